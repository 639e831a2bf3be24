import type * as AST from '../types.js';
import { AstNotImplementedError, AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import {
  isAnyNode,
  isArguments,
  isBlock,
  isClassMember,
  isDataType,
  isExpression,
  isFunctionDef,
  isFunctionPrototype,
  isKind,
  isLiteral,
  isModule,
  isPackage,
  isTarget,
  isVariable,
  isVariableDeclaration,
  isArgument,
  isComplexKind,
  isFloatKind,
  isIntegerKind,
  isScalarTypeKind,
  isTemporalKind,
  isTextKind,
  literalScalarKind,
  type NodeGuard,
} from '../ast/guards.js';
import { Ast } from '../ast/ast.js';
import {
  COMPLEX_LITERALS,
  FLOAT_LITERALS,
  INTEGER_LITERALS,
  TEMPORAL_LITERALS,
  TEXT_LITERALS,
} from '../datatypes/literals.js';
import {
  isAugAssignOperator,
  isBinaryOperator,
  isBoolOperator,
  isCompareOperator,
  isUnaryOperator,
} from '../operators/promotion.js';
import { isReprList, isReprStruct, structEntry } from './struct.js';

/**
 * @module decode
 *
 * 结构化表示 → 节点树。所有节点都经由工厂函数重建，
 * 因此解码出的树与手工构造的树接受完全相同的构造期校验。
 */

const KIND_RE = /^[A-Za-z][A-Za-z0-9]*/;
const INTEGER_RE = /^-?\d+$/;

const VISIBILITIES: readonly AST.VisibilityKind[] = ['public', 'private', 'protected'];
const SCOPES: readonly AST.ScopeKind[] = ['global', 'local'];
const MUTABILITIES: readonly AST.MutabilityKind[] = ['constant', 'mutable'];

const isCaseStmt = isKind('CaseStmt');
const isCatchHandler = isKind('CatchHandlerStmt');
const isFinallyHandler = isKind('FinallyHandlerStmt');
const isClause = isKind('ComprehensionClause');
const isAlias = isKind('AliasExpr');
const isWithItem = isKind('WithItem');

function malformed(message: string): AstValueError {
  return new AstValueError(DiagnosticCode.V009_MalformedStruct, message);
}

/** 从 tag 中取出 kind：`LiteralInt8[100]#12` → `LiteralInt8` */
export function parseKind(tag: string): string {
  const match = KIND_RE.exec(tag);
  if (!match) throw malformed(`Cannot read a node kind from tag '${tag}'`);
  return match[0];
}

/** 按槽位读取并校验一个节点的结构体 */
class StructReader {
  constructor(
    private readonly kind: string,
    private readonly body: AST.ReprStruct
  ) {}

  private raw(key: string): AST.ReprValue {
    const value = this.body[key];
    if (value === undefined) throw malformed(`${this.kind} is missing slot '${key}'`);
    return value;
  }

  private expected(key: string, what: string): AstValueError {
    return malformed(`${this.kind}.${key} expects ${what}`);
  }

  node<T extends AST.AstNode>(key: string, guard: NodeGuard<T>, what: string = 'a node'): T {
    const node = this.optionalNode(key, guard, what);
    if (node === null) throw this.expected(key, what);
    return node;
  }

  optionalNode<T extends AST.AstNode>(key: string, guard: NodeGuard<T>, what: string = 'a node'): T | null {
    const value = this.raw(key);
    if (value === null) return null;
    if (!isReprStruct(value)) throw this.expected(key, what);
    const node = decodeStruct(value);
    if (!guard(node)) throw malformed(`${this.kind}.${key} expects ${what}, got ${node.kind}`);
    return node;
  }

  nodes<T extends AST.AstNode>(key: string, guard: NodeGuard<T>, what: string = 'nodes'): T[] {
    const value = this.raw(key);
    if (!isReprList(value)) throw this.expected(key, `a list of ${what}`);
    return value.map(item => {
      if (!isReprStruct(item)) throw this.expected(key, `a list of ${what}`);
      const node = decodeStruct(item);
      if (!guard(node)) throw malformed(`${this.kind}.${key} expects ${what}, got ${node.kind}`);
      return node;
    });
  }

  string(key: string): string {
    const value = this.raw(key);
    if (typeof value !== 'string') throw this.expected(key, 'a string');
    return value;
  }

  optionalString(key: string): string | null {
    const value = this.raw(key);
    if (value === null) return null;
    if (typeof value !== 'string') throw this.expected(key, 'a string or null');
    return value;
  }

  strings(key: string): string[] {
    const value = this.raw(key);
    if (!isReprList(value)) throw this.expected(key, 'a list of strings');
    return value.map(item => {
      if (typeof item !== 'string') throw this.expected(key, 'a list of strings');
      return item;
    });
  }

  number(key: string): number {
    const value = this.raw(key);
    if (typeof value !== 'number') throw this.expected(key, 'a number');
    return value;
  }

  /** 安全整数写作 number，超出范围的写作十进制字符串 */
  integer(key: string): bigint {
    const value = this.raw(key);
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
    if (typeof value === 'string' && INTEGER_RE.test(value)) return BigInt(value);
    throw this.expected(key, 'an integer');
  }

  boolean(key: string): boolean {
    const value = this.raw(key);
    if (typeof value !== 'boolean') throw this.expected(key, 'a boolean');
    return value;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    const value = this.raw(key);
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) throw this.expected(key, `one of ${allowed.join(', ')}`);
    return match;
  }

  operator<T extends string>(key: string, guard: (op: string) => op is T): T {
    const value = this.string(key);
    if (!guard(value)) {
      throw new AstValueError(DiagnosticCode.V009_MalformedStruct, `${this.kind}.${key}: unknown operator '${value}'`);
    }
    return value;
  }
}

function decodeScalar(kind: string, r: StructReader): AST.AstNode | null {
  if (isScalarTypeKind(kind)) return Ast[kind]();

  const scalar = literalScalarKind(kind);
  if (scalar === null) return null;
  if (isIntegerKind(scalar)) return INTEGER_LITERALS[scalar](r.integer('value'));
  if (isFloatKind(scalar)) return FLOAT_LITERALS[scalar](r.number('value'));
  if (isComplexKind(scalar)) return COMPLEX_LITERALS[scalar](r.number('real'), r.number('imag'));
  if (isTextKind(scalar)) return TEXT_LITERALS[scalar](r.string('value'));
  if (isTemporalKind(scalar)) return TEMPORAL_LITERALS[scalar](r.string('value'));
  if (scalar === 'Boolean') return Ast.LiteralBoolean(r.boolean('value'));
  if (scalar === 'NoneType') return Ast.LiteralNone();
  return null;
}

function decodeNode(kind: string, r: StructReader): AST.AstNode {
  const scalar = decodeScalar(kind, r);
  if (scalar !== null) return scalar;

  const expr = (key: string): AST.Expression => r.node(key, isExpression, 'an expression');
  const optExpr = (key: string): AST.Expression | null => r.optionalNode(key, isExpression, 'an expression');
  const type = (key: string): AST.DataType => r.node(key, isDataType, 'a data type');
  const block = (key: string): AST.Block => r.node(key, isBlock, 'a Block');
  const variable = (key: string): AST.Variable => r.node(key, isVariable, 'a Variable');

  switch (kind) {
    case 'ListType':
      return Ast.ListType(r.nodes('element-types', isDataType), { heterogeneous: r.boolean('heterogeneous') });
    case 'SetType':
      return Ast.SetType(r.nodes('element-types', isDataType), { heterogeneous: r.boolean('heterogeneous') });
    case 'MapType':
      return Ast.MapType(type('key-type'), type('value-type'));
    case 'TupleType':
      return Ast.TupleType(r.nodes('element-types', isDataType));
    case 'StructType':
      return Ast.StructType(r.string('name'));
    case 'ClassType':
      return Ast.ClassType(r.string('name'));
    case 'EnumType':
      return Ast.EnumType(r.string('name'));
    case 'FunctionType':
      return Ast.FunctionType(r.nodes('param-types', isDataType), type('return-type'));

    case 'LiteralList':
      return Ast.LiteralList(r.nodes('elements', isLiteral, 'literals'));
    case 'LiteralTuple':
      return Ast.LiteralTuple(r.nodes('elements', isLiteral, 'literals'));
    case 'LiteralSet':
      return Ast.LiteralSet(r.nodes('elements', isLiteral, 'literals'));
    case 'LiteralMap': {
      const keys = r.nodes('keys', isLiteral, 'literals');
      const values = r.nodes('values', isLiteral, 'literals');
      if (keys.length !== values.length) throw malformed('LiteralMap keys and values differ in length');
      const entries = keys.map((key, i) => {
        const value = values[i];
        if (value === undefined) throw malformed(`LiteralMap is missing the value at index ${i}`);
        return [key, value] as const;
      });
      return Ast.LiteralMap(entries);
    }

    case 'Variable':
      return Ast.Variable(r.string('name'), type('type'));
    case 'UnaryOp':
      return Ast.UnaryOp(r.operator('op', isUnaryOperator), expr('operand'));
    case 'BinaryOp':
      return Ast.BinaryOp(r.operator('op', isBinaryOperator), expr('lhs'), expr('rhs'));
    case 'CompareOp':
      return Ast.CompareOp(r.operator('op', isCompareOperator), expr('lhs'), expr('rhs'));
    case 'BoolOp':
      return Ast.BoolOp(r.operator('op', isBoolOperator), expr('lhs'), expr('rhs'));
    case 'AugAssign':
      return Ast.AugAssign(r.operator('op', isAugAssignOperator), expr('target'), expr('value'));
    case 'WalrusOp':
      return Ast.WalrusOp(expr('target'), expr('value'));
    case 'Starred':
      return Ast.Starred(expr('value'));
    case 'TypeCastExpr':
      return Ast.TypeCastExpr(expr('value'), type('type'));
    case 'ParenthesizedExpr':
      return Ast.ParenthesizedExpr(expr('value'));
    case 'SubscriptExpr':
      return Ast.SubscriptExpr(expr('value'), {
        index: optExpr('index'),
        lower: optExpr('lower'),
        upper: optExpr('upper'),
        step: optExpr('step'),
      });
    case 'FunctionCall':
      return Ast.FunctionCall(
        { name: r.string('callee'), returnType: type('return-type') },
        r.nodes('args', isExpression, 'expressions')
      );
    case 'LambdaExpr':
      return Ast.LambdaExpr(r.node('params', isArguments, 'Arguments'), expr('body'));
    case 'AwaitExpr':
      return Ast.AwaitExpr(expr('value'));
    case 'YieldExpr':
      return Ast.YieldExpr(optExpr('value'));
    case 'IfExpr':
      return Ast.IfExpr(expr('condition'), expr('then-expr'), expr('else-expr'));
    case 'ForRangeLoopExpr':
      return Ast.ForRangeLoopExpr(variable('variable'), expr('start'), expr('end'), expr('step'), block('body'));
    case 'ForRangeLoopStmt':
      return Ast.ForRangeLoopStmt(variable('variable'), expr('start'), expr('end'), expr('step'), block('body'));
    case 'ForCountLoopExpr':
      return Ast.ForCountLoopExpr(
        r.node('initializer', isVariableDeclaration, 'a VariableDeclaration'),
        expr('condition'),
        expr('update'),
        block('body')
      );
    case 'ForCountLoopStmt':
      return Ast.ForCountLoopStmt(
        r.node('initializer', isVariableDeclaration, 'a VariableDeclaration'),
        expr('condition'),
        expr('update'),
        block('body')
      );
    case 'WhileExpr':
      return Ast.WhileExpr(expr('condition'), block('body'));
    case 'WhileStmt':
      return Ast.WhileStmt(expr('condition'), block('body'));
    case 'DoWhileStmt':
      return Ast.DoWhileStmt(block('body'), expr('condition'));
    case 'ComprehensionClause':
      return Ast.ComprehensionClause(
        expr('target'),
        expr('iterable'),
        r.nodes('conditions', isExpression, 'expressions'),
        r.boolean('is-async')
      );
    case 'ListComprehension':
      return Ast.ListComprehension(expr('element'), r.nodes('clauses', isClause, 'ComprehensionClause nodes'));
    case 'SetComprehension':
      return Ast.SetComprehension(expr('element'), r.nodes('clauses', isClause, 'ComprehensionClause nodes'));
    case 'GeneratorExpr':
      return Ast.GeneratorExpr(expr('element'), r.nodes('clauses', isClause, 'ComprehensionClause nodes'));
    case 'DictComprehension':
      return Ast.DictComprehension(
        expr('key'),
        expr('value'),
        r.nodes('clauses', isClause, 'ComprehensionClause nodes')
      );
    case 'AliasExpr':
      return Ast.AliasExpr(r.string('name'), r.optionalString('asname'));
    case 'ImportExpr':
      return Ast.ImportExpr(r.nodes('names', isAlias, 'AliasExpr nodes'));
    case 'ImportStmt':
      return Ast.ImportStmt(r.nodes('names', isAlias, 'AliasExpr nodes'));
    case 'ImportFromExpr':
      return Ast.ImportFromExpr(r.optionalString('module'), r.nodes('names', isAlias, 'AliasExpr nodes'), r.number('level'));
    case 'ImportFromStmt':
      return Ast.ImportFromStmt(r.optionalString('module'), r.nodes('names', isAlias, 'AliasExpr nodes'), r.number('level'));

    case 'Block':
      return Ast.Block(r.nodes('nodes', isAnyNode), r.string('name'));
    case 'VariableDeclaration':
      return Ast.VariableDeclaration(r.string('name'), type('type'), optExpr('value'), {
        mutability: r.oneOf('mutability', MUTABILITIES),
        visibility: r.oneOf('visibility', VISIBILITIES),
        scope: r.oneOf('scope', SCOPES),
      });
    case 'VariableAssignment':
      return Ast.VariableAssignment(expr('target'), expr('value'));
    case 'DeleteStmt':
      return Ast.DeleteStmt(r.nodes('targets', isExpression, 'expressions'));
    case 'IfStmt':
      return Ast.IfStmt(expr('condition'), block('then-block'), r.optionalNode('else-block', isBlock, 'a Block'));
    case 'BreakStmt':
      return Ast.BreakStmt();
    case 'ContinueStmt':
      return Ast.ContinueStmt();
    case 'CaseStmt':
      return Ast.CaseStmt(optExpr('condition'), block('body'), r.boolean('is-default'));
    case 'SwitchStmt':
      return Ast.SwitchStmt(expr('value'), r.nodes('cases', isCaseStmt, 'CaseStmt nodes'));
    case 'ThrowStmt':
      return Ast.ThrowStmt(optExpr('exception'));
    case 'CatchHandlerStmt':
      return Ast.CatchHandlerStmt(r.strings('types'), r.optionalString('name'), block('body'));
    case 'FinallyHandlerStmt':
      return Ast.FinallyHandlerStmt(block('body'));
    case 'ExceptionHandlerStmt':
      return Ast.ExceptionHandlerStmt(
        block('body'),
        r.nodes('handlers', isCatchHandler, 'CatchHandlerStmt nodes'),
        r.optionalNode('finally-handler', isFinallyHandler, 'a FinallyHandlerStmt')
      );
    case 'WithItem':
      return Ast.WithItem(expr('context-expr'), r.optionalString('instance-name'));
    case 'WithStmt':
      return Ast.WithStmt(r.nodes('items', isWithItem, 'WithItem nodes'), block('body'));
    case 'Argument':
      return Ast.Argument(r.string('name'), type('type'), optExpr('default-value'));
    case 'Arguments':
      return Ast.Arguments(r.nodes('nodes', isArgument, 'Argument nodes'));
    case 'FunctionPrototype':
      return Ast.FunctionPrototype(r.string('name'), r.node('args', isArguments, 'Arguments'), type('return-type'), {
        scope: r.oneOf('scope', SCOPES),
        visibility: r.oneOf('visibility', VISIBILITIES),
      });
    case 'FunctionDef':
      return Ast.FunctionDef(r.node('prototype', isFunctionPrototype, 'a FunctionPrototype'), block('body'));
    case 'FunctionAsyncDef':
      return Ast.FunctionAsyncDef(r.node('prototype', isFunctionPrototype, 'a FunctionPrototype'), block('body'));
    case 'FunctionReturn':
      return Ast.FunctionReturn(optExpr('value'));
    case 'ClassDeclStmt':
      return Ast.ClassDeclStmt(r.string('name'), {
        bases: r.strings('bases'),
        visibility: r.oneOf('visibility', VISIBILITIES),
        isAbstract: r.boolean('is-abstract'),
      });
    case 'ClassDefStmt':
      return Ast.ClassDefStmt(r.string('name'), r.nodes('members', isClassMember, 'class members'), {
        bases: r.strings('bases'),
        visibility: r.oneOf('visibility', VISIBILITIES),
        isAbstract: r.boolean('is-abstract'),
      });
    case 'StructDeclStmt':
      return Ast.StructDeclStmt(r.string('name'), { visibility: r.oneOf('visibility', VISIBILITIES) });
    case 'StructDefStmt':
      return Ast.StructDefStmt(
        r.string('name'),
        r.nodes('attributes', isVariableDeclaration, 'VariableDeclaration nodes'),
        r.nodes('methods', isFunctionDef, 'FunctionDef nodes'),
        { visibility: r.oneOf('visibility', VISIBILITIES) }
      );
    case 'EnumDeclStmt':
      return Ast.EnumDeclStmt(r.string('name'), r.nodes('members', isVariableDeclaration, 'VariableDeclaration nodes'), {
        visibility: r.oneOf('visibility', VISIBILITIES),
      });

    case 'Module':
      return Ast.Module(r.string('name'), r.nodes('nodes', isAnyNode));
    case 'Package':
      return Ast.Package(r.string('name'), r.nodes('modules', isModule, 'Module nodes'), r.nodes('packages', isPackage, 'Package nodes'));
    case 'Target':
      return Ast.Target(r.string('datalayout'), r.string('triple'));
    case 'Program':
      return Ast.Program(r.string('name'), r.node('target', isTarget, 'a Target'), r.nodes('packages', isPackage, 'Package nodes'));

    default:
      throw new AstNotImplementedError(DiagnosticCode.N002_UnknownNodeKind, `Cannot decode unknown node kind '${kind}'`);
  }
}

/** 解码一个 `{ tag: { ... } }` 结构；tag 中的 `#id` 与标签被忽略 */
export function decodeStruct(struct: AST.ReprStruct): AST.AstNode {
  const entry = structEntry(struct);
  if (entry === null) throw malformed('Struct must map exactly one tag to a slot object');
  const kind = parseKind(entry.tag);
  return decodeNode(kind, new StructReader(kind, entry.body));
}
