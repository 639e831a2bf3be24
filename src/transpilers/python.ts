import type * as AST from '../types.js';
import { AstNotImplementedError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { ConfigService } from '../config/config-service.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { AstVisitor } from '../core/visitor.js';
import { parentOf } from '../ast/identity.js';
import { isIntegerKind, isTemporalKind, literalScalarKind } from '../ast/guards.js';
import { typeLabel } from '../datatypes/data_types.js';

/**
 * 参考转译器：把节点树渲染为 Python 源码。
 *
 * 每个 visit 方法返回以第 0 列为起点的文本，嵌套层次由 `suite()` 统一加缩进，
 * 因此同一节点无论出现在何处，渲染结果都只差一个整体缩进。
 *
 * 输出用到的标准库名字（dataclass、Enum、Final 等）在渲染过程中收集，
 * 由 `transpile()` 统一放到结果顶部。
 *
 * @example
 * ```typescript
 * const source = new PythonTranspiler().transpile(module);
 * ```
 */

const BOOL_OPERATORS: Readonly<Record<AST.BoolOperator, (lhs: string, rhs: string) => string>> = {
  and: (lhs, rhs) => `(${lhs} and ${rhs})`,
  or: (lhs, rhs) => `(${lhs} or ${rhs})`,
  xor: (lhs, rhs) => `(bool(${lhs}) != bool(${rhs}))`,
  nand: (lhs, rhs) => `(not (${lhs} and ${rhs}))`,
  nor: (lhs, rhs) => `(not (${lhs} or ${rhs}))`,
  xnor: (lhs, rhs) => `(bool(${lhs}) == bool(${rhs}))`,
};

/** 可直接作为 match 字面量模式的常量 */
function isPatternLiteral(node: AST.Expression): boolean {
  if (node.kind === 'LiteralNone') return true;
  const scalar = literalScalarKind(node.kind);
  return scalar !== null && !isTemporalKind(scalar);
}

const TEMPORAL_CONSTRUCTORS: Readonly<Record<AST.TemporalKind, string>> = {
  Date: 'datetime.date',
  Time: 'datetime.time',
  DateTime: 'datetime.datetime',
  Timestamp: 'datetime.datetime',
};

export interface PythonTranspilerOptions {
  /** 缩进宽度，默认取 ConfigService.indentWidth */
  readonly indentWidth?: number;
  readonly logger?: Logger;
}

export class PythonTranspiler extends AstVisitor<string> {
  private readonly indentUnit: string;
  private readonly logger: Logger;
  private readonly imports = new Set<string>();
  /** 每层循环（及函数体）一项：计数循环为其 update，continue 之前须先执行；其余为 null */
  private readonly continueUpdates: Array<AST.Expression | null> = [];

  constructor(options: PythonTranspilerOptions = {}) {
    super();
    this.indentUnit = ' '.repeat(options.indentWidth ?? ConfigService.getInstance().indentWidth);
    this.logger = options.logger ?? createLogger('transpiler').child('python');
  }

  /** 渲染整棵树，并在顶部加上所需的 import 行 */
  transpile(node: AST.AstNode): string {
    this.logger.debug('Transpiling node tree to Python', { kind: node.kind, id: node.id });
    this.imports.clear();
    this.continueUpdates.length = 0;
    const body = this.visit(node);
    if (this.imports.size === 0) return body;
    return `${[...this.imports].sort().join('\n')}\n\n${body}`;
  }

  // ---------------------------------------------------------------------------
  // 辅助
  // ---------------------------------------------------------------------------

  private indent(text: string): string {
    return text
      .split('\n')
      .map(line => (line.length === 0 ? line : this.indentUnit + line))
      .join('\n');
  }

  private suite(block: AST.Block): string {
    return this.indent(this.visit(block));
  }

  private lines(nodes: readonly AST.AstNode[]): string {
    return nodes.map(node => this.visit(node)).join('\n');
  }

  private withContinueTarget(update: AST.Expression | null, render: () => string): string {
    this.continueUpdates.push(update);
    try {
      return render();
    } finally {
      this.continueUpdates.pop();
    }
  }

  /** 循环体与函数体开启新的 continue 目标 */
  private innerSuite(block: AST.Block): string {
    return this.withContinueTarget(null, () => this.suite(block));
  }

  private range(node: AST.ForRangeLoopStmt | AST.ForRangeLoopExpr): string {
    for (const bound of [node.start, node.end, node.step]) {
      if (!isIntegerKind(bound.type.kind)) {
        throw new AstNotImplementedError(
          DiagnosticCode.N001_UnhandledVariant,
          `${node.kind} bound of type ${typeLabel(bound.type)} has no Python range() form`,
          { node: bound }
        );
      }
    }
    return `range(${this.visit(node.start)}, ${this.visit(node.end)}, ${this.visit(node.step)})`;
  }

  private casePattern(node: AST.CaseStmt): string {
    const condition = node.condition;
    if (condition === null) return '_';
    if (isPatternLiteral(condition)) return this.visit(condition);
    // 名字在 case 中是捕获模式，非字面量条件改写为守卫
    const parent = parentOf(node);
    if (parent === null || parent.kind !== 'SwitchStmt') {
      throw new AstNotImplementedError(
        DiagnosticCode.N001_UnhandledVariant,
        'CaseStmt with a non-literal condition has no Python form outside a SwitchStmt',
        { node }
      );
    }
    return `_ if ${this.visit(parent.value)} == ${this.visit(condition)}`;
  }

  // match 不会贯穿到下一个 case，结尾的 break 去掉
  private caseBody(body: AST.Block): string {
    const nodes = body.nodes.at(-1)?.kind === 'BreakStmt' ? body.nodes.slice(0, -1) : body.nodes;
    return nodes.length === 0 ? 'pass' : this.lines(nodes);
  }

  private annotation(type: AST.DataType): string {
    switch (type.kind) {
      case 'Int8':
      case 'Int16':
      case 'Int32':
      case 'Int64':
      case 'Int128':
      case 'UInt8':
      case 'UInt16':
      case 'UInt32':
      case 'UInt64':
      case 'UInt128':
        return 'int';
      case 'Float16':
      case 'Float32':
      case 'Float64':
        return 'float';
      case 'Complex32':
      case 'Complex64':
        return 'complex';
      case 'Boolean':
        return 'bool';
      case 'UTF8Char':
      case 'String':
      case 'UTF8String':
        return 'str';
      case 'Date':
      case 'Time':
      case 'DateTime':
      case 'Timestamp':
        this.imports.add('import datetime');
        return TEMPORAL_CONSTRUCTORS[type.kind];
      case 'NoneType':
        return 'None';
      case 'UndefinedType':
        this.imports.add('from typing import Any');
        return 'Any';
      case 'ListType':
        return `list[${this.elementAnnotation(type.elementTypes)}]`;
      case 'SetType':
        return `set[${this.elementAnnotation(type.elementTypes)}]`;
      case 'MapType':
        return `dict[${this.annotation(type.keyType)}, ${this.annotation(type.valueType)}]`;
      case 'TupleType':
        return type.elementTypes.length === 0
          ? 'tuple[()]'
          : `tuple[${type.elementTypes.map(t => this.annotation(t)).join(', ')}]`;
      case 'StructType':
      case 'ClassType':
      case 'EnumType':
        return type.name;
      case 'FunctionType':
        this.imports.add('from typing import Callable');
        return `Callable[[${type.paramTypes.map(t => this.annotation(t)).join(', ')}], ${this.annotation(type.returnType)}]`;
    }
  }

  private elementAnnotation(types: readonly AST.DataType[]): string {
    if (types.length === 0) {
      this.imports.add('from typing import Any');
      return 'Any';
    }
    return [...new Set(types.map(t => this.annotation(t)))].join(' | ');
  }

  private float(value: number): string {
    return Number.isInteger(value) && Math.abs(value) < 1e16 ? value.toFixed(1) : String(value);
  }

  private comprehension(clauses: readonly AST.ComprehensionClause[]): string {
    return clauses.map(clause => this.visit(clause)).join(' ');
  }

  private signature(prototype: AST.FunctionPrototype): string {
    return `${prototype.name}(${this.visit(prototype.args)}) -> ${this.annotation(prototype.returnType)}`;
  }

  private classHeader(name: string, bases: readonly string[], isAbstract: boolean): string {
    const all = [...bases];
    if (isAbstract) {
      this.imports.add('from abc import ABC');
      all.push('ABC');
    }
    return all.length === 0 ? `class ${name}` : `class ${name}(${all.join(', ')})`;
  }

  private aliases(names: readonly AST.AliasExpr[]): string {
    return names.map(alias => this.visit(alias)).join(', ');
  }

  private importFrom(node: AST.ImportFromStmt | AST.ImportFromExpr): string {
    return `from ${'.'.repeat(node.level)}${node.module ?? ''} import ${this.aliases(node.names)}`;
  }

  // ---------------------------------------------------------------------------
  // 字面量
  // ---------------------------------------------------------------------------

  override visitLiteralInt8(node: AST.NodeOfKind<'LiteralInt8'>): string {
    return node.value.toString();
  }
  override visitLiteralInt16(node: AST.NodeOfKind<'LiteralInt16'>): string {
    return node.value.toString();
  }
  override visitLiteralInt32(node: AST.NodeOfKind<'LiteralInt32'>): string {
    return node.value.toString();
  }
  override visitLiteralInt64(node: AST.NodeOfKind<'LiteralInt64'>): string {
    return node.value.toString();
  }
  override visitLiteralInt128(node: AST.NodeOfKind<'LiteralInt128'>): string {
    return node.value.toString();
  }
  override visitLiteralUInt8(node: AST.NodeOfKind<'LiteralUInt8'>): string {
    return node.value.toString();
  }
  override visitLiteralUInt16(node: AST.NodeOfKind<'LiteralUInt16'>): string {
    return node.value.toString();
  }
  override visitLiteralUInt32(node: AST.NodeOfKind<'LiteralUInt32'>): string {
    return node.value.toString();
  }
  override visitLiteralUInt64(node: AST.NodeOfKind<'LiteralUInt64'>): string {
    return node.value.toString();
  }
  override visitLiteralUInt128(node: AST.NodeOfKind<'LiteralUInt128'>): string {
    return node.value.toString();
  }

  override visitLiteralFloat16(node: AST.NodeOfKind<'LiteralFloat16'>): string {
    return this.float(node.value);
  }
  override visitLiteralFloat32(node: AST.NodeOfKind<'LiteralFloat32'>): string {
    return this.float(node.value);
  }
  override visitLiteralFloat64(node: AST.NodeOfKind<'LiteralFloat64'>): string {
    return this.float(node.value);
  }

  override visitLiteralComplex32(node: AST.NodeOfKind<'LiteralComplex32'>): string {
    return `complex(${this.float(node.real)}, ${this.float(node.imag)})`;
  }
  override visitLiteralComplex64(node: AST.NodeOfKind<'LiteralComplex64'>): string {
    return `complex(${this.float(node.real)}, ${this.float(node.imag)})`;
  }

  override visitLiteralBoolean(node: AST.LiteralBoolean): string {
    return node.value ? 'True' : 'False';
  }

  // JSON 字符串转义是 Python 字符串字面量的子集
  override visitLiteralUTF8Char(node: AST.NodeOfKind<'LiteralUTF8Char'>): string {
    return JSON.stringify(node.value);
  }
  override visitLiteralString(node: AST.NodeOfKind<'LiteralString'>): string {
    return JSON.stringify(node.value);
  }
  override visitLiteralUTF8String(node: AST.NodeOfKind<'LiteralUTF8String'>): string {
    return JSON.stringify(node.value);
  }

  override visitLiteralDate(node: AST.NodeOfKind<'LiteralDate'>): string {
    return `${this.annotation(node.type)}.fromisoformat(${JSON.stringify(node.value)})`;
  }
  override visitLiteralTime(node: AST.NodeOfKind<'LiteralTime'>): string {
    return `${this.annotation(node.type)}.fromisoformat(${JSON.stringify(node.value)})`;
  }
  override visitLiteralDateTime(node: AST.NodeOfKind<'LiteralDateTime'>): string {
    return `${this.annotation(node.type)}.fromisoformat(${JSON.stringify(node.value)})`;
  }
  override visitLiteralTimestamp(node: AST.NodeOfKind<'LiteralTimestamp'>): string {
    return `${this.annotation(node.type)}.fromisoformat(${JSON.stringify(node.value)})`;
  }

  override visitLiteralNone(_node: AST.LiteralNone): string {
    return 'None';
  }

  override visitLiteralList(node: AST.LiteralList): string {
    return `[${this.visitAll(node.elements).join(', ')}]`;
  }

  override visitLiteralTuple(node: AST.LiteralTuple): string {
    const items = this.visitAll(node.elements);
    return items.length === 1 ? `(${items[0] ?? ''},)` : `(${items.join(', ')})`;
  }

  override visitLiteralSet(node: AST.LiteralSet): string {
    return node.elements.length === 0 ? 'set()' : `{${this.visitAll(node.elements).join(', ')}}`;
  }

  override visitLiteralMap(node: AST.LiteralMap): string {
    const entries = node.keys.map((key, i) => {
      const value = node.values[i];
      return `${this.visit(key)}: ${value === undefined ? 'None' : this.visit(value)}`;
    });
    return `{${entries.join(', ')}}`;
  }

  // ---------------------------------------------------------------------------
  // 表达式
  // ---------------------------------------------------------------------------

  override visitVariable(node: AST.Variable): string {
    return node.name;
  }

  override visitUnaryOp(node: AST.UnaryOp): string {
    const operand = this.visit(node.operand);
    return node.op === 'not' ? `(not ${operand})` : `(${node.op}${operand})`;
  }

  override visitBinaryOp(node: AST.BinaryOp): string {
    return `(${this.visit(node.lhs)} ${node.op} ${this.visit(node.rhs)})`;
  }

  override visitCompareOp(node: AST.CompareOp): string {
    return `(${this.visit(node.lhs)} ${node.op} ${this.visit(node.rhs)})`;
  }

  override visitBoolOp(node: AST.BoolOp): string {
    return BOOL_OPERATORS[node.op](this.visit(node.lhs), this.visit(node.rhs));
  }

  override visitAugAssign(node: AST.AugAssign): string {
    return `${this.visit(node.target)} ${node.op} ${this.visit(node.value)}`;
  }

  override visitWalrusOp(node: AST.WalrusOp): string {
    return `(${this.visit(node.target)} := ${this.visit(node.value)})`;
  }

  override visitStarred(node: AST.Starred): string {
    return `*${this.visit(node.value)}`;
  }

  override visitTypeCastExpr(node: AST.TypeCastExpr): string {
    this.imports.add('from typing import cast');
    return `cast(${this.annotation(node.type)}, ${this.visit(node.value)})`;
  }

  override visitParenthesizedExpr(node: AST.ParenthesizedExpr): string {
    return `(${this.visit(node.value)})`;
  }

  override visitSubscriptExpr(node: AST.SubscriptExpr): string {
    const value = this.visit(node.value);
    if (node.index !== null) return `${value}[${this.visit(node.index)}]`;
    const part = (expr: AST.Expression | null): string => (expr === null ? '' : this.visit(expr));
    const slice = `${part(node.lower)}:${part(node.upper)}`;
    return node.step === null ? `${value}[${slice}]` : `${value}[${slice}:${this.visit(node.step)}]`;
  }

  override visitFunctionCall(node: AST.FunctionCall): string {
    return `${node.callee}(${this.visitAll(node.args).join(', ')})`;
  }

  override visitLambdaExpr(node: AST.LambdaExpr): string {
    const params = node.params.nodes
      .map(arg => (arg.defaultValue === null ? arg.name : `${arg.name}=${this.visit(arg.defaultValue)}`))
      .join(', ');
    return params.length === 0 ? `(lambda: ${this.visit(node.body)})` : `(lambda ${params}: ${this.visit(node.body)})`;
  }

  override visitAwaitExpr(node: AST.AwaitExpr): string {
    return `(await ${this.visit(node.value)})`;
  }

  override visitYieldExpr(node: AST.YieldExpr): string {
    return node.value === null ? '(yield)' : `(yield ${this.visit(node.value)})`;
  }

  override visitIfExpr(node: AST.IfExpr): string {
    return `(${this.visit(node.thenExpr)} if ${this.visit(node.condition)} else ${this.visit(node.elseExpr)})`;
  }

  override visitForRangeLoopExpr(node: AST.ForRangeLoopExpr): string {
    const [element, ...rest] = node.body.nodes;
    if (rest.length > 0) {
      throw new AstNotImplementedError(
        DiagnosticCode.N001_UnhandledVariant,
        'ForRangeLoopExpr with more than one body node has no Python list-comprehension form',
        { node }
      );
    }
    const value = element === undefined ? 'None' : this.visit(element);
    return `[${value} for ${node.variable.name} in ${this.range(node)}]`;
  }

  override visitComprehensionClause(node: AST.ComprehensionClause): string {
    const head = `${node.isAsync ? 'async ' : ''}for ${node.target.name} in ${this.visit(node.iterable)}`;
    return [head, ...node.conditions.map(c => `if ${this.visit(c)}`)].join(' ');
  }

  override visitListComprehension(node: AST.ListComprehension): string {
    return `[${this.visit(node.element)} ${this.comprehension(node.clauses)}]`;
  }

  override visitSetComprehension(node: AST.SetComprehension): string {
    return `{${this.visit(node.element)} ${this.comprehension(node.clauses)}}`;
  }

  override visitDictComprehension(node: AST.DictComprehension): string {
    return `{${this.visit(node.key)}: ${this.visit(node.value)} ${this.comprehension(node.clauses)}}`;
  }

  override visitGeneratorExpr(node: AST.GeneratorExpr): string {
    return `(${this.visit(node.element)} ${this.comprehension(node.clauses)})`;
  }

  override visitAliasExpr(node: AST.AliasExpr): string {
    return node.asname === null ? node.name : `${node.name} as ${node.asname}`;
  }

  override visitImportExpr(node: AST.ImportExpr): string {
    return `import ${this.aliases(node.names)}`;
  }

  override visitImportFromExpr(node: AST.ImportFromExpr): string {
    return this.importFrom(node);
  }

  // ---------------------------------------------------------------------------
  // 语句
  // ---------------------------------------------------------------------------

  override visitBlock(node: AST.Block): string {
    return node.nodes.length === 0 ? 'pass' : this.lines(node.nodes);
  }

  override visitVariableDeclaration(node: AST.VariableDeclaration): string {
    let annotation = this.annotation(node.type);
    if (node.mutability === 'constant') {
      this.imports.add('from typing import Final');
      annotation = `Final[${annotation}]`;
    }
    return node.value === null ? `${node.name}: ${annotation}` : `${node.name}: ${annotation} = ${this.visit(node.value)}`;
  }

  override visitVariableAssignment(node: AST.VariableAssignment): string {
    return `${this.visit(node.target)} = ${this.visit(node.value)}`;
  }

  override visitDeleteStmt(node: AST.DeleteStmt): string {
    return `del ${this.visitAll(node.targets).join(', ')}`;
  }

  override visitIfStmt(node: AST.IfStmt): string {
    const head = `if ${this.visit(node.condition)}:\n${this.suite(node.thenBlock)}`;
    const elseBlock = node.elseBlock;
    if (elseBlock === null) return head;
    const [only, ...rest] = elseBlock.nodes;
    // else 中只有一个 if 时折叠为 elif
    if (only !== undefined && only.kind === 'IfStmt' && rest.length === 0) {
      return `${head}\nel${this.visit(only)}`;
    }
    return `${head}\nelse:\n${this.suite(elseBlock)}`;
  }

  override visitForRangeLoopStmt(node: AST.ForRangeLoopStmt): string {
    return `for ${node.variable.name} in ${this.range(node)}:\n${this.innerSuite(node.body)}`;
  }

  // 计数循环展开为 while：update 放在循环体末尾，并在本循环的每个 continue 之前重复一次
  override visitForCountLoopStmt(node: AST.ForCountLoopStmt): string {
    const body = this.withContinueTarget(node.update, () => this.indent(this.lines([...node.body.nodes, node.update])));
    return `${this.visit(node.initializer)}\nwhile ${this.visit(node.condition)}:\n${body}`;
  }

  override visitWhileStmt(node: AST.WhileStmt): string {
    return `while ${this.visit(node.condition)}:\n${this.innerSuite(node.body)}`;
  }

  override visitDoWhileStmt(node: AST.DoWhileStmt): string {
    const exit = `if not ${this.visit(node.condition)}:\n${this.indent('break')}`;
    const body = this.withContinueTarget(null, () =>
      node.body.nodes.length === 0 ? exit : `${this.lines(node.body.nodes)}\n${exit}`
    );
    return `while True:\n${this.indent(body)}`;
  }

  override visitBreakStmt(_node: AST.BreakStmt): string {
    return 'break';
  }

  override visitContinueStmt(_node: AST.ContinueStmt): string {
    const update = this.continueUpdates.at(-1) ?? null;
    return update === null ? 'continue' : `${this.visit(update)}\ncontinue`;
  }

  override visitCaseStmt(node: AST.CaseStmt): string {
    return `case ${this.casePattern(node)}:\n${this.indent(this.caseBody(node.body))}`;
  }

  override visitSwitchStmt(node: AST.SwitchStmt): string {
    const head = `match ${this.visit(node.value)}:`;
    if (node.cases.length === 0) return `${head}\n${this.indent('case _:\n' + this.indent('pass'))}`;
    return `${head}\n${this.indent(this.lines(node.cases))}`;
  }

  override visitThrowStmt(node: AST.ThrowStmt): string {
    return node.exception === null ? 'raise' : `raise ${this.visit(node.exception)}`;
  }

  override visitCatchHandlerStmt(node: AST.CatchHandlerStmt): string {
    let clause = 'except';
    if (node.types.length === 1) clause += ` ${node.types.join('')}`;
    else if (node.types.length > 1) clause += ` (${node.types.join(', ')})`;
    if (node.name !== null) clause += ` as ${node.name}`;
    return `${clause}:\n${this.suite(node.body)}`;
  }

  override visitFinallyHandlerStmt(node: AST.FinallyHandlerStmt): string {
    return `finally:\n${this.suite(node.body)}`;
  }

  override visitExceptionHandlerStmt(node: AST.ExceptionHandlerStmt): string {
    const parts = [`try:\n${this.suite(node.body)}`, ...this.visitAll(node.handlers)];
    if (node.finallyHandler !== null) parts.push(this.visit(node.finallyHandler));
    return parts.join('\n');
  }

  override visitWithItem(node: AST.WithItem): string {
    const context = this.visit(node.contextExpr);
    return node.instanceName === null ? context : `${context} as ${node.instanceName}`;
  }

  override visitWithStmt(node: AST.WithStmt): string {
    return `with ${this.visitAll(node.items).join(', ')}:\n${this.suite(node.body)}`;
  }

  // ---------------------------------------------------------------------------
  // 函数
  // ---------------------------------------------------------------------------

  override visitArgument(node: AST.Argument): string {
    const param = `${node.name}: ${this.annotation(node.type)}`;
    return node.defaultValue === null ? param : `${param} = ${this.visit(node.defaultValue)}`;
  }

  override visitArguments(node: AST.Arguments): string {
    return this.visitAll(node.nodes).join(', ');
  }

  override visitFunctionPrototype(node: AST.FunctionPrototype): string {
    return `def ${this.signature(node)}: ...`;
  }

  override visitFunctionDef(node: AST.FunctionDef): string {
    return `def ${this.signature(node.prototype)}:\n${this.innerSuite(node.body)}`;
  }

  override visitFunctionAsyncDef(node: AST.FunctionAsyncDef): string {
    return `async def ${this.signature(node.prototype)}:\n${this.innerSuite(node.body)}`;
  }

  override visitFunctionReturn(node: AST.FunctionReturn): string {
    return node.value === null ? 'return' : `return ${this.visit(node.value)}`;
  }

  // ---------------------------------------------------------------------------
  // 类型声明
  // ---------------------------------------------------------------------------

  override visitClassDeclStmt(node: AST.ClassDeclStmt): string {
    return `${this.classHeader(node.name, node.bases, node.isAbstract)}: ...`;
  }

  override visitClassDefStmt(node: AST.ClassDefStmt): string {
    const body = node.members.length === 0 ? 'pass' : this.lines(node.members);
    return `${this.classHeader(node.name, node.bases, node.isAbstract)}:\n${this.indent(body)}`;
  }

  override visitStructDeclStmt(node: AST.StructDeclStmt): string {
    this.imports.add('from dataclasses import dataclass');
    return `@dataclass\nclass ${node.name}: ...`;
  }

  override visitStructDefStmt(node: AST.StructDefStmt): string {
    this.imports.add('from dataclasses import dataclass');
    const members = [...node.attributes, ...node.methods];
    const body = members.length === 0 ? 'pass' : this.lines(members);
    return `@dataclass\nclass ${node.name}:\n${this.indent(body)}`;
  }

  // 枚举成员不能带注解，否则 Enum 不把它当成员
  override visitEnumDeclStmt(node: AST.EnumDeclStmt): string {
    this.imports.add('from enum import Enum');
    const members = node.members.map(member => {
      if (member.value !== null) return `${member.name} = ${this.visit(member.value)}`;
      this.imports.add('from enum import auto');
      return `${member.name} = auto()`;
    });
    const body = members.length === 0 ? 'pass' : members.join('\n');
    return `class ${node.name}(Enum):\n${this.indent(body)}`;
  }

  override visitImportStmt(node: AST.ImportStmt): string {
    return `import ${this.aliases(node.names)}`;
  }

  override visitImportFromStmt(node: AST.ImportFromStmt): string {
    return this.importFrom(node);
  }

  // ---------------------------------------------------------------------------
  // 容器
  // ---------------------------------------------------------------------------

  override visitModule(node: AST.Module): string {
    return this.lines(node.nodes);
  }

  override visitPackage(node: AST.Package): string {
    const sections = node.modules.map(module => `# module ${node.name}.${module.name}\n${this.visit(module)}`);
    sections.push(...this.visitAll(node.packages));
    return sections.join('\n\n');
  }

  override visitTarget(node: AST.Target): string {
    return `# target triple=${node.triple} datalayout=${node.datalayout}`;
  }

  override visitProgram(node: AST.Program): string {
    return [`# program ${node.name}`, this.visit(node.target), ...this.visitAll(node.packages)].join('\n\n');
  }
}
