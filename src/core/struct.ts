import { isDeepStrictEqual } from 'node:util';
import type * as AST from '../types.js';
import { AstNotImplementedError, DiagnosticCode } from '../diagnostics/diagnostics.js';

/**
 * @module struct
 *
 * 节点的结构化表示：`{ tag: { slot: value, ... } }`。
 *
 * **格式约定**：
 * - tag 为 `nodeToString(node)`，简化模式下追加 `#id`，保证同构兄弟子树的键互不相同
 * - 子节点槽位使用小写连字符键（`then-block`、`finally-handler`）；可选子节点缺省为 null
 * - 标量属性同样写入槽位，解码只依赖槽位，不解析 tag 中的标签
 * - 由操作数推导出的结果类型不写入结构，解码时重新推导
 * - 整数在安全范围内写为 number，否则写为十进制字符串
 */

export type StructSlot =
  | { readonly key: string; readonly node: AST.AstNode | null }
  | { readonly key: string; readonly nodes: readonly AST.AstNode[] }
  | { readonly key: string; readonly value: AST.ReprValue };

export interface NodeDescription {
  /** tag 方括号中的标签；缺省时 tag 只有 kind */
  readonly label?: string;
  readonly slots: readonly StructSlot[];
}

const child = (key: string, node: AST.AstNode | null): StructSlot => ({ key, node });
const children = (key: string, nodes: readonly AST.AstNode[]): StructSlot => ({ key, nodes });
const attr = (key: string, value: AST.ReprValue): StructSlot => ({ key, value });

/** bigint → number（安全整数）或十进制字符串 */
export function integerRepr(value: bigint): number | string {
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : value.toString();
}

// -0 在 JSON 中会丢失符号，统一为 0
function floatRepr(value: number): number {
  return value === 0 ? 0 : value;
}

function unknownNode(_node: never, kind: unknown): never {
  throw new AstNotImplementedError(
    DiagnosticCode.N002_UnknownNodeKind,
    `No structural form for node kind '${String(kind)}'`
  );
}

function described(label: string | undefined, slots: readonly StructSlot[]): NodeDescription {
  return label === undefined ? { slots } : { label, slots };
}

function callableSlots(node: AST.FunctionPrototype): StructSlot[] {
  return [
    attr('name', node.name),
    child('args', node.args),
    child('return-type', node.returnType),
    attr('scope', node.scope),
    attr('visibility', node.visibility),
  ];
}

/**
 * 每种节点的标签与槽位。穷尽 switch：新增节点类型而未在此处理会在编译期报错。
 */
export function describeNode(node: AST.AstNode): NodeDescription {
  const kind: unknown = node.kind;
  switch (node.kind) {
    // 标量类型
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
    case 'Float16':
    case 'Float32':
    case 'Float64':
    case 'Complex32':
    case 'Complex64':
    case 'Boolean':
    case 'UTF8Char':
    case 'String':
    case 'UTF8String':
    case 'Date':
    case 'Time':
    case 'DateTime':
    case 'Timestamp':
    case 'NoneType':
    case 'UndefinedType':
      return { slots: [] };

    // 复合类型
    case 'ListType':
    case 'SetType':
      return { slots: [children('element-types', node.elementTypes), attr('heterogeneous', node.heterogeneous)] };
    case 'MapType':
      return { slots: [child('key-type', node.keyType), child('value-type', node.valueType)] };
    case 'TupleType':
      return { slots: [children('element-types', node.elementTypes)] };
    case 'StructType':
    case 'ClassType':
    case 'EnumType':
      return { label: node.name, slots: [attr('name', node.name)] };
    case 'FunctionType':
      return { slots: [children('param-types', node.paramTypes), child('return-type', node.returnType)] };

    // 字面量
    case 'LiteralInt8':
    case 'LiteralInt16':
    case 'LiteralInt32':
    case 'LiteralInt64':
    case 'LiteralInt128':
    case 'LiteralUInt8':
    case 'LiteralUInt16':
    case 'LiteralUInt32':
    case 'LiteralUInt64':
    case 'LiteralUInt128':
      return { label: node.value.toString(), slots: [attr('value', integerRepr(node.value))] };
    case 'LiteralFloat16':
    case 'LiteralFloat32':
    case 'LiteralFloat64':
      return { label: String(floatRepr(node.value)), slots: [attr('value', floatRepr(node.value))] };
    case 'LiteralComplex32':
    case 'LiteralComplex64': {
      const sign = node.imag < 0 ? '-' : '+';
      return {
        label: `${floatRepr(node.real)}${sign}${Math.abs(node.imag)}j`,
        slots: [attr('real', floatRepr(node.real)), attr('imag', floatRepr(node.imag))],
      };
    }
    case 'LiteralBoolean':
      return { label: String(node.value), slots: [attr('value', node.value)] };
    case 'LiteralUTF8Char':
    case 'LiteralString':
    case 'LiteralUTF8String':
    case 'LiteralDate':
    case 'LiteralTime':
    case 'LiteralDateTime':
    case 'LiteralTimestamp':
      return { label: node.value, slots: [attr('value', node.value)] };
    case 'LiteralNone':
      return { slots: [] };
    case 'LiteralList':
    case 'LiteralTuple':
    case 'LiteralSet':
      return { slots: [children('elements', node.elements)] };
    case 'LiteralMap':
      return { slots: [children('keys', node.keys), children('values', node.values)] };

    // 表达式
    case 'Variable':
      return { label: node.name, slots: [attr('name', node.name), child('type', node.type)] };
    case 'UnaryOp':
      return { label: node.op, slots: [attr('op', node.op), child('operand', node.operand)] };
    case 'BinaryOp':
    case 'CompareOp':
    case 'BoolOp':
      return { label: node.op, slots: [attr('op', node.op), child('lhs', node.lhs), child('rhs', node.rhs)] };
    case 'AugAssign':
      return { label: node.op, slots: [attr('op', node.op), child('target', node.target), child('value', node.value)] };
    case 'WalrusOp':
      return { label: ':=', slots: [child('target', node.target), child('value', node.value)] };
    case 'Starred':
    case 'ParenthesizedExpr':
    case 'AwaitExpr':
      return { slots: [child('value', node.value)] };
    case 'TypeCastExpr':
      return { slots: [child('value', node.value), child('type', node.type)] };
    case 'SubscriptExpr':
      return {
        slots: [
          child('value', node.value),
          child('index', node.index),
          child('lower', node.lower),
          child('upper', node.upper),
          child('step', node.step),
        ],
      };
    case 'FunctionCall':
      return {
        label: node.callee,
        slots: [attr('callee', node.callee), children('args', node.args), child('return-type', node.type)],
      };
    case 'LambdaExpr':
      return { slots: [child('params', node.params), child('body', node.body)] };
    case 'YieldExpr':
      return { slots: [child('value', node.value)] };
    case 'IfExpr':
      return {
        slots: [child('condition', node.condition), child('then-expr', node.thenExpr), child('else-expr', node.elseExpr)],
      };
    case 'ForRangeLoopExpr':
    case 'ForRangeLoopStmt':
      return {
        slots: [
          child('variable', node.variable),
          child('start', node.start),
          child('end', node.end),
          child('step', node.step),
          child('body', node.body),
        ],
      };
    case 'ForCountLoopExpr':
    case 'ForCountLoopStmt':
      return {
        slots: [
          child('initializer', node.initializer),
          child('condition', node.condition),
          child('update', node.update),
          child('body', node.body),
        ],
      };
    case 'WhileExpr':
    case 'WhileStmt':
      return { slots: [child('condition', node.condition), child('body', node.body)] };
    case 'ComprehensionClause':
      return {
        slots: [
          child('target', node.target),
          child('iterable', node.iterable),
          children('conditions', node.conditions),
          attr('is-async', node.isAsync),
        ],
      };
    case 'ListComprehension':
    case 'SetComprehension':
    case 'GeneratorExpr':
      return { slots: [child('element', node.element), children('clauses', node.clauses)] };
    case 'DictComprehension':
      return { slots: [child('key', node.key), child('value', node.value), children('clauses', node.clauses)] };
    case 'AliasExpr':
      return described(node.asname === null ? node.name : `${node.name} as ${node.asname}`, [
        attr('name', node.name),
        attr('asname', node.asname),
      ]);
    case 'ImportExpr':
    case 'ImportStmt':
      return { slots: [children('names', node.names)] };
    case 'ImportFromExpr':
    case 'ImportFromStmt':
      return {
        label: `${'.'.repeat(node.level)}${node.module ?? ''}`,
        slots: [attr('module', node.module), children('names', node.names), attr('level', node.level)],
      };

    // 语句
    case 'Block':
      return { label: node.name, slots: [attr('name', node.name), children('nodes', node.nodes)] };
    case 'VariableDeclaration':
      return {
        label: node.name,
        slots: [
          attr('name', node.name),
          child('type', node.type),
          child('value', node.value),
          attr('mutability', node.mutability),
          attr('visibility', node.visibility),
          attr('scope', node.scope),
        ],
      };
    case 'VariableAssignment':
      return { slots: [child('target', node.target), child('value', node.value)] };
    case 'DeleteStmt':
      return { slots: [children('targets', node.targets)] };
    case 'IfStmt':
      return {
        slots: [
          child('condition', node.condition),
          child('then-block', node.thenBlock),
          child('else-block', node.elseBlock),
        ],
      };
    case 'DoWhileStmt':
      return { slots: [child('body', node.body), child('condition', node.condition)] };
    case 'BreakStmt':
    case 'ContinueStmt':
      return { slots: [] };
    case 'CaseStmt':
      return described(node.isDefault ? 'default' : undefined, [
        child('condition', node.condition),
        child('body', node.body),
        attr('is-default', node.isDefault),
      ]);
    case 'SwitchStmt':
      return { slots: [child('value', node.value), children('cases', node.cases)] };
    case 'ThrowStmt':
      return { slots: [child('exception', node.exception)] };
    case 'CatchHandlerStmt':
      return described(node.types.length > 0 ? node.types.join(', ') : undefined, [
        attr('types', node.types),
        attr('name', node.name),
        child('body', node.body),
      ]);
    case 'FinallyHandlerStmt':
      return { slots: [child('body', node.body)] };
    case 'ExceptionHandlerStmt':
      return {
        slots: [
          child('body', node.body),
          children('handlers', node.handlers),
          child('finally-handler', node.finallyHandler),
        ],
      };
    case 'WithItem':
      return { slots: [child('context-expr', node.contextExpr), attr('instance-name', node.instanceName)] };
    case 'WithStmt':
      return { slots: [children('items', node.items), child('body', node.body)] };
    case 'Argument':
      return {
        label: node.name,
        slots: [attr('name', node.name), child('type', node.type), child('default-value', node.defaultValue)],
      };
    case 'Arguments':
      return { slots: [children('nodes', node.nodes)] };
    case 'FunctionPrototype':
      return { label: node.name, slots: callableSlots(node) };
    case 'FunctionDef':
    case 'FunctionAsyncDef':
      return { label: node.prototype.name, slots: [child('prototype', node.prototype), child('body', node.body)] };
    case 'FunctionReturn':
      return { slots: [child('value', node.value)] };
    case 'ClassDeclStmt':
      return {
        label: node.name,
        slots: [
          attr('name', node.name),
          attr('bases', node.bases),
          attr('visibility', node.visibility),
          attr('is-abstract', node.isAbstract),
        ],
      };
    case 'ClassDefStmt':
      return {
        label: node.name,
        slots: [
          attr('name', node.name),
          attr('bases', node.bases),
          attr('visibility', node.visibility),
          attr('is-abstract', node.isAbstract),
          children('members', node.members),
        ],
      };
    case 'StructDeclStmt':
      return { label: node.name, slots: [attr('name', node.name), attr('visibility', node.visibility)] };
    case 'StructDefStmt':
      return {
        label: node.name,
        slots: [
          attr('name', node.name),
          attr('visibility', node.visibility),
          children('attributes', node.attributes),
          children('methods', node.methods),
        ],
      };
    case 'EnumDeclStmt':
      return {
        label: node.name,
        slots: [attr('name', node.name), attr('visibility', node.visibility), children('members', node.members)],
      };

    // 容器
    case 'Module':
      return { label: node.name, slots: [attr('name', node.name), children('nodes', node.nodes)] };
    case 'Package':
      return {
        label: node.name,
        slots: [attr('name', node.name), children('modules', node.modules), children('packages', node.packages)],
      };
    case 'Target':
      return { slots: [attr('datalayout', node.datalayout), attr('triple', node.triple)] };
    case 'Program':
      return {
        label: node.name,
        slots: [attr('name', node.name), child('target', node.target), children('packages', node.packages)],
      };

    default:
      return unknownNode(node, kind);
  }
}

/** 人类可读的 tag，如 `LiteralInt32[1]`、`BinaryOp[+]`、`Block[entry]` */
export function nodeToString(node: AST.AstNode): string {
  const { label } = describeNode(node);
  return label === undefined ? node.kind : `${node.kind}[${label}]`;
}

export function getStruct(node: AST.AstNode, simplified: boolean = false): AST.ReprStruct {
  const { label, slots } = describeNode(node);
  const base = label === undefined ? node.kind : `${node.kind}[${label}]`;
  const tag = simplified ? `${base}#${node.id}` : base;

  const body: Record<string, AST.ReprValue> = {};
  for (const slot of slots) {
    if ('node' in slot) {
      body[slot.key] = slot.node === null ? null : getStruct(slot.node, simplified);
    } else if ('nodes' in slot) {
      body[slot.key] = slot.nodes.map(n => getStruct(n, simplified));
    } else {
      body[slot.key] = slot.value;
    }
  }
  return { [tag]: body };
}

/** 结构相等：比较全部语义属性，忽略身份标识、位置与父链接 */
export function isStructurallyEqual(a: AST.AstNode, b: AST.AstNode): boolean {
  return isDeepStrictEqual(getStruct(a, false), getStruct(b, false));
}

export function isReprStruct(value: AST.ReprValue): value is AST.ReprStruct {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isReprList(value: AST.ReprValue): value is readonly AST.ReprValue[] {
  return Array.isArray(value);
}

/** 拆出结构的唯一 tag 与槽位映射；形状不符时返回 null */
export function structEntry(struct: AST.ReprStruct): { tag: string; body: AST.ReprStruct } | null {
  const entries = Object.entries(struct);
  const [first] = entries;
  if (entries.length !== 1 || first === undefined) return null;
  const [tag, body] = first;
  return isReprStruct(body) ? { tag, body } : null;
}
