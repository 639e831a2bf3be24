import type * as AST from '../types.js';

// 节点类别判定：按 kind 分组的常量表与类型守卫

export const SIGNED_INTEGER_KINDS: readonly AST.SignedIntegerKind[] = ['Int8', 'Int16', 'Int32', 'Int64', 'Int128'];
export const UNSIGNED_INTEGER_KINDS: readonly AST.UnsignedIntegerKind[] = [
  'UInt8',
  'UInt16',
  'UInt32',
  'UInt64',
  'UInt128',
];
export const INTEGER_KINDS: readonly AST.IntegerKind[] = [...SIGNED_INTEGER_KINDS, ...UNSIGNED_INTEGER_KINDS];
export const FLOAT_KINDS: readonly AST.FloatKind[] = ['Float16', 'Float32', 'Float64'];
export const COMPLEX_KINDS: readonly AST.ComplexKind[] = ['Complex32', 'Complex64'];
export const NUMERIC_KINDS: readonly AST.NumericKind[] = [...INTEGER_KINDS, ...FLOAT_KINDS, ...COMPLEX_KINDS];
export const TEXT_KINDS: readonly AST.TextKind[] = ['UTF8Char', 'String', 'UTF8String'];
export const TEMPORAL_KINDS: readonly AST.TemporalKind[] = ['Date', 'Time', 'DateTime', 'Timestamp'];
export const SCALAR_TYPE_KINDS: readonly AST.ScalarTypeKind[] = [
  ...NUMERIC_KINDS,
  'Boolean',
  ...TEXT_KINDS,
  ...TEMPORAL_KINDS,
  'NoneType',
  'UndefinedType',
];

const signedSet = new Set<string>(SIGNED_INTEGER_KINDS);
const unsignedSet = new Set<string>(UNSIGNED_INTEGER_KINDS);
const floatSet = new Set<string>(FLOAT_KINDS);
const complexSet = new Set<string>(COMPLEX_KINDS);
const textSet = new Set<string>(TEXT_KINDS);
const temporalSet = new Set<string>(TEMPORAL_KINDS);
const scalarSet = new Set<string>(SCALAR_TYPE_KINDS);

export function isSignedIntegerKind(kind: string): kind is AST.SignedIntegerKind {
  return signedSet.has(kind);
}

export function isUnsignedIntegerKind(kind: string): kind is AST.UnsignedIntegerKind {
  return unsignedSet.has(kind);
}

export function isIntegerKind(kind: string): kind is AST.IntegerKind {
  return signedSet.has(kind) || unsignedSet.has(kind);
}

export function isFloatKind(kind: string): kind is AST.FloatKind {
  return floatSet.has(kind);
}

export function isComplexKind(kind: string): kind is AST.ComplexKind {
  return complexSet.has(kind);
}

export function isNumericKind(kind: string): kind is AST.NumericKind {
  return isIntegerKind(kind) || floatSet.has(kind) || complexSet.has(kind);
}

export function isTextKind(kind: string): kind is AST.TextKind {
  return textSet.has(kind);
}

export function isTemporalKind(kind: string): kind is AST.TemporalKind {
  return temporalSet.has(kind);
}

export function isScalarTypeKind(kind: string): kind is AST.ScalarTypeKind {
  return scalarSet.has(kind);
}

/** `LiteralInt8` → `Int8`；非标量字面量返回 null */
export function literalScalarKind(kind: string): AST.ScalarTypeKind | null {
  if (!kind.startsWith('Literal')) return null;
  const rest = kind.slice('Literal'.length);
  return isScalarTypeKind(rest) ? rest : null;
}

const COMPOSITE_TYPE_KINDS = new Set<string>([
  'ListType',
  'SetType',
  'MapType',
  'TupleType',
  'StructType',
  'ClassType',
  'EnumType',
  'FunctionType',
]);

const COLLECTION_LITERAL_KINDS = new Set<string>(['LiteralList', 'LiteralTuple', 'LiteralSet', 'LiteralMap']);

const NON_LITERAL_EXPRESSION_KINDS = new Set<string>([
  'Variable',
  'UnaryOp',
  'BinaryOp',
  'CompareOp',
  'BoolOp',
  'AugAssign',
  'WalrusOp',
  'Starred',
  'TypeCastExpr',
  'ParenthesizedExpr',
  'SubscriptExpr',
  'FunctionCall',
  'LambdaExpr',
  'AwaitExpr',
  'YieldExpr',
  'IfExpr',
  'ForRangeLoopExpr',
  'ForCountLoopExpr',
  'WhileExpr',
  'ListComprehension',
  'SetComprehension',
  'DictComprehension',
  'GeneratorExpr',
  'ImportExpr',
  'ImportFromExpr',
]);

export function isDataType(node: AST.AstNode): node is AST.DataType {
  return scalarSet.has(node.kind) || COMPOSITE_TYPE_KINDS.has(node.kind);
}

export function isScalarType(node: AST.AstNode): node is AST.ScalarType {
  return scalarSet.has(node.kind);
}

export function isLiteral(node: AST.AstNode): node is AST.Literal {
  return (
    COLLECTION_LITERAL_KINDS.has(node.kind) ||
    node.kind === 'LiteralBoolean' ||
    node.kind === 'LiteralNone' ||
    literalScalarKind(node.kind) !== null
  );
}

export function isIntegerLiteral(node: AST.AstNode): node is AST.IntegerLiteral {
  const scalar = literalScalarKind(node.kind);
  return scalar !== null && isIntegerKind(scalar);
}

export function isFloatLiteral(node: AST.AstNode): node is AST.FloatLiteral {
  const scalar = literalScalarKind(node.kind);
  return scalar !== null && isFloatKind(scalar);
}

export function isExpression(node: AST.AstNode): node is AST.Expression {
  return isLiteral(node) || NON_LITERAL_EXPRESSION_KINDS.has(node.kind);
}

export function isCollectionType(type: AST.DataType): type is AST.CollectionType {
  return (
    type.kind === 'ListType' || type.kind === 'SetType' || type.kind === 'MapType' || type.kind === 'TupleType'
  );
}

export type NodeGuard<T extends AST.AstNode> = (node: AST.AstNode) => node is T;

/** 生成单一 kind 的类型守卫 */
export function isKind<K extends AST.NodeKind>(kind: K): NodeGuard<AST.NodeOfKind<K>> {
  return (node: AST.AstNode): node is AST.NodeOfKind<K> => node.kind === kind;
}

export const isAnyNode = (node: AST.AstNode): node is AST.AstNode => node.kind.length > 0;
export const isVariable = isKind('Variable');
export const isBlock = isKind('Block');
export const isArguments = isKind('Arguments');
export const isArgument = isKind('Argument');
export const isVariableDeclaration = isKind('VariableDeclaration');
export const isFunctionPrototype = isKind('FunctionPrototype');
export const isFunctionDef = isKind('FunctionDef');
export const isModule = isKind('Module');
export const isPackage = isKind('Package');
export const isTarget = isKind('Target');

export function isClassMember(node: AST.AstNode): node is AST.ClassMember {
  return node.kind === 'VariableDeclaration' || node.kind === 'FunctionDef' || node.kind === 'FunctionAsyncDef';
}

/** 判断表达式是否为字面量零（穿透括号与一元正负号） */
export function isZeroLiteral(node: AST.Expression): boolean {
  if (isIntegerLiteral(node)) return node.value === 0n;
  if (isFloatLiteral(node)) return node.value === 0;
  if (node.kind === 'ParenthesizedExpr') return isZeroLiteral(node.value);
  if (node.kind === 'UnaryOp' && (node.op === '-' || node.op === '+')) return isZeroLiteral(node.operand);
  return false;
}
