import type * as AST from '../types.js';
import {
  isComplexKind,
  isFloatKind,
  isIntegerKind,
  isNumericKind,
  isSignedIntegerKind,
  isTemporalKind,
  isTextKind,
} from '../ast/guards.js';
import { DataTypes, bitWidth, cloneDataType, typeEquals } from '../datatypes/data_types.js';
import { isCompatible } from '../datatypes/compatibility.js';

/**
 * @module promotion
 *
 * 运算结果类型提升表。所有函数返回新的类型节点，未覆盖的组合返回 null，
 * 由运算符工厂转为 AstTypeError。完整的规则说明见 DESIGN.md。
 */

export const BINARY_OPERATORS: readonly AST.BinaryOperator[] = [
  '+',
  '-',
  '*',
  '/',
  '//',
  '%',
  '**',
  '&',
  '|',
  '^',
  '<<',
  '>>',
];
export const COMPARE_OPERATORS: readonly AST.CompareOperator[] = ['==', '!=', '<', '<=', '>', '>='];
export const BOOL_OPERATORS: readonly AST.BoolOperator[] = ['and', 'or', 'xor', 'nand', 'nor', 'xnor'];
export const UNARY_OPERATORS: readonly AST.UnaryOperator[] = ['+', '-', '~', 'not'];
export const AUG_ASSIGN_OPERATORS: readonly AST.AugAssignOperator[] = BINARY_OPERATORS.map(
  (op): AST.AugAssignOperator => `${op}=`
);

const binarySet = new Set<string>(BINARY_OPERATORS);
const compareSet = new Set<string>(COMPARE_OPERATORS);
const boolSet = new Set<string>(BOOL_OPERATORS);
const unarySet = new Set<string>(UNARY_OPERATORS);
const augSet = new Set<string>(AUG_ASSIGN_OPERATORS);

export function isBinaryOperator(op: string): op is AST.BinaryOperator {
  return binarySet.has(op);
}

export function isCompareOperator(op: string): op is AST.CompareOperator {
  return compareSet.has(op);
}

export function isBoolOperator(op: string): op is AST.BoolOperator {
  return boolSet.has(op);
}

export function isUnaryOperator(op: string): op is AST.UnaryOperator {
  return unarySet.has(op);
}

export function isAugAssignOperator(op: string): op is AST.AugAssignOperator {
  return augSet.has(op);
}

/** `+=` → `+` */
export function augAssignBase(op: AST.AugAssignOperator): AST.BinaryOperator {
  const base = op.slice(0, -1);
  return isBinaryOperator(base) ? base : '+';
}

const SIGNED_BY_WIDTH: Readonly<Record<number, AST.SignedIntegerKind>> = {
  8: 'Int8',
  16: 'Int16',
  32: 'Int32',
  64: 'Int64',
  128: 'Int128',
};

function wider<K extends AST.NumericKind>(a: K, b: K): K {
  return bitWidth(b) > bitWidth(a) ? b : a;
}

/**
 * 数值族提升：
 * - 同号整数取较宽者；有符号与无符号混合时取能容纳两者的最窄有符号类型，UInt128 无解
 * - 整数与浮点取浮点；浮点之间取较宽者
 * - 复数吸收实数；Complex32 遇到 Float64 升为 Complex64
 */
export function promoteNumericKinds(a: AST.NumericKind, b: AST.NumericKind): AST.NumericKind | null {
  if (a === b) return a;

  if (isComplexKind(a) || isComplexKind(b)) {
    const width = Math.max(
      isComplexKind(a) || isFloatKind(a) ? bitWidth(a) : 0,
      isComplexKind(b) || isFloatKind(b) ? bitWidth(b) : 0
    );
    return width >= 64 ? 'Complex64' : 'Complex32';
  }

  if (isFloatKind(a) && isFloatKind(b)) return wider(a, b);
  if (isFloatKind(a)) return a;
  if (isFloatKind(b)) return b;

  if (!isIntegerKind(a) || !isIntegerKind(b)) return null;
  const aSigned = isSignedIntegerKind(a);
  if (aSigned === isSignedIntegerKind(b)) return wider(a, b);

  const signed = aSigned ? a : b;
  const unsigned = aSigned ? b : a;
  if (bitWidth(signed) > bitWidth(unsigned)) return signed;
  return SIGNED_BY_WIDTH[bitWidth(unsigned) * 2] ?? null;
}

function numericResult(lhs: AST.DataType, rhs: AST.DataType): AST.DataType | null {
  if (!isNumericKind(lhs.kind) || !isNumericKind(rhs.kind)) return null;
  const kind = promoteNumericKinds(lhs.kind, rhs.kind);
  return kind === null ? null : DataTypes[kind]();
}

function textResult(lhs: AST.DataType, rhs: AST.DataType): AST.DataType | null {
  if (!isTextKind(lhs.kind) || !isTextKind(rhs.kind)) return null;
  return lhs.kind === 'String' && rhs.kind === 'String' ? DataTypes.String() : DataTypes.UTF8String();
}

function concatResult(lhs: AST.DataType, rhs: AST.DataType): AST.DataType | null {
  if (lhs.kind === 'TupleType' && rhs.kind === 'TupleType') {
    return DataTypes.TupleType([...lhs.elementTypes, ...rhs.elementTypes].map(cloneDataType));
  }
  if (lhs.kind === 'ListType' && rhs.kind === 'ListType' && typeEquals(lhs, rhs)) {
    return cloneDataType(lhs);
  }
  return null;
}

function repeatResult(lhs: AST.DataType, rhs: AST.DataType): AST.DataType | null {
  const repeatable = (t: AST.DataType): boolean =>
    isTextKind(t.kind) || t.kind === 'ListType' || t.kind === 'TupleType';
  if (repeatable(lhs) && isIntegerKind(rhs.kind)) {
    return lhs.kind === 'UTF8Char' ? DataTypes.UTF8String() : cloneDataType(lhs);
  }
  if (isIntegerKind(lhs.kind) && repeatable(rhs)) {
    return rhs.kind === 'UTF8Char' ? DataTypes.UTF8String() : cloneDataType(rhs);
  }
  return null;
}

export function promoteBinary(op: AST.BinaryOperator, lhs: AST.DataType, rhs: AST.DataType): AST.DataType | null {
  switch (op) {
    case '+':
      return numericResult(lhs, rhs) ?? textResult(lhs, rhs) ?? concatResult(lhs, rhs);
    case '-':
    case '**':
      return numericResult(lhs, rhs);
    case '*':
      return numericResult(lhs, rhs) ?? repeatResult(lhs, rhs);
    case '/': {
      const result = numericResult(lhs, rhs);
      if (result === null) return null;
      return isIntegerKind(result.kind) ? DataTypes.Float64() : result;
    }
    case '//':
    case '%':
      if (isComplexKind(lhs.kind) || isComplexKind(rhs.kind)) return null;
      return numericResult(lhs, rhs);
    case '&':
    case '|':
    case '^':
      if (lhs.kind === 'Boolean' && rhs.kind === 'Boolean') return DataTypes.Boolean();
      if (!isIntegerKind(lhs.kind) || !isIntegerKind(rhs.kind)) return null;
      return numericResult(lhs, rhs);
    case '<<':
    case '>>':
      if (!isIntegerKind(lhs.kind) || !isIntegerKind(rhs.kind)) return null;
      return DataTypes[lhs.kind]();
  }
}

export function promoteUnary(op: AST.UnaryOperator, operand: AST.DataType): AST.DataType | null {
  const kind = operand.kind;
  switch (op) {
    case '+':
      return isNumericKind(kind) ? DataTypes[kind]() : null;
    case '-':
      return isNumericKind(kind) && !(isIntegerKind(kind) && !isSignedIntegerKind(kind)) ? DataTypes[kind]() : null;
    case '~':
      return isIntegerKind(kind) ? DataTypes[kind]() : null;
    case 'not':
      return kind === 'Boolean' ? DataTypes.Boolean() : null;
  }
}

function isOrdered(lhs: AST.DataType, rhs: AST.DataType): boolean {
  const real = (t: AST.DataType): boolean => isNumericKind(t.kind) && !isComplexKind(t.kind);
  if (real(lhs) && real(rhs)) return true;
  if (isTextKind(lhs.kind) && isTextKind(rhs.kind)) return true;
  if (lhs.kind === 'Boolean' && rhs.kind === 'Boolean') return true;
  return isTemporalKind(lhs.kind) && isTemporalKind(rhs.kind) && isCompatible(lhs, rhs);
}

export function promoteCompare(
  op: AST.CompareOperator,
  lhs: AST.DataType,
  rhs: AST.DataType
): AST.ScalarTypeNode<'Boolean'> | null {
  if (op === '==' || op === '!=') return isCompatible(lhs, rhs) ? DataTypes.Boolean() : null;
  return isOrdered(lhs, rhs) ? DataTypes.Boolean() : null;
}

export function promoteBool(
  _op: AST.BoolOperator,
  lhs: AST.DataType,
  rhs: AST.DataType
): AST.ScalarTypeNode<'Boolean'> | null {
  return lhs.kind === 'Boolean' && rhs.kind === 'Boolean' ? DataTypes.Boolean() : null;
}
