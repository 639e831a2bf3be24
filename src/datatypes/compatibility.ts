import type * as AST from '../types.js';
import { isNumericKind, isTextKind } from '../ast/guards.js';
import { typeEquals } from './data_types.js';

function listsCompatible(a: readonly AST.DataType[], b: readonly AST.DataType[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => {
    const other = b[i];
    return other !== undefined && isCompatible(t, other);
  });
}

const TIMESTAMP_FAMILY = new Set<string>(['DateTime', 'Timestamp']);

/**
 * 类型兼容性判定，供运算符提升与赋值校验使用。
 *
 * 自反且对称；数值族之间互相兼容，文本族之间互相兼容，
 * 文本与数值、布尔与数值永不兼容。
 */
export function isCompatible(a: AST.DataType, b: AST.DataType): boolean {
  if (typeEquals(a, b)) return true;
  if (isNumericKind(a.kind) && isNumericKind(b.kind)) return true;
  if (isTextKind(a.kind) && isTextKind(b.kind)) return true;
  if (TIMESTAMP_FAMILY.has(a.kind) && TIMESTAMP_FAMILY.has(b.kind)) return true;

  switch (a.kind) {
    case 'ListType':
    case 'SetType':
      if ((b.kind !== 'ListType' && b.kind !== 'SetType') || b.kind !== a.kind) return false;
      if (a.heterogeneous || b.heterogeneous) return listsCompatible(a.elementTypes, b.elementTypes);
      return listsCompatible(a.elementTypes.slice(0, 1), b.elementTypes.slice(0, 1));
    case 'MapType':
      return b.kind === 'MapType' && isCompatible(a.keyType, b.keyType) && isCompatible(a.valueType, b.valueType);
    case 'TupleType':
      return b.kind === 'TupleType' && listsCompatible(a.elementTypes, b.elementTypes);
    case 'FunctionType':
      return (
        b.kind === 'FunctionType' &&
        listsCompatible(a.paramTypes, b.paramTypes) &&
        isCompatible(a.returnType, b.returnType)
      );
    default:
      return false;
  }
}
