import type * as AST from '../types.js';
import { AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { nodeBase } from '../ast/identity.js';

/**
 * 类型描述节点的工厂、结构相等与复制。
 *
 * 类型节点构造后不可变，也不挂父链接；运算结果类型总是新建节点，不与操作数共享。
 */

export type TypeOptions = Pick<AST.NodeOptions, 'span'>;

export function scalarType<K extends AST.ScalarTypeKind>(kind: K, opts: TypeOptions = {}): AST.ScalarTypeNode<K> {
  return { kind, ...nodeBase(opts) };
}

export interface CollectionTypeOptions extends TypeOptions {
  /** 允许元素类型不一致 */
  readonly heterogeneous?: boolean;
}

function normalizeElementTypes(
  kind: string,
  elementTypes: AST.DataType | readonly AST.DataType[],
  heterogeneous: boolean
): AST.DataType[] {
  const types = 'kind' in elementTypes ? [elementTypes] : [...elementTypes];
  const [first, ...rest] = types;
  if (first === undefined) {
    throw new AstValueError(DiagnosticCode.V011_EmptyElementTypes, `${kind} requires at least one element type`);
  }
  if (!heterogeneous) {
    const mismatch = rest.find(t => !typeEquals(first, t));
    if (mismatch !== undefined) {
      throw new AstValueError(
        DiagnosticCode.V007_NonUniformElements,
        `${kind} element types must be uniform unless declared heterogeneous: ${typeLabel(first)} vs ${typeLabel(mismatch)}`
      );
    }
  }
  return types;
}

export const DataTypes = {
  Int8: (opts?: TypeOptions) => scalarType('Int8', opts),
  Int16: (opts?: TypeOptions) => scalarType('Int16', opts),
  Int32: (opts?: TypeOptions) => scalarType('Int32', opts),
  Int64: (opts?: TypeOptions) => scalarType('Int64', opts),
  Int128: (opts?: TypeOptions) => scalarType('Int128', opts),
  UInt8: (opts?: TypeOptions) => scalarType('UInt8', opts),
  UInt16: (opts?: TypeOptions) => scalarType('UInt16', opts),
  UInt32: (opts?: TypeOptions) => scalarType('UInt32', opts),
  UInt64: (opts?: TypeOptions) => scalarType('UInt64', opts),
  UInt128: (opts?: TypeOptions) => scalarType('UInt128', opts),
  Float16: (opts?: TypeOptions) => scalarType('Float16', opts),
  Float32: (opts?: TypeOptions) => scalarType('Float32', opts),
  Float64: (opts?: TypeOptions) => scalarType('Float64', opts),
  Complex32: (opts?: TypeOptions) => scalarType('Complex32', opts),
  Complex64: (opts?: TypeOptions) => scalarType('Complex64', opts),
  Boolean: (opts?: TypeOptions) => scalarType('Boolean', opts),
  UTF8Char: (opts?: TypeOptions) => scalarType('UTF8Char', opts),
  String: (opts?: TypeOptions) => scalarType('String', opts),
  UTF8String: (opts?: TypeOptions) => scalarType('UTF8String', opts),
  Date: (opts?: TypeOptions) => scalarType('Date', opts),
  Time: (opts?: TypeOptions) => scalarType('Time', opts),
  DateTime: (opts?: TypeOptions) => scalarType('DateTime', opts),
  Timestamp: (opts?: TypeOptions) => scalarType('Timestamp', opts),
  NoneType: (opts?: TypeOptions) => scalarType('NoneType', opts),
  UndefinedType: (opts?: TypeOptions) => scalarType('UndefinedType', opts),

  ListType: (elementTypes: AST.DataType | readonly AST.DataType[], opts: CollectionTypeOptions = {}): AST.ListType => {
    const heterogeneous = opts.heterogeneous ?? false;
    return {
      kind: 'ListType',
      ...nodeBase(opts),
      elementTypes: normalizeElementTypes('ListType', elementTypes, heterogeneous),
      heterogeneous,
    };
  },

  SetType: (elementTypes: AST.DataType | readonly AST.DataType[], opts: CollectionTypeOptions = {}): AST.SetType => {
    const heterogeneous = opts.heterogeneous ?? false;
    return {
      kind: 'SetType',
      ...nodeBase(opts),
      elementTypes: normalizeElementTypes('SetType', elementTypes, heterogeneous),
      heterogeneous,
    };
  },

  MapType: (keyType: AST.DataType, valueType: AST.DataType, opts: TypeOptions = {}): AST.MapType =>
    ({ kind: 'MapType', ...nodeBase(opts), keyType, valueType }),

  TupleType: (elementTypes: readonly AST.DataType[], opts: TypeOptions = {}): AST.TupleType =>
    ({ kind: 'TupleType', ...nodeBase(opts), elementTypes: [...elementTypes] }),

  StructType: (name: string, opts: TypeOptions = {}): AST.StructType =>
    ({ kind: 'StructType', ...nodeBase(opts), name }),

  ClassType: (name: string, opts: TypeOptions = {}): AST.ClassType =>
    ({ kind: 'ClassType', ...nodeBase(opts), name }),

  EnumType: (name: string, opts: TypeOptions = {}): AST.EnumType =>
    ({ kind: 'EnumType', ...nodeBase(opts), name }),

  FunctionType: (paramTypes: readonly AST.DataType[], returnType: AST.DataType, opts: TypeOptions = {}): AST.FunctionType =>
    ({ kind: 'FunctionType', ...nodeBase(opts), paramTypes: [...paramTypes], returnType }),
};

function typeListsEqual(a: readonly AST.DataType[], b: readonly AST.DataType[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => {
    const other = b[i];
    return other !== undefined && typeEquals(t, other);
  });
}

/** 类型描述的结构相等（忽略身份标识与位置） */
export function typeEquals(a: AST.DataType, b: AST.DataType): boolean {
  if (a.kind !== b.kind) return false;
  switch (a.kind) {
    case 'ListType':
      return b.kind === 'ListType' && a.heterogeneous === b.heterogeneous && typeListsEqual(a.elementTypes, b.elementTypes);
    case 'SetType':
      return b.kind === 'SetType' && a.heterogeneous === b.heterogeneous && typeListsEqual(a.elementTypes, b.elementTypes);
    case 'MapType':
      return b.kind === 'MapType' && typeEquals(a.keyType, b.keyType) && typeEquals(a.valueType, b.valueType);
    case 'TupleType':
      return b.kind === 'TupleType' && typeListsEqual(a.elementTypes, b.elementTypes);
    case 'StructType':
    case 'ClassType':
    case 'EnumType':
      return (b.kind === 'StructType' || b.kind === 'ClassType' || b.kind === 'EnumType') && a.name === b.name;
    case 'FunctionType':
      return (
        b.kind === 'FunctionType' &&
        typeListsEqual(a.paramTypes, b.paramTypes) &&
        typeEquals(a.returnType, b.returnType)
      );
    default:
      return true;
  }
}

/** 深复制类型描述，新节点获得新的身份标识 */
export function cloneDataType(type: AST.DataType): AST.DataType {
  switch (type.kind) {
    case 'ListType':
      return DataTypes.ListType(type.elementTypes.map(cloneDataType), { heterogeneous: type.heterogeneous });
    case 'SetType':
      return DataTypes.SetType(type.elementTypes.map(cloneDataType), { heterogeneous: type.heterogeneous });
    case 'MapType':
      return DataTypes.MapType(cloneDataType(type.keyType), cloneDataType(type.valueType));
    case 'TupleType':
      return DataTypes.TupleType(type.elementTypes.map(cloneDataType));
    case 'StructType':
      return DataTypes.StructType(type.name);
    case 'ClassType':
      return DataTypes.ClassType(type.name);
    case 'EnumType':
      return DataTypes.EnumType(type.name);
    case 'FunctionType':
      return DataTypes.FunctionType(type.paramTypes.map(cloneDataType), cloneDataType(type.returnType));
    default:
      return DataTypes[type.kind]();
  }
}

/** 用于错误消息的简短类型名，如 `ListType[Int32]` */
export function typeLabel(type: AST.DataType): string {
  switch (type.kind) {
    case 'ListType':
    case 'SetType':
    case 'TupleType':
      return `${type.kind}[${type.elementTypes.map(typeLabel).join(', ')}]`;
    case 'MapType':
      return `MapType[${typeLabel(type.keyType)}, ${typeLabel(type.valueType)}]`;
    case 'StructType':
    case 'ClassType':
    case 'EnumType':
      return `${type.kind}[${type.name}]`;
    case 'FunctionType':
      return `FunctionType[(${type.paramTypes.map(typeLabel).join(', ')}) -> ${typeLabel(type.returnType)}]`;
    default:
      return type.kind;
  }
}

const BIT_WIDTHS: Readonly<Record<AST.IntegerKind | AST.FloatKind | AST.ComplexKind, number>> = {
  Int8: 8,
  Int16: 16,
  Int32: 32,
  Int64: 64,
  Int128: 128,
  UInt8: 8,
  UInt16: 16,
  UInt32: 32,
  UInt64: 64,
  UInt128: 128,
  Float16: 16,
  Float32: 32,
  Float64: 64,
  Complex32: 32,
  Complex64: 64,
};

/** 数值类型位宽；复数按单个分量计 */
export function bitWidth(kind: AST.NumericKind): number {
  return BIT_WIDTHS[kind];
}
