import type * as AST from '../types.js';
import { AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isSignedIntegerKind } from '../ast/guards.js';
import { DataTypes, bitWidth, cloneDataType, typeEquals, typeLabel } from './data_types.js';
import { isValidTemporal, temporalFormat } from './temporal.js';

/**
 * @module literals
 *
 * 字面量工厂：构造时即校验值是否落在声明类型的取值域内。
 *
 * - 整数字面量统一以 bigint 保存，number 输入必须是安全整数
 * - 浮点/复数字面量必须有限且不超过对应位宽的最大有限值
 * - 文本字面量按 UTF-16 良构性校验；时间字面量按 ISO 8601 子集校验
 * - 集合字面量由元素推导类型
 */

const FLOAT_MAX: Readonly<Record<AST.FloatKind, number>> = {
  Float16: 65504,
  Float32: 3.4028234663852886e38,
  Float64: Number.MAX_VALUE,
};

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function integerRange(kind: AST.IntegerKind): { min: bigint; max: bigint } {
  const bits = BigInt(bitWidth(kind));
  if (isSignedIntegerKind(kind)) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

function checkInteger(kind: AST.IntegerKind, raw: number | bigint): bigint {
  if (typeof raw === 'number' && !Number.isSafeInteger(raw)) {
    throw new AstValueError(
      DiagnosticCode.V010_NotAnInteger,
      `Literal${kind} expects a safe integer or bigint, got ${raw}`
    );
  }
  const value = BigInt(raw);
  const { min, max } = integerRange(kind);
  if (value < min || value > max) {
    throw new AstValueError(
      DiagnosticCode.V001_IntegerOutOfRange,
      `Value ${value} out of range for ${kind} (${min}..${max})`
    );
  }
  return value;
}

function checkFloat(kind: AST.FloatKind, value: number, label: string = `Literal${kind}`): number {
  if (!Number.isFinite(value)) {
    throw new AstValueError(DiagnosticCode.V003_NonFiniteFloat, `${label} requires a finite value, got ${value}`);
  }
  if (Math.abs(value) > FLOAT_MAX[kind]) {
    throw new AstValueError(DiagnosticCode.V002_FloatOutOfRange, `Value ${value} out of range for ${kind}`);
  }
  return value;
}

function checkWellFormed(kind: string, value: string): string {
  if (LONE_SURROGATE.test(value)) {
    throw new AstValueError(DiagnosticCode.V004_InvalidCharacter, `${kind} contains an unpaired surrogate`);
  }
  return value;
}

function checkChar(value: string): string {
  checkWellFormed('LiteralUTF8Char', value);
  const codePoints = [...value].length;
  if (codePoints !== 1) {
    throw new AstValueError(
      DiagnosticCode.V004_InvalidCharacter,
      `LiteralUTF8Char requires exactly one code point, got ${codePoints}`
    );
  }
  return value;
}

function checkTemporal(kind: AST.TemporalKind, value: string): string {
  if (!isValidTemporal(kind, value)) {
    throw new AstValueError(
      DiagnosticCode.V005_InvalidTemporal,
      `Invalid ${kind} literal '${value}', expected ${temporalFormat(kind)}`
    );
  }
  return value;
}

/** 字面量值相等（不含身份标识），用于集合去重校验 */
export function literalEquals(a: AST.Literal, b: AST.Literal): boolean {
  if (a.kind !== b.kind) return false;
  switch (a.kind) {
    case 'LiteralList':
    case 'LiteralTuple':
    case 'LiteralSet':
      return (
        (b.kind === 'LiteralList' || b.kind === 'LiteralTuple' || b.kind === 'LiteralSet') &&
        literalListsEqual(a.elements, b.elements)
      );
    case 'LiteralMap':
      return b.kind === 'LiteralMap' && literalListsEqual(a.keys, b.keys) && literalListsEqual(a.values, b.values);
    case 'LiteralNone':
      return true;
    case 'LiteralComplex32':
    case 'LiteralComplex64':
      return (b.kind === 'LiteralComplex32' || b.kind === 'LiteralComplex64') && a.real === b.real && a.imag === b.imag;
    default:
      return 'value' in b && a.value === b.value;
  }
}

function literalListsEqual(a: readonly AST.Literal[], b: readonly AST.Literal[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, i) => {
    const other = b[i];
    return other !== undefined && literalEquals(item, other);
  });
}

function uniformType(types: readonly AST.DataType[]): boolean {
  const [first, ...rest] = types;
  return first === undefined || rest.every(t => typeEquals(first, t));
}

/** 由元素类型推导 ListType / SetType 的元素参数；空集合记为 UndefinedType */
function inferElementTypes(elements: readonly AST.Literal[]): { types: AST.DataType[]; heterogeneous: boolean } {
  const types = elements.map(e => e.type);
  const first = types[0];
  if (first === undefined) return { types: [DataTypes.UndefinedType()], heterogeneous: false };
  if (uniformType(types)) return { types: [cloneDataType(first)], heterogeneous: false };
  return { types: types.map(cloneDataType), heterogeneous: true };
}

function assertDistinct(kind: string, items: readonly AST.Literal[]): void {
  items.forEach((item, i) => {
    if (items.slice(0, i).some(prev => literalEquals(prev, item))) {
      throw new AstValueError(DiagnosticCode.V008_DuplicateElement, `${kind} contains a duplicate element at index ${i}`);
    }
  });
}

export const Literals = {
  LiteralInt8: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'Int8'> =>
    finishNode({ kind: 'LiteralInt8', ...nodeBase(opts), value: checkInteger('Int8', value), type: DataTypes.Int8() }, opts),
  LiteralInt16: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'Int16'> =>
    finishNode({ kind: 'LiteralInt16', ...nodeBase(opts), value: checkInteger('Int16', value), type: DataTypes.Int16() }, opts),
  LiteralInt32: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'Int32'> =>
    finishNode({ kind: 'LiteralInt32', ...nodeBase(opts), value: checkInteger('Int32', value), type: DataTypes.Int32() }, opts),
  LiteralInt64: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'Int64'> =>
    finishNode({ kind: 'LiteralInt64', ...nodeBase(opts), value: checkInteger('Int64', value), type: DataTypes.Int64() }, opts),
  LiteralInt128: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'Int128'> =>
    finishNode(
      { kind: 'LiteralInt128', ...nodeBase(opts), value: checkInteger('Int128', value), type: DataTypes.Int128() },
      opts
    ),
  LiteralUInt8: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'UInt8'> =>
    finishNode({ kind: 'LiteralUInt8', ...nodeBase(opts), value: checkInteger('UInt8', value), type: DataTypes.UInt8() }, opts),
  LiteralUInt16: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'UInt16'> =>
    finishNode(
      { kind: 'LiteralUInt16', ...nodeBase(opts), value: checkInteger('UInt16', value), type: DataTypes.UInt16() },
      opts
    ),
  LiteralUInt32: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'UInt32'> =>
    finishNode(
      { kind: 'LiteralUInt32', ...nodeBase(opts), value: checkInteger('UInt32', value), type: DataTypes.UInt32() },
      opts
    ),
  LiteralUInt64: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'UInt64'> =>
    finishNode(
      { kind: 'LiteralUInt64', ...nodeBase(opts), value: checkInteger('UInt64', value), type: DataTypes.UInt64() },
      opts
    ),
  LiteralUInt128: (value: number | bigint, opts: AST.NodeOptions = {}): AST.IntegerLiteralNode<'UInt128'> =>
    finishNode(
      { kind: 'LiteralUInt128', ...nodeBase(opts), value: checkInteger('UInt128', value), type: DataTypes.UInt128() },
      opts
    ),

  LiteralFloat16: (value: number, opts: AST.NodeOptions = {}): AST.FloatLiteralNode<'Float16'> =>
    finishNode({ kind: 'LiteralFloat16', ...nodeBase(opts), value: checkFloat('Float16', value), type: DataTypes.Float16() }, opts),
  LiteralFloat32: (value: number, opts: AST.NodeOptions = {}): AST.FloatLiteralNode<'Float32'> =>
    finishNode({ kind: 'LiteralFloat32', ...nodeBase(opts), value: checkFloat('Float32', value), type: DataTypes.Float32() }, opts),
  LiteralFloat64: (value: number, opts: AST.NodeOptions = {}): AST.FloatLiteralNode<'Float64'> =>
    finishNode({ kind: 'LiteralFloat64', ...nodeBase(opts), value: checkFloat('Float64', value), type: DataTypes.Float64() }, opts),

  // Complex32 由两个 Float32 分量组成，Complex64 由两个 Float64 分量组成
  LiteralComplex32: (real: number, imag: number, opts: AST.NodeOptions = {}): AST.ComplexLiteralNode<'Complex32'> =>
    finishNode(
      {
        kind: 'LiteralComplex32',
        ...nodeBase(opts),
        real: checkFloat('Float32', real, 'LiteralComplex32'),
        imag: checkFloat('Float32', imag, 'LiteralComplex32'),
        type: DataTypes.Complex32(),
      },
      opts
    ),
  LiteralComplex64: (real: number, imag: number, opts: AST.NodeOptions = {}): AST.ComplexLiteralNode<'Complex64'> =>
    finishNode(
      {
        kind: 'LiteralComplex64',
        ...nodeBase(opts),
        real: checkFloat('Float64', real, 'LiteralComplex64'),
        imag: checkFloat('Float64', imag, 'LiteralComplex64'),
        type: DataTypes.Complex64(),
      },
      opts
    ),

  LiteralBoolean: (value: boolean, opts: AST.NodeOptions = {}): AST.LiteralBoolean =>
    finishNode({ kind: 'LiteralBoolean', ...nodeBase(opts), value, type: DataTypes.Boolean() }, opts),

  LiteralUTF8Char: (value: string, opts: AST.NodeOptions = {}): AST.TextLiteralNode<'UTF8Char'> =>
    finishNode({ kind: 'LiteralUTF8Char', ...nodeBase(opts), value: checkChar(value), type: DataTypes.UTF8Char() }, opts),
  LiteralString: (value: string, opts: AST.NodeOptions = {}): AST.TextLiteralNode<'String'> =>
    finishNode({ kind: 'LiteralString', ...nodeBase(opts), value, type: DataTypes.String() }, opts),
  LiteralUTF8String: (value: string, opts: AST.NodeOptions = {}): AST.TextLiteralNode<'UTF8String'> =>
    finishNode(
      {
        kind: 'LiteralUTF8String',
        ...nodeBase(opts),
        value: checkWellFormed('LiteralUTF8String', value),
        type: DataTypes.UTF8String(),
      },
      opts
    ),

  LiteralDate: (value: string, opts: AST.NodeOptions = {}): AST.TemporalLiteralNode<'Date'> =>
    finishNode({ kind: 'LiteralDate', ...nodeBase(opts), value: checkTemporal('Date', value), type: DataTypes.Date() }, opts),
  LiteralTime: (value: string, opts: AST.NodeOptions = {}): AST.TemporalLiteralNode<'Time'> =>
    finishNode({ kind: 'LiteralTime', ...nodeBase(opts), value: checkTemporal('Time', value), type: DataTypes.Time() }, opts),
  LiteralDateTime: (value: string, opts: AST.NodeOptions = {}): AST.TemporalLiteralNode<'DateTime'> =>
    finishNode(
      { kind: 'LiteralDateTime', ...nodeBase(opts), value: checkTemporal('DateTime', value), type: DataTypes.DateTime() },
      opts
    ),
  LiteralTimestamp: (value: string, opts: AST.NodeOptions = {}): AST.TemporalLiteralNode<'Timestamp'> =>
    finishNode(
      { kind: 'LiteralTimestamp', ...nodeBase(opts), value: checkTemporal('Timestamp', value), type: DataTypes.Timestamp() },
      opts
    ),

  LiteralNone: (opts: AST.NodeOptions = {}): AST.LiteralNone =>
    finishNode({ kind: 'LiteralNone', ...nodeBase(opts), type: DataTypes.NoneType() }, opts),

  LiteralList: (elements: readonly AST.Literal[], opts: AST.NodeOptions = {}): AST.LiteralList => {
    const { types, heterogeneous } = inferElementTypes(elements);
    return finishNode(
      {
        kind: 'LiteralList',
        ...nodeBase(opts),
        elements: [...elements],
        type: DataTypes.ListType(types, { heterogeneous }),
      },
      opts,
      elements
    );
  },

  LiteralTuple: (elements: readonly AST.Literal[], opts: AST.NodeOptions = {}): AST.LiteralTuple =>
    finishNode(
      {
        kind: 'LiteralTuple',
        ...nodeBase(opts),
        elements: [...elements],
        type: DataTypes.TupleType(elements.map(e => cloneDataType(e.type))),
      },
      opts,
      elements
    ),

  LiteralSet: (elements: readonly AST.Literal[], opts: AST.NodeOptions = {}): AST.LiteralSet => {
    assertDistinct('LiteralSet', elements);
    const { types, heterogeneous } = inferElementTypes(elements);
    return finishNode(
      {
        kind: 'LiteralSet',
        ...nodeBase(opts),
        elements: [...elements],
        type: DataTypes.SetType(types, { heterogeneous }),
      },
      opts,
      elements
    );
  },

  LiteralMap: (
    entries: ReadonlyArray<readonly [AST.Literal, AST.Literal]>,
    opts: AST.NodeOptions = {}
  ): AST.LiteralMap => {
    const keys = entries.map(([key]) => key);
    const values = entries.map(([, value]) => value);
    assertDistinct('LiteralMap keys', keys);
    for (const [slot, items] of [
      ['key', keys],
      ['value', values],
    ] as const) {
      if (!uniformType(items.map(item => item.type))) {
        throw new AstValueError(
          DiagnosticCode.V007_NonUniformElements,
          `LiteralMap ${slot} types must be uniform, got ${items.map(item => typeLabel(item.type)).join(', ')}`
        );
      }
    }
    const [firstKey] = keys;
    const [firstValue] = values;
    return finishNode(
      {
        kind: 'LiteralMap',
        ...nodeBase(opts),
        keys,
        values,
        type: DataTypes.MapType(
          firstKey ? cloneDataType(firstKey.type) : DataTypes.UndefinedType(),
          firstValue ? cloneDataType(firstValue.type) : DataTypes.UndefinedType()
        ),
      },
      opts,
      [...keys, ...values]
    );
  },
};

/** 按标量 kind 构造整数字面量，供反序列化使用 */
export const INTEGER_LITERALS: Readonly<
  Record<AST.IntegerKind, (value: number | bigint, opts?: AST.NodeOptions) => AST.IntegerLiteral>
> = {
  Int8: Literals.LiteralInt8,
  Int16: Literals.LiteralInt16,
  Int32: Literals.LiteralInt32,
  Int64: Literals.LiteralInt64,
  Int128: Literals.LiteralInt128,
  UInt8: Literals.LiteralUInt8,
  UInt16: Literals.LiteralUInt16,
  UInt32: Literals.LiteralUInt32,
  UInt64: Literals.LiteralUInt64,
  UInt128: Literals.LiteralUInt128,
};

export const FLOAT_LITERALS: Readonly<Record<AST.FloatKind, (value: number, opts?: AST.NodeOptions) => AST.FloatLiteral>> = {
  Float16: Literals.LiteralFloat16,
  Float32: Literals.LiteralFloat32,
  Float64: Literals.LiteralFloat64,
};

export const COMPLEX_LITERALS: Readonly<
  Record<AST.ComplexKind, (real: number, imag: number, opts?: AST.NodeOptions) => AST.ComplexLiteral>
> = {
  Complex32: Literals.LiteralComplex32,
  Complex64: Literals.LiteralComplex64,
};

export const TEXT_LITERALS: Readonly<Record<AST.TextKind, (value: string, opts?: AST.NodeOptions) => AST.TextLiteral>> = {
  UTF8Char: Literals.LiteralUTF8Char,
  String: Literals.LiteralString,
  UTF8String: Literals.LiteralUTF8String,
};

export const TEMPORAL_LITERALS: Readonly<
  Record<AST.TemporalKind, (value: string, opts?: AST.NodeOptions) => AST.TemporalLiteral>
> = {
  Date: Literals.LiteralDate,
  Time: Literals.LiteralTime,
  DateTime: Literals.LiteralDateTime,
  Timestamp: Literals.LiteralTimestamp,
};
