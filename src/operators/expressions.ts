import type * as AST from '../types.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isIntegerKind, isIntegerLiteral } from '../ast/guards.js';
import { DataTypes, cloneDataType, typeLabel } from '../datatypes/data_types.js';
import { isCompatible } from '../datatypes/compatibility.js';

// 变量引用、类型转换、括号与下标

export interface SubscriptParts {
  readonly index?: AST.Expression | null;
  readonly lower?: AST.Expression | null;
  readonly upper?: AST.Expression | null;
  readonly step?: AST.Expression | null;
}

function requireIntegerIndex(value: AST.Expression, part: AST.Expression | null, span?: AST.Span): void {
  if (part !== null && !isIntegerKind(part.type.kind)) {
    throw new AstTypeError(
      DiagnosticCode.T002_IncompatibleTypes,
      `Subscript of ${typeLabel(value.type)} requires integer indices, got ${typeLabel(part.type)}`,
      { span, node: { kind: 'SubscriptExpr' } }
    );
  }
}

function notSubscriptable(value: AST.Expression, detail: string, span?: AST.Span): AstTypeError {
  return new AstTypeError(
    DiagnosticCode.T003_NotSubscriptable,
    `${typeLabel(value.type)} ${detail}`,
    { span, node: { kind: 'SubscriptExpr' } }
  );
}

/** 下标访问的结果类型；切片保持原类型 */
function subscriptType(
  value: AST.Expression,
  index: AST.Expression | null,
  slice: readonly (AST.Expression | null)[],
  span?: AST.Span
): AST.DataType {
  const type = value.type;
  switch (type.kind) {
    case 'ListType':
    case 'TupleType':
    case 'String':
    case 'UTF8String': {
      for (const part of [index, ...slice]) requireIntegerIndex(value, part, span);
      if (index === null) return cloneDataType(type);
      if (type.kind === 'ListType') {
        const [first] = type.elementTypes;
        return !type.heterogeneous && first !== undefined ? cloneDataType(first) : DataTypes.UndefinedType();
      }
      if (type.kind === 'TupleType') {
        const position = isIntegerLiteral(index) ? Number(index.value) : Number.NaN;
        const element = Number.isInteger(position) ? type.elementTypes.at(position) : undefined;
        return element !== undefined ? cloneDataType(element) : DataTypes.UndefinedType();
      }
      return cloneDataType(type);
    }
    case 'MapType':
      if (index === null) throw notSubscriptable(value, 'cannot be sliced', span);
      if (!isCompatible(index.type, type.keyType)) {
        throw new AstTypeError(
          DiagnosticCode.T002_IncompatibleTypes,
          `Key of type ${typeLabel(index.type)} does not match ${typeLabel(type.keyType)}`,
          { span, node: { kind: 'SubscriptExpr' } }
        );
      }
      return cloneDataType(type.valueType);
    default:
      throw notSubscriptable(value, 'is not subscriptable', span);
  }
}

export const Expressions = {
  Variable: (name: string, type: AST.DataType, opts: AST.NodeOptions = {}): AST.Variable =>
    finishNode({ kind: 'Variable', ...nodeBase(opts), name, type }, opts),

  /** 显式类型转换，不做值域检查 */
  TypeCastExpr: (value: AST.Expression, type: AST.DataType, opts: AST.NodeOptions = {}): AST.TypeCastExpr =>
    finishNode({ kind: 'TypeCastExpr', ...nodeBase(opts), value, type }, opts, [value]),

  ParenthesizedExpr: (value: AST.Expression, opts: AST.NodeOptions = {}): AST.ParenthesizedExpr =>
    finishNode(
      { kind: 'ParenthesizedExpr', ...nodeBase(opts), value, type: cloneDataType(value.type) },
      opts,
      [value]
    ),

  /**
   * 单下标 `v[i]` 或切片 `v[lower:upper:step]`，二者互斥。
   * 列表、元组与字符串要求整数下标；映射要求键类型兼容且不支持切片。
   */
  SubscriptExpr: (value: AST.Expression, parts: SubscriptParts, opts: AST.NodeOptions = {}): AST.SubscriptExpr => {
    const index = parts.index ?? null;
    const lower = parts.lower ?? null;
    const upper = parts.upper ?? null;
    const step = parts.step ?? null;
    const isSlice = lower !== null || upper !== null || step !== null;
    if (index !== null && isSlice) {
      throw new AstSyntaxError(DiagnosticCode.S010_AmbiguousSubscript, 'Subscript cannot combine an index with a slice', {
        span: opts.span,
        node: { kind: 'SubscriptExpr' },
      });
    }
    const type = subscriptType(value, index, [lower, upper, step], opts.span);
    return finishNode(
      { kind: 'SubscriptExpr', ...nodeBase(opts), value, index, lower, upper, step, type },
      opts,
      [value, index, lower, upper, step]
    );
  },
};
