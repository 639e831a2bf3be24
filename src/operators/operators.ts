import type * as AST from '../types.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isCollectionType, isVariable } from '../ast/guards.js';
import { cloneDataType, typeLabel } from '../datatypes/data_types.js';
import { isCompatible } from '../datatypes/compatibility.js';
import { augAssignBase, promoteBinary, promoteBool, promoteCompare, promoteUnary } from './promotion.js';

/**
 * @module operators
 *
 * 运算符节点工厂。结果类型在构造时经提升表解析，
 * 未覆盖的操作数组合直接抛出 AstTypeError，不会构造出类型不良的树。
 */

function unsupported(kind: string, op: string, types: readonly AST.DataType[], span?: AST.Span): AstTypeError {
  return new AstTypeError(
    DiagnosticCode.T001_UnsupportedOperands,
    `${kind} '${op}' does not support operand types (${types.map(typeLabel).join(', ')})`,
    { span, node: { kind } }
  );
}

/** 赋值类运算的左侧必须是可寻址的 Variable */
function requireVariable(kind: string, target: AST.Expression): AST.Variable {
  if (!isVariable(target)) {
    throw new AstSyntaxError(
      DiagnosticCode.S001_NotAddressable,
      `${kind} target must be a Variable, got ${target.kind}`,
      { node: target }
    );
  }
  return target;
}

export const Operators = {
  UnaryOp: (op: AST.UnaryOperator, operand: AST.Expression, opts: AST.NodeOptions = {}): AST.UnaryOp => {
    const type = promoteUnary(op, operand.type);
    if (type === null) throw unsupported('UnaryOp', op, [operand.type], opts.span);
    return finishNode({ kind: 'UnaryOp', ...nodeBase(opts), op, operand, type }, opts, [operand]);
  },

  BinaryOp: (
    op: AST.BinaryOperator,
    lhs: AST.Expression,
    rhs: AST.Expression,
    opts: AST.NodeOptions = {}
  ): AST.BinaryOp => {
    const type = promoteBinary(op, lhs.type, rhs.type);
    if (type === null) throw unsupported('BinaryOp', op, [lhs.type, rhs.type], opts.span);
    return finishNode({ kind: 'BinaryOp', ...nodeBase(opts), op, lhs, rhs, type }, opts, [lhs, rhs]);
  },

  CompareOp: (
    op: AST.CompareOperator,
    lhs: AST.Expression,
    rhs: AST.Expression,
    opts: AST.NodeOptions = {}
  ): AST.CompareOp => {
    const type = promoteCompare(op, lhs.type, rhs.type);
    if (type === null) throw unsupported('CompareOp', op, [lhs.type, rhs.type], opts.span);
    return finishNode({ kind: 'CompareOp', ...nodeBase(opts), op, lhs, rhs, type }, opts, [lhs, rhs]);
  },

  BoolOp: (op: AST.BoolOperator, lhs: AST.Expression, rhs: AST.Expression, opts: AST.NodeOptions = {}): AST.BoolOp => {
    const type = promoteBool(op, lhs.type, rhs.type);
    if (type === null) throw unsupported('BoolOp', op, [lhs.type, rhs.type], opts.span);
    return finishNode({ kind: 'BoolOp', ...nodeBase(opts), op, lhs, rhs, type }, opts, [lhs, rhs]);
  },

  /** `x += v`：基础运算须可提升，且结果类型须与目标兼容 */
  AugAssign: (
    op: AST.AugAssignOperator,
    target: AST.Expression,
    value: AST.Expression,
    opts: AST.NodeOptions = {}
  ): AST.AugAssign => {
    const variable = requireVariable('AugAssign', target);
    const result = promoteBinary(augAssignBase(op), variable.type, value.type);
    if (result === null) throw unsupported('AugAssign', op, [variable.type, value.type], opts.span);
    if (!isCompatible(result, variable.type)) {
      throw new AstTypeError(
        DiagnosticCode.T002_IncompatibleTypes,
        `AugAssign '${op}' produces ${typeLabel(result)}, which cannot be stored in ${typeLabel(variable.type)}`,
        { span: opts.span, node: { kind: 'AugAssign' } }
      );
    }
    return finishNode(
      { kind: 'AugAssign', ...nodeBase(opts), op, target: variable, value, type: cloneDataType(variable.type) },
      opts,
      [variable, value]
    );
  },

  WalrusOp: (target: AST.Expression, value: AST.Expression, opts: AST.NodeOptions = {}): AST.WalrusOp => {
    const variable = requireVariable('WalrusOp', target);
    if (!isCompatible(value.type, variable.type)) {
      throw new AstTypeError(
        DiagnosticCode.T002_IncompatibleTypes,
        `Cannot bind ${typeLabel(value.type)} to '${variable.name}' of type ${typeLabel(variable.type)}`,
        { span: opts.span, node: { kind: 'WalrusOp' } }
      );
    }
    return finishNode(
      { kind: 'WalrusOp', ...nodeBase(opts), target: variable, value, type: cloneDataType(variable.type) },
      opts,
      [variable, value]
    );
  },

  Starred: (value: AST.Expression, opts: AST.NodeOptions = {}): AST.Starred => {
    if (!isCollectionType(value.type)) {
      throw new AstTypeError(
        DiagnosticCode.T005_NotIterable,
        `Starred requires a collection value, got ${typeLabel(value.type)}`,
        { span: opts.span, node: { kind: 'Starred' } }
      );
    }
    return finishNode({ kind: 'Starred', ...nodeBase(opts), value, type: cloneDataType(value.type) }, opts, [value]);
  },
};
