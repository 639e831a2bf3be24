import type * as AST from '../types.js';
import { AstSyntaxError, AstTypeError, AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isNumericKind, isZeroLiteral } from '../ast/guards.js';
import { DataTypes, cloneDataType, typeEquals, typeLabel } from '../datatypes/data_types.js';
import { isCompatible } from '../datatypes/compatibility.js';
import { promoteNumericKinds } from '../operators/promotion.js';

/**
 * @module control_flow
 *
 * 代码块、条件、循环、分支与异常处理节点。
 *
 * 构造期校验：
 * - 区间循环拒绝字面量零步长，且边界必须是数值
 * - 计数循环拒绝 `+= 0` / `-= 0` 形式的更新
 * - switch 至多一个 default 分支，分支条件须与主体类型兼容
 * - 异常处理至少要有一个 catch 或 finally
 */

export const DEFAULT_BLOCK_NAME = 'entry';

function checkRange(
  kind: string,
  start: AST.Expression,
  end: AST.Expression,
  step: AST.Expression,
  span?: AST.Span
): void {
  if (isZeroLiteral(step)) {
    throw new AstValueError(DiagnosticCode.V006_ZeroStep, `${kind} step must be non-zero`, { span, node: { kind } });
  }
  for (const [slot, bound] of [
    ['start', start],
    ['end', end],
    ['step', step],
  ] as const) {
    if (!isNumericKind(bound.type.kind)) {
      throw new AstTypeError(
        DiagnosticCode.T001_UnsupportedOperands,
        `${kind} ${slot} must be numeric, got ${typeLabel(bound.type)}`,
        { span, node: { kind } }
      );
    }
  }
}

function checkCountUpdate(kind: string, update: AST.Expression, span?: AST.Span): void {
  if (update.kind === 'AugAssign' && (update.op === '+=' || update.op === '-=') && isZeroLiteral(update.value)) {
    throw new AstValueError(DiagnosticCode.V006_ZeroStep, `${kind} update '${update.op}' by zero never advances`, {
      span,
      node: { kind },
    });
  }
}

function branchType(thenExpr: AST.Expression, elseExpr: AST.Expression): AST.DataType {
  const a = thenExpr.type;
  const b = elseExpr.type;
  if (!typeEquals(a, b) && isNumericKind(a.kind) && isNumericKind(b.kind)) {
    const kind = promoteNumericKinds(a.kind, b.kind);
    if (kind !== null) return DataTypes[kind]();
  }
  return cloneDataType(a);
}

export const ControlFlow = {
  Block: (nodes: readonly AST.AstNode[] = [], name: string = DEFAULT_BLOCK_NAME, opts: AST.NodeOptions = {}): AST.Block =>
    finishNode({ kind: 'Block', ...nodeBase(opts), name, nodes: [...nodes] }, opts, nodes),

  IfStmt: (
    condition: AST.Expression,
    thenBlock: AST.Block,
    elseBlock: AST.Block | null = null,
    opts: AST.NodeOptions = {}
  ): AST.IfStmt =>
    finishNode({ kind: 'IfStmt', ...nodeBase(opts), condition, thenBlock, elseBlock }, opts, [
      condition,
      thenBlock,
      elseBlock,
    ]),

  IfExpr: (
    condition: AST.Expression,
    thenExpr: AST.Expression,
    elseExpr: AST.Expression,
    opts: AST.NodeOptions = {}
  ): AST.IfExpr => {
    if (!isCompatible(thenExpr.type, elseExpr.type)) {
      throw new AstTypeError(
        DiagnosticCode.T002_IncompatibleTypes,
        `IfExpr branches have incompatible types ${typeLabel(thenExpr.type)} and ${typeLabel(elseExpr.type)}`,
        { span: opts.span, node: { kind: 'IfExpr' } }
      );
    }
    return finishNode(
      { kind: 'IfExpr', ...nodeBase(opts), condition, thenExpr, elseExpr, type: branchType(thenExpr, elseExpr) },
      opts,
      [condition, thenExpr, elseExpr]
    );
  },

  ForRangeLoopStmt: (
    variable: AST.Variable,
    start: AST.Expression,
    end: AST.Expression,
    step: AST.Expression,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.ForRangeLoopStmt => {
    checkRange('ForRangeLoopStmt', start, end, step, opts.span);
    return finishNode({ kind: 'ForRangeLoopStmt', ...nodeBase(opts), variable, start, end, step, body }, opts, [
      variable,
      start,
      end,
      step,
      body,
    ]);
  },

  ForRangeLoopExpr: (
    variable: AST.Variable,
    start: AST.Expression,
    end: AST.Expression,
    step: AST.Expression,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.ForRangeLoopExpr => {
    checkRange('ForRangeLoopExpr', start, end, step, opts.span);
    return finishNode(
      {
        kind: 'ForRangeLoopExpr',
        ...nodeBase(opts),
        variable,
        start,
        end,
        step,
        body,
        type: DataTypes.UndefinedType(),
      },
      opts,
      [variable, start, end, step, body]
    );
  },

  ForCountLoopStmt: (
    initializer: AST.VariableDeclaration,
    condition: AST.Expression,
    update: AST.Expression,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.ForCountLoopStmt => {
    checkCountUpdate('ForCountLoopStmt', update, opts.span);
    return finishNode({ kind: 'ForCountLoopStmt', ...nodeBase(opts), initializer, condition, update, body }, opts, [
      initializer,
      condition,
      update,
      body,
    ]);
  },

  ForCountLoopExpr: (
    initializer: AST.VariableDeclaration,
    condition: AST.Expression,
    update: AST.Expression,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.ForCountLoopExpr => {
    checkCountUpdate('ForCountLoopExpr', update, opts.span);
    return finishNode(
      {
        kind: 'ForCountLoopExpr',
        ...nodeBase(opts),
        initializer,
        condition,
        update,
        body,
        type: DataTypes.UndefinedType(),
      },
      opts,
      [initializer, condition, update, body]
    );
  },

  WhileStmt: (condition: AST.Expression, body: AST.Block, opts: AST.NodeOptions = {}): AST.WhileStmt =>
    finishNode({ kind: 'WhileStmt', ...nodeBase(opts), condition, body }, opts, [condition, body]),

  WhileExpr: (condition: AST.Expression, body: AST.Block, opts: AST.NodeOptions = {}): AST.WhileExpr =>
    finishNode(
      { kind: 'WhileExpr', ...nodeBase(opts), condition, body, type: DataTypes.UndefinedType() },
      opts,
      [condition, body]
    ),

  DoWhileStmt: (body: AST.Block, condition: AST.Expression, opts: AST.NodeOptions = {}): AST.DoWhileStmt =>
    finishNode({ kind: 'DoWhileStmt', ...nodeBase(opts), body, condition }, opts, [body, condition]),

  BreakStmt: (opts: AST.NodeOptions = {}): AST.BreakStmt => finishNode({ kind: 'BreakStmt', ...nodeBase(opts) }, opts),

  ContinueStmt: (opts: AST.NodeOptions = {}): AST.ContinueStmt =>
    finishNode({ kind: 'ContinueStmt', ...nodeBase(opts) }, opts),

  /** default 分支不带条件，其余分支必须带条件 */
  CaseStmt: (
    condition: AST.Expression | null,
    body: AST.Block,
    isDefault: boolean = false,
    opts: AST.NodeOptions = {}
  ): AST.CaseStmt => {
    if (isDefault === (condition !== null)) {
      throw new AstSyntaxError(
        DiagnosticCode.S006_InvalidCase,
        isDefault ? 'A default case cannot carry a condition' : 'A non-default case requires a condition',
        { span: opts.span, node: { kind: 'CaseStmt' } }
      );
    }
    return finishNode({ kind: 'CaseStmt', ...nodeBase(opts), condition, body, isDefault }, opts, [condition, body]);
  },

  SwitchStmt: (value: AST.Expression, cases: readonly AST.CaseStmt[], opts: AST.NodeOptions = {}): AST.SwitchStmt => {
    let seenDefault = false;
    for (const c of cases) {
      if (c.isDefault) {
        if (seenDefault) {
          throw new AstSyntaxError(DiagnosticCode.S002_DuplicateDefault, 'SwitchStmt allows at most one default case', {
            node: c,
          });
        }
        seenDefault = true;
      } else if (c.condition !== null && !isCompatible(c.condition.type, value.type)) {
        throw new AstTypeError(
          DiagnosticCode.T002_IncompatibleTypes,
          `Case condition of type ${typeLabel(c.condition.type)} cannot match subject of type ${typeLabel(value.type)}`,
          { node: c }
        );
      }
    }
    return finishNode({ kind: 'SwitchStmt', ...nodeBase(opts), value, cases: [...cases] }, opts, [value, ...cases]);
  },

  ThrowStmt: (exception: AST.Expression | null = null, opts: AST.NodeOptions = {}): AST.ThrowStmt =>
    finishNode({ kind: 'ThrowStmt', ...nodeBase(opts), exception }, opts, [exception]),

  /** types 为空表示捕获全部异常 */
  CatchHandlerStmt: (
    types: readonly string[],
    name: string | null,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.CatchHandlerStmt =>
    finishNode({ kind: 'CatchHandlerStmt', ...nodeBase(opts), types: [...types], name, body }, opts, [body]),

  FinallyHandlerStmt: (body: AST.Block, opts: AST.NodeOptions = {}): AST.FinallyHandlerStmt =>
    finishNode({ kind: 'FinallyHandlerStmt', ...nodeBase(opts), body }, opts, [body]),

  ExceptionHandlerStmt: (
    body: AST.Block,
    handlers: readonly AST.CatchHandlerStmt[],
    finallyHandler: AST.FinallyHandlerStmt | null = null,
    opts: AST.NodeOptions = {}
  ): AST.ExceptionHandlerStmt => {
    if (handlers.length === 0 && finallyHandler === null) {
      throw new AstSyntaxError(
        DiagnosticCode.S008_EmptyHandlers,
        'ExceptionHandlerStmt requires at least one catch handler or a finally handler',
        { span: opts.span, node: { kind: 'ExceptionHandlerStmt' } }
      );
    }
    return finishNode(
      { kind: 'ExceptionHandlerStmt', ...nodeBase(opts), body, handlers: [...handlers], finallyHandler },
      opts,
      [body, ...handlers, finallyHandler]
    );
  },

  WithItem: (contextExpr: AST.Expression, instanceName: string | null = null, opts: AST.NodeOptions = {}): AST.WithItem =>
    finishNode({ kind: 'WithItem', ...nodeBase(opts), contextExpr, instanceName }, opts, [contextExpr]),

  WithStmt: (items: readonly AST.WithItem[], body: AST.Block, opts: AST.NodeOptions = {}): AST.WithStmt => {
    if (items.length === 0) {
      throw new AstSyntaxError(DiagnosticCode.S011_EmptyWithItems, 'WithStmt requires at least one item', {
        span: opts.span,
        node: { kind: 'WithStmt' },
      });
    }
    return finishNode({ kind: 'WithStmt', ...nodeBase(opts), items: [...items], body }, opts, [...items, body]);
  },
};
