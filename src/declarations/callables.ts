import type * as AST from '../types.js';
import { AstTypeError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { appendArgument, assertUniqueArgumentNames, finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { DataTypes, cloneDataType } from '../datatypes/data_types.js';
import { assertAssignable, type DeclarationOptions } from './variables.js';

/**
 * @module callables
 *
 * 函数原型、定义、调用与返回，以及 lambda / await / yield。
 *
 * 原型在构造时复查参数名唯一；调用在构造时按被调方原型检查实参个数与类型。
 * 只有名称与返回类型的被调方（如外部函数）跳过实参检查。
 */

/** 调用目标：完整原型或仅含名称与返回类型的签名 */
export type CallTarget =
  | AST.FunctionPrototype
  | AST.FunctionDef
  | AST.FunctionAsyncDef
  | { readonly name: string; readonly returnType: AST.DataType };

interface Signature {
  readonly name: string;
  readonly returnType: AST.DataType;
  readonly prototype: AST.FunctionPrototype | null;
}

function signatureOf(callee: CallTarget): Signature {
  if (!('kind' in callee)) return { name: callee.name, returnType: callee.returnType, prototype: null };
  const prototype = callee.kind === 'FunctionPrototype' ? callee : callee.prototype;
  return { name: prototype.name, returnType: prototype.returnType, prototype };
}

function checkCallArguments(prototype: AST.FunctionPrototype, args: readonly AST.Expression[], span?: AST.Span): void {
  const params = prototype.args.nodes;
  const required = params.filter(p => p.defaultValue === null).length;
  if (args.length < required || args.length > params.length) {
    const expected = required === params.length ? `${required}` : `${required}..${params.length}`;
    throw new AstTypeError(
      DiagnosticCode.T004_ArityMismatch,
      `Function '${prototype.name}' expects ${expected} argument(s), got ${args.length}`,
      { span, node: { kind: 'FunctionCall' } }
    );
  }
  args.forEach((arg, i) => {
    const param = params[i];
    if (param !== undefined) assertAssignable('FunctionCall', arg, param.type, span);
  });
}

export const Callables = {
  Argument: (
    name: string,
    type: AST.DataType,
    defaultValue: AST.Expression | null = null,
    opts: AST.NodeOptions = {}
  ): AST.Argument => {
    if (defaultValue !== null) assertAssignable('Argument', defaultValue, type, opts.span);
    return finishNode({ kind: 'Argument', ...nodeBase(opts), name, type, defaultValue }, opts, [defaultValue]);
  },

  /** 有序参数列表；构造和追加时都要求参数名唯一 */
  Arguments: (nodes: readonly AST.Argument[] = [], opts: AST.NodeOptions = {}): AST.Arguments => {
    const args: AST.Arguments = { kind: 'Arguments', ...nodeBase(opts), nodes: [] };
    for (const arg of nodes) appendArgument(args, arg);
    return finishNode(args, opts);
  },

  FunctionPrototype: (
    name: string,
    args: AST.Arguments,
    returnType: AST.DataType,
    opts: DeclarationOptions = {}
  ): AST.FunctionPrototype => {
    assertUniqueArgumentNames(args.nodes, { kind: 'FunctionPrototype', span: opts.span });
    return finishNode(
      {
        kind: 'FunctionPrototype',
        ...nodeBase(opts),
        name,
        args,
        returnType,
        scope: opts.scope ?? 'global',
        visibility: opts.visibility ?? 'public',
      },
      opts,
      [args]
    );
  },

  FunctionDef: (prototype: AST.FunctionPrototype, body: AST.Block, opts: AST.NodeOptions = {}): AST.FunctionDef =>
    finishNode({ kind: 'FunctionDef', ...nodeBase(opts), prototype, body }, opts, [prototype, body]),

  FunctionAsyncDef: (
    prototype: AST.FunctionPrototype,
    body: AST.Block,
    opts: AST.NodeOptions = {}
  ): AST.FunctionAsyncDef =>
    finishNode({ kind: 'FunctionAsyncDef', ...nodeBase(opts), prototype, body }, opts, [prototype, body]),

  FunctionReturn: (value: AST.Expression | null = null, opts: AST.NodeOptions = {}): AST.FunctionReturn =>
    finishNode({ kind: 'FunctionReturn', ...nodeBase(opts), value }, opts, [value]),

  FunctionCall: (callee: CallTarget, args: readonly AST.Expression[] = [], opts: AST.NodeOptions = {}): AST.FunctionCall => {
    const signature = signatureOf(callee);
    if (signature.prototype !== null) checkCallArguments(signature.prototype, args, opts.span);
    return finishNode(
      {
        kind: 'FunctionCall',
        ...nodeBase(opts),
        callee: signature.name,
        args: [...args],
        type: cloneDataType(signature.returnType),
      },
      opts,
      args
    );
  },

  LambdaExpr: (params: AST.Arguments, body: AST.Expression, opts: AST.NodeOptions = {}): AST.LambdaExpr => {
    assertUniqueArgumentNames(params.nodes, { kind: 'LambdaExpr' });
    const type = DataTypes.FunctionType(
      params.nodes.map(p => cloneDataType(p.type)),
      cloneDataType(body.type)
    );
    return finishNode({ kind: 'LambdaExpr', ...nodeBase(opts), params, body, type }, opts, [params, body]);
  },

  AwaitExpr: (value: AST.Expression, opts: AST.NodeOptions = {}): AST.AwaitExpr =>
    finishNode({ kind: 'AwaitExpr', ...nodeBase(opts), value, type: cloneDataType(value.type) }, opts, [value]),

  /** 无值的 yield 产出 NoneType */
  YieldExpr: (value: AST.Expression | null = null, opts: AST.NodeOptions = {}): AST.YieldExpr =>
    finishNode(
      {
        kind: 'YieldExpr',
        ...nodeBase(opts),
        value,
        type: value !== null ? cloneDataType(value.type) : DataTypes.NoneType(),
      },
      opts,
      [value]
    ),
};
