import type * as AST from '../types.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isVariable } from '../ast/guards.js';
import { typeLabel } from '../datatypes/data_types.js';
import { isCompatible } from '../datatypes/compatibility.js';

/** 声明类节点共用的修饰符 */
export interface DeclarationOptions extends AST.NodeOptions {
  readonly visibility?: AST.VisibilityKind;
  readonly scope?: AST.ScopeKind;
}

export interface VariableOptions extends DeclarationOptions {
  readonly mutability?: AST.MutabilityKind;
}

export function assertAssignable(owner: string, value: AST.Expression, type: AST.DataType, span?: AST.Span): void {
  if (!isCompatible(value.type, type)) {
    throw new AstTypeError(
      DiagnosticCode.T002_IncompatibleTypes,
      `${owner} value of type ${typeLabel(value.type)} is not compatible with ${typeLabel(type)}`,
      { span, node: { kind: owner } }
    );
  }
}

function requireVariableTarget(owner: string, target: AST.Expression): AST.Variable {
  if (!isVariable(target)) {
    throw new AstSyntaxError(DiagnosticCode.S001_NotAddressable, `${owner} target must be a Variable, got ${target.kind}`, {
      node: target,
    });
  }
  return target;
}

export const Variables = {
  /** 常量必须带初值；初值类型须与声明类型兼容 */
  VariableDeclaration: (
    name: string,
    type: AST.DataType,
    value: AST.Expression | null = null,
    opts: VariableOptions = {}
  ): AST.VariableDeclaration => {
    const mutability = opts.mutability ?? 'mutable';
    if (mutability === 'constant' && value === null) {
      throw new AstSyntaxError(DiagnosticCode.S007_MissingValue, `Constant '${name}' requires a value`, {
        span: opts.span,
        node: { kind: 'VariableDeclaration' },
      });
    }
    if (value !== null) assertAssignable('VariableDeclaration', value, type, opts.span);
    return finishNode(
      {
        kind: 'VariableDeclaration',
        ...nodeBase(opts),
        name,
        type,
        value,
        mutability,
        visibility: opts.visibility ?? 'public',
        scope: opts.scope ?? 'local',
      },
      opts,
      [value]
    );
  },

  VariableAssignment: (
    target: AST.Expression,
    value: AST.Expression,
    opts: AST.NodeOptions = {}
  ): AST.VariableAssignment => {
    const variable = requireVariableTarget('VariableAssignment', target);
    assertAssignable('VariableAssignment', value, variable.type, opts.span);
    return finishNode({ kind: 'VariableAssignment', ...nodeBase(opts), target: variable, value }, opts, [
      variable,
      value,
    ]);
  },

  DeleteStmt: (targets: readonly AST.Expression[], opts: AST.NodeOptions = {}): AST.DeleteStmt => {
    const variables = targets.map(t => requireVariableTarget('DeleteStmt', t));
    return finishNode({ kind: 'DeleteStmt', ...nodeBase(opts), targets: variables }, opts, variables);
  },
};
