import type * as AST from '../types.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { isCollectionType, isTextKind, isVariable } from '../ast/guards.js';
import { DataTypes, cloneDataType, typeLabel } from '../datatypes/data_types.js';

// 推导式：子句自左向右求值，同一子句内的过滤条件按顺序取与

function isIterableType(type: AST.DataType): boolean {
  return isCollectionType(type) || (isTextKind(type.kind) && type.kind !== 'UTF8Char');
}

function requireClauses(kind: string, clauses: readonly AST.ComprehensionClause[], span?: AST.Span): void {
  if (clauses.length === 0) {
    throw new AstSyntaxError(DiagnosticCode.S012_EmptyClauses, `${kind} requires at least one clause`, {
      span,
      node: { kind },
    });
  }
}

export const Comprehensions = {
  ComprehensionClause: (
    target: AST.Expression,
    iterable: AST.Expression,
    conditions: readonly AST.Expression[] = [],
    isAsync: boolean = false,
    opts: AST.NodeOptions = {}
  ): AST.ComprehensionClause => {
    if (!isVariable(target)) {
      throw new AstSyntaxError(
        DiagnosticCode.S001_NotAddressable,
        `ComprehensionClause target must be a Variable, got ${target.kind}`,
        { node: target }
      );
    }
    if (!isIterableType(iterable.type)) {
      throw new AstTypeError(
        DiagnosticCode.T005_NotIterable,
        `ComprehensionClause iterable of type ${typeLabel(iterable.type)} is not iterable`,
        { span: opts.span, node: { kind: 'ComprehensionClause' } }
      );
    }
    return finishNode(
      { kind: 'ComprehensionClause', ...nodeBase(opts), target, iterable, conditions: [...conditions], isAsync },
      opts,
      [target, iterable, ...conditions]
    );
  },

  ListComprehension: (
    element: AST.Expression,
    clauses: readonly AST.ComprehensionClause[],
    opts: AST.NodeOptions = {}
  ): AST.ListComprehension => {
    requireClauses('ListComprehension', clauses, opts.span);
    return finishNode(
      {
        kind: 'ListComprehension',
        ...nodeBase(opts),
        element,
        clauses: [...clauses],
        type: DataTypes.ListType(cloneDataType(element.type)),
      },
      opts,
      [element, ...clauses]
    );
  },

  SetComprehension: (
    element: AST.Expression,
    clauses: readonly AST.ComprehensionClause[],
    opts: AST.NodeOptions = {}
  ): AST.SetComprehension => {
    requireClauses('SetComprehension', clauses, opts.span);
    return finishNode(
      {
        kind: 'SetComprehension',
        ...nodeBase(opts),
        element,
        clauses: [...clauses],
        type: DataTypes.SetType(cloneDataType(element.type)),
      },
      opts,
      [element, ...clauses]
    );
  },

  DictComprehension: (
    key: AST.Expression,
    value: AST.Expression,
    clauses: readonly AST.ComprehensionClause[],
    opts: AST.NodeOptions = {}
  ): AST.DictComprehension => {
    requireClauses('DictComprehension', clauses, opts.span);
    return finishNode(
      {
        kind: 'DictComprehension',
        ...nodeBase(opts),
        key,
        value,
        clauses: [...clauses],
        type: DataTypes.MapType(cloneDataType(key.type), cloneDataType(value.type)),
      },
      opts,
      [key, value, ...clauses]
    );
  },

  GeneratorExpr: (
    element: AST.Expression,
    clauses: readonly AST.ComprehensionClause[],
    opts: AST.NodeOptions = {}
  ): AST.GeneratorExpr => {
    requireClauses('GeneratorExpr', clauses, opts.span);
    return finishNode(
      { kind: 'GeneratorExpr', ...nodeBase(opts), element, clauses: [...clauses], type: DataTypes.UndefinedType() },
      opts,
      [element, ...clauses]
    );
  },
};
