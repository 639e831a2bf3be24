import type * as AST from '../types.js';
import { AstSyntaxError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';
import { DataTypes } from '../datatypes/data_types.js';

/**
 * @module packages
 *
 * 导入声明与顶层容器（Module / Package / Program / Target）。
 * 导入只记录意图，不做任何模块解析。
 */

function checkImport(kind: string, names: readonly AST.AliasExpr[], span?: AST.Span): void {
  if (names.length === 0) {
    throw new AstSyntaxError(DiagnosticCode.S005_EmptyImport, `${kind} requires at least one name`, {
      span,
      node: { kind },
    });
  }
}

/** 相对层级为非负整数；缺省模块名时层级必须大于 0（`from . import x`） */
function checkImportFrom(kind: string, module: string | null, level: number, span?: AST.Span): void {
  if (!Number.isInteger(level) || level < 0) {
    throw new AstSyntaxError(DiagnosticCode.S009_InvalidImportLevel, `${kind} level must be a non-negative integer`, {
      span,
      node: { kind },
    });
  }
  if (module === null && level === 0) {
    throw new AstSyntaxError(
      DiagnosticCode.S009_InvalidImportLevel,
      `${kind} without a module name requires a relative level`,
      { span, node: { kind } }
    );
  }
}

export const Packages = {
  AliasExpr: (name: string, asname: string | null = null, opts: AST.NodeOptions = {}): AST.AliasExpr =>
    finishNode({ kind: 'AliasExpr', ...nodeBase(opts), name, asname }, opts),

  ImportStmt: (names: readonly AST.AliasExpr[], opts: AST.NodeOptions = {}): AST.ImportStmt => {
    checkImport('ImportStmt', names, opts.span);
    return finishNode({ kind: 'ImportStmt', ...nodeBase(opts), names: [...names] }, opts, names);
  },

  ImportFromStmt: (
    module: string | null,
    names: readonly AST.AliasExpr[],
    level: number = 0,
    opts: AST.NodeOptions = {}
  ): AST.ImportFromStmt => {
    checkImport('ImportFromStmt', names, opts.span);
    checkImportFrom('ImportFromStmt', module, level, opts.span);
    return finishNode({ kind: 'ImportFromStmt', ...nodeBase(opts), module, names: [...names], level }, opts, names);
  },

  ImportExpr: (names: readonly AST.AliasExpr[], opts: AST.NodeOptions = {}): AST.ImportExpr => {
    checkImport('ImportExpr', names, opts.span);
    return finishNode(
      { kind: 'ImportExpr', ...nodeBase(opts), names: [...names], type: DataTypes.UndefinedType() },
      opts,
      names
    );
  },

  ImportFromExpr: (
    module: string | null,
    names: readonly AST.AliasExpr[],
    level: number = 0,
    opts: AST.NodeOptions = {}
  ): AST.ImportFromExpr => {
    checkImport('ImportFromExpr', names, opts.span);
    checkImportFrom('ImportFromExpr', module, level, opts.span);
    return finishNode(
      {
        kind: 'ImportFromExpr',
        ...nodeBase(opts),
        module,
        names: [...names],
        level,
        type: DataTypes.UndefinedType(),
      },
      opts,
      names
    );
  },

  /** 具名的可变代码块 */
  Module: (name: string, nodes: readonly AST.AstNode[] = [], opts: AST.NodeOptions = {}): AST.Module =>
    finishNode({ kind: 'Module', ...nodeBase(opts), name, nodes: [...nodes] }, opts, nodes),

  Package: (
    name: string,
    modules: readonly AST.Module[] = [],
    packages: readonly AST.Package[] = [],
    opts: AST.NodeOptions = {}
  ): AST.Package =>
    finishNode({ kind: 'Package', ...nodeBase(opts), name, modules: [...modules], packages: [...packages] }, opts, [
      ...modules,
      ...packages,
    ]),

  Target: (datalayout: string = '', triple: string = '', opts: AST.NodeOptions = {}): AST.Target =>
    finishNode({ kind: 'Target', ...nodeBase(opts), datalayout, triple }, opts),

  Program: (
    name: string,
    target: AST.Target,
    packages: readonly AST.Package[] = [],
    opts: AST.NodeOptions = {}
  ): AST.Program =>
    finishNode({ kind: 'Program', ...nodeBase(opts), name, target, packages: [...packages] }, opts, [
      target,
      ...packages,
    ]),
};
