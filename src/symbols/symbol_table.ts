import type * as AST from '../types.js';
import { AstKeyError, DiagnosticBuilder, DiagnosticCode, type Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * @module symbol_table
 *
 * 按作用域索引的声明注册表。
 *
 * - 作用域显式嵌套：每个 `Scope` 持有其外层作用域的引用
 * - 表只共享声明节点的引用，节点归属于所在的 Block / Module
 * - 同一作用域内重复定义抛出 AstKeyError；内层作用域遮蔽外层同名符号是允许的
 */

/** 可以登记到符号表的声明节点 */
export type Declaration =
  | AST.VariableDeclaration
  | AST.Argument
  | AST.FunctionPrototype
  | AST.FunctionDef
  | AST.FunctionAsyncDef
  | AST.ClassDeclStmt
  | AST.ClassDefStmt
  | AST.StructDeclStmt
  | AST.StructDefStmt
  | AST.EnumDeclStmt
  | AST.AliasExpr;

export interface ShadowEvent {
  readonly name: string;
  readonly scope: Scope;
  readonly shadowedScope: Scope;
  readonly node: AST.AstNode;
  readonly shadowed: AST.AstNode;
  /** K004 警告，指向遮蔽者 */
  readonly diagnostic: Diagnostic;
}

export interface DefineOptions {
  onShadow?: (event: ShadowEvent) => void;
}

export class Scope {
  private readonly symbols = new Map<string, AST.AstNode>();

  constructor(
    readonly name: string,
    readonly parent: Scope | null
  ) {}

  hasLocal(name: string): boolean {
    return this.symbols.has(name);
  }

  getLocal(name: string): AST.AstNode | undefined {
    return this.symbols.get(name);
  }

  setLocal(name: string, node: AST.AstNode): void {
    this.symbols.set(name, node);
  }

  /** 向外逐层查找，返回最近的声明及其所在作用域 */
  resolve(name: string): { scope: Scope; node: AST.AstNode } | undefined {
    const node = this.symbols.get(name);
    if (node !== undefined) return { scope: this, node };
    return this.parent?.resolve(name);
  }

  names(): string[] {
    return [...this.symbols.keys()];
  }

  /** `global` → `global.function` */
  get qualifiedName(): string {
    return this.parent === null ? this.name : `${this.parent.qualifiedName}.${this.name}`;
  }
}

export function declarationName(node: Declaration): string {
  switch (node.kind) {
    case 'FunctionDef':
    case 'FunctionAsyncDef':
      return node.prototype.name;
    case 'AliasExpr':
      return node.asname ?? node.name;
    default:
      return node.name;
  }
}

function declarationScope(node: Declaration): AST.ScopeKind {
  switch (node.kind) {
    case 'VariableDeclaration':
    case 'FunctionPrototype':
      return node.scope;
    case 'FunctionDef':
    case 'FunctionAsyncDef':
      return node.prototype.scope;
    default:
      return 'local';
  }
}

export interface SymbolTableOptions {
  readonly logger?: Logger;
}

export class SymbolTable {
  readonly root: Scope;
  private current: Scope;
  private readonly logger: Logger;

  constructor(options: SymbolTableOptions = {}) {
    this.root = new Scope('global', null);
    this.current = this.root;
    this.logger = options.logger ?? createLogger('symbols');
  }

  get currentScope(): Scope {
    return this.current;
  }

  /** 新建一个以 parent 为外层的作用域，不改变当前作用域 */
  createScope(name: string, parent: Scope = this.current): Scope {
    return new Scope(name, parent);
  }

  enterScope(name: string): Scope {
    this.current = this.createScope(name, this.current);
    return this.current;
  }

  exitScope(): Scope {
    const parent = this.current.parent;
    if (parent === null) {
      throw new AstKeyError(DiagnosticCode.K003_RootScopeExit, 'Cannot exit the root scope');
    }
    this.current = parent;
    return parent;
  }

  define(scope: Scope, name: string, node: AST.AstNode, options: DefineOptions = {}): void {
    if (scope.hasLocal(name)) {
      throw new AstKeyError(
        DiagnosticCode.K001_DuplicateSymbol,
        `Duplicate symbol '${name}' declared in scope '${scope.qualifiedName}'`,
        { node }
      );
    }
    const shadowed = scope.parent?.resolve(name);
    scope.setLocal(name, node);

    if (shadowed !== undefined) {
      this.logger.debug('Symbol shadows an outer declaration', {
        name,
        scope: scope.qualifiedName,
        shadowedScope: shadowed.scope.qualifiedName,
      });
      const diagnostic = DiagnosticBuilder.warning(DiagnosticCode.K004_ShadowedSymbol)
        .withMessage(
          `Symbol '${name}' in scope '${scope.qualifiedName}' shadows the declaration in scope '${shadowed.scope.qualifiedName}'`
        )
        .withNode(node)
        .build();
      options.onShadow?.({ name, scope, shadowedScope: shadowed.scope, node, shadowed: shadowed.node, diagnostic });
    }
  }

  /** 由声明推导名称；`global` 作用域的声明总是登记在根作用域 */
  declare(scope: Scope, node: Declaration, options: DefineOptions = {}): Scope {
    const target = declarationScope(node) === 'global' ? this.root : scope;
    this.define(target, declarationName(node), node, options);
    return target;
  }

  lookup(scope: Scope, name: string): AST.AstNode {
    const found = scope.resolve(name);
    if (found === undefined) {
      throw new AstKeyError(
        DiagnosticCode.K002_UndefinedSymbol,
        `Symbol '${name}' is not defined in scope '${scope.qualifiedName}' or any enclosing scope`
      );
    }
    return found.node;
  }

  tryLookup(scope: Scope, name: string): AST.AstNode | undefined {
    return scope.resolve(name)?.node;
  }
}
