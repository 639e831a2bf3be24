import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { SymbolTable, declarationName, type ShadowEvent } from '../../../src/symbols/symbol_table.js';
import { AstKeyError, DiagnosticCode, DiagnosticSeverity } from '../../../src/diagnostics/diagnostics.js';
import { assertAstError, createCapturingLogger } from '../../helpers/test-utils.js';

describe('SymbolTable', () => {
  let table: SymbolTable;

  beforeEach(() => {
    table = new SymbolTable({ logger: createCapturingLogger().logger });
  });

  it('应该在根作用域定义并查找符号', () => {
    const decl = Ast.VariableDeclaration('x', Ast.Int32());
    table.define(table.root, 'x', decl);
    assert.strictEqual(table.lookup(table.root, 'x'), decl);
    assert.deepEqual(table.root.names(), ['x']);
  });

  it('同一作用域内重复定义应该抛出 KeyError', () => {
    table.define(table.root, 'x', Ast.VariableDeclaration('x', Ast.Int32()));
    const error = assertAstError(
      () => table.define(table.root, 'x', Ast.VariableDeclaration('x', Ast.String())),
      AstKeyError,
      DiagnosticCode.K001_DuplicateSymbol
    );
    assert.equal(error.message, "Duplicate symbol 'x' declared in scope 'global'");
  });

  it('查找未定义的符号应该抛出 KeyError', () => {
    const inner = table.enterScope('function');
    const error = assertAstError(() => table.lookup(inner, 'missing'), AstKeyError, DiagnosticCode.K002_UndefinedSymbol);
    assert.equal(error.message, "Symbol 'missing' is not defined in scope 'global.function' or any enclosing scope");
    assert.equal(table.tryLookup(inner, 'missing'), undefined);
  });

  it('内层作用域应该看到外层符号，并可以遮蔽它', () => {
    const outer = Ast.VariableDeclaration('x', Ast.Int32());
    const inner = Ast.VariableDeclaration('x', Ast.String());
    table.define(table.root, 'x', outer);

    const scope = table.enterScope('block');
    assert.strictEqual(table.lookup(scope, 'x'), outer);

    const events: ShadowEvent[] = [];
    table.define(scope, 'x', inner, { onShadow: event => events.push(event) });

    assert.strictEqual(table.lookup(scope, 'x'), inner);
    assert.strictEqual(table.lookup(table.root, 'x'), outer);
    assert.equal(events.length, 1);
    assert.equal(events[0]?.name, 'x');
    assert.strictEqual(events[0]?.shadowedScope, table.root);
    assert.strictEqual(events[0]?.shadowed, outer);
    assert.deepEqual(events[0]?.diagnostic, {
      severity: DiagnosticSeverity.Warning,
      code: DiagnosticCode.K004_ShadowedSymbol,
      message: "Symbol 'x' in scope 'global.block' shadows the declaration in scope 'global'",
      nodeKind: 'VariableDeclaration',
    });
  });

  it('遮蔽应该记录一条调试日志', () => {
    const { logger, entries } = createCapturingLogger('symbols');
    const logged = new SymbolTable({ logger });
    logged.define(logged.root, 'y', Ast.VariableDeclaration('y', Ast.Int32()));
    logged.define(logged.enterScope('loop'), 'y', Ast.VariableDeclaration('y', Ast.Int32()));

    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.level, 'DEBUG');
    assert.equal(entries[0]?.message, 'Symbol shadows an outer declaration');
    assert.equal(entries[0]?.scope, 'global.loop');
    assert.equal(entries[0]?.shadowedScope, 'global');
  });

  it('退出作用域回到外层，根作用域不能退出', () => {
    const inner = table.enterScope('function');
    assert.strictEqual(inner.parent, table.root);
    assert.strictEqual(table.exitScope(), table.root);
    assert.strictEqual(table.currentScope, table.root);
    assertAstError(() => table.exitScope(), AstKeyError, DiagnosticCode.K003_RootScopeExit);
  });

  it('createScope 不改变当前作用域', () => {
    const detached = table.createScope('helper');
    assert.strictEqual(detached.parent, table.root);
    assert.strictEqual(table.currentScope, table.root);
  });

  it('declare 按声明推导名称，global 声明登记在根作用域', () => {
    const scope = table.enterScope('function');
    const fn = Ast.FunctionDef(Ast.FunctionPrototype('helper', Ast.Arguments(), Ast.NoneType()), Ast.Block());
    const local = Ast.VariableDeclaration('tmp', Ast.Int32());

    assert.strictEqual(table.declare(scope, fn), table.root);
    assert.strictEqual(table.declare(scope, local), scope);
    assert.equal(table.root.hasLocal('helper'), true);
    assert.equal(scope.hasLocal('tmp'), true);
  });

  it('别名以 asname 登记', () => {
    assert.equal(declarationName(Ast.AliasExpr('numpy', 'np')), 'np');
    assert.equal(declarationName(Ast.AliasExpr('os')), 'os');
  });
});
