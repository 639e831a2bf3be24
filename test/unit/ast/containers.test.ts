import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { parentOf } from '../../../src/ast/identity.js';
import {
  appendArgument,
  appendNode,
  insertArgument,
  insertNode,
  nodeAt,
  nodeCount,
} from '../../../src/ast/containers.js';
import { AstIndexError, AstSyntaxError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { assertAstError } from '../../helpers/test-utils.js';

describe('Block', () => {
  it('默认名称应该是 entry', () => {
    assert.equal(Ast.Block().name, 'entry');
  });

  it('追加后按下标取回的应该是同一个节点', () => {
    const block = Ast.Block();
    const first = Ast.LiteralInt32(1);
    const second = Ast.LiteralInt32(2);

    assert.equal(appendNode(block, first), 1);
    assert.equal(appendNode(block, second), 2);

    assert.equal(nodeCount(block), 2);
    assert.strictEqual(nodeAt(block, 0), first);
    assert.strictEqual(nodeAt(block, 1), second);
    assert.strictEqual(parentOf(second), block);
  });

  it('insertNode 应该在指定位置插入，等于长度时追加', () => {
    const a = Ast.BreakStmt();
    const b = Ast.ContinueStmt();
    const c = Ast.ThrowStmt();
    const block = Ast.Block([a]);

    insertNode(block, 0, b);
    insertNode(block, 2, c);

    assert.deepEqual(
      block.nodes.map(n => n.kind),
      ['ContinueStmt', 'BreakStmt', 'ThrowStmt']
    );
  });

  it('越界、负数或非整数下标应该抛出 IndexError', () => {
    const block = Ast.Block([Ast.BreakStmt()]);

    assertAstError(() => nodeAt(block, 1), AstIndexError, DiagnosticCode.I001_IndexOutOfRange);
    assertAstError(() => nodeAt(block, -1), AstIndexError, DiagnosticCode.I001_IndexOutOfRange);
    assertAstError(() => nodeAt(block, 0.5), AstIndexError, DiagnosticCode.I001_IndexOutOfRange);
    assertAstError(() => insertNode(block, 3, Ast.BreakStmt()), AstIndexError, DiagnosticCode.I001_IndexOutOfRange);
  });

  it('越界错误消息应该包含下标与长度', () => {
    const error = assertAstError(() => nodeAt(Ast.Block(), 0), AstIndexError, DiagnosticCode.I001_IndexOutOfRange);
    assert.equal(error.message, 'Index 0 out of range for Block of length 0');
  });
});

describe('Module', () => {
  it('应该与 Block 一样支持追加与下标访问', () => {
    const module = Ast.Module('main');
    const decl = Ast.VariableDeclaration('x', Ast.Int32(), Ast.LiteralInt32(1), { parent: module });

    assert.equal(nodeCount(module), 1);
    assert.strictEqual(nodeAt(module, 0), decl);
  });
});

describe('Arguments', () => {
  it('appendArgument 应该拒绝重复参数名', () => {
    const args = Ast.Arguments([Ast.Argument('a', Ast.Int32())]);

    assert.equal(appendArgument(args, Ast.Argument('b', Ast.Int32())), 2);
    assertAstError(
      () => appendArgument(args, Ast.Argument('a', Ast.Float64())),
      AstSyntaxError,
      DiagnosticCode.S003_DuplicateArgument
    );
    assert.equal(nodeCount(args), 2);
  });

  it('insertArgument 应该保持顺序并返回新长度', () => {
    const args = Ast.Arguments([Ast.Argument('b', Ast.Int32())]);
    assert.equal(insertArgument(args, 0, Ast.Argument('a', Ast.Int32())), 2);
    assert.equal(nodeAt(args, 0).name, 'a');
    assert.equal(nodeAt(args, 1).name, 'b');
  });

  it('构造时出现重复参数名应该抛出 SyntaxError', () => {
    assertAstError(
      () => Ast.Arguments([Ast.Argument('x', Ast.Int32()), Ast.Argument('x', Ast.Int32())]),
      AstSyntaxError,
      DiagnosticCode.S003_DuplicateArgument
    );
  });
});
