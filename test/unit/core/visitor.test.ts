import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { AstVisitor } from '../../../src/core/visitor.js';
import { AstNotImplementedError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import type * as AST from '../../../src/types.js';
import { assertAstError } from '../../helpers/test-utils.js';

class Evaluator extends AstVisitor<number> {
  override visitLiteralInt32(node: AST.NodeOfKind<'LiteralInt32'>): number {
    return Number(node.value);
  }

  override visitBinaryOp(node: AST.BinaryOp): number {
    const lhs = this.visit(node.lhs);
    const rhs = this.visit(node.rhs);
    return node.op === '*' ? lhs * rhs : lhs + rhs;
  }

  override visitParenthesizedExpr(node: AST.ParenthesizedExpr): number {
    return this.visit(node.value);
  }
}

describe('AstVisitor', () => {
  it('应该按节点 kind 分派', () => {
    const expr = Ast.BinaryOp(
      '*',
      Ast.ParenthesizedExpr(Ast.BinaryOp('+', Ast.LiteralInt32(2), Ast.LiteralInt32(3))),
      Ast.LiteralInt32(4)
    );
    assert.equal(new Evaluator().visit(expr), 20);
  });

  it('visitAll 保持顺序', () => {
    assert.deepEqual(new Evaluator().visitAll([Ast.LiteralInt32(1), Ast.LiteralInt32(2)]), [1, 2]);
  });

  it('缺少处理方法时应该抛出 NotImplementedError', () => {
    const error = assertAstError(
      () => new Evaluator().visit(Ast.LiteralString('x')),
      AstNotImplementedError,
      DiagnosticCode.N001_UnhandledVariant
    );
    assert.equal(error.message, 'Evaluator does not implement visitLiteralString');
  });
});
