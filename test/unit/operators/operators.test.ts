import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { nodeToString } from '../../../src/core/struct.js';
import { assertAstError } from '../../helpers/test-utils.js';

describe('UnaryOp / BinaryOp', () => {
  it('BinaryOp 的结果类型由提升表决定', () => {
    const sum = Ast.BinaryOp('+', Ast.LiteralInt8(1), Ast.LiteralInt16(2));
    assert.equal(sum.type.kind, 'Int16');
    assert.equal(nodeToString(sum), 'BinaryOp[+]');
  });

  it('不支持的操作数组合应该抛出 TypeError', () => {
    const error = assertAstError(
      () => Ast.BinaryOp('-', Ast.LiteralString('a'), Ast.LiteralInt32(1)),
      AstTypeError,
      DiagnosticCode.T001_UnsupportedOperands
    );
    assert.equal(error.message, "BinaryOp '-' does not support operand types (String, Int32)");
  });

  it('UnaryOp 取负无符号整数应该失败', () => {
    assertAstError(() => Ast.UnaryOp('-', Ast.LiteralUInt8(3)), AstTypeError, DiagnosticCode.T001_UnsupportedOperands);
    assert.equal(Ast.UnaryOp('not', Ast.LiteralBoolean(false)).type.kind, 'Boolean');
  });

  it('CompareOp 与 BoolOp 的结果总是 Boolean', () => {
    const lt = Ast.CompareOp('<', Ast.LiteralInt32(1), Ast.LiteralFloat64(2.5));
    const both = Ast.BoolOp('and', lt, Ast.LiteralBoolean(true));
    assert.equal(lt.type.kind, 'Boolean');
    assert.equal(both.type.kind, 'Boolean');
    assertAstError(
      () => Ast.BoolOp('or', Ast.LiteralInt32(1), Ast.LiteralBoolean(true)),
      AstTypeError,
      DiagnosticCode.T001_UnsupportedOperands
    );
  });
});

describe('AugAssign / WalrusOp', () => {
  it('AugAssign 的目标必须是 Variable', () => {
    assertAstError(
      () => Ast.AugAssign('+=', Ast.LiteralInt32(1), Ast.LiteralInt32(1)),
      AstSyntaxError,
      DiagnosticCode.S001_NotAddressable
    );
  });

  it('AugAssign 的类型与目标一致', () => {
    const x = Ast.Variable('x', Ast.Int32());
    const node = Ast.AugAssign('+=', x, Ast.LiteralInt8(1));
    assert.equal(node.type.kind, 'Int32');
    assert.notStrictEqual(node.type, x.type);
  });

  it('基础运算不可提升时应该抛出 T001，结果不可存入目标时抛出 T002', () => {
    const s = Ast.Variable('s', Ast.String());
    assertAstError(() => Ast.AugAssign('-=', s, Ast.LiteralString('x')), AstTypeError, DiagnosticCode.T001_UnsupportedOperands);

    const n = Ast.Variable('n', Ast.Int32());
    assertAstError(
      () => Ast.AugAssign('*=', n, Ast.LiteralString('x')),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
  });

  it('WalrusOp 要求值与目标兼容', () => {
    const x = Ast.Variable('x', Ast.Float64());
    assert.equal(Ast.WalrusOp(x, Ast.LiteralInt32(1)).type.kind, 'Float64');
    assertAstError(
      () => Ast.WalrusOp(Ast.Variable('y', Ast.Int32()), Ast.LiteralString('no')),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
    assert.equal(nodeToString(Ast.WalrusOp(Ast.Variable('z', Ast.Int8()), Ast.LiteralInt8(1))), 'WalrusOp[:=]');
  });
});

describe('Starred', () => {
  it('只接受集合值', () => {
    const list = Ast.LiteralList([Ast.LiteralInt32(1)]);
    assert.equal(Ast.Starred(list).type.kind, 'ListType');
    assertAstError(() => Ast.Starred(Ast.LiteralInt32(1)), AstTypeError, DiagnosticCode.T005_NotIterable);
  });
});
