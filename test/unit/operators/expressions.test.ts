import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { AstSyntaxError, AstTypeError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { nodeToString } from '../../../src/core/struct.js';
import { assertAstError } from '../../helpers/test-utils.js';

describe('Variable / TypeCastExpr / ParenthesizedExpr', () => {
  it('Variable 渲染为名称标签', () => {
    assert.equal(nodeToString(Ast.Variable('count', Ast.Int64())), 'Variable[count]');
  });

  it('TypeCastExpr 的类型就是目标类型', () => {
    const cast = Ast.TypeCastExpr(Ast.LiteralInt32(1), Ast.Float32());
    assert.equal(cast.type.kind, 'Float32');
  });

  it('ParenthesizedExpr 复制内部表达式的类型', () => {
    const inner = Ast.LiteralBoolean(true);
    const paren = Ast.ParenthesizedExpr(inner);
    assert.equal(paren.type.kind, 'Boolean');
    assert.notStrictEqual(paren.type, inner.type);
  });
});

describe('SubscriptExpr', () => {
  const list = () => Ast.Variable('xs', Ast.ListType(Ast.Float64()));

  it('列表单下标得到元素类型', () => {
    const item = Ast.SubscriptExpr(list(), { index: Ast.LiteralInt32(0) });
    assert.equal(item.type.kind, 'Float64');
    assert.equal(item.lower, null);
  });

  it('切片保持原类型', () => {
    const slice = Ast.SubscriptExpr(list(), { lower: Ast.LiteralInt32(1), upper: Ast.LiteralInt32(3) });
    assert.equal(slice.type.kind, 'ListType');
    assert.equal(slice.index, null);
  });

  it('下标与切片不能同时出现', () => {
    assertAstError(
      () => Ast.SubscriptExpr(list(), { index: Ast.LiteralInt32(0), step: Ast.LiteralInt32(1) }),
      AstSyntaxError,
      DiagnosticCode.S010_AmbiguousSubscript
    );
  });

  it('序列下标必须是整数', () => {
    assertAstError(
      () => Ast.SubscriptExpr(list(), { index: Ast.LiteralString('a') }),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
  });

  it('元组按字面量下标取对应位置的类型', () => {
    const pair = Ast.Variable('pair', Ast.TupleType([Ast.Int8(), Ast.String()]));
    assert.equal(Ast.SubscriptExpr(pair, { index: Ast.LiteralInt32(1) }).type.kind, 'String');
    assert.equal(Ast.SubscriptExpr(pair, { index: Ast.LiteralInt32(-1) }).type.kind, 'String');
    assert.equal(
      Ast.SubscriptExpr(pair, { index: Ast.Variable('i', Ast.Int32()) }).type.kind,
      'UndefinedType'
    );
  });

  it('映射按键取值，且不能切片', () => {
    const map = Ast.Variable('m', Ast.MapType(Ast.String(), Ast.Int64()));
    assert.equal(Ast.SubscriptExpr(map, { index: Ast.LiteralString('k') }).type.kind, 'Int64');
    assertAstError(
      () => Ast.SubscriptExpr(map, { lower: Ast.LiteralInt32(0) }),
      AstTypeError,
      DiagnosticCode.T003_NotSubscriptable
    );
    assertAstError(
      () => Ast.SubscriptExpr(map, { index: Ast.LiteralInt32(0) }),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
  });

  it('标量不可下标', () => {
    assertAstError(
      () => Ast.SubscriptExpr(Ast.LiteralInt32(5), { index: Ast.LiteralInt32(0) }),
      AstTypeError,
      DiagnosticCode.T003_NotSubscriptable
    );
  });
});
