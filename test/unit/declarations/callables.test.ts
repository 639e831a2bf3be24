import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { parentOf } from '../../../src/ast/identity.js';
import { AstTypeError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { typeLabel } from '../../../src/datatypes/data_types.js';
import { nodeToString } from '../../../src/core/struct.js';
import { assertAstError } from '../../helpers/test-utils.js';

function addPrototype() {
  return Ast.FunctionPrototype(
    'add',
    Ast.Arguments([
      Ast.Argument('a', Ast.Int32()),
      Ast.Argument('b', Ast.Int32(), Ast.LiteralInt32(1)),
    ]),
    Ast.Int64()
  );
}

describe('函数声明', () => {
  it('Argument 的默认值须与参数类型兼容', () => {
    assertAstError(
      () => Ast.Argument('flag', Ast.Boolean(), Ast.LiteralString('yes')),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
  });

  it('FunctionPrototype 默认为全局、公开', () => {
    const proto = addPrototype();
    assert.equal(proto.scope, 'global');
    assert.equal(proto.visibility, 'public');
    assert.strictEqual(parentOf(proto.args), proto);
    assert.equal(nodeToString(proto), 'FunctionPrototype[add]');
  });

  it('FunctionDef 以原型名作为标签', () => {
    const def = Ast.FunctionDef(addPrototype(), Ast.Block([Ast.FunctionReturn()]));
    assert.equal(nodeToString(def), 'FunctionDef[add]');
    assert.equal(nodeToString(Ast.FunctionAsyncDef(addPrototype(), Ast.Block())), 'FunctionAsyncDef[add]');
  });
});

describe('FunctionCall', () => {
  it('调用类型为返回类型的副本', () => {
    const proto = addPrototype();
    const call = Ast.FunctionCall(proto, [Ast.LiteralInt32(2)]);
    assert.equal(call.callee, 'add');
    assert.equal(call.type.kind, 'Int64');
    assert.notStrictEqual(call.type, proto.returnType);
    assert.equal(nodeToString(call), 'FunctionCall[add]');
  });

  it('参数个数须落在必需参数与全部参数之间', () => {
    const error = assertAstError(
      () => Ast.FunctionCall(addPrototype(), []),
      AstTypeError,
      DiagnosticCode.T004_ArityMismatch
    );
    assert.equal(error.message, "Function 'add' expects 1..2 argument(s), got 0");
    assertAstError(
      () => Ast.FunctionCall(addPrototype(), [Ast.LiteralInt32(1), Ast.LiteralInt32(2), Ast.LiteralInt32(3)]),
      AstTypeError,
      DiagnosticCode.T004_ArityMismatch
    );
  });

  it('实参类型须与形参兼容', () => {
    assertAstError(
      () => Ast.FunctionCall(addPrototype(), [Ast.LiteralString('2')]),
      AstTypeError,
      DiagnosticCode.T002_IncompatibleTypes
    );
  });

  it('经由 FunctionDef 调用同样校验参数', () => {
    const def = Ast.FunctionDef(addPrototype(), Ast.Block());
    assertAstError(() => Ast.FunctionCall(def), AstTypeError, DiagnosticCode.T004_ArityMismatch);
  });

  it('只给出名称与返回类型时不校验参数', () => {
    const call = Ast.FunctionCall({ name: 'print', returnType: Ast.NoneType() }, [Ast.LiteralString('hi')]);
    assert.equal(call.type.kind, 'NoneType');
    assert.equal(call.args.length, 1);
  });
});

describe('lambda、await 与 yield', () => {
  it('LambdaExpr 的类型由参数与函数体推导', () => {
    const x = Ast.Variable('x', Ast.Int32());
    const lambda = Ast.LambdaExpr(
      Ast.Arguments([Ast.Argument('x', Ast.Int32())]),
      Ast.BinaryOp('*', x, Ast.LiteralInt32(2))
    );
    assert.equal(typeLabel(lambda.type), 'FunctionType[(Int32) -> Int32]');
  });

  it('AwaitExpr 沿用被等待值的类型', () => {
    assert.equal(Ast.AwaitExpr(Ast.LiteralFloat64(1.5)).type.kind, 'Float64');
  });

  it('无值的 YieldExpr 类型为 NoneType', () => {
    assert.equal(Ast.YieldExpr().type.kind, 'NoneType');
    assert.equal(Ast.YieldExpr(Ast.LiteralString('v')).type.kind, 'String');
  });
});
