import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { parentOf } from '../../../src/ast/identity.js';
import { AstSyntaxError, DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { assertAstError } from '../../helpers/test-utils.js';

const method = (name: string, visibility: 'public' | 'private' = 'public') =>
  Ast.FunctionDef(Ast.FunctionPrototype(name, Ast.Arguments(), Ast.NoneType(), { visibility }), Ast.Block());

describe('ClassDeclStmt / ClassDefStmt', () => {
  it('声明的默认值', () => {
    const decl = Ast.ClassDeclStmt('Shape');
    assert.deepEqual(decl.bases, []);
    assert.equal(decl.visibility, 'public');
    assert.equal(decl.isAbstract, false);
  });

  it('定义持有成员并成为其父节点', () => {
    const field = Ast.VariableDeclaration('sides', Ast.Int32());
    const cls = Ast.ClassDefStmt('Shape', [field, method('area')], { bases: ['Base'], isAbstract: true });
    assert.deepEqual(cls.bases, ['Base']);
    assert.equal(cls.isAbstract, true);
    assert.strictEqual(parentOf(field), cls);
  });

  it('同一可见性下的重名成员被拒绝', () => {
    const error = assertAstError(
      () => Ast.ClassDefStmt('Shape', [method('area'), Ast.VariableDeclaration('area', Ast.Float64())]),
      AstSyntaxError,
      DiagnosticCode.S004_DuplicateMember
    );
    assert.equal(error.message, "ClassDefStmt has a duplicate member 'area'");
  });

  it('不同可见性的同名成员可以共存', () => {
    const cls = Ast.ClassDefStmt('Shape', [method('area'), method('area', 'private')]);
    assert.equal(cls.members.length, 2);
  });
});

describe('StructDefStmt / EnumDeclStmt', () => {
  it('结构体的属性与方法共享同一命名空间', () => {
    assertAstError(
      () => Ast.StructDefStmt('Point', [Ast.VariableDeclaration('norm', Ast.Float64())], [method('norm')]),
      AstSyntaxError,
      DiagnosticCode.S004_DuplicateMember
    );
    const point = Ast.StructDefStmt('Point', [
      Ast.VariableDeclaration('x', Ast.Float64()),
      Ast.VariableDeclaration('y', Ast.Float64()),
    ]);
    assert.deepEqual(point.methods, []);
    assert.equal(Ast.StructDeclStmt('Point', { visibility: 'private' }).visibility, 'private');
  });

  it('枚举成员名须唯一', () => {
    const red = () => Ast.VariableDeclaration('RED', Ast.Int32(), Ast.LiteralInt32(1), { mutability: 'constant' });
    assertAstError(() => Ast.EnumDeclStmt('Color', [red(), red()]), AstSyntaxError, DiagnosticCode.S004_DuplicateMember);
    assert.equal(Ast.EnumDeclStmt('Color', [red()]).members.length, 1);
  });
});
