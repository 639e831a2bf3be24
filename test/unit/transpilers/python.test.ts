import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { Ast } from '../../../src/ast/ast.js';
import { PythonTranspiler } from '../../../src/transpilers/python.js';
import { ConfigService } from '../../../src/config/config-service.js';
import {
  AstNotImplementedError,
  AstValueError,
  DiagnosticCode,
} from '../../../src/diagnostics/diagnostics.js';
import type { AstNode, Expression } from '../../../src/types.js';
import { assertAstError, createCapturingLogger } from '../../helpers/test-utils.js';

function transpile(node: AstNode): string {
  return new PythonTranspiler({ indentWidth: 4, logger: createCapturingLogger().logger }).transpile(node);
}

const v = (name: string) => Ast.Variable(name, Ast.Int32());
const flag = (name: string) => Ast.Variable(name, Ast.Boolean());
const call = (name: string, args: Expression[] = []) => Ast.FunctionCall({ name, returnType: Ast.NoneType() }, args);

describe('PythonTranspiler 循环', () => {
  afterEach(() => {
    delete process.env.POLYAST_INDENT_WIDTH;
    ConfigService.resetForTesting();
  });

  it('区间循环渲染为 range', () => {
    const loop = Ast.ForRangeLoopStmt(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(10), Ast.LiteralInt32(1), Ast.Block());
    assert.equal(transpile(loop), 'for i in range(0, 10, 1):\n    pass');
  });

  it('缩进宽度默认取自配置', () => {
    process.env.POLYAST_INDENT_WIDTH = '2';
    ConfigService.resetForTesting();
    const loop = Ast.ForRangeLoopStmt(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(3), Ast.LiteralInt32(1), Ast.Block());
    const transpiler = new PythonTranspiler({ logger: createCapturingLogger().logger });
    assert.equal(transpiler.transpile(loop), 'for i in range(0, 3, 1):\n  pass');
  });

  it('步长为 0 的区间表达式在构造时即被拒绝', () => {
    assertAstError(
      () => Ast.ForRangeLoopExpr(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(5), Ast.LiteralInt32(0), Ast.Block()),
      AstValueError,
      DiagnosticCode.V006_ZeroStep
    );
  });

  it('区间表达式渲染为列表推导', () => {
    const body = Ast.Block([Ast.BinaryOp('*', v('i'), v('i'))]);
    const expr = Ast.ForRangeLoopExpr(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(5), Ast.LiteralInt32(1), body);
    assert.equal(transpile(expr), '[(i * i) for i in range(0, 5, 1)]');
  });

  it('多语句的区间表达式没有对应形式', () => {
    const body = Ast.Block([v('a'), v('b')]);
    const expr = Ast.ForRangeLoopExpr(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(5), Ast.LiteralInt32(1), body);
    assertAstError(() => transpile(expr), AstNotImplementedError, DiagnosticCode.N001_UnhandledVariant);
  });

  it('计数循环展开为 while，更新放在循环体末尾', () => {
    const loop = Ast.ForCountLoopStmt(
      Ast.VariableDeclaration('k', Ast.Int32(), Ast.LiteralInt32(0)),
      Ast.CompareOp('<', v('k'), Ast.LiteralInt32(3)),
      Ast.AugAssign('+=', v('k'), Ast.LiteralInt32(1)),
      Ast.Block([call('print', [v('k')])])
    );
    assert.equal(transpile(loop), 'k: int = 0\nwhile (k < 3):\n    print(k)\n    k += 1');
  });

  it('计数循环中的 continue 之前先执行更新', () => {
    const loop = Ast.ForCountLoopStmt(
      Ast.VariableDeclaration('k', Ast.Int32(), Ast.LiteralInt32(0)),
      Ast.CompareOp('<', v('k'), Ast.LiteralInt32(3)),
      Ast.AugAssign('+=', v('k'), Ast.LiteralInt32(1)),
      Ast.Block([
        Ast.IfStmt(Ast.CompareOp('==', v('k'), Ast.LiteralInt32(1)), Ast.Block([Ast.ContinueStmt()])),
        call('print', [v('k')]),
      ])
    );
    assert.equal(
      transpile(loop),
      'k: int = 0\nwhile (k < 3):\n    if (k == 1):\n        k += 1\n        continue\n    print(k)\n    k += 1'
    );
  });

  it('内层循环的 continue 不附带外层计数循环的更新', () => {
    const loop = Ast.ForCountLoopStmt(
      Ast.VariableDeclaration('k', Ast.Int32(), Ast.LiteralInt32(0)),
      Ast.CompareOp('<', v('k'), Ast.LiteralInt32(3)),
      Ast.AugAssign('+=', v('k'), Ast.LiteralInt32(1)),
      Ast.Block([Ast.WhileStmt(flag('busy'), Ast.Block([Ast.ContinueStmt()]))])
    );
    assert.equal(transpile(loop), 'k: int = 0\nwhile (k < 3):\n    while busy:\n        continue\n    k += 1');
  });

  it('非整数边界的区间循环没有 range 形式', () => {
    const loop = Ast.ForRangeLoopStmt(v('i'), Ast.LiteralFloat64(0.5), Ast.LiteralInt32(3), Ast.LiteralInt32(1), Ast.Block());
    const error = assertAstError(() => transpile(loop), AstNotImplementedError, DiagnosticCode.N001_UnhandledVariant);
    assert.equal(error.message, 'ForRangeLoopStmt bound of type Float64 has no Python range() form');

    const expr = Ast.ForRangeLoopExpr(v('i'), Ast.LiteralInt32(0), Ast.LiteralInt32(3), Ast.LiteralFloat32(0.5), Ast.Block());
    assertAstError(() => transpile(expr), AstNotImplementedError, DiagnosticCode.N001_UnhandledVariant);
  });

  it('do-while 渲染为带退出判断的 while True', () => {
    const loop = Ast.DoWhileStmt(
      Ast.Block([Ast.AugAssign('-=', v('n'), Ast.LiteralInt32(1))]),
      Ast.CompareOp('>', v('n'), Ast.LiteralInt32(0))
    );
    assert.equal(transpile(loop), 'while True:\n    n -= 1\n    if not (n > 0):\n        break');
  });
});

describe('PythonTranspiler 语句', () => {
  it('函数定义与嵌套缩进', () => {
    const proto = Ast.FunctionPrototype(
      'add',
      Ast.Arguments([Ast.Argument('a', Ast.Int32()), Ast.Argument('b', Ast.Int32(), Ast.LiteralInt32(1))]),
      Ast.Int64()
    );
    const body = Ast.Block([
      Ast.IfStmt(
        Ast.CompareOp('>', v('a'), Ast.LiteralInt32(0)),
        Ast.Block([Ast.FunctionReturn(Ast.BinaryOp('+', v('a'), v('b')))]),
        Ast.Block([Ast.FunctionReturn(Ast.LiteralInt32(0))])
      ),
    ]);
    assert.equal(
      transpile(Ast.FunctionDef(proto, body)),
      'def add(a: int, b: int = 1) -> int:\n    if (a > 0):\n        return (a + b)\n    else:\n        return 0'
    );
  });

  it('else 中唯一的 if 折叠为 elif', () => {
    const stmt = Ast.IfStmt(
      flag('x'),
      Ast.Block(),
      Ast.Block([Ast.IfStmt(flag('y'), Ast.Block(), Ast.Block([Ast.BreakStmt()]))])
    );
    assert.equal(transpile(stmt), 'if x:\n    pass\nelif y:\n    pass\nelse:\n    break');
  });

  it('switch 渲染为 match', () => {
    const stmt = Ast.SwitchStmt(v('code'), [
      Ast.CaseStmt(Ast.LiteralInt32(1), Ast.Block([Ast.BreakStmt()])),
      Ast.CaseStmt(null, Ast.Block(), true),
    ]);
    assert.equal(transpile(stmt), 'match code:\n    case 1:\n        pass\n    case _:\n        pass');
    assert.equal(transpile(Ast.SwitchStmt(v('code'), [])), 'match code:\n    case _:\n        pass');
  });

  it('非字面量的 case 条件渲染为守卫', () => {
    const stmt = Ast.SwitchStmt(v('code'), [
      Ast.CaseStmt(v('expected'), Ast.Block([call('hit'), Ast.BreakStmt()])),
      Ast.CaseStmt(Ast.BinaryOp('+', v('base'), Ast.LiteralInt32(1)), Ast.Block()),
    ]);
    assert.equal(
      transpile(stmt),
      'match code:\n    case _ if code == expected:\n        hit()\n    case _ if code == (base + 1):\n        pass'
    );
  });

  it('脱离 switch 的 case 只能使用字面量条件', () => {
    assert.equal(transpile(Ast.CaseStmt(Ast.LiteralString('ok'), Ast.Block())), 'case "ok":\n    pass');
    assertAstError(
      () => transpile(Ast.CaseStmt(v('expected'), Ast.Block())),
      AstNotImplementedError,
      DiagnosticCode.N001_UnhandledVariant
    );
  });

  it('异常处理渲染为 try/except/finally', () => {
    const stmt = Ast.ExceptionHandlerStmt(
      Ast.Block([Ast.ThrowStmt(call('ValueError'))]),
      [Ast.CatchHandlerStmt(['ValueError', 'KeyError'], 'err', Ast.Block())],
      Ast.FinallyHandlerStmt(Ast.Block([call('cleanup')]))
    );
    assert.equal(
      transpile(stmt),
      'try:\n    raise ValueError()\nexcept (ValueError, KeyError) as err:\n    pass\nfinally:\n    cleanup()'
    );
  });

  it('with 语句与 async 函数', () => {
    const file = Ast.FunctionCall({ name: 'open', returnType: Ast.ClassType('File') });
    assert.equal(transpile(Ast.WithStmt([Ast.WithItem(file, 'f')], Ast.Block())), 'with open() as f:\n    pass');

    const fetch = Ast.FunctionAsyncDef(
      Ast.FunctionPrototype('fetch', Ast.Arguments(), Ast.String()),
      Ast.Block([Ast.FunctionReturn(Ast.AwaitExpr(Ast.FunctionCall({ name: 'get', returnType: Ast.String() })))])
    );
    assert.equal(transpile(fetch), 'async def fetch() -> str:\n    return (await get())');
  });

  it('用到的标准库名字排序后放在顶部', () => {
    const module = Ast.Module('shapes', [
      Ast.VariableDeclaration('LIMIT', Ast.Int32(), Ast.LiteralInt32(10), { mutability: 'constant' }),
      Ast.StructDefStmt('Point', [
        Ast.VariableDeclaration('x', Ast.Float64()),
        Ast.VariableDeclaration('y', Ast.Float64()),
      ]),
      Ast.EnumDeclStmt('Color', [
        Ast.VariableDeclaration('RED', Ast.Int32(), Ast.LiteralInt32(1), { mutability: 'constant' }),
        Ast.VariableDeclaration('GREEN', Ast.Int32()),
      ]),
    ]);
    assert.equal(
      transpile(module),
      [
        'from dataclasses import dataclass',
        'from enum import Enum',
        'from enum import auto',
        'from typing import Final',
        '',
        'LIMIT: Final[int] = 10',
        '@dataclass',
        'class Point:',
        '    x: float',
        '    y: float',
        'class Color(Enum):',
        '    RED = 1',
        '    GREEN = auto()',
      ].join('\n')
    );
  });

  it('抽象类继承 ABC', () => {
    const cls = Ast.ClassDefStmt('Shape', [], { bases: ['Base'], isAbstract: true });
    assert.equal(transpile(cls), 'from abc import ABC\n\nclass Shape(Base, ABC):\n    pass');
  });

  it('Program 按段输出注释头与模块', () => {
    const program = Ast.Program('demo', Ast.Target('', 'x86_64'), [
      Ast.Package('app', [Ast.Module('main', [Ast.ImportStmt([Ast.AliasExpr('os')])])]),
    ]);
    assert.equal(
      transpile(program),
      '# program demo\n\n# target triple=x86_64 datalayout=\n\n# module app.main\nimport os'
    );
  });
});

describe('PythonTranspiler 表达式', () => {
  it('字面量', () => {
    assert.equal(transpile(Ast.LiteralFloat64(2)), '2.0');
    assert.equal(transpile(Ast.LiteralComplex64(1.5, -2)), 'complex(1.5, -2.0)');
    assert.equal(transpile(Ast.LiteralTuple([Ast.LiteralInt32(1)])), '(1,)');
    assert.equal(transpile(Ast.LiteralSet([])), 'set()');
    assert.equal(transpile(Ast.LiteralMap([[Ast.LiteralString('a'), Ast.LiteralBoolean(false)]])), '{"a": False}');
    assert.equal(
      transpile(Ast.LiteralDate('2024-01-31')),
      'import datetime\n\ndatetime.date.fromisoformat("2024-01-31")'
    );
  });

  it('布尔运算符', () => {
    assert.equal(transpile(Ast.BoolOp('xor', flag('a'), flag('b'))), '(bool(a) != bool(b))');
    assert.equal(transpile(Ast.BoolOp('nand', flag('a'), flag('b'))), '(not (a and b))');
    assert.equal(transpile(Ast.UnaryOp('not', flag('a'))), '(not a)');
  });

  it('推导式', () => {
    const xs = Ast.Variable('xs', Ast.ListType(Ast.Int32()));
    const clause = () =>
      Ast.ComprehensionClause(v('x'), xs, [Ast.CompareOp('>', v('x'), Ast.LiteralInt32(0))]);
    assert.equal(
      transpile(Ast.ListComprehension(Ast.BinaryOp('*', v('x'), Ast.LiteralInt32(2)), [clause()])),
      '[(x * 2) for x in xs if (x > 0)]'
    );
    assert.equal(
      transpile(Ast.DictComprehension(v('x'), Ast.LiteralString('v'), [clause()])),
      '{x: "v" for x in xs if (x > 0)}'
    );
  });

  it('lambda、类型转换与切片', () => {
    const lambda = Ast.LambdaExpr(
      Ast.Arguments([Ast.Argument('x', Ast.Int32())]),
      Ast.BinaryOp('+', v('x'), Ast.LiteralInt32(1))
    );
    assert.equal(transpile(lambda), '(lambda x: (x + 1))');
    assert.equal(
      transpile(Ast.TypeCastExpr(Ast.LiteralInt32(3), Ast.Float64())),
      'from typing import cast\n\ncast(float, 3)'
    );
    const xs = Ast.Variable('xs', Ast.ListType(Ast.Int32()));
    assert.equal(
      transpile(Ast.SubscriptExpr(xs, { lower: Ast.LiteralInt32(1), upper: Ast.LiteralInt32(3) })),
      'xs[1:3]'
    );
  });

  it('类型节点不能单独渲染', () => {
    const error = assertAstError(() => transpile(Ast.Int32()), AstNotImplementedError, DiagnosticCode.N001_UnhandledVariant);
    assert.equal(error.message, 'PythonTranspiler does not implement visitInt32');
  });

  it('转译前记录一条调试日志', () => {
    const { logger, entries } = createCapturingLogger('transpiler.python');
    const node = Ast.BreakStmt();
    new PythonTranspiler({ indentWidth: 4, logger }).transpile(node);
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.message, 'Transpiling node tree to Python');
    assert.equal(entries[0]?.kind, 'BreakStmt');
    assert.equal(entries[0]?.id, node.id);
  });
});
