import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { Ast } from '../../src/ast/ast.js';
import { appendNode, nodeAt, nodeCount } from '../../src/ast/containers.js';
import { parentOf } from '../../src/ast/identity.js';
import { INTEGER_KINDS, NUMERIC_KINDS, SCALAR_TYPE_KINDS } from '../../src/ast/guards.js';
import { INTEGER_LITERALS, integerRange } from '../../src/datatypes/literals.js';
import { isCompatible } from '../../src/datatypes/compatibility.js';
import { scalarType, typeEquals, typeLabel } from '../../src/datatypes/data_types.js';
import {
  BINARY_OPERATORS,
  BOOL_OPERATORS,
  COMPARE_OPERATORS,
  UNARY_OPERATORS,
  promoteBinary,
  promoteBool,
  promoteCompare,
  promoteNumericKinds,
  promoteUnary,
} from '../../src/operators/promotion.js';
import { getStruct, isReprList, isReprStruct, isStructurallyEqual } from '../../src/core/struct.js';
import { fromJson, toJson } from '../../src/core/serialization.js';
import { PythonTranspiler } from '../../src/transpilers/python.js';
import { AstError, AstTypeError, DiagnosticCode } from '../../src/diagnostics/diagnostics.js';
import type { DataType, ReprValue } from '../../src/types.js';
import { createCapturingLogger } from '../helpers/test-utils.js';

const integerKind = fc.constantFrom(...INTEGER_KINDS);
const numericKind = fc.constantFrom(...NUMERIC_KINDS);

/** 全部标量类型，外加覆盖拼接规则的列表与元组 */
const OPERAND_TYPES: ReadonlyArray<() => DataType> = [
  ...SCALAR_TYPE_KINDS.map(kind => () => scalarType(kind)),
  () => Ast.ListType(Ast.Int32()),
  () => Ast.TupleType([Ast.String(), Ast.Int8()]),
];
const operandType = fc.constantFrom(...OPERAND_TYPES);

const operand = (name: string, type: DataType) => Ast.Variable(name, type);

/** 构造成功当且仅当提升结果非 null，且节点类型等于该结果；否则抛出 T001 */
function constructionAgrees(expected: DataType | null, build: () => { readonly type: DataType }): boolean {
  try {
    const node = build();
    return expected !== null && typeEquals(node.type, expected);
  } catch (error) {
    return expected === null && error instanceof AstTypeError && error.code === DiagnosticCode.T001_UnsupportedOperands;
  }
}

function collectTags(value: ReprValue, into: string[]): string[] {
  if (isReprList(value)) {
    for (const item of value) collectTags(item, into);
  } else if (isReprStruct(value)) {
    for (const [key, body] of Object.entries(value)) {
      into.push(key);
      if (isReprStruct(body)) for (const slot of Object.values(body)) collectTags(slot, into);
    }
  }
  return into;
}

describe('属性测试', () => {
  it('整数字面量恰好接受其位宽范围内的值', () => {
    fc.assert(
      fc.property(integerKind, fc.bigInt({ min: -(1n << 130n), max: 1n << 130n }), (kind, value) => {
        const { min, max } = integerRange(kind);
        const inRange = value >= min && value <= max;
        try {
          INTEGER_LITERALS[kind](value);
          return inRange;
        } catch (error) {
          return !inRange && error instanceof AstError && error.code === DiagnosticCode.V001_IntegerOutOfRange;
        }
      }),
      { numRuns: 300 }
    );
  });

  it('数值提升与操作数顺序无关，且结果与两侧兼容', () => {
    fc.assert(
      fc.property(numericKind, numericKind, (a, b) => {
        const ab = promoteNumericKinds(a, b);
        if (ab !== promoteNumericKinds(b, a)) return false;
        if (ab === null) return true;
        const result = Ast[ab]();
        return isCompatible(result, Ast[a]()) && isCompatible(result, Ast[b]());
      })
    );
  });

  it('BinaryOp 的构造结果与 promoteBinary 在所有运算符与类型组合上一致', () => {
    const mismatches: string[] = [];
    for (const op of BINARY_OPERATORS) {
      for (const lhsType of OPERAND_TYPES) {
        for (const rhsType of OPERAND_TYPES) {
          const lhs = operand('a', lhsType());
          const rhs = operand('b', rhsType());
          const expected = promoteBinary(op, lhs.type, rhs.type);
          if (!constructionAgrees(expected, () => Ast.BinaryOp(op, lhs, rhs))) {
            mismatches.push(`${typeLabel(lhs.type)} ${op} ${typeLabel(rhs.type)}`);
          }
        }
      }
    }
    assert.deepEqual(mismatches, []);
  });

  it('UnaryOp、CompareOp 与 BoolOp 的构造结果与对应的提升函数一致', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...UNARY_OPERATORS),
        fc.constantFrom(...COMPARE_OPERATORS),
        fc.constantFrom(...BOOL_OPERATORS),
        operandType,
        operandType,
        (unaryOp, compareOp, boolOp, lhsType, rhsType) => {
          const lhs = operand('a', lhsType());
          const rhs = operand('b', rhsType());
          return (
            constructionAgrees(promoteUnary(unaryOp, lhs.type), () => Ast.UnaryOp(unaryOp, lhs)) &&
            constructionAgrees(promoteCompare(compareOp, lhs.type, rhs.type), () => Ast.CompareOp(compareOp, lhs, rhs)) &&
            constructionAgrees(promoteBool(boolOp, lhs.type, rhs.type), () => Ast.BoolOp(boolOp, lhs, rhs))
          );
        }
      ),
      { numRuns: 500 }
    );
  });

  it('JSON 往返保持结构相等', () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 8 }),
        fc.string({ maxLength: 12 }),
        (numbers, text) => {
          const tree = Ast.Block([
            Ast.VariableDeclaration('label', Ast.String(), Ast.LiteralString(text)),
            Ast.LiteralList(numbers.map(n => Ast.LiteralInt32(n))),
          ]);
          return isStructurallyEqual(fromJson(toJson(tree)), tree);
        }
      ),
      { numRuns: 50 }
    );
  });

  it('简化结构中的每个 tag 互不相同', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 3 }), { minLength: 1, maxLength: 10 }), values => {
        const block = Ast.Block(values.map(n => Ast.BinaryOp('+', Ast.LiteralInt32(n), Ast.LiteralInt32(n))));
        const tags = collectTags(getStruct(block, true), []);
        return tags.length === 1 + values.length * 3 && new Set(tags).size === tags.length;
      })
    );
  });

  it('追加节点后按下标取回同一节点并建立父链接', () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 20 }), flags => {
        const block = Ast.Block();
        const nodes = flags.map(flag => (flag ? Ast.BreakStmt() : Ast.ContinueStmt()));
        nodes.forEach((node, i) => assert.equal(appendNode(block, node), i + 1));
        assert.equal(nodeCount(block), nodes.length);
        nodes.forEach((node, i) => {
          assert.strictEqual(nodeAt(block, i), node);
          assert.strictEqual(parentOf(node), block);
        });
      })
    );
  });

  it('字符串字面量转译为等值的带引号文本', () => {
    const transpiler = new PythonTranspiler({ indentWidth: 4, logger: createCapturingLogger().logger });
    fc.assert(
      fc.property(fc.string({ maxLength: 30 }), text => {
        return transpiler.transpile(Ast.LiteralString(text)) === JSON.stringify(text);
      })
    );
  });
});
