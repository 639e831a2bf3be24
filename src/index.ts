/**
 * @module polyast
 *
 * 与具体语言无关的抽象语法树模型。
 *
 * **组成**：
 * ```
 * 工厂函数（Ast.*）→ 带类型的节点树 → getStruct / toJson / toYaml → fromJson / fromYaml
 *                                   ↘ AstVisitor 子类（如 PythonTranspiler）→ 目标语言源码
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { Ast, PythonTranspiler, nodeToString } from 'polyast';
 *
 * const loop = Ast.ForRangeLoopStmt(
 *   Ast.Variable('i', Ast.Int32()),
 *   Ast.LiteralInt32(0),
 *   Ast.LiteralInt32(10),
 *   Ast.LiteralInt32(1),
 *   Ast.Block()
 * );
 * nodeToString(loop);                        // 'ForRangeLoopStmt'
 * new PythonTranspiler().transpile(loop);    // 'for i in range(0, 10, 1):\n    pass'
 * ```
 */

// 节点类型
export type * from './types.js';

// 工厂
export { Ast } from './ast/ast.js';
export type { AstFactories } from './ast/ast.js';
export { DataTypes, scalarType, typeEquals, cloneDataType, typeLabel, bitWidth } from './datatypes/data_types.js';
export type { TypeOptions, CollectionTypeOptions } from './datatypes/data_types.js';
export { Literals, integerRange, literalEquals } from './datatypes/literals.js';
export { isCompatible } from './datatypes/compatibility.js';
export { isValidTemporal, temporalFormat } from './datatypes/temporal.js';
export { Operators } from './operators/operators.js';
export { Expressions } from './operators/expressions.js';
export type { SubscriptParts } from './operators/expressions.js';
export {
  BINARY_OPERATORS,
  COMPARE_OPERATORS,
  BOOL_OPERATORS,
  UNARY_OPERATORS,
  AUG_ASSIGN_OPERATORS,
  promoteNumericKinds,
  promoteBinary,
  promoteUnary,
  promoteCompare,
  promoteBool,
} from './operators/promotion.js';
export { ControlFlow, DEFAULT_BLOCK_NAME } from './flows/control_flow.js';
export { Comprehensions } from './flows/comprehensions.js';
export { Variables } from './declarations/variables.js';
export type { DeclarationOptions, VariableOptions } from './declarations/variables.js';
export { Callables } from './declarations/callables.js';
export type { CallTarget } from './declarations/callables.js';
export { Classes } from './declarations/classes.js';
export type { ClassOptions, TypeDeclOptions } from './declarations/classes.js';
export { Packages } from './declarations/packages.js';

// 身份、父链接与容器
export { parentOf } from './ast/identity.js';
export { appendNode, insertNode, nodeAt, nodeCount, appendArgument, insertArgument } from './ast/containers.js';
export * from './ast/guards.js';

// 符号表
export { SymbolTable, Scope, declarationName } from './symbols/symbol_table.js';
export type { Declaration, DefineOptions, ShadowEvent, SymbolTableOptions } from './symbols/symbol_table.js';

// 结构化表示与序列化
export { getStruct, nodeToString, isStructurallyEqual } from './core/struct.js';
export { structToGraph } from './core/struct_graph.js';
export type { StructGraph, GraphVertex, GraphEdge } from './core/struct_graph.js';
export { toJson, toYaml, fromJson, fromYaml, fromStruct } from './core/serialization.js';

// 访问器与转译
export { AstVisitor } from './core/visitor.js';
export { PythonTranspiler } from './transpilers/python.js';
export type { PythonTranspilerOptions } from './transpilers/python.js';

// 诊断、日志与配置
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticBuilder,
  AstError,
  AstValueError,
  AstTypeError,
  AstSyntaxError,
  AstKeyError,
  AstIndexError,
  AstNotImplementedError,
} from './diagnostics/diagnostics.js';
export type { Diagnostic, ErrorKind, ErrorContext } from './diagnostics/diagnostics.js';
export { Logger, LogLevel, createLogger } from './utils/logger.js';
export type { LogMetadata, LogSink } from './utils/logger.js';
export { ConfigService } from './config/config-service.js';
