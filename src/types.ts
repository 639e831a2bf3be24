// AST node type definitions

/**
 * @module types
 *
 * 语言无关 AST 的全部节点类型定义。
 *
 * **组织方式**：
 * - 每个节点都是只读的纯数据对象，通过 `kind` 字面量区分（tagged union）
 * - 按类别划分闭合联合：`DataType`、`Literal`、`Expression`、`Statement`，最终汇总为 `AstNode`
 * - 同族节点（如定宽整数）使用泛型接口 + 映射类型展开，保证 `switch (node.kind)` 可逐一收窄
 * - 唯一可变的容器是 `Block`、`Module`、`Arguments` 的 `nodes` 数组
 */

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export interface BaseNode {
  readonly kind: string;
  /** 构造时分配、终生不变的身份标识 */
  readonly id: number;
  readonly span?: Span;
}

export interface NodeOptions {
  readonly span?: Span;
  /** 构造完成后追加到该容器末尾 */
  readonly parent?: Block | Module;
}

// ---------------------------------------------------------------------------
// Modifiers
// ---------------------------------------------------------------------------

export type VisibilityKind = 'public' | 'private' | 'protected';
export type ScopeKind = 'global' | 'local';
export type MutabilityKind = 'constant' | 'mutable';

// ---------------------------------------------------------------------------
// Data types
// ---------------------------------------------------------------------------

export type SignedIntegerKind = 'Int8' | 'Int16' | 'Int32' | 'Int64' | 'Int128';
export type UnsignedIntegerKind = 'UInt8' | 'UInt16' | 'UInt32' | 'UInt64' | 'UInt128';
export type IntegerKind = SignedIntegerKind | UnsignedIntegerKind;
export type FloatKind = 'Float16' | 'Float32' | 'Float64';
export type ComplexKind = 'Complex32' | 'Complex64';
export type NumericKind = IntegerKind | FloatKind | ComplexKind;
export type TextKind = 'UTF8Char' | 'String' | 'UTF8String';
export type TemporalKind = 'Date' | 'Time' | 'DateTime' | 'Timestamp';
export type ScalarTypeKind = NumericKind | 'Boolean' | TextKind | TemporalKind | 'NoneType' | 'UndefinedType';

export interface ScalarTypeNode<K extends ScalarTypeKind> extends BaseNode {
  readonly kind: K;
}

export type ScalarType = { [K in ScalarTypeKind]: ScalarTypeNode<K> }[ScalarTypeKind];

export interface ListType extends BaseNode {
  readonly kind: 'ListType';
  readonly elementTypes: readonly DataType[];
  readonly heterogeneous: boolean;
}

export interface SetType extends BaseNode {
  readonly kind: 'SetType';
  readonly elementTypes: readonly DataType[];
  readonly heterogeneous: boolean;
}

export interface MapType extends BaseNode {
  readonly kind: 'MapType';
  readonly keyType: DataType;
  readonly valueType: DataType;
}

export interface TupleType extends BaseNode {
  readonly kind: 'TupleType';
  readonly elementTypes: readonly DataType[];
}

export interface StructType extends BaseNode {
  readonly kind: 'StructType';
  readonly name: string;
}

export interface ClassType extends BaseNode {
  readonly kind: 'ClassType';
  readonly name: string;
}

export interface EnumType extends BaseNode {
  readonly kind: 'EnumType';
  readonly name: string;
}

export interface FunctionType extends BaseNode {
  readonly kind: 'FunctionType';
  readonly paramTypes: readonly DataType[];
  readonly returnType: DataType;
}

export type CollectionType = ListType | SetType | MapType | TupleType;

export type DataType =
  | ScalarType
  | CollectionType
  | StructType
  | ClassType
  | EnumType
  | FunctionType;

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

export interface IntegerLiteralNode<K extends IntegerKind> extends BaseNode {
  readonly kind: `Literal${K}`;
  readonly value: bigint;
  readonly type: ScalarTypeNode<K>;
}

export interface FloatLiteralNode<K extends FloatKind> extends BaseNode {
  readonly kind: `Literal${K}`;
  readonly value: number;
  readonly type: ScalarTypeNode<K>;
}

export interface ComplexLiteralNode<K extends ComplexKind> extends BaseNode {
  readonly kind: `Literal${K}`;
  readonly real: number;
  readonly imag: number;
  readonly type: ScalarTypeNode<K>;
}

export interface TextLiteralNode<K extends TextKind> extends BaseNode {
  readonly kind: `Literal${K}`;
  readonly value: string;
  readonly type: ScalarTypeNode<K>;
}

export interface TemporalLiteralNode<K extends TemporalKind> extends BaseNode {
  readonly kind: `Literal${K}`;
  readonly value: string;
  readonly type: ScalarTypeNode<K>;
}

export type IntegerLiteral = { [K in IntegerKind]: IntegerLiteralNode<K> }[IntegerKind];
export type FloatLiteral = { [K in FloatKind]: FloatLiteralNode<K> }[FloatKind];
export type ComplexLiteral = { [K in ComplexKind]: ComplexLiteralNode<K> }[ComplexKind];
export type TextLiteral = { [K in TextKind]: TextLiteralNode<K> }[TextKind];
export type TemporalLiteral = { [K in TemporalKind]: TemporalLiteralNode<K> }[TemporalKind];

export interface LiteralBoolean extends BaseNode {
  readonly kind: 'LiteralBoolean';
  readonly value: boolean;
  readonly type: ScalarTypeNode<'Boolean'>;
}

export interface LiteralNone extends BaseNode {
  readonly kind: 'LiteralNone';
  readonly type: ScalarTypeNode<'NoneType'>;
}

export interface LiteralList extends BaseNode {
  readonly kind: 'LiteralList';
  readonly elements: readonly Literal[];
  readonly type: ListType;
}

export interface LiteralTuple extends BaseNode {
  readonly kind: 'LiteralTuple';
  readonly elements: readonly Literal[];
  readonly type: TupleType;
}

export interface LiteralSet extends BaseNode {
  readonly kind: 'LiteralSet';
  readonly elements: readonly Literal[];
  readonly type: SetType;
}

export interface LiteralMap extends BaseNode {
  readonly kind: 'LiteralMap';
  readonly keys: readonly Literal[];
  readonly values: readonly Literal[];
  readonly type: MapType;
}

export type ScalarLiteral =
  | IntegerLiteral
  | FloatLiteral
  | ComplexLiteral
  | TextLiteral
  | TemporalLiteral
  | LiteralBoolean
  | LiteralNone;

export type Literal = ScalarLiteral | LiteralList | LiteralTuple | LiteralSet | LiteralMap;

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type BitwiseOperator = '&' | '|' | '^' | '<<' | '>>';
export type BinaryOperator = ArithmeticOperator | BitwiseOperator;
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type BoolOperator = 'and' | 'or' | 'xor' | 'nand' | 'nor' | 'xnor';
export type UnaryOperator = '+' | '-' | '~' | 'not';
export type AugAssignOperator = `${BinaryOperator}=`;

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export interface Variable extends BaseNode {
  readonly kind: 'Variable';
  readonly name: string;
  readonly type: DataType;
}

export interface UnaryOp extends BaseNode {
  readonly kind: 'UnaryOp';
  readonly op: UnaryOperator;
  readonly operand: Expression;
  readonly type: DataType;
}

export interface BinaryOp extends BaseNode {
  readonly kind: 'BinaryOp';
  readonly op: BinaryOperator;
  readonly lhs: Expression;
  readonly rhs: Expression;
  readonly type: DataType;
}

export interface CompareOp extends BaseNode {
  readonly kind: 'CompareOp';
  readonly op: CompareOperator;
  readonly lhs: Expression;
  readonly rhs: Expression;
  readonly type: ScalarTypeNode<'Boolean'>;
}

export interface BoolOp extends BaseNode {
  readonly kind: 'BoolOp';
  readonly op: BoolOperator;
  readonly lhs: Expression;
  readonly rhs: Expression;
  readonly type: ScalarTypeNode<'Boolean'>;
}

export interface AugAssign extends BaseNode {
  readonly kind: 'AugAssign';
  readonly op: AugAssignOperator;
  readonly target: Variable;
  readonly value: Expression;
  readonly type: DataType;
}

export interface WalrusOp extends BaseNode {
  readonly kind: 'WalrusOp';
  readonly target: Variable;
  readonly value: Expression;
  readonly type: DataType;
}

export interface Starred extends BaseNode {
  readonly kind: 'Starred';
  readonly value: Expression;
  readonly type: DataType;
}

export interface TypeCastExpr extends BaseNode {
  readonly kind: 'TypeCastExpr';
  readonly value: Expression;
  /** 目标类型 */
  readonly type: DataType;
}

export interface ParenthesizedExpr extends BaseNode {
  readonly kind: 'ParenthesizedExpr';
  readonly value: Expression;
  readonly type: DataType;
}

export interface SubscriptExpr extends BaseNode {
  readonly kind: 'SubscriptExpr';
  readonly value: Expression;
  readonly index: Expression | null;
  readonly lower: Expression | null;
  readonly upper: Expression | null;
  readonly step: Expression | null;
  readonly type: DataType;
}

export interface FunctionCall extends BaseNode {
  readonly kind: 'FunctionCall';
  readonly callee: string;
  readonly args: readonly Expression[];
  readonly type: DataType;
}

export interface LambdaExpr extends BaseNode {
  readonly kind: 'LambdaExpr';
  readonly params: Arguments;
  readonly body: Expression;
  readonly type: FunctionType;
}

export interface AwaitExpr extends BaseNode {
  readonly kind: 'AwaitExpr';
  readonly value: Expression;
  readonly type: DataType;
}

export interface YieldExpr extends BaseNode {
  readonly kind: 'YieldExpr';
  readonly value: Expression | null;
  readonly type: DataType;
}

export interface IfExpr extends BaseNode {
  readonly kind: 'IfExpr';
  readonly condition: Expression;
  readonly thenExpr: Expression;
  readonly elseExpr: Expression;
  readonly type: DataType;
}

export interface ForRangeLoopExpr extends BaseNode {
  readonly kind: 'ForRangeLoopExpr';
  readonly variable: Variable;
  readonly start: Expression;
  readonly end: Expression;
  readonly step: Expression;
  readonly body: Block;
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export interface ForCountLoopExpr extends BaseNode {
  readonly kind: 'ForCountLoopExpr';
  readonly initializer: VariableDeclaration;
  readonly condition: Expression;
  readonly update: Expression;
  readonly body: Block;
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export interface WhileExpr extends BaseNode {
  readonly kind: 'WhileExpr';
  readonly condition: Expression;
  readonly body: Block;
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export interface ComprehensionClause extends BaseNode {
  readonly kind: 'ComprehensionClause';
  readonly target: Variable;
  readonly iterable: Expression;
  /** 过滤条件按顺序取与 */
  readonly conditions: readonly Expression[];
  readonly isAsync: boolean;
}

export interface ListComprehension extends BaseNode {
  readonly kind: 'ListComprehension';
  readonly element: Expression;
  readonly clauses: readonly ComprehensionClause[];
  readonly type: ListType;
}

export interface SetComprehension extends BaseNode {
  readonly kind: 'SetComprehension';
  readonly element: Expression;
  readonly clauses: readonly ComprehensionClause[];
  readonly type: SetType;
}

export interface DictComprehension extends BaseNode {
  readonly kind: 'DictComprehension';
  readonly key: Expression;
  readonly value: Expression;
  readonly clauses: readonly ComprehensionClause[];
  readonly type: MapType;
}

export interface GeneratorExpr extends BaseNode {
  readonly kind: 'GeneratorExpr';
  readonly element: Expression;
  readonly clauses: readonly ComprehensionClause[];
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export interface AliasExpr extends BaseNode {
  readonly kind: 'AliasExpr';
  readonly name: string;
  readonly asname: string | null;
}

export interface ImportExpr extends BaseNode {
  readonly kind: 'ImportExpr';
  readonly names: readonly AliasExpr[];
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export interface ImportFromExpr extends BaseNode {
  readonly kind: 'ImportFromExpr';
  readonly module: string | null;
  readonly names: readonly AliasExpr[];
  readonly level: number;
  readonly type: ScalarTypeNode<'UndefinedType'>;
}

export type Expression =
  | Literal
  | Variable
  | UnaryOp
  | BinaryOp
  | CompareOp
  | BoolOp
  | AugAssign
  | WalrusOp
  | Starred
  | TypeCastExpr
  | ParenthesizedExpr
  | SubscriptExpr
  | FunctionCall
  | LambdaExpr
  | AwaitExpr
  | YieldExpr
  | IfExpr
  | ForRangeLoopExpr
  | ForCountLoopExpr
  | WhileExpr
  | ListComprehension
  | SetComprehension
  | DictComprehension
  | GeneratorExpr
  | ImportExpr
  | ImportFromExpr;

// ---------------------------------------------------------------------------
// Statements and declarations
// ---------------------------------------------------------------------------

export interface Block extends BaseNode {
  readonly kind: 'Block';
  readonly name: string;
  readonly nodes: AstNode[];
}

export interface VariableDeclaration extends BaseNode {
  readonly kind: 'VariableDeclaration';
  readonly name: string;
  readonly type: DataType;
  readonly value: Expression | null;
  readonly mutability: MutabilityKind;
  readonly visibility: VisibilityKind;
  readonly scope: ScopeKind;
}

export interface VariableAssignment extends BaseNode {
  readonly kind: 'VariableAssignment';
  readonly target: Variable;
  readonly value: Expression;
}

export interface DeleteStmt extends BaseNode {
  readonly kind: 'DeleteStmt';
  readonly targets: readonly Variable[];
}

export interface IfStmt extends BaseNode {
  readonly kind: 'IfStmt';
  readonly condition: Expression;
  readonly thenBlock: Block;
  readonly elseBlock: Block | null;
}

export interface ForRangeLoopStmt extends BaseNode {
  readonly kind: 'ForRangeLoopStmt';
  readonly variable: Variable;
  readonly start: Expression;
  readonly end: Expression;
  readonly step: Expression;
  readonly body: Block;
}

export interface ForCountLoopStmt extends BaseNode {
  readonly kind: 'ForCountLoopStmt';
  readonly initializer: VariableDeclaration;
  readonly condition: Expression;
  readonly update: Expression;
  readonly body: Block;
}

export interface WhileStmt extends BaseNode {
  readonly kind: 'WhileStmt';
  readonly condition: Expression;
  readonly body: Block;
}

export interface DoWhileStmt extends BaseNode {
  readonly kind: 'DoWhileStmt';
  readonly body: Block;
  readonly condition: Expression;
}

export interface BreakStmt extends BaseNode {
  readonly kind: 'BreakStmt';
}

export interface ContinueStmt extends BaseNode {
  readonly kind: 'ContinueStmt';
}

export interface CaseStmt extends BaseNode {
  readonly kind: 'CaseStmt';
  readonly condition: Expression | null;
  readonly body: Block;
  readonly isDefault: boolean;
}

export interface SwitchStmt extends BaseNode {
  readonly kind: 'SwitchStmt';
  readonly value: Expression;
  readonly cases: readonly CaseStmt[];
}

export interface ThrowStmt extends BaseNode {
  readonly kind: 'ThrowStmt';
  readonly exception: Expression | null;
}

export interface CatchHandlerStmt extends BaseNode {
  readonly kind: 'CatchHandlerStmt';
  readonly types: readonly string[];
  readonly name: string | null;
  readonly body: Block;
}

export interface FinallyHandlerStmt extends BaseNode {
  readonly kind: 'FinallyHandlerStmt';
  readonly body: Block;
}

export interface ExceptionHandlerStmt extends BaseNode {
  readonly kind: 'ExceptionHandlerStmt';
  readonly body: Block;
  readonly handlers: readonly CatchHandlerStmt[];
  readonly finallyHandler: FinallyHandlerStmt | null;
}

export interface WithItem extends BaseNode {
  readonly kind: 'WithItem';
  readonly contextExpr: Expression;
  readonly instanceName: string | null;
}

export interface WithStmt extends BaseNode {
  readonly kind: 'WithStmt';
  readonly items: readonly WithItem[];
  readonly body: Block;
}

export interface Argument extends BaseNode {
  readonly kind: 'Argument';
  readonly name: string;
  readonly type: DataType;
  readonly defaultValue: Expression | null;
}

export interface Arguments extends BaseNode {
  readonly kind: 'Arguments';
  readonly nodes: Argument[];
}

export interface FunctionPrototype extends BaseNode {
  readonly kind: 'FunctionPrototype';
  readonly name: string;
  readonly args: Arguments;
  readonly returnType: DataType;
  readonly scope: ScopeKind;
  readonly visibility: VisibilityKind;
}

export interface FunctionDef extends BaseNode {
  readonly kind: 'FunctionDef';
  readonly prototype: FunctionPrototype;
  readonly body: Block;
}

export interface FunctionAsyncDef extends BaseNode {
  readonly kind: 'FunctionAsyncDef';
  readonly prototype: FunctionPrototype;
  readonly body: Block;
}

export interface FunctionReturn extends BaseNode {
  readonly kind: 'FunctionReturn';
  readonly value: Expression | null;
}

export type ClassMember = VariableDeclaration | FunctionDef | FunctionAsyncDef;

export interface ClassDeclStmt extends BaseNode {
  readonly kind: 'ClassDeclStmt';
  readonly name: string;
  readonly bases: readonly string[];
  readonly visibility: VisibilityKind;
  readonly isAbstract: boolean;
}

export interface ClassDefStmt extends BaseNode {
  readonly kind: 'ClassDefStmt';
  readonly name: string;
  readonly bases: readonly string[];
  readonly visibility: VisibilityKind;
  readonly isAbstract: boolean;
  readonly members: readonly ClassMember[];
}

export interface StructDeclStmt extends BaseNode {
  readonly kind: 'StructDeclStmt';
  readonly name: string;
  readonly visibility: VisibilityKind;
}

export interface StructDefStmt extends BaseNode {
  readonly kind: 'StructDefStmt';
  readonly name: string;
  readonly visibility: VisibilityKind;
  readonly attributes: readonly VariableDeclaration[];
  readonly methods: readonly FunctionDef[];
}

export interface EnumDeclStmt extends BaseNode {
  readonly kind: 'EnumDeclStmt';
  readonly name: string;
  readonly visibility: VisibilityKind;
  readonly members: readonly VariableDeclaration[];
}

export interface ImportStmt extends BaseNode {
  readonly kind: 'ImportStmt';
  readonly names: readonly AliasExpr[];
}

export interface ImportFromStmt extends BaseNode {
  readonly kind: 'ImportFromStmt';
  readonly module: string | null;
  readonly names: readonly AliasExpr[];
  readonly level: number;
}

export interface Module extends BaseNode {
  readonly kind: 'Module';
  readonly name: string;
  readonly nodes: AstNode[];
}

export interface Package extends BaseNode {
  readonly kind: 'Package';
  readonly name: string;
  readonly modules: readonly Module[];
  readonly packages: readonly Package[];
}

export interface Target extends BaseNode {
  readonly kind: 'Target';
  readonly datalayout: string;
  readonly triple: string;
}

export interface Program extends BaseNode {
  readonly kind: 'Program';
  readonly name: string;
  readonly target: Target;
  readonly packages: readonly Package[];
}

export type Statement =
  | Block
  | VariableDeclaration
  | VariableAssignment
  | DeleteStmt
  | IfStmt
  | ForRangeLoopStmt
  | ForCountLoopStmt
  | WhileStmt
  | DoWhileStmt
  | BreakStmt
  | ContinueStmt
  | CaseStmt
  | SwitchStmt
  | ThrowStmt
  | CatchHandlerStmt
  | FinallyHandlerStmt
  | ExceptionHandlerStmt
  | WithStmt
  | FunctionPrototype
  | FunctionDef
  | FunctionAsyncDef
  | FunctionReturn
  | ClassDeclStmt
  | ClassDefStmt
  | StructDeclStmt
  | StructDefStmt
  | EnumDeclStmt
  | ImportStmt
  | ImportFromStmt;

/** 既非表达式也非语句的辅助节点 */
export type AuxiliaryNode = ComprehensionClause | AliasExpr | WithItem | Argument | Arguments;

export type Container = Module | Package | Program | Target;

export type AstNode = DataType | Expression | Statement | AuxiliaryNode | Container;

export type NodeKind = AstNode['kind'];

type SelectByKind<N, K> = N extends { readonly kind: infer NK } ? (K extends NK ? N : never) : never;

/** 按 kind 取出对应节点类型 */
export type NodeOfKind<K extends NodeKind> = SelectByKind<AstNode, K>;

// ---------------------------------------------------------------------------
// Structural representation
// ---------------------------------------------------------------------------

export type ReprScalar = string | number | boolean | null;

export type ReprValue = ReprScalar | ReprStruct | readonly ReprValue[];

/** `{ tag: { slot: value } }` 形式的结构化表示 */
export interface ReprStruct {
  readonly [key: string]: ReprValue;
}
