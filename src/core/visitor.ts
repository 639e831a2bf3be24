import type * as AST from '../types.js';
import { AstNotImplementedError, DiagnosticCode } from '../diagnostics/diagnostics.js';

/**
 * 节点访问器基类（双分派）。
 *
 * 设计目标：
 * - 每种节点对应一个可选的 `visit<Kind>` 方法，子类只需实现它支持的节点
 * - `visit(node)` 按运行时 kind 分派到对应方法；方法缺失时抛出 AstNotImplementedError(N001)，
 *   不会静默跳过
 * - 分派表与 `src/types.ts` 中的 AstNode 联合保持一致，新增节点时此处的穷尽检查会在编译期报错
 *
 * 子类负责缩进与输出格式，节点本身不参与文本生成。
 */
export abstract class AstVisitor<R> {
  // 数据类型
  visitInt8?(node: AST.ScalarTypeNode<'Int8'>): R;
  visitInt16?(node: AST.ScalarTypeNode<'Int16'>): R;
  visitInt32?(node: AST.ScalarTypeNode<'Int32'>): R;
  visitInt64?(node: AST.ScalarTypeNode<'Int64'>): R;
  visitInt128?(node: AST.ScalarTypeNode<'Int128'>): R;
  visitUInt8?(node: AST.ScalarTypeNode<'UInt8'>): R;
  visitUInt16?(node: AST.ScalarTypeNode<'UInt16'>): R;
  visitUInt32?(node: AST.ScalarTypeNode<'UInt32'>): R;
  visitUInt64?(node: AST.ScalarTypeNode<'UInt64'>): R;
  visitUInt128?(node: AST.ScalarTypeNode<'UInt128'>): R;
  visitFloat16?(node: AST.ScalarTypeNode<'Float16'>): R;
  visitFloat32?(node: AST.ScalarTypeNode<'Float32'>): R;
  visitFloat64?(node: AST.ScalarTypeNode<'Float64'>): R;
  visitComplex32?(node: AST.ScalarTypeNode<'Complex32'>): R;
  visitComplex64?(node: AST.ScalarTypeNode<'Complex64'>): R;
  visitBoolean?(node: AST.ScalarTypeNode<'Boolean'>): R;
  visitUTF8Char?(node: AST.ScalarTypeNode<'UTF8Char'>): R;
  visitString?(node: AST.ScalarTypeNode<'String'>): R;
  visitUTF8String?(node: AST.ScalarTypeNode<'UTF8String'>): R;
  visitDate?(node: AST.ScalarTypeNode<'Date'>): R;
  visitTime?(node: AST.ScalarTypeNode<'Time'>): R;
  visitDateTime?(node: AST.ScalarTypeNode<'DateTime'>): R;
  visitTimestamp?(node: AST.ScalarTypeNode<'Timestamp'>): R;
  visitNoneType?(node: AST.ScalarTypeNode<'NoneType'>): R;
  visitUndefinedType?(node: AST.ScalarTypeNode<'UndefinedType'>): R;
  visitListType?(node: AST.ListType): R;
  visitSetType?(node: AST.SetType): R;
  visitMapType?(node: AST.MapType): R;
  visitTupleType?(node: AST.TupleType): R;
  visitStructType?(node: AST.StructType): R;
  visitClassType?(node: AST.ClassType): R;
  visitEnumType?(node: AST.EnumType): R;
  visitFunctionType?(node: AST.FunctionType): R;

  // 字面量
  visitLiteralInt8?(node: AST.NodeOfKind<'LiteralInt8'>): R;
  visitLiteralInt16?(node: AST.NodeOfKind<'LiteralInt16'>): R;
  visitLiteralInt32?(node: AST.NodeOfKind<'LiteralInt32'>): R;
  visitLiteralInt64?(node: AST.NodeOfKind<'LiteralInt64'>): R;
  visitLiteralInt128?(node: AST.NodeOfKind<'LiteralInt128'>): R;
  visitLiteralUInt8?(node: AST.NodeOfKind<'LiteralUInt8'>): R;
  visitLiteralUInt16?(node: AST.NodeOfKind<'LiteralUInt16'>): R;
  visitLiteralUInt32?(node: AST.NodeOfKind<'LiteralUInt32'>): R;
  visitLiteralUInt64?(node: AST.NodeOfKind<'LiteralUInt64'>): R;
  visitLiteralUInt128?(node: AST.NodeOfKind<'LiteralUInt128'>): R;
  visitLiteralFloat16?(node: AST.NodeOfKind<'LiteralFloat16'>): R;
  visitLiteralFloat32?(node: AST.NodeOfKind<'LiteralFloat32'>): R;
  visitLiteralFloat64?(node: AST.NodeOfKind<'LiteralFloat64'>): R;
  visitLiteralComplex32?(node: AST.NodeOfKind<'LiteralComplex32'>): R;
  visitLiteralComplex64?(node: AST.NodeOfKind<'LiteralComplex64'>): R;
  visitLiteralBoolean?(node: AST.LiteralBoolean): R;
  visitLiteralUTF8Char?(node: AST.NodeOfKind<'LiteralUTF8Char'>): R;
  visitLiteralString?(node: AST.NodeOfKind<'LiteralString'>): R;
  visitLiteralUTF8String?(node: AST.NodeOfKind<'LiteralUTF8String'>): R;
  visitLiteralDate?(node: AST.NodeOfKind<'LiteralDate'>): R;
  visitLiteralTime?(node: AST.NodeOfKind<'LiteralTime'>): R;
  visitLiteralDateTime?(node: AST.NodeOfKind<'LiteralDateTime'>): R;
  visitLiteralTimestamp?(node: AST.NodeOfKind<'LiteralTimestamp'>): R;
  visitLiteralNone?(node: AST.LiteralNone): R;
  visitLiteralList?(node: AST.LiteralList): R;
  visitLiteralTuple?(node: AST.LiteralTuple): R;
  visitLiteralSet?(node: AST.LiteralSet): R;
  visitLiteralMap?(node: AST.LiteralMap): R;

  // 表达式
  visitVariable?(node: AST.Variable): R;
  visitUnaryOp?(node: AST.UnaryOp): R;
  visitBinaryOp?(node: AST.BinaryOp): R;
  visitCompareOp?(node: AST.CompareOp): R;
  visitBoolOp?(node: AST.BoolOp): R;
  visitAugAssign?(node: AST.AugAssign): R;
  visitWalrusOp?(node: AST.WalrusOp): R;
  visitStarred?(node: AST.Starred): R;
  visitTypeCastExpr?(node: AST.TypeCastExpr): R;
  visitParenthesizedExpr?(node: AST.ParenthesizedExpr): R;
  visitSubscriptExpr?(node: AST.SubscriptExpr): R;
  visitFunctionCall?(node: AST.FunctionCall): R;
  visitLambdaExpr?(node: AST.LambdaExpr): R;
  visitAwaitExpr?(node: AST.AwaitExpr): R;
  visitYieldExpr?(node: AST.YieldExpr): R;
  visitIfExpr?(node: AST.IfExpr): R;
  visitForRangeLoopExpr?(node: AST.ForRangeLoopExpr): R;
  visitForCountLoopExpr?(node: AST.ForCountLoopExpr): R;
  visitWhileExpr?(node: AST.WhileExpr): R;
  visitListComprehension?(node: AST.ListComprehension): R;
  visitSetComprehension?(node: AST.SetComprehension): R;
  visitDictComprehension?(node: AST.DictComprehension): R;
  visitGeneratorExpr?(node: AST.GeneratorExpr): R;
  visitImportExpr?(node: AST.ImportExpr): R;
  visitImportFromExpr?(node: AST.ImportFromExpr): R;

  // 语句与声明
  visitForRangeLoopStmt?(node: AST.ForRangeLoopStmt): R;
  visitForCountLoopStmt?(node: AST.ForCountLoopStmt): R;
  visitWhileStmt?(node: AST.WhileStmt): R;
  visitImportStmt?(node: AST.ImportStmt): R;
  visitImportFromStmt?(node: AST.ImportFromStmt): R;
  visitBlock?(node: AST.Block): R;
  visitVariableDeclaration?(node: AST.VariableDeclaration): R;
  visitVariableAssignment?(node: AST.VariableAssignment): R;
  visitDeleteStmt?(node: AST.DeleteStmt): R;
  visitIfStmt?(node: AST.IfStmt): R;
  visitDoWhileStmt?(node: AST.DoWhileStmt): R;
  visitBreakStmt?(node: AST.BreakStmt): R;
  visitContinueStmt?(node: AST.ContinueStmt): R;
  visitCaseStmt?(node: AST.CaseStmt): R;
  visitSwitchStmt?(node: AST.SwitchStmt): R;
  visitThrowStmt?(node: AST.ThrowStmt): R;
  visitCatchHandlerStmt?(node: AST.CatchHandlerStmt): R;
  visitFinallyHandlerStmt?(node: AST.FinallyHandlerStmt): R;
  visitExceptionHandlerStmt?(node: AST.ExceptionHandlerStmt): R;
  visitWithStmt?(node: AST.WithStmt): R;
  visitFunctionPrototype?(node: AST.FunctionPrototype): R;
  visitFunctionDef?(node: AST.FunctionDef): R;
  visitFunctionAsyncDef?(node: AST.FunctionAsyncDef): R;
  visitFunctionReturn?(node: AST.FunctionReturn): R;
  visitClassDeclStmt?(node: AST.ClassDeclStmt): R;
  visitClassDefStmt?(node: AST.ClassDefStmt): R;
  visitStructDeclStmt?(node: AST.StructDeclStmt): R;
  visitStructDefStmt?(node: AST.StructDefStmt): R;
  visitEnumDeclStmt?(node: AST.EnumDeclStmt): R;

  // 辅助节点
  visitComprehensionClause?(node: AST.ComprehensionClause): R;
  visitAliasExpr?(node: AST.AliasExpr): R;
  visitWithItem?(node: AST.WithItem): R;
  visitArgument?(node: AST.Argument): R;
  visitArguments?(node: AST.Arguments): R;

  // 容器
  visitModule?(node: AST.Module): R;
  visitPackage?(node: AST.Package): R;
  visitTarget?(node: AST.Target): R;
  visitProgram?(node: AST.Program): R;
  visit(node: AST.AstNode): R {
    const kind: unknown = node.kind;
    switch (node.kind) {
      case 'Int8':
        return this.dispatch(node, this.visitInt8);
      case 'Int16':
        return this.dispatch(node, this.visitInt16);
      case 'Int32':
        return this.dispatch(node, this.visitInt32);
      case 'Int64':
        return this.dispatch(node, this.visitInt64);
      case 'Int128':
        return this.dispatch(node, this.visitInt128);
      case 'UInt8':
        return this.dispatch(node, this.visitUInt8);
      case 'UInt16':
        return this.dispatch(node, this.visitUInt16);
      case 'UInt32':
        return this.dispatch(node, this.visitUInt32);
      case 'UInt64':
        return this.dispatch(node, this.visitUInt64);
      case 'UInt128':
        return this.dispatch(node, this.visitUInt128);
      case 'Float16':
        return this.dispatch(node, this.visitFloat16);
      case 'Float32':
        return this.dispatch(node, this.visitFloat32);
      case 'Float64':
        return this.dispatch(node, this.visitFloat64);
      case 'Complex32':
        return this.dispatch(node, this.visitComplex32);
      case 'Complex64':
        return this.dispatch(node, this.visitComplex64);
      case 'Boolean':
        return this.dispatch(node, this.visitBoolean);
      case 'UTF8Char':
        return this.dispatch(node, this.visitUTF8Char);
      case 'String':
        return this.dispatch(node, this.visitString);
      case 'UTF8String':
        return this.dispatch(node, this.visitUTF8String);
      case 'Date':
        return this.dispatch(node, this.visitDate);
      case 'Time':
        return this.dispatch(node, this.visitTime);
      case 'DateTime':
        return this.dispatch(node, this.visitDateTime);
      case 'Timestamp':
        return this.dispatch(node, this.visitTimestamp);
      case 'NoneType':
        return this.dispatch(node, this.visitNoneType);
      case 'UndefinedType':
        return this.dispatch(node, this.visitUndefinedType);
      case 'ListType':
        return this.dispatch(node, this.visitListType);
      case 'SetType':
        return this.dispatch(node, this.visitSetType);
      case 'MapType':
        return this.dispatch(node, this.visitMapType);
      case 'TupleType':
        return this.dispatch(node, this.visitTupleType);
      case 'StructType':
        return this.dispatch(node, this.visitStructType);
      case 'ClassType':
        return this.dispatch(node, this.visitClassType);
      case 'EnumType':
        return this.dispatch(node, this.visitEnumType);
      case 'FunctionType':
        return this.dispatch(node, this.visitFunctionType);
      case 'LiteralInt8':
        return this.dispatch(node, this.visitLiteralInt8);
      case 'LiteralInt16':
        return this.dispatch(node, this.visitLiteralInt16);
      case 'LiteralInt32':
        return this.dispatch(node, this.visitLiteralInt32);
      case 'LiteralInt64':
        return this.dispatch(node, this.visitLiteralInt64);
      case 'LiteralInt128':
        return this.dispatch(node, this.visitLiteralInt128);
      case 'LiteralUInt8':
        return this.dispatch(node, this.visitLiteralUInt8);
      case 'LiteralUInt16':
        return this.dispatch(node, this.visitLiteralUInt16);
      case 'LiteralUInt32':
        return this.dispatch(node, this.visitLiteralUInt32);
      case 'LiteralUInt64':
        return this.dispatch(node, this.visitLiteralUInt64);
      case 'LiteralUInt128':
        return this.dispatch(node, this.visitLiteralUInt128);
      case 'LiteralFloat16':
        return this.dispatch(node, this.visitLiteralFloat16);
      case 'LiteralFloat32':
        return this.dispatch(node, this.visitLiteralFloat32);
      case 'LiteralFloat64':
        return this.dispatch(node, this.visitLiteralFloat64);
      case 'LiteralComplex32':
        return this.dispatch(node, this.visitLiteralComplex32);
      case 'LiteralComplex64':
        return this.dispatch(node, this.visitLiteralComplex64);
      case 'LiteralBoolean':
        return this.dispatch(node, this.visitLiteralBoolean);
      case 'LiteralUTF8Char':
        return this.dispatch(node, this.visitLiteralUTF8Char);
      case 'LiteralString':
        return this.dispatch(node, this.visitLiteralString);
      case 'LiteralUTF8String':
        return this.dispatch(node, this.visitLiteralUTF8String);
      case 'LiteralDate':
        return this.dispatch(node, this.visitLiteralDate);
      case 'LiteralTime':
        return this.dispatch(node, this.visitLiteralTime);
      case 'LiteralDateTime':
        return this.dispatch(node, this.visitLiteralDateTime);
      case 'LiteralTimestamp':
        return this.dispatch(node, this.visitLiteralTimestamp);
      case 'LiteralNone':
        return this.dispatch(node, this.visitLiteralNone);
      case 'LiteralList':
        return this.dispatch(node, this.visitLiteralList);
      case 'LiteralTuple':
        return this.dispatch(node, this.visitLiteralTuple);
      case 'LiteralSet':
        return this.dispatch(node, this.visitLiteralSet);
      case 'LiteralMap':
        return this.dispatch(node, this.visitLiteralMap);
      case 'Variable':
        return this.dispatch(node, this.visitVariable);
      case 'UnaryOp':
        return this.dispatch(node, this.visitUnaryOp);
      case 'BinaryOp':
        return this.dispatch(node, this.visitBinaryOp);
      case 'CompareOp':
        return this.dispatch(node, this.visitCompareOp);
      case 'BoolOp':
        return this.dispatch(node, this.visitBoolOp);
      case 'AugAssign':
        return this.dispatch(node, this.visitAugAssign);
      case 'WalrusOp':
        return this.dispatch(node, this.visitWalrusOp);
      case 'Starred':
        return this.dispatch(node, this.visitStarred);
      case 'TypeCastExpr':
        return this.dispatch(node, this.visitTypeCastExpr);
      case 'ParenthesizedExpr':
        return this.dispatch(node, this.visitParenthesizedExpr);
      case 'SubscriptExpr':
        return this.dispatch(node, this.visitSubscriptExpr);
      case 'FunctionCall':
        return this.dispatch(node, this.visitFunctionCall);
      case 'LambdaExpr':
        return this.dispatch(node, this.visitLambdaExpr);
      case 'AwaitExpr':
        return this.dispatch(node, this.visitAwaitExpr);
      case 'YieldExpr':
        return this.dispatch(node, this.visitYieldExpr);
      case 'IfExpr':
        return this.dispatch(node, this.visitIfExpr);
      case 'ForRangeLoopExpr':
        return this.dispatch(node, this.visitForRangeLoopExpr);
      case 'ForCountLoopExpr':
        return this.dispatch(node, this.visitForCountLoopExpr);
      case 'WhileExpr':
        return this.dispatch(node, this.visitWhileExpr);
      case 'ListComprehension':
        return this.dispatch(node, this.visitListComprehension);
      case 'SetComprehension':
        return this.dispatch(node, this.visitSetComprehension);
      case 'DictComprehension':
        return this.dispatch(node, this.visitDictComprehension);
      case 'GeneratorExpr':
        return this.dispatch(node, this.visitGeneratorExpr);
      case 'ImportExpr':
        return this.dispatch(node, this.visitImportExpr);
      case 'ImportFromExpr':
        return this.dispatch(node, this.visitImportFromExpr);
      case 'ForRangeLoopStmt':
        return this.dispatch(node, this.visitForRangeLoopStmt);
      case 'ForCountLoopStmt':
        return this.dispatch(node, this.visitForCountLoopStmt);
      case 'WhileStmt':
        return this.dispatch(node, this.visitWhileStmt);
      case 'ImportStmt':
        return this.dispatch(node, this.visitImportStmt);
      case 'ImportFromStmt':
        return this.dispatch(node, this.visitImportFromStmt);
      case 'Block':
        return this.dispatch(node, this.visitBlock);
      case 'VariableDeclaration':
        return this.dispatch(node, this.visitVariableDeclaration);
      case 'VariableAssignment':
        return this.dispatch(node, this.visitVariableAssignment);
      case 'DeleteStmt':
        return this.dispatch(node, this.visitDeleteStmt);
      case 'IfStmt':
        return this.dispatch(node, this.visitIfStmt);
      case 'DoWhileStmt':
        return this.dispatch(node, this.visitDoWhileStmt);
      case 'BreakStmt':
        return this.dispatch(node, this.visitBreakStmt);
      case 'ContinueStmt':
        return this.dispatch(node, this.visitContinueStmt);
      case 'CaseStmt':
        return this.dispatch(node, this.visitCaseStmt);
      case 'SwitchStmt':
        return this.dispatch(node, this.visitSwitchStmt);
      case 'ThrowStmt':
        return this.dispatch(node, this.visitThrowStmt);
      case 'CatchHandlerStmt':
        return this.dispatch(node, this.visitCatchHandlerStmt);
      case 'FinallyHandlerStmt':
        return this.dispatch(node, this.visitFinallyHandlerStmt);
      case 'ExceptionHandlerStmt':
        return this.dispatch(node, this.visitExceptionHandlerStmt);
      case 'WithStmt':
        return this.dispatch(node, this.visitWithStmt);
      case 'FunctionPrototype':
        return this.dispatch(node, this.visitFunctionPrototype);
      case 'FunctionDef':
        return this.dispatch(node, this.visitFunctionDef);
      case 'FunctionAsyncDef':
        return this.dispatch(node, this.visitFunctionAsyncDef);
      case 'FunctionReturn':
        return this.dispatch(node, this.visitFunctionReturn);
      case 'ClassDeclStmt':
        return this.dispatch(node, this.visitClassDeclStmt);
      case 'ClassDefStmt':
        return this.dispatch(node, this.visitClassDefStmt);
      case 'StructDeclStmt':
        return this.dispatch(node, this.visitStructDeclStmt);
      case 'StructDefStmt':
        return this.dispatch(node, this.visitStructDefStmt);
      case 'EnumDeclStmt':
        return this.dispatch(node, this.visitEnumDeclStmt);
      case 'ComprehensionClause':
        return this.dispatch(node, this.visitComprehensionClause);
      case 'AliasExpr':
        return this.dispatch(node, this.visitAliasExpr);
      case 'WithItem':
        return this.dispatch(node, this.visitWithItem);
      case 'Argument':
        return this.dispatch(node, this.visitArgument);
      case 'Arguments':
        return this.dispatch(node, this.visitArguments);
      case 'Module':
        return this.dispatch(node, this.visitModule);
      case 'Package':
        return this.dispatch(node, this.visitPackage);
      case 'Target':
        return this.dispatch(node, this.visitTarget);
      case 'Program':
        return this.dispatch(node, this.visitProgram);
      default:
        return this.unknownKind(node, kind);
    }
  }

  /** 依次访问一组节点 */
  visitAll(nodes: readonly AST.AstNode[]): R[] {
    return nodes.map(node => this.visit(node));
  }

  protected dispatch<T extends AST.AstNode>(node: T, handler: ((node: T) => R) | undefined): R {
    if (handler === undefined) {
      throw new AstNotImplementedError(
        DiagnosticCode.N001_UnhandledVariant,
        `${this.constructor.name} does not implement visit${node.kind}`,
        { node }
      );
    }
    return handler.call(this, node);
  }

  private unknownKind(_node: never, kind: unknown): never {
    throw new AstNotImplementedError(
      DiagnosticCode.N002_UnknownNodeKind,
      `${this.constructor.name} cannot dispatch unknown node kind '${String(kind)}'`
    );
  }
}
