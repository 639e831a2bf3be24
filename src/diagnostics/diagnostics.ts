// Structured diagnostics and the typed error taxonomy

import type { Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
}

export enum DiagnosticCode {
  // Value domain errors (V001-V099)
  V001_IntegerOutOfRange = 'V001',
  V002_FloatOutOfRange = 'V002',
  V003_NonFiniteFloat = 'V003',
  V004_InvalidCharacter = 'V004',
  V005_InvalidTemporal = 'V005',
  V006_ZeroStep = 'V006',
  V007_NonUniformElements = 'V007',
  V008_DuplicateElement = 'V008',
  V009_MalformedStruct = 'V009',
  V010_NotAnInteger = 'V010',
  V011_EmptyElementTypes = 'V011',

  // Type errors (T001-T099)
  T001_UnsupportedOperands = 'T001',
  T002_IncompatibleTypes = 'T002',
  T003_NotSubscriptable = 'T003',
  T004_ArityMismatch = 'T004',
  T005_NotIterable = 'T005',
  T006_UnknownOperator = 'T006',

  // Structural errors (S001-S099)
  S001_NotAddressable = 'S001',
  S002_DuplicateDefault = 'S002',
  S003_DuplicateArgument = 'S003',
  S004_DuplicateMember = 'S004',
  S005_EmptyImport = 'S005',
  S006_InvalidCase = 'S006',
  S007_MissingValue = 'S007',
  S008_EmptyHandlers = 'S008',
  S009_InvalidImportLevel = 'S009',
  S010_AmbiguousSubscript = 'S010',
  S011_EmptyWithItems = 'S011',
  S012_EmptyClauses = 'S012',

  // Symbol table errors (K001-K099)
  K001_DuplicateSymbol = 'K001',
  K002_UndefinedSymbol = 'K002',
  K003_RootScopeExit = 'K003',
  K004_ShadowedSymbol = 'K004',

  // Container access errors (I001-I099)
  I001_IndexOutOfRange = 'I001',

  // Coverage gaps (N001-N099)
  N001_UnhandledVariant = 'N001',
  N002_UnknownNodeKind = 'N002',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span?: Span;
  /** 触发诊断的节点 kind */
  readonly nodeKind?: string;
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private nodeKind?: string;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span | undefined): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withNode(node: { readonly kind: string; readonly span?: Span }): DiagnosticBuilder {
    this.nodeKind = node.kind;
    if (node.span !== undefined) this.span = node.span;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      ...(this.span !== undefined && { span: this.span }),
      ...(this.nodeKind !== undefined && { nodeKind: this.nodeKind }),
    };
  }
}

export type ErrorKind =
  | 'ValueError'
  | 'TypeError'
  | 'SyntaxError'
  | 'KeyError'
  | 'IndexError'
  | 'NotImplementedError';

export interface ErrorContext {
  readonly span?: Span | undefined;
  readonly node?: { readonly kind: string; readonly span?: Span };
}

/**
 * 所有 AST 错误的基类，携带结构化 Diagnostic。
 */
export abstract class AstError extends Error {
  public readonly diagnostic: Diagnostic;
  abstract readonly errorKind: ErrorKind;

  constructor(code: DiagnosticCode, message: string, context: ErrorContext = {}) {
    super(message);
    const builder = DiagnosticBuilder.error(code).withMessage(message).withSpan(context.span);
    if (context.node) builder.withNode(context.node);
    this.diagnostic = builder.build();
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}

/** 值超出类型的取值域 */
export class AstValueError extends AstError {
  override readonly errorKind = 'ValueError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstValueError';
  }
}

/** 操作数类型组合未被提升表覆盖 */
export class AstTypeError extends AstError {
  override readonly errorKind = 'TypeError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstTypeError';
  }
}

/** 结构上非法的构造 */
export class AstSyntaxError extends AstError {
  override readonly errorKind = 'SyntaxError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstSyntaxError';
  }
}

export class AstKeyError extends AstError {
  override readonly errorKind = 'KeyError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstKeyError';
  }
}

export class AstIndexError extends AstError {
  override readonly errorKind = 'IndexError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstIndexError';
  }
}

export class AstNotImplementedError extends AstError {
  override readonly errorKind = 'NotImplementedError';

  constructor(code: DiagnosticCode, message: string, context?: ErrorContext) {
    super(code, message, context);
    this.name = 'AstNotImplementedError';
  }
}
