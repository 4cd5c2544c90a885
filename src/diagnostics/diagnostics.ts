// Structured diagnostics with error codes, spans, and the internal/fallback flags

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnexpectedCharacter = 'L001',
  L002_UnterminatedString = 'L002',
  L003_UnterminatedCharacter = 'L003',
  L004_UnterminatedComment = 'L004',
  L005_UnterminatedRawString = 'L005',
  L006_MalformedNumber = 'L006',
  L007_InvalidInterpolation = 'L007',
  L008_LineTooLong = 'L008',

  // Parser errors (P001-P099)
  P001_ExpectedIdentifier = 'P001',
  P002_ExpectedTypeId = 'P002',
  P003_ExpectedToken = 'P003',
  P004_UnexpectedToken = 'P004',
  P005_ExpectedExpression = 'P005',
  P006_InvalidDeclaration = 'P006',
  P007_InvalidStatement = 'P007',
  P008_InvalidCapture = 'P008',
  P009_InvalidQualifiedId = 'P009',
  P010_UnexpectedEndOfSection = 'P010',

  // Reflection / metafunction errors (R001-R099)
  R001_MetafunctionRequirement = 'R001',
  R002_MetafunctionError = 'R002',
  R003_UnknownMetafunction = 'R003',
  R004_UnusedMetafunctionArguments = 'R004',
  R005_InvalidNarrowing = 'R005',
  R006_SnippetParseFailed = 'R006',
  R007_MetafunctionsFailed = 'R007',

  // Internal errors (I001-I099)
  I001_InternalError = 'I001',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  /** 仅用于编译器内部错误（显示时附加前缀） */
  readonly internal?: boolean;
  /** 低优先级诊断：仅在没有更好的诊断时显示 */
  readonly fallback?: boolean;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private internal = false;
  private fallback = false;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
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

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  asInternal(internal = true): DiagnosticBuilder {
    this.internal = internal;
    return this;
  }

  asFallback(fallback = true): DiagnosticBuilder {
    this.fallback = fallback;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.internal ? { internal: true } : {}),
      ...(this.fallback ? { fallback: true } : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unexpectedCharacter: (char: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnexpectedCharacter)
      .withMessage(`unexpected character '${char}'`)
      .withPosition(pos),

  unterminatedString: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedString)
      .withMessage('string literal "..." is missing its closing "')
      .withPosition(pos),

  unterminatedCharacter: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L003_UnterminatedCharacter)
      .withMessage("character literal '...' is missing its closing '")
      .withPosition(pos),

  unterminatedComment: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L004_UnterminatedComment)
      .withMessage('/* comment starting here is not closed by */ before the end of the source')
      .withPosition(pos),

  unterminatedRawString: (closingSeq: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L005_UnterminatedRawString)
      .withMessage(`raw string literal starting here has no closing ${closingSeq} before the end of the source`)
      .withPosition(pos),

  invalidRawStringDelimiter: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L005_UnterminatedRawString)
      .withMessage('invalid raw string delimiter - expected up to 16 characters followed by (')
      .withPosition(pos),

  malformedNumber: (detail: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L006_MalformedNumber)
      .withMessage(detail)
      .withPosition(pos),

  invalidInterpolation: (detail: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L007_InvalidInterpolation)
      .withMessage(detail)
      .withPosition(pos),

  lineTooLong: (limit: number, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L008_LineTooLong)
      .withMessage(`source line exceeds the maximum supported length of ${limit} characters`)
      .withPosition(pos),

  expectedIdentifier: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P001_ExpectedIdentifier)
      .withMessage('expected identifier')
      .withPosition(pos),

  expectedToken: (expected: string, actual: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P003_ExpectedToken)
      .withMessage(`expected '${expected}' (at '${actual}')`)
      .withPosition(pos),

  unexpectedEndOfSection: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P010_UnexpectedEndOfSection)
      .withMessage('unexpected text at end of cpp2 code section')
      .withPosition(pos)
      .asFallback(),

  syntax: (code: DiagnosticCode, message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(code).withMessage(message).withPosition(pos),

  metafunction: (code: DiagnosticCode, message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(code).withMessage(message).withPosition(pos),

  invalidNarrowing: (expected: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.R005_InvalidNarrowing)
      .withMessage(`declaration is not ${expected}`)
      .withPosition(pos),

  internal: (message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I001_InternalError)
      .withMessage(message)
      .withPosition(pos)
      .asInternal(),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;
  const prefix = diagnostic.internal ? 'internal compiler error: ' : '';

  let result = `${severity} ${code}: ${prefix}${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(Math.max(0, span.start.col - 1))}^`;
    }
  }

  return result;
}

/**
 * 把捕获到的异常转换为诊断：DiagnosticError 原样取出，其余视为内部错误。
 *
 * @param pos - 非 DiagnosticError 时使用的位置
 */
export function toDiagnostic(e: unknown, pos: Position): Diagnostic {
  if (e instanceof DiagnosticError) return e.diagnostic;
  const message = e instanceof Error ? e.message : String(e);
  return Diagnostics.internal(message, pos).build();
}
