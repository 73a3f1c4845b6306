import type { TextRange } from '../frontend/position.js';

/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `TRN100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Offset range into the source text, used for snippet rendering. */
  range?: TextRange;
  /** Short label printed beside the underline. */
  label?: string;
  /** Extra line printed below the snippet. */
  hint?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'TRN000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'TRN001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'TRN002',

  /** Generic parse error: a production committed and a required token was missing. */
  ParseError: 'TRN100',

  /** The token stream ran out inside a construct that needs a continuation. */
  UnexpectedEof: 'TRN101',

  /** A character no lexical rule accepts. */
  LexUnknownChar: 'TRN110',

  /** A string literal without its closing delimiter. */
  LexUnterminatedString: 'TRN111',

  /** A block comment without its closing `*` `/`. */
  LexUnterminatedComment: 'TRN112',

  /** Two identifiers with only trivia between them. */
  AdjacentIdentifiers: 'TRN200',

  /** An opening delimiter that is never closed, or a closer without an opener. */
  UnbalancedDelimiter: 'TRN201',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
