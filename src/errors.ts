/**
 * Stable error codes attached to every recorded {@link ToonError}.
 *
 * The thousands digit is the category: 1 lexer, 2 structure, 3 size
 * validation, 4 delimiters, 5 indentation, 9 resource guards.
 */
export const ErrorCode = {
  UnterminatedString: 'TOON1001',
  InvalidEscapeSequence: 'TOON1002',
  InvalidCharacter: 'TOON1003',

  ExpectedPropertyKey: 'TOON2001',
  ExpectedColon: 'TOON2002',
  ExpectedRightBracket: 'TOON2003',
  ExpectedRightBrace: 'TOON2004',
  ExpectedFieldName: 'TOON2005',
  ExpectedDelimiter: 'TOON2006',
  UnexpectedToken: 'TOON2007',
  UnexpectedEndOfInput: 'TOON2008',
  InvalidArraySize: 'TOON2009',
  ExpectedListItem: 'TOON2010',
  EmptyDocument: 'TOON2011',

  ArraySizeMismatch: 'TOON3001',
  TableSizeMismatch: 'TOON3002',
  TableRowFieldMismatch: 'TOON3003',

  MixedDelimiters: 'TOON4001',
  DelimiterMarkerMisplaced: 'TOON4002',

  UnexpectedIndentation: 'TOON5001',
  InconsistentIndentation: 'TOON5002',

  InfiniteLoopDetected: 'TOON9001',
  TokenCountExceeded: 'TOON9002',
  StringLengthExceeded: 'TOON9003',
  NestingDepthExceeded: 'TOON9004',
  ArraySizeExceeded: 'TOON9005',
  InputSizeExceeded: 'TOON9006',
  SourceMissing: 'TOON9007',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorCategory =
  | 'lexer'
  | 'structure'
  | 'validation'
  | 'delimiter'
  | 'indentation'
  | 'guard';

const CATEGORY_BY_DIGIT: Readonly<Record<string, ErrorCategory>> = Object.freeze({
  '1': 'lexer',
  '2': 'structure',
  '3': 'validation',
  '4': 'delimiter',
  '5': 'indentation',
  '9': 'guard',
});

/** Resolve the category of an error code from its leading digit. */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_DIGIT[code.charAt(4)] ?? 'guard';
}

/**
 * A recoverable problem found while lexing or parsing.
 *
 * Errors never stop a parse; they are collected in encounter order on the
 * result. Spans may overlap.
 */
export interface ToonError {
  /** Human-readable explanation, usually followed by a hint. */
  readonly message: string;
  /** Stable category code such as `TOON3001`. */
  readonly code?: ErrorCode;
  /** Zero-based UTF-16 offset of the first character of the span. */
  readonly position: number;
  /** Span length in UTF-16 code units. */
  readonly length: number;
  /** One-based line number of the span start. */
  readonly line: number;
  /** One-based column number of the span start. */
  readonly column: number;
}

/** Anything that carries a source span, such as a token. */
export interface SourceSpan {
  readonly position: number;
  readonly line: number;
  readonly column: number;
  readonly length: number;
}

export function createError(code: ErrorCode, message: string, at: SourceSpan): ToonError {
  return Object.freeze({
    message,
    code,
    position: at.position,
    length: at.length,
    line: at.line,
    column: at.column,
  });
}

/**
 * Accumulates recoverable errors for one lexing or parsing pass and forwards
 * each one to an optional listener as it is recorded.
 */
export class ErrorCollector {
  private readonly items: ToonError[] = [];
  private readonly onError?: (error: ToonError) => void;

  constructor(onError?: (error: ToonError) => void) {
    this.onError = onError;
  }

  report(code: ErrorCode, message: string, at: SourceSpan): ToonError {
    const error = createError(code, message, at);
    this.items.push(error);
    this.onError?.(error);
    return error;
  }

  /** Append errors recorded elsewhere (for example by the lexer). */
  adopt(errors: readonly ToonError[]): void {
    for (const error of errors) {
      this.items.push(error);
      this.onError?.(error);
    }
  }

  toArray(): ToonError[] {
    return this.items.slice();
  }
}

/**
 * Thrown by {@link parse} for the two conditions that cannot produce a
 * result: an absent source and a source larger than `maxInputSize`.
 *
 * The message never includes source text.
 *
 * @example
 * ```typescript
 * import { parse, ToonInputError } from 'toonparse';
 *
 * try {
 *   parse(hugeText, { maxInputSize: 1024 });
 * } catch (err) {
 *   if (err instanceof ToonInputError) {
 *     console.error(`${err.code}: ${err.message}`);
 *   }
 * }
 * ```
 */
export class ToonInputError extends Error {
  /** `TOON9006` for oversize input, `TOON9007` for a missing source. */
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ToonInputError';
    this.code = code;
  }
}
