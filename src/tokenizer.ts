import { DEFAULT_MAX_STRING_LENGTH, DEFAULT_MAX_TOKEN_COUNT } from './constants';
import { ErrorCode, ErrorCollector, type ToonError } from './errors';
import {
  invalidCharacterMessage,
  invalidEscapeMessage,
  stringLengthMessage,
  tokenCountMessage,
  unterminatedStringMessage,
  type LiteralKind,
} from './hints';

export type TokenType =
  // value literals
  | 'string'
  | 'number'
  | 'true'
  | 'false'
  | 'null'
  | 'identifier'
  // structural punctuation
  | 'colon'
  | 'comma'
  | 'pipe'
  | 'left_bracket'
  | 'right_bracket'
  | 'left_brace'
  | 'right_brace'
  // layout
  | 'newline'
  | 'indent'
  | 'dedent'
  | 'whitespace'
  | 'comment'
  | 'eof'
  | 'invalid';

/**
 * A single token produced by the TOON lexer.
 *
 * Tokens never span lines. Concatenating every `raw` in order reproduces the
 * source text.
 */
export interface Token {
  /** Semantic category of the token. */
  readonly type: TokenType;
  /** Decoded text: escapes processed for quoted strings, otherwise `raw`. */
  readonly value: string;
  /** Exact source slice, quotes included. */
  readonly raw: string;
  /** Zero-based character offset in the input string. */
  readonly position: number;
  /** One-based line number in the input. */
  readonly line: number;
  /** One-based column number in the input. */
  readonly column: number;
  /** Length of `raw`. */
  readonly length: number;
}

export interface TokenizeOptions {
  /**
   * Maximum number of tokens emitted before lexing stops.
   *
   * @default DEFAULT_MAX_TOKEN_COUNT
   */
  maxTokenCount?: number;

  /**
   * Maximum decoded length of one string or identifier token.
   *
   * @default DEFAULT_MAX_STRING_LENGTH
   */
  maxStringLength?: number;
}

export interface ScanResult {
  tokens: Token[];
  errors: ToonError[];
  /** True when lexing stopped at the token limit. */
  truncated: boolean;
}

const STRUCTURAL: Readonly<Record<string, TokenType>> = Object.freeze({
  ':': 'colon',
  ',': 'comma',
  '|': 'pipe',
  '[': 'left_bracket',
  ']': 'right_bracket',
  '{': 'left_brace',
  '}': 'right_brace',
});

const ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
  "'": "'",
});

// \p{L} matches any Unicode letter (Latin, CJK, Cyrillic, Greek, etc.)
const IDENT_START_RE = /[\p{L}_]/u;
// Whitespace other than tab and line breaks.
const INLINE_SPACE_RE = /[^\S\t\n\r]/;

function isAsciiDigitCode(code: number): boolean {
  return code >= 48 && code <= 57;
}

function isDigit(ch: string | undefined): boolean {
  return !!ch && isAsciiDigitCode(ch.charCodeAt(0));
}

function isLineBreak(ch: string | undefined): boolean {
  return ch === '\n' || ch === '\r';
}

function isInlineSpace(ch: string): boolean {
  return ch === ' ' || INLINE_SPACE_RE.test(ch);
}

function isControl(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (code < 0x20 && code !== 9 && code !== 10 && code !== 13) || code === 0x7f;
}

function isCommentStart(input: string, pos: number): boolean {
  const ch = input[pos];
  return ch === '#' || (ch === '/' && input[pos + 1] === '/');
}

// Characters that may appear inside an unquoted literal after its first one.
function isBareChar(input: string, pos: number): boolean {
  if (pos >= input.length) return false;
  const ch = input[pos];
  if (ch === ' ' || ch === '\t' || isLineBreak(ch)) return false;
  if (ch in STRUCTURAL) return false;
  if (ch === '"' || ch === '\\') return false;
  if (isCommentStart(input, pos)) return false;
  if (isControl(ch) || isInlineSpace(ch)) return false;
  return true;
}

function isBareStart(input: string, pos: number): boolean {
  return input[pos] !== "'" && isBareChar(input, pos);
}

// Integers written with a redundant leading zero ("05", "-007") are strings.
function hasForbiddenLeadingZero(literal: string): boolean {
  const digits = literal.startsWith('-') ? literal.slice(1) : literal;
  return /^\d+$/.test(digits) && digits.length > 1 && digits.startsWith('0');
}

// Precompute line start offsets for O(log n) line/column lookup.
// "\n", "\r\n" and a lone "\r" each end a line. Columns count UTF-16 code
// units, which is how most editors report them.
export function buildLineOffsets(input: string): number[] {
  const offsets = [0];
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === '\r') {
      if (input[i + 1] === '\n') i++;
      offsets.push(i + 1);
    } else if (ch === '\n') {
      offsets.push(i + 1);
    }
  }
  return offsets;
}

export function posToLineCol(lineOffsets: number[], pos: number): { line: number; column: number } {
  let lo = 0;
  let hi = lineOffsets.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineOffsets[mid] <= pos) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: pos - lineOffsets[lo] + 1 };
}

/**
 * Scan TOON text into tokens, collecting lexical errors instead of throwing.
 *
 * Unterminated strings, bad escapes and stray characters are recorded and
 * still produce a token. When `maxTokenCount` is reached the scan stops early,
 * records `TOON9002` and ends the list with `eof`.
 */
export function scan(input: string, options: TokenizeOptions = {}): ScanResult {
  const tokens: Token[] = [];
  const errors = new ErrorCollector();
  const len = input.length;
  const lineOffsets = buildLineOffsets(input);
  const maxTokenCount = options.maxTokenCount ?? DEFAULT_MAX_TOKEN_COUNT;
  const maxStringLength = options.maxStringLength ?? DEFAULT_MAX_STRING_LENGTH;
  const indentStack = [0];
  let pos = 0;
  let atLineStart = true;
  let truncated = false;

  function lc(p: number) {
    return posToLineCol(lineOffsets, p);
  }

  function spanAt(position: number, length: number) {
    const { line, column } = lc(position);
    return { position, length, line, column };
  }

  /** Build a Token and push it, unless the token limit has been reached. */
  function emit(type: TokenType, raw: string, position: number, value: string = raw): boolean {
    if (tokens.length >= maxTokenCount) {
      truncated = true;
      errors.report(ErrorCode.TokenCountExceeded, tokenCountMessage(maxTokenCount), spanAt(position, raw.length));
      return false;
    }
    const { line, column } = lc(position);
    tokens.push({ type, value, raw, position, line, column, length: raw.length });
    return true;
  }

  function checkLength(kind: LiteralKind, value: string, start: number): void {
    if (value.length > maxStringLength) {
      errors.report(
        ErrorCode.StringLengthExceeded,
        stringLengthMessage(kind, value.length, maxStringLength),
        spanAt(start, pos - start),
      );
    }
  }

  // Leading whitespace of a content line drives the indent/dedent stack.
  // Blank and comment-only lines leave it untouched.
  function scanLineStart(): boolean {
    const start = pos;
    while (pos < len && (input[pos] === ' ' || input[pos] === '\t')) pos++;
    const raw = input.slice(start, pos);
    atLineStart = false;
    const blank = pos >= len || isLineBreak(input[pos]) || isCommentStart(input, pos);
    if (blank) {
      return raw.length === 0 || emit('whitespace', raw, start);
    }
    const width = raw.length;
    while (indentStack.length > 1 && width < indentStack[indentStack.length - 1]) {
      indentStack.pop();
      if (!emit('dedent', '', start)) return false;
    }
    if (width > indentStack[indentStack.length - 1]) {
      indentStack.push(width);
      return emit('indent', raw, start);
    }
    return raw.length === 0 || emit('whitespace', raw, start);
  }

  function scanQuoted(quote: string): boolean {
    const start = pos;
    pos++; // opening quote
    let value = '';
    let closed = false;
    while (pos < len) {
      const ch = input[pos];
      if (ch === quote) {
        pos++;
        closed = true;
        break;
      }
      if (isLineBreak(ch)) break;
      if (ch === '\\') {
        if (pos + 1 >= len || isLineBreak(input[pos + 1])) {
          value += ch;
          pos++;
          continue;
        }
        const next = input[pos + 1];
        if (next in ESCAPES) {
          value += ESCAPES[next];
        } else {
          errors.report(ErrorCode.InvalidEscapeSequence, invalidEscapeMessage(ch + next), spanAt(pos, 2));
          value += ch + next;
        }
        pos += 2;
        continue;
      }
      value += ch;
      pos++;
    }
    if (!closed) {
      errors.report(
        ErrorCode.UnterminatedString,
        unterminatedStringMessage(quote, pos - start, pos < len),
        spanAt(start, pos - start),
      );
    }
    checkLength('String', value, start);
    return emit('string', input.slice(start, pos), start, value);
  }

  function scanBare(): boolean {
    const start = pos;
    pos++;
    while (isBareChar(input, pos)) pos++;
    const raw = input.slice(start, pos);
    if (raw === 'true' || raw === 'false' || raw === 'null') {
      return emit(raw, raw, start);
    }
    const isIdentifier = IDENT_START_RE.test(raw.charAt(0));
    checkLength(isIdentifier ? 'Identifier' : 'Unquoted string', raw, start);
    return emit(isIdentifier ? 'identifier' : 'string', raw, start);
  }

  function scanNumber(): boolean {
    const start = pos;
    if (input[pos] === '-') pos++;
    while (isDigit(input[pos])) pos++;
    if (input[pos] === '.' && isDigit(input[pos + 1])) {
      pos++;
      while (isDigit(input[pos])) pos++;
    }
    if (input[pos] === 'e' || input[pos] === 'E') {
      const signed = input[pos + 1] === '+' || input[pos + 1] === '-';
      if (isDigit(input[pos + (signed ? 2 : 1)])) {
        pos += signed ? 2 : 1;
        while (isDigit(input[pos])) pos++;
      }
    }
    // "2024-01-01", "1.2.3" and "12px" continue as one unquoted string.
    if (isBareChar(input, pos)) {
      while (isBareChar(input, pos)) pos++;
      const raw = input.slice(start, pos);
      checkLength('Unquoted string', raw, start);
      return emit('string', raw, start);
    }
    const raw = input.slice(start, pos);
    if (hasForbiddenLeadingZero(raw)) {
      return emit('string', raw, start);
    }
    return emit('number', raw, start);
  }

  function scanToken(): boolean {
    const start = pos;
    const ch = input[pos];

    if (ch === '\n') {
      pos++;
      atLineStart = true;
      return emit('newline', ch, start);
    }
    if (ch === '\r') {
      pos += input[pos + 1] === '\n' ? 2 : 1;
      atLineStart = true;
      return emit('newline', input.slice(start, pos), start);
    }

    // Each tab is its own token so a tab delimiter is always whole.
    if (ch === '\t') {
      pos++;
      return emit('whitespace', ch, start);
    }
    if (isInlineSpace(ch)) {
      while (pos < len && isInlineSpace(input[pos])) pos++;
      return emit('whitespace', input.slice(start, pos), start);
    }

    if (isCommentStart(input, pos)) {
      while (pos < len && !isLineBreak(input[pos])) pos++;
      return emit('comment', input.slice(start, pos), start);
    }

    if (ch in STRUCTURAL) {
      pos++;
      return emit(STRUCTURAL[ch], ch, start);
    }

    if (ch === '"' || ch === "'") return scanQuoted(ch);

    if (isDigit(ch) || (ch === '-' && isDigit(input[pos + 1]))) return scanNumber();

    if (isBareStart(input, pos)) return scanBare();

    pos++;
    errors.report(ErrorCode.InvalidCharacter, invalidCharacterMessage(ch), spanAt(start, 1));
    return emit('invalid', ch, start);
  }

  while (pos < len) {
    const ok = atLineStart ? scanLineStart() : scanToken();
    if (!ok) break;
  }

  if (!truncated) {
    while (indentStack.length > 1) {
      indentStack.pop();
      if (!emit('dedent', '', len)) break;
    }
  }

  const end = lc(pos);
  tokens.push({ type: 'eof', value: '', raw: '', position: pos, line: end.line, column: end.column, length: 0 });
  return { tokens, errors: errors.toArray(), truncated };
}

/**
 * Tokenize TOON text into a lossless array of tokens.
 *
 * Lexical problems never throw; use {@link scan} (or {@link parse}) to see
 * the errors recorded along the way.
 *
 * @param input  Raw TOON text.
 * @returns Tokens ending with an `eof` token.
 *
 * @example
 * import { tokenize } from 'toonparse';
 *
 * tokenize('id: 7');
 * // [
 * //   { type: 'identifier', value: 'id', raw: 'id', position: 0, line: 1, column: 1, length: 2 },
 * //   { type: 'colon',      value: ':',  raw: ':',  position: 2, line: 1, column: 3, length: 1 },
 * //   { type: 'whitespace', value: ' ',  raw: ' ',  position: 3, line: 1, column: 4, length: 1 },
 * //   { type: 'number',     value: '7',  raw: '7',  position: 4, line: 1, column: 5, length: 1 },
 * //   { type: 'eof',        value: '',   raw: '',   position: 5, line: 1, column: 6, length: 0 },
 * // ]
 */
export function tokenize(input: string, options: TokenizeOptions = {}): Token[] {
  return scan(input, options).tokens;
}

const VALUE_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  'string', 'number', 'true', 'false', 'null', 'identifier',
]);

const STRUCTURAL_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  'colon', 'comma', 'pipe', 'left_bracket', 'right_bracket', 'left_brace', 'right_brace',
]);

const LAYOUT_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  'newline', 'indent', 'dedent', 'whitespace',
]);

export function isValueToken(type: TokenType): boolean {
  return VALUE_TYPES.has(type);
}

export function isStructuralToken(type: TokenType): boolean {
  return STRUCTURAL_TYPES.has(type);
}

export function isLayoutToken(type: TokenType): boolean {
  return LAYOUT_TYPES.has(type);
}

/** `true`, `false` and `null`. */
export function isKeywordToken(type: TokenType): boolean {
  return type === 'true' || type === 'false' || type === 'null';
}
