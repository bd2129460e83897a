import type * as AST from '../ast';
import { delimiterOf, type Delimiter } from '../delimiters';
import type { SourceSpan } from '../errors';
import type { Token } from '../tokenizer';

export function startOf(token: Token): AST.SourceLocation {
  return { line: token.line, column: token.column, offset: token.position };
}

export function endOf(token: Token): AST.SourceLocation {
  return { line: token.line, column: token.column + token.length, offset: token.position + token.length };
}

export function spanOf(first: Token, last: Token = first): AST.Span {
  return { start: startOf(first), end: endOf(last) };
}

/** Zero-width span just after `token`. */
export function spanAfter(token: Token): AST.Span {
  const end = endOf(token);
  return { start: end, end };
}

/** Error anchor covering `first` through `last` on one line. */
export function rangeOf(first: Token, last: Token = first): SourceSpan {
  return {
    position: first.position,
    length: last.position + last.length - first.position,
    line: first.line,
    column: first.column,
  };
}

/** Zero-length error anchor just after `token`. */
export function pointAfter(token: Token): SourceSpan {
  return {
    position: token.position + token.length,
    length: 0,
    line: token.line,
    column: token.column + token.length,
  };
}

export function isQuoted(token: Token): boolean {
  return token.type === 'string' && (token.raw.startsWith('"') || token.raw.startsWith("'"));
}

/** Index of the first non-whitespace token at or after `from`. */
export function skipSpaces(tokens: readonly Token[], from: number): number {
  let i = from;
  while (i < tokens.length && tokens[i].type === 'whitespace') i++;
  return i;
}

/** Like {@link skipSpaces} but stops at a tab, which may be a delimiter. */
export function skipBlanks(tokens: readonly Token[], from: number): number {
  let i = from;
  while (i < tokens.length && tokens[i].type === 'whitespace' && tokens[i].raw !== '\t') i++;
  return i;
}

/**
 * Drop whitespace from both ends. A trailing tab survives when tab is the
 * active delimiter, since it closes an empty last cell.
 */
export function trimSpaces(tokens: readonly Token[], delimiter?: Delimiter): Token[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && tokens[start].type === 'whitespace') start++;
  while (end > start && tokens[end - 1].type === 'whitespace') {
    if (delimiter !== undefined && delimiterOf(tokens[end - 1]) === delimiter) break;
    end--;
  }
  return tokens.slice(start, end);
}

/** Decoded text of a token run, keeping the source whitespace between tokens. */
export function joinValue(tokens: readonly Token[]): string {
  return tokens.map(t => t.value).join('');
}

export function joinRaw(tokens: readonly Token[]): string {
  return tokens.map(t => t.raw).join('');
}

export interface Cell {
  /** Content tokens with surrounding whitespace removed. */
  readonly tokens: Token[];
  /** Delimiter token ending this cell, if any. */
  readonly closedBy?: Token;
  /** Delimiter token opening this cell, if any. */
  readonly openedBy?: Token;
}

/**
 * Split a token run into cells at every token `isSeparator` accepts. An
 * empty run yields no cells; a run ending in a separator yields a trailing
 * empty cell.
 */
export function splitCells(
  tokens: readonly Token[],
  isSeparator: (token: Token) => boolean,
): Cell[] {
  if (tokens.length === 0) return [];
  const cells: Cell[] = [];
  let current: Token[] = [];
  let openedBy: Token | undefined;
  for (const token of tokens) {
    if (isSeparator(token)) {
      cells.push({ tokens: trimSpaces(current), closedBy: token, openedBy });
      current = [];
      openedBy = token;
    } else {
      current.push(token);
    }
  }
  cells.push({ tokens: trimSpaces(current), openedBy });
  return cells;
}

export function splitOn(delimiter: Delimiter): (token: Token) => boolean {
  return token => delimiterOf(token) === delimiter;
}

/** Anchor token for an empty cell: the delimiter after it, else the one before. */
export function cellAnchor(cell: Cell): Token | undefined {
  return cell.tokens.length > 0 ? cell.tokens[0] : cell.closedBy ?? cell.openedBy;
}

/** Materialize one token into a value node by its kind. */
export function literalNode(token: Token): AST.PrimitiveNode {
  const span = spanOf(token);
  switch (token.type) {
    case 'number':
      return {
        type: 'number',
        value: Number(token.raw),
        isInteger: !/[.eE]/.test(token.raw),
        raw: token.raw,
        span,
      };
    case 'true':
    case 'false':
      return { type: 'boolean', value: token.type === 'true', raw: token.raw, span };
    case 'null':
      return { type: 'null', raw: token.raw, span };
    default:
      return { type: 'string', value: token.value, raw: token.raw, span };
  }
}

/**
 * Value node for a run of tokens: one token keeps its own kind, several fold
 * into a single string that keeps the whitespace between them.
 */
export function valueNode(tokens: readonly Token[]): AST.PrimitiveNode {
  if (tokens.length === 1) return literalNode(tokens[0]);
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  return {
    type: 'string',
    value: joinValue(tokens),
    raw: joinRaw(tokens),
    span: spanOf(first, last),
  };
}

export function nullAfter(token: Token): AST.NullNode {
  return { type: 'null', raw: '', span: spanAfter(token) };
}

export function emptyObjectAfter(token: Token): AST.ObjectNode {
  return { type: 'object', properties: [], span: spanAfter(token) };
}

/**
 * The first pair of adjacent content tokens in a cell where one is a quoted
 * string, meaning a delimiter was probably left out between them.
 */
export function findMissingDelimiter(tokens: readonly Token[]): Token | undefined {
  let previous: Token | undefined;
  for (const token of tokens) {
    if (token.type === 'whitespace') continue;
    if (previous && (isQuoted(previous) || isQuoted(token))) return token;
    previous = token;
  }
  return undefined;
}
