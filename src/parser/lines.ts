import { measureIndent } from '../delimiters';
import type { SourceSpan } from '../errors';
import type { Token } from '../tokenizer';

/**
 * One physical line that carries content. Blank and comment-only lines
 * never become a SourceLine.
 */
export interface SourceLine {
  /** Leading space/tab count. */
  readonly indent: number;
  /** True when the leading run mixes tabs and spaces. */
  readonly mixedIndent: boolean;
  /**
   * Content tokens in order, inner whitespace kept. Leading indentation, the
   * trailing comment and trailing spaces are removed.
   */
  readonly tokens: readonly Token[];
}

function buildLine(raw: readonly Token[]): SourceLine | undefined {
  let start = 0;
  let leading = '';
  while (start < raw.length && (raw[start].type === 'indent' || raw[start].type === 'whitespace')) {
    leading += raw[start].raw;
    start++;
  }
  let end = raw.length;
  if (end > start && raw[end - 1].type === 'comment') end--;
  // Trailing tabs stay: in a tab-delimited row they close an empty cell.
  while (end > start && raw[end - 1].type === 'whitespace' && raw[end - 1].raw !== '\t') end--;
  if (end === start) return undefined;
  const { width, mixed } = measureIndent(leading);
  return { indent: width, mixedIndent: mixed, tokens: raw.slice(start, end) };
}

/** Group a token stream into content lines, dropping layout-only tokens. */
export function splitLines(tokens: readonly Token[]): SourceLine[] {
  const lines: SourceLine[] = [];
  let current: Token[] = [];
  const flush = () => {
    const line = buildLine(current);
    if (line) lines.push(line);
    current = [];
  };
  for (const token of tokens) {
    if (token.type === 'newline' || token.type === 'eof') {
      flush();
    } else if (token.type !== 'dedent') {
      current.push(token);
    }
  }
  flush();
  return lines;
}

export function firstToken(line: SourceLine): Token {
  return line.tokens[0];
}

/** A list item line starts with a lone dash. */
export function isListMarker(line: SourceLine): boolean {
  const first = firstToken(line);
  return first.type === 'string' && first.raw === '-';
}

/** Error anchor for the leading whitespace of a line. */
export function indentSpan(line: SourceLine): SourceSpan {
  const first = firstToken(line);
  return {
    position: first.position - line.indent,
    length: line.indent,
    line: first.line,
    column: 1,
  };
}

/** Error anchor covering all content of a line. */
export function lineSpan(line: SourceLine): SourceSpan {
  const first = firstToken(line);
  const last = line.tokens[line.tokens.length - 1];
  return {
    position: first.position,
    length: last.position + last.length - first.position,
    line: first.line,
    column: first.column,
  };
}
