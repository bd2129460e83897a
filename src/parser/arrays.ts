import type * as AST from '../ast';
import { delimiterOf, type Delimiter, type DelimiterScopes } from '../delimiters';
import { ErrorCode, type SourceSpan } from '../errors';
import {
  EXPECTED_FIELD_NAME,
  EXPECTED_LIST_ITEM,
  EXPECTED_RIGHT_BRACE,
  EXPECTED_RIGHT_BRACKET,
  INVALID_ARRAY_SIZE,
  arraySizeExceededMessage,
  arraySizeMismatchMessage,
  contentAfterTableHeaderMessage,
  misplacedMarkerMessage,
  missingDelimiterMessage,
  mixedDelimitersMessage,
  tableRowFieldMismatchMessage,
  tableSizeMismatchMessage,
  unexpectedIndentationMessage,
} from '../hints';
import type { Token } from '../tokenizer';
import { firstToken, isListMarker, lineSpan, type SourceLine } from './lines';
import {
  cellAnchor,
  emptyObjectAfter,
  endOf,
  findMissingDelimiter,
  joinValue,
  pointAfter,
  rangeOf,
  skipBlanks,
  skipSpaces,
  spanAfter,
  splitCells,
  splitOn,
  startOf,
  trimSpaces,
  valueNode,
  nullAfter,
  type Cell,
} from './values';

/** Parser services the array routines call back into. */
export interface ArrayParser {
  readonly scopes: DelimiterScopes;
  readonly maxArraySize: number;
  report(code: ErrorCode, message: string, at: SourceSpan): void;
  peekLine(): SourceLine | undefined;
  nextLine(): void;
  lineIndex(): number;
  recoverToIndent(indent: number): void;
  ensureProgress(before: number, what: string): void;
  withDepth<T>(at: SourceSpan, fn: () => T): T | undefined;
  isKeyToken(token: Token): boolean;
  parseProperty(line: SourceLine, start: number, indent: number): AST.PropertyNode | undefined;
  parseBlock(parentIndent: number, blockIndent: number): AST.PropertyNode[];
}

/** Parsed `[N<marker>]{fields}:` header. */
export interface ArrayHeader {
  readonly open: Token;
  readonly close: Token;
  readonly colon: Token;
  readonly declaredSize: number;
  /** False when the size was missing or malformed. */
  readonly sizeKnown: boolean;
  readonly sizeToken?: Token;
  readonly delimiter: Delimiter;
  readonly fields?: readonly string[];
  /** Index of the first token after the colon. */
  readonly bodyStart: number;
}

const SIZE_RE = /^\d+$/;

function parseFields(
  ctx: ArrayParser,
  tokens: readonly Token[],
  start: number,
  delimiter: Delimiter,
): { fields: string[]; next: number } {
  const open = tokens[start];
  let i = start + 1;
  while (i < tokens.length && tokens[i].type !== 'right_brace' && tokens[i].type !== 'colon') i++;
  const inner = trimSpaces(tokens.slice(start + 1, i), delimiter);
  const close = i < tokens.length && tokens[i].type === 'right_brace' ? tokens[i] : undefined;
  if (close) {
    i++;
  } else {
    ctx.report(
      ErrorCode.ExpectedRightBrace,
      EXPECTED_RIGHT_BRACE,
      i < tokens.length ? rangeOf(tokens[i]) : pointAfter(tokens[i - 1]),
    );
  }

  // A comma or pipe other than the active delimiter still separates names.
  const isSeparator = (token: Token): boolean => {
    const found = delimiterOf(token);
    return found !== undefined && (found === delimiter || found !== 'tab');
  };
  for (const token of inner) {
    const found = delimiterOf(token);
    if (found !== undefined && found !== delimiter && found !== 'tab') {
      ctx.report(ErrorCode.MixedDelimiters, mixedDelimitersMessage(delimiter, found), rangeOf(token));
    }
  }

  const cells = splitCells(inner, isSeparator);
  const last = cells.length > 0 ? cells[cells.length - 1] : undefined;
  // `{a|b|}`: the delimiter may be repeated right before the brace.
  if (last && last.tokens.length === 0 && last.openedBy) cells.pop();

  const fields: string[] = [];
  if (cells.length === 0) {
    ctx.report(ErrorCode.ExpectedFieldName, EXPECTED_FIELD_NAME, rangeOf(close ?? open));
  }
  for (const cell of cells) {
    if (cell.tokens.length === 0) {
      ctx.report(ErrorCode.ExpectedFieldName, EXPECTED_FIELD_NAME, rangeOf(cellAnchor(cell) ?? open));
      continue;
    }
    fields.push(joinValue(cell.tokens));
  }
  return { fields, next: i };
}

/**
 * Parse an array header starting at the `[` at `start`, through its colon.
 * Returns undefined after reporting when the header cannot be used.
 */
function parseHeader(
  ctx: ArrayParser,
  tokens: readonly Token[],
  start: number,
): ArrayHeader | undefined {
  const open = tokens[start];
  let i = start + 1;
  let marker: Delimiter | undefined;

  const early = i < tokens.length ? delimiterOf(tokens[i]) : undefined;
  if (early) {
    ctx.report(ErrorCode.DelimiterMarkerMisplaced, misplacedMarkerMessage(early), rangeOf(tokens[i]));
    marker = early;
    i++;
  }
  i = skipBlanks(tokens, i);

  let declaredSize = 0;
  let sizeKnown = false;
  let sizeToken: Token | undefined;
  const candidate = i < tokens.length ? tokens[i] : undefined;
  if (candidate && (candidate.type === 'number' || candidate.type === 'string') && SIZE_RE.test(candidate.raw)) {
    declaredSize = Number.parseInt(candidate.raw, 10);
    sizeKnown = true;
    sizeToken = candidate;
    i++;
  } else {
    ctx.report(ErrorCode.InvalidArraySize, INVALID_ARRAY_SIZE, candidate ? rangeOf(candidate) : pointAfter(open));
    while (
      i < tokens.length
      && tokens[i].type !== 'right_bracket'
      && tokens[i].type !== 'left_brace'
      && tokens[i].type !== 'colon'
      && delimiterOf(tokens[i]) === undefined
    ) {
      i++;
    }
  }

  i = skipBlanks(tokens, i);
  const late = i < tokens.length ? delimiterOf(tokens[i]) : undefined;
  if (late) {
    marker = late;
    i = skipBlanks(tokens, i + 1);
  }

  let close: Token;
  if (i < tokens.length && tokens[i].type === 'right_bracket') {
    close = tokens[i];
    i++;
  } else {
    const last = tokens[i - 1];
    ctx.report(
      ErrorCode.ExpectedRightBracket,
      EXPECTED_RIGHT_BRACKET,
      i < tokens.length ? rangeOf(tokens[i]) : pointAfter(last),
    );
    const next = i < tokens.length ? tokens[i] : undefined;
    if (!next || (next.type !== 'colon' && next.type !== 'left_brace')) return undefined;
    close = last;
  }

  const delimiter = ctx.scopes.resolve(marker);
  let fields: string[] | undefined;
  i = skipSpaces(tokens, i);
  if (i < tokens.length && tokens[i].type === 'left_brace') {
    const parsed = parseFields(ctx, tokens, i, delimiter);
    fields = parsed.fields;
    i = skipSpaces(tokens, parsed.next);
  }

  if (i >= tokens.length || tokens[i].type !== 'colon') {
    ctx.report(
      ErrorCode.ExpectedColon,
      "Expected ':' after array header.",
      i < tokens.length ? rangeOf(tokens[i]) : pointAfter(tokens[i - 1]),
    );
    return undefined;
  }

  return {
    open,
    close,
    colon: tokens[i],
    declaredSize,
    sizeKnown,
    sizeToken,
    delimiter,
    fields,
    bodyStart: i + 1,
  };
}

function headerSpan(header: ArrayHeader): SourceSpan {
  return rangeOf(header.open, header.close);
}

/** Report a declared size over the limit; true when it was. */
function checkDeclaredSize(ctx: ArrayParser, header: ArrayHeader): boolean {
  if (header.declaredSize <= ctx.maxArraySize) return false;
  ctx.report(
    ErrorCode.ArraySizeExceeded,
    arraySizeExceededMessage(header.declaredSize, ctx.maxArraySize),
    header.sizeToken ? rangeOf(header.sizeToken) : headerSpan(header),
  );
  return true;
}

function cellNode(ctx: ArrayParser, cell: Cell, header: ArrayHeader): AST.ValueNode {
  if (cell.tokens.length === 0) {
    const anchor = cellAnchor(cell) ?? header.colon;
    return { type: 'null', raw: '', span: { start: startOf(anchor), end: startOf(anchor) } };
  }
  const stray = findMissingDelimiter(cell.tokens);
  if (stray) {
    ctx.report(ErrorCode.ExpectedDelimiter, missingDelimiterMessage(header.delimiter), rangeOf(stray));
  }
  return valueNode(cell.tokens);
}

function spanFrom(header: ArrayHeader, last: AST.Span | undefined): AST.Span {
  return { start: startOf(header.open), end: last ? last.end : endOf(header.colon) };
}

function lastSpan(nodes: readonly { readonly span: AST.Span }[]): AST.Span | undefined {
  return nodes.length > 0 ? nodes[nodes.length - 1].span : undefined;
}

/** Values on the header line and on deeper continuation lines. */
function parseInlineArray(
  ctx: ArrayParser,
  inline: readonly Token[],
  header: ArrayHeader,
  ownerIndent: number,
): AST.ArrayNode {
  const split = splitOn(header.delimiter);
  const sizeExceeded = checkDeclaredSize(ctx, header);
  const elements: AST.ValueNode[] = [];
  let overflow = false;
  let pendingEmpty: Cell | undefined;

  const addCells = (cells: readonly Cell[]): void => {
    for (const cell of cells) {
      if (overflow) return;
      if (elements.length >= ctx.maxArraySize) {
        overflow = true;
        if (sizeExceeded) return;
        const anchor = cellAnchor(cell) ?? header.colon;
        ctx.report(
          ErrorCode.ArraySizeExceeded,
          arraySizeExceededMessage(elements.length + 1, ctx.maxArraySize),
          rangeOf(anchor),
        );
        return;
      }
      elements.push(cellNode(ctx, cell, header));
    }
  };

  // A trailing delimiter before a continuation line does not add an element.
  const addLine = (tokens: readonly Token[]): void => {
    const cells = splitCells(trimSpaces(tokens, header.delimiter), split);
    pendingEmpty = undefined;
    const last = cells.length > 0 ? cells[cells.length - 1] : undefined;
    if (last && last.tokens.length === 0 && last.openedBy) {
      pendingEmpty = cells.pop();
    }
    addCells(cells);
  };

  addLine(inline);

  for (let next = ctx.peekLine(); next && next.indent > ownerIndent; next = ctx.peekLine()) {
    if (!overflow) addLine(next.tokens);
    ctx.nextLine();
  }
  if (pendingEmpty) addCells([pendingEmpty]);

  if (!sizeExceeded && !overflow && header.sizeKnown && elements.length !== header.declaredSize) {
    ctx.report(
      ErrorCode.ArraySizeMismatch,
      arraySizeMismatchMessage(header.declaredSize, elements.length),
      headerSpan(header),
    );
  }

  return {
    type: 'array',
    declaredSize: header.declaredSize,
    delimiter: header.delimiter,
    form: 'inline',
    elements,
    span: spanFrom(header, lastSpan(elements)),
  };
}

function parseObjectItem(ctx: ArrayParser, line: SourceLine, keyIndex: number): AST.ObjectNode {
  const key = line.tokens[keyIndex];
  // Sibling fields line up with the first key, not with the dash.
  const fieldIndent = key.column - 1;
  const properties: AST.PropertyNode[] = [];
  const first = ctx.parseProperty(line, keyIndex, fieldIndent);
  if (first) properties.push(first);
  properties.push(...ctx.parseBlock(line.indent, fieldIndent));
  const last = properties.length > 0 ? properties[properties.length - 1] : undefined;
  return {
    type: 'object',
    properties,
    span: { start: startOf(key), end: last ? last.span.end : endOf(key) },
  };
}

/** One `- ...` line of an expanded array. Always consumes the line. */
function parseListItem(ctx: ArrayParser, line: SourceLine): AST.ValueNode {
  const tokens = line.tokens;
  const dash = firstToken(line);
  const i = skipSpaces(tokens, 1);

  if (i >= tokens.length) {
    ctx.nextLine();
    const next = ctx.peekLine();
    if (!next || next.indent <= line.indent) return emptyObjectAfter(dash);
    const properties = ctx.parseBlock(line.indent, next.indent);
    const last = properties.length > 0 ? properties[properties.length - 1] : undefined;
    return {
      type: 'object',
      properties,
      span: { start: startOf(dash), end: last ? last.span.end : endOf(dash) },
    };
  }

  const head = tokens[i];
  if (head.type === 'left_bracket') {
    return parseArrayValue(ctx, line, i, line.indent) ?? nullAfter(dash);
  }

  if (ctx.isKeyToken(head)) {
    const j = skipSpaces(tokens, i + 1);
    if (j < tokens.length && (tokens[j].type === 'colon' || tokens[j].type === 'left_bracket')) {
      return parseObjectItem(ctx, line, i);
    }
  }

  ctx.nextLine();
  return valueNode(trimSpaces(tokens.slice(i)));
}

function parseExpandedArray(ctx: ArrayParser, header: ArrayHeader, ownerIndent: number): AST.ArrayNode {
  const sizeExceeded = checkDeclaredSize(ctx, header);
  const elements: AST.ValueNode[] = [];
  let itemIndent: number | undefined;
  let stopped = false;

  for (let line = ctx.peekLine(); line && line.indent > ownerIndent; line = ctx.peekLine()) {
    const before = ctx.lineIndex();
    if (stopped) {
      ctx.nextLine();
      continue;
    }
    itemIndent ??= line.indent;
    if (line.indent !== itemIndent) {
      ctx.report(
        ErrorCode.UnexpectedIndentation,
        unexpectedIndentationMessage(itemIndent, line.indent),
        lineSpan(line),
      );
    }
    if (!isListMarker(line)) {
      ctx.report(ErrorCode.ExpectedListItem, EXPECTED_LIST_ITEM, rangeOf(firstToken(line)));
      ctx.recoverToIndent(line.indent);
      continue;
    }
    if (elements.length >= ctx.maxArraySize) {
      if (!sizeExceeded) {
        ctx.report(
          ErrorCode.ArraySizeExceeded,
          arraySizeExceededMessage(elements.length + 1, ctx.maxArraySize),
          lineSpan(line),
        );
      }
      stopped = true;
      continue;
    }
    const current = line;
    const item = ctx.withDepth(rangeOf(firstToken(current)), () => parseListItem(ctx, current));
    if (item === undefined) {
      stopped = true;
      continue;
    }
    elements.push(item);
    ctx.ensureProgress(before, 'an expanded array item');
  }

  if (!stopped && !sizeExceeded && header.sizeKnown && elements.length !== header.declaredSize) {
    ctx.report(
      ErrorCode.ArraySizeMismatch,
      arraySizeMismatchMessage(header.declaredSize, elements.length),
      headerSpan(header),
    );
  }

  return {
    type: 'array',
    declaredSize: header.declaredSize,
    delimiter: header.delimiter,
    form: 'expanded',
    elements,
    span: spanFrom(header, lastSpan(elements)),
  };
}

function parseRow(
  ctx: ArrayParser,
  line: SourceLine,
  header: ArrayHeader,
  fields: readonly string[],
  rowNumber: number,
): AST.ValueNode[] {
  const cells = splitCells(line.tokens, splitOn(header.delimiter));
  const row = cells.map(cell => cellNode(ctx, cell, header));
  if (row.length !== fields.length) {
    ctx.report(
      ErrorCode.TableRowFieldMismatch,
      tableRowFieldMismatchMessage(rowNumber, fields.length, row.length),
      lineSpan(line),
    );
  }
  ctx.nextLine();
  return row;
}

function parseTable(
  ctx: ArrayParser,
  line: SourceLine,
  header: ArrayHeader,
  fields: readonly string[],
  ownerIndent: number,
): AST.TableArrayNode {
  const trailing = trimSpaces(line.tokens.slice(header.bodyStart));
  if (trailing.length > 0) {
    ctx.report(
      ErrorCode.UnexpectedToken,
      contentAfterTableHeaderMessage(),
      rangeOf(trailing[0], trailing[trailing.length - 1]),
    );
  }
  ctx.nextLine();

  const sizeExceeded = checkDeclaredSize(ctx, header);
  const rows: AST.ValueNode[][] = [];
  let rowIndent: number | undefined;
  let stopped = false;
  let lastRowEnd: AST.SourceLocation | undefined;

  for (let next = ctx.peekLine(); next && next.indent > ownerIndent; next = ctx.peekLine()) {
    const before = ctx.lineIndex();
    if (stopped) {
      ctx.nextLine();
      continue;
    }
    rowIndent ??= next.indent;
    if (next.indent !== rowIndent) {
      ctx.report(
        ErrorCode.UnexpectedIndentation,
        unexpectedIndentationMessage(rowIndent, next.indent),
        lineSpan(next),
      );
    }
    if (rows.length >= ctx.maxArraySize) {
      if (!sizeExceeded) {
        ctx.report(
          ErrorCode.ArraySizeExceeded,
          arraySizeExceededMessage(rows.length + 1, ctx.maxArraySize),
          lineSpan(next),
        );
      }
      stopped = true;
      continue;
    }
    const current = next;
    const row = ctx.withDepth(lineSpan(current), () => parseRow(ctx, current, header, fields, rows.length + 1));
    if (row === undefined) {
      stopped = true;
      continue;
    }
    rows.push(row);
    lastRowEnd = endOf(current.tokens[current.tokens.length - 1]);
    ctx.ensureProgress(before, 'a table row');
  }

  if (!stopped && !sizeExceeded && header.sizeKnown && rows.length !== header.declaredSize) {
    ctx.report(
      ErrorCode.TableSizeMismatch,
      tableSizeMismatchMessage(header.declaredSize, rows.length),
      headerSpan(header),
    );
  }

  return {
    type: 'table',
    declaredSize: header.declaredSize,
    delimiter: header.delimiter,
    fields,
    rows,
    span: { start: startOf(header.open), end: lastRowEnd ?? spanAfter(header.colon).end },
  };
}

/**
 * Parse an array or table whose header starts at `tokens[start]` of `line`.
 * `ownerIndent` is the indentation of the owning property or list item;
 * body lines must be deeper. Consumes the header line and the body. Returns
 * undefined after reporting and recovering when the header is unusable.
 */
export function parseArrayValue(
  ctx: ArrayParser,
  line: SourceLine,
  start: number,
  ownerIndent: number,
): AST.ArrayNode | AST.TableArrayNode | undefined {
  const header = parseHeader(ctx, line.tokens, start);
  if (!header) {
    ctx.recoverToIndent(line.indent);
    return undefined;
  }
  const fields = header.fields;
  return ctx.scopes.within(header.delimiter, () => {
    if (fields) return parseTable(ctx, line, header, fields, ownerIndent);
    const inline = line.tokens.slice(header.bodyStart);
    ctx.nextLine();
    const next = ctx.peekLine();
    if (trimSpaces(inline).length === 0 && next && next.indent > ownerIndent && isListMarker(next)) {
      return parseExpandedArray(ctx, header, ownerIndent);
    }
    return parseInlineArray(ctx, inline, header, ownerIndent);
  });
}
