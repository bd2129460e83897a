import type * as AST from './ast';
import { resolveOptions, type ResolvedOptions, type ToonParserOptions } from './config';
import { DelimiterScopes } from './delimiters';
import { ErrorCode, ErrorCollector, type SourceSpan, type ToonError } from './errors';
import {
  EMPTY_DOCUMENT,
  INCONSISTENT_INDENTATION,
  expectedPropertyKeyMessage,
  loopGuardMessage,
  missingColonMessage,
  nestingDepthMessage,
  unexpectedEndMessage,
  unexpectedIndentationMessage,
  unexpectedTokenMessage,
} from './hints';
import { isStructuralToken, isValueToken, type Token } from './tokenizer';
import { parseArrayValue, type ArrayParser } from './parser/arrays';
import { indentSpan, lineSpan, splitLines, type SourceLine } from './parser/lines';
import {
  emptyObjectAfter,
  endOf,
  joinValue,
  nullAfter,
  pointAfter,
  rangeOf,
  skipSpaces,
  startOf,
  trimSpaces,
  valueNode,
} from './parser/values';

const EOF_TOKEN: Token = Object.freeze({
  type: 'eof',
  value: '',
  raw: '',
  position: 0,
  line: 1,
  column: 1,
  length: 0,
});

/**
 * Resilient recursive-descent TOON parser.
 *
 * Consumes the tokens produced by {@link tokenize} (or {@link scan}) and builds
 * a {@link AST.DocumentNode}. Every problem is recorded as a {@link ToonError}
 * and parsing resumes at the next line indented at or below the construct that
 * failed, so a document is always returned.
 *
 * One instance parses one token list; create a new one per parse.
 *
 * @example
 * import { scan, Parser } from 'toonparse';
 *
 * const { tokens, errors } = scan('name: Ada\nage: 36');
 * const parser = new Parser(tokens, {}, errors);
 * const document = parser.parseDocument();
 * // document.properties.length === 2, parser.getErrors() is empty
 */
export class Parser {
  private readonly tokens: readonly Token[];
  private readonly lines: SourceLine[];
  private readonly options: ResolvedOptions;
  private readonly errors: ErrorCollector;
  private readonly scopes = new DelimiterScopes();
  private cursor: number = 0;
  private depth: number = 0;

  constructor(tokens: readonly Token[], options: ToonParserOptions = {}, lexErrors: readonly ToonError[] = []) {
    this.tokens = tokens;
    this.options = resolveOptions(options);
    this.errors = new ErrorCollector(this.options.onError);
    this.errors.adopt(lexErrors);
    this.lines = splitLines(tokens);
  }

  /** Errors recorded so far, lexer errors passed to the constructor first. */
  getErrors(): ToonError[] {
    return this.errors.toArray();
  }

  /**
   * Parse all top-level properties. The top-level block's indentation is the
   * indentation of the first content line.
   */
  parseDocument(): AST.DocumentNode {
    for (const line of this.lines) {
      if (line.mixedIndent) {
        this.report(ErrorCode.InconsistentIndentation, INCONSISTENT_INDENTATION, indentSpan(line));
      }
    }
    if (this.lines.length === 0) this.checkBlankDocument();
    const properties = this.lines.length > 0 ? this.parseBlock(-1, this.lines[0].indent) : [];
    const eof = this.tokens.length > 0 ? this.tokens[this.tokens.length - 1] : EOF_TOKEN;
    return {
      type: 'document',
      properties,
      span: { start: { line: 1, column: 1, offset: 0 }, end: endOf(eof) },
    };
  }

  // Whitespace-only input is reported; empty and comment-only input is not.
  private checkBlankDocument(): void {
    const layout = this.tokens.filter(t => t.type !== 'eof' && t.type !== 'dedent');
    if (layout.length === 0 || layout.some(t => t.type === 'comment')) return;
    const first = layout[0];
    const last = layout[layout.length - 1];
    this.report(ErrorCode.EmptyDocument, EMPTY_DOCUMENT, {
      position: first.position,
      length: last.position + last.length - first.position,
      line: first.line,
      column: first.column,
    });
  }

  private report(code: ErrorCode, message: string, at: SourceSpan): void {
    this.errors.report(code, message, at);
  }

  private peekLine(): SourceLine | undefined {
    return this.cursor < this.lines.length ? this.lines[this.cursor] : undefined;
  }

  private nextLine(): void {
    this.cursor++;
  }

  /**
   * The single recovery routine: drop the current line and every following
   * line indented deeper than `indent`.
   */
  private recoverToIndent(indent: number): void {
    this.cursor++;
    while (this.cursor < this.lines.length && this.lines[this.cursor].indent > indent) {
      this.cursor++;
    }
  }

  private ensureProgress(before: number, what: string): void {
    if (this.cursor !== before) return;
    const line = this.peekLine();
    if (line) this.report(ErrorCode.InfiniteLoopDetected, loopGuardMessage(what), lineSpan(line));
    this.cursor++;
  }

  /**
   * Run `fn` one nesting level deeper. Past `maxNestingDepth` the subtree is
   * not entered: the error is recorded at `at` and undefined is returned.
   */
  private withDepth<T>(at: SourceSpan, fn: () => T): T | undefined {
    this.depth++;
    if (this.depth > this.options.maxNestingDepth) {
      this.depth--;
      this.report(ErrorCode.NestingDepthExceeded, nestingDepthMessage(this.options.maxNestingDepth), at);
      return undefined;
    }
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  private isKeyToken(token: Token): boolean {
    return isValueToken(token.type) || token.type === 'invalid';
  }

  /**
   * Parse consecutive properties deeper than `parentIndent`. Lines whose
   * indentation differs from `blockIndent` are reported and still parsed as
   * members, which resynchronizes the block at its own level.
   */
  private parseBlock(parentIndent: number, blockIndent: number): AST.PropertyNode[] {
    const properties: AST.PropertyNode[] = [];
    for (let line = this.peekLine(); line && line.indent > parentIndent; line = this.peekLine()) {
      if (line.indent !== blockIndent) {
        this.report(
          ErrorCode.UnexpectedIndentation,
          unexpectedIndentationMessage(blockIndent, line.indent),
          indentSpan(line),
        );
      }
      const before = this.cursor;
      const property = this.parseProperty(line, 0, line.indent);
      if (property) properties.push(property);
      this.ensureProgress(before, 'a property');
    }
    return properties;
  }

  /**
   * Parse `key: value`, `key:` + block, or `key[N]...:` starting at
   * `line.tokens[start]`. `indent` is the property's own level (a list item's
   * first field sits at its key column). Consumes the line and its body.
   */
  private parseProperty(line: SourceLine, start: number, indent: number): AST.PropertyNode | undefined {
    const tokens = line.tokens;
    const key = tokens[start];
    if (!this.isKeyToken(key)) {
      this.report(ErrorCode.ExpectedPropertyKey, expectedPropertyKeyMessage(key.type), rangeOf(key));
      this.recoverToIndent(line.indent);
      return undefined;
    }

    const i = skipSpaces(tokens, start + 1);
    const next = i < tokens.length ? tokens[i] : undefined;

    if (next?.type === 'left_bracket') {
      const value = parseArrayValue(this.createArrayContext(), line, i, indent);
      return value ? this.property(key, value, indent) : undefined;
    }

    if (next?.type !== 'colon') {
      this.reportMissingColon(tokens, start, next);
      this.recoverToIndent(line.indent);
      return undefined;
    }

    const rest = trimSpaces(tokens.slice(i + 1));
    this.nextLine();
    if (rest.length > 0) {
      return this.property(key, this.parseInlineValue(rest), indent);
    }
    return this.property(key, this.parseObjectValue(key, next, indent), indent);
  }

  private property(key: Token, value: AST.ValueNode, indent: number): AST.PropertyNode {
    return {
      type: 'property',
      key: key.value,
      value,
      indent,
      span: { start: startOf(key), end: value.span.end },
    };
  }

  private reportMissingColon(tokens: readonly Token[], keyIndex: number, offending: Token | undefined): void {
    const key = tokens[keyIndex];
    let keyText = key.value;
    // `first name: Ada` reads as an unquoted multi-word key.
    const colonIndex = tokens.findIndex((t, j) => j > keyIndex && t.type === 'colon');
    if (colonIndex > 0) {
      const words = tokens.slice(keyIndex, colonIndex);
      if (words.every(t => isValueToken(t.type) || t.type === 'whitespace')) {
        keyText = joinValue(trimSpaces(words));
      }
    }
    this.report(
      ErrorCode.ExpectedColon,
      missingColonMessage(keyText),
      offending ? rangeOf(offending) : pointAfter(key),
    );
  }

  /**
   * Everything after the colon up to the comment. One token keeps its kind;
   * several become one string with the source spacing kept.
   */
  private parseInlineValue(tokens: readonly Token[]): AST.PrimitiveNode {
    const first = tokens[0];
    if (isStructuralToken(first.type)) {
      this.report(ErrorCode.UnexpectedToken, unexpectedTokenMessage(first.type, 'at the start of a value'), rangeOf(first));
    }
    return valueNode(tokens);
  }

  /** Block of deeper properties after `key:`; the key line is already consumed. */
  private parseObjectValue(key: Token, colon: Token, indent: number): AST.ValueNode {
    const next = this.peekLine();
    if (!next) {
      this.report(ErrorCode.UnexpectedEndOfInput, unexpectedEndMessage(key.value), pointAfter(colon));
      return emptyObjectAfter(colon);
    }
    if (next.indent <= indent) return emptyObjectAfter(colon);

    const properties = this.withDepth(rangeOf(key), () => this.parseBlock(indent, next.indent));
    if (properties === undefined) {
      while (this.cursor < this.lines.length && this.lines[this.cursor].indent > indent) this.cursor++;
      return nullAfter(colon);
    }
    const last = properties.length > 0 ? properties[properties.length - 1] : undefined;
    if (!last) return emptyObjectAfter(colon);
    return {
      type: 'object',
      properties,
      span: { start: properties[0].span.start, end: last.span.end },
    };
  }

  private createArrayContext(): ArrayParser {
    return {
      scopes: this.scopes,
      maxArraySize: this.options.maxArraySize,
      report: (code, message, at) => this.report(code, message, at),
      peekLine: () => this.peekLine(),
      nextLine: () => this.nextLine(),
      lineIndex: () => this.cursor,
      recoverToIndent: (indent) => this.recoverToIndent(indent),
      ensureProgress: (before, what) => this.ensureProgress(before, what),
      withDepth: <T>(at: SourceSpan, fn: () => T) => this.withDepth(at, fn),
      isKeyToken: (token) => this.isKeyToken(token),
      parseProperty: (line, start, indent) => this.parseProperty(line, start, indent),
      parseBlock: (parentIndent, blockIndent) => this.parseBlock(parentIndent, blockIndent),
    };
  }
}
