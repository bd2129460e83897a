import { resolveOptions, type ToonParserOptions } from './config';
import { ToonInputError } from './errors';
import { guardSource } from './guard';
import { Parser } from './parser';
import { createFailureResult, createResult, type ToonParseResult } from './result';
import { scan } from './tokenizer';

export interface TryParseResult {
  /** False only when the source was missing or larger than `maxInputSize`. */
  readonly succeeded: boolean;
  readonly result: ToonParseResult;
}

/**
 * Parse TOON text into a position-aware document.
 *
 * Recoverable problems (bad syntax, size mismatches, exceeded depth or array
 * limits) never throw: they are collected on the result, and the document
 * holds everything that could still be parsed.
 *
 * @param source - TOON text. `null` or `undefined` is rejected.
 * @param options - Resource limits and an optional `onError` listener.
 * @throws {ToonInputError} When the source is missing (`TOON9007`) or larger
 *   than `maxInputSize` bytes (`TOON9006`).
 * @throws {RangeError} When an option limit is not a positive integer.
 *
 * @example
 * ```typescript
 * import { parse } from 'toonparse';
 *
 * const result = parse('name: Ada\nage 36\ncity: London');
 * result.isSuccess;                 // false
 * result.errors[0].line;            // 2
 * result.document.properties.length // 2 (name, city)
 * ```
 */
export function parse(source: string | null | undefined, options: ToonParserOptions = {}): ToonParseResult {
  const resolved = resolveOptions(options);
  const text = guardSource(source, resolved.maxInputSize);
  const { tokens, errors } = scan(text, resolved);
  const parser = new Parser(tokens, resolved, errors);
  const document = parser.parseDocument();
  return createResult(document, parser.getErrors(), tokens);
}

/**
 * Like {@link parse}, but turns the fail-fast conditions into a failed
 * result instead of throwing.
 *
 * @example
 * ```typescript
 * import { tryParse } from 'toonparse';
 *
 * const { succeeded, result } = tryParse(undefined);
 * succeeded;              // false
 * result.errors[0].code;  // 'TOON9007'
 * ```
 */
export function tryParse(source: string | null | undefined, options: ToonParserOptions = {}): TryParseResult {
  try {
    return { succeeded: true, result: parse(source, options) };
  } catch (err) {
    if (err instanceof ToonInputError) {
      return { succeeded: false, result: createFailureResult(err.code, err.message) };
    }
    throw err;
  }
}
