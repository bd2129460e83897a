import type * as AST from './ast';
import { createError, type ErrorCode, type ToonError } from './errors';
import type { Token } from './tokenizer';

/**
 * Outcome of one parse. Always carries a document, possibly partial; it is
 * deeply frozen.
 */
export interface ToonParseResult {
  readonly document: AST.DocumentNode;
  /** Every recorded error in encounter order; lexer errors come first. */
  readonly errors: readonly ToonError[];
  /** The full token stream the document was built from. */
  readonly tokens: readonly Token[];
  /** True exactly when `errors` is empty. */
  readonly isSuccess: boolean;
}

// Iterative so deep documents cannot overflow the call stack here.
function deepFreeze<T extends object>(root: T): T {
  const pending: object[] = [root];
  while (pending.length > 0) {
    const value = pending.pop();
    if (value === undefined || Object.isFrozen(value)) continue;
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      if (typeof child === 'object' && child !== null) pending.push(child);
    }
  }
  return root;
}

export function createResult(
  document: AST.DocumentNode,
  errors: readonly ToonError[],
  tokens: readonly Token[],
): ToonParseResult {
  return deepFreeze({
    document,
    errors: errors.slice(),
    tokens: tokens.slice(),
    isSuccess: errors.length === 0,
  });
}

const EMPTY_SPAN: AST.Span = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

/** Result for input that could not be parsed at all. */
export function createFailureResult(code: ErrorCode, message: string): ToonParseResult {
  const error = createError(code, message, { position: 0, length: 0, line: 1, column: 1 });
  const document: AST.DocumentNode = { type: 'document', properties: [], span: EMPTY_SPAN };
  return createResult(document, [error], []);
}
