import type { Token } from './tokenizer';

export type Delimiter = 'comma' | 'tab' | 'pipe';

/** Delimiter used when no enclosing array or table declares one. */
export const DEFAULT_DELIMITER: Delimiter = 'comma';

/**
 * The delimiter a token stands for, if any. Tabs are only ever single-tab
 * whitespace tokens, so a run of spaces never counts.
 */
export function delimiterOf(token: Token): Delimiter | undefined {
  if (token.type === 'comma') return 'comma';
  if (token.type === 'pipe') return 'pipe';
  if (token.type === 'whitespace' && token.raw === '\t') return 'tab';
  return undefined;
}

/**
 * Stack of active delimiters, one entry per open array or table header.
 *
 * A header without an explicit marker inherits the innermost entry, so a
 * delimiter flows through nested arrays and tables and skips plain objects,
 * which never push.
 */
export class DelimiterScopes {
  private readonly stack: Delimiter[] = [];

  get active(): Delimiter {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : DEFAULT_DELIMITER;
  }

  /** Resolve the delimiter for a header: its marker, or the inherited one. */
  resolve(marker: Delimiter | undefined): Delimiter {
    return marker ?? this.active;
  }

  /** Run `fn` with `delimiter` pushed, popping it afterwards even on throw. */
  within<T>(delimiter: Delimiter, fn: () => T): T {
    this.stack.push(delimiter);
    try {
      return fn();
    } finally {
      this.stack.pop();
    }
  }
}

export interface LineIndent {
  /** Count of leading space and tab characters. */
  readonly width: number;
  /** True when the leading run contains both spaces and tabs. */
  readonly mixed: boolean;
}

/** Measure leading indentation from raw text that starts at a line start. */
export function measureIndent(leading: string): LineIndent {
  let width = 0;
  let spaces = false;
  let tabs = false;
  for (const ch of leading) {
    if (ch === ' ') spaces = true;
    else if (ch === '\t') tabs = true;
    else break;
    width++;
  }
  return { width, mixed: spaces && tabs };
}
