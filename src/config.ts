import type { ToonError } from './errors';
import {
  DEFAULT_PROFILE,
  LIMIT_KEYS,
  PARSER_PROFILES,
  assertLimit,
  type ParserLimits,
  type ParserProfile,
  type ProfileName,
} from './presets/profiles';

/**
 * Options for {@link parse}, {@link tryParse} and {@link tokenize}.
 *
 * Every limit falls back to the selected profile, which is `default` unless
 * `profile` says otherwise.
 */
export interface ToonParserOptions {
  /**
   * Base preset for limits not given explicitly.
   *
   * @default 'default'
   */
  profile?: ProfileName | ParserProfile;

  /**
   * Maximum allowed input size in bytes (UTF-8).
   *
   * @default 10_485_760 (10 MB)
   */
  maxInputSize?: number;

  /**
   * Maximum token count. The lexer stops at the limit and the parser runs
   * over the truncated stream.
   *
   * @default 1_000_000
   */
  maxTokenCount?: number;

  /**
   * Maximum decoded length of a single string or identifier.
   *
   * @default 65_536
   */
  maxStringLength?: number;

  /**
   * Maximum nesting depth of objects, expanded-array items and table rows.
   *
   * @default 100
   */
  maxNestingDepth?: number;

  /**
   * Maximum declared or collected element count of one array or table.
   *
   * @default 1_000_000
   */
  maxArraySize?: number;

  /**
   * Optional callback invoked for every recorded error, in encounter order,
   * as soon as it is recorded.
   */
  onError?: (error: ToonError) => void;
}

export interface ResolvedOptions extends ParserLimits {
  readonly onError?: (error: ToonError) => void;
}

/**
 * Merge caller options over a profile.
 *
 * @throws {RangeError} When a limit is not a positive integer.
 */
export function resolveOptions(options: ToonParserOptions = {}): ResolvedOptions {
  const base = typeof options.profile === 'string'
    ? PARSER_PROFILES[options.profile]
    : options.profile ?? DEFAULT_PROFILE;
  const resolved: ResolvedOptions = {
    maxInputSize: options.maxInputSize ?? base.maxInputSize,
    maxTokenCount: options.maxTokenCount ?? base.maxTokenCount,
    maxStringLength: options.maxStringLength ?? base.maxStringLength,
    maxNestingDepth: options.maxNestingDepth ?? base.maxNestingDepth,
    maxArraySize: options.maxArraySize ?? base.maxArraySize,
    onError: options.onError,
  };
  for (const key of LIMIT_KEYS) assertLimit(key, resolved[key]);
  return Object.freeze(resolved);
}
