import {
  DEFAULT_MAX_ARRAY_SIZE,
  DEFAULT_MAX_INPUT_SIZE,
  DEFAULT_MAX_NESTING_DEPTH,
  DEFAULT_MAX_STRING_LENGTH,
  DEFAULT_MAX_TOKEN_COUNT,
  UNLIMITED,
} from '../constants';

export type ProfileName = 'default' | 'unlimited';

/**
 * A complete, frozen set of resource limits.
 *
 * Profiles are plain data and can be shared freely between parses.
 */
export interface ParserProfile {
  readonly name: ProfileName;
  /** Maximum UTF-8 byte length of the source text. */
  readonly maxInputSize: number;
  /** Maximum number of tokens the lexer emits before truncating. */
  readonly maxTokenCount: number;
  /** Maximum decoded length of one string or identifier literal. */
  readonly maxStringLength: number;
  /** Maximum depth of nested objects, list items and table rows. */
  readonly maxNestingDepth: number;
  /** Maximum declared or collected size of one array or table. */
  readonly maxArraySize: number;
}

export type ParserLimits = Omit<ParserProfile, 'name'>;

export const LIMIT_KEYS: readonly (keyof ParserLimits)[] = Object.freeze([
  'maxInputSize',
  'maxTokenCount',
  'maxStringLength',
  'maxNestingDepth',
  'maxArraySize',
]);

/**
 * Ensure a limit is a positive integer.
 *
 * @throws {RangeError} When the value is not an integer of at least 1.
 */
export function assertLimit(key: keyof ParserLimits, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${key} must be a positive integer, got ${String(value)}`);
  }
}

function makeProfile(name: ProfileName, limits: ParserLimits): ParserProfile {
  for (const key of LIMIT_KEYS) assertLimit(key, limits[key]);
  const profile: ParserProfile = { name, ...limits };
  return Object.freeze(profile);
}

/** Conservative limits suitable for untrusted input. */
export const DEFAULT_PROFILE: ParserProfile = makeProfile('default', {
  maxInputSize: DEFAULT_MAX_INPUT_SIZE,
  maxTokenCount: DEFAULT_MAX_TOKEN_COUNT,
  maxStringLength: DEFAULT_MAX_STRING_LENGTH,
  maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
  maxArraySize: DEFAULT_MAX_ARRAY_SIZE,
});

/** Every limit at the largest safe integer, for trusted batch input. */
export const UNLIMITED_PROFILE: ParserProfile = makeProfile('unlimited', {
  maxInputSize: UNLIMITED,
  maxTokenCount: UNLIMITED,
  maxStringLength: UNLIMITED,
  maxNestingDepth: UNLIMITED,
  maxArraySize: UNLIMITED,
});

export const PARSER_PROFILES: Readonly<Record<ProfileName, ParserProfile>> = Object.freeze({
  default: DEFAULT_PROFILE,
  unlimited: UNLIMITED_PROFILE,
});
