// Shared limits for the source guard, lexer and parser.
// Keep these centralized so presets and option defaults stay in sync.

// 10MB default safety ceiling for input payloads.
export const DEFAULT_MAX_INPUT_SIZE = 10_485_760;

// Lexer hard limits for DoS protection.
export const DEFAULT_MAX_TOKEN_COUNT = 1_000_000;
export const DEFAULT_MAX_STRING_LENGTH = 65_536;

// Parser limits.
export const DEFAULT_MAX_NESTING_DEPTH = 100;
export const DEFAULT_MAX_ARRAY_SIZE = 1_000_000;

// Ceiling used by the unlimited preset.
export const UNLIMITED = Number.MAX_SAFE_INTEGER;

// Indentation width assumed when converting whitespace counts to levels.
export const INDENT_WIDTH = 2;
