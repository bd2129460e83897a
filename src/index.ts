export { parse, tryParse } from './toon';
export type { TryParseResult } from './toon';
export type { ToonParseResult } from './result';
export {
  scan,
  tokenize,
  isValueToken,
  isStructuralToken,
  isLayoutToken,
  isKeywordToken,
} from './tokenizer';
export type { Token, TokenType, TokenizeOptions, ScanResult } from './tokenizer';
export { Parser } from './parser';
export { resolveOptions } from './config';
export type { ToonParserOptions, ResolvedOptions } from './config';
export { DEFAULT_PROFILE, UNLIMITED_PROFILE, PARSER_PROFILES } from './presets/profiles';
export type { ParserProfile, ParserLimits, ProfileName } from './presets/profiles';
export {
  DEFAULT_MAX_INPUT_SIZE,
  DEFAULT_MAX_TOKEN_COUNT,
  DEFAULT_MAX_STRING_LENGTH,
  DEFAULT_MAX_NESTING_DEPTH,
  DEFAULT_MAX_ARRAY_SIZE,
} from './constants';
export { ErrorCode, ToonInputError, getErrorCategory } from './errors';
export type { ToonError, ErrorCategory } from './errors';
export type { Delimiter } from './delimiters';
export { formatToonError, formatErrorExcerpt } from './diagnostics';
export { visitNode } from './visitor';
export type { AstVisitor, VisitContext, TypeHandlers } from './visitor';
export { getAllProperties, findProperty, getPropertyDepth, toDebugString } from './query';
export type {
  Node,
  ValueNode,
  PrimitiveNode,
  DocumentNode,
  PropertyNode,
  ObjectNode,
  ArrayNode,
  ArrayForm,
  TableArrayNode,
  StringNode,
  NumberNode,
  BooleanNode,
  NullNode,
  Span,
  SourceLocation,
} from './ast';

// Injected at build time by tsup's `define` option from package.json.
declare const __TOONPARSE_VERSION__: string | undefined;
export const version: string =
  typeof __TOONPARSE_VERSION__ !== 'undefined'
    ? __TOONPARSE_VERSION__
    : '0.0.0-dev';
