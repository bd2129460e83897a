import type { Delimiter } from './delimiters';
import type { TokenType } from './tokenizer';

// Message and hint text for every recorded error. Keep wording here so
// lexer and parser call sites only pass numbers and token kinds.

const MAX_QUOTED_KEY_LENGTH = 40;

/** Format a count with thousands separators (10485760 -> "10,485,760"). */
export function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function plural(n: number, word: string): string {
  return `${formatCount(n)} ${word}${n === 1 ? '' : 's'}`;
}

function codePointLabel(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

function hasControlChars(text: string): boolean {
  CONTROL_CHARS.lastIndex = 0;
  return CONTROL_CHARS.test(text);
}

// Keys come from user input; keep them short and printable in messages.
function quoteKey(key: string): string {
  const shown = key.length > MAX_QUOTED_KEY_LENGTH
    ? key.slice(0, MAX_QUOTED_KEY_LENGTH) + '…'
    : key;
  return `'${shown.replace(CONTROL_CHARS, codePointLabel)}'`;
}

export function delimiterName(delimiter: Delimiter): string {
  switch (delimiter) {
    case 'comma': return 'comma (,)';
    case 'tab': return 'tab character';
    case 'pipe': return 'pipe (|)';
  }
}

// Lexer

export function unterminatedStringMessage(quote: string, scannedLength: number, atLineEnd: boolean): string {
  let hint: string;
  if (scannedLength > 100) {
    hint = `Very long string (${formatCount(scannedLength)} characters). Check whether the closing ${quote} was left out far from the opening quote.`;
  } else if (atLineEnd) {
    hint = `Strings must be closed on the line they start on. Add a closing ${quote}, or use \\n for a line break.`;
  } else {
    hint = `Add a closing ${quote} before the end of the input.`;
  }
  return `Unterminated string. ${hint}`;
}

export function invalidEscapeMessage(sequence: string): string {
  return `Invalid escape sequence '${sequence}'. Valid escape sequences are \\n, \\r, \\t, \\\\, \\" and \\'.`;
}

export function invalidCharacterMessage(ch: string): string {
  return hasControlChars(ch)
    ? `Unexpected control character ${codePointLabel(ch)}.`
    : `Unexpected character '${ch}' (${codePointLabel(ch)}). Quote the value if the character is part of it.`;
}

export function tokenCountMessage(max: number): string {
  return `Token count exceeds maximum of ${formatCount(max)}. Use the maxTokenCount option to increase the limit for large inputs.`;
}

export type LiteralKind = 'String' | 'Unquoted string' | 'Identifier';

export function stringLengthMessage(kind: LiteralKind, length: number, max: number): string {
  return `${kind} length of ${formatCount(length)} characters exceeds maximum of ${formatCount(max)}. Use the maxStringLength option to increase the limit.`;
}

// Structure

export function unexpectedTokenHint(type: TokenType): string {
  switch (type) {
    case 'left_bracket':
      return "Found '[' in an unexpected position. Array size notation [n] must come immediately after the property key.";
    case 'left_brace':
      return "Found '{' in an unexpected position. A field list {fields} must come after the array size [n].";
    case 'colon':
      return "Found an extra ':'. Each property has exactly one colon separator.";
    case 'comma':
      return "Found ',' outside of an array. Commas are only used as array delimiters.";
    case 'pipe':
      return "Found '|' outside of an array. Pipes are only used as delimiters in arrays declared with [n|].";
    case 'right_bracket':
      return "Found ']' without a matching '['.";
    case 'right_brace':
      return "Found '}' without a matching '{'.";
    default:
      return `Unexpected ${type.replace('_', ' ')} token.`;
  }
}

export function expectedPropertyKeyMessage(found: TokenType): string {
  return `Expected property key. ${unexpectedTokenHint(found)}`;
}

export function missingColonMessage(key: string): string {
  let hint: string;
  if (key.endsWith(';')) {
    hint = `Detected a semicolon after ${quoteKey(key.slice(0, -1))}. Use ':' as the separator, not ';'.`;
  } else if (key.endsWith('=')) {
    hint = `Detected an equals sign after ${quoteKey(key.slice(0, -1))}. Use ':' as the separator, not '='.`;
  } else if (key === '-') {
    hint = "List items belong to an array. Declare one on the line above, for example items[2]:, and indent the items under it.";
  } else if (/\s/.test(key)) {
    hint = `Key ${quoteKey(key)} contains spaces. Quote multi-word keys, then add ':'.`;
  } else {
    const example = key.length > MAX_QUOTED_KEY_LENGTH || hasControlChars(key) ? 'key' : key;
    hint = `Add ':' after the key, for example ${example}: value`;
  }
  return `Expected ':' after property key ${quoteKey(key)}. ${hint}`;
}

export function unexpectedEndMessage(key: string): string {
  return `Unexpected end of input after ${quoteKey(key)}. Add a value or an indented block.`;
}

export function unexpectedTokenMessage(found: TokenType, where: string): string {
  return `Unexpected token ${where}. ${unexpectedTokenHint(found)}`;
}

export const EXPECTED_RIGHT_BRACKET = "Expected ']' to close the array header.";
export const EXPECTED_RIGHT_BRACE = "Expected '}' to close the field list.";
export const EXPECTED_FIELD_NAME = 'Expected field name in the field list.';
export const INVALID_ARRAY_SIZE = 'Invalid array size. Write a non-negative integer inside the brackets, for example [3].';
export const EXPECTED_LIST_ITEM = "Expected a list item starting with '- '. Items of an expanded array each start with a dash.";
export const EMPTY_DOCUMENT = 'Document contains only whitespace.';
export const SOURCE_MISSING = 'Source text is required.';

export function missingDelimiterMessage(delimiter: Delimiter): string {
  return `Expected delimiter between values. This array uses ${delimiterName(delimiter)} as delimiter; separate every element with it.`;
}

export function contentAfterTableHeaderMessage(): string {
  return 'Unexpected content after a table header. Rows go on the following indented lines.';
}

// Size validation

export function arraySizeMismatchMessage(declared: number, actual: number): string {
  let hint: string;
  if (actual === 0) {
    hint = 'No elements found. Check that the elements are on the header line or indented under it.';
  } else if (actual < declared) {
    hint = `Missing ${plural(declared - actual, 'element')}. Check for an incomplete array or a missing delimiter between elements.`;
  } else {
    hint = `Found ${plural(actual - declared, 'extra element')}. Either declare [${actual}] or remove the extra elements.`;
  }
  return `Array size mismatch: declared ${declared}, found ${actual}. ${hint}`;
}

export function tableSizeMismatchMessage(declared: number, actual: number): string {
  let hint: string;
  if (actual === 0) {
    hint = 'No rows found. Check that rows are indented under the table header.';
  } else if (actual < declared) {
    hint = `Missing ${plural(declared - actual, 'row')}. Check for incomplete table data or missing rows.`;
  } else {
    hint = `Found ${plural(actual - declared, 'extra row')}. Either declare [${actual}] or remove the extra rows.`;
  }
  return `Table array size mismatch: declared ${declared}, found ${actual}. ${hint}`;
}

export function tableRowFieldMismatchMessage(row: number, fields: number, cells: number): string {
  return `Table row ${row} has ${plural(cells, 'value')} but the header declares ${plural(fields, 'field')}.`;
}

// Delimiters

export function mixedDelimitersMessage(active: Delimiter, found: Delimiter): string {
  return `Mixed delimiters: this header uses ${delimiterName(active)} but found ${delimiterName(found)}.`;
}

export function misplacedMarkerMessage(delimiter: Delimiter): string {
  const ch = delimiter === 'pipe' ? '|' : delimiter === 'tab' ? '\\t' : ',';
  return `Delimiter marker ${delimiterName(delimiter)} must come after the size, immediately before ']', for example [3${ch}].`;
}

// Indentation

export function unexpectedIndentationMessage(expected: number, actual: number): string {
  const hint = actual > expected
    ? `Over-indented by ${plural(actual - expected, 'space')}. Indent child properties by a consistent amount under their parent.`
    : `Under-indented by ${plural(expected - actual, 'space')}. Check which parent this line belongs to.`;
  return `Unexpected indentation: expected ${expected}, found ${actual}. ${hint}`;
}

export const INCONSISTENT_INDENTATION = 'Inconsistent indentation: the line mixes tabs and spaces. Indent with spaces only.';

// Guards

export function nestingDepthMessage(max: number): string {
  return `Maximum nesting depth of ${formatCount(max)} exceeded. Use the maxNestingDepth option to increase the limit.`;
}

export function arraySizeExceededMessage(size: number, max: number): string {
  return `Array size of ${formatCount(size)} exceeds maximum of ${formatCount(max)}. Use the maxArraySize option to increase the limit.`;
}

export function inputSizeMessage(max: number): string {
  return `Input exceeds maximum allowed size of ${formatCount(max)} bytes. Use the maxInputSize option to increase the limit.`;
}

export function loopGuardMessage(where: string): string {
  return `Parser made no progress while parsing ${where}; skipped one line.`;
}
