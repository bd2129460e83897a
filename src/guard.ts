import { ErrorCode, ToonInputError } from './errors';
import { SOURCE_MISSING, inputSizeMessage } from './hints';

/** Calculate UTF-8 byte length without allocating an encoded copy. */
export function utf8ByteLength(s: string): number {
  let bytes = 0;
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i);
    if (code <= 0x7f) {
      bytes += 1;
    } else if (code <= 0x7ff) {
      bytes += 2;
    } else if (code >= 0xd800 && code <= 0xdbff) {
      const next = i + 1 < s.length ? s.charCodeAt(i + 1) : 0;
      if (next >= 0xdc00 && next <= 0xdfff) {
        bytes += 4; // surrogate pair -> 4-byte UTF-8 code point
        i++;
      } else {
        bytes += 3; // lone surrogates encode as U+FFFD
      }
    } else {
      bytes += 3;
    }
  }
  return bytes;
}

/**
 * Reject sources that cannot produce a result: anything that is not a
 * string, and strings whose UTF-8 size exceeds `maxInputSize`.
 *
 * @throws {ToonInputError} With code TOON9007 or TOON9006.
 */
export function guardSource(source: unknown, maxInputSize: number): string {
  if (typeof source !== 'string') {
    throw new ToonInputError(ErrorCode.SourceMissing, SOURCE_MISSING);
  }
  // Each UTF-16 unit encodes to at most 3 bytes, so short inputs skip the count.
  if (source.length * 3 > maxInputSize && utf8ByteLength(source) > maxInputSize) {
    throw new ToonInputError(ErrorCode.InputSizeExceeded, inputSizeMessage(maxInputSize));
  }
  return source;
}
