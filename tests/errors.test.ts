import { describe, expect, it } from 'vitest';
import { ErrorCode, ErrorCollector, ToonInputError, type ToonError } from '../src/errors';
import { guardSource, utf8ByteLength } from '../src/guard';

const at = { position: 4, length: 2, line: 1, column: 5 };

describe('ErrorCollector', () => {
  it('records frozen errors in order', () => {
    const errors = new ErrorCollector();
    errors.report(ErrorCode.ExpectedColon, 'first', at);
    errors.report(ErrorCode.ArraySizeMismatch, 'second', at);
    const all = errors.toArray();
    expect(all.map(e => e.message)).toEqual(['first', 'second']);
    expect(all[0]).toEqual({ code: 'TOON2002', message: 'first', position: 4, length: 2, line: 1, column: 5 });
    expect(Object.isFrozen(all[0])).toBe(true);
    expect(all.map(e => e.code)).toEqual([ErrorCode.ExpectedColon, ErrorCode.ArraySizeMismatch]);
  });

  it('forwards reported and adopted errors to the listener', () => {
    const seen: ToonError[] = [];
    const lexer = new ErrorCollector();
    lexer.report(ErrorCode.InvalidCharacter, 'lexed', at);
    const errors = new ErrorCollector(e => seen.push(e));
    errors.adopt(lexer.toArray());
    errors.report(ErrorCode.ExpectedColon, 'parsed', at);
    expect(seen.map(e => e.message)).toEqual(['lexed', 'parsed']);
  });

  it('hands out copies', () => {
    const errors = new ErrorCollector();
    errors.toArray().push({ message: 'x', position: 0, length: 0, line: 1, column: 1 });
    expect(errors.toArray()).toEqual([]);
  });
});

describe('guardSource', () => {
  it('returns the source when it fits', () => {
    expect(guardSource('a: 1', 100)).toBe('a: 1');
  });

  it('rejects a non-string source', () => {
    expect(() => guardSource(42, 100)).toThrow(ToonInputError);
  });

  it('rejects a source over the byte limit', () => {
    try {
      guardSource('€€', 5);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ToonInputError);
      expect(err instanceof ToonInputError && err.code).toBe('TOON9006');
    }
  });
});

describe('utf8ByteLength', () => {
  it('counts UTF-8 bytes', () => {
    expect(utf8ByteLength('abc')).toBe(3);
    expect(utf8ByteLength('é')).toBe(2);
    expect(utf8ByteLength('€')).toBe(3);
    expect(utf8ByteLength('😀')).toBe(4);
    expect(utf8ByteLength('\ud800')).toBe(3);
  });
});
