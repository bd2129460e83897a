import { describe, expect, it } from 'vitest';
import { Parser, findProperty, parse, scan } from '../src/index';
import type { PropertyNode, ValueNode } from '../src/index';

function valueOf(source: string, path: string): ValueNode | undefined {
  return findProperty(parse(source).document, path)?.value;
}

function keys(properties: readonly PropertyNode[]): string[] {
  return properties.map(p => p.key);
}

describe('parse: properties and values', () => {
  it('parses flat key/value pairs', () => {
    const result = parse('name: Ada\nage: 36\nactive: true\nnote: null');
    expect(result.isSuccess).toBe(true);
    expect(result.errors).toEqual([]);
    expect(keys(result.document.properties)).toEqual(['name', 'age', 'active', 'note']);
    expect(valueOf('name: Ada', 'name')).toMatchObject({ type: 'string', value: 'Ada', raw: 'Ada' });
    expect(valueOf('age: 36', 'age')).toMatchObject({ type: 'number', value: 36, isInteger: true });
    expect(valueOf('active: true', 'active')).toMatchObject({ type: 'boolean', value: true });
    expect(valueOf('note: null', 'note')).toMatchObject({ type: 'null', raw: 'null' });
  });

  it('keeps a leading-zero integer as a string and zero as a number', () => {
    expect(valueOf('value: 05', 'value')).toMatchObject({ type: 'string', value: '05' });
    expect(valueOf('value: 0', 'value')).toMatchObject({ type: 'number', value: 0, isInteger: true });
  });

  it('marks decimals and exponents as non-integers', () => {
    expect(valueOf('n: -1.5e3', 'n')).toMatchObject({ type: 'number', value: -1500, isInteger: false });
    expect(valueOf('n: 2.50', 'n')).toMatchObject({ type: 'number', value: 2.5, raw: '2.50' });
  });

  it('keeps quoted numbers and keywords as strings', () => {
    expect(valueOf('n: "42"', 'n')).toMatchObject({ type: 'string', value: '42', raw: '"42"' });
    expect(valueOf("b: 'true'", 'b')).toMatchObject({ type: 'string', value: 'true' });
  });

  it('joins multi-word values with their source spacing', () => {
    expect(valueOf('note: hello world  again', 'note')).toMatchObject({
      type: 'string',
      value: 'hello world  again',
      raw: 'hello world  again',
    });
  });

  it('decodes escapes in quoted values', () => {
    const result = parse('text: "Line1\\nLine2"');
    expect(result.isSuccess).toBe(true);
    expect(result.document.properties[0].value).toMatchObject({ type: 'string', value: 'Line1\nLine2' });
  });

  it('keeps an invalid escape verbatim and reports it once', () => {
    const result = parse('text: "Hello\\xWorld"');
    expect(result.errors.map(e => [e.code, e.column])).toEqual([['TOON1002', 13]]);
    expect(result.document.properties[0].value).toMatchObject({ type: 'string', value: 'Hello\\xWorld' });
  });

  it('decodes quoted keys', () => {
    const result = parse('"full name": Ada Lovelace');
    expect(result.document.properties[0].key).toBe('full name');
    expect(result.document.properties[0].value).toMatchObject({ value: 'Ada Lovelace' });
  });

  it('ignores trailing comments', () => {
    const result = parse('a: 1 # one\nb: two // second');
    expect(result.isSuccess).toBe(true);
    expect(valueOf('a: 1 # one', 'a')).toMatchObject({ type: 'number', value: 1 });
    expect(findProperty(result.document, 'b')?.value).toMatchObject({ type: 'string', value: 'two' });
  });

  it('records spans for properties and values', () => {
    const property = parse('name: John').document.properties[0];
    expect(property.span).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 11, offset: 10 },
    });
    expect(property.value.span.start).toEqual({ line: 1, column: 7, offset: 6 });
  });
});

describe('parse: objects', () => {
  it('nests indented blocks', () => {
    const result = parse('server:\n  host: localhost\n  tls:\n    port: 443\nname: api');
    expect(result.isSuccess).toBe(true);
    expect(keys(result.document.properties)).toEqual(['server', 'name']);
    const server = result.document.properties[0].value;
    expect(server.type).toBe('object');
    expect(valueOf('server:\n  host: localhost\n  tls:\n    port: 443', 'server.tls.port'))
      .toMatchObject({ type: 'number', value: 443 });
  });

  it('gives a key with no block an empty object', () => {
    const result = parse('a:\nb: 1');
    expect(result.isSuccess).toBe(true);
    expect(result.document.properties[0].value).toMatchObject({ type: 'object', properties: [] });
  });

  it('records unexpected end of input after a trailing colon', () => {
    const result = parse('a: 1\nb:');
    expect(result.errors).toEqual([{
      code: 'TOON2008',
      message: "Unexpected end of input after 'b'. Add a value or an indented block.",
      position: 7,
      length: 0,
      line: 2,
      column: 3,
    }]);
    expect(result.document.properties[1].value).toMatchObject({ type: 'object', properties: [] });
  });

  it('accepts a document indented as a whole', () => {
    const result = parse('  a: 1\n  b: 2');
    expect(result.isSuccess).toBe(true);
    expect(keys(result.document.properties)).toEqual(['a', 'b']);
  });
});

describe('parse: empty documents', () => {
  it('treats empty input as success', () => {
    const result = parse('');
    expect(result.isSuccess).toBe(true);
    expect(result.document.properties).toEqual([]);
    expect(result.tokens.map(t => t.type)).toEqual(['eof']);
  });

  it('treats comment-only input as success', () => {
    const result = parse('# settings\n// none yet\n');
    expect(result.isSuccess).toBe(true);
    expect(result.document.properties).toEqual([]);
  });

  it('reports whitespace-only input', () => {
    const result = parse('   ');
    expect(result.isSuccess).toBe(false);
    expect(result.errors).toEqual([{
      code: 'TOON2011',
      message: 'Document contains only whitespace.',
      position: 0,
      length: 3,
      line: 1,
      column: 1,
    }]);
  });
});

describe('Parser', () => {
  it('parses a token list produced separately', () => {
    const { tokens, errors } = scan('name: Ada\nage: 36');
    const parser = new Parser(tokens, {}, errors);
    const document = parser.parseDocument();
    expect(keys(document.properties)).toEqual(['name', 'age']);
    expect(parser.getErrors()).toEqual([]);
  });

  it('puts lexer errors ahead of its own', () => {
    const { tokens, errors } = scan('a: "x\\q"\nb 1');
    const parser = new Parser(tokens, {}, errors);
    parser.parseDocument();
    expect(parser.getErrors().map(e => e.code)).toEqual(['TOON1002', 'TOON2002']);
  });
});
