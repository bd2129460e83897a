import { describe, expect, it } from 'vitest';
import { findProperty, parse } from '../src/index';

describe('indentation', () => {
  it('reports an over-indented line and keeps it in its block', () => {
    const result = parse('a:\n  b: 1\n   c: 2');
    expect(result.errors).toEqual([{
      code: 'TOON5001',
      message: 'Unexpected indentation: expected 2, found 3. Over-indented by 1 space. Indent child properties by a consistent amount under their parent.',
      position: 10,
      length: 3,
      line: 3,
      column: 1,
    }]);
    const a = findProperty(result.document, 'a');
    expect(a?.value.type === 'object' && a.value.properties.map(p => p.key)).toEqual(['b', 'c']);
  });

  it('reports an under-indented line that is still deeper than its parent', () => {
    const result = parse('a:\n    b: 1\n  c: 2\nd: 3');
    expect(result.errors.map(e => e.message)).toEqual([
      'Unexpected indentation: expected 4, found 2. Under-indented by 2 spaces. Check which parent this line belongs to.',
    ]);
    expect(result.document.properties.map(p => p.key)).toEqual(['a', 'd']);
    expect(findProperty(result.document, 'a.c')?.value).toMatchObject({ type: 'number', value: 2 });
  });

  it('returns to the parent level after a block', () => {
    const result = parse('a:\n  b:\n    c: 1\n  d: 2\ne: 3');
    expect(result.isSuccess).toBe(true);
    expect(findProperty(result.document, 'a.d')).toMatchObject({ key: 'd', indent: 2 });
    expect(findProperty(result.document, 'e')).toMatchObject({ key: 'e', indent: 0 });
  });

  it('reports a line mixing tabs and spaces once', () => {
    const result = parse('a:\n \tb: 1');
    expect(result.errors).toEqual([{
      code: 'TOON5002',
      message: 'Inconsistent indentation: the line mixes tabs and spaces. Indent with spaces only.',
      position: 3,
      length: 2,
      line: 2,
      column: 1,
    }]);
    expect(findProperty(result.document, 'a.b')?.value).toMatchObject({ value: 1 });
  });

  it('reports misaligned expanded-array items', () => {
    const result = parse('list[2]:\n  - a\n   - b');
    expect(result.errors.map(e => [e.code, e.line])).toEqual([['TOON5001', 3]]);
  });

  it('reports misaligned table rows and keeps them', () => {
    const result = parse('t[2]{a}:\n  1\n    2');
    expect(result.errors.map(e => [e.code, e.line])).toEqual([['TOON5001', 3]]);
    const t = result.document.properties[0].value;
    expect(t.type === 'table' && t.rows.length).toBe(2);
  });
});
