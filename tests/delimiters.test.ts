import { describe, expect, it } from 'vitest';
import { findProperty, getAllProperties, parse } from '../src/index';
import type { ArrayNode, TableArrayNode, ValueNode } from '../src/index';
import { DelimiterScopes, measureIndent } from '../src/delimiters';

function asArray(value: ValueNode): ArrayNode {
  if (value.type !== 'array') throw new Error(`expected array, got ${value.type}`);
  return value;
}

function asTable(value: ValueNode): TableArrayNode {
  if (value.type !== 'table') throw new Error(`expected table, got ${value.type}`);
  return value;
}

function strings(array: ArrayNode): unknown[] {
  return array.elements.map(e => ('value' in e ? e.value : e.type));
}

describe('delimiter markers', () => {
  it('splits on pipes when the header declares one', () => {
    const result = parse('path[3|]: a,b|c|d');
    expect(result.isSuccess).toBe(true);
    const path = asArray(result.document.properties[0].value);
    expect(path.delimiter).toBe('pipe');
    expect(strings(path)).toEqual(['a,b', 'c', 'd']);
  });

  it('splits on tabs when the header declares one', () => {
    const result = parse('cols[2\t]: first name\tlast name');
    expect(result.isSuccess).toBe(true);
    const cols = asArray(result.document.properties[0].value);
    expect(cols.delimiter).toBe('tab');
    expect(strings(cols)).toEqual(['first name', 'last name']);
  });

  it('uses the marker for table fields and rows', () => {
    const result = parse('t[1|]{id|note}:\n  1|hello, world');
    expect(result.isSuccess).toBe(true);
    const t = asTable(result.document.properties[0].value);
    expect(t.fields).toEqual(['id', 'note']);
    expect(t.rows[0].map(c => ('value' in c ? c.value : c.type))).toEqual([1, 'hello, world']);
  });

  it('inherits the enclosing delimiter in nested headers', () => {
    const result = parse('grid[2|]:\n  - [2]: a|b\n  - [2]: c|d');
    expect(result.isSuccess).toBe(true);
    const grid = asArray(result.document.properties[0].value);
    const rows = grid.elements.map(asArray);
    expect(rows.map(r => r.delimiter)).toEqual(['pipe', 'pipe']);
    expect(rows.map(strings)).toEqual([['a', 'b'], ['c', 'd']]);
  });

  it('carries the delimiter through objects nested in list items', () => {
    const result = parse('r[1|]:\n  - o:\n      inner[2]: a|b');
    expect(result.isSuccess).toBe(true);
    const inner = getAllProperties(result.document).find(p => p.key === 'inner');
    expect(inner).toBeDefined();
    if (!inner) return;
    const array = asArray(inner.value);
    expect(array.delimiter).toBe('pipe');
    expect(strings(array)).toEqual(['a', 'b']);
  });

  it('falls back to comma under a plain object', () => {
    const result = parse('o:\n  inner[2]: a|b');
    const inner = findProperty(result.document, 'o.inner');
    expect(inner).toBeDefined();
    if (!inner) return;
    const array = asArray(inner.value);
    expect(array.delimiter).toBe('comma');
    expect(strings(array)).toEqual(['a|b']);
    expect(result.errors.map(e => [e.code, e.line, e.column])).toEqual([['TOON3001', 2, 8]]);
  });

  it('lets an explicit marker override the inherited one', () => {
    const result = parse('outer[1|]:\n  - [2,]: x,y');
    expect(result.isSuccess).toBe(true);
    const inner = asArray(asArray(result.document.properties[0].value).elements[0]);
    expect(inner.delimiter).toBe('comma');
    expect(strings(inner)).toEqual(['x', 'y']);
  });

  it('does not leak a delimiter to sibling properties', () => {
    const result = parse('a[2|]: x|y\nb[2]: 1,2');
    expect(result.isSuccess).toBe(true);
    expect(asArray(result.document.properties[1].value).delimiter).toBe('comma');
  });

  it('reports a marker written before the size and still uses it', () => {
    const result = parse('t[|2]: a|b');
    expect(result.errors).toEqual([{
      code: 'TOON4002',
      message: "Delimiter marker pipe (|) must come after the size, immediately before ']', for example [3|].",
      position: 2,
      length: 1,
      line: 1,
      column: 3,
    }]);
    expect(strings(asArray(result.document.properties[0].value))).toEqual(['a', 'b']);
  });

  it('reports a foreign delimiter in a field list', () => {
    const result = parse('t[1]{a|b}:\n  1,2');
    expect(result.errors.map(e => [e.code, e.message])).toEqual([
      ['TOON4001', 'Mixed delimiters: this header uses comma (,) but found pipe (|).'],
    ]);
    expect(asTable(result.document.properties[0].value).fields).toEqual(['a', 'b']);
  });
});

describe('DelimiterScopes', () => {
  it('defaults to comma and restores after each scope', () => {
    const scopes = new DelimiterScopes();
    expect(scopes.active).toBe('comma');
    const seen = scopes.within('pipe', () => {
      const inner = scopes.within(scopes.resolve(undefined), () => scopes.active);
      return [inner, scopes.active];
    });
    expect(seen).toEqual(['pipe', 'pipe']);
    expect(scopes.active).toBe('comma');
  });

  it('pops the scope when the callback throws', () => {
    const scopes = new DelimiterScopes();
    expect(() => scopes.within('tab', () => {
      throw new Error('boom');
    })).toThrow('boom');
    expect(scopes.active).toBe('comma');
  });
});

describe('measureIndent', () => {
  it('counts leading spaces and tabs', () => {
    expect(measureIndent('    ')).toEqual({ width: 4, mixed: false });
    expect(measureIndent('\t\t')).toEqual({ width: 2, mixed: false });
    expect(measureIndent(' \t')).toEqual({ width: 2, mixed: true });
  });
});
