import { describe, expect, it } from 'vitest';
import { parse } from '../src/index';
import type { TableArrayNode, ValueNode } from '../src/index';

function asTable(value: ValueNode): TableArrayNode {
  if (value.type !== 'table') throw new Error(`expected table, got ${value.type}`);
  return value;
}

function cells(table: TableArrayNode): unknown[][] {
  return table.rows.map(row => row.map(c => ('value' in c ? c.value : c.type)));
}

describe('table arrays', () => {
  it('parses fields and rows', () => {
    const result = parse('users[2]{id,name,admin}:\n  1,Alice,true\n  2,Bob,false');
    expect(result.isSuccess).toBe(true);
    const users = asTable(result.document.properties[0].value);
    expect(users).toMatchObject({ declaredSize: 2, delimiter: 'comma', fields: ['id', 'name', 'admin'] });
    expect(cells(users)).toEqual([
      [1, 'Alice', true],
      [2, 'Bob', false],
    ]);
  });

  it('ends the table at the first line at or above the header', () => {
    const result = parse('rows[1]{a,b}:\n  x,y\ntotal: 1');
    expect(result.isSuccess).toBe(true);
    expect(result.document.properties.map(p => p.key)).toEqual(['rows', 'total']);
  });

  it('keeps quoted cells whole', () => {
    const table = asTable(parse('t[1]{a,b}:\n  "x,y",2').document.properties[0].value);
    expect(cells(table)).toEqual([['x,y', 2]]);
  });

  it('reports missing rows and keeps the rows found', () => {
    const result = parse('users[3]{id,name}:\n  1,Alice\n  2,Bob');
    expect(result.errors).toEqual([{
      code: 'TOON3002',
      message: 'Table array size mismatch: declared 3, found 2. Missing 1 row. Check for incomplete table data or missing rows.',
      position: 5,
      length: 3,
      line: 1,
      column: 6,
    }]);
    expect(asTable(result.document.properties[0].value).rows).toHaveLength(2);
  });

  it('reports a row with the wrong number of cells and keeps it', () => {
    const result = parse('t[2]{a,b}:\n  1\n  2,3');
    expect(result.errors.map(e => [e.code, e.message, e.line])).toEqual([
      ['TOON3003', 'Table row 1 has 1 value but the header declares 2 fields.', 2],
    ]);
    expect(cells(asTable(result.document.properties[0].value))).toEqual([[1], [2, 3]]);
  });

  it('reports content after the header colon', () => {
    const result = parse('t[1]{a}: oops\n  1');
    expect(result.errors.map(e => [e.code, e.column, e.length])).toEqual([['TOON2007', 10, 4]]);
    expect(result.errors[0].message).toBe(
      'Unexpected content after a table header. Rows go on the following indented lines.',
    );
  });

  it('reports an empty field slot', () => {
    const result = parse('t[1]{a,,b}:\n  1,2');
    expect(result.errors.map(e => e.code)).toContain('TOON2005');
    expect(asTable(result.document.properties[0].value).fields).toEqual(['a', 'b']);
  });

  it('reports a missing closing brace', () => {
    const result = parse('t[1]{a,b:\n  1,2');
    expect(result.errors[0]).toMatchObject({
      code: 'TOON2004',
      message: "Expected '}' to close the field list.",
      column: 9,
    });
    expect(asTable(result.document.properties[0].value).fields).toEqual(['a', 'b']);
  });

  it('parses tables inside list items', () => {
    const source = [
      'groups[1]:',
      '  - members[2]{id,role}:',
      '      1,owner',
      '      2,guest',
    ].join('\n');
    const result = parse(source);
    expect(result.isSuccess).toBe(true);
    const groups = result.document.properties[0].value;
    if (groups.type !== 'array') throw new Error('expected array');
    const group = groups.elements[0];
    if (group.type !== 'object') throw new Error('expected object');
    const members = asTable(group.properties[0].value);
    expect(cells(members)).toEqual([[1, 'owner'], [2, 'guest']]);
  });
});
