import { describe, expect, it } from 'vitest';
import { parse, visitNode } from '../src/index';
import type { Node } from '../src/index';

describe('visitNode', () => {
  it('walks depth-first with depth and parent', () => {
    const document = parse('a: x\nb[2]: 1,2').document;
    const seen: string[] = [];
    visitNode(document, {
      enter(node, context) {
        seen.push(`${node.type}@${context.depth}`);
      },
    });
    expect(seen).toEqual([
      'document@0',
      'property@1',
      'string@2',
      'property@1',
      'array@2',
      'number@3',
      'number@3',
    ]);
  });

  it('calls leave after the children', () => {
    const document = parse('a:\n  b: 1').document;
    const order: string[] = [];
    visitNode(document, {
      enter: node => order.push(`+${node.type}`),
      leave: node => order.push(`-${node.type}`),
    });
    expect(order).toEqual([
      '+document', '+property', '+object', '+property', '+number',
      '-number', '-property', '-object', '-property', '-document',
    ]);
  });

  it('supports typed per-type handlers', () => {
    const document = parse('t[2]{id,name}:\n  1,Ann\n  2,Bob').document;
    const ids: number[] = [];
    const parents: (Node | null)[] = [];
    visitNode(document, {
      byType: {
        number(node, context) {
          ids.push(node.value);
          parents.push(context.parent);
        },
      },
    });
    expect(ids).toEqual([1, 2]);
    expect(parents.map(p => p?.type)).toEqual(['table', 'table']);
  });
});
