import type * as AST from './ast';
import { INDENT_WIDTH } from './constants';
import { visitNode } from './visitor';

/**
 * Every property in the tree, depth first in source order, including the
 * fields of objects nested in arrays.
 */
export function getAllProperties(root: AST.Node): AST.PropertyNode[] {
  const properties: AST.PropertyNode[] = [];
  visitNode(root, {
    byType: {
      property(node) {
        properties.push(node);
      },
    },
  });
  return properties;
}

function lastByKey(properties: readonly AST.PropertyNode[], key: string): AST.PropertyNode | undefined {
  for (let i = properties.length - 1; i >= 0; i--) {
    if (properties[i].key === key) return properties[i];
  }
  return undefined;
}

/**
 * Look up a property by dotted path (`server.tls.port`) or by key segments,
 * descending through object values. With duplicate keys the last one wins.
 */
export function findProperty(
  document: AST.DocumentNode,
  path: string | readonly string[],
): AST.PropertyNode | undefined {
  const segments = typeof path === 'string' ? path.split('.') : path;
  let scope: readonly AST.PropertyNode[] = document.properties;
  let found: AST.PropertyNode | undefined;
  for (const segment of segments) {
    found = lastByKey(scope, segment);
    if (!found) return undefined;
    scope = found.value.type === 'object' ? found.value.properties : [];
  }
  return found;
}

/** Nesting level of a property, counting two spaces per level. */
export function getPropertyDepth(property: AST.PropertyNode): number {
  return Math.floor(property.indent / INDENT_WIDTH);
}

function label(node: AST.Node): string {
  switch (node.type) {
    case 'document': return 'Document:';
    case 'property': return `Property: ${node.key}`;
    case 'object': return 'Object:';
    case 'array': return `Array[${node.declaredSize}]:`;
    case 'table': return `TableArray[${node.declaredSize}] {${node.fields.join(',')}}:`;
    case 'string': return `String: ${JSON.stringify(node.value)}`;
    case 'number': return `Number: ${node.raw}`;
    case 'boolean': return `Boolean: ${node.value}`;
    case 'null': return 'Null';
  }
}

/**
 * Render a tree as an indented outline, two spaces per level, for debugging
 * and test failure output.
 *
 * @example
 * toDebugString(parse('tags[2]: a,b').document);
 * // Document:
 * //   Property: tags
 * //     Array[2]:
 * //       String: "a"
 * //       String: "b"
 */
export function toDebugString(root: AST.Node): string {
  const lines: string[] = [];
  const write = (node: AST.Node, level: number): void => {
    lines.push(' '.repeat(level * INDENT_WIDTH) + label(node));
    switch (node.type) {
      case 'document':
      case 'object':
        for (const p of node.properties) write(p, level + 1);
        break;
      case 'property':
        write(node.value, level + 1);
        break;
      case 'array':
        for (const e of node.elements) write(e, level + 1);
        break;
      case 'table':
        for (const row of node.rows) {
          lines.push(' '.repeat((level + 1) * INDENT_WIDTH) + 'Row:');
          for (const cell of row) write(cell, level + 2);
        }
        break;
      default:
        break;
    }
  };
  write(root, 0);
  return lines.join('\n');
}
