import type * as AST from './ast';

export interface VisitContext {
  parent: AST.Node | null;
  /** Property key, element index, or row index for table cells. */
  key?: string | number;
  depth: number;
}

type NodeOfType<K extends AST.Node['type']> = Extract<AST.Node, { type: K }>;

export type TypeHandlers = {
  [K in AST.Node['type']]?: (node: NodeOfType<K>, context: VisitContext) => void;
};

export interface AstVisitor {
  enter?: (node: AST.Node, context: VisitContext) => void;
  leave?: (node: AST.Node, context: VisitContext) => void;
  byType?: TypeHandlers;
}

interface Child {
  node: AST.Node;
  key: string | number;
}

/** Direct children of a node in source order. */
function childrenOf(node: AST.Node): Child[] {
  switch (node.type) {
    case 'document':
    case 'object':
      return node.properties.map(p => ({ node: p, key: p.key }));
    case 'property':
      return [{ node: node.value, key: node.key }];
    case 'array':
      return node.elements.map((e, i) => ({ node: e, key: i }));
    case 'table':
      return node.rows.flatMap((row, r) => row.map(cell => ({ node: cell, key: r })));
    case 'string':
    case 'number':
    case 'boolean':
    case 'null':
      return [];
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

function dispatch(byType: TypeHandlers, node: AST.Node, context: VisitContext): void {
  switch (node.type) {
    case 'document': byType.document?.(node, context); break;
    case 'property': byType.property?.(node, context); break;
    case 'object': byType.object?.(node, context); break;
    case 'array': byType.array?.(node, context); break;
    case 'table': byType.table?.(node, context); break;
    case 'string': byType.string?.(node, context); break;
    case 'number': byType.number?.(node, context); break;
    case 'boolean': byType.boolean?.(node, context); break;
    case 'null': byType.null?.(node, context); break;
  }
}

/**
 * Traverse a syntax tree depth-first and invoke visitor callbacks.
 *
 * `enter` and the per-type handler run before a node's children, `leave`
 * after them. Table cells are visited row by row with the row index as key.
 */
export function visitNode(root: AST.Node, visitor: AstVisitor): void {
  const walk = (node: AST.Node, parent: AST.Node | null, key: string | number | undefined, depth: number): void => {
    const context: VisitContext = { parent, key, depth };
    visitor.enter?.(node, context);
    if (visitor.byType) dispatch(visitor.byType, node, context);
    for (const child of childrenOf(node)) {
      walk(child.node, node, child.key, depth + 1);
    }
    visitor.leave?.(node, context);
  };

  walk(root, null, undefined, 0);
}
