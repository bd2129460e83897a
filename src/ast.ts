// Syntax tree types for parsed TOON documents

import type { Delimiter } from './delimiters';

/** One end of a node span. `offset` is a zero-based UTF-16 index. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open source range: `end` points just past the node. */
export interface Span {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export type Node =
  | DocumentNode
  | PropertyNode
  | ValueNode;

export type ValueNode =
  | ObjectNode
  | ArrayNode
  | TableArrayNode
  | StringNode
  | NumberNode
  | BooleanNode
  | NullNode;

export type PrimitiveNode = StringNode | NumberNode | BooleanNode | NullNode;

export interface DocumentNode {
  readonly type: 'document';
  readonly properties: readonly PropertyNode[];
  readonly span: Span;
}

export interface PropertyNode {
  readonly type: 'property';
  readonly key: string;
  readonly value: ValueNode;
  /** Leading whitespace width of the key (its virtual column inside a list item). */
  readonly indent: number;
  readonly span: Span;
}

export interface ObjectNode {
  readonly type: 'object';
  readonly properties: readonly PropertyNode[];
  readonly span: Span;
}

export type ArrayForm = 'inline' | 'expanded';

export interface ArrayNode {
  readonly type: 'array';
  /** Size written in the header; may differ from `elements.length`. */
  readonly declaredSize: number;
  readonly delimiter: Delimiter;
  readonly form: ArrayForm;
  readonly elements: readonly ValueNode[];
  readonly span: Span;
}

export interface TableArrayNode {
  readonly type: 'table';
  readonly declaredSize: number;
  readonly delimiter: Delimiter;
  readonly fields: readonly string[];
  /** Cells are positional; a row may hold more or fewer cells than `fields`. */
  readonly rows: readonly (readonly ValueNode[])[];
  readonly span: Span;
}

export interface StringNode {
  readonly type: 'string';
  readonly value: string;
  readonly raw: string;
  readonly span: Span;
}

export interface NumberNode {
  readonly type: 'number';
  readonly value: number;
  readonly isInteger: boolean;
  readonly raw: string;
  readonly span: Span;
}

export interface BooleanNode {
  readonly type: 'boolean';
  readonly value: boolean;
  readonly raw: string;
  readonly span: Span;
}

export interface NullNode {
  readonly type: 'null';
  readonly raw: string;
  readonly span: Span;
}
