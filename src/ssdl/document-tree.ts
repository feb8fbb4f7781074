import type { SourceSpan } from './source-map.js';

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
  readonly span?: SourceSpan;
}

export interface SeqNode {
  readonly kind: 'seq';
  readonly items: readonly DocNode[];
  readonly span?: SourceSpan;
}

export interface MapEntry {
  readonly key: string;
  readonly value: DocNode;
  /** From the key's first character to the end of the value. */
  readonly span?: SourceSpan;
}

/** Entries keep declaration order and repeated keys. */
export interface MapNode {
  readonly kind: 'map';
  readonly entries: readonly MapEntry[];
  readonly span?: SourceSpan;
}

/** A host value with no descriptor counterpart (function, symbol, Date...). */
export interface OpaqueNode {
  readonly kind: 'opaque';
  readonly typeName: string;
  readonly span?: SourceSpan;
}

export type DocNode = ScalarNode | SeqNode | MapNode | OpaqueNode;

export function describeNode(node: DocNode | undefined): string {
  if (node === undefined) {
    return 'nothing';
  }
  switch (node.kind) {
    case 'map':
      return 'mapping';
    case 'seq':
      return 'sequence';
    case 'opaque':
      return node.typeName;
    case 'scalar':
      if (node.value === null) {
        return 'null';
      }
      if (typeof node.value === 'number') {
        return Number.isInteger(node.value) ? `integer ${node.value}` : `number ${node.value}`;
      }
      if (typeof node.value === 'boolean') {
        return `boolean ${String(node.value)}`;
      }
      return node.value === '' ? 'empty string' : 'string';
  }
}

export function entryKeys(node: MapNode): readonly string[] {
  return node.entries.map((entry) => entry.key);
}

/**
 * Builds a tree from an in-memory value (for example `JSON.parse` output).
 * Plain objects become mappings in property order; nothing carries a span.
 */
export function documentNodeFromValue(value: unknown): DocNode {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'scalar', value } : { kind: 'opaque', typeName: String(value) };
  }
  if (Array.isArray(value)) {
    return { kind: 'seq', items: value.map((item: unknown) => documentNodeFromValue(item)) };
  }
  if (isPlainRecord(value)) {
    return {
      kind: 'map',
      entries: Object.entries(value).map(([key, entry]) => ({ key, value: documentNodeFromValue(entry) })),
    };
  }
  if (value === undefined) {
    return { kind: 'opaque', typeName: 'undefined' };
  }
  if (typeof value === 'object') {
    return { kind: 'opaque', typeName: value.constructor?.name ?? 'object' };
  }
  return { kind: 'opaque', typeName: typeof value };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
