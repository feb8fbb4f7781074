import type { Diagnostic } from '../kernel/diagnostics.js';
import { isAlias, isMap, isScalar, isSeq, LineCounter, parseDocument, type Document } from 'yaml';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import { describeNode, documentNodeFromValue, type DocNode, type MapEntry, type MapNode } from './document-tree.js';
import { EMPTY_SOURCE_MAP, type DescriptorSourceMap, type SourceSpan } from './source-map.js';
import { createDiagnostic, indexPath, joinPath } from './validate-shared.js';

export interface ReadDescriptorSourceOptions {
  readonly maxInputBytes?: number;
  readonly maxDepth?: number;
  readonly maxAliasCount?: number;
}

export interface DescriptorSourceReadResult {
  /** `null` when the source is unreadable; the diagnostics say why. */
  readonly root: MapNode | null;
  readonly sourceMap: DescriptorSourceMap;
  readonly diagnostics: readonly Diagnostic[];
}

export const DEFAULT_MAX_INPUT_BYTES = 1024 * 1024;
export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_MAX_ALIAS_COUNT = 100;

type YamlRange = readonly [number, number, number];

interface ReadContext {
  readonly doc: Document;
  readonly lineCounter: LineCounter;
  readonly maxDepth: number;
  readonly maxAliasCount: number;
  readonly diagnostics: Diagnostic[];
  readonly byPath: Map<string, SourceSpan>;
  readonly resolving: Set<unknown>;
  aliasCount: number;
}

export function readDescriptorSource(
  text: string,
  options: ReadDescriptorSourceOptions = {},
): DescriptorSourceReadResult {
  const diagnostics: Diagnostic[] = [];
  const maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  const inputBytes = Buffer.byteLength(text, 'utf8');
  if (inputBytes > maxInputBytes) {
    diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_INPUT_BYTES_EXCEEDED,
        '',
        `Input exceeds maxInputBytes (${inputBytes} > ${maxInputBytes}).`,
        { suggestion: 'Reduce the descriptor size or raise limits.maxInputBytes.' },
      ),
    );
    return { root: null, sourceMap: EMPTY_SOURCE_MAP, diagnostics };
  }

  const lineCounter = new LineCounter();
  const doc = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: false,
    lineCounter,
  });

  if (doc.errors.length > 0) {
    for (const error of doc.errors) {
      const start = error.linePos?.[0];
      const end = error.linePos?.at(-1) ?? start;
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_YAML_SYNTAX,
          '',
          start !== undefined
            ? `YAML parse error at line ${start.line}, col ${start.col}: ${error.message}`
            : error.message,
          start !== undefined && end !== undefined
            ? { span: { line: start.line, col: start.col, endLine: end.line, endCol: end.col } }
            : {},
        ),
      );
    }
    return { root: null, sourceMap: EMPTY_SOURCE_MAP, diagnostics };
  }

  const context: ReadContext = {
    doc,
    lineCounter,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxAliasCount: options.maxAliasCount ?? DEFAULT_MAX_ALIAS_COUNT,
    diagnostics,
    byPath: new Map(),
    resolving: new Set(),
    aliasCount: 0,
  };
  const root = readNode(doc.contents, '', 0, context);
  const sourceMap: DescriptorSourceMap = { byPath: Object.fromEntries(context.byPath) };
  if (context.aliasCount > context.maxAliasCount) {
    return { root: null, sourceMap, diagnostics };
  }
  if (root === undefined || root.kind !== 'map') {
    diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_ROOT_NOT_MAPPING,
        '',
        'A descriptor must be a mapping at the top level.',
        { expected: 'mapping', actual: describeNode(root ?? { kind: 'scalar', value: null }) },
      ),
    );
    return { root: null, sourceMap, diagnostics };
  }

  return { root, sourceMap, diagnostics };
}

/** Reads an already-parsed value (e.g. from `JSON.parse`). No spans are recorded. */
export function readDescriptorValue(value: unknown): DescriptorSourceReadResult {
  const root = documentNodeFromValue(value);
  if (root.kind !== 'map') {
    return {
      root: null,
      sourceMap: EMPTY_SOURCE_MAP,
      diagnostics: [
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_ROOT_NOT_MAPPING,
          '',
          'A descriptor must be a mapping at the top level.',
          { expected: 'mapping', actual: describeNode(root) },
        ),
      ],
    };
  }
  return { root, sourceMap: EMPTY_SOURCE_MAP, diagnostics: [] };
}

function readNode(node: unknown, path: string, depth: number, context: ReadContext): DocNode | undefined {
  if (depth > context.maxDepth) {
    context.diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_DEPTH_EXCEEDED,
        path,
        `Nesting deeper than ${context.maxDepth} levels is not supported.`,
      ),
    );
    return undefined;
  }

  if (node === null || node === undefined) {
    return { kind: 'scalar', value: null };
  }

  if (isAlias(node)) {
    if (!countAlias(path, context)) {
      return undefined;
    }
    const target = node.resolve(context.doc);
    if (target === undefined || context.resolving.has(target)) {
      context.diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_ALIAS_UNRESOLVED,
          path,
          `Alias "*${node.source}" cannot be resolved.`,
          { suggestion: 'Declare the anchor before use and avoid self-referencing aliases.' },
        ),
      );
      return undefined;
    }
    context.resolving.add(target);
    const resolved = readNode(target, path, depth, context);
    context.resolving.delete(target);
    return resolved;
  }

  const span = spanOf(rangeOf(node), context.lineCounter);
  if (span !== undefined && !context.byPath.has(path)) {
    context.byPath.set(path, span);
  }

  if (isScalar(node)) {
    const value = node.value;
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
      return withSpan({ kind: 'scalar', value }, span);
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return withSpan({ kind: 'scalar', value }, span);
    }
    return withSpan({ kind: 'opaque', typeName: typeof value }, span);
  }

  if (isSeq(node)) {
    const items: DocNode[] = [];
    node.items.forEach((item, index) => {
      const read = readNode(item, indexPath(path, index), depth + 1, context);
      if (read !== undefined) {
        items.push(read);
      }
    });
    return withSpan({ kind: 'seq', items }, span);
  }

  if (isMap(node)) {
    const entries: MapEntry[] = [];
    for (const pair of node.items) {
      const keyNode = isAlias(pair.key) ? pair.key.resolve(context.doc) : pair.key;
      const keyValue = isScalar(keyNode) ? keyNode.value : keyNode;
      if (typeof keyValue !== 'string' && typeof keyValue !== 'number' && typeof keyValue !== 'boolean') {
        context.diagnostics.push(
          createDiagnostic(
            'ParseError',
            SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_KEY_NOT_SCALAR,
            path,
            'Mapping keys must be plain scalars.',
            { expected: 'string key', actual: keyValue === null ? 'null' : 'complex key' },
          ),
        );
        continue;
      }
      const key = String(keyValue);
      const entryPath = joinPath(path, key);
      const value = readNode(pair.value, entryPath, depth + 1, context);
      if (value === undefined) {
        continue;
      }
      const entrySpan = entrySpanOf(pair.key, pair.value, context.lineCounter);
      entries.push(entrySpan === undefined ? { key, value } : { key, value, span: entrySpan });
      if (entrySpan !== undefined && value.span === undefined && !context.byPath.has(entryPath)) {
        context.byPath.set(entryPath, entrySpan);
      }
    }
    return withSpan({ kind: 'map', entries }, span);
  }

  return { kind: 'opaque', typeName: 'unknown node' };
}

/** Every alias expansion counts; past the limit nothing more is expanded. */
function countAlias(path: string, context: ReadContext): boolean {
  context.aliasCount += 1;
  if (context.aliasCount <= context.maxAliasCount) {
    return true;
  }
  if (context.aliasCount === context.maxAliasCount + 1) {
    context.diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_ALIAS_COUNT_EXCEEDED,
        path,
        `Alias expansion exceeds maxAliasCount (${context.maxAliasCount}).`,
        { suggestion: 'Write the repeated content out or raise limits.maxAliasCount.' },
      ),
    );
  }
  return false;
}

function withSpan<T extends DocNode>(node: T, span: SourceSpan | undefined): T {
  return span === undefined ? node : { ...node, span };
}

function spanOf(range: YamlRange | undefined, lineCounter: LineCounter): SourceSpan | undefined {
  if (range === undefined) {
    return undefined;
  }
  return spanBetween(range[0], range[1], lineCounter);
}

function entrySpanOf(key: unknown, value: unknown, lineCounter: LineCounter): SourceSpan | undefined {
  const keyRange = rangeOf(key);
  if (keyRange === undefined) {
    return undefined;
  }
  const valueRange = rangeOf(value);
  return spanBetween(keyRange[0], valueRange?.[1] ?? keyRange[1], lineCounter);
}

function rangeOf(node: unknown): YamlRange | undefined {
  if (isScalar(node) || isMap(node) || isSeq(node) || isAlias(node)) {
    return node.range ?? undefined;
  }
  return undefined;
}

function spanBetween(start: number, end: number, lineCounter: LineCounter): SourceSpan {
  const from = lineCounter.linePos(start);
  const to = lineCounter.linePos(end);
  return { line: from.line, col: from.col, endLine: to.line, endCol: to.col };
}
