import type { Diagnostic } from '../kernel/diagnostics.js';
import type { DescriptorSourceMap, SourceSpan } from './source-map.js';

export function resolveSpanForDiagnosticPath(path: string, sourceMap?: DescriptorSourceMap): SourceSpan | undefined {
  if (sourceMap === undefined) {
    return undefined;
  }

  for (const candidate of [path, ...buildPathParents(path)]) {
    if (Object.hasOwn(sourceMap.byPath, candidate)) {
      return sourceMap.byPath[candidate];
    }
  }

  return undefined;
}

export function attachSourceSpans(
  diagnostics: readonly Diagnostic[],
  sourceMap?: DescriptorSourceMap,
): readonly Diagnostic[] {
  if (sourceMap === undefined) {
    return diagnostics;
  }

  return diagnostics.map((diagnostic) => {
    if (diagnostic.span !== undefined) {
      return diagnostic;
    }
    const span = resolveSpanForDiagnosticPath(diagnostic.path, sourceMap);
    return span === undefined ? diagnostic : { ...diagnostic, span };
  });
}

function buildPathParents(path: string): readonly string[] {
  const parents: string[] = [];
  let cursor = path;
  while (true) {
    const next = trimLastPathSegment(cursor);
    if (next === undefined) {
      break;
    }
    parents.push(next);
    cursor = next;
  }
  return parents;
}

function trimLastPathSegment(path: string): string | undefined {
  if (path.length === 0) {
    return undefined;
  }

  if (path.endsWith(']')) {
    const openIndex = path.lastIndexOf('[');
    if (openIndex <= 0) {
      return undefined;
    }
    return path.slice(0, openIndex);
  }

  const dotIndex = path.lastIndexOf('.');
  if (dotIndex <= 0) {
    return undefined;
  }
  return path.slice(0, dotIndex);
}
