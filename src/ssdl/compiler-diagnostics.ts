import type { Diagnostic } from '../kernel/diagnostics.js';
import type { DescriptorSourceMap } from './source-map.js';
import { attachSourceSpans } from './diagnostic-source-map.js';
import { countErrorDiagnostics } from './validate-shared.js';

export interface FinalizedDiagnostics {
  readonly diagnostics: readonly Diagnostic[];
  /** How many warnings the cap dropped. */
  readonly truncatedCount: number;
}

export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  const seen = new Set<string>();
  const deduped: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const key = serializeDiagnosticForDeduping(diagnostic);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    deduped.push(diagnostic);
  }

  return deduped;
}

/**
 * Errors are never dropped. Warnings fill whatever room the errors leave
 * under the cap, in their original order.
 */
export function capDiagnostics(
  diagnostics: readonly Diagnostic[],
  maxDiagnosticCount: number,
): readonly Diagnostic[] {
  if (!Number.isInteger(maxDiagnosticCount) || maxDiagnosticCount < 0) {
    throw new Error('maxDiagnosticCount must be an integer >= 0.');
  }

  if (diagnostics.length <= maxDiagnosticCount) {
    return [...diagnostics];
  }

  let warningBudget = Math.max(0, maxDiagnosticCount - countErrorDiagnostics(diagnostics));
  return diagnostics.filter((diagnostic) => {
    if (diagnostic.severity === 'error') {
      return true;
    }
    if (warningBudget === 0) {
      return false;
    }
    warningBudget -= 1;
    return true;
  });
}

/** Declaration order is kept; pipeline stages already emit in that order. */
export function finalizeDiagnostics(
  diagnostics: readonly Diagnostic[],
  sourceMap: DescriptorSourceMap | undefined,
  maxDiagnosticCount: number,
): FinalizedDiagnostics {
  const deduped = dedupeDiagnostics(attachSourceSpans(diagnostics, sourceMap));
  const capped = capDiagnostics(deduped, maxDiagnosticCount);
  return { diagnostics: capped, truncatedCount: deduped.length - capped.length };
}

function serializeDiagnosticForDeduping(diagnostic: Diagnostic): string {
  const alternatives = diagnostic.alternatives === undefined ? '' : diagnostic.alternatives.join('\u001f');
  return [
    diagnostic.kind,
    diagnostic.code,
    diagnostic.path,
    diagnostic.severity,
    diagnostic.message,
    diagnostic.suggestion ?? '',
    alternatives,
    diagnostic.span === undefined ? '' : `${diagnostic.span.line}:${diagnostic.span.col}`,
  ].join('\u001e');
}
