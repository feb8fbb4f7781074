import {
  severityOfKind,
  type Diagnostic,
  type DiagnosticKind,
  type DiagnosticSourceSpan,
} from '../kernel/diagnostics.js';
import type { SsdlDiagnosticCode } from './diagnostic-codes.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';

const MAX_ALTERNATIVE_DISTANCE = 3;

export const SERVICE_KEYS = ['name', 'scope', 'version'] as const;
export const VERSION_KEYS = ['major', 'minor', 'patch'] as const;
export const DATA_SOURCE_KEYS = ['name', 'provider', 'type', 'uri', 'query'] as const;
export const QUERY_KEYS = ['type', 'select'] as const;
export const APPLICATION_KEYS = ['type', 'layout', 'roles', 'defaultRole', 'visualizations'] as const;
export const VISUALIZATION_KEYS = ['name', 'type', 'source', 'data', 'extra', 'roles'] as const;
export const ROLE_KEYS = ['name', 'hierarchy'] as const;
export const DEPLOYMENT_KEYS = ['env'] as const;
export const DEPLOYMENT_ENV_KEYS = ['name', 'uri', 'port', 'type', 'roles', 'credentials'] as const;

export interface DiagnosticDetails {
  readonly expected?: string;
  readonly actual?: string;
  readonly suggestion?: string;
  readonly alternatives?: readonly string[];
  readonly span?: DiagnosticSourceSpan;
}

export function createDiagnostic(
  kind: DiagnosticKind,
  code: SsdlDiagnosticCode,
  path: string,
  message: string,
  details: DiagnosticDetails = {},
): Diagnostic {
  return {
    kind,
    code,
    path,
    severity: severityOfKind(kind),
    message,
    ...(details.expected === undefined ? {} : { expected: details.expected }),
    ...(details.actual === undefined ? {} : { actual: details.actual }),
    ...(details.suggestion === undefined ? {} : { suggestion: details.suggestion }),
    ...(details.alternatives === undefined || details.alternatives.length === 0
      ? {}
      : { alternatives: [...details.alternatives] }),
    ...(details.span === undefined ? {} : { span: details.span }),
  };
}

export function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

export function pushUnknownKeyDiagnostics(
  keys: readonly string[],
  allowedKeys: readonly string[],
  basePath: string,
  diagnostics: Diagnostic[],
  objectLabel: string,
): void {
  for (const unknownKey of keys.filter((key) => !allowedKeys.includes(key))) {
    const alternatives = getAlternatives(unknownKey, allowedKeys);
    diagnostics.push(
      createDiagnostic(
        'UnknownKeyWarning',
        SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_UNKNOWN_KEY,
        joinPath(basePath, unknownKey),
        `Unknown key "${unknownKey}" in ${objectLabel} is ignored.`,
        {
          suggestion:
            alternatives.length > 0
              ? `Did you mean "${alternatives[0]}"?`
              : `Use one of the supported ${objectLabel} keys: ${allowedKeys.join(', ')}.`,
          alternatives,
        },
      ),
    );
  }
}

export function pushMissingReferenceDiagnostic(
  diagnostics: Diagnostic[],
  kind: DiagnosticKind,
  code: SsdlDiagnosticCode,
  path: string,
  message: string,
  value: string,
  validValues: readonly string[],
  fallbackSuggestion: string,
): void {
  const alternatives = getAlternatives(value, validValues);
  diagnostics.push(
    createDiagnostic(kind, code, path, message, {
      suggestion: alternatives.length > 0 ? `Did you mean "${alternatives[0]}"?` : fallbackSuggestion,
      alternatives,
    }),
  );
}

/**
 * Closest candidates by edit distance. Case-insensitive equality counts as
 * distance zero so `NOx` and `Nox` always pair up.
 */
export function getAlternatives(value: string, validValues: readonly string[]): readonly string[] {
  if (validValues.length === 0) {
    return [];
  }

  const lowered = value.toLowerCase();
  const scored = validValues
    .filter((candidate) => candidate !== value)
    .map((candidate) => ({
      candidate,
      distance: candidate.toLowerCase() === lowered ? 0 : levenshteinDistance(value, candidate),
    }))
    .sort((left, right) => {
      if (left.distance !== right.distance) {
        return left.distance - right.distance;
      }
      return left.candidate.localeCompare(right.candidate);
    });

  const bestDistance = scored[0]?.distance;
  if (bestDistance === undefined || bestDistance > MAX_ALTERNATIVE_DISTANCE) {
    return [];
  }

  return scored.filter((entry) => entry.distance === bestDistance).map((entry) => entry.candidate);
}

export function levenshteinDistance(left: string, right: string): number {
  const cols = right.length + 1;
  let previousRow: number[] = Array.from({ length: cols }, (_unused, index) => index);

  for (let row = 1; row <= left.length; row += 1) {
    const currentRow: number[] = new Array<number>(cols).fill(0);
    currentRow[0] = row;

    for (let col = 1; col <= right.length; col += 1) {
      const substitutionCost = left[row - 1] === right[col - 1] ? 0 : 1;
      const insertCost = (currentRow[col - 1] ?? Number.POSITIVE_INFINITY) + 1;
      const deleteCost = (previousRow[col] ?? Number.POSITIVE_INFINITY) + 1;
      const replaceCost = (previousRow[col - 1] ?? Number.POSITIVE_INFINITY) + substitutionCost;
      currentRow[col] = Math.min(insertCost, deleteCost, replaceCost);
    }

    previousRow = currentRow;
  }

  return previousRow[right.length] ?? 0;
}

export function countErrorDiagnostics(diagnostics: readonly Diagnostic[]): number {
  return diagnostics.reduce((count, diagnostic) => count + (diagnostic.severity === 'error' ? 1 : 0), 0);
}
