export type DiagnosticSeverity = 'error' | 'warning';

export const DIAGNOSTIC_KINDS = [
  'ParseError',
  'UnsupportedVersionError',
  'DuplicateKeyError',
  'InconsistentKeyError',
  'DanglingReferenceError',
  'UndeclaredRoleError',
  'UnsupportedProviderError',
  'UnsupportedVisualizationError',
  'UnknownAttributeWarning',
  'VersionWarning',
  'UnknownKeyWarning',
  'RenderContractWarning',
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

const SEVERITY_BY_KIND: Readonly<Record<DiagnosticKind, DiagnosticSeverity>> = {
  ParseError: 'error',
  UnsupportedVersionError: 'error',
  DuplicateKeyError: 'error',
  InconsistentKeyError: 'error',
  DanglingReferenceError: 'error',
  UndeclaredRoleError: 'error',
  UnsupportedProviderError: 'error',
  UnsupportedVisualizationError: 'error',
  UnknownAttributeWarning: 'warning',
  VersionWarning: 'warning',
  UnknownKeyWarning: 'warning',
  RenderContractWarning: 'warning',
};

export function severityOfKind(kind: DiagnosticKind): DiagnosticSeverity {
  return SEVERITY_BY_KIND[kind];
}

export interface DiagnosticSourceSpan {
  readonly line: number;
  readonly col: number;
  readonly endLine: number;
  readonly endCol: number;
}

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly expected?: string;
  readonly actual?: string;
  readonly suggestion?: string;
  readonly alternatives?: readonly string[];
  readonly span?: DiagnosticSourceSpan;
}

export function isFatal(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === 'error';
}

export function hasFatalDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(isFatal);
}
