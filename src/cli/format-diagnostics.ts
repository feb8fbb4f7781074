import type { Diagnostic } from '../kernel/diagnostics.js';

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.span === undefined ? '' : ` (${diagnostic.span.line}:${diagnostic.span.col})`;
  const path = diagnostic.path === '' ? '<root>' : diagnostic.path;
  const lines = [`${diagnostic.severity} ${diagnostic.code} at ${path}${location}: ${diagnostic.message}`];
  if (diagnostic.expected !== undefined && diagnostic.actual !== undefined) {
    lines.push(`  expected ${diagnostic.expected}, found ${diagnostic.actual}`);
  } else if (diagnostic.actual !== undefined) {
    lines.push(`  found ${diagnostic.actual}`);
  }
  if (diagnostic.suggestion !== undefined) {
    lines.push(`  hint: ${diagnostic.suggestion}`);
  }
  return lines.join('\n');
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  return diagnostics.map(formatDiagnostic).join('\n');
}
