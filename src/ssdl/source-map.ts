import type { DiagnosticSourceSpan } from '../kernel/diagnostics.js';

export type SourceSpan = DiagnosticSourceSpan;

export interface DescriptorSourceMap {
  readonly byPath: Readonly<Record<string, SourceSpan>>;
}

export const EMPTY_SOURCE_MAP: DescriptorSourceMap = Object.freeze<DescriptorSourceMap>({ byPath: {} });
