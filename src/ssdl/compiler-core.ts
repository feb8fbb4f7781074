import { hasFatalDiagnostics, type Diagnostic } from '../kernel/diagnostics.js';
import type { DescriptorIR, VersionCompatibility } from '../kernel/types.js';
import { compileQueries } from './compile-queries.js';
import { createCompilerConfig, type CompilerConfig } from './compiler-config.js';
import { finalizeDiagnostics } from './compiler-diagnostics.js';
import { emitDescriptorIR } from './emit-ir.js';
import { extractEntities } from './extract-entities.js';
import { parseDescriptor } from './parser.js';
import { resolveReferences } from './resolve-references.js';
import type { DescriptorSourceMap } from './source-map.js';
import { readDescriptorSource, readDescriptorValue, type DescriptorSourceReadResult } from './source-reader.js';
import { countErrorDiagnostics } from './validate-shared.js';
import { checkDescriptorVersion } from './version-gate.js';

export const PIPELINE_STATES = [
  'INIT',
  'PARSED',
  'VERSION_CHECKED',
  'EXTRACTED',
  'RESOLVED',
  'COMPILED',
  'EMITTED',
  'FAILED',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export interface CompileDescriptorResult {
  /** Present only when the run reached `EMITTED`. */
  readonly ir: DescriptorIR | null;
  readonly diagnostics: readonly Diagnostic[];
  readonly state: PipelineState;
  /** Every state the run passed through, starting at `INIT`. */
  readonly transitions: readonly PipelineState[];
  readonly truncatedDiagnosticCount: number;
  readonly sourceMap: DescriptorSourceMap;
}

export function compileDescriptorSource(text: string, config: CompilerConfig = createCompilerConfig()): CompileDescriptorResult {
  return compileReadDescriptor(
    readDescriptorSource(text, {
      maxInputBytes: config.limits.maxInputBytes,
      maxDepth: config.limits.maxDepth,
      maxAliasCount: config.limits.maxAliasCount,
    }),
    config,
  );
}

/** Compiles an in-memory descriptor value; diagnostics carry no spans. */
export function compileDescriptorValue(value: unknown, config: CompilerConfig = createCompilerConfig()): CompileDescriptorResult {
  return compileReadDescriptor(readDescriptorValue(value), config);
}

export function compileReadDescriptor(read: DescriptorSourceReadResult, config: CompilerConfig): CompileDescriptorResult {
  const { logger } = config;
  const transitions: PipelineState[] = ['INIT'];
  const diagnostics: Diagnostic[] = [...read.diagnostics];

  const finish = (state: PipelineState, ir: DescriptorIR | null = null): CompileDescriptorResult => {
    if (state === 'FAILED') {
      transitions.push('FAILED');
    }
    const finalized = finalizeDiagnostics(diagnostics, read.sourceMap, config.limits.maxDiagnosticCount);
    return {
      ir,
      diagnostics: finalized.diagnostics,
      state,
      transitions,
      truncatedDiagnosticCount: finalized.truncatedCount,
      sourceMap: read.sourceMap,
    };
  };
  const enter = (state: PipelineState): void => {
    transitions.push(state);
    logger.logStage({ stage: state, diagnosticCount: diagnostics.length, errorCount: countErrorDiagnostics(diagnostics) });
  };
  const halt = (stage: PipelineState, reason: string): CompileDescriptorResult => {
    logger.logHalt({ stage, reason });
    return finish('FAILED');
  };

  if (read.root === null) {
    return halt('INIT', 'descriptor source is unreadable');
  }

  const parsed = parseDescriptor(read.root);
  diagnostics.push(...parsed.diagnostics);
  enter('PARSED');

  let compatibility: VersionCompatibility | null = null;
  if (parsed.descriptor.service !== null) {
    const gate = checkDescriptorVersion(parsed.descriptor.service.version, config.supportedVersions);
    diagnostics.push(...gate.diagnostics);
    if (gate.compatibility === null) {
      return halt('VERSION_CHECKED', 'unsupported descriptor major version');
    }
    compatibility = gate.compatibility;
  }
  enter('VERSION_CHECKED');

  const extracted = extractEntities(parsed.descriptor);
  diagnostics.push(...extracted.diagnostics);
  enter('EXTRACTED');
  if (hasFatalDiagnostics(diagnostics)) {
    return halt('EXTRACTED', 'structural or extraction errors');
  }

  const { entities } = extracted;
  const resolved = resolveReferences(entities, { visualizations: config.visualizations, catalog: config.catalog });
  diagnostics.push(...resolved.diagnostics);
  if (hasFatalDiagnostics(resolved.diagnostics)) {
    return halt('RESOLVED', 'unresolved references');
  }
  enter('RESOLVED');

  const compiled = compileQueries(entities.dataSources, { providers: config.providers, catalog: config.catalog });
  diagnostics.push(...compiled.diagnostics);
  if (hasFatalDiagnostics(compiled.diagnostics)) {
    return halt('COMPILED', 'query compilation errors');
  }
  enter('COMPILED');

  if (entities.service === null || entities.application === null || compatibility === null) {
    throw new Error('Descriptor reached emission without service, application or version compatibility.');
  }

  const finalized = finalizeDiagnostics(diagnostics, read.sourceMap, config.limits.maxDiagnosticCount);
  const ir = emitDescriptorIR({
    service: { ...entities.service, compatibility },
    application: entities.application,
    dataSources: compiled.dataSources,
    bindings: resolved.bindings,
    roles: [...entities.roles.values()].map((role) => role.value),
    deploymentEnvs: new Map([...entities.deploymentEnvs].map(([name, env]) => [name, env.value] as const)),
    diagnostics: finalized.diagnostics,
    truncatedDiagnosticCount: finalized.truncatedCount,
  });
  enter('EMITTED');
  logger.logSummary({
    state: 'EMITTED',
    dataSourceCount: Object.keys(ir.dataSources).length,
    visualizationCount: Object.keys(ir.visualizations).length,
    errorCount: 0,
    warningCount: ir.diagnostics.length,
  });
  return finish('EMITTED', ir);
}
