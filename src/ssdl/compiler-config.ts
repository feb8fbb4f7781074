import type { AttributeCatalog, SemanticVersion } from '../kernel/types.js';
import { loadAttributeCatalog, parseAttributeCatalog } from './attribute-catalog.js';
import { SILENT_COMPILER_LOGGER, type CompilerLogger } from './compiler-logger.js';
import { createProviderRegistry, type ProviderRegistry, type ProviderStrategy } from './provider-registry.js';
import { DEFAULT_MAX_ALIAS_COUNT, DEFAULT_MAX_DEPTH, DEFAULT_MAX_INPUT_BYTES } from './source-reader.js';
import {
  createVisualizationRegistry,
  type VisualizationDefinition,
  type VisualizationRegistry,
} from './visualization-registry.js';

export interface CompileLimits {
  readonly maxInputBytes: number;
  readonly maxDepth: number;
  readonly maxAliasCount: number;
  readonly maxDiagnosticCount: number;
}

export const DEFAULT_COMPILE_LIMITS: CompileLimits = {
  maxInputBytes: DEFAULT_MAX_INPUT_BYTES,
  maxDepth: DEFAULT_MAX_DEPTH,
  maxAliasCount: DEFAULT_MAX_ALIAS_COUNT,
  maxDiagnosticCount: 500,
};

/** One reference version per supported major. */
export const DEFAULT_SUPPORTED_VERSIONS: readonly SemanticVersion[] = [{ major: 1, minor: 0, patch: 0 }];

export interface CompilerConfig {
  readonly supportedVersions: readonly SemanticVersion[];
  readonly providers: ProviderRegistry;
  readonly visualizations: VisualizationRegistry;
  readonly catalog: AttributeCatalog;
  readonly limits: CompileLimits;
  readonly logger: CompilerLogger;
}

export interface CompilerConfigOverrides {
  readonly supportedVersions?: readonly SemanticVersion[];
  readonly providers?: readonly ProviderStrategy[];
  readonly visualizations?: readonly VisualizationDefinition[];
  /** Replaces the bundled catalog; validated like the bundled file. */
  readonly catalog?: unknown;
  readonly limits?: Partial<CompileLimits>;
  readonly logger?: CompilerLogger;
}

/**
 * Builds an independent compiler configuration. Invalid overrides throw,
 * they never become diagnostics.
 */
export function createCompilerConfig(overrides: CompilerConfigOverrides = {}): CompilerConfig {
  return {
    supportedVersions: resolveSupportedVersions(overrides.supportedVersions),
    providers: createProviderRegistry(overrides.providers),
    visualizations: createVisualizationRegistry(overrides.visualizations),
    catalog: overrides.catalog === undefined ? loadAttributeCatalog() : parseAttributeCatalog(overrides.catalog),
    limits: resolveCompileLimits(overrides.limits),
    logger: overrides.logger ?? SILENT_COMPILER_LOGGER,
  };
}

export function resolveCompileLimits(overrides?: Partial<CompileLimits>): CompileLimits {
  return {
    maxInputBytes: resolveLimit(overrides?.maxInputBytes, DEFAULT_COMPILE_LIMITS.maxInputBytes, 'maxInputBytes', 1),
    maxDepth: resolveLimit(overrides?.maxDepth, DEFAULT_COMPILE_LIMITS.maxDepth, 'maxDepth', 1),
    maxAliasCount: resolveLimit(overrides?.maxAliasCount, DEFAULT_COMPILE_LIMITS.maxAliasCount, 'maxAliasCount', 0),
    maxDiagnosticCount: resolveLimit(
      overrides?.maxDiagnosticCount,
      DEFAULT_COMPILE_LIMITS.maxDiagnosticCount,
      'maxDiagnosticCount',
      0,
    ),
  };
}

function resolveSupportedVersions(candidate: readonly SemanticVersion[] | undefined): readonly SemanticVersion[] {
  if (candidate === undefined) {
    return DEFAULT_SUPPORTED_VERSIONS;
  }
  if (candidate.length === 0) {
    throw new Error('supportedVersions must list at least one version.');
  }
  const majors = new Set<number>();
  for (const version of candidate) {
    for (const component of [version.major, version.minor, version.patch]) {
      if (!Number.isInteger(component) || component < 0) {
        throw new Error('supportedVersions entries must use integers >= 0.');
      }
    }
    if (majors.has(version.major)) {
      throw new Error(`supportedVersions lists major version ${version.major} more than once.`);
    }
    majors.add(version.major);
  }
  return candidate.map((version) => ({ major: version.major, minor: version.minor, patch: version.patch }));
}

function resolveLimit(candidate: number | undefined, fallback: number, name: keyof CompileLimits, minimum: number): number {
  if (candidate === undefined) {
    return fallback;
  }
  if (!Number.isInteger(candidate) || candidate < minimum) {
    throw new Error(`${name} must be an integer >= ${minimum}.`);
  }
  return candidate;
}
