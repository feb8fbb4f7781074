import type { Diagnostic } from '../kernel/diagnostics.js';
import type {
  AttributeCatalog,
  DataSource,
  RenderContract,
  Visualization,
  VisualizationField,
} from '../kernel/types.js';
import { lookupAttributeKind } from './attribute-catalog.js';
import type { Located } from './descriptor-doc.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import type { ExtractedEntities, ExtractedVisualization } from './extract-entities.js';
import { createDiagnostic, getAlternatives, joinPath, pushMissingReferenceDiagnostic } from './validate-shared.js';
import type { VisualizationRegistry } from './visualization-registry.js';

export interface ResolvedVisualizationBinding {
  readonly visualization: Visualization;
  readonly sourceName: string;
  readonly fields: readonly VisualizationField[];
  readonly render: RenderContract;
}

export interface ResolveReferencesOptions {
  readonly visualizations: VisualizationRegistry;
  readonly catalog: AttributeCatalog;
}

export interface ResolveReferencesResult {
  /** Visualizations whose source and type resolved, in declaration order. */
  readonly bindings: readonly ResolvedVisualizationBinding[];
  readonly diagnostics: readonly Diagnostic[];
}

export function resolveReferences(
  entities: ExtractedEntities,
  options: ResolveReferencesOptions,
): ResolveReferencesResult {
  const diagnostics: Diagnostic[] = [];
  const sourceIndex = new Map<string, DataSource>();
  for (const [name, located] of entities.dataSources) {
    sourceIndex.set(name, located.value);
  }
  const declaredRoles = [...entities.roles.keys()];
  const checkRole = (ref: Located<string>, owner: string): void => {
    if (entities.roles.has(ref.value)) {
      return;
    }
    pushMissingReferenceDiagnostic(
      diagnostics,
      'UndeclaredRoleError',
      SSDL_DIAGNOSTIC_CODES.SSDL_XREF_ROLE_UNDECLARED,
      ref.path,
      `${owner} references undeclared role "${ref.value}".`,
      ref.value,
      declaredRoles,
      declaredRoles.length > 0
        ? `Declare "${ref.value}" under application.roles or use one of: ${declaredRoles.join(', ')}.`
        : `Declare "${ref.value}" under application.roles.`,
    );
  };

  if (entities.defaultRoleRef !== undefined) {
    checkRole(entities.defaultRoleRef, 'Application default role');
  }

  const bindings: ResolvedVisualizationBinding[] = [];
  for (const [name, visualization] of entities.visualizations) {
    const binding = resolveVisualization(name, visualization, sourceIndex, options, diagnostics);
    if (binding !== null) {
      bindings.push(binding);
    }
    for (const ref of visualization.roleRefs) {
      checkRole(ref, `Visualization "${name}"`);
    }
  }

  for (const [name, env] of entities.deploymentEnvs) {
    for (const ref of env.roleRefs) {
      checkRole(ref, `Deployment environment "${name}"`);
    }
  }

  return { bindings, diagnostics };
}

function resolveVisualization(
  name: string,
  located: ExtractedVisualization,
  sourceIndex: ReadonlyMap<string, DataSource>,
  options: ResolveReferencesOptions,
  diagnostics: Diagnostic[],
): ResolvedVisualizationBinding | null {
  const visualization = located.value;
  const source = sourceIndex.get(located.sourceRef.value);
  if (source === undefined) {
    const known = [...sourceIndex.keys()];
    pushMissingReferenceDiagnostic(
      diagnostics,
      'DanglingReferenceError',
      SSDL_DIAGNOSTIC_CODES.SSDL_XREF_SOURCE_MISSING,
      located.sourceRef.path,
      `Visualization "${name}" references unknown data source "${located.sourceRef.value}".`,
      located.sourceRef.value,
      known,
      known.length > 0 ? `Use one of the declared data sources: ${known.join(', ')}.` : 'Declare the data source under data_sources.',
    );
  }

  const definition = options.visualizations.get(visualization.type);
  if (definition === undefined) {
    const supported = [...options.visualizations.keys()];
    const alternatives = getAlternatives(visualization.type, supported);
    diagnostics.push(
      createDiagnostic(
        'UnsupportedVisualizationError',
        SSDL_DIAGNOSTIC_CODES.SSDL_XREF_VISUALIZATION_TYPE_UNSUPPORTED,
        joinPath(located.path, 'type'),
        `Visualization "${name}" has unsupported type "${visualization.type}".`,
        {
          expected: supported.join(' | '),
          actual: visualization.type,
          suggestion:
            alternatives.length > 0 ? `Did you mean "${alternatives[0]}"?` : `Use one of: ${supported.join(', ')}.`,
          alternatives,
        },
      ),
    );
  }

  if (source === undefined || definition === undefined) {
    return null;
  }

  const fields = classifyFields(visualization.data, source.query.select);
  const build = definition.buildContract(visualization.data, (field) =>
    lookupAttributeKind(options.catalog, source.provider, source.query.type, field),
  );
  if (build.shortfall !== undefined) {
    diagnostics.push(
      createDiagnostic('RenderContractWarning', build.shortfall.code, joinPath(located.path, 'data'), build.shortfall.message, {
        suggestion: build.shortfall.suggestion,
      }),
    );
  }

  return { visualization, sourceName: source.name, fields, render: build.contract };
}

/** `projected` when the source selects the name verbatim, else `derived`. */
export function classifyFields(data: readonly string[], select: readonly string[]): readonly VisualizationField[] {
  const selected = new Set(select);
  return data.map((field): VisualizationField => {
    if (selected.has(field)) {
      return { name: field, origin: 'projected' };
    }
    const candidates = getAlternatives(field, select);
    return candidates.length > 0 ? { name: field, origin: 'derived', candidates } : { name: field, origin: 'derived' };
  });
}
