import type { Diagnostic } from '../kernel/diagnostics.js';
import type {
  AttributeCatalog,
  CompiledDataSource,
  DataSource,
  ProviderCapability,
  QueryFilterSlot,
} from '../kernel/types.js';
import { listEntityTypes, lookupEntityAttributes } from './attribute-catalog.js';
import type { Located } from './descriptor-doc.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import type { ProviderRegistry } from './provider-registry.js';
import { createDiagnostic, getAlternatives, indexPath, joinPath, pushMissingReferenceDiagnostic } from './validate-shared.js';

export interface CompileQueriesOptions {
  readonly providers: ProviderRegistry;
  readonly catalog: AttributeCatalog;
}

export interface CompileQueriesResult {
  readonly dataSources: ReadonlyMap<string, CompiledDataSource>;
  readonly diagnostics: readonly Diagnostic[];
}

export function compileQueries(
  dataSources: ReadonlyMap<string, Located<DataSource>>,
  options: CompileQueriesOptions,
): CompileQueriesResult {
  const diagnostics: Diagnostic[] = [];
  const compiled = new Map<string, CompiledDataSource>();

  for (const [name, located] of dataSources) {
    const source = located.value;
    const strategy = options.providers.get(source.provider);
    if (strategy === undefined) {
      const supported = [...options.providers.keys()];
      pushMissingReferenceDiagnostic(
        diagnostics,
        'UnsupportedProviderError',
        SSDL_DIAGNOSTIC_CODES.SSDL_QUERY_PROVIDER_UNSUPPORTED,
        joinPath(located.path, 'provider'),
        `Data source "${name}" uses unsupported provider "${source.provider}".`,
        source.provider,
        supported,
        `Use one of the supported providers: ${supported.join(', ')}.`,
      );
      continue;
    }

    const filters = checkAttributesAndCollectFilters(located, strategy.capabilities, options.catalog, diagnostics);
    compiled.set(name, { ...source, plan: strategy.compile(source, filters) });
  }

  return { dataSources: compiled, diagnostics };
}

function checkAttributesAndCollectFilters(
  located: Located<DataSource>,
  capabilities: readonly ProviderCapability[],
  catalog: AttributeCatalog,
  diagnostics: Diagnostic[],
): readonly QueryFilterSlot[] {
  const source = located.value;
  const queryPath = joinPath(located.path, 'query');
  const attributes = lookupEntityAttributes(catalog, source.provider, source.query.type);
  if (attributes === undefined) {
    const knownTypes = listEntityTypes(catalog, source.provider);
    const alternatives = getAlternatives(source.query.type, knownTypes);
    diagnostics.push(
      createDiagnostic(
        'UnknownAttributeWarning',
        SSDL_DIAGNOSTIC_CODES.SSDL_QUERY_ENTITY_TYPE_UNKNOWN,
        joinPath(queryPath, 'type'),
        `Entity type "${source.query.type}" is not in the ${source.provider} attribute catalog; its attributes are passed through unchecked.`,
        {
          actual: source.query.type,
          ...(alternatives.length > 0 ? { suggestion: `Did you mean "${alternatives[0]}"?` } : {}),
          alternatives,
        },
      ),
    );
    return [];
  }

  const known = Object.keys(attributes);
  const filters: QueryFilterSlot[] = [];
  source.query.select.forEach((attribute, index) => {
    const kind = Object.hasOwn(attributes, attribute) ? attributes[attribute] : undefined;
    if (kind === undefined) {
      const alternatives = getAlternatives(attribute, known);
      diagnostics.push(
        createDiagnostic(
          'UnknownAttributeWarning',
          SSDL_DIAGNOSTIC_CODES.SSDL_QUERY_ATTRIBUTE_UNKNOWN,
          indexPath(joinPath(queryPath, 'select'), index),
          `Attribute "${attribute}" is not defined for ${source.provider} entity type "${source.query.type}".`,
          {
            actual: attribute,
            ...(alternatives.length > 0 ? { suggestion: `Did you mean "${alternatives[0]}"?` } : {}),
            alternatives,
          },
        ),
      );
      return;
    }
    if (kind === 'geo' && capabilities.includes('geo-filter')) {
      filters.push({ kind: 'geo', attribute });
    }
    if (kind === 'datetime' && capabilities.includes('time-range')) {
      filters.push({ kind: 'timeRange', attribute });
    }
  });
  return filters;
}
