import type { Diagnostic } from '../kernel/diagnostics.js';
import type {
  ApplicationMeta,
  DataSource,
  DeploymentEnv,
  Role,
  SemanticVersion,
  ServiceMeta,
  Visualization,
} from '../kernel/types.js';
import type {
  Located,
  ParsedDataSource,
  ParsedDeploymentEnv,
  ParsedDescriptor,
  ParsedRole,
  ParsedVisualization,
} from './descriptor-doc.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import type { SourceSpan } from './source-map.js';
import { createDiagnostic } from './validate-shared.js';

export interface ExtractedVisualization extends Located<Visualization> {
  readonly sourceRef: Located<string>;
  readonly fieldRefs: readonly Located<string>[];
  readonly roleRefs: readonly Located<string>[];
}

export interface ExtractedDeploymentEnv extends Located<DeploymentEnv> {
  readonly roleRefs: readonly Located<string>[];
}

export interface ExtractedEntities {
  readonly service: ServiceMeta | null;
  readonly application: ApplicationMeta | null;
  readonly defaultRoleRef?: Located<string>;
  readonly dataSources: ReadonlyMap<string, Located<DataSource>>;
  readonly visualizations: ReadonlyMap<string, ExtractedVisualization>;
  readonly roles: ReadonlyMap<string, Located<Role>>;
  readonly deploymentEnvs: ReadonlyMap<string, ExtractedDeploymentEnv>;
}

export interface ExtractEntitiesResult {
  readonly entities: ExtractedEntities;
  readonly diagnostics: readonly Diagnostic[];
}

interface EntityCollector<T> {
  readonly name: string;
  readonly entity: T | null;
  readonly diagnostics: readonly Diagnostic[];
  readonly span?: SourceSpan;
}

/** Keyed entities as they appear in the parsed tree. */
interface KeyedSource {
  readonly key: string;
  readonly declaredName?: Located<string>;
  readonly path: string;
  readonly span?: SourceSpan;
}

export function extractEntities(parsed: ParsedDescriptor): ExtractEntitiesResult {
  const diagnostics: Diagnostic[] = [];

  const dataSources = mergeCollectors(
    parsed.dataSources.map((item) => collectKeyed(item, 'Data source', () => toDataSource(item))),
    'Data source',
    diagnostics,
  );
  const visualizations = mergeCollectors(
    (parsed.application?.visualizations ?? []).map((item) =>
      collectKeyed(item, 'Visualization', () => toVisualization(item)),
    ),
    'Visualization',
    diagnostics,
  );
  const roles = extractRoles(parsed.application?.roles ?? [], diagnostics);
  const deploymentEnvs = mergeCollectors(
    parsed.deploymentEnvs.map((item) => collectKeyed(item, 'Deployment environment', () => toDeploymentEnv(item))),
    'Deployment environment',
    diagnostics,
  );

  const service: ServiceMeta | null =
    parsed.service === null
      ? null
      : { name: parsed.service.name, scope: parsed.service.scope, version: copyVersion(parsed.service.version.value) };
  const application = parsed.application;

  return {
    entities: {
      service,
      application:
        application === null
          ? null
          : {
              type: application.type,
              ...(application.layout === undefined ? {} : { layout: application.layout }),
              ...(application.defaultRole === undefined ? {} : { defaultRole: application.defaultRole.value }),
            },
      ...(application?.defaultRole === undefined ? {} : { defaultRoleRef: application.defaultRole }),
      dataSources,
      visualizations,
      roles,
      deploymentEnvs,
    },
    diagnostics,
  };
}

function collectKeyed<T>(source: KeyedSource, label: string, build: () => T): EntityCollector<T> {
  const diagnostics: Diagnostic[] = [];
  const declared = source.declaredName;
  if (declared !== undefined && declared.value !== source.key) {
    diagnostics.push(
      createDiagnostic(
        'InconsistentKeyError',
        SSDL_DIAGNOSTIC_CODES.SSDL_EXTRACT_KEY_NAME_MISMATCH,
        declared.path,
        `${label} declared under key "${source.key}" is named "${declared.value}".`,
        {
          expected: source.key,
          actual: declared.value,
          suggestion: `Rename the key to "${declared.value}" or set name to "${source.key}".`,
        },
      ),
    );
  }
  return {
    name: source.key,
    entity: build(),
    diagnostics,
    ...(source.span === undefined ? {} : { span: source.span }),
  };
}

/** Merges per-entity collectors in declaration order; the first declaration of a name wins. */
function mergeCollectors<T extends Located<{ readonly name: string }>>(
  collectors: readonly EntityCollector<T>[],
  label: string,
  diagnostics: Diagnostic[],
): ReadonlyMap<string, T> {
  const merged = new Map<string, T>();
  for (const collector of collectors) {
    diagnostics.push(...collector.diagnostics);
    if (collector.entity === null) {
      continue;
    }
    const existing = merged.get(collector.name);
    if (existing !== undefined) {
      diagnostics.push(
        createDiagnostic(
          'DuplicateKeyError',
          SSDL_DIAGNOSTIC_CODES.SSDL_EXTRACT_DUPLICATE_NAME,
          collector.entity.path,
          `${label} "${collector.name}" is already declared at ${existing.path}.`,
          {
            suggestion: `Rename or remove one of the "${collector.name}" declarations.`,
            ...(collector.span === undefined ? {} : { span: collector.span }),
          },
        ),
      );
      continue;
    }
    merged.set(collector.name, collector.entity);
  }
  return merged;
}

function extractRoles(parsedRoles: readonly ParsedRole[], diagnostics: Diagnostic[]): ReadonlyMap<string, Located<Role>> {
  const roles = new Map<string, Located<Role>>();
  for (const role of parsedRoles) {
    const existing = roles.get(role.name);
    if (existing !== undefined) {
      diagnostics.push(
        createDiagnostic(
          'DuplicateKeyError',
          SSDL_DIAGNOSTIC_CODES.SSDL_EXTRACT_DUPLICATE_ROLE,
          role.path,
          `Role "${role.name}" is already declared at ${existing.path}.`,
          {
            suggestion: `Remove the repeated "${role.name}" role.`,
            ...(role.span === undefined ? {} : { span: role.span }),
          },
        ),
      );
      continue;
    }
    roles.set(role.name, {
      value: { name: role.name, hierarchy: role.hierarchy, declaration: role.declaration },
      path: role.path,
    });
  }
  return roles;
}

function toDataSource(item: ParsedDataSource): Located<DataSource> {
  return {
    value: {
      name: item.key,
      category: item.category,
      provider: item.provider,
      type: item.type,
      uri: item.uri,
      query: { type: item.query.type, select: [...item.query.select] },
    },
    path: item.path,
  };
}

function toVisualization(item: ParsedVisualization): ExtractedVisualization {
  const roles = item.roles?.map((role) => role.value);
  return {
    value: {
      name: item.key,
      type: item.type,
      source: item.source.value,
      data: item.data.map((field) => field.value),
      ...(item.extra === undefined ? {} : { extra: { ...item.extra } }),
      ...(roles === undefined ? {} : { roles }),
    },
    path: item.path,
    sourceRef: item.source,
    fieldRefs: item.data,
    roleRefs: item.roles ?? [],
  };
}

function toDeploymentEnv(item: ParsedDeploymentEnv): ExtractedDeploymentEnv {
  const roles = item.roles?.map((role) => role.value);
  return {
    value: {
      name: item.key,
      uri: item.uri,
      port: item.port,
      type: item.type,
      ...(roles === undefined ? {} : { roles }),
      ...(item.credentials === undefined ? {} : { credentials: item.credentials }),
    },
    path: item.path,
    roleRefs: item.roles ?? [],
  };
}

function copyVersion(version: SemanticVersion): SemanticVersion {
  return { major: version.major, minor: version.minor, patch: version.patch };
}
