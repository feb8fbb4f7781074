import type { Diagnostic } from '../kernel/diagnostics.js';
import {
  ROLE_HIERARCHIES,
  type CredentialMap,
  type ExtraMap,
  type ExtraValue,
  type RoleHierarchy,
  type SemanticVersion,
} from '../kernel/types.js';
import type {
  Located,
  ParsedApplication,
  ParsedDataSource,
  ParsedDeploymentEnv,
  ParsedDescriptor,
  ParsedRole,
  ParsedService,
  ParsedVisualization,
} from './descriptor-doc.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import { describeNode, type DocNode, type MapEntry, type MapNode } from './document-tree.js';
import {
  APPLICATION_KEYS,
  createDiagnostic,
  countErrorDiagnostics,
  DATA_SOURCE_KEYS,
  DEPLOYMENT_ENV_KEYS,
  DEPLOYMENT_KEYS,
  getAlternatives,
  indexPath,
  joinPath,
  pushUnknownKeyDiagnostics,
  QUERY_KEYS,
  ROLE_KEYS,
  SERVICE_KEYS,
  VERSION_KEYS,
  VISUALIZATION_KEYS,
} from './validate-shared.js';

export interface ParseDescriptorResult {
  readonly descriptor: ParsedDescriptor;
  readonly diagnostics: readonly Diagnostic[];
}

const MAX_PORT = 65535;
const VERSION_STRING_PATTERN = /^(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)$/;

/**
 * Turns a document tree into typed entities. An entity that produced an error
 * is left out of the result while its siblings are still parsed. The
 * application survives errors in its roles and visualizations so that
 * extraction still sees the entities that did parse.
 */
export function parseDescriptor(root: MapNode): ParseDescriptorResult {
  const diagnostics: Diagnostic[] = [];
  const fields = collectFields(root, '', diagnostics);

  const service = parseSection(diagnostics, () => parseService(requireField(fields, 'service', '', diagnostics), diagnostics));
  const dataSources = parseDataSources(requireField(fields, 'data_sources', '', diagnostics), diagnostics);
  const application = parseApplication(requireField(fields, 'application', '', diagnostics), diagnostics);
  const deploymentEnvs = parseDeployment(requireField(fields, 'deployment', '', diagnostics), diagnostics);

  return {
    descriptor: {
      service,
      dataSources,
      application,
      deploymentEnvs,
    },
    diagnostics,
  };
}

function parseSection<T>(diagnostics: Diagnostic[], parse: () => T | null): T | null {
  const errorsBefore = countErrorDiagnostics(diagnostics);
  const parsed = parse();
  return countErrorDiagnostics(diagnostics) > errorsBefore ? null : parsed;
}

function parseService(entry: MapEntry | undefined, diagnostics: Diagnostic[]): ParsedService | null {
  const path = 'service';
  const node = entry === undefined ? undefined : expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return null;
  }
  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], SERVICE_KEYS, path, diagnostics, 'service');

  const name = readRequiredString(fields, 'name', path, diagnostics);
  const scope = readRequiredString(fields, 'scope', path, diagnostics);
  const versionEntry = requireField(fields, 'version', path, diagnostics);
  const version = versionEntry === undefined ? undefined : parseVersion(versionEntry.value, joinPath(path, 'version'), diagnostics);
  if (name === undefined || scope === undefined || version === undefined) {
    return null;
  }
  return { name, scope, version: { value: version, path: joinPath(path, 'version') }, path };
}

function parseVersion(node: DocNode, path: string, diagnostics: Diagnostic[]): SemanticVersion | undefined {
  if (node.kind === 'scalar' && typeof node.value === 'string') {
    const match = VERSION_STRING_PATTERN.exec(node.value.trim());
    if (match === null) {
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_VERSION_INVALID,
          path,
          `Version "${node.value}" is not of the form major.minor.patch.`,
          { expected: 'major.minor.patch', actual: node.value },
        ),
      );
      return undefined;
    }
    return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
  }

  if (node.kind !== 'map') {
    pushTypeMismatch(diagnostics, path, '"major.minor.patch" string or { major, minor, patch } mapping', node);
    return undefined;
  }

  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], VERSION_KEYS, path, diagnostics, 'version');
  const major = readRequiredInteger(fields, 'major', path, diagnostics);
  const minor = readRequiredInteger(fields, 'minor', path, diagnostics);
  const patch = readRequiredInteger(fields, 'patch', path, diagnostics);
  if (major === undefined || minor === undefined || patch === undefined) {
    return undefined;
  }
  for (const [component, value] of [['major', major], ['minor', minor], ['patch', patch]] as const) {
    if (value < 0) {
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_VERSION_INVALID,
          joinPath(path, component),
          `Version ${component} must be a non-negative integer.`,
          { expected: 'integer >= 0', actual: String(value) },
        ),
      );
      return undefined;
    }
  }
  return { major, minor, patch };
}

function parseDataSources(entry: MapEntry | undefined, diagnostics: Diagnostic[]): readonly ParsedDataSource[] {
  const path = 'data_sources';
  const node = entry === undefined ? undefined : expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return [];
  }

  const parsed: ParsedDataSource[] = [];
  let declaredCount = 0;
  for (const categoryEntry of node.entries) {
    const categoryPath = joinPath(path, categoryEntry.key);
    const category = expectMap(categoryEntry.value, categoryPath, diagnostics);
    if (category === undefined) {
      continue;
    }
    for (const sourceEntry of category.entries) {
      declaredCount += 1;
      const dataSource = parseSection(diagnostics, () =>
        parseDataSource(categoryEntry.key, sourceEntry, joinPath(categoryPath, sourceEntry.key), diagnostics),
      );
      if (dataSource !== null) {
        parsed.push(dataSource);
      }
    }
  }

  if (declaredCount === 0) {
    pushEmptyContainer(diagnostics, path, 'at least one data source');
  }
  return parsed;
}

function parseDataSource(
  category: string,
  entry: MapEntry,
  path: string,
  diagnostics: Diagnostic[],
): ParsedDataSource | null {
  const node = expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return null;
  }
  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], DATA_SOURCE_KEYS, path, diagnostics, 'data source');

  const declaredName = readOptionalString(fields, 'name', path, diagnostics);
  const provider = readRequiredString(fields, 'provider', path, diagnostics);
  const type = readRequiredString(fields, 'type', path, diagnostics);
  const uri = readRequiredUri(fields, 'uri', path, diagnostics);

  const queryPath = joinPath(path, 'query');
  const queryEntry = requireField(fields, 'query', path, diagnostics);
  const queryNode = queryEntry === undefined ? undefined : expectMap(queryEntry.value, queryPath, diagnostics);
  let query: ParsedDataSource['query'] | undefined;
  if (queryNode !== undefined) {
    const queryFields = collectFields(queryNode, queryPath, diagnostics);
    pushUnknownKeyDiagnostics([...queryFields.keys()], QUERY_KEYS, queryPath, diagnostics, 'query');
    const queryType = readRequiredString(queryFields, 'type', queryPath, diagnostics);
    const select = readRequiredNameList(queryFields, 'select', queryPath, diagnostics);
    if (queryType !== undefined && select !== undefined) {
      query = { type: queryType, select: select.map((item) => item.value) };
    }
  }

  if (provider === undefined || type === undefined || uri === undefined || query === undefined) {
    return null;
  }
  return {
    key: entry.key,
    ...(declaredName === undefined ? {} : { declaredName }),
    path,
    ...(entry.span === undefined ? {} : { span: entry.span }),
    category,
    provider,
    type,
    uri,
    query,
  };
}

function parseApplication(entry: MapEntry | undefined, diagnostics: Diagnostic[]): ParsedApplication | null {
  const path = 'application';
  const node = entry === undefined ? undefined : expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return null;
  }
  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], APPLICATION_KEYS, path, diagnostics, 'application');

  const type = readRequiredString(fields, 'type', path, diagnostics);
  const layout = readOptionalString(fields, 'layout', path, diagnostics);
  const defaultRole = readOptionalString(fields, 'defaultRole', path, diagnostics);
  const roles = parseRoles(fields.get('roles'), joinPath(path, 'roles'), diagnostics);
  const visualizations = parseVisualizations(fields.get('visualizations'), joinPath(path, 'visualizations'), diagnostics);

  if (type === undefined) {
    return null;
  }
  return {
    type,
    ...(layout === undefined ? {} : { layout: layout.value }),
    ...(defaultRole === undefined ? {} : { defaultRole }),
    roles,
    visualizations,
    path,
  };
}

function parseRoles(entry: MapEntry | undefined, path: string, diagnostics: Diagnostic[]): readonly ParsedRole[] {
  if (entry === undefined) {
    return [];
  }
  if (entry.value.kind !== 'seq') {
    pushTypeMismatch(diagnostics, path, 'sequence of roles', entry.value);
    return [];
  }

  const roles: ParsedRole[] = [];
  entry.value.items.forEach((item, index) => {
    const role = parseSection(diagnostics, () => parseRole(item, indexPath(path, index), diagnostics));
    if (role !== null) {
      roles.push(role);
    }
  });
  return roles;
}

function parseRole(node: DocNode, path: string, diagnostics: Diagnostic[]): ParsedRole | null {
  const span = node.span === undefined ? {} : { span: node.span };
  if (node.kind === 'scalar' && typeof node.value === 'string' && node.value.trim() !== '') {
    return {
      name: node.value,
      hierarchy: toRoleHierarchy(node.value) ?? 'User',
      declaration: 'tag',
      path,
      ...span,
    };
  }
  if (node.kind !== 'map') {
    pushTypeMismatch(diagnostics, path, 'role tag or { name, hierarchy } mapping', node);
    return null;
  }

  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], ROLE_KEYS, path, diagnostics, 'role');
  const name = readRequiredString(fields, 'name', path, diagnostics);
  const hierarchyText = readOptionalString(fields, 'hierarchy', path, diagnostics);
  let hierarchy: RoleHierarchy = 'User';
  if (hierarchyText !== undefined) {
    const known = toRoleHierarchy(hierarchyText.value);
    if (known === undefined) {
      const alternatives = getAlternatives(hierarchyText.value, ROLE_HIERARCHIES);
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_ENUM_VALUE_INVALID,
          hierarchyText.path,
          `Unknown role hierarchy "${hierarchyText.value}".`,
          {
            expected: ROLE_HIERARCHIES.join(' | '),
            actual: hierarchyText.value,
            ...(alternatives.length > 0 ? { suggestion: `Did you mean "${alternatives[0]}"?` } : {}),
            alternatives,
          },
        ),
      );
      return null;
    }
    hierarchy = known;
  }
  if (name === undefined) {
    return null;
  }
  return { name, hierarchy, declaration: 'record', path, ...span };
}

function toRoleHierarchy(value: string): RoleHierarchy | undefined {
  return ROLE_HIERARCHIES.find((hierarchy) => hierarchy === value);
}

function parseVisualizations(
  entry: MapEntry | undefined,
  path: string,
  diagnostics: Diagnostic[],
): readonly ParsedVisualization[] {
  if (entry === undefined) {
    return [];
  }
  const node = expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return [];
  }

  const visualizations: ParsedVisualization[] = [];
  for (const visualizationEntry of node.entries) {
    const visualization = parseSection(diagnostics, () =>
      parseVisualization(visualizationEntry, joinPath(path, visualizationEntry.key), diagnostics),
    );
    if (visualization !== null) {
      visualizations.push(visualization);
    }
  }
  return visualizations;
}

function parseVisualization(entry: MapEntry, path: string, diagnostics: Diagnostic[]): ParsedVisualization | null {
  const node = expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return null;
  }
  const fields = collectFields(node, path, diagnostics);

  const declaredName = readOptionalString(fields, 'name', path, diagnostics);
  const type = readRequiredString(fields, 'type', path, diagnostics);
  const source = readRequiredString(fields, 'source', path, diagnostics);
  const data = readRequiredNameList(fields, 'data', path, diagnostics);
  const rolesEntry = fields.get('roles');
  const roles = rolesEntry === undefined ? undefined : readNameList(rolesEntry.value, joinPath(path, 'roles'), diagnostics, false);
  const extra = parseVisualizationExtra(fields, path, diagnostics);

  if (type === undefined || source === undefined || data === undefined || extra === null) {
    return null;
  }
  return {
    key: entry.key,
    ...(declaredName === undefined ? {} : { declaredName }),
    path,
    ...(entry.span === undefined ? {} : { span: entry.span }),
    type,
    source: { value: source, path: joinPath(path, 'source') },
    data,
    ...(extra === undefined ? {} : { extra }),
    ...(roles === undefined ? {} : { roles }),
  };
}

/**
 * Explicit `extra` entries first, then unrecognised visualization keys in
 * declaration order. An explicit entry shadows a folded key of the same name.
 */
function parseVisualizationExtra(
  fields: ReadonlyMap<string, MapEntry>,
  path: string,
  diagnostics: Diagnostic[],
): ExtraMap | undefined | null {
  const extra = new Map<string, ExtraValue>();
  let valid = true;
  let hasEntries = false;

  const explicitEntry = fields.get('extra');
  const explicitPath = joinPath(path, 'extra');
  if (explicitEntry !== undefined) {
    const explicit = expectMap(explicitEntry.value, explicitPath, diagnostics);
    if (explicit === undefined) {
      valid = false;
    } else {
      for (const [key, item] of collectFields(explicit, explicitPath, diagnostics)) {
        const value = readExtraValue(item.value, joinPath(explicitPath, key), diagnostics);
        if (value === undefined) {
          valid = false;
          continue;
        }
        extra.set(key, value);
        hasEntries = true;
      }
    }
  }

  for (const [key, item] of fields) {
    if (VISUALIZATION_KEYS.some((known) => known === key)) {
      continue;
    }
    const keyPath = joinPath(path, key);
    const value = readExtraValue(item.value, keyPath, diagnostics);
    if (value === undefined) {
      valid = false;
      continue;
    }
    if (extra.has(key)) {
      diagnostics.push(
        createDiagnostic(
          'UnknownKeyWarning',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EXTRA_KEY_SHADOWED,
          keyPath,
          `Key "${key}" is also set under extra; the extra value is kept.`,
          { suggestion: `Remove "${key}" or the extra.${key} entry.` },
        ),
      );
      continue;
    }
    extra.set(key, value);
    hasEntries = true;
  }

  if (!valid) {
    return null;
  }
  return hasEntries || explicitEntry !== undefined ? Object.fromEntries(extra) : undefined;
}

function readExtraValue(node: DocNode, path: string, diagnostics: Diagnostic[]): ExtraValue | undefined {
  if (node.kind === 'scalar' && node.value !== null) {
    return node.value;
  }
  pushTypeMismatch(diagnostics, path, 'string, number or boolean', node);
  return undefined;
}

function parseDeployment(entry: MapEntry | undefined, diagnostics: Diagnostic[]): readonly ParsedDeploymentEnv[] {
  const path = 'deployment';
  const node = entry === undefined ? undefined : expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return [];
  }
  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], DEPLOYMENT_KEYS, path, diagnostics, 'deployment');

  const envPath = joinPath(path, 'env');
  const envEntry = requireField(fields, 'env', path, diagnostics);
  const envNode = envEntry === undefined ? undefined : expectMap(envEntry.value, envPath, diagnostics);
  if (envNode === undefined) {
    return [];
  }
  if (envNode.entries.length === 0) {
    pushEmptyContainer(diagnostics, envPath, 'at least one deployment environment');
    return [];
  }

  const envs: ParsedDeploymentEnv[] = [];
  for (const item of envNode.entries) {
    const env = parseSection(diagnostics, () => parseDeploymentEnv(item, joinPath(envPath, item.key), diagnostics));
    if (env !== null) {
      envs.push(env);
    }
  }
  return envs;
}

function parseDeploymentEnv(entry: MapEntry, path: string, diagnostics: Diagnostic[]): ParsedDeploymentEnv | null {
  const node = expectMap(entry.value, path, diagnostics);
  if (node === undefined) {
    return null;
  }
  const fields = collectFields(node, path, diagnostics);
  pushUnknownKeyDiagnostics([...fields.keys()], DEPLOYMENT_ENV_KEYS, path, diagnostics, 'deployment environment');

  const declaredName = readOptionalString(fields, 'name', path, diagnostics);
  const uri = readRequiredUri(fields, 'uri', path, diagnostics);
  const port = readPort(fields, path, diagnostics);
  const type = readRequiredString(fields, 'type', path, diagnostics);
  const rolesEntry = fields.get('roles');
  const roles = rolesEntry === undefined ? undefined : readNameList(rolesEntry.value, joinPath(path, 'roles'), diagnostics, false);
  const credentialsEntry = fields.get('credentials');
  const credentials =
    credentialsEntry === undefined
      ? undefined
      : readCredentials(credentialsEntry.value, joinPath(path, 'credentials'), diagnostics);

  if (uri === undefined || port === undefined || type === undefined || credentials === null) {
    return null;
  }
  return {
    key: entry.key,
    ...(declaredName === undefined ? {} : { declaredName }),
    path,
    ...(entry.span === undefined ? {} : { span: entry.span }),
    uri,
    port,
    type,
    ...(roles === undefined ? {} : { roles }),
    ...(credentials === undefined ? {} : { credentials }),
  };
}

/** String-valued mapping; `null` once any entry is rejected. */
function readCredentials(node: DocNode, path: string, diagnostics: Diagnostic[]): CredentialMap | null {
  const map = expectMap(node, path, diagnostics);
  if (map === undefined) {
    return null;
  }
  const credentials = new Map<string, string>();
  let valid = true;
  for (const [key, item] of collectFields(map, path, diagnostics)) {
    if (item.value.kind === 'scalar' && typeof item.value.value === 'string') {
      credentials.set(key, item.value.value);
      continue;
    }
    pushTypeMismatch(diagnostics, joinPath(path, key), 'string', item.value);
    valid = false;
  }
  return valid ? Object.fromEntries(credentials) : null;
}

function readPort(fields: ReadonlyMap<string, MapEntry>, parentPath: string, diagnostics: Diagnostic[]): number | undefined {
  const port = readRequiredInteger(fields, 'port', parentPath, diagnostics);
  if (port === undefined) {
    return undefined;
  }
  if (port < 0 || port > MAX_PORT) {
    diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_PORT_OUT_OF_RANGE,
        joinPath(parentPath, 'port'),
        `Port ${port} is outside the range 0..${MAX_PORT}.`,
        { expected: `integer in [0, ${MAX_PORT}]`, actual: String(port) },
      ),
    );
    return undefined;
  }
  return port;
}

/** First occurrence wins; repeated fixed keys are reported. */
function collectFields(node: MapNode, path: string, diagnostics: Diagnostic[]): ReadonlyMap<string, MapEntry> {
  const fields = new Map<string, MapEntry>();
  for (const entry of node.entries) {
    if (fields.has(entry.key)) {
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_DUPLICATE_ENTRY,
          joinPath(path, entry.key),
          `Key "${entry.key}" is declared more than once.`,
          {
            suggestion: 'Keep a single declaration of this key.',
            ...(entry.span === undefined ? {} : { span: entry.span }),
          },
        ),
      );
      continue;
    }
    fields.set(entry.key, entry);
  }
  return fields;
}

function requireField(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): MapEntry | undefined {
  const entry = fields.get(key);
  if (entry === undefined) {
    diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_REQUIRED_KEY_MISSING,
        joinPath(parentPath, key),
        `Required key "${key}" is missing${parentPath === '' ? '' : ` in ${parentPath}`}.`,
        { expected: key, actual: 'nothing' },
      ),
    );
  }
  return entry;
}

function expectMap(node: DocNode, path: string, diagnostics: Diagnostic[]): MapNode | undefined {
  if (node.kind === 'map') {
    return node;
  }
  pushTypeMismatch(diagnostics, path, 'mapping', node);
  return undefined;
}

function readRequiredString(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): string | undefined {
  const entry = requireField(fields, key, parentPath, diagnostics);
  return entry === undefined ? undefined : readNonEmptyString(entry.value, joinPath(parentPath, key), diagnostics);
}

function readOptionalString(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): Located<string> | undefined {
  const entry = fields.get(key);
  if (entry === undefined) {
    return undefined;
  }
  const path = joinPath(parentPath, key);
  const value = readNonEmptyString(entry.value, path, diagnostics);
  return value === undefined ? undefined : { value, path };
}

function readNonEmptyString(node: DocNode, path: string, diagnostics: Diagnostic[]): string | undefined {
  if (node.kind === 'scalar' && typeof node.value === 'string' && node.value.trim() !== '') {
    return node.value;
  }
  pushTypeMismatch(diagnostics, path, 'non-empty string', node);
  return undefined;
}

function readRequiredInteger(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): number | undefined {
  const entry = requireField(fields, key, parentPath, diagnostics);
  if (entry === undefined) {
    return undefined;
  }
  const node = entry.value;
  if (node.kind === 'scalar' && typeof node.value === 'number' && Number.isSafeInteger(node.value)) {
    return node.value;
  }
  pushTypeMismatch(diagnostics, joinPath(parentPath, key), 'integer', node);
  return undefined;
}

function readRequiredUri(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): string | undefined {
  const value = readRequiredString(fields, key, parentPath, diagnostics);
  if (value === undefined) {
    return undefined;
  }
  if (!isAbsoluteUri(value)) {
    diagnostics.push(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_URI_INVALID,
        joinPath(parentPath, key),
        `"${value}" is not an absolute URI.`,
        { expected: 'absolute URI (scheme://host...)', actual: value },
      ),
    );
    return undefined;
  }
  return value;
}

function isAbsoluteUri(value: string): boolean {
  try {
    return new URL(value).protocol.length > 1;
  } catch {
    return false;
  }
}

function readRequiredNameList(
  fields: ReadonlyMap<string, MapEntry>,
  key: string,
  parentPath: string,
  diagnostics: Diagnostic[],
): readonly Located<string>[] | undefined {
  const entry = requireField(fields, key, parentPath, diagnostics);
  return entry === undefined ? undefined : readNameList(entry.value, joinPath(parentPath, key), diagnostics, true);
}

/** Sequence of non-empty, distinct strings. */
function readNameList(
  node: DocNode,
  path: string,
  diagnostics: Diagnostic[],
  requireNonEmpty: boolean,
): readonly Located<string>[] | undefined {
  if (node.kind !== 'seq') {
    pushTypeMismatch(diagnostics, path, 'sequence of strings', node);
    return undefined;
  }
  if (requireNonEmpty && node.items.length === 0) {
    pushEmptyContainer(diagnostics, path, 'at least one entry');
    return undefined;
  }

  const names: Located<string>[] = [];
  const seen = new Set<string>();
  let valid = true;
  node.items.forEach((item, index) => {
    const itemPath = indexPath(path, index);
    const value = readNonEmptyString(item, itemPath, diagnostics);
    if (value === undefined) {
      valid = false;
      return;
    }
    if (seen.has(value)) {
      diagnostics.push(
        createDiagnostic(
          'ParseError',
          SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_DUPLICATE_ENTRY,
          itemPath,
          `"${value}" appears more than once in ${path}.`,
          { suggestion: `Remove the repeated "${value}".` },
        ),
      );
      valid = false;
      return;
    }
    seen.add(value);
    names.push({ value, path: itemPath });
  });
  return valid ? names : undefined;
}

function pushTypeMismatch(diagnostics: Diagnostic[], path: string, expected: string, node: DocNode): void {
  const actual = describeNode(node);
  diagnostics.push(
    createDiagnostic(
      'ParseError',
      SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_TYPE_MISMATCH,
      path,
      `Expected ${expected} at ${path}, found ${actual}.`,
      { expected, actual },
    ),
  );
}

function pushEmptyContainer(diagnostics: Diagnostic[], path: string, expected: string): void {
  diagnostics.push(
    createDiagnostic('ParseError', SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EMPTY_CONTAINER, path, `${path} must contain ${expected}.`, {
      expected,
      actual: 'empty',
    }),
  );
}
