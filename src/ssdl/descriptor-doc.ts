import type { CredentialMap, ExtraMap, RoleHierarchy, SemanticVersion } from '../kernel/types.js';
import type { SourceSpan } from './source-map.js';

/** A value paired with the descriptor path it was read from. */
export interface Located<T> {
  readonly value: T;
  readonly path: string;
}

interface ParsedKeyedEntity {
  /** The mapping key the entity was declared under. */
  readonly key: string;
  /** The explicit `name` field, when the entity has one. */
  readonly declaredName?: Located<string>;
  readonly path: string;
  readonly span?: SourceSpan;
}

export interface ParsedService {
  readonly name: string;
  readonly scope: string;
  readonly version: Located<SemanticVersion>;
  readonly path: string;
}

export interface ParsedDataSource extends ParsedKeyedEntity {
  readonly category: string;
  readonly provider: string;
  readonly type: string;
  readonly uri: string;
  readonly query: {
    readonly type: string;
    readonly select: readonly string[];
  };
}

export interface ParsedRole {
  readonly name: string;
  readonly hierarchy: RoleHierarchy;
  readonly declaration: 'tag' | 'record';
  readonly path: string;
  readonly span?: SourceSpan;
}

export interface ParsedVisualization extends ParsedKeyedEntity {
  readonly type: string;
  readonly source: Located<string>;
  readonly data: readonly Located<string>[];
  readonly extra?: ExtraMap;
  readonly roles?: readonly Located<string>[];
}

export interface ParsedApplication {
  readonly type: string;
  readonly layout?: string;
  readonly defaultRole?: Located<string>;
  readonly roles: readonly ParsedRole[];
  readonly visualizations: readonly ParsedVisualization[];
  readonly path: string;
}

export interface ParsedDeploymentEnv extends ParsedKeyedEntity {
  readonly uri: string;
  readonly port: number;
  readonly type: string;
  readonly roles?: readonly Located<string>[];
  readonly credentials?: CredentialMap;
}

/**
 * Structurally valid descriptor content in declaration order. Repeated keys
 * survive as separate entries; uniqueness is settled during extraction.
 */
export interface ParsedDescriptor {
  readonly service: ParsedService | null;
  readonly dataSources: readonly ParsedDataSource[];
  readonly application: ParsedApplication | null;
  readonly deploymentEnvs: readonly ParsedDeploymentEnv[];
}
