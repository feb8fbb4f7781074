import type { Diagnostic } from './diagnostics.js';

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export type VersionCompatibility = 'exact' | 'ahead' | 'behind';

export interface ServiceMeta {
  readonly name: string;
  readonly scope: string;
  readonly version: SemanticVersion;
}

export interface DataQuery {
  readonly type: string;
  readonly select: readonly string[];
}

export interface DataSource {
  readonly name: string;
  readonly category: string;
  readonly provider: string;
  readonly type: string;
  readonly uri: string;
  readonly query: DataQuery;
}

export type ExtraValue = string | number | boolean;

export type ExtraMap = Readonly<Record<string, ExtraValue>>;

export type CredentialMap = Readonly<Record<string, string>>;

export interface Visualization {
  readonly name: string;
  readonly type: string;
  readonly source: string;
  readonly data: readonly string[];
  readonly extra?: ExtraMap;
  readonly roles?: readonly string[];
}

export type RoleHierarchy = 'User' | 'Superuser' | 'Admin';

export const ROLE_HIERARCHIES: readonly RoleHierarchy[] = ['User', 'Superuser', 'Admin'];

export interface Role {
  readonly name: string;
  readonly hierarchy: RoleHierarchy;
  /** `tag` for a bare `- Admin` entry, `record` for `- { name, hierarchy }`. */
  readonly declaration: 'tag' | 'record';
}

export interface ApplicationMeta {
  readonly type: string;
  readonly layout?: string;
  readonly defaultRole?: string;
}

export interface DeploymentEnv {
  readonly name: string;
  readonly uri: string;
  readonly port: number;
  readonly type: string;
  readonly roles?: readonly string[];
  /** Passed through to the deployment target; never inspected. */
  readonly credentials?: CredentialMap;
}

export const ATTRIBUTE_KINDS = ['geo', 'datetime', 'number', 'text', 'structured', 'reference'] as const;

export type AttributeKind = (typeof ATTRIBUTE_KINDS)[number];

export type EntityAttributeSet = Readonly<Record<string, AttributeKind>>;

/** provider tag → entity type → attribute name → kind */
export type AttributeCatalog = Readonly<Record<string, Readonly<Record<string, EntityAttributeSet>>>>;

export type ProviderCapability = 'geo-filter' | 'time-range';

export type QueryFilterSlot =
  | { readonly kind: 'geo'; readonly attribute: string }
  | { readonly kind: 'timeRange'; readonly attribute: string };

interface QueryPlanBase {
  readonly provider: string;
  readonly method: 'GET';
  readonly endpoint: string;
  readonly entityType: string;
  readonly attributes: readonly string[];
  readonly capabilities: readonly ProviderCapability[];
  readonly filters: readonly QueryFilterSlot[];
}

export interface NgsiV2QueryPlan extends QueryPlanBase {
  readonly dialect: 'ngsi-v2';
  readonly params: {
    readonly type: string;
    readonly attrs: string;
    readonly options: 'keyValues';
  };
}

export interface DataskopQueryPlan extends QueryPlanBase {
  readonly dialect: 'dataskop-rest';
  readonly params: {
    readonly entityType: string;
    readonly fields: string;
  };
}

export type QueryPlan = NgsiV2QueryPlan | DataskopQueryPlan;

export type FieldOrigin = 'projected' | 'derived';

export interface VisualizationField {
  readonly name: string;
  readonly origin: FieldOrigin;
  /** Near-miss names from the source projection, only on derived fields. */
  readonly candidates?: readonly string[];
}

export type RenderContract =
  | {
      readonly kind: 'map';
      readonly geometryField: string | null;
      readonly labelFields: readonly string[];
    }
  | {
      readonly kind: 'series';
      readonly chart: 'chart' | 'line' | 'bar';
      readonly timeField: string | null;
      readonly valueFields: readonly string[];
    }
  | {
      readonly kind: 'proportion';
      readonly categoryField: string;
      readonly valueFields: readonly string[];
    }
  | {
      readonly kind: 'table';
      readonly columns: readonly string[];
    };

export interface CompiledDataSource extends DataSource {
  readonly plan: QueryPlan;
}

export interface ResolvedVisualization {
  readonly name: string;
  readonly type: string;
  readonly source: CompiledDataSource;
  readonly data: readonly VisualizationField[];
  readonly extra?: ExtraMap;
  readonly roles?: readonly string[];
  readonly render: RenderContract;
}

export interface ServiceIR extends ServiceMeta {
  readonly compatibility: VersionCompatibility;
}

export const IR_VERSION = 1;

export interface DescriptorIR {
  readonly irVersion: typeof IR_VERSION;
  readonly service: ServiceIR;
  readonly application: ApplicationMeta;
  readonly dataSources: Readonly<Record<string, CompiledDataSource>>;
  readonly visualizations: Readonly<Record<string, ResolvedVisualization>>;
  readonly roles: readonly Role[];
  readonly deploymentEnvs: Readonly<Record<string, DeploymentEnv>>;
  readonly diagnostics: readonly Diagnostic[];
  /** Warnings left out of `diagnostics` by the diagnostic cap. */
  readonly truncatedDiagnosticCount: number;
}

export interface SerializedVisualization extends Omit<ResolvedVisualization, 'source'> {
  readonly source: string;
}

export interface SerializedDescriptorIR extends Omit<DescriptorIR, 'visualizations'> {
  readonly visualizations: Readonly<Record<string, SerializedVisualization>>;
}
