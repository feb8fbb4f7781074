import type { Diagnostic } from '../kernel/diagnostics.js';
import { SerializedDescriptorIRSchema } from '../kernel/schemas.js';
import {
  IR_VERSION,
  type ApplicationMeta,
  type CompiledDataSource,
  type DeploymentEnv,
  type DescriptorIR,
  type ResolvedVisualization,
  type Role,
  type SerializedDescriptorIR,
  type SerializedVisualization,
  type ServiceIR,
} from '../kernel/types.js';
import type { ResolvedVisualizationBinding } from './resolve-references.js';

export interface EmitDescriptorIRInput {
  readonly service: ServiceIR;
  readonly application: ApplicationMeta;
  readonly dataSources: ReadonlyMap<string, CompiledDataSource>;
  readonly bindings: readonly ResolvedVisualizationBinding[];
  readonly roles: readonly Role[];
  readonly deploymentEnvs: ReadonlyMap<string, DeploymentEnv>;
  readonly diagnostics: readonly Diagnostic[];
  readonly truncatedDiagnosticCount: number;
}

/**
 * Assembles the frozen IR. Each visualization's `source` is the same object
 * found under `dataSources`.
 */
export function emitDescriptorIR(input: EmitDescriptorIRInput): DescriptorIR {
  const visualizations = input.bindings.map((binding): readonly [string, ResolvedVisualization] => {
    const source = input.dataSources.get(binding.sourceName);
    if (source === undefined) {
      throw new Error(`Visualization "${binding.visualization.name}" is bound to missing data source "${binding.sourceName}".`);
    }
    const { visualization } = binding;
    return [
      visualization.name,
      {
        name: visualization.name,
        type: visualization.type,
        source,
        data: binding.fields,
        ...(visualization.extra === undefined ? {} : { extra: visualization.extra }),
        ...(visualization.roles === undefined ? {} : { roles: visualization.roles }),
        render: binding.render,
      },
    ];
  });

  // Descriptor keys become own properties, `__proto__` included.
  return deepFreeze({
    irVersion: IR_VERSION,
    service: input.service,
    application: input.application,
    dataSources: Object.fromEntries(input.dataSources),
    visualizations: Object.fromEntries(visualizations),
    roles: [...input.roles],
    deploymentEnvs: Object.fromEntries(input.deploymentEnvs),
    diagnostics: [...input.diagnostics],
    truncatedDiagnosticCount: input.truncatedDiagnosticCount,
  });
}

export function toSerializableIR(ir: DescriptorIR): SerializedDescriptorIR {
  const visualizations = Object.entries(ir.visualizations).map(
    ([name, visualization]): readonly [string, SerializedVisualization] => [
      name,
      { ...visualization, source: visualization.source.name },
    ],
  );
  return { ...ir, visualizations: Object.fromEntries(visualizations) };
}

/** Stable JSON text; equal IRs serialize to identical strings. */
export function serializeIR(ir: DescriptorIR): string {
  return `${JSON.stringify(toSerializableIR(ir), null, 2)}\n`;
}

export interface IRValidationResult {
  readonly valid: boolean;
  readonly issues: readonly string[];
}

export function validateSerializedIR(value: unknown): IRValidationResult {
  const result = SerializedDescriptorIRSchema.safeParse(value);
  if (result.success) {
    return { valid: true, issues: [] };
  }
  return {
    valid: false,
    issues: result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
  };
}

/**
 * Projects the IR back to descriptor form. Compiling the result yields an
 * equal IR.
 */
export function irToDescriptor(ir: DescriptorIR): Record<string, unknown> {
  const categories = new Map<string, [string, unknown][]>();
  for (const source of Object.values(ir.dataSources)) {
    const category = categories.get(source.category) ?? [];
    category.push([
      source.name,
      {
        name: source.name,
        provider: source.provider,
        type: source.type,
        uri: source.uri,
        query: { type: source.query.type, select: [...source.query.select] },
      },
    ]);
    categories.set(source.category, category);
  }
  const dataSources = Object.fromEntries(
    [...categories].map(([category, entries]) => [category, Object.fromEntries(entries)] as const),
  );

  const visualizations = Object.fromEntries(
    Object.values(ir.visualizations).map((visualization): readonly [string, unknown] => [
      visualization.name,
      {
        name: visualization.name,
        type: visualization.type,
        source: visualization.source.name,
        data: visualization.data.map((field) => field.name),
        ...(visualization.extra === undefined ? {} : { extra: { ...visualization.extra } }),
        ...(visualization.roles === undefined ? {} : { roles: [...visualization.roles] }),
      },
    ]),
  );

  const env = Object.fromEntries(
    Object.values(ir.deploymentEnvs).map((deploymentEnv): readonly [string, unknown] => [
      deploymentEnv.name,
      {
        name: deploymentEnv.name,
        uri: deploymentEnv.uri,
        port: deploymentEnv.port,
        type: deploymentEnv.type,
        ...(deploymentEnv.roles === undefined ? {} : { roles: [...deploymentEnv.roles] }),
        ...(deploymentEnv.credentials === undefined ? {} : { credentials: { ...deploymentEnv.credentials } }),
      },
    ]),
  );

  const { version } = ir.service;
  return {
    service: {
      name: ir.service.name,
      scope: ir.service.scope,
      version: `${version.major}.${version.minor}.${version.patch}`,
    },
    data_sources: dataSources,
    application: {
      type: ir.application.type,
      ...(ir.application.layout === undefined ? {} : { layout: ir.application.layout }),
      roles: ir.roles.map((role) =>
        role.declaration === 'tag' ? role.name : { name: role.name, hierarchy: role.hierarchy },
      ),
      ...(ir.application.defaultRole === undefined ? {} : { defaultRole: ir.application.defaultRole }),
      visualizations,
    },
    deployment: { env },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  const members: unknown[] = Object.values(value);
  for (const member of members) {
    deepFreeze(member);
  }
  return value;
}
