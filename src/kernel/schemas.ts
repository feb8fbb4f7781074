import { z } from 'zod';
import { DIAGNOSTIC_KINDS } from './diagnostics.js';
import { ATTRIBUTE_KINDS } from './types.js';

export const IntegerSchema = z.number().int();
export const StringSchema = z.string();
export const NonEmptyStringSchema = StringSchema.min(1);

export const SemanticVersionSchema = z
  .object({
    major: IntegerSchema.min(0),
    minor: IntegerSchema.min(0),
    patch: IntegerSchema.min(0),
  })
  .strict();

export const ExtraMapSchema = z.record(StringSchema, z.union([StringSchema, z.number(), z.boolean()]));

export const DiagnosticSchema = z
  .object({
    kind: z.enum(DIAGNOSTIC_KINDS),
    code: NonEmptyStringSchema,
    path: StringSchema,
    severity: z.union([z.literal('error'), z.literal('warning')]),
    message: NonEmptyStringSchema,
    expected: StringSchema.optional(),
    actual: StringSchema.optional(),
    suggestion: StringSchema.optional(),
    alternatives: z.array(StringSchema).optional(),
    span: z
      .object({
        line: IntegerSchema.min(1),
        col: IntegerSchema.min(1),
        endLine: IntegerSchema.min(1),
        endCol: IntegerSchema.min(1),
      })
      .strict()
      .optional(),
  })
  .strict();

export const ServiceIRSchema = z
  .object({
    name: NonEmptyStringSchema,
    scope: NonEmptyStringSchema,
    version: SemanticVersionSchema,
    compatibility: z.union([z.literal('exact'), z.literal('ahead'), z.literal('behind')]),
  })
  .strict();

export const ApplicationMetaSchema = z
  .object({
    type: NonEmptyStringSchema,
    layout: NonEmptyStringSchema.optional(),
    defaultRole: NonEmptyStringSchema.optional(),
  })
  .strict();

const ProviderCapabilitySchema = z.union([z.literal('geo-filter'), z.literal('time-range')]);

const QueryFilterSlotSchema = z.union([
  z.object({ kind: z.literal('geo'), attribute: NonEmptyStringSchema }).strict(),
  z.object({ kind: z.literal('timeRange'), attribute: NonEmptyStringSchema }).strict(),
]);

const queryPlanBaseShape = {
  provider: NonEmptyStringSchema,
  method: z.literal('GET'),
  endpoint: z.url(),
  entityType: NonEmptyStringSchema,
  attributes: z.array(NonEmptyStringSchema).min(1),
  capabilities: z.array(ProviderCapabilitySchema),
  filters: z.array(QueryFilterSlotSchema),
};

export const QueryPlanSchema = z.discriminatedUnion('dialect', [
  z
    .object({
      ...queryPlanBaseShape,
      dialect: z.literal('ngsi-v2'),
      params: z
        .object({
          type: NonEmptyStringSchema,
          attrs: NonEmptyStringSchema,
          options: z.literal('keyValues'),
        })
        .strict(),
    })
    .strict(),
  z
    .object({
      ...queryPlanBaseShape,
      dialect: z.literal('dataskop-rest'),
      params: z
        .object({
          entityType: NonEmptyStringSchema,
          fields: NonEmptyStringSchema,
        })
        .strict(),
    })
    .strict(),
]);

export const CompiledDataSourceSchema = z
  .object({
    name: NonEmptyStringSchema,
    category: NonEmptyStringSchema,
    provider: NonEmptyStringSchema,
    type: NonEmptyStringSchema,
    uri: z.url(),
    query: z
      .object({
        type: NonEmptyStringSchema,
        select: z.array(NonEmptyStringSchema).min(1),
      })
      .strict(),
    plan: QueryPlanSchema,
  })
  .strict();

export const VisualizationFieldSchema = z
  .object({
    name: NonEmptyStringSchema,
    origin: z.union([z.literal('projected'), z.literal('derived')]),
    candidates: z.array(NonEmptyStringSchema).optional(),
  })
  .strict();

export const RenderContractSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('map'),
      geometryField: NonEmptyStringSchema.nullable(),
      labelFields: z.array(NonEmptyStringSchema),
    })
    .strict(),
  z
    .object({
      kind: z.literal('series'),
      chart: z.union([z.literal('chart'), z.literal('line'), z.literal('bar')]),
      timeField: NonEmptyStringSchema.nullable(),
      valueFields: z.array(NonEmptyStringSchema),
    })
    .strict(),
  z
    .object({
      kind: z.literal('proportion'),
      categoryField: NonEmptyStringSchema,
      valueFields: z.array(NonEmptyStringSchema),
    })
    .strict(),
  z
    .object({
      kind: z.literal('table'),
      columns: z.array(NonEmptyStringSchema),
    })
    .strict(),
]);

export const SerializedVisualizationSchema = z
  .object({
    name: NonEmptyStringSchema,
    type: NonEmptyStringSchema,
    source: NonEmptyStringSchema,
    data: z.array(VisualizationFieldSchema).min(1),
    extra: ExtraMapSchema.optional(),
    roles: z.array(NonEmptyStringSchema).optional(),
    render: RenderContractSchema,
  })
  .strict();

export const RoleSchema = z
  .object({
    name: NonEmptyStringSchema,
    hierarchy: z.union([z.literal('User'), z.literal('Superuser'), z.literal('Admin')]),
    declaration: z.union([z.literal('tag'), z.literal('record')]),
  })
  .strict();

export const DeploymentEnvSchema = z
  .object({
    name: NonEmptyStringSchema,
    uri: z.url(),
    port: IntegerSchema.min(0).max(65_535),
    type: NonEmptyStringSchema,
    roles: z.array(NonEmptyStringSchema).optional(),
    credentials: z.record(StringSchema, StringSchema).optional(),
  })
  .strict();

export const SerializedDescriptorIRSchema = z
  .object({
    irVersion: z.literal(1),
    service: ServiceIRSchema,
    application: ApplicationMetaSchema,
    dataSources: z.record(StringSchema, CompiledDataSourceSchema),
    visualizations: z.record(StringSchema, SerializedVisualizationSchema),
    roles: z.array(RoleSchema),
    deploymentEnvs: z.record(StringSchema, DeploymentEnvSchema),
    diagnostics: z.array(DiagnosticSchema),
    truncatedDiagnosticCount: IntegerSchema.min(0),
  })
  .strict();

export const AttributeCatalogSchema = z.record(
  NonEmptyStringSchema,
  z.record(NonEmptyStringSchema, z.record(NonEmptyStringSchema, z.enum(ATTRIBUTE_KINDS))),
);
