import { z } from 'zod';
import { DiagnosticSchema, SerializedDescriptorIRSchema } from './schemas.js';

export const SCHEMA_ARTIFACT_FILENAMES = ['DescriptorIR.schema.json', 'Diagnostic.schema.json'] as const;

export type SchemaArtifactFilename = (typeof SCHEMA_ARTIFACT_FILENAMES)[number];

const withId = (id: SchemaArtifactFilename, schema: Record<string, unknown>): Record<string, unknown> => ({
  ...schema,
  $id: id,
});

export const buildSchemaArtifactMap = (): Record<SchemaArtifactFilename, Record<string, unknown>> => ({
  'DescriptorIR.schema.json': withId(
    'DescriptorIR.schema.json',
    z.toJSONSchema(SerializedDescriptorIRSchema, { target: 'draft-7' }),
  ),
  'Diagnostic.schema.json': withId('Diagnostic.schema.json', z.toJSONSchema(DiagnosticSchema, { target: 'draft-7' })),
});
