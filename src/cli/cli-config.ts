import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { IntegerSchema, SemanticVersionSchema } from '../kernel/schemas.js';
import type { SemanticVersion } from '../kernel/types.js';
import { loadAttributeCatalog } from '../ssdl/attribute-catalog.js';
import type { CompilerConfigOverrides } from '../ssdl/compiler-config.js';

const VersionTextSchema = z
  .string()
  .regex(/^(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)$/, 'expected major.minor.patch');

export const CliConfigFileSchema = z
  .object({
    supportedVersions: z.array(z.union([VersionTextSchema, SemanticVersionSchema])).min(1).optional(),
    catalog: z.string().min(1).optional(),
    limits: z
      .object({
        maxInputBytes: IntegerSchema.min(1).optional(),
        maxDepth: IntegerSchema.min(1).optional(),
        maxAliasCount: IntegerSchema.min(0).optional(),
        maxDiagnosticCount: IntegerSchema.min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type CliConfigFile = z.infer<typeof CliConfigFileSchema>;

/**
 * Reads a YAML or JSON CLI configuration file into compiler overrides.
 * `catalog` is resolved against the configuration file's directory.
 */
export function loadCliConfigFile(configPath: string): CompilerConfigOverrides {
  const raw: unknown = parseYaml(readFileSync(configPath, 'utf8'));
  const parsed = CliConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration file ${configPath}: ${issues}`);
  }
  return toCompilerOverrides(parsed.data, dirname(configPath));
}

export function toCompilerOverrides(file: CliConfigFile, baseDirectory: string): CompilerConfigOverrides {
  const limits = file.limits === undefined ? undefined : stripUndefined(file.limits);
  return {
    ...(file.supportedVersions === undefined
      ? {}
      : { supportedVersions: file.supportedVersions.map(toSemanticVersion) }),
    ...(file.catalog === undefined ? {} : { catalog: loadAttributeCatalog(resolve(baseDirectory, file.catalog)) }),
    ...(limits === undefined ? {} : { limits }),
  };
}

function toSemanticVersion(value: string | SemanticVersion): SemanticVersion {
  if (typeof value !== 'string') {
    return value;
  }
  const [major = 0, minor = 0, patch = 0] = value.split('.').map(Number);
  return { major, minor, patch };
}

function stripUndefined(limits: NonNullable<CliConfigFile['limits']>): {
  maxInputBytes?: number;
  maxDepth?: number;
  maxAliasCount?: number;
  maxDiagnosticCount?: number;
} {
  return {
    ...(limits.maxInputBytes === undefined ? {} : { maxInputBytes: limits.maxInputBytes }),
    ...(limits.maxDepth === undefined ? {} : { maxDepth: limits.maxDepth }),
    ...(limits.maxAliasCount === undefined ? {} : { maxAliasCount: limits.maxAliasCount }),
    ...(limits.maxDiagnosticCount === undefined ? {} : { maxDiagnosticCount: limits.maxDiagnosticCount }),
  };
}
