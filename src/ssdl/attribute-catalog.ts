import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { AttributeCatalogSchema } from '../kernel/schemas.js';
import type { AttributeCatalog, AttributeKind, EntityAttributeSet } from '../kernel/types.js';

export const DEFAULT_ATTRIBUTE_CATALOG_PATH = fileURLToPath(
  new URL('../../data/attribute-catalog.json', import.meta.url),
);

/** Throws when the file is missing or does not match the catalog shape. */
export function loadAttributeCatalog(catalogPath: string = DEFAULT_ATTRIBUTE_CATALOG_PATH): AttributeCatalog {
  const raw: unknown = JSON.parse(readFileSync(catalogPath, 'utf8'));
  return parseAttributeCatalog(raw, catalogPath);
}

export function parseAttributeCatalog(raw: unknown, origin = 'attribute catalog'): AttributeCatalog {
  const parsed = AttributeCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${origin}: ${issues}`);
  }
  return parsed.data;
}

/** Own keys only, so names such as `constructor` never hit the prototype. */
export function lookupEntityAttributes(
  catalog: AttributeCatalog,
  provider: string,
  entityType: string,
): EntityAttributeSet | undefined {
  const entityTypes = Object.hasOwn(catalog, provider) ? catalog[provider] : undefined;
  if (entityTypes === undefined || !Object.hasOwn(entityTypes, entityType)) {
    return undefined;
  }
  return entityTypes[entityType];
}

export function listEntityTypes(catalog: AttributeCatalog, provider: string): readonly string[] {
  const entityTypes = Object.hasOwn(catalog, provider) ? catalog[provider] : undefined;
  return entityTypes === undefined ? [] : Object.keys(entityTypes);
}

export function lookupAttributeKind(
  catalog: AttributeCatalog,
  provider: string,
  entityType: string,
  attribute: string,
): AttributeKind | undefined {
  const attributes = lookupEntityAttributes(catalog, provider, entityType);
  if (attributes === undefined || !Object.hasOwn(attributes, attribute)) {
    return undefined;
  }
  return attributes[attribute];
}
