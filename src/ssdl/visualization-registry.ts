import type { AttributeKind, RenderContract } from '../kernel/types.js';
import { SSDL_DIAGNOSTIC_CODES, type SsdlDiagnosticCode } from './diagnostic-codes.js';

export interface RenderContractShortfall {
  readonly code: SsdlDiagnosticCode;
  readonly message: string;
  readonly suggestion: string;
}

export interface RenderContractBuild {
  readonly contract: RenderContract;
  readonly shortfall?: RenderContractShortfall;
}

export type AttributeKindLookup = (field: string) => AttributeKind | undefined;

export interface VisualizationDefinition {
  readonly type: string;
  readonly buildContract: (fields: readonly string[], kindOf: AttributeKindLookup) => RenderContractBuild;
}

export type VisualizationRegistry = ReadonlyMap<string, VisualizationDefinition>;

const mapDefinition: VisualizationDefinition = {
  type: 'Map',
  buildContract: (fields, kindOf) => {
    const geometryField = fields.find((field) => kindOf(field) === 'geo') ?? null;
    const contract: RenderContract = {
      kind: 'map',
      geometryField,
      labelFields: fields.filter((field) => field !== geometryField),
    };
    if (geometryField !== null) {
      return { contract };
    }
    return {
      contract,
      shortfall: {
        code: SSDL_DIAGNOSTIC_CODES.SSDL_RENDER_GEOMETRY_FIELD_MISSING,
        message: 'Map has no field with a geographic type to place its markers.',
        suggestion: 'Add a geo attribute such as "location" to data.',
      },
    };
  },
};

function seriesDefinition(type: string, chart: 'chart' | 'line' | 'bar'): VisualizationDefinition {
  return {
    type,
    buildContract: (fields, kindOf) => {
      const timeField = fields.find((field) => kindOf(field) === 'datetime') ?? null;
      const contract: RenderContract = {
        kind: 'series',
        chart,
        timeField,
        valueFields: fields.filter((field) => field !== timeField),
      };
      if (timeField !== null) {
        return { contract };
      }
      return {
        contract,
        shortfall: {
          code: SSDL_DIAGNOSTIC_CODES.SSDL_RENDER_TIME_FIELD_MISSING,
          message: `${type} has no datetime field for its horizontal axis.`,
          suggestion: 'Add a datetime attribute such as "dateObserved" to data.',
        },
      };
    },
  };
}

const pieDefinition: VisualizationDefinition = {
  type: 'Pie',
  buildContract: (fields, kindOf) => {
    const categoryField = fields.find((field) => kindOf(field) !== 'number') ?? fields[0] ?? '';
    return {
      contract: {
        kind: 'proportion',
        categoryField,
        valueFields: fields.filter((field) => field !== categoryField),
      },
    };
  },
};

const tableDefinition: VisualizationDefinition = {
  type: 'Table',
  buildContract: (fields) => ({ contract: { kind: 'table', columns: [...fields] } }),
};

export const BUILTIN_VISUALIZATION_DEFINITIONS: readonly VisualizationDefinition[] = [
  mapDefinition,
  seriesDefinition('Chart', 'chart'),
  seriesDefinition('Line', 'line'),
  seriesDefinition('Bar', 'bar'),
  pieDefinition,
  tableDefinition,
];

/** Throws on a repeated visualization type. */
export function createVisualizationRegistry(
  definitions: readonly VisualizationDefinition[] = BUILTIN_VISUALIZATION_DEFINITIONS,
): VisualizationRegistry {
  const registry = new Map<string, VisualizationDefinition>();
  for (const definition of definitions) {
    if (registry.has(definition.type)) {
      throw new Error(`Visualization type "${definition.type}" is registered more than once.`);
    }
    registry.set(definition.type, definition);
  }
  return registry;
}
