import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { AttributeKind } from '../../src/kernel/types.js';
import { SSDL_DIAGNOSTIC_CODES } from '../../src/ssdl/diagnostic-codes.js';
import { createVisualizationRegistry, type AttributeKindLookup } from '../../src/ssdl/visualization-registry.js';

const KINDS: Readonly<Record<string, AttributeKind>> = {
  location: 'geo',
  dateObserved: 'datetime',
  NOx: 'number',
  O3: 'number',
  address: 'structured',
  category: 'text',
};
const kindOf: AttributeKindLookup = (field) => KINDS[field];
const registry = createVisualizationRegistry();

function build(type: string, fields: readonly string[]) {
  const definition = registry.get(type);
  assert.ok(definition !== undefined, `missing ${type}`);
  return definition.buildContract(fields, kindOf);
}

describe('visualization registry', () => {
  it('registers the built-in visualization types', () => {
    assert.deepEqual([...registry.keys()], ['Map', 'Chart', 'Line', 'Bar', 'Pie', 'Table']);
  });

  it('places maps on their first geographic field', () => {
    assert.deepEqual(build('Map', ['address', 'location', 'NOx']), {
      contract: { kind: 'map', geometryField: 'location', labelFields: ['address', 'NOx'] },
    });
  });

  it('reports a map without a geographic field', () => {
    const result = build('Map', ['NOx']);
    assert.equal(result.shortfall?.code, SSDL_DIAGNOSTIC_CODES.SSDL_RENDER_GEOMETRY_FIELD_MISSING);
    assert.deepEqual(result.contract, { kind: 'map', geometryField: null, labelFields: ['NOx'] });
  });

  it('puts series on their datetime field', () => {
    assert.deepEqual(build('Bar', ['NOx', 'dateObserved', 'O3']), {
      contract: { kind: 'series', chart: 'bar', timeField: 'dateObserved', valueFields: ['NOx', 'O3'] },
    });
    const missing = build('Line', ['NOx']);
    assert.equal(missing.shortfall?.code, SSDL_DIAGNOSTIC_CODES.SSDL_RENDER_TIME_FIELD_MISSING);
    assert.equal(missing.shortfall?.message, 'Line has no datetime field for its horizontal axis.');
  });

  it('splits pies into category and values', () => {
    assert.deepEqual(build('Pie', ['NOx', 'category', 'O3']).contract, {
      kind: 'proportion',
      categoryField: 'category',
      valueFields: ['NOx', 'O3'],
    });
  });

  it('keeps table columns in order', () => {
    assert.deepEqual(build('Table', ['O3', 'NOx']).contract, { kind: 'table', columns: ['O3', 'NOx'] });
  });

  it('accepts custom definitions and rejects repeated types', () => {
    const custom = createVisualizationRegistry([
      { type: 'Gauge', buildContract: (fields) => ({ contract: { kind: 'table', columns: [...fields] } }) },
    ]);
    assert.deepEqual([...custom.keys()], ['Gauge']);
    const [map] = registry.values();
    assert.ok(map !== undefined);
    assert.throws(() => createVisualizationRegistry([map, map]), /registered more than once/);
  });
});
