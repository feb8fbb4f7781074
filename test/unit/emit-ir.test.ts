import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { compileDescriptorSource } from '../../src/ssdl/compiler-core.js';
import { irToDescriptor, serializeIR, toSerializableIR, validateSerializedIR } from '../../src/ssdl/emit-ir.js';
import { airQualityDescriptor } from '../helpers/fixture-reader.js';

function compiledIR() {
  const result = compileDescriptorSource(airQualityDescriptor());
  assert.ok(result.ir !== null);
  return result.ir;
}

describe('emitDescriptorIR', () => {
  it('shares one data source object between the index and its visualizations', () => {
    const ir = compiledIR();
    assert.equal(ir.visualizations['Air Quality Visualization']?.source, ir.dataSources['Measurements']);
  });

  it('freezes the whole IR', () => {
    const ir = compiledIR();

    assert.ok(Object.isFrozen(ir));
    assert.ok(Object.isFrozen(ir.dataSources['Measurements']?.plan.filters));
    assert.ok(Object.isFrozen(ir.visualizations['Air Quality Visualization']?.data));
    assert.equal(Reflect.set(ir.service, 'name', 'Changed'), false);
    assert.equal(ir.service.name, 'Air Quality Madrid');
  });
});

describe('serializeIR', () => {
  it('replaces visualization sources with data source names', () => {
    const serialized = toSerializableIR(compiledIR());
    assert.equal(serialized.visualizations['Air Quality Visualization']?.source, 'Measurements');
  });

  it('produces text that validates against the IR schema', () => {
    const text = serializeIR(compiledIR());
    const parsed: unknown = JSON.parse(text);

    assert.ok(text.endsWith('}\n'));
    assert.deepEqual(validateSerializedIR(parsed), { valid: true, issues: [] });
  });

  it('reports schema violations with their paths', () => {
    const result = validateSerializedIR({ irVersion: 2 });
    assert.equal(result.valid, false);
    assert.ok(result.issues.some((issue) => issue.startsWith('irVersion:')));
  });
});

describe('irToDescriptor', () => {
  it('projects the IR back to descriptor sections', () => {
    const descriptor = irToDescriptor(compiledIR());

    assert.deepEqual(descriptor['service'], { name: 'Air Quality Madrid', scope: 'Environment', version: '1.0.0' });
    assert.deepEqual(descriptor['deployment'], {
      env: { local: { name: 'local', uri: 'http://localhost/test', port: 50055, type: 'Docker' } },
    });
    assert.deepEqual(Object.keys(descriptor), ['service', 'data_sources', 'application', 'deployment']);
  });
});
