import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Ajv, type ErrorObject } from 'ajv';

import { buildSchemaArtifactMap, SCHEMA_ARTIFACT_FILENAMES } from '../../src/kernel/schema-artifacts.js';
import { compileDescriptorSource } from '../../src/ssdl/compiler-core.js';
import { serializeIR } from '../../src/ssdl/emit-ir.js';
import { airQualityDescriptor } from '../helpers/fixture-reader.js';

const schemas = buildSchemaArtifactMap();

const createValidator = (filename: (typeof SCHEMA_ARTIFACT_FILENAMES)[number]) => {
  const ajv = new Ajv({ allErrors: true, strict: false, validateFormats: false });
  return ajv.compile(schemas[filename]);
};

const formatErrors = (errors: readonly ErrorObject[] | null | undefined): string =>
  (errors ?? []).map((error) => `${error.instancePath || '<root>'} ${error.message ?? ''}`).join('\n');

describe('JSON schema artifacts', () => {
  it('carries an $id on every artifact', () => {
    for (const filename of SCHEMA_ARTIFACT_FILENAMES) {
      assert.equal(schemas[filename]['$id'], filename);
    }
  });

  it('accepts serialized IR with its warnings', () => {
    const result = compileDescriptorSource(airQualityDescriptor());
    assert.ok(result.ir !== null);
    const validate = createValidator('DescriptorIR.schema.json');
    const document: unknown = JSON.parse(serializeIR(result.ir));

    assert.equal(validate(document), true, formatErrors(validate.errors));
  });

  it('rejects IR with an unknown top-level field', () => {
    const validate = createValidator('DescriptorIR.schema.json');
    const result = compileDescriptorSource(airQualityDescriptor());
    assert.ok(result.ir !== null);
    const parsed: unknown = JSON.parse(serializeIR(result.ir));
    assert.ok(typeof parsed === 'object' && parsed !== null);
    const document = { ...parsed, extraField: true };

    assert.equal(validate(document), false);
  });

  it('validates diagnostics emitted by failed compilations', () => {
    const validate = createValidator('Diagnostic.schema.json');
    const result = compileDescriptorSource(airQualityDescriptor(['port: 50055', 'port: 70000']));

    assert.ok(result.diagnostics.length > 0);
    for (const diagnostic of result.diagnostics) {
      assert.equal(validate(diagnostic), true, formatErrors(validate.errors));
    }
  });

  it('rejects diagnostics with an unknown kind', () => {
    const validate = createValidator('Diagnostic.schema.json');
    assert.equal(
      validate({ kind: 'Oops', code: 'X', path: '', severity: 'error', message: 'Broken.' }),
      false,
    );
  });
});
