import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { SSDL_DIAGNOSTIC_CODES } from '../../src/ssdl/diagnostic-codes.js';
import { describeNode, documentNodeFromValue, entryKeys } from '../../src/ssdl/document-tree.js';
import { readDescriptorSource, readDescriptorValue } from '../../src/ssdl/source-reader.js';
import { singleDiagnostic } from '../helpers/diagnostic-helpers.js';

describe('readDescriptorSource', () => {
  it('keeps key order and repeated keys', () => {
    const result = readDescriptorSource('b: 1\na: 2\nb: 3\n');

    assert.deepEqual(result.diagnostics, []);
    assert.ok(result.root !== null);
    assert.deepEqual(entryKeys(result.root), ['b', 'a', 'b']);
    assert.deepEqual(
      result.root.entries.map((entry) => (entry.value.kind === 'scalar' ? entry.value.value : null)),
      [1, 2, 3],
    );
  });

  it('records 1-based line spans by path', () => {
    const result = readDescriptorSource('service:\n  name: Demo\n  tags: [a, b]\n');

    assert.equal(result.sourceMap.byPath['service.name']?.line, 2);
    assert.equal(result.sourceMap.byPath['service.tags[1]']?.line, 3);
  });

  it('reads YAML 1.2 core scalars', () => {
    const result = readDescriptorSource('version: 1.0.0\nport: 8080\nflag: true\nempty:\n');

    assert.ok(result.root !== null);
    assert.deepEqual(
      result.root.entries.map((entry) => (entry.value.kind === 'scalar' ? entry.value.value : undefined)),
      ['1.0.0', 8080, true, null],
    );
  });

  it('resolves aliases to their anchored values', () => {
    const result = readDescriptorSource('base: &shared [x, y]\ncopy: *shared\n');

    assert.ok(result.root !== null);
    const copy = result.root.entries[1]?.value;
    assert.ok(copy !== undefined && copy.kind === 'seq');
    assert.deepEqual(
      copy.items.map((item) => (item.kind === 'scalar' ? item.value : null)),
      ['x', 'y'],
    );
  });

  it('reports YAML syntax errors as unreadable source', () => {
    const result = readDescriptorSource('service: [unclosed\n');

    assert.equal(result.root, null);
    assert.ok(result.diagnostics.length > 0);
    assert.ok(result.diagnostics.every((diagnostic) => diagnostic.code === SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_YAML_SYNTAX));
    assert.ok(result.diagnostics.every((diagnostic) => diagnostic.kind === 'ParseError'));
  });

  it('rejects a root that is not a mapping', () => {
    const result = readDescriptorSource('- a\n- b\n');

    assert.equal(result.root, null);
    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_ROOT_NOT_MAPPING);
    assert.equal(diagnostic.expected, 'mapping');
    assert.equal(diagnostic.actual, 'sequence');
  });

  it('treats an empty document as a null root', () => {
    const result = readDescriptorSource('');

    assert.equal(result.root, null);
    assert.equal(singleDiagnostic(result.diagnostics).actual, 'null');
  });

  it('enforces maxInputBytes before parsing', () => {
    const result = readDescriptorSource('a: 1234567890\n', { maxInputBytes: 4 });

    assert.equal(result.root, null);
    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_INPUT_BYTES_EXCEEDED);
    assert.equal(diagnostic.message, 'Input exceeds maxInputBytes (14 > 4).');
  });

  it('stops expanding aliases past maxAliasCount', () => {
    const result = readDescriptorSource('a: &a [x, x]\nb: &b [*a, *a]\nc: [*b, *b]\n', { maxAliasCount: 3 });

    assert.equal(result.root, null);
    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_ALIAS_COUNT_EXCEEDED);
    assert.equal(diagnostic.kind, 'ParseError');
    assert.equal(diagnostic.path, 'c[0][0]');
    assert.equal(diagnostic.message, 'Alias expansion exceeds maxAliasCount (3).');
  });

  it('rejects nested alias fan-out with the default limit', () => {
    const lines = ['l0: &l0 [lol, lol, lol, lol, lol, lol, lol, lol, lol, lol]'];
    for (let level = 1; level <= 8; level += 1) {
      const references = Array.from({ length: 10 }, () => `*l${level - 1}`).join(', ');
      lines.push(`l${level}: &l${level} [${references}]`);
    }

    const result = readDescriptorSource(`${lines.join('\n')}\n`);

    assert.equal(result.root, null);
    assert.equal(singleDiagnostic(result.diagnostics).code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_ALIAS_COUNT_EXCEEDED);
  });

  it('stops at maxDepth', () => {
    const result = readDescriptorSource('a:\n  b:\n    c: 1\n', { maxDepth: 2 });

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_MAX_DEPTH_EXCEEDED);
    assert.equal(diagnostic.path, 'a.b.c');
  });

  it('rejects complex mapping keys', () => {
    const result = readDescriptorSource('? [a, b]\n: 1\nok: 2\n');

    assert.ok(result.root !== null);
    assert.deepEqual(entryKeys(result.root), ['ok']);
    assert.equal(singleDiagnostic(result.diagnostics).code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_KEY_NOT_SCALAR);
  });
});

describe('readDescriptorValue', () => {
  it('builds a span-free tree from plain values', () => {
    const result = readDescriptorValue({ service: { name: 'Demo' }, list: [1, 'two'] });

    assert.ok(result.root !== null);
    assert.deepEqual(entryKeys(result.root), ['service', 'list']);
    assert.deepEqual(result.sourceMap.byPath, {});
  });

  it('rejects non-object roots', () => {
    const result = readDescriptorValue(['a']);

    assert.equal(result.root, null);
    assert.equal(singleDiagnostic(result.diagnostics).code, SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_ROOT_NOT_MAPPING);
  });
});

describe('document tree', () => {
  it('marks host values without a descriptor form as opaque', () => {
    assert.deepEqual(documentNodeFromValue(new Date(0)), { kind: 'opaque', typeName: 'Date' });
    assert.deepEqual(documentNodeFromValue(undefined), { kind: 'opaque', typeName: 'undefined' });
    assert.deepEqual(documentNodeFromValue(Number.NaN), { kind: 'opaque', typeName: 'NaN' });
  });

  it('describes nodes for type mismatch messages', () => {
    assert.equal(describeNode({ kind: 'scalar', value: 'x' }), 'string');
    assert.equal(describeNode({ kind: 'scalar', value: '' }), 'empty string');
    assert.equal(describeNode({ kind: 'scalar', value: 3 }), 'integer 3');
    assert.equal(describeNode({ kind: 'scalar', value: 1.5 }), 'number 1.5');
    assert.equal(describeNode({ kind: 'seq', items: [] }), 'sequence');
    assert.equal(describeNode(undefined), 'nothing');
  });
});
