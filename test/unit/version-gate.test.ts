import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { SemanticVersion } from '../../src/kernel/types.js';
import { SSDL_DIAGNOSTIC_CODES } from '../../src/ssdl/diagnostic-codes.js';
import { checkDescriptorVersion, compareVersions, formatVersion } from '../../src/ssdl/version-gate.js';
import { singleDiagnostic } from '../helpers/diagnostic-helpers.js';

const SUPPORTED: readonly SemanticVersion[] = [
  { major: 1, minor: 2, patch: 0 },
  { major: 3, minor: 0, patch: 1 },
];

const at = (major: number, minor: number, patch: number) => ({
  value: { major, minor, patch },
  path: 'service.version',
});

describe('checkDescriptorVersion', () => {
  it('accepts the reference version as exact', () => {
    assert.deepEqual(checkDescriptorVersion(at(1, 2, 0), SUPPORTED), { compatibility: 'exact', diagnostics: [] });
  });

  it('warns when the descriptor is newer within a supported major', () => {
    const result = checkDescriptorVersion(at(1, 3, 0), SUPPORTED);

    assert.equal(result.compatibility, 'ahead');
    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.kind, 'VersionWarning');
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_AHEAD);
    assert.equal(diagnostic.expected, '1.2.0');
    assert.equal(diagnostic.actual, '1.3.0');
  });

  it('warns when the descriptor is older within a supported major', () => {
    const result = checkDescriptorVersion(at(3, 0, 0), SUPPORTED);

    assert.equal(result.compatibility, 'behind');
    assert.equal(singleDiagnostic(result.diagnostics).code, SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_BEHIND);
  });

  it('fails closed on an unknown major', () => {
    const result = checkDescriptorVersion(at(2, 0, 0), SUPPORTED);

    assert.equal(result.compatibility, null);
    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.kind, 'UnsupportedVersionError');
    assert.equal(diagnostic.severity, 'error');
    assert.equal(diagnostic.path, 'service.version');
    assert.equal(diagnostic.message, 'Descriptor version 2.0.0 has unsupported major version 2.');
    assert.equal(diagnostic.expected, 'major version 1 or 3');
    assert.deepEqual(diagnostic.alternatives, ['1.2.0', '3.0.1']);
  });
});

describe('version helpers', () => {
  it('orders by major, then minor, then patch', () => {
    assert.ok(compareVersions({ major: 1, minor: 9, patch: 9 }, { major: 2, minor: 0, patch: 0 }) < 0);
    assert.ok(compareVersions({ major: 1, minor: 2, patch: 0 }, { major: 1, minor: 1, patch: 7 }) > 0);
    assert.equal(compareVersions({ major: 1, minor: 2, patch: 3 }, { major: 1, minor: 2, patch: 3 }), 0);
    assert.equal(formatVersion({ major: 10, minor: 0, patch: 2 }), '10.0.2');
  });
});
