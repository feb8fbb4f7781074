import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { SSDL_DIAGNOSTIC_CODES } from '../../src/ssdl/diagnostic-codes.js';
import {
  countErrorDiagnostics,
  createDiagnostic,
  getAlternatives,
  indexPath,
  joinPath,
  levenshteinDistance,
} from '../../src/ssdl/validate-shared.js';

describe('getAlternatives', () => {
  it('pairs names that differ only by case', () => {
    assert.deepEqual(getAlternatives('Nox', ['NO', 'NO2', 'NOx', 'O3']), ['NOx']);
  });

  it('returns every candidate at the best distance in sorted order', () => {
    assert.deepEqual(getAlternatives('bat', ['cat', 'hat', 'battery']), ['cat', 'hat']);
  });

  it('skips the value itself and candidates that are too far away', () => {
    assert.deepEqual(getAlternatives('location', ['location']), []);
    assert.deepEqual(getAlternatives('address', ['temperature', 'O3']), []);
    assert.deepEqual(getAlternatives('x', []), []);
  });
});

describe('validate-shared helpers', () => {
  it('measures edit distance', () => {
    assert.equal(levenshteinDistance('kitten', 'sitting'), 3);
    assert.equal(levenshteinDistance('', 'abc'), 3);
    assert.equal(levenshteinDistance('same', 'same'), 0);
  });

  it('builds diagnostic paths', () => {
    assert.equal(joinPath('', 'service'), 'service');
    assert.equal(joinPath('service', 'name'), 'service.name');
    assert.equal(indexPath('application.roles', 2), 'application.roles[2]');
  });

  it('derives severity from kind and omits empty details', () => {
    const error = createDiagnostic(
      'DanglingReferenceError',
      SSDL_DIAGNOSTIC_CODES.SSDL_XREF_SOURCE_MISSING,
      'application.visualizations.Trend.source',
      'Missing source.',
      { alternatives: [] },
    );
    assert.deepEqual(error, {
      kind: 'DanglingReferenceError',
      code: 'SSDL_XREF_SOURCE_MISSING',
      path: 'application.visualizations.Trend.source',
      severity: 'error',
      message: 'Missing source.',
    });

    const warning = createDiagnostic('VersionWarning', SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_AHEAD, 'service.version', 'Ahead.');
    assert.equal(warning.severity, 'warning');
    assert.equal(countErrorDiagnostics([error, warning, error]), 2);
  });
});
