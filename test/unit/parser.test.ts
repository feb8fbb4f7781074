import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { SSDL_DIAGNOSTIC_CODES } from '../../src/ssdl/diagnostic-codes.js';
import { parseDescriptor } from '../../src/ssdl/parser.js';
import { readDescriptorSource, readDescriptorValue } from '../../src/ssdl/source-reader.js';
import { assertNoDiagnostics, singleDiagnostic } from '../helpers/diagnostic-helpers.js';
import { airQualityDescriptor } from '../helpers/fixture-reader.js';

function parseText(text: string): ReturnType<typeof parseDescriptor> {
  const read = readDescriptorSource(text);
  assert.deepEqual(read.diagnostics, []);
  assert.ok(read.root !== null);
  return parseDescriptor(read.root);
}

describe('parseDescriptor', () => {
  it('parses the sample descriptor into typed sections', () => {
    const result = parseText(airQualityDescriptor());

    assertNoDiagnostics(result);
    const { service, dataSources, application, deploymentEnvs } = result.descriptor;
    assert.deepEqual(service, {
      name: 'Air Quality Madrid',
      scope: 'Environment',
      version: { value: { major: 1, minor: 0, patch: 0 }, path: 'service.version' },
      path: 'service',
    });

    const [source] = dataSources;
    assert.equal(dataSources.length, 1);
    assert.equal(source?.key, 'Measurements');
    assert.equal(source?.category, 'measurements');
    assert.deepEqual(source?.declaredName, {
      value: 'Measurements',
      path: 'data_sources.measurements.Measurements.name',
    });
    assert.deepEqual(source?.query, { type: 'AirQualityObserved', select: ['location', 'Nox', 'O3', 'dateObserved'] });

    assert.equal(application?.layout, 'SinglePage');
    assert.deepEqual(
      application?.roles.map((role) => [role.name, role.hierarchy, role.declaration]),
      [
        ['User', 'User', 'tag'],
        ['Superuser', 'Superuser', 'tag'],
        ['Admin', 'Admin', 'tag'],
      ],
    );
    const [visualization] = application?.visualizations ?? [];
    assert.equal(visualization?.type, 'Map');
    assert.deepEqual(visualization?.source, {
      value: 'Measurements',
      path: 'application.visualizations.Air Quality Visualization.source',
    });
    assert.deepEqual(visualization?.extra, { area: 'Madrid' });

    assert.equal(deploymentEnvs.length, 1);
    assert.equal(deploymentEnvs[0]?.port, 50055);
  });

  it('reports every missing top-level section', () => {
    const result = parseText('service:\n  name: Demo\n  scope: Test\n  version: 1.0.0\n');

    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [
        [SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_REQUIRED_KEY_MISSING, 'data_sources'],
        [SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_REQUIRED_KEY_MISSING, 'application'],
        [SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_REQUIRED_KEY_MISSING, 'deployment'],
      ],
    );
    assert.ok(result.descriptor.service !== null);
    assert.equal(result.descriptor.application, null);
  });

  it('names the parent of a missing nested key', () => {
    const result = parseText(airQualityDescriptor(['  scope: Environment\n', '']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.path, 'service.scope');
    assert.equal(diagnostic.message, 'Required key "scope" is missing in service.');
    assert.equal(result.descriptor.service, null);
  });

  it('accepts a version mapping', () => {
    const result = parseText(airQualityDescriptor(['version: 1.0.0', 'version: { major: 2, minor: 3, patch: 4 }']));

    assertNoDiagnostics(result);
    assert.deepEqual(result.descriptor.service?.version.value, { major: 2, minor: 3, patch: 4 });
  });

  it('rejects malformed version strings', () => {
    const result = parseText(airQualityDescriptor(['version: 1.0.0', 'version: v1.0']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_VERSION_INVALID);
    assert.equal(diagnostic.path, 'service.version');
    assert.equal(diagnostic.actual, 'v1.0');
  });

  it('reports type mismatches with what was found', () => {
    const result = parseText(airQualityDescriptor(['  scope: Environment', '  scope: 42']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_TYPE_MISMATCH);
    assert.equal(diagnostic.message, 'Expected non-empty string at service.scope, found integer 42.');
  });

  it('rejects out-of-range ports and drops the environment', () => {
    const result = parseText(airQualityDescriptor(['port: 50055', 'port: 70000']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_PORT_OUT_OF_RANGE);
    assert.equal(diagnostic.path, 'deployment.env.local.port');
    assert.equal(diagnostic.message, 'Port 70000 is outside the range 0..65535.');
    assert.deepEqual(result.descriptor.deploymentEnvs, []);
  });

  it('rejects relative URIs', () => {
    const result = parseText(airQualityDescriptor(['uri: http://localhost/test', 'uri: /test']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_URI_INVALID);
    assert.equal(diagnostic.path, 'deployment.env.local.uri');
  });

  it('rejects empty and repeated select lists', () => {
    const empty = parseText(airQualityDescriptor(['select: [location, Nox, O3, dateObserved]', 'select: []']));
    assert.equal(singleDiagnostic(empty.diagnostics).code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EMPTY_CONTAINER);
    assert.deepEqual(empty.descriptor.dataSources, []);

    const repeated = parseText(airQualityDescriptor(['select: [location, Nox, O3, dateObserved]', 'select: [O3, O3]']));
    const diagnostic = singleDiagnostic(repeated.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_DUPLICATE_ENTRY);
    assert.equal(diagnostic.path, 'data_sources.measurements.Measurements.query.select[1]');
  });

  it('requires at least one data source', () => {
    const result = parseText(
      airQualityDescriptor([
        'data_sources:\n  measurements:\n    Measurements:\n      name: Measurements\n      provider: Fiware\n      type: Sensor\n      uri: https://data.iiss.at/dataskop/fiwarenosec\n      query:\n        type: AirQualityObserved\n        select: [location, Nox, O3, dateObserved]\n',
        'data_sources: {}\n',
      ]),
    );

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EMPTY_CONTAINER);
    assert.equal(diagnostic.path, 'data_sources');
  });

  it('reports repeated fixed keys at the repeated declaration', () => {
    const result = parseText(airQualityDescriptor(['  scope: Environment\n', '  scope: Environment\n  scope: Air\n']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_DUPLICATE_ENTRY);
    assert.equal(diagnostic.path, 'service.scope');
    assert.equal(diagnostic.span?.line, 4);
    assert.equal(result.descriptor.service, null);
  });

  it('warns about unknown keys with a close suggestion', () => {
    const result = parseText(airQualityDescriptor(['  scope: Environment\n', '  scope: Environment\n  nmae: Other\n']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.kind, 'UnknownKeyWarning');
    assert.equal(diagnostic.path, 'service.nmae');
    assert.equal(diagnostic.suggestion, 'Did you mean "name"?');
    assert.ok(result.descriptor.service !== null);
  });

  it('ignores unknown top-level keys', () => {
    const result = parseText(`${airQualityDescriptor()}notes: internal\n`);

    assertNoDiagnostics(result);
  });

  it('reads role records and rejects unknown hierarchies', () => {
    const records = parseText(
      airQualityDescriptor(['roles: [User, Superuser, Admin]', 'roles: [User, { name: Operator, hierarchy: Superuser }]']),
    );
    assertNoDiagnostics(records);
    assert.deepEqual(
      records.descriptor.application?.roles.map((role) => [role.name, role.hierarchy, role.declaration]),
      [
        ['User', 'User', 'tag'],
        ['Operator', 'Superuser', 'record'],
      ],
    );

    const invalid = parseText(
      airQualityDescriptor(['roles: [User, Superuser, Admin]', 'roles: [{ name: Operator, hierarchy: Admn }]']),
    );
    const diagnostic = singleDiagnostic(invalid.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_ENUM_VALUE_INVALID);
    assert.equal(diagnostic.path, 'application.roles[0].hierarchy');
    assert.equal(diagnostic.suggestion, 'Did you mean "Admin"?');
  });

  it('gives custom role tags the User hierarchy', () => {
    const result = parseText(airQualityDescriptor(['roles: [User, Superuser, Admin]', 'roles: [Analyst]']));

    assert.deepEqual(result.descriptor.application?.roles.map((role) => role.hierarchy), ['User']);
  });

  it('folds unknown visualization keys into extra after the explicit entries', () => {
    const result = parseText(
      airQualityDescriptor(['      extra:\n        area: Madrid\n', '      zoom: 12\n      extra:\n        area: Madrid\n']),
    );

    assertNoDiagnostics(result);
    const [visualization] = result.descriptor.application?.visualizations ?? [];
    assert.deepEqual(visualization?.extra, { area: 'Madrid', zoom: 12 });
    assert.deepEqual(Object.keys(visualization?.extra ?? {}), ['area', 'zoom']);
  });

  it('keeps the explicit extra value over a folded key of the same name', () => {
    const result = parseText(
      airQualityDescriptor(['      extra:\n        area: Madrid\n', '      area: Sevilla\n      extra:\n        area: Madrid\n']),
    );

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EXTRA_KEY_SHADOWED);
    assert.equal(diagnostic.path, 'application.visualizations.Air Quality Visualization.area');
    assert.equal(diagnostic.severity, 'warning');
    const [visualization] = result.descriptor.application?.visualizations ?? [];
    assert.deepEqual(visualization?.extra, { area: 'Madrid' });
  });

  it('rejects structured extra values', () => {
    const result = parseText(airQualityDescriptor(['        area: Madrid', '        area: [Madrid, Sevilla]']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_TYPE_MISMATCH);
    assert.equal(diagnostic.path, 'application.visualizations.Air Quality Visualization.extra.area');
    assert.equal(result.descriptor.application?.type, 'Web');
    assert.deepEqual(result.descriptor.application?.visualizations, []);
  });

  it('keeps the application and its valid siblings when one role or visualization fails', () => {
    const result = parseText(
      airQualityDescriptor(
        ['roles: [User, Superuser, Admin]', 'roles: [User, Superuser, Admin, 5]'],
        [
          '        area: Madrid\n',
          '        area: Madrid\n    Broken Table:\n      type: Table\n      source: Measurements\n      data: []\n',
        ],
      ),
    );

    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [
        [SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_TYPE_MISMATCH, 'application.roles[3]'],
        [SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EMPTY_CONTAINER, 'application.visualizations.Broken Table.data'],
      ],
    );
    assert.deepEqual(result.descriptor.application?.roles.map((role) => role.name), ['User', 'Superuser', 'Admin']);
    assert.deepEqual(
      result.descriptor.application?.visualizations.map((visualization) => visualization.key),
      ['Air Quality Visualization'],
    );
  });

  it('still drops the application when its type is missing', () => {
    const result = parseText(airQualityDescriptor(['  type: Web\n', '']));

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_REQUIRED_KEY_MISSING);
    assert.equal(diagnostic.path, 'application.type');
    assert.equal(result.descriptor.application, null);
  });

  it('keeps __proto__ as an ordinary extra key', () => {
    const result = parseText(airQualityDescriptor(['        area: Madrid\n', '        area: Madrid\n      __proto__: shadow\n']));

    assertNoDiagnostics(result);
    const extra = result.descriptor.application?.visualizations[0]?.extra ?? {};
    assert.deepEqual(Object.keys(extra), ['area', '__proto__']);
    assert.ok(Object.hasOwn(extra, '__proto__'));
    assert.equal(Object.getPrototypeOf(extra), Object.prototype);
  });

  it('carries deployment credentials as a string map', () => {
    const result = parseText(
      airQualityDescriptor(['      type: Docker', '      type: Docker\n      credentials:\n        user: test-user\n        password: test-secret']),
    );

    assertNoDiagnostics(result);
    assert.deepEqual(result.descriptor.deploymentEnvs[0]?.credentials, { user: 'test-user', password: 'test-secret' });
  });

  it('rejects credentials that are not strings and drops the environment', () => {
    const result = parseText(
      airQualityDescriptor(['      type: Docker', '      type: Docker\n      credentials:\n        token: 42']),
    );

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_TYPE_MISMATCH);
    assert.equal(diagnostic.path, 'deployment.env.local.credentials.token');
    assert.deepEqual(result.descriptor.deploymentEnvs, []);
  });

  it('requires a non-empty deployment env', () => {
    const result = parseText(
      airQualityDescriptor([
        'deployment:\n  env:\n    local:\n      name: local\n      uri: http://localhost/test\n      port: 50055\n      type: Docker\n',
        'deployment:\n  env: {}\n',
      ]),
    );

    const diagnostic = singleDiagnostic(result.diagnostics);
    assert.equal(diagnostic.code, SSDL_DIAGNOSTIC_CODES.SSDL_PARSE_EMPTY_CONTAINER);
    assert.equal(diagnostic.path, 'deployment.env');
  });

  it('parses in-memory values without spans', () => {
    const read = readDescriptorValue({ service: { name: 'Demo', scope: 'Test', version: '1.0.0' } });
    assert.ok(read.root !== null);

    const result = parseDescriptor(read.root);
    assert.equal(result.descriptor.service?.name, 'Demo');
    assert.ok(result.diagnostics.every((diagnostic) => diagnostic.span === undefined));
  });
});
