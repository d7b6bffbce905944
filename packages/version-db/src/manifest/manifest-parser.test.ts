/**
 * JSON Manifest Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseManifest } from './manifest-parser.js';
import type { ParseResult, SourceControlFile } from './types.js';

function expectOk(result: ParseResult<SourceControlFile>): SourceControlFile {
  if (!result.ok) {
    throw new Error(`expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

function messages(result: ParseResult<SourceControlFile>): string[] {
  if (result.ok) throw new Error('expected failure');
  return result.error.diagnostics.map((d) => `${d.field}: ${d.message}`);
}

describe('parseManifest()', () => {
  it('should read the scheme from the version field used', () => {
    const cases = [
      ['version', '1.2.3', 'relaxed'],
      ['version-semver', '1.2.3-rc.1', 'semver'],
      ['version-date', '2024-03-01', 'date'],
      ['version-string', 'vista', 'string'],
    ] as const;

    for (const [field, text, scheme] of cases) {
      const scf = expectOk(parseManifest(JSON.stringify({ name: 'foo', [field]: text }), 'foo'));
      expect(scf.version).toEqual({ scheme, version: { text, portVersion: 0 } });
    }
  });

  it('should read port-version and metadata', () => {
    const scf = expectOk(
      parseManifest(
        JSON.stringify({
          $comment: 'kept',
          name: 'fmt',
          version: '10.2.1',
          'port-version': 2,
          description: 'Formatting library',
          maintainers: ['a@example.com', 'b@example.com'],
          license: 'MIT',
          dependencies: ['zlib', { name: 'curl', 'default-features': false, features: ['ssl'] }],
          'default-features': ['tools'],
          features: { tools: { description: 'Command line tools' } },
        }),
        'ports/fmt/vcpkg.json'
      )
    );

    expect(scf.origin).toBe('manifest');
    expect(scf.comments).toEqual({ $comment: 'kept' });
    expect(scf.version.version.portVersion).toBe(2);
    expect(scf.description).toEqual(['Formatting library']);
    expect(scf.maintainers).toEqual(['a@example.com', 'b@example.com']);
    expect(scf.dependencies).toEqual([
      { name: 'zlib', features: [], defaultFeatures: true, host: false },
      { name: 'curl', features: ['ssl'], defaultFeatures: false, host: false },
    ]);
    expect(scf.features).toEqual([
      { name: 'tools', description: ['Command line tools'], dependencies: [] },
    ]);
  });

  it('should require exactly one version field', () => {
    expect(messages(parseManifest('{"name":"foo"}', 'foo'))).toEqual([
      'version: missing a version field (one of version, version-semver, version-date, version-string)',
    ]);
    expect(
      messages(parseManifest('{"name":"foo","version":"1.0","version-string":"1.0"}', 'foo'))
    ).toEqual(['version-string: only one version field is allowed, found version, version-string']);
  });

  it('should validate version text against its scheme', () => {
    expect(messages(parseManifest('{"name":"foo","version-date":"2023-02-30"}', 'foo'))).toEqual([
      'version-date: "2023-02-30" is not a date version (YYYY-MM-DD of a real day, optionally followed by .N)',
    ]);
    expect(messages(parseManifest('{"name":"foo","version-semver":"1.2"}', 'foo'))).toEqual([
      'version-semver: "1.2" is not a semantic version (MAJOR.MINOR.PATCH[-prerelease][+build])',
    ]);
  });

  it('should report unknown keys and wrong types with their paths', () => {
    const result = parseManifest(
      '{"name":"foo","version":"1.0","colour":"red","port-version":-1}',
      'foo'
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;

    const fields = result.error.diagnostics.map((d) => d.field);
    expect(fields).toContain('port-version');
    expect(fields).toContain('(root)');
  });

  it('should reject invalid port names', () => {
    expect(messages(parseManifest('{"name":"Foo_Bar","version":"1"}', 'foo'))).toEqual([
      'name: must be lowercase alphanumerics separated by hyphens',
    ]);
  });

  it('should reject invalid feature names', () => {
    const text = (feature: string): string =>
      `{"name":"foo","version":"1","features":{"${feature}":{"description":"x"}}}`;

    expect(messages(parseManifest(text('Bad_Ssl'), 'foo'))).toEqual([
      'features.Bad_Ssl: feature names must be lowercase alphanumerics separated by hyphens',
    ]);
    expect(messages(parseManifest(text('__proto__'), 'foo'))).toEqual([
      'features.__proto__: feature names must be lowercase alphanumerics separated by hyphens',
    ]);
  });

  it('should reject default features that are not declared', () => {
    expect(
      messages(parseManifest('{"name":"foo","version":"1","default-features":["gui"]}', 'foo'))
    ).toEqual(['default-features: unknown feature "gui"']);
  });

  it('should report malformed JSON against the origin', () => {
    const result = parseManifest('{"name": ', 'ports/foo/vcpkg.json');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.origin).toBe('ports/foo/vcpkg.json');
    expect(result.error.diagnostics[0].field).toBe('(json)');
  });

  it('should reject a manifest that is not an object', () => {
    expect(messages(parseManifest('[]', 'foo'))).toEqual(['(root): manifest must be a JSON object']);
  });
});
