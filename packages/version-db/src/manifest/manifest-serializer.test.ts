/**
 * Canonical Manifest Serializer Tests
 */

import { describe, it, expect } from 'vitest';
import { formatManifest, serializeDependency, serializeManifest } from './manifest-serializer.js';
import { parseManifest } from './manifest-parser.js';
import { parseControlFile } from './control-file.js';

const CANONICAL = `{
  "$comment": "example port",
  "name": "fmt",
  "version": "10.2.1",
  "port-version": 1,
  "description": "Formatting library",
  "homepage": "https://example.com/fmt",
  "license": "MIT",
  "dependencies": [
    {
      "name": "cmake-helper",
      "host": true
    },
    "zlib"
  ],
  "features": {
    "tools": {
      "description": "Command line tools"
    }
  }
}
`;

describe('serializeDependency()', () => {
  it('should write a plain dependency as its name', () => {
    expect(
      serializeDependency({ name: 'zlib', features: [], defaultFeatures: true, host: false })
    ).toBe('zlib');
  });

  it('should write qualifiers in canonical key order', () => {
    const json = serializeDependency({
      name: 'curl',
      features: ['ssl'],
      defaultFeatures: false,
      host: true,
      platform: 'linux',
    });
    expect(JSON.stringify(json)).toBe(
      '{"name":"curl","host":true,"default-features":false,"features":["ssl"],"platform":"linux"}'
    );
  });
});

describe('formatManifest()', () => {
  it('should reproduce canonical text unchanged', () => {
    const result = parseManifest(CANONICAL, 'fmt/vcpkg.json');
    if (!result.ok) throw new Error('expected success');
    expect(formatManifest(result.value)).toBe(CANONICAL);
  });

  it('should reorder keys and sort dependencies', () => {
    const messy = JSON.stringify({
      dependencies: ['zlib', { name: 'cmake-helper', host: true }],
      license: 'MIT',
      'port-version': 1,
      homepage: 'https://example.com/fmt',
      version: '10.2.1',
      features: { tools: { description: ['Command line tools'] } },
      description: ['Formatting library'],
      name: 'fmt',
      $comment: 'example port',
    });
    const result = parseManifest(messy, 'fmt/vcpkg.json');
    if (!result.ok) throw new Error('expected success');
    expect(formatManifest(result.value)).toBe(CANONICAL);
  });

  it('should omit a zero port-version', () => {
    const result = parseManifest('{"name":"foo","version-date":"2024-01-02","port-version":0}', 'x');
    if (!result.ok) throw new Error('expected success');
    expect(formatManifest(result.value)).toBe(
      '{\n  "name": "foo",\n  "version-date": "2024-01-02"\n}\n'
    );
  });
});

describe('serializeManifest()', () => {
  it('should convert a CONTROL description into manifest form', () => {
    const control = [
      'Source: zlib',
      'Version: 1.2.11',
      'Port-Version: 9',
      'Description: A compression library',
      '  with a second line',
      'Build-Depends: fmt, curl[ssl,core] (!uwp)',
      'Default-Features: ssl',
      '',
      'Feature: ssl',
      'Description: TLS support',
      'Build-Depends: openssl',
    ].join('\n');
    const result = parseControlFile(control, 'zlib/CONTROL');
    if (!result.ok) throw new Error('expected success');

    expect(serializeManifest(result.value)).toEqual({
      name: 'zlib',
      'version-string': '1.2.11',
      'port-version': 9,
      description: ['A compression library', 'with a second line'],
      dependencies: [
        { name: 'curl', 'default-features': false, features: ['ssl'], platform: '!uwp' },
        'fmt',
      ],
      'default-features': ['ssl'],
      features: {
        ssl: { description: 'TLS support', dependencies: ['openssl'] },
      },
    });
  });
});
