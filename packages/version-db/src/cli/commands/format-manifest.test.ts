/**
 * Format-manifest command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from '../../core/utils/fs.js';
import { createTestCatalog, createTestContext, type TestCatalog } from '../../__tests__/utils/catalog.js';
import { EXIT_CODES } from '../lib/context.js';
import { runFormatManifest } from './format-manifest.js';

describe('runFormatManifest', () => {
  let catalog: TestCatalog;

  beforeEach(async () => {
    catalog = await createTestCatalog();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await catalog.cleanup();
  });

  const manifestPath = (port: string): string => join(catalog.portsDir, port, 'vcpkg.json');

  it('rewrites a manifest in canonical form', async () => {
    await catalog.writePortFile('foo', 'vcpkg.json', '{"version":"1.0.0","name":"foo"}');

    const exitCode = await runFormatManifest('foo', {}, createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(await readFile(manifestPath('foo'), 'utf-8')).toBe(
      '{\n  "name": "foo",\n  "version": "1.0.0"\n}\n'
    );
    expect(console.log).toHaveBeenCalledWith(`Success: formatted ${manifestPath('foo')}`);
  });

  it('leaves a canonical manifest alone', async () => {
    await catalog.writeManifest('foo', { name: 'foo', version: '1.0.0' });

    const exitCode = await runFormatManifest('foo', {}, createTestContext(catalog, { json: true }));

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify({ port: 'foo', path: manifestPath('foo'), changed: false })
    );
  });

  it('refuses a CONTROL port without --convert-control', async () => {
    await catalog.writePortFile('zlib', 'CONTROL', 'Source: zlib\nVersion: 1.2.11\n');

    const exitCode = await runFormatManifest('zlib', {}, createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.USAGE_ERROR);
    expect(await pathExists(manifestPath('zlib'))).toBe(false);
  });

  it('converts a CONTROL port and removes the CONTROL file', async () => {
    await catalog.writePortFile('zlib', 'CONTROL', 'Source: zlib\nVersion: 1.2.11\n');

    const exitCode = await runFormatManifest(
      'zlib',
      { convertControl: true },
      createTestContext(catalog)
    );

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(await readFile(manifestPath('zlib'), 'utf-8')).toBe(
      '{\n  "name": "zlib",\n  "version-string": "1.2.11"\n}\n'
    );
    expect(await pathExists(join(catalog.portsDir, 'zlib', 'CONTROL'))).toBe(false);
  });

  it('reports a manifest that does not parse', async () => {
    await catalog.writePortFile('foo', 'vcpkg.json', '{"name":"foo"}');

    const exitCode = await runFormatManifest('foo', {}, createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.ERRORS);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining(`Error: error: while loading ${manifestPath('foo')}:`)
    );
  });
});
