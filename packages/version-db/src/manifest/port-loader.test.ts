/**
 * Port Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isPortDirectory, loadAllPorts, loadPort } from './port-loader.js';

describe('port loader', () => {
  let portsDir: string;

  async function writePort(name: string, files: Record<string, string>): Promise<string> {
    const dir = join(portsDir, name);
    await mkdir(dir, { recursive: true });
    for (const [file, text] of Object.entries(files)) {
      await writeFile(join(dir, file), text, 'utf-8');
    }
    return dir;
  }

  beforeEach(async () => {
    portsDir = join(tmpdir(), `version-db-ports-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(portsDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(portsDir, { recursive: true, force: true });
  });

  it('should prefer vcpkg.json over CONTROL', async () => {
    const dir = await writePort('foo', {
      'vcpkg.json': '{"name":"foo","version":"2.0"}',
      CONTROL: 'Source: foo\nVersion: 1.0\n',
    });

    const result = await loadPort(dir);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.origin).toBe('manifest');
    expect(result.value.version.version.text).toBe('2.0');
  });

  it('should fall back to CONTROL', async () => {
    const dir = await writePort('bar', { CONTROL: 'Source: bar\nVersion: 1.0-beta\n' });

    const result = await loadPort(dir);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.origin).toBe('control');
    expect(result.value.version.scheme).toBe('string');
  });

  it('should report a directory with neither file', async () => {
    const dir = await writePort('empty', {});

    expect(await isPortDirectory(dir)).toBe(false);
    expect(await loadPort(dir)).toEqual({
      ok: false,
      error: {
        origin: dir,
        diagnostics: [{ field: '(port)', message: 'no vcpkg.json or CONTROL in empty' }],
      },
    });
  });

  it('should tag parse errors with the file path', async () => {
    const dir = await writePort('broken', { 'vcpkg.json': '{"name":"broken"}' });

    const result = await loadPort(dir);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.origin).toBe(join(dir, 'vcpkg.json'));
  });

  it('should load every port and collect errors separately', async () => {
    await writePort('zeta', { 'vcpkg.json': '{"name":"zeta","version":"1"}' });
    await writePort('alpha', { CONTROL: 'Source: alpha\nVersion: 3\n' });
    await writePort('broken', { 'vcpkg.json': 'not json' });
    await writeFile(join(portsDir, 'README.md'), 'not a port', 'utf-8');

    const { ports, errors } = await loadAllPorts(portsDir);

    expect(ports.map((p) => p.file.name)).toEqual(['alpha', 'zeta']);
    expect(errors).toHaveLength(1);
    expect(errors[0].origin).toBe(join(portsDir, 'broken', 'vcpkg.json'));
  });
});
