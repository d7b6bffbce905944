/**
 * Version History Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MalformedRegistryFileError } from '../core/errors.js';
import { versionHistoryPath } from './paths.js';
import {
  VersionHistory,
  VersionHistoryStore,
  parseVersionHistory,
  type VersionHistoryEntry,
} from './version-history-store.js';

function entry(gitTree: string, text: string, portVersion = 0): VersionHistoryEntry {
  return { gitTree, version: { scheme: 'relaxed', version: { text, portVersion } } };
}

describe('versionHistoryPath()', () => {
  it('should shard by the first letter of the port', () => {
    expect(versionHistoryPath('/catalog/versions', 'zlib')).toBe('/catalog/versions/z-/zlib.json');
    expect(versionHistoryPath('/catalog/versions', '7zip')).toBe('/catalog/versions/7-/7zip.json');
  });
});

describe('VersionHistory', () => {
  it('should find entries by git tree and by exact version', () => {
    const history = new VersionHistory('foo', [entry('b', '1.1.0'), entry('a', '1.0.0')]);

    expect(history.findByGitTree('a')).toEqual({ index: 1, entry: entry('a', '1.0.0') });
    expect(history.findByGitTree('c')).toBeUndefined();
    expect(history.findByVersion({ text: '1.1.0', portVersion: 0 })?.index).toBe(0);
    expect(history.findByVersion({ text: '1.1.0', portVersion: 1 })).toBeUndefined();
  });

  it('should insert at the front and replace in place', () => {
    const history = new VersionHistory('foo', [entry('a', '1.0.0')]);

    history.record(entry('b', '2.0.0'), { kind: 'front' });
    history.record(entry('c', '1.0.0'), { kind: 'replace', index: 1 });

    expect(history.entries.map((e) => e.gitTree)).toEqual(['b', 'c']);
    expect(history.size).toBe(2);
  });

  it('should reject a replacement outside the history', () => {
    const history = new VersionHistory('foo', [entry('a', '1.0.0')]);
    expect(() => history.record(entry('b', '1.0.0'), { kind: 'replace', index: 1 })).toThrow(
      RangeError
    );
  });
});

describe('parseVersionHistory()', () => {
  it('should read the scheme from the field name and default port-version to 0', () => {
    const history = parseVersionHistory(
      JSON.stringify({
        versions: [
          { 'git-tree': 'b', 'version-date': '2024-01-02', 'port-version': 3 },
          { 'git-tree': 'a', 'version-string': 'vista' },
        ],
      }),
      'f.json',
      'foo'
    );

    expect(history.entries).toEqual([
      { gitTree: 'b', version: { scheme: 'date', version: { text: '2024-01-02', portVersion: 3 } } },
      { gitTree: 'a', version: { scheme: 'string', version: { text: 'vista', portVersion: 0 } } },
    ]);
  });

  it('should reject entries without exactly one version field', () => {
    const text = JSON.stringify({
      versions: [{ 'git-tree': 'a' }, { 'git-tree': 'b', version: '1', 'version-string': '1' }],
    });

    try {
      parseVersionHistory(text, 'f.json', 'foo');
      expect.unreachable('expected a malformed history error');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRegistryFileError);
      if (!(error instanceof MalformedRegistryFileError)) return;
      expect(error.code).toBe('malformed-history');
      expect(error.getSummary()).toBe(
        [
          'unable to parse versions file f.json',
          '  versions.0: missing a version field',
          '  versions.1: only one version field is allowed, found version, version-string',
        ].join('\n')
      );
    }
  });

  it('should reject invalid JSON and unexpected shapes', () => {
    expect(() => parseVersionHistory('{', 'f.json', 'foo')).toThrow(MalformedRegistryFileError);
    expect(() => parseVersionHistory('{"versions":{}}', 'f.json', 'foo')).toThrow(
      'unable to parse versions file f.json'
    );
  });
});

describe('VersionHistoryStore', () => {
  let versionsDir: string;
  let store: VersionHistoryStore;

  beforeEach(async () => {
    versionsDir = join(
      tmpdir(),
      `version-db-history-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await mkdir(versionsDir, { recursive: true });
    store = new VersionHistoryStore(versionsDir);
  });

  afterEach(async () => {
    await rm(versionsDir, { recursive: true, force: true });
  });

  it('should return undefined for a port with no history file', async () => {
    expect(await store.load('foo')).toBeUndefined();
  });

  it('should write canonical JSON and read it back', async () => {
    const history = new VersionHistory('foo', [entry('deadbeef', '1.0.0')]);
    history.record(
      { gitTree: 'cafef00d', version: { scheme: 'semver', version: { text: '2.0.0', portVersion: 1 } } },
      { kind: 'front' }
    );

    const path = await store.persist(history);

    expect(path).toBe(join(versionsDir, 'f-', 'foo.json'));
    expect(await readFile(path, 'utf-8')).toBe(
      [
        '{',
        '  "versions": [',
        '    {',
        '      "git-tree": "cafef00d",',
        '      "version-semver": "2.0.0",',
        '      "port-version": 1',
        '    },',
        '    {',
        '      "git-tree": "deadbeef",',
        '      "version": "1.0.0",',
        '      "port-version": 0',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n')
    );

    const loaded = await store.load('foo');
    expect(loaded?.entries).toEqual(history.entries);
  });

  it('should leave no temporary files behind', async () => {
    await store.persist(new VersionHistory('foo', [entry('a', '1')]));
    expect(await readdir(join(versionsDir, 'f-'))).toEqual(['foo.json']);
  });

  it('should surface a malformed file on load', async () => {
    await mkdir(join(versionsDir, 'b-'), { recursive: true });
    await writeFile(join(versionsDir, 'b-', 'bar.json'), 'not json', 'utf-8');

    await expect(store.load('bar')).rejects.toBeInstanceOf(MalformedRegistryFileError);
  });
});
