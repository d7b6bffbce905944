/**
 * Baseline Registry
 *
 * `versions/baseline.json` maps every port to its current recommended
 * version:
 *
 * ```json
 * { "default": { "zlib": { "baseline": "1.3.1", "port-version": 0 } } }
 * ```
 *
 * The map is loaded once and kept in memory while ports are reconciled;
 * {@link BaselineRegistry.persist} rewrites the whole file with ports in
 * sorted order.
 *
 * @module registry/baseline-registry
 */

import { BaselineNotFoundError, MalformedRegistryFileError } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { readTextIfExists } from '../core/utils/fs.js';
import { zodDiagnostics } from '../manifest/manifest-schema.js';
import { versionsEqual, type Version } from '../versions/types.js';
import { baselinePath } from './paths.js';
import { BaselineFileSchema } from './schema.js';

export interface BaselineFileEntry {
  readonly baseline: string;
  readonly 'port-version': number;
}

export class BaselineRegistry {
  private readonly versions: Map<string, Version>;

  constructor(
    public readonly path: string,
    versions: ReadonlyMap<string, Version> = new Map()
  ) {
    this.versions = new Map(versions);
  }

  /**
   * Load `<versionsDir>/baseline.json`
   *
   * @throws BaselineNotFoundError when the file does not exist
   * @throws MalformedRegistryFileError when it does not parse
   */
  static async load(versionsDir: string): Promise<BaselineRegistry> {
    const path = baselinePath(versionsDir);
    const text = await readTextIfExists(path);
    if (text === undefined) {
      throw new BaselineNotFoundError(path);
    }
    return BaselineRegistry.parse(text, path);
  }

  /**
   * @throws MalformedRegistryFileError
   */
  static parse(text: string, path: string): BaselineRegistry {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedRegistryFileError(path, [{ field: '(json)', message }], 'malformed-baseline');
    }

    const result = BaselineFileSchema.safeParse(json);
    if (!result.success) {
      throw new MalformedRegistryFileError(path, zodDiagnostics(result.error), 'malformed-baseline');
    }

    const versions = new Map<string, Version>();
    for (const [port, entry] of Object.entries(result.data.default)) {
      versions.set(port, { text: entry.baseline, portVersion: entry['port-version'] ?? 0 });
    }
    return new BaselineRegistry(path, versions);
  }

  get size(): number {
    return this.versions.size;
  }

  get(port: string): Version | undefined {
    return this.versions.get(port);
  }

  /**
   * Whether the recorded baseline is exactly `version`
   */
  matches(port: string, version: Version): boolean {
    const current = this.versions.get(port);
    return current !== undefined && versionsEqual(current, version);
  }

  set(port: string, version: Version): void {
    this.versions.set(port, version);
  }

  /**
   * Baseline file object with ports in sorted order
   */
  toJSON(): { default: Record<string, BaselineFileEntry> } {
    const entries: Record<string, BaselineFileEntry> = {};
    for (const port of [...this.versions.keys()].sort()) {
      const version = this.versions.get(port);
      if (version) {
        entries[port] = { baseline: version.text, 'port-version': version.portVersion };
      }
    }
    return { default: entries };
  }

  async persist(): Promise<void> {
    await atomicWriteJSON(this.path, this.toJSON());
  }
}
