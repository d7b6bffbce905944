/**
 * Version History Store
 *
 * One JSON file per port records every version the port has had, newest
 * first, each paired with the git tree of the port directory at that
 * version:
 *
 * ```json
 * {
 *   "versions": [
 *     { "git-tree": "...", "version": "1.2.0", "port-version": 0 }
 *   ]
 * }
 * ```
 *
 * The field that carries the version text names its scheme. A missing file
 * means the port has no recorded versions yet; a file that exists but does
 * not parse is a {@link MalformedRegistryFileError}.
 *
 * @module registry/version-history-store
 */

import { MalformedRegistryFileError } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { readTextIfExists } from '../core/utils/fs.js';
import { zodDiagnostics } from '../manifest/manifest-schema.js';
import type { FieldDiagnostic } from '../manifest/types.js';
import {
  SCHEME_FIELDS,
  VERSION_FIELDS,
  schemeForField,
  versionsEqual,
  type SchemedVersion,
  type Version,
} from '../versions/types.js';
import { versionHistoryPath } from './paths.js';
import { HistoryFileSchema, type HistoryEntryJson } from './schema.js';

export interface VersionHistoryEntry {
  readonly gitTree: string;
  readonly version: SchemedVersion;
}

/**
 * Where {@link VersionHistory.record} puts an entry
 */
export type HistoryPlacement =
  | { readonly kind: 'front' }
  | { readonly kind: 'replace'; readonly index: number };

export interface HistoryMatch {
  readonly index: number;
  readonly entry: VersionHistoryEntry;
}

/**
 * In-memory history of one port, newest entry first
 */
export class VersionHistory {
  private readonly items: VersionHistoryEntry[];

  constructor(
    public readonly port: string,
    entries: readonly VersionHistoryEntry[] = []
  ) {
    this.items = [...entries];
  }

  get entries(): readonly VersionHistoryEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  findByGitTree(gitTree: string): HistoryMatch | undefined {
    const index = this.items.findIndex((entry) => entry.gitTree === gitTree);
    return index < 0 ? undefined : { index, entry: this.items[index] };
  }

  /**
   * First entry with the same version text and port version
   */
  findByVersion(version: Version): HistoryMatch | undefined {
    const index = this.items.findIndex((entry) => versionsEqual(entry.version.version, version));
    return index < 0 ? undefined : { index, entry: this.items[index] };
  }

  record(entry: VersionHistoryEntry, placement: HistoryPlacement): void {
    if (placement.kind === 'front') {
      this.items.unshift(entry);
      return;
    }
    if (placement.index < 0 || placement.index >= this.items.length) {
      throw new RangeError(
        `history index ${placement.index} out of range for ${this.port} (${this.items.length} entries)`
      );
    }
    this.items[placement.index] = entry;
  }
}

function entryFromJson(
  json: HistoryEntryJson,
  index: number,
  diagnostics: FieldDiagnostic[]
): VersionHistoryEntry | undefined {
  const present = VERSION_FIELDS.filter((field) => json[field] !== undefined);
  if (present.length !== 1) {
    diagnostics.push({
      field: `versions.${index}`,
      message:
        present.length === 0
          ? 'missing a version field'
          : `only one version field is allowed, found ${present.join(', ')}`,
    });
    return undefined;
  }

  const field = present[0];
  const text = json[field];
  if (text === undefined) return undefined;

  return {
    gitTree: json['git-tree'],
    version: {
      scheme: schemeForField(field),
      version: { text, portVersion: json['port-version'] ?? 0 },
    },
  };
}

/**
 * Parse the text of a history file
 *
 * @param path - Used in the error when the text is malformed
 * @throws MalformedRegistryFileError
 */
export function parseVersionHistory(text: string, path: string, port: string): VersionHistory {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedRegistryFileError(path, [{ field: '(json)', message }], 'malformed-history');
  }

  const result = HistoryFileSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedRegistryFileError(path, zodDiagnostics(result.error), 'malformed-history');
  }

  const diagnostics: FieldDiagnostic[] = [];
  const entries: VersionHistoryEntry[] = [];
  result.data.versions.forEach((entryJson, index) => {
    const entry = entryFromJson(entryJson, index, diagnostics);
    if (entry) entries.push(entry);
  });

  if (diagnostics.length > 0) {
    throw new MalformedRegistryFileError(path, diagnostics, 'malformed-history');
  }
  return new VersionHistory(port, entries);
}

/**
 * History file object: `git-tree`, the scheme's field, `port-version`
 */
export function serializeVersionHistory(history: VersionHistory): {
  versions: Array<Record<string, string | number>>;
} {
  return {
    versions: history.entries.map((entry) => ({
      'git-tree': entry.gitTree,
      [SCHEME_FIELDS[entry.version.scheme]]: entry.version.version.text,
      'port-version': entry.version.version.portVersion,
    })),
  };
}

/**
 * Reads and writes the history files under one versions directory
 */
export class VersionHistoryStore {
  constructor(private readonly versionsDir: string) {}

  pathFor(port: string): string {
    return versionHistoryPath(this.versionsDir, port);
  }

  /**
   * The port's history, or `undefined` when no file exists yet
   *
   * @throws MalformedRegistryFileError
   */
  async load(port: string): Promise<VersionHistory | undefined> {
    const path = this.pathFor(port);
    const text = await readTextIfExists(path);
    return text === undefined ? undefined : parseVersionHistory(text, path, port);
  }

  /**
   * Atomically write the history file, creating its directory as needed
   *
   * @returns The path written
   */
  async persist(history: VersionHistory): Promise<string> {
    const path = this.pathFor(history.port);
    await atomicWriteJSON(path, serializeVersionHistory(history));
    return path;
  }
}
