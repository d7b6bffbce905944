/**
 * Test catalog helpers
 *
 * Builds a throwaway catalog (`ports/`, `versions/`) under the OS temp
 * directory, a logger that records what it was given, and a CLI context
 * for running commands against the catalog.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import type { GlobalContext } from '../../cli/lib/context.js';
import { createCLILogger } from '../../cli/lib/logger.js';
import type { LogLevel, LogMetadata, Logger } from '../../core/utils/logger.js';

export interface TestCatalog {
  readonly root: string;
  readonly portsDir: string;
  readonly versionsDir: string;
  writePortFile(port: string, file: string, text: string): Promise<void>;
  /** Write `ports/<port>/vcpkg.json` from a manifest object, canonically formatted */
  writeManifest(port: string, manifest: Record<string, unknown>): Promise<void>;
  writeBaseline(entries: Record<string, { baseline: string; 'port-version': number }>): Promise<void>;
  writeVersionsFile(relativePath: string, text: string): Promise<void>;
  readVersionsFile(relativePath: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTestCatalog(): Promise<TestCatalog> {
  const root = join(tmpdir(), `version-db-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  const portsDir = join(root, 'ports');
  const versionsDir = join(root, 'versions');
  await mkdir(portsDir, { recursive: true });
  await mkdir(versionsDir, { recursive: true });

  const writePortFile = async (port: string, file: string, text: string): Promise<void> => {
    await mkdir(join(portsDir, port), { recursive: true });
    await writeFile(join(portsDir, port, file), text, 'utf-8');
  };

  return {
    root,
    portsDir,
    versionsDir,
    writePortFile,
    writeManifest: (port, manifest) =>
      writePortFile(port, 'vcpkg.json', `${JSON.stringify(manifest, null, 2)}\n`),
    writeBaseline: (entries) =>
      writeFile(
        join(versionsDir, 'baseline.json'),
        `${JSON.stringify({ default: entries }, null, 2)}\n`,
        'utf-8'
      ),
    writeVersionsFile: async (relativePath, text) => {
      await mkdir(dirname(join(versionsDir, relativePath)), { recursive: true });
      await writeFile(join(versionsDir, relativePath), text, 'utf-8');
    },
    readVersionsFile: (relativePath) => readFile(join(versionsDir, relativePath), 'utf-8'),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export interface LogRecord {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  private record(level: LogLevel, message: string, metadata?: LogMetadata): void {
    this.records.push(metadata === undefined ? { level, message } : { level, message, metadata });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.record('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.record('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.record('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.record('error', message, metadata);
  }

  messages(level: LogLevel): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }
}

/**
 * CLI context pointing at a test catalog
 */
export function createTestContext(
  catalog: TestCatalog,
  options: { readonly json?: boolean; readonly verbose?: boolean } = {}
): GlobalContext {
  const json = options.json ?? false;
  return {
    config: {
      paths: { root: catalog.root, ports: 'ports', versions: 'versions' },
      verbose: options.verbose ?? false,
      json,
      configPath: null,
    },
    logger: createCLILogger({ level: 'debug', json }),
    startTime: Date.now(),
  };
}
