/**
 * Port Loader
 *
 * Reads a port directory's description: `vcpkg.json` when it exists,
 * otherwise the legacy `CONTROL` file. Loading never throws for a bad port;
 * problems come back as {@link ParseError}s so a whole catalog can be loaded
 * in one pass.
 *
 * @module manifest/port-loader
 */

import { basename, join } from 'path';
import { listDirectories, pathExists, readTextIfExists } from '../core/utils/fs.js';
import { parseControlFile } from './control-file.js';
import { parseManifest } from './manifest-parser.js';
import {
  parseFailed,
  type LoadResults,
  type LoadedPort,
  type ParseError,
  type ParseResult,
  type SourceControlFile,
} from './types.js';

export const MANIFEST_FILE_NAME = 'vcpkg.json';
export const CONTROL_FILE_NAME = 'CONTROL';

/**
 * Parse a port description held in memory
 *
 * @param origin - Path or tag used in diagnostics
 * @param isManifest - `true` for `vcpkg.json` text, `false` for `CONTROL`
 */
export function loadPortText(
  text: string,
  origin: string,
  isManifest: boolean
): ParseResult<SourceControlFile> {
  return isManifest ? parseManifest(text, origin) : parseControlFile(text, origin);
}

/**
 * Whether a directory holds a port description
 */
export async function isPortDirectory(dir: string): Promise<boolean> {
  return (
    (await pathExists(join(dir, MANIFEST_FILE_NAME))) ||
    (await pathExists(join(dir, CONTROL_FILE_NAME)))
  );
}

async function readPortFile(path: string): Promise<string | ParseError | undefined> {
  try {
    return await readTextIfExists(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { origin: path, diagnostics: [{ field: '(file)', message }] };
  }
}

/**
 * Load one port directory
 */
export async function loadPort(portDir: string): Promise<ParseResult<SourceControlFile>> {
  const manifestPath = join(portDir, MANIFEST_FILE_NAME);
  const manifest = await readPortFile(manifestPath);
  if (typeof manifest === 'string') return loadPortText(manifest, manifestPath, true);
  if (manifest !== undefined) return { ok: false, error: manifest };

  const controlPath = join(portDir, CONTROL_FILE_NAME);
  const control = await readPortFile(controlPath);
  if (typeof control === 'string') return loadPortText(control, controlPath, false);
  if (control !== undefined) return { ok: false, error: control };

  return parseFailed(portDir, [
    {
      field: '(port)',
      message: `no ${MANIFEST_FILE_NAME} or ${CONTROL_FILE_NAME} in ${basename(portDir)}`,
    },
  ]);
}

/**
 * Load every port directory under `portsDir`.
 *
 * Ports that fail to load land in `errors`; the rest are returned in
 * directory-name order.
 */
export async function loadAllPorts(portsDir: string): Promise<LoadResults> {
  const ports: LoadedPort[] = [];
  const errors: ParseError[] = [];

  for (const name of await listDirectories(portsDir)) {
    const portDir = join(portsDir, name);
    const result = await loadPort(portDir);
    if (result.ok) {
      ports.push({ portDir, file: result.value });
    } else {
      errors.push(result.error);
    }
  }

  return { ports, errors };
}
