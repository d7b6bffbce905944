/**
 * Format-manifest Command
 *
 * Rewrites a port's `vcpkg.json` in canonical form. With `--convert-control`
 * a port still described by a CONTROL file gets a `vcpkg.json` written and
 * the CONTROL file removed.
 *
 * Usage:
 *   version-db format-manifest <port> [--convert-control]
 *
 * @module cli/commands/format-manifest
 */

import { unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { Command } from 'commander';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { readTextIfExists } from '../../core/utils/fs.js';
import { formatManifest } from '../../manifest/manifest-serializer.js';
import { CONTROL_FILE_NAME, MANIFEST_FILE_NAME, loadPort } from '../../manifest/port-loader.js';
import { formatParseError } from '../../manifest/types.js';
import { resolvePaths } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, reportCommandError, type ExitCode, type GlobalContext } from '../lib/context.js';
import { printError, printOutput, printSuccess } from '../lib/output.js';

export interface FormatManifestOptions {
  readonly convertControl?: boolean;
}

export async function runFormatManifest(
  port: string,
  options: FormatManifestOptions,
  context: GlobalContext
): Promise<ExitCode> {
  const { portsDir } = resolvePaths(context.config);
  const portDir = join(portsDir, port);
  const manifestPath = join(portDir, MANIFEST_FILE_NAME);
  context.logger.setCommand('format-manifest');

  try {
    const loaded = await loadPort(portDir);
    if (!loaded.ok) {
      printError(formatParseError(loaded.error));
      return EXIT_CODES.ERRORS;
    }

    const scf = loaded.value;
    if (scf.origin === 'control' && !options.convertControl) {
      printError(`${port} is described by a ${CONTROL_FILE_NAME} file; pass --convert-control to write ${MANIFEST_FILE_NAME}`);
      return EXIT_CODES.USAGE_ERROR;
    }

    const formatted = formatManifest(scf);
    if (scf.origin === 'manifest' && (await readTextIfExists(manifestPath)) === formatted) {
      if (context.config.json) {
        printOutput(JSON.stringify({ port, path: manifestPath, changed: false }));
      } else {
        printOutput(`${manifestPath} is already formatted`);
      }
      return EXIT_CODES.SUCCESS;
    }

    await atomicWriteFile(manifestPath, formatted);
    if (scf.origin === 'control') {
      await unlink(join(portDir, CONTROL_FILE_NAME));
    }

    if (context.config.json) {
      printOutput(JSON.stringify({ port, path: manifestPath, changed: true }));
    } else {
      printSuccess(
        scf.origin === 'control' ? `converted ${port} to ${manifestPath}` : `formatted ${manifestPath}`
      );
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error);
  }
}

export function registerFormatManifestCommand(program: Command): void {
  program
    .command('format-manifest')
    .description('Rewrite a port manifest in canonical form')
    .argument('<port>', 'Port name')
    .option('--convert-control', 'Convert a CONTROL file to vcpkg.json')
    .action(async (port: string, options: FormatManifestOptions) => {
      const exitCode = await runFormatManifest(port, options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}
