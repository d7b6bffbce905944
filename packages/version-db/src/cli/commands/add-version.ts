/**
 * Add-version Command
 *
 * Records the current version of a port (or of every port) in its version
 * history file and in the baseline.
 *
 * Usage:
 *   version-db add-version <port> [options]
 *   version-db add-version --all [options]
 *
 * Options:
 *   --all                        Process versions for all ports
 *   --overwrite-version          Overwrite the git tree of an existing version
 *   --skip-formatting-check      Skip the formatting check of vcpkg.json files
 *   --skip-version-format-check  Skip the version scheme check
 *   --strict-version-scheme      Fail instead of warning on a scheme suggestion
 *   --verbose                    Print success messages instead of just errors
 *
 * @module cli/commands/add-version
 */

import type { Command } from 'commander';
import { addVersions } from '../../reconcile/add-versions.js';
import { GitPortTreeSource, type PortTreeSource } from '../../reconcile/tree-source.js';
import { resolvePaths } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, reportCommandError, type ExitCode, type GlobalContext } from '../lib/context.js';
import { formatDuration } from '../lib/logger.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface AddVersionOptions {
  readonly all?: boolean;
  readonly overwriteVersion?: boolean;
  readonly skipFormattingCheck?: boolean;
  readonly skipVersionFormatCheck?: boolean;
  readonly strictVersionScheme?: boolean;
  readonly verbose?: boolean;
}

/**
 * Run add-version and return the process exit code
 *
 * @param treeSource - Defaults to git in the catalog root
 */
export async function runAddVersion(
  port: string | undefined,
  options: AddVersionOptions,
  context: GlobalContext,
  treeSource?: PortTreeSource
): Promise<ExitCode> {
  const { config, logger } = context;
  const paths = resolvePaths(config);
  logger.setCommand('add-version');

  try {
    const report = await addVersions(
      {
        portsDir: paths.portsDir,
        versionsDir: paths.versionsDir,
        ...(port !== undefined ? { port } : {}),
        all: options.all ?? false,
        overwriteVersion: options.overwriteVersion ?? false,
        skipFormattingCheck: options.skipFormattingCheck ?? false,
        skipVersionFormatCheck: options.skipVersionFormatCheck ?? false,
        strictVersionScheme: options.strictVersionScheme ?? false,
        verbose: options.verbose ?? config.verbose,
        logger,
      },
      treeSource ?? new GitPortTreeSource({ root: paths.root, portsDir: paths.portsDir, logger })
    );

    // One line, like the logger's JSON lines on the same stream
    if (config.json) {
      printOutput(formatJson(report, false));
    }

    if (report.failures.length > 0) {
      logger.error(
        `${report.failures.length} of ${report.failures.length + report.outcomes.length} ports failed`,
        { ports: report.failures.map((f) => f.port) }
      );
      logger.commandEnd(false);
      return EXIT_CODES.ERRORS;
    }

    logger.debug(`processed ${report.outcomes.length} ports in ${formatDuration(Date.now() - context.startTime)}`);
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.commandEnd(false);
    return reportCommandError(error);
  }
}

export function registerAddVersionCommand(program: Command): void {
  program
    .command('add-version')
    .description('Add the current version of a port to its version history and the baseline')
    .argument('[port]', 'Port name')
    .option('--all', 'Process versions for all ports')
    .option('--overwrite-version', 'Overwrite the git tree of an existing version')
    .option('--skip-formatting-check', 'Skip the formatting check of vcpkg.json files')
    .option('--skip-version-format-check', 'Skip the version scheme check')
    .option('--strict-version-scheme', 'Fail instead of warning when a stricter scheme fits')
    .option('--verbose', 'Print success messages instead of just errors')
    .action(async (port: string | undefined, options: AddVersionOptions) => {
      const exitCode = await runAddVersion(port, options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}
