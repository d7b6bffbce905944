/**
 * Baseline Commands
 *
 * Usage:
 *   version-db baseline get <port>
 *
 * @module cli/commands/baseline
 */

import type { Command } from 'commander';
import { BaselineRegistry } from '../../registry/baseline-registry.js';
import { formatVersion } from '../../versions/types.js';
import { resolvePaths } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, reportCommandError, type ExitCode, type GlobalContext } from '../lib/context.js';
import { printError, printOutput } from '../lib/output.js';

export async function runBaselineGet(port: string, context: GlobalContext): Promise<ExitCode> {
  const { versionsDir } = resolvePaths(context.config);

  try {
    const baseline = await BaselineRegistry.load(versionsDir);
    const version = baseline.get(port);
    if (version === undefined) {
      printError(`${port} has no baseline in ${baseline.path}`);
      return EXIT_CODES.ERRORS;
    }

    if (context.config.json) {
      printOutput(
        JSON.stringify({ port, baseline: version.text, 'port-version': version.portVersion })
      );
    } else {
      printOutput(`${port} ${formatVersion(version)}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error);
  }
}

export function registerBaselineCommands(program: Command): void {
  const baseline = program.command('baseline').description('Baseline registry operations');

  baseline
    .command('get')
    .description('Show the baseline version of a port')
    .argument('<port>', 'Port name')
    .action(async (port: string) => {
      const exitCode = await runBaselineGet(port, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}
