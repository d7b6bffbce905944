/**
 * History Command
 *
 * Prints the versions recorded for a port, newest first.
 *
 * Usage:
 *   version-db history <port>
 *
 * @module cli/commands/history
 */

import type { Command } from 'commander';
import { VersionHistoryStore, serializeVersionHistory } from '../../registry/version-history-store.js';
import { formatVersion } from '../../versions/types.js';
import { resolvePaths } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, reportCommandError, type ExitCode, type GlobalContext } from '../lib/context.js';
import { formatJson, formatTable, printError, printOutput, type TableColumn } from '../lib/output.js';

const COLUMNS: readonly TableColumn[] = [
  { key: 'version', header: 'Version' },
  { key: 'scheme', header: 'Scheme' },
  { key: 'gitTree', header: 'Git Tree' },
];

export async function runHistory(port: string, context: GlobalContext): Promise<ExitCode> {
  const { versionsDir } = resolvePaths(context.config);
  const store = new VersionHistoryStore(versionsDir);

  try {
    const history = await store.load(port);
    if (history === undefined) {
      printError(`no version history for ${port} (${store.pathFor(port)})`);
      return EXIT_CODES.ERRORS;
    }

    if (context.config.json) {
      printOutput(formatJson(serializeVersionHistory(history)));
    } else {
      printOutput(
        formatTable(
          history.entries.map((entry) => ({
            version: formatVersion(entry.version.version),
            scheme: entry.version.scheme,
            gitTree: entry.gitTree,
          })),
          COLUMNS
        )
      );
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error);
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show the recorded versions of a port')
    .argument('<port>', 'Port name')
    .action(async (port: string) => {
      const exitCode = await runHistory(port, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}
