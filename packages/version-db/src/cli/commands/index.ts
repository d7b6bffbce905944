/**
 * Commands Index
 *
 * Registers every version-db subcommand on the program.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerAddVersionCommand } from './add-version.js';
import { registerBaselineCommands } from './baseline.js';
import { registerFormatManifestCommand } from './format-manifest.js';
import { registerHistoryCommand } from './history.js';

export function registerCommands(program: Command): void {
  registerAddVersionCommand(program);
  registerFormatManifestCommand(program);
  registerHistoryCommand(program);
  registerBaselineCommands(program);
}

export { runAddVersion, type AddVersionOptions } from './add-version.js';
export { runFormatManifest, type FormatManifestOptions } from './format-manifest.js';
export { runHistory } from './history.js';
export { runBaselineGet } from './baseline.js';
