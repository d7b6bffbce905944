#!/usr/bin/env tsx
/**
 * version-db CLI Entry Point
 *
 * Maintains the version database of a port catalog: per-port version
 * history files and the baseline.
 *
 * @module version-db-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, initializeContext } from '../src/cli/lib/context.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.error(`Unable to read ${packageJsonPath}: ${error instanceof Error ? error.message : String(error)}`);
    return '0.0.0';
  }
}

interface GlobalOptions {
  readonly root?: string;
  readonly json?: boolean;
  readonly config?: string;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('version-db')
    .description('Port version database tooling')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--root <path>', 'Catalog root directory (default: current directory)')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .version-dbrc)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext({
          ...(options.config !== undefined ? { configPath: options.config } : {}),
          overrides: {
            ...(options.root !== undefined ? { root: options.root } : {}),
            ...(options.json !== undefined ? { json: options.json } : {}),
          },
        });
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
