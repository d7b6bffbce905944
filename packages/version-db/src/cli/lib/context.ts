/**
 * CLI Global Context and Exit Codes
 *
 * The entry point loads configuration once (commander `preAction` hook) and
 * commands read it from here.
 *
 * @module cli/lib/context
 */

import {
  BaselineNotFoundError,
  ConfigError,
  MalformedRegistryFileError,
  PortReconcileError,
  TreeSourceError,
  UsageError,
} from '../../core/errors.js';
import { formatFailure } from '../../reconcile/reconcile-port.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';
import { printError, printWarning } from './output.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE_ERROR: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export async function initializeContext(options: LoadConfigOptions): Promise<GlobalContext> {
  const startTime = Date.now();
  const config = await loadConfig(options);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * Exit code for an error thrown out of a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError) return EXIT_CODES.USAGE_ERROR;
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof BaselineNotFoundError || error instanceof MalformedRegistryFileError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Print an error thrown out of a command and return its exit code
 */
export function reportCommandError(error: unknown): ExitCode {
  if (error instanceof PortReconcileError) {
    // Unchanged files are reported as a warning, as in the all-ports run
    if (error.failure.kind === 'content-hash-conflict') {
      printWarning(formatFailure(error.failure));
    } else {
      printError(formatFailure(error.failure));
    }
  } else if (error instanceof MalformedRegistryFileError) {
    printError(error.getSummary());
  } else if (error instanceof TreeSourceError && error.detail) {
    printError(`${error.message}\n  ${error.detail}`);
  } else {
    printError(error instanceof Error ? error.message : String(error));
  }
  return exitCodeFor(error);
}
