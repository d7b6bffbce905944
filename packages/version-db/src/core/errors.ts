/**
 * version-db Error Types
 *
 * Errors thrown for conditions that stop a whole run (missing baseline,
 * unreadable registry files, bad invocation) or that abort a single-port run.
 * Per-port failures in all-ports mode are reported as values instead; see
 * `reconcile/types.ts`.
 */

import type { FieldDiagnostic } from '../manifest/types.js';
import type { PortFailure } from '../reconcile/types.js';

export type VersionDbErrorCode =
  | 'baseline-not-found'
  | 'config'
  | 'malformed-baseline'
  | 'malformed-history'
  | 'port-failed'
  | 'tree-source'
  | 'usage';

/**
 * Base class for every error version-db throws on purpose
 */
export class VersionDbError extends Error {
  constructor(
    message: string,
    public readonly code: VersionDbErrorCode
  ) {
    super(message);
    this.name = 'VersionDbError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The baseline file is required before anything can be reconciled.
 */
export class BaselineNotFoundError extends VersionDbError {
  constructor(public readonly path: string) {
    super(`couldn't find required file ${path}`, 'baseline-not-found');
    this.name = 'BaselineNotFoundError';
  }
}

/**
 * A registry JSON file exists but does not have the expected shape.
 */
export class MalformedRegistryFileError extends VersionDbError {
  constructor(
    public readonly path: string,
    public readonly diagnostics: readonly FieldDiagnostic[],
    code: 'malformed-baseline' | 'malformed-history'
  ) {
    super(
      `unable to parse ${code === 'malformed-baseline' ? 'baseline' : 'versions'} file ${path}`,
      code
    );
    this.name = 'MalformedRegistryFileError';
  }

  /**
   * Message followed by one indented line per diagnostic
   */
  getSummary(): string {
    return [
      this.message,
      ...this.diagnostics.map((d) => `  ${d.field}: ${d.message}`),
    ].join('\n');
  }
}

/**
 * A port failed in single-port mode, where any failure aborts the run.
 */
export class PortReconcileError extends VersionDbError {
  constructor(public readonly failure: PortFailure) {
    super(failure.message, 'port-failed');
    this.name = 'PortReconcileError';
  }
}

/**
 * The version-control backend could not produce the port tree map.
 */
export class TreeSourceError extends VersionDbError {
  constructor(message: string, public readonly detail?: string) {
    super(message, 'tree-source');
    this.name = 'TreeSourceError';
  }
}

/**
 * The command was invoked with an argument combination it cannot run.
 */
export class UsageError extends VersionDbError {
  constructor(message: string) {
    super(message, 'usage');
    this.name = 'UsageError';
  }
}

/**
 * The configuration file is missing, unreadable or invalid.
 */
export class ConfigError extends VersionDbError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}
