/**
 * version-db - Port Version Database
 *
 * version-db provides:
 * - Version schemes (relaxed, semver, date, string) with comparison and scheme suggestions
 * - Port manifest (vcpkg.json) and CONTROL parsing plus canonical formatting
 * - Per-port version history files and the baseline registry
 * - The add-version reconciliation that keeps both in step with the ports tree
 *
 * @packageDocumentation
 */

export * from './versions/index.js';
export * from './manifest/index.js';
export * from './registry/index.js';
export * from './reconcile/index.js';

export {
  VersionDbError,
  BaselineNotFoundError,
  MalformedRegistryFileError,
  PortReconcileError,
  TreeSourceError,
  UsageError,
  ConfigError,
  type VersionDbErrorCode,
} from './core/errors.js';

export type { Logger, LogLevel, LogMetadata } from './core/utils/logger.js';
export { createLogger } from './core/utils/logger.js';
