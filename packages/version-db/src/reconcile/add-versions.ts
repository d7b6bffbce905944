/**
 * Add-version Batch
 *
 * Runs {@link reconcilePort} over one named port or over every port
 * directory. Ports are processed one at a time; the baseline is loaded once
 * and kept in memory across the loop.
 *
 * - Single port: the first failure throws {@link PortReconcileError}.
 * - All ports (best effort): failures are logged and collected, and every
 *   port is attempted. Ports already written are not rolled back.
 *
 * @module reconcile/add-versions
 */

import { PortReconcileError, UsageError } from '../core/errors.js';
import { listDirectories } from '../core/utils/fs.js';
import { createLogger } from '../core/utils/logger.js';
import { BaselineRegistry } from '../registry/baseline-registry.js';
import { VersionHistoryStore } from '../registry/version-history-store.js';
import { formatFailure, reconcilePort, type ReconcileContext } from './reconcile-port.js';
import type { PortTreeSource } from './tree-source.js';
import type {
  AddVersionReport,
  AddVersionRequest,
  PortFailure,
  PortOutcome,
  ReconcileOptions,
} from './types.js';

export function reconcileOptionsFor(request: AddVersionRequest): ReconcileOptions {
  const single = request.port !== undefined;
  return {
    overwriteVersion: request.overwriteVersion ?? false,
    skipFormattingCheck: request.skipFormattingCheck ?? false,
    skipVersionFormatCheck: request.skipVersionFormatCheck ?? false,
    strictVersionScheme: request.strictVersionScheme ?? false,
    verbose: single || (request.verbose ?? false),
    bestEffort: !single,
  };
}

/**
 * Record the current version of one port, or of all ports
 *
 * @throws UsageError when neither a port nor `all` is given
 * @throws BaselineNotFoundError when `versions/baseline.json` is missing
 * @throws PortReconcileError for a failure in single-port mode
 */
export async function addVersions(
  request: AddVersionRequest,
  treeSource: PortTreeSource
): Promise<AddVersionReport> {
  const logger = request.logger ?? createLogger({ module: 'add-version' });

  if (request.port === undefined && !request.all) {
    throw new UsageError(
      'add-version with no arguments requires passing --all to update all port versions at once'
    );
  }
  if (request.port !== undefined && request.all) {
    logger.warn('ignoring --all since a port name argument was provided');
  }

  const baseline = await BaselineRegistry.load(request.versionsDir);
  const ports =
    request.port !== undefined ? [request.port] : await listDirectories(request.portsDir);
  const options = reconcileOptionsFor(request);

  const ctx: ReconcileContext = {
    portsDir: request.portsDir,
    histories: new VersionHistoryStore(request.versionsDir),
    baseline,
    trees: await treeSource.getPortTreeMap(),
    treeSource,
    options,
    logger,
  };

  const outcomes: PortOutcome[] = [];
  const failures: PortFailure[] = [];

  for (const port of ports) {
    const result = await reconcilePort(port, ctx);
    if (result.ok) {
      outcomes.push(result.outcome);
      continue;
    }

    if (!options.bestEffort) {
      throw new PortReconcileError(result.failure);
    }
    if (result.failure.kind === 'content-hash-conflict') {
      logger.warn(formatFailure(result.failure), { port, kind: result.failure.kind });
    } else {
      logger.error(formatFailure(result.failure), { port, kind: result.failure.kind });
    }
    failures.push(result.failure);
  }

  logger.debug('add-version finished', {
    ports: ports.length,
    updated: outcomes.filter((o) => o.history === 'updated' || o.baseline === 'updated').length,
    failed: failures.length,
  });

  return { outcomes, failures };
}
