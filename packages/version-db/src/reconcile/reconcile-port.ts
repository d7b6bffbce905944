/**
 * Per-port Reconciliation
 *
 * Brings one port's history file and baseline entry in line with the port's
 * manifest and its committed git tree. Pre-checks run first, in order:
 *
 * 1. the port directory exists
 * 2. the manifest or CONTROL file loads
 * 3. `vcpkg.json` is canonically formatted (unless skipped)
 * 4. uncommitted changes (warning only)
 * 5. the port has a committed git tree
 *
 * Then the history decision is applied and the baseline synced. Problems are
 * returned as {@link PortFailure} values; the caller decides whether one stops
 * the run.
 *
 * @module reconcile/reconcile-port
 */

import { join } from 'node:path';
import { MalformedRegistryFileError } from '../core/errors.js';
import { isDirectory, readTextIfExists } from '../core/utils/fs.js';
import type { Logger } from '../core/utils/logger.js';
import { formatManifest } from '../manifest/manifest-serializer.js';
import { MANIFEST_FILE_NAME, loadPort } from '../manifest/port-loader.js';
import { formatParseError, type SourceControlFile } from '../manifest/types.js';
import type { BaselineRegistry } from '../registry/baseline-registry.js';
import {
  VersionHistory,
  type VersionHistoryEntry,
  type VersionHistoryStore,
} from '../registry/version-history-store.js';
import { describeSuggestion, suggestVersionScheme } from '../versions/scheme-check.js';
import { formatVersion, versionsEqual } from '../versions/types.js';
import { decideHistoryUpdate } from './decide.js';
import type { PortTreeSource } from './tree-source.js';
import type {
  HistoryDecision,
  PortFailure,
  PortFailureKind,
  PortResult,
  ReconcileOptions,
  UpdateResult,
} from './types.js';

const COMMIT_REMINDER = 'Did you remember to commit your changes?';
const NO_FILES_UPDATED = 'No files were updated';

export interface ReconcileContext {
  readonly portsDir: string;
  readonly histories: VersionHistoryStore;
  /** Held in memory across ports and written through on change */
  readonly baseline: BaselineRegistry;
  /** Port name to committed git tree */
  readonly trees: ReadonlyMap<string, string>;
  readonly treeSource: PortTreeSource;
  readonly options: ReconcileOptions;
  readonly logger: Logger;
}

function fail(
  port: string,
  kind: PortFailureKind,
  message: string,
  details: readonly string[] = []
): PortResult {
  return { ok: false, failure: { port, kind, message, details } };
}

/**
 * Failure message followed by its detail lines
 */
export function formatFailure(failure: PortFailure): string {
  return [failure.message, ...failure.details.map((line) => `  ${line}`)].join('\n');
}

async function checkFormatting(
  port: string,
  portDir: string,
  scf: SourceControlFile
): Promise<PortResult | undefined> {
  if (scf.origin !== 'manifest') return undefined;

  const current = await readTextIfExists(join(portDir, MANIFEST_FILE_NAME));
  if (current === undefined || current === formatManifest(scf)) return undefined;

  return fail(port, 'formatting-drift', `${port} is not properly formatted`, [
    `Run \`version-db format-manifest ${port}\` to format the file`,
    "Don't forget to commit the result!",
  ]);
}

function rejection(port: string, gitTree: string, decision: HistoryDecision): PortResult | undefined {
  switch (decision.kind) {
    case 'reject-same-content':
      return fail(
        port,
        'content-hash-conflict',
        `checked-in files for ${port} are unchanged from version ${formatVersion(decision.matched.version.version)}`,
        [`SHA: ${gitTree}`, COMMIT_REMINDER, NO_FILES_UPDATED]
      );
    case 'reject-version-reuse':
      return fail(
        port,
        'version-reuse-conflict',
        `checked-in files for ${port} have changed but the version was not updated`,
        [
          `version: ${formatVersion(decision.existing.version.version)}`,
          `old SHA: ${decision.existing.gitTree}`,
          `new SHA: ${gitTree}`,
          'Did you remember to update the version or port version?',
          'Use --overwrite-version to bypass this check',
          NO_FILES_UPDATED,
        ]
      );
    case 'append':
    case 'no-op':
    case 'in-place-update':
      return undefined;
  }
}

function applyDecision(
  port: string,
  history: VersionHistory | undefined,
  entry: VersionHistoryEntry,
  decision: Extract<HistoryDecision, { kind: 'append' | 'in-place-update' }>
): VersionHistory {
  if (history === undefined) {
    return new VersionHistory(port, [entry]);
  }
  if (decision.kind === 'append') {
    history.record(entry, { kind: 'front' });
  } else {
    history.record(entry, { kind: 'replace', index: decision.index });
  }
  return history;
}

async function syncBaseline(
  port: string,
  scf: SourceControlFile,
  ctx: ReconcileContext
): Promise<UpdateResult> {
  const { baseline, logger, options } = ctx;
  const version = scf.version.version;

  if (baseline.matches(port, version)) {
    if (options.verbose) {
      logger.info(`version ${formatVersion(version)} is already in ${baseline.path}`);
    }
    return 'not-updated';
  }

  baseline.set(port, version);
  await baseline.persist();
  if (options.verbose) {
    logger.info(`added version ${formatVersion(version)} to ${baseline.path}`);
  }
  return 'updated';
}

/**
 * Reconcile one port
 *
 * Writes at most one history file and one baseline file. Errors other than
 * the port failures listed in {@link PortFailureKind} (I/O errors, a failed
 * write) propagate.
 */
export async function reconcilePort(port: string, ctx: ReconcileContext): Promise<PortResult> {
  const { options, logger } = ctx;
  const portDir = join(ctx.portsDir, port);

  if (!(await isDirectory(portDir))) {
    return fail(port, 'port-not-found', `${port} does not exist`);
  }

  const loaded = await loadPort(portDir);
  if (!loaded.ok) {
    return fail(port, 'parse-error', `can't load port ${port}`, formatParseError(loaded.error).split('\n'));
  }
  const scf = loaded.value;

  if (!options.skipFormattingCheck) {
    const drift = await checkFormatting(port, portDir, scf);
    if (drift) return drift;
  }

  if ((await ctx.treeSource.hasLocalChanges(port)) === true) {
    logger.warn(`there are uncommitted changes for ${port}`);
  }

  const gitTree = ctx.trees.get(port);
  if (gitTree === undefined) {
    return fail(port, 'missing-git-tree', `can't obtain SHA for port ${port}`, [
      COMMIT_REMINDER,
      NO_FILES_UPDATED,
    ]);
  }

  let history: VersionHistory | undefined;
  try {
    history = await ctx.histories.load(port);
  } catch (error) {
    if (!(error instanceof MalformedRegistryFileError)) throw error;
    return fail(
      port,
      'malformed-history',
      error.message,
      error.diagnostics.map((d) => `${d.field}: ${d.message}`)
    );
  }

  const version = scf.version;
  const decision = decideHistoryUpdate(history, version, gitTree, options.overwriteVersion);
  const rejected = rejection(port, gitTree, decision);
  if (rejected) return rejected;

  let historyResult: UpdateResult = 'not-updated';
  let baselineResult: UpdateResult = 'not-updated';
  let syncable = true;
  const historyPath = ctx.histories.pathFor(port);

  if (decision.kind === 'no-op') {
    const recorded = decision.recorded.version.version;
    if (!versionsEqual(recorded, version.version)) {
      // The baseline may only name a version the history holds.
      logger.warn(
        `${port} ${formatVersion(version.version)} has the same files as recorded version ${formatVersion(recorded)}; the baseline was not updated`,
        { port, gitTree, recordedPortVersion: recorded.portVersion }
      );
      syncable = false;
    } else if (options.verbose) {
      logger.info(`version ${formatVersion(version.version)} is already in ${historyPath}`);
    }
  } else if (decision.kind === 'append' || decision.kind === 'in-place-update') {
    if (!options.skipVersionFormatCheck) {
      const suggestion = suggestVersionScheme(version);
      if (suggestion) {
        const message = describeSuggestion(suggestion, port);
        if (options.strictVersionScheme) {
          return fail(port, 'version-scheme', message, [
            'Use --skip-version-format-check to disable this check',
          ]);
        }
        logger.warn(`${message} Use --skip-version-format-check to disable this check.`);
      }
    }

    const updated = applyDecision(port, history, { gitTree, version }, decision);
    await ctx.histories.persist(updated);
    historyResult = 'updated';

    if (options.verbose) {
      const newFile = decision.kind === 'append' && decision.newFile ? ' (new file)' : '';
      logger.info(`added version ${formatVersion(version.version)} to ${historyPath}${newFile}`);
    }
  }

  if (syncable) {
    baselineResult = await syncBaseline(port, scf, ctx);
  }

  if (options.verbose && historyResult === 'not-updated' && baselineResult === 'not-updated') {
    logger.info(`No files were updated for ${port}`);
  }

  return {
    ok: true,
    outcome: {
      port,
      version,
      gitTree,
      decision: decision.kind,
      history: historyResult,
      baseline: baselineResult,
    },
  };
}
