/**
 * Reconciliation Types
 *
 * @module reconcile/types
 */

import type { Logger } from '../core/utils/logger.js';
import type { SchemedVersion } from '../versions/types.js';
import type { VersionHistoryEntry } from '../registry/version-history-store.js';

export type UpdateResult = 'updated' | 'not-updated';

/**
 * Why a port was not reconciled
 */
export type PortFailureKind =
  | 'port-not-found'
  | 'parse-error'
  | 'formatting-drift'
  | 'missing-git-tree'
  | 'malformed-history'
  | 'content-hash-conflict'
  | 'version-reuse-conflict'
  | 'version-scheme';

export interface PortFailure {
  readonly port: string;
  readonly kind: PortFailureKind;
  readonly message: string;
  /** Follow-up lines: hashes, diagnostics, suggested commands */
  readonly details: readonly string[];
}

/**
 * What to do with a port's history file
 */
export type HistoryDecision =
  | { readonly kind: 'append'; readonly newFile: boolean }
  | { readonly kind: 'no-op'; readonly index: number; readonly recorded: VersionHistoryEntry }
  | { readonly kind: 'in-place-update'; readonly index: number; readonly previousGitTree: string }
  | { readonly kind: 'reject-same-content'; readonly matched: VersionHistoryEntry }
  | { readonly kind: 'reject-version-reuse'; readonly existing: VersionHistoryEntry };

export type HistoryDecisionKind = HistoryDecision['kind'];

export interface PortOutcome {
  readonly port: string;
  readonly version: SchemedVersion;
  readonly gitTree: string;
  readonly decision: HistoryDecisionKind;
  readonly history: UpdateResult;
  readonly baseline: UpdateResult;
}

export type PortResult =
  | { readonly ok: true; readonly outcome: PortOutcome }
  | { readonly ok: false; readonly failure: PortFailure };

export interface ReconcileOptions {
  /** Replace the git tree of an already recorded version */
  readonly overwriteVersion: boolean;
  /** Skip the canonical `vcpkg.json` formatting check */
  readonly skipFormattingCheck: boolean;
  /** Skip the scheme suggestion for string versions */
  readonly skipVersionFormatCheck: boolean;
  /** Treat a scheme suggestion as a failure instead of a warning */
  readonly strictVersionScheme: boolean;
  /** Report successful updates and no-ops, not only problems */
  readonly verbose: boolean;
  /** Skip failing ports instead of stopping at the first one */
  readonly bestEffort: boolean;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  overwriteVersion: false,
  skipFormattingCheck: false,
  skipVersionFormatCheck: false,
  strictVersionScheme: false,
  verbose: false,
  bestEffort: false,
};

export interface AddVersionRequest {
  readonly portsDir: string;
  readonly versionsDir: string;
  /** Port to reconcile; ignored ports list when absent and `all` is set */
  readonly port?: string;
  readonly all: boolean;
  readonly overwriteVersion?: boolean;
  readonly skipFormattingCheck?: boolean;
  readonly skipVersionFormatCheck?: boolean;
  readonly strictVersionScheme?: boolean;
  /** Forces success output in all-ports mode */
  readonly verbose?: boolean;
  readonly logger?: Logger;
}

export interface AddVersionReport {
  readonly outcomes: readonly PortOutcome[];
  readonly failures: readonly PortFailure[];
}
