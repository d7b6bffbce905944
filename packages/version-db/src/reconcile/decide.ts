/**
 * History decision table
 *
 * Pure: looks at the loaded history and the port's current version and tree,
 * and says what should happen. Nothing is written here.
 *
 * @module reconcile/decide
 */

import type { VersionHistory } from '../registry/version-history-store.js';
import type { SchemedVersion } from '../versions/types.js';
import type { HistoryDecision } from './types.js';

/**
 * Rules, first match wins:
 *
 * 1. no history file: append to a new file
 * 2. same tree, same version text: no-op (the recorded entry may differ in
 *    port version)
 * 3. same tree, different version text: the files did not change but the
 *    version did (rejected, `overwriteVersion` does not apply)
 * 4. same version, different tree: replace in place with
 *    `overwriteVersion`, otherwise rejected
 * 5. otherwise: append at the front
 */
export function decideHistoryUpdate(
  history: VersionHistory | undefined,
  version: SchemedVersion,
  gitTree: string,
  overwriteVersion: boolean
): HistoryDecision {
  if (history === undefined) {
    return { kind: 'append', newFile: true };
  }

  const sameTree = history.findByGitTree(gitTree);
  if (sameTree) {
    // Text only: a port-version bump over unchanged files is not a conflict.
    if (sameTree.entry.version.version.text === version.version.text) {
      return { kind: 'no-op', index: sameTree.index, recorded: sameTree.entry };
    }
    return { kind: 'reject-same-content', matched: sameTree.entry };
  }

  const sameVersion = history.findByVersion(version.version);
  if (sameVersion) {
    if (!overwriteVersion) {
      return { kind: 'reject-version-reuse', existing: sameVersion.entry };
    }
    return {
      kind: 'in-place-update',
      index: sameVersion.index,
      previousGitTree: sameVersion.entry.gitTree,
    };
  }

  return { kind: 'append', newFile: false };
}
