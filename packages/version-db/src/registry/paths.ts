/**
 * Registry file locations under the versions directory.
 */

import { join } from 'path';

export const BASELINE_FILE_NAME = 'baseline.json';

/**
 * `<versions>/<first letter>-/<port>.json`
 */
export function versionHistoryPath(versionsDir: string, port: string): string {
  return join(versionsDir, `${port.charAt(0)}-`, `${port}.json`);
}

export function baselinePath(versionsDir: string): string {
  return join(versionsDir, BASELINE_FILE_NAME);
}
