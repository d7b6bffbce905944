/**
 * Version scheme suggestion.
 *
 * A port that declares `version-string` loses ordering. When its text would
 * also be a valid date or relaxed version, the port should declare that
 * scheme instead. The check is advisory unless strict checking is on.
 *
 * @module versions/scheme-check
 */

import { tryParseRelaxed } from './dot-version.js';
import { tryParseDate } from './date-version.js';
import { SCHEME_FIELDS, type SchemedVersion, type VersionField } from './types.js';

export interface SchemeSuggestion {
  readonly current: VersionField;
  readonly suggested: VersionField;
  readonly text: string;
}

/**
 * Suggest a stricter scheme for a String-scheme version.
 *
 * Date is tested before relaxed: `2023-05-01` is also a relaxed version with
 * prerelease `05-01`, but the date reading is the intended one.
 */
export function suggestVersionScheme(version: SchemedVersion): SchemeSuggestion | undefined {
  if (version.scheme !== 'string') return undefined;

  const text = version.version.text;
  if (tryParseDate(text)) {
    return { current: SCHEME_FIELDS.string, suggested: SCHEME_FIELDS.date, text };
  }
  if (tryParseRelaxed(text)) {
    return { current: SCHEME_FIELDS.string, suggested: SCHEME_FIELDS.relaxed, text };
  }
  return undefined;
}

export function describeSuggestion(suggestion: SchemeSuggestion, portName: string): string {
  return `Use the version scheme "${suggestion.suggested}" instead of "${suggestion.current}" in port "${portName}".`;
}
