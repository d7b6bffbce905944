/**
 * Scheme-aware parsing and ordering.
 *
 * The four schemes form a closed union; every switch over it is exhaustive,
 * so adding a scheme is a compile error until each site handles it.
 *
 * @module versions/compare
 */

import { compareDotVersions, tryParseRelaxed, tryParseSemver, type DotVersion } from './dot-version.js';
import { compareDateVersions, tryParseDate, type DateVersion } from './date-version.js';
import type { SchemedVersion, VersionScheme } from './types.js';

export type ParsedVersion =
  | { readonly scheme: 'relaxed'; readonly value: DotVersion }
  | { readonly scheme: 'semver'; readonly value: DotVersion }
  | { readonly scheme: 'date'; readonly value: DateVersion }
  | { readonly scheme: 'string'; readonly value: string };

export type VersionComparison = 'lt' | 'eq' | 'gt' | 'unknown';

/**
 * Parse version text under a scheme; `undefined` when the text is not valid
 * for it
 */
export function parseVersion(scheme: VersionScheme, text: string): ParsedVersion | undefined {
  switch (scheme) {
    case 'relaxed': {
      const value = tryParseRelaxed(text);
      return value && { scheme: 'relaxed', value };
    }
    case 'semver': {
      const value = tryParseSemver(text);
      return value && { scheme: 'semver', value };
    }
    case 'date': {
      const value = tryParseDate(text);
      return value && { scheme: 'date', value };
    }
    case 'string':
      return text.length > 0 && !text.includes('#') ? { scheme: 'string', value: text } : undefined;
  }
}

/**
 * Human-readable reason `text` is invalid under `scheme`, or `undefined`
 */
export function validateVersionText(scheme: VersionScheme, text: string): string | undefined {
  if (parseVersion(scheme, text)) return undefined;

  switch (scheme) {
    case 'relaxed':
      return `"${text}" is not a relaxed version (dot-separated numbers without leading zeros, e.g. 1.2.3)`;
    case 'semver':
      return `"${text}" is not a semantic version (MAJOR.MINOR.PATCH[-prerelease][+build])`;
    case 'date':
      return `"${text}" is not a date version (YYYY-MM-DD of a real day, optionally followed by .N)`;
    case 'string':
      return text.length === 0
        ? 'version text must not be empty'
        : `"${text}" must not contain '#'`;
  }
}

function toComparison(order: number): VersionComparison {
  if (order < 0) return 'lt';
  if (order > 0) return 'gt';
  return 'eq';
}

function compareParsed(a: ParsedVersion, b: ParsedVersion): VersionComparison {
  switch (a.scheme) {
    case 'relaxed':
    case 'semver':
      return (b.scheme === 'relaxed' || b.scheme === 'semver') && b.scheme === a.scheme
        ? toComparison(compareDotVersions(a.value, b.value))
        : 'unknown';
    case 'date':
      return b.scheme === 'date' ? toComparison(compareDateVersions(a.value, b.value)) : 'unknown';
    case 'string':
      return b.scheme === 'string' && a.value === b.value ? 'eq' : 'unknown';
  }
}

/**
 * Order two versions under their schemes, breaking ties by port version.
 *
 * Versions of different schemes, unparseable text and distinct string
 * versions are `unknown`.
 */
export function compareVersions(a: SchemedVersion, b: SchemedVersion): VersionComparison {
  if (a.scheme !== b.scheme) return 'unknown';

  const left = parseVersion(a.scheme, a.version.text);
  const right = parseVersion(b.scheme, b.version.text);
  if (!left || !right) return 'unknown';

  const result = compareParsed(left, right);
  if (result !== 'eq') return result;
  return toComparison(a.version.portVersion - b.version.portVersion);
}
