/**
 * Dotted versions: the `version` (relaxed) and `version-semver` schemes.
 *
 * Relaxed accepts any number of numeric segments; semver requires exactly
 * three. Both accept a `-prerelease` and a `+build` suffix. Numeric parts are
 * kept as digit strings so that arbitrarily long segments compare exactly.
 *
 * @module versions/dot-version
 */

export interface DotVersion {
  readonly original: string;
  /** Numeric segments, without leading zeros */
  readonly segments: readonly string[];
  readonly prerelease: readonly string[];
  readonly build: readonly string[];
}

const NUMERIC = '(?:0|[1-9]\\d*)';
const IDENTIFIER = '[0-9A-Za-z-]+';
const IDENTIFIERS = `${IDENTIFIER}(?:\\.${IDENTIFIER})*`;

const RELAXED_PATTERN = new RegExp(
  `^(${NUMERIC}(?:\\.${NUMERIC})*)(?:-(${IDENTIFIERS}))?(?:\\+(${IDENTIFIERS}))?$`
);

const SEMVER_PATTERN = new RegExp(
  `^(${NUMERIC}\\.${NUMERIC}\\.${NUMERIC})(?:-(${IDENTIFIERS}))?(?:\\+(${IDENTIFIERS}))?$`
);

const NUMERIC_IDENTIFIER = /^\d+$/;

function parseWith(pattern: RegExp, text: string, strictPrerelease: boolean): DotVersion | undefined {
  const match = pattern.exec(text);
  if (!match) return undefined;

  const prerelease = match[2] === undefined ? [] : match[2].split('.');
  if (
    strictPrerelease &&
    prerelease.some((id) => NUMERIC_IDENTIFIER.test(id) && id.length > 1 && id.startsWith('0'))
  ) {
    return undefined;
  }

  return {
    original: text,
    segments: match[1].split('.'),
    prerelease,
    build: match[3] === undefined ? [] : match[3].split('.'),
  };
}

/**
 * Parse a relaxed dotted version (`1`, `1.2`, `1.2.3.4-rc1`)
 */
export function tryParseRelaxed(text: string): DotVersion | undefined {
  return parseWith(RELAXED_PATTERN, text, false);
}

/**
 * Parse a SemVer 2.0 version (`1.2.3`, `1.2.3-alpha.1+build.5`)
 */
export function tryParseSemver(text: string): DotVersion | undefined {
  return parseWith(SEMVER_PATTERN, text, true);
}

/**
 * Compare two non-negative integers written without leading zeros
 */
export function compareDigits(a: string, b: string): number {
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareIdentifier(a: string, b: string): number {
  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);

  if (aNumeric && bNumeric) {
    return compareDigits(a.replace(/^0+(?=\d)/, ''), b.replace(/^0+(?=\d)/, ''));
  }
  // Numeric identifiers have lower precedence than alphanumeric ones
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePrerelease(a: readonly string[], b: readonly string[]): number {
  // A release outranks any of its prereleases
  if (a.length === 0 || b.length === 0) {
    if (a.length === b.length) return 0;
    return a.length === 0 ? 1 : -1;
  }

  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const result = compareIdentifier(a[i], b[i]);
    if (result !== 0) return result;
  }
  return Math.sign(a.length - b.length);
}

/**
 * Order two dotted versions. Build metadata never participates.
 *
 * Segments compare numerically; when one segment list is a prefix of the
 * other, the shorter version is less (`1.2` < `1.2.0`).
 */
export function compareDotVersions(a: DotVersion, b: DotVersion): number {
  const shared = Math.min(a.segments.length, b.segments.length);
  for (let i = 0; i < shared; i++) {
    const result = compareDigits(a.segments[i], b.segments[i]);
    if (result !== 0) return result;
  }
  if (a.segments.length !== b.segments.length) {
    return a.segments.length < b.segments.length ? -1 : 1;
  }
  return comparePrerelease(a.prerelease, b.prerelease);
}
