/**
 * Version Types
 *
 * A port declares its version under exactly one of four manifest fields, and
 * that field fixes the ordering discipline (the scheme) for the version text.
 * The history and baseline files store the same text; only the history keeps
 * the scheme, through the field name it writes.
 */

/**
 * Ordering discipline declared by a manifest
 */
export type VersionScheme = 'relaxed' | 'semver' | 'date' | 'string';

/**
 * Manifest / history field that carries a version under each scheme
 */
export type VersionField = 'version' | 'version-semver' | 'version-date' | 'version-string';

/**
 * Version text plus the port's own revision counter
 */
export interface Version {
  readonly text: string;
  /** `port-version`: bumped when port files change but upstream did not */
  readonly portVersion: number;
}

export interface SchemedVersion {
  readonly scheme: VersionScheme;
  readonly version: Version;
}

export const VERSION_SCHEMES: readonly VersionScheme[] = ['relaxed', 'semver', 'date', 'string'];

export const SCHEME_FIELDS: Readonly<Record<VersionScheme, VersionField>> = {
  relaxed: 'version',
  semver: 'version-semver',
  date: 'version-date',
  string: 'version-string',
};

/**
 * Version fields in the order they are looked up
 */
export const VERSION_FIELDS: readonly VersionField[] = VERSION_SCHEMES.map(
  (scheme) => SCHEME_FIELDS[scheme]
);

export function schemeForField(field: VersionField): VersionScheme {
  switch (field) {
    case 'version':
      return 'relaxed';
    case 'version-semver':
      return 'semver';
    case 'version-date':
      return 'date';
    case 'version-string':
      return 'string';
  }
}

/**
 * Exact equality: same text and same port version
 */
export function versionsEqual(a: Version, b: Version): boolean {
  return a.text === b.text && a.portVersion === b.portVersion;
}

/**
 * `1.2.3` or `1.2.3#2` when the port version is non-zero
 */
export function formatVersion(version: Version): string {
  return version.portVersion === 0 ? version.text : `${version.text}#${version.portVersion}`;
}
