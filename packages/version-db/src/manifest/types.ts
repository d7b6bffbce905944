/**
 * Manifest Types
 *
 * The canonical in-memory description of one port, produced from either a
 * JSON manifest (`vcpkg.json`) or a legacy paragraph file (`CONTROL`).
 *
 * @module manifest/types
 */

import type { SchemedVersion } from '../versions/types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Which file format a port was parsed from
 */
export type PortOrigin = 'manifest' | 'control';

export interface Dependency {
  readonly name: string;
  readonly features: readonly string[];
  /** `false` when the dependent opts out of the dependency's default features */
  readonly defaultFeatures: boolean;
  readonly host: boolean;
  /** Platform expression, e.g. `windows & !uwp` */
  readonly platform?: string;
}

export interface FeatureParagraph {
  readonly name: string;
  readonly description: readonly string[];
  readonly dependencies: readonly Dependency[];
  readonly supports?: string;
}

export interface SourceControlFile {
  readonly name: string;
  readonly version: SchemedVersion;
  readonly origin: PortOrigin;
  /** `$`-prefixed manifest keys, kept verbatim */
  readonly comments: Readonly<Record<string, JsonValue>>;
  readonly maintainers: readonly string[];
  readonly description: readonly string[];
  readonly homepage?: string;
  readonly documentation?: string;
  readonly license?: string;
  readonly supports?: string;
  readonly dependencies: readonly Dependency[];
  readonly defaultFeatures: readonly string[];
  readonly features: readonly FeatureParagraph[];
}

/**
 * One problem found while parsing, tied to a field
 */
export interface FieldDiagnostic {
  readonly field: string;
  readonly message: string;
  /** 1-based, for paragraph files */
  readonly line?: number;
  readonly column?: number;
}

export interface ParseError {
  /** File path, or a tag naming the in-memory buffer */
  readonly origin: string;
  readonly diagnostics: readonly FieldDiagnostic[];
}

export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ParseFailure {
  readonly ok: false;
  readonly error: ParseError;
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export interface LoadedPort {
  readonly portDir: string;
  readonly file: SourceControlFile;
}

export interface LoadResults {
  readonly ports: readonly LoadedPort[];
  readonly errors: readonly ParseError[];
}

export function parseOk<T>(value: T): ParseSuccess<T> {
  return { ok: true, value };
}

export function parseFailed(origin: string, diagnostics: readonly FieldDiagnostic[]): ParseFailure {
  return { ok: false, error: { origin, diagnostics } };
}

/**
 * Port names: lowercase alphanumerics separated by single hyphens
 */
export const PORT_NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function formatParseError(error: ParseError): string {
  const lines = [`error: while loading ${error.origin}:`];
  for (const diagnostic of error.diagnostics) {
    const position =
      diagnostic.line !== undefined
        ? `${diagnostic.line}:${diagnostic.column ?? 1}: `
        : '';
    lines.push(`  ${position}${diagnostic.field}: ${diagnostic.message}`);
  }
  return lines.join('\n');
}
