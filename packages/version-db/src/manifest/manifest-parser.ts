/**
 * JSON Manifest Parser
 *
 * Parses `vcpkg.json` text into a {@link SourceControlFile}. The manifest names
 * its version scheme through which version field it uses; exactly one must be
 * present and its text must be valid for that scheme.
 *
 * @module manifest/manifest-parser
 */

import { validateVersionText } from '../versions/compare.js';
import { SCHEME_FIELDS, VERSION_FIELDS, schemeForField, type VersionField } from '../versions/types.js';
import {
  JsonValueSchema,
  ManifestSchema,
  zodDiagnostics,
  type DependencyJson,
  type FeatureJson,
  type ManifestJson,
} from './manifest-schema.js';
import {
  parseFailed,
  parseOk,
  type Dependency,
  type FeatureParagraph,
  type FieldDiagnostic,
  type JsonValue,
  type ParseResult,
  type SourceControlFile,
} from './types.js';

function toList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

export function dependencyFromJson(json: DependencyJson): Dependency {
  if (typeof json === 'string') {
    return { name: json, features: [], defaultFeatures: true, host: false };
  }
  return {
    name: json.name,
    features: json.features ?? [],
    defaultFeatures: json['default-features'] ?? true,
    host: json.host ?? false,
    ...(json.platform !== undefined ? { platform: json.platform } : {}),
  };
}

function featureFromJson(name: string, json: FeatureJson): FeatureParagraph {
  return {
    name,
    description: toList(json.description),
    dependencies: (json.dependencies ?? []).map(dependencyFromJson),
    ...(json.supports !== undefined ? { supports: json.supports } : {}),
  };
}

/**
 * Split `$`-prefixed comment keys from the rest of a manifest object
 */
function splitComments(
  object: object
): { comments: Record<string, JsonValue>; body: Record<string, unknown> } {
  const comments: Record<string, JsonValue> = {};
  const body: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(object)) {
    if (key.startsWith('$')) {
      const parsed = JsonValueSchema.safeParse(value);
      if (parsed.success) comments[key] = parsed.data;
    } else {
      body[key] = value;
    }
  }
  return { comments, body };
}

function findVersionField(
  manifest: ManifestJson,
  diagnostics: FieldDiagnostic[]
): { field: VersionField; text: string } | undefined {
  const present = VERSION_FIELDS.filter((field) => manifest[field] !== undefined);

  if (present.length === 0) {
    diagnostics.push({
      field: SCHEME_FIELDS.relaxed,
      message: `missing a version field (one of ${VERSION_FIELDS.join(', ')})`,
    });
    return undefined;
  }
  if (present.length > 1) {
    diagnostics.push({
      field: present[1],
      message: `only one version field is allowed, found ${present.join(', ')}`,
    });
    return undefined;
  }

  const field = present[0];
  const text = manifest[field];
  if (text === undefined) return undefined;

  const problem = validateVersionText(schemeForField(field), text);
  if (problem) {
    diagnostics.push({ field, message: problem });
    return undefined;
  }
  return { field, text };
}

/**
 * Build a port description from an already-decoded JSON value
 */
export function manifestFromJson(json: unknown, origin: string): ParseResult<SourceControlFile> {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return parseFailed(origin, [{ field: '(root)', message: 'manifest must be a JSON object' }]);
  }

  const { comments, body } = splitComments(json);
  const result = ManifestSchema.safeParse(body);
  if (!result.success) {
    return parseFailed(origin, zodDiagnostics(result.error));
  }

  const manifest = result.data;
  const diagnostics: FieldDiagnostic[] = [];
  const version = findVersionField(manifest, diagnostics);

  const features = Object.entries(manifest.features ?? {}).map(([name, feature]) =>
    featureFromJson(name, feature)
  );
  for (const name of manifest['default-features'] ?? []) {
    if (!features.some((feature) => feature.name === name)) {
      diagnostics.push({ field: 'default-features', message: `unknown feature "${name}"` });
    }
  }

  if (version === undefined || diagnostics.length > 0) {
    return parseFailed(origin, diagnostics);
  }

  return parseOk<SourceControlFile>({
    name: manifest.name,
    version: {
      scheme: schemeForField(version.field),
      version: { text: version.text, portVersion: manifest['port-version'] ?? 0 },
    },
    origin: 'manifest',
    comments,
    maintainers: toList(manifest.maintainers),
    description: toList(manifest.description),
    ...(manifest.homepage !== undefined ? { homepage: manifest.homepage } : {}),
    ...(manifest.documentation !== undefined ? { documentation: manifest.documentation } : {}),
    ...(manifest.license !== undefined ? { license: manifest.license } : {}),
    ...(manifest.supports !== undefined ? { supports: manifest.supports } : {}),
    dependencies: (manifest.dependencies ?? []).map(dependencyFromJson),
    defaultFeatures: manifest['default-features'] ?? [],
    features,
  });
}

/**
 * Parse `vcpkg.json` text
 */
export function parseManifest(text: string, origin: string): ParseResult<SourceControlFile> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return parseFailed(origin, [{ field: '(json)', message }]);
  }
  return manifestFromJson(json, origin);
}
