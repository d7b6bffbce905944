/**
 * Canonical Manifest Serializer
 *
 * Writes a {@link SourceControlFile} back out as `vcpkg.json`. The output is
 * the one canonical form a checked-in manifest must match byte for byte:
 *
 * - key order: `$` comments, `name`, version field, `port-version` (omitted
 *   when 0), `maintainers`, `description`, `homepage`, `documentation`,
 *   `license`, `supports`, `dependencies`, `default-features`, `features`
 * - dependencies and features sorted by name
 * - a one-element description or maintainer list is written as a string
 * - a dependency with nothing but a name is written as that name
 * - two-space indentation and a trailing newline
 *
 * @module manifest/manifest-serializer
 */

import { SCHEME_FIELDS } from '../versions/types.js';
import type { Dependency, FeatureParagraph, JsonValue, SourceControlFile } from './types.js';

type JsonObject = { [key: string]: JsonValue };

function byName<T extends { readonly name: string }>(a: T, b: T): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function stringOrList(values: readonly string[]): JsonValue {
  return values.length === 1 ? values[0] : [...values];
}

export function serializeDependency(dependency: Dependency): JsonValue {
  const plain =
    dependency.features.length === 0 &&
    dependency.defaultFeatures &&
    !dependency.host &&
    dependency.platform === undefined;
  if (plain) return dependency.name;

  const obj: JsonObject = { name: dependency.name };
  if (dependency.host) obj.host = true;
  if (!dependency.defaultFeatures) obj['default-features'] = false;
  if (dependency.features.length > 0) obj.features = [...dependency.features];
  if (dependency.platform !== undefined) obj.platform = dependency.platform;
  return obj;
}

function serializeDependencies(dependencies: readonly Dependency[]): JsonValue {
  return [...dependencies].sort(byName).map(serializeDependency);
}

function serializeFeature(feature: FeatureParagraph): JsonObject {
  const obj: JsonObject = { description: stringOrList(feature.description) };
  if (feature.dependencies.length > 0) obj.dependencies = serializeDependencies(feature.dependencies);
  if (feature.supports !== undefined) obj.supports = feature.supports;
  return obj;
}

/**
 * Manifest JSON object with canonical key order
 */
export function serializeManifest(scf: SourceControlFile): JsonObject {
  const obj: JsonObject = { ...scf.comments };

  obj.name = scf.name;
  obj[SCHEME_FIELDS[scf.version.scheme]] = scf.version.version.text;
  if (scf.version.version.portVersion !== 0) {
    obj['port-version'] = scf.version.version.portVersion;
  }
  if (scf.maintainers.length > 0) obj.maintainers = stringOrList(scf.maintainers);
  if (scf.description.length > 0) obj.description = stringOrList(scf.description);
  if (scf.homepage !== undefined) obj.homepage = scf.homepage;
  if (scf.documentation !== undefined) obj.documentation = scf.documentation;
  if (scf.license !== undefined) obj.license = scf.license;
  if (scf.supports !== undefined) obj.supports = scf.supports;
  if (scf.dependencies.length > 0) obj.dependencies = serializeDependencies(scf.dependencies);
  if (scf.defaultFeatures.length > 0) obj['default-features'] = [...scf.defaultFeatures];
  if (scf.features.length > 0) {
    const features: JsonObject = {};
    for (const feature of [...scf.features].sort(byName)) {
      features[feature.name] = serializeFeature(feature);
    }
    obj.features = features;
  }

  return obj;
}

/**
 * Canonical `vcpkg.json` text
 */
export function formatManifest(scf: SourceControlFile): string {
  return `${JSON.stringify(serializeManifest(scf), null, 2)}\n`;
}
