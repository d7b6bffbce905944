/**
 * CONTROL File Parser
 *
 * Builds a {@link SourceControlFile} from the paragraphs of a legacy
 * `CONTROL` file. The first paragraph describes the port; each later one
 * describes a feature. The `Version` field is always the String scheme.
 *
 * All field problems in the file are collected before failing, so a single
 * report lists every one of them.
 *
 * @module manifest/control-file
 */

import { validateVersionText } from '../versions/compare.js';
import { parseParagraphs, splitTopLevelCommas, type Paragraph, type ParagraphField } from './paragraphs.js';
import {
  PORT_NAME_PATTERN,
  parseFailed,
  parseOk,
  type Dependency,
  type FeatureParagraph,
  type FieldDiagnostic,
  type ParseResult,
  type SourceControlFile,
} from './types.js';

const CORE_FIELDS = new Set([
  'Source',
  'Version',
  'Port-Version',
  'Build-Depends',
  'Description',
  'Homepage',
  'Maintainer',
  'Supports',
  'Default-Features',
]);

const FEATURE_FIELDS = new Set(['Feature', 'Description', 'Build-Depends', 'Supports']);

const DEPENDENCY_PATTERN = /^([a-z0-9]+(?:-[a-z0-9]+)*)(?:\[([^\]]*)\])?(?:\s*\(([^)]*)\))?$/;

class DiagnosticSink {
  readonly items: FieldDiagnostic[] = [];

  add(field: string, message: string, at?: ParagraphField): void {
    this.items.push({ field, message, line: at?.line, column: at?.column });
  }
}

function checkFields(
  paragraph: Paragraph,
  allowed: ReadonlySet<string>,
  sink: DiagnosticSink
): void {
  for (const [name, field] of paragraph) {
    if (!allowed.has(name)) {
      sink.add(name, 'unknown field', field);
    }
  }
}

function requireField(
  paragraph: Paragraph,
  name: string,
  sink: DiagnosticSink,
  firstField: ParagraphField | undefined
): string | undefined {
  const field = paragraph.get(name);
  if (field === undefined || field.value === '') {
    sink.add(name, 'missing required field', field ?? firstField);
    return undefined;
  }
  return field.value;
}

function lines(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split('\n').filter((line) => line.length > 0);
}

/**
 * Parse a `Build-Depends` list: `zlib, curl[ssl,http2] (!uwp), fmt[core]`
 *
 * `[core]` opts out of the dependency's default features.
 */
export function parseDependencyList(
  value: string,
  sink: { add(field: string, message: string, at?: ParagraphField): void },
  at?: ParagraphField
): Dependency[] {
  const dependencies: Dependency[] = [];

  for (const item of splitTopLevelCommas(value)) {
    const match = DEPENDENCY_PATTERN.exec(item);
    if (!match) {
      sink.add('Build-Depends', `invalid dependency "${item}"`, at);
      continue;
    }

    const requested = match[2] === undefined ? [] : splitTopLevelCommas(match[2]);
    const platform = match[3]?.trim();
    dependencies.push({
      name: match[1],
      features: requested.filter((feature) => feature !== 'core'),
      defaultFeatures: !requested.includes('core'),
      host: false,
      ...(platform ? { platform } : {}),
    });
  }

  return dependencies;
}

function parseFeature(paragraph: Paragraph, sink: DiagnosticSink): FeatureParagraph | undefined {
  const first: ParagraphField | undefined = paragraph.values().next().value;
  checkFields(paragraph, FEATURE_FIELDS, sink);

  const name = requireField(paragraph, 'Feature', sink, first);
  if (name !== undefined && !PORT_NAME_PATTERN.test(name)) {
    sink.add('Feature', `invalid feature name "${name}"`, paragraph.get('Feature'));
    return undefined;
  }
  const description = requireField(paragraph, 'Description', sink, first);
  const buildDepends = paragraph.get('Build-Depends');
  const supports = paragraph.get('Supports')?.value;

  if (name === undefined || description === undefined) return undefined;

  return {
    name,
    description: lines(description),
    dependencies: buildDepends ? parseDependencyList(buildDepends.value, sink, buildDepends) : [],
    ...(supports ? { supports } : {}),
  };
}

function parsePortVersion(field: ParagraphField | undefined, sink: DiagnosticSink): number {
  if (field === undefined) return 0;
  if (!/^\d+$/.test(field.value)) {
    sink.add('Port-Version', `expected a non-negative integer, got "${field.value}"`, field);
    return 0;
  }
  return Number(field.value);
}

/**
 * Convert parsed paragraphs into a port description
 */
export function controlFileFromParagraphs(
  paragraphs: readonly Paragraph[],
  origin: string
): ParseResult<SourceControlFile> {
  const [core, ...featureParagraphs] = paragraphs;
  if (core === undefined) {
    return parseFailed(origin, [{ field: 'Source', message: 'file contains no paragraphs' }]);
  }

  const sink = new DiagnosticSink();
  const first: ParagraphField | undefined = core.values().next().value;
  checkFields(core, CORE_FIELDS, sink);

  const name = requireField(core, 'Source', sink, first);
  if (name !== undefined && !PORT_NAME_PATTERN.test(name)) {
    sink.add('Source', `invalid port name "${name}"`, core.get('Source'));
  }

  const versionText = requireField(core, 'Version', sink, first);
  if (versionText !== undefined) {
    const problem = validateVersionText('string', versionText);
    if (problem) sink.add('Version', problem, core.get('Version'));
  }

  const portVersion = parsePortVersion(core.get('Port-Version'), sink);
  const buildDepends = core.get('Build-Depends');
  const dependencies = buildDepends ? parseDependencyList(buildDepends.value, sink, buildDepends) : [];
  const features = featureParagraphs
    .map((paragraph) => parseFeature(paragraph, sink))
    .filter((feature): feature is FeatureParagraph => feature !== undefined);

  const seen = new Set<string>();
  for (const feature of features) {
    if (seen.has(feature.name)) sink.add('Feature', `duplicate feature "${feature.name}"`);
    seen.add(feature.name);
  }

  if (sink.items.length > 0 || name === undefined || versionText === undefined) {
    return parseFailed(origin, sink.items);
  }

  const homepage = core.get('Homepage')?.value;
  const supports = core.get('Supports')?.value;
  const defaultFeatures = core.get('Default-Features')?.value;

  return parseOk<SourceControlFile>({
    name,
    version: { scheme: 'string', version: { text: versionText, portVersion } },
    origin: 'control',
    comments: {},
    maintainers: lines(core.get('Maintainer')?.value),
    description: lines(core.get('Description')?.value),
    ...(homepage ? { homepage } : {}),
    ...(supports ? { supports } : {}),
    dependencies,
    defaultFeatures: defaultFeatures ? splitTopLevelCommas(defaultFeatures) : [],
    features,
  });
}

/**
 * Parse the text of a `CONTROL` file
 */
export function parseControlFile(text: string, origin: string): ParseResult<SourceControlFile> {
  const paragraphs = parseParagraphs(text, origin);
  if (!paragraphs.ok) return paragraphs;
  return controlFileFromParagraphs(paragraphs.value, origin);
}
