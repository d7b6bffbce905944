/**
 * JSON Manifest Schemas
 *
 * Zod schemas for `vcpkg.json`. Comment keys (`$...`) are split off before
 * validation, so the object schemas are strict: any other unknown key is an
 * error.
 *
 * @module manifest/manifest-schema
 */

import { z } from 'zod';
import type { FieldDiagnostic, JsonValue } from './types.js';
import { PORT_NAME_PATTERN } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const PortNameSchema = z
  .string()
  .regex(PORT_NAME_PATTERN, 'must be lowercase alphanumerics separated by hyphens');

export const FeatureNameSchema = z
  .string()
  .regex(PORT_NAME_PATTERN, 'feature names must be lowercase alphanumerics separated by hyphens');

const StringOrStrings = z.union([z.string(), z.array(z.string())]);

export const DependencyObjectSchema = z
  .object({
    name: PortNameSchema,
    features: z.array(z.string()).optional(),
    'default-features': z.boolean().optional(),
    host: z.boolean().optional(),
    platform: z.string().optional(),
  })
  .strict();

export const DependencySchema = z.union([PortNameSchema, DependencyObjectSchema]);

export const FeatureSchema = z
  .object({
    description: StringOrStrings,
    dependencies: z.array(DependencySchema).optional(),
    supports: z.string().optional(),
  })
  .strict();

export const ManifestSchema = z
  .object({
    name: PortNameSchema,
    version: z.string().optional(),
    'version-semver': z.string().optional(),
    'version-date': z.string().optional(),
    'version-string': z.string().optional(),
    'port-version': z.number().int().nonnegative().optional(),
    maintainers: StringOrStrings.optional(),
    description: StringOrStrings.optional(),
    homepage: z.string().optional(),
    documentation: z.string().optional(),
    license: z.string().optional(),
    supports: z.string().optional(),
    dependencies: z.array(DependencySchema).optional(),
    'default-features': z.array(z.string()).optional(),
    features: z.record(FeatureNameSchema, FeatureSchema).optional(),
  })
  .strict();

export type ManifestJson = z.infer<typeof ManifestSchema>;
export type DependencyJson = z.infer<typeof DependencySchema>;
export type FeatureJson = z.infer<typeof FeatureSchema>;

/**
 * Turn zod issues into field diagnostics (`features.tls.description`, ...)
 */
export function zodDiagnostics(error: z.ZodError): FieldDiagnostic[] {
  return error.errors.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
