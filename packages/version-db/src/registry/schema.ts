/**
 * Registry File Schemas
 *
 * Zod schemas for the per-port history files and the baseline file. Version
 * text is stored as written; it is not re-validated against its scheme on
 * load.
 *
 * @module registry/schema
 */

import { z } from 'zod';

const PortVersionSchema = z.number().int().nonnegative();

export const HistoryEntrySchema = z
  .object({
    'git-tree': z.string().min(1, 'git-tree must not be empty'),
    version: z.string().optional(),
    'version-semver': z.string().optional(),
    'version-date': z.string().optional(),
    'version-string': z.string().optional(),
    'port-version': PortVersionSchema.optional(),
  })
  .strict();

export const HistoryFileSchema = z
  .object({
    versions: z.array(HistoryEntrySchema),
  })
  .strict();

export const BaselineEntrySchema = z
  .object({
    baseline: z.string(),
    'port-version': PortVersionSchema.optional(),
  })
  .strict();

export const BaselineFileSchema = z
  .object({
    default: z.record(BaselineEntrySchema),
  })
  .strict();

export type HistoryEntryJson = z.infer<typeof HistoryEntrySchema>;
export type HistoryFileJson = z.infer<typeof HistoryFileSchema>;
export type BaselineFileJson = z.infer<typeof BaselineFileSchema>;
