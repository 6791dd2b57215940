import { z } from 'zod';
import type { QcConfig } from '../config/types.js';

/**
 * Per-request overrides of the configured QC settings.
 */
export const qcOverridesSchema = z.object({
  beadThreshold: z.number().int().min(0).optional(),
  rSquaredThreshold: z.number().gt(0).lt(1).optional(),
  backgroundAnalyte: z.string().min(1).optional(),
  standardAnalytes: z.array(z.string().min(1)).optional(),
}).strict();

export const plateQcRequestSchema = z.object({
  content: z.string().min(1),
  plateId: z.string().min(1).regex(/^[^/\\]+$/, 'plateId must not contain path separators'),
  write: z.boolean().optional(),
  settings: qcOverridesSchema.optional(),
}).strict();

export const projectQcRequestSchema = z.object({
  directory: z.string().min(1),
  strict: z.boolean().optional(),
  settings: qcOverridesSchema.optional(),
}).strict();

export type QcOverrides = z.infer<typeof qcOverridesSchema>;
export type PlateQcRequest = z.infer<typeof plateQcRequestSchema>;
export type ProjectQcRequest = z.infer<typeof projectQcRequestSchema>;

/**
 * Drop unset keys so the overrides merge cleanly over the configuration.
 */
export function toQcOverrides(overrides: QcOverrides | undefined, strict?: boolean): Partial<QcConfig> {
  return {
    ...(overrides?.beadThreshold !== undefined ? { beadThreshold: overrides.beadThreshold } : {}),
    ...(overrides?.rSquaredThreshold !== undefined ? { rSquaredThreshold: overrides.rSquaredThreshold } : {}),
    ...(overrides?.backgroundAnalyte !== undefined ? { backgroundAnalyte: overrides.backgroundAnalyte } : {}),
    ...(overrides?.standardAnalytes !== undefined ? { standardAnalytes: overrides.standardAnalytes } : {}),
    ...(strict !== undefined ? { strict } : {}),
  };
}
