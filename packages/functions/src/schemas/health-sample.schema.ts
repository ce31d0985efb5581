import { z } from 'zod';
import { HEALTH_SAMPLE_KINDS } from '../types/health-sample.js';
import { dateStringSchema } from './recovery.schema.js';

/**
 * Health Sample Schemas
 *
 * Validation for raw HealthKit readings pushed by the iOS app.
 */

export const healthSampleKindSchema = z.enum(HEALTH_SAMPLE_KINDS);

const isoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO 8601 timestamp' });

export const healthSampleSchema = z
  .object({
    kind: healthSampleKindSchema,
    timestamp: isoTimestampSchema,
    value: z.number().finite().min(0),
    endTimestamp: isoTimestampSchema.optional(),
    unit: z.enum(['m', 'cm']).optional(),
  })
  .refine(
    (sample) =>
      sample.endTimestamp === undefined ||
      Date.parse(sample.endTimestamp) >= Date.parse(sample.timestamp),
    { message: 'endTimestamp must not precede timestamp', path: ['endTimestamp'] }
  );

export type HealthSampleInput = z.infer<typeof healthSampleSchema>;

// --- Bulk Sample Sync Schema ---

export const bulkHealthSampleSyncSchema = z.object({
  samples: z.array(healthSampleSchema).min(1).max(1000),
});

export type BulkHealthSampleSyncInput = z.infer<typeof bulkHealthSampleSyncSchema>;

// --- Body Metrics Sync Schema ---

/**
 * Body for POST /health-sync/body-metrics/sync.
 * `days` is how far back to look when there is no stored history yet.
 */
export const syncBodyMetricsSchema = z.object({
  days: z.number().int().min(1).max(365).default(90),
  force: z.boolean().default(false),
});

export type SyncBodyMetricsInput = z.infer<typeof syncBodyMetricsSchema>;

export const bodyMetricsRangeQuerySchema = z.object({
  start: dateStringSchema,
  end: dateStringSchema,
});

export type BodyMetricsRangeQueryInput = z.infer<typeof bodyMetricsRangeQuerySchema>;

// --- Health Profile Schema ---

export const healthProfileSchema = z.object({
  heightCm: z.number().positive().max(300).optional(),
  biologicalSex: z.enum(['male', 'female']).optional(),
  dateOfBirth: dateStringSchema.optional(),
});

export type HealthProfileInput = z.infer<typeof healthProfileSchema>;
