/**
 * Health Sample Types
 *
 * Raw readings pushed from HealthKit, and the collaborator interface
 * the backend reads them through.
 */

export const HEALTH_SAMPLE_KINDS = [
  'weight',
  'body_fat_percentage',
  'lean_body_mass',
  'body_mass_index',
  'waist_circumference',
  'height',
  'basal_energy_burned',
  'active_energy_burned',
  'sleep_asleep',
  'heart_rate_variability_sdnn',
  'resting_heart_rate',
] as const;

export type HealthSampleKind = (typeof HEALTH_SAMPLE_KINDS)[number];

export type LengthUnit = 'm' | 'cm';

export interface HealthSample {
  kind: HealthSampleKind;
  timestamp: string; // ISO 8601, as recorded on the device
  value: number;
  endTimestamp?: string; // interval samples (sleep)
  unit?: LengthUnit; // length samples only
}

export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Source of raw health readings.
 * Returns an empty list (not an error) when a kind is absent or unauthorized.
 */
export interface HealthSource {
  fetchSamples(
    userId: string,
    kind: HealthSampleKind,
    range: DateRange
  ): Promise<HealthSample[]>;
}
