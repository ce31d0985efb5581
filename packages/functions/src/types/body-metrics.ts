/**
 * Body Metrics Types
 *
 * Body composition snapshots built from HealthKit readings, one per user per calendar day.
 */

export type BodyMetricsSource = 'healthkit' | 'manual';

export interface BodyMetrics {
  date: string; // YYYY-MM-DD format
  weight: number; // kg, the only required reading
  bodyFat: number; // %
  skeletalMuscle: number; // kg, ~45% of lean mass
  bmi: number;
  bmr: number; // kcal/day, yearly average
  height?: number; // cm
  leanBodyMass?: number; // kg
  waistCircumference?: number; // cm
  source: BodyMetricsSource;
}

/**
 * Body metrics as stored in Firestore, keyed by date.
 */
export interface StoredBodyMetrics extends BodyMetrics {
  syncedAt: string; // ISO 8601 timestamp
}

// --- Profile ---

export type BiologicalSex = 'male' | 'female';

/**
 * Slow-changing profile values used for BMR estimation.
 */
export interface UserHealthProfile {
  heightCm?: number;
  biologicalSex?: BiologicalSex;
  dateOfBirth?: string; // YYYY-MM-DD format
  age?: number;
}

// --- BMR ---

export type BmrSource = 'healthkit_average' | 'harris_benedict' | 'default';

export interface ResolvedBmr {
  bmr: number;
  source: BmrSource;
}

export interface HarrisBenedictInputs {
  weightKg: number | null;
  heightCm: number | null;
  age: number | null;
  sex: BiologicalSex | null;
}

export interface BodyMetricsSyncResult {
  fetched: number;
  deduplicated: number;
  saved: number;
  updated: number;
  bmr: ResolvedBmr;
}
