/**
 * Recovery Types
 *
 * Daily recovery metrics derived from HealthKit samples, and the
 * guidance produced by the recovery scorer.
 */

// --- Recovery Metrics ---

/**
 * Recovery inputs for a single calendar day.
 * Computed on demand from raw samples; never persisted.
 */
export interface RecoveryMetrics {
  date: string; // YYYY-MM-DD format
  sleepHours: number;
  hrv: number; // SDNN in milliseconds
  restingHR: number; // BPM
}

// --- Insights ---

export type RecoveryStatus = 'Excellent' | 'Good' | 'Moderate' | 'Poor' | 'Unknown';

export interface RecoveryInsights {
  overallStatus: RecoveryStatus;
  sleepStatus: string;
  hrvStatus: string;
  recommendations: string[];
}

// --- Planned Workout ---

export interface PlannedExercise {
  name: string;
  sets: number;
  weightKg?: number;
}

/**
 * A workout as planned for the day, before any recovery-based adjustment.
 */
export interface PlannedWorkout {
  id: string;
  name: string;
  notes?: string;
  cancelled: boolean;
  exercises: PlannedExercise[];
}

/**
 * What the scorer recommends changing. Rewriting sets and weights is up to the caller.
 */
export interface IntensityAdjustment {
  intensityFactor: number; // 0.0 cancels the workout
  setsToRemove: number;
  removeAllSets: boolean;
}

// --- Report ---

/**
 * Everything the recovery endpoint returns for a day.
 */
export interface RecoveryReport {
  date: string;
  score: number;
  recommendation: string;
  shouldWarn: boolean;
  warningMessage: string;
  metrics: RecoveryMetrics | null;
  insights: RecoveryInsights;
  averageWeightKg: number | null;
  averageHrvMs: number | null;
}
