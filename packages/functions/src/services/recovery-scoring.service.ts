/**
 * Recovery Scoring Service
 *
 * Converts a day's recovery metrics into a 0-100 score and workout guidance.
 *
 * Score = (Sleep × 0.4) + (HRV/RHR × 0.4) + (Weight Stability × 0.2)
 *
 * All functions are pure. Fetching the metrics is the caller's job.
 */

import { debug } from 'firebase-functions/logger';
import type {
  BodyMetrics,
  IntensityAdjustment,
  PlannedWorkout,
  RecoveryInsights,
  RecoveryMetrics,
  RecoveryStatus,
} from '../shared.js';

const TAG = '[Recovery Scoring]';

/** Returned when there is no data to score. */
export const DEFAULT_RECOVERY_SCORE = 70;

const SLEEP_WEIGHT = 0.4;
const HRV_WEIGHT = 0.4;
const WEIGHT_STABILITY_WEIGHT = 0.2;

// ============ Component Scores ============

/**
 * Sleep duration score. Step function at 8, 7, 6 and 5 hours (inclusive).
 */
export function calculateSleepScore(sleepHours: number): number {
  if (sleepHours >= 8) return 100;
  if (sleepHours >= 7) return 85;
  if (sleepHours >= 6) return 65;
  if (sleepHours >= 5) return 45;
  return 25;
}

export function calculateHrvSubScore(hrvMs: number): number {
  if (hrvMs >= 70) return 100;
  if (hrvMs >= 50) return 80;
  if (hrvMs >= 30) return 60;
  if (hrvMs >= 20) return 40;
  return 20;
}

/**
 * Lower resting heart rate scores higher.
 */
export function calculateRestingHrSubScore(restingHR: number): number {
  if (restingHR <= 50) return 100;
  if (restingHR <= 60) return 85;
  if (restingHR <= 70) return 70;
  if (restingHR <= 80) return 55;
  return 40;
}

/**
 * Nervous-system recovery: HRV carries 70%, resting HR 30%.
 */
export function calculateHrvScore(hrvMs: number, restingHR: number): number {
  return calculateHrvSubScore(hrvMs) * 0.7 + calculateRestingHrSubScore(restingHR) * 0.3;
}

/**
 * Weight stability against a recent average. Rapid change suggests
 * overtraining or under-eating.
 *
 * @param latest - Latest body metrics, if any
 * @param avgWeight - Baseline weight in kg; 0 or less means no baseline
 */
export function calculateWeightStabilityScore(
  latest: BodyMetrics | null | undefined,
  avgWeight: number
): number {
  if (!latest || !(avgWeight > 0)) {
    return 100;
  }

  const percentChange = (Math.abs(latest.weight - avgWeight) / avgWeight) * 100;

  if (percentChange <= 0.5) return 100;
  if (percentChange <= 1.0) return 90;
  if (percentChange <= 2.0) return 75;
  if (percentChange <= 3.0) return 55;
  return 30;
}

// ============ Recovery Score ============

/**
 * Weighted sum of the three sub-scores, clamped to [0, 100].
 */
export function combineRecoveryScore(
  sleepScore: number,
  hrvScore: number,
  weightScore: number
): number {
  const total =
    sleepScore * SLEEP_WEIGHT + hrvScore * HRV_WEIGHT + weightScore * WEIGHT_STABILITY_WEIGHT;
  return Math.min(100, Math.max(0, total));
}

/**
 * Calculate the daily recovery score (0-100).
 *
 * @param date - Day being scored (YYYY-MM-DD)
 * @param metrics - The day's recovery metrics, or null when unavailable
 * @param latestBodyMetrics - Most recent body metrics, for weight stability
 * @param avgWeight - Recent average weight in kg; defaults to the latest weight
 * @returns Score clamped to [0, 100]; 70 when there is nothing to score
 */
export function calculateRecoveryScore(
  date: string,
  metrics: RecoveryMetrics | null,
  latestBodyMetrics?: BodyMetrics | null,
  avgWeight?: number | null
): number {
  if (!metrics) {
    return DEFAULT_RECOVERY_SCORE;
  }

  const sleepScore = calculateSleepScore(metrics.sleepHours);
  const hrvScore = calculateHrvScore(metrics.hrv, metrics.restingHR);
  const weightScore = calculateWeightStabilityScore(
    latestBodyMetrics,
    avgWeight ?? latestBodyMetrics?.weight ?? 0
  );

  const score = combineRecoveryScore(sleepScore, hrvScore, weightScore);
  debug(`${TAG} score`, { date, sleepScore, hrvScore, weightScore, score });
  return score;
}

// ============ Guidance ============

export function getWorkoutRecommendation(recoveryScore: number): string {
  if (recoveryScore < 40) {
    return 'Critical recovery needed. Take a rest day or do light stretching/walking only.';
  }
  if (recoveryScore < 50) {
    return 'Low recovery detected. Consider a rest day or very light mobility work.';
  }
  if (recoveryScore < 60) {
    return 'Below-average recovery. Reduce intensity by 20-30% and cut volume by 1 set per exercise.';
  }
  if (recoveryScore < 70) {
    return 'Moderate recovery. Reduce intensity by 10-15% today and focus on technique.';
  }
  if (recoveryScore < 85) {
    return 'Good recovery. Proceed with planned workout at normal intensity.';
  }
  return 'Excellent recovery! Perfect day for progressive overload - increase weight or reps!';
}

function overallStatusFor(recoveryScore: number): RecoveryStatus {
  if (recoveryScore >= 85) return 'Excellent';
  if (recoveryScore >= 70) return 'Good';
  if (recoveryScore >= 50) return 'Moderate';
  return 'Poor';
}

function sleepStatusFor(sleepHours: number): string {
  const hours = `${sleepHours.toFixed(1)}h`;
  if (sleepHours >= 8) return `Excellent (${hours})`;
  if (sleepHours >= 7) return `Good (${hours})`;
  if (sleepHours >= 6) return `Moderate (${hours})`;
  return `Poor (${hours})`;
}

function hrvStatusFor(hrvMs: number): string {
  const value = `${Math.trunc(hrvMs)} ms`;
  if (hrvMs >= 70) return `Excellent (${value})`;
  if (hrvMs >= 50) return `Good (${value})`;
  if (hrvMs >= 30) return `Moderate (${value})`;
  return `Low (${value})`;
}

/**
 * Human-readable status lines and recommendations for a scored day.
 * Every matching recommendation rule contributes; they are not exclusive.
 */
export function getRecoveryInsights(
  recoveryScore: number,
  metrics: RecoveryMetrics | null,
  avgHrv: number | null
): RecoveryInsights {
  if (!metrics) {
    return {
      overallStatus: 'Unknown',
      sleepStatus: 'No data',
      hrvStatus: 'No data',
      recommendations: ['Connect your health data source to track recovery metrics'],
    };
  }

  const recommendations: string[] = [];

  if (metrics.sleepHours < 7) {
    recommendations.push('Prioritize 7-9 hours of sleep tonight');
  }

  if (metrics.hrv < 40 && avgHrv !== null && metrics.hrv < avgHrv * 0.85) {
    recommendations.push('HRV is 15%+ below your average - reduce workout intensity');
  }

  if (metrics.restingHR > 75) {
    recommendations.push('Elevated resting heart rate - consider stress management');
  }

  if (recoveryScore < 60) {
    recommendations.push('Focus on nutrition: increase protein and hydration');
    recommendations.push('Consider active recovery: light walk or stretching');
  }

  if (recommendations.length === 0) {
    recommendations.push('Recovery is on track - maintain current routine');
  }

  return {
    overallStatus: overallStatusFor(recoveryScore),
    sleepStatus: sleepStatusFor(metrics.sleepHours),
    hrvStatus: hrvStatusFor(metrics.hrv),
    recommendations,
  };
}

// ============ Workout Adjustment ============

/**
 * Intensity band for a recovery score, or null when no adjustment is needed (>= 70).
 */
export function getIntensityAdjustment(recoveryScore: number): IntensityAdjustment | null {
  if (recoveryScore >= 70) {
    return null;
  }
  if (recoveryScore < 40) {
    return { intensityFactor: 0, setsToRemove: 0, removeAllSets: true };
  }
  if (recoveryScore < 50) {
    return { intensityFactor: 0.7, setsToRemove: 2, removeAllSets: false };
  }
  if (recoveryScore < 60) {
    return { intensityFactor: 0.8, setsToRemove: 1, removeAllSets: false };
  }
  return { intensityFactor: 0.9, setsToRemove: 0, removeAllSets: false };
}

function appendNote(notes: string | undefined, note: string): string {
  return notes !== undefined && notes !== '' ? `${notes}\n${note}` : note;
}

/**
 * Annotate a planned workout with the recovery-based adjustment.
 * Sets and weights are left as planned; rewriting them is the caller's job.
 */
export function adjustWorkoutIntensity(
  plannedWorkout: PlannedWorkout,
  recoveryScore: number
): PlannedWorkout {
  const adjustment = getIntensityAdjustment(recoveryScore);
  if (!adjustment) {
    return plannedWorkout;
  }

  if (adjustment.intensityFactor === 0) {
    return {
      ...plannedWorkout,
      cancelled: true,
      notes: 'WORKOUT CANCELLED - Critical recovery needed. Rest day recommended.',
    };
  }

  const reductionPercent = Math.round((1 - adjustment.intensityFactor) * 100);
  const scoreLabel = `${Math.round(recoveryScore)}/100`;
  const note =
    recoveryScore < 50
      ? `AUTO-ADJUSTED: Recovery score low (${scoreLabel}). Recommend reducing intensity by ${reductionPercent}% and volume by ${adjustment.setsToRemove} set(s).`
      : `ADJUSTED: Moderate recovery (${scoreLabel}). Consider reducing intensity by ${reductionPercent}%.`;

  return {
    ...plannedWorkout,
    notes: appendNote(plannedWorkout.notes, note),
  };
}

export function shouldWarnBeforeWorkout(recoveryScore: number): boolean {
  return recoveryScore < 50;
}

export function getWorkoutWarningMessage(recoveryScore: number): string {
  const scoreLabel = `${Math.round(recoveryScore)}/100`;
  if (recoveryScore < 40) {
    return `Your recovery score is critically low (${scoreLabel}). Your body needs rest to adapt and grow. Consider taking a rest day.`;
  }
  if (recoveryScore < 50) {
    return `Your recovery score is low (${scoreLabel}). We've reduced the workout intensity. Listen to your body and stop if needed.`;
  }
  return '';
}

// ============ Baselines ============

/**
 * Mean weight over recent body metrics, or null when there are none.
 */
export function calculateAverageWeight(metrics: BodyMetrics[]): number | null {
  if (metrics.length === 0) {
    return null;
  }
  return metrics.reduce((sum, entry) => sum + entry.weight, 0) / metrics.length;
}

/**
 * Mean HRV over recent days, ignoring days without a positive reading.
 */
export function calculateAverageHrv(history: RecoveryMetrics[]): number | null {
  const values = history.map((entry) => entry.hrv).filter((hrv) => hrv > 0);
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, hrv) => sum + hrv, 0) / values.length;
}
