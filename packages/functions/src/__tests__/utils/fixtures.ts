/**
 * Test data fixtures and factory functions.
 *
 * These functions create properly typed test data with sensible defaults
 * that can be overridden for specific test scenarios.
 */

import type {
  NutritionTarget,
  PlannedWorkout,
  RecoveryMetrics,
  RecoveryReport,
  StoredBodyMetrics,
} from '../../shared.js';

export function createStoredBodyMetrics(
  overrides: Partial<StoredBodyMetrics> = {}
): StoredBodyMetrics {
  return {
    date: '2026-03-10',
    weight: 70,
    bodyFat: 20,
    skeletalMuscle: 25.2,
    bmi: 22.9,
    bmr: 1600,
    height: 175,
    leanBodyMass: 56,
    source: 'healthkit',
    syncedAt: '2026-03-10T08:00:00.000Z',
    ...overrides,
  };
}

export function createRecoveryMetrics(overrides: Partial<RecoveryMetrics> = {}): RecoveryMetrics {
  return {
    date: '2026-03-10',
    sleepHours: 7.5,
    hrv: 55,
    restingHR: 58,
    ...overrides,
  };
}

export function createNutritionTarget(overrides: Partial<NutritionTarget> = {}): NutritionTarget {
  return {
    id: 'target-1',
    userId: 'default-user',
    dailyCalories: 2080,
    macros: { protein: 168, carbs: 141, fats: 94 },
    bmr: 1600,
    isWorkoutDay: false,
    createdAt: '2026-03-10T12:00:00.000Z',
    validUntil: '2026-03-11T12:00:00.000Z',
    ...overrides,
  };
}

export function createPlannedWorkout(overrides: Partial<PlannedWorkout> = {}): PlannedWorkout {
  return {
    id: 'workout-1',
    name: 'Lower Body',
    cancelled: false,
    exercises: [
      { name: 'Back Squat', sets: 4, weightKg: 100 },
      { name: 'Romanian Deadlift', sets: 3, weightKg: 80 },
    ],
    ...overrides,
  };
}

/**
 * A report with the given score; the other fields are placeholders.
 */
export function createRecoveryReport(score: number, overrides: Partial<RecoveryReport> = {}): RecoveryReport {
  return {
    date: '2026-03-10',
    score,
    recommendation: 'Good recovery. Proceed with planned workout at normal intensity.',
    shouldWarn: score < 50,
    warningMessage: '',
    metrics: createRecoveryMetrics(),
    insights: {
      overallStatus: 'Good',
      sleepStatus: 'Good (7.5h)',
      hrvStatus: 'Good (55 ms)',
      recommendations: ['Recovery is on track - maintain current routine'],
    },
    averageWeightKg: 70,
    averageHrvMs: 52,
    ...overrides,
  };
}
