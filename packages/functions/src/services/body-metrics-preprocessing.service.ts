/**
 * Body Metrics Preprocessing Service
 *
 * Turns raw HealthKit readings into per-day BodyMetrics and RecoveryMetrics:
 * yearly BMR averaging with a Harris-Benedict fallback, same-day
 * deduplication, and length unit normalization.
 */

import { warn } from 'firebase-functions/logger';
import type {
  BodyMetrics,
  HarrisBenedictInputs,
  HealthSample,
  HealthSampleKind,
  RecoveryMetrics,
  ResolvedBmr,
} from '../shared.js';

const TAG = '[Body Metrics]';

export const MIN_PLAUSIBLE_BMR = 800;
export const DEFAULT_BMR = 1200;
export const DEFAULT_HEIGHT_CM = 175;
const SKELETAL_MUSCLE_RATIO = 0.45;

const DEFAULT_SLEEP_HOURS = 7;
const DEFAULT_HRV_MS = 35;
const DEFAULT_RESTING_HR = 67;

export type SamplesByKind = Partial<Record<HealthSampleKind, HealthSample[]>>;

// ============ Dates ============

/**
 * UTC calendar day (YYYY-MM-DD) of a timestamp, the same day `recordedAt`
 * range queries put it on.
 */
export function normalizeDate(timestamp: string | Date): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  return date.toISOString().slice(0, 10);
}

/**
 * Whole years between a date of birth and `now`, counting a birthday only once it has passed.
 */
export function calculateAge(dateOfBirth: string, now: Date = new Date()): number {
  const [year = 0, month = 1, day = 1] = dateOfBirth.split('-').map(Number);
  let age = now.getUTCFullYear() - year;
  const currentMonth = now.getUTCMonth() + 1;
  if (currentMonth < month || (currentMonth === month && now.getUTCDate() < day)) {
    age -= 1;
  }
  return age;
}

// ============ BMR ============

/**
 * Average of daily basal energy totals. Readings on the same day are summed
 * first. Returns null when there are no readings.
 */
export function averageDailyBmr(samples: HealthSample[]): number | null {
  if (samples.length === 0) {
    return null;
  }

  const dailyTotals = new Map<string, number>();
  for (const sample of samples) {
    const date = normalizeDate(sample.timestamp);
    dailyTotals.set(date, (dailyTotals.get(date) ?? 0) + sample.value);
  }

  let total = 0;
  for (const value of dailyTotals.values()) {
    total += value;
  }
  return Math.round(total / dailyTotals.size);
}

/**
 * Revised Harris-Benedict equation. Null when any input is missing.
 */
export function estimateHarrisBenedictBmr(inputs: HarrisBenedictInputs): number | null {
  const { weightKg, heightCm, age, sex } = inputs;
  if (weightKg === null || heightCm === null || age === null || sex === null) {
    return null;
  }

  const bmr =
    sex === 'male'
      ? 88.362 + 13.397 * weightKg + 4.799 * heightCm - 5.677 * age
      : 447.593 + 9.247 * weightKg + 3.098 * heightCm - 4.33 * age;

  return Math.round(bmr);
}

/**
 * Yearly BMR: the HealthKit average when it is at least 800 kcal,
 * otherwise Harris-Benedict, otherwise 1200.
 */
export function resolveYearlyBmr(
  samples: HealthSample[],
  fallbackInputs: HarrisBenedictInputs
): ResolvedBmr {
  const average = averageDailyBmr(samples);
  if (average !== null && average >= MIN_PLAUSIBLE_BMR) {
    return { bmr: average, source: 'healthkit_average' };
  }

  if (average === null) {
    warn(`${TAG} No basal energy readings, estimating BMR`);
  } else {
    warn(`${TAG} Average BMR below floor, estimating BMR`, { average, floor: MIN_PLAUSIBLE_BMR });
  }

  const estimate = estimateHarrisBenedictBmr(fallbackInputs);
  if (estimate !== null) {
    return { bmr: estimate, source: 'harris_benedict' };
  }

  warn(`${TAG} Missing profile inputs for Harris-Benedict, using default BMR`, {
    hasWeight: fallbackInputs.weightKg !== null,
    hasHeight: fallbackInputs.heightCm !== null,
    hasAge: fallbackInputs.age !== null,
    hasSex: fallbackInputs.sex !== null,
  });
  return { bmr: DEFAULT_BMR, source: 'default' };
}

// ============ Units ============

/**
 * Waist circumference in cm. Values under 2.0 are taken to be metres
 * unless an explicit unit says otherwise.
 */
export function normalizeWaistCm(value: number, unit?: HealthSample['unit']): number {
  if (unit === 'm') return value * 100;
  if (unit === 'cm') return value;
  return value < 2.0 ? value * 100 : value;
}

/**
 * Height in cm. Values under 3.0 are taken to be metres unless an explicit unit says otherwise.
 */
export function normalizeHeightCm(value: number, unit?: HealthSample['unit']): number {
  if (unit === 'm') return value * 100;
  if (unit === 'cm') return value;
  return value < 3.0 ? value * 100 : value;
}

/**
 * Most recent height reading in cm, or null.
 */
export function latestHeightCm(samples: HealthSample[]): number | null {
  let latest: HealthSample | null = null;
  for (const sample of samples) {
    if (!latest || Date.parse(sample.timestamp) >= Date.parse(latest.timestamp)) {
      latest = sample;
    }
  }
  return latest ? normalizeHeightCm(latest.value, latest.unit) : null;
}

// ============ Body Metrics ============

/**
 * Number of populated readings among weight, body fat, skeletal muscle and BMR.
 */
export function completenessScore(metrics: BodyMetrics): number {
  return [metrics.weight, metrics.bodyFat, metrics.skeletalMuscle, metrics.bmr].filter(
    (value) => value !== 0
  ).length;
}

export function calculatedLeanBodyMass(metrics: BodyMetrics): number {
  if (metrics.leanBodyMass !== undefined && metrics.leanBodyMass > 0) {
    return metrics.leanBodyMass;
  }
  return metrics.weight - metrics.weight * (metrics.bodyFat / 100);
}

function newestFirst(a: BodyMetrics, b: BodyMetrics): number {
  if (a.date === b.date) return 0;
  return a.date < b.date ? 1 : -1;
}

/**
 * One record per calendar day, keeping the most complete (first seen on ties), newest first.
 */
export function deduplicateBodyMetrics(metrics: BodyMetrics[]): BodyMetrics[] {
  const byDate = new Map<string, BodyMetrics>();

  for (const entry of metrics) {
    const existing = byDate.get(entry.date);
    if (!existing || completenessScore(entry) > completenessScore(existing)) {
      byDate.set(entry.date, entry);
    }
  }

  return [...byDate.values()].sort(newestFirst);
}

interface DayReadings {
  weight?: number;
  bodyFat?: number;
  leanMass?: number;
  bmi?: number;
  waist?: number;
}

/**
 * Group readings by day into BodyMetrics. Only days with a weight reading
 * produce a record; the last reading of a kind on a day wins.
 *
 * @param heightCm - Height for BMI when no BMI reading exists; 175 when unknown
 * @param bmr - Resolved yearly BMR, stamped on every record
 */
export function buildBodyMetrics(
  samples: SamplesByKind,
  heightCm: number | null,
  bmr: number
): BodyMetrics[] {
  const height = heightCm ?? DEFAULT_HEIGHT_CM;
  const readingsByDate = new Map<string, DayReadings>();

  const collect = (
    kind: HealthSampleKind,
    field: keyof DayReadings,
    convert: (sample: HealthSample) => number = (sample) => sample.value
  ): void => {
    for (const sample of samples[kind] ?? []) {
      const date = normalizeDate(sample.timestamp);
      const readings = readingsByDate.get(date) ?? {};
      readings[field] = convert(sample);
      readingsByDate.set(date, readings);
    }
  };

  collect('weight', 'weight');
  collect('body_fat_percentage', 'bodyFat');
  collect('lean_body_mass', 'leanMass');
  collect('body_mass_index', 'bmi');
  collect('waist_circumference', 'waist', (sample) => normalizeWaistCm(sample.value, sample.unit));

  const metrics: BodyMetrics[] = [];
  for (const [date, readings] of readingsByDate) {
    if (readings.weight === undefined) {
      continue;
    }

    const weight = readings.weight;
    const bodyFat = readings.bodyFat ?? 0;

    let leanBodyMass = 0;
    if (readings.leanMass !== undefined) {
      leanBodyMass = readings.leanMass;
    } else if (bodyFat > 0) {
      leanBodyMass = weight - weight * (bodyFat / 100);
    }

    const heightM = height / 100;
    const bmi = readings.bmi ?? weight / (heightM * heightM);

    const entry: BodyMetrics = {
      date,
      weight,
      bodyFat,
      skeletalMuscle: leanBodyMass > 0 ? leanBodyMass * SKELETAL_MUSCLE_RATIO : 0,
      bmi,
      bmr,
      height,
      leanBodyMass,
      source: 'healthkit',
    };
    if (readings.waist !== undefined) {
      entry.waistCircumference = readings.waist;
    }
    metrics.push(entry);
  }

  return metrics.sort(newestFirst);
}

// ============ Recovery Metrics ============

/**
 * Total sleep in hours from asleep intervals, counted in whole minutes.
 */
export function sleepHoursFrom(samples: HealthSample[]): number {
  let minutes = 0;
  for (const sample of samples) {
    if (sample.endTimestamp === undefined) {
      continue;
    }
    const durationMs = Date.parse(sample.endTimestamp) - Date.parse(sample.timestamp);
    if (durationMs > 0) {
      minutes += Math.floor(durationMs / 60000);
    }
  }
  return minutes / 60;
}

function mean(samples: HealthSample[]): number {
  if (samples.length === 0) {
    return 0;
  }
  return samples.reduce((sum, sample) => sum + sample.value, 0) / samples.length;
}

/**
 * A day's recovery metrics. Missing or zero aggregates fall back to
 * 7 h sleep, 35 ms HRV and 67 bpm resting HR.
 */
export function extractRecoveryMetrics(
  date: string,
  sleepSamples: HealthSample[],
  hrvSamples: HealthSample[],
  restingHrSamples: HealthSample[]
): RecoveryMetrics {
  const sleepHours = sleepHoursFrom(sleepSamples);
  const hrv = mean(hrvSamples);
  const restingHR = mean(restingHrSamples);

  return {
    date,
    sleepHours: sleepHours === 0 ? DEFAULT_SLEEP_HOURS : sleepHours,
    hrv: hrv === 0 ? DEFAULT_HRV_MS : hrv,
    restingHR: restingHR === 0 ? DEFAULT_RESTING_HR : restingHR,
  };
}
