/**
 * Health Data Service
 *
 * The I/O boundary in front of the scoring engine. Every call into the
 * health source is wrapped in a Result so the calculators only receive
 * resolved values or an explicit error.
 */

import { info, warn } from 'firebase-functions/logger';
import type {
  BodyMetrics,
  DateRange,
  HarrisBenedictInputs,
  HealthDataError,
  HealthSample,
  HealthSampleKind,
  HealthSource,
  RecoveryMetrics,
  ResolvedBmr,
  Result,
  UserHealthProfile,
} from '../shared.js';
import { err, ok } from '../shared.js';
import type { UserPreferencesRepository } from '../repositories/user-preferences.repository.js';
import { BMR_AVERAGE_DAYS, LATEST_METRICS_DAYS } from '../config.js';
import {
  buildBodyMetrics,
  calculateAge,
  extractRecoveryMetrics,
  latestHeightCm,
  resolveYearlyBmr,
  type SamplesByKind,
} from './body-metrics-preprocessing.service.js';

const TAG = '[Health Data]';
const DAY_MS = 24 * 60 * 60 * 1000;
const HEIGHT_LOOKBACK_DAYS = 10 * 365;

const OPTIONAL_BODY_KINDS = [
  'body_fat_percentage',
  'lean_body_mass',
  'body_mass_index',
  'waist_circumference',
] as const satisfies readonly HealthSampleKind[];

type HealthResult<T> = Result<T, HealthDataError>;

/**
 * UTC day window `[date, date + 1 day)` for a YYYY-MM-DD string.
 */
export function dayRange(date: string): DateRange {
  const start = new Date(`${date}T00:00:00.000Z`);
  return { start, end: new Date(start.getTime() + DAY_MS) };
}

export function trailingRange(end: Date, days: number): DateRange {
  return { start: new Date(end.getTime() - days * DAY_MS), end };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HealthDataService {
  constructor(
    private readonly source: HealthSource,
    private readonly preferences: Pick<UserPreferencesRepository, 'getHealthProfile'>
  ) {}

  private async fetchKind(
    userId: string,
    kind: HealthSampleKind,
    range: DateRange
  ): Promise<HealthResult<HealthSample[]>> {
    try {
      return ok(await this.source.fetchSamples(userId, kind, range));
    } catch (error) {
      warn(`${TAG} health source failed`, { userId, kind, error: messageOf(error) });
      return err({ kind: 'unavailable', message: `Could not read ${kind}: ${messageOf(error)}` });
    }
  }

  /**
   * Sleep, HRV and resting HR for one calendar day, with fallbacks for missing readings.
   */
  async fetchRecoveryMetrics(userId: string, date: string): Promise<HealthResult<RecoveryMetrics>> {
    const range = dayRange(date);
    const [sleep, hrv, restingHr] = await Promise.all([
      this.fetchKind(userId, 'sleep_asleep', range),
      this.fetchKind(userId, 'heart_rate_variability_sdnn', range),
      this.fetchKind(userId, 'resting_heart_rate', range),
    ]);

    if (!sleep.ok) return sleep;
    if (!hrv.ok) return hrv;
    if (!restingHr.ok) return restingHr;

    return ok(extractRecoveryMetrics(date, sleep.value, hrv.value, restingHr.value));
  }

  /**
   * Recovery metrics for `days` calendar days ending at `endDate`, skipping unreadable days.
   */
  async fetchRecoveryHistory(
    userId: string,
    endDate: string,
    days: number
  ): Promise<RecoveryMetrics[]> {
    const end = dayRange(endDate).start.getTime();
    const dates = Array.from({ length: days }, (_, i) =>
      new Date(end - i * DAY_MS).toISOString().slice(0, 10)
    );
    const results = await Promise.all(dates.map((date) => this.fetchRecoveryMetrics(userId, date)));
    return results.flatMap((result) => (result.ok ? [result.value] : []));
  }

  /**
   * Stored profile with height backfilled from HealthKit and `age` derived from date of birth.
   */
  async fetchUserHealthProfile(
    userId: string,
    now: Date = new Date()
  ): Promise<HealthResult<UserHealthProfile>> {
    let profile: UserHealthProfile;
    try {
      profile = await this.preferences.getHealthProfile(userId);
    } catch (error) {
      warn(`${TAG} could not read profile`, { userId, error: messageOf(error) });
      return err({ kind: 'unavailable', message: `Could not read profile: ${messageOf(error)}` });
    }

    if (profile.heightCm === undefined) {
      const heights = await this.fetchKind(userId, 'height', trailingRange(now, HEIGHT_LOOKBACK_DAYS));
      const heightCm = heights.ok ? latestHeightCm(heights.value) : null;
      if (heightCm !== null) {
        profile.heightCm = heightCm;
      }
    }

    if (profile.dateOfBirth !== undefined) {
      profile.age = calculateAge(profile.dateOfBirth, now);
    }

    return ok(profile);
  }

  /**
   * Yearly average BMR with the Harris-Benedict and default fallbacks.
   * An unreadable basal energy history is treated as empty.
   */
  async fetchYearlyAverageBmr(
    userId: string,
    now: Date = new Date()
  ): Promise<HealthResult<ResolvedBmr>> {
    const [basal, weights, profileResult] = await Promise.all([
      this.fetchKind(userId, 'basal_energy_burned', trailingRange(now, BMR_AVERAGE_DAYS)),
      this.fetchKind(userId, 'weight', trailingRange(now, LATEST_METRICS_DAYS)),
      this.fetchUserHealthProfile(userId, now),
    ]);

    const profile: UserHealthProfile = profileResult.ok ? profileResult.value : {};
    const latestWeight = weights.ok ? weights.value[weights.value.length - 1] : undefined;

    const inputs: HarrisBenedictInputs = {
      weightKg: latestWeight?.value ?? null,
      heightCm: profile.heightCm ?? null,
      age: profile.age ?? null,
      sex: profile.biologicalSex ?? null,
    };

    const resolved = resolveYearlyBmr(basal.ok ? basal.value : [], inputs);
    info(`${TAG} resolved BMR`, { userId, bmr: resolved.bmr, source: resolved.source });
    return ok(resolved);
  }

  /**
   * Body metrics for a range, one per day with a weight reading, newest first.
   *
   * @param bmr - Yearly BMR to stamp on every record; resolved here when omitted
   */
  async fetchBodyMetrics(
    userId: string,
    range: DateRange,
    bmr?: number
  ): Promise<HealthResult<BodyMetrics[]>> {
    const weights = await this.fetchKind(userId, 'weight', range);
    if (!weights.ok) {
      return weights;
    }

    const samples: SamplesByKind = { weight: weights.value };
    const optional = await Promise.all(
      OPTIONAL_BODY_KINDS.map(async (kind) => [kind, await this.fetchKind(userId, kind, range)] as const)
    );
    for (const [kind, result] of optional) {
      // Optional readings degrade to absent
      samples[kind] = result.ok ? result.value : [];
    }

    const profileResult = await this.fetchUserHealthProfile(userId, range.end);
    const heightCm = profileResult.ok ? profileResult.value.heightCm ?? null : null;

    let resolvedBmr = bmr;
    if (resolvedBmr === undefined) {
      const bmrResult = await this.fetchYearlyAverageBmr(userId, range.end);
      if (!bmrResult.ok) {
        return bmrResult;
      }
      resolvedBmr = bmrResult.value.bmr;
    }

    return ok(buildBodyMetrics(samples, heightCm, resolvedBmr));
  }

  /**
   * Most recent body metrics from the last 30 days.
   */
  async fetchLatestBodyMetrics(
    userId: string,
    now: Date = new Date()
  ): Promise<HealthResult<BodyMetrics>> {
    const result = await this.fetchBodyMetrics(userId, trailingRange(now, LATEST_METRICS_DAYS));
    if (!result.ok) {
      return result;
    }
    const latest = result.value[0];
    if (!latest) {
      return err({ kind: 'missing_data', message: 'No body metrics in the last 30 days' });
    }
    return ok(latest);
  }

  /**
   * Total active energy burned on a calendar day, in kcal.
   */
  async fetchActiveCalories(userId: string, date: string): Promise<HealthResult<number>> {
    const result = await this.fetchKind(userId, 'active_energy_burned', dayRange(date));
    if (!result.ok) {
      return result;
    }
    if (result.value.length === 0) {
      return err({ kind: 'missing_data', message: `No active energy readings for ${date}` });
    }
    return ok(result.value.reduce((sum, sample) => sum + sample.value, 0));
  }
}
