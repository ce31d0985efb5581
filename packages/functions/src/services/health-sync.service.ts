/**
 * Health Sync Service
 *
 * Pulls body metrics through the health-data boundary and stores one
 * record per day. New days are inserted. A stored day is rewritten when its
 * BMR changed or the fetched record is more complete; a forced sync rewrites
 * the last week regardless.
 */

import { info } from 'firebase-functions/logger';
import type { BodyMetricsSyncResult, DateRange, HealthSample } from '../shared.js';
import type { BodyMetricsRepository } from '../repositories/body-metrics.repository.js';
import type { HealthSampleRepository } from '../repositories/health-sample.repository.js';
import { UpstreamError } from '../types/errors.js';
import type { HealthDataService } from './health-data.service.js';
import {
  completenessScore,
  deduplicateBodyMetrics,
  normalizeDate,
} from './body-metrics-preprocessing.service.js';

const TAG = '[Health Sync]';
const DAY_MS = 24 * 60 * 60 * 1000;
export const FORCE_SYNC_DAYS = 7;

export interface SyncBodyMetricsOptions {
  /** Rewrite every stored day in the range. */
  overwrite?: boolean;
}

export class HealthSyncService {
  constructor(
    private readonly healthData: Pick<HealthDataService, 'fetchYearlyAverageBmr' | 'fetchBodyMetrics'>,
    private readonly bodyMetrics: Pick<BodyMetricsRepository, 'findLatest' | 'findRange' | 'upsert'>,
    private readonly healthSamples: Pick<HealthSampleRepository, 'addSamples'>
  ) {}

  /**
   * Store raw readings pushed by the client.
   */
  async ingestSamples(userId: string, samples: HealthSample[]): Promise<number> {
    const stored = await this.healthSamples.addSamples(userId, samples);
    info(`${TAG} samples stored`, { userId, count: stored });
    return stored;
  }

  /**
   * Sync body metrics for a range.
   *
   * @throws UpstreamError when the health source cannot be read
   */
  async syncBodyMetrics(
    userId: string,
    range: DateRange,
    options: SyncBodyMetricsOptions = {}
  ): Promise<BodyMetricsSyncResult> {
    const overwrite = options.overwrite ?? false;
    const start = Date.now();

    const bmrResult = await this.healthData.fetchYearlyAverageBmr(userId, range.end);
    if (!bmrResult.ok) {
      throw new UpstreamError('HEALTH_SOURCE_UNAVAILABLE', bmrResult.error.message, 503);
    }
    const bmr = bmrResult.value;

    const fetched = await this.healthData.fetchBodyMetrics(userId, range, bmr.bmr);
    if (!fetched.ok) {
      throw new UpstreamError('HEALTH_SOURCE_UNAVAILABLE', fetched.error.message, 503);
    }

    const deduplicated = deduplicateBodyMetrics(fetched.value);
    const existing = await this.bodyMetrics.findRange(
      userId,
      normalizeDate(range.start),
      normalizeDate(range.end)
    );
    const existingByDate = new Map(existing.map((entry) => [entry.date, entry]));

    let saved = 0;
    let updated = 0;
    for (const metrics of deduplicated) {
      const stored = existingByDate.get(metrics.date);
      if (!stored) {
        await this.bodyMetrics.upsert(userId, metrics);
        saved++;
      } else if (
        overwrite ||
        stored.bmr !== metrics.bmr ||
        completenessScore(metrics) > completenessScore(stored)
      ) {
        await this.bodyMetrics.upsert(userId, metrics);
        updated++;
      }
    }

    const result: BodyMetricsSyncResult = {
      fetched: fetched.value.length,
      deduplicated: deduplicated.length,
      saved,
      updated,
      bmr,
    };
    info(`${TAG} body metrics synced`, {
      userId,
      ...result,
      overwrite,
      elapsedMs: Date.now() - start,
    });
    return result;
  }

  /**
   * Sync from the latest stored day, or `lookbackDays` back when nothing is stored yet.
   */
  async syncNewBodyMetrics(
    userId: string,
    lookbackDays: number,
    now: Date = new Date()
  ): Promise<BodyMetricsSyncResult> {
    const latest = await this.bodyMetrics.findLatest(userId);
    const start = latest
      ? new Date(`${latest.date}T00:00:00.000Z`)
      : new Date(now.getTime() - lookbackDays * DAY_MS);
    return this.syncBodyMetrics(userId, { start, end: now });
  }

  /**
   * Re-sync the last week and overwrite whatever is stored for those days.
   */
  async forceSyncBodyMetrics(
    userId: string,
    now: Date = new Date()
  ): Promise<BodyMetricsSyncResult> {
    const start = new Date(now.getTime() - FORCE_SYNC_DAYS * DAY_MS);
    return this.syncBodyMetrics(userId, { start, end: now }, { overwrite: true });
  }
}
