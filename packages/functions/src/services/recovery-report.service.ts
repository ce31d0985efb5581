/**
 * Recovery Report Service
 *
 * Gathers a day's recovery metrics and weight baseline, then runs the
 * recovery scorer over them.
 */

import { info, warn } from 'firebase-functions/logger';
import type { RecoveryMetrics, RecoveryReport } from '../shared.js';
import type { BodyMetricsRepository } from '../repositories/body-metrics.repository.js';
import { RECOVERY_BASELINE_DAYS } from '../config.js';
import type { HealthDataService } from './health-data.service.js';
import {
  calculateAverageHrv,
  calculateAverageWeight,
  calculateRecoveryScore,
  getRecoveryInsights,
  getWorkoutRecommendation,
  getWorkoutWarningMessage,
  shouldWarnBeforeWorkout,
} from './recovery-scoring.service.js';

const TAG = '[Recovery]';
const DAY_MS = 24 * 60 * 60 * 1000;

export function todayDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function shiftDate(date: string, days: number): string {
  const time = new Date(`${date}T00:00:00.000Z`).getTime();
  return new Date(time + days * DAY_MS).toISOString().slice(0, 10);
}

export class RecoveryReportService {
  constructor(
    private readonly healthData: Pick<HealthDataService, 'fetchRecoveryMetrics' | 'fetchRecoveryHistory'>,
    private readonly bodyMetrics: Pick<BodyMetricsRepository, 'findRange'>
  ) {}

  async buildReport(userId: string, date: string): Promise<RecoveryReport> {
    const start = Date.now();

    const [metricsResult, recent] = await Promise.all([
      this.healthData.fetchRecoveryMetrics(userId, date),
      this.bodyMetrics.findRange(userId, shiftDate(date, -RECOVERY_BASELINE_DAYS), date),
    ]);
    // Newest first, so this is the latest weigh-in on or before the scored day
    const latest = recent[0] ?? null;

    let metrics: RecoveryMetrics | null = null;
    if (metricsResult.ok) {
      metrics = metricsResult.value;
    } else {
      warn(`${TAG} recovery metrics unavailable, scoring without them`, {
        userId,
        date,
        kind: metricsResult.error.kind,
        message: metricsResult.error.message,
      });
    }

    const averageWeightKg = calculateAverageWeight(recent);

    let averageHrvMs: number | null = null;
    if (metrics && recent.length > 0) {
      const history = await this.healthData.fetchRecoveryHistory(userId, date, RECOVERY_BASELINE_DAYS);
      averageHrvMs = calculateAverageHrv(history);
    }

    const score = calculateRecoveryScore(date, metrics, latest, averageWeightKg);

    info(`${TAG} score calculated`, {
      userId,
      date,
      score,
      hasMetrics: metrics !== null,
      averageWeightKg,
      averageHrvMs,
      elapsedMs: Date.now() - start,
    });

    return {
      date,
      score,
      recommendation: getWorkoutRecommendation(score),
      shouldWarn: shouldWarnBeforeWorkout(score),
      warningMessage: getWorkoutWarningMessage(score),
      metrics,
      insights: getRecoveryInsights(score, metrics, averageHrvMs),
      averageWeightKg,
      averageHrvMs,
    };
  }
}
