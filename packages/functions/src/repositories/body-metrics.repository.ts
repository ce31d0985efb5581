import type { Firestore } from 'firebase-admin/firestore';
import type { BodyMetrics, StoredBodyMetrics } from '../shared.js';
import { UserScopedRepository } from './base.repository.js';
import {
  readEnum,
  readNumber,
  readOptionalNumber,
  readString,
} from './firestore-type-guards.js';

/**
 * Body metrics keyed by calendar day: `users/{userId}/bodyMetrics/{YYYY-MM-DD}`.
 * Writing the same day twice replaces the earlier record.
 */
export class BodyMetricsRepository extends UserScopedRepository<StoredBodyMetrics> {
  constructor(db?: Firestore) {
    super('bodyMetrics', db);
  }

  async upsert(userId: string, metrics: BodyMetrics): Promise<StoredBodyMetrics> {
    const stored: StoredBodyMetrics = {
      date: metrics.date,
      weight: metrics.weight,
      bodyFat: metrics.bodyFat,
      skeletalMuscle: metrics.skeletalMuscle,
      bmi: metrics.bmi,
      bmr: metrics.bmr,
      source: metrics.source,
      syncedAt: new Date().toISOString(),
    };
    // Firestore rejects undefined fields
    if (metrics.height !== undefined) stored.height = metrics.height;
    if (metrics.leanBodyMass !== undefined) stored.leanBodyMass = metrics.leanBodyMass;
    if (metrics.waistCircumference !== undefined) {
      stored.waistCircumference = metrics.waistCircumference;
    }

    await this.collection(userId).doc(metrics.date).set(stored);
    return stored;
  }

  async findByDate(userId: string, date: string): Promise<StoredBodyMetrics | null> {
    return this.findById(userId, date);
  }

  async findLatest(userId: string): Promise<StoredBodyMetrics | null> {
    const snapshot = await this.collection(userId).orderBy('date', 'desc').limit(1).get();
    const doc = snapshot.docs[0];
    if (!doc) {
      return null;
    }
    return this.docToEntity(doc);
  }

  /**
   * Records with `start <= date <= end`, newest first.
   */
  async findRange(userId: string, start: string, end: string): Promise<StoredBodyMetrics[]> {
    const snapshot = await this.collection(userId)
      .where('date', '>=', start)
      .where('date', '<=', end)
      .orderBy('date', 'desc')
      .get();
    return this.docsToEntities(snapshot.docs);
  }

  protected parseEntity(id: string, data: Record<string, unknown>): StoredBodyMetrics | null {
    const weight = readNumber(data, 'weight');
    if (weight === null) {
      return null;
    }

    const metrics: StoredBodyMetrics = {
      date: readString(data, 'date') ?? id,
      weight,
      bodyFat: readNumber(data, 'bodyFat') ?? 0,
      skeletalMuscle: readNumber(data, 'skeletalMuscle') ?? 0,
      bmi: readNumber(data, 'bmi') ?? 0,
      bmr: readNumber(data, 'bmr') ?? 0,
      source: readEnum(data, 'source', ['healthkit', 'manual'] as const) ?? 'healthkit',
      syncedAt: readString(data, 'syncedAt') ?? '',
    };

    const height = readOptionalNumber(data, 'height');
    const leanBodyMass = readOptionalNumber(data, 'leanBodyMass');
    const waistCircumference = readOptionalNumber(data, 'waistCircumference');
    if (height !== undefined) metrics.height = height;
    if (leanBodyMass !== undefined) metrics.leanBodyMass = leanBodyMass;
    if (waistCircumference !== undefined) metrics.waistCircumference = waistCircumference;

    return metrics;
  }
}
