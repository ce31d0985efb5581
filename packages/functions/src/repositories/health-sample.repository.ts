import type { Firestore } from 'firebase-admin/firestore';
import type { DateRange, HealthSample, HealthSampleKind } from '../shared.js';
import { HEALTH_SAMPLE_KINDS } from '../shared.js';
import { UserScopedRepository } from './base.repository.js';
import { readEnum, readNumber, readString } from './firestore-type-guards.js';

// Firestore caps a write batch at 500 operations
const BATCH_LIMIT = 500;

/**
 * Raw HealthKit readings: `users/{userId}/healthSamples/{kind}_{recordedAt}`.
 * Re-sending a reading overwrites it instead of duplicating it, whatever
 * offset the client wrote its timestamp in.
 */
export class HealthSampleRepository extends UserScopedRepository<HealthSample> {
  constructor(db?: Firestore) {
    super('healthSamples', db);
  }

  static docId(sample: Pick<HealthSample, 'kind' | 'timestamp'>): string {
    return `${sample.kind}_${new Date(sample.timestamp).toISOString()}`;
  }

  async addSamples(userId: string, samples: HealthSample[]): Promise<number> {
    const syncedAt = new Date().toISOString();

    for (let offset = 0; offset < samples.length; offset += BATCH_LIMIT) {
      const batch = this.db.batch();
      for (const sample of samples.slice(offset, offset + BATCH_LIMIT)) {
        const docRef = this.collection(userId).doc(HealthSampleRepository.docId(sample));
        const data: Record<string, unknown> = {
          kind: sample.kind,
          timestamp: sample.timestamp,
          recordedAt: new Date(sample.timestamp).toISOString(),
          value: sample.value,
          syncedAt,
        };
        if (sample.endTimestamp !== undefined) data['endTimestamp'] = sample.endTimestamp;
        if (sample.unit !== undefined) data['unit'] = sample.unit;
        batch.set(docRef, data);
      }
      await batch.commit();
    }

    return samples.length;
  }

  /**
   * Readings of one kind recorded in `[range.start, range.end)`, oldest first.
   */
  async findByKind(
    userId: string,
    kind: HealthSampleKind,
    range: DateRange
  ): Promise<HealthSample[]> {
    const snapshot = await this.collection(userId)
      .where('kind', '==', kind)
      .where('recordedAt', '>=', range.start.toISOString())
      .where('recordedAt', '<', range.end.toISOString())
      .orderBy('recordedAt', 'asc')
      .get();
    return this.docsToEntities(snapshot.docs);
  }

  protected parseEntity(_id: string, data: Record<string, unknown>): HealthSample | null {
    const kind = readEnum(data, 'kind', HEALTH_SAMPLE_KINDS);
    const timestamp = readString(data, 'timestamp');
    const value = readNumber(data, 'value');
    if (kind === null || timestamp === null || value === null) {
      return null;
    }

    const sample: HealthSample = { kind, timestamp, value };
    const endTimestamp = readString(data, 'endTimestamp');
    const unit = readEnum(data, 'unit', ['m', 'cm'] as const);
    if (endTimestamp !== null) sample.endTimestamp = endTimestamp;
    if (unit !== null) sample.unit = unit;
    return sample;
  }
}
