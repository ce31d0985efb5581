/**
 * HealthSource backed by the samples the mobile client pushes to
 * `users/{userId}/healthSamples`.
 */

import type { DateRange, HealthSample, HealthSampleKind, HealthSource } from '../shared.js';
import type { HealthSampleRepository } from '../repositories/health-sample.repository.js';

export class FirestoreHealthSource implements HealthSource {
  constructor(private readonly samples: Pick<HealthSampleRepository, 'findByKind'>) {}

  async fetchSamples(
    userId: string,
    kind: HealthSampleKind,
    range: DateRange
  ): Promise<HealthSample[]> {
    return this.samples.findByKind(userId, kind, range);
  }
}
