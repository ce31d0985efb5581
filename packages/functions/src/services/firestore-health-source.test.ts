import { describe, it, expect, vi } from 'vitest';
import type { HealthSample } from '../shared.js';
import { FirestoreHealthSource } from './firestore-health-source.js';

describe('FirestoreHealthSource', () => {
  it('should read samples of one kind from the user collection', async () => {
    const samples: HealthSample[] = [
      { kind: 'resting_heart_rate', timestamp: '2026-03-10T06:00:00.000Z', value: 58 },
    ];
    const repository = { findByKind: vi.fn().mockResolvedValue(samples) };
    const source = new FirestoreHealthSource(repository);
    const range = {
      start: new Date('2026-03-10T00:00:00.000Z'),
      end: new Date('2026-03-11T00:00:00.000Z'),
    };

    const result = await source.fetchSamples('user-1', 'resting_heart_rate', range);

    expect(result).toEqual(samples);
    expect(repository.findByKind).toHaveBeenCalledWith('user-1', 'resting_heart_rate', range);
  });
});
