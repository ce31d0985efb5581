import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Firestore } from 'firebase-admin/firestore';
import type { HealthSample } from '../shared.js';
import {
  createMockQuerySnapshot,
  createUserScopedFirestoreMocks,
  type UserScopedFirestoreMocks,
} from '../test-utils/index.js';

vi.mock('../firebase.js', () => ({
  getFirestoreDb: vi.fn(),
  getCollectionName: vi.fn((name: string) => `test_${name}`),
}));

import { HealthSampleRepository } from './health-sample.repository.js';

describe('HealthSampleRepository', () => {
  let mocks: UserScopedFirestoreMocks;
  let repository: HealthSampleRepository;

  beforeEach(() => {
    mocks = createUserScopedFirestoreMocks();
    repository = new HealthSampleRepository(mocks.mockDb as Firestore);
  });

  describe('docId', () => {
    it('should key a reading by kind and timestamp', () => {
      expect(
        HealthSampleRepository.docId({ kind: 'weight', timestamp: '2026-03-10T07:00:00.000Z' })
      ).toBe('weight_2026-03-10T07:00:00.000Z');
    });

    it('should key offset timestamps by their UTC instant', () => {
      expect(
        HealthSampleRepository.docId({ kind: 'weight', timestamp: '2026-03-10T07:00:00-05:00' })
      ).toBe('weight_2026-03-10T12:00:00.000Z');
      expect(
        HealthSampleRepository.docId({ kind: 'weight', timestamp: '2026-03-10T12:00:00Z' })
      ).toBe('weight_2026-03-10T12:00:00.000Z');
    });
  });

  describe('addSamples', () => {
    it('should batch-write readings with a UTC recordedAt', async () => {
      const samples: HealthSample[] = [
        { kind: 'weight', timestamp: '2026-03-10T07:00:00-05:00', value: 79 },
        {
          kind: 'sleep_asleep',
          timestamp: '2026-03-09T23:00:00.000Z',
          endTimestamp: '2026-03-10T06:30:00.000Z',
          value: 0,
        },
        { kind: 'height', timestamp: '2026-03-01T08:00:00.000Z', value: 1.8, unit: 'm' },
      ];

      const count = await repository.addSamples('user-1', samples);

      expect(count).toBe(3);
      expect(mocks.mockUserDoc.collection).toHaveBeenCalledWith('healthSamples');
      expect(mocks.mockCollection.doc).toHaveBeenCalledWith('weight_2026-03-10T12:00:00.000Z');
      expect(mocks.mockBatchSet).toHaveBeenCalledTimes(3);
      expect(mocks.mockBatchSet).toHaveBeenNthCalledWith(1, mocks.mockDocRef, {
        kind: 'weight',
        timestamp: '2026-03-10T07:00:00-05:00',
        recordedAt: '2026-03-10T12:00:00.000Z',
        value: 79,
        syncedAt: expect.any(String),
      });
      expect(mocks.mockBatchSet).toHaveBeenNthCalledWith(
        2,
        mocks.mockDocRef,
        expect.objectContaining({ endTimestamp: '2026-03-10T06:30:00.000Z' })
      );
      expect(mocks.mockBatchSet).toHaveBeenNthCalledWith(
        3,
        mocks.mockDocRef,
        expect.objectContaining({ unit: 'm' })
      );
      expect(mocks.mockBatchCommit).toHaveBeenCalledTimes(1);
    });

    it('should split large uploads into batches of 500', async () => {
      const samples: HealthSample[] = Array.from({ length: 501 }, (_, i) => ({
        kind: 'active_energy_burned',
        timestamp: new Date(Date.UTC(2026, 2, 10, 0, i)).toISOString(),
        value: 1,
      }));

      const count = await repository.addSamples('user-1', samples);

      expect(count).toBe(501);
      expect(mocks.mockDb.batch).toHaveBeenCalledTimes(2);
      expect(mocks.mockBatchCommit).toHaveBeenCalledTimes(2);
    });

    it('should not commit an empty upload', async () => {
      expect(await repository.addSamples('user-1', [])).toBe(0);
      expect(mocks.mockBatchCommit).not.toHaveBeenCalled();
    });
  });

  describe('findByKind', () => {
    it('should query one kind in a half-open range', async () => {
      mocks.mockQueryChain.get.mockResolvedValue(
        createMockQuerySnapshot([
          {
            id: 'weight_2026-03-10T07:00:00.000Z',
            data: { kind: 'weight', timestamp: '2026-03-10T07:00:00.000Z', value: 79 },
          },
          { id: 'broken', data: { kind: 'weight', value: 'heavy' } },
        ])
      );

      const result = await repository.findByKind('user-1', 'weight', {
        start: new Date('2026-03-10T00:00:00.000Z'),
        end: new Date('2026-03-11T00:00:00.000Z'),
      });

      expect(result).toEqual([
        { kind: 'weight', timestamp: '2026-03-10T07:00:00.000Z', value: 79 },
      ]);
      expect(mocks.mockQueryChain.where).toHaveBeenNthCalledWith(1, 'kind', '==', 'weight');
      expect(mocks.mockQueryChain.where).toHaveBeenNthCalledWith(
        2,
        'recordedAt',
        '>=',
        '2026-03-10T00:00:00.000Z'
      );
      expect(mocks.mockQueryChain.where).toHaveBeenNthCalledWith(
        3,
        'recordedAt',
        '<',
        '2026-03-11T00:00:00.000Z'
      );
      expect(mocks.mockQueryChain.orderBy).toHaveBeenCalledWith('recordedAt', 'asc');
    });
  });
});
