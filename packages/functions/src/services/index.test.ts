import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Firestore } from 'firebase-admin/firestore';
import { createUserScopedFirestoreMocks } from '../test-utils/index.js';
import { BodyMetricsRepository } from '../repositories/index.js';

const mockDb = vi.hoisted(() => ({ current: {} }));

vi.mock('../firebase.js', () => ({
  getFirestoreDb: vi.fn(() => mockDb.current),
  getCollectionName: vi.fn((name: string) => `test_${name}`),
}));

import {
  createServices,
  getHealthDataService,
  getHealthSyncService,
  getRecoveryReportService,
  getRepositories,
  HealthDataService,
  HealthSyncService,
  RecoveryReportService,
  resetServices,
} from './index.js';

describe('service registry', () => {
  beforeEach(() => {
    mockDb.current = createUserScopedFirestoreMocks().mockDb;
    resetServices();
  });

  it('should reuse the repositories until reset', () => {
    const first = getRepositories();

    expect(getRepositories()).toBe(first);
    resetServices();
    expect(getRepositories()).not.toBe(first);
  });

  it('should build each service once', () => {
    const healthData = getHealthDataService();
    const healthSync = getHealthSyncService();
    const recoveryReport = getRecoveryReportService();

    expect(healthData).toBeInstanceOf(HealthDataService);
    expect(getHealthDataService()).toBe(healthData);
    expect(healthSync).toBeInstanceOf(HealthSyncService);
    expect(getHealthSyncService()).toBe(healthSync);
    expect(recoveryReport).toBeInstanceOf(RecoveryReportService);
    expect(getRecoveryReportService()).toBe(recoveryReport);
  });

  it('should wire a separate set of services for a given database', () => {
    const { mockDb: db } = createUserScopedFirestoreMocks();

    const services = createServices(db as Firestore);

    expect(services.repositories.bodyMetrics).toBeInstanceOf(BodyMetricsRepository);
    expect(services.repositories).not.toBe(getRepositories());
    expect(services.healthSync).toBeInstanceOf(HealthSyncService);
    expect(services.recoveryReport).toBeInstanceOf(RecoveryReportService);
  });
});
