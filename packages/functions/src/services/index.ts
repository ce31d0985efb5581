import type { Firestore } from 'firebase-admin/firestore';
import { getFirestoreDb } from '../firebase.js';
import { createRepositories, type Repositories } from '../repositories/index.js';
import { FirestoreHealthSource } from './firestore-health-source.js';
import { HealthDataService } from './health-data.service.js';
import { HealthSyncService } from './health-sync.service.js';
import { RecoveryReportService } from './recovery-report.service.js';

export { FirestoreHealthSource } from './firestore-health-source.js';
export { HealthDataService } from './health-data.service.js';
export { HealthSyncService } from './health-sync.service.js';
export { RecoveryReportService } from './recovery-report.service.js';

// Singleton instances for use with the default database
let repositories: Repositories | null = null;
let healthDataService: HealthDataService | null = null;
let healthSyncService: HealthSyncService | null = null;
let recoveryReportService: RecoveryReportService | null = null;

// Reset all service singletons (for testing)
export function resetServices(): void {
  repositories = null;
  healthDataService = null;
  healthSyncService = null;
  recoveryReportService = null;
}

export function getRepositories(): Repositories {
  if (!repositories) {
    repositories = createRepositories(getFirestoreDb());
  }
  return repositories;
}

export function getHealthDataService(): HealthDataService {
  if (!healthDataService) {
    const repos = getRepositories();
    healthDataService = new HealthDataService(
      new FirestoreHealthSource(repos.healthSamples),
      repos.userPreferences
    );
  }
  return healthDataService;
}

export function getHealthSyncService(): HealthSyncService {
  if (!healthSyncService) {
    const repos = getRepositories();
    healthSyncService = new HealthSyncService(
      getHealthDataService(),
      repos.bodyMetrics,
      repos.healthSamples
    );
  }
  return healthSyncService;
}

export function getRecoveryReportService(): RecoveryReportService {
  if (!recoveryReportService) {
    recoveryReportService = new RecoveryReportService(
      getHealthDataService(),
      getRepositories().bodyMetrics
    );
  }
  return recoveryReportService;
}

// Helper to create services with a custom database (useful for testing)
export function createServices(db: Firestore): {
  repositories: Repositories;
  healthData: HealthDataService;
  healthSync: HealthSyncService;
  recoveryReport: RecoveryReportService;
} {
  const repos = createRepositories(db);
  const healthData = new HealthDataService(
    new FirestoreHealthSource(repos.healthSamples),
    repos.userPreferences
  );
  return {
    repositories: repos,
    healthData,
    healthSync: new HealthSyncService(healthData, repos.bodyMetrics, repos.healthSamples),
    recoveryReport: new RecoveryReportService(healthData, repos.bodyMetrics),
  };
}
