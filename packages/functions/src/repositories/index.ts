import type { Firestore } from 'firebase-admin/firestore';
import { BodyMetricsRepository } from './body-metrics.repository.js';
import { NutritionTargetRepository } from './nutrition-target.repository.js';
import { UserPreferencesRepository } from './user-preferences.repository.js';
import { HealthSampleRepository } from './health-sample.repository.js';

export { UserScopedRepository } from './base.repository.js';
export { BodyMetricsRepository } from './body-metrics.repository.js';
export { NutritionTargetRepository } from './nutrition-target.repository.js';
export { UserPreferencesRepository, type UserPreferences } from './user-preferences.repository.js';
export { HealthSampleRepository } from './health-sample.repository.js';

export interface Repositories {
  bodyMetrics: BodyMetricsRepository;
  nutritionTargets: NutritionTargetRepository;
  userPreferences: UserPreferencesRepository;
  healthSamples: HealthSampleRepository;
}

export function createRepositories(db: Firestore): Repositories {
  return {
    bodyMetrics: new BodyMetricsRepository(db),
    nutritionTargets: new NutritionTargetRepository(db),
    userPreferences: new UserPreferencesRepository(db),
    healthSamples: new HealthSampleRepository(db),
  };
}
