/**
 * Single import point for the types and schemas shared across handlers,
 * services and repositories.
 */

export type * from './types/api.js';
export type * from './types/body-metrics.js';
export type * from './types/recovery.js';
export type { Result, HealthDataError, HealthDataErrorKind } from './types/result.js';
export { HEALTH_SAMPLE_KINDS } from './types/health-sample.js';
export type {
  HealthSampleKind,
  HealthSample,
  HealthSource,
  DateRange,
  LengthUnit,
} from './types/health-sample.js';
export { NUTRITION_GOALS, ACTIVITY_LEVELS } from './types/nutrition.js';
export type {
  NutritionGoal,
  ActivityLevel,
  Macros,
  MacroPercentages,
  NutritionTarget,
  MealTimingRecommendations,
  MealSearchConstraints,
  RecipeMeal,
} from './types/nutrition.js';
export { ok, err } from './types/result.js';
export * from './schemas/index.js';
