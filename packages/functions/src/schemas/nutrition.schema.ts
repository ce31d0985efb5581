import { z } from 'zod';
import { ACTIVITY_LEVELS, NUTRITION_GOALS } from '../types/nutrition.js';

/**
 * Nutrition Schemas
 *
 * Zod validation schemas for nutrition target and recipe search inputs.
 */

export const nutritionGoalSchema = z.enum(NUTRITION_GOALS);

export const activityLevelSchema = z.enum(ACTIVITY_LEVELS);

const booleanQuerySchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

// --- Create Target Schema ---

/**
 * Body for POST /nutrition/targets.
 * `recoveryScore` applies the recovery-based calorie adjustment when present.
 */
export const createNutritionTargetSchema = z.object({
  goal: nutritionGoalSchema,
  activityLevel: activityLevelSchema.default('moderate'),
  isWorkoutDay: z.boolean().default(false),
  recoveryScore: z.number().min(0).max(100).optional(),
});

export type CreateNutritionTargetInput = z.infer<typeof createNutritionTargetSchema>;

// --- Workout Meal Query Schema ---

export const workoutMealQuerySchema = z.object({
  weightKg: z.coerce.number().positive().max(500).optional(),
});

export type WorkoutMealQueryInput = z.infer<typeof workoutMealQuerySchema>;

// --- Advice Query Schema ---

export const nutritionAdviceQuerySchema = z.object({
  goal: nutritionGoalSchema.default('maintenance'),
  hasWorkoutToday: booleanQuerySchema.default('false'),
});

export type NutritionAdviceQueryInput = z.infer<typeof nutritionAdviceQuerySchema>;

// --- Recipe Search Schema ---

export const recipeSearchRequestSchema = z.object({
  mealsPerDay: z.number().int().min(1).max(8).default(3),
  excludeIngredients: z.array(z.string().trim().min(1)).max(50).default([]),
  diet: z.string().trim().min(1).optional(),
  intolerances: z.array(z.string().trim().min(1)).max(20).optional(),
  maxReadyTime: z.number().int().positive().max(600).optional(),
  number: z.number().int().min(1).max(50).default(10),
});

export type RecipeSearchRequestInput = z.infer<typeof recipeSearchRequestSchema>;

// --- Meal Schedule Query Schema ---

export const mealScheduleQuerySchema = z.object({
  workoutTime: z
    .string()
    .regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'workoutTime must be HH:mm (24h)'),
});

export type MealScheduleQueryInput = z.infer<typeof mealScheduleQuerySchema>;
