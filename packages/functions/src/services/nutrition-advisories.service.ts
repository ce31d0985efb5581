/**
 * Nutrition Advisories Service
 *
 * Static meal-timing, dietary and food-source guidance, loaded once from
 * data/nutrition-advisories.json, plus a workout-anchored meal schedule.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { MealTimingRecommendations, NutritionTarget } from '../shared.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const stringListSchema = z.array(z.string().min(1)).min(1);

const advisoryDataSchema = z.object({
  mealTiming: z.object({
    workoutDay: z.record(z.string()),
    restDay: z.record(z.string()),
  }),
  dietaryRecommendations: z.object({
    muscleGain: stringListSchema,
    fatLoss: stringListSchema,
    maintenance: stringListSchema,
  }),
  proteinSources: stringListSchema,
  carbSources: z.object({
    fatLoss: stringListSchema,
    default: stringListSchema,
  }),
  fatSources: stringListSchema,
});

export type AdvisoryData = z.infer<typeof advisoryDataSchema>;

let cachedAdvisories: AdvisoryData | null = null;

/**
 * Load and validate the advisory data. Throws if the file is missing or malformed.
 */
export function loadAdvisories(): AdvisoryData {
  if (cachedAdvisories) {
    return cachedAdvisories;
  }
  const dataPath = resolve(__dirname, '../../data/nutrition-advisories.json');
  const raw: unknown = JSON.parse(readFileSync(dataPath, 'utf-8'));
  cachedAdvisories = advisoryDataSchema.parse(raw);
  return cachedAdvisories;
}

export function getMealTimingRecommendations(
  _goal: string,
  hasWorkoutToday = false
): MealTimingRecommendations {
  const { mealTiming } = loadAdvisories();
  return { ...(hasWorkoutToday ? mealTiming.workoutDay : mealTiming.restDay) };
}

export function getDietaryRecommendations(goal: string): string[] {
  const { dietaryRecommendations } = loadAdvisories();
  switch (goal.toLowerCase()) {
    case 'muscle_gain':
    case 'bulk':
      return [...dietaryRecommendations.muscleGain];
    case 'fat_loss':
    case 'cut':
      return [...dietaryRecommendations.fatLoss];
    default:
      return [...dietaryRecommendations.maintenance];
  }
}

export function getProteinSources(): string[] {
  return [...loadAdvisories().proteinSources];
}

/**
 * Carb sources; the lower-glycemic list applies only to `fat_loss` exactly.
 */
export function getCarbSources(goal: string): string[] {
  const { carbSources } = loadAdvisories();
  return [...(goal === 'fat_loss' ? carbSources.fatLoss : carbSources.default)];
}

export function getFatSources(): string[] {
  return [...loadAdvisories().fatSources];
}

// ============ Workout Meal Schedule ============

const MINUTES_PER_DAY = 24 * 60;
const EVENING_WORKOUT_HOUR = 17;

/**
 * Parse `HH:mm` (24h) into minutes after midnight, or null when malformed.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return hours * 60 + minutes;
}

/**
 * Render minutes after midnight as `h:mm AM/PM`, wrapping across midnight.
 */
export function formatTimeOfDay(minutesAfterMidnight: number): string {
  const wrapped = ((minutesAfterMidnight % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hour = Math.floor(wrapped / 60);
  const minute = wrapped % 60;
  const period = hour >= 12 ? 'PM' : 'AM';
  const displayHour = hour > 12 ? hour - 12 : hour === 0 ? 12 : hour;
  return `${displayHour}:${String(minute).padStart(2, '0')} ${period}`;
}

/**
 * Meals anchored to a workout start time (`HH:mm`).
 *
 * Pre-workout 90 minutes before with 25% of the day's carbs, a hydration
 * note for evening sessions, post-workout 45 minutes after with 30% of
 * carbs and 35% of protein.
 */
export function getWorkoutMealSchedule(
  workoutTime: string,
  target: NutritionTarget
): MealTimingRecommendations {
  const start = parseTimeOfDay(workoutTime);
  if (start === null) {
    throw new Error(`Invalid workout time: ${workoutTime}`);
  }

  const { carbs, protein } = target.macros;
  const schedule: MealTimingRecommendations = {
    pre_workout: `${formatTimeOfDay(start - 90)}: Pre-workout meal (${Math.round(carbs * 0.25)}g carbs, light protein)`,
  };

  if (Math.floor(start / 60) >= EVENING_WORKOUT_HOUR) {
    schedule['intra_workout'] = 'During workout: Stay hydrated, optional BCAAs';
  }

  schedule['post_workout'] = `${formatTimeOfDay(start + 45)}: Post-workout meal (${Math.round(carbs * 0.3)}g carbs, ${Math.round(protein * 0.35)}g protein)`;

  return schedule;
}
