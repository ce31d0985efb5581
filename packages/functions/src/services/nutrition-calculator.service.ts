/**
 * Nutrition Calculator Service
 *
 * BMR-based daily calorie and macro targets.
 *
 * - Maintenance calories: BMR × activity factor
 * - Goal adjustment: +400 (muscle gain) / −400 (fat loss)
 * - Protein is set per kg of bodyweight; the remaining calories are split
 *   between carbs and fats by goal
 *
 * Goal and activity level are matched case-insensitively and accept the
 * aliases listed below; anything unrecognized falls back to maintenance
 * and moderate activity.
 */

import { randomUUID } from 'node:crypto';
import type { BodyMetrics, MacroPercentages, Macros, NutritionTarget } from '../shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const WORKOUT_MEAL_WINDOW_MS = 2 * 60 * 60 * 1000;

export const MIN_PROTEIN_PER_KG = 1.6;
export const MIN_DAILY_CALORIES = 1200;

type GoalCategory = 'muscle_gain' | 'fat_loss' | 'maintenance';

interface MacroProfile {
  proteinPerKg: number;
  carbShare: number;
  fatShare: number;
}

const MACRO_PROFILES: Record<GoalCategory, MacroProfile> = {
  muscle_gain: { proteinPerKg: 2.2, carbShare: 0.6, fatShare: 0.4 },
  fat_loss: { proteinPerKg: 2.4, carbShare: 0.4, fatShare: 0.6 },
  maintenance: { proteinPerKg: 2.0, carbShare: 0.55, fatShare: 0.45 },
};

const GOAL_CALORIE_ADJUSTMENT: Record<GoalCategory, number> = {
  muscle_gain: 400,
  fat_loss: -400,
  maintenance: 0,
};

function categorizeGoal(goal: string): GoalCategory {
  switch (goal.toLowerCase()) {
    case 'muscle_gain':
    case 'bulk':
      return 'muscle_gain';
    case 'fat_loss':
    case 'cut':
      return 'fat_loss';
    default:
      return 'maintenance';
  }
}

/**
 * Activity multiplier applied to BMR.
 *
 * - Sedentary (little/no exercise): 1.2
 * - Lightly active (1-3 days/week): 1.375
 * - Moderately active (3-5 days/week): 1.55
 * - Very active (6-7 days/week): 1.725
 * - Athlete (2x/day training): 1.9
 */
export function getActivityFactor(activityLevel: string): number {
  switch (activityLevel.toLowerCase()) {
    case 'sedentary':
      return 1.2;
    case 'light':
    case 'lightly_active':
      return 1.375;
    case 'moderate':
    case 'moderately_active':
      return 1.55;
    case 'very_active':
    case 'very':
      return 1.725;
    case 'athlete':
    case 'extremely_active':
      return 1.9;
    default:
      return 1.55;
  }
}

// ============ Macros ============

/**
 * Total calories by the 4-4-9 rule.
 */
export function totalCalories(macros: Macros): number {
  return Math.round(macros.protein * 4 + macros.carbs * 4 + macros.fats * 9);
}

export function macroPercentages(macros: Macros): MacroPercentages {
  const total = totalCalories(macros);
  if (total === 0) {
    return { protein: 0, carbs: 0, fats: 0 };
  }
  return {
    protein: ((macros.protein * 4) / total) * 100,
    carbs: ((macros.carbs * 4) / total) * 100,
    fats: ((macros.fats * 9) / total) * 100,
  };
}

function roundMacros(protein: number, carbs: number, fats: number): Macros {
  return {
    protein: Math.round(protein),
    carbs: Math.round(carbs),
    fats: Math.round(fats),
  };
}

// ============ Daily Targets ============

/**
 * Daily calorie target.
 *
 * Workout days add 100 kcal unless the goal is exactly `fat_loss`.
 */
export function calculateDailyCalories(
  bmr: number,
  goal: string,
  activityLevel: string,
  isWorkoutDay = false
): number {
  const maintenance = bmr * getActivityFactor(activityLevel);
  let target = maintenance + GOAL_CALORIE_ADJUSTMENT[categorizeGoal(goal)];

  if (isWorkoutDay && goal !== 'fat_loss') {
    target += 100;
  }

  return Math.round(target);
}

/**
 * Split a calorie target into macros.
 *
 * Workout days cycle carbs: +30 g carbs and −10 g fats after the split.
 * The target is valid for 24 hours; `userId` and `bmr` are left for the caller.
 */
export function calculateMacros(
  calories: number,
  weightKg: number,
  goal: string,
  isWorkoutDay = false,
  now: Date = new Date()
): NutritionTarget {
  const profile = MACRO_PROFILES[categorizeGoal(goal)];

  const proteinGrams = weightKg * profile.proteinPerKg;
  const remainingCalories = calories - proteinGrams * 4;
  let carbsGrams = (remainingCalories * profile.carbShare) / 4;
  let fatsGrams = (remainingCalories * profile.fatShare) / 9;

  if (isWorkoutDay) {
    carbsGrams += 30;
    fatsGrams -= 10;
  }

  return {
    id: randomUUID(),
    userId: '',
    dailyCalories: calories,
    macros: roundMacros(proteinGrams, carbsGrams, fatsGrams),
    bmr: 0,
    isWorkoutDay,
    createdAt: now.toISOString(),
    validUntil: new Date(now.getTime() + DAY_MS).toISOString(),
  };
}

export function calculateFromBodyMetrics(
  metrics: BodyMetrics,
  goal: string,
  activityLevel: string,
  isWorkoutDay = false,
  now: Date = new Date()
): NutritionTarget {
  const calories = calculateDailyCalories(metrics.bmr, goal, activityLevel, isWorkoutDay);
  return {
    ...calculateMacros(calories, metrics.weight, goal, isWorkoutDay, now),
    bmr: metrics.bmr,
  };
}

// ============ Workout Meals ============

function workoutMealTarget(
  proteinGrams: number,
  carbsGrams: number,
  fatsGrams: number,
  now: Date
): NutritionTarget {
  return {
    id: randomUUID(),
    userId: '',
    dailyCalories: Math.round(proteinGrams * 4 + carbsGrams * 4 + fatsGrams * 9),
    macros: roundMacros(proteinGrams, carbsGrams, fatsGrams),
    bmr: 0,
    isWorkoutDay: false,
    createdAt: now.toISOString(),
    validUntil: new Date(now.getTime() + WORKOUT_MEAL_WINDOW_MS).toISOString(),
  };
}

/**
 * Post-workout meal (30-60 min after training): high carbs, moderate protein, minimal fat.
 */
export function calculatePostWorkoutMeal(weightKg: number, now: Date = new Date()): NutritionTarget {
  return workoutMealTarget(weightKg * 0.4, weightKg * 0.8, 5, now);
}

/**
 * Pre-workout meal (1-2 hours before training): moderate carbs and protein, low fat.
 */
export function calculatePreWorkoutMeal(weightKg: number, now: Date = new Date()): NutritionTarget {
  return workoutMealTarget(weightKg * 0.3, weightKg * 0.6, 8, now);
}

// ============ Validation & Adjustment ============

/**
 * Hard floors: protein >= 1.6 g/kg and at least 1200 kcal/day.
 * Callers must not persist or present a target that fails this.
 */
export function validateNutritionTarget(target: NutritionTarget, weightKg: number): boolean {
  if (target.macros.protein < weightKg * MIN_PROTEIN_PER_KG) {
    return false;
  }
  return target.dailyCalories >= MIN_DAILY_CALORIES;
}

export function isTargetValid(target: NutritionTarget, now: Date = new Date()): boolean {
  return now.getTime() < Date.parse(target.validUntil);
}

/**
 * Surplus (positive) or deficit (negative) relative to BMR.
 */
export function calorieAdjustment(target: NutritionTarget): number {
  return target.dailyCalories - target.bmr;
}

/**
 * Scale a target down on poorly recovered days, keeping protein high.
 *
 * - >= 70: unchanged
 * - >= 50: calories ×0.95, carbs ×0.90
 * - < 50: calories ×0.90, carbs ×0.80, protein ×1.05
 */
export function adjustForRecovery(target: NutritionTarget, recoveryScore: number): NutritionTarget {
  if (recoveryScore >= 70) {
    return target;
  }

  const moderate = recoveryScore >= 50;
  const calorieFactor = moderate ? 0.95 : 0.9;
  const carbFactor = moderate ? 0.9 : 0.8;
  const proteinFactor = moderate ? 1 : 1.05;

  return {
    ...target,
    dailyCalories: Math.round(target.dailyCalories * calorieFactor),
    macros: roundMacros(
      target.macros.protein * proteinFactor,
      target.macros.carbs * carbFactor,
      target.macros.fats
    ),
  };
}
