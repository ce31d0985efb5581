/**
 * Nutrition Types
 *
 * Daily calorie and macro targets, and the recipe search collaborator's shapes.
 */

// --- Goals & Activity ---

export const NUTRITION_GOALS = [
  'muscle_gain',
  'bulk',
  'fat_loss',
  'cut',
  'maintenance',
  'recomp',
] as const;

export type NutritionGoal = (typeof NUTRITION_GOALS)[number];

export const ACTIVITY_LEVELS = [
  'sedentary',
  'light',
  'lightly_active',
  'moderate',
  'moderately_active',
  'very_active',
  'very',
  'athlete',
  'extremely_active',
] as const;

export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

// --- Macros ---

/**
 * Macronutrients in grams. Calories follow the 4-4-9 rule.
 */
export interface Macros {
  protein: number;
  carbs: number;
  fats: number;
}

export interface MacroPercentages {
  protein: number;
  carbs: number;
  fats: number;
}

// --- Nutrition Target ---

export interface NutritionTarget {
  id: string;
  userId: string;
  dailyCalories: number;
  macros: Macros;
  bmr: number;
  isWorkoutDay: boolean;
  createdAt: string; // ISO 8601 timestamp
  validUntil: string; // ISO 8601 timestamp
}

export type MealTimingRecommendations = Record<string, string>;

// --- Recipe Search ---

export interface MealSearchConstraints {
  maxCalories: number;
  minProtein: number;
  excludeIngredients: string[];
  diet?: string;
  intolerances?: string[];
  maxReadyTime?: number;
  number: number;
}

export interface RecipeMeal {
  id: string;
  name: string;
  calories: number;
  macros: Macros;
  prepTimeMinutes: number;
  imageUrl: string | null;
  recipeUrl: string | null;
  ingredients: string[];
}
