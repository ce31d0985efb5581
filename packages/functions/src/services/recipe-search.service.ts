/**
 * Recipe Search Service
 *
 * Builds per-meal constraints from a nutrition target and queries the
 * Spoonacular complex search endpoint. No retries.
 */

import { z } from 'zod';
import type { MealSearchConstraints, NutritionTarget, RecipeMeal } from '../shared.js';
import { SPOONACULAR_BASE_URL } from '../config.js';

/**
 * Error thrown when Spoonacular calls fail.
 */
export class RecipeApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'RecipeApiError';
  }

  get isQuotaExceeded(): boolean {
    return this.statusCode === 402;
  }
}

// ============ Response Parsing ============

const nutrientSchema = z.object({
  name: z.string(),
  amount: z.number(),
});

const ingredientSchema = z.object({
  original: z.string().optional(),
  name: z.string().optional(),
});

const searchResultSchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string(),
  readyInMinutes: z.number().optional(),
  image: z.string().optional(),
  sourceUrl: z.string().optional(),
  nutrition: z.object({ nutrients: z.array(nutrientSchema) }).optional(),
  extendedIngredients: z.array(ingredientSchema).optional(),
});

const complexSearchResponseSchema = z.object({
  results: z.array(searchResultSchema),
});

type SearchResult = z.infer<typeof searchResultSchema>;

export function parseSearchResult(result: SearchResult): RecipeMeal {
  const totals = { Calories: 0, Protein: 0, Carbohydrates: 0, Fat: 0 };
  for (const nutrient of result.nutrition?.nutrients ?? []) {
    switch (nutrient.name) {
      case 'Calories':
      case 'Protein':
      case 'Carbohydrates':
      case 'Fat':
        totals[nutrient.name] = nutrient.amount;
        break;
      default:
        break;
    }
  }

  return {
    id: String(result.id),
    name: result.title,
    calories: Math.trunc(totals.Calories),
    macros: {
      protein: totals.Protein,
      carbs: totals.Carbohydrates,
      fats: totals.Fat,
    },
    prepTimeMinutes: result.readyInMinutes ?? 0,
    imageUrl: result.image ?? null,
    recipeUrl: result.sourceUrl ?? null,
    ingredients: (result.extendedIngredients ?? []).map(
      (ingredient) => ingredient.original ?? ingredient.name ?? 'Unknown'
    ),
  };
}

// ============ Constraints ============

export interface MealSearchOptions {
  diet?: string;
  intolerances?: string[];
  maxReadyTime?: number;
  number?: number;
}

/**
 * Split a daily target evenly across meals.
 */
export function buildMealSearchConstraints(
  target: NutritionTarget,
  mealsPerDay: number,
  exclusions: string[],
  options: MealSearchOptions = {}
): MealSearchConstraints {
  const meals = Math.max(1, mealsPerDay);
  const constraints: MealSearchConstraints = {
    maxCalories: Math.round(target.dailyCalories / meals),
    minProtein: Math.round(target.macros.protein / meals),
    excludeIngredients: [...exclusions],
    number: options.number ?? 10,
  };
  if (options.diet !== undefined) constraints.diet = options.diet;
  if (options.intolerances !== undefined) constraints.intolerances = [...options.intolerances];
  if (options.maxReadyTime !== undefined) constraints.maxReadyTime = options.maxReadyTime;
  return constraints;
}

export function buildComplexSearchUrl(apiKey: string, constraints: MealSearchConstraints): URL {
  const url = new URL(`${SPOONACULAR_BASE_URL}/recipes/complexSearch`);
  url.searchParams.set('apiKey', apiKey);
  url.searchParams.set('number', constraints.number.toString());
  url.searchParams.set('offset', '0');
  url.searchParams.set('addRecipeInformation', 'true');
  url.searchParams.set('fillIngredients', 'true');
  url.searchParams.set('addRecipeNutrition', 'true');
  url.searchParams.set('minProtein', constraints.minProtein.toString());
  url.searchParams.set('maxCalories', constraints.maxCalories.toString());

  if (constraints.maxReadyTime !== undefined) {
    url.searchParams.set('maxReadyTime', constraints.maxReadyTime.toString());
  }
  if (constraints.excludeIngredients.length > 0) {
    url.searchParams.set('excludeIngredients', constraints.excludeIngredients.join(','));
  }
  if (constraints.diet !== undefined && constraints.diet !== '') {
    url.searchParams.set('diet', constraints.diet);
  }
  if (constraints.intolerances !== undefined && constraints.intolerances.length > 0) {
    url.searchParams.set('intolerances', constraints.intolerances.join(','));
  }
  return url;
}

// ============ Search ============

/**
 * Search recipes that fit per-meal constraints.
 *
 * @throws RecipeApiError on a non-OK status (402 when the daily quota is spent)
 *   or a response that does not match the expected shape
 */
export async function searchRecipes(
  apiKey: string,
  constraints: MealSearchConstraints
): Promise<RecipeMeal[]> {
  const response = await fetch(buildComplexSearchUrl(apiKey, constraints).toString());

  if (response.status === 402) {
    throw new RecipeApiError('Recipe API quota exceeded', 402);
  }
  if (!response.ok) {
    throw new RecipeApiError(`Recipe API error: ${response.status}`, response.status);
  }

  const body: unknown = await response.json();
  const parsed = complexSearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RecipeApiError('Unexpected recipe API response', 502, parsed.error);
  }

  return parsed.data.results.map(parseSearchResult);
}
