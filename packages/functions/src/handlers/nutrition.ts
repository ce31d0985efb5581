/**
 * Nutrition Handlers
 *
 * Express app for daily nutrition targets, workout meals, advisories and
 * recipe search.
 */

import { type Request, type Response, type NextFunction } from 'express';
import { info, warn } from 'firebase-functions/logger';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp, getUserId } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate } from '../middleware/validate.js';
import { spoonacularApiKey } from '../config.js';
import { NotFoundError, UnprocessableError, UpstreamError } from '../types/errors.js';
import { getHealthDataService, getRepositories } from '../services/index.js';
import {
  adjustForRecovery,
  calculateFromBodyMetrics,
  calculatePostWorkoutMeal,
  calculatePreWorkoutMeal,
  calorieAdjustment,
  macroPercentages,
  MIN_DAILY_CALORIES,
  MIN_PROTEIN_PER_KG,
  validateNutritionTarget,
} from '../services/nutrition-calculator.service.js';
import {
  getCarbSources,
  getDietaryRecommendations,
  getFatSources,
  getMealTimingRecommendations,
  getProteinSources,
  getWorkoutMealSchedule,
} from '../services/nutrition-advisories.service.js';
import {
  buildMealSearchConstraints,
  RecipeApiError,
  searchRecipes,
  type MealSearchOptions,
} from '../services/recipe-search.service.js';
import {
  createNutritionTargetSchema,
  mealScheduleQuerySchema,
  nutritionAdviceQuerySchema,
  recipeSearchRequestSchema,
  workoutMealQuerySchema,
  type BodyMetrics,
  type CreateNutritionTargetInput,
  type NutritionTarget,
  type RecipeSearchRequestInput,
} from '../shared.js';

const TAG = '[Nutrition]';

const app = createBaseApp('nutrition');

function validationFailed(res: Response, details: unknown): void {
  res.status(400).json({
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message: 'Invalid query parameters',
      details,
    },
  });
}

/**
 * Latest synced body metrics, else the latest straight from the health source.
 */
async function findLatestBodyMetrics(userId: string): Promise<BodyMetrics | null> {
  const stored = await getRepositories().bodyMetrics.findLatest(userId);
  if (stored) {
    return stored;
  }
  const result = await getHealthDataService().fetchLatestBodyMetrics(userId);
  if (!result.ok) {
    warn(`${TAG} no body metrics available`, { userId, kind: result.error.kind });
    return null;
  }
  return result.value;
}

async function resolveWeightKg(userId: string, weightKg: number | undefined): Promise<number> {
  if (weightKg !== undefined) {
    return weightKg;
  }
  const latest = await findLatestBodyMetrics(userId);
  if (!latest) {
    throw new NotFoundError('Body metrics', userId);
  }
  return latest.weight;
}

async function requireCurrentTarget(userId: string): Promise<NutritionTarget> {
  const target = await getRepositories().nutritionTargets.findLatestValid(userId);
  if (!target) {
    throw new NotFoundError('Current nutrition target', userId);
  }
  return target;
}

// POST /nutrition/targets
// Calculate, validate and store today's target from the latest body metrics
app.post(
  '/targets',
  validate(createNutritionTargetSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const start = Date.now();
    const userId = getUserId(req);
    const input: CreateNutritionTargetInput = createNutritionTargetSchema.parse(req.body);
    info(`${TAG} POST /targets`, { userId, goal: input.goal, activityLevel: input.activityLevel });

    const metrics = await findLatestBodyMetrics(userId);
    if (!metrics) {
      throw new NotFoundError('Body metrics', userId);
    }

    let target: NutritionTarget = {
      ...calculateFromBodyMetrics(metrics, input.goal, input.activityLevel, input.isWorkoutDay),
      userId,
    };
    if (input.recoveryScore !== undefined) {
      target = adjustForRecovery(target, input.recoveryScore);
    }

    if (!validateNutritionTarget(target, metrics.weight)) {
      throw new UnprocessableError(
        'TARGET_BELOW_FLOOR',
        'Calculated target is below the minimum protein or calorie floor',
        {
          dailyCalories: target.dailyCalories,
          minDailyCalories: MIN_DAILY_CALORIES,
          protein: target.macros.protein,
          minProtein: metrics.weight * MIN_PROTEIN_PER_KG,
        }
      );
    }

    const saved = await getRepositories().nutritionTargets.save(userId, target);

    info(`${TAG} POST /targets complete`, {
      userId,
      targetId: saved.id,
      dailyCalories: saved.dailyCalories,
      bmr: saved.bmr,
      elapsedMs: Date.now() - start,
    });
    res.status(201).json({
      success: true,
      data: {
        target: saved,
        macroPercentages: macroPercentages(saved.macros),
        calorieAdjustment: calorieAdjustment(saved),
      },
    });
  })
);

// GET /nutrition/targets/current
app.get(
  '/targets/current',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const target = await requireCurrentTarget(userId);
    res.json({
      success: true,
      data: {
        target,
        macroPercentages: macroPercentages(target.macros),
        calorieAdjustment: calorieAdjustment(target),
      },
    });
  })
);

// GET /nutrition/meals/pre-workout?weightKg=
app.get(
  '/meals/pre-workout',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const parseResult = workoutMealQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      validationFailed(res, parseResult.error.issues);
      return;
    }

    const weightKg = await resolveWeightKg(userId, parseResult.data.weightKg);
    res.json({
      success: true,
      data: { ...calculatePreWorkoutMeal(weightKg), userId },
    });
  })
);

// GET /nutrition/meals/post-workout?weightKg=
app.get(
  '/meals/post-workout',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const parseResult = workoutMealQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      validationFailed(res, parseResult.error.issues);
      return;
    }

    const weightKg = await resolveWeightKg(userId, parseResult.data.weightKg);
    res.json({
      success: true,
      data: { ...calculatePostWorkoutMeal(weightKg), userId },
    });
  })
);

// GET /nutrition/advice?goal=&hasWorkoutToday=
app.get(
  '/advice',
  (req: Request, res: Response) => {
    const parseResult = nutritionAdviceQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      validationFailed(res, parseResult.error.issues);
      return;
    }

    const { goal, hasWorkoutToday } = parseResult.data;
    res.json({
      success: true,
      data: {
        mealTiming: getMealTimingRecommendations(goal, hasWorkoutToday),
        dietaryRecommendations: getDietaryRecommendations(goal),
        proteinSources: getProteinSources(),
        carbSources: getCarbSources(goal),
        fatSources: getFatSources(),
      },
    });
  }
);

// GET /nutrition/schedule?workoutTime=HH:mm
// Meal times around a workout, sized from the current target
app.get(
  '/schedule',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const parseResult = mealScheduleQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      validationFailed(res, parseResult.error.issues);
      return;
    }

    const target = await requireCurrentTarget(userId);
    res.json({
      success: true,
      data: getWorkoutMealSchedule(parseResult.data.workoutTime, target),
    });
  })
);

// POST /nutrition/recipes/search
// Recipes that fit one meal's share of the current target
app.post(
  '/recipes/search',
  validate(recipeSearchRequestSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const start = Date.now();
    const userId = getUserId(req);
    const input: RecipeSearchRequestInput = recipeSearchRequestSchema.parse(req.body);

    const apiKey = spoonacularApiKey.value();
    if (!apiKey) {
      res.status(500).json({
        success: false,
        error: { code: 'CONFIG_ERROR', message: 'Recipe API key not configured' },
      });
      return;
    }

    const target = await requireCurrentTarget(userId);
    const options: MealSearchOptions = { number: input.number };
    if (input.diet !== undefined) options.diet = input.diet;
    if (input.intolerances !== undefined) options.intolerances = input.intolerances;
    if (input.maxReadyTime !== undefined) options.maxReadyTime = input.maxReadyTime;
    const constraints = buildMealSearchConstraints(
      target,
      input.mealsPerDay,
      input.excludeIngredients,
      options
    );

    try {
      const meals = await searchRecipes(apiKey, constraints);
      info(`${TAG} POST /recipes/search complete`, {
        userId,
        maxCalories: constraints.maxCalories,
        minProtein: constraints.minProtein,
        count: meals.length,
        elapsedMs: Date.now() - start,
      });
      res.json({
        success: true,
        data: { constraints, meals },
      });
    } catch (error) {
      if (error instanceof RecipeApiError) {
        throw error.isQuotaExceeded
          ? new UpstreamError('RECIPE_QUOTA_EXCEEDED', 'Recipe API daily quota exceeded', 503)
          : new UpstreamError('RECIPE_API_ERROR', error.message);
      }
      throw error;
    }
  })
);

// Error handler must be last
app.use(errorHandler);

export const nutritionApp = app;
