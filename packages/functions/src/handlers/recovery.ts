/**
 * Recovery Handlers
 *
 * Express app for the daily recovery score and recovery-based workout adjustment.
 */

import { type Request, type Response, type NextFunction } from 'express';
import { info, warn } from 'firebase-functions/logger';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp, getUserId } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate } from '../middleware/validate.js';
import { getRecoveryReportService } from '../services/index.js';
import { todayDate } from '../services/recovery-report.service.js';
import {
  adjustWorkoutIntensity,
  getIntensityAdjustment,
  getWorkoutWarningMessage,
  shouldWarnBeforeWorkout,
} from '../services/recovery-scoring.service.js';
import {
  adjustWorkoutRequestSchema,
  getRecoveryScoreQuerySchema,
  type AdjustWorkoutRequestInput,
  type PlannedWorkout,
} from '../shared.js';

const TAG = '[Recovery]';

const app = createBaseApp('recovery');

// GET /recovery/score?date=YYYY-MM-DD
// Score a day (today by default) with insights and workout guidance
app.get(
  '/score',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);

    const parseResult = getRecoveryScoreQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      warn(`${TAG} GET /score validation failed`, { userId, errors: parseResult.error.issues });
      res.status(400).json({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid query parameters',
          details: parseResult.error.issues,
        },
      });
      return;
    }

    const date = parseResult.data.date ?? todayDate();
    info(`${TAG} GET /score`, { userId, date });

    const report = await getRecoveryReportService().buildReport(userId, date);

    res.json({
      success: true,
      data: report,
    });
  })
);

// POST /recovery/adjust-workout
// Annotate (or cancel) a planned workout for the day's recovery
app.post(
  '/adjust-workout',
  validate(adjustWorkoutRequestSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const body: AdjustWorkoutRequestInput = adjustWorkoutRequestSchema.parse(req.body);

    let recoveryScore = body.recoveryScore;
    if (recoveryScore === undefined) {
      const report = await getRecoveryReportService().buildReport(userId, body.date ?? todayDate());
      recoveryScore = report.score;
    }

    const workout: PlannedWorkout = {
      id: body.workout.id,
      name: body.workout.name,
      cancelled: body.workout.cancelled,
      exercises: body.workout.exercises.map((exercise) => ({ ...exercise })),
    };
    if (body.workout.notes !== undefined) {
      workout.notes = body.workout.notes;
    }

    const adjusted = adjustWorkoutIntensity(workout, recoveryScore);
    info(`${TAG} POST /adjust-workout`, {
      userId,
      workoutId: workout.id,
      recoveryScore,
      cancelled: adjusted.cancelled,
    });

    res.json({
      success: true,
      data: {
        workout: adjusted,
        recoveryScore,
        adjustment: getIntensityAdjustment(recoveryScore),
        shouldWarn: shouldWarnBeforeWorkout(recoveryScore),
        warningMessage: getWorkoutWarningMessage(recoveryScore),
      },
    });
  })
);

// Error handler must be last
app.use(errorHandler);

export const recoveryApp = app;
