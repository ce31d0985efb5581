import { z } from 'zod';

/**
 * Recovery Schemas
 *
 * Zod validation schemas for recovery API inputs.
 */

// --- Date Pattern ---

export const datePattern = /^\d{4}-\d{2}-\d{2}$/;

export const dateStringSchema = z
  .string()
  .regex(datePattern, 'Date must be in YYYY-MM-DD format');

// --- Recovery Score Query Schema ---

/**
 * Query parameters for GET /recovery/score.
 * Defaults to today when no date is given.
 */
export const getRecoveryScoreQuerySchema = z.object({
  date: dateStringSchema.optional(),
});

export type GetRecoveryScoreQueryInput = z.infer<typeof getRecoveryScoreQuerySchema>;

// --- Planned Workout Schema ---

export const plannedExerciseSchema = z.object({
  name: z.string().trim().min(1).max(200),
  sets: z.number().int().min(0).max(50),
  weightKg: z.number().min(0).max(1000).optional(),
});

export const plannedWorkoutSchema = z.object({
  id: z.string().min(1),
  name: z.string().trim().min(1).max(200),
  notes: z.string().max(5000).optional(),
  cancelled: z.boolean().default(false),
  exercises: z.array(plannedExerciseSchema).max(100),
});

export type PlannedWorkoutInput = z.infer<typeof plannedWorkoutSchema>;

// --- Adjust Workout Schema ---

/**
 * Body for POST /recovery/adjust-workout.
 * When `recoveryScore` is omitted the server computes today's score.
 */
export const adjustWorkoutRequestSchema = z.object({
  workout: plannedWorkoutSchema,
  recoveryScore: z.number().min(0).max(100).optional(),
  date: dateStringSchema.optional(),
});

export type AdjustWorkoutRequestInput = z.infer<typeof adjustWorkoutRequestSchema>;
