/**
 * Health Sync Handlers
 *
 * Express app for pushing HealthKit readings and turning them into
 * stored body metrics.
 */

import { type Request, type Response, type NextFunction } from 'express';
import { info, warn } from 'firebase-functions/logger';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp, getUserId } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate } from '../middleware/validate.js';
import { getHealthDataService, getHealthSyncService, getRepositories } from '../services/index.js';
import {
  bulkHealthSampleSyncSchema,
  syncBodyMetricsSchema,
  bodyMetricsRangeQuerySchema,
  healthProfileSchema,
  type BulkHealthSampleSyncInput,
  type SyncBodyMetricsInput,
  type HealthProfileInput,
  type HealthSample,
  type UserHealthProfile,
} from '../shared.js';

const TAG = '[Health Sync]';

const app = createBaseApp('health-sync');

// POST /health-sync/samples
// Store raw HealthKit readings (up to 1000 per request)
app.post(
  '/samples',
  validate(bulkHealthSampleSyncSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const start = Date.now();
    const userId = getUserId(req);
    const body: BulkHealthSampleSyncInput = bulkHealthSampleSyncSchema.parse(req.body);

    const samples: HealthSample[] = body.samples.map((sample) => {
      const entry: HealthSample = {
        kind: sample.kind,
        timestamp: sample.timestamp,
        value: sample.value,
      };
      if (sample.endTimestamp !== undefined) entry.endTimestamp = sample.endTimestamp;
      if (sample.unit !== undefined) entry.unit = sample.unit;
      return entry;
    });
    info(`${TAG} POST /samples`, { userId, count: samples.length });

    const stored = await getHealthSyncService().ingestSamples(userId, samples);

    info(`${TAG} POST /samples complete`, { userId, stored, elapsedMs: Date.now() - start });
    res.status(201).json({
      success: true,
      data: { stored },
    });
  })
);

// POST /health-sync/body-metrics/sync
// Rebuild body metrics from stored readings since the last synced day,
// or overwrite the last week with force
app.post(
  '/body-metrics/sync',
  validate(syncBodyMetricsSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const { days, force }: SyncBodyMetricsInput = syncBodyMetricsSchema.parse(req.body);
    info(`${TAG} POST /body-metrics/sync`, { userId, days, force });

    const service = getHealthSyncService();
    const result = force
      ? await service.forceSyncBodyMetrics(userId)
      : await service.syncNewBodyMetrics(userId, days);

    res.json({
      success: true,
      data: result,
    });
  })
);

// GET /health-sync/body-metrics?start=YYYY-MM-DD&end=YYYY-MM-DD
app.get(
  '/body-metrics',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);

    const parseResult = bodyMetricsRangeQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      warn(`${TAG} GET /body-metrics validation failed`, { userId, errors: parseResult.error.issues });
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

    const { start, end } = parseResult.data;
    const metrics = await getRepositories().bodyMetrics.findRange(userId, start, end);

    info(`${TAG} GET /body-metrics result`, { userId, start, end, count: metrics.length });
    res.json({
      success: true,
      data: metrics,
    });
  })
);

// GET /health-sync/profile
app.get(
  '/profile',
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const result = await getHealthDataService().fetchUserHealthProfile(userId);
    if (!result.ok) {
      res.status(503).json({
        success: false,
        error: { code: 'HEALTH_SOURCE_UNAVAILABLE', message: result.error.message },
      });
      return;
    }
    res.json({ success: true, data: result.value });
  })
);

// PUT /health-sync/profile
// Height, biological sex and date of birth for BMR estimation
app.put(
  '/profile',
  validate(healthProfileSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const input: HealthProfileInput = healthProfileSchema.parse(req.body);
    info(`${TAG} PUT /profile`, { userId, fields: Object.keys(input) });

    const profile: UserHealthProfile = {};
    if (input.heightCm !== undefined) profile.heightCm = input.heightCm;
    if (input.biologicalSex !== undefined) profile.biologicalSex = input.biologicalSex;
    if (input.dateOfBirth !== undefined) profile.dateOfBirth = input.dateOfBirth;

    await getRepositories().userPreferences.setHealthProfile(userId, profile);

    res.json({
      success: true,
      data: profile,
    });
  })
);

// Error handler must be last
app.use(errorHandler);

export const healthSyncApp = app;
