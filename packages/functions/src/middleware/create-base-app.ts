import express, { type Request } from 'express';
import cors from 'cors';
import { stripPathPrefix } from './strip-path-prefix.js';
import { requireAppCheck } from './app-check.js';
import { defaultUserId } from '../config.js';

/**
 * Create an Express app with the standard middleware stack.
 */
export function createBaseApp(resourceName: string): express.Application {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());
  app.use(stripPathPrefix(resourceName));
  app.use(requireAppCheck);
  return app;
}

/**
 * Get user ID from request headers.
 * Falls back to the configured default user.
 */
export function getUserId(req: Request): string {
  const userId = req.headers['x-user-id'];
  if (typeof userId === 'string' && userId.length > 0) {
    return userId;
  }
  const fallback = defaultUserId.value();
  return fallback !== '' ? fallback : 'default-user';
}
