import type { Request, Response, NextFunction } from 'express';
import { getAppCheck } from 'firebase-admin/app-check';
import { warn } from 'firebase-functions/logger';
import { initializeFirebase } from '../firebase.js';

const TAG = '[App Check]';

function rejectRequest(res: Response, message: string): void {
  res.status(401).json({
    success: false,
    error: { code: 'UNAUTHORIZED', message },
  });
}

/**
 * Reject requests without a valid `X-Firebase-AppCheck` token.
 * The emulator skips verification.
 */
export function requireAppCheck(req: Request, res: Response, next: NextFunction): void {
  if (process.env['FUNCTIONS_EMULATOR'] === 'true') {
    next();
    return;
  }

  const token = req.header('X-Firebase-AppCheck');
  if (token === undefined || token === '') {
    warn(`${TAG} missing token`, { path: req.path });
    rejectRequest(res, 'Missing App Check token');
    return;
  }

  initializeFirebase();
  getAppCheck()
    .verifyToken(token)
    .then(() => next())
    .catch((error: unknown) => {
      warn(`${TAG} invalid token`, {
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      rejectRequest(res, 'Invalid App Check token');
    });
}
