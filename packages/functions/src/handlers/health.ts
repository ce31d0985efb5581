import express from 'express';
import cors from 'cors';
import { stripPathPrefix } from '../middleware/strip-path-prefix.js';

// Liveness check: no JSON body parsing or App Check
const app = express();
app.use(cors({ origin: true }));
app.use(stripPathPrefix('health'));

app.get('/', (_req, res) => {
  res.json({
    success: true,
    data: {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'readyfuel-functions',
    },
  });
});

export const healthApp = app;
