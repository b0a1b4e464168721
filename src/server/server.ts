/**
 * Express Server
 *
 * Routes:
 * - GET /health: status, kill switch, version, last poll summary
 *
 * Exported as a factory so tests can create fresh app instances.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { healthHandler } from './health.js';

export function createApp() {
  const app = express();
  app.use(express.json());

  app.get('/health', healthHandler);

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
