/**
 * Health Check Endpoint Handler
 *
 * Returns server status, kill switch state, version, timestamp and the
 * outcome of the most recent poll cycle (null before the first one).
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';
import { getLastPollSummary } from '../scheduler/index.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    version: process.env.npm_package_version ?? 'dev',
    lastPoll: getLastPollSummary(),
  });
}
