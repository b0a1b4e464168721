/**
 * Shared Application Configuration
 *
 * Centralizes environment access for the process-level concerns (kill switch,
 * Redis, HTTP port, data directory). Per-module settings live in each module's
 * own config.ts and use the env helpers exported here.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to skip every scheduled job
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - DATA_DIR: Directory holding the SQLite dedup database (default ./data)
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  dataDir: string;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  server: {
    port: number;
  };
}

export function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

export function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] || fallback;
}

export function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function floatEnv(key: string, fallback: number): number {
  const parsed = parseFloat(optionalEnv(key, String(fallback)));
  return Number.isFinite(parsed) ? parsed : fallback;
}

const isDev = optionalEnv('NODE_ENV', 'development') !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  dataDir: optionalEnv('DATA_DIR', './data'),
  redis: {
    url: process.env.REDIS_URL ?? undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD ?? undefined,
  },
  server: {
    port: intEnv('PORT', 3000),
  },
};
