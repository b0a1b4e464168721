/**
 * BullMQ Queue Configuration
 *
 * One queue carries both scheduled jobs (poll-inbox, monthly-report).
 * Jobs are not retried automatically: the next scheduled poll picks up
 * whatever a failed one left unmarked.
 *
 * Uses lazy singleton pattern: the queue is not created until first access,
 * so importing this module opens no Redis connection.
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import type { ScanJobData, ScanJobName, ScanJobResult } from './types.js';

export const SCAN_QUEUE_NAME = 'invoice-scan';

/** Redis connection config shape for BullMQ */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
  maxRetriesPerRequest: null;
}

/**
 * Parse a Redis URL into a connection config object.
 * Supports redis:// and rediss:// (TLS).
 */
export function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    ...(parsed.protocol === 'rediss:' && { tls: {} }),
    maxRetriesPerRequest: null,
  };
}

/**
 * REDIS_URL when set, else REDIS_HOST/PORT/PASSWORD.
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

let _queue: Queue<ScanJobData, ScanJobResult, ScanJobName> | null = null;

export function getScanQueue(): Queue<ScanJobData, ScanJobResult, ScanJobName> {
  if (!_queue) {
    _queue = new Queue<ScanJobData, ScanJobResult, ScanJobName>(SCAN_QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 7 * 86400 },
        removeOnFail: { age: 30 * 86400 },
      },
    });
  }
  return _queue;
}

/** Close the queue connection for graceful shutdown. */
export async function closeScanQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
