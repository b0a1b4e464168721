/**
 * Scan Worker
 *
 * Runs the scheduled jobs of the invoice-scan queue, one at a time:
 * - poll-inbox: one poll cycle from the computed floor; a complete cycle
 *   records its start so the next floor can move past it
 * - monthly-report: closes the previous month
 *
 * Design:
 * - processScanJob is exported for direct unit testing
 * - Worker uses lazy singleton pattern, concurrency 1
 * - Kill switch skips every job without touching the mailbox
 * - The last poll summary is kept for the health endpoint
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { intakeConfig } from '../intake/index.js';
import { runMonthlyReportCycle } from '../reporting/index.js';
import type { RoutingRules } from '../rules.js';
import type { DedupStore } from '../store/index.js';
import { computePollFloor, runPollCycle } from './poll-cycle.js';
import type { PollCycleDeps } from './poll-cycle.js';
import { SCAN_QUEUE_NAME, createRedisConnection } from './queue.js';
import type { PollSummary, ScanJobData, ScanJobName, ScanJobResult } from './types.js';

export interface ScanRuntime {
  dedupStore: DedupStore;
  rules: RoutingRules;
  /** Builds the per-run collaborators (fresh auth session each call) */
  createPollDeps: (dedupStore: DedupStore, rules: RoutingRules) => PollCycleDeps;
  /** Aborted on shutdown; stops a running cycle between messages */
  signal?: AbortSignal;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Last poll summary
// ---------------------------------------------------------------------------

export interface LastPoll {
  finishedAt: string;
  summary: PollSummary;
}

let _lastPoll: LastPoll | null = null;

export function getLastPollSummary(): LastPoll | null {
  return _lastPoll;
}

export function resetLastPollSummary(): void {
  _lastPoll = null;
}

// ---------------------------------------------------------------------------
// Job processing
// ---------------------------------------------------------------------------

export async function processScanJob(
  job: Job<ScanJobData, ScanJobResult, ScanJobName>,
  runtime: ScanRuntime,
): Promise<ScanJobResult> {
  console.log(`[worker] Processing job ${job.id}`, { name: job.name });

  if (appConfig.killSwitch) {
    console.log('[worker] Kill switch active, skipping job', { name: job.name });
    return { job: job.name, skipped: 'kill-switch' };
  }

  const now = runtime.now?.() ?? new Date();

  if (job.name === 'monthly-report') {
    const report = runMonthlyReportCycle(runtime.dedupStore, now);
    return { job: 'monthly-report', report };
  }

  const since = computePollFloor(runtime.dedupStore.getLastCompleteScanStart(), now, intakeConfig.lookbackDays);
  const deps = runtime.createPollDeps(runtime.dedupStore, runtime.rules);
  const summary = await runPollCycle(deps, runtime.rules, { since, signal: runtime.signal });

  const finishedAt = runtime.now?.() ?? new Date();
  if (summary.complete) {
    runtime.dedupStore.recordCompleteScan(now, finishedAt);
  } else {
    console.warn('[worker] Poll incomplete, floor stays at the last complete poll', { since: since.toISOString() });
  }

  _lastPoll = { finishedAt: finishedAt.toISOString(), summary };
  return { job: 'poll-inbox', summary };
}

// ---------------------------------------------------------------------------
// Worker
// ---------------------------------------------------------------------------

let _worker: Worker<ScanJobData, ScanJobResult, ScanJobName> | null = null;

export function createScanWorker(runtime: ScanRuntime): Worker<ScanJobData, ScanJobResult, ScanJobName> {
  if (_worker) return _worker;

  _worker = new Worker<ScanJobData, ScanJobResult, ScanJobName>(
    SCAN_QUEUE_NAME,
    (job) => processScanJob(job, runtime),
    {
      connection: createRedisConnection(),
      concurrency: 1,
    },
  );

  _worker.on('completed', (job) => {
    console.log(`[worker] Job ${job.id} completed`, { name: job.name });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[worker] Job ${job?.id} failed`, { name: job?.name, error: err.message });
  });

  console.log('[worker] Started, listening for jobs on queue:', SCAN_QUEUE_NAME);
  return _worker;
}

/** Finishes the current job, then stops taking new ones. */
export async function closeScanWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
