#!/usr/bin/env node
/**
 * Backfill CLI
 *
 * Runs one poll cycle from a given date instead of the scheduled floor.
 * Messages already in the Dedup Store are skipped as usual, so re-running
 * over the same window files nothing twice.
 *
 * Usage:
 *   npx tsx src/backfill.ts --since 2025-01-01
 *   npx tsx src/backfill.ts --since 2025-01-01 --dry-run
 *
 * --dry-run scans and logs the filename each document would get; nothing
 * is classified, uploaded or recorded.
 */

import 'dotenv/config';
import { routingRules } from './rules.js';
import { BACKFILL_USAGE, parseBackfillArgs, runPollCycle, createPollDeps } from './scheduler/index.js';
import { openDedupStore } from './store/index.js';

async function main(): Promise<number> {
  const args = parseBackfillArgs(process.argv.slice(2));
  if (!args) {
    console.error(BACKFILL_USAGE);
    return 1;
  }

  console.log('[backfill] Starting', { since: args.since.toISOString(), dryRun: args.dryRun });

  const controller = new AbortController();
  process.on('SIGINT', () => {
    console.warn('[backfill] Interrupted, finishing the current message');
    controller.abort();
  });

  const dedupStore = openDedupStore();
  try {
    const deps = createPollDeps(dedupStore, routingRules);
    const summary = await runPollCycle(deps, routingRules, {
      since: args.since,
      dryRun: args.dryRun,
      signal: controller.signal,
    });

    console.log('[backfill] Totals', {
      emailsFound: summary.emailsFound,
      alreadyProcessed: summary.alreadyProcessed,
      invoices: summary.invoices,
      review: summary.review,
      rejected: summary.rejected,
      errors: summary.errors.length,
    });
    for (const error of summary.errors) {
      console.error(`[backfill]   ${error}`);
    }
    return 0;
  } finally {
    dedupStore.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('[backfill] Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
