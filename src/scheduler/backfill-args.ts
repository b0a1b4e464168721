/**
 * Argument parsing for the backfill CLI.
 */

import { parseArgs } from 'node:util';
import { parseCalendarDate } from '../filing/index.js';

export const BACKFILL_USAGE = 'Usage: invoice-backfill --since YYYY-MM-DD [--dry-run]';

export interface BackfillArgs {
  /** UTC midnight of the given day */
  since: Date;
  dryRun: boolean;
}

/** Returns null on unknown flags, a missing --since or a date that does not exist */
export function parseBackfillArgs(argv: string[]): BackfillArgs | null {
  let values: { since?: string; 'dry-run'?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        since: { type: 'string' },
        'dry-run': { type: 'boolean', default: false },
      },
    }));
  } catch (err) {
    console.error(`[backfill] ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const date = values.since ? parseCalendarDate(values.since) : null;
  if (!date) return null;

  return {
    since: new Date(Date.UTC(date.year, date.month - 1, date.day)),
    dryRun: values['dry-run'] ?? false,
  };
}
