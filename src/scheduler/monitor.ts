/**
 * Job schedulers for the invoice-scan queue
 *
 * - poll-inbox every POLL_INTERVAL_MINUTES
 * - monthly-report at REPORT_HOUR_UTC on REPORT_DAY_OF_MONTH (UTC)
 *
 * upsertJobScheduler is idempotent, so restarts do not stack schedules.
 */

import type { Queue } from 'bullmq';
import { intakeConfig } from '../intake/index.js';
import { reportingConfig } from '../reporting/index.js';
import type { ScanJobData, ScanJobName, ScanJobResult } from './types.js';

export function monthlyReportPattern(dayOfMonth: number, hourUtc: number): string {
  return `0 ${hourUtc} ${dayOfMonth} * *`;
}

export async function startScanSchedulers(queue: Queue<ScanJobData, ScanJobResult, ScanJobName>): Promise<void> {
  if (!intakeConfig.enabled) {
    console.log('[scheduler] Mailbox polling disabled (INTAKE_ENABLED=false)');
  } else {
    await queue.upsertJobScheduler(
      'poll-inbox',
      { every: intakeConfig.pollIntervalMs },
      { name: 'poll-inbox', data: { scheduledAt: new Date().toISOString() } },
    );
    console.log(`[scheduler] Polling ${intakeConfig.mailbox} every ${intakeConfig.pollIntervalMs / 60000} min`);
  }

  const pattern = monthlyReportPattern(reportingConfig.dayOfMonth, reportingConfig.hourUtc);
  await queue.upsertJobScheduler(
    'monthly-report',
    { pattern, tz: 'UTC' },
    { name: 'monthly-report', data: {} },
  );
  console.log('[scheduler] Monthly report scheduled', { pattern, tz: 'UTC' });
}
