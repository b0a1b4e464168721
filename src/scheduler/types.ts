/**
 * Scheduler Type Definitions
 */

import type { MonthlyReportResult } from '../reporting/index.js';

export type ScanJobName = 'poll-inbox' | 'monthly-report';

export interface ScanJobData {
  /** ISO timestamp the scheduler enqueued the job */
  scheduledAt?: string;
}

/** Counts for one poll cycle */
export interface PollSummary {
  /** Messages that carried at least one document and were not already processed */
  emailsFound: number;
  alreadyProcessed: number;
  invoices: number;
  review: number;
  rejected: number;
  errors: string[];
  /**
   * True when the scan listed its whole window and every emitted message was
   * handed to the pipeline without failing. Only then may the next floor move.
   */
  complete: boolean;
}

export type ScanJobResult =
  | { job: 'poll-inbox'; summary: PollSummary }
  | { job: 'monthly-report'; report: MonthlyReportResult }
  | { job: ScanJobName; skipped: 'kill-switch' };
