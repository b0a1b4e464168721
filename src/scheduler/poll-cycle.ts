/**
 * Poll Cycle
 *
 * One pass over the mailbox:
 * 1. Scan every eligible folder from the floor, skipping message ids the
 *    Dedup Store already holds before any content is fetched
 * 2. Run the Routing Pipeline on each remaining message, one at a time
 *
 * A failed message is logged and collected; the cycle moves on. Auth
 * failures and uploads without an id end the cycle. A cycle that was aborted,
 * hit a read error or left a message failed is reported as incomplete, and the
 * scheduled floor stays where it was.
 *
 * Dry runs scan the same way but classify, upload and record nothing; the
 * filename each document would get from its received date and sender is
 * logged instead.
 */

import { buildFilename, isUnrecoverable, processMessage } from '../filing/index.js';
import type { PipelineContext } from '../filing/index.js';
import { errorMessage } from '../google/index.js';
import type { MailScanner, MailMessage } from '../intake/index.js';
import type { RoutingRules } from '../rules.js';
import type { DedupStore } from '../store/index.js';
import type { PollSummary } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PollCycleDeps {
  scanner: Pick<MailScanner, 'scan'>;
  pipeline: PipelineContext;
  dedupStore: Pick<DedupStore, 'isEmailProcessed'>;
}

export interface PollCycleOptions {
  since: Date | null;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export function emptySummary(): PollSummary {
  return {
    emailsFound: 0,
    alreadyProcessed: 0,
    invoices: 0,
    review: 0,
    rejected: 0,
    errors: [],
    complete: true,
  };
}

/**
 * Scheduled polls start one day before the last complete poll began. Until
 * one has completed, they look back `lookbackDays`. Mail below the floor was
 * listed by a complete poll, so it is either processed or carries no documents.
 */
export function computePollFloor(lastCompleteScanStart: Date | null, now: Date, lookbackDays: number): Date {
  if (!lastCompleteScanStart) return new Date(now.getTime() - lookbackDays * DAY_MS);
  return new Date(lastCompleteScanStart.getTime() - DAY_MS);
}

function logDryRun(message: MailMessage): void {
  for (const document of message.documents) {
    console.log('[poll] Dry run, would file', {
      messageId: message.messageId,
      document: document.name,
      filename: buildFilename({
        receivedAt: message.receivedAt,
        sender: message.sender,
        originalName: document.name,
        invoiceDate: null,
        supplierName: null,
      }),
    });
  }
}

export async function runPollCycle(
  deps: PollCycleDeps,
  rules: Pick<RoutingRules, 'whitelistedSenders' | 'subjectKeywords' | 'linkKeywords'>,
  options: PollCycleOptions,
): Promise<PollSummary> {
  const summary = emptySummary();

  const scan = await deps.scanner.scan({
    since: options.since,
    whitelistedSenders: rules.whitelistedSenders,
    subjectKeywords: rules.subjectKeywords,
    linkKeywords: rules.linkKeywords,
    skipMessage: (messageId) => deps.dedupStore.isEmailProcessed(messageId),
    signal: options.signal,
  });

  summary.emailsFound = scan.messages.length;
  summary.alreadyProcessed = scan.skipped;
  summary.errors.push(...scan.errors);
  if (scan.errors.length > 0) summary.complete = false;

  for (const message of scan.messages) {
    if (options.signal?.aborted) {
      console.warn('[poll] Cycle aborted, remaining messages left for the next run', {
        messageId: message.messageId,
      });
      summary.complete = false;
      break;
    }

    if (options.dryRun) {
      logDryRun(message);
      continue;
    }

    try {
      const outcome = await processMessage(deps.pipeline, message);
      for (const document of outcome.documents) {
        if (document.status === 'invoice') summary.invoices++;
        else if (document.status === 'review') summary.review++;
        else summary.rejected++;
      }
      summary.errors.push(...outcome.errors);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      console.error('[poll] Message failed', { messageId: message.messageId, error: errorMessage(err) });
      summary.errors.push(`Message ${message.messageId}: ${errorMessage(err)}`);
      summary.complete = false;
    }
  }

  // The scanner stops listing on abort without reporting what it left out
  if (options.signal?.aborted) summary.complete = false;

  console.log('[poll] Cycle finished', {
    since: options.since?.toISOString() ?? null,
    dryRun: options.dryRun ?? false,
    ...summary,
    errors: summary.errors.length,
  });
  return summary;
}
