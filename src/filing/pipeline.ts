/**
 * Routing Pipeline
 *
 * Takes one accepted mail message and files each of its documents:
 * 1. Archives expand one level; each member runs through this same procedure.
 *    An archive is never uploaded itself. Its status is invoice when any
 *    member was filed as an invoice, else rejected.
 * 2. Classify with the sender's supplier hint
 * 3. Resolve the storage period (invoice date, else received date)
 * 4. Build the filename
 * 5. Upload: invoices under <root>/YYYY/MM/<label>/, everything else under
 *    <root>/YYYY/MM/<review>/; an existing file at the target is reused
 * 6. Invoices only: record the upload and every extracted field
 * 7. After every document has been attempted, mark the message processed
 *
 * A failure on one document is logged and collected; its siblings still run.
 * Auth failures and an upload that reports success without an id propagate,
 * leaving the message unmarked for the next run.
 */

import { classifyDocument } from '../classification/index.js';
import { AuthSessionError, errorMessage, isUnauthorizedError } from '../google/index.js';
import { expandArchive, isArchive } from '../intake/index.js';
import type { CandidateDocument, MailMessage } from '../intake/index.js';
import { supplierHintFor } from '../rules.js';
import type { RoutingRules } from '../rules.js';
import type { DedupStore } from '../store/index.js';
import { buildFilename, companyLabel } from './naming.js';
import { uploadToPath } from './object-store.js';
import { resolveStoragePeriod, targetFolderPath, usableInvoiceDate } from './router.js';
import type { FolderRoute } from './router.js';
import { ObjectStoreError } from './types.js';
import type { DocumentOutcome, DocumentStatus, MessageOutcome, ObjectStore } from './types.js';

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export interface PipelineContext {
  objectStore: ObjectStore;
  dedupStore: Pick<DedupStore, 'saveInvoice' | 'markEmailProcessed'>;
  rules: Pick<RoutingRules, 'senderSuppliers'>;
  route: FolderRoute;
}

interface MessageRun {
  message: MailMessage;
  supplierHint: string | null;
  outcomes: DocumentOutcome[];
  errors: string[];
}

/** Errors that must stop the cycle instead of being collected */
export function isUnrecoverable(err: unknown): boolean {
  if (err instanceof ObjectStoreError) return err.code === 'NO_ID';
  return err instanceof AuthSessionError || isUnauthorizedError(err);
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

async function attemptDocument(
  ctx: PipelineContext,
  run: MessageRun,
  document: CandidateDocument,
): Promise<DocumentStatus | null> {
  try {
    return await routeDocument(ctx, run, document);
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    console.error('[pipeline] Document failed, continuing with the next one', {
      messageId: run.message.messageId,
      document: document.name,
      error: errorMessage(err),
    });
    run.errors.push(`Message ${run.message.messageId}, document ${document.name}: ${errorMessage(err)}`);
    return null;
  }
}

async function routeArchive(
  ctx: PipelineContext,
  run: MessageRun,
  archive: CandidateDocument,
): Promise<DocumentStatus> {
  const members = await expandArchive(archive);
  if (members.length === 0) {
    console.log('[pipeline] Archive has no usable documents, rejected', {
      messageId: run.message.messageId,
      archive: archive.name,
    });
    run.outcomes.push({ name: archive.name, status: 'rejected' });
    return 'rejected';
  }

  let anyInvoice = false;
  for (const member of members) {
    // expandArchive never yields nested archives, so this recursion is one level deep
    const status = await attemptDocument(ctx, run, member);
    if (status === 'invoice') anyInvoice = true;
  }
  return anyInvoice ? 'invoice' : 'rejected';
}

/** Files one document; archives recurse over their members */
async function routeDocument(
  ctx: PipelineContext,
  run: MessageRun,
  document: CandidateDocument,
): Promise<DocumentStatus> {
  if (isArchive(document)) {
    return routeArchive(ctx, run, document);
  }

  const { message } = run;
  const verdict = await classifyDocument(document, run.supplierHint);

  const invoiceDate = usableInvoiceDate(verdict.invoiceDate);
  const period = resolveStoragePeriod(invoiceDate, message.receivedAt);
  const filename = buildFilename({
    receivedAt: message.receivedAt,
    sender: message.sender,
    originalName: document.name,
    invoiceDate,
    supplierName: verdict.supplierName,
  });
  const label = companyLabel(message.sender, verdict.supplierName);
  const folderPath = targetFolderPath(ctx.route, period, verdict.decision, label);

  const { object } = await uploadToPath(ctx.objectStore, folderPath, filename, document);

  if (verdict.decision === 'invoice') {
    ctx.dedupStore.saveInvoice({
      emailId: message.messageId,
      filename,
      driveFileId: object.id,
      driveWebLink: object.webLink,
      sender: message.sender,
      receivedAt: message.receivedAt,
      year: period.year,
      month: period.month,
      invoiceDate,
      supplier: verdict.supplierName,
      amountPretax: verdict.amountPretax,
      amountTax: verdict.amountTax,
      amountTotal: verdict.amountTotal,
      currency: verdict.currency,
      confidence: verdict.confidence,
    });
  }

  console.log('[pipeline] Document filed', {
    messageId: message.messageId,
    document: document.name,
    decision: verdict.decision,
    path: [...folderPath, filename].join('/'),
  });
  run.outcomes.push({ name: document.name, status: verdict.decision });
  return verdict.decision;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/**
 * Files every document of a message, then marks the message processed.
 * Outcomes list one entry per classified document (archive members included)
 * and one per archive that yielded nothing.
 */
export async function processMessage(ctx: PipelineContext, message: MailMessage): Promise<MessageOutcome> {
  const run: MessageRun = {
    message,
    supplierHint: supplierHintFor(message.sender, ctx.rules),
    outcomes: [],
    errors: [],
  };

  console.log('[pipeline] Processing message', {
    messageId: message.messageId,
    sender: message.sender,
    subject: message.subject,
    documents: message.documents.length,
  });

  for (const document of message.documents) {
    await attemptDocument(ctx, run, document);
  }

  ctx.dedupStore.markEmailProcessed({
    messageId: message.messageId,
    sender: message.sender,
    subject: message.subject,
    receivedAt: message.receivedAt,
  });

  return { messageId: message.messageId, documents: run.outcomes, errors: run.errors };
}
