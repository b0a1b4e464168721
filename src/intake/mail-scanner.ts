/**
 * Mail Scanner — filtered, paginated enumeration of mailbox folders
 *
 * For each scanned folder:
 * 1. List message ids received after the floor (newest first, all pages)
 * 2. Apply the acceptance policy on From/Subject before any content is fetched
 * 3. Fetch the full message, keep file attachments of a supported media type
 *    under the size ceiling, and download each one by id
 * 4. Collect invoice links from the body and resolve them through the LinkResolver
 * 5. Emit the message only if it ended up with at least one document
 *
 * Secondary folders (spam, archive) are scanned only when a sender allow-list
 * exists, and only allow-listed senders are accepted there.
 *
 * Requests go through the run's AuthSession (one refresh-and-retry on 401).
 * Auth failures abort the scan; any other error skips that message.
 */

import type { gmail_v1 } from 'googleapis';

import { AuthSessionError, errorMessage, isUnauthorizedError } from '../google/index.js';
import type { AuthSession } from '../google/index.js';
import { isWhitelisted } from '../rules.js';
import { downloadAttachment, extractAttachments } from './attachment-extractor.js';
import { intakeConfig, isSupportedMediaType } from './config.js';
import {
  MAIL_FOLDERS,
  extractMessageBody,
  getMessagePayload,
  getMessageSummary,
  listFolderMessageIds,
} from './gmail-reader.js';
import type { GmailClient, RequestRunner } from './gmail-reader.js';
import { extractInvoiceLinks } from './link-extractor.js';
import type { LinkResolver } from './link-resolver.js';
import type {
  CandidateDocument,
  MailFolder,
  MailMessage,
  MessageSummary,
  ScanFilters,
  ScanOptions,
  ScanResult,
} from './types.js';

// ---------------------------------------------------------------------------
// Acceptance policy
// ---------------------------------------------------------------------------

/**
 * Decides from sender and subject alone whether a message is worth fetching.
 * - allow-listed sender: always accepted
 * - secondary folder: rejected otherwise
 * - subject filter set and subject non-empty: must contain a keyword
 * - otherwise accepted
 */
export function acceptMessage(
  summary: Pick<MessageSummary, 'sender' | 'subject'>,
  folder: Pick<MailFolder, 'secondary'>,
  filters: Pick<ScanFilters, 'whitelistedSenders' | 'subjectKeywords'>,
): boolean {
  if (filters.whitelistedSenders.length > 0 && isWhitelisted(summary.sender, filters.whitelistedSenders)) {
    return true;
  }

  if (folder.secondary) return false;

  const subject = summary.subject.trim().toLowerCase();
  if (filters.subjectKeywords.length > 0 && subject) {
    return filters.subjectKeywords.some((keyword) => subject.includes(keyword.toLowerCase()));
  }

  return true;
}

export function foldersToScan(filters: Pick<ScanFilters, 'whitelistedSenders'>): MailFolder[] {
  if (filters.whitelistedSenders.length === 0) return [MAIL_FOLDERS.inbox];
  return [MAIL_FOLDERS.inbox, MAIL_FOLDERS.spam, MAIL_FOLDERS.archive];
}

function isAuthFailure(err: unknown): boolean {
  return err instanceof AuthSessionError || isUnauthorizedError(err);
}

// ---------------------------------------------------------------------------
// MailScanner
// ---------------------------------------------------------------------------

export interface MailScannerDeps {
  gmail: GmailClient;
  session: AuthSession;
  linkResolver: LinkResolver;
  pageSize?: number;
  maxAttachmentBytes?: number;
}

export class MailScanner {
  private readonly gmail: GmailClient;
  private readonly linkResolver: LinkResolver;
  private readonly run: RequestRunner;
  private readonly pageSize: number;
  private readonly maxAttachmentBytes: number;

  constructor(deps: MailScannerDeps) {
    this.gmail = deps.gmail;
    this.linkResolver = deps.linkResolver;
    this.run = (label, request) => deps.session.call(label, request);
    this.pageSize = deps.pageSize ?? intakeConfig.pageSize;
    this.maxAttachmentBytes = deps.maxAttachmentBytes ?? intakeConfig.maxAttachmentBytes;
  }

  async scan(options: ScanOptions): Promise<ScanResult> {
    const result: ScanResult = {
      messages: [],
      listed: { inbox: 0, spam: 0, archive: 0 },
      skipped: 0,
      errors: [],
    };
    const seen = new Set<string>();

    for (const folder of foldersToScan(options)) {
      if (options.signal?.aborted) break;

      const ids = await listFolderMessageIds(this.gmail, folder, options.since, this.pageSize, this.run);
      result.listed[folder.name] = ids.length;
      console.log('[scanner] Listed folder', { folder: folder.name, messages: ids.length });

      for (const messageId of ids) {
        if (options.signal?.aborted) break;
        if (seen.has(messageId)) continue;
        seen.add(messageId);

        if (options.skipMessage?.(messageId)) {
          result.skipped++;
          continue;
        }

        try {
          const message = await this.readMessage(messageId, folder, options);
          if (message) result.messages.push(message);
        } catch (err) {
          if (isAuthFailure(err)) throw err;
          const msg = `Message ${messageId} (${folder.name}): ${errorMessage(err)}`;
          console.error('[scanner] Failed to read message, skipping', {
            messageId,
            folder: folder.name,
            error: errorMessage(err),
          });
          result.errors.push(msg);
        }
      }
    }

    console.log('[scanner] Scan complete', {
      listed: result.listed,
      emitted: result.messages.length,
      skipped: result.skipped,
      errors: result.errors.length,
    });
    return result;
  }

  /** Reads one message, or returns null when it is not accepted or carries no documents. */
  async readMessage(messageId: string, folder: MailFolder, filters: ScanFilters): Promise<MailMessage | null> {
    const summary = await getMessageSummary(this.gmail, messageId, this.run);
    if (!acceptMessage(summary, folder, filters)) return null;

    const payload = await getMessagePayload(this.gmail, messageId, this.run);
    const documents = await this.downloadAttachments(messageId, payload);

    const links = extractInvoiceLinks(extractMessageBody(payload), filters.linkKeywords);
    for (const url of links) {
      const document = await this.linkResolver.resolve(url);
      if (document) documents.push(document);
    }

    if (documents.length === 0) return null;

    return {
      messageId: summary.messageId,
      sender: summary.sender,
      subject: summary.subject,
      receivedAt: summary.receivedAt,
      sourceFolder: folder.name,
      documents,
    };
  }

  private async downloadAttachments(
    messageId: string,
    payload: gmail_v1.Schema$MessagePart | undefined,
  ): Promise<CandidateDocument[]> {
    const documents: CandidateDocument[] = [];

    for (const attachment of extractAttachments(payload)) {
      if (!isSupportedMediaType(attachment.mediaType)) {
        console.log('[scanner] Skipping unsupported attachment', {
          messageId,
          filename: attachment.filename,
          mediaType: attachment.mediaType,
        });
        continue;
      }

      if (attachment.size > this.maxAttachmentBytes) {
        console.warn('[scanner] Skipping oversized attachment', {
          messageId,
          filename: attachment.filename,
          size: attachment.size,
          limit: this.maxAttachmentBytes,
        });
        continue;
      }

      try {
        const bytes = await downloadAttachment(this.gmail, messageId, attachment.attachmentId, this.run);
        documents.push({
          name: attachment.filename,
          mediaType: attachment.mediaType,
          bytes,
          origin: 'attachment',
        });
      } catch (err) {
        if (isAuthFailure(err)) throw err;
        console.error('[scanner] Attachment download failed', {
          messageId,
          filename: attachment.filename,
          error: errorMessage(err),
        });
      }
    }

    return documents;
  }
}
