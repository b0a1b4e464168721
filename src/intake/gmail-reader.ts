/**
 * Gmail Reader — Folder Listing and Message Reads
 *
 * Provides the Gmail reads the mail scanner is built on:
 * 1. listFolderMessageIds: paginated messages.list for one folder, newest first,
 *    filtered server-side by "after:<epoch seconds>"
 * 2. getMessageSummary: metadata-only fetch (From, Subject, internalDate) for the
 *    acceptance policy
 * 3. getMessagePayload: full fetch of the MIME tree (attachments and body)
 * 4. extractMessageBody: HTML body if present, else plain text
 *
 * All functions accept the gmail client as the first parameter (pure, testable).
 * Every request goes through the caller's RequestRunner so that the per-run
 * auth session can refresh and retry once on a 401.
 */

import { google } from 'googleapis';
import type { gmail_v1 } from 'googleapis';
import type { AuthSession } from '../google/index.js';
import type { MailFolder, MailFolderName, MessageBody, MessageSummary } from './types.js';

export type GmailClient = gmail_v1.Gmail;
type MessagePart = gmail_v1.Schema$MessagePart;

export type RequestRunner = <T>(label: string, request: () => Promise<T>) => Promise<T>;

const runDirect: RequestRunner = (_label, request) => request();

export function createGmailClient(session: AuthSession): GmailClient {
  return google.gmail({ version: 'v1', auth: session.auth });
}

// ---------------------------------------------------------------------------
// Folders
// ---------------------------------------------------------------------------

export const MAIL_FOLDERS: Record<MailFolderName, MailFolder> = {
  inbox: { name: 'inbox', labelIds: ['INBOX'], includeSpamTrash: false, secondary: false },
  spam: { name: 'spam', labelIds: ['SPAM'], includeSpamTrash: true, secondary: true },
  archive: {
    name: 'archive',
    query: '-in:inbox -in:spam -in:trash -in:sent -in:drafts',
    includeSpamTrash: false,
    secondary: true,
  },
};

/** Gmail search string for a folder and time floor */
export function buildFolderQuery(folder: MailFolder, since: Date | null): string | undefined {
  const terms: string[] = [];
  if (since) terms.push(`after:${Math.floor(since.getTime() / 1000)}`);
  if (folder.query) terms.push(folder.query);
  return terms.length > 0 ? terms.join(' ') : undefined;
}

// ---------------------------------------------------------------------------
// listFolderMessageIds
// ---------------------------------------------------------------------------

/**
 * Lists every message id in a folder received after `since`, following
 * nextPageToken until exhausted. Gmail returns newest first.
 */
export async function listFolderMessageIds(
  gmail: GmailClient,
  folder: MailFolder,
  since: Date | null,
  pageSize: number,
  run: RequestRunner = runDirect,
): Promise<string[]> {
  const q = buildFolderQuery(folder, since);
  const ids: string[] = [];
  let pageToken: string | undefined;

  do {
    const response = await run(`messages.list:${folder.name}`, () =>
      gmail.users.messages.list({
        userId: 'me',
        labelIds: folder.labelIds,
        q,
        maxResults: pageSize,
        pageToken,
        includeSpamTrash: folder.includeSpamTrash,
      }),
    );

    for (const message of response.data.messages ?? []) {
      if (message.id) ids.push(message.id);
    }
    pageToken = response.data.nextPageToken ?? undefined;
  } while (pageToken);

  return ids;
}

// ---------------------------------------------------------------------------
// getMessageSummary
// ---------------------------------------------------------------------------

export async function getMessageSummary(
  gmail: GmailClient,
  messageId: string,
  run: RequestRunner = runDirect,
): Promise<MessageSummary> {
  const response = await run('messages.get:metadata', () =>
    gmail.users.messages.get({
      userId: 'me',
      id: messageId,
      format: 'metadata',
      metadataHeaders: ['From', 'Subject'],
    }),
  );

  const headers = response.data.payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  return {
    messageId: response.data.id ?? messageId,
    sender: parseEmailFromHeader(getHeader('From')).toLowerCase(),
    subject: getHeader('Subject'),
    receivedAt: parseInternalDate(response.data.internalDate),
  };
}

/** internalDate is epoch milliseconds as a string */
function parseInternalDate(internalDate: string | null | undefined): string {
  const ms = Number(internalDate);
  return Number.isFinite(ms) && ms > 0 ? new Date(ms).toISOString() : new Date().toISOString();
}

// ---------------------------------------------------------------------------
// getMessagePayload
// ---------------------------------------------------------------------------

export async function getMessagePayload(
  gmail: GmailClient,
  messageId: string,
  run: RequestRunner = runDirect,
): Promise<MessagePart | undefined> {
  const response = await run('messages.get:full', () =>
    gmail.users.messages.get({ userId: 'me', id: messageId, format: 'full' }),
  );
  return response.data.payload ?? undefined;
}

// ---------------------------------------------------------------------------
// extractMessageBody
// ---------------------------------------------------------------------------

/**
 * Walks the MIME tree for the message body. text/html wins over text/plain;
 * attachments (parts with a filename) are never treated as body.
 */
export function extractMessageBody(payload: MessagePart | undefined): MessageBody | null {
  const html = findBodyPart(payload, 'text/html');
  if (html !== null) return { format: 'html', content: html };

  const text = findBodyPart(payload, 'text/plain');
  if (text !== null) return { format: 'text', content: text };

  return null;
}

function findBodyPart(part: MessagePart | undefined, mimeType: string): string | null {
  if (!part) return null;

  if (part.mimeType === mimeType && !part.filename && part.body?.data) {
    return Buffer.from(part.body.data, 'base64url').toString('utf-8');
  }

  for (const child of part.parts ?? []) {
    const result = findBodyPart(child, mimeType);
    if (result !== null) return result;
  }

  return null;
}

/**
 * Extracts the email address from a From header value.
 * Handles formats:
 * - "John Doe <john@example.com>" -> "john@example.com"
 * - "john@example.com" -> "john@example.com"
 * - "<john@example.com>" -> "john@example.com"
 */
export function parseEmailFromHeader(fromHeader: string): string {
  const match = fromHeader.match(/<([^>]+)>/);
  if (match) return match[1].trim();

  return fromHeader.trim();
}
