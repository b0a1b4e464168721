/**
 * Attachment Extractor — finds file parts in a Gmail payload and downloads them.
 *
 * Inline parts (Content-Disposition: inline, or a Content-ID with no filename)
 * are signatures and embedded images and never become documents. Size and
 * media-type filtering happen in the scanner, which logs what it drops.
 */

import type { gmail_v1 } from 'googleapis';
import { normalizeMediaType } from './config.js';
import type { RequestRunner } from './gmail-reader.js';
import type { AttachmentInfo } from './types.js';

type MessagePart = gmail_v1.Schema$MessagePart;
type GmailClient = gmail_v1.Gmail;

// ---------------------------------------------------------------------------
// extractAttachments
// ---------------------------------------------------------------------------

export function extractAttachments(payload: MessagePart | undefined): AttachmentInfo[] {
  if (!payload) return [];

  const attachments: AttachmentInfo[] = [];
  walkParts([payload], attachments);
  return attachments;
}

function walkParts(parts: MessagePart[], result: AttachmentInfo[]): void {
  for (const part of parts) {
    if (part.filename && part.body?.attachmentId && !isInlinePart(part)) {
      result.push({
        filename: part.filename,
        mediaType: normalizeMediaType(part.mimeType, part.filename),
        attachmentId: part.body.attachmentId,
        size: part.body.size ?? 0,
      });
    }

    if (part.parts && part.parts.length > 0) {
      walkParts(part.parts, result);
    }
  }
}

export function isInlinePart(part: MessagePart): boolean {
  const header = (name: string): string | undefined =>
    part.headers?.find((h) => h.name?.toLowerCase() === name)?.value ?? undefined;

  const disposition = header('content-disposition');
  if (disposition) return disposition.trim().toLowerCase().startsWith('inline');

  return Boolean(header('content-id')) && !part.filename;
}

// ---------------------------------------------------------------------------
// downloadAttachment
// ---------------------------------------------------------------------------

/**
 * Downloads and decodes a single attachment. The listing never carries content,
 * so every attachment is fetched by id.
 */
export async function downloadAttachment(
  gmail: GmailClient,
  messageId: string,
  attachmentId: string,
  run: RequestRunner = (_label, request) => request(),
): Promise<Buffer> {
  const response = await run('attachments.get', () =>
    gmail.users.messages.attachments.get({
      userId: 'me',
      messageId,
      id: attachmentId,
    }),
  );

  const data = response.data.data;
  if (!data) {
    throw new Error(`[scanner] Attachment ${attachmentId} on message ${messageId} returned no data`);
  }

  return Buffer.from(data, 'base64url');
}
