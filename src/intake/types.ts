/**
 * Mail Intake Type Definitions
 *
 * - CandidateDocument: one classifiable unit (attachment, archive member or link download)
 * - MailMessage: one accepted mailbox item with its candidate documents
 * - MailFolder: a scanned Gmail folder and its trust level
 * - AttachmentInfo: attachment metadata from a Gmail message part
 */

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** How the classifier and pipeline treat a media type */
export type DocumentKind = 'pdf' | 'image' | 'spreadsheet' | 'archive' | 'unsupported';

export type DocumentOrigin = 'attachment' | 'archive' | 'link';

export interface CandidateDocument {
  name: string;
  /** Canonical media type (see normalizeMediaType) */
  mediaType: string;
  bytes: Buffer;
  origin: DocumentOrigin;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type MailFolderName = 'inbox' | 'spam' | 'archive';

export interface MailFolder {
  name: MailFolderName;
  /** Gmail label filter, if any */
  labelIds?: string[];
  /** Extra search terms appended to the time filter */
  query?: string;
  includeSpamTrash: boolean;
  /** Secondary folders only accept allow-listed senders */
  secondary: boolean;
}

export interface MailMessage {
  messageId: string;
  /** Lowercased sender address */
  sender: string;
  subject: string;
  /** ISO 8601, UTC */
  receivedAt: string;
  sourceFolder: MailFolderName;
  documents: CandidateDocument[];
}

/** Headers needed for the acceptance policy, read before any content is fetched */
export interface MessageSummary {
  messageId: string;
  sender: string;
  subject: string;
  receivedAt: string;
}

/** Attachment info extracted from a Gmail message part */
export interface AttachmentInfo {
  filename: string;
  mediaType: string;
  attachmentId: string;
  size: number;
}

export interface MessageBody {
  format: 'html' | 'text';
  content: string;
}

// ---------------------------------------------------------------------------
// Scan
// ---------------------------------------------------------------------------

export interface ScanFilters {
  /** Messages received after this instant; null scans everything */
  since: Date | null;
  whitelistedSenders: readonly string[];
  subjectKeywords: readonly string[];
  linkKeywords: readonly string[];
}

export interface ScanOptions extends ScanFilters {
  /** Skips a message before its content is fetched (e.g. already processed) */
  skipMessage?: (messageId: string) => boolean;
  signal?: AbortSignal;
}

export interface ScanResult {
  messages: MailMessage[];
  /** Messages listed, per folder, before filtering */
  listed: Record<MailFolderName, number>;
  skipped: number;
  errors: string[];
}
