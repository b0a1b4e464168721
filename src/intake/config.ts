/**
 * Intake Module Configuration
 *
 * Provides configuration for mailbox intake:
 * - Mailbox to scan and polling interval
 * - Page size for message listing (Gmail caps maxResults at 500)
 * - Attachment / link download size ceiling
 * - Link download timeout, redirect limit and User-Agent
 * - Supported media types and their extension mapping
 */

import { intEnv, optionalEnv } from '../config.js';
import type { DocumentKind } from './types.js';

// ---------------------------------------------------------------------------
// Config Interface
// ---------------------------------------------------------------------------

export interface IntakeConfig {
  /** Mailbox to scan (service-account impersonation target) */
  mailbox: string;
  /** Polling interval in milliseconds (default: 60 minutes) */
  pollIntervalMs: number;
  /** messages.list page size, at most 500 */
  pageSize: number;
  /** Floor for scheduled polls when nothing has been processed yet */
  lookbackDays: number;
  /** Hard ceiling for attachments and link downloads (default: 20 MiB) */
  maxAttachmentBytes: number;
  linkTimeoutMs: number;
  linkMaxRedirects: number;
  linkUserAgent: string;
  enabled: boolean;
}

const GMAIL_MAX_PAGE_SIZE = 500;

// ---------------------------------------------------------------------------
// Media Types
// ---------------------------------------------------------------------------

export const XLSX_MEDIA_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const XLS_MEDIA_TYPE = 'application/vnd.ms-excel';

/** Supported media types and how the classifier treats them */
export const SUPPORTED_MEDIA_TYPES = new Map<string, DocumentKind>([
  ['application/pdf', 'pdf'],
  ['image/jpeg', 'image'],
  ['image/png', 'image'],
  ['image/tiff', 'image'],
  [XLSX_MEDIA_TYPE, 'spreadsheet'],
  [XLS_MEDIA_TYPE, 'spreadsheet'],
  ['application/zip', 'archive'],
]);

const MEDIA_TYPE_ALIASES = new Map<string, string>([
  ['application/x-pdf', 'application/pdf'],
  ['image/jpg', 'image/jpeg'],
  ['image/pjpeg', 'image/jpeg'],
  ['application/x-zip-compressed', 'application/zip'],
  ['application/x-zip', 'application/zip'],
]);

export const EXTENSION_MEDIA_TYPES = new Map<string, string>([
  ['.pdf', 'application/pdf'],
  ['.jpg', 'image/jpeg'],
  ['.jpeg', 'image/jpeg'],
  ['.png', 'image/png'],
  ['.tif', 'image/tiff'],
  ['.tiff', 'image/tiff'],
  ['.xlsx', XLSX_MEDIA_TYPE],
  ['.xls', XLS_MEDIA_TYPE],
  ['.zip', 'application/zip'],
]);

const MEDIA_TYPE_EXTENSIONS = new Map<string, string>([
  ['application/pdf', '.pdf'],
  ['image/jpeg', '.jpg'],
  ['image/png', '.png'],
  ['image/tiff', '.tiff'],
  [XLSX_MEDIA_TYPE, '.xlsx'],
  [XLS_MEDIA_TYPE, '.xls'],
  ['application/zip', '.zip'],
]);

/** Lowercase extension including the dot, or '' */
export function extensionOf(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

/**
 * Canonical media type for a Content-Type value: parameters dropped,
 * lowercased, aliases folded. Generic binary types fall back to the
 * filename's extension when one is given.
 */
export function normalizeMediaType(contentType: string | null | undefined, filename?: string): string {
  const bare = (contentType ?? '').split(';')[0].trim().toLowerCase();
  const canonical = MEDIA_TYPE_ALIASES.get(bare) ?? bare;

  if ((canonical === '' || canonical === 'application/octet-stream') && filename) {
    return EXTENSION_MEDIA_TYPES.get(extensionOf(filename)) ?? canonical;
  }
  return canonical;
}

export function documentKindOf(mediaType: string): DocumentKind {
  return SUPPORTED_MEDIA_TYPES.get(normalizeMediaType(mediaType)) ?? 'unsupported';
}

export function isSupportedMediaType(mediaType: string): boolean {
  return documentKindOf(mediaType) !== 'unsupported';
}

export function extensionForMediaType(mediaType: string): string {
  return MEDIA_TYPE_EXTENSIONS.get(normalizeMediaType(mediaType)) ?? '.bin';
}

// ---------------------------------------------------------------------------
// Config Instance
// ---------------------------------------------------------------------------

export const intakeConfig: IntakeConfig = {
  mailbox: optionalEnv('MAIL_INBOX', 'invoices@example.com'),
  pollIntervalMs: intEnv('POLL_INTERVAL_MINUTES', 60) * 60 * 1000,
  pageSize: Math.min(intEnv('SCAN_PAGE_SIZE', GMAIL_MAX_PAGE_SIZE), GMAIL_MAX_PAGE_SIZE),
  lookbackDays: intEnv('SCAN_LOOKBACK_DAYS', 7),
  maxAttachmentBytes: intEnv('MAX_ATTACHMENT_MB', 20) * 1024 * 1024,
  linkTimeoutMs: intEnv('LINK_TIMEOUT_MS', 30_000),
  linkMaxRedirects: intEnv('LINK_MAX_REDIRECTS', 5),
  linkUserAgent: 'Mozilla/5.0 (invoice-bot)',
  enabled: process.env.INTAKE_ENABLED !== 'false', // Enabled by default
};
