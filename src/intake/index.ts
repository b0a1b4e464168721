/**
 * Mail intake barrel: scanner, link resolution and archive expansion.
 */

export { MailScanner } from './mail-scanner.js';
export { LinkResolver } from './link-resolver.js';
export { expandArchive, isArchive } from './archive-expander.js';
export { createGmailClient } from './gmail-reader.js';
export { intakeConfig, documentKindOf } from './config.js';
export type {
  CandidateDocument,
  DocumentKind,
  MailMessage,
  ScanOptions,
  ScanResult,
} from './types.js';
