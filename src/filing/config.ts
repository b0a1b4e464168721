/**
 * Filing Configuration
 *
 * Environment variables:
 * - DRIVE_PARENT_FOLDER_ID: Drive folder that holds the invoice tree (default: My Drive root)
 * - DRIVE_FOLDER_NAME: Name of the invoice tree's root folder (default: Invoices)
 * - REVIEW_FOLDER_NAME: Per-month folder for everything not filed as an invoice (default: _review)
 */

import { optionalEnv } from '../config.js';

export interface FilingConfig {
  parentFolderId: string;
  rootFolderName: string;
  reviewFolderName: string;
  /** Payloads up to this size use a single multipart request */
  simpleUploadMaxBytes: number;
  /** Resumable upload chunk: a multiple of both 256 KiB and 320 KiB */
  uploadChunkBytes: number;
}

export const filingConfig: FilingConfig = {
  parentFolderId: optionalEnv('DRIVE_PARENT_FOLDER_ID', 'root'),
  rootFolderName: optionalEnv('DRIVE_FOLDER_NAME', 'Invoices'),
  reviewFolderName: optionalEnv('REVIEW_FOLDER_NAME', '_review'),
  simpleUploadMaxBytes: 4 * 1024 * 1024,
  uploadChunkBytes: 5 * 1024 * 1024,
};
