/**
 * Filing Type Definitions
 *
 * - ObjectStore: the path-addressable store documents are filed into
 * - StoredObject: a stored file's id and shareable link
 * - StoragePeriod: the year/month folder a document lands in
 * - DocumentStatus / MessageOutcome: pipeline results
 */

import type { Decision } from '../classification/index.js';

// ---------------------------------------------------------------------------
// Object store
// ---------------------------------------------------------------------------

export type ObjectStoreErrorCode = 'NO_ID' | 'FOLDER_UNRESOLVED' | 'UPLOAD_SESSION';

export class ObjectStoreError extends Error {
  readonly code: ObjectStoreErrorCode;

  constructor(message: string, code: ObjectStoreErrorCode) {
    super(message);
    this.name = 'ObjectStoreError';
    this.code = code;
  }
}

export interface StoredObject {
  id: string;
  webLink: string;
}

export interface ObjectStore {
  /** Id of the folder the whole tree hangs from */
  readonly rootId: string;
  /** Finds a child folder by name, creating it when missing */
  resolveFolder(parentId: string, name: string): Promise<string>;
  findFile(folderId: string, name: string): Promise<StoredObject | null>;
  upload(folderId: string, name: string, bytes: Buffer, mediaType: string): Promise<StoredObject>;
}

export interface UploadResult {
  object: StoredObject;
  /** True when a file already sat at the target path and nothing was uploaded */
  alreadyExisted: boolean;
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export interface StoragePeriod {
  year: number;
  /** 1-12 */
  month: number;
}

export type DocumentStatus = Decision;

export interface DocumentOutcome {
  name: string;
  status: DocumentStatus;
}

export interface MessageOutcome {
  messageId: string;
  documents: DocumentOutcome[];
  errors: string[];
}
