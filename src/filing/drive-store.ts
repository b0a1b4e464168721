/**
 * Google Drive Object Store
 *
 * ObjectStore over Drive v3:
 * - resolveFolder: find a child folder by name, create it when missing (cached)
 * - findFile: look a file up by exact name within a folder
 * - upload: multipart create for small payloads, resumable session for large ones
 *
 * Every call goes through the session's refresh-and-retry wrapper.
 */

import { Readable } from 'node:stream';
import { google } from 'googleapis';
import type { drive_v3 } from 'googleapis';
import { httpStatusOf } from '../google/index.js';
import type { AuthSession } from '../google/index.js';
import { filingConfig } from './config.js';
import { ObjectStoreError } from './types.js';
import type { ObjectStore, StoredObject } from './types.js';

export type DriveClient = drive_v3.Drive;

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const RESUMABLE_UPLOAD_URL = 'https://www.googleapis.com/upload/drive/v3/files';

export function createDriveClient(session: AuthSession): DriveClient {
  return google.drive({ version: 'v3', auth: session.auth });
}

// ---------------------------------------------------------------------------
// Query Helpers
// ---------------------------------------------------------------------------

/** Escapes backslashes and single quotes for Drive query string literals */
export function escapeDriveQuery(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function fallbackWebLink(fileId: string): string {
  return `https://drive.google.com/file/d/${fileId}/view`;
}

function toStoredObject(file: { id?: string | null; webViewLink?: string | null }, name: string): StoredObject {
  if (!file.id) {
    throw new ObjectStoreError(`Drive API returned no ID for "${name}"`, 'NO_ID');
  }
  return { id: file.id, webLink: file.webViewLink ?? fallbackWebLink(file.id) };
}

// ---------------------------------------------------------------------------
// DriveObjectStore
// ---------------------------------------------------------------------------

export interface DriveObjectStoreOptions {
  drive: DriveClient;
  session: AuthSession;
  rootId?: string;
  simpleUploadMaxBytes?: number;
  uploadChunkBytes?: number;
}

export class DriveObjectStore implements ObjectStore {
  readonly rootId: string;
  private readonly drive: DriveClient;
  private readonly session: AuthSession;
  private readonly simpleUploadMaxBytes: number;
  private readonly uploadChunkBytes: number;
  private readonly folderCache = new Map<string, string>();

  constructor(options: DriveObjectStoreOptions) {
    this.drive = options.drive;
    this.session = options.session;
    this.rootId = options.rootId ?? filingConfig.parentFolderId;
    this.simpleUploadMaxBytes = options.simpleUploadMaxBytes ?? filingConfig.simpleUploadMaxBytes;
    this.uploadChunkBytes = options.uploadChunkBytes ?? filingConfig.uploadChunkBytes;
  }

  // -------------------------------------------------------------------------
  // Folders
  // -------------------------------------------------------------------------

  async resolveFolder(parentId: string, name: string): Promise<string> {
    const cacheKey = `${parentId}/${name}`;
    const cached = this.folderCache.get(cacheKey);
    if (cached) return cached;

    let folderId = await this.findFolder(parentId, name);
    if (!folderId) {
      folderId = await this.createFolder(parentId, name);
    }

    this.folderCache.set(cacheKey, folderId);
    return folderId;
  }

  private async findFolder(parentId: string, name: string): Promise<string | null> {
    const query =
      `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents ` +
      `and mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`;

    const response = await this.session.call('drive.files.list', () =>
      this.drive.files.list({
        q: query,
        fields: 'files(id, name)',
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      }),
    );

    const first = response.data.files?.[0];
    return first?.id ?? null;
  }

  private async createFolder(parentId: string, name: string): Promise<string> {
    try {
      const response = await this.session.call('drive.files.create', () =>
        this.drive.files.create({
          requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
          fields: 'id',
          supportsAllDrives: true,
        }),
      );
      const folderId = response.data.id;
      if (!folderId) {
        throw new ObjectStoreError(`Drive API returned no ID after creating folder "${name}"`, 'NO_ID');
      }
      console.log('[drive] Created folder', { name, folderId });
      return folderId;
    } catch (err) {
      if (httpStatusOf(err) !== 409) throw err;

      // Created concurrently by another writer
      const existing = await this.findFolder(parentId, name);
      if (!existing) {
        throw new ObjectStoreError(`Folder "${name}" conflicted on create but could not be found`, 'FOLDER_UNRESOLVED');
      }
      return existing;
    }
  }

  // -------------------------------------------------------------------------
  // Files
  // -------------------------------------------------------------------------

  async findFile(folderId: string, name: string): Promise<StoredObject | null> {
    const query =
      `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(folderId)}' in parents ` +
      `and mimeType != '${FOLDER_MIME_TYPE}' and trashed = false`;

    const response = await this.session.call('drive.files.list', () =>
      this.drive.files.list({
        q: query,
        fields: 'files(id, webViewLink)',
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      }),
    );

    const first = response.data.files?.[0];
    if (!first?.id) return null;
    return toStoredObject(first, name);
  }

  async upload(folderId: string, name: string, bytes: Buffer, mediaType: string): Promise<StoredObject> {
    if (bytes.length <= this.simpleUploadMaxBytes) {
      const response = await this.session.call('drive.files.create', () =>
        this.drive.files.create({
          requestBody: { name, parents: [folderId] },
          media: { mimeType: mediaType, body: Readable.from(bytes) },
          fields: 'id, webViewLink',
          supportsAllDrives: true,
        }),
      );
      return toStoredObject(response.data, name);
    }

    return this.uploadResumable(folderId, name, bytes, mediaType);
  }

  /**
   * Resumable upload: one POST opens the session, then fixed-size PUT chunks
   * with Content-Range. Drive answers 308 until the last chunk lands.
   */
  private async uploadResumable(
    folderId: string,
    name: string,
    bytes: Buffer,
    mediaType: string,
  ): Promise<StoredObject> {
    const start = await this.session.call('drive.upload.start', () =>
      this.session.auth.request<unknown>({
        url: RESUMABLE_UPLOAD_URL,
        method: 'POST',
        params: { uploadType: 'resumable', fields: 'id,webViewLink', supportsAllDrives: true },
        headers: {
          'X-Upload-Content-Type': mediaType,
          'X-Upload-Content-Length': String(bytes.length),
        },
        data: { name, parents: [folderId] },
      }),
    );

    const sessionUri: unknown = start.headers.location;
    if (typeof sessionUri !== 'string' || sessionUri.length === 0) {
      throw new ObjectStoreError(`Drive did not open an upload session for "${name}"`, 'UPLOAD_SESSION');
    }

    const total = bytes.length;
    for (let offset = 0; offset < total; offset += this.uploadChunkBytes) {
      const end = Math.min(offset + this.uploadChunkBytes, total);
      const chunk = bytes.subarray(offset, end);

      const response = await this.session.call('drive.upload.chunk', () =>
        this.session.auth.request<drive_v3.Schema$File>({
          url: sessionUri,
          method: 'PUT',
          headers: {
            'Content-Length': String(chunk.length),
            'Content-Range': `bytes ${offset}-${end - 1}/${total}`,
          },
          data: Readable.from(chunk),
          validateStatus: (status) => status === 308 || (status >= 200 && status < 300),
        }),
      );

      if (response.status !== 308) {
        console.log('[drive] Resumable upload complete', { name, bytes: total });
        return toStoredObject(response.data, name);
      }
    }

    throw new ObjectStoreError(`Upload session for "${name}" never completed`, 'UPLOAD_SESSION');
  }
}
