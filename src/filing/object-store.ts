/**
 * Path helpers over an ObjectStore
 *
 * uploadToPath is the idempotent upload: folders along the path are resolved
 * or created, and a file already present under the same name is returned
 * as-is instead of being uploaded again. Re-running a scan over the same
 * window therefore creates no duplicates.
 */

import type { CandidateDocument } from '../intake/index.js';
import type { ObjectStore, UploadResult } from './types.js';

export async function resolveFolderPath(store: ObjectStore, segments: readonly string[]): Promise<string> {
  let folderId = store.rootId;
  for (const segment of segments) {
    folderId = await store.resolveFolder(folderId, segment);
  }
  return folderId;
}

export async function uploadToPath(
  store: ObjectStore,
  segments: readonly string[],
  filename: string,
  document: Pick<CandidateDocument, 'bytes' | 'mediaType'>,
): Promise<UploadResult> {
  const folderId = await resolveFolderPath(store, segments);

  const existing = await store.findFile(folderId, filename);
  if (existing) {
    console.log('[filing] Already uploaded, reusing existing file', {
      path: [...segments, filename].join('/'),
      fileId: existing.id,
    });
    return { object: existing, alreadyExisted: true };
  }

  const object = await store.upload(folderId, filename, document.bytes, document.mediaType);
  console.log('[filing] Uploaded', { path: [...segments, filename].join('/'), fileId: object.id });
  return { object, alreadyExisted: false };
}
