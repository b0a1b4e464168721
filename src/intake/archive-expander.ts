/**
 * Archive Expander — zip attachments into individual documents
 *
 * One level only: members are filtered by extension against the supported
 * set minus archives, so a zip inside a zip is skipped rather than opened.
 * Directory entries and macOS metadata (__MACOSX/, ._ resource forks) are
 * skipped. Each member becomes a document named after its base filename.
 *
 * A corrupt or unreadable archive yields [] and a warning; it never throws.
 */

import JSZip from 'jszip';

import { EXTENSION_MEDIA_TYPES, documentKindOf, extensionOf } from './config.js';
import type { CandidateDocument } from './types.js';

export function isArchive(document: Pick<CandidateDocument, 'mediaType'>): boolean {
  return documentKindOf(document.mediaType) === 'archive';
}

function isPlatformMetadata(path: string): boolean {
  const base = path.split('/').pop() ?? '';
  return path.split('/').includes('__MACOSX') || base.startsWith('._') || base === '.DS_Store';
}

function memberMediaType(path: string): string | null {
  const mediaType = EXTENSION_MEDIA_TYPES.get(extensionOf(path));
  if (!mediaType || documentKindOf(mediaType) === 'archive') return null;
  return mediaType;
}

export async function expandArchive(archive: CandidateDocument): Promise<CandidateDocument[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(archive.bytes);
  } catch (err) {
    console.warn('[archive] Could not open archive', {
      name: archive.name,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  const documents: CandidateDocument[] = [];

  for (const entry of Object.values(zip.files)) {
    if (entry.dir || isPlatformMetadata(entry.name)) continue;

    const mediaType = memberMediaType(entry.name);
    if (!mediaType) {
      console.log('[archive] Skipping unsupported member', { archive: archive.name, member: entry.name });
      continue;
    }

    try {
      const bytes = await entry.async('nodebuffer');
      documents.push({
        name: entry.name.split('/').pop() ?? entry.name,
        mediaType,
        bytes,
        origin: 'archive',
      });
    } catch (err) {
      console.warn('[archive] Could not read member', {
        archive: archive.name,
        member: entry.name,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  console.log('[archive] Expanded', { name: archive.name, members: documents.length });
  return documents;
}
