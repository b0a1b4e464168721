import { describe, it, expect, vi, beforeEach } from 'vitest';
import { resolveFolderPath, uploadToPath } from '../object-store.js';
import { MemoryObjectStore } from './memory-object-store.js';

const document = { bytes: Buffer.from('%PDF-1.4'), mediaType: 'application/pdf' };

describe('resolveFolderPath', () => {
  it('resolves each segment under the previous one', async () => {
    const store = new MemoryObjectStore();
    const spy = vi.spyOn(store, 'resolveFolder');

    const id = await resolveFolderPath(store, ['Invoices', '2025', '06']);

    expect(spy.mock.calls).toEqual([
      ['root', 'Invoices'],
      ['folder-1', '2025'],
      ['folder-2', '06'],
    ]);
    expect(id).toBe('folder-3');
  });

  it('returns the root for an empty path', async () => {
    expect(await resolveFolderPath(new MemoryObjectStore(), [])).toBe('root');
  });
});

describe('uploadToPath', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('uploads a new file', async () => {
    const store = new MemoryObjectStore();

    const result = await uploadToPath(store, ['Invoices', '2025'], 'a.pdf', document);

    expect(result).toEqual({ object: { id: 'file-1', webLink: 'https://example.test/file-1' }, alreadyExisted: false });
    expect(store.pathOf(store.files[0])).toBe('Invoices/2025/a.pdf');
  });

  it('returns the existing object instead of uploading twice', async () => {
    const store = new MemoryObjectStore();
    await uploadToPath(store, ['Invoices', '2025'], 'a.pdf', document);

    const again = await uploadToPath(store, ['Invoices', '2025'], 'a.pdf', document);

    expect(again).toEqual({ object: { id: 'file-1', webLink: 'https://example.test/file-1' }, alreadyExisted: true });
    expect(store.uploadCount).toBe(1);
  });

  it('treats the same name in another folder as a new file', async () => {
    const store = new MemoryObjectStore();
    await uploadToPath(store, ['Invoices', '2025', '05'], 'a.pdf', document);
    await uploadToPath(store, ['Invoices', '2025', '06'], 'a.pdf', document);

    expect(store.uploadCount).toBe(2);
  });
});
