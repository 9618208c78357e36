import { describe, it, expect } from 'vitest';
import { MemoryContentStore } from './content-store';
import { NotFoundError } from '../utils/errors';

describe('MemoryContentStore', () => {
  it('stores each distinct document once', async () => {
    const store = new MemoryContentStore();
    const first = await store.putJSON({ pi: 'x', ver: 1 });
    const second = await store.putJSON({ ver: 1, pi: 'x' });

    expect(second).toBe(first);
    expect(store.documentCount).toBe(1);
    await expect(store.getJSON(first)).resolves.toEqual({ pi: 'x', ver: 1 });
  });

  it('round-trips blobs and reports their size', async () => {
    const store = new MemoryContentStore();
    const bytes = new TextEncoder().encode('scan page 1');
    const { cid, size } = await store.putBytes(bytes);

    expect(size).toBe(11);
    expect(new TextDecoder().decode(await store.getBytes(cid))).toBe('scan page 1');
  });

  it('does not let callers mutate stored bytes', async () => {
    const store = new MemoryContentStore();
    const bytes = new Uint8Array([1, 2, 3]);
    const { cid } = await store.putBytes(bytes);
    bytes[0] = 9;
    const read = await store.getBytes(cid);
    read[1] = 9;

    expect(Array.from(await store.getBytes(cid))).toEqual([1, 2, 3]);
  });

  it('throws NotFoundError for unknown CIDs', async () => {
    const store = new MemoryContentStore();
    const { cid } = await store.putBytes(new Uint8Array([1]));

    await expect(store.getJSON(cid)).rejects.toBeInstanceOf(NotFoundError);
    const docCid = await new MemoryContentStore().putJSON({ a: 1 });
    await expect(store.getBytes(docCid)).rejects.toThrow(`Blob not found: ${docCid}`);
  });
});
