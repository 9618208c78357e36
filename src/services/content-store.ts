import { blobCID, decodeJSON, encodeJSON } from '../utils/cid';
import { NotFoundError } from '../utils/errors';

/**
 * Content-addressed store boundary.
 * Documents and blobs are immutable; the CID is a pure function of the content.
 */
export interface ContentStore {
  putJSON(doc: unknown): Promise<string>;
  getJSON(cid: string): Promise<unknown>;
  putBytes(bytes: Uint8Array, name?: string): Promise<{ cid: string; size: number }>;
  getBytes(cid: string): Promise<Uint8Array>;
}

/**
 * In-process content store.
 * CIDs are computed locally (CIDv1, sha2-256) so they are stable across runs.
 */
export class MemoryContentStore implements ContentStore {
  private readonly docs = new Map<string, Uint8Array>();
  private readonly blobs = new Map<string, Uint8Array>();

  async putJSON(doc: unknown): Promise<string> {
    const { cid, bytes } = await encodeJSON(doc);
    if (!this.docs.has(cid)) {
      this.docs.set(cid, bytes);
    }
    return cid;
  }

  async getJSON(cid: string): Promise<unknown> {
    const bytes = this.docs.get(cid);
    if (!bytes) {
      throw new NotFoundError('Document', cid);
    }
    return decodeJSON(bytes);
  }

  async putBytes(bytes: Uint8Array): Promise<{ cid: string; size: number }> {
    const cid = await blobCID(bytes);
    if (!this.blobs.has(cid)) {
      this.blobs.set(cid, bytes.slice());
    }
    return { cid, size: bytes.byteLength };
  }

  async getBytes(cid: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(cid);
    if (!bytes) {
      throw new NotFoundError('Blob', cid);
    }
    return bytes.slice();
  }

  /**
   * Number of stored documents (used to observe write deduplication)
   */
  get documentCount(): number {
    return this.docs.size;
  }
}
