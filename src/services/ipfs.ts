import { z } from 'zod';
import { NotFoundError, StorageUnavailableError, parseIPFSError } from '../utils/errors';
import type { ContentStore } from './content-store';

const AddResultSchema = z.object({
  Name: z.string(),
  Hash: z.string(),
  Size: z.string(),
});

const DagPutResultSchema = z.object({
  Cid: z.object({ '/': z.string() }),
});

/**
 * IPFS RPC client for Kubo HTTP API
 * All methods use POST and call /api/v0/* endpoints
 */
export class IPFSService implements ContentStore {
  private readonly baseURL: string;

  constructor(baseURL: string) {
    // Remove trailing slash if present
    this.baseURL = baseURL.replace(/\/$/, '');
  }

  /**
   * Build full API endpoint URL
   */
  private endpoint(path: string, params?: Record<string, string>): string {
    const url = new URL(`${this.baseURL}/api/v0${path}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  /**
   * Make RPC call and handle errors
   */
  private async call(endpoint: string, options?: RequestInit): Promise<Response> {
    const startTime = Date.now();
    const path = new URL(endpoint).pathname;

    let response: Response;
    try {
      console.log(`[IPFS] → ${path}`);
      response = await fetch(endpoint, {
        method: 'POST',
        ...options,
      });
    } catch (error) {
      const duration = Date.now() - startTime;
      console.log(`[IPFS] ✘ ${path} (${duration}ms, error: ${error})`);
      throw new StorageUnavailableError(
        `Failed to connect to IPFS node: ${parseIPFSError(error)}`
      );
    }

    const duration = Date.now() - startTime;
    console.log(`[IPFS] ← ${path} (${duration}ms, status: ${response.status})`);

    if (!response.ok) {
      // Try to parse IPFS error response
      let errorMessage = `IPFS RPC failed with status ${response.status}`;
      try {
        errorMessage = parseIPFSError(await response.json());
      } catch {
        // body was not JSON; keep the status message
      }
      throw new StorageUnavailableError(errorMessage, { status: response.status, path });
    }

    return response;
  }

  /**
   * Add a file to IPFS
   * POST /api/v0/add
   */
  async add(formData: FormData): Promise<Array<z.infer<typeof AddResultSchema>>> {
    const url = this.endpoint('/add', {
      quieter: 'true',
      'cid-version': '1',
      pin: 'true',
    });

    const response = await this.call(url, { body: formData });
    const text = await response.text();

    // IPFS returns newline-delimited JSON
    return text
      .trim()
      .split('\n')
      .map((line) => AddResultSchema.parse(JSON.parse(line)));
  }

  async putBytes(bytes: Uint8Array, name: string = 'file'): Promise<{ cid: string; size: number }> {
    const formData = new FormData();
    formData.append('file', new Blob([bytes]), name);
    const [result] = await this.add(formData);
    if (!result) {
      throw new StorageUnavailableError('IPFS add returned no result');
    }
    return { cid: result.Hash, size: parseInt(result.Size, 10) };
  }

  /**
   * Store DAG node (dag-cbor)
   * POST /api/v0/dag/put
   *
   * Uses input-codec=dag-json so { "/": cid } members are stored as real
   * IPLD links (CBOR tag 42) for DAG traversal and CAR exports.
   */
  async putJSON(obj: unknown): Promise<string> {
    const url = this.endpoint('/dag/put', {
      'store-codec': 'dag-cbor',
      'input-codec': 'dag-json',
      pin: 'true',
    });

    // Send as multipart form data with field name "object"
    const formData = new FormData();
    const blob = new Blob([JSON.stringify(obj)], { type: 'application/json' });
    formData.append('object', blob);

    const response = await this.call(url, { body: formData });
    const result = DagPutResultSchema.parse(await response.json());
    return result.Cid['/'];
  }

  /**
   * Get DAG node
   * POST /api/v0/dag/get
   *
   * Offline: everything the ledger references was written to this node, so a
   * missing block is answered locally instead of searched for on the DHT.
   */
  async getJSON(cid: string): Promise<unknown> {
    const url = this.endpoint('/dag/get', { arg: cid, offline: 'true' });
    const response = await this.read(url, 'Document', cid);
    return await response.json();
  }

  /**
   * Cat file content
   * POST /api/v0/cat
   */
  async getBytes(cid: string): Promise<Uint8Array> {
    const url = this.endpoint('/cat', { arg: cid, offline: 'true' });
    const response = await this.read(url, 'Blob', cid);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async read(url: string, resource: string, cid: string): Promise<Response> {
    try {
      return await this.call(url);
    } catch (error) {
      if (isMissingBlockError(error)) {
        throw new NotFoundError(resource, cid);
      }
      throw error;
    }
  }

  /**
   * Write to MFS file
   * POST /api/v0/files/write
   */
  async mfsWrite(
    path: string,
    content: string,
    options: { create?: boolean; truncate?: boolean; parents?: boolean } = {}
  ): Promise<void> {
    const { create = false, truncate = false, parents = false } = options;

    const url = this.endpoint('/files/write', {
      arg: path,
      create: create.toString(),
      truncate: truncate.toString(),
      parents: parents.toString(),
    });

    const formData = new FormData();
    formData.append('file', new Blob([content], { type: 'text/plain' }));

    await this.call(url, { body: formData });
  }

  /**
   * Read from MFS file
   * POST /api/v0/files/read
   */
  async mfsRead(path: string): Promise<string> {
    const url = this.endpoint('/files/read', { arg: path });
    const response = await this.call(url);
    return await response.text();
  }
}

/**
 * Kubo answers reads of absent MFS paths with a 500 "file does not exist"
 */
export function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof StorageUnavailableError &&
    error.details?.status === 500 &&
    /does not exist/i.test(error.message)
  );
}

/**
 * Offline reads of absent blocks fail with a 500 "block was not found locally"
 */
export function isMissingBlockError(error: unknown): boolean {
  return (
    error instanceof StorageUnavailableError &&
    error.details?.status === 500 &&
    /not found|could not find/i.test(error.message)
  );
}
