/**
 * Process environment read at startup (see config.ts)
 */
export interface Env {
  /**
   * Storage backend: "memory" (in-process, default) or "ipfs" (Kubo node)
   */
  STORAGE_BACKEND?: string;

  /**
   * IPFS Kubo RPC API URL, required when STORAGE_BACKEND=ipfs
   * Example: http://ipfs-kubo:5001 or http://127.0.0.1:5001
   */
  IPFS_API_URL?: string;

  /**
   * HTTP listen port (default 8787)
   */
  PORT?: string;

  /**
   * Hot log entries that trigger a snapshot rebuild (default 10000)
   */
  INDEX_SNAPSHOT_THRESHOLD?: string;

  /**
   * Entities per snapshot chunk (default 1000)
   */
  INDEX_CHUNK_SIZE?: string;

  /**
   * Attempts per relationship side effect before it is recorded as failed (default 10)
   */
  RELATION_MAX_ATTEMPTS?: string;
}
