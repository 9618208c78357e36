import type { Env } from './types/env';
import { DEFAULT_CHUNK_SIZE, DEFAULT_SNAPSHOT_THRESHOLD } from './services/index-engine';

export type StorageBackend = 'memory' | 'ipfs';

const DEFAULT_PORT = 8787;
const DEFAULT_RELATION_MAX_ATTEMPTS = 10;

/**
 * Validate environment configuration
 * Throws on the first invalid value
 */
export function validateEnv(env: Env): void {
  const backend = env.STORAGE_BACKEND ?? 'memory';
  if (backend !== 'memory' && backend !== 'ipfs') {
    throw new Error(`Invalid STORAGE_BACKEND: ${backend} (expected "memory" or "ipfs")`);
  }

  if (backend === 'ipfs') {
    if (!env.IPFS_API_URL) {
      throw new Error('IPFS_API_URL is required when STORAGE_BACKEND=ipfs');
    }
    try {
      new URL(env.IPFS_API_URL);
    } catch {
      throw new Error(`Invalid IPFS_API_URL: ${env.IPFS_API_URL}`);
    }
  }

  getPort(env);
  getIndexOptions(env);
  getRelationMaxAttempts(env);
}

export function getStorageBackend(env: Env): StorageBackend {
  return env.STORAGE_BACKEND === 'ipfs' ? 'ipfs' : 'memory';
}

/**
 * Get IPFS API URL from environment
 */
export function getIPFSURL(env: Env): string {
  if (!env.IPFS_API_URL) {
    throw new Error('IPFS_API_URL is not set');
  }
  return env.IPFS_API_URL;
}

export function getPort(env: Env): number {
  const port = positiveInt('PORT', env.PORT, DEFAULT_PORT);
  if (port > 65535) {
    throw new Error(`Invalid PORT: ${port}`);
  }
  return port;
}

export function getIndexOptions(env: Env): { snapshotThreshold: number; chunkSize: number } {
  return {
    snapshotThreshold: positiveInt(
      'INDEX_SNAPSHOT_THRESHOLD',
      env.INDEX_SNAPSHOT_THRESHOLD,
      DEFAULT_SNAPSHOT_THRESHOLD
    ),
    chunkSize: positiveInt('INDEX_CHUNK_SIZE', env.INDEX_CHUNK_SIZE, DEFAULT_CHUNK_SIZE),
  };
}

export function getRelationMaxAttempts(env: Env): number {
  return positiveInt('RELATION_MAX_ATTEMPTS', env.RELATION_MAX_ATTEMPTS, DEFAULT_RELATION_MAX_ATTEMPTS);
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid ${name}: ${raw} (expected a positive integer)`);
  }
  return value;
}
