import { describe, it, expect } from 'vitest';
import {
  getIndexOptions,
  getPort,
  getRelationMaxAttempts,
  getStorageBackend,
  validateEnv,
} from './config';

describe('validateEnv', () => {
  it('accepts an empty environment', () => {
    expect(() => validateEnv({})).not.toThrow();
  });

  it('rejects unknown storage backends', () => {
    expect(() => validateEnv({ STORAGE_BACKEND: 's3' })).toThrow(
      'Invalid STORAGE_BACKEND: s3 (expected "memory" or "ipfs")'
    );
  });

  it('requires a Kubo URL for the ipfs backend', () => {
    expect(() => validateEnv({ STORAGE_BACKEND: 'ipfs' })).toThrow(
      'IPFS_API_URL is required when STORAGE_BACKEND=ipfs'
    );
    expect(() => validateEnv({ STORAGE_BACKEND: 'ipfs', IPFS_API_URL: 'not a url' })).toThrow(
      'Invalid IPFS_API_URL: not a url'
    );
    expect(() => validateEnv({ STORAGE_BACKEND: 'ipfs', IPFS_API_URL: 'http://localhost:5001' })).not.toThrow();
  });

  it('rejects non-numeric tuning values', () => {
    expect(() => validateEnv({ INDEX_CHUNK_SIZE: 'lots' })).toThrow(
      'Invalid INDEX_CHUNK_SIZE: lots (expected a positive integer)'
    );
  });
});

describe('getters', () => {
  it('fall back to defaults', () => {
    expect(getStorageBackend({})).toBe('memory');
    expect(getPort({})).toBe(8787);
    expect(getIndexOptions({})).toEqual({ snapshotThreshold: 10000, chunkSize: 1000 });
    expect(getRelationMaxAttempts({})).toBe(10);
  });

  it('read configured values', () => {
    expect(getPort({ PORT: '3000' })).toBe(3000);
    expect(getIndexOptions({ INDEX_SNAPSHOT_THRESHOLD: '50', INDEX_CHUNK_SIZE: '10' })).toEqual({
      snapshotThreshold: 50,
      chunkSize: 10,
    });
    expect(getRelationMaxAttempts({ RELATION_MAX_ATTEMPTS: '3' })).toBe(3);
  });

  it('reject out-of-range ports', () => {
    expect(() => getPort({ PORT: '70000' })).toThrow('Invalid PORT: 70000');
    expect(() => getPort({ PORT: '0' })).toThrow('Invalid PORT: 0 (expected a positive integer)');
  });
});
