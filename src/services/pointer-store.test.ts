import { describe, it, expect } from 'vitest';
import { MemoryPointerStore, type MfsClient, MfsPointerStore } from './pointer-store';
import { StorageUnavailableError } from '../utils/errors';

describe('MemoryPointerStore', () => {
  it('creates a key only when expected is null', async () => {
    const store = new MemoryPointerStore();
    expect(await store.compareAndSwap('/k', null, 'a')).toEqual({ ok: true });
    expect(await store.compareAndSwap('/k', null, 'b')).toEqual({ ok: false, actual: 'a' });
    expect(await store.read('/k')).toBe('a');
  });

  it('swaps only from the current value', async () => {
    const store = new MemoryPointerStore();
    await store.compareAndSwap('/k', null, 'a');
    expect(await store.compareAndSwap('/k', 'stale', 'c')).toEqual({ ok: false, actual: 'a' });
    expect(await store.compareAndSwap('/k', 'a', 'c')).toEqual({ ok: true });
    expect(await store.read('/k')).toBe('c');
  });

  it('admits exactly one of many racing writers', async () => {
    const store = new MemoryPointerStore();
    await store.compareAndSwap('/k', null, 'base');
    const results = await Promise.all(
      ['x', 'y', 'z'].map((next) => store.compareAndSwap('/k', 'base', next))
    );
    expect(results.filter((r) => r.ok)).toHaveLength(1);
  });

  it('lists keys under a prefix', async () => {
    const store = new MemoryPointerStore();
    await store.compareAndSwap('/a/2', null, 'v');
    await store.compareAndSwap('/a/1', null, 'v');
    await store.compareAndSwap('/b/1', null, 'v');
    expect(store.keys('/a/')).toEqual(['/a/1', '/a/2']);
  });
});

/**
 * In-process stand-in for Kubo's MFS endpoints
 */
class FakeMfs implements MfsClient {
  readonly files = new Map<string, string>();
  onWrite: ((path: string) => void) | null = null;
  offline = false;

  async mfsRead(path: string): Promise<string> {
    if (this.offline) {
      throw new StorageUnavailableError('Failed to connect to IPFS node: ECONNREFUSED');
    }
    const content = this.files.get(path);
    if (content === undefined) {
      throw new StorageUnavailableError('file does not exist', {
        status: 500,
        path: '/api/v0/files/read',
      });
    }
    return content;
  }

  async mfsWrite(path: string, content: string): Promise<void> {
    this.files.set(path, content);
    this.onWrite?.(path);
  }
}

describe('MfsPointerStore', () => {
  it('treats a missing file as an absent key', async () => {
    const store = new MfsPointerStore(new FakeMfs());
    expect(await store.read('/ledger/tips/0/1/X.tip')).toBeNull();
  });

  it('writes one line per key', async () => {
    const mfs = new FakeMfs();
    const store = new MfsPointerStore(mfs);

    expect(await store.compareAndSwap('/p', null, 'bafyA')).toEqual({ ok: true });
    expect(mfs.files.get('/p')).toBe('bafyA\n');
    expect(await store.read('/p')).toBe('bafyA');
    expect(await store.compareAndSwap('/p', null, 'bafyB')).toEqual({ ok: false, actual: 'bafyA' });
  });

  it('serializes writers in this process', async () => {
    const store = new MfsPointerStore(new FakeMfs());
    const results = await Promise.all([
      store.compareAndSwap('/p', null, 'first'),
      store.compareAndSwap('/p', null, 'second'),
    ]);

    expect(results).toEqual([{ ok: true }, { ok: false, actual: 'first' }]);
  });

  it('reports a lost race when another process overwrites the file', async () => {
    const mfs = new FakeMfs();
    mfs.onWrite = (path) => {
      mfs.files.set(path, 'elsewhere\n');
    };
    const store = new MfsPointerStore(mfs);

    expect(await store.compareAndSwap('/p', null, 'mine')).toEqual({
      ok: false,
      actual: 'elsewhere',
    });
  });

  it('propagates errors other than a missing path', async () => {
    const mfs = new FakeMfs();
    mfs.offline = true;
    const store = new MfsPointerStore(mfs);
    await expect(store.read('/p')).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('refuses multi-line values', async () => {
    const store = new MfsPointerStore(new FakeMfs());
    await expect(store.compareAndSwap('/p', null, 'a\nb')).rejects.toBeInstanceOf(
      StorageUnavailableError
    );
  });
});
