import { StorageUnavailableError } from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { isMissingPathError } from './ipfs';

export type CASResult = { ok: true } | { ok: false; actual: string | null };

/**
 * Mutable pointer substrate: small string values under keys, changed only
 * through an atomic "write if current value equals" operation.
 * `expected = null` means "only if the key does not exist yet".
 */
export interface PointerStore {
  read(key: string): Promise<string | null>;
  compareAndSwap(key: string, expected: string | null, next: string): Promise<CASResult>;
}

/**
 * In-process pointer store. Compare and set run in one synchronous step,
 * so concurrent callers on the event loop can never interleave between them.
 */
export class MemoryPointerStore implements PointerStore {
  private readonly values = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async compareAndSwap(key: string, expected: string | null, next: string): Promise<CASResult> {
    const actual = this.values.get(key) ?? null;
    if (actual !== expected) {
      return { ok: false, actual };
    }
    this.values.set(key, next);
    return { ok: true };
  }

  /**
   * Keys under a prefix (for inspection in tools and tests)
   */
  keys(prefix: string = ''): string[] {
    return [...this.values.keys()].filter((k) => k.startsWith(prefix)).sort();
  }
}

/**
 * The subset of the Kubo MFS API the pointer store needs
 */
export interface MfsClient {
  mfsRead(path: string): Promise<string>;
  mfsWrite(
    path: string,
    content: string,
    options?: { create?: boolean; truncate?: boolean; parents?: boolean }
  ): Promise<void>;
}

/**
 * Pointer store backed by files in Kubo's MFS.
 * Each key is an MFS path holding a single line: <value>\n
 *
 * MFS has no native compare-and-swap. Writers in this process are serialized
 * per key, and every write is read back: if another process overwrote the
 * file in between, the swap is reported as failed with the value found.
 */
export class MfsPointerStore implements PointerStore {
  private readonly locks = new KeyedMutex();

  constructor(private readonly mfs: MfsClient) {}

  async read(key: string): Promise<string | null> {
    try {
      const content = await this.mfs.mfsRead(key);
      const value = content.trim();
      return value === '' ? null : value;
    } catch (error) {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    }
  }

  async compareAndSwap(key: string, expected: string | null, next: string): Promise<CASResult> {
    if (next.includes('\n')) {
      throw new StorageUnavailableError(`Pointer value for ${key} must be a single line`);
    }

    return this.locks.run(key, async () => {
      const actual = await this.read(key);
      if (actual !== expected) {
        return { ok: false, actual };
      }

      await this.mfs.mfsWrite(key, `${next}\n`, {
        create: true,
        truncate: true,
        parents: true,
      });

      const written = await this.read(key);
      if (written !== next) {
        console.warn(`[POINTER] Write race on ${key}: wrote ${next}, read back ${written}`);
        return { ok: false, actual: written };
      }
      return { ok: true };
    });
  }
}
