import { MemoryContentStore } from './services/content-store';
import { MemoryPointerStore, type PointerStore, type CASResult } from './services/pointer-store';
import { createLedger, type Ledger, type LedgerOptions } from './services/ledger';
import { blobCID } from './utils/cid';
import { StorageUnavailableError } from './utils/errors';

/**
 * Clock that advances by `stepMs` on every call, so each manifest gets a
 * distinct, predictable timestamp
 */
export function tickingClock(start: string = '2025-01-01T00:00:00.000Z', stepMs: number = 1000): () => Date {
  let next = Date.parse(start);
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

/**
 * Deterministic, valid PI for fixtures: testPi(7) -> "01HX0000000000000000000007"
 */
export function testPi(n: number): string {
  return `01HX${String(n).padStart(22, '0')}`;
}

/**
 * CID of a small raw blob, for use as a component reference
 */
export function testCid(label: string): Promise<string> {
  return blobCID(new TextEncoder().encode(label));
}

export interface TestLedger extends Ledger {
  memory: MemoryContentStore;
  pointerStore: MemoryPointerStore;
}

export function createTestLedger(
  overrides: Partial<Omit<LedgerOptions, 'store' | 'pointers'>> = {}
): TestLedger {
  const memory = new MemoryContentStore();
  const pointerStore = new MemoryPointerStore();
  const ledger = createLedger({
    store: memory,
    pointers: pointerStore,
    clock: tickingClock(),
    relations: { baseDelayMs: 0 },
    ...overrides,
  });
  return { ...ledger, memory, pointerStore };
}

/**
 * Pointer store that can be switched into an outage
 */
export class FlakyPointerStore implements PointerStore {
  failing = false;

  constructor(private readonly inner: PointerStore = new MemoryPointerStore()) {}

  async read(key: string): Promise<string | null> {
    this.check();
    return this.inner.read(key);
  }

  async compareAndSwap(key: string, expected: string | null, next: string): Promise<CASResult> {
    this.check();
    return this.inner.compareAndSwap(key, expected, next);
  }

  private check(): void {
    if (this.failing) {
      throw new StorageUnavailableError('pointer substrate offline');
    }
  }
}
