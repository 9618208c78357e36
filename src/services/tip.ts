import { shard2 } from '../utils/ulid';
import { NotFoundError } from '../utils/errors';
import type { CASResult, PointerStore } from './pointer-store';

/**
 * Tip registry: PI -> CID of the entity's current manifest.
 * Tips are stored at: /ledger/tips/<pi[0]>/<pi[1]>/<PI>.tip
 *
 * compareAndSwap is the only way a tip changes, and the only admission point
 * deciding which of two racing version appends wins.
 */
export class TipService {
  private readonly baseDir = '/ledger/tips';

  constructor(private readonly pointers: PointerStore) {}

  /**
   * Build pointer key for PI's tip
   * Example: "01J8ME3H..." -> "/ledger/tips/0/1/01J8ME3H....tip"
   */
  tipPath(pi: string): string {
    const [a, b] = shard2(pi);
    return `${this.baseDir}/${a}/${b}/${pi}.tip`;
  }

  /**
   * Read tip CID for PI
   * Throws NotFoundError if tip doesn't exist
   */
  async readTip(pi: string): Promise<string> {
    const tip = await this.pointers.read(this.tipPath(pi));
    if (tip === null) {
      throw new NotFoundError('Entity', pi);
    }
    return tip;
  }

  /**
   * Check if tip exists for PI
   */
  async tipExists(pi: string): Promise<boolean> {
    return (await this.pointers.read(this.tipPath(pi))) !== null;
  }

  /**
   * Advance the tip from `expected` to `next` atomically.
   * `expected = null` creates the tip and fails if the entity already exists.
   */
  async compareAndSwap(pi: string, expected: string | null, next: string): Promise<CASResult> {
    const result = await this.pointers.compareAndSwap(this.tipPath(pi), expected, next);
    if (result.ok) {
      console.log(`[TIP] ${pi}: ${expected ?? 'none'} -> ${next}`);
    } else {
      console.log(`[TIP] CAS rejected for ${pi}: expected ${expected ?? 'none'}, actual ${result.actual ?? 'none'}`);
    }
    return result;
  }
}
