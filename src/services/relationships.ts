import { VersionAppender, type VersionDelta } from './versioning';
import type { ManifestV1 } from '../types/manifest';
import { CASError, describeError } from '../utils/errors';
import { processBatched } from '../utils/batch';

export type SideEffectKind = 'link_child' | 'unlink_child' | 'set_parent' | 'clear_parent';

/**
 * Outcome of one relationship side effect: a version append on `target_pi`
 * recording its relation to `related_pi`.
 */
export interface SideEffect {
  kind: SideEffectKind;
  target_pi: string;
  related_pi: string;
  status: 'pending' | 'applied' | 'failed';
  attempts: number;
  tip?: string;
  ver?: number;
  error?: string;
}

export interface RelationshipOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  batchSize?: number;
  // newest failures kept for failures()
  failureHistory?: number;
  sleep?: (ms: number) => Promise<void>;
}

// children updated in parallel per batch
const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_FAILURE_HISTORY = 1000;

/**
 * Keeps parent.children_pi and child.parent_pi in step.
 *
 * Each side effect is one independent version append on the other entity.
 * Nothing here is transactional: a side effect that keeps losing the tip CAS
 * is recorded as failed and left for a later edit to repair. It is never
 * rolled back and never retried after this call returns.
 */
export class RelationshipMaintainer {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly batchSize: number;
  private readonly failureHistory: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly failed: SideEffect[] = [];
  private failedTotal = 0;

  constructor(
    private readonly appender: VersionAppender,
    options: RelationshipOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 10;
    this.baseDelayMs = options.baseDelayMs ?? 100;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.failureHistory = Math.max(1, options.failureHistory ?? DEFAULT_FAILURE_HISTORY);
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Add `child` to the parent's children_pi.
   * With `expectedParentTip`, a parent that has moved fails immediately.
   */
  linkChild(parent: string, child: string, expectedParentTip?: string): Promise<SideEffect> {
    return this.apply(
      'link_child',
      parent,
      child,
      () => ({ children_pi_add: [child], note: `Added child entity ${child}` }),
      expectedParentTip
    );
  }

  unlinkChild(parent: string, child: string): Promise<SideEffect> {
    return this.apply('unlink_child', parent, child, () => ({
      children_pi_remove: [child],
      note: `Removed child entity ${child}`,
    }));
  }

  setParent(child: string, parent: string): Promise<SideEffect> {
    return this.apply('set_parent', child, parent, () => ({
      parent_pi: parent,
      note: `Set parent to ${parent}`,
    }));
  }

  /**
   * Clear the child's parent, but only while it still points at `parent`
   */
  clearParent(child: string, parent: string): Promise<SideEffect> {
    return this.apply('clear_parent', child, parent, (manifest) =>
      manifest.parent_pi === parent ? { parent_pi: null, note: `Removed parent ${parent}` } : {}
    );
  }

  /**
   * Set or clear the parent on many children, in batches
   */
  updateChildren(
    kind: 'set_parent' | 'clear_parent',
    parent: string,
    children: string[]
  ): Promise<SideEffect[]> {
    return processBatched(children, this.batchSize, (child) =>
      kind === 'set_parent' ? this.setParent(child, parent) : this.clearParent(child, parent)
    );
  }

  /**
   * Most recent side effects that ended in failure, oldest first
   */
  failures(): SideEffect[] {
    return [...this.failed];
  }

  /**
   * Failures since start, including those no longer held by failures()
   */
  get failureCount(): number {
    return this.failedTotal;
  }

  private async apply(
    kind: SideEffectKind,
    target: string,
    related: string,
    plan: (manifest: ManifestV1) => VersionDelta,
    expectedTip?: string
  ): Promise<SideEffect> {
    const effect: SideEffect = {
      kind,
      target_pi: target,
      related_pi: related,
      status: 'pending',
      attempts: 0,
    };

    while (effect.attempts < this.maxAttempts) {
      effect.attempts++;
      try {
        const current = await this.appender.readCurrent(target);
        if (expectedTip !== undefined && current.cid !== expectedTip) {
          throw new CASError({ actual: current.cid, expect: expectedTip });
        }

        // a relation already in place appends nothing
        const result = await this.appender.append(target, plan(current.manifest), {
          expectTip: current.cid,
          skipIfUnchanged: true,
        });
        effect.status = 'applied';
        effect.tip = result.tip;
        effect.ver = result.ver;
        if (result.changed) {
          console.log(`[RELATION] ${kind} ${target} <- ${related}: v${result.ver}`);
        }
        return effect;
      } catch (error) {
        const retryable =
          error instanceof CASError && expectedTip === undefined && effect.attempts < this.maxAttempts;
        if (!retryable) {
          return this.fail(effect, error);
        }
        // Exponential backoff with jitter to spread out contention on hot parents
        const baseDelay = this.baseDelayMs * 2 ** (effect.attempts - 1);
        const delay = baseDelay + Math.random() * baseDelay;
        console.log(`[RELATION] Race on ${target} during ${kind}, retrying in ${delay.toFixed(0)}ms (attempt ${effect.attempts + 1}/${this.maxAttempts})`);
        await this.sleep(delay);
      }
    }

    return this.fail(effect, new Error(`gave up after ${effect.attempts} attempts`));
  }

  private fail(effect: SideEffect, error: unknown): SideEffect {
    effect.status = 'failed';
    effect.error = describeError(error);
    this.failedTotal++;
    this.failed.push(effect);
    if (this.failed.length > this.failureHistory) {
      this.failed.shift();
    }
    console.error(`[RELATION] ${effect.kind} on ${effect.target_pi} (related ${effect.related_pi}) failed after ${effect.attempts} attempts: ${effect.error}`);
    return effect;
  }
}
