/**
 * Index Sync
 *
 * Fire-and-forget delivery of entity events to the index engine after tip
 * writes. Notifications are processed one at a time in arrival order and a
 * notification never fails the write that produced it: errors are logged and
 * the event is deferred, to be replayed ahead of the next one.
 */

import { IndexEngine, type RecordResult } from './index-engine';
import { BackgroundTasks } from './background';
import { describeError } from '../utils/errors';

export type IndexSyncEvent =
  | { event: 'created'; pi: string; tip: string; ts: string }
  | { event: 'updated'; pi: string; tip: string; ver: number; ts: string };

export class IndexSync {
  private queue: Promise<void> = Promise.resolve();
  private deferredEvents: IndexSyncEvent[] = [];
  private rebuilding = false;

  constructor(
    private readonly index: IndexEngine,
    private readonly tasks: BackgroundTasks
  ) {}

  /**
   * Queue an event. The returned promise settles once it has been processed
   * (recorded or deferred) and never rejects; pass it to waitUntil.
   */
  notify(event: IndexSyncEvent): Promise<void> {
    const run = this.queue.then(() => this.process(event));
    this.queue = run;
    return run;
  }

  /**
   * Replay deferred events now
   */
  flushDeferred(): Promise<void> {
    const run = this.queue.then(() => this.replayDeferred());
    this.queue = run;
    return run;
  }

  get deferred(): readonly IndexSyncEvent[] {
    return this.deferredEvents;
  }

  private async process(event: IndexSyncEvent): Promise<void> {
    await this.replayDeferred();
    if (this.deferredEvents.length > 0) {
      // keep order: nothing newer is recorded while older events are stuck
      this.deferredEvents.push(event);
      console.error(`[SYNC] Deferred ${event.event} ${event.pi} behind ${this.deferredEvents.length - 1} earlier events`);
      return;
    }
    if (!(await this.deliver(event))) {
      this.deferredEvents.push(event);
    }
  }

  private async replayDeferred(): Promise<void> {
    while (this.deferredEvents.length > 0) {
      const [next] = this.deferredEvents;
      if (!(await this.deliver(next))) {
        return;
      }
      this.deferredEvents.shift();
    }
  }

  private async deliver(event: IndexSyncEvent): Promise<boolean> {
    let result: RecordResult;
    try {
      result =
        event.event === 'created'
          ? await this.index.recordCreate(event.pi, event.tip, event.ts)
          : await this.index.recordUpdate(event.pi, event.tip, event.ver, event.ts);
    } catch (error) {
      console.error(`[SYNC] Index ${event.event} failed for ${event.pi}: ${describeError(error)}`);
      return false;
    }

    if (result.status === 'recorded') {
      console.log(`[SYNC] Index ${event.event}: ${event.pi} v${result.entry.ver}`);
      await this.maybeRebuild(result);
    }
    return true;
  }

  private async maybeRebuild(result: Extract<RecordResult, { status: 'recorded' }>): Promise<void> {
    if (this.rebuilding) {
      return;
    }
    let due: boolean;
    try {
      due = await this.index.shouldRebuild(result.pointer);
    } catch (error) {
      console.error(`[SYNC] Could not check snapshot threshold: ${describeError(error)}`);
      return;
    }
    if (!due) {
      return;
    }

    this.rebuilding = true;
    console.log(`[SYNC] Hot log reached ${this.index.snapshotThreshold} entries, rebuilding snapshot`);
    this.tasks.waitUntil(
      this.index
        .rebuildSnapshot()
        .then((rebuild) => {
          console.log(`[SYNC] Snapshot rebuild ${rebuild.status}`);
        })
        .finally(() => {
          this.rebuilding = false;
        }),
      'snapshot rebuild'
    );
  }
}
