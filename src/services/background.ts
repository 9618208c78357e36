import { describeError } from '../utils/errors';

/**
 * Tracks fire-and-forget work started after a response is decided
 * (index notifications, relationship side effects, snapshot rebuilds).
 *
 * Mirrors the worker-runtime `waitUntil` contract: the task runs detached,
 * a rejection is logged rather than surfaced, and `settle()` lets shutdown
 * and tests wait for everything in flight.
 */
export class BackgroundTasks {
  private readonly inflight = new Set<Promise<void>>();

  waitUntil(task: Promise<unknown>, label: string = 'task'): void {
    const tracked: Promise<void> = task
      .then(
        () => undefined,
        (error: unknown) => {
          console.error(`[TASK] ${label} failed: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  /**
   * Resolve once no task is in flight, including tasks started by tasks
   */
  async settle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  get pending(): number {
    return this.inflight.size;
  }
}
