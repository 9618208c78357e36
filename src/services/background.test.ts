import { describe, it, expect, vi } from 'vitest';
import { BackgroundTasks } from './background';

describe('BackgroundTasks', () => {
  it('settles after every task, including tasks started by tasks', async () => {
    const tasks = new BackgroundTasks();
    const done: string[] = [];

    tasks.waitUntil(
      (async () => {
        await new Promise((resolve) => setTimeout(resolve, 0));
        done.push('outer');
        tasks.waitUntil(
          (async () => {
            await new Promise((resolve) => setTimeout(resolve, 0));
            done.push('inner');
          })(),
          'inner'
        );
      })(),
      'outer'
    );

    expect(tasks.pending).toBe(1);
    await tasks.settle();
    expect(done).toEqual(['outer', 'inner']);
    expect(tasks.pending).toBe(0);
  });

  it('logs a failed task instead of rejecting', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const tasks = new BackgroundTasks();

    tasks.waitUntil(Promise.reject(new Error('disk full')), 'index update');
    await tasks.settle();

    expect(errors).toHaveBeenCalledWith('[TASK] index update failed: disk full');
    errors.mockRestore();
  });
});
