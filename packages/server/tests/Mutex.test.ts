import { describe, expect, it } from 'vitest';
import { Mutex } from '../src/utils/Mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  it('should return the task result', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
    expect(mutex.isLocked).toBe(false);
  });

  it('should not interleave tasks that await', async () => {
    const mutex = new Mutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      events.push('second');
    });

    // Let the first task reach its await
    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(mutex.pending).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run waiting tasks in arrival order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all([1, 2, 3, 4].map((n) => mutex.runExclusive(() => order.push(n))));

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('should release the lock when a task throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
