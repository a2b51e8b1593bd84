/**
 * FIFO mutual-exclusion handle.
 *
 * Every read-modify-write on the coordinator's shared state runs inside
 * `runExclusive`, so a task never observes another task's half-applied changes,
 * even when it awaits.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * const role = await mutex.runExclusive(() => registry.get(id)?.role);
 * ```
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Run a task once every earlier task has finished.
   * The lock is released whether the task returns or throws.
   */
  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of tasks waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
      } else {
        this.waiters.push(resolve);
      }
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
