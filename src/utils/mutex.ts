/**
 * Promise-based locking primitives
 *
 * Node runs our code on one thread, but every await is a point where
 * another request can interleave. These helpers serialize the sections
 * that must not interleave: agent calls, session file writes, and the
 * one-time construction of platform handles.
 */

/**
 * FIFO mutual-exclusion lock.
 *
 * @example
 * ```typescript
 * const lock = new Mutex();
 * const result = await lock.runExclusive(() => client.run(payload));
 * ```
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously queued task has settled.
   * The lock is released whether the task resolves or rejects.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** True while a task holds the lock or is waiting for it */
  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * Lazily constructed, process-wide value.
 *
 * Double-checked: a fast path when the value exists, then the factory runs
 * under the lock and the value is checked again, so concurrent first
 * callers share one construction. A failed construction is not cached;
 * the next caller retries.
 */
export class OnceCell<T> {
  private slot: { value: T } | null = null;
  private readonly lock = new Mutex();

  constructor(private readonly factory: () => Promise<T> | T) {}

  async get(): Promise<T> {
    if (this.slot) {
      return this.slot.value;
    }
    return this.lock.runExclusive(async () => {
      if (!this.slot) {
        this.slot = { value: await this.factory() };
      }
      return this.slot.value;
    });
  }

  /** Whether the factory has completed successfully */
  isInitialized(): boolean {
    return this.slot !== null;
  }
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
