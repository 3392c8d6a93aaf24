// Interview Assistant Bot - Per-identity mutual exclusion
// Tasks for the same key run one after another in arrival order; tasks for
// different keys run concurrently.

import { createDeferred } from "./utils/deferred.js";

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` once every earlier task for `key` has settled. The lock is
   * released whether the task resolves or throws, and the task's outcome is
   * passed through unchanged.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const released = createDeferred<void>();
    const tail = previous.then(() => released.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      released.resolve();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
