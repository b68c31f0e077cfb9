/**
 * Async Mutex
 * ===========
 * Promise-chain mutual exclusion for serialising async critical sections
 * within a single Node.js process. Nothing here coordinates across processes.
 */

export class AsyncMutex {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Execute `fn` while holding the lock.
   *
   * Calls are admitted in FIFO order; a rejected `fn` releases the lock
   * just like a resolved one.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const prev = this.queue;
    this.queue = gate;
    this.pending += 1;

    try {
      await prev;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  /**
   * True while a holder or a waiter exists.
   */
  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * One `AsyncMutex` per key, created on demand and dropped once idle.
 */
export class KeyedAsyncMutex {
  private readonly locks = new Map<string, AsyncMutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.locks.set(key, mutex);
    }

    const held = mutex;
    try {
      return await held.runExclusive(fn);
    } finally {
      if (!held.isLocked() && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys with a holder or waiter.
   */
  size(): number {
    return this.locks.size;
  }
}
