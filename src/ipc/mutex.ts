/**
 * A mutual exclusion lock.
 *
 * Serializes exchanges on a shared connection: the lock is held from the
 * moment a request is written until its response has been read.
 *
 * @module ipc/mutex
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Acquires the lock, runs the callback, and releases the lock.
   *
   * @param signal - Aborting while still queued gives up the wait
   */
  async runExclusive<T>(callback: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await callback();
    } finally {
      this.release();
    }
  }

  /**
   * Acquires the lock, waiting for earlier holders to release it.
   *
   * If `signal` aborts before the lock is handed over, the waiter leaves the
   * queue and the promise rejects with the signal's reason.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(wake);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const wake = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Releases the lock, handing it to the next waiter in FIFO order.
   *
   * @throws If the mutex is not locked.
   */
  release(): void {
    if (!this.locked) {
      throw new Error('Cannot release an unlocked mutex.');
    }
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * Whether the lock is currently held.
   */
  isLocked(): boolean {
    return this.locked;
  }
}
