import { AsyncLocalStorage } from 'node:async_hooks';
import { LockError } from '@shelfdb/core';

/**
 * Re-entrant mutex guarding the single writer connection.
 *
 * Ownership follows the logical caller through AsyncLocalStorage, so a
 * transaction body can call back into the store without deadlocking on
 * itself. Async callers queue in FIFO order. A synchronous caller cannot
 * wait without blocking the event loop, so it fails with LockError when
 * another caller holds the lock across an `await`.
 */
export class WriterLock {
  private readonly context = new AsyncLocalStorage<symbol>();
  private owner: symbol | null = null;
  private readonly waiters: Array<() => void> = [];

  get locked(): boolean {
    return this.owner !== null;
  }

  /**
   * Number of async callers waiting for the lock
   */
  get pending(): number {
    return this.waiters.length;
  }

  heldByCurrentCaller(): boolean {
    return this.owner !== null && this.context.getStore() === this.owner;
  }

  runSync<T>(fn: () => T): T {
    if (this.owner !== null) {
      if (this.heldByCurrentCaller()) {
        return fn();
      }
      throw new LockError(
        'Writer connection is held by another in-flight operation; use the async API to wait for it'
      );
    }

    const token = Symbol('writer');
    this.owner = token;
    try {
      return this.context.run(token, fn);
    } finally {
      this.release();
    }
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.heldByCurrentCaller()) {
      return fn();
    }

    const token = await this.acquire();
    try {
      return await this.context.run(token, fn);
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<symbol> {
    const token = Symbol('writer');
    if (this.owner === null) {
      this.owner = token;
      return Promise.resolve(token);
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.owner = token;
        resolve(token);
      });
    });
  }

  /**
   * Hand the lock straight to the next waiter so no caller can slip in
   * between release and wake-up
   */
  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.owner = null;
    }
  }
}
