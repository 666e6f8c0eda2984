import { AsyncResource } from 'node:async_hooks';
import { ClosedError } from '@shelfdb/core';

export interface RunOptions {
  /**
   * Aborting rejects the returned promise. Work that was already
   * dispatched still runs; its result is dropped.
   */
  signal?: AbortSignal;
}

/**
 * Bounded dispatcher for synchronous units of work.
 *
 * At most `workerCount` tasks are in flight; the rest wait in FIFO order.
 * Each task starts on its own `setImmediate` turn, so callers never run
 * storage work on their own tick, and runs in the async context of the
 * caller that queued it.
 */
export class WorkerPool {
  private readonly queue: Array<() => void> = [];
  private active = 0;
  private closing = false;
  private readonly idleWaiters: Array<() => void> = [];

  constructor(readonly workerCount = 5) {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new RangeError(`workerCount must be a positive integer, got ${workerCount}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.closing;
  }

  run<T>(task: () => T, options: RunOptions = {}): Promise<T> {
    const { signal } = options;
    if (this.closing) {
      return Promise.reject(new ClosedError('Worker pool is closed'));
    }
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const onAbort = () => {
        if (settled || !signal) return;
        settled = true;
        reject(abortError(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const job = AsyncResource.bind(() => {
        try {
          const result = task();
          if (!settled) {
            settled = true;
            resolve(result);
          }
        } catch (error) {
          if (!settled) {
            settled = true;
            reject(error);
          }
        } finally {
          signal?.removeEventListener('abort', onAbort);
        }
      });

      this.queue.push(job);
      this.pump();
    });
  }

  /**
   * Stop accepting work and wait for queued and in-flight tasks
   */
  async close(): Promise<void> {
    this.closing = true;
    if (this.active === 0 && this.queue.length === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.workerCount) {
      const job = this.queue.shift();
      if (!job) break;

      this.active++;
      setImmediate(() => {
        try {
          job();
        } finally {
          this.active--;
          this.pump();
          this.notifyIdle();
        }
      });
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}

/**
 * The signal's reason when it is an Error, otherwise a plain AbortError
 */
export function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Reject as soon as `signal` aborts while leaving `promise` to settle on
 * its own
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
