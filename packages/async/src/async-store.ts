import {
  ClosedError,
  TransactionError,
  ValidationError,
  scopedLogger,
  consoleLogger,
  type EvictionPolicy,
  type JsonValue,
  type Logger,
} from '@shelfdb/core';
import {
  ShelfStore,
  executeRead,
  resolveTarget,
  type BuiltQuery,
  type CheckpointMode,
  type CheckpointResult,
  type ExecuteResult,
  type QueryOptions,
  type Row,
  type SqlParameters,
  type StoreTarget,
} from '@shelfdb/sqlite';
import { parseAsyncStoreOptions, type AsyncShelfStoreOptions } from './options';
import { ReadConnectionPool } from './read-pool';
import { WorkerPool, abortError, raceAbort, type RunOptions } from './worker-pool';

export type CallOptions = RunOptions;

export interface GetOptions extends CallOptions {
  defaultValue?: JsonValue;
}

/**
 * State shared by a root facade and every view derived from it
 */
interface BridgeState {
  workers: WorkerPool;
  readers: ReadConnectionPool | null;
  pendingReads: Set<Promise<unknown>>;
  closing: boolean;
  logger: Logger;
}

interface AsyncStoreInit {
  store: ShelfStore;
  bridge: BridgeState;
}

/**
 * Promise-returning facade over a ShelfStore.
 *
 * Work on the writer connection waits for the writer lock first and only
 * then takes a worker slot. Query-style reads go to the read pool when one
 * is configured and never touch the lock or the cache.
 */
export class AsyncShelfStore {
  private readonly store: ShelfStore;
  private readonly bridge: BridgeState;

  private constructor(init: AsyncStoreInit) {
    this.store = init.store;
    this.bridge = init.bridge;
  }

  static async open(target: string, options: AsyncShelfStoreOptions = {}): Promise<AsyncShelfStore> {
    const { workerCount, readPoolSize } = parseAsyncStoreOptions(options);
    if (readPoolSize > 0 && resolveTarget(target).inMemory) {
      throw new ValidationError('Invalid store options: readPoolSize requires a file-backed database', [
        'readPoolSize: requires a file-backed database',
      ]);
    }
    const workers = new WorkerPool(workerCount);
    const logger = scopedLogger(options.logger ?? consoleLogger, 'shelfdb:async');

    let store: ShelfStore;
    try {
      store = await workers.run(() => ShelfStore.open(target, options));
    } catch (error) {
      await workers.close();
      throw error;
    }

    let readers: ReadConnectionPool | null = null;
    try {
      if (readPoolSize > 0) {
        readers = new ReadConnectionPool(store.target.location, readPoolSize, logger);
      }
    } catch (error) {
      store.close();
      await workers.close();
      throw error;
    }

    logger.debug?.(`opened with ${workerCount} workers and ${readPoolSize} read connections`);
    return new AsyncShelfStore({
      store,
      bridge: { workers, readers, pendingReads: new Set(), closing: false, logger },
    });
  }

  get tableName(): string {
    return this.store.tableName;
  }

  get isRoot(): boolean {
    return this.store.isRoot;
  }

  get closed(): boolean {
    return this.store.closed;
  }

  get target(): StoreTarget {
    return this.store.target;
  }

  get evictionPolicy(): EvictionPolicy {
    return this.store.evictionPolicy;
  }

  get readPoolEnabled(): boolean {
    return this.bridge.readers !== null;
  }

  /**
   * The synchronous view this facade drives. Sync calls on it still see the
   * writer lock, so they fail fast while an async unit holds it.
   */
  get sync(): ShelfStore {
    return this.store;
  }

  // ==================== Map interface ====================

  get(key: string, options: GetOptions = {}): Promise<JsonValue | undefined> {
    return this.dispatch((s) => s.get(key, options.defaultValue), options);
  }

  set(key: string, value: JsonValue, options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.set(key, value), options);
  }

  delete(key: string, options?: CallOptions): Promise<boolean> {
    return this.dispatch((s) => s.delete(key), options);
  }

  has(key: string, options?: CallOptions): Promise<boolean> {
    return this.dispatch((s) => s.has(key), options);
  }

  count(options?: CallOptions): Promise<number> {
    return this.dispatch((s) => s.count(), options);
  }

  keys(options?: CallOptions): Promise<string[]> {
    return this.dispatch((s) => s.keys(), options);
  }

  values(options?: CallOptions): Promise<JsonValue[]> {
    return this.dispatch((s) => s.values(), options);
  }

  entries(options?: CallOptions): Promise<Array<[string, JsonValue]>> {
    return this.dispatch((s) => s.entries(), options);
  }

  /**
   * Remove and return a value. Rejects with KeyNotFoundError when the key
   * is missing and no `defaultValue` was given.
   */
  pop(key: string, options: GetOptions = {}): Promise<JsonValue | undefined> {
    return this.dispatch((s) => ('defaultValue' in options ? s.pop(key, options.defaultValue) : s.pop(key)), options);
  }

  update(values: Record<string, JsonValue>, options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.update(values), options);
  }

  clear(options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.clear(), options);
  }

  setDefault(key: string, defaultValue: JsonValue, options?: CallOptions): Promise<JsonValue> {
    return this.dispatch((s) => s.setDefault(key, defaultValue), options);
  }

  toObject(options?: CallOptions): Promise<Record<string, JsonValue>> {
    return this.dispatch((s) => s.toObject(), options);
  }

  // ==================== Cache control ====================

  loadAll(options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.loadAll(), options);
  }

  refresh(key?: string, options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.refresh(key), options);
  }

  isCached(key: string): boolean {
    return this.store.isCached(key);
  }

  getFresh(key: string, options?: CallOptions): Promise<JsonValue | undefined> {
    return this.dispatch((s) => s.getFresh(key), options);
  }

  batchUpdate(values: Record<string, JsonValue>, options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.batchUpdate(values), options);
  }

  batchDelete(keys: string[], options?: CallOptions): Promise<number> {
    return this.dispatch((s) => s.batchDelete(keys), options);
  }

  // ==================== Transactions ====================

  beginTransaction(options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.beginTransaction(), options);
  }

  commit(options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.commit(), options);
  }

  rollback(options?: CallOptions): Promise<void> {
    return this.dispatch((s) => s.rollback(), options);
  }

  inTransaction(): boolean {
    return this.store.inTransaction();
  }

  /**
   * Run `fn` in a transaction holding the writer lock until it settles.
   * Calls made on the store passed to `fn` re-enter the lock.
   */
  async withTransaction<T>(fn: (store: AsyncShelfStore) => Promise<T>, options: CallOptions = {}): Promise<T> {
    this.assertAccepting();
    const { signal } = options;
    throwIfAborted(signal);
    const work = this.store.runExclusive(() => {
      this.assertAccepting();
      throwIfAborted(signal);
      return this.store.withTransactionAsync(() => fn(this));
    });
    return raceAbort(work, signal);
  }

  // ==================== Derived views & lifecycle ====================

  /**
   * Derive an async view of another table sharing both pools
   */
  table(name: string): AsyncShelfStore {
    return new AsyncShelfStore({ store: this.store.table(name), bridge: this.bridge });
  }

  /**
   * On the root: wait for the writer, so every call issued before this one
   * finishes first, then drain pooled reads and both pools and close the
   * connection. Calls still queued behind the close fail with ClosedError.
   * A transaction left open rejects the close and changes nothing.
   * On a child only the child is closed.
   */
  async close(): Promise<void> {
    if (this.store.closed || this.bridge.closing) return;
    if (!this.store.isRoot) {
      this.store.close();
      return;
    }

    await this.store.runExclusive(async () => {
      if (this.store.closed || this.bridge.closing) return;
      if (this.store.inTransaction()) {
        throw new TransactionError(
          'Cannot close the connection while a transaction is active; commit or roll back first'
        );
      }

      const { workers, readers, pendingReads, logger } = this.bridge;
      this.bridge.closing = true;
      await Promise.allSettled(Array.from(pendingReads));
      await workers.close();
      try {
        readers?.close();
      } finally {
        this.store.close();
        logger.debug?.('closed');
      }
    });
  }

  // ==================== SQL access ====================

  async query(options: QueryOptions & CallOptions = {}): Promise<Row[]> {
    const built = this.store.buildQuery(options);
    if (this.bridge.readers) {
      return this.read(built, options);
    }
    return this.dispatch((s) => s.fetchAll(built.sql, built.parameters), options);
  }

  async fetchAll(sql: string, parameters: SqlParameters = [], options: CallOptions = {}): Promise<Row[]> {
    if (this.bridge.readers) {
      return this.read({ sql, parameters }, options);
    }
    return this.dispatch((s) => s.fetchAll(sql, parameters), options);
  }

  async fetchOne(sql: string, parameters: SqlParameters = [], options: CallOptions = {}): Promise<Row | undefined> {
    const rows = await this.fetchAll(sql, parameters, options);
    return rows[0];
  }

  execute(sql: string, parameters: SqlParameters = [], options?: CallOptions): Promise<ExecuteResult> {
    return this.dispatch((s) => s.execute(sql, parameters), options);
  }

  pragma(name: string, value?: string | number, options?: CallOptions): Promise<unknown> {
    return this.dispatch((s) => s.pragma(name, value), options);
  }

  checkpoint(mode?: CheckpointMode, options?: CallOptions): Promise<CheckpointResult> {
    return this.dispatch((s) => s.checkpoint(mode), options);
  }

  // ==================== Dispatch ====================

  /**
   * Writer-connection work: wait for the lock, then take a worker slot.
   * The lock is held until the task itself finishes, even if the caller
   * aborts first.
   */
  private async dispatch<T>(task: (store: ShelfStore) => T, options: CallOptions = {}): Promise<T> {
    this.assertAccepting();
    const { signal } = options;
    throwIfAborted(signal);
    const { workers } = this.bridge;
    const work = this.store.runExclusive(() => {
      this.assertAccepting();
      throwIfAborted(signal);
      return workers.run(() => task(this.store));
    });
    return raceAbort(work, signal);
  }

  /**
   * Pooled read: no writer lock, no cache
   */
  private async read(query: BuiltQuery, options: CallOptions): Promise<Row[]> {
    this.assertAccepting();
    const { workers, readers } = this.bridge;
    if (!readers) {
      throw new ClosedError('Read pool is not enabled');
    }
    const { signal } = options;
    throwIfAborted(signal);
    const work = readers.use((db) => {
      throwIfAborted(signal);
      return workers.run(() => executeRead(db, query.sql, query.parameters));
    });
    return raceAbort(this.track(work), signal);
  }

  /**
   * Remember a pooled read until it settles so close() can wait for it.
   * Writer work needs no tracking: close() queues on the writer lock
   * behind it.
   */
  private track<T>(promise: Promise<T>): Promise<T> {
    const { pendingReads } = this.bridge;
    pendingReads.add(promise);
    const forget = () => {
      pendingReads.delete(promise);
    };
    void promise.then(forget, forget);
    return promise;
  }

  private assertAccepting(): void {
    if (this.bridge.closing || this.store.closed) {
      throw new ClosedError(`Database connection is closed (table: '${this.store.tableName}')`);
    }
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortError(signal);
  }
}

/**
 * Open a root async store. Shorthand for `AsyncShelfStore.open`.
 */
export function openAsyncStore(target: string, options: AsyncShelfStoreOptions = {}): Promise<AsyncShelfStore> {
  return AsyncShelfStore.open(target, options);
}
