import {
  CacheNamespace,
  ClosedError,
  KeyNotFoundError,
  TransactionError,
  scopedLogger,
  validateIdentifier,
  type EvictionPolicy,
  type JsonValue,
  type Logger,
} from '@shelfdb/core';
import { guard } from './backend';
import { SharedConnection, type CheckpointMode, type CheckpointResult } from './connection';
import { parseStoreOptions, toEvictionPolicy, type ResolvedHooks, type ShelfStoreOptions, type StoreConfig } from './options';
import { QueryBuilder, executeRead, type BuiltQuery, type QueryOptions, type Row, type SqlParameters } from './query';
import { resolveTarget, type StoreTarget } from './target';

export interface StoreInit {
  connection: SharedConnection;
  config: StoreConfig;
  hooks: ResolvedHooks;
  root: boolean;
}

export interface ExecuteResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * A map-like view of one table, cached in memory and persisted on every
 * write.
 *
 * The root store owns the writer connection. Views derived with `table()`
 * share that connection and its lock but keep their own cache, and stop
 * working as soon as the root closes.
 */
export class ShelfStore {
  readonly tableName: string;
  readonly isRoot: boolean;
  private readonly connection: SharedConnection;
  private readonly cache: CacheNamespace;
  private readonly config: StoreConfig;
  private readonly hooks: ResolvedHooks;
  private readonly queries: QueryBuilder;
  private readonly logger: Logger;
  private selfClosed = false;
  private allLoaded = false;
  private readonly detachFromConnection: () => void;

  protected constructor(init: StoreInit) {
    this.connection = init.connection;
    this.config = init.config;
    this.hooks = init.hooks;
    this.isRoot = init.root;
    this.tableName = validateIdentifier(init.config.table, 'table name');
    this.logger = scopedLogger(init.hooks.logger, `shelfdb:${this.tableName}`);

    this.cache = new CacheNamespace({
      policy: toEvictionPolicy(init.config),
      onExpire: (key) => this.cascadeDelete(key),
      sweepIntervalMs: init.config.cacheSweepIntervalMs,
      logger: this.logger,
    });
    // Views closed through their root still stop their sweep
    this.detachFromConnection = this.connection.onClose(() => this.cache.dispose());
    this.queries = new QueryBuilder({
      strict: init.config.strictValidation,
      maxClauseLength: init.config.maxClauseLength,
      allowedFunctions: init.config.allowedFunctions,
      forbiddenFunctions: init.config.forbiddenFunctions,
      logger: this.logger,
    });

    try {
      this.connection.runWrite(() => this.connection.backend.ensureTable(this.tableName));
      if (init.config.bulkPreload) {
        this.loadAll();
      }
    } catch (error) {
      this.detachFromConnection();
      this.cache.dispose();
      throw error;
    }
  }

  /**
   * Open a root store on a path or `sqlite:///` URL
   */
  static open(target: string, options: ShelfStoreOptions = {}): ShelfStore {
    const { config, hooks } = parseStoreOptions(options);
    const connection = SharedConnection.open(resolveTarget(target), config, hooks);
    try {
      return new ShelfStore({ connection, config, hooks, root: true });
    } catch (error) {
      connection.close();
      throw error;
    }
  }

  get closed(): boolean {
    return this.selfClosed || this.connection.closed;
  }

  get target(): StoreTarget {
    return this.connection.target;
  }

  get evictionPolicy(): EvictionPolicy {
    return this.cache.policy;
  }

  // ==================== Map interface ====================

  get(key: string): JsonValue | undefined;
  get<D>(key: string, defaultValue: D): JsonValue | D;
  get<D>(key: string, defaultValue?: D): JsonValue | D | undefined {
    this.assertOpen();
    const value = this.lookup(key);
    return value === undefined ? defaultValue : value;
  }

  set(key: string, value: JsonValue): void {
    this.assertOpen();
    this.connection.runWrite(() => {
      this.connection.backend.write(this.tableName, key, value);
      this.remember(key, value);
    });
  }

  /**
   * Returns true when the key existed
   */
  delete(key: string): boolean {
    this.assertOpen();
    return this.connection.runWrite(() => {
      const removed = this.connection.backend.delete(this.tableName, key);
      this.remember(key, undefined);
      return removed;
    });
  }

  has(key: string): boolean {
    this.assertOpen();
    return this.lookup(key) !== undefined;
  }

  /**
   * Row count in storage, not in the cache
   */
  count(): number {
    this.assertOpen();
    return this.connection.backend.count(this.tableName);
  }

  keys(): string[] {
    this.assertOpen();
    return this.connection.backend.keys(this.tableName);
  }

  values(): JsonValue[] {
    return this.entries().map(([, value]) => value);
  }

  entries(): Array<[string, JsonValue]> {
    this.assertOpen();
    const rows = this.connection.backend.readAll(this.tableName);
    for (const [key, value] of rows) {
      this.remember(key, value);
    }
    return rows;
  }

  pop(key: string): JsonValue;
  pop<D>(key: string, defaultValue: D): JsonValue | D;
  pop<D>(key: string, ...fallback: [D?]): JsonValue | D | undefined {
    this.assertOpen();
    return this.connection.runWrite(() => {
      const value = this.lookup(key);
      if (value === undefined) {
        if (fallback.length > 0) return fallback[0];
        throw new KeyNotFoundError(key);
      }
      this.connection.backend.delete(this.tableName, key);
      this.remember(key, undefined);
      return value;
    });
  }

  update(values: Record<string, JsonValue>): void {
    this.assertOpen();
    this.connection.runWrite(() => {
      for (const [key, value] of Object.entries(values)) {
        this.set(key, value);
      }
    });
  }

  clear(): void {
    this.assertOpen();
    this.connection.runWrite(() => {
      this.connection.backend.clear(this.tableName);
      this.cache.clear();
      this.connection.transactions.track(this.cache, null);
      this.allLoaded = false;
    });
  }

  setDefault(key: string, defaultValue: JsonValue): JsonValue {
    this.assertOpen();
    return this.connection.runWrite(() => {
      const value = this.lookup(key);
      if (value !== undefined) return value;
      this.set(key, defaultValue);
      return defaultValue;
    });
  }

  toObject(): Record<string, JsonValue> {
    return Object.fromEntries(this.entries());
  }

  // ==================== Cache control ====================

  /**
   * Fill the cache with every row of the table
   */
  loadAll(): void {
    this.assertOpen();
    if (this.allLoaded && this.cache.policy.kind === 'unbounded') return;

    for (const [key, value] of this.connection.backend.readAll(this.tableName)) {
      this.remember(key, value);
    }
    this.allLoaded = true;
  }

  /**
   * Re-read one key from storage, or drop the whole cache
   */
  refresh(key?: string): void {
    this.assertOpen();
    if (key === undefined) {
      this.cache.clear();
      this.allLoaded = false;
      return;
    }
    this.cache.remove(key);
    this.lookup(key);
  }

  isCached(key: string): boolean {
    this.assertOpen();
    return this.cache.contains(key);
  }

  /**
   * Read straight from storage, then refill the cache
   */
  getFresh(key: string): JsonValue | undefined {
    this.assertOpen();
    this.cache.remove(key);
    return this.lookup(key);
  }

  batchUpdate(values: Record<string, JsonValue>): void {
    this.assertOpen();
    const entries = Object.entries(values);
    this.connection.atomically(() => {
      this.connection.backend.writeMany(this.tableName, entries);
    });
    for (const [key, value] of entries) {
      this.remember(key, value);
    }
  }

  batchDelete(keys: string[]): number {
    this.assertOpen();
    const removed = this.connection.atomically(() =>
      this.connection.backend.deleteMany(this.tableName, keys)
    );
    for (const key of keys) {
      this.remember(key, undefined);
    }
    return removed;
  }

  // ==================== Transactions ====================

  beginTransaction(): void {
    this.assertOpen();
    this.connection.runWrite(() => this.connection.transactions.begin());
  }

  commit(): void {
    this.assertOpen();
    this.connection.runWrite(() => this.connection.transactions.commit());
  }

  rollback(): void {
    this.assertOpen();
    this.connection.runWrite(() => this.connection.transactions.rollback());
  }

  inTransaction(): boolean {
    this.assertOpen();
    return this.connection.transactions.active;
  }

  /**
   * Run a synchronous unit of work in a transaction. Rolls back and
   * rethrows if it throws.
   */
  withTransaction<T>(fn: (store: this) => T): T {
    this.assertOpen();
    return this.connection.runWrite(() => {
      this.connection.transactions.begin();
      let result: T;
      try {
        result = fn(this);
      } catch (error) {
        this.rollbackAfterFailure();
        throw error;
      }
      if (result instanceof Promise) {
        this.rollbackAfterFailure();
        throw new TransactionError(
          'withTransaction expects a synchronous unit of work; use withTransactionAsync for async work'
        );
      }
      this.commitOrRollback();
      return result;
    });
  }

  /**
   * Async variant: holds the writer lock for the whole unit, so other async
   * callers wait and synchronous callers get a LockError until it settles
   */
  withTransactionAsync<T>(fn: (store: this) => Promise<T>): Promise<T> {
    this.assertOpen();
    return this.connection.runExclusive(async () => {
      this.connection.transactions.begin();
      let result: T;
      try {
        result = await fn(this);
      } catch (error) {
        this.rollbackAfterFailure();
        throw error;
      }
      this.commitOrRollback();
      return result;
    });
  }

  // ==================== Derived views & lifecycle ====================

  /**
   * Derive a view of another table on the same connection
   */
  table(name: string): ShelfStore {
    this.assertOpen();
    return new ShelfStore({
      connection: this.connection,
      config: { ...this.config, table: validateIdentifier(name, 'table name') },
      hooks: this.hooks,
      root: false,
    });
  }

  /**
   * Closing twice is a no-op. Closing the root releases the connection and
   * closes every derived view with it.
   */
  close(): void {
    if (this.closed) return;

    if (this.isRoot) {
      this.connection.close();
    }
    this.selfClosed = true;
    this.detachFromConnection();
    this.cache.dispose();
    this.logger.debug?.('closed');
  }

  // ==================== SQL access ====================

  /**
   * Validated SELECT over this table (or another one on the connection)
   */
  query(options: QueryOptions = {}): Row[] {
    const built = this.buildQuery(options);
    return this.fetchAll(built.sql, built.parameters);
  }

  /**
   * Validate query options and produce SQL without running it
   */
  buildQuery(options: QueryOptions = {}): BuiltQuery {
    this.assertOpen();
    return this.queries.buildSelect(this.tableName, options);
  }

  /**
   * Raw statement under the writer lock. The cache is not updated; call
   * `refresh()` for any key the statement touches.
   */
  execute(sql: string, parameters: SqlParameters = []): ExecuteResult {
    this.assertOpen();
    return this.connection.runWrite(() =>
      guard('Statement failed', () => {
        const statement = this.connection.db.prepare<unknown[], Row>(sql);
        const result = statement.run(...(Array.isArray(parameters) ? parameters : [parameters]));
        return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
      })
    );
  }

  fetchAll(sql: string, parameters: SqlParameters = []): Row[] {
    this.assertOpen();
    return this.connection.runWrite(() => executeRead(this.connection.db, sql, parameters));
  }

  fetchOne(sql: string, parameters: SqlParameters = []): Row | undefined {
    return this.fetchAll(sql, parameters)[0];
  }

  pragma(name: string, value?: string | number): unknown {
    this.assertOpen();
    return this.connection.pragma(name, value);
  }

  checkpoint(mode?: CheckpointMode): CheckpointResult {
    this.assertOpen();
    return this.connection.checkpoint(mode);
  }

  // ==================== Internals shared with the async bridge ====================

  /**
   * Wait for the writer lock, then run `fn` holding it
   */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.assertOpen();
    return this.connection.runExclusive(fn);
  }

  private lookup(key: string): JsonValue | undefined {
    const cached = this.cache.get(key);
    switch (cached.status) {
      case 'hit':
        return cached.value;
      case 'absent':
        return undefined;
      case 'miss': {
        const value = this.connection.backend.read(this.tableName, key);
        this.remember(key, value);
        return value;
      }
    }
  }

  /**
   * Cache a value (or a tombstone for `undefined`) and record it against
   * the active transaction
   */
  private remember(key: string, value: JsonValue | undefined): void {
    if (value === undefined) {
      this.cache.putAbsent(key);
    } else {
      this.cache.put(key, value);
    }
    this.connection.transactions.track(this.cache, key);
  }

  private cascadeDelete(key: string): void {
    if (this.closed) {
      // Root went away under a background sweep
      this.cache.dispose();
      return;
    }
    this.connection.runWrite(() => this.connection.backend.delete(this.tableName, key));
    this.logger.debug?.(`expired '${key}' and deleted it from storage`);
  }

  private commitOrRollback(): void {
    try {
      this.connection.transactions.commit();
    } catch (error) {
      this.rollbackAfterFailure();
      throw error;
    }
  }

  private rollbackAfterFailure(): void {
    if (!this.connection.transactions.active) return;
    try {
      this.connection.transactions.rollback();
    } catch (rollbackError) {
      this.logger.error('rollback after a failed transaction also failed', rollbackError);
    }
  }

  private assertOpen(): void {
    if (this.selfClosed) {
      throw new ClosedError(`Database connection is closed (table: '${this.tableName}')`);
    }
    if (this.connection.closed) {
      throw new ClosedError(
        this.isRoot
          ? `Database connection is closed (table: '${this.tableName}')`
          : `Parent database connection is closed (table: '${this.tableName}')`
      );
    }
  }
}

/**
 * Open a root store. Shorthand for `ShelfStore.open`.
 */
export function openStore(target: string, options: ShelfStoreOptions = {}): ShelfStore {
  return ShelfStore.open(target, options);
}
