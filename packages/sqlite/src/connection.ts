import Database from 'better-sqlite3';
import { TransactionError, ValidationError, validateIdentifier, type Logger } from '@shelfdb/core';
import { SqliteBackend, guard } from './backend';
import { WriterLock } from './lock';
import { TransactionManager } from './transaction';
import type { ResolvedHooks, StoreConfig } from './options';
import type { StoreTarget } from './target';

export type CheckpointMode = 'PASSIVE' | 'FULL' | 'RESTART' | 'TRUNCATE';

export interface CheckpointResult {
  busy: number;
  log: number;
  checkpointed: number;
}

const CHECKPOINT_MODES: readonly CheckpointMode[] = ['PASSIVE', 'FULL', 'RESTART', 'TRUNCATE'];
const PRAGMA_VALUE_PATTERN = /^-?[A-Za-z0-9_]+$/;
const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * The single writer handle shared by a root store and every table view
 * derived from it. Owns the writer lock, the transaction state and the
 * closed flag that children observe.
 */
export class SharedConnection {
  readonly lock = new WriterLock();
  readonly backend: SqliteBackend;
  readonly transactions: TransactionManager;
  private closedFlag = false;
  private readonly closeListeners = new Set<() => void>();

  private constructor(
    readonly db: Database.Database,
    readonly target: StoreTarget,
    private readonly logger: Logger,
    hooks: ResolvedHooks
  ) {
    this.backend = new SqliteBackend(db, hooks.codec, hooks.cipher);
    this.transactions = new TransactionManager(db, logger);
  }

  static open(target: StoreTarget, config: StoreConfig, hooks: ResolvedHooks): SharedConnection {
    const db = guard(`Failed to open database '${target.location}'`, () => {
      return new Database(target.location, {
        timeout: config.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
      });
    });

    try {
      if (config.optimize) {
        applyOptimizations(db, config.cacheSizeMb);
      }
      if (config.busyTimeoutMs !== undefined) {
        guard('Failed to set busy timeout', () => db.pragma(`busy_timeout = ${config.busyTimeoutMs}`));
      }
    } catch (error) {
      db.close();
      throw error;
    }

    hooks.logger.debug?.(`opened ${target.location}`);
    return new SharedConnection(db, target, hooks.logger, hooks);
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  /**
   * Register `listener` to run once the handle is released.
   * Returns a function that unregisters it.
   */
  onClose(listener: () => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /**
   * Run a synchronous unit of work under the writer lock
   */
  runWrite<T>(fn: () => T): T {
    return this.lock.runSync(fn);
  }

  /**
   * Wait for the writer lock, then run `fn` while holding it
   */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  /**
   * Run `fn` atomically: joins the active transaction if there is one,
   * otherwise wraps it in its own engine transaction
   */
  atomically<T>(fn: () => T): T {
    return this.runWrite(() => {
      if (this.transactions.active) {
        return fn();
      }
      return guard('Batch transaction failed', () => this.db.transaction(fn)());
    });
  }

  pragma(name: string, value?: string | number): unknown {
    validateIdentifier(name, 'pragma name');
    if (value !== undefined) {
      const text = String(value);
      if (!PRAGMA_VALUE_PATTERN.test(text)) {
        throw new ValidationError(`Invalid pragma value: '${text}'`);
      }
      this.runWrite(() => guard(`Failed to set pragma ${name}`, () => this.db.pragma(`${name} = ${text}`)));
    }
    return guard(`Failed to read pragma ${name}`, () => this.db.pragma(name, { simple: true }));
  }

  checkpoint(mode: CheckpointMode = 'PASSIVE'): CheckpointResult {
    if (!CHECKPOINT_MODES.includes(mode)) {
      throw new ValidationError(`Invalid checkpoint mode: '${mode}'`);
    }
    const rows = this.runWrite(() =>
      guard('WAL checkpoint failed', () => this.db.pragma(`wal_checkpoint(${mode})`))
    );
    const row = Array.isArray(rows) ? rows[0] : undefined;
    return {
      busy: numericField(row, 'busy'),
      log: numericField(row, 'log'),
      checkpointed: numericField(row, 'checkpointed'),
    };
  }

  /**
   * Release the handle. Only the root store calls this; children observe
   * the flag.
   */
  close(): void {
    if (this.closedFlag) return;
    if (this.transactions.active) {
      throw new TransactionError(
        'Cannot close the connection while a transaction is active; commit or roll back first'
      );
    }
    this.runWrite(() => {
      guard('Failed to close database', () => this.db.close());
    });
    this.closedFlag = true;
    for (const listener of this.closeListeners) {
      listener();
    }
    this.closeListeners.clear();
    this.logger.debug?.(`closed ${this.target.location}`);
  }
}

function applyOptimizations(db: Database.Database, cacheSizeMb: number): void {
  guard('Failed to apply connection settings', () => {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma(`cache_size = -${cacheSizeMb * 1024}`);
    db.pragma('temp_store = MEMORY');
    db.pragma('mmap_size = 268435456');
  });
}

function numericField(row: unknown, field: string): number {
  if (typeof row !== 'object' || row === null || !(field in row)) return 0;
  const value: unknown = Reflect.get(row, field);
  return typeof value === 'number' ? value : Number(value);
}
