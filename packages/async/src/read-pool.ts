import Database from 'better-sqlite3';
import { ClosedError, DatabaseError, consoleLogger, type Logger } from '@shelfdb/core';

interface Waiter {
  resolve: (db: Database.Database) => void;
  reject: (error: Error) => void;
}

/**
 * Fixed set of read-only connections to the same database file.
 *
 * Reads here bypass the writer lock entirely, so they carry no ordering
 * guarantee relative to concurrent writes. The pool never takes part in
 * transactions: every connection is opened read-only with `query_only` set.
 */
export class ReadConnectionPool {
  private readonly connections: Database.Database[] = [];
  private readonly idle: Database.Database[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(
    readonly location: string,
    readonly size: number,
    private readonly logger: Logger = consoleLogger
  ) {
    try {
      for (let i = 0; i < size; i++) {
        const db = new Database(location, { readonly: true, fileMustExist: true });
        this.connections.push(db);
        db.pragma('query_only = ON');
        this.idle.push(db);
      }
    } catch (error) {
      for (const db of this.connections) {
        if (db.open) db.close();
      }
      throw new DatabaseError(`Failed to open read pool for '${location}'`, error);
    }
  }

  get available(): number {
    return this.idle.length;
  }

  /**
   * Check out a connection for the duration of `fn`
   */
  async use<T>(fn: (db: Database.Database) => Promise<T> | T): Promise<T> {
    const db = await this.acquire();
    try {
      return await fn(db);
    } finally {
      this.release(db);
    }
  }

  /**
   * Close every connection, even if some fail. Failures are logged and
   * reported together once all connections have been attempted.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new ClosedError('Read pool is closed'));
    }

    const failures: unknown[] = [];
    for (const db of this.connections) {
      try {
        db.close();
      } catch (error) {
        this.logger.error('Failed to close read connection', error);
        failures.push(error);
      }
    }
    this.idle.length = 0;

    if (failures.length > 0) {
      throw new DatabaseError(
        `Failed to close ${failures.length} of ${this.connections.length} read connections`,
        new AggregateError(failures)
      );
    }
  }

  private acquire(): Promise<Database.Database> {
    if (this.closed) {
      return Promise.reject(new ClosedError('Read pool is closed'));
    }
    const db = this.idle.pop();
    if (db) return Promise.resolve(db);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  private release(db: Database.Database): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(db);
    } else {
      this.idle.push(db);
    }
  }
}
