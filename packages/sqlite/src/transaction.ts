import type Database from 'better-sqlite3';
import { TransactionError, type CacheNamespace, type Logger } from '@shelfdb/core';
import { guard } from './backend';

export type TransactionState = 'idle' | 'active';

const WHOLE_NAMESPACE = 'all' as const;

/**
 * Idle/active state machine for the shared connection.
 *
 * The state lives on the connection, so a transaction begun through one
 * table view is visible to every view sharing it. Cache fills made while
 * active are recorded per namespace; rollback drops them so later reads go
 * back to storage, commit just forgets them.
 */
export class TransactionManager {
  private current: TransactionState = 'idle';
  private readonly touched = new Map<CacheNamespace, Set<string> | typeof WHOLE_NAMESPACE>();

  constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger
  ) {}

  get active(): boolean {
    return this.current === 'active';
  }

  begin(): void {
    if (this.current === 'active') {
      throw new TransactionError('Transaction already active; nested transactions are not supported');
    }
    guard('Failed to begin transaction', () => {
      this.db.exec('BEGIN IMMEDIATE');
    });
    this.current = 'active';
    this.logger.debug?.('transaction begun');
  }

  commit(): void {
    if (this.current !== 'active') {
      throw new TransactionError('No active transaction to commit');
    }
    if (!this.db.inTransaction) {
      // The engine rolled back on its own (e.g. after a disk-full error)
      this.finishRollback();
      throw new TransactionError('Transaction was rolled back by the database engine; nothing to commit');
    }

    try {
      guard('Failed to commit transaction', () => {
        this.db.exec('COMMIT');
      });
    } finally {
      if (!this.db.inTransaction) {
        this.current = 'idle';
        this.touched.clear();
      }
    }
    this.logger.debug?.('transaction committed');
  }

  rollback(): void {
    if (this.current !== 'active') {
      throw new TransactionError('No active transaction to roll back');
    }
    try {
      if (this.db.inTransaction) {
        guard('Failed to roll back transaction', () => {
          this.db.exec('ROLLBACK');
        });
      }
    } finally {
      if (!this.db.inTransaction) {
        this.finishRollback();
      }
    }
    this.logger.debug?.('transaction rolled back');
  }

  /**
   * Record a cache fill made during the active transaction.
   * A null key stands for the whole namespace (e.g. after a clear).
   */
  track(namespace: CacheNamespace, key: string | null): void {
    if (this.current !== 'active') return;

    const existing = this.touched.get(namespace);
    if (existing === WHOLE_NAMESPACE) return;
    if (key === null) {
      this.touched.set(namespace, WHOLE_NAMESPACE);
      return;
    }
    if (existing) {
      existing.add(key);
    } else {
      this.touched.set(namespace, new Set([key]));
    }
  }

  private finishRollback(): void {
    for (const [namespace, keys] of this.touched) {
      if (keys === WHOLE_NAMESPACE) {
        namespace.clear();
      } else {
        for (const key of keys) namespace.remove(key);
      }
    }
    this.touched.clear();
    this.current = 'idle';
  }
}
