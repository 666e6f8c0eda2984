import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ClosedError, DatabaseError, silentLogger, type Logger } from '@shelfdb/core';
import { openStore, type ShelfStore } from '@shelfdb/sqlite';
import { ReadConnectionPool } from '../src';

interface CountRow {
  total: number;
}

describe('ReadConnectionPool', () => {
  let dir: string;
  let path: string;
  let writer: ShelfStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shelfdb-read-'));
    path = join(dir, 'read.db');
    writer = openStore(path, { logger: silentLogger });
    writer.update({ a: 1, b: 2 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    writer.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads committed rows', async () => {
    const pool = new ReadConnectionPool(path, 2, silentLogger);
    const row = await pool.use((db) => db.prepare<[], CountRow>('SELECT COUNT(*) AS total FROM data').get());

    expect(row).toEqual({ total: 2 });
    expect(pool.available).toBe(2);
    pool.close();
  });

  it('refuses writes', async () => {
    const pool = new ReadConnectionPool(path, 1, silentLogger);
    await expect(
      pool.use((db) => db.prepare("INSERT INTO data (key, value) VALUES ('c', '3')").run())
    ).rejects.toThrow();
    expect(writer.count()).toBe(2);
    pool.close();
  });

  it('queues callers when every connection is busy', async () => {
    const pool = new ReadConnectionPool(path, 1, silentLogger);
    const order: string[] = [];

    const first = pool.use(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push('first');
    });
    const second = pool.use(() => {
      order.push('second');
    });

    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
    pool.close();
  });

  it('fails to open a missing file', () => {
    expect(() => new ReadConnectionPool(join(dir, 'missing.db'), 1, silentLogger)).toThrow(DatabaseError);
  });

  it('rejects use after close', async () => {
    const pool = new ReadConnectionPool(path, 1, silentLogger);
    pool.close();
    await expect(pool.use(() => 'late')).rejects.toThrow(new ClosedError('Read pool is closed'));
  });

  it('closes every connection and reports failures together', async () => {
    const logger: Logger = { warn: vi.fn(), error: vi.fn() };
    const pool = new ReadConnectionPool(path, 2, logger);
    const failure = new Error('close failed');

    const failing = await pool.use((db) => {
      vi.spyOn(db, 'close').mockImplementationOnce(() => {
        throw failure;
      });
      return db;
    });

    let caught: unknown;
    try {
      pool.close();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DatabaseError);
    expect(caught instanceof DatabaseError ? caught.message : '').toMatch(/^Failed to close 1 of 2 read connections/);
    expect(caught instanceof DatabaseError ? caught.cause : undefined).toBeInstanceOf(AggregateError);
    expect(logger.error).toHaveBeenCalledWith('Failed to close read connection', failure);

    vi.restoreAllMocks();
    failing.close();
  });
});
