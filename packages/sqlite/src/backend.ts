import type Database from 'better-sqlite3';
import {
  DatabaseError,
  ShelfError,
  jsonCodec,
  quoteIdentifier,
  validateIdentifier,
  type JsonValue,
  type ValueCipher,
  type ValueCodec,
} from '@shelfdb/core';

interface ValueRow {
  value: string;
}

interface KeyRow {
  key: string;
}

interface KeyValueRow {
  key: string;
  value: string;
}

interface CountRow {
  total: number;
}

interface TableStatements {
  read: Database.Statement<[string], ValueRow>;
  exists: Database.Statement<[string], KeyRow>;
  write: Database.Statement<[string, string], unknown>;
  delete: Database.Statement<[string], unknown>;
  count: Database.Statement<[], CountRow>;
  keys: Database.Statement<[], KeyRow>;
  readAll: Database.Statement<[], KeyValueRow>;
  clear: Database.Statement<[], unknown>;
}

// SQLite's default bound-parameter limit is 999 on older builds
const IN_CLAUSE_CHUNK = 500;

/**
 * Thin adapter issuing key/value reads and writes against one SQLite
 * connection. Each table is `(key TEXT PRIMARY KEY, value TEXT NOT NULL)`.
 *
 * Values pass through the codec, then the optional cipher, on the way in,
 * and the reverse on the way out. Engine failures surface as DatabaseError
 * with the original error as `cause`.
 */
export class SqliteBackend {
  private readonly tables = new Map<string, TableStatements>();

  constructor(
    private readonly db: Database.Database,
    private readonly codec: ValueCodec = jsonCodec,
    private readonly cipher?: ValueCipher
  ) {}

  ensureTable(table: string): void {
    const name = quoteIdentifier(validateIdentifier(table, 'table name'));
    guard(`Failed to create table '${table}'`, () => {
      this.db.exec(`CREATE TABLE IF NOT EXISTS ${name} (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);
    });
  }

  read(table: string, key: string): JsonValue | undefined {
    const row = guard(`Failed to read key '${key}' from '${table}'`, () =>
      this.statements(table).read.get(key)
    );
    return row === undefined ? undefined : this.decode(table, key, row.value);
  }

  readMany(table: string, keys: readonly string[]): Map<string, JsonValue> {
    const result = new Map<string, JsonValue>();
    const name = quoteIdentifier(validateIdentifier(table, 'table name'));

    for (let start = 0; start < keys.length; start += IN_CLAUSE_CHUNK) {
      const chunk = keys.slice(start, start + IN_CLAUSE_CHUNK);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = guard(`Failed to read ${chunk.length} keys from '${table}'`, () =>
        this.db
          .prepare<string[], KeyValueRow>(`SELECT key, value FROM ${name} WHERE key IN (${placeholders})`)
          .all(...chunk)
      );
      for (const row of rows) {
        result.set(row.key, this.decode(table, row.key, row.value));
      }
    }
    return result;
  }

  write(table: string, key: string, value: JsonValue): void {
    const payload = this.encode(value);
    guard(`Failed to write key '${key}' to '${table}'`, () => {
      this.statements(table).write.run(key, payload);
    });
  }

  writeMany(table: string, entries: Iterable<readonly [string, JsonValue]>): void {
    for (const [key, value] of entries) {
      this.write(table, key, value);
    }
  }

  /**
   * Returns true when a row was removed
   */
  delete(table: string, key: string): boolean {
    const result = guard(`Failed to delete key '${key}' from '${table}'`, () =>
      this.statements(table).delete.run(key)
    );
    return result.changes > 0;
  }

  deleteMany(table: string, keys: Iterable<string>): number {
    let removed = 0;
    for (const key of keys) {
      if (this.delete(table, key)) removed++;
    }
    return removed;
  }

  exists(table: string, key: string): boolean {
    const row = guard(`Failed to check key '${key}' in '${table}'`, () =>
      this.statements(table).exists.get(key)
    );
    return row !== undefined;
  }

  count(table: string): number {
    const row = guard(`Failed to count rows in '${table}'`, () => this.statements(table).count.get());
    return row?.total ?? 0;
  }

  keys(table: string): string[] {
    const rows = guard(`Failed to list keys in '${table}'`, () => this.statements(table).keys.all());
    return rows.map((row) => row.key);
  }

  readAll(table: string): Array<[string, JsonValue]> {
    const rows = guard(`Failed to read rows from '${table}'`, () =>
      this.statements(table).readAll.all()
    );
    return rows.map((row) => [row.key, this.decode(table, row.key, row.value)]);
  }

  clear(table: string): void {
    guard(`Failed to clear '${table}'`, () => {
      this.statements(table).clear.run();
    });
  }

  private statements(table: string): TableStatements {
    const cached = this.tables.get(table);
    if (cached) return cached;

    const name = quoteIdentifier(validateIdentifier(table, 'table name'));
    const db = this.db;
    const statements: TableStatements = {
      read: db.prepare<[string], ValueRow>(`SELECT value FROM ${name} WHERE key = ?`),
      exists: db.prepare<[string], KeyRow>(`SELECT key FROM ${name} WHERE key = ?`),
      write: db.prepare<[string, string], unknown>(
        `INSERT OR REPLACE INTO ${name} (key, value) VALUES (?, ?)`
      ),
      delete: db.prepare<[string], unknown>(`DELETE FROM ${name} WHERE key = ?`),
      count: db.prepare<[], CountRow>(`SELECT COUNT(*) AS total FROM ${name}`),
      keys: db.prepare<[], KeyRow>(`SELECT key FROM ${name}`),
      readAll: db.prepare<[], KeyValueRow>(`SELECT key, value FROM ${name}`),
      clear: db.prepare<[], unknown>(`DELETE FROM ${name}`),
    };
    this.tables.set(table, statements);
    return statements;
  }

  private encode(value: JsonValue): string {
    const encoded = this.codec.encode(value);
    return this.cipher ? this.cipher.encrypt(encoded) : encoded;
  }

  private decode(table: string, key: string, payload: string): JsonValue {
    return guard(`Failed to decode value for key '${key}' in '${table}'`, () => {
      const plain = this.cipher ? this.cipher.decrypt(payload) : payload;
      return this.codec.decode(plain);
    });
  }
}

/**
 * Run an engine call, wrapping anything that is not already a ShelfError
 */
export function guard<T>(message: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ShelfError) throw error;
    throw new DatabaseError(message, error);
  }
}
