import type Database from 'better-sqlite3';
import {
  ValidationError,
  quoteIdentifier,
  validateExpression,
  validateIdentifier,
  type ClauseContext,
  type Logger,
} from '@shelfdb/core';
import { guard } from './backend';

export type SqlParameters = unknown[] | Record<string, unknown>;

export type Row = Record<string, unknown>;

export interface QueryOptions {
  table?: string; // Default: the store's table
  columns?: string[]; // Default: ['*']
  where?: string;
  parameters?: SqlParameters;
  orderBy?: string;
  groupBy?: string;
  limit?: number;
  offset?: number;
  allowedFunctions?: string[];
  forbiddenFunctions?: string[];
  overrideAllowed?: boolean; // Only this call's allowedFunctions count, not the defaults or the store's
}

export interface ClausePolicy {
  strict: boolean;
  maxClauseLength: number | null;
  allowedFunctions: string[];
  forbiddenFunctions: string[];
  logger: Logger;
}

export interface BuiltQuery {
  sql: string;
  parameters: SqlParameters;
}

/**
 * Build a validated SELECT from query options.
 * Every caller-supplied fragment is checked before any SQL is produced.
 */
export class QueryBuilder {
  constructor(private readonly policy: ClausePolicy) {}

  buildSelect(defaultTable: string, options: QueryOptions = {}): BuiltQuery {
    const table = quoteIdentifier(validateIdentifier(options.table ?? defaultTable, 'table name'));
    const columns = this.mapColumns(options.columns, options);
    const parts = [`SELECT ${columns} FROM ${table}`];

    if (options.where) {
      this.check(options.where, 'where', options);
      parts.push(`WHERE ${options.where}`);
    }
    if (options.groupBy) {
      this.check(options.groupBy, 'groupBy', options);
      parts.push(`GROUP BY ${options.groupBy}`);
    }
    if (options.orderBy) {
      this.check(options.orderBy, 'orderBy', options);
      parts.push(`ORDER BY ${options.orderBy}`);
    }

    const limit = this.mapPaginationValue(options.limit, 'limit');
    const offset = this.mapPaginationValue(options.offset, 'offset');
    if (limit !== null) {
      parts.push(`LIMIT ${limit}`);
    }
    if (offset !== null) {
      // SQLite only accepts OFFSET after a LIMIT; -1 means no limit
      parts.push(limit === null ? `LIMIT -1 OFFSET ${offset}` : `OFFSET ${offset}`);
    }

    return { sql: parts.join(' '), parameters: options.parameters ?? [] };
  }

  private mapColumns(columns: string[] | undefined, options: QueryOptions): string {
    if (!columns || columns.length === 0) return '*';

    return columns
      .map((column) => {
        // Plain names are quoted so reserved words such as "group" work
        if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(column)) {
          return quoteIdentifier(column);
        }
        if (column === '*') return column;
        this.check(column, 'columns', options);
        return column;
      })
      .join(', ');
  }

  private mapPaginationValue(value: number | undefined, name: string): number | null {
    if (value === undefined) return null;
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${name} must be a non-negative integer, got ${value}`);
    }
    return value;
  }

  private check(fragment: string, context: ClauseContext, options: QueryOptions): void {
    const overrideAllowed = options.overrideAllowed ?? false;
    const allowed = overrideAllowed
      ? options.allowedFunctions ?? []
      : [...this.policy.allowedFunctions, ...(options.allowedFunctions ?? [])];

    validateExpression(fragment, {
      context,
      allowedFunctions: allowed,
      overrideAllowed,
      forbiddenFunctions: [...this.policy.forbiddenFunctions, ...(options.forbiddenFunctions ?? [])],
      maxLength: this.policy.maxClauseLength,
      strict: this.policy.strict,
      logger: this.policy.logger,
    });
  }
}

/**
 * Run a read statement on any connection, the writer or a pooled reader.
 * Statements that return no data are run and yield an empty list.
 */
export function executeRead(db: Database.Database, sql: string, parameters: SqlParameters = []): Row[] {
  return guard('Query failed', () => {
    const statement = db.prepare<unknown[], Row>(sql);
    const args = Array.isArray(parameters) ? parameters : [parameters];
    if (!statement.reader) {
      statement.run(...args);
      return [];
    }
    return statement.all(...args);
  });
}
