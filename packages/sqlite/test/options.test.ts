import { describe, it, expect } from 'vitest';
import { UnsupportedTargetError, ValidationError, silentLogger } from '@shelfdb/core';
import {
  ShelfStore,
  parseStoreOptions,
  parseWithSchema,
  resolveTarget,
  storeOptionsSchema,
  toEvictionPolicy,
} from '../src';

describe('store options', () => {
  it('fills defaults', () => {
    const { config } = parseStoreOptions();
    expect(config).toEqual({
      table: 'data',
      bulkPreload: false,
      cacheStrategy: 'unbounded',
      cacheCascadeDelete: false,
      strictValidation: true,
      allowedFunctions: [],
      forbiddenFunctions: [],
      maxClauseLength: 1000,
      optimize: true,
      cacheSizeMb: 64,
    });
    expect(toEvictionPolicy(config)).toEqual({ kind: 'unbounded' });
  });

  it('maps cache settings to eviction policies', () => {
    expect(toEvictionPolicy(parseStoreOptions({ cacheStrategy: 'lru', cacheCapacity: 5 }).config)).toEqual({
      kind: 'lru',
      capacity: 5,
    });
    expect(
      toEvictionPolicy(
        parseStoreOptions({ cacheStrategy: 'ttl', cacheTtlMs: 500, cacheCascadeDelete: true }).config
      )
    ).toEqual({ kind: 'ttl', ttlMs: 500, cascadeDelete: true });
  });

  it('requires the parameter each policy needs', () => {
    expect(() => ShelfStore.open(':memory:', { logger: silentLogger, cacheStrategy: 'lru' })).toThrow(
      "Invalid store options: cacheCapacity: cacheCapacity is required when cacheStrategy is 'lru'"
    );
    expect(() => parseStoreOptions({ cacheStrategy: 'ttl' })).toThrow(
      "Invalid store options: cacheTtlMs: cacheTtlMs is required when cacheStrategy is 'ttl'"
    );
  });

  it('rejects malformed values', () => {
    expect(() => parseWithSchema(storeOptionsSchema, { cacheStrategy: 'fifo' })).toThrow(
      /^Invalid store options: cacheStrategy: /
    );
    expect(() => parseStoreOptions({ cacheCapacity: 0, cacheStrategy: 'lru' })).toThrow(ValidationError);
    expect(() => parseStoreOptions({ maxClauseLength: -5 })).toThrow(/^Invalid store options: maxClauseLength: /);
  });
});

describe('resolveTarget', () => {
  it('accepts plain paths and memory targets', () => {
    expect(resolveTarget('app.db')).toEqual({ backend: 'sqlite', location: 'app.db', inMemory: false });
    expect(resolveTarget(':memory:')).toEqual({ backend: 'sqlite', location: ':memory:', inMemory: true });
  });

  it('normalises sqlite and file URLs', () => {
    expect(resolveTarget('sqlite:///var/lib/app.db').location).toBe('/var/lib/app.db');
    expect(resolveTarget('sqlite:////var/lib/app.db').location).toBe('/var/lib/app.db');
    expect(resolveTarget('sqlite:///./data/app.db').location).toBe('./data/app.db');
    expect(resolveTarget('sqlite:///C:/data/app.db').location).toBe('C:/data/app.db');
    expect(resolveTarget('file:///tmp/my%20app.db').location).toBe('/tmp/my app.db');
    expect(resolveTarget('sqlite://').inMemory).toBe(true);
    expect(resolveTarget('sqlite:///:memory:').inMemory).toBe(true);
  });

  it('rejects PostgreSQL and unknown schemes', () => {
    expect(() => resolveTarget('postgresql://user@localhost/app')).toThrow(
      new UnsupportedTargetError('PostgreSQL backend is not implemented yet. Use a SQLite path or a sqlite:/// URL.')
    );
    expect(() => resolveTarget('mysql://localhost/app')).toThrow(
      "Unsupported or unknown database target: 'mysql://localhost/app'"
    );
    expect(() => resolveTarget('')).toThrow("Unsupported or unknown database target: ''");
  });

  it('refuses to open unsupported targets', () => {
    expect(() => ShelfStore.open('postgres://localhost/app', { logger: silentLogger })).toThrow(
      UnsupportedTargetError
    );
  });
});
