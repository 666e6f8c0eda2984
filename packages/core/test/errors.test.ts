import { describe, it, expect, vi } from 'vitest';
import {
  ClosedError,
  ConnectionError,
  DatabaseError,
  KeyNotFoundError,
  ShelfError,
  ValidationError,
  calculateValueDepth,
  isShelfError,
  jsonCodec,
  scopedLogger,
  type Logger,
} from '../src';

describe('errors', () => {
  it('keeps the engine error as cause', () => {
    const cause = new Error('SQLITE_BUSY: database is locked');
    const error = new DatabaseError('Failed to write key', cause);

    expect(error.message).toBe('Failed to write key: SQLITE_BUSY: database is locked');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('DATABASE');
    expect(error.name).toBe('DatabaseError');
  });

  it('gives each error a stable code', () => {
    const closed = new ClosedError('Database connection is closed');
    expect(closed).toBeInstanceOf(ConnectionError);
    expect(closed).toBeInstanceOf(ShelfError);
    expect(closed.code).toBe('CLOSED');

    const missing = new KeyNotFoundError('alpha');
    expect(missing.message).toBe("Key not found: 'alpha'");
    expect(missing.key).toBe('alpha');

    expect(new ValidationError('bad', ['one', 'two']).violations).toEqual(['one', 'two']);
  });

  it('recognises shelf errors', () => {
    expect(isShelfError(new ClosedError('closed'))).toBe(true);
    expect(isShelfError(new Error('plain'))).toBe(false);
    expect(isShelfError('text')).toBe(false);
  });
});

describe('values', () => {
  it('measures nesting depth', () => {
    expect(calculateValueDepth('text')).toBe(0);
    expect(calculateValueDepth([])).toBe(1);
    expect(calculateValueDepth({ a: [1, { b: null }] })).toBe(3);
  });

  it('encodes values as JSON', () => {
    expect(jsonCodec.encode({ a: [1, true, null] })).toBe('{"a":[1,true,null]}');
    expect(jsonCodec.decode('{"a":[1,true,null]}')).toEqual({ a: [1, true, null] });
  });
});

describe('scopedLogger', () => {
  it('prefixes every message with the scope', () => {
    const base: Logger = { warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const logger = scopedLogger(base, 'shelfdb:users');

    logger.warn('slow query', 42);
    logger.debug?.('opened');
    logger.info?.('ignored');

    expect(base.warn).toHaveBeenCalledWith('[shelfdb:users] slow query', 42);
    expect(base.debug).toHaveBeenCalledWith('[shelfdb:users] opened');
  });
});
