import type { JsonValue } from '../types';

/**
 * Rule governing which cached entries are discarded
 */
export type EvictionPolicy =
  | { kind: 'unbounded' }
  | { kind: 'lru'; capacity: number }
  | { kind: 'ttl'; ttlMs: number; cascadeDelete: boolean };

export type CacheStrategy = EvictionPolicy['kind'];

/**
 * A cached key. `present: false` is a tombstone: the backing row is known
 * to be absent, so a lookup need not reach storage.
 */
export type CacheEntry =
  | { key: string; present: true; value: JsonValue; lastAccess: number; expiresAt: number | null }
  | { key: string; present: false; lastAccess: number; expiresAt: number | null };

export type CacheLookup =
  | { status: 'hit'; value: JsonValue }
  | { status: 'absent' }
  | { status: 'miss' };

/**
 * Common cache store interface. Implementations never talk to storage;
 * the caller falls through to the backend on a miss and fills the cache.
 */
export interface CacheStore {
  get(key: string): CacheLookup;
  put(key: string, value: JsonValue): void;
  putAbsent(key: string): void;
  remove(key: string): void;
  contains(key: string): boolean;
  evictIfNeeded(protectedKey?: string): void;
  clear(): void;
  readonly size: number;
}
