import type { JsonValue } from '../types';
import type { CacheEntry, CacheLookup, CacheStore, EvictionPolicy } from './types';
import { CacheError } from '../errors';
import type { Logger } from '../logger';
import { consoleLogger } from '../logger';

export interface CacheNamespaceConfig {
  policy?: EvictionPolicy; // Default: unbounded
  /**
   * Called for every expired entry that held a value when the policy is
   * TTL with `cascadeDelete`. The store wires this to a backend delete.
   */
  onExpire?: (key: string) => void;
  sweepIntervalMs?: number; // Background expiry sweep, TTL only. Default: off
  logger?: Logger; // Receives background sweep failures. Default: consoleLogger
}

/**
 * Per-table in-memory mapping with pluggable eviction.
 * Uses Map insertion order as the recency list, so LRU eviction is O(1)
 * in the common case.
 */
export class CacheNamespace implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  readonly policy: EvictionPolicy;
  private readonly onExpire?: (key: string) => void;
  private readonly logger: Logger;
  private sweepTimer?: NodeJS.Timeout;

  constructor(config: CacheNamespaceConfig = {}) {
    this.policy = config.policy ?? { kind: 'unbounded' };
    this.onExpire = config.onExpire;
    this.logger = config.logger ?? consoleLogger;
    assertPolicy(this.policy);

    if (config.sweepIntervalMs !== undefined && this.policy.kind === 'ttl') {
      this.sweepTimer = setInterval(() => this.sweep(), config.sweepIntervalMs);
      // Allow process to exit even if timer is active
      this.sweepTimer.unref?.();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheLookup {
    const entry = this.entries.get(key);
    if (!entry) {
      return { status: 'miss' };
    }

    const now = Date.now();
    if (isExpired(entry, now)) {
      this.expire(entry);
      return { status: 'miss' };
    }

    this.touch(entry, now);
    return entry.present ? { status: 'hit', value: detach(entry.value) } : { status: 'absent' };
  }

  put(key: string, value: JsonValue): void {
    this.store({ key, present: true, value: detach(value), lastAccess: 0, expiresAt: null });
  }

  putAbsent(key: string): void {
    this.store({ key, present: false, lastAccess: 0, expiresAt: null });
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Whether the key is known to the namespace (value or tombstone).
   * Does not refresh recency.
   */
  contains(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !isExpired(entry, Date.now());
  }

  evictIfNeeded(protectedKey?: string): void {
    const policy = this.policy;
    switch (policy.kind) {
      case 'unbounded':
        return;
      case 'lru':
        this.evictLeastRecent(policy.capacity, protectedKey);
        return;
      case 'ttl':
        this.pruneExpired();
        return;
      default: {
        const unknown: never = policy;
        throw new CacheError(`Unknown eviction policy: ${JSON.stringify(unknown)}`);
      }
    }
  }

  /**
   * Remove expired entries, cascading where configured.
   * Returns the number of entries dropped.
   */
  pruneExpired(): number {
    const now = Date.now();
    const expired: CacheEntry[] = [];

    for (const entry of this.entries.values()) {
      if (isExpired(entry, now)) {
        expired.push(entry);
      }
    }

    for (const entry of expired) {
      this.expire(entry);
    }
    return expired.length;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Stop the background sweep and drop every entry
   */
  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    this.entries.clear();
  }

  private sweep(): void {
    try {
      this.pruneExpired();
    } catch (error) {
      this.logger.error('Background expiry sweep failed', error);
    }
  }

  private store(entry: CacheEntry): void {
    const now = Date.now();
    entry.lastAccess = now;
    entry.expiresAt = this.policy.kind === 'ttl' ? now + this.policy.ttlMs : null;

    // Re-insert so the key moves to the most recent end
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);

    if (this.policy.kind === 'lru') {
      this.evictIfNeeded(entry.key);
    }
  }

  private touch(entry: CacheEntry, now: number): void {
    entry.lastAccess = now;
    if (this.policy.kind === 'lru') {
      this.entries.delete(entry.key);
      this.entries.set(entry.key, entry);
    }
  }

  /**
   * Map keeps insertion order, so the first key that is not protected is
   * the least recently used one
   */
  private evictLeastRecent(capacity: number, protectedKey?: string): void {
    while (this.entries.size > capacity) {
      let victim: string | undefined;
      for (const key of this.entries.keys()) {
        if (key !== protectedKey) {
          victim = key;
          break;
        }
      }
      if (victim === undefined) {
        return;
      }
      this.entries.delete(victim);
    }
  }

  private expire(entry: CacheEntry): void {
    this.entries.delete(entry.key);
    if (entry.present && this.policy.kind === 'ttl' && this.policy.cascadeDelete) {
      this.onExpire?.(entry.key);
    }
  }
}

/**
 * Cached values never share structure with callers, so mutating a value
 * after `put` or after `get` leaves the cached copy untouched
 */
function detach(value: JsonValue): JsonValue {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

function isExpired(entry: CacheEntry, now: number): boolean {
  return entry.expiresAt !== null && now >= entry.expiresAt;
}

function assertPolicy(policy: EvictionPolicy): void {
  if (policy.kind === 'lru' && (!Number.isInteger(policy.capacity) || policy.capacity < 1)) {
    throw new CacheError(`LRU capacity must be a positive integer, got ${policy.capacity}`);
  }
  if (policy.kind === 'ttl' && !(policy.ttlMs > 0)) {
    throw new CacheError(`TTL must be a positive number of milliseconds, got ${policy.ttlMs}`);
  }
}
