import { afterEach, describe, it, expect, vi } from 'vitest';
import { CacheError, CacheNamespace, type Logger } from '../src';

describe('CacheNamespace', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('unbounded', () => {
    it('returns hits, tombstones and misses', () => {
      const cache = new CacheNamespace();
      cache.put('a', { n: 1 });
      cache.putAbsent('b');

      expect(cache.get('a')).toEqual({ status: 'hit', value: { n: 1 } });
      expect(cache.get('b')).toEqual({ status: 'absent' });
      expect(cache.get('c')).toEqual({ status: 'miss' });
      expect(cache.size).toBe(2);
    });

    it('copies values in and out', () => {
      const cache = new CacheNamespace();
      const items = ['x'];
      cache.put('a', { items });
      items.push('y');

      const first = cache.get('a');
      if (first.status === 'hit' && typeof first.value === 'object' && first.value !== null && !Array.isArray(first.value)) {
        const list = first.value.items;
        if (Array.isArray(list)) list.push('z');
      }
      expect(cache.get('a')).toEqual({ status: 'hit', value: { items: ['x'] } });
    });

    it('never evicts', () => {
      const cache = new CacheNamespace();
      for (let i = 0; i < 50; i++) cache.put(`k${i}`, i);
      cache.evictIfNeeded();
      expect(cache.size).toBe(50);
    });

    it('removes and clears entries', () => {
      const cache = new CacheNamespace();
      cache.put('a', 1);
      cache.put('b', 2);
      cache.remove('a');
      expect(cache.keys()).toEqual(['b']);
      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  describe('lru', () => {
    it('evicts the least recently used key', () => {
      const cache = new CacheNamespace({ policy: { kind: 'lru', capacity: 2 } });
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('c', 3);
      expect(cache.keys().sort()).toEqual(['b', 'c']);

      cache.get('c');
      cache.put('a', 1);
      expect(cache.keys().sort()).toEqual(['a', 'c']);
    });

    it('refreshes recency on read', () => {
      const cache = new CacheNamespace({ policy: { kind: 'lru', capacity: 2 } });
      cache.put('a', 1);
      cache.put('b', 2);
      cache.get('a');
      cache.put('c', 3);
      expect(cache.keys().sort()).toEqual(['a', 'c']);
    });

    it('does not refresh recency on contains', () => {
      const cache = new CacheNamespace({ policy: { kind: 'lru', capacity: 2 } });
      cache.put('a', 1);
      cache.put('b', 2);
      expect(cache.contains('a')).toBe(true);
      cache.put('c', 3);
      expect(cache.contains('a')).toBe(false);
    });

    it('counts tombstones against capacity', () => {
      const cache = new CacheNamespace({ policy: { kind: 'lru', capacity: 1 } });
      cache.put('a', 1);
      cache.putAbsent('b');
      expect(cache.keys()).toEqual(['b']);
    });

    it('rejects a capacity below one', () => {
      expect(() => new CacheNamespace({ policy: { kind: 'lru', capacity: 0 } })).toThrow(
        new CacheError('LRU capacity must be a positive integer, got 0')
      );
    });
  });

  describe('ttl', () => {
    it('expires entries lazily and cascades for present values', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(10_000);
      const onExpire = vi.fn();
      const cache = new CacheNamespace({
        policy: { kind: 'ttl', ttlMs: 1000, cascadeDelete: true },
        onExpire,
      });

      cache.put('k', 'v');
      cache.putAbsent('gone');

      vi.setSystemTime(10_999);
      expect(cache.get('k')).toEqual({ status: 'hit', value: 'v' });

      vi.setSystemTime(11_000);
      expect(cache.get('k')).toEqual({ status: 'miss' });
      expect(cache.get('gone')).toEqual({ status: 'miss' });
      expect(onExpire).toHaveBeenCalledTimes(1);
      expect(onExpire).toHaveBeenCalledWith('k');
    });

    it('does not cascade without cascadeDelete', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(0);
      const onExpire = vi.fn();
      const cache = new CacheNamespace({
        policy: { kind: 'ttl', ttlMs: 50, cascadeDelete: false },
        onExpire,
      });

      cache.put('k', 'v');
      vi.setSystemTime(100);
      expect(cache.pruneExpired()).toBe(1);
      expect(onExpire).not.toHaveBeenCalled();
    });

    it('does not extend the lifetime on read', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(0);
      const cache = new CacheNamespace({ policy: { kind: 'ttl', ttlMs: 100, cascadeDelete: false } });

      cache.put('k', 'v');
      vi.setSystemTime(90);
      cache.get('k');
      vi.setSystemTime(100);
      expect(cache.contains('k')).toBe(false);
    });

    it('prunes only expired entries', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(0);
      const cache = new CacheNamespace({ policy: { kind: 'ttl', ttlMs: 100, cascadeDelete: false } });

      cache.put('old', 1);
      vi.setSystemTime(60);
      cache.put('new', 2);
      vi.setSystemTime(120);

      expect(cache.pruneExpired()).toBe(1);
      expect(cache.keys()).toEqual(['new']);
    });

    it('sweeps in the background until disposed', () => {
      vi.useFakeTimers();
      const onExpire = vi.fn();
      const cache = new CacheNamespace({
        policy: { kind: 'ttl', ttlMs: 100, cascadeDelete: true },
        onExpire,
        sweepIntervalMs: 500,
      });

      cache.put('k', 'v');
      vi.advanceTimersByTime(500);
      expect(onExpire).toHaveBeenCalledWith('k');
      expect(cache.size).toBe(0);

      cache.dispose();
      cache.put('again', 'v');
      vi.advanceTimersByTime(1000);
      expect(onExpire).toHaveBeenCalledTimes(1);
    });

    it('logs sweep failures instead of throwing from the timer', () => {
      vi.useFakeTimers();
      const failure = new Error('disk unavailable');
      const logger: Logger = { warn: vi.fn(), error: vi.fn() };
      const cache = new CacheNamespace({
        policy: { kind: 'ttl', ttlMs: 100, cascadeDelete: true },
        onExpire: () => {
          throw failure;
        },
        sweepIntervalMs: 200,
        logger,
      });

      cache.put('k', 'v');
      vi.advanceTimersByTime(200);
      expect(logger.error).toHaveBeenCalledWith('Background expiry sweep failed', failure);
      cache.dispose();
    });

    it('rejects a non-positive ttl', () => {
      expect(
        () => new CacheNamespace({ policy: { kind: 'ttl', ttlMs: 0, cascadeDelete: false } })
      ).toThrow('TTL must be a positive number of milliseconds, got 0');
    });
  });
});
