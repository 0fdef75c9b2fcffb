/**
 * Population Dedup Cache Tests
 *
 * Time is driven through an injected clock; nothing here sleeps.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PopulationDedupCache } from '../../../resolution/population-cache.js';

const C = 630949280220402687n;
const D = 630949280220390399n;

describe('PopulationDedupCache', () => {
  let now: number;
  let cache: PopulationDedupCache;

  beforeEach(() => {
    now = 1_000_000;
    cache = new PopulationDedupCache({ ttlSeconds: 240, maxEntries: 1024, clock: () => now });
  });

  it('reports nothing pending when empty', () => {
    expect(cache.membersStillPending([C, D])).toEqual(new Set());
  });

  it('reports marked cells as pending within the TTL', () => {
    cache.markPending([C]);
    now += 239_999;

    expect(cache.membersStillPending([C, D])).toEqual(new Set([C]));
  });

  it('treats an entry as expired exactly at the TTL', () => {
    cache.markPending([C]);
    now += 240_000;

    expect(cache.membersStillPending([C])).toEqual(new Set());
  });

  it('drops expired entries when a lookup touches them', () => {
    cache.markPending([C, D]);
    now += 240_000;

    cache.membersStillPending([C]);

    expect(cache.size).toBe(1);
  });

  it('restarts the window when a cell is marked again', () => {
    cache.markPending([C]);
    now += 200_000;
    cache.markPending([C]);
    now += 200_000;

    expect(cache.membersStillPending([C])).toEqual(new Set([C]));
  });

  it('supports sub-second TTLs', () => {
    const short = new PopulationDedupCache({ ttlSeconds: 0.1, maxEntries: 10, clock: () => now });
    short.markPending([C]);

    now += 99;
    expect(short.membersStillPending([C])).toEqual(new Set([C]));

    now += 2;
    expect(short.membersStillPending([C])).toEqual(new Set());
  });

  describe('isExpired', () => {
    it('compares age against the TTL', () => {
      expect(cache.isExpired(0, 239_999)).toBe(false);
      expect(cache.isExpired(0, 240_000)).toBe(true);
    });
  });

  describe('capacity', () => {
    it('evicts the oldest entries first', () => {
      const small = new PopulationDedupCache({ ttlSeconds: 240, maxEntries: 2, clock: () => now });

      small.markPending([1n]);
      now += 1;
      small.markPending([2n]);
      now += 1;
      small.markPending([3n]);

      expect(small.size).toBe(2);
      expect(small.evictions).toBe(1);
      expect(small.membersStillPending([1n, 2n, 3n])).toEqual(new Set([2n, 3n]));
    });

    it('counts a refreshed entry as the newest', () => {
      const small = new PopulationDedupCache({ ttlSeconds: 240, maxEntries: 2, clock: () => now });

      small.markPending([1n, 2n]);
      small.markPending([1n]);
      small.markPending([3n]);

      expect(small.membersStillPending([1n, 2n, 3n])).toEqual(new Set([1n, 3n]));
    });

    it('requires room for at least one entry', () => {
      expect(() => new PopulationDedupCache({ ttlSeconds: 240, maxEntries: 0 })).toThrow(
        'Population cache needs room for at least one entry, got 0'
      );
    });
  });

  it('purges every expired entry on demand', () => {
    cache.markPending([C]);
    now += 100_000;
    cache.markPending([D]);
    now += 150_000;

    expect(cache.purgeExpired()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.membersStillPending([C, D])).toEqual(new Set([D]));
  });

  it('clears all entries', () => {
    cache.markPending([C, D]);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.membersStillPending([C, D])).toEqual(new Set());
  });
});
