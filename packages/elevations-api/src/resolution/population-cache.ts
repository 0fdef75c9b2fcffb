/**
 * Population Dedup Cache
 *
 * Remembers which cells had population requested recently so the backfill
 * job is not triggered twice for the same cell inside the TTL window.
 *
 * DESIGN:
 * - Lazy expiry: an entry older than the TTL is treated as absent and dropped
 *   when a lookup touches it. No background sweep, no timers.
 * - Bounded: once maxEntries is exceeded the oldest entries go first. Map
 *   iteration order is insertion order, and a refresh re-inserts the key.
 * - Injected clock: tests move time explicitly instead of sleeping.
 *
 * Every method is synchronous, so a call runs to completion on the event loop
 * before any other request can observe the map. The read in
 * membersStillPending and the write in markPending are not atomic as a pair;
 * at worst one extra population trigger goes out for a cell whose entry
 * expires between the two.
 */

import type { CellId } from '../core/types.js';

export type Clock = () => number;

export interface PopulationCacheConfig {
  readonly ttlSeconds: number;
  readonly maxEntries: number;
  readonly clock?: Clock;
}

export class PopulationDedupCache {
  private readonly entries = new Map<CellId, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private evictionCount = 0;

  constructor(config: PopulationCacheConfig) {
    if (config.maxEntries < 1) {
      throw new Error(`Population cache needs room for at least one entry, got ${config.maxEntries}`);
    }
    this.ttlMs = config.ttlSeconds * 1000;
    this.maxEntries = config.maxEntries;
    this.clock = config.clock ?? Date.now;
  }

  /**
   * Subset of candidates with an unexpired entry as of now
   */
  membersStillPending(candidates: Iterable<CellId>): Set<CellId> {
    const now = this.clock();
    const pending = new Set<CellId>();

    for (const cell of candidates) {
      const insertedAt = this.entries.get(cell);
      if (insertedAt === undefined) continue;

      if (this.isExpired(insertedAt, now)) {
        this.entries.delete(cell);
      } else {
        pending.add(cell);
      }
    }

    return pending;
  }

  /**
   * Insert or refresh entries with the current time
   */
  markPending(cells: Iterable<CellId>): void {
    const now = this.clock();

    for (const cell of cells) {
      this.entries.delete(cell);
      this.entries.set(cell, now);
    }

    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(oldest);
      this.evictionCount++;
    }
  }

  isExpired(insertedAt: number, now: number): boolean {
    return now - insertedAt >= this.ttlMs;
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  purgeExpired(): number {
    const now = this.clock();
    let removed = 0;

    for (const [cell, insertedAt] of this.entries) {
      if (this.isExpired(insertedAt, now)) {
        this.entries.delete(cell);
        removed++;
      }
    }

    return removed;
  }

  /** Entries currently held, expired or not */
  get size(): number {
    return this.entries.size;
  }

  /** Entries reclaimed by the capacity bound */
  get evictions(): number {
    return this.evictionCount;
  }

  clear(): void {
    this.entries.clear();
  }
}
