/**
 * Elevations Service Constants
 *
 * Defaults for every tunable the engine recognizes. Runtime values come from
 * ElevationsConfig; these are only the starting point.
 */

/** Coarsest H3 resolution the store is populated at */
export const MIN_RESOLUTION = 8;

/** Finest H3 resolution the store is populated at; default for coordinate/polygon requests */
export const MAX_RESOLUTION = 12;

/** Cells per request for explicit cell or coordinate lists */
export const CELL_LIMIT = 15;

/** Polygon-derived sets are contiguous and cheaper to backfill in bulk */
export const POLYGON_CELL_LIMIT_MULTIPLIER = 100;

/** How long a population request suppresses repeats for the same cell */
export const POPULATION_TTL_SECONDS = 240;

export const CACHE_MAX_ENTRIES = 1024;

/** Wait-time guidance returned alongside pending cells */
export const ESTIMATED_WAIT_SECONDS = 240;

export const WAIT_SECONDS_PER_PENDING_CELL = 0;

export const STORE_TIMEOUT_MS = 10_000;

export const POPULATION_TIMEOUT_MS = 5_000;

export const MAX_BODY_BYTES = 1024 * 1024;

/** Exclusive upper bound of an unsigned 64-bit index */
export const UINT64_LIMIT = 1n << 64n;
