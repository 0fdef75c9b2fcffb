/**
 * Elevations Service Configuration
 *
 * Defaults, deep-partial overrides, and environment loading.
 *
 * Environment variables (all optional):
 * - ELEVATIONS_MIN_RESOLUTION, ELEVATIONS_MAX_RESOLUTION
 * - ELEVATIONS_CELL_LIMIT, ELEVATIONS_POLYGON_CELL_LIMIT_MULTIPLIER
 * - ELEVATIONS_POPULATION_TTL_SECONDS, ELEVATIONS_CACHE_MAX_ENTRIES
 * - ELEVATIONS_POPULATION_ENDPOINT, ELEVATIONS_POPULATION_TIMEOUT_MS
 * - ELEVATIONS_DATABASE_PATH, ELEVATIONS_STORE_TIMEOUT_MS
 * - ELEVATIONS_ESTIMATED_WAIT_SECONDS, ELEVATIONS_WAIT_SECONDS_PER_PENDING_CELL
 * - ELEVATIONS_SCHEMA_URI, ELEVATIONS_SCHEMA_INFO
 * - ELEVATIONS_PORT, ELEVATIONS_HOST, ELEVATIONS_CORS_ORIGINS (comma separated)
 * - ELEVATIONS_MAX_BODY_BYTES
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { z } from 'zod';
import {
  CACHE_MAX_ENTRIES,
  CELL_LIMIT,
  ESTIMATED_WAIT_SECONDS,
  MAX_BODY_BYTES,
  MAX_RESOLUTION,
  MIN_RESOLUTION,
  POLYGON_CELL_LIMIT_MULTIPLIER,
  POPULATION_TIMEOUT_MS,
  POPULATION_TTL_SECONDS,
  STORE_TIMEOUT_MS,
  WAIT_SECONDS_PER_PENDING_CELL,
} from './constants.js';

export interface LimitsConfig {
  readonly minResolution: number;
  readonly maxResolution: number;
  /** Cap for explicit cell and coordinate lists */
  readonly cellLimit: number;
  /** Polygon cap is cellLimit * polygonCellLimitMultiplier */
  readonly polygonCellLimitMultiplier: number;
}

export interface PopulationConfig {
  readonly ttlSeconds: number;
  readonly maxEntries: number;
  readonly timeoutMs: number;
  /** Populator endpoint; population requests are only logged when unset */
  readonly endpoint?: string;
}

export interface StoreConfig {
  readonly databasePath: string;
  readonly timeoutMs: number;
}

export interface ResponseConfig {
  readonly estimatedWaitSeconds: number;
  readonly waitSecondsPerPendingCell: number;
  readonly schemaUri?: string;
  readonly schemaInfo?: string;
}

export interface APIConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
  readonly maxBodyBytes: number;
  readonly version: string;
}

export interface ElevationsConfig {
  readonly limits: LimitsConfig;
  readonly population: PopulationConfig;
  readonly store: StoreConfig;
  readonly response: ResponseConfig;
  readonly api: APIConfig;
}

export const DEFAULT_CONFIG: ElevationsConfig = {
  limits: {
    minResolution: MIN_RESOLUTION,
    maxResolution: MAX_RESOLUTION,
    cellLimit: CELL_LIMIT,
    polygonCellLimitMultiplier: POLYGON_CELL_LIMIT_MULTIPLIER,
  },
  population: {
    ttlSeconds: POPULATION_TTL_SECONDS,
    maxEntries: CACHE_MAX_ENTRIES,
    timeoutMs: POPULATION_TIMEOUT_MS,
  },
  store: {
    databasePath: 'elevations.db',
    timeoutMs: STORE_TIMEOUT_MS,
  },
  response: {
    estimatedWaitSeconds: ESTIMATED_WAIT_SECONDS,
    waitSecondsPerPendingCell: WAIT_SECONDS_PER_PENDING_CELL,
  },
  api: {
    port: 3000,
    host: '0.0.0.0',
    corsOrigins: ['*'],
    maxBodyBytes: MAX_BODY_BYTES,
    version: 'v1',
  },
};

/**
 * Deep partial type for nested configuration objects
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly string[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/**
 * Create configuration by merging overrides onto the defaults
 *
 * @throws {Error} If the resolution bounds are inverted
 */
export function createConfig(
  overrides: DeepPartial<ElevationsConfig> = {}
): ElevationsConfig {
  const config: ElevationsConfig = {
    limits: {
      ...DEFAULT_CONFIG.limits,
      ...overrides.limits,
    },
    population: {
      ...DEFAULT_CONFIG.population,
      ...overrides.population,
    },
    store: {
      ...DEFAULT_CONFIG.store,
      ...overrides.store,
    },
    response: {
      ...DEFAULT_CONFIG.response,
      ...overrides.response,
    },
    api: {
      ...DEFAULT_CONFIG.api,
      ...overrides.api,
    },
  };

  if (config.limits.minResolution > config.limits.maxResolution) {
    throw new Error(
      `Invalid resolution bounds: minimum ${config.limits.minResolution} exceeds maximum ${config.limits.maxResolution}`
    );
  }

  return config;
}

// ============================================================================
// Environment Loading
// ============================================================================

const resolutionVar = z.coerce.number().int().min(0).max(15).optional();
const positiveIntVar = z.coerce.number().int().positive().optional();
const nonNegativeVar = z.coerce.number().nonnegative().optional();

const envSchema = z.object({
  ELEVATIONS_MIN_RESOLUTION: resolutionVar,
  ELEVATIONS_MAX_RESOLUTION: resolutionVar,
  ELEVATIONS_CELL_LIMIT: positiveIntVar,
  ELEVATIONS_POLYGON_CELL_LIMIT_MULTIPLIER: positiveIntVar,
  ELEVATIONS_POPULATION_TTL_SECONDS: z.coerce.number().positive().optional(),
  ELEVATIONS_CACHE_MAX_ENTRIES: positiveIntVar,
  ELEVATIONS_POPULATION_ENDPOINT: z.string().url().optional(),
  ELEVATIONS_POPULATION_TIMEOUT_MS: positiveIntVar,
  ELEVATIONS_DATABASE_PATH: z.string().min(1).optional(),
  ELEVATIONS_STORE_TIMEOUT_MS: positiveIntVar,
  ELEVATIONS_ESTIMATED_WAIT_SECONDS: nonNegativeVar,
  ELEVATIONS_WAIT_SECONDS_PER_PENDING_CELL: nonNegativeVar,
  ELEVATIONS_SCHEMA_URI: z.string().url().optional(),
  ELEVATIONS_SCHEMA_INFO: z.string().url().optional(),
  ELEVATIONS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  ELEVATIONS_HOST: z.string().min(1).optional(),
  ELEVATIONS_CORS_ORIGINS: z
    .string()
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0))
    .optional(),
  ELEVATIONS_MAX_BODY_BYTES: positiveIntVar,
});

/**
 * Build configuration from environment variables
 *
 * Empty strings count as unset.
 *
 * @throws {Error} If a variable is present but invalid
 */
export function loadConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env
): ElevationsConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ELEVATIONS_') && value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;

  // Spreading `{ key: undefined }` over a default would erase it, so only set keys that are present
  return createConfig({
    limits: {
      ...(vars.ELEVATIONS_MIN_RESOLUTION !== undefined ? { minResolution: vars.ELEVATIONS_MIN_RESOLUTION } : {}),
      ...(vars.ELEVATIONS_MAX_RESOLUTION !== undefined ? { maxResolution: vars.ELEVATIONS_MAX_RESOLUTION } : {}),
      ...(vars.ELEVATIONS_CELL_LIMIT !== undefined ? { cellLimit: vars.ELEVATIONS_CELL_LIMIT } : {}),
      ...(vars.ELEVATIONS_POLYGON_CELL_LIMIT_MULTIPLIER !== undefined ? {
        polygonCellLimitMultiplier: vars.ELEVATIONS_POLYGON_CELL_LIMIT_MULTIPLIER,
      } : {}),
    },
    population: {
      ...(vars.ELEVATIONS_POPULATION_TTL_SECONDS !== undefined ? { ttlSeconds: vars.ELEVATIONS_POPULATION_TTL_SECONDS } : {}),
      ...(vars.ELEVATIONS_CACHE_MAX_ENTRIES !== undefined ? { maxEntries: vars.ELEVATIONS_CACHE_MAX_ENTRIES } : {}),
      ...(vars.ELEVATIONS_POPULATION_TIMEOUT_MS !== undefined ? { timeoutMs: vars.ELEVATIONS_POPULATION_TIMEOUT_MS } : {}),
      ...(vars.ELEVATIONS_POPULATION_ENDPOINT !== undefined ? { endpoint: vars.ELEVATIONS_POPULATION_ENDPOINT } : {}),
    },
    store: {
      ...(vars.ELEVATIONS_DATABASE_PATH !== undefined ? { databasePath: vars.ELEVATIONS_DATABASE_PATH } : {}),
      ...(vars.ELEVATIONS_STORE_TIMEOUT_MS !== undefined ? { timeoutMs: vars.ELEVATIONS_STORE_TIMEOUT_MS } : {}),
    },
    response: {
      ...(vars.ELEVATIONS_ESTIMATED_WAIT_SECONDS !== undefined ? {
        estimatedWaitSeconds: vars.ELEVATIONS_ESTIMATED_WAIT_SECONDS,
      } : {}),
      ...(vars.ELEVATIONS_WAIT_SECONDS_PER_PENDING_CELL !== undefined ? {
        waitSecondsPerPendingCell: vars.ELEVATIONS_WAIT_SECONDS_PER_PENDING_CELL,
      } : {}),
      ...(vars.ELEVATIONS_SCHEMA_URI !== undefined ? { schemaUri: vars.ELEVATIONS_SCHEMA_URI } : {}),
      ...(vars.ELEVATIONS_SCHEMA_INFO !== undefined ? { schemaInfo: vars.ELEVATIONS_SCHEMA_INFO } : {}),
    },
    api: {
      ...(vars.ELEVATIONS_PORT !== undefined ? { port: vars.ELEVATIONS_PORT } : {}),
      ...(vars.ELEVATIONS_HOST !== undefined ? { host: vars.ELEVATIONS_HOST } : {}),
      ...(vars.ELEVATIONS_CORS_ORIGINS !== undefined ? { corsOrigins: vars.ELEVATIONS_CORS_ORIGINS } : {}),
      ...(vars.ELEVATIONS_MAX_BODY_BYTES !== undefined ? { maxBodyBytes: vars.ELEVATIONS_MAX_BODY_BYTES } : {}),
    },
  });
}
