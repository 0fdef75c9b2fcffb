/**
 * CLI command implementations
 *
 * Kept apart from the commander wiring in bin/ so they can be called and
 * tested without parsing argv.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createConfig, loadConfigFromEnv, type ElevationsConfig } from '../core/config.js';
import type { CellId } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import { validate } from '../cells/cell-codec.js';
import { SqliteElevationStore } from '../adapters/sqlite-elevation-store.js';
import { createElevationsAPI, type ElevationsAPI } from '../serving/api.js';

export interface ServeOptions {
  readonly port?: number;
  readonly host?: string;
  readonly db?: string;
  readonly populatorUrl?: string;
}

/**
 * Environment first, then command-line flags on top
 */
export function resolveServeConfig(
  options: ServeOptions,
  env: Readonly<Record<string, string | undefined>> = process.env
): ElevationsConfig {
  const base = loadConfigFromEnv(env);

  return createConfig({
    ...base,
    api: {
      ...base.api,
      ...(options.port !== undefined ? { port: options.port } : {}),
      ...(options.host !== undefined ? { host: options.host } : {}),
    },
    store: {
      ...base.store,
      ...(options.db !== undefined ? { databasePath: options.db } : {}),
    },
    population: {
      ...base.population,
      ...(options.populatorUrl !== undefined ? { endpoint: options.populatorUrl } : {}),
    },
  });
}

export async function serveCommand(options: ServeOptions): Promise<ElevationsAPI> {
  const config = resolveServeConfig(options);
  const api = createElevationsAPI(config);
  await api.start();
  return api;
}

// ============================================================================
// init-db
// ============================================================================

export interface InitDbOptions {
  readonly db: string;
  /** JSON object mapping decimal cell ids to elevations in metres */
  readonly seed?: string;
}

export interface InitDbResult {
  readonly databasePath: string;
  readonly seeded: number;
}

const seedSchema = z.record(
  z.string().regex(/^\d+$/, 'Seed keys must be decimal cell ids'),
  z.number().finite('Elevations must be finite numbers')
);

/**
 * Parse a seed document into cell elevations
 *
 * @throws {Error} If the document is not valid JSON, has the wrong shape, or names an invalid cell
 */
export function parseSeed(text: string): Map<CellId, number> {
  // Ids are object keys here, so plain JSON keeps them exact
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid seed file: ${error instanceof Error ? error.message : String(error)}`);
  }

  const validation = seedSchema.safeParse(document);
  if (!validation.success) {
    const problems = validation.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid seed file: ${problems}`);
  }

  const elevations = new Map<CellId, number>();
  for (const [key, elevation] of Object.entries(validation.data)) {
    const cell = BigInt(key);
    if (!validate(cell)) {
      throw new Error(`Invalid seed file: ${key} is not a valid H3 cell`);
    }
    elevations.set(cell, elevation);
  }

  return elevations;
}

/**
 * Create the elevations table and optionally load seed data into it
 */
export async function initDbCommand(options: InitDbOptions): Promise<InitDbResult> {
  const store = new SqliteElevationStore(options.db, { ensureSchema: true });

  try {
    let seeded = 0;
    if (options.seed !== undefined) {
      const elevations = parseSeed(await readFile(options.seed, 'utf-8'));
      seeded = store.upsertElevations(elevations);
    }

    logger.info('Elevation store initialized', { path: options.db, seeded });
    return { databasePath: options.db, seeded };
  } finally {
    store.close();
  }
}
