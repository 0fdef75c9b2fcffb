/**
 * SQLite Elevation Store
 *
 * ElevationStoreGateway backed by better-sqlite3. The populator writes into
 * the `elevations` table; this service only reads, apart from the schema
 * bootstrap and the upsert used for seeding.
 *
 * H3 indexes keep their top bit clear, so every valid cell fits SQLite's
 * signed 64-bit INTEGER. Reads run with safeIntegers so ids come back as
 * bigint without losing precision.
 */

import Database from 'better-sqlite3';
import type { CellId, ElevationStoreGateway } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'sqlite-store' });

/** Stays well under SQLITE_MAX_VARIABLE_NUMBER */
const LOOKUP_BATCH_SIZE = 500;

interface ElevationRow {
  readonly cell_index: bigint;
  readonly elevation: number;
}

export interface SqliteElevationStoreOptions {
  readonly readonly?: boolean;
  /** Create the table when missing (default: true unless readonly) */
  readonly ensureSchema?: boolean;
}

export class SqliteElevationStore implements ElevationStoreGateway {
  private readonly db: Database.Database;
  private readonly lookupStatements = new Map<number, Database.Statement<bigint[], ElevationRow>>();

  constructor(path: string, options: SqliteElevationStoreOptions = {}) {
    const readonly = options.readonly ?? false;
    this.db = new Database(path, { readonly, fileMustExist: readonly });

    if (!readonly) {
      this.db.pragma('journal_mode = WAL');
    }

    if (options.ensureSchema ?? !readonly) {
      this.ensureSchema();
    }

    log.info('Elevation store opened', { path, readonly });
  }

  ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS elevations (
        cell_index INTEGER PRIMARY KEY,
        elevation REAL NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      )
    `);
  }

  async lookup(ids: ReadonlySet<CellId>): Promise<ReadonlyMap<CellId, number>> {
    const found = new Map<CellId, number>();
    const all = [...ids];

    for (let start = 0; start < all.length; start += LOOKUP_BATCH_SIZE) {
      const batch = all.slice(start, start + LOOKUP_BATCH_SIZE);
      for (const row of this.statementFor(batch.length).all(...batch)) {
        found.set(row.cell_index, row.elevation);
      }
    }

    return found;
  }

  /**
   * Insert or overwrite elevations in one transaction
   */
  upsertElevations(elevations: ReadonlyMap<CellId, number>): number {
    const upsert = this.db.prepare<[bigint, number]>(`
      INSERT INTO elevations (cell_index, elevation) VALUES (?, ?)
      ON CONFLICT(cell_index) DO UPDATE SET
        elevation = excluded.elevation,
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `);

    const writeAll = this.db.transaction((entries: ReadonlyMap<CellId, number>) => {
      for (const [cell, elevation] of entries) {
        upsert.run(cell, elevation);
      }
    });

    writeAll(elevations);
    return elevations.size;
  }

  close(): void {
    this.db.close();
  }

  private statementFor(size: number): Database.Statement<bigint[], ElevationRow> {
    const cached = this.lookupStatements.get(size);
    if (cached) return cached;

    const placeholders = new Array<string>(size).fill('?').join(', ');
    const statement = this.db
      .prepare<bigint[], ElevationRow>(
        `SELECT cell_index, elevation FROM elevations WHERE cell_index IN (${placeholders})`
      )
      .safeIntegers(true);

    this.lookupStatements.set(size, statement);
    return statement;
  }
}
