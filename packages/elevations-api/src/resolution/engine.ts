/**
 * Resolution Engine
 *
 * Per request:
 * 1. Resolve the payload into a RequestedSet (limits enforced on the way)
 * 2. Look the whole set up in the elevation store
 * 3. unavailable = requested - found
 * 4. Drop cells whose population is already pending
 * 5. Mark the rest pending and fire the population trigger without awaiting it
 *
 * Caller errors come back as values and leave the cache untouched. A store
 * failure throws DependencyFailureError. A population failure is only logged:
 * the dedup entry is already written and a later request retries naturally
 * once it expires.
 */

import type {
  CellId,
  ElevationStoreGateway,
  PopulationRequester,
  Resolution,
} from '../core/types.js';
import { DependencyFailureError, ok, toError, type Result } from '../core/errors.js';
import { withTimeout } from '../core/utils/timeout.js';
import { createLogger } from '../core/utils/logger.js';
import type { InputResolver } from './input-resolver.js';
import type { PopulationDedupCache } from './population-cache.js';

const log = createLogger({ module: 'engine' });

export interface ResolutionEngineOptions {
  readonly resolver: InputResolver;
  readonly gateway: ElevationStoreGateway;
  readonly requester: PopulationRequester;
  readonly cache: PopulationDedupCache;
  readonly storeTimeoutMs: number;
  readonly populationTimeoutMs: number;
}

export class ResolutionEngine {
  private readonly resolver: InputResolver;
  private readonly gateway: ElevationStoreGateway;
  private readonly requester: PopulationRequester;
  private readonly cache: PopulationDedupCache;
  private readonly storeTimeoutMs: number;
  private readonly populationTimeoutMs: number;

  constructor(options: ResolutionEngineOptions) {
    this.resolver = options.resolver;
    this.gateway = options.gateway;
    this.requester = options.requester;
    this.cache = options.cache;
    this.storeTimeoutMs = options.storeTimeoutMs;
    this.populationTimeoutMs = options.populationTimeoutMs;
  }

  /**
   * @throws {DependencyFailureError} If the store lookup fails or times out
   */
  async resolve(payload: unknown): Promise<Result<Resolution>> {
    const requested = this.resolver.resolve(payload);
    if (!requested.ok) return requested;

    const { cells } = requested.value;
    const found = await this.lookup(cells);

    const available = new Map<CellId, number>();
    const unavailable = new Set<CellId>();
    for (const cell of cells) {
      const elevation = found.get(cell);
      if (elevation === undefined) {
        unavailable.add(cell);
      } else {
        available.set(cell, elevation);
      }
    }

    const pending = this.cache.membersStillPending(unavailable);
    const toPopulate = new Set([...unavailable].filter((cell) => !pending.has(cell)));

    if (toPopulate.size > 0) {
      this.cache.markPending(toPopulate);
      this.triggerPopulation(toPopulate);
    }

    log.debug('Resolved elevation request', {
      kind: requested.value.kind,
      requested: cells.size,
      available: available.size,
      unavailable: unavailable.size,
      alreadyPending: pending.size,
      populationRequested: toPopulate.size,
    });

    return ok({
      requested: requested.value,
      available,
      unavailable,
      populationRequested: toPopulate,
    });
  }

  get pendingCacheSize(): number {
    return this.cache.size;
  }

  get pendingCacheEvictions(): number {
    return this.cache.evictions;
  }

  private async lookup(cells: ReadonlySet<CellId>): Promise<ReadonlyMap<CellId, number>> {
    try {
      return await withTimeout(this.gateway.lookup(cells), this.storeTimeoutMs, 'Elevation store lookup');
    } catch (error) {
      throw new DependencyFailureError('elevation-store', toError(error));
    }
  }

  private triggerPopulation(cells: ReadonlySet<CellId>): void {
    let request: Promise<void>;
    try {
      request = this.requester.requestPopulation(cells);
    } catch (error) {
      request = Promise.reject(error);
    }

    withTimeout(request, this.populationTimeoutMs, 'Population request')
      .then(() => {
        log.info('Population requested', { cells: cells.size });
      })
      .catch((error: unknown) => {
        const failure = new DependencyFailureError('population-requester', toError(error));
        log.warn('Population request failed', {
          cells: [...cells].map((cell) => cell.toString()),
          error: failure.message,
        });
      });
  }
}
