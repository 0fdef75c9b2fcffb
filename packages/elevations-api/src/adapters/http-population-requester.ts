/**
 * HTTP Population Requester
 *
 * Asks the populator service to backfill cells by POSTing them as
 * `{"cells": [<uint64>, ...]}`, the same shape callers send to this API.
 * Ids are written as bare 64-bit integers via lossless-json.
 *
 * No retries here: the dedup cache entry lapses after its TTL and the next
 * request for the cell triggers population again.
 */

import { stringify } from 'lossless-json';
import type { CellId, PopulationRequester } from '../core/types.js';
import { OperationTimeoutError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'population-requester' });

/**
 * Populator answered with a non-2xx status
 */
export class PopulationRequestError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(statusCode: number, url: string) {
    super(`Populator responded with HTTP ${statusCode}: ${url}`);
    this.name = 'PopulationRequestError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

export interface HttpPopulationRequesterConfig {
  readonly endpoint: string;
  readonly timeoutMs: number;
  readonly headers?: Readonly<Record<string, string>>;
}

export class HttpPopulationRequester implements PopulationRequester {
  private readonly config: HttpPopulationRequesterConfig;

  constructor(config: HttpPopulationRequesterConfig) {
    this.config = config;
  }

  /**
   * @throws {PopulationRequestError} For non-2xx responses
   * @throws {OperationTimeoutError} If the populator does not answer in time
   */
  async requestPopulation(ids: ReadonlySet<CellId>): Promise<void> {
    const { endpoint, timeoutMs } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.config.headers,
        },
        body: stringify({ cells: [...ids] }),
        signal: controller.signal,
      });

      // Nothing in the reply is used; release the connection
      await response.body?.cancel();

      if (!response.ok) {
        throw new PopulationRequestError(response.status, endpoint);
      }

      log.debug('Populator accepted request', { cells: ids.size, status: response.status });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new OperationTimeoutError(`POST ${endpoint}`, timeoutMs);
      }
      throw toError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Stand-in used when no populator endpoint is configured
 */
export class LoggingPopulationRequester implements PopulationRequester {
  async requestPopulation(ids: ReadonlySet<CellId>): Promise<void> {
    log.warn('No populator endpoint configured; population request dropped', {
      cells: [...ids].map((cell) => cell.toString()),
    });
  }
}
