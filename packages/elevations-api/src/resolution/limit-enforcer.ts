/**
 * Limit Enforcer
 *
 * Resolution and cardinality bounds. Both checks run before the store is
 * touched and fail the whole request.
 */

import type { LimitsConfig } from '../core/config.js';
import type { RequestShapeKind } from '../core/types.js';
import { fail, ok, requestError, type Result } from '../core/errors.js';

export class LimitEnforcer {
  private readonly limits: LimitsConfig;

  constructor(limits: LimitsConfig) {
    this.limits = limits;
  }

  get minResolution(): number {
    return this.limits.minResolution;
  }

  get maxResolution(): number {
    return this.limits.maxResolution;
  }

  /**
   * Maximum cells a request of the given shape may expand to
   */
  cellLimitFor(kind: RequestShapeKind): number {
    return kind === 'polygon'
      ? this.limits.cellLimit * this.limits.polygonCellLimitMultiplier
      : this.limits.cellLimit;
  }

  checkResolution(resolution: number): Result<number> {
    const { minResolution, maxResolution } = this.limits;

    if (!Number.isInteger(resolution) || resolution < minResolution || resolution > maxResolution) {
      return fail(
        requestError(
          'ResolutionOutOfRange',
          `Request for resolution ${resolution} rejected - the resolution must be between ` +
            `${minResolution} and ${maxResolution} inclusively.`,
          { resolution, minResolution, maxResolution }
        )
      );
    }

    return ok(resolution);
  }

  checkCardinality(count: number, kind: RequestShapeKind): Result<number> {
    if (count > this.cellLimitFor(kind)) {
      return this.rejectCardinality(count, kind);
    }

    return ok(count);
  }

  /**
   * CellLimitExceeded for a count known (or estimated) to be over the limit
   */
  rejectCardinality(count: number, kind: RequestShapeKind): Result<never> {
    const limit = this.cellLimitFor(kind);

    return fail(
      requestError(
        'CellLimitExceeded',
        `Request for ${count} cells rejected - only ${limit} cells can be sent per request.`,
        { count, limit }
      )
    );
  }
}
