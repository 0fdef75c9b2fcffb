/**
 * Input Resolver
 *
 * Turns a request payload into a RequestedSet. The payload carries exactly one
 * of `cells`, `coordinates` or `polygon`; each becomes a variant of
 * RequestShape and is expanded to cell ids.
 *
 * Check order is fail-fast and per shape:
 * - cells: cardinality, well-formedness, per-cell resolution
 * - coordinates: resolution, conversion, cardinality
 * - polygon: resolution, estimated cardinality, polyfill, empty coverage, cardinality
 */

import { z } from 'zod';
import type {
  CellId,
  Coordinate,
  CellListShape,
  CoordinateListShape,
  PolygonShape,
  RequestedSet,
  RequestShape,
} from '../core/types.js';
import { fail, ok, requestError, type Result } from '../core/errors.js';
import {
  cellsCoveringPolygon,
  estimatePolygonCellCount,
  fromCoordinate,
  resolutionOf,
  validate,
} from '../cells/cell-codec.js';
import { createLogger } from '../core/utils/logger.js';
import type { LimitEnforcer } from './limit-enforcer.js';

const log = createLogger({ module: 'input-resolver' });

// ============================================================================
// Payload Schemas (Zod)
// ============================================================================

const latitudeSchema = z
  .number({ invalid_type_error: 'Latitude must be a number' })
  .finite()
  .min(-90, 'Latitude must be >= -90')
  .max(90, 'Latitude must be <= 90');

const longitudeSchema = z
  .number({ invalid_type_error: 'Longitude must be a number' })
  .finite()
  .min(-180, 'Longitude must be >= -180')
  .max(180, 'Longitude must be <= 180');

const coordinateSchema = z
  .tuple([latitudeSchema, longitudeSchema])
  .transform(([lat, lng]): Coordinate => ({ lat, lng }));

// 64-bit ids arrive as bigint from the lossless body parser
const cellIdSchema = z.union([
  z.bigint(),
  z.number().int('Cell ids must be integers').transform((value) => BigInt(value)),
  z.string().regex(/^\d+$/, 'Cell ids must be decimal integers').transform((value) => BigInt(value)),
]);

const payloadSchema = z.object({
  cells: z.array(cellIdSchema).optional(),
  coordinates: z.array(coordinateSchema).optional(),
  polygon: z.array(coordinateSchema).optional(),
  resolution: z.number().int('Resolution must be an integer').optional(),
});

const SHAPE_KEYS = ['cells', 'coordinates', 'polygon'] as const;

const MIN_POLYGON_VERTICES = 3;

// Area estimates drift from the exact polyfill count; only far-over polygons are rejected unfilled
const POLYGON_ESTIMATE_SLACK = 2;

// ============================================================================
// Resolver
// ============================================================================

export class InputResolver {
  private readonly enforcer: LimitEnforcer;

  constructor(enforcer: LimitEnforcer) {
    this.enforcer = enforcer;
  }

  /**
   * Parse and expand a payload in one step
   */
  resolve(payload: unknown): Result<RequestedSet> {
    const shape = this.parse(payload);
    if (!shape.ok) return shape;
    return this.toRequestedSet(shape.value);
  }

  /**
   * Validate the payload structure and pick its shape
   */
  parse(payload: unknown): Result<RequestShape> {
    if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
      return fail(requestError('MalformedRequest', 'Request body must be a JSON object.'));
    }

    const validation = payloadSchema.safeParse(payload);
    if (!validation.success) {
      const [first] = validation.error.issues;
      const location = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
      return fail(
        requestError(
          'MalformedRequest',
          `Invalid request payload - ${location}${first?.message ?? 'unknown problem'}`,
          validation.error.flatten()
        )
      );
    }

    const data = validation.data;
    const present = SHAPE_KEYS.filter((key) => data[key] !== undefined);

    if (present.length !== 1) {
      return fail(
        requestError(
          'MalformedRequest',
          "Request must contain exactly one of 'cells', 'coordinates' or 'polygon'.",
          { present }
        )
      );
    }

    const resolution = data.resolution ?? this.enforcer.maxResolution;

    if (data.cells !== undefined) {
      if (data.cells.length === 0) {
        return fail(requestError('MalformedRequest', "'cells' must contain at least one cell id."));
      }
      return ok<RequestShape>({ kind: 'cells', cells: data.cells });
    }

    if (data.coordinates !== undefined) {
      if (data.coordinates.length === 0) {
        return fail(requestError('MalformedRequest', "'coordinates' must contain at least one coordinate."));
      }
      return ok<RequestShape>({ kind: 'coordinates', coordinates: data.coordinates, resolution });
    }

    if (data.polygon !== undefined && data.polygon.length >= MIN_POLYGON_VERTICES) {
      return ok<RequestShape>({ kind: 'polygon', polygon: data.polygon, resolution });
    }

    return fail(
      requestError('MalformedRequest', `'polygon' must contain at least ${MIN_POLYGON_VERTICES} vertices.`)
    );
  }

  /**
   * Expand a shape into its cell set, enforcing limits along the way
   */
  toRequestedSet(shape: RequestShape): Result<RequestedSet> {
    switch (shape.kind) {
      case 'cells':
        return this.fromCells(shape);
      case 'coordinates':
        return this.fromCoordinates(shape);
      case 'polygon':
        return this.fromPolygon(shape);
      default: {
        const unreachable: never = shape;
        return unreachable;
      }
    }
  }

  private fromCells(shape: CellListShape): Result<RequestedSet> {
    const cells = new Set(shape.cells);

    const cardinality = this.enforcer.checkCardinality(cells.size, shape.kind);
    if (!cardinality.ok) return cardinality;

    for (const id of cells) {
      if (!validate(id)) {
        return fail(
          requestError('InvalidCellIdentifier', `${id} is not a valid H3 cell - aborting request.`, {
            cell: id.toString(),
          })
        );
      }
    }

    for (const id of cells) {
      const resolution = this.enforcer.checkResolution(resolutionOf(id));
      if (!resolution.ok) return resolution;
    }

    return ok<RequestedSet>({ kind: shape.kind, cells });
  }

  private fromCoordinates(shape: CoordinateListShape): Result<RequestedSet> {
    const resolution = this.enforcer.checkResolution(shape.resolution);
    if (!resolution.ok) return resolution;

    // Several coordinates can land in one cell; the last one seen is echoed back
    const origins = new Map<CellId, Coordinate>();
    for (const coordinate of shape.coordinates) {
      origins.set(fromCoordinate(coordinate.lat, coordinate.lng, shape.resolution), coordinate);
    }

    const cardinality = this.enforcer.checkCardinality(origins.size, shape.kind);
    if (!cardinality.ok) return cardinality;

    return ok<RequestedSet>({ kind: shape.kind, cells: new Set(origins.keys()), origins });
  }

  private fromPolygon(shape: PolygonShape): Result<RequestedSet> {
    const resolution = this.enforcer.checkResolution(shape.resolution);
    if (!resolution.ok) return resolution;

    const limit = this.enforcer.cellLimitFor(shape.kind);
    const estimate = estimatePolygonCellCount(shape.polygon, shape.resolution);
    if (estimate > limit * POLYGON_ESTIMATE_SLACK) {
      return this.enforcer.rejectCardinality(estimate, shape.kind);
    }

    let cells: Set<CellId>;
    try {
      cells = cellsCoveringPolygon(shape.polygon, shape.resolution);
    } catch (error) {
      // h3-js throws H3Error objects or bare strings when the fill is too large
      log.warn('Polygon fill failed', {
        resolution: shape.resolution,
        estimate,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.enforcer.rejectCardinality(Math.max(estimate, limit + 1), shape.kind);
    }

    if (cells.size === 0) {
      return fail(
        requestError('EmptyCoverage', 'Request for zero cells rejected.', {
          resolution: shape.resolution,
        })
      );
    }

    const cardinality = this.enforcer.checkCardinality(cells.size, shape.kind);
    if (!cardinality.ok) return cardinality;

    return ok<RequestedSet>({ kind: shape.kind, cells });
  }
}
