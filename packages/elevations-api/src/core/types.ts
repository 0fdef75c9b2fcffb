/**
 * Elevations Service - Core Type Definitions
 *
 * Cell identifiers travel as bigint everywhere inside the service. The wire
 * format is a 64-bit unsigned integer, which a JS number cannot hold exactly.
 */

/**
 * Unsigned 64-bit H3 cell index
 */
export type CellId = bigint;

/**
 * WGS84 point as supplied by the caller
 */
export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

/**
 * Closed boundary; the last vertex connects back to the first
 */
export type Polygon = readonly Coordinate[];

// ============================================================================
// Request Shapes
// ============================================================================

export interface CellListShape {
  readonly kind: 'cells';
  readonly cells: readonly CellId[];
}

export interface CoordinateListShape {
  readonly kind: 'coordinates';
  readonly coordinates: readonly Coordinate[];
  readonly resolution: number;
}

export interface PolygonShape {
  readonly kind: 'polygon';
  readonly polygon: Polygon;
  readonly resolution: number;
}

/**
 * The three mutually exclusive ways a caller can address cells
 */
export type RequestShape = CellListShape | CoordinateListShape | PolygonShape;

export type RequestShapeKind = RequestShape['kind'];

/**
 * Canonical cell set derived from one request.
 *
 * `origins` is only present for coordinate requests and maps each cell back
 * to the coordinate the caller sent for it.
 */
export interface RequestedSet {
  readonly kind: RequestShapeKind;
  readonly cells: ReadonlySet<CellId>;
  readonly origins?: ReadonlyMap<CellId, Coordinate>;
}

/**
 * Outcome of one resolution pass
 */
export interface Resolution {
  readonly requested: RequestedSet;
  readonly available: ReadonlyMap<CellId, number>;
  readonly unavailable: ReadonlySet<CellId>;
  /** Cells handed to the population requester by this pass */
  readonly populationRequested: ReadonlySet<CellId>;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Batch point lookup against the elevation store.
 *
 * Returns only the cells it can resolve. A missing cell means "not yet known",
 * never an error.
 */
export interface ElevationStoreGateway {
  lookup(ids: ReadonlySet<CellId>): Promise<ReadonlyMap<CellId, number>>;
}

/**
 * Best-effort trigger for the out-of-band backfill job
 */
export interface PopulationRequester {
  requestPopulation(ids: ReadonlySet<CellId>): Promise<void>;
}

// ============================================================================
// Response Envelope
// ============================================================================

/**
 * Pending entry: a decimal cell id, or the caller's [lat, lng] pair
 */
export type PendingKey = string | readonly [number, number];

export interface ElevationsEnvelope {
  readonly elevations: Readonly<Record<string, number>>;
  readonly pending?: readonly PendingKey[];
  readonly estimated_wait_time?: number;
}
