/**
 * Response Assembler
 *
 * Keys the result by whatever the caller used to address cells. Coordinate
 * requests get their own coordinates back verbatim: converting a cell back to
 * a point only yields its center.
 */

import type {
  CellId,
  Coordinate,
  ElevationsEnvelope,
  PendingKey,
  Resolution,
} from '../core/types.js';

export interface AssemblerOptions {
  readonly estimatedWaitSeconds: number;
  readonly waitSecondsPerPendingCell: number;
}

/**
 * Elevations map key for a coordinate, e.g. "[54.53097, 5.96836]".
 *
 * Numbers are written in their shortest round-trip form, so the key carries
 * the caller's values but not their spelling: `[54.0, 1e-07]` comes back as
 * `"[54, 1e-7]"`.
 */
export function coordinateKey(coordinate: Coordinate): string {
  return `[${coordinate.lat}, ${coordinate.lng}]`;
}

export function estimateWaitSeconds(pendingCount: number, options: AssemblerOptions): number {
  return options.estimatedWaitSeconds + Math.round(options.waitSecondsPerPendingCell * pendingCount);
}

export function assembleResponse(resolution: Resolution, options: AssemblerOptions): ElevationsEnvelope {
  const { origins } = resolution.requested;

  const elevations: Record<string, number> = {};
  for (const [cell, elevation] of resolution.available) {
    elevations[keyFor(cell, origins)] = elevation;
  }

  if (resolution.unavailable.size === 0) {
    return { elevations };
  }

  const pending: PendingKey[] = [...resolution.unavailable].map((cell) => pendingKeyFor(cell, origins));

  return {
    elevations,
    pending,
    estimated_wait_time: estimateWaitSeconds(resolution.unavailable.size, options),
  };
}

function keyFor(cell: CellId, origins: ReadonlyMap<CellId, Coordinate> | undefined): string {
  const origin = origins?.get(cell);
  return origin ? coordinateKey(origin) : cell.toString();
}

function pendingKeyFor(cell: CellId, origins: ReadonlyMap<CellId, Coordinate> | undefined): PendingKey {
  const origin = origins?.get(cell);
  return origin ? [origin.lat, origin.lng] : cell.toString();
}
