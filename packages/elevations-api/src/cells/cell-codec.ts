/**
 * Cell Codec
 *
 * Bridges the 64-bit integer cell ids used on the wire and in the store with
 * the hex string indexes h3-js works in.
 *
 * @module cells/cell-codec
 */

import { area } from '@turf/area';
import { getHexagonAreaAvg, getResolution, isValidCell, latLngToCell, polygonToCells, UNITS } from 'h3-js';
import type { CellId, Polygon } from '../core/types.js';
import { UINT64_LIMIT } from '../core/constants.js';

export function toHex(id: CellId): string {
  return id.toString(16);
}

export function fromHex(index: string): CellId {
  return BigInt(`0x${index}`);
}

/**
 * Structural check only; says nothing about whether the store knows the cell
 */
export function validate(id: CellId): boolean {
  if (id < 0n || id >= UINT64_LIMIT) return false;
  return isValidCell(toHex(id));
}

/**
 * Resolution encoded in a valid cell id
 */
export function resolutionOf(id: CellId): number {
  return getResolution(toHex(id));
}

/**
 * Cell containing a point at the given resolution
 */
export function fromCoordinate(lat: number, lng: number, resolution: number): CellId {
  return fromHex(latLngToCell(lat, lng, resolution));
}

/**
 * Cells whose centers fall inside the polygon.
 *
 * Small polygons at coarse resolutions legitimately cover nothing; the
 * result is then an empty set, not an error.
 */
export function cellsCoveringPolygon(polygon: Polygon, resolution: number): Set<CellId> {
  const loop = polygon.map((vertex) => [vertex.lat, vertex.lng]);
  return new Set(polygonToCells(loop, resolution).map(fromHex));
}

/**
 * Approximate cell count for a polygon from its spherical area and the
 * average cell area at the resolution. Cheap enough to run before a polyfill
 * that may not fit in memory.
 */
export function estimatePolygonCellCount(polygon: Polygon, resolution: number): number {
  const ring = polygon.map((vertex) => [vertex.lng, vertex.lat]);
  const first = polygon[0];
  const last = polygon[polygon.length - 1];
  if (first !== undefined && last !== undefined && (first.lat !== last.lat || first.lng !== last.lng)) {
    ring.push([first.lng, first.lat]);
  }

  const squareMetres = area({ type: 'Polygon', coordinates: [ring] });
  return Math.ceil(squareMetres / getHexagonAreaAvg(resolution, UNITS.m2));
}
