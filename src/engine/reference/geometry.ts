/**
 * Planar point-in-polygon tests for the turbine classification regions.
 *
 * Containment is strict: a point lying on any ring boundary is not contained.
 */

import type { LinearRing, PolygonRings, Position } from '../schema/ReferenceTablesV1';

const BOUNDARY_EPSILON = 1e-12;

function onSegment(x: number, y: number, a: Position, b: Position): boolean {
  const [ax, ay] = a;
  const [bx, by] = b;
  const cross = (bx - ax) * (y - ay) - (by - ay) * (x - ax);
  const scale = Math.max(1, Math.abs(bx - ax), Math.abs(by - ay));
  if (Math.abs(cross) > BOUNDARY_EPSILON * scale * scale) return false;
  return (
    x >= Math.min(ax, bx) - BOUNDARY_EPSILON &&
    x <= Math.max(ax, bx) + BOUNDARY_EPSILON &&
    y >= Math.min(ay, by) - BOUNDARY_EPSILON &&
    y <= Math.max(ay, by) + BOUNDARY_EPSILON
  );
}

export function isOnRingBoundary(x: number, y: number, ring: LinearRing): boolean {
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    if (onSegment(x, y, ring[j], ring[i])) return true;
  }
  return false;
}

/**
 * Even-odd ray casting.  Works with closed (first === last) or open rings;
 * boundary points give an unspecified answer, so callers check
 * isOnRingBoundary first.
 */
export function isInsideRing(x: number, y: number, ring: LinearRing): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    const crosses = (yi > y) !== (yj > y) && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) inside = !inside;
  }
  return inside;
}

/** True when (x, y) lies strictly inside the outer ring and outside every hole. */
export function polygonContains(polygon: PolygonRings, x: number, y: number): boolean {
  if (polygon.length === 0) return false;
  const [outer, ...holes] = polygon;
  if (polygon.some((ring) => isOnRingBoundary(x, y, ring))) return false;
  if (!isInsideRing(x, y, outer)) return false;
  return !holes.some((hole) => isInsideRing(x, y, hole));
}
