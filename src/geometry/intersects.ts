/**
 * @module geometry/intersects
 *
 * Geometry / rectangle predicates used to filter candidate tiles.
 *
 * Two relations are supported:
 *
 * - **intersects**: the geometry and the closed rectangle share at least one
 *   point. A geometry touching a tile only along its edge or at a corner
 *   intersects it.
 * - **overlaps**: the geometry reaches the open interior of the rectangle.
 *   Edge and corner touches do not count.
 *
 * Segments are clipped with the Liang-Barsky parametrization. A clipped
 * segment lies in the closed rectangle; since the rectangle is convex, it
 * reaches the interior exactly when its midpoint does. A polygon whose
 * boundary never enters the rectangle either covers the whole rectangle or
 * none of it, which the rectangle's center decides.
 */

import type { Bounds, Geometry, Position } from '../types.js';

type Relation = 'intersects' | 'overlaps';

/** Whether the geometry shares any point with the closed rectangle. */
export function intersectsBounds(geometry: Geometry, bounds: Bounds): boolean {
  return relate(geometry, bounds, 'intersects');
}

/** Whether the geometry reaches the open interior of the rectangle. */
export function overlapsBounds(geometry: Geometry, bounds: Bounds): boolean {
  return relate(geometry, bounds, 'overlaps');
}

// ─── Internals ──────────────────────────────────────────────────────────────

function relate(geometry: Geometry, bounds: Bounds, relation: Relation): boolean {
  switch (geometry.type) {
    case 'Point':
      return geometry.coordinates.length >= 2 &&
        pointRelates(geometry.coordinates, bounds, relation);
    case 'MultiPoint':
      return geometry.coordinates.some((p) => pointRelates(p, bounds, relation));
    case 'LineString':
      return lineRelates(geometry.coordinates, bounds, relation);
    case 'MultiLineString':
      return geometry.coordinates.some((line) => lineRelates(line, bounds, relation));
    case 'Polygon':
      return polygonRelates(geometry.coordinates, bounds, relation);
    case 'MultiPolygon':
      return geometry.coordinates.some((polygon) => polygonRelates(polygon, bounds, relation));
    case 'GeometryCollection':
      return geometry.geometries.some((member) => relate(member, bounds, relation));
  }
}

function pointRelates([x, y]: Position, b: Bounds, relation: Relation): boolean {
  return relation === 'intersects'
    ? x >= b.left && x <= b.right && y >= b.bottom && y <= b.top
    : x > b.left && x < b.right && y > b.bottom && y < b.top;
}

function lineRelates(line: Position[], b: Bounds, relation: Relation): boolean {
  if (line.length === 1) return pointRelates(line[0], b, relation);
  for (let i = 0; i < line.length - 1; i++) {
    if (segmentRelates(line[i], line[i + 1], b, relation)) return true;
  }
  return false;
}

function polygonRelates(rings: Position[][], b: Bounds, relation: Relation): boolean {
  if (rings.length === 0 || rings[0].length === 0) return false;
  if (rings.some((ring) => lineRelates(ring, b, relation))) return true;
  return containsPoint(rings, (b.left + b.right) / 2, (b.bottom + b.top) / 2);
}

function segmentRelates(
  [ax, ay]: Position,
  [bx, by]: Position,
  b: Bounds,
  relation: Relation,
): boolean {
  const dx = bx - ax;
  const dy = by - ay;
  let t0 = 0;
  let t1 = 1;
  const edges: Array<[p: number, q: number]> = [
    [-dx, ax - b.left],
    [dx, b.right - ax],
    [-dy, ay - b.bottom],
    [dy, b.top - ay],
  ];
  for (const [p, q] of edges) {
    if (p === 0) {
      // parallel to this edge and outside of it
      if (q < 0) return false;
      continue;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) return false;
      if (r > t0) t0 = r;
    } else {
      if (r < t0) return false;
      if (r < t1) t1 = r;
    }
  }
  if (relation === 'intersects') return true;
  const tm = (t0 + t1) / 2;
  return pointRelates([ax + dx * tm, ay + dy * tm], b, 'overlaps');
}

/**
 * Even-odd point-in-polygon test across all rings, so holes exclude.
 */
function containsPoint(rings: Position[][], x: number, y: number): boolean {
  let inside = false;
  for (const ring of rings) {
    for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
      const [xi, yi] = ring[i];
      const [xj, yj] = ring[j];
      if ((yi > y) !== (yj > y) && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
        inside = !inside;
      }
    }
  }
  return inside;
}
