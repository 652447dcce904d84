/**
 * @module geometry/bounds
 *
 * Bounding boxes and kind checks for GeoJSON geometries.
 */

import { GeometryTypeError } from '../errors.js';
import type { Bounds, Geometry, Position } from '../types.js';

/** GeoJSON geometry kinds accepted by the tile-selection functions. */
export const SUPPORTED_GEOMETRY_TYPES: readonly string[] = [
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
];

/**
 * Reject values that are not a supported GeoJSON geometry.
 *
 * Geometries usually arrive from parsed JSON, so the static type alone does
 * not guarantee the `type` member; collections are checked recursively.
 *
 * @throws {@link GeometryTypeError}
 */
export function assertSupportedGeometry(geometry: Geometry): void {
  const kind = geometryKind(geometry);
  if (!SUPPORTED_GEOMETRY_TYPES.includes(kind)) {
    throw new GeometryTypeError(
      `unsupported geometry type '${kind}', use one of ${SUPPORTED_GEOMETRY_TYPES.join(', ')}`,
    );
  }
  if (geometry.type === 'GeometryCollection') {
    geometry.geometries.forEach(assertSupportedGeometry);
  }
}

/**
 * Compute the bounding box of a geometry.
 *
 * @returns `null` for geometries without any position.
 */
export function geometryBounds(geometry: Geometry): Bounds | null {
  let left = Infinity, bottom = Infinity, right = -Infinity, top = -Infinity;
  let empty = true;
  for (const [x, y] of positions(geometry)) {
    empty = false;
    if (x < left) left = x;
    if (x > right) right = x;
    if (y < bottom) bottom = y;
    if (y > top) top = y;
  }
  return empty ? null : { left, bottom, right, top };
}

/** Whether `inner` lies inside `outer`, edges included. */
export function boundsWithin(inner: Bounds, outer: Bounds): boolean {
  return (
    inner.left >= outer.left &&
    inner.right <= outer.right &&
    inner.bottom >= outer.bottom &&
    inner.top <= outer.top
  );
}

/**
 * Iterate over every position of a geometry, collections included.
 */
export function* positions(geometry: Geometry): Generator<Position> {
  switch (geometry.type) {
    case 'Point':
      // an empty point has no coordinates
      if (geometry.coordinates.length >= 2) yield geometry.coordinates;
      break;
    case 'MultiPoint':
    case 'LineString':
      yield* geometry.coordinates;
      break;
    case 'MultiLineString':
    case 'Polygon':
      for (const line of geometry.coordinates) yield* line;
      break;
    case 'MultiPolygon':
      for (const polygon of geometry.coordinates) {
        for (const ring of polygon) yield* ring;
      }
      break;
    case 'GeometryCollection':
      for (const member of geometry.geometries) yield* positions(member);
      break;
  }
}

function geometryKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return typeof value;
}
