/**
 * @module geometry/clip
 *
 * Clipping of GeoJSON geometries to a rectangle, and the antimeridian split
 * used by global grids.
 *
 * **Geometry handling by kind:**
 * - **Points / MultiPoints**: containment test per position, edges included.
 * - **LineStrings / MultiLineStrings**: segments are clipped one by one
 *   (Liang-Barsky); a line leaving and re-entering the rectangle is split
 *   into several parts.
 * - **Polygons / MultiPolygons**: each ring is clipped against the four
 *   sides in turn (Sutherland-Hodgman) and stays a single closed ring; a
 *   polygon whose exterior ring is clipped away is dropped with its holes.
 *
 * Pieces are meant for output. To decide which tiles a geometry touches,
 * relate the tiles to {@link wrapAcrossGridEdges} instead: a concave ring
 * cut in several parts keeps zero-area runs along the clip edge.
 */

import type {
  Bounds,
  Geometry,
  LineString,
  MultiLineString,
  Position,
} from '../types.js';
import { boundsWithin, geometryBounds } from './bounds.js';

/**
 * Grid properties the antimeridian split needs.
 */
export interface ClipGrid {
  readonly bounds: Bounds;
  readonly isGlobal: boolean;
}

/**
 * Split a geometry into pieces lying inside the grid bounds.
 *
 * - Geometry already inside the grid: returned unchanged as the only piece.
 * - Global grid: the part inside the grid, plus the parts beyond its left
 *   and right edges shifted by one grid width so that they land inside.
 *   Parts beyond the top and bottom edges are dropped.
 * - Non-global grid: the part inside the grid.
 *
 * Empty pieces are omitted, so the result may be empty.
 *
 * @example
 * ```typescript
 * // box from -183.125 to -177.5 on the geodetic grid
 * splitAtGridBounds(box, grid);
 * // => [part from -180 to -177.5, part from 176.875 to 180]
 * ```
 */
export function splitAtGridBounds(geometry: Geometry, grid: ClipGrid): Geometry[] {
  const geomBounds = geometryBounds(geometry);
  if (geomBounds === null) return [];
  if (boundsWithin(geomBounds, grid.bounds)) return [geometry];

  const { left, bottom, right, top } = grid.bounds;
  const pieces: Geometry[] = [];
  const inside = clipGeometry(geometry, grid.bounds);
  if (inside) pieces.push(inside);

  if (grid.isGlobal) {
    const width = right - left;
    if (geomBounds.left < left) {
      const west = clipGeometry(geometry, { left: left - width, bottom, right: left, top });
      if (west) pieces.push(translateGeometry(west, width));
    }
    if (geomBounds.right > right) {
      const east = clipGeometry(geometry, { left: right, bottom, right: right + width, top });
      if (east) pieces.push(translateGeometry(east, -width));
    }
  }
  return pieces;
}

/**
 * The geometry plus, on global grids, copies shifted by one grid width
 * towards the grid from each edge the geometry extends past.
 *
 * Inside the grid the copies cover exactly what {@link splitAtGridBounds}
 * returns, so relating a tile to them is relating it to the split pieces.
 * No clip edges are introduced.
 */
export function wrapAcrossGridEdges(geometry: Geometry, grid: ClipGrid): Geometry[] {
  const geomBounds = geometryBounds(geometry);
  if (geomBounds === null) return [];
  if (!grid.isGlobal || boundsWithin(geomBounds, grid.bounds)) return [geometry];

  const { left, right } = grid.bounds;
  const copies = [geometry];
  if (geomBounds.left < left) copies.push(translateGeometry(geometry, right - left));
  if (geomBounds.right > right) copies.push(translateGeometry(geometry, left - right));
  return copies;
}

/**
 * Clip a geometry to an axis-aligned rectangle.
 *
 * Geometries entirely outside the rectangle return `null`; geometries
 * entirely inside are returned unchanged.
 */
export function clipGeometry(geometry: Geometry, clip: Bounds): Geometry | null {
  const geomBounds = geometryBounds(geometry);
  if (geomBounds === null) return null;
  // Trivial reject
  if (
    geomBounds.right < clip.left || geomBounds.left > clip.right ||
    geomBounds.top < clip.bottom || geomBounds.bottom > clip.top
  ) {
    return null;
  }
  // Trivial accept
  if (boundsWithin(geomBounds, clip)) return geometry;

  switch (geometry.type) {
    case 'Point':
      return geometry;
    case 'MultiPoint': {
      const coordinates = geometry.coordinates.filter(([x, y]) => contains(clip, x, y));
      return coordinates.length > 0 ? { type: 'MultiPoint', coordinates } : null;
    }
    case 'LineString':
      return toLineGeometry(clipLine(geometry.coordinates, clip));
    case 'MultiLineString':
      return toLineGeometry(geometry.coordinates.flatMap((line) => clipLine(line, clip)));
    case 'Polygon': {
      const rings = clipPolygon(geometry.coordinates, clip);
      return rings ? { type: 'Polygon', coordinates: rings } : null;
    }
    case 'MultiPolygon': {
      const coordinates: Position[][][] = [];
      for (const polygon of geometry.coordinates) {
        const rings = clipPolygon(polygon, clip);
        if (rings) coordinates.push(rings);
      }
      return coordinates.length > 0 ? { type: 'MultiPolygon', coordinates } : null;
    }
    case 'GeometryCollection': {
      const geometries: Geometry[] = [];
      for (const member of geometry.geometries) {
        const clipped = clipGeometry(member, clip);
        if (clipped) geometries.push(clipped);
      }
      return geometries.length > 0 ? { type: 'GeometryCollection', geometries } : null;
    }
  }
}

/**
 * Shift every position of a geometry horizontally by `dx`.
 */
export function translateGeometry(geometry: Geometry, dx: number): Geometry {
  const shift = ([x, y, ...rest]: Position): Position => [x + dx, y, ...rest];
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: shift(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(shift) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(shift) };
    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map((line) => line.map(shift)),
      };
    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map((ring) => ring.map(shift)),
      };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) =>
          polygon.map((ring) => ring.map(shift)),
        ),
      };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => translateGeometry(member, dx)),
      };
  }
}

// ─── Internals ──────────────────────────────────────────────────────────────

function contains(clip: Bounds, x: number, y: number): boolean {
  return x >= clip.left && x <= clip.right && y >= clip.bottom && y <= clip.top;
}

function toLineGeometry(lines: Position[][]): LineString | MultiLineString | null {
  if (lines.length === 0) return null;
  if (lines.length === 1) return { type: 'LineString', coordinates: lines[0] };
  return { type: 'MultiLineString', coordinates: lines };
}

function clipLine(line: Position[], clip: Bounds): Position[][] {
  const parts: Position[][] = [];
  let part: Position[] = [];
  for (let i = 1; i < line.length; i++) {
    const segment = clipSegment(line[i - 1], line[i], clip);
    if (segment === null) {
      if (part.length > 0) parts.push(part);
      part = [];
      continue;
    }
    const [start, end, entered, exited] = segment;
    if (entered && part.length > 0) {
      parts.push(part);
      part = [];
    }
    if (part.length === 0) part.push(start);
    part.push(end);
    if (exited) {
      parts.push(part);
      part = [];
    }
  }
  if (part.length > 0) parts.push(part);
  return parts;
}

/**
 * Clip the rings of one polygon.
 *
 * @returns `null` if the exterior ring is clipped away.
 */
function clipPolygon(rings: Position[][], clip: Bounds): Position[][] | null {
  const clipped: Position[][] = [];
  for (let i = 0; i < rings.length; i++) {
    const ring = clipRing(rings[i], clip);
    if (ring) {
      clipped.push(ring);
    } else if (i === 0) {
      return null;
    }
  }
  return clipped;
}

type Side = 'left' | 'right' | 'bottom' | 'top';

const SIDES: readonly Side[] = ['left', 'right', 'bottom', 'top'];

/**
 * Clip a closed ring against each side of the rectangle in turn.
 *
 * Concave rings that the rectangle cuts into several parts stay one ring,
 * joined by zero-area runs along the rectangle's edge.
 *
 * @returns The closed ring, or `null` with fewer than three vertices left.
 */
function clipRing(ring: Position[], clip: Bounds): Position[] | null {
  let vertices = isClosed(ring) ? ring.slice(0, -1) : ring;
  for (const side of SIDES) {
    if (vertices.length === 0) break;
    const kept: Position[] = [];
    let previous = vertices[vertices.length - 1];
    for (const current of vertices) {
      const currentInside = inside(current, side, clip);
      if (currentInside !== inside(previous, side, clip)) {
        kept.push(crossing(previous, current, side, clip));
      }
      if (currentInside) kept.push(current);
      previous = current;
    }
    vertices = kept;
  }
  if (vertices.length < 3) return null;
  return [...vertices, vertices[0]];
}

function isClosed(ring: Position[]): boolean {
  if (ring.length < 2) return false;
  const [fx, fy] = ring[0];
  const [lx, ly] = ring[ring.length - 1];
  return fx === lx && fy === ly;
}

function inside([x, y]: Position, side: Side, clip: Bounds): boolean {
  switch (side) {
    case 'left':
      return x >= clip.left;
    case 'right':
      return x <= clip.right;
    case 'bottom':
      return y >= clip.bottom;
    case 'top':
      return y <= clip.top;
  }
}

/** Point where `a → b` crosses the line through one side of the rectangle. */
function crossing([ax, ay]: Position, [bx, by]: Position, side: Side, clip: Bounds): Position {
  if (side === 'left' || side === 'right') {
    const x = clip[side];
    return [x, ay + ((by - ay) * (x - ax)) / (bx - ax)];
  }
  const y = clip[side];
  return [ax + ((bx - ax) * (y - ay)) / (by - ay), y];
}

/**
 * Liang-Barsky clipping of the segment `a → b`.
 *
 * @returns The clipped end points and whether the segment was cut at its
 *   start or end, or `null` if it misses the rectangle.
 */
function clipSegment(
  a: Position,
  b: Position,
  clip: Bounds,
): [start: Position, end: Position, entered: boolean, exited: boolean] | null {
  const [ax, ay] = a;
  const dx = b[0] - ax;
  const dy = b[1] - ay;
  let t0 = 0;
  let t1 = 1;
  const limits: Array<[p: number, q: number]> = [
    [-dx, ax - clip.left],
    [dx, clip.right - ax],
    [-dy, ay - clip.bottom],
    [dy, clip.top - ay],
  ];
  for (const [p, q] of limits) {
    if (p === 0) {
      if (q < 0) return null;
      continue;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) return null;
      if (r > t0) t0 = r;
    } else {
      if (r < t0) return null;
      if (r < t1) t1 = r;
    }
  }
  const at = (t: number): Position => [
    Math.min(Math.max(ax + dx * t, clip.left), clip.right),
    Math.min(Math.max(ay + dy * t, clip.bottom), clip.top),
  ];
  return [t0 > 0 ? at(t0) : a, t1 < 1 ? at(t1) : b, t0 > 0, t1 < 1];
}
