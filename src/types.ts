/**
 * @module types
 *
 * Shared type definitions for the tile pyramid library.
 *
 * - **Bounds / BoundsLike**: axis-aligned rectangles in grid units
 * - **Shape**: width/height pairs, in tiles (grid shape) or pixels (tile shape)
 * - **TileIndex**: the `(zoom, row, col)` identity of a tile
 * - **Selection options**: batching, point edge handling and neighborhood
 *   connectedness
 * - **Geometry aliases**: the GeoJSON geometry kinds accepted by the
 *   tile-selection functions
 *
 * Geometry interchange uses plain GeoJSON objects. Coordinates are always in
 * the reference system of the pyramid they are queried against.
 */

import type {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
  Position,
} from 'geojson';

export type {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
  Position,
};

// ─── Bounds ─────────────────────────────────────────────────────────────────

/**
 * Axis-aligned rectangle in reference-system units.
 *
 * Used for grid extents, tile bounds and query rectangles. The y axis points
 * north: `bottom < top`.
 */
export interface Bounds {
  /** Western edge. */
  readonly left: number;
  /** Southern edge. */
  readonly bottom: number;
  /** Eastern edge. */
  readonly right: number;
  /** Northern edge. */
  readonly top: number;
}

/**
 * Bounds as an object or as a `[left, bottom, right, top]` tuple.
 */
export type BoundsLike =
  | Bounds
  | readonly [left: number, bottom: number, right: number, top: number];

/**
 * Normalize a {@link BoundsLike} into a {@link Bounds} object.
 *
 * @example
 * ```typescript
 * toBounds([0, 1, 2, 3]); // => { left: 0, bottom: 1, right: 2, top: 3 }
 * ```
 */
export function toBounds(bounds: BoundsLike): Bounds {
  if (isBoundsTuple(bounds)) {
    const [left, bottom, right, top] = bounds;
    return { left, bottom, right, top };
  }
  return {
    left: bounds.left,
    bottom: bounds.bottom,
    right: bounds.right,
    top: bounds.top,
  };
}

function isBoundsTuple(
  bounds: BoundsLike,
): bounds is readonly [number, number, number, number] {
  return Array.isArray(bounds);
}

// ─── Shape ──────────────────────────────────────────────────────────────────

/**
 * Two-dimensional extent.
 *
 * For a grid definition this is the number of tiles at zoom 0; for a tile it
 * is the raster size in pixels.
 */
export interface Shape {
  /** Number of columns (tiles or pixels). */
  readonly width: number;
  /** Number of rows (tiles or pixels). */
  readonly height: number;
}

// ─── Tile Index ─────────────────────────────────────────────────────────────

/**
 * Tile identity within one pyramid: `[zoom, row, col]`.
 *
 * Rows count downwards from the grid's top edge, columns rightwards from
 * its left edge.
 */
export type TileIndex = readonly [zoom: number, row: number, col: number];

// ─── Selection Options ──────────────────────────────────────────────────────

/**
 * Grouping of enumerated tiles: one batch per matrix row or per column.
 */
export type BatchBy = 'row' | 'column';

/**
 * Which adjoining tile owns a point lying exactly on a tile edge.
 *
 * The first letter picks the horizontal side (`l`eft / `r`ight), the second
 * the vertical side (`t`op / `b`ottom).
 */
export type OnEdgeUse = 'lb' | 'rb' | 'rt' | 'lt';

/** Four direct neighbors or all eight surrounding tiles. */
export type Connectedness = 4 | 8;

/**
 * Options accepted by `TilePyramid.tilesFromGeom`.
 */
export interface GeomQueryOptions {
  /** Yield tiles in row or column batches. */
  batchBy?: BatchBy;
  /**
   * Drop tiles the geometry only touches along an edge or at a corner.
   * @defaultValue false
   */
  exact?: boolean;
}
