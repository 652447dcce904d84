/**
 * @module tiles
 *
 * Tile-selection algorithms: which tiles of a pyramid a rectangle, point or
 * geometry touches at a zoom level.
 *
 * All functions are stateless; the pyramid supplies every size. Enumerations
 * return lazy, restartable iterables: nothing is computed before iteration
 * starts, each iteration starts over, and batching by row or column bounds
 * memory to one row or column of tiles.
 *
 * **Edge ownership.** Tile positions are computed as fractional indices
 * `(x - grid.left) / tileXSize` and `(grid.top - y) / tileYSize`, snapped to
 * the nearest integer when within {@link EDGE_TOLERANCE}. A tile covers the
 * half-open ranges `[left, right)` and `(bottom, top]`: it owns its left and
 * top edges. A rectangle whose edges fall exactly on tile boundaries
 * therefore selects only the tiles it overlaps with nonzero area. Only the
 * grid's own right and bottom edges belong to the last column and row.
 */

import { splitAtGridBounds, wrapAcrossGridEdges } from './geometry/clip.js';
import { assertSupportedGeometry, geometryBounds } from './geometry/bounds.js';
import { intersectsBounds, overlapsBounds } from './geometry/intersects.js';
import {
  PointOutsideGridError,
  TileIndexError,
  TilePyramidError,
} from './errors.js';
import { snapToEdge, validatePixelbuffer, validateZoom } from './options.js';
import type { TilePyramid } from './pyramid.js';
import type { Tile } from './tile.js';
import { toBounds } from './types.js';
import type {
  BatchBy,
  Bounds,
  BoundsLike,
  Geometry,
  GeomQueryOptions,
  OnEdgeUse,
} from './types.js';

const EDGE_CHOICES: readonly OnEdgeUse[] = ['lb', 'rb', 'rt', 'lt'];

/**
 * Row and column indices covered by a query at one zoom level.
 */
interface Coverage {
  /** Ascending row indices. */
  rows: number[];
  /** Ascending, unique column indices. */
  cols: number[];
}

// ─── Bounds ─────────────────────────────────────────────────────────────────

/**
 * Enumerate the tiles overlapping a rectangle.
 *
 * On global grids, bounds extending past the left or right grid edge wrap
 * around the antimeridian, and bounds at least one grid wide select every
 * column. Top and bottom are clamped to the grid.
 *
 * Zero-width or zero-height bounds select the tiles holding that line, by
 * the edge ownership rule. Bounds disjoint from the grid, or only touching
 * its edge, select nothing.
 *
 * @returns Tiles in row-major order, or `Tile[]` batches when `batchBy` is
 *   set.
 * @throws {@link TilePyramidError} for invalid zoom or `batchBy` values, and
 *   for bounds that are not finite numbers.
 */
export function tilesFromBounds(
  pyramid: TilePyramid,
  bounds: BoundsLike,
  zoom: number,
  batchBy?: BatchBy,
): Iterable<Tile> | Iterable<Tile[]> {
  validateZoom(zoom);
  validateBatchBy(batchBy);
  const query = toBounds(bounds);
  assertFinite(query);
  const cover = () => coverage(pyramid, query, zoom);

  return batchBy === undefined
    ? lazy(() => iterateTiles(pyramid, zoom, cover()))
    : lazy(() => iterateBatches(pyramid, zoom, cover(), batchBy));
}

/**
 * Enumerate the tiles touched by a geometry.
 *
 * Points resolve to the tile owning them, like zero-extent bounds: the
 * left and top edges belong to a tile, the grid's right and bottom edges to
 * the last column and row. A point outside the grid selects nothing, unless
 * a global grid wraps it back in.
 *
 * Other geometries select candidates from their bounding box and keep the
 * tiles whose bounds intersect the geometry, or one of its copies shifted
 * across the antimeridian on global grids. With `exact`, tiles the geometry
 * only touches along an edge or at a corner are dropped. Empty batches are
 * skipped.
 *
 * @throws {@link GeometryTypeError} for unsupported geometry kinds.
 * @throws {@link TilePyramidError} for coordinates that are not finite.
 */
export function tilesFromGeom(
  pyramid: TilePyramid,
  geometry: Geometry,
  zoom: number,
  options: GeomQueryOptions = {},
): Iterable<Tile> | Iterable<Tile[]> {
  validateZoom(zoom);
  validateBatchBy(options.batchBy);
  assertSupportedGeometry(geometry);
  const { batchBy, exact = false } = options;

  const bounds = geometryBounds(geometry);
  if (bounds === null) return [];
  assertFinite(bounds);

  if (geometry.type === 'Point') {
    const cover = () => coverage(pyramid, bounds, zoom);
    return batchBy === undefined
      ? lazy(() => iterateTiles(pyramid, zoom, cover()))
      : lazy(() => iterateBatches(pyramid, zoom, cover(), batchBy));
  }

  const relates = exact ? overlapsBounds : intersectsBounds;
  const matches = (tile: Tile, pieces: Geometry[]): boolean => {
    const tileBounds = tile.bounds();
    return pieces.some((piece) => relates(piece, tileBounds));
  };

  if (batchBy === undefined) {
    return lazy(function* () {
      const pieces = wrapAcrossGridEdges(geometry, pyramid.grid);
      for (const tile of iterateTiles(pyramid, zoom, coverage(pyramid, bounds, zoom))) {
        if (matches(tile, pieces)) yield tile;
      }
    });
  }
  return lazy(function* () {
    const pieces = wrapAcrossGridEdges(geometry, pyramid.grid);
    const batches = iterateBatches(pyramid, zoom, coverage(pyramid, bounds, zoom), batchBy);
    for (const batch of batches) {
      const kept = batch.filter((tile) => matches(tile, pieces));
      if (kept.length > 0) yield kept;
    }
  });
}

// ─── Points ─────────────────────────────────────────────────────────────────

/**
 * Find the tile containing a point.
 *
 * A point exactly on a tile edge belongs to the tile on the side picked by
 * `onEdgeUse`; a point strictly inside a tile ignores it. On global grids a
 * column past either grid edge wraps around to the other side.
 *
 * @throws {@link PointOutsideGridError} if the point is outside the grid.
 * @throws {@link TileIndexError} if the edge choice points outside the tile
 *   matrix, e.g. `"rb"` on the grid's bottom edge.
 * @throws {@link TilePyramidError} for an unknown `onEdgeUse`.
 *
 * @example
 * ```typescript
 * const pyramid = new TilePyramid('geodetic');
 * tileFromXy(pyramid, 0, 0, 5, 'rb').id; // => [5, 16, 32]
 * tileFromXy(pyramid, 0, 0, 5, 'lt').id; // => [5, 15, 31]
 * ```
 */
export function tileFromXy(
  pyramid: TilePyramid,
  x: number,
  y: number,
  zoom: number,
  onEdgeUse: OnEdgeUse = 'rb',
): Tile {
  validateZoom(zoom);
  if (!EDGE_CHOICES.includes(onEdgeUse)) {
    throw new TilePyramidError(
      `onEdgeUse must be one of ${EDGE_CHOICES.join(', ')}, got '${onEdgeUse}'`,
    );
  }
  const { left, bottom, right, top } = pyramid.grid.bounds;
  if (!(x >= left && x <= right && y >= bottom && y <= top)) {
    throw new PointOutsideGridError(
      `point (${x}, ${y}) is outside the grid bounds (${left}, ${bottom}, ${right}, ${top})`,
    );
  }

  const colPosition = snapToEdge((x - left) / pyramid.tileXSize(zoom));
  const rowPosition = snapToEdge((top - y) / pyramid.tileYSize(zoom));
  let col = Math.floor(colPosition);
  let row = Math.floor(rowPosition);
  if (onEdgeUse[0] === 'l' && Number.isInteger(colPosition)) col -= 1;
  if (onEdgeUse[1] === 't' && Number.isInteger(rowPosition)) row -= 1;

  const matrixWidth = pyramid.matrixWidth(zoom);
  if (pyramid.grid.isGlobal) {
    col = ((col % matrixWidth) + matrixWidth) % matrixWidth;
  }
  if (row < 0 || row >= pyramid.matrixHeight(zoom) || col < 0 || col >= matrixWidth) {
    throw new TileIndexError(
      `onEdgeUse '${onEdgeUse}' results in an invalid tile (${zoom}, ${row}, ${col}) for point (${x}, ${y})`,
    );
  }
  return pyramid.tile(zoom, row, col);
}

// ─── Snapping ───────────────────────────────────────────────────────────────

/**
 * Extend bounds outward to the edges of the tiles they overlap.
 *
 * The bounds are first intersected with the grid. The result spans the
 * (optionally buffered) bounds of the tiles holding the lower-left and
 * upper-right corners; it equals the union of the tiles selected by
 * {@link tilesFromBounds}. Snapping snapped bounds again without a buffer
 * returns them unchanged.
 *
 * @throws {@link PointOutsideGridError} if the bounds do not intersect the grid.
 * @throws {@link PixelbufferError} for an invalid pixelbuffer.
 *
 * @example
 * ```typescript
 * snapBounds([0, 1, 2, 3], new TilePyramid('geodetic'), 8);
 * // => { left: 0, bottom: 0.703125, right: 2.109375, top: 3.515625 }
 * ```
 */
export function snapBounds(
  bounds: BoundsLike,
  pyramid: TilePyramid,
  zoom: number,
  pixelbuffer = 0,
): Bounds {
  validateZoom(zoom);
  validatePixelbuffer(pixelbuffer);
  const query = toBounds(bounds);
  const grid = pyramid.grid.bounds;
  const left = Math.max(query.left, grid.left);
  const bottom = Math.max(query.bottom, grid.bottom);
  const right = Math.min(query.right, grid.right);
  const top = Math.min(query.top, grid.top);
  if (left > right || bottom > top) {
    throw new PointOutsideGridError(
      `bounds (${query.left}, ${query.bottom}, ${query.right}, ${query.top}) do not intersect the grid`,
    );
  }

  const lowerLeft = tileFromXy(pyramid, left, bottom, zoom, 'rt').bounds(pixelbuffer);
  const upperRight = tileFromXy(pyramid, right, top, zoom, 'lb').bounds(pixelbuffer);
  return {
    left: lowerLeft.left,
    bottom: lowerLeft.bottom,
    right: upperRight.right,
    top: upperRight.top,
  };
}

// ─── Pyramid ↔ Pyramid ──────────────────────────────────────────────────────

/**
 * Tiles of `pyramid` overlapping `tile` with nonzero area, at the tile's
 * zoom level.
 *
 * Translates tiles between pyramids of the same grid with different
 * metatiling: a metatile maps to the base tiles it groups, a base tile to
 * the metatile containing it.
 */
export function intersectingTiles(tile: Tile, pyramid: TilePyramid): Tile[] {
  return [...iterateTiles(pyramid, tile.zoom, coverage(pyramid, tile.bounds(), tile.zoom))];
}

// ─── Geometry clipping ──────────────────────────────────────────────────────

/**
 * Clip a geometry to the grid bounds of a pyramid.
 *
 * On global grids, parts beyond the antimeridian are shifted by one grid
 * width back inside the grid, so a geometry crossing it is split in two.
 * Parts of non-global grids outside the bounds are cut off. A geometry
 * already inside the grid is returned unchanged.
 *
 * @returns The pieces as an array with `multipart`, otherwise a
 *   `GeometryCollection` of them (or the unchanged geometry).
 * @throws {@link GeometryTypeError} for unsupported geometry kinds.
 */
export function clipGeometryToSrsBounds(
  geometry: Geometry,
  pyramid: TilePyramid,
  options: { multipart: true },
): Geometry[];
export function clipGeometryToSrsBounds(
  geometry: Geometry,
  pyramid: TilePyramid,
  options?: { multipart?: false },
): Geometry;
export function clipGeometryToSrsBounds(
  geometry: Geometry,
  pyramid: TilePyramid,
  options?: { multipart?: boolean },
): Geometry | Geometry[];

// Implementation
export function clipGeometryToSrsBounds(
  geometry: Geometry,
  pyramid: TilePyramid,
  options?: { multipart?: boolean },
): Geometry | Geometry[] {
  assertSupportedGeometry(geometry);
  const pieces = splitAtGridBounds(geometry, pyramid.grid);
  if (options?.multipart) return pieces;
  if (pieces.length === 1 && pieces[0] === geometry) return geometry;
  return { type: 'GeometryCollection', geometries: pieces };
}

// ─── Internals ──────────────────────────────────────────────────────────────

function lazy<T>(generate: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: generate };
}

function validateBatchBy(batchBy: BatchBy | undefined): void {
  if (batchBy !== undefined && batchBy !== 'row' && batchBy !== 'column') {
    throw new TilePyramidError(`batchBy must be 'row' or 'column', got '${batchBy}'`);
  }
}

function* iterateTiles(pyramid: TilePyramid, zoom: number, { rows, cols }: Coverage): Generator<Tile> {
  for (const row of rows) {
    for (const col of cols) {
      yield pyramid.tile(zoom, row, col);
    }
  }
}

function* iterateBatches(
  pyramid: TilePyramid,
  zoom: number,
  { rows, cols }: Coverage,
  batchBy: BatchBy,
): Generator<Tile[]> {
  if (rows.length === 0 || cols.length === 0) return;
  if (batchBy === 'row') {
    for (const row of rows) yield cols.map((col) => pyramid.tile(zoom, row, col));
  } else {
    for (const col of cols) yield rows.map((row) => pyramid.tile(zoom, row, col));
  }
}

/**
 * Compute the rows and columns a query rectangle covers.
 */
function coverage(pyramid: TilePyramid, query: Bounds, zoom: number): Coverage {
  const grid = pyramid.grid;
  const { left, bottom, right, top } = grid.bounds;
  const zeroWidth = query.right === query.left;
  const zeroHeight = query.top === query.bottom;

  // rows: no vertical wraparound, clamp to the grid
  const rows = indexRange(
    top - Math.min(query.top, top),
    top - Math.max(query.bottom, bottom),
    pyramid.tileYSize(zoom),
    pyramid.matrixHeight(zoom),
    zeroHeight,
  );
  if (rows.length === 0) return { rows, cols: [] };

  const matrixWidth = pyramid.matrixWidth(zoom);
  let spans: Array<[number, number]>;
  if (!grid.isGlobal) {
    spans = [[Math.max(query.left, left), Math.min(query.right, right)]];
  } else if (query.right - query.left >= grid.xSize) {
    spans = [[left, right]];
  } else {
    let qLeft = query.left;
    let qRight = query.right;
    if (qRight < left || qLeft > right) {
      // bounds wholly beyond one grid edge: shift by whole grid widths so
      // that the left edge lands in [left, right)
      qLeft = left + modulo(modulo(qLeft, grid.xSize) - left, grid.xSize);
      qRight = qLeft + (query.right - query.left);
    }
    if (qLeft < left) {
      spans = [[qLeft + grid.xSize, right], [left, qRight]];
    } else if (qRight > right) {
      spans = [[qLeft, right], [left, qRight - grid.xSize]];
    } else {
      spans = [[qLeft, qRight]];
    }
  }

  const colSet = new Set<number>();
  for (const [spanLeft, spanRight] of spans) {
    const range = indexRange(
      spanLeft - left,
      spanRight - left,
      pyramid.tileXSize(zoom),
      matrixWidth,
      zeroWidth,
    );
    for (const col of range) colSet.add(col);
  }
  const cols = [...colSet].sort((a, b) => a - b);
  return { rows, cols };
}

function modulo(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function assertFinite({ left, bottom, right, top }: Bounds): void {
  if (![left, bottom, right, top].every(Number.isFinite)) {
    throw new TilePyramidError(
      `bounds (${left}, ${bottom}, ${right}, ${top}) must be finite numbers`,
    );
  }
}

/**
 * Indices of the tiles covering `[start, end)` along one axis, with
 * positions measured in map units from the grid origin.
 *
 * A zero-length range selects the tile owning that position, but only when
 * the query itself has zero extent on this axis; zero-length pieces left
 * over from clamping or wrapping are only touches.
 */
function indexRange(
  start: number,
  end: number,
  tileSize: number,
  count: number,
  zeroExtent: boolean,
): number[] {
  if (end < start) return [];
  let first: number;
  let last: number;
  if (end === start) {
    if (!zeroExtent) return [];
    first = Math.min(Math.floor(snapToEdge(start / tileSize)), count - 1);
    last = first + 1;
  } else {
    first = Math.floor(snapToEdge(start / tileSize));
    last = Math.ceil(snapToEdge(end / tileSize));
  }
  first = Math.max(first, 0);
  last = Math.min(last, count);

  const indices: number[] = [];
  for (let i = first; i < last; i++) indices.push(i);
  return indices;
}
