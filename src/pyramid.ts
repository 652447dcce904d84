/**
 * @module pyramid
 *
 * The tile pyramid: a grid definition plus tile size and metatiling, and
 * every computation that maps between tile indices and map coordinates.
 *
 * A {@link TilePyramid} is cheap to build and immutable. Per-zoom sizes are
 * memoized in a {@link ZoomLevelCache}; tiles are created on demand and hold
 * nothing but a reference back to their pyramid and their index.
 *
 * **Index layout.** At zoom `z` the grid is divided into
 * `shape.width * 2^z` by `shape.height * 2^z` base tiles. With metatiling
 * `m`, `m × m` base tiles form one metatile; where `m` does not evenly
 * divide the base matrix the last row and column are clipped to the grid.
 * Rows count downwards from the grid's top edge, columns rightwards from its
 * left edge.
 *
 * @example
 * ```typescript
 * const pyramid = new TilePyramid('geodetic');
 * pyramid.matrixWidth(0);          // => 2
 * pyramid.tileBounds(0, 0, 1);     // => { left: 0, bottom: -90, right: 180, top: 90 }
 *
 * for (const tile of pyramid.tilesFromBounds([0, 0, 1, 1], 8)) {
 *   console.log(tile.id);          // [8, 126, 256], [8, 126, 257], ...
 * }
 * ```
 */

import type { Affine } from './affine.js';
import { TileIndexError } from './errors.js';
import { assertSupportedGeometry, geometryBounds } from './geometry/bounds.js';
import { GridDefinition } from './grid.js';
import type { GridLike } from './grid.js';
import type { GridDefinitionInput } from './grids.js';
import { ZoomLevelCache } from './levels.js';
import type { ZoomLevel } from './levels.js';
import { resolveOptions, validatePixelbuffer, validateZoom } from './options.js';
import type { PyramidOptions } from './options.js';
import { Tile } from './tile.js';
import {
  clipGeometryToSrsBounds,
  intersectingTiles,
  snapBounds,
  tileFromXy,
  tilesFromBounds,
  tilesFromGeom,
} from './tiles.js';
import type {
  BatchBy,
  Bounds,
  BoundsLike,
  Geometry,
  GeomQueryOptions,
  OnEdgeUse,
  Polygon,
  Shape,
} from './types.js';

/**
 * Plain-object form of a pyramid, as returned by {@link TilePyramid.toJSON}.
 */
export interface PyramidJSON {
  grid: GridDefinitionInput;
  tileSize: number;
  metatiling: number;
}

/**
 * Tile pyramid over a grid definition.
 */
export class TilePyramid {
  readonly grid: GridDefinition;
  /** Base tile edge length in pixels. */
  readonly tileSize: number;
  /** Base tiles per metatile edge. */
  readonly metatiling: number;
  private readonly levels: ZoomLevelCache;

  /**
   * @param grid - Preset name, grid definition input or grid.
   * @param options - Tile size and metatiling; see {@link PyramidOptions}.
   * @throws {@link InvalidGridError} for invalid grids or options.
   */
  constructor(grid: GridLike, options?: PyramidOptions) {
    const { tileSize, metatiling } = resolveOptions(options);
    this.grid = GridDefinition.from(grid);
    this.tileSize = tileSize;
    this.metatiling = metatiling;
    this.levels = new ZoomLevelCache(this.grid, tileSize, metatiling);
  }

  /** Rebuild a pyramid from {@link TilePyramid.toJSON} output. */
  static fromJSON(json: PyramidJSON): TilePyramid {
    return new TilePyramid(json.grid, { tileSize: json.tileSize, metatiling: json.metatiling });
  }

  get left(): number {
    return this.grid.left;
  }

  get bottom(): number {
    return this.grid.bottom;
  }

  get right(): number {
    return this.grid.right;
  }

  get top(): number {
    return this.grid.top;
  }

  get isGlobal(): boolean {
    return this.grid.isGlobal;
  }

  // ─── Zoom level sizes ─────────────────────────────────────────────────────

  /** Number of tile columns at a zoom level. */
  matrixWidth(zoom: number): number {
    return this.level(zoom).matrixWidth;
  }

  /** Number of tile rows at a zoom level. */
  matrixHeight(zoom: number): number {
    return this.level(zoom).matrixHeight;
  }

  /** Nominal tile width in map units; edge tiles may be clipped. */
  tileXSize(zoom: number): number {
    return this.level(zoom).tileXSize;
  }

  /** Nominal tile height in map units; edge tiles may be clipped. */
  tileYSize(zoom: number): number {
    return this.level(zoom).tileYSize;
  }

  /** Nominal tile width in pixels. */
  tileWidth(zoom: number): number {
    return this.level(zoom).tileWidth;
  }

  /** Nominal tile height in pixels. */
  tileHeight(zoom: number): number {
    return this.level(zoom).tileHeight;
  }

  /** Horizontal map units per pixel. */
  pixelXSize(zoom: number): number {
    return this.level(zoom).pixelXSize;
  }

  /** Vertical map units per pixel. */
  pixelYSize(zoom: number): number {
    return this.level(zoom).pixelYSize;
  }

  // ─── Tiles ────────────────────────────────────────────────────────────────

  /**
   * Get a validated tile.
   *
   * @throws {@link TilePyramidError} for an invalid zoom.
   * @throws {@link TileIndexError} if row or column lie outside the matrix.
   */
  tile(zoom: number, row: number, col: number): Tile {
    this.assertIndex(zoom, row, col);
    return new Tile(this, zoom, row, col);
  }

  /** Whether `(zoom, row, col)` addresses a tile of this pyramid. */
  isValidIndex(zoom: number, row: number, col: number): boolean {
    if (!Number.isInteger(zoom) || zoom < 0) return false;
    if (!Number.isInteger(row) || !Number.isInteger(col)) return false;
    const { matrixWidth, matrixHeight } = this.levels.get(zoom);
    return row >= 0 && row < matrixHeight && col >= 0 && col < matrixWidth;
  }

  /**
   * Bounds of a tile, optionally expanded by a pixel buffer.
   *
   * The unbuffered bounds never leave the grid: the last row and column of
   * a metatiled matrix are clipped. Neighboring tiles share their edge
   * coordinates exactly. A buffer extends edge tiles beyond the grid, except
   * across the top and bottom of global grids.
   *
   * @throws {@link TileIndexError} outside the matrix.
   * @throws {@link PixelbufferError} for an invalid pixelbuffer.
   */
  tileBounds(zoom: number, row: number, col: number, pixelbuffer = 0): Bounds {
    this.assertIndex(zoom, row, col);
    validatePixelbuffer(pixelbuffer);
    const level = this.levels.get(zoom);
    const grid = this.grid.bounds;

    const left = grid.left + col * level.tileXSize;
    const top = grid.top - row * level.tileYSize;
    const right = col === level.matrixWidth - 1
      ? grid.right
      : grid.left + (col + 1) * level.tileXSize;
    const bottom = row === level.matrixHeight - 1
      ? grid.bottom
      : grid.top - (row + 1) * level.tileYSize;
    if (pixelbuffer === 0) return { left, bottom, right, top };

    const dx = pixelbuffer * level.pixelXSize;
    const dy = pixelbuffer * level.pixelYSize;
    let bufferedTop = top + dy;
    let bufferedBottom = bottom - dy;
    if (this.grid.isGlobal) {
      bufferedTop = Math.min(bufferedTop, grid.top);
      bufferedBottom = Math.max(bufferedBottom, grid.bottom);
    }
    return { left: left - dx, bottom: bufferedBottom, right: right + dx, top: bufferedTop };
  }

  /**
   * Tile bounds as a GeoJSON polygon, ring from the top-left corner
   * clockwise.
   */
  tileBbox(zoom: number, row: number, col: number, pixelbuffer = 0): Polygon {
    const { left, bottom, right, top } = this.tileBounds(zoom, row, col, pixelbuffer);
    return {
      type: 'Polygon',
      coordinates: [[[left, top], [right, top], [right, bottom], [left, bottom], [left, top]]],
    };
  }

  /**
   * Raster size of a tile in pixels.
   *
   * The base size follows from the clipped bounds, so edge tiles of a
   * metatiled matrix can be smaller than {@link tileWidth}. A buffer adds
   * `pixelbuffer` on every side, except where global grids clamp it at the
   * top and bottom.
   */
  tileShape(zoom: number, row: number, col: number, pixelbuffer = 0): Shape {
    const { left, bottom, right, top } = this.tileBounds(zoom, row, col);
    validatePixelbuffer(pixelbuffer);
    const level = this.levels.get(zoom);
    const width = Math.round((right - left) / level.pixelXSize);
    const height = Math.round((top - bottom) / level.pixelYSize);
    if (pixelbuffer === 0) return { width, height };

    if (!this.grid.isGlobal) {
      return { width: width + 2 * pixelbuffer, height: height + 2 * pixelbuffer };
    }
    let bufferedHeight: number;
    if (level.matrixHeight === 1) {
      bufferedHeight = height;
    } else if (row === 0 || row === level.matrixHeight - 1) {
      bufferedHeight = height + pixelbuffer;
    } else {
      bufferedHeight = height + 2 * pixelbuffer;
    }
    return { width: width + 2 * pixelbuffer, height: bufferedHeight };
  }

  /**
   * Pixel-to-map transform of a tile: `[pixelXSize, 0, left, 0,
   * -pixelYSize, top]` of the buffered bounds.
   */
  tileAffine(zoom: number, row: number, col: number, pixelbuffer = 0): Affine {
    const { left, top } = this.tileBounds(zoom, row, col, pixelbuffer);
    const level = this.levels.get(zoom);
    return [level.pixelXSize, 0, left, 0, -level.pixelYSize, top];
  }

  // ─── Selection ────────────────────────────────────────────────────────────

  /**
   * Tiles of this pyramid overlapping `tile` with nonzero area, at the
   * tile's zoom.
   *
   * @example
   * ```typescript
   * const metatiles = new TilePyramid('geodetic', { metatiling: 2 });
   * const tiles = new TilePyramid('geodetic');
   * tiles.intersecting(metatiles.tile(8, 63, 128)).length; // => 4
   * ```
   */
  intersecting(tile: Tile): Tile[] {
    return intersectingTiles(tile, this);
  }

  /**
   * Enumerate the tiles overlapping a rectangle; see {@link tilesFromBounds}
   * in `tiles.ts` for edge and wraparound rules.
   */
  tilesFromBounds(bounds: BoundsLike, zoom: number): Iterable<Tile>;
  tilesFromBounds(bounds: BoundsLike, zoom: number, batchBy: BatchBy): Iterable<Tile[]>;
  tilesFromBounds(bounds: BoundsLike, zoom: number, batchBy?: BatchBy): Iterable<Tile> | Iterable<Tile[]>;

  // Implementation
  tilesFromBounds(bounds: BoundsLike, zoom: number, batchBy?: BatchBy): Iterable<Tile> | Iterable<Tile[]> {
    return tilesFromBounds(this, bounds, zoom, batchBy);
  }

  /**
   * Enumerate the tiles overlapping a geometry's bounding box.
   *
   * @throws {@link GeometryTypeError} for unsupported geometry kinds.
   */
  tilesFromBbox(geometry: Geometry, zoom: number): Iterable<Tile>;
  tilesFromBbox(geometry: Geometry, zoom: number, batchBy: BatchBy): Iterable<Tile[]>;
  tilesFromBbox(geometry: Geometry, zoom: number, batchBy?: BatchBy): Iterable<Tile> | Iterable<Tile[]>;

  // Implementation
  tilesFromBbox(geometry: Geometry, zoom: number, batchBy?: BatchBy): Iterable<Tile> | Iterable<Tile[]> {
    assertSupportedGeometry(geometry);
    const bounds = geometryBounds(geometry);
    if (bounds === null) {
      validateZoom(zoom);
      return [];
    }
    return tilesFromBounds(this, bounds, zoom, batchBy);
  }

  /**
   * Enumerate the tiles a geometry touches.
   *
   * @example
   * ```typescript
   * const triangle = { type: 'Polygon', coordinates: [[[0, 0], [1, 1], [1, 0], [0, 0]]] };
   * [...pyramid.tilesFromGeom(triangle, 8)].length;                  // => 4
   * [...pyramid.tilesFromGeom(triangle, 8, { exact: true })].length; // => 3
   * ```
   */
  tilesFromGeom(
    geometry: Geometry,
    zoom: number,
    options?: GeomQueryOptions & { batchBy?: undefined },
  ): Iterable<Tile>;
  tilesFromGeom(
    geometry: Geometry,
    zoom: number,
    options: GeomQueryOptions & { batchBy: BatchBy },
  ): Iterable<Tile[]>;
  tilesFromGeom(
    geometry: Geometry,
    zoom: number,
    options?: GeomQueryOptions,
  ): Iterable<Tile> | Iterable<Tile[]>;

  // Implementation
  tilesFromGeom(
    geometry: Geometry,
    zoom: number,
    options?: GeomQueryOptions,
  ): Iterable<Tile> | Iterable<Tile[]> {
    return tilesFromGeom(this, geometry, zoom, options);
  }

  /** Find the tile containing a point; see {@link tileFromXy} in `tiles.ts`. */
  tileFromXy(x: number, y: number, zoom: number, onEdgeUse: OnEdgeUse = 'rb'): Tile {
    return tileFromXy(this, x, y, zoom, onEdgeUse);
  }

  /** Clip a geometry to the grid bounds, wrapping parts beyond the antimeridian. */
  clipGeometryToSrsBounds(geometry: Geometry, options: { multipart: true }): Geometry[];
  clipGeometryToSrsBounds(geometry: Geometry, options?: { multipart?: false }): Geometry;
  clipGeometryToSrsBounds(geometry: Geometry, options?: { multipart?: boolean }): Geometry | Geometry[];

  // Implementation
  clipGeometryToSrsBounds(geometry: Geometry, options?: { multipart?: boolean }): Geometry | Geometry[] {
    return clipGeometryToSrsBounds(geometry, this, options);
  }

  /** Extend bounds outward to the edges of the tiles they overlap. */
  snapBounds(bounds: BoundsLike, zoom: number, pixelbuffer = 0): Bounds {
    return snapBounds(bounds, this, zoom, pixelbuffer);
  }

  // ─── Identity ─────────────────────────────────────────────────────────────

  /** Equal grid, tile size and metatiling. */
  equals(other: TilePyramid): boolean {
    return this === other || this.key === other.key;
  }

  /** Structural hash string; equal pyramids have equal keys. */
  get key(): string {
    return `${this.grid.key}|${this.tileSize}|${this.metatiling}`;
  }

  toJSON(): PyramidJSON {
    return { grid: this.grid.toJSON(), tileSize: this.tileSize, metatiling: this.metatiling };
  }

  toString(): string {
    return `TilePyramid(${this.grid.type}, tileSize=${this.tileSize}, metatiling=${this.metatiling})`;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private level(zoom: number): ZoomLevel {
    validateZoom(zoom);
    return this.levels.get(zoom);
  }

  private assertIndex(zoom: number, row: number, col: number): void {
    validateZoom(zoom);
    if (!this.isValidIndex(zoom, row, col)) {
      throw new TileIndexError(
        `tile (${zoom}, ${row}, ${col}) is outside the ${this.matrixHeight(zoom)} x ${this.matrixWidth(zoom)} matrix of zoom ${zoom}`,
      );
    }
  }
}
