/**
 * @module tile-pyramid
 *
 * Public API surface for the tile-pyramid library.
 *
 * tile-pyramid maps between a hierarchical grid of rectangular map tiles and
 * map coordinates, for any projected or geographic reference system. It
 * decides which tiles a point, rectangle or geometry touches at a zoom
 * level, and converts any tile back into exact bounds, a pixel shape and an
 * affine transform for raster I/O.
 *
 * ---
 *
 * ### Core objects
 *
 * | Export | Role |
 * |--------|------|
 * | {@link GridDefinition} | Zoom-0 tile counts, outer bounds, reference system, antimeridian behavior. Presets: `geodetic`, `mercator`. |
 * | {@link TilePyramid} | A grid plus tile size and metatiling. All index ↔ coordinate computations and tile selection. |
 * | {@link Tile} | One `(zoom, row, col)` of a pyramid, with bounds, shape, affine, parent, children and neighbors. |
 *
 * ---
 *
 * ### Tile selection
 *
 * `TilePyramid.tilesFromBounds`, `tilesFromBbox` and `tilesFromGeom` return
 * lazy, restartable iterables, optionally batched by row or column.
 * `tileFromXy` resolves a single point. On global grids all of them wrap
 * around the antimeridian.
 *
 * ---
 *
 * ### Free functions
 *
 * - {@link clipGeometryToSrsBounds}: split a geometry at the grid bounds.
 * - {@link snapBounds}: extend bounds to the tile edges they overlap.
 * - {@link compareTiles}: order tiles by zoom, row, column.
 * - {@link apply}: map a pixel coordinate through a tile's affine transform.
 *
 * ---
 *
 * ### Errors
 *
 * Every error extends {@link TilePyramidError}: {@link InvalidGridError},
 * {@link TileIndexError}, {@link PointOutsideGridError},
 * {@link GeometryTypeError} and {@link PixelbufferError}.
 */

// ─── Core ───────────────────────────────────────────────────────────────────

export { GridDefinition } from './grid.js';
export { TilePyramid } from './pyramid.js';
export { Tile, compareTiles } from './tile.js';

// ─── Functions ──────────────────────────────────────────────────────────────

export { clipGeometryToSrsBounds, snapBounds } from './tiles.js';
export { apply } from './affine.js';
export { toBounds } from './types.js';

// ─── Configuration ──────────────────────────────────────────────────────────

export { PRESET_GRIDS } from './grids.js';
export {
  DEFAULT_PYRAMID_OPTIONS,
  EDGE_TOLERANCE,
  METATILING_VALUES,
  SHAPE_RATIO_TOLERANCE,
} from './options.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  GeometryTypeError,
  InvalidGridError,
  PixelbufferError,
  PointOutsideGridError,
  TileIndexError,
  TilePyramidError,
} from './errors.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { Affine } from './affine.js';
export type { GridLike } from './grid.js';
export type { CrsIdentity, GridDefinitionInput, GridPresetName } from './grids.js';
export type { PyramidOptions } from './options.js';
export type { PyramidJSON } from './pyramid.js';
export type {
  BatchBy,
  Bounds,
  BoundsLike,
  Connectedness,
  Geometry,
  GeomQueryOptions,
  OnEdgeUse,
  Shape,
  TileIndex,
} from './types.js';
