/**
 * @module levels
 *
 * Per-zoom derived quantities of a tile pyramid and their memoization.
 *
 * Every size a pyramid reports at a zoom level follows from the grid, the
 * tile size and the metatiling alone, so it is computed once per zoom and
 * kept for the lifetime of the pyramid. The cache only stores numbers; it
 * holds no tiles and no query state.
 */

import type { GridDefinition } from './grid.js';

/**
 * Sizes of one zoom level.
 */
export interface ZoomLevel {
  /** Number of (meta)tile columns. */
  readonly matrixWidth: number;
  /** Number of (meta)tile rows. */
  readonly matrixHeight: number;
  /** Nominal (unclipped) metatile width in map units. */
  readonly tileXSize: number;
  /** Nominal (unclipped) metatile height in map units. */
  readonly tileYSize: number;
  /** Nominal metatile width in pixels. */
  readonly tileWidth: number;
  /** Nominal metatile height in pixels. */
  readonly tileHeight: number;
  /** Map units per pixel, horizontally. */
  readonly pixelXSize: number;
  /** Map units per pixel, vertically. */
  readonly pixelYSize: number;
}

/**
 * Compute the sizes of a zoom level.
 *
 * Base tiles are `tileSize` pixels wide and the grid's extent divided by
 * `shape * 2^zoom` map units. A metatile groups `metatiling × metatiling`
 * base tiles, but never more than the zoom level has.
 */
export function computeZoomLevel(
  grid: GridDefinition,
  tileSize: number,
  metatiling: number,
  zoom: number,
): ZoomLevel {
  const columns = grid.shape.width * 2 ** zoom;
  const rows = grid.shape.height * 2 ** zoom;
  return {
    matrixWidth: Math.max(1, Math.ceil(columns / metatiling)),
    matrixHeight: Math.max(1, Math.ceil(rows / metatiling)),
    tileXSize: (grid.xSize / columns) * metatiling,
    tileYSize: (grid.ySize / rows) * metatiling,
    tileWidth: Math.min(tileSize * metatiling, tileSize * columns),
    tileHeight: Math.min(tileSize * metatiling, tileSize * rows),
    pixelXSize: grid.xSize / (columns * tileSize),
    pixelYSize: grid.ySize / (rows * tileSize),
  };
}

/**
 * Memoizes {@link ZoomLevel}s of one pyramid by zoom.
 */
export class ZoomLevelCache {
  private readonly grid: GridDefinition;
  private readonly tileSize: number;
  private readonly metatiling: number;
  private readonly levels = new Map<number, ZoomLevel>();

  constructor(grid: GridDefinition, tileSize: number, metatiling: number) {
    this.grid = grid;
    this.tileSize = tileSize;
    this.metatiling = metatiling;
  }

  /**
   * Get or compute the sizes of a zoom level. The zoom must already be
   * validated.
   */
  get(zoom: number): ZoomLevel {
    let level = this.levels.get(zoom);
    if (!level) {
      level = computeZoomLevel(this.grid, this.tileSize, this.metatiling, zoom);
      this.levels.set(zoom, level);
    }
    return level;
  }
}
