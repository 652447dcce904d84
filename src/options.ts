/**
 * @module options
 *
 * Pyramid options, tuning constants and option resolution.
 *
 * Option values cascade through two levels:
 *
 * 1. {@link PyramidOptions}: values passed to the `TilePyramid` constructor
 * 2. {@link DEFAULT_PYRAMID_OPTIONS}: built-in fallbacks
 *
 * @example
 * ```typescript
 * const pyramid = new TilePyramid('geodetic', { metatiling: 4 });
 * // tileSize falls back to 256
 * ```
 */

import { InvalidGridError, PixelbufferError, TilePyramidError } from './errors.js';

/**
 * Largest relative difference tolerated between a grid's shape ratio and its
 * bounds ratio.
 */
export const SHAPE_RATIO_TOLERANCE = 1e-6;

/**
 * Distance, in fractions of a tile, within which a coordinate is treated as
 * lying exactly on a tile edge.
 *
 * Coordinates derived from tile bounds (e.g. `col * tileXSize`) do not
 * always divide back into whole tile counts; snapping the quotient keeps
 * edge ownership independent of rounding noise.
 */
export const EDGE_TOLERANCE = 1e-9;

/** Metatiling factors accepted by `TilePyramid`. */
export const METATILING_VALUES: readonly number[] = [
  1, 2, 4, 8, 16, 32, 64, 128, 256, 512,
];

/**
 * Tile size and metatiling of a pyramid.
 */
export interface PyramidOptions {
  /** Tile edge length in pixels. @defaultValue 256 */
  tileSize?: number;
  /** Number of base tiles per metatile edge. @defaultValue 1 */
  metatiling?: number;
}

/** Built-in default values for all pyramid options. */
export const DEFAULT_PYRAMID_OPTIONS: Required<PyramidOptions> = {
  tileSize: 256,
  metatiling: 1,
};

/**
 * Resolve and validate effective pyramid options.
 *
 * @throws {@link InvalidGridError} if `tileSize` is not a positive integer or
 *   `metatiling` is not one of {@link METATILING_VALUES}.
 *
 * @example
 * ```typescript
 * resolveOptions({ metatiling: 2 });
 * // → { tileSize: 256, metatiling: 2 }
 * ```
 */
export function resolveOptions(options?: PyramidOptions): Required<PyramidOptions> {
  const tileSize = options?.tileSize ?? DEFAULT_PYRAMID_OPTIONS.tileSize;
  const metatiling = options?.metatiling ?? DEFAULT_PYRAMID_OPTIONS.metatiling;

  if (!Number.isInteger(tileSize) || tileSize <= 0) {
    throw new InvalidGridError(`tileSize must be a positive integer, got ${tileSize}`);
  }
  if (!METATILING_VALUES.includes(metatiling)) {
    throw new InvalidGridError(
      `metatiling must be one of ${METATILING_VALUES.join(', ')}, got ${metatiling}`,
    );
  }
  return { tileSize, metatiling };
}

/**
 * @throws {@link TilePyramidError} unless `zoom` is an integer >= 0.
 */
export function validateZoom(zoom: number): void {
  if (!Number.isInteger(zoom) || zoom < 0) {
    throw new TilePyramidError(`zoom must be an integer >= 0, got ${zoom}`);
  }
}

/**
 * @throws {@link PixelbufferError} unless `pixelbuffer` is an integer >= 0.
 */
export function validatePixelbuffer(pixelbuffer: number): void {
  if (!Number.isInteger(pixelbuffer) || pixelbuffer < 0) {
    throw new PixelbufferError(
      `pixelbuffer must be an integer >= 0, got ${pixelbuffer}`,
    );
  }
}

/**
 * Snap a fractional tile position to the nearest integer when it lies
 * within {@link EDGE_TOLERANCE} of it.
 */
export function snapToEdge(position: number): number {
  const nearest = Math.round(position);
  return Math.abs(position - nearest) < EDGE_TOLERANCE ? nearest : position;
}
