/**
 * @module affine
 *
 * Pixel-to-map affine transforms handed to raster I/O collaborators.
 */

/**
 * Affine geotransform: `[a, b, c, d, e, f]`.
 *
 * Maps pixel (col, row) to map (x, y):
 *   x = a * col + b * row + c
 *   y = d * col + e * row + f
 *
 * Tile transforms are axis-aligned: `[pixelXSize, 0, left, 0, -pixelYSize, top]`.
 */
export type Affine = readonly [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
];

/**
 * Apply a geotransform to a pixel coordinate.
 *
 * @example
 * ```typescript
 * const [x, y] = apply(tile.affine(), 0, 0); // top-left corner of the tile
 * ```
 */
export function apply(
  [a, b, c, d, e, f]: Affine,
  col: number,
  row: number,
): [number, number] {
  return [a * col + b * row + c, d * col + e * row + f];
}
