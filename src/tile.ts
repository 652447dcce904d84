/**
 * @module tile
 *
 * A single tile of a {@link TilePyramid}.
 *
 * Tiles are small value objects: a reference to their pyramid and a
 * `(zoom, row, col)` index. Every geometric property is computed from the
 * pyramid on access, and two tiles with equal pyramids and indices are
 * interchangeable.
 *
 * @example
 * ```typescript
 * const tile = new TilePyramid('geodetic').tile(8, 126, 256);
 * tile.bounds();          // => { left: 0, bottom: 0.703125, right: 0.703125, top: 1.40625 }
 * tile.getParent()?.id;   // => [7, 63, 128]
 * const [zoom, row, col] = tile;
 * ```
 */

import type { Affine } from './affine.js';
import { TilePyramidError } from './errors.js';
import type { TilePyramid } from './pyramid.js';
import type { Bounds, Connectedness, Polygon, Shape, TileIndex } from './types.js';

// Neighbor offsets as [row, col], clockwise from above, then the diagonals.
const DIRECT_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, 1],
  [1, 0],
  [0, -1],
];
const DIAGONAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, 1],
  [1, 1],
  [1, -1],
  [-1, -1],
];
// Children as [row, col] offsets: top left, top right, bottom right, bottom left.
const CHILD_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0],
  [0, 1],
  [1, 1],
  [1, 0],
];

/**
 * Tile of a pyramid at `(zoom, row, col)`.
 *
 * The constructor does not validate the index; use `TilePyramid.tile()` for
 * validated tiles, or {@link Tile.isValid} to check one.
 */
export class Tile implements Iterable<number> {
  readonly pyramid: TilePyramid;
  readonly zoom: number;
  readonly row: number;
  readonly col: number;

  constructor(pyramid: TilePyramid, zoom: number, row: number, col: number) {
    this.pyramid = pyramid;
    this.zoom = zoom;
    this.row = row;
    this.col = col;
  }

  /** `[zoom, row, col]` */
  get id(): TileIndex {
    return [this.zoom, this.row, this.col];
  }

  /** String identity including the pyramid; usable as a `Map` key. */
  get key(): string {
    return `${this.zoom}/${this.row}/${this.col}@${this.pyramid.key}`;
  }

  get left(): number {
    return this.bounds().left;
  }

  get bottom(): number {
    return this.bounds().bottom;
  }

  get right(): number {
    return this.bounds().right;
  }

  get top(): number {
    return this.bounds().top;
  }

  /** Width in map units, after clipping to the grid. */
  get xSize(): number {
    const { left, right } = this.bounds();
    return right - left;
  }

  /** Height in map units, after clipping to the grid. */
  get ySize(): number {
    const { bottom, top } = this.bounds();
    return top - bottom;
  }

  /** Width in pixels. */
  get width(): number {
    return this.shape().width;
  }

  /** Height in pixels. */
  get height(): number {
    return this.shape().height;
  }

  get pixelXSize(): number {
    return this.pyramid.pixelXSize(this.zoom);
  }

  get pixelYSize(): number {
    return this.pyramid.pixelYSize(this.zoom);
  }

  bounds(pixelbuffer = 0): Bounds {
    return this.pyramid.tileBounds(this.zoom, this.row, this.col, pixelbuffer);
  }

  bbox(pixelbuffer = 0): Polygon {
    return this.pyramid.tileBbox(this.zoom, this.row, this.col, pixelbuffer);
  }

  affine(pixelbuffer = 0): Affine {
    return this.pyramid.tileAffine(this.zoom, this.row, this.col, pixelbuffer);
  }

  shape(pixelbuffer = 0): Shape {
    return this.pyramid.tileShape(this.zoom, this.row, this.col, pixelbuffer);
  }

  /** Whether the index addresses a tile of the pyramid. */
  isValid(): boolean {
    return this.pyramid.isValidIndex(this.zoom, this.row, this.col);
  }

  /** The tile one zoom level up containing this one, `null` at zoom 0. */
  getParent(): Tile | null {
    if (this.zoom === 0) return null;
    return this.pyramid.tile(this.zoom - 1, this.row >> 1, this.col >> 1);
  }

  /**
   * Tiles one zoom level down covering this one: top left, top right,
   * bottom right, bottom left. Children beyond a clipped matrix edge are
   * omitted.
   */
  getChildren(): Tile[] {
    const zoom = this.zoom + 1;
    const children: Tile[] = [];
    for (const [rowOffset, colOffset] of CHILD_OFFSETS) {
      const row = this.row * 2 + rowOffset;
      const col = this.col * 2 + colOffset;
      if (this.pyramid.isValidIndex(zoom, row, col)) {
        children.push(this.pyramid.tile(zoom, row, col));
      }
    }
    return children;
  }

  /**
   * Adjacent tiles at the same zoom level.
   *
   * ```
   * -------------
   * | 8 | 1 | 5 |
   * -------------
   * | 4 | x | 2 |
   * -------------
   * | 7 | 3 | 6 |
   * -------------
   * ```
   *
   * Columns wrap around the antimeridian on global grids; rows beyond the
   * top or bottom are omitted. Wrapping can make several offsets point at
   * the same tile, which is then returned once at its first position, and
   * never the tile itself.
   *
   * @param connectedness - 4 for direct neighbors only, 8 to add diagonals.
   * @throws {@link TilePyramidError} for other connectedness values.
   */
  getNeighbors(connectedness: Connectedness = 8): Tile[] {
    if (connectedness !== 4 && connectedness !== 8) {
      throw new TilePyramidError(`connectedness must be 4 or 8, got ${connectedness}`);
    }
    const offsets = connectedness === 8
      ? [...DIRECT_OFFSETS, ...DIAGONAL_OFFSETS]
      : DIRECT_OFFSETS;
    const matrixWidth = this.pyramid.matrixWidth(this.zoom);
    const matrixHeight = this.pyramid.matrixHeight(this.zoom);

    const neighbors = new Map<string, Tile>();
    for (const [rowOffset, colOffset] of offsets) {
      const row = this.row + rowOffset;
      let col = this.col + colOffset;
      if (row < 0 || row >= matrixHeight) continue;
      if (col < 0 || col >= matrixWidth) {
        if (!this.pyramid.isGlobal) continue;
        col = (col + matrixWidth) % matrixWidth;
      }
      if (row === this.row && col === this.col) continue;
      const key = `${row}/${col}`;
      if (!neighbors.has(key)) neighbors.set(key, this.pyramid.tile(this.zoom, row, col));
    }
    return [...neighbors.values()];
  }

  /**
   * Tiles of another pyramid overlapping this one with nonzero area; see
   * `TilePyramid.intersecting`.
   */
  intersecting(pyramid: TilePyramid): Tile[] {
    return pyramid.intersecting(this);
  }

  /** Equal pyramids and equal indices. */
  equals(other: Tile): boolean {
    return (
      this.zoom === other.zoom &&
      this.row === other.row &&
      this.col === other.col &&
      this.pyramid.equals(other.pyramid)
    );
  }

  *[Symbol.iterator](): Iterator<number> {
    yield this.zoom;
    yield this.row;
    yield this.col;
  }

  toString(): string {
    return `Tile(${this.zoom}, ${this.row}, ${this.col}, ${this.pyramid})`;
  }
}

/**
 * Order tiles by zoom, then row, then column. Suitable for `Array.sort`.
 */
export function compareTiles(a: Tile, b: Tile): number {
  return a.zoom - b.zoom || a.row - b.row || a.col - b.col;
}
