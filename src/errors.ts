/**
 * @module errors
 *
 * Error kinds thrown by the tile pyramid library.
 *
 * Every operation is a pure function of its inputs, so errors are always
 * thrown synchronously by the call that received the offending value. All
 * classes extend {@link TilePyramidError}, which callers can use to catch
 * any library error at once.
 */

/**
 * Base class of all library errors. Also thrown directly for invalid zoom
 * levels and unknown option values (`onEdgeUse`, `connectedness`,
 * `batchBy`).
 */
export class TilePyramidError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or inconsistent grid definition or pyramid options. */
export class InvalidGridError extends TilePyramidError {}

/** Row or column outside the tile matrix of a zoom level. */
export class TileIndexError extends TilePyramidError {}

/** Point or bounds outside the grid's outer bounds. */
export class PointOutsideGridError extends TilePyramidError {}

/** Geometry kind the tile-selection functions do not support. */
export class GeometryTypeError extends TilePyramidError {}

/** Negative or non-integer pixelbuffer. */
export class PixelbufferError extends TilePyramidError {}
