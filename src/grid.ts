/**
 * @module grid
 *
 * The source grid of a tile pyramid: tile counts at zoom 0, outer bounds,
 * reference system and antimeridian behavior.
 *
 * A {@link GridDefinition} is pure data plus validation. It is immutable and
 * compared by value, so two pyramids built from a preset name and from the
 * equivalent explicit definition share equal grids.
 */

import proj4 from 'proj4';

import { InvalidGridError } from './errors.js';
import { PRESET_GRIDS, isPresetName } from './grids.js';
import type { CrsIdentity, GridDefinitionInput, GridPresetName } from './grids.js';
import { SHAPE_RATIO_TOLERANCE } from './options.js';
import type { Bounds, Shape } from './types.js';

/** Anything a grid can be built from. */
export type GridLike = GridDefinition | GridDefinitionInput | GridPresetName;

/**
 * Immutable description of a tile pyramid's source grid.
 *
 * @example
 * ```typescript
 * const grid = new GridDefinition({
 *   shape: { width: 1, height: 1 },
 *   bounds: { left: 2426378.0132, bottom: 1528101.2618, right: 6293974.6215, top: 5395697.8701 },
 *   epsg: 3035,
 * });
 * grid.isGlobal; // => false
 * ```
 */
export class GridDefinition {
  /** `"custom"` for explicit definitions, otherwise the preset name. */
  readonly type: GridPresetName | 'custom';
  readonly shape: Shape;
  readonly bounds: Bounds;
  readonly isGlobal: boolean;
  readonly crs: CrsIdentity;

  /**
   * @throws {@link InvalidGridError} for unknown presets and definitions
   *   failing {@link GridDefinition.validate}.
   */
  constructor(definition: GridLike) {
    let input: GridDefinitionInput;
    if (typeof definition === 'string') {
      if (!isPresetName(definition)) {
        throw new InvalidGridError(
          `unknown grid preset '${definition}', use one of ${Object.keys(PRESET_GRIDS).join(', ')}`,
        );
      }
      this.type = definition;
      input = PRESET_GRIDS[definition];
    } else if (definition instanceof GridDefinition) {
      this.type = definition.type;
      input = definition.toJSON();
    } else {
      this.type = 'custom';
      input = definition;
    }

    this.shape = Object.freeze({ width: input.shape.width, height: input.shape.height });
    this.bounds = Object.freeze({
      left: input.bounds.left,
      bottom: input.bounds.bottom,
      right: input.bounds.right,
      top: input.bounds.top,
    });
    this.isGlobal = input.isGlobal ?? false;
    this.crs = Object.freeze(normalizeCrs(input));
    this.validate();
  }

  /** Return `definition` if it already is a grid, otherwise build one. */
  static from(definition: GridLike): GridDefinition {
    return definition instanceof GridDefinition ? definition : new GridDefinition(definition);
  }

  get left(): number {
    return this.bounds.left;
  }

  get bottom(): number {
    return this.bounds.bottom;
  }

  get right(): number {
    return this.bounds.right;
  }

  get top(): number {
    return this.bounds.top;
  }

  /** Horizontal extent in reference-system units. */
  get xSize(): number {
    return this.bounds.right - this.bounds.left;
  }

  /** Vertical extent in reference-system units. */
  get ySize(): number {
    return this.bounds.top - this.bounds.bottom;
  }

  /**
   * Check shape, bounds and reference system.
   *
   * The shape's width/height ratio must match the bounds' ratio, otherwise
   * tiles would not be square in map units. The error message proposes
   * bounds that would satisfy the check.
   *
   * @throws {@link InvalidGridError}
   */
  validate(): void {
    const { width, height } = this.shape;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new InvalidGridError(
        `grid shape must be positive integers, got ${width} x ${height}`,
      );
    }

    const { left, bottom, right, top } = this.bounds;
    if (![left, bottom, right, top].every(Number.isFinite)) {
      throw new InvalidGridError(`grid bounds must be finite, got ${formatBounds(this.bounds)}`);
    }
    if (left >= right || bottom >= top) {
      throw new InvalidGridError(
        `grid bounds must satisfy left < right and bottom < top, got ${formatBounds(this.bounds)}`,
      );
    }

    const shapeRatio = width / height;
    const boundsRatio = (right - left) / (top - bottom);
    if (Math.abs(shapeRatio - boundsRatio) / Math.max(shapeRatio, boundsRatio) > SHAPE_RATIO_TOLERANCE) {
      const minLength = Math.min((right - left) / width, (top - bottom) / height);
      const proposed: Bounds = {
        left,
        bottom,
        right: left + width * minLength,
        top: bottom + height * minLength,
      };
      throw new InvalidGridError(
        `shape ratio (${shapeRatio}) must equal bounds ratio (${boundsRatio}); try ${formatBounds(proposed)}`,
      );
    }
  }

  /** Structural equality over shape, bounds, global flag and reference system. */
  equals(other: GridDefinition): boolean {
    return this === other || this.key === other.key;
  }

  /** Structural hash string; equal grids have equal keys. */
  get key(): string {
    const { width, height } = this.shape;
    const crs = this.crs.epsg !== undefined ? `epsg:${this.crs.epsg}` : `proj:${this.crs.proj}`;
    return `${width}x${height}|${formatBounds(this.bounds)}|${this.isGlobal ? 'global' : 'regional'}|${crs}`;
  }

  /** Plain-object definition that rebuilds an equal grid. */
  toJSON(): GridDefinitionInput {
    const base = {
      shape: { width: this.shape.width, height: this.shape.height },
      bounds: { ...this.bounds },
      isGlobal: this.isGlobal,
    };
    const crs = this.crs;
    return crs.epsg !== undefined ? { ...base, epsg: crs.epsg } : { ...base, proj: crs.proj };
  }

  toString(): string {
    return `GridDefinition(${this.type}, ${this.key})`;
  }
}

// ─── Internals ──────────────────────────────────────────────────────────────

function formatBounds({ left, bottom, right, top }: Bounds): string {
  return `(${left}, ${bottom}, ${right}, ${top})`;
}

/**
 * Reduce the input to exactly one reference-system identity. Proj strings
 * are whitespace-normalized and must be parsable by proj4.
 */
function normalizeCrs(input: GridDefinitionInput): CrsIdentity {
  const { epsg, proj } = input;
  if (epsg !== undefined && proj !== undefined) {
    throw new InvalidGridError("either 'epsg' or 'proj' is allowed, not both");
  }
  if (epsg !== undefined) {
    if (!Number.isInteger(epsg) || epsg <= 0) {
      throw new InvalidGridError(`epsg must be a positive integer, got ${epsg}`);
    }
    return { epsg };
  }
  if (proj !== undefined) {
    const normalized = proj.trim().split(/\s+/).join(' ');
    try {
      proj4('EPSG:4326', normalized);
    } catch (cause) {
      throw new InvalidGridError(`invalid projection definition '${normalized}'`, { cause });
    }
    return { proj: normalized };
  }
  throw new InvalidGridError("either 'epsg' or 'proj' is required");
}
