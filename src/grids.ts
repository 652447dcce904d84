/**
 * @module grids
 *
 * Named grid presets.
 *
 * A preset is only a shorthand for a particular {@link GridDefinitionInput};
 * `new GridDefinition('geodetic')` and `new GridDefinition(PRESET_GRIDS.geodetic)`
 * produce equal grids.
 */

import type { Bounds, Shape } from './types.js';

/**
 * Reference-system identity of a grid: a registry code or a raw projection
 * definition string, never both.
 */
export type CrsIdentity = { epsg: number; proj?: never } | { proj: string; epsg?: never };

/**
 * Plain-object description of a grid, as accepted by `GridDefinition` and
 * returned by `GridDefinition.toJSON()`.
 */
export type GridDefinitionInput = {
  /** Tiles across and down at zoom 0. */
  shape: Shape;
  /** Outer bounds in reference-system units. */
  bounds: Bounds;
  /**
   * Whether the grid spans the full horizontal extent of its reference
   * system, connecting its right edge to its left edge.
   * @defaultValue false
   */
  isGlobal?: boolean;
} & CrsIdentity;

/** Names of the built-in presets. */
export type GridPresetName = 'geodetic' | 'mercator';

const MERCATOR_EXTENT = 20037508.3427892;

/**
 * Built-in grid presets.
 *
 * | Name | Shape | Bounds | CRS |
 * |------|-------|--------|-----|
 * | `geodetic` | 2 × 1 | -180, -90, 180, 90 | EPSG:4326 |
 * | `mercator` | 1 × 1 | ±20037508.3427892 | EPSG:3857 |
 */
export const PRESET_GRIDS: Readonly<Record<GridPresetName, GridDefinitionInput>> = {
  geodetic: {
    shape: { width: 2, height: 1 },
    bounds: { left: -180, bottom: -90, right: 180, top: 90 },
    isGlobal: true,
    epsg: 4326,
  },
  mercator: {
    shape: { width: 1, height: 1 },
    bounds: {
      left: -MERCATOR_EXTENT,
      bottom: -MERCATOR_EXTENT,
      right: MERCATOR_EXTENT,
      top: MERCATOR_EXTENT,
    },
    isGlobal: true,
    epsg: 3857,
  },
};

export function isPresetName(name: string): name is GridPresetName {
  return Object.prototype.hasOwnProperty.call(PRESET_GRIDS, name);
}
