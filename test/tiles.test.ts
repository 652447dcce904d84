import { describe, it, expect } from 'vitest';
import { TilePyramid } from '../src/pyramid.js';
import {
  clipGeometryToSrsBounds,
  snapBounds,
  tileFromXy,
  tilesFromBounds,
  tilesFromGeom,
} from '../src/tiles.js';
import {
  GeometryTypeError,
  PointOutsideGridError,
  TileIndexError,
  TilePyramidError,
} from '../src/errors.js';
import type { Tile } from '../src/tile.js';
import type { Geometry, OnEdgeUse, Polygon } from '../src/types.js';

const geodetic = new TilePyramid('geodetic');
const idsOf = (tiles: Iterable<Tile>) => [...tiles].map((t) => t.id);

function box(left: number, bottom: number, right: number, top: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [[[left, bottom], [right, bottom], [right, top], [left, top], [left, bottom]]],
  };
}

describe('tilesFromBounds', () => {
  it('should be lazy and restartable', () => {
    const tiles = geodetic.tilesFromBounds([0, 0, 1, 1], 8);
    expect(idsOf(tiles)).toEqual(idsOf(tiles));
    expect(idsOf(tiles).length).toBe(4);
  });

  it('should batch by row', () => {
    const batches = [...geodetic.tilesFromBounds([0, 0, 1, 1], 8, 'row')];
    expect(batches.map(idsOf)).toEqual([
      [[8, 126, 256], [8, 126, 257]],
      [[8, 127, 256], [8, 127, 257]],
    ]);
  });

  it('should batch by column', () => {
    const batches = [...geodetic.tilesFromBounds([0, 0, 1, 1], 8, 'column')];
    expect(batches.map(idsOf)).toEqual([
      [[8, 126, 256], [8, 127, 256]],
      [[8, 126, 257], [8, 127, 257]],
    ]);
  });

  it('should reject unknown batch modes', () => {
    expect(() => geodetic.tilesFromBounds([0, 0, 1, 1], 8, JSON.parse('"diagonal"'))).toThrow(TilePyramidError);
  });

  it('should reject invalid zoom levels at call time', () => {
    expect(() => tilesFromBounds(geodetic, [0, 0, 1, 1], -2)).toThrow(TilePyramidError);
  });

  it('should cover the whole grid', () => {
    expect(idsOf(geodetic.tilesFromBounds([-180, -90, 180, 90], 0))).toEqual([
      [0, 0, 0],
      [0, 0, 1],
    ]);
    expect([...geodetic.tilesFromBounds([-180, -90, 180, 90], 3)].length).toBe(128);
  });

  it('should clamp bounds beyond the top and bottom', () => {
    expect(idsOf(geodetic.tilesFromBounds([1, 50, 2, 120], 1))).toEqual([[1, 0, 2]]);
  });

  it('should select nothing outside the grid', () => {
    expect(idsOf(geodetic.tilesFromBounds([0, 95, 1, 100], 4))).toEqual([]);
    expect(idsOf(geodetic.tilesFromBounds([0, -100, 1, -95], 4))).toEqual([]);
  });

  it('should select nothing for inverted bounds', () => {
    expect(idsOf(geodetic.tilesFromBounds([10, 0, -10, 5], 4))).toEqual([]);
  });

  it('should yield no batches for an empty selection', () => {
    expect([...geodetic.tilesFromBounds([0, 95, 1, 100], 4, 'row')]).toEqual([]);
  });
});

describe('tilesFromBbox', () => {
  it('should select nothing for empty geometries', () => {
    expect([...geodetic.tilesFromBbox({ type: 'LineString', coordinates: [] }, 5)]).toEqual([]);
  });

  it('should select the tile owning a point', () => {
    expect(idsOf(geodetic.tilesFromBbox({ type: 'Point', coordinates: [0, 0] }, 5))).toEqual([[5, 16, 32]]);
  });
});

describe('tilesFromGeom', () => {
  it('should resolve points with the right-bottom edge rule', () => {
    expect(idsOf(geodetic.tilesFromGeom({ type: 'Point', coordinates: [0, 0] }, 5))).toEqual([[5, 16, 32]]);
  });

  it('should batch a single point', () => {
    const batches = [...geodetic.tilesFromGeom({ type: 'Point', coordinates: [0.5, 0.5] }, 5, { batchBy: 'row' })];
    expect(batches.map(idsOf)).toEqual([[[5, 15, 32]]]);
  });

  it('should select nothing for points outside the grid', () => {
    expect([...geodetic.tilesFromGeom({ type: 'Point', coordinates: [0, 95] }, 5)]).toEqual([]);
    expect([...geodetic.tilesFromGeom({ type: 'Point', coordinates: [0, 95] }, 5, { batchBy: 'row' })]).toEqual([]);
    const regional = new TilePyramid({ ...geodetic.grid.toJSON(), isGlobal: false });
    expect([...regional.tilesFromGeom({ type: 'Point', coordinates: [190, 0] }, 5)]).toEqual([]);
  });

  it('should assign points on the bottom grid edge to the last row', () => {
    expect(idsOf(geodetic.tilesFromGeom({ type: 'Point', coordinates: [0, -90] }, 5))).toEqual([[5, 31, 32]]);
  });

  it('should wrap points beyond the antimeridian on global grids', () => {
    expect(idsOf(geodetic.tilesFromGeom({ type: 'Point', coordinates: [190, 0] }, 5))).toEqual([[5, 16, 1]]);
  });

  it('should reject non-finite coordinates', () => {
    expect(() => geodetic.tilesFromGeom({ type: 'Point', coordinates: [Infinity, 0] }, 5)).toThrow(TilePyramidError);
    const line: Geometry = { type: 'LineString', coordinates: [[0, 0], [-Infinity, 10]] };
    expect(() => geodetic.tilesFromGeom(line, 5)).toThrow('bounds (-Infinity, 0, 0, 10) must be finite numbers');
  });

  it('should select each tile of a multipoint once', () => {
    const points: Geometry = { type: 'MultiPoint', coordinates: [[0.1, 0.1], [0.2, 0.2], [10.1, 0.1]] };
    expect(idsOf(geodetic.tilesFromGeom(points, 5))).toEqual([
      [5, 15, 32],
      [5, 15, 33],
    ]);
  });

  it('should select tiles along a line but skip tiles inside its bbox', () => {
    // crosses a 3 x 3 block of candidates from its top left to its bottom right tile
    const line: Geometry = { type: 'LineString', coordinates: [[1, 4], [16, -10]] };
    expect(idsOf(geodetic.tilesFromGeom(line, 5))).toEqual([
      [5, 15, 32],
      [5, 16, 32],
      [5, 16, 33],
      [5, 16, 34],
      [5, 17, 34],
    ]);
  });

  it('should exclude holes in exact mode only', () => {
    // outer ring covers 4 x 2 zoom-2 tiles, the hole is exactly tile (2, 1, 3)
    const polygon: Polygon = {
      type: 'Polygon',
      coordinates: [
        [[-90, -45], [90, -45], [90, 45], [-90, 45], [-90, -45]],
        [[-45, 0], [0, 0], [0, 45], [-45, 45], [-45, 0]],
      ],
    };
    expect([...geodetic.tilesFromGeom(polygon, 2)].length).toBe(8);
    const exact = idsOf(geodetic.tilesFromGeom(polygon, 2, { exact: true }));
    expect(exact.length).toBe(7);
    expect(exact).not.toContainEqual([2, 1, 3]);
  });

  it('should exclude tiles inside a hole in either mode', () => {
    // the hole spans 3 x 3 zoom-4 tiles; only its middle tile is free of the boundary
    const polygon: Polygon = {
      type: 'Polygon',
      coordinates: [
        [[-90, -45], [90, -45], [90, 45], [-90, 45], [-90, -45]],
        [[-22.5, -22.5], [11.25, -22.5], [11.25, 11.25], [-22.5, 11.25], [-22.5, -22.5]],
      ],
    };
    const ids = idsOf(geodetic.tilesFromGeom(polygon, 4));
    expect(ids).not.toContainEqual([4, 8, 15]);
    expect(ids).toContainEqual([4, 7, 15]);
    expect(ids.length).toBe(16 * 8 - 1);
  });

  it('should combine the members of a collection', () => {
    const collection: Geometry = {
      type: 'GeometryCollection',
      geometries: [
        { type: 'Point', coordinates: [0.1, 0.1] },
        box(96, -40.5, 97, -39.5),
      ],
    };
    expect(idsOf(geodetic.tilesFromGeom(collection, 5))).toEqual([[5, 15, 32], [5, 23, 49]]);
  });

  it('should skip empty batches', () => {
    const line: Geometry = { type: 'LineString', coordinates: [[1, 4], [16, -10]] };
    const batches = [...geodetic.tilesFromGeom(line, 5, { batchBy: 'column' })];
    expect(batches.map(idsOf)).toEqual([
      [[5, 15, 32], [5, 16, 32]],
      [[5, 16, 33]],
      [[5, 16, 34], [5, 17, 34]],
    ]);
  });

  it('should select nothing for empty geometries', () => {
    expect([...geodetic.tilesFromGeom({ type: 'Polygon', coordinates: [] }, 5)]).toEqual([]);
    expect([...geodetic.tilesFromGeom({ type: 'GeometryCollection', geometries: [] }, 5)]).toEqual([]);
  });

  it('should reject unsupported geometry kinds', () => {
    const circle = JSON.parse('{"type": "Circle", "coordinates": [0, 0], "radius": 1}');
    expect(() => geodetic.tilesFromGeom(circle, 5)).toThrow(GeometryTypeError);
    expect(() => tilesFromGeom(geodetic, circle, 5)).toThrow("unsupported geometry type 'Circle'");
  });
});

describe('tileFromXy', () => {
  it('should ignore the edge rule inside a tile', () => {
    const edges: OnEdgeUse[] = ['lb', 'rb', 'rt', 'lt'];
    for (const onEdgeUse of edges) {
      expect(tileFromXy(geodetic, 0.5, 0.5, 5, onEdgeUse).id).toEqual([5, 15, 32]);
    }
  });

  it('should pick the tile on the requested side of an edge', () => {
    expect(tileFromXy(geodetic, 0, 0, 5, 'rb').id).toEqual([5, 16, 32]);
    expect(tileFromXy(geodetic, 0, 0, 5, 'lb').id).toEqual([5, 16, 31]);
    expect(tileFromXy(geodetic, 0, 0, 5, 'rt').id).toEqual([5, 15, 32]);
    expect(tileFromXy(geodetic, 0, 0, 5, 'lt').id).toEqual([5, 15, 31]);
  });

  it('should handle the bottom right grid corner', () => {
    expect(() => tileFromXy(geodetic, 180, -90, 5, 'rb')).toThrow(TileIndexError);
    expect(() => tileFromXy(geodetic, 180, -90, 5, 'lb')).toThrow(TileIndexError);
    expect(tileFromXy(geodetic, 180, -90, 5, 'rt').id).toEqual([5, 31, 0]);
    expect(tileFromXy(geodetic, 180, -90, 5, 'lt').id).toEqual([5, 31, 63]);
  });

  it('should handle the top left grid corner', () => {
    expect(() => tileFromXy(geodetic, -180, 90, 5, 'lt')).toThrow(TileIndexError);
    expect(() => tileFromXy(geodetic, -180, 90, 5, 'rt')).toThrow(TileIndexError);
    expect(tileFromXy(geodetic, -180, 90, 5, 'rb').id).toEqual([5, 0, 0]);
    expect(tileFromXy(geodetic, -180, 90, 5, 'lb').id).toEqual([5, 0, 63]);
  });

  it('should reject points outside the grid', () => {
    expect(() => tileFromXy(geodetic, 180.1, 0, 5)).toThrow(PointOutsideGridError);
    expect(() => tileFromXy(geodetic, 0, -90.1, 5)).toThrow(PointOutsideGridError);
    expect(() => tileFromXy(geodetic, NaN, 0, 5)).toThrow(PointOutsideGridError);
  });

  it('should reject unknown edge rules', () => {
    expect(() => tileFromXy(geodetic, 0, 0, 5, JSON.parse('"center"'))).toThrow(TilePyramidError);
  });

  it('should agree with the tile bounds it returns', () => {
    const tile = tileFromXy(geodetic, 12.345, 47.89, 11);
    const { left, bottom, right, top } = tile.bounds();
    expect(12.345).toBeGreaterThanOrEqual(left);
    expect(12.345).toBeLessThan(right);
    expect(47.89).toBeGreaterThan(bottom);
    expect(47.89).toBeLessThanOrEqual(top);
  });
});

describe('snapBounds', () => {
  it('should extend bounds to tile edges', () => {
    expect(snapBounds([0, 1, 2, 3], geodetic, 8)).toEqual({
      left: 0,
      bottom: 0.703125,
      right: 2.109375,
      top: 3.515625,
    });
  });

  it('should be idempotent without a buffer', () => {
    const snapped = snapBounds([0, 1, 2, 3], geodetic, 8);
    expect(snapBounds(snapped, geodetic, 8)).toEqual(snapped);
  });

  it('should equal the union of the selected tiles', () => {
    const tiles = [...geodetic.tilesFromBounds([0, 1, 2, 3], 8)];
    const snapped = snapBounds([0, 1, 2, 3], geodetic, 8);
    expect(Math.min(...tiles.map((t) => t.left))).toBe(snapped.left);
    expect(Math.min(...tiles.map((t) => t.bottom))).toBe(snapped.bottom);
    expect(Math.max(...tiles.map((t) => t.right))).toBe(snapped.right);
    expect(Math.max(...tiles.map((t) => t.top))).toBe(snapped.top);
  });

  it('should add a pixel buffer', () => {
    expect(snapBounds([0, 1, 2, 3], geodetic, 8, 1)).toEqual({
      left: -0.00274658203125,
      bottom: 0.70037841796875,
      right: 2.11212158203125,
      top: 3.51837158203125,
    });
  });

  it('should clamp bounds to the grid', () => {
    expect(snapBounds([170, 80, 200, 100], geodetic, 2)).toEqual({
      left: 135,
      bottom: 45,
      right: 180,
      top: 90,
    });
  });

  it('should reject bounds outside the grid', () => {
    expect(() => snapBounds([0, 95, 1, 100], geodetic, 8)).toThrow(PointOutsideGridError);
  });
});

describe('clipGeometryToSrsBounds', () => {
  it('should return geometries inside the grid unchanged', () => {
    const inside = box(0, 0, 10, 10);
    expect(clipGeometryToSrsBounds(inside, geodetic)).toBe(inside);
    expect(clipGeometryToSrsBounds(inside, geodetic, { multipart: true })).toEqual([inside]);
  });

  it('should be available on the pyramid', () => {
    const inside = box(0, 0, 10, 10);
    expect(geodetic.clipGeometryToSrsBounds(inside)).toBe(inside);
  });

  it('should reject unsupported geometry kinds', () => {
    expect(() => clipGeometryToSrsBounds(JSON.parse('{"type": "Curve"}'), geodetic)).toThrow(GeometryTypeError);
  });
});
