import { describe, it, expect } from 'vitest';
import {
  clipGeometry,
  splitAtGridBounds,
  translateGeometry,
  wrapAcrossGridEdges,
} from '../../src/geometry/clip.js';
import { geometryBounds } from '../../src/geometry/bounds.js';
import type { Bounds, Geometry, Polygon } from '../../src/types.js';

const clip: Bounds = { left: 0, bottom: 0, right: 20, top: 20 };

function box(left: number, bottom: number, right: number, top: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [[[left, bottom], [right, bottom], [right, top], [left, top], [left, bottom]]],
  };
}

describe('clipGeometry', () => {
  // ─── Trivial cases ────────────────────────────────────────────────────

  it('should return geometries inside the rectangle unchanged', () => {
    const inside = box(1, 1, 5, 5);
    expect(clipGeometry(inside, clip)).toBe(inside);
  });

  it('should return null for geometries outside the rectangle', () => {
    expect(clipGeometry(box(30, 30, 40, 40), clip)).toBeNull();
    expect(clipGeometry({ type: 'Point', coordinates: [-1, 5] }, clip)).toBeNull();
  });

  it('should return null for empty geometries', () => {
    expect(clipGeometry({ type: 'MultiPolygon', coordinates: [] }, clip)).toBeNull();
  });

  // ─── Points ───────────────────────────────────────────────────────────

  it('should keep points on the boundary', () => {
    const point: Geometry = { type: 'Point', coordinates: [20, 20] };
    expect(clipGeometry(point, clip)).toBe(point);
  });

  it('should filter multipoint members', () => {
    const points: Geometry = { type: 'MultiPoint', coordinates: [[-5, 5], [5, 5], [25, 5]] };
    expect(clipGeometry(points, clip)).toEqual({ type: 'MultiPoint', coordinates: [[5, 5]] });
  });

  // ─── Lines ────────────────────────────────────────────────────────────

  it('should cut a line entering the rectangle', () => {
    const line: Geometry = { type: 'LineString', coordinates: [[-10, 5], [10, 5]] };
    expect(clipGeometry(line, clip)).toEqual({ type: 'LineString', coordinates: [[0, 5], [10, 5]] });
  });

  it('should split a line leaving and re-entering the rectangle', () => {
    const line: Geometry = { type: 'LineString', coordinates: [[5, 5], [25, 5], [25, 10], [5, 10]] };
    expect(clipGeometry(line, clip)).toEqual({
      type: 'MultiLineString',
      coordinates: [
        [[5, 5], [20, 5]],
        [[20, 10], [5, 10]],
      ],
    });
  });

  it('should drop multiline members outside the rectangle', () => {
    const lines: Geometry = {
      type: 'MultiLineString',
      coordinates: [
        [[30, 5], [40, 5]],
        [[-10, 5], [10, 5]],
      ],
    };
    expect(clipGeometry(lines, clip)).toEqual({ type: 'LineString', coordinates: [[0, 5], [10, 5]] });
  });

  // ─── Polygons ─────────────────────────────────────────────────────────

  it('should clip a polygon to a closed ring', () => {
    expect(clipGeometry(box(-5, -5, 5, 5), clip)).toEqual({
      type: 'Polygon',
      coordinates: [[[0, 0], [5, 0], [5, 5], [0, 5], [0, 0]]],
    });
  });

  it('should drop holes clipped away and keep the exterior', () => {
    const polygon: Polygon = {
      type: 'Polygon',
      coordinates: [
        [[-5, -5], [5, -5], [5, 5], [-5, 5], [-5, -5]],
        [[-4, -4], [-2, -4], [-2, -2], [-4, -2], [-4, -4]],
      ],
    };
    const clipped = clipGeometry(polygon, clip);
    expect(clipped?.type).toBe('Polygon');
    expect(clipped?.type === 'Polygon' && clipped.coordinates.length).toBe(1);
  });

  it('should drop multipolygon members outside the rectangle', () => {
    const polygons: Geometry = {
      type: 'MultiPolygon',
      coordinates: [box(30, 30, 40, 40).coordinates, box(1, 1, 2, 2).coordinates],
    };
    expect(clipGeometry(polygons, clip)).toEqual({
      type: 'MultiPolygon',
      coordinates: [box(1, 1, 2, 2).coordinates],
    });
  });

  it('should clip collection members', () => {
    const collection: Geometry = {
      type: 'GeometryCollection',
      geometries: [{ type: 'Point', coordinates: [50, 50] }, box(-5, -5, 5, 5)],
    };
    const clipped = clipGeometry(collection, clip);
    expect(clipped?.type).toBe('GeometryCollection');
    expect(clipped && geometryBounds(clipped)).toEqual({ left: 0, bottom: 0, right: 5, top: 5 });
  });
});

describe('translateGeometry', () => {
  it('should shift every position horizontally', () => {
    expect(translateGeometry(box(0, 0, 1, 1), 360)).toEqual(box(360, 0, 361, 1));
    expect(translateGeometry({ type: 'Point', coordinates: [1, 2, 3] }, -10)).toEqual({
      type: 'Point',
      coordinates: [-9, 2, 3],
    });
  });

  it('should shift collection members', () => {
    const shifted = translateGeometry(
      { type: 'GeometryCollection', geometries: [{ type: 'MultiPoint', coordinates: [[1, 1], [2, 2]] }] },
      5,
    );
    expect(shifted).toEqual({
      type: 'GeometryCollection',
      geometries: [{ type: 'MultiPoint', coordinates: [[6, 1], [7, 2]] }],
    });
  });
});

describe('splitAtGridBounds', () => {
  const global = { bounds: { left: -180, bottom: -90, right: 180, top: 90 }, isGlobal: true };
  const regional = { bounds: { left: 0, bottom: 0, right: 20, top: 20 }, isGlobal: false };

  it('should keep geometries inside the grid as the only piece', () => {
    const inside = box(0, 0, 10, 10);
    expect(splitAtGridBounds(inside, global)).toEqual([inside]);
  });

  it('should cut geometries on regional grids', () => {
    const pieces = splitAtGridBounds(box(-5, -5, 5, 5), regional);
    expect(pieces.length).toBe(1);
    expect(geometryBounds(pieces[0])).toEqual({ left: 0, bottom: 0, right: 5, top: 5 });
  });

  it('should wrap parts beyond the antimeridian on global grids', () => {
    const pieces = splitAtGridBounds(box(-183.125, 67.5, 183.125, 73.125), global);
    expect(pieces.map(geometryBounds)).toEqual([
      { left: -180, bottom: 67.5, right: 180, top: 73.125 },
      { left: 176.875, bottom: 67.5, right: 180, top: 73.125 },
      { left: -180, bottom: 67.5, right: -176.875, top: 73.125 },
    ]);
  });

  it('should drop parts beyond the poles', () => {
    const pieces = splitAtGridBounds(box(10, 80, 20, 100), global);
    expect(pieces.map(geometryBounds)).toEqual([{ left: 10, bottom: 80, right: 20, top: 90 }]);
  });

  it('should return no pieces for empty geometries', () => {
    expect(splitAtGridBounds({ type: 'LineString', coordinates: [] }, global)).toEqual([]);
  });
});

describe('wrapAcrossGridEdges', () => {
  const global = { bounds: { left: -180, bottom: -90, right: 180, top: 90 }, isGlobal: true };
  const regional = { bounds: { left: 0, bottom: 0, right: 20, top: 20 }, isGlobal: false };

  it('should return geometries inside the grid alone', () => {
    const inside = box(0, 0, 10, 10);
    expect(wrapAcrossGridEdges(inside, global)).toEqual([inside]);
  });

  it('should add a shifted copy for each grid edge crossed', () => {
    const wide = box(-190, 0, 185, 10);
    expect(wrapAcrossGridEdges(wide, global)).toEqual([
      wide,
      box(170, 0, 545, 10),
      box(-550, 0, -175, 10),
    ]);
  });

  it('should not cut the geometry at the antimeridian', () => {
    const copies = wrapAcrossGridEdges(box(170, -10, 190, 10), global);
    expect(copies.map(geometryBounds)).toEqual([
      { left: 170, bottom: -10, right: 190, top: 10 },
      { left: -190, bottom: -10, right: -170, top: 10 },
    ]);
  });

  it('should not copy on regional grids', () => {
    const crossing = box(-5, -5, 5, 5);
    expect(wrapAcrossGridEdges(crossing, regional)).toEqual([crossing]);
  });

  it('should return nothing for empty geometries', () => {
    expect(wrapAcrossGridEdges({ type: 'MultiPoint', coordinates: [] }, global)).toEqual([]);
  });
});
