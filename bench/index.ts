/**
 * Performance benchmarks for tile-pyramid.
 *
 * These benchmarks exercise tile lookup, tile selection and geometry
 * splitting, measuring throughput in operations/sec.
 *
 * Run: npm run bench
 */

import { TilePyramid } from '../src/pyramid.js';
import type { Bounds, LineString, Polygon } from '../src/types.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

function count(tiles: Iterable<unknown>): number {
  const iterator = tiles[Symbol.iterator]();
  let n = 0;
  while (!iterator.next().done) n++;
  return n;
}

// ─── Synthetic data generators ──────────────────────────────────────────────

function generatePolygon(bounds: Bounds, vertices: number): Polygon {
  const cx = (bounds.left + bounds.right) / 2;
  const cy = (bounds.bottom + bounds.top) / 2;
  const rx = (bounds.right - bounds.left) / 2;
  const ry = (bounds.top - bounds.bottom) / 2;

  const ring: number[][] = [];
  for (let j = 0; j < vertices; j++) {
    const angle = (j / vertices) * Math.PI * 2;
    const jitter = 1 - Math.random() * 0.3;
    ring.push([cx + Math.cos(angle) * rx * jitter, cy + Math.sin(angle) * ry * jitter]);
  }
  // Close the ring
  ring.push([...ring[0]]);
  return { type: 'Polygon', coordinates: [ring] };
}

function generateLine(bounds: Bounds, points: number): LineString {
  const coordinates: number[][] = [];
  const dx = (bounds.right - bounds.left) / points;
  for (let j = 0; j < points; j++) {
    const y = bounds.bottom + Math.random() * (bounds.top - bounds.bottom);
    coordinates.push([bounds.left + j * dx, y]);
  }
  return { type: 'LineString', coordinates };
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchTileLookup() {
  console.log('\n── Tile lookup ──');

  const pyramid = new TilePyramid('geodetic');
  const points = Array.from({ length: 1000 }, () => [
    -180 + Math.random() * 360,
    -90 + Math.random() * 180,
  ]);

  bench('1,000 points → tile at zoom 12', () => {
    for (const [x, y] of points) pyramid.tileFromXy(x, y, 12);
  }, 1000);

  bench('1,000 tile bounds at zoom 12', () => {
    for (let col = 0; col < 1000; col++) pyramid.tileBounds(12, 1000, col, 8);
  }, 1000);
}

function benchTilesFromBounds() {
  console.log('\n── Tiles from bounds ──');

  const pyramid = new TilePyramid('geodetic');
  const mercator = new TilePyramid('mercator', { metatiling: 4 });

  for (const zoom of [6, 9, 12]) {
    const tiles = count(pyramid.tilesFromBounds([0, 40, 10, 50], zoom));
    bench(`${fmt(tiles, 0)} tiles (geodetic z${zoom})`, () => {
      count(pyramid.tilesFromBounds([0, 40, 10, 50], zoom));
    }, zoom === 12 ? 10 : 1000);
  }

  bench('antimeridian crossing (geodetic z8)', () => {
    count(pyramid.tilesFromBounds([170, -10, 190, 10], 8));
  }, 1000);

  bench('batched by row (mercator mt4 z10)', () => {
    count(mercator.tilesFromBounds(mercator.grid.bounds, 10, 'row'));
  }, 100);
}

function benchTilesFromGeom() {
  console.log('\n── Tiles from geometry ──');

  const pyramid = new TilePyramid('geodetic');
  const region = { left: 5, bottom: 45, right: 15, top: 55 };

  for (const vertices of [20, 200]) {
    const polygon = generatePolygon(region, vertices);
    bench(`${vertices}-vertex polygon (z8)`, () => count(pyramid.tilesFromGeom(polygon, 8)), 100);
    bench(`${vertices}-vertex polygon, exact (z8)`, () => {
      count(pyramid.tilesFromGeom(polygon, 8, { exact: true }));
    }, 100);
  }

  const line = generateLine(region, 100);
  bench('100-point linestring (z10)', () => count(pyramid.tilesFromGeom(line, 10)), 100);
}

function benchClipping() {
  console.log('\n── Clipping to grid bounds ──');

  const pyramid = new TilePyramid('geodetic');
  const inside = generatePolygon({ left: -10, bottom: -10, right: 10, top: 10 }, 100);
  const crossing = generatePolygon({ left: 160, bottom: -10, right: 200, top: 10 }, 100);

  bench('100-vertex polygon inside the grid', () => {
    pyramid.clipGeometryToSrsBounds(inside, { multipart: true });
  }, 10000);
  bench('100-vertex polygon across the antimeridian', () => {
    pyramid.clipGeometryToSrsBounds(crossing, { multipart: true });
  }, 10000);
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  tile-pyramid Performance Benchmarks                               ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchTileLookup();
benchTilesFromBounds();
benchTilesFromGeom();
benchClipping();

console.log('\nDone.');
