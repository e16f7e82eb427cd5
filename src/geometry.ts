import type { Point2D } from './types';
import type { HaulDistanceMetric } from './config';

/** Closing edges of a polygon, last vertex back to the first. */
function* edges(polygon: readonly Point2D[]): Generator<[Point2D, Point2D]> {
  for (let i = 0; i < polygon.length; i++) {
    yield [polygon[i], polygon[(i + 1) % polygon.length]];
  }
}

/**
 * Even-odd test: counts edges that straddle p's row and cross it to the right
 * of p. Points exactly on an edge may land either side.
 */
export function pointInPolygon(p: Point2D, polygon: readonly Point2D[]): boolean {
  let crossings = 0;
  for (const [a, b] of edges(polygon)) {
    if ((a.y > p.y) === (b.y > p.y)) continue;
    const xAtRow = a.x + (p.y - a.y) * (b.x - a.x) / (b.y - a.y);
    if (xAtRow > p.x) crossings++;
  }
  return crossings % 2 === 1;
}

/** Distance from p to the closest point of segment ab. */
export function distanceToSegment(p: Point2D, a: Point2D, b: Point2D): number {
  const ab = { x: b.x - a.x, y: b.y - a.y };
  const lengthSq = ab.x * ab.x + ab.y * ab.y;
  const along = lengthSq < 1e-12
    ? 0
    : ((p.x - a.x) * ab.x + (p.y - a.y) * ab.y) / lengthSq;
  const t = Math.min(1, Math.max(0, along));
  return Math.hypot(p.x - a.x - t * ab.x, p.y - a.y - t * ab.y);
}

/** Distance from p to the outline of a closed polygon, inside or out. */
export function distanceToPolygon(p: Point2D, polygon: readonly Point2D[]): number {
  let nearest = Infinity;
  for (const [a, b] of edges(polygon)) {
    nearest = Math.min(nearest, distanceToSegment(p, a, b));
  }
  return nearest;
}

export function planDistance(a: Point2D, b: Point2D, metric: HaulDistanceMetric): number {
  if (metric === 'manhattan') {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  }
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function boundsOf(points: readonly Point2D[]): Bounds {
  let minX = Infinity, minY = Infinity;
  let maxX = -Infinity, maxY = -Infinity;

  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }

  return { minX, minY, maxX, maxY };
}

export function withinBounds(p: Point2D, bounds: Bounds, margin = 0): boolean {
  return p.x >= bounds.minX - margin && p.x <= bounds.maxX + margin &&
    p.y >= bounds.minY - margin && p.y <= bounds.maxY + margin;
}
