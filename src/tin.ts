import Delaunator from 'delaunator';
import type { Point2D, Point3D } from './types';
import { InsufficientDataError } from './errors';
import { boundsOf, withinBounds, type Bounds } from './geometry';

/** Barycentric weights may dip this far below zero on an edge. */
const EDGE_TOLERANCE = 1e-6;

export interface TIN {
  points: Point3D[];
  triangles: Uint32Array;
  /** Convex hull, as indices into points */
  hull: Uint32Array;
  /** Plan bounds of each triangle, in triangle order */
  bounds: Bounds[];
}

/**
 * Delaunay triangulation of the points in plan. Throws when the points cannot
 * span a surface: fewer than three, or all on one line.
 */
export function buildTIN(points: Point3D[]): TIN {
  if (points.length < 3) {
    throw new InsufficientDataError(`Need at least 3 elevation samples, got ${points.length}`);
  }

  const coords = points.flatMap(p => [p.x, p.y]);
  const { triangles, hull } = new Delaunator(coords);
  if (triangles.length === 0) {
    throw new InsufficientDataError('Elevation samples are collinear; no surface can be interpolated');
  }

  const bounds: Bounds[] = [];
  for (let i = 0; i < triangles.length; i += 3) {
    bounds.push(boundsOf([points[triangles[i]], points[triangles[i + 1]], points[triangles[i + 2]]]));
  }

  return { points, triangles, hull, bounds };
}

/**
 * Linear interpolation on the TIN at (x, y), or null outside the convex hull.
 * The first triangle containing the point wins, so nodes on shared edges
 * resolve the same way every time.
 */
export function terrainHeight(x: number, y: number, tin: TIN): number | null {
  const { points, triangles, bounds } = tin;
  const p = { x, y };
  for (let t = 0; t < bounds.length; t++) {
    if (!withinBounds(p, bounds[t], 1e-9)) continue;

    const z = planeHeight(
      p,
      points[triangles[3 * t]],
      points[triangles[3 * t + 1]],
      points[triangles[3 * t + 2]]
    );
    if (z !== null) return z;
  }
  return null;
}

/**
 * Height at p on the plane through triangle abc, weighting each corner by the
 * signed area of the sub-triangle opposite it. Null when p is outside abc or
 * the triangle is degenerate.
 */
function planeHeight(
  p: Point2D,
  a: Point3D,
  b: Point3D,
  c: Point3D
): number | null {
  const area = (b.x - a.x) * (c.y - a.y) - (c.x - a.x) * (b.y - a.y);
  if (Math.abs(area) < 1e-12) return null;

  const wa = ((b.x - p.x) * (c.y - p.y) - (c.x - p.x) * (b.y - p.y)) / area;
  const wb = ((c.x - p.x) * (a.y - p.y) - (a.x - p.x) * (c.y - p.y)) / area;
  const wc = 1 - wa - wb;
  if (wa < -EDGE_TOLERANCE || wb < -EDGE_TOLERANCE || wc < -EDGE_TOLERANCE) return null;

  return wa * a.z + wb * b.z + wc * c.z;
}
