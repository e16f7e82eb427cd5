import type { Point2D } from './types';
import type { GradingConfig } from './config';
import { pointInPolygon, distanceToPolygon } from './geometry';

export interface DesignSurface {
  padElevationFt: number;
  padOutline?: readonly Point2D[];
  /** Grade falling away from the pad edge, percent */
  sideSlopePercent: number;
}

export function designSurfaceFromConfig(config: GradingConfig): DesignSurface | null {
  if (config.targetElevationFt === undefined) return null;
  return {
    padElevationFt: config.targetElevationFt,
    padOutline: config.padOutline,
    sideSlopePercent: config.defaultSlopePercent,
  };
}

/**
 * Proposed grade at (x, y). Inside the pad (or everywhere, when there is no
 * outline) the surface sits at pad elevation; outside it descends from the
 * nearest pad edge.
 */
export function designHeight(x: number, y: number, surface: DesignSurface): number {
  const { padOutline, padElevationFt, sideSlopePercent } = surface;
  if (!padOutline) return padElevationFt;

  const p: Point2D = { x, y };
  if (pointInPolygon(p, padOutline)) {
    return padElevationFt;
  }

  const dist = distanceToPolygon(p, padOutline);
  return padElevationFt - dist * sideSlopePercent / 100;
}
