import type {
  CellKey,
  ErosionRisk,
  GridCell,
  SlopeAnalysis,
  SlopeClass,
  SlopeSegment,
  SlopeSurface,
  TerrainGrid,
} from './types';
import type { GradingConfig } from './config';
import { cellAt } from './grid';
import { logger } from './logger';

export type SlopeThresholds = Pick<
  GradingConfig,
  'minSlopePercent' | 'gentleSlopePercent' | 'moderateSlopePercent' | 'maxSlopePercent'
>;

// Forward neighbours only, so each pair is visited once.
const FORWARD_4: readonly [number, number][] = [[0, 1], [1, 0]];
const FORWARD_8: readonly [number, number][] = [[0, 1], [1, -1], [1, 0], [1, 1]];

export function classifySlope(slopePercent: number, t: SlopeThresholds): SlopeClass {
  if (slopePercent < t.minSlopePercent) return 'flat';
  if (slopePercent < t.gentleSlopePercent) return 'gentle';
  if (slopePercent < t.moderateSlopePercent) return 'moderate';
  if (slopePercent <= t.maxSlopePercent) return 'steep';
  return 'excessive';
}

export function erosionRisk(slopePercent: number, t: SlopeThresholds): ErosionRisk {
  if (slopePercent > t.maxSlopePercent) return 'high';
  // Near-flat ground ponds
  if (slopePercent < t.minSlopePercent) return 'moderate';
  return 'low';
}

function elevationOn(cell: GridCell, surface: SlopeSurface): number | null {
  return surface === 'current' ? cell.currentElevationFt : cell.targetElevationFt;
}

/**
 * Slope between every pair of adjacent cells that both have an elevation on
 * the given surface.
 */
export function analyzeSlopes(
  grid: TerrainGrid,
  surface: SlopeSurface,
  config: SlopeThresholds & Pick<GradingConfig, 'connectivity'>
): SlopeAnalysis {
  const offsets = config.connectivity === 8 ? FORWARD_8 : FORWARD_4;
  const segments: SlopeSegment[] = [];
  let maxSlopePercent: number | null = null;
  let minSlopePercent: number | null = null;
  let highRiskCount = 0;
  let moderateRiskCount = 0;

  for (const cell of grid.cells) {
    const z1 = elevationOn(cell, surface);
    if (z1 === null) continue;

    for (const [dr, dc] of offsets) {
      const neighbour = cellAt(grid, cell.row + dr, cell.col + dc);
      if (!neighbour) continue;
      const z2 = elevationOn(neighbour, surface);
      if (z2 === null) continue;

      const deltaElevationFt = z2 - z1;
      const horizontalDistanceFt = grid.cellSizeFt * Math.hypot(dr, dc);
      const slopePercent = Math.abs(deltaElevationFt) * 100 / horizontalDistanceFt;
      const risk = erosionRisk(slopePercent, config);

      segments.push({
        from: keyOf(cell),
        to: keyOf(neighbour),
        surface,
        deltaElevationFt,
        horizontalDistanceFt,
        slopePercent,
        classification: classifySlope(slopePercent, config),
        erosionRisk: risk,
      });

      if (maxSlopePercent === null || slopePercent > maxSlopePercent) maxSlopePercent = slopePercent;
      if (minSlopePercent === null || slopePercent < minSlopePercent) minSlopePercent = slopePercent;
      if (risk === 'high') highRiskCount++;
      else if (risk === 'moderate') moderateRiskCount++;
    }
  }

  logger.debug('slope', `Analyzed ${surface} surface`, {
    segments: segments.length,
    maxSlopePercent,
    highRiskCount,
  });

  return { surface, segments, maxSlopePercent, minSlopePercent, highRiskCount, moderateRiskCount };
}

export function segmentsExceeding(analysis: SlopeAnalysis, thresholdPercent: number): SlopeSegment[] {
  return analysis.segments.filter(s => s.slopePercent > thresholdPercent);
}

function keyOf(cell: GridCell): CellKey {
  return { row: cell.row, col: cell.col };
}
