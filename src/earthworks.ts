import type { EarthworkCell, EarthworkDirection, EarthworkSummary, TerrainGrid } from './types';
import { logger } from './logger';

export const CUBIC_FEET_PER_CUBIC_YARD = 27;

export function classifyDepth(depthFt: number, balanceToleranceFt: number): EarthworkDirection {
  if (depthFt > balanceToleranceFt) return 'fill';
  if (depthFt < -balanceToleranceFt) return 'cut';
  return 'balanced';
}

/**
 * Cut and fill per cell. Cells missing either surface are skipped; balanced
 * cells are listed but stay out of the totals.
 */
export function computeEarthwork(grid: TerrainGrid, balanceToleranceFt: number): EarthworkSummary {
  const cells: EarthworkCell[] = [];
  let totalCutCy = 0;
  let totalFillCy = 0;

  for (const cell of grid.cells) {
    const zExisting = cell.currentElevationFt;
    const zDesign = cell.targetElevationFt;
    if (zExisting === null || zDesign === null) continue;

    const depthFt = zDesign - zExisting;
    const volumeCy = Math.abs(depthFt) * cell.areaSqft / CUBIC_FEET_PER_CUBIC_YARD;
    const direction = classifyDepth(depthFt, balanceToleranceFt);

    if (direction === 'cut') totalCutCy += volumeCy;
    else if (direction === 'fill') totalFillCy += volumeCy;

    cells.push({ row: cell.row, col: cell.col, x: cell.x, y: cell.y, depthFt, volumeCy, direction });
  }

  logger.debug('earthwork', 'Computed cut/fill', {
    cells: cells.length,
    totalCutCy,
    totalFillCy,
  });

  return {
    cells,
    totalCutCy,
    totalFillCy,
    balanceRatio: totalCutCy > 0 ? totalFillCy / totalCutCy : null,
  };
}
