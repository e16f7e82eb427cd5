import type { ElevationSample, EarthworkSummary, GradingResult, MassHaulPlan, TerrainGrid } from './types';
import { resolveGradingConfig, type GradingConfig, type GradingConfigInput } from './config';
import { applyDesignSurface, buildTerrainGrid, type GridBuildOptions } from './grid';
import { computeEarthwork } from './earthworks';
import { analyzeSlopes } from './slope';
import { optimizeMassHaul } from './haul';
import { estimateCost } from './cost';
import {
  InsufficientDataError,
  InternalConsistencyError,
  InvalidConfigurationError,
  UnresolvableGridError,
} from './errors';
import { logger } from './logger';

const CONSERVATION_TOLERANCE = 1e-9;

/**
 * Full grading analysis of a prepared grid. Pure: the same grid and
 * configuration always give an identical, frozen result.
 */
export function analyzeGrading(grid: TerrainGrid, configInput: GradingConfigInput = {}): GradingResult {
  const config = resolveGradingConfig(configInput);
  return runAnalysis(grid, config);
}

/** Resamples the survey onto a `gridSizeFt` grid, then analyzes it. */
export function analyzeSamples(
  samples: readonly ElevationSample[],
  configInput: GradingConfigInput = {},
  options: GridBuildOptions = {}
): GradingResult {
  const config = resolveGradingConfig(configInput);
  const hasTargets = config.targetElevationFt !== undefined ||
    options.targets !== undefined ||
    samples.some(s => s.target !== undefined);
  if (!hasTargets) {
    throw new UnresolvableGridError(
      'No sample carries a target elevation, no per-cell targets were given and no targetElevationFt is configured'
    );
  }

  const grid = buildTerrainGrid(samples, config.gridSizeFt, config, options);
  return runAnalysis(grid, config);
}

function runAnalysis(input: TerrainGrid, config: GradingConfig): GradingResult {
  const grid = validateGrid(applyDesignSurface(input, config));

  const earthwork = computeEarthwork(grid, config.balanceToleranceFt);
  checkVolumes(earthwork);

  const existingSlopes = analyzeSlopes(grid, 'current', config);
  const proposedSlopes = analyzeSlopes(grid, 'target', config);

  const haul = optimizeMassHaul(earthwork.cells, config);
  checkConservation(earthwork, haul);

  const cost = estimateCost(earthwork, haul, config);

  logger.debug('engine', 'Grading analysis complete', {
    rows: grid.rows,
    cols: grid.cols,
    cutVolumeCy: earthwork.totalCutCy,
    fillVolumeCy: earthwork.totalFillCy,
    totalCost: cost.totalCost,
  });

  return deepFreeze({
    cutVolumeCy: earthwork.totalCutCy,
    fillVolumeCy: earthwork.totalFillCy,
    balanceRatio: earthwork.balanceRatio,
    compactedFillVolumeCy: earthwork.totalFillCy * config.compactionFactor,
    earthworkCells: earthwork.cells,
    assignments: haul.assignments,
    exportVolumeCy: haul.exportVolumeCy,
    importVolumeCy: haul.importVolumeCy,
    residuals: haul.residuals,
    massHaulDistanceFt: haul.massHaulDistanceFt,
    existingSlopes,
    proposedSlopes,
    cost,
    totalCost: cost.totalCost,
  });
}

function validateGrid(grid: TerrainGrid): TerrainGrid {
  if (!Number.isFinite(grid.cellSizeFt) || grid.cellSizeFt <= 0) {
    throw new InvalidConfigurationError([`cellSizeFt: must be a positive number, got ${grid.cellSizeFt}`]);
  }
  if (grid.cells.length !== grid.rows * grid.cols) {
    throw new InvalidConfigurationError([
      `cells: expected ${grid.rows * grid.cols} cells for a ${grid.rows} x ${grid.cols} grid, got ${grid.cells.length}`,
    ]);
  }
  grid.cells.forEach((cell, i) => {
    if (cell.row * grid.cols + cell.col !== i) {
      throw new InvalidConfigurationError([`cells: cell ${i} is at (${cell.row}, ${cell.col}), expected row-major order`]);
    }
  });

  const surveyed = grid.cells.filter(c => c.currentElevationFt !== null);
  if (surveyed.length === 0) {
    throw new InsufficientDataError('No grid cell has an existing elevation');
  }
  if (!surveyed.some(c => c.targetElevationFt !== null)) {
    throw new UnresolvableGridError(
      'No target elevations on the grid and no targetElevationFt configured'
    );
  }
  return grid;
}

function checkVolumes(earthwork: EarthworkSummary): void {
  for (const cell of earthwork.cells) {
    if (!Number.isFinite(cell.volumeCy) || cell.volumeCy < 0) {
      throw new InternalConsistencyError(
        `Cell (${cell.row}, ${cell.col}) has volume ${cell.volumeCy}`
      );
    }
  }
}

function checkConservation(earthwork: EarthworkSummary, haul: MassHaulPlan): void {
  const balances: [string, number, number][] = [
    ['cut', earthwork.totalCutCy, haul.hauledVolumeCy + haul.exportVolumeCy],
    ['fill', earthwork.totalFillCy, haul.hauledVolumeCy + haul.importVolumeCy],
  ];

  for (const [side, total, accounted] of balances) {
    if (Math.abs(total - accounted) > CONSERVATION_TOLERANCE * Math.max(1, total)) {
      logger.error('engine', `Volume not conserved on ${side} side`, { total, accounted });
      throw new InternalConsistencyError(
        `${side} volume ${total} cy does not match hauled plus off-site volume ${accounted} cy`
      );
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
