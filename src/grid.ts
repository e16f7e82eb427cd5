import type { ElevationSample, GridCell, Point3D, TerrainGrid } from './types';
import type { GradingConfig } from './config';
import { buildTIN, terrainHeight, type TIN } from './tin';
import { designHeight, designSurfaceFromConfig } from './design';
import { boundsOf } from './geometry';
import { InsufficientDataError, InvalidConfigurationError } from './errors';
import { logger } from './logger';

export type ElevationMatrix = ReadonlyArray<ReadonlyArray<number | null | undefined>>;

export interface GridBuildOptions {
  /** Explicit proposed grade per node, [row][col]; takes precedence over everything else */
  targets?: ElevationMatrix;
}

/**
 * Resamples scattered survey shots onto a regular node grid covering their
 * bounding box. Elevations are linear on the Delaunay TIN of the samples, so
 * nodes outside the convex hull come out as no data.
 */
export function buildTerrainGrid(
  samples: readonly ElevationSample[],
  gridSizeFt: number,
  config: GradingConfig,
  options: GridBuildOptions = {}
): TerrainGrid {
  if (!Number.isFinite(gridSizeFt) || gridSizeFt <= 0) {
    throw new InvalidConfigurationError([`gridSizeFt: must be a positive number, got ${gridSizeFt}`]);
  }

  samples.forEach((s, i) => {
    const finite = [s.x, s.y, s.current].every(Number.isFinite) &&
      (s.target === undefined || Number.isFinite(s.target));
    if (!finite) {
      throw new InsufficientDataError(`Sample ${i} has a non-finite coordinate or elevation`);
    }
  });

  const existing = buildTIN(samples.map(s => ({ x: s.x, y: s.y, z: s.current })));
  const proposed = targetTIN(samples);
  const design = designSurfaceFromConfig(config);

  const { minX, minY, maxX, maxY } = boundsOf(samples);
  const cols = Math.floor((maxX - minX) / gridSizeFt + 1e-9) + 1;
  const rows = Math.floor((maxY - minY) / gridSizeFt + 1e-9) + 1;
  const areaSqft = gridSizeFt * gridSizeFt;

  const cells: GridCell[] = [];
  let noData = 0;
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const x = minX + col * gridSizeFt;
      const y = minY + row * gridSizeFt;

      const current = terrainHeight(x, y, existing);
      let target: number | null = null;
      if (current !== null) {
        target = explicitTarget(options.targets, row, col);
        if (target === null && proposed) target = terrainHeight(x, y, proposed);
        if (target === null && design) target = designHeight(x, y, design);
      } else {
        noData++;
      }

      cells.push({
        row,
        col,
        x,
        y,
        currentElevationFt: current,
        targetElevationFt: target,
        areaSqft,
      });
    }
  }

  logger.debug('grid', 'Resampled elevation samples', {
    samples: samples.length,
    rows,
    cols,
    noDataCells: noData,
  });

  return { originX: minX, originY: minY, cellSizeFt: gridSizeFt, rows, cols, cells };
}

export interface ElevationGridInput {
  originX?: number;
  originY?: number;
  cellSizeFt: number;
  /** Existing grade, [row][col]; null, undefined or NaN marks no data */
  current: ElevationMatrix;
  target?: ElevationMatrix;
}

/** Grid from elevations that are already gridded, e.g. a DEM export. */
export function terrainGridFromElevations(input: ElevationGridInput): TerrainGrid {
  const { originX = 0, originY = 0, cellSizeFt, current, target } = input;
  if (!Number.isFinite(cellSizeFt) || cellSizeFt <= 0) {
    throw new InvalidConfigurationError([`cellSizeFt: must be a positive number, got ${cellSizeFt}`]);
  }

  const rows = current.length;
  const cols = rows > 0 ? current[0].length : 0;
  if (rows === 0 || cols === 0) {
    throw new InsufficientDataError('Elevation grid is empty');
  }
  if (current.some(r => r.length !== cols)) {
    throw new InvalidConfigurationError(['current: rows must all have the same length']);
  }
  if (target && (target.length !== rows || target.some(r => r.length !== cols))) {
    throw new InvalidConfigurationError([`target: expected ${rows} x ${cols} elevations`]);
  }

  const areaSqft = cellSizeFt * cellSizeFt;
  const cells: GridCell[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const z = finiteOrNull(current[row][col]);
      cells.push({
        row,
        col,
        x: originX + col * cellSizeFt,
        y: originY + row * cellSizeFt,
        currentElevationFt: z,
        targetElevationFt: z === null ? null : explicitTarget(target, row, col),
        areaSqft,
      });
    }
  }

  return { originX, originY, cellSizeFt, rows, cols, cells };
}

/**
 * Fills targets that are still missing from the configured design surface.
 * Grids built from samples already have this applied.
 */
export function applyDesignSurface(grid: TerrainGrid, config: GradingConfig): TerrainGrid {
  const design = designSurfaceFromConfig(config);
  if (!design) return grid;

  return {
    ...grid,
    cells: grid.cells.map(cell =>
      cell.currentElevationFt !== null && cell.targetElevationFt === null
        ? { ...cell, targetElevationFt: designHeight(cell.x, cell.y, design) }
        : cell
    ),
  };
}

export function cellAt(grid: TerrainGrid, row: number, col: number): GridCell | undefined {
  if (row < 0 || row >= grid.rows || col < 0 || col >= grid.cols) return undefined;
  return grid.cells[row * grid.cols + col];
}

function targetTIN(samples: readonly ElevationSample[]): TIN | null {
  const points: Point3D[] = [];
  for (const s of samples) {
    if (s.target !== undefined) points.push({ x: s.x, y: s.y, z: s.target });
  }
  if (points.length < 3) return null;

  try {
    return buildTIN(points);
  } catch (err) {
    if (err instanceof InsufficientDataError) {
      logger.warn('grid', 'Sample targets are collinear; falling back to configured design surface', {
        targetSamples: points.length,
      });
      return null;
    }
    throw err;
  }
}

function explicitTarget(targets: ElevationMatrix | undefined, row: number, col: number): number | null {
  return finiteOrNull(targets?.[row]?.[col]);
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
