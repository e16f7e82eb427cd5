import type { CellKey, EarthworkCell, HaulAssignment, MassHaulPlan, ResidualVolume } from './types';
import type { GradingConfig } from './config';
import { planDistance } from './geometry';
import { logger } from './logger';

export type MassHaulOptions = Pick<GradingConfig, 'haulCostPerCyFt' | 'haulDistanceMetric' | 'haulStrategy'>;

interface HaulNode {
  cell: EarthworkCell;
  remaining: number;
}

interface Candidate {
  source: HaulNode;
  sink: HaulNode;
  distanceFt: number;
}

function compareKeys(a: CellKey, b: CellKey): number {
  return a.row - b.row || a.col - b.col;
}

/** Shortest haul first, then source row/col, then sink row/col. */
function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    a.distanceFt - b.distanceFt ||
    compareKeys(a.source.cell, b.source.cell) ||
    compareKeys(a.sink.cell, b.sink.cell)
  );
}

function nodesOf(cells: readonly EarthworkCell[], direction: 'cut' | 'fill'): HaulNode[] {
  return cells
    .filter(c => c.direction === direction && c.volumeCy > 0)
    .sort(compareKeys)
    .map(cell => ({ cell, remaining: cell.volumeCy }));
}

type Allocate = (candidate: Candidate) => void;

// Rescans every live pair per step.
function runNaive(sources: HaulNode[], sinks: HaulNode[], metric: GradingConfig['haulDistanceMetric'], allocate: Allocate): void {
  for (;;) {
    let best: Candidate | null = null;
    for (const source of sources) {
      if (source.remaining <= 0) continue;
      for (const sink of sinks) {
        if (sink.remaining <= 0) continue;
        const candidate = { source, sink, distanceFt: planDistance(source.cell, sink.cell, metric) };
        if (best === null || compareCandidates(candidate, best) < 0) best = candidate;
      }
    }
    if (best === null) return;
    allocate(best);
  }
}

// Remaining quantities only ever shrink, so a pair that is dead when reached
// in sorted order can never become the global minimum later.
function runSorted(sources: HaulNode[], sinks: HaulNode[], metric: GradingConfig['haulDistanceMetric'], allocate: Allocate): void {
  const candidates: Candidate[] = [];
  for (const source of sources) {
    for (const sink of sinks) {
      candidates.push({ source, sink, distanceFt: planDistance(source.cell, sink.cell, metric) });
    }
  }
  candidates.sort(compareCandidates);

  for (const candidate of candidates) {
    if (candidate.source.remaining > 0 && candidate.sink.remaining > 0) {
      allocate(candidate);
    }
  }
}

/**
 * Greedy least-distance mass haul. Cut cells supply fill cells nearest pair
 * first until one side runs out; what is left over becomes export (spoil) or
 * import (borrow). Input order does not affect the result.
 */
export function optimizeMassHaul(cells: readonly EarthworkCell[], options: MassHaulOptions): MassHaulPlan {
  const sources = nodesOf(cells, 'cut');
  const sinks = nodesOf(cells, 'fill');
  const assignments: HaulAssignment[] = [];

  const allocate: Allocate = ({ source, sink, distanceFt }) => {
    const volumeCy = Math.min(source.remaining, sink.remaining);
    source.remaining -= volumeCy;
    sink.remaining -= volumeCy;
    assignments.push({
      source: { row: source.cell.row, col: source.cell.col },
      sink: { row: sink.cell.row, col: sink.cell.col },
      volumeCy,
      distanceFt,
      haulCost: volumeCy * distanceFt * options.haulCostPerCyFt,
    });
  };

  if (options.haulStrategy === 'naive') {
    runNaive(sources, sinks, options.haulDistanceMetric, allocate);
  } else {
    runSorted(sources, sinks, options.haulDistanceMetric, allocate);
  }

  let hauledVolumeCy = 0;
  let weightedDistance = 0;
  let totalHaulCost = 0;
  for (const a of assignments) {
    hauledVolumeCy += a.volumeCy;
    weightedDistance += a.volumeCy * a.distanceFt;
    totalHaulCost += a.haulCost;
  }

  const residuals: ResidualVolume[] = [];
  let exportVolumeCy = 0;
  let importVolumeCy = 0;
  for (const node of sources) {
    if (node.remaining <= 0) continue;
    exportVolumeCy += node.remaining;
    residuals.push({ row: node.cell.row, col: node.cell.col, direction: 'cut', volumeCy: node.remaining });
  }
  for (const node of sinks) {
    if (node.remaining <= 0) continue;
    importVolumeCy += node.remaining;
    residuals.push({ row: node.cell.row, col: node.cell.col, direction: 'fill', volumeCy: node.remaining });
  }

  logger.debug('haul', 'Allocated mass haul', {
    strategy: options.haulStrategy,
    sources: sources.length,
    sinks: sinks.length,
    assignments: assignments.length,
    exportVolumeCy,
    importVolumeCy,
  });

  return {
    assignments,
    hauledVolumeCy,
    exportVolumeCy,
    importVolumeCy,
    residuals,
    totalHaulCost,
    massHaulDistanceFt: hauledVolumeCy > 0 ? weightedDistance / hauledVolumeCy : 0,
  };
}
