import { describe, expect, it } from 'vitest';
import { optimizeMassHaul, type MassHaulOptions } from './haul';
import type { EarthworkCell, EarthworkDirection } from './types';

const options: MassHaulOptions = {
  haulCostPerCyFt: 0.01,
  haulDistanceMetric: 'euclidean',
  haulStrategy: 'sorted',
};

function cell(
  row: number,
  col: number,
  x: number,
  y: number,
  direction: EarthworkDirection,
  volumeCy: number
): EarthworkCell {
  const depth = volumeCy * 27 / 100;
  return { row, col, x, y, direction, volumeCy, depthFt: direction === 'cut' ? -depth : depth };
}

// Deterministic pseudo-random site so both strategies see the same input.
function scatteredSite(count: number): EarthworkCell[] {
  let seed = 7;
  const next = () => {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    return seed / 2147483648;
  };
  const cells: EarthworkCell[] = [];
  for (let i = 0; i < count; i++) {
    const row = Math.floor(i / 6);
    const col = i % 6;
    const direction: EarthworkDirection = next() < 0.5 ? 'cut' : 'fill';
    cells.push(cell(row, col, col * 10, row * 10, direction, 5 + Math.round(next() * 95)));
  }
  return cells;
}

describe('optimizeMassHaul', () => {
  it('hauls a single cut straight to a single fill', () => {
    const plan = optimizeMassHaul(
      [cell(0, 0, 0, 0, 'cut', 100), cell(1, 0, 0, 50, 'fill', 100)],
      options
    );

    expect(plan.assignments).toEqual([
      { source: { row: 0, col: 0 }, sink: { row: 1, col: 0 }, volumeCy: 100, distanceFt: 50, haulCost: 50 },
    ]);
    expect(plan.exportVolumeCy).toBe(0);
    expect(plan.importVolumeCy).toBe(0);
    expect(plan.massHaulDistanceFt).toBe(50);
    expect(plan.residuals).toEqual([]);
  });

  it('fills the nearer cell first and exports the surplus, whatever the input order', () => {
    const source = cell(0, 0, 0, 0, 'cut', 300);
    const near = cell(0, 2, 20, 0, 'fill', 100);
    const far = cell(0, 10, 100, 0, 'fill', 100);

    for (const cells of [[source, near, far], [far, near, source], [near, far, source]]) {
      const plan = optimizeMassHaul(cells, options);
      expect(plan.assignments.map(a => [a.sink.col, a.volumeCy, a.distanceFt])).toEqual([
        [2, 100, 20],
        [10, 100, 100],
      ]);
      expect(plan.exportVolumeCy).toBe(100);
      expect(plan.importVolumeCy).toBe(0);
      expect(plan.residuals).toEqual([{ row: 0, col: 0, direction: 'cut', volumeCy: 100 }]);
      expect(plan.massHaulDistanceFt).toBe(60);
    }
  });

  it('breaks distance ties by sink row then column', () => {
    const plan = optimizeMassHaul(
      [
        cell(1, 0, 0, 10, 'fill', 50),
        cell(0, 1, 10, 0, 'fill', 50),
        cell(0, 0, 0, 0, 'cut', 50),
      ],
      options
    );

    expect(plan.assignments).toHaveLength(1);
    expect(plan.assignments[0].sink).toEqual({ row: 0, col: 1 });
    expect(plan.importVolumeCy).toBe(50);
    expect(plan.residuals).toEqual([{ row: 1, col: 0, direction: 'fill', volumeCy: 50 }]);
  });

  it('breaks distance ties by source when two cuts reach one fill equally', () => {
    const plan = optimizeMassHaul(
      [
        cell(1, 1, 10, 10, 'fill', 40),
        cell(2, 1, 10, 20, 'cut', 40),
        cell(0, 1, 10, 0, 'cut', 40),
      ],
      options
    );

    expect(plan.assignments.map(a => a.source)).toEqual([{ row: 0, col: 1 }]);
    expect(plan.exportVolumeCy).toBe(40);
  });

  it('returns an empty plan when there is nothing to move', () => {
    const plan = optimizeMassHaul([], options);
    expect(plan.assignments).toEqual([]);
    expect(plan.exportVolumeCy).toBe(0);
    expect(plan.importVolumeCy).toBe(0);
    expect(plan.massHaulDistanceFt).toBe(0);
    expect(plan.totalHaulCost).toBe(0);
  });

  it('ignores balanced cells', () => {
    const plan = optimizeMassHaul(
      [cell(0, 0, 0, 0, 'balanced', 0.01), cell(0, 1, 10, 0, 'fill', 20)],
      options
    );
    expect(plan.assignments).toEqual([]);
    expect(plan.importVolumeCy).toBe(20);
  });

  it('measures manhattan haul distance when configured', () => {
    const plan = optimizeMassHaul(
      [cell(0, 0, 0, 0, 'cut', 10), cell(4, 3, 30, 40, 'fill', 10)],
      { ...options, haulDistanceMetric: 'manhattan' }
    );
    expect(plan.assignments[0].distanceFt).toBe(70);
    expect(plan.assignments[0].haulCost).toBeCloseTo(7, 10);
  });

  it('gives identical assignments with the naive and sorted strategies', () => {
    const cells = scatteredSite(36);
    const sorted = optimizeMassHaul(cells, options);
    const naive = optimizeMassHaul(cells, { ...options, haulStrategy: 'naive' });

    expect(naive.assignments).toEqual(sorted.assignments);
    expect(naive.totalHaulCost).toBe(sorted.totalHaulCost);
    expect(naive.exportVolumeCy).toBe(sorted.exportVolumeCy);
    expect(naive.importVolumeCy).toBe(sorted.importVolumeCy);
  });

  it('never emits zero-volume assignments and conserves volume', () => {
    const cells = scatteredSite(36);
    const plan = optimizeMassHaul(cells, options);
    const cut = cells.filter(c => c.direction === 'cut').reduce((s, c) => s + c.volumeCy, 0);
    const fill = cells.filter(c => c.direction === 'fill').reduce((s, c) => s + c.volumeCy, 0);

    expect(plan.assignments.every(a => a.volumeCy > 0)).toBe(true);
    expect(plan.hauledVolumeCy + plan.exportVolumeCy).toBeCloseTo(cut, 9);
    expect(plan.hauledVolumeCy + plan.importVolumeCy).toBeCloseTo(fill, 9);
    // one side is always exhausted
    expect(Math.min(plan.exportVolumeCy, plan.importVolumeCy)).toBe(0);
  });

  it('finds nothing cheaper when re-run on its own residuals', () => {
    const cells = scatteredSite(36);
    const first = optimizeMassHaul(cells, options);

    const byKey = new Map(cells.map(c => [`${c.row},${c.col}`, c]));
    const residualCells = first.residuals.map(r => {
      const original = byKey.get(`${r.row},${r.col}`);
      expect(original).toBeDefined();
      return cell(r.row, r.col, original?.x ?? 0, original?.y ?? 0, r.direction, r.volumeCy);
    });
    const rerun = optimizeMassHaul(residualCells, options);

    expect(rerun.assignments).toEqual([]);
    expect(rerun.totalHaulCost).toBe(0);
    expect(new Set(first.residuals.map(r => r.direction)).size).toBeLessThanOrEqual(1);
  });
});
