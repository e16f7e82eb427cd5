import { describe, expect, it } from 'vitest';
import { estimateCost } from './cost';
import { DEFAULT_GRADING_CONFIG } from './config';
import { InternalConsistencyError } from './errors';
import type { HaulAssignment } from './types';

const assignment: HaulAssignment = {
  source: { row: 0, col: 0 },
  sink: { row: 0, col: 5 },
  volumeCy: 80,
  distanceFt: 50,
  haulCost: 40,
};

describe('estimateCost', () => {
  it('prices every component from the configured rates', () => {
    const cost = estimateCost(
      { totalCutCy: 100, totalFillCy: 80 },
      { assignments: [assignment], importVolumeCy: 0, exportVolumeCy: 20 },
      DEFAULT_GRADING_CONFIG
    );

    expect(cost.cutCost).toBe(1500);
    expect(cost.fillCost).toBe(2000);
    expect(cost.compactionCost).toBe(640);
    expect(cost.haulCost).toBeCloseTo(40, 9);
    expect(cost.importCost).toBe(0);
    expect(cost.exportCost).toBe(400);
    expect(cost.totalCost).toBeCloseTo(4580, 9);
  });

  it('charges borrow at the import rate', () => {
    const cost = estimateCost(
      { totalCutCy: 0, totalFillCy: 10 },
      { assignments: [], importVolumeCy: 10, exportVolumeCy: 0 },
      { ...DEFAULT_GRADING_CONFIG, importCostPerCy: 50 }
    );

    expect(cost.importCost).toBe(500);
    expect(cost.totalCost).toBe(250 + 80 + 500);
  });

  it('is zero for a site with no earthwork', () => {
    const cost = estimateCost(
      { totalCutCy: 0, totalFillCy: 0 },
      { assignments: [], importVolumeCy: 0, exportVolumeCy: 0 },
      DEFAULT_GRADING_CONFIG
    );
    expect(cost.totalCost).toBe(0);
  });

  it('fails fast on a negative component instead of clamping', () => {
    expect(() =>
      estimateCost(
        { totalCutCy: -1, totalFillCy: 0 },
        { assignments: [], importVolumeCy: 0, exportVolumeCy: 0 },
        DEFAULT_GRADING_CONFIG
      )
    ).toThrow(InternalConsistencyError);
  });
});
