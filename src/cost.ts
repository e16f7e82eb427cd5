import type { CostBreakdown, EarthworkSummary, MassHaulPlan } from './types';
import type { GradingConfig } from './config';
import { InternalConsistencyError } from './errors';
import { logger } from './logger';

export type CostRates = Pick<
  GradingConfig,
  | 'excavationCostPerCy'
  | 'fillCostPerCy'
  | 'compactionCostPerCy'
  | 'haulCostPerCyFt'
  | 'importCostPerCy'
  | 'exportCostPerCy'
>;

export function estimateCost(
  earthwork: Pick<EarthworkSummary, 'totalCutCy' | 'totalFillCy'>,
  haul: Pick<MassHaulPlan, 'assignments' | 'importVolumeCy' | 'exportVolumeCy'>,
  rates: CostRates
): CostBreakdown {
  let haulCost = 0;
  for (const a of haul.assignments) {
    haulCost += a.volumeCy * a.distanceFt * rates.haulCostPerCyFt;
  }

  const components = {
    cutCost: earthwork.totalCutCy * rates.excavationCostPerCy,
    fillCost: earthwork.totalFillCy * rates.fillCostPerCy,
    compactionCost: earthwork.totalFillCy * rates.compactionCostPerCy,
    haulCost,
    importCost: haul.importVolumeCy * rates.importCostPerCy,
    exportCost: haul.exportVolumeCy * rates.exportCostPerCy,
  };

  for (const [name, value] of Object.entries(components)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InternalConsistencyError(`${name} came out as ${value}; costs must be finite and non-negative`);
    }
  }

  const totalCost =
    components.cutCost +
    components.fillCost +
    components.compactionCost +
    components.haulCost +
    components.importCost +
    components.exportCost;

  logger.debug('cost', 'Estimated grading cost', { ...components, totalCost });

  return { ...components, totalCost };
}
