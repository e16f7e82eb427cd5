export type LotViability = 'viable' | 'redesign';

/**
 * Screens a lot by grading cost against the rent it earns. A lot whose
 * grading costs more than `thresholdRatio` of a year's rent needs redesign.
 */
export function evaluateLotViability(
  gradingCost: number,
  annualRent: number,
  thresholdRatio = 0.15
): LotViability {
  if (annualRent <= 0) return 'redesign';
  return gradingCost / annualRent <= thresholdRatio ? 'viable' : 'redesign';
}
