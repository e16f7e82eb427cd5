export * from './types';
export * from './errors';
export {
  DEFAULT_GRADING_CONFIG,
  gradingConfigSchema,
  resolveGradingConfig,
} from './config';
export type { GradingConfig, GradingConfigInput, HaulDistanceMetric, HaulStrategy } from './config';
export { buildTerrainGrid, terrainGridFromElevations, applyDesignSurface, cellAt } from './grid';
export type { ElevationGridInput, ElevationMatrix, GridBuildOptions } from './grid';
export { computeEarthwork, classifyDepth, CUBIC_FEET_PER_CUBIC_YARD } from './earthworks';
export { analyzeSlopes, classifySlope, erosionRisk, segmentsExceeding } from './slope';
export type { SlopeThresholds } from './slope';
export { optimizeMassHaul } from './haul';
export type { MassHaulOptions } from './haul';
export { estimateCost } from './cost';
export type { CostRates } from './cost';
export { analyzeGrading, analyzeSamples } from './engine';
export { toGradingRecord, gradingCacheKey } from './report';
export type { GradingRecord, SlopeAnalysisRecord, SlopeSegmentRecord } from './report';
export { parseSamplesCsv } from './csv';
export { evaluateLotViability } from './viability';
export type { LotViability } from './viability';
export { designHeight } from './design';
export type { DesignSurface } from './design';
