import { createHash } from 'node:crypto';
import type { GradingResult, SlopeAnalysis, TerrainGrid } from './types';
import { resolveGradingConfig, type GradingConfigInput } from './config';

export interface SlopeSegmentRecord {
  from: [number, number];
  to: [number, number];
  slope_percent: number;
  classification: string;
  erosion_risk: string;
}

export interface SlopeAnalysisRecord {
  max_slope_percent: number | null;
  min_slope_percent: number | null;
  high_risk_segments: number;
  segments: SlopeSegmentRecord[];
}

/** Field names downstream stormwater, road, sewer and finance consumers rely on. */
export interface GradingRecord {
  cut_volume_cy: number;
  fill_volume_cy: number;
  balance_ratio: number | null;
  compacted_fill_volume_cy: number;
  import_volume_cy: number;
  export_volume_cy: number;
  mass_haul_distance_ft: number;
  haul_assignments: {
    source: [number, number];
    sink: [number, number];
    volume_cy: number;
    distance_ft: number;
    haul_cost: number;
  }[];
  cost_breakdown: {
    cut_cost: number;
    fill_cost: number;
    compaction_cost: number;
    haul_cost: number;
    import_cost: number;
    export_cost: number;
  };
  total_cost: number;
  existing_slopes: SlopeAnalysisRecord;
  proposed_slopes: SlopeAnalysisRecord;
}

function slopeRecord(analysis: SlopeAnalysis): SlopeAnalysisRecord {
  return {
    max_slope_percent: analysis.maxSlopePercent,
    min_slope_percent: analysis.minSlopePercent,
    high_risk_segments: analysis.highRiskCount,
    segments: analysis.segments.map(s => ({
      from: [s.from.row, s.from.col],
      to: [s.to.row, s.to.col],
      slope_percent: s.slopePercent,
      classification: s.classification,
      erosion_risk: s.erosionRisk,
    })),
  };
}

export function toGradingRecord(result: GradingResult): GradingRecord {
  const { cost } = result;
  return {
    cut_volume_cy: result.cutVolumeCy,
    fill_volume_cy: result.fillVolumeCy,
    balance_ratio: result.balanceRatio,
    compacted_fill_volume_cy: result.compactedFillVolumeCy,
    import_volume_cy: result.importVolumeCy,
    export_volume_cy: result.exportVolumeCy,
    mass_haul_distance_ft: result.massHaulDistanceFt,
    haul_assignments: result.assignments.map(a => ({
      source: [a.source.row, a.source.col],
      sink: [a.sink.row, a.sink.col],
      volume_cy: a.volumeCy,
      distance_ft: a.distanceFt,
      haul_cost: a.haulCost,
    })),
    cost_breakdown: {
      cut_cost: cost.cutCost,
      fill_cost: cost.fillCost,
      compaction_cost: cost.compactionCost,
      haul_cost: cost.haulCost,
      import_cost: cost.importCost,
      export_cost: cost.exportCost,
    },
    total_cost: result.totalCost,
    existing_slopes: slopeRecord(result.existingSlopes),
    proposed_slopes: slopeRecord(result.proposedSlopes),
  };
}

/** JSON with object keys sorted, so equal values always serialise the same. */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return v;
    const sorted: Record<string, unknown> = {};
    for (const [k, child] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[k] = child;
    }
    return sorted;
  });
}

/**
 * Stable key for caching analyses outside the engine. Configuration is
 * resolved first, so spelling out a default does not change the key.
 */
export function gradingCacheKey(grid: TerrainGrid, config: GradingConfigInput = {}): string {
  return createHash('sha256')
    .update(canonicalJson({ grid, config: resolveGradingConfig(config) }))
    .digest('hex');
}
