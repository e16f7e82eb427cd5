export interface Point2D {
  x: number;
  y: number;
}

export interface Point3D extends Point2D {
  z: number;
}

/** Survey shot in site feet. `target` is the proposed finished grade, when known. */
export interface ElevationSample {
  x: number;
  y: number;
  current: number;
  target?: number;
}

export interface CellKey {
  row: number;
  col: number;
}

export interface GridCell extends CellKey {
  /** Cell centre, site feet */
  x: number;
  y: number;
  /** null = no data */
  currentElevationFt: number | null;
  targetElevationFt: number | null;
  areaSqft: number;
}

export interface TerrainGrid {
  originX: number;
  originY: number;
  cellSizeFt: number;
  rows: number;
  cols: number;
  /** Row-major, rows * cols entries */
  cells: readonly GridCell[];
}

export type EarthworkDirection = 'cut' | 'fill' | 'balanced';

export interface EarthworkCell extends CellKey {
  x: number;
  y: number;
  /** target - current; positive needs fill */
  depthFt: number;
  volumeCy: number;
  direction: EarthworkDirection;
}

export interface EarthworkSummary {
  cells: EarthworkCell[];
  totalCutCy: number;
  totalFillCy: number;
  /** fill / cut; null when there is no cut */
  balanceRatio: number | null;
}

export type SlopeSurface = 'current' | 'target';

export type SlopeClass = 'flat' | 'gentle' | 'moderate' | 'steep' | 'excessive';

export type ErosionRisk = 'low' | 'moderate' | 'high';

export interface SlopeSegment {
  from: CellKey;
  to: CellKey;
  surface: SlopeSurface;
  deltaElevationFt: number;
  horizontalDistanceFt: number;
  slopePercent: number;
  classification: SlopeClass;
  erosionRisk: ErosionRisk;
}

export interface SlopeAnalysis {
  surface: SlopeSurface;
  segments: SlopeSegment[];
  maxSlopePercent: number | null;
  minSlopePercent: number | null;
  highRiskCount: number;
  moderateRiskCount: number;
}

export interface HaulAssignment {
  source: CellKey;
  sink: CellKey;
  volumeCy: number;
  distanceFt: number;
  haulCost: number;
}

/** Volume left on a cell after hauling: cut to export, fill to import */
export interface ResidualVolume extends CellKey {
  direction: 'cut' | 'fill';
  volumeCy: number;
}

export interface MassHaulPlan {
  assignments: HaulAssignment[];
  hauledVolumeCy: number;
  /** Spoil: cut left over after every fill is satisfied */
  exportVolumeCy: number;
  /** Borrow: fill demand no on-site cut could meet */
  importVolumeCy: number;
  residuals: ResidualVolume[];
  totalHaulCost: number;
  /** Volume-weighted mean haul distance */
  massHaulDistanceFt: number;
}

export interface CostBreakdown {
  cutCost: number;
  fillCost: number;
  compactionCost: number;
  haulCost: number;
  importCost: number;
  exportCost: number;
  totalCost: number;
}

export interface GradingResult {
  cutVolumeCy: number;
  fillVolumeCy: number;
  balanceRatio: number | null;
  compactedFillVolumeCy: number;
  earthworkCells: readonly EarthworkCell[];
  assignments: readonly HaulAssignment[];
  exportVolumeCy: number;
  importVolumeCy: number;
  residuals: readonly ResidualVolume[];
  massHaulDistanceFt: number;
  existingSlopes: SlopeAnalysis;
  proposedSlopes: SlopeAnalysis;
  cost: CostBreakdown;
  totalCost: number;
}
