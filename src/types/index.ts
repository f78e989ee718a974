/**
 * panelscan type definitions
 *
 * @module types
 */

// Panel layout types
export type {
  BoundingBox,
  PanelSpec,
  Panel,
  AxisExtent,
  AxisShift,
} from './panel';

export { boxWidth, boxHeight, boxesOverlap, unionBoxes } from './panel';

// Defect types
export type { DefectPoint, AssignedDefect, TransformedDefect } from './defect';

// Grid types
export type {
  SubgridCell,
  CountedCell,
  CleanedCell,
  CellRecord,
  GridDimensions,
} from './grid';

// Region types
export type { Region, RegionTableRow, Connectivity } from './region';

// Noise types
export type { NoiseEstimator } from './noise';

// Configuration types
export type { AnalysisConfig, AnalysisOptions } from './config';
