/**
 * Sub-grid cell types
 * @module types/grid
 */

import type { BoundingBox } from './panel';

/**
 * One cell of a panel's sub-grid
 */
export interface SubgridCell {
  /** Identifier "{panelLabel}-{subCol}{subRow}", e.g. "H5-a3" */
  id: string;

  panelLabel: string;

  /** 1-based sub-row, counted from the panel's lowest y */
  subRow: number;

  /** Sub-column letter, 'a' at the panel's lowest x */
  subCol: string;

  /** Zero-based row inside the panel */
  localRow: number;

  /** Zero-based column inside the panel */
  localCol: number;

  /** Row in the seam-continuous grid spanning all panels */
  globalRow: number;

  /** Column in the seam-continuous grid spanning all panels */
  globalCol: number;

  /** Cell bounds in physical coordinates */
  box: BoundingBox;

  /** Cell bounds with gaps removed */
  cleanBox: BoundingBox;
}

/**
 * Cell with its raw defect count
 */
export interface CountedCell extends SubgridCell {
  rawCount: number;
}

/**
 * Cell with noise subtracted
 */
export interface CleanedCell extends CountedCell {
  /** Background level subtracted from the raw count (never negative) */
  noiseEstimate: number;

  /** max(0, rawCount - noiseEstimate) */
  cleanedCount: number;
}

/**
 * Cell with region membership; the per-cell data surface of an analysis
 */
export interface CellRecord extends CleanedCell {
  /** Region the cell belongs to, null for inactive cells */
  regionId: number | null;
}

/**
 * Dimensions of the unified grid
 */
export interface GridDimensions {
  /** Sub-grid rows per panel */
  subRows: number;

  /** Sub-grid columns per panel */
  subCols: number;

  /** Total rows across all panel rows */
  totalRows: number;

  /** Total columns across all panel columns */
  totalCols: number;
}
