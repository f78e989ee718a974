/**
 * Region detection types
 * @module types/region
 */

import type { BoundingBox } from './panel';
import type { CleanedCell } from './grid';

/**
 * Connected cluster of active cells
 */
export interface Region {
  /** Dense id from 1, in discovery (row-major) order */
  regionId: number;

  /** Member cells in row-major global order */
  cells: CleanedCell[];

  /** Sum of member cleaned counts */
  totalCleanedDefects: number;

  cellCount: number;

  /** totalCleanedDefects / cellCount */
  avgDensity: number;

  /** Bounds of the member cells in physical coordinates */
  bounds: BoundingBox;

  /** Bounds of the member cells with gaps removed */
  cleanBounds: BoundingBox;
}

/**
 * Row of the region table handed to reporting
 */
export interface RegionTableRow {
  regionId: number;
  totalDefectsCleaned: number;
  subgridCount: number;

  /** Average cleaned defects per cell, 2-decimal precision */
  avgDefectsPerGrid: number;

  /** Member cell identifiers, e.g. ["H5-a3", "H5-b3"] */
  subgrids: string[];
}

/**
 * Neighbourhood used for labeling
 */
export type Connectivity = 4 | 8;
