/**
 * Analysis configuration types
 * @module types/config
 */

import type { NoiseEstimator } from './noise';
import type { Connectivity } from './region';

/**
 * Options recognised by the analysis pipeline
 */
export interface AnalysisConfig {
  /** Sub-grid rows per panel (N) */
  subGridRows: number;

  /** Sub-grid columns per panel (M, at most 26) */
  subGridCols: number;

  /**
   * Fixed cell width in layout units. When set, the column count is derived
   * from each panel's width and must divide it evenly.
   */
  cellWidth?: number;

  /** Fixed cell height in layout units; derives the row count */
  cellHeight?: number;

  /** A cell is active when its cleaned count is strictly above this value */
  noiseThreshold: number;

  /** Labeling neighbourhood (default 8) */
  connectivity: Connectivity;

  /** Background-noise policy (default: global median of raw counts) */
  noiseEstimator: NoiseEstimator;

  /** Round cleaned counts to whole defects before labeling */
  roundCleanedCounts: boolean;
}

/**
 * Caller-facing configuration; anything omitted takes its default
 */
export type AnalysisOptions = Partial<AnalysisConfig>;
