/**
 * Noise estimation types
 * @module types/noise
 */

import type { CountedCell } from './grid';

/**
 * Background-noise policy
 *
 * Implementations receive every counted cell of the grid and return one
 * estimate per cell, in the same order. Estimates should be non-negative;
 * the cleaner clamps anything else to zero.
 */
export interface NoiseEstimator {
  /** Short policy name used in logs and summaries */
  readonly name: string;

  estimate(cells: readonly CountedCell[]): number[];
}
