/**
 * Noise subtraction
 * @module noise/noise-cleaner
 */

import type { CleanedCell, CountedCell, NoiseEstimator } from '../types';
import { createLogger } from '../utils/logger';
import { isFiniteNumber } from '../utils/validation';

const logger = createLogger('noise');

export interface CleanOptions {
  /** Round cleaned counts to whole defects (default: false) */
  roundCleanedCounts?: boolean;
}

/**
 * Subtract the estimator's background level from every cell.
 *
 * Negative or non-finite estimates are clamped to zero; cleaned counts are
 * floored at zero, so 0 <= cleanedCount <= rawCount always holds.
 */
export function cleanCounts(
  cells: readonly CountedCell[],
  estimator: NoiseEstimator,
  options: CleanOptions = {}
): CleanedCell[] {
  const estimates = estimator.estimate(cells);

  if (estimates.length !== cells.length) {
    throw new Error(
      `Noise estimator "${estimator.name}" returned ${estimates.length} estimates for ${cells.length} cells`
    );
  }

  let clamped = 0;

  const cleaned = cells.map((cell, i) => {
    let noise = estimates[i];
    if (!isFiniteNumber(noise) || noise < 0) {
      clamped++;
      noise = 0;
    }

    let cleanedCount = Math.max(0, cell.rawCount - noise);
    if (options.roundCleanedCounts) {
      cleanedCount = Math.round(cleanedCount);
    }

    return { ...cell, noiseEstimate: noise, cleanedCount };
  });

  if (clamped > 0) {
    logger.warn('Clamped invalid noise estimates to zero', { estimator: estimator.name, cells: clamped });
  }

  logger.debug('Noise removed', { estimator: estimator.name, cells: cells.length });

  return cleaned;
}
