/**
 * Background-noise estimators
 *
 * Every estimator implements {@link NoiseEstimator}: one estimate per cell,
 * in input order. Global estimators return the same level for every cell;
 * the local window estimator looks at the cell's neighbourhood in global
 * index space.
 *
 * @module noise/estimators
 */

import type { CountedCell, NoiseEstimator } from '../types';
import { boxHeight, boxWidth } from '../types';
import { median, percentile } from '../utils/math';
import { ConfigurationError, isFiniteNumber } from '../utils/validation';

/**
 * Global median of all raw counts
 */
export class MedianNoiseEstimator implements NoiseEstimator {
  readonly name = 'median';

  estimate(cells: readonly CountedCell[]): number[] {
    const level = median(cells.map(c => c.rawCount));
    return cells.map(() => level);
  }
}

/**
 * Global p-th percentile of all raw counts (low percentiles track the
 * quiet background when many cells carry signal)
 */
export class PercentileNoiseEstimator implements NoiseEstimator {
  readonly name: string;

  constructor(private readonly p: number) {
    if (!isFiniteNumber(p) || p < 0 || p > 100) {
      throw new ConfigurationError('percentile must be within [0, 100]', 'noiseEstimator.percentile', p);
    }
    this.name = `percentile-${p}`;
  }

  estimate(cells: readonly CountedCell[]): number[] {
    const sorted = cells.map(c => c.rawCount).sort((a, b) => a - b);
    const level = percentile(sorted, this.p);
    return cells.map(() => level);
  }
}

/**
 * Fixed baseline for every cell
 */
export class ConstantNoiseEstimator implements NoiseEstimator {
  readonly name: string;

  constructor(private readonly level: number) {
    if (!isFiniteNumber(level)) {
      throw new ConfigurationError('level must be a finite number', 'noiseEstimator.level', level);
    }
    this.name = `constant-${level}`;
  }

  estimate(cells: readonly CountedCell[]): number[] {
    return cells.map(() => this.level);
  }
}

/**
 * Expected noise proportional to cell area: density (defects per unit
 * area) times the cell's physical area
 */
export class AreaDensityNoiseEstimator implements NoiseEstimator {
  readonly name: string;

  constructor(private readonly density: number) {
    if (!isFiniteNumber(density) || density < 0) {
      throw new ConfigurationError('density must be a non-negative number', 'noiseEstimator.density', density);
    }
    this.name = `area-density-${density}`;
  }

  estimate(cells: readonly CountedCell[]): number[] {
    return cells.map(c => boxWidth(c.box) * boxHeight(c.box) * this.density);
  }
}

/**
 * Median of the raw counts inside a square window (Chebyshev radius) around
 * each cell in global index space. Windows are clipped at the grid border.
 */
export class LocalWindowNoiseEstimator implements NoiseEstimator {
  readonly name: string;

  constructor(private readonly radius: number = 1) {
    if (!Number.isInteger(radius) || radius < 1) {
      throw new ConfigurationError('radius must be a positive integer', 'noiseEstimator.radius', radius);
    }
    this.name = `local-window-${radius}`;
  }

  estimate(cells: readonly CountedCell[]): number[] {
    const byIndex = new Map<string, number>();
    for (const cell of cells) {
      byIndex.set(`${cell.globalRow}:${cell.globalCol}`, cell.rawCount);
    }

    return cells.map(cell => {
      const window: number[] = [];
      for (let dr = -this.radius; dr <= this.radius; dr++) {
        for (let dc = -this.radius; dc <= this.radius; dc++) {
          const count = byIndex.get(`${cell.globalRow + dr}:${cell.globalCol + dc}`);
          if (count !== undefined) window.push(count);
        }
      }
      return median(window);
    });
  }
}
