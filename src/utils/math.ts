/**
 * Mathematical utilities
 * @module utils/math
 */

/**
 * Round to specified decimal places
 */
export function round(value: number, decimals: number = 0): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

/**
 * Calculate median of an array
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Percentile (0-100) of a sorted array, linear interpolation between ranks
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) return 0;
  if (p <= 0) return sortedValues[0];
  if (p >= 100) return sortedValues[sortedValues.length - 1];

  const index = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) return sortedValues[lower];

  const weight = index - lower;
  return sortedValues[lower] * (1 - weight) + sortedValues[upper] * weight;
}

/**
 * Index of the half-open interval [edges[i], edges[i + 1]) holding value.
 * The last interval is closed, so the final edge maps to the last index.
 * Returns -1 when value lies outside [edges[0], edges[last]].
 */
export function intervalIndex(edges: readonly number[], value: number): number {
  const last = edges.length - 1;
  if (last < 1 || value < edges[0] || value > edges[last]) return -1;
  if (value === edges[last]) return last - 1;

  let lo = 0;
  let hi = last;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (value < edges[mid]) {
      hi = mid;
    } else {
      lo = mid;
    }
  }
  return lo;
}
