/**
 * Default configuration values
 * @module config/defaults
 */

import type { AnalysisConfig, AnalysisOptions } from '../types';
import { MedianNoiseEstimator } from '../noise/estimators';
import {
  ConfigurationError,
  MAX_SUBGRID_COLUMNS,
  isFiniteNumber,
  validatePartitionFactor,
} from '../utils/validation';

/**
 * Default analysis configuration: 3x3 sub-grid per panel, any residual
 * signal is active, 8-connected regions, global median background
 */
export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = {
  subGridRows: 3,
  subGridCols: 3,
  noiseThreshold: 0,
  connectivity: 8,
  noiseEstimator: new MedianNoiseEstimator(),
  roundCleanedCounts: false,
};

/**
 * Merge caller options over the defaults and validate the result
 */
export function resolveAnalysisConfig(options: AnalysisOptions = {}): AnalysisConfig {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG };

  // Explicit undefined keeps the default
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  validatePartitionFactor(config.subGridRows, 'subGridRows');
  validatePartitionFactor(config.subGridCols, 'subGridCols', MAX_SUBGRID_COLUMNS);

  for (const option of ['cellWidth', 'cellHeight'] as const) {
    const size = config[option];
    if (size !== undefined && (!isFiniteNumber(size) || size <= 0)) {
      throw new ConfigurationError('must be a positive number', option, size);
    }
  }

  if (!isFiniteNumber(config.noiseThreshold) || config.noiseThreshold < 0) {
    throw new ConfigurationError('must be a non-negative number', 'noiseThreshold', config.noiseThreshold);
  }

  if (config.connectivity !== 4 && config.connectivity !== 8) {
    throw new ConfigurationError('must be 4 or 8', 'connectivity', config.connectivity);
  }

  if (typeof config.noiseEstimator?.estimate !== 'function') {
    throw new ConfigurationError('must implement estimate()', 'noiseEstimator', config.noiseEstimator);
  }

  return config;
}
