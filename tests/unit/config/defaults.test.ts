/**
 * Analysis configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from '../../../src/config/defaults';
import { ConstantNoiseEstimator } from '../../../src/noise/estimators';
import { ConfigurationError } from '../../../src/utils/validation';
import type { AnalysisOptions } from '../../../src/types';

describe('resolveAnalysisConfig', () => {
  it('should default to a 3x3 grid, zero threshold, 8-connectivity and median noise', () => {
    const config = resolveAnalysisConfig();

    expect(config).toMatchObject({
      subGridRows: 3,
      subGridCols: 3,
      noiseThreshold: 0,
      connectivity: 8,
      roundCleanedCounts: false,
    });
    expect(config.noiseEstimator.name).toBe('median');
    expect(config.cellWidth).toBeUndefined();
    expect(config.cellHeight).toBeUndefined();
  });

  it('should apply overrides', () => {
    const estimator = new ConstantNoiseEstimator(1);
    const config = resolveAnalysisConfig({
      subGridRows: 5,
      connectivity: 4,
      noiseThreshold: 1.5,
      noiseEstimator: estimator,
      cellWidth: 10,
    });

    expect(config).toMatchObject({ subGridRows: 5, subGridCols: 3, connectivity: 4, noiseThreshold: 1.5, cellWidth: 10 });
    expect(config.noiseEstimator).toBe(estimator);
  });

  it('should keep defaults for explicit undefined', () => {
    expect(resolveAnalysisConfig({ subGridRows: undefined }).subGridRows).toBe(3);
  });

  it('should not modify the defaults', () => {
    resolveAnalysisConfig({ subGridRows: 7 });
    expect(DEFAULT_ANALYSIS_CONFIG.subGridRows).toBe(3);
  });

  it.each<[AnalysisOptions, string]>([
    [{ subGridRows: 0 }, 'subGridRows: must be a positive integer'],
    [{ subGridCols: 1.5 }, 'subGridCols: must be a positive integer'],
    [{ subGridCols: 27 }, 'subGridCols: must not exceed 26'],
    [{ cellWidth: -1 }, 'cellWidth: must be a positive number'],
    [{ cellHeight: 0 }, 'cellHeight: must be a positive number'],
    [{ noiseThreshold: -0.5 }, 'noiseThreshold: must be a non-negative number'],
    [{ noiseThreshold: NaN }, 'noiseThreshold: must be a non-negative number'],
  ])('should reject %o', (options, message) => {
    expect(() => resolveAnalysisConfig(options)).toThrow(ConfigurationError);
    expect(() => resolveAnalysisConfig(options)).toThrow(message);
  });

  describe('options read from untyped JSON', () => {
    function fromJson(text: string): AnalysisOptions {
      return JSON.parse(text);
    }

    it('should reject an unsupported connectivity', () => {
      expect(() => resolveAnalysisConfig(fromJson('{"connectivity": 6}'))).toThrow(
        'connectivity: must be 4 or 8'
      );
    });

    it('should reject an estimator without estimate()', () => {
      expect(() => resolveAnalysisConfig(fromJson('{"noiseEstimator": {"name": "broken"}}'))).toThrow(
        'noiseEstimator: must implement estimate()'
      );
    });
  });
});
