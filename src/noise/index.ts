/**
 * Noise estimation exports
 * @module noise
 */

export {
  MedianNoiseEstimator,
  PercentileNoiseEstimator,
  ConstantNoiseEstimator,
  AreaDensityNoiseEstimator,
  LocalWindowNoiseEstimator,
} from './estimators';

export { cleanCounts, type CleanOptions } from './noise-cleaner';
