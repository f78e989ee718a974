/**
 * Region detection exports
 * @module regions
 */

export { labelConnectedComponents, type LabelResult } from './connected-components';
export {
  detectRegions,
  compareRegions,
  type RegionDetectionOptions,
  type RegionDetectionResult,
} from './region-detector';
export { toRegionTable } from './region-table';
