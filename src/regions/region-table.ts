/**
 * Region table rows for reporting
 * @module regions/region-table
 */

import type { Region, RegionTableRow } from '../types';
import { round } from '../utils/math';

/**
 * One table row per region, in the order given (already sorted by the
 * detector); the average is rounded to 2 decimals
 */
export function toRegionTable(regions: readonly Region[]): RegionTableRow[] {
  return regions.map(region => ({
    regionId: region.regionId,
    totalDefectsCleaned: region.totalCleanedDefects,
    subgridCount: region.cellCount,
    avgDefectsPerGrid: round(region.avgDensity, 2),
    subgrids: region.cells.map(c => c.id),
  }));
}
