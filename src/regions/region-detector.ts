/**
 * Region Detector
 *
 * Labels active cells (cleaned count above the threshold) over the global
 * index grid. Global indices are continuous across panel seams, so a
 * cluster spanning two panels is one region without any seam handling.
 *
 * Region ids follow discovery order: the row-major position (globalRow,
 * then globalCol) of each region's first cell. The returned list is sorted
 * by total cleaned defects, descending, ties by ascending id.
 *
 * @module regions/region-detector
 */

import type {
  BoundingBox,
  CellRecord,
  CleanedCell,
  Connectivity,
  GridDimensions,
  Region,
} from '../types';
import { unionBoxes } from '../types';
import { createLogger } from '../utils/logger';
import { sum } from '../utils/math';
import { labelConnectedComponents } from './connected-components';

const logger = createLogger('region-detector');

export interface RegionDetectionOptions {
  /** Cells with cleanedCount strictly above this are active (default: 0) */
  threshold?: number;

  /** Neighbourhood (default: 8) */
  connectivity?: Connectivity;
}

export interface RegionDetectionResult {
  /** Regions sorted by total cleaned defects, descending */
  regions: Region[];

  /** Input cells, in input order, with their region id */
  cells: CellRecord[];
}

/**
 * Place every cell on the dense global grid
 * @throws Error when a position is missing or occupied twice
 */
function rasterize(cells: readonly CleanedCell[], dimensions: GridDimensions): CleanedCell[] {
  const { totalRows, totalCols } = dimensions;
  const grid: (CleanedCell | undefined)[] = new Array(totalRows * totalCols);

  for (const cell of cells) {
    const { globalRow, globalCol } = cell;
    if (globalRow < 0 || globalRow >= totalRows || globalCol < 0 || globalCol >= totalCols) {
      throw new Error(`Cell ${cell.id} has global index (${globalRow}, ${globalCol}) outside the grid`);
    }
    const position = globalRow * totalCols + globalCol;
    const occupant = grid[position];
    if (occupant) {
      throw new Error(`Cells ${occupant.id} and ${cell.id} share global index (${globalRow}, ${globalCol})`);
    }
    grid[position] = cell;
  }

  const dense: CleanedCell[] = [];
  for (let position = 0; position < grid.length; position++) {
    const cell = grid[position];
    if (!cell) {
      const row = Math.floor(position / totalCols);
      throw new Error(`No cell at global index (${row}, ${position % totalCols})`);
    }
    dense.push(cell);
  }
  return dense;
}

function boundsOf(boxes: BoundingBox[]): BoundingBox {
  const bounds = unionBoxes(boxes);
  if (!bounds) {
    throw new Error('Region has no cells');
  }
  return bounds;
}

export function compareRegions(a: Region, b: Region): number {
  return b.totalCleanedDefects - a.totalCleanedDefects || a.regionId - b.regionId;
}

/**
 * Find connected regions of active cells
 */
export function detectRegions(
  cells: readonly CleanedCell[],
  dimensions: GridDimensions,
  options: RegionDetectionOptions = {}
): RegionDetectionResult {
  const threshold = options.threshold ?? 0;
  const connectivity = options.connectivity ?? 8;
  const { totalRows, totalCols } = dimensions;

  const dense = rasterize(cells, dimensions);
  const mask = new Uint8Array(dense.length);
  dense.forEach((cell, i) => {
    mask[i] = cell.cleanedCount > threshold ? 1 : 0;
  });

  const { labels, numLabels } = labelConnectedComponents(mask, totalCols, totalRows, connectivity);

  const members: CleanedCell[][] = Array.from({ length: numLabels }, () => []);
  const regionOf = new Map<CleanedCell, number>();
  dense.forEach((cell, i) => {
    const label = labels[i];
    if (label === 0) return;
    members[label - 1].push(cell);
    regionOf.set(cell, label);
  });

  const regions: Region[] = members.map((regionCells, i) => {
    const totalCleanedDefects = sum(regionCells.map(c => c.cleanedCount));
    return {
      regionId: i + 1,
      cells: regionCells,
      totalCleanedDefects,
      cellCount: regionCells.length,
      avgDensity: totalCleanedDefects / regionCells.length,
      bounds: boundsOf(regionCells.map(c => c.box)),
      cleanBounds: boundsOf(regionCells.map(c => c.cleanBox)),
    };
  });

  regions.sort(compareRegions);

  logger.info('Regions detected', {
    regions: regions.length,
    activeCells: regionOf.size,
    threshold,
    connectivity,
  });

  return {
    regions,
    cells: cells.map(cell => ({ ...cell, regionId: regionOf.get(cell) ?? null })),
  };
}
