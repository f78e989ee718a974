/**
 * Defect Counter
 * @module grid/defect-counter
 */

import type { CountedCell, SubgridCell, TransformedDefect } from '../types';
import { createLogger } from '../utils/logger';
import { intervalIndex, sum } from '../utils/math';
import type { SubgridMap } from './subgrid-mapper';

const logger = createLogger('defect-counter');

/**
 * Count cleaned defects per cell.
 *
 * A defect is counted in its own panel's grid. Inside the panel, cells are
 * half-open on interior edges and closed on the panel's upper edges, so
 * every defect lands in exactly one cell and the counts sum to the number
 * of defects.
 */
export function countDefects(grid: SubgridMap, defects: readonly TransformedDefect[]): CountedCell[] {
  const counts = new Map<SubgridCell, number>();

  for (const defect of defects) {
    const panelGrid = grid.panelGrids.get(defect.panelLabel);
    if (!panelGrid) {
      throw new Error(`Defect belongs to unknown panel ${defect.panelLabel}`);
    }

    const localCol = intervalIndex(panelGrid.xEdges, defect.cleanX);
    const localRow = intervalIndex(panelGrid.yEdges, defect.cleanY);
    if (localCol < 0 || localRow < 0) {
      throw new Error(
        `Defect (${defect.cleanX}, ${defect.cleanY}) lies outside cleaned panel ${defect.panelLabel}`
      );
    }

    const cell = panelGrid.cells[localRow][localCol];
    counts.set(cell, (counts.get(cell) ?? 0) + 1);
  }

  const counted = grid.cells.map(cell => ({ ...cell, rawCount: counts.get(cell) ?? 0 }));

  const total = sum(counted.map(cell => cell.rawCount));
  if (total !== defects.length) {
    throw new Error(`Counted ${total} defects but ${defects.length} were supplied`);
  }

  logger.debug('Defects counted', {
    defects: total,
    occupiedCells: counted.filter(c => c.rawCount > 0).length,
  });

  return counted;
}
