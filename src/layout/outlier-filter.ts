/**
 * Outlier filtering
 *
 * Defects outside every panel box are expected in the source data (stray
 * points in the gaps and around the array) and are dropped silently.
 *
 * @module layout/outlier-filter
 */

import type { AssignedDefect, DefectPoint } from '../types';
import { createLogger } from '../utils/logger';
import type { PanelLayout } from './panel-layout';

const logger = createLogger('outlier-filter');

export interface FilterResult {
  /** Defects inside a panel, in input order, tagged with their panel */
  accepted: AssignedDefect[];

  /** Number of defects outside every panel */
  dropped: number;
}

/**
 * Keep the defects that lie in the closed box of some panel
 */
export function filterOutliers(defects: readonly DefectPoint[], layout: PanelLayout): FilterResult {
  const accepted: AssignedDefect[] = [];

  for (const defect of defects) {
    const panel = layout.locate(defect.x, defect.y);
    if (!panel) continue;

    accepted.push({
      ...defect,
      panelLabel: panel.label,
      column: panel.column,
      row: panel.row,
    });
  }

  const dropped = defects.length - accepted.length;
  logger.info('Filtered outliers', { input: defects.length, kept: accepted.length, dropped });

  return { accepted, dropped };
}
