/**
 * Coordinate Transformer
 *
 * Applies gap removal by panel membership: a point moves with its own
 * panel's column and row, never by a geometric lookup, so points on a
 * removed gap boundary stay with the panel they came from.
 *
 * @module transform/coordinate-transformer
 */

import type { AssignedDefect, BoundingBox, Panel, TransformedDefect } from '../types';
import { unionBoxes } from '../types';
import type { PanelLayout } from '../layout/panel-layout';
import type { GapResolution } from './gap-resolver';

/**
 * Gap-free box of the panel at a column and row
 */
export function cleanBoxAt(gaps: GapResolution, column: number, row: number): BoundingBox {
  const x = gaps.column(column);
  const y = gaps.row(row);
  return { xMin: x.cleanMin, xMax: x.cleanMax, yMin: y.cleanMin, yMax: y.cleanMax };
}

/**
 * Panels with cleaned boxes and zero-based ranks, in layout order
 */
export function transformPanels(layout: PanelLayout, gaps: GapResolution): Panel[] {
  return layout.panels.map(panel => ({
    ...panel,
    columnRank: layout.columnRank(panel.column),
    rowRank: layout.rowRank(panel.row),
    cleanBox: cleanBoxAt(gaps, panel.column, panel.row),
  }));
}

/**
 * Gap-free coordinates for every defect; originals are kept
 */
export function transformDefects(
  defects: readonly AssignedDefect[],
  gaps: GapResolution
): TransformedDefect[] {
  return defects.map(defect => {
    const transformed: TransformedDefect = {
      origX: defect.x,
      origY: defect.y,
      cleanX: gaps.cleanX(defect.column, defect.x),
      cleanY: gaps.cleanY(defect.row, defect.y),
      panelLabel: defect.panelLabel,
      column: defect.column,
      row: defect.row,
    };
    if (defect.id !== undefined) transformed.id = defect.id;
    if (defect.kind !== undefined) transformed.kind = defect.kind;
    return transformed;
  });
}

/**
 * Rectangle covered by the cleaned panels
 */
export function cleanedExtent(panels: readonly Panel[]): BoundingBox | null {
  return unionBoxes(panels.map(p => p.cleanBox));
}
