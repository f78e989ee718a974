/**
 * Shared test fixtures: panel arrays, defect clusters and hand-built cells
 */

import type {
  BoundingBox,
  CleanedCell,
  CountedCell,
  DefectPoint,
  GridDimensions,
  Panel,
  PanelSpec,
} from '../../src/types';
import { PanelLayout } from '../../src/layout/panel-layout';
import { formatPanelLabel } from '../../src/layout/panel-label';
import { resolveGaps } from '../../src/transform/gap-resolver';
import { transformPanels } from '../../src/transform/coordinate-transformer';
import { subColumnLetter } from '../../src/grid/subgrid-mapper';

export interface PanelGridOptions {
  /** Panel width and height (default: 100) */
  size?: number;

  /** Gap between neighbouring panels (default: 50) */
  gap?: number;
}

/**
 * columns x rows square panels labelled "A1", "B1", ... with uniform gaps
 */
export function panelGrid(columns: number, rows: number, options: PanelGridOptions = {}): PanelSpec[] {
  const size = options.size ?? 100;
  const gap = options.gap ?? 50;
  const panels: PanelSpec[] = [];

  for (let row = 0; row < rows; row++) {
    for (let column = 0; column < columns; column++) {
      const xMin = column * (size + gap);
      const yMin = row * (size + gap);
      panels.push({
        label: formatPanelLabel(column, row),
        column,
        row,
        box: { xMin, xMax: xMin + size, yMin, yMax: yMin + size },
      });
    }
  }
  return panels;
}

/**
 * Panels with ranks and cleaned boxes
 */
export function cleanPanels(specs: readonly PanelSpec[]): Panel[] {
  const layout = PanelLayout.fromPanels(specs);
  return transformPanels(layout, resolveGaps(layout));
}

/**
 * count points on a 5-unit lattice starting 5 units inside the cell's
 * lower corner, 8 per line; the cell must be at least 50 x 50
 */
export function clusterIn(cell: BoundingBox, count: number): DefectPoint[] {
  const points: DefectPoint[] = [];
  for (let i = 0; i < count; i++) {
    points.push({
      x: cell.xMin + 5 + (i % 8) * 5,
      y: cell.yMin + 5 + Math.floor(i / 8) * 5,
    });
  }
  return points;
}

function cellBox(xMin: number, yMin: number, size: number): BoundingBox {
  return { xMin, xMax: xMin + size, yMin, yMax: yMin + size };
}

/**
 * Two 100 x 100 panels, A1 at x 0..100 and B1 at x 150..250, split 2 x 2.
 * `counts` maps a cell id ("A1-b1") to the number of defects placed in it;
 * cells not listed get `background` defects.
 */
export function twoPanelDefects(counts: Record<string, number>, background: number = 2): DefectPoint[] {
  const defects: DefectPoint[] = [];

  for (const [label, xOrigin] of [['A1', 0], ['B1', 150]] as const) {
    for (let localRow = 0; localRow < 2; localRow++) {
      for (let localCol = 0; localCol < 2; localCol++) {
        const id = `${label}-${subColumnLetter(localCol)}${localRow + 1}`;
        const box = cellBox(xOrigin + localCol * 50, localRow * 50, 50);
        defects.push(...clusterIn(box, counts[id] ?? background));
      }
    }
  }
  return defects;
}

function gridCell(globalRow: number, globalCol: number, cellSize: number) {
  const box = cellBox(globalCol * cellSize, globalRow * cellSize, cellSize);
  const subCol = subColumnLetter(globalCol);
  return {
    id: `P-${subCol}${globalRow + 1}`,
    panelLabel: 'P',
    subRow: globalRow + 1,
    subCol,
    localRow: globalRow,
    localCol: globalCol,
    globalRow,
    globalCol,
    box,
    cleanBox: box,
  };
}

/**
 * Single-panel cells from a row-major matrix of raw counts; ids are
 * "P-{letter}{row}" and every cell is cellSize x cellSize
 */
export function countedGrid(counts: readonly number[][], cellSize: number = 10): CountedCell[] {
  const cells: CountedCell[] = [];
  counts.forEach((row, globalRow) => {
    row.forEach((rawCount, globalCol) => {
      cells.push({ ...gridCell(globalRow, globalCol, cellSize), rawCount });
    });
  });
  return cells;
}

/**
 * Cells whose cleaned count is the matrix value (no noise subtracted)
 */
export function cleanedGrid(values: readonly number[][], cellSize: number = 10): CleanedCell[] {
  return countedGrid(values, cellSize).map(cell => ({
    ...cell,
    noiseEstimate: 0,
    cleanedCount: cell.rawCount,
  }));
}

export function dimensionsOf(values: readonly number[][]): GridDimensions {
  const totalRows = values.length;
  const totalCols = totalRows > 0 ? values[0].length : 0;
  return { subRows: totalRows, subCols: totalCols, totalRows, totalCols };
}
