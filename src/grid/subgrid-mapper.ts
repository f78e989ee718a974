/**
 * Sub-grid Mapper
 *
 * Splits every cleaned panel box into an N x M sub-grid and gives each cell
 * a global (row, column) index over the whole panel array:
 *
 *   globalRow = rowRank * N + localRow
 *   globalCol = columnRank * M + localCol
 *
 * Ranks and local indices are zero-based, so cells on either side of a
 * removed gap get consecutive global indices. Local rows count up from the
 * panel's lowest y (sub-row 1), local columns from its lowest x (sub-column
 * 'a').
 *
 * @module grid/subgrid-mapper
 */

import type { AnalysisConfig, GridDimensions, Panel, SubgridCell } from '../types';
import { boxHeight, boxWidth } from '../types';
import { createLogger } from '../utils/logger';
import {
  ConfigurationError,
  MAX_SUBGRID_COLUMNS,
  validatePartitionFactor,
} from '../utils/validation';

const logger = createLogger('subgrid-mapper');

/** Relative tolerance when a fixed cell size must divide a panel */
const DIVISIBILITY_TOLERANCE = 1e-9;

export interface SubgridPartition {
  /** Rows per panel (N) */
  subRows: number;

  /** Columns per panel (M) */
  subCols: number;
}

/**
 * Cell edges of one panel; edges are shared by neighbouring cells
 */
export interface PanelGrid {
  panel: Panel;

  /** M + 1 cleaned x edges, first and last equal to the panel's bounds */
  xEdges: number[];

  /** N + 1 cleaned y edges */
  yEdges: number[];

  /** Cells indexed [localRow][localCol] */
  cells: SubgridCell[][];
}

export interface SubgridMap {
  /** All cells ordered by (globalRow, globalCol) */
  cells: SubgridCell[];

  dimensions: GridDimensions;

  /** Per-panel edges keyed by panel label */
  panelGrids: Map<string, PanelGrid>;
}

/**
 * Sub-column letter for a zero-based local column
 */
export function subColumnLetter(localCol: number): string {
  return String.fromCharCode(97 + localCol);
}

/**
 * Cell identifier "{panelLabel}-{subCol}{subRow}", e.g. "H5-a3"
 */
export function formatCellId(panelLabel: string, localRow: number, localCol: number): string {
  return `${panelLabel}-${subColumnLetter(localCol)}${localRow + 1}`;
}

/**
 * Split [min, max] into equal parts. The outer edges are the inputs
 * themselves so cells never reach past their panel.
 */
export function splitEdges(min: number, max: number, parts: number): number[] {
  const edges: number[] = [min];
  for (let k = 1; k < parts; k++) {
    edges.push(min + ((max - min) * k) / parts);
  }
  edges.push(max);
  return edges;
}

function divisions(length: number, cellSize: number, option: string, label: string): number {
  const ratio = length / cellSize;
  const whole = Math.round(ratio);

  if (whole < 1 || Math.abs(ratio - whole) > DIVISIBILITY_TOLERANCE * Math.max(1, ratio)) {
    throw new ConfigurationError(
      `${cellSize} does not evenly divide panel ${label} (length ${length})`,
      option,
      cellSize
    );
  }
  return whole;
}

function uniformDivisions(
  panels: readonly Panel[],
  cellSize: number,
  option: 'cellWidth' | 'cellHeight',
  length: (panel: Panel) => number
): number {
  let parts: number | undefined;

  for (const panel of panels) {
    const n = divisions(length(panel), cellSize, option, panel.label);
    if (parts === undefined) {
      parts = n;
    } else if (n !== parts) {
      throw new ConfigurationError(
        `gives ${n} cells for panel ${panel.label} but ${parts} for other panels`,
        option,
        cellSize
      );
    }
  }

  if (parts === undefined) {
    throw new ConfigurationError('cannot derive a partition without panels', option, cellSize);
  }
  return parts;
}

/**
 * Sub-grid size per panel, from the partition factors or a fixed cell size
 * @throws ConfigurationError when a fixed size does not divide every panel
 *   into the same number of cells
 */
export function resolvePartition(
  panels: readonly Panel[],
  config: Pick<AnalysisConfig, 'subGridRows' | 'subGridCols' | 'cellWidth' | 'cellHeight'>
): SubgridPartition {
  const subCols = config.cellWidth !== undefined
    ? uniformDivisions(panels, config.cellWidth, 'cellWidth', p => boxWidth(p.cleanBox))
    : config.subGridCols;

  const subRows = config.cellHeight !== undefined
    ? uniformDivisions(panels, config.cellHeight, 'cellHeight', p => boxHeight(p.cleanBox))
    : config.subGridRows;

  validatePartitionFactor(subRows, 'subGridRows');
  validatePartitionFactor(subCols, 'subGridCols', MAX_SUBGRID_COLUMNS);

  return { subRows, subCols };
}

/**
 * Build every panel's cells with local and global indices
 */
export function mapSubgrids(panels: readonly Panel[], partition: SubgridPartition): SubgridMap {
  const { subRows, subCols } = partition;
  validatePartitionFactor(subRows, 'subGridRows');
  validatePartitionFactor(subCols, 'subGridCols', MAX_SUBGRID_COLUMNS);

  const panelGrids = new Map<string, PanelGrid>();
  const cells: SubgridCell[] = [];
  let columnRanks = 0;
  let rowRanks = 0;

  for (const panel of panels) {
    const xEdges = splitEdges(panel.cleanBox.xMin, panel.cleanBox.xMax, subCols);
    const yEdges = splitEdges(panel.cleanBox.yMin, panel.cleanBox.yMax, subRows);
    const xPhysical = splitEdges(panel.box.xMin, panel.box.xMax, subCols);
    const yPhysical = splitEdges(panel.box.yMin, panel.box.yMax, subRows);

    const grid: SubgridCell[][] = [];

    for (let localRow = 0; localRow < subRows; localRow++) {
      const rowCells: SubgridCell[] = [];

      for (let localCol = 0; localCol < subCols; localCol++) {
        const cell: SubgridCell = {
          id: formatCellId(panel.label, localRow, localCol),
          panelLabel: panel.label,
          subRow: localRow + 1,
          subCol: subColumnLetter(localCol),
          localRow,
          localCol,
          globalRow: panel.rowRank * subRows + localRow,
          globalCol: panel.columnRank * subCols + localCol,
          box: {
            xMin: xPhysical[localCol],
            xMax: xPhysical[localCol + 1],
            yMin: yPhysical[localRow],
            yMax: yPhysical[localRow + 1],
          },
          cleanBox: {
            xMin: xEdges[localCol],
            xMax: xEdges[localCol + 1],
            yMin: yEdges[localRow],
            yMax: yEdges[localRow + 1],
          },
        };
        rowCells.push(cell);
        cells.push(cell);
      }
      grid.push(rowCells);
    }

    panelGrids.set(panel.label, { panel, xEdges, yEdges, cells: grid });
    columnRanks = Math.max(columnRanks, panel.columnRank + 1);
    rowRanks = Math.max(rowRanks, panel.rowRank + 1);
  }

  cells.sort((a, b) => a.globalRow - b.globalRow || a.globalCol - b.globalCol);

  const dimensions: GridDimensions = {
    subRows,
    subCols,
    totalRows: rowRanks * subRows,
    totalCols: columnRanks * subCols,
  };

  logger.debug('Sub-grids mapped', { cells: cells.length, ...dimensions });

  return { cells, dimensions, panelGrids };
}
