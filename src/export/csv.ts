/**
 * CSV Exporter
 * Export the region table and the per-cell data surface as CSV
 *
 * @module export/csv
 */

import type { CellRecord, RegionTableRow } from '../types';

/**
 * CSV export options
 */
export interface CSVExportOptions {
  /** Delimiter (default: ',') */
  delimiter?: string;

  /** Line ending (default: '\n') */
  lineEnding?: string;

  /** Include header row (default: true) */
  includeHeader?: boolean;

  /** Decimal places for non-integer values (default: 2) */
  decimalPlaces?: number;

  /** Separator between sub-grid ids in the region table (default: ';') */
  subgridSeparator?: string;
}

export const REGION_COLUMNS = [
  'region_id',
  'total_defects_cleaned',
  'subgrid_count',
  'avg_defects_per_grid',
  'subgrids',
] as const;

export const CELL_COLUMNS = [
  'cell_id',
  'panel_label',
  'sub_row',
  'sub_col',
  'global_row',
  'global_col',
  'x_min',
  'x_max',
  'y_min',
  'y_max',
  'clean_x_min',
  'clean_x_max',
  'clean_y_min',
  'clean_y_max',
  'raw_count',
  'noise_estimate',
  'cleaned_count',
  'region_id',
] as const;

/**
 * CSV Exporter class
 */
export class RegionCsvExporter {
  private options: Required<CSVExportOptions>;

  constructor(options: CSVExportOptions = {}) {
    this.options = {
      delimiter: options.delimiter ?? ',',
      lineEnding: options.lineEnding ?? '\n',
      includeHeader: options.includeHeader ?? true,
      decimalPlaces: options.decimalPlaces ?? 2,
      subgridSeparator: options.subgridSeparator ?? ';',
    };
  }

  /**
   * Region table, one line per region; the average always has 2 decimals
   */
  exportRegions(rows: readonly RegionTableRow[]): string {
    const lines = rows.map(row => [
      String(row.regionId),
      this.formatNumber(row.totalDefectsCleaned),
      String(row.subgridCount),
      row.avgDefectsPerGrid.toFixed(2),
      row.subgrids.join(this.options.subgridSeparator),
    ]);

    return this.render(REGION_COLUMNS, lines);
  }

  /**
   * Per-cell data surface, one line per cell
   */
  exportCells(cells: readonly CellRecord[]): string {
    const lines = cells.map(cell => [
      cell.id,
      cell.panelLabel,
      String(cell.subRow),
      cell.subCol,
      String(cell.globalRow),
      String(cell.globalCol),
      this.formatNumber(cell.box.xMin),
      this.formatNumber(cell.box.xMax),
      this.formatNumber(cell.box.yMin),
      this.formatNumber(cell.box.yMax),
      this.formatNumber(cell.cleanBox.xMin),
      this.formatNumber(cell.cleanBox.xMax),
      this.formatNumber(cell.cleanBox.yMin),
      this.formatNumber(cell.cleanBox.yMax),
      String(cell.rawCount),
      this.formatNumber(cell.noiseEstimate),
      this.formatNumber(cell.cleanedCount),
      cell.regionId === null ? '' : String(cell.regionId),
    ]);

    return this.render(CELL_COLUMNS, lines);
  }

  private render(columns: readonly string[], rows: string[][]): string {
    const { delimiter, lineEnding, includeHeader } = this.options;
    const lines: string[] = [];

    if (includeHeader) {
      lines.push(columns.join(delimiter));
    }
    for (const row of rows) {
      lines.push(row.map(field => this.escape(field)).join(delimiter));
    }

    return lines.join(lineEnding) + lineEnding;
  }

  private formatNumber(value: number): string {
    return Number.isInteger(value) ? String(value) : value.toFixed(this.options.decimalPlaces);
  }

  private escape(field: string): string {
    if (field.includes(this.options.delimiter) || /["\r\n]/.test(field)) {
      return `"${field.replace(/"/g, '""')}"`;
    }
    return field;
  }
}

/**
 * Convenience function for a region table CSV
 */
export function exportRegionsToCSV(rows: readonly RegionTableRow[], options?: CSVExportOptions): string {
  return new RegionCsvExporter(options).exportRegions(rows);
}

/**
 * Convenience function for a cell surface CSV
 */
export function exportCellsToCSV(cells: readonly CellRecord[], options?: CSVExportOptions): string {
  return new RegionCsvExporter(options).exportCells(cells);
}
