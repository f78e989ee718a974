/**
 * JSON Exporter
 * Versioned JSON document of an analysis run
 *
 * @module export/json
 */

import type { DefectAnalysis, AnalysisSummary } from '../analysis/analyze-defects';
import type { BoundingBox, CellRecord, RegionTableRow } from '../types';

/**
 * JSON export options
 */
export interface JSONExportOptions {
  /** Pretty print with indentation (default: true) */
  prettyPrint?: boolean;

  /** Indentation spaces (default: 2) */
  indent?: number;

  /** Include the per-cell data surface (default: false) */
  includeCells?: boolean;

  /** Export timestamp (default: now) */
  exportedAt?: Date;
}

export const JSON_EXPORT_VERSION = '1.0';

export interface RegionJSON extends RegionTableRow {
  bounds: BoundingBox;
  cleanBounds: BoundingBox;
}

/**
 * JSON export structure
 */
export interface AnalysisJSONExport {
  version: string;
  exportedAt: string;
  config: {
    subGridRows: number;
    subGridCols: number;
    noiseThreshold: number;
    connectivity: number;
    noiseEstimator: string;
    roundCleanedCounts: boolean;
  };
  summary: AnalysisSummary;
  regions: RegionJSON[];
  cells?: CellRecord[];
}

/**
 * Build the export document
 */
export function toAnalysisJSON(analysis: DefectAnalysis, options: JSONExportOptions = {}): AnalysisJSONExport {
  const { config, summary } = analysis;

  const document: AnalysisJSONExport = {
    version: JSON_EXPORT_VERSION,
    exportedAt: (options.exportedAt ?? new Date()).toISOString(),
    config: {
      subGridRows: summary.grid.subRows,
      subGridCols: summary.grid.subCols,
      noiseThreshold: config.noiseThreshold,
      connectivity: config.connectivity,
      noiseEstimator: config.noiseEstimator.name,
      roundCleanedCounts: config.roundCleanedCounts,
    },
    summary,
    regions: analysis.regionTable.map((row, i) => ({
      ...row,
      bounds: analysis.regions[i].bounds,
      cleanBounds: analysis.regions[i].cleanBounds,
    })),
  };

  if (options.includeCells) {
    document.cells = analysis.cells;
  }

  return document;
}

/**
 * Serialize an analysis run to a JSON string
 */
export function exportAnalysisJson(analysis: DefectAnalysis, options: JSONExportOptions = {}): string {
  const prettyPrint = options.prettyPrint ?? true;
  const document = toAnalysisJSON(analysis, options);
  return prettyPrint ? JSON.stringify(document, null, options.indent ?? 2) : JSON.stringify(document);
}
