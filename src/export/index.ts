/**
 * Export module
 * @module export
 */

export {
  RegionCsvExporter,
  exportRegionsToCSV,
  exportCellsToCSV,
  REGION_COLUMNS,
  CELL_COLUMNS,
  type CSVExportOptions,
} from './csv';

export {
  exportAnalysisJson,
  toAnalysisJSON,
  JSON_EXPORT_VERSION,
  type JSONExportOptions,
  type AnalysisJSONExport,
  type RegionJSON,
} from './json';
