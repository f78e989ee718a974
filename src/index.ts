/**
 * panelscan - defect density analysis across gapped panel arrays
 *
 * Removes the physical gaps between panels, splits every panel into a
 * sub-grid, counts defects per cell, subtracts background noise and finds
 * connected high-density regions, including regions that cross panel seams.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  BoundingBox,
  PanelSpec,
  Panel,
  AxisExtent,
  AxisShift,
  DefectPoint,
  AssignedDefect,
  TransformedDefect,
  SubgridCell,
  CountedCell,
  CleanedCell,
  CellRecord,
  GridDimensions,
  Region,
  RegionTableRow,
  Connectivity,
  NoiseEstimator,
  AnalysisConfig,
  AnalysisOptions,
} from './types';

export { boxWidth, boxHeight, boxesOverlap, unionBoxes } from './types';

// ============================================================================
// Pipeline
// ============================================================================

export { analyzeDefects, type DefectAnalysis, type AnalysisSummary } from './analysis';

export { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from './config';

// ============================================================================
// Stages
// ============================================================================

export {
  PanelLayout,
  filterOutliers,
  formatPanelLabel,
  columnLetters,
  stripProductPrefix,
  type FilterResult,
} from './layout';

export {
  GapResolution,
  resolveGaps,
  resolveAxis,
  cleanBoxAt,
  transformPanels,
  transformDefects,
  cleanedExtent,
} from './transform';

export {
  mapSubgrids,
  resolvePartition,
  splitEdges,
  formatCellId,
  subColumnLetter,
  countDefects,
  type SubgridMap,
  type SubgridPartition,
  type PanelGrid,
} from './grid';

export {
  MedianNoiseEstimator,
  PercentileNoiseEstimator,
  ConstantNoiseEstimator,
  AreaDensityNoiseEstimator,
  LocalWindowNoiseEstimator,
  cleanCounts,
  type CleanOptions,
} from './noise';

export {
  detectRegions,
  compareRegions,
  labelConnectedComponents,
  toRegionTable,
  type RegionDetectionOptions,
  type RegionDetectionResult,
  type LabelResult,
} from './regions';

// ============================================================================
// Loading and export
// ============================================================================

export {
  parseCsv,
  parseCsvRows,
  parsePanelRecords,
  parseDefectRecords,
  parseCornerRecords,
  panelsFromCorners,
  readRecords,
  loadPanelsFile,
  loadDefectsFile,
  loadCornerPanelsFile,
  type CornerRow,
  type CornerPanelOptions,
  type CSVParseOptions,
} from './loader';

export {
  RegionCsvExporter,
  exportRegionsToCSV,
  exportCellsToCSV,
  exportAnalysisJson,
  toAnalysisJSON,
  type CSVExportOptions,
  type JSONExportOptions,
  type AnalysisJSONExport,
} from './export';

// ============================================================================
// Utilities
// ============================================================================

export {
  ValidationError,
  LayoutError,
  ConfigurationError,
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './utils';
