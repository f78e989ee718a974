/**
 * Defect density analysis pipeline
 *
 * layout -> outlier filter -> gap removal -> sub-grid mapping -> counting
 * -> noise removal -> region detection, as one synchronous batch pass.
 *
 * @module analysis/analyze-defects
 */

import type {
  AnalysisConfig,
  AnalysisOptions,
  BoundingBox,
  CellRecord,
  DefectPoint,
  GridDimensions,
  Panel,
  PanelSpec,
  Region,
  RegionTableRow,
  TransformedDefect,
} from '../types';
import { resolveAnalysisConfig } from '../config/defaults';
import { PanelLayout } from '../layout/panel-layout';
import { filterOutliers } from '../layout/outlier-filter';
import { GapResolution, resolveGaps } from '../transform/gap-resolver';
import { cleanedExtent, transformDefects, transformPanels } from '../transform/coordinate-transformer';
import { mapSubgrids, resolvePartition } from '../grid/subgrid-mapper';
import { countDefects } from '../grid/defect-counter';
import { cleanCounts } from '../noise/noise-cleaner';
import { detectRegions } from '../regions/region-detector';
import { toRegionTable } from '../regions/region-table';
import { createLogger } from '../utils/logger';

const logger = createLogger('analysis');

/**
 * Headline numbers of one analysis run
 */
export interface AnalysisSummary {
  inputDefects: number;
  filteredDefects: number;
  droppedDefects: number;
  panelCount: number;
  cellCount: number;
  activeCells: number;
  regionCount: number;

  /** Name of the noise policy used */
  noiseEstimator: string;

  grid: GridDimensions;

  /** Physical box covering all panels, gaps included */
  physicalExtent: BoundingBox;

  /** Box covering the cleaned panels */
  cleanedExtent: BoundingBox;
}

/**
 * Everything a run produces, for reporting and visualisation
 */
export interface DefectAnalysis {
  config: AnalysisConfig;
  layout: PanelLayout;
  gaps: GapResolution;

  /** Panels with cleaned boxes */
  panels: Panel[];

  /** Filtered defects with original and cleaned coordinates */
  defects: TransformedDefect[];

  /** Per-cell data surface ordered by (globalRow, globalCol) */
  cells: CellRecord[];

  /** Regions sorted by total cleaned defects, descending */
  regions: Region[];

  regionTable: RegionTableRow[];

  summary: AnalysisSummary;
}

/**
 * Run the full pipeline
 *
 * @throws LayoutError for a malformed panel layout (before any transform)
 * @throws ConfigurationError for invalid or inconsistent options
 */
export function analyzeDefects(
  panelSpecs: readonly PanelSpec[],
  defectPoints: readonly DefectPoint[],
  options: AnalysisOptions = {}
): DefectAnalysis {
  const config = resolveAnalysisConfig(options);

  const layout = logger.time('layout', () => PanelLayout.fromPanels(panelSpecs));
  const { accepted, dropped } = filterOutliers(defectPoints, layout);

  const gaps = resolveGaps(layout);
  const panels = transformPanels(layout, gaps);
  const defects = transformDefects(accepted, gaps);

  const extent = cleanedExtent(panels);
  if (!extent) {
    throw new Error('Layout produced no cleaned panels');
  }

  const partition = resolvePartition(panels, config);
  const grid = mapSubgrids(panels, partition);
  const counted = countDefects(grid, defects);
  const cleaned = cleanCounts(counted, config.noiseEstimator, {
    roundCleanedCounts: config.roundCleanedCounts,
  });

  const { regions, cells } = logger.time('region detection', () =>
    detectRegions(cleaned, grid.dimensions, {
      threshold: config.noiseThreshold,
      connectivity: config.connectivity,
    })
  );

  const summary: AnalysisSummary = {
    inputDefects: defectPoints.length,
    filteredDefects: defects.length,
    droppedDefects: dropped,
    panelCount: panels.length,
    cellCount: cells.length,
    activeCells: cells.filter(c => c.regionId !== null).length,
    regionCount: regions.length,
    noiseEstimator: config.noiseEstimator.name,
    grid: grid.dimensions,
    physicalExtent: layout.bounds,
    cleanedExtent: extent,
  };

  logger.info('Analysis complete', {
    defects: summary.filteredDefects,
    cells: summary.cellCount,
    regions: summary.regionCount,
  });

  return {
    config,
    layout,
    gaps,
    panels,
    defects,
    cells,
    regions,
    regionTable: toRegionTable(regions),
    summary,
  };
}
