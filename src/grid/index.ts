/**
 * Sub-grid exports
 * @module grid
 */

export {
  mapSubgrids,
  resolvePartition,
  splitEdges,
  formatCellId,
  subColumnLetter,
  type SubgridPartition,
  type SubgridMap,
  type PanelGrid,
} from './subgrid-mapper';

export { countDefects } from './defect-counter';
