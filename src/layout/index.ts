/**
 * Panel layout exports
 * @module layout
 */

export { PanelLayout } from './panel-layout';
export { filterOutliers, type FilterResult } from './outlier-filter';
export { columnLetters, formatPanelLabel, stripProductPrefix } from './panel-label';
