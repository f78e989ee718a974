/**
 * Configuration exports
 * @module config
 */

export { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from './defaults';
