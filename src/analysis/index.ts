/**
 * Analysis pipeline exports
 * @module analysis
 */

export { analyzeDefects, type DefectAnalysis, type AnalysisSummary } from './analyze-defects';
