/**
 * Dataset loaders
 *
 * Supported inputs:
 * - panel and defect records (plain objects)
 * - CSV text with a header row
 * - panels stored as corner points
 * - .json / .csv files
 *
 * @module loader
 */

export * from './csv';
export * from './records';
export * from './corner-points';
export * from './dataset';
