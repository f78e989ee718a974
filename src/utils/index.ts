/**
 * Utility exports
 * @module utils
 */

// Math utilities
export { round, sum, median, percentile, intervalIndex } from './math';

// Errors and validation
export {
  ValidationError,
  LayoutError,
  ConfigurationError,
  MAX_SUBGRID_COLUMNS,
  isFiniteNumber,
  isRecord,
  toFiniteNumber,
  toInteger,
  toNonEmptyString,
  validatePartitionFactor,
} from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  configureFromEnvironment,
  resetLogger,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
