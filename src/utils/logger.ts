/**
 * Structured Logging Utility
 *
 * Module loggers share one global configuration that is read at log time,
 * so changing the level (for example silencing a test run) also affects
 * loggers created at import time. Per-logger overrides win over the global
 * settings.
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log level string representations
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;

  level: LogLevelName;

  /** Module name, nested modules joined with ':' */
  module: string;

  message: string;

  /** Additional structured data */
  context?: Record<string, unknown>;

  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Emit each entry as one JSON line */
  jsonOutput: boolean;

  /** Include timestamps in text output */
  includeTimestamp: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
  none: LogLevel.SILENT,
};

/**
 * Parse log level from string; unknown names fall back to INFO
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;
  return LEVEL_ALIASES[level.trim().toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Configure the global logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Restore the global configuration to its defaults
 */
export function resetLogger(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

/**
 * Set log level from LOG_LEVEL or PANELSCAN_LOG_LEVEL
 */
export function configureFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const envLevel = env.PANELSCAN_LOG_LEVEL || env.LOG_LEVEL;

  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

function formatLogEntry(entry: LogEntry, includeTimestamp: boolean): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`, `[${entry.module}]`, entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function writeToConsole(entry: LogEntry, config: LoggerConfig): void {
  const output = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, config.includeTimestamp);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error && !config.jsonOutput) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger instance
 */
export class Logger {
  readonly module: string;
  private overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.config.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isEnabled(level)) return;

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      writeToConsole(entry, config);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Run a synchronous stage and log its duration at debug level.
   * A thrown error is logged and rethrown unchanged.
   */
  time<T>(stage: string, fn: () => T): T {
    const started = performance.now();
    try {
      const result = fn();
      this.debug(`${stage} finished`, { durationMs: Math.round(performance.now() - started) });
      return result;
    } catch (err) {
      this.error(`${stage} failed`, err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
  }

  /**
   * Create a child logger for a sub-module
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }
}

/**
 * Create a logger for a specific module
 */
export function createLogger(module: string): Logger {
  return new Logger(module);
}

/**
 * Create a logger that never outputs, whatever the global level
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

configureFromEnvironment();
