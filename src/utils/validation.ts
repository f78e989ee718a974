/**
 * Error types and input validation utilities
 * @module utils/validation
 */

/**
 * Malformed input record (loader level)
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Panel layout that cannot be analysed: overlapping boxes, holes in the
 * column/row grid, misaligned or reordered columns and rows.
 */
export class LayoutError extends Error {
  constructor(
    message: string,
    public panels: string[] = []
  ) {
    super(panels.length > 0 ? `${message} (panels: ${panels.join(', ')})` : message);
    this.name = 'LayoutError';
  }
}

/**
 * Invalid or inconsistent analysis option
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public option: string,
    public value: unknown
  ) {
    super(`${option}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Largest sub-grid column count; columns are lettered a..z
 */
export const MAX_SUBGRID_COLUMNS = 26;

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Coerce a record field to a finite number; numeric strings are accepted
 */
export function toFiniteNumber(value: unknown, field: string): number {
  if (isFiniteNumber(value)) return value;

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }

  throw new ValidationError('must be a finite number', field, value);
}

export function toInteger(value: unknown, field: string): number {
  const n = toFiniteNumber(value, field);
  if (!Number.isInteger(n)) {
    throw new ValidationError('must be an integer', field, value);
  }
  return n;
}

export function toNonEmptyString(value: unknown, field: string): string {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError('must be a non-empty string', field, value);
  }
  return value.trim();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a sub-grid partition factor
 */
export function validatePartitionFactor(value: number, option: string, max?: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError('must be a positive integer', option, value);
  }
  if (max !== undefined && value > max) {
    throw new ConfigurationError(`must not exceed ${max}`, option, value);
  }
  return value;
}
