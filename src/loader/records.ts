/**
 * Panel and defect record parsing
 *
 * Accepts plain objects as read from JSON or CSV. Field names follow the
 * dataset convention (snake_case); camelCase aliases are accepted too.
 * Numeric strings are coerced to numbers.
 *
 * @module loader/records
 */

import type { DefectPoint, PanelSpec } from '../types';
import {
  ValidationError,
  isRecord,
  toFiniteNumber,
  toInteger,
  toNonEmptyString,
} from '../utils/validation';

/**
 * First present (non-empty) field among the given names
 */
export function pickField(record: Record<string, unknown>, names: readonly string[]): unknown {
  for (const name of names) {
    const value = record[name];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

function optionalString(record: Record<string, unknown>, names: readonly string[]): string | undefined {
  const value = pickField(record, names);
  if (value === undefined) return undefined;
  return String(value);
}

function asRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError('must be an object', path, value);
  }
  return value;
}

export function parsePanelRecord(value: unknown, index: number): PanelSpec {
  const path = `panels[${index}]`;
  const record = asRecord(value, path);

  return {
    label: toNonEmptyString(pickField(record, ['label', 'panel_label']), `${path}.label`),
    column: toInteger(pickField(record, ['column', 'col']), `${path}.column`),
    row: toInteger(pickField(record, ['row']), `${path}.row`),
    box: {
      xMin: toFiniteNumber(pickField(record, ['x_min', 'xMin']), `${path}.x_min`),
      xMax: toFiniteNumber(pickField(record, ['x_max', 'xMax']), `${path}.x_max`),
      yMin: toFiniteNumber(pickField(record, ['y_min', 'yMin']), `${path}.y_min`),
      yMax: toFiniteNumber(pickField(record, ['y_max', 'yMax']), `${path}.y_max`),
    },
  };
}

export function parsePanelRecords(records: readonly unknown[]): PanelSpec[] {
  return records.map((record, i) => parsePanelRecord(record, i));
}

export function parseDefectRecord(value: unknown, index: number): DefectPoint {
  const path = `defects[${index}]`;
  const record = asRecord(value, path);

  const defect: DefectPoint = {
    x: toFiniteNumber(pickField(record, ['x']), `${path}.x`),
    y: toFiniteNumber(pickField(record, ['y']), `${path}.y`),
  };

  const id = optionalString(record, ['id', 'defect_id']);
  if (id !== undefined) defect.id = id;

  const kind = optionalString(record, ['kind', 'defect_type', 'defectType']);
  if (kind !== undefined) defect.kind = kind;

  return defect;
}

export function parseDefectRecords(records: readonly unknown[]): DefectPoint[] {
  return records.map((record, i) => parseDefectRecord(record, i));
}
