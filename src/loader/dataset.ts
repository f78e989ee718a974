/**
 * Dataset file loading (.json or .csv)
 * @module loader/dataset
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { DefectPoint, PanelSpec } from '../types';
import { createLogger } from '../utils/logger';
import { ValidationError } from '../utils/validation';
import { parseCsv } from './csv';
import { parseDefectRecords, parsePanelRecords } from './records';
import { panelsFromCorners, parseCornerRecords, type CornerPanelOptions } from './corner-points';

const logger = createLogger('loader');

/**
 * Read a file of records: a JSON array of objects, or CSV with a header row
 */
export async function readRecords(filePath: string): Promise<unknown[]> {
  const ext = extname(filePath).toLowerCase();
  const text = await readFile(filePath, 'utf-8');

  if (ext === '.csv') {
    return parseCsv(text);
  }

  if (ext === '.json') {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new ValidationError('is not valid JSON', filePath, err instanceof Error ? err.message : String(err));
    }
    if (!Array.isArray(data)) {
      throw new ValidationError('must contain a JSON array of records', filePath, typeof data);
    }
    return data;
  }

  throw new ValidationError('unsupported file type (expected .json or .csv)', filePath, ext);
}

export async function loadPanelsFile(filePath: string): Promise<PanelSpec[]> {
  const panels = parsePanelRecords(await readRecords(filePath));
  logger.info('Loaded panels', { file: filePath, panels: panels.length });
  return panels;
}

export async function loadDefectsFile(filePath: string): Promise<DefectPoint[]> {
  const defects = parseDefectRecords(await readRecords(filePath));
  logger.info('Loaded defects', { file: filePath, defects: defects.length });
  return defects;
}

/**
 * Load panels stored as corner rows
 */
export async function loadCornerPanelsFile(
  filePath: string,
  options: CornerPanelOptions = {}
): Promise<PanelSpec[]> {
  const panels = panelsFromCorners(parseCornerRecords(await readRecords(filePath)), options);
  logger.info('Loaded panels from corners', { file: filePath, panels: panels.length });
  return panels;
}
