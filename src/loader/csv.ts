/**
 * CSV text parsing
 *
 * Comma-separated text with a header row. Fields may be quoted; a doubled
 * quote inside a quoted field is a literal quote. LF and CRLF line endings
 * are accepted and blank lines are skipped.
 *
 * @module loader/csv
 */

import { ValidationError } from '../utils/validation';

export interface CSVParseOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

/**
 * Split CSV text into rows of raw field strings
 */
export function parseCsvRows(text: string, delimiter: string = ','): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    if (fieldStarted || row.length > 0) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (text[i + 1] !== '\n') endRow();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new ValidationError('unterminated quoted field', 'csv', text.length);
  }
  endRow();

  return rows;
}

/**
 * Parse CSV text into one record per data row, keyed by the header names
 */
export function parseCsv(text: string, options: CSVParseOptions = {}): Record<string, string>[] {
  const rows = parseCsvRows(text.replace(/^\uFEFF/, ''), options.delimiter ?? ',');
  if (rows.length === 0) return [];

  const header = rows[0].map(h => h.trim());

  return rows.slice(1).map((fields, i) => {
    if (fields.length !== header.length) {
      throw new ValidationError(
        `expected ${header.length} fields, found ${fields.length}`,
        `csv row ${i + 1}`,
        fields
      );
    }

    const record: Record<string, string> = {};
    header.forEach((name, col) => {
      record[name] = fields[col];
    });
    return record;
  });
}
