/**
 * Panels from corner points
 *
 * Source systems store each panel as four corner rows (panel id, x, y, and
 * optionally a sequence number and product id). The corners are grouped per
 * panel into a bounding box; column and row indices come from the rank of
 * the panel's x and y interval among all distinct intervals.
 *
 * @module loader/corner-points
 */

import type { PanelSpec } from '../types';
import { formatPanelLabel, stripProductPrefix } from '../layout/panel-label';
import { ValidationError, isRecord, toFiniteNumber, toInteger, toNonEmptyString } from '../utils/validation';
import { pickField } from './records';

export interface CornerRow {
  panelId: string;
  x: number;
  y: number;
  sequenceNo?: number;
  productId?: string;
}

export interface CornerPanelOptions {
  /**
   * 'grid' labels panels by column letter and row number ("A1", "H5");
   * 'panel-id' keeps the panel id, minus the product-id prefix when one is
   * known (default: 'grid')
   */
  labelStyle?: 'grid' | 'panel-id';

  /** Product id prefix for rows that carry none */
  productId?: string;
}

export function parseCornerRecords(records: readonly unknown[]): CornerRow[] {
  return records.map((value, index) => {
    const path = `corners[${index}]`;
    if (!isRecord(value)) {
      throw new ValidationError('must be an object', path, value);
    }

    const row: CornerRow = {
      panelId: toNonEmptyString(pickField(value, ['panel_id', 'panelId', 'PanelID']), `${path}.panel_id`),
      x: toFiniteNumber(pickField(value, ['x']), `${path}.x`),
      y: toFiniteNumber(pickField(value, ['y']), `${path}.y`),
    };

    const sequenceNo = pickField(value, ['sequence_no', 'sequenceNo']);
    if (sequenceNo !== undefined) row.sequenceNo = toInteger(sequenceNo, `${path}.sequence_no`);

    const productId = pickField(value, ['product_id', 'productId']);
    if (productId !== undefined) row.productId = String(productId);

    return row;
  });
}

interface PanelCorners {
  panelId: string;
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
  sequenceNo?: number;
  productId?: string;
}

function intervalRanks(intervals: Array<[number, number]>): Map<string, number> {
  const distinct = new Map<string, [number, number]>();
  for (const interval of intervals) {
    distinct.set(`${interval[0]}:${interval[1]}`, interval);
  }

  const sorted = [...distinct.entries()].sort((a, b) => a[1][0] - b[1][0] || a[1][1] - b[1][1]);
  return new Map(sorted.map(([key], rank) => [key, rank]));
}

/**
 * Aggregate corner rows into panel specs. Panels are returned in sequence
 * order when every panel has a sequence number, otherwise in order of first
 * appearance.
 */
export function panelsFromCorners(rows: readonly CornerRow[], options: CornerPanelOptions = {}): PanelSpec[] {
  const byId = new Map<string, PanelCorners>();

  for (const row of rows) {
    const existing = byId.get(row.panelId);
    if (!existing) {
      byId.set(row.panelId, {
        panelId: row.panelId,
        xMin: row.x,
        xMax: row.x,
        yMin: row.y,
        yMax: row.y,
        sequenceNo: row.sequenceNo,
        productId: row.productId,
      });
      continue;
    }

    existing.xMin = Math.min(existing.xMin, row.x);
    existing.xMax = Math.max(existing.xMax, row.x);
    existing.yMin = Math.min(existing.yMin, row.y);
    existing.yMax = Math.max(existing.yMax, row.y);
    if (existing.sequenceNo === undefined) existing.sequenceNo = row.sequenceNo;
    if (existing.productId === undefined) existing.productId = row.productId;
  }

  let panels = [...byId.values()];
  if (panels.every(p => p.sequenceNo !== undefined)) {
    panels = panels.sort((a, b) => (a.sequenceNo ?? 0) - (b.sequenceNo ?? 0));
  }

  const columnRanks = intervalRanks(panels.map(p => [p.xMin, p.xMax]));
  const rowRanks = intervalRanks(panels.map(p => [p.yMin, p.yMax]));
  const labelStyle = options.labelStyle ?? 'grid';

  return panels.map(p => {
    const column = columnRanks.get(`${p.xMin}:${p.xMax}`) ?? 0;
    const row = rowRanks.get(`${p.yMin}:${p.yMax}`) ?? 0;
    const productId = p.productId ?? options.productId;

    const label = labelStyle === 'grid'
      ? formatPanelLabel(column, row)
      : productId !== undefined && p.panelId.startsWith(productId)
        ? stripProductPrefix(p.panelId, productId)
        : p.panelId;

    return {
      label,
      column,
      row,
      box: { xMin: p.xMin, xMax: p.xMax, yMin: p.yMin, yMax: p.yMax },
    };
  });
}
