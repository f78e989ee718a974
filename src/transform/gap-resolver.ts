/**
 * Gap Resolver
 *
 * Measures the physical gap in front of every column and row and lays the
 * columns and rows end to end in gap-free coordinates. Each cleaned extent
 * starts at the previous one's cleaned end, so seams meet exactly.
 *
 * @module transform/gap-resolver
 */

import type { AxisExtent, AxisShift } from '../types';
import type { PanelLayout } from '../layout/panel-layout';
import { createLogger } from '../utils/logger';
import { LayoutError } from '../utils/validation';

const logger = createLogger('gap-resolver');

/**
 * Per-axis shift tables with index lookups
 */
export class GapResolution {
  private readonly columnShifts: Map<number, AxisShift>;
  private readonly rowShifts: Map<number, AxisShift>;

  constructor(
    readonly columns: readonly AxisShift[],
    readonly rows: readonly AxisShift[]
  ) {
    this.columnShifts = new Map(columns.map(c => [c.index, c]));
    this.rowShifts = new Map(rows.map(r => [r.index, r]));
  }

  /**
   * Shift entry of a column
   * @throws LayoutError for an unknown column
   */
  column(column: number): AxisShift {
    const entry = this.columnShifts.get(column);
    if (entry === undefined) {
      throw new LayoutError(`No gap shift for column ${column}`);
    }
    return entry;
  }

  /**
   * Shift entry of a row
   * @throws LayoutError for an unknown row
   */
  row(row: number): AxisShift {
    const entry = this.rowShifts.get(row);
    if (entry === undefined) {
      throw new LayoutError(`No gap shift for row ${row}`);
    }
    return entry;
  }

  /** Total x gap removed in front of a column */
  shiftX(column: number): number {
    return this.column(column).shift;
  }

  /** Total y gap removed below a row */
  shiftY(row: number): number {
    return this.row(row).shift;
  }

  /** Gap-free x of a point in a column, kept inside the column's cleaned extent */
  cleanX(column: number, x: number): number {
    return toClean(this.column(column), x);
  }

  /** Gap-free y of a point in a row, kept inside the row's cleaned extent */
  cleanY(row: number, y: number): number {
    return toClean(this.row(row), y);
  }

  /** Sum of all column gaps */
  get totalShiftX(): number {
    return this.columns.length > 0 ? this.columns[this.columns.length - 1].shift : 0;
  }

  /** Sum of all row gaps */
  get totalShiftY(): number {
    return this.rows.length > 0 ? this.rows[this.rows.length - 1].shift : 0;
  }
}

/**
 * Cumulative shifts for extents ordered by index
 */
export function resolveAxis(extents: readonly AxisExtent[], axis: 'column' | 'row'): AxisShift[] {
  const shifts: AxisShift[] = [];

  for (let i = 0; i < extents.length; i++) {
    const extent = extents[i];

    if (i === 0) {
      shifts.push({ ...extent, gapBefore: 0, shift: 0, cleanMin: extent.min, cleanMax: extent.max });
      continue;
    }

    const prev = extents[i - 1];
    const gapBefore = extent.min - prev.max;
    if (gapBefore < 0) {
      throw new LayoutError(`${axis} ${extent.index} overlaps ${axis} ${prev.index} by ${-gapBefore}`);
    }

    // Starts exactly where the previous cleaned extent ends
    const cleanMin = shifts[i - 1].cleanMax;
    const cleanMax = cleanMin + (extent.max - extent.min);
    shifts.push({ ...extent, gapBefore, shift: extent.min - cleanMin, cleanMin, cleanMax });
  }

  return shifts;
}

function toClean(entry: AxisShift, value: number): number {
  const clean = entry.cleanMin + (value - entry.min);
  return Math.min(entry.cleanMax, Math.max(entry.cleanMin, clean));
}

/**
 * Compute the column and row shifts of a layout
 */
export function resolveGaps(layout: PanelLayout): GapResolution {
  const resolution = new GapResolution(
    resolveAxis(layout.columns, 'column'),
    resolveAxis(layout.rows, 'row')
  );

  logger.debug('Gaps resolved', {
    columnGaps: resolution.columns.map(c => c.gapBefore),
    rowGaps: resolution.rows.map(r => r.gapBefore),
    totalShiftX: resolution.totalShiftX,
    totalShiftY: resolution.totalShiftY,
  });

  return resolution;
}
