/**
 * Panel Layout
 *
 * Validated, immutable view of the panel array: panels indexed by label and
 * by (column, row), plus the physical extent of every column and row.
 *
 * A layout is accepted only when
 * - labels are unique and every box is finite and non-degenerate,
 * - no two boxes share interior area,
 * - column and row indices are contiguous and every (column, row) pair holds
 *   exactly one panel,
 * - panels of a column share their x extent and panels of a row share their
 *   y extent,
 * - columns increase along x and rows increase along y.
 *
 * @module layout/panel-layout
 */

import type { AxisExtent, BoundingBox, PanelSpec } from '../types';
import { boxesOverlap } from '../types';
import { createLogger } from '../utils/logger';
import { LayoutError, isFiniteNumber } from '../utils/validation';

const logger = createLogger('layout');

function positionKey(column: number, row: number): string {
  return `${column}:${row}`;
}

export class PanelLayout {
  /** Panels ordered by row, then column */
  readonly panels: readonly PanelSpec[];

  /** Column extents ordered by column index */
  readonly columns: readonly AxisExtent[];

  /** Row extents ordered by row index */
  readonly rows: readonly AxisExtent[];

  private readonly byLabel: Map<string, PanelSpec>;
  private readonly byPosition: Map<string, PanelSpec>;

  private constructor(
    panels: PanelSpec[],
    columns: AxisExtent[],
    rows: AxisExtent[]
  ) {
    this.panels = panels;
    this.columns = columns;
    this.rows = rows;
    this.byLabel = new Map(panels.map(p => [p.label, p]));
    this.byPosition = new Map(panels.map(p => [positionKey(p.column, p.row), p]));
  }

  /**
   * Validate panels and build a layout
   * @throws LayoutError when the panels do not form a complete, ordered grid
   */
  static fromPanels(specs: readonly PanelSpec[]): PanelLayout {
    if (specs.length === 0) {
      throw new LayoutError('Layout has no panels');
    }

    for (const panel of specs) {
      validatePanel(panel);
    }

    checkUniqueLabels(specs);
    checkOverlaps(specs);

    const columnIndices = contiguousIndices(specs.map(p => p.column), 'column');
    const rowIndices = contiguousIndices(specs.map(p => p.row), 'row');

    const byPosition = new Map<string, PanelSpec>();
    for (const panel of specs) {
      const key = positionKey(panel.column, panel.row);
      const existing = byPosition.get(key);
      if (existing) {
        throw new LayoutError(
          `Two panels occupy column ${panel.column}, row ${panel.row}`,
          [existing.label, panel.label]
        );
      }
      byPosition.set(key, panel);
    }

    const ordered: PanelSpec[] = [];
    for (const row of rowIndices) {
      for (const column of columnIndices) {
        const panel = byPosition.get(positionKey(column, row));
        if (!panel) {
          throw new LayoutError(`Missing panel at column ${column}, row ${row}`);
        }
        ordered.push(panel);
      }
    }

    const columns = columnIndices.map(index =>
      alignedExtent(ordered.filter(p => p.column === index), 'column', index, b => [b.xMin, b.xMax])
    );
    const rows = rowIndices.map(index =>
      alignedExtent(ordered.filter(p => p.row === index), 'row', index, b => [b.yMin, b.yMax])
    );

    checkAxisOrder(columns, 'column');
    checkAxisOrder(rows, 'row');

    logger.debug('Layout validated', {
      panels: ordered.length,
      columns: columns.length,
      rows: rows.length,
    });

    return new PanelLayout(ordered, columns, rows);
  }

  get columnCount(): number {
    return this.columns.length;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /**
   * Physical box covering every panel, gaps included
   */
  get bounds(): BoundingBox {
    return {
      xMin: this.columns[0].min,
      xMax: this.columns[this.columns.length - 1].max,
      yMin: this.rows[0].min,
      yMax: this.rows[this.rows.length - 1].max,
    };
  }

  getPanel(column: number, row: number): PanelSpec | undefined {
    return this.byPosition.get(positionKey(column, row));
  }

  getByLabel(label: string): PanelSpec | undefined {
    return this.byLabel.get(label);
  }

  /**
   * Zero-based position of a column index
   * @throws LayoutError for a column that is not part of the layout
   */
  columnRank(column: number): number {
    const rank = column - this.columns[0].index;
    if (!Number.isInteger(rank) || rank < 0 || rank >= this.columns.length) {
      throw new LayoutError(`Unknown column ${column}`);
    }
    return rank;
  }

  rowRank(row: number): number {
    const rank = row - this.rows[0].index;
    if (!Number.isInteger(rank) || rank < 0 || rank >= this.rows.length) {
      throw new LayoutError(`Unknown row ${row}`);
    }
    return rank;
  }

  /**
   * Panel whose closed box contains the point. On a boundary shared by two
   * abutting panels the lower column and lower row win, so each point maps
   * to exactly one panel.
   */
  locate(x: number, y: number): PanelSpec | undefined {
    const column = this.columns.find(c => x >= c.min && x <= c.max);
    if (!column) return undefined;

    const row = this.rows.find(r => y >= r.min && y <= r.max);
    if (!row) return undefined;

    return this.getPanel(column.index, row.index);
  }
}

function validatePanel(panel: PanelSpec): void {
  const { label, column, row, box } = panel;

  if (typeof label !== 'string' || label.trim() === '') {
    throw new LayoutError(`Panel at column ${column}, row ${row} has no label`);
  }
  if (!Number.isInteger(column) || !Number.isInteger(row)) {
    throw new LayoutError('Column and row must be integers', [label]);
  }
  if (![box.xMin, box.xMax, box.yMin, box.yMax].every(isFiniteNumber)) {
    throw new LayoutError('Bounding box must be finite', [label]);
  }
  if (box.xMin >= box.xMax || box.yMin >= box.yMax) {
    throw new LayoutError('Bounding box must have positive width and height', [label]);
  }
}

function checkUniqueLabels(specs: readonly PanelSpec[]): void {
  const seen = new Set<string>();
  for (const panel of specs) {
    if (seen.has(panel.label)) {
      throw new LayoutError('Duplicate panel label', [panel.label]);
    }
    seen.add(panel.label);
  }
}

function checkOverlaps(specs: readonly PanelSpec[]): void {
  for (let i = 0; i < specs.length; i++) {
    for (let j = i + 1; j < specs.length; j++) {
      if (boxesOverlap(specs[i].box, specs[j].box)) {
        throw new LayoutError('Panel bounding boxes overlap', [specs[i].label, specs[j].label]);
      }
    }
  }
}

/**
 * Sorted distinct indices; a missing index in between is a hole
 */
function contiguousIndices(values: number[], axis: 'column' | 'row'): number[] {
  const sorted = [...new Set(values)].sort((a, b) => a - b);

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] !== sorted[i - 1] + 1) {
      throw new LayoutError(`${axis} indices leave a hole between ${sorted[i - 1]} and ${sorted[i]}`);
    }
  }
  return sorted;
}

function alignedExtent(
  panels: PanelSpec[],
  axis: 'column' | 'row',
  index: number,
  span: (box: BoundingBox) => [number, number]
): AxisExtent {
  const [min, max] = span(panels[0].box);

  for (const panel of panels) {
    const [pMin, pMax] = span(panel.box);
    if (pMin !== min || pMax !== max) {
      throw new LayoutError(
        `Panels of ${axis} ${index} are not aligned`,
        [panels[0].label, panel.label]
      );
    }
  }

  return { index, min, max };
}

function checkAxisOrder(extents: AxisExtent[], axis: 'column' | 'row'): void {
  for (let i = 1; i < extents.length; i++) {
    const prev = extents[i - 1];
    const next = extents[i];
    if (next.min < prev.max) {
      throw new LayoutError(
        `${axis} ${next.index} starts at ${next.min}, before ${axis} ${prev.index} ends at ${prev.max}`
      );
    }
  }
}
