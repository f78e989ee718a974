/**
 * Corner point aggregation tests
 */

import { describe, it, expect } from 'vitest';
import { panelsFromCorners, parseCornerRecords, type CornerRow } from '../../../src/loader/corner-points';
import { PanelLayout } from '../../../src/layout/panel-layout';

function corners(panelId: string, x: number, y: number, sequenceNo?: number): CornerRow[] {
  return [
    [x, y],
    [x + 100, y],
    [x + 100, y + 100],
    [x, y + 100],
  ].map(([cx, cy]) => (sequenceNo === undefined ? { panelId, x: cx, y: cy } : { panelId, x: cx, y: cy, sequenceNo }));
}

describe('parseCornerRecords', () => {
  it('should parse rows with optional sequence and product', () => {
    const rows = parseCornerRecords([
      { panel_id: 'PROD_X01', x: '0', y: '0', sequence_no: '1', product_id: 'PROD_X' },
      { PanelID: 'PROD_X02', x: 150, y: 0 },
    ]);

    expect(rows).toEqual([
      { panelId: 'PROD_X01', x: 0, y: 0, sequenceNo: 1, productId: 'PROD_X' },
      { panelId: 'PROD_X02', x: 150, y: 0 },
    ]);
    expect(rows[1]).not.toHaveProperty('sequenceNo');
  });

  it('should name the failing row', () => {
    expect(() => parseCornerRecords([{ panel_id: 'P', x: 'a', y: 0 }])).toThrow(
      'corners[0].x: must be a finite number'
    );
    expect(() => parseCornerRecords([42])).toThrow('corners[0]: must be an object');
  });
});

describe('panelsFromCorners', () => {
  const rows = [
    ...corners('PROD_X01', 0, 0, 4),
    ...corners('PROD_X02', 150, 0, 3),
    ...corners('PROD_X03', 0, 150, 2),
    ...corners('PROD_X04', 150, 150, 1),
  ];

  it('should build boxes and grid labels in sequence order', () => {
    expect(panelsFromCorners(rows)).toEqual([
      { label: 'B2', column: 1, row: 1, box: { xMin: 150, xMax: 250, yMin: 150, yMax: 250 } },
      { label: 'A2', column: 0, row: 1, box: { xMin: 0, xMax: 100, yMin: 150, yMax: 250 } },
      { label: 'B1', column: 1, row: 0, box: { xMin: 150, xMax: 250, yMin: 0, yMax: 100 } },
      { label: 'A1', column: 0, row: 0, box: { xMin: 0, xMax: 100, yMin: 0, yMax: 100 } },
    ]);
  });

  it('should keep first-appearance order when a sequence number is missing', () => {
    const partial = [...corners('P1', 0, 0, 2), ...corners('P2', 150, 0)];
    expect(panelsFromCorners(partial).map(p => p.label)).toEqual(['A1', 'B1']);
  });

  it('should strip the product prefix from panel ids', () => {
    const labels = panelsFromCorners(rows, { labelStyle: 'panel-id', productId: 'PROD_X' }).map(p => p.label);
    expect(labels).toEqual(['04', '03', '02', '01']);
  });

  it('should prefer the product id carried by the rows', () => {
    const withProduct = corners('LOT7-A', 0, 0).map(row => ({ ...row, productId: 'LOT7-' }));
    expect(panelsFromCorners(withProduct, { labelStyle: 'panel-id', productId: 'OTHER' })[0].label).toBe('A');
  });

  it('should keep panel ids without the prefix unchanged', () => {
    const [panel] = panelsFromCorners(corners('Q9', 0, 0), { labelStyle: 'panel-id', productId: 'PROD_X' });
    expect(panel.label).toBe('Q9');
  });

  it('should produce a valid layout', () => {
    const layout = PanelLayout.fromPanels(panelsFromCorners(rows));
    expect(layout.panels.map(p => p.label)).toEqual(['A1', 'B1', 'A2', 'B2']);
  });
});
