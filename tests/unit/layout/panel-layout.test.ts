/**
 * Panel layout validation tests
 */

import { describe, it, expect } from 'vitest';
import { PanelLayout } from '../../../src/layout/panel-layout';
import { LayoutError } from '../../../src/utils/validation';
import type { PanelSpec } from '../../../src/types';
import { panelGrid } from '../../helpers/fixtures';

function withBox(panel: PanelSpec, box: Partial<PanelSpec['box']>): PanelSpec {
  return { ...panel, box: { ...panel.box, ...box } };
}

describe('PanelLayout.fromPanels', () => {
  it('should order panels by row, then column', () => {
    const layout = PanelLayout.fromPanels([...panelGrid(3, 2)].reverse());

    expect(layout.panels.map(p => p.label)).toEqual(['A1', 'B1', 'C1', 'A2', 'B2', 'C2']);
    expect(layout.columnCount).toBe(3);
    expect(layout.rowCount).toBe(2);
  });

  it('should record column and row extents', () => {
    const layout = PanelLayout.fromPanels(panelGrid(3, 2));

    expect(layout.columns).toEqual([
      { index: 0, min: 0, max: 100 },
      { index: 1, min: 150, max: 250 },
      { index: 2, min: 300, max: 400 },
    ]);
    expect(layout.rows).toEqual([
      { index: 0, min: 0, max: 100 },
      { index: 1, min: 150, max: 250 },
    ]);
    expect(layout.bounds).toEqual({ xMin: 0, xMax: 400, yMin: 0, yMax: 250 });
  });

  it('should look panels up by position and label', () => {
    const layout = PanelLayout.fromPanels(panelGrid(3, 2));

    expect(layout.getPanel(1, 1)?.label).toBe('B2');
    expect(layout.getByLabel('C1')?.column).toBe(2);
    expect(layout.getPanel(5, 5)).toBeUndefined();
    expect(layout.getByLabel('Z9')).toBeUndefined();
  });

  it('should rank indices that do not start at zero', () => {
    const panels = panelGrid(2, 1).map(p => ({ ...p, column: p.column + 3, row: p.row + 7 }));
    const layout = PanelLayout.fromPanels(panels);

    expect(layout.columnRank(3)).toBe(0);
    expect(layout.columnRank(4)).toBe(1);
    expect(layout.rowRank(7)).toBe(0);
    expect(() => layout.columnRank(9)).toThrow('Unknown column 9');
    expect(() => layout.rowRank(0)).toThrow('Unknown row 0');
  });

  it('should accept panels that abut without a gap', () => {
    const layout = PanelLayout.fromPanels(panelGrid(2, 2, { gap: 0 }));
    expect(layout.columns.map(c => [c.min, c.max])).toEqual([[0, 100], [100, 200]]);
  });

  describe('rejections', () => {
    it('should reject an empty layout', () => {
      expect(() => PanelLayout.fromPanels([])).toThrow(new LayoutError('Layout has no panels'));
    });

    it('should reject a missing label', () => {
      const [a1] = panelGrid(1, 1);
      expect(() => PanelLayout.fromPanels([{ ...a1, label: ' ' }])).toThrow(
        'Panel at column 0, row 0 has no label'
      );
    });

    it('should reject fractional indices', () => {
      const [a1] = panelGrid(1, 1);
      expect(() => PanelLayout.fromPanels([{ ...a1, column: 0.5 }])).toThrow(
        'Column and row must be integers (panels: A1)'
      );
    });

    it('should reject non-finite boxes', () => {
      const [a1] = panelGrid(1, 1);
      expect(() => PanelLayout.fromPanels([withBox(a1, { xMax: NaN })])).toThrow(
        'Bounding box must be finite (panels: A1)'
      );
    });

    it('should reject degenerate boxes', () => {
      const [a1] = panelGrid(1, 1);
      expect(() => PanelLayout.fromPanels([withBox(a1, { yMax: 0 })])).toThrow(
        'Bounding box must have positive width and height (panels: A1)'
      );
    });

    it('should reject duplicate labels', () => {
      const [a1, b1] = panelGrid(2, 1);
      expect(() => PanelLayout.fromPanels([a1, { ...b1, label: 'A1' }])).toThrow(
        'Duplicate panel label (panels: A1)'
      );
    });

    it('should reject overlapping boxes', () => {
      const [a1, b1] = panelGrid(2, 1);
      expect(() => PanelLayout.fromPanels([a1, withBox(b1, { xMin: 50, xMax: 150 })])).toThrow(
        'Panel bounding boxes overlap (panels: A1, B1)'
      );
    });

    it('should reject a hole in the column indices', () => {
      const [a1, b1] = panelGrid(2, 1);
      expect(() => PanelLayout.fromPanels([a1, { ...b1, column: 2 }])).toThrow(
        'column indices leave a hole between 0 and 2'
      );
    });

    it('should reject two panels at one position', () => {
      const [a1, b1] = panelGrid(2, 1);
      expect(() => PanelLayout.fromPanels([a1, { ...b1, label: 'A1b', column: 0 }])).toThrow(
        'Two panels occupy column 0, row 0 (panels: A1, A1b)'
      );
    });

    it('should reject an incomplete grid', () => {
      const panels = panelGrid(2, 2).filter(p => p.label !== 'B2');
      expect(() => PanelLayout.fromPanels(panels)).toThrow('Missing panel at column 1, row 1');
    });

    it('should reject misaligned columns', () => {
      const panels = panelGrid(2, 2).map(p => (p.label === 'A2' ? withBox(p, { xMax: 90 }) : p));
      expect(() => PanelLayout.fromPanels(panels)).toThrow(
        'Panels of column 0 are not aligned (panels: A1, A2)'
      );
    });

    it('should reject columns out of x order', () => {
      const [a1, b1] = panelGrid(2, 1);
      const swapped = [{ ...a1, box: b1.box }, { ...b1, box: a1.box }];
      expect(() => PanelLayout.fromPanels(swapped)).toThrow(
        'column 1 starts at 0, before column 0 ends at 250'
      );
    });

    it('should throw LayoutError instances', () => {
      expect(() => PanelLayout.fromPanels([])).toThrow(LayoutError);
    });
  });
});

describe('PanelLayout.locate', () => {
  const layout = PanelLayout.fromPanels(panelGrid(2, 2));

  it('should find the panel containing a point', () => {
    expect(layout.locate(175, 50)?.label).toBe('B1');
    expect(layout.locate(10, 200)?.label).toBe('A2');
  });

  it('should include panel boundaries', () => {
    expect(layout.locate(100, 100)?.label).toBe('A1');
    expect(layout.locate(150, 150)?.label).toBe('B2');
  });

  it('should return undefined in gaps and outside the array', () => {
    expect(layout.locate(125, 50)).toBeUndefined();
    expect(layout.locate(50, 125)).toBeUndefined();
    expect(layout.locate(-1, 50)).toBeUndefined();
    expect(layout.locate(300, 300)).toBeUndefined();
  });

  it('should give a shared edge to the lower column', () => {
    const abutting = PanelLayout.fromPanels(panelGrid(2, 1, { gap: 0 }));
    expect(abutting.locate(100, 50)?.label).toBe('A1');
  });
});
