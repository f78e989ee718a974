/**
 * CSV export tests
 */

import { describe, it, expect } from 'vitest';
import {
  CELL_COLUMNS,
  RegionCsvExporter,
  exportCellsToCSV,
  exportRegionsToCSV,
} from '../../../src/export/csv';
import type { CellRecord, RegionTableRow } from '../../../src/types';

const rows: RegionTableRow[] = [
  { regionId: 2, totalDefectsCleaned: 54, subgridCount: 2, avgDefectsPerGrid: 27, subgrids: ['A1-b1', 'B1-a1'] },
  { regionId: 1, totalDefectsCleaned: 7.5, subgridCount: 3, avgDefectsPerGrid: 2.5, subgrids: ['C1-a1'] },
];

const quietCell: CellRecord = {
  id: 'A1-a1',
  panelLabel: 'A1',
  subRow: 1,
  subCol: 'a',
  localRow: 0,
  localCol: 0,
  globalRow: 0,
  globalCol: 0,
  box: { xMin: 0, xMax: 50, yMin: 0, yMax: 50 },
  cleanBox: { xMin: 0, xMax: 50, yMin: 0, yMax: 50 },
  rawCount: 3,
  noiseEstimate: 1.5,
  cleanedCount: 1.5,
  regionId: null,
};

const activeCell: CellRecord = {
  ...quietCell,
  id: 'B1-a1',
  panelLabel: 'B1',
  globalCol: 2,
  box: { xMin: 150, xMax: 200, yMin: 0, yMax: 50 },
  cleanBox: { xMin: 100, xMax: 150, yMin: 0, yMax: 50 },
  rawCount: 30,
  noiseEstimate: 2,
  cleanedCount: 28,
  regionId: 1,
};

describe('exportRegionsToCSV', () => {
  it('should write one line per region with a header', () => {
    expect(exportRegionsToCSV(rows)).toBe(
      'region_id,total_defects_cleaned,subgrid_count,avg_defects_per_grid,subgrids\n' +
        '2,54,2,27.00,A1-b1;B1-a1\n' +
        '1,7.50,3,2.50,C1-a1\n'
    );
  });

  it('should quote fields containing the delimiter', () => {
    const csv = exportRegionsToCSV([rows[0]], { subgridSeparator: ',', includeHeader: false });
    expect(csv).toBe('2,54,2,27.00,"A1-b1,B1-a1"\n');
  });

  it('should honour delimiter and line ending options', () => {
    const csv = exportRegionsToCSV([rows[1]], { delimiter: '\t', lineEnding: '\r\n', includeHeader: false });
    expect(csv).toBe('1\t7.50\t3\t2.50\tC1-a1\r\n');
  });

  it('should write only the header for an empty table', () => {
    expect(exportRegionsToCSV([])).toBe(
      'region_id,total_defects_cleaned,subgrid_count,avg_defects_per_grid,subgrids\n'
    );
  });
});

describe('exportCellsToCSV', () => {
  it('should write every cell field', () => {
    const lines = exportCellsToCSV([quietCell, activeCell]).split('\n');

    expect(lines).toEqual([
      CELL_COLUMNS.join(','),
      'A1-a1,A1,1,a,0,0,0,50,0,50,0,50,0,50,3,1.50,1.50,',
      'B1-a1,B1,1,a,0,2,150,200,0,50,100,150,0,50,30,2,28,1',
      '',
    ]);
  });

  it('should use the configured precision', () => {
    const exporter = new RegionCsvExporter({ decimalPlaces: 3, includeHeader: false });
    expect(exporter.exportCells([quietCell])).toBe('A1-a1,A1,1,a,0,0,0,50,0,50,0,50,0,50,3,1.500,1.500,\n');
  });

  it('should escape quotes', () => {
    const csv = exportCellsToCSV([{ ...quietCell, panelLabel: 'A"1' }], { includeHeader: false });
    expect(csv.startsWith('A1-a1,"A""1",')).toBe(true);
  });
});
