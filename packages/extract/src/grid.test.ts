import { describe, it, expect } from 'vitest';
import { gridToTable, transposeGrid } from './grid.js';
import { toCellValue } from './cells.js';
import { InMemoryDataSource } from './in-memory.js';

describe('gridToTable', () => {
  it('should take headers from the first row', () => {
    const table = gridToTable('visits', [
      ['patient_id', 'hpo'],
      ['P001', 'HP:0001250'],
      ['P002', null],
    ]);

    expect(table).toEqual({
      name: 'visits',
      columns: [
        { name: 'patient_id', values: ['P001', 'P002'] },
        { name: 'hpo', values: ['HP:0001250', null] },
      ],
    });
  });

  it('should name columns by position without headers and drop trailing empty rows', () => {
    const table = gridToTable('visits', [['P001', 'M'], ['P002'], [null, null]], { hasHeaders: false });

    expect(table.columns).toEqual([
      { name: 'column_1', values: ['P001', 'P002'] },
      { name: 'column_2', values: ['M', null] },
    ]);
  });

  it('should suffix repeated and fill blank headers', () => {
    const table = gridToTable('visits', [['id', 'hpo', 'hpo', null], ['P001', 'a', 'b', 'c']]);

    expect(table.columns.map(column => column.name)).toEqual(['id', 'hpo', 'hpo_2', 'column_4']);
  });

  it('should read subjects laid out as columns', () => {
    const table = gridToTable('visits', [
      ['patient_id', 'P001', 'P002'],
      ['sex', 'M', 'F'],
    ], { patientsAreRows: false });

    expect(table.columns).toEqual([
      { name: 'patient_id', values: ['P001', 'P002'] },
      { name: 'sex', values: ['M', 'F'] },
    ]);
  });
});

describe('transposeGrid', () => {
  it('should pad ragged rows with null', () => {
    expect(transposeGrid([[1, 2, 3], [4]])).toEqual([[1, 4], [2, null], [3, null]]);
  });
});

describe('toCellValue', () => {
  it('should flatten spreadsheet values', () => {
    expect(toCellValue('')).toBeNull();
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue(new Date(Date.UTC(2024, 0, 15)))).toBe('2024-01-15');
    expect(toCellValue({ richText: [{ text: 'Sei' }, { text: 'zure' }] })).toBe('Seizure');
    expect(toCellValue({ text: 'HP:0001250', hyperlink: 'https://example.org/hp' })).toBe('HP:0001250');
    expect(toCellValue({ formula: 'A1+1', result: 3, date1904: false })).toBe(3);
    expect(toCellValue({ error: '#N/A' })).toBeNull();
  });
});

describe('InMemoryDataSource', () => {
  it('should hand out copies of its tables', async () => {
    const source = new InMemoryDataSource('inline', [{ name: 't', columns: [{ name: 'id', values: ['P001'] }] }]);

    const [first] = await source.extract();
    first.columns[0].values[0] = 'changed';
    const [second] = await source.extract();

    expect(second.columns[0].values).toEqual(['P001']);
  });
});
