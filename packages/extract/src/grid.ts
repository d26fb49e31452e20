/**
 * Grid to table conversion shared by the file-backed sources
 */

import type { CellValue, RawTable } from '@phenoxform/core';
import type { CellGrid, SheetLayout } from './types.js';

/**
 * Swap rows and columns, padding ragged rows with null
 */
export function transposeGrid(grid: CellGrid): CellGrid {
  const width = Math.max(0, ...grid.map(row => row.length));
  return Array.from({ length: width }, (_, column) => grid.map(row => row[column] ?? null));
}

function headerName(value: CellValue, index: number): string {
  const name = value === null ? '' : String(value).trim();
  return name.length > 0 ? name : `column_${index + 1}`;
}

/**
 * Build a RawTable from cell rows
 *
 * Without headers, columns are named column_1, column_2, ... A blank header
 * cell gets the same positional name. Trailing empty rows are dropped.
 */
export function gridToTable(name: string, grid: CellGrid, layout: SheetLayout = {}): RawTable {
  const oriented = layout.patientsAreRows === false ? transposeGrid(grid) : grid;

  let end = oriented.length;
  while (end > 0 && oriented[end - 1].every(value => value === null)) end--;
  const rows = oriented.slice(0, end);

  const hasHeaders = layout.hasHeaders ?? true;
  const width = Math.max(0, ...rows.map(row => row.length));
  const headerRow = hasHeaders && rows.length > 0 ? rows[0] : [];
  const body = hasHeaders ? rows.slice(1) : rows;

  const seen = new Map<string, number>();
  const columns = Array.from({ length: width }, (_, index) => {
    let columnName = hasHeaders ? headerName(headerRow[index] ?? null, index) : `column_${index + 1}`;
    const count = (seen.get(columnName) ?? 0) + 1;
    seen.set(columnName, count);
    // Repeated headers get a numeric suffix: a, a_2, a_3
    if (count > 1) columnName = `${columnName}_${count}`;
    return { name: columnName, values: body.map(row => row[index] ?? null) };
  });

  return { name, columns };
}
