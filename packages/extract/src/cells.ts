/**
 * exceljs cell values to table cells
 */

import type { CellValue as ExcelCellValue, Worksheet } from 'exceljs';
import { pino } from 'pino';
import type { CellValue } from '@phenoxform/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

/**
 * Flatten an exceljs value: formulas to their result, rich text and links to
 * their text, dates to ISO strings, errors and blanks to null
 */
export function toCellValue(value: ExcelCellValue, where = ''): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return formatDate(value);

  if ('richText' in value) {
    return toCellValue(value.richText.map(part => part.text).join(''), where);
  }
  if ('hyperlink' in value) {
    return toCellValue(value.text, where);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return toCellValue(value.result, where);
  }
  if ('error' in value) {
    logger.warn({ event: 'extract.cell.error', where, error: value.error }, 'Spreadsheet error value read as empty');
    return null;
  }
  return null;
}

/**
 * Every row of a worksheet as plain cells, 1-based rows and columns flattened
 */
export function worksheetGrid(sheet: Worksheet): CellValue[][] {
  const grid: CellValue[][] = [];
  const width = sheet.columnCount;
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: CellValue[] = [];
    for (let c = 1; c <= width; c++) {
      cells.push(toCellValue(row.getCell(c).value, `${sheet.name}!R${r}C${c}`));
    }
    grid.push(cells);
  }
  return grid;
}
