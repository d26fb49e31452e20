/**
 * Excel workbooks
 */

import { basename } from 'path';
import ExcelJS from 'exceljs';
import { pino } from 'pino';
import { ExtractionError, errorMessage, type RawTable } from '@phenoxform/core';
import { worksheetGrid } from './cells.js';
import { gridToTable } from './grid.js';
import type { DataSource, SheetLayout } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface ExcelDataSourceOptions extends SheetLayout {
  path: string;
  /** Worksheets to read, by name; every worksheet when omitted */
  sheets?: string[];
}

/**
 * An .xlsx workbook; each worksheet is a table named after the sheet
 */
export class ExcelDataSource implements DataSource {
  readonly name: string;
  private readonly options: ExcelDataSourceOptions;

  constructor(options: ExcelDataSourceOptions) {
    this.options = options;
    this.name = basename(options.path);
  }

  async extract(): Promise<RawTable[]> {
    const { path, sheets } = this.options;
    const workbook = new ExcelJS.Workbook();

    try {
      await workbook.xlsx.readFile(path);
    } catch (error) {
      logger.error({ event: 'extract.excel.failed', path, error: errorMessage(error) }, 'Workbook read failed');
      throw new ExtractionError(this.name, `Cannot read workbook ${path}: ${errorMessage(error)}`, { cause: error });
    }

    const selected = sheets
      ? sheets.map(sheetName => {
        const sheet = workbook.getWorksheet(sheetName);
        if (!sheet) {
          throw new ExtractionError(this.name, `Workbook ${path} has no worksheet "${sheetName}"`);
        }
        return sheet;
      })
      : workbook.worksheets;

    return selected.map(sheet => {
      const table = gridToTable(sheet.name, worksheetGrid(sheet), this.options);
      logger.info({
        event: 'extract.excel.sheet',
        path,
        table: table.name,
        columns: table.columns.length,
      }, 'Read worksheet');
      return table;
    });
  }
}
