/**
 * Delimited text files
 */

import { basename } from 'path';
import ExcelJS, { type Worksheet } from 'exceljs';
import { pino } from 'pino';
import { ExtractionError, errorMessage, type RawTable } from '@phenoxform/core';
import { worksheetGrid } from './cells.js';
import { gridToTable } from './grid.js';
import type { DataSource, SheetLayout } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface CsvDataSourceOptions extends SheetLayout {
  path: string;
  /** Name of the single table the file yields */
  tableName: string;
  separator?: string;
}

/**
 * One CSV file, one table. Cells are read as text; typing is left to the
 * alias maps and the collector.
 */
export class CsvDataSource implements DataSource {
  readonly name: string;
  private readonly options: CsvDataSourceOptions;

  constructor(options: CsvDataSourceOptions) {
    this.options = options;
    this.name = basename(options.path);
  }

  async extract(): Promise<RawTable[]> {
    const { path, tableName, separator = ',' } = this.options;
    const workbook = new ExcelJS.Workbook();

    let sheet: Worksheet;
    try {
      sheet = await workbook.csv.readFile(path, {
        parserOptions: { delimiter: separator },
        // Keep every cell as the text in the file
        map: (value: unknown) => value,
      });
    } catch (error) {
      logger.error({ event: 'extract.csv.failed', path, error: errorMessage(error) }, 'CSV read failed');
      throw new ExtractionError(this.name, `Cannot read CSV file ${path}: ${errorMessage(error)}`, { cause: error });
    }

    const table = gridToTable(tableName, worksheetGrid(sheet), this.options);
    logger.info({
      event: 'extract.csv.read',
      path,
      table: tableName,
      columns: table.columns.length,
      rows: table.columns[0]?.values.length ?? 0,
    }, 'Read CSV table');
    return [table];
  }
}
