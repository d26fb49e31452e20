import type { CellValue, RawTable } from '@phenoxform/core';

/**
 * A place raw tables come from
 */
export interface DataSource {
  /** Recorded as the source of every row it produces */
  readonly name: string;
  extract(): Promise<RawTable[]>;
}

export interface SheetLayout {
  /** First row (or column) holds the headers; default true */
  hasHeaders?: boolean;
  /** Each subject is a row; false when subjects run across columns. Default true */
  patientsAreRows?: boolean;
}

export type CellGrid = CellValue[][];
