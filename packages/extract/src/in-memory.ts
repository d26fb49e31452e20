import type { RawTable } from '@phenoxform/core';
import type { DataSource } from './types.js';

/**
 * Tables supplied directly, e.g. from an inline configuration block or a test
 */
export class InMemoryDataSource implements DataSource {
  readonly name: string;
  private readonly tables: RawTable[];

  constructor(name: string, tables: RawTable[]) {
    this.name = name;
    this.tables = tables;
  }

  async extract(): Promise<RawTable[]> {
    return this.tables.map(table => ({
      name: table.name,
      columns: table.columns.map(column => ({ name: column.name, values: [...column.values] })),
    }));
  }
}
