/**
 * Tabular values
 *
 * RawTable is what extraction produces. TaggedTable is a RawTable whose
 * columns carry the SeriesContexts bound to them. TaggedTable is immutable:
 * every operation returns a new instance.
 */

import { contextEquals, type Context } from './context.js';
import { ExtractionError } from './errors.js';
import type { SeriesContext, TableContext } from './table-context.js';

export type CellValue = string | number | boolean | null;

export interface RawColumn {
  name: string;
  values: CellValue[];
}

export interface RawTable {
  name: string;
  columns: RawColumn[];
}

export interface TaggedColumn {
  readonly name: string;
  readonly values: readonly CellValue[];
  readonly series: readonly SeriesContext[];
}

export interface ColumnFilter {
  header?: Context;
  data?: Context;
}

export interface TaggedCell {
  readonly column: string;
  readonly value: CellValue;
  readonly series: readonly SeriesContext[];
}

export interface TaggedRow {
  readonly table: string;
  readonly source: string;
  readonly index: number;
  readonly cells: readonly TaggedCell[];
}

/**
 * Whether a column has a bound series satisfying the filter
 */
export function columnMatches(column: TaggedColumn, filter: ColumnFilter): boolean {
  return column.series.some(series =>
    (filter.header === undefined || contextEquals(series.headerContext, filter.header)) &&
    (filter.data === undefined || contextEquals(series.dataContext, filter.data))
  );
}

export class TaggedTable {
  readonly context: TableContext;
  readonly columns: readonly TaggedColumn[];
  readonly source: string;

  constructor(context: TableContext, columns: readonly TaggedColumn[], source = 'unknown') {
    const lengths = new Set(columns.map(column => column.values.length));
    if (lengths.size > 1) {
      throw new ExtractionError(source, `Columns of table "${context.name}" have differing lengths: ${[...lengths].join(', ')}`);
    }
    this.context = context;
    this.columns = columns;
    this.source = source;
  }

  get name(): string {
    return this.context.name;
  }

  get rowCount(): number {
    return this.columns.length > 0 ? this.columns[0].values.length : 0;
  }

  column(name: string): TaggedColumn | undefined {
    return this.columns.find(column => column.name === name);
  }

  filterColumns(filter: ColumnFilter): TaggedColumn[] {
    return this.columns.filter(column => columnMatches(column, filter));
  }

  subjectIdColumns(): TaggedColumn[] {
    return this.filterColumns({ data: { kind: 'SubjectId' } });
  }

  withColumnValues(name: string, values: readonly CellValue[]): TaggedTable {
    const existing = this.column(name);
    if (!existing) {
      throw new ExtractionError(this.source, `Table "${this.name}" has no column "${name}"`);
    }
    return this.withColumn({ ...existing, values });
  }

  /**
   * Replace the column with the same name, or append it
   */
  withColumn(column: TaggedColumn): TaggedTable {
    const index = this.columns.findIndex(existing => existing.name === column.name);
    const columns = index >= 0
      ? this.columns.map((existing, i) => (i === index ? column : existing))
      : [...this.columns, column];
    return new TaggedTable(this.context, columns, this.source);
  }

  /**
   * Rename a column. If the new name is taken the two columns are merged,
   * keeping the first non-null value of each row.
   */
  renameColumn(from: string, to: string): TaggedTable {
    if (from === to) return this;
    const renamed = this.column(from);
    if (!renamed) {
      throw new ExtractionError(this.source, `Table "${this.name}" has no column "${from}"`);
    }

    const target = this.column(to);
    if (!target) {
      const columns = this.columns.map(column => (column.name === from ? { ...column, name: to } : column));
      return new TaggedTable(this.context, columns, this.source);
    }

    const merged: TaggedColumn = {
      ...target,
      values: target.values.map((value, i) => value ?? renamed.values[i] ?? null),
    };
    const columns = this.columns
      .filter(column => column.name !== from)
      .map(column => (column.name === to ? merged : column));
    return new TaggedTable(this.context, columns, this.source);
  }

  withoutColumn(name: string): TaggedTable {
    return new TaggedTable(this.context, this.columns.filter(column => column.name !== name), this.source);
  }

  row(index: number): TaggedRow {
    return {
      table: this.name,
      source: this.source,
      index,
      cells: this.columns.map(column => ({
        column: column.name,
        value: column.values[index] ?? null,
        series: column.series,
      })),
    };
  }

  rows(): TaggedRow[] {
    return Array.from({ length: this.rowCount }, (_, index) => this.row(index));
  }
}
