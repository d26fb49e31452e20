/**
 * Multi-HPO column expansion strategy
 */

import {
  StrategyError,
  cellToString,
  exact,
  seriesContext,
  type CellValue,
  type DiagnosticsReport,
  type TaggedColumn,
  type TaggedTable,
} from '@phenoxform/core';
import type { Strategy } from '../strategy.js';

export const OBSERVED = 'observed';

const SEPARATORS = /[\n\r\t,;]+/;
const LEADING_HPO_ID = /^HP:\d{7}/i;

/**
 * Terms listed in one cell: the leading HP id of each element, or the whole
 * element as a label
 */
export function splitTerms(value: CellValue): string[] {
  const text = cellToString(value);
  if (text === null) return [];

  const terms: string[] = [];
  for (const element of text.split(SEPARATORS)) {
    const trimmed = element.trim();
    if (trimmed.length === 0) continue;
    const id = LEADING_HPO_ID.exec(trimmed);
    const term = id ? id[0].toUpperCase() : trimmed;
    if (!terms.includes(term)) terms.push(term);
  }
  return terms;
}

/**
 * Expand columns listing several HPO terms per cell into one column per term
 *
 * Each new column is named by the term, its header tagged HpoLabelOrId and
 * its cells tagged ObservationStatus: "observed" for rows listing the term,
 * null otherwise. The source column is dropped.
 */
export class MultiHpoColExpansionStrategy implements Strategy {
  readonly name = 'multi_hpo_col_expansion';

  appliesTo(table: TaggedTable): boolean {
    return this.sourceColumns(table).length > 0;
  }

  async transform(table: TaggedTable, _diagnostics: DiagnosticsReport): Promise<TaggedTable> {
    if (table.subjectIdColumns().length === 0) {
      throw new StrategyError(this.name, table.name, `Table "${table.name}" has no subject id column`);
    }

    let result = table;
    for (const column of this.sourceColumns(table)) {
      const rowsByTerm = new Map<string, Set<number>>();
      column.values.forEach((value, row) => {
        for (const term of splitTerms(value)) {
          const rows = rowsByTerm.get(term) ?? new Set<number>();
          rows.add(row);
          rowsByTerm.set(term, rows);
        }
      });

      const blockId = column.series.find(series => series.buildingBlockId !== undefined)?.buildingBlockId;
      result = result.withoutColumn(column.name);

      for (const [term, rows] of rowsByTerm) {
        const values = Array.from({ length: table.rowCount }, (_, row): CellValue => (rows.has(row) ? OBSERVED : null));
        const existing = result.column(term);
        result = result.withColumn(existing ? this.mergeInto(existing, values) : {
          name: term,
          values,
          series: [seriesContext(exact(term), {
            headerContext: { kind: 'HpoLabelOrId' },
            dataContext: { kind: 'ObservationStatus' },
            buildingBlockId: blockId,
          })],
        });
      }
    }

    return result;
  }

  private sourceColumns(table: TaggedTable): TaggedColumn[] {
    return table.filterColumns({ data: { kind: 'MultiHpoId' } });
  }

  private mergeInto(existing: TaggedColumn, values: CellValue[]): TaggedColumn {
    return {
      ...existing,
      values: existing.values.map((value, row) => value ?? values[row] ?? null),
    };
  }
}
