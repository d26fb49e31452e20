/**
 * Alias map strategy
 */

import {
  cellToString,
  coerceValue,
  type AliasMap,
  type CellValue,
  type DiagnosticsReport,
  type TaggedColumn,
  type TaggedTable,
} from '@phenoxform/core';
import type { Strategy } from '../strategy.js';

function aliasMapOf(column: TaggedColumn): AliasMap | undefined {
  return column.series.find(series => series.aliasMap !== undefined)?.aliasMap;
}

/**
 * Replace cell values through the alias map declared on their series
 *
 * Keys are matched literally against the string form of the cell. Unmapped
 * values pass through. Every value is then coerced to the declared output
 * type; a value that cannot be coerced is reported and nulled.
 */
export class AliasMapStrategy implements Strategy {
  readonly name = 'alias_map';

  appliesTo(table: TaggedTable): boolean {
    return table.columns.some(column => aliasMapOf(column) !== undefined);
  }

  async transform(table: TaggedTable, diagnostics: DiagnosticsReport): Promise<TaggedTable> {
    let result = table;

    for (const column of table.columns) {
      const aliasMap = aliasMapOf(column);
      if (!aliasMap) continue;

      const values = column.values.map((value, row): CellValue => {
        const mapped = this.lookup(aliasMap, value);
        const coerced = coerceValue(mapped, aliasMap.outputType);
        if (coerced.ok) return coerced.value;

        diagnostics.add({
          kind: 'TypeCoercion',
          message: coerced.reason,
          table: table.name,
          source: table.source,
          column: column.name,
          row,
          value: mapped,
          origin: this.name,
        });
        return null;
      });

      result = result.withColumnValues(column.name, values);
    }

    return result;
  }

  private lookup(aliasMap: AliasMap, value: CellValue): CellValue {
    const key = cellToString(value);
    if (key === null || !Object.prototype.hasOwnProperty.call(aliasMap.map, key)) {
      return value;
    }
    return aliasMap.map[key] ?? null;
  }
}
