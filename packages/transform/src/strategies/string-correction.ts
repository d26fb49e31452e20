/**
 * String correction strategy
 */

import {
  contextEquals,
  type CellValue,
  type Context,
  type DiagnosticsReport,
  type TaggedColumn,
  type TaggedTable,
} from '@phenoxform/core';
import type { Strategy } from '../strategy.js';

export const DEFAULT_CORRECTED_CONTEXTS: readonly Context[] = [
  { kind: 'HpoLabelOrId' },
  { kind: 'DiseaseLabelOrId' },
  { kind: 'HgncSymbolOrId' },
  { kind: 'SubjectSex' },
  { kind: 'VitalStatus' },
];

export interface StringCorrectionOptions {
  contexts?: readonly Context[];
  /** Literal substring replaced in every cell before whitespace cleanup */
  replace?: string;
  with?: string;
}

/**
 * Collapse whitespace runs and trim string cells of selected data contexts
 */
export class StringCorrectionStrategy implements Strategy {
  readonly name = 'string_correction';
  private readonly contexts: readonly Context[];
  private readonly replace?: string;
  private readonly replacement: string;

  constructor(options: StringCorrectionOptions = {}) {
    this.contexts = options.contexts ?? DEFAULT_CORRECTED_CONTEXTS;
    this.replace = options.replace && options.replace.length > 0 ? options.replace : undefined;
    this.replacement = options.with ?? '';
  }

  appliesTo(table: TaggedTable): boolean {
    return table.columns.some(column => this.selects(column));
  }

  async transform(table: TaggedTable, _diagnostics: DiagnosticsReport): Promise<TaggedTable> {
    let result = table;
    for (const column of table.columns) {
      if (!this.selects(column)) continue;
      result = result.withColumnValues(column.name, column.values.map(value => this.correct(value)));
    }
    return result;
  }

  correct(value: CellValue): CellValue {
    if (typeof value !== 'string') return value;
    const replaced = this.replace ? value.split(this.replace).join(this.replacement) : value;
    const collapsed = replaced.replace(/\s+/g, ' ').trim();
    return collapsed.length === 0 ? null : collapsed;
  }

  private selects(column: TaggedColumn): boolean {
    return column.series.some(series =>
      this.contexts.some(context => contextEquals(series.dataContext, context))
    );
  }
}
