/**
 * Controlled-vocabulary mapping strategy
 */

import { pino } from 'pino';
import {
  cellToString,
  describeContext,
  type CellValue,
  type Context,
  type DiagnosticsReport,
  type TaggedTable,
} from '@phenoxform/core';
import type { Strategy } from '../strategy.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const SEX_SYNONYMS: Record<string, string> = {
  m: 'MALE',
  male: 'MALE',
  man: 'MALE',
  f: 'FEMALE',
  female: 'FEMALE',
  woman: 'FEMALE',
  diverse: 'OTHER_SEX',
  intersex: 'OTHER_SEX',
  other: 'OTHER_SEX',
  unknown: 'UNKNOWN_SEX',
};

export const VITAL_STATUS_SYNONYMS: Record<string, string> = {
  yes: 'ALIVE',
  living: 'ALIVE',
  alive: 'ALIVE',
  no: 'DECEASED',
  dead: 'DECEASED',
  deceased: 'DECEASED',
  unknown: 'UNKNOWN_STATUS',
  'no data': 'UNKNOWN_STATUS',
};

export type DefaultMapping = 'sex_mapping' | 'vital_status_mapping';

export interface MappingOptions {
  dataContext: Context;
  /** Keys are matched after trimming and lower-casing */
  synonyms: Record<string, string>;
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Map the cells of one data context through a synonym table
 *
 * Values outside the table are reported and left as they are.
 */
export class MappingStrategy implements Strategy {
  readonly name = 'mapping';
  private readonly dataContext: Context;
  private readonly synonyms: Map<string, string>;

  constructor(options: MappingOptions) {
    this.dataContext = options.dataContext;
    this.synonyms = new Map(
      Object.entries(options.synonyms).map(([key, value]): [string, string] => [normalizeKey(key), value])
    );
  }

  static defaultMapping(mapping: DefaultMapping): MappingStrategy {
    switch (mapping) {
      case 'sex_mapping':
        return new MappingStrategy({ dataContext: { kind: 'SubjectSex' }, synonyms: SEX_SYNONYMS });
      case 'vital_status_mapping':
        return new MappingStrategy({ dataContext: { kind: 'VitalStatus' }, synonyms: VITAL_STATUS_SYNONYMS });
    }
  }

  appliesTo(table: TaggedTable): boolean {
    return table.filterColumns({ data: this.dataContext }).length > 0;
  }

  async transform(table: TaggedTable, diagnostics: DiagnosticsReport): Promise<TaggedTable> {
    let result = table;
    let unmapped = 0;

    for (const column of table.filterColumns({ data: this.dataContext })) {
      const values = column.values.map((value, row): CellValue => {
        const text = cellToString(value);
        if (text === null) return null;

        const mapped = this.synonyms.get(normalizeKey(text));
        if (mapped !== undefined) return mapped;

        unmapped++;
        diagnostics.add({
          kind: 'MappingViolation',
          message: `"${text}" is not a known ${describeContext(this.dataContext)} value`,
          table: table.name,
          source: table.source,
          column: column.name,
          row,
          value,
          origin: this.name,
        });
        return value;
      });
      result = result.withColumnValues(column.name, values);
    }

    if (unmapped > 0) {
      logger.warn({
        event: 'transform.mapping.unmapped',
        table: table.name,
        context: describeContext(this.dataContext),
        unmapped,
      }, 'Values outside the controlled vocabulary');
    }

    return result;
  }
}
