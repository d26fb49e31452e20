/**
 * Ontology normaliser strategy
 */

import { pino } from 'pino';
import {
  PipelineError,
  cellToString,
  describeContext,
  errorMessage,
  type CellValue,
  type Context,
  type DiagnosticsReport,
  type TaggedTable,
} from '@phenoxform/core';
import type { BiDict } from '@phenoxform/ontology';
import { mapLimit } from '../limit.js';
import type { Strategy } from '../strategy.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const RECOVERABLE_CODES = new Set(['ONTOLOGY_LOOKUP', 'INVALID_ID', 'CACHE']);

export interface OntologyNormaliserOptions {
  dict: BiDict;
  dataContext: Context;
  /** Max lookups in flight for one table */
  concurrency?: number;
}

type Resolution = { ok: true; id: string } | { ok: false; reason: string };

/**
 * Replace labels and synonyms with canonical ontology ids
 *
 * Applies to cells of columns whose data context matches, and to the headers
 * of columns whose header context matches. Values that are already ids pass
 * through. Unresolved values keep their original text and are reported.
 */
export class OntologyNormaliserStrategy implements Strategy {
  readonly name = 'ontology_normaliser';
  private readonly dict: BiDict;
  private readonly dataContext: Context;
  private readonly concurrency: number;

  constructor(options: OntologyNormaliserOptions) {
    this.dict = options.dict;
    this.dataContext = options.dataContext;
    this.concurrency = options.concurrency ?? 8;
  }

  appliesTo(table: TaggedTable): boolean {
    return this.dataColumns(table).length > 0 || this.headerColumns(table).length > 0;
  }

  async transform(table: TaggedTable, diagnostics: DiagnosticsReport): Promise<TaggedTable> {
    const dataColumns = this.dataColumns(table);
    const headerColumns = this.headerColumns(table);

    const distinct = new Set<string>();
    for (const name of dataColumns) {
      for (const value of table.column(name)?.values ?? []) {
        const text = cellToString(value);
        if (text !== null) distinct.add(text);
      }
    }
    for (const name of headerColumns) distinct.add(name);

    const keys = [...distinct];
    const resolved = await mapLimit(keys, this.concurrency, key => this.resolve(key));
    const resolutions = new Map(keys.map((key, i): [string, Resolution] => [key, resolved[i]]));

    let result = table;

    for (const name of dataColumns) {
      const column = result.column(name);
      if (!column) continue;

      const values = column.values.map((value, row): CellValue => {
        const text = cellToString(value);
        if (text === null) return value;
        const resolution = resolutions.get(text);
        if (resolution?.ok) return resolution.id;

        diagnostics.add({
          kind: 'OntologyLookup',
          message: resolution?.reason ?? `"${text}" was not resolved`,
          table: table.name,
          source: table.source,
          column: name,
          row,
          value,
          origin: this.name,
        });
        return value;
      });
      result = result.withColumnValues(name, values);
    }

    for (const name of headerColumns) {
      const resolution = resolutions.get(name);
      if (resolution?.ok) {
        result = result.renameColumn(name, resolution.id);
        continue;
      }
      diagnostics.add({
        kind: 'OntologyLookup',
        message: resolution?.reason ?? `"${name}" was not resolved`,
        table: table.name,
        source: table.source,
        column: name,
        value: name,
        origin: this.name,
      });
    }

    logger.debug({
      event: 'transform.ontology_normaliser.done',
      table: table.name,
      ontology: this.dict.ref.key,
      context: describeContext(this.dataContext),
      distinctValues: keys.length,
      cache: this.dict.stats(),
    }, 'Normalised ontology values');

    return result;
  }

  private async resolve(value: string): Promise<Resolution> {
    if (this.dict.isId(value)) {
      return { ok: true, id: this.dict.validateId(value) };
    }
    try {
      return { ok: true, id: await this.dict.getId(value) };
    } catch (error) {
      if (error instanceof PipelineError && RECOVERABLE_CODES.has(error.code)) {
        return { ok: false, reason: errorMessage(error) };
      }
      throw error;
    }
  }

  private dataColumns(table: TaggedTable): string[] {
    return table.filterColumns({ data: this.dataContext }).map(column => column.name);
  }

  private headerColumns(table: TaggedTable): string[] {
    return table.filterColumns({ header: this.dataContext }).map(column => column.name);
  }
}
