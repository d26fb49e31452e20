/**
 * Context matcher
 *
 * Binds the SeriesContexts of a TableContext to the physical columns of a
 * raw table and prepares the cells of bound columns.
 */

import { pino } from 'pino';
import { IdentifierMatchError } from './errors.js';
import { describeIdentifier, resolveIdentifier } from './identifier.js';
import { TaggedTable, type CellValue, type RawTable, type TaggedColumn } from './table.js';
import type { SeriesContext, TableContext } from './table-context.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * Trim strings and turn empty strings into null
 */
export function prepareCell(value: CellValue): CellValue {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

function fillValue(series: readonly SeriesContext[]): CellValue {
  for (const sc of series) {
    if (sc.fillMissing !== undefined) return sc.fillMissing;
  }
  return null;
}

/**
 * Match a raw table against its declared context
 *
 * A column matched by several series is bound to all of them. Columns bound
 * to no series are dropped.
 */
export function matchTable(raw: RawTable, tableContext: TableContext, source = 'unknown'): TaggedTable {
  const headers = raw.columns.map(column => column.name);
  const bindings = new Map<string, SeriesContext[]>();

  for (const series of tableContext.series) {
    const { matched, missing } = resolveIdentifier(series.identifier, headers);
    const where = describeIdentifier(series.identifier);

    if (!series.optional) {
      if (missing.length > 0) {
        throw new IdentifierMatchError(
          tableContext.name,
          where,
          `Table "${tableContext.name}" is missing required column(s): ${missing.join(', ')}`
        );
      }
      if (matched.length === 0) {
        throw new IdentifierMatchError(
          tableContext.name,
          where,
          `Identifier ${where} matched no column of table "${tableContext.name}"`
        );
      }
    }

    for (const header of matched) {
      const bound = bindings.get(header) ?? [];
      bound.push(series);
      bindings.set(header, bound);
    }
  }

  const columns: TaggedColumn[] = [];
  const unbound: string[] = [];

  for (const rawColumn of raw.columns) {
    const series = bindings.get(rawColumn.name);
    if (!series) {
      unbound.push(rawColumn.name);
      continue;
    }
    const fill = fillValue(series);
    columns.push({
      name: rawColumn.name,
      series,
      values: rawColumn.values.map(value => {
        const prepared = prepareCell(value);
        return prepared === null ? fill : prepared;
      }),
    });
  }

  if (unbound.length > 0) {
    logger.debug({
      event: 'matcher.columns.unbound',
      table: tableContext.name,
      columns: unbound,
    }, 'Dropping columns without a series context');
  }

  logger.debug({
    event: 'matcher.table.matched',
    table: tableContext.name,
    source,
    columns: columns.length,
  }, 'Table matched against context');

  return new TaggedTable(tableContext, columns, source);
}
