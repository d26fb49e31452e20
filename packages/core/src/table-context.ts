/**
 * Declared semantic shape of a table
 */

import { z } from 'zod';
import { ContextConfigSchema, NONE, contextFromConfig, type Context } from './context.js';
import { coerceValue, OUTPUT_TYPES, type OutputType } from './coerce.js';
import { ConfigurationError } from './errors.js';
import {
  IdentifierConfigSchema,
  describeIdentifier,
  identifierFromConfig,
  type Identifier,
} from './identifier.js';
import type { CellValue } from './table.js';

export type Scalar = Exclude<CellValue, null>;

export interface AliasMap {
  /** Literal, case-sensitive cell value -> replacement (null clears the cell) */
  map: Record<string, CellValue>;
  outputType: OutputType;
}

export interface SeriesContext {
  identifier: Identifier;
  /** Meaning of the column header itself */
  headerContext: Context;
  /** Meaning of the column's cell values */
  dataContext: Context;
  fillMissing?: Scalar;
  aliasMap?: AliasMap;
  /** Series sharing this id are assembled into one sub-record per row */
  buildingBlockId?: string;
  /** Optional series may match no column, and may be null inside a block */
  optional: boolean;
}

export interface TableContext {
  name: string;
  series: SeriesContext[];
}

export type SeriesContextOptions = Partial<Omit<SeriesContext, 'identifier'>>;

export function seriesContext(identifier: Identifier, options: SeriesContextOptions = {}): SeriesContext {
  return {
    identifier,
    headerContext: options.headerContext ?? NONE,
    dataContext: options.dataContext ?? NONE,
    fillMissing: options.fillMissing,
    aliasMap: options.aliasMap,
    buildingBlockId: options.buildingBlockId,
    optional: options.optional ?? false,
  };
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const SeriesContextConfigSchema = z.object({
  identifier: IdentifierConfigSchema,
  header_context: ContextConfigSchema.optional(),
  data_context: ContextConfigSchema.optional(),
  fill_missing: ScalarSchema.optional(),
  alias_map: z.object({
    hash_map: z.record(z.union([ScalarSchema, z.null()])),
    output_dtype: z.enum(['string', 'float', 'int', 'boolean']).default('string'),
  }).optional(),
  building_block_id: z.string().min(1).optional(),
  optional: z.boolean().optional(),
});

export const TableContextConfigSchema = z.object({
  name: z.string().min(1),
  context: z.array(SeriesContextConfigSchema).min(1),
});

export type SeriesContextConfig = z.infer<typeof SeriesContextConfigSchema>;
export type TableContextConfig = z.infer<typeof TableContextConfigSchema>;

export function seriesContextFromConfig(config: SeriesContextConfig): SeriesContext {
  return seriesContext(identifierFromConfig(config.identifier), {
    headerContext: config.header_context ? contextFromConfig(config.header_context) : undefined,
    dataContext: config.data_context ? contextFromConfig(config.data_context) : undefined,
    fillMissing: config.fill_missing,
    aliasMap: config.alias_map
      ? { map: { ...config.alias_map.hash_map }, outputType: config.alias_map.output_dtype }
      : undefined,
    buildingBlockId: config.building_block_id,
    optional: config.optional,
  });
}

/**
 * Build and validate a TableContext from its configuration form
 */
export function tableContextFromConfig(config: TableContextConfig): TableContext {
  const table: TableContext = {
    name: config.name,
    series: config.context.map(seriesContextFromConfig),
  };
  validateTableContext(table);
  return table;
}

/**
 * Collect every problem with a table context and throw them together
 */
export function validateTableContext(table: TableContext): void {
  const issues: string[] = [];

  const subjectIdSeries = table.series.filter(series => series.dataContext.kind === 'SubjectId');
  if (subjectIdSeries.length !== 1) {
    issues.push(`expected exactly one subject_id series, found ${subjectIdSeries.length}`);
  }

  const seen = new Set<string>();
  for (const series of table.series) {
    const key = JSON.stringify(series.identifier);
    if (seen.has(key)) {
      issues.push(`identifier ${describeIdentifier(series.identifier)} is declared more than once`);
    }
    seen.add(key);

    if (series.aliasMap) {
      issues.push(...aliasMapIssues(series));
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid table context "${table.name}"`, issues);
  }
}

/**
 * Problems with a series' alias map; empty when the map is well-formed
 */
export function aliasMapIssues(series: SeriesContext): string[] {
  const aliasMap = series.aliasMap;
  if (!aliasMap) return [];

  const where = describeIdentifier(series.identifier);
  if (!OUTPUT_TYPES.includes(aliasMap.outputType)) {
    return [`alias map of ${where} has unknown output type "${String(aliasMap.outputType)}"`];
  }

  const issues: string[] = [];
  for (const [key, value] of Object.entries(aliasMap.map)) {
    const coerced = coerceValue(value, aliasMap.outputType);
    if (!coerced.ok) {
      issues.push(`alias map of ${where} maps "${key}" to a value that is not ${aliasMap.outputType}: ${coerced.reason}`);
    }
  }
  return issues;
}
