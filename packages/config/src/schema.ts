/**
 * Pipeline configuration schema
 *
 * The file form is snake_case YAML or JSON; loadPipelineConfig converts it to
 * the camelCase model below.
 */

import { z } from 'zod';
import { TableContextConfigSchema, type RawTable, type TableContext } from '@phenoxform/core';
import { StrategyConfigSchema, type StrategyConfig } from '@phenoxform/transform';
import type { OntologyRef } from '@phenoxform/ontology';
import type { CheckConfig } from '@phenoxform/checks';

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const CsvSourceConfigSchema = z.object({
  type: z.literal('csv'),
  source: z.string().min(1),
  separator: z.string().length(1).default(','),
  has_headers: z.boolean().default(true),
  patients_are_rows: z.boolean().default(true),
  tables: z.array(TableContextConfigSchema).length(1, 'a csv source declares exactly one table'),
});

export const ExcelSourceConfigSchema = z.object({
  type: z.literal('excel'),
  source: z.string().min(1),
  has_headers: z.boolean().default(true),
  patients_are_rows: z.boolean().default(true),
  /** One table per worksheet, matched by sheet name */
  tables: z.array(TableContextConfigSchema).min(1),
});

export const InlineSourceConfigSchema = z.object({
  type: z.literal('inline'),
  name: z.string().min(1),
  data: z.array(z.object({
    name: z.string().min(1),
    columns: z.array(z.object({ name: z.string(), values: z.array(CellSchema) })),
  })),
  tables: z.array(TableContextConfigSchema).min(1),
});

export const DataSourceConfigSchema = z.discriminatedUnion('type', [
  CsvSourceConfigSchema,
  ExcelSourceConfigSchema,
  InlineSourceConfigSchema,
]);

const OntologyRefConfigSchema = z.union([
  z.string().min(1),
  z.object({ prefix: z.string().min(1), version: z.string().optional() }),
]);

export const LoaderConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('file_system'),
    out_dir: z.string().min(1),
    create_dir: z.boolean().default(false),
  }),
  z.object({ type: z.literal('memory') }),
]);

export const CheckConfigSchema = z.object({
  key: z.string().min(1),
  enabled: z.boolean().default(true),
  severity_override: z.enum(['INFO', 'WARN', 'ERROR']).optional(),
});

export const PipelineConfigSchema = z.object({
  data_sources: z.array(DataSourceConfigSchema).min(1),
  pipeline: z.object({
    strategies: z.array(StrategyConfigSchema).default([]),
    ontologies: z.array(OntologyRefConfigSchema).default([]),
    concurrency: z.number().int().positive().default(4),
    lookup_concurrency: z.number().int().positive().default(8),
  }).default({}),
  loader: LoaderConfigSchema,
  checks: z.array(CheckConfigSchema).optional(),
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type PipelineConfigFile = z.infer<typeof PipelineConfigSchema>;

export type DataSourceConfig =
  | { type: 'csv'; source: string; separator: string; hasHeaders: boolean; patientsAreRows: boolean; table: TableContext }
  | { type: 'excel'; source: string; hasHeaders: boolean; patientsAreRows: boolean; tables: TableContext[] }
  | { type: 'inline'; name: string; data: RawTable[]; tables: TableContext[] };

export type LoaderConfig =
  | { type: 'file_system'; outDir: string; createDir: boolean }
  | { type: 'memory' };

export interface PipelineConfig {
  dataSources: DataSourceConfig[];
  strategies: StrategyConfig[];
  ontologies: OntologyRef[];
  concurrency: number;
  lookupConcurrency: number;
  loader: LoaderConfig;
  /** Absent when the file declares no checks section; linting is then skipped */
  checks?: CheckConfig[];
}
