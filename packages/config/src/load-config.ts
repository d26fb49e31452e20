/**
 * Pipeline configuration loading
 */

import { readFile } from 'fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'path';
import { load } from 'js-yaml';
import { pino } from 'pino';
import {
  ConfigurationError,
  errorMessage,
  tableContextFromConfig,
  type TableContext,
  type TableContextConfig,
} from '@phenoxform/core';
import { OntologyRef } from '@phenoxform/ontology';
import { strategyOrderIssues } from '@phenoxform/transform';
import {
  PipelineConfigSchema,
  type DataSourceConfig,
  type LoaderConfig,
  type PipelineConfig,
  type PipelineConfigFile,
} from './schema.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Parse YAML or JSON text; the extension picks the parser, YAML otherwise
 */
export function parseConfigText(text: string, fileName = 'config.yaml'): unknown {
  const extension = extname(fileName).toLowerCase();
  try {
    return extension === '.json' ? JSON.parse(text) : load(text);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${fileName}: ${errorMessage(error)}`);
  }
}

/**
 * Validate and convert a configuration object
 *
 * Every schema, table context and strategy order problem is reported in one
 * ConfigurationError. Relative paths resolve against `baseDir`.
 */
export function parsePipelineConfig(raw: unknown, baseDir: string = process.cwd()): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid pipeline configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const file: PipelineConfigFile = parsed.data;
  const issues: string[] = [];

  const convertTables = (tables: TableContextConfig[], where: string): TableContext[] =>
    tables.flatMap(table => {
      try {
        return [tableContextFromConfig(table)];
      } catch (error) {
        const details = error instanceof ConfigurationError && error.issues.length > 0
          ? error.issues
          : [errorMessage(error)];
        issues.push(...details.map(detail => `${where} table "${table.name}": ${detail}`));
        return [];
      }
    });

  const dataSources = file.data_sources.map((source, index): DataSourceConfig => {
    const where = `data_sources.${index}`;
    switch (source.type) {
      case 'csv': {
        const [table] = convertTables(source.tables, where);
        return {
          type: 'csv',
          source: resolvePath(baseDir, source.source),
          separator: source.separator,
          hasHeaders: source.has_headers,
          patientsAreRows: source.patients_are_rows,
          table: table ?? { name: source.tables[0].name, series: [] },
        };
      }
      case 'excel':
        return {
          type: 'excel',
          source: resolvePath(baseDir, source.source),
          hasHeaders: source.has_headers,
          patientsAreRows: source.patients_are_rows,
          tables: convertTables(source.tables, where),
        };
      case 'inline':
        return { type: 'inline', name: source.name, data: source.data, tables: convertTables(source.tables, where) };
    }
  });

  issues.push(...strategyOrderIssues(file.pipeline.strategies));

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid pipeline configuration', issues);
  }

  const loader: LoaderConfig = file.loader.type === 'file_system'
    ? { type: 'file_system', outDir: resolvePath(baseDir, file.loader.out_dir), createDir: file.loader.create_dir }
    : { type: 'memory' };

  return {
    dataSources,
    strategies: file.pipeline.strategies,
    ontologies: file.pipeline.ontologies.map(ref =>
      typeof ref === 'string' ? OntologyRef.from(ref) : new OntologyRef(ref.prefix, ref.version)
    ),
    concurrency: file.pipeline.concurrency,
    lookupConcurrency: file.pipeline.lookup_concurrency,
    loader,
    checks: file.checks?.map(check => ({
      checkKey: check.key,
      enabled: check.enabled,
      severityOverride: check.severity_override,
    })),
  };
}

/**
 * Read, validate and convert a YAML or JSON configuration file
 */
export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  const absolute = resolve(path);
  let text: string;
  try {
    text = await readFile(absolute, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${absolute}: ${errorMessage(error)}`);
  }

  const config = parsePipelineConfig(parseConfigText(text, absolute), dirname(absolute));

  logger.info({
    event: 'config.loaded',
    path: absolute,
    dataSources: config.dataSources.length,
    strategies: config.strategies.length,
    ontologies: config.ontologies.map(ref => ref.key),
  }, 'Loaded pipeline configuration');

  return config;
}
