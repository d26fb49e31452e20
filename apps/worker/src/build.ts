/**
 * Pipeline assembly from a loaded configuration
 */

import { pino } from 'pino';
import type { DataSourceConfig, LoaderConfig, PipelineConfig, RuntimeEnv } from '@phenoxform/config';
import { CsvDataSource, ExcelDataSource, InMemoryDataSource } from '@phenoxform/extract';
import { CachedOntologyFactory, createProviderResolver, type OntologyTerm } from '@phenoxform/ontology';
import { FileSystemLoader, MemoryLoader, type Loader } from '@phenoxform/storage';
import { createStrategies } from '@phenoxform/transform';
import { Pipeline, type ConfiguredSource } from './pipeline.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface BuildOptions {
  env: RuntimeEnv;
  /** Inline term lists keyed by prefix, ahead of term files and BioPortal */
  terms?: Record<string, OntologyTerm[]>;
  fetchFn?: typeof fetch;
  /** Replaces the configured loader */
  loader?: Loader;
}

export interface BuiltPipeline {
  pipeline: Pipeline;
  sources: ConfiguredSource[];
  ontologies: CachedOntologyFactory;
  loader: Loader;
}

export function createDataSource(config: DataSourceConfig): ConfiguredSource {
  switch (config.type) {
    case 'csv':
      return {
        source: new CsvDataSource({
          path: config.source,
          tableName: config.table.name,
          separator: config.separator,
          hasHeaders: config.hasHeaders,
          patientsAreRows: config.patientsAreRows,
        }),
        tables: [config.table],
      };
    case 'excel':
      return {
        source: new ExcelDataSource({
          path: config.source,
          sheets: config.tables.map(table => table.name),
          hasHeaders: config.hasHeaders,
          patientsAreRows: config.patientsAreRows,
        }),
        tables: config.tables,
      };
    case 'inline':
      return { source: new InMemoryDataSource(config.name, config.data), tables: config.tables };
  }
}

export function createLoader(config: LoaderConfig): Loader {
  return config.type === 'file_system'
    ? new FileSystemLoader({ outDir: config.outDir, createDir: config.createDir })
    : new MemoryLoader();
}

/**
 * Wire sources, ontologies, strategies and loader for one configuration
 *
 * Declared ontologies get their providers here, so a missing term source
 * fails before any table is read.
 */
export function buildPipeline(config: PipelineConfig, options: BuildOptions): BuiltPipeline {
  const ontologies = new CachedOntologyFactory(createProviderResolver({
    ontologyDir: options.env.ontologyDir,
    bioportalApiKey: options.env.bioportalApiKey,
    bioportalUrl: options.env.bioportalUrl,
    terms: options.terms,
    fetchFn: options.fetchFn,
  }));
  ontologies.preload(config.ontologies);

  const strategies = createStrategies(config.strategies, {
    ontologies,
    refs: config.ontologies,
    lookupConcurrency: config.lookupConcurrency,
  });

  const loader = options.loader ?? createLoader(config.loader);
  const sources = config.dataSources.map(createDataSource);

  logger.debug({
    event: 'pipeline.built',
    sources: sources.map(configured => configured.source.name),
    strategies: strategies.map(strategy => strategy.name),
    ontologies: config.ontologies.map(ref => ref.key),
    loader: loader.name,
  }, 'Pipeline built');

  return {
    pipeline: new Pipeline({
      strategies,
      loader,
      checks: config.checks,
      concurrency: config.concurrency,
    }),
    sources,
    ontologies,
    loader,
  };
}
