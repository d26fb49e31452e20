/**
 * Pipeline orchestrator
 *
 * extract -> match -> strategies -> collect -> finalize -> checks -> load
 */

import { randomUUID } from 'crypto';
import { pino } from 'pino';
import {
  DiagnosticsReport,
  LoadError,
  errorMessage,
  matchTable,
  type RawTable,
  type TableContext,
  type TaggedTable,
} from '@phenoxform/core';
import { mapLimit, runStrategies, type Strategy } from '@phenoxform/transform';
import { Collector, type SubjectRecord } from '@phenoxform/collector';
import { runChecks, type CheckConfig, type LintReport } from '@phenoxform/checks';
import type { DataSource } from '@phenoxform/extract';
import type { Loader } from '@phenoxform/storage';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** A data source with the table contexts declared for it */
export interface ConfiguredSource {
  source: DataSource;
  tables: readonly TableContext[];
}

export interface PipelineOptions {
  strategies: readonly Strategy[];
  loader: Loader;
  collector?: Collector;
  /** Rule configuration; when absent the records are not linted */
  checks?: readonly CheckConfig[];
  /** Tables matched and transformed at once */
  concurrency?: number;
}

export interface PipelineResult {
  records: SubjectRecord[];
  diagnostics: DiagnosticsReport;
  lintReport?: LintReport;
}

interface TableJob {
  source: string;
  raw: RawTable;
  context: TableContext;
}

interface TableOutput {
  table: TaggedTable;
  diagnostics: DiagnosticsReport;
}

export class Pipeline {
  private readonly strategies: readonly Strategy[];
  private readonly loader: Loader;
  private readonly collector: Collector;
  private readonly checks?: readonly CheckConfig[];
  private readonly concurrency: number;

  constructor(options: PipelineOptions) {
    this.strategies = options.strategies;
    this.loader = options.loader;
    this.collector = options.collector ?? new Collector();
    this.checks = options.checks;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
  }

  /**
   * Run every source through to the loader
   *
   * Fatal errors reject with their original class. Row-scoped problems come
   * back in `diagnostics`, strategy diagnostics first in table order, then
   * the collector's.
   */
  async run(sources: readonly ConfiguredSource[]): Promise<PipelineResult> {
    const runId = randomUUID();
    const runLogger = logger.child({ runId });
    const startTime = Date.now();

    runLogger.info({ event: 'pipeline.started', sources: sources.length, strategies: this.strategies.map(s => s.name) }, 'Pipeline started');

    try {
      const jobs: TableJob[] = [];
      for (const configured of sources) {
        jobs.push(...(await this.planSource(configured)));
      }

      const outputs = await mapLimit(jobs, this.concurrency, job => this.processTable(job));

      const diagnostics = new DiagnosticsReport();
      for (const output of outputs) {
        diagnostics.merge(output.diagnostics);
        this.collector.ingestTable(output.table);
      }

      const records = this.collector.finalize();
      diagnostics.merge(this.collector.diagnostics);
      this.collector.diagnostics.clear();

      const lintReport = this.checks ? runChecks(records, [...this.checks]) : undefined;
      if (lintReport) {
        runLogger.info({
          event: 'pipeline.checks.completed',
          findings: lintReport.findings.length,
          hasViolations: lintReport.hasViolations,
        }, 'Checks completed');
      }

      await this.load(records);

      runLogger.info({
        event: 'pipeline.completed',
        tables: jobs.length,
        records: records.length,
        diagnostics: diagnostics.countByKind(),
        durationMs: Date.now() - startTime,
      }, 'Pipeline completed');

      return { records, diagnostics, lintReport };
    } catch (error) {
      runLogger.error({
        event: 'pipeline.failed',
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      }, 'Pipeline failed');
      throw error;
    }
  }

  private async planSource({ source, tables }: ConfiguredSource): Promise<TableJob[]> {
    const rawTables = await source.extract();
    const jobs: TableJob[] = [];

    for (const raw of rawTables) {
      const context = tables.find(table => table.name === raw.name);
      if (!context) {
        logger.warn({ event: 'pipeline.table.undeclared', source: source.name, table: raw.name }, 'Table has no declared context; skipped');
        continue;
      }
      jobs.push({ source: source.name, raw, context });
    }

    for (const table of tables) {
      if (!rawTables.some(raw => raw.name === table.name)) {
        logger.warn({ event: 'pipeline.table.absent', source: source.name, table: table.name }, 'Declared table not produced by source');
      }
    }

    return jobs;
  }

  private async processTable(job: TableJob): Promise<TableOutput> {
    const diagnostics = new DiagnosticsReport();
    const tagged = matchTable(job.raw, job.context, job.source);

    logger.debug({
      event: 'pipeline.table.matched',
      source: job.source,
      table: tagged.name,
      columns: tagged.columns.length,
      rows: tagged.rowCount,
    }, 'Table matched');

    const table = await runStrategies(this.strategies, tagged, diagnostics);
    return { table, diagnostics };
  }

  private async load(records: SubjectRecord[]): Promise<void> {
    try {
      await this.loader.load(records);
    } catch (error) {
      if (error instanceof LoadError) throw error;
      throw new LoadError(`Loader ${this.loader.name} failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }
}
