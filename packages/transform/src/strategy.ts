/**
 * Strategy pipeline
 */

import { pino } from 'pino';
import {
  PipelineError,
  StrategyError,
  errorMessage,
  type DiagnosticsReport,
  type TaggedTable,
} from '@phenoxform/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * One rewrite step over a tagged table
 *
 * Strategies return a new table and never mutate their input. Row-scoped
 * problems go to the diagnostics report; structural problems throw.
 */
export interface Strategy {
  readonly name: string;
  appliesTo(table: TaggedTable): boolean;
  transform(table: TaggedTable, diagnostics: DiagnosticsReport): Promise<TaggedTable>;
}

/**
 * Apply strategies in order, each to the output of the previous one
 */
export async function runStrategies(
  strategies: readonly Strategy[],
  table: TaggedTable,
  diagnostics: DiagnosticsReport
): Promise<TaggedTable> {
  let current = table;

  for (const strategy of strategies) {
    if (!strategy.appliesTo(current)) {
      logger.debug({
        event: 'transform.strategy.skipped',
        strategy: strategy.name,
        table: current.name,
      }, 'Strategy does not apply to table');
      continue;
    }

    const startTime = Date.now();
    const before = diagnostics.size;
    try {
      current = await strategy.transform(current, diagnostics);
    } catch (error) {
      logger.error({
        event: 'transform.strategy.failed',
        strategy: strategy.name,
        table: current.name,
        error: errorMessage(error),
      }, 'Strategy failed');

      if (error instanceof PipelineError) throw error;
      throw new StrategyError(strategy.name, current.name, errorMessage(error), { cause: error });
    }

    logger.debug({
      event: 'transform.strategy.applied',
      strategy: strategy.name,
      table: current.name,
      diagnostics: diagnostics.size - before,
      durationMs: Date.now() - startTime,
    }, 'Strategy applied');
  }

  return current;
}
