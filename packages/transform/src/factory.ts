/**
 * Strategy factory
 *
 * Builds the ordered strategy list from its serializable configuration.
 */

import { z } from 'zod';
import { ConfigurationError, ContextConfigSchema, contextFromConfig } from '@phenoxform/core';
import { OntologyRef, type CachedOntologyFactory } from '@phenoxform/ontology';
import type { Strategy } from './strategy.js';
import { AliasMapStrategy } from './strategies/alias-map.js';
import { MappingStrategy } from './strategies/mapping.js';
import { MultiHpoColExpansionStrategy } from './strategies/multi-hpo-col-expansion.js';
import { OntologyNormaliserStrategy } from './strategies/ontology-normaliser.js';
import { StringCorrectionStrategy } from './strategies/string-correction.js';

export const StrategyConfigSchema = z.union([
  z.enum(['string_correction', 'alias_map', 'multi_hpo_col_expansion', 'sex_mapping', 'vital_status_mapping']),
  z.object({
    string_correction: z.object({
      contexts: z.array(ContextConfigSchema).optional(),
      replace: z.string().optional(),
      with: z.string().optional(),
    }),
  }).strict(),
  z.object({
    ontology_normaliser: z.object({
      ontology: z.string().min(1),
      data_context: ContextConfigSchema,
    }),
  }).strict(),
  z.object({
    mapping: z.object({
      data_context: ContextConfigSchema,
      synonyms: z.record(z.string()),
    }),
  }).strict(),
]);

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;

export type StrategyName =
  | 'string_correction'
  | 'alias_map'
  | 'multi_hpo_col_expansion'
  | 'ontology_normaliser'
  | 'mapping';

export function strategyName(config: StrategyConfig): StrategyName {
  if (typeof config === 'string') {
    return config === 'sex_mapping' || config === 'vital_status_mapping' ? 'mapping' : config;
  }
  if ('string_correction' in config) return 'string_correction';
  if ('ontology_normaliser' in config) return 'ontology_normaliser';
  return 'mapping';
}

/** Strategies that must run after string_correction when both are declared */
const AFTER_STRING_CORRECTION: readonly StrategyName[] = ['alias_map', 'ontology_normaliser'];

/**
 * Order violations of a strategy list, as messages
 */
export function strategyOrderIssues(configs: readonly StrategyConfig[]): string[] {
  const names = configs.map(strategyName);
  const issues: string[] = [];

  names.forEach((name, index) => {
    if (name !== 'string_correction') return;
    names.slice(0, index).forEach((earlier, earlierIndex) => {
      if (AFTER_STRING_CORRECTION.includes(earlier)) {
        issues.push(`string_correction (position ${index + 1}) must come before ${earlier} (position ${earlierIndex + 1})`);
      }
    });
  });

  return issues;
}

export interface StrategyFactoryOptions {
  ontologies: CachedOntologyFactory;
  /** Declared ontology versions; a normaliser naming only a prefix picks its version here */
  refs?: readonly OntologyRef[];
  /** Lookups in flight per normalised table */
  lookupConcurrency?: number;
}

export function createStrategy(config: StrategyConfig, options: StrategyFactoryOptions): Strategy {
  if (typeof config === 'string') {
    switch (config) {
      case 'string_correction':
        return new StringCorrectionStrategy();
      case 'alias_map':
        return new AliasMapStrategy();
      case 'multi_hpo_col_expansion':
        return new MultiHpoColExpansionStrategy();
      case 'sex_mapping':
      case 'vital_status_mapping':
        return MappingStrategy.defaultMapping(config);
    }
  }

  if ('string_correction' in config) {
    const { contexts, replace, with: replacement } = config.string_correction;
    return new StringCorrectionStrategy({
      contexts: contexts?.map(contextFromConfig),
      replace,
      with: replacement,
    });
  }

  if ('ontology_normaliser' in config) {
    const { ontology, data_context } = config.ontology_normaliser;
    const requested = OntologyRef.from(ontology);
    const ref = options.refs?.find(declared => declared.prefix === requested.prefix) ?? requested;
    return new OntologyNormaliserStrategy({
      dict: options.ontologies.getBiDict(ref),
      dataContext: contextFromConfig(data_context),
      concurrency: options.lookupConcurrency,
    });
  }

  return new MappingStrategy({
    dataContext: contextFromConfig(config.mapping.data_context),
    synonyms: config.mapping.synonyms,
  });
}

/**
 * Build the ordered strategy list, rejecting invalid orderings
 */
export function createStrategies(configs: readonly StrategyConfig[], options: StrategyFactoryOptions): Strategy[] {
  const issues = strategyOrderIssues(configs);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid strategy order', issues);
  }
  return configs.map(config => createStrategy(config, options));
}
