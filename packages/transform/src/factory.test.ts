import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@phenoxform/core';
import { CachedOntologyFactory, InMemoryTermProvider, OntologyRef } from '@phenoxform/ontology';
import {
  StrategyConfigSchema,
  createStrategies,
  strategyOrderIssues,
  type StrategyConfig,
} from './factory.js';

function ontologies(): { factory: CachedOntologyFactory; resolved: string[] } {
  const resolved: string[] = [];
  const factory = new CachedOntologyFactory(ref => {
    resolved.push(ref.key);
    return new InMemoryTermProvider([]);
  });
  return { factory, resolved };
}

describe('strategy factory', () => {
  it('should parse every configuration form', () => {
    const configs = [
      'string_correction',
      { string_correction: { replace: '_', with: ' ' } },
      'alias_map',
      'multi_hpo_col_expansion',
      'sex_mapping',
      { ontology_normaliser: { ontology: 'hp', data_context: 'hpo_label_or_id' } },
      { mapping: { data_context: 'vital_status', synonyms: { y: 'ALIVE' } } },
    ].map(config => StrategyConfigSchema.parse(config));

    expect(configs).toHaveLength(7);
    expect(() => StrategyConfigSchema.parse('date_to_age')).toThrow();
  });

  it('should build strategies in declared order', () => {
    const { factory, resolved } = ontologies();
    const configs: StrategyConfig[] = [
      'string_correction',
      'alias_map',
      { ontology_normaliser: { ontology: 'hp', data_context: 'hpo_label_or_id' } },
      'sex_mapping',
    ];

    const strategies = createStrategies(configs, {
      ontologies: factory,
      refs: [OntologyRef.hp('2024-04-26')],
    });

    expect(strategies.map(strategy => strategy.name)).toEqual([
      'string_correction',
      'alias_map',
      'ontology_normaliser',
      'mapping',
    ]);
    expect(resolved).toEqual(['HP:2024-04-26']);
  });

  it('should reject string_correction declared after alias_map or ontology_normaliser', () => {
    const configs: StrategyConfig[] = [
      'alias_map',
      { ontology_normaliser: { ontology: 'hp', data_context: 'hpo_label_or_id' } },
      'string_correction',
    ];

    expect(strategyOrderIssues(configs)).toEqual([
      'string_correction (position 3) must come before alias_map (position 1)',
      'string_correction (position 3) must come before ontology_normaliser (position 2)',
    ]);
    expect(() => createStrategies(configs, { ontologies: ontologies().factory })).toThrow(ConfigurationError);
  });

  it('should accept lists without string_correction', () => {
    expect(strategyOrderIssues(['alias_map', 'multi_hpo_col_expansion'])).toEqual([]);
  });
});
