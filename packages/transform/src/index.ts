/**
 * Table transformation strategies
 */

export * from './strategy.js';
export * from './limit.js';
export * from './factory.js';
export * from './strategies/string-correction.js';
export * from './strategies/alias-map.js';
export * from './strategies/multi-hpo-col-expansion.js';
export * from './strategies/ontology-normaliser.js';
export * from './strategies/mapping.js';
