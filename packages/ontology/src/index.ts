/**
 * Ontology lookups with a run-scoped cache
 */

export * from './ontology-ref.js';
export * from './types.js';
export * from './bidict.js';
export * from './factory.js';
export * from './resolver.js';
export * from './providers/in-memory.js';
export * from './providers/bioportal.js';
