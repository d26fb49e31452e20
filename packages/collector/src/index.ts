/**
 * Per-subject aggregation of tagged rows
 */

export * from './record.js';
export * from './collector.js';
