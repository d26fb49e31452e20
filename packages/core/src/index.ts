/**
 * Tagging model shared by every package
 */

export * from './context.js';
export * from './identifier.js';
export * from './coerce.js';
export * from './table-context.js';
export * from './table.js';
export * from './matcher.js';
export * from './errors.js';
export * from './diagnostics.js';
