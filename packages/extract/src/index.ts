/**
 * Data sources
 */

export * from './types.js';
export * from './grid.js';
export * from './cells.js';
export * from './csv.js';
export * from './excel.js';
export * from './in-memory.js';
