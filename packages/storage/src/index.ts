/**
 * Record loaders
 */

export * from './types.js';
export * from './file-system.js';
export * from './memory.js';
