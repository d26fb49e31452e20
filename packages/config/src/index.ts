export * from './env.js';
export * from './schema.js';
export * from './load-config.js';
