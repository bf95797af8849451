/**
 * Public library surface: the same pipeline the CLI runs.
 */

export * from './core/index.js';
export * from './config/index.js';
export * from './display/index.js';
export * from './environment/index.js';
export * from './privilege/index.js';
export * from './process/index.js';
export * from './browser/index.js';
export * from './report/index.js';
export * from './schema/index.js';
