/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Config files and the JSON report validate through these schemas.
 */

export * from './config.js';
export * from './session.js';
export * from './report.js';
