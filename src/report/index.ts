/**
 * Report module.
 * Turns a bootstrap outcome into the JSON contract and the stderr summary.
 */

export { generateJSON, serializeJSON, formatSummary } from './reporter.js';
export type { SessionReport } from './reporter.js';
