/**
 * Core orchestration module.
 * Coordinates provisioner → privilege boundary → display → application.
 */

export { SessionBootstrap } from './bootstrap.js';
export type {
  ApplicationCommand,
  DisplaySettings,
  SessionBootstrapOptions,
  SignalSource,
} from './bootstrap.js';
export { runBootstrap, outcomeFor } from './pipeline.js';
export type { BootstrapOutcome, PipelineDeps } from './pipeline.js';
export * from './errors.js';
