/**
 * Process module.
 * Narrow child-process abstraction shared by the display supervisor
 * and the session bootstrap.
 */

export { launchProcess } from './launcher.js';
export type { LaunchOptions, ManagedProcess, ProcessLauncher } from './launcher.js';
