/**
 * Environment module.
 * Detects the browser and publishes the frozen runtime environment
 * every child process inherits.
 */

export { EnvironmentProvisioner, parseMajorVersion } from './provisioner.js';
export type { BrowserInfo, ProvisionerOptions } from './provisioner.js';
export {
  publishEnvironment,
  childEnvironment,
  formatEnvironmentFile,
} from './runtimeEnv.js';
export type { RuntimeEnvironment } from './runtimeEnv.js';
