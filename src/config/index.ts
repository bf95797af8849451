/**
 * Configuration module.
 * Loads and validates runtime config from the config file, env and CLI flags.
 * Zod-validated; precedence is file < env < flags.
 */

export {
  DISPLAY_DEFAULTS,
  TIMEOUTS,
  BROWSER_DEFAULTS,
  UNBUFFERED_VARIABLES,
  PRIVILEGES_DROPPED_VARIABLE,
  DEFAULT_CONFIG_PATH,
  EXIT_CODES,
} from './defaults.js';
export { loadConfigFile, parseConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { resolveSettings, parseScreen } from './settings.js';
export type { BootstrapSettings, CliOverrides, Screen } from './settings.js';
