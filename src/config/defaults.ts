/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const DISPLAY_DEFAULTS = {
  NUMBER: 99,
  WIDTH: 1024,
  HEIGHT: 768,
  DEPTH: 16,
  SERVER_PATH: 'Xvfb',
  SOCKET_DIR: '/tmp/.X11-unix',
} as const;

export const TIMEOUTS = {
  DISPLAY_READY: 10_000,
  READY_POLL_INTERVAL: 100,
  DISPLAY_STOP: 5_000,
  APP_GRACE_PERIOD: 10_000,
  BROWSER_PROBE: 30_000,
  BROWSER_VERSION_QUERY: 10_000,
} as const;

export const BROWSER_DEFAULTS = {
  VERSION_VARIABLE: 'CHROME_VERSION',
  CANDIDATES: [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
  ],
  PROBE_ARGS: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
} as const;

/** Variables set to "1" in the application's environment to disable output buffering. */
export const UNBUFFERED_VARIABLES = ['PYTHONUNBUFFERED'] as const;

export const PRIVILEGES_DROPPED_VARIABLE = 'BOOTSTRAP_PRIVILEGES_DROPPED';

export const DEFAULT_CONFIG_PATH = '.bootstrap.yaml';

// Reserved codes follow sysexits.h.
export const EXIT_CODES = {
  OK: 0,
  CONFIG_ERROR: 64,
  DISPLAY_UNAVAILABLE: 69,
  PERMISSION_DENIED: 77,
  PROVISIONING_FAILED: 78,
  APP_NOT_LAUNCHED: 127,
} as const;
