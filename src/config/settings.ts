import { parseDisplay } from '../display/readiness.js';
import { ConfigError } from '../core/errors.js';
import type { ExecutionIdentity } from '../privilege/boundary.js';
import { colorDepthSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Resolved settings ───────────────────────────────────────

export interface BootstrapSettings {
  display: {
    number: number;
    width: number;
    height: number;
    depth: number;
    readyTimeoutMs: number;
    serverPath: string;
    serverArgs: readonly string[];
    socketDir: string;
  };
  browser: {
    path?: string | undefined;
    required: boolean;
    probe: boolean;
    probeTimeoutMs: number;
    versionVariable: string;
  };
  app: {
    command: readonly string[];
    cwd?: string | undefined;
    env: Readonly<Record<string, string>>;
    gracePeriodMs: number;
    unbuffered: readonly string[];
  };
  identity?: ExecutionIdentity | undefined;
}

/** Flags from the command line. Strings as commander hands them over. */
export interface CliOverrides {
  display?: string | undefined;
  screen?: string | undefined;
  readyTimeout?: string | undefined;
  gracePeriod?: string | undefined;
  user?: string | undefined;
  group?: string | undefined;
  browserPath?: string | undefined;
  allowMissingBrowser?: boolean | undefined;
  probeBrowser?: boolean | undefined;
  command?: readonly string[] | undefined;
}

// ── Parsers ─────────────────────────────────────────────────

export interface Screen {
  width: number;
  height: number;
  depth: number;
}

/** "1024x768x16" → { width: 1024, height: 768, depth: 16 }. */
export function parseScreen(value: string): Screen {
  const match = /^(\d+)x(\d+)x(\d+)$/.exec(value.trim());
  if (!match?.[1] || !match[2] || !match[3]) {
    throw new ConfigError(`Invalid screen "${value}", expected WIDTHxHEIGHTxDEPTH`);
  }
  const screen = { width: Number(match[1]), height: Number(match[2]), depth: Number(match[3]) };
  if (screen.width === 0 || screen.height === 0) {
    throw new ConfigError(`Invalid screen "${value}", width and height must be positive`);
  }
  if (!colorDepthSchema.safeParse(screen.depth).success) {
    throw new ConfigError(`Unsupported color depth ${String(screen.depth)} in "${value}"`);
  }
  return screen;
}

function parseDisplayNumber(value: string, source: string): number {
  const displayNumber = parseDisplay(value);
  if (displayNumber === null) {
    throw new ConfigError(`Invalid display "${value}" from ${source}, expected ":N"`);
  }
  return displayNumber;
}

function parseSeconds(value: string, source: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`Invalid ${source} "${value}", expected positive seconds`);
  }
  return seconds;
}

// ── Merge ───────────────────────────────────────────────────

/**
 * Precedence: config file < environment variables < CLI flags.
 * Defaults are already applied by the file schema.
 */
export function resolveSettings(
  file: FileConfig,
  env: Readonly<Record<string, string | undefined>>,
  cli: CliOverrides = {},
): BootstrapSettings {
  // Display
  const displayValue = cli.display ?? env['BOOTSTRAP_DISPLAY'];
  const displayNumber =
    displayValue !== undefined
      ? parseDisplayNumber(displayValue, cli.display !== undefined ? '--display' : 'BOOTSTRAP_DISPLAY')
      : file.display.number;

  const screenValue = cli.screen ?? env['BOOTSTRAP_SCREEN'];
  const screen =
    screenValue !== undefined
      ? parseScreen(screenValue)
      : { width: file.display.width, height: file.display.height, depth: file.display.depth };

  const readyTimeoutValue = cli.readyTimeout ?? env['BOOTSTRAP_READY_TIMEOUT'];
  const readyTimeout =
    readyTimeoutValue !== undefined
      ? parseSeconds(readyTimeoutValue, 'ready timeout')
      : file.display.readyTimeout;

  const gracePeriod =
    cli.gracePeriod !== undefined
      ? parseSeconds(cli.gracePeriod, 'grace period')
      : file.app.gracePeriod;

  // Identity
  const user = cli.user ?? env['BOOTSTRAP_USER'] ?? file.user;
  const group = cli.group ?? env['BOOTSTRAP_GROUP'] ?? file.group;
  if (group !== undefined && user === undefined) {
    throw new ConfigError('A group was configured without a user');
  }

  // Browser
  const browserPath = cli.browserPath ?? env['CHROME_PATH'] ?? file.browser.path;

  const command = cli.command !== undefined && cli.command.length > 0
    ? cli.command
    : file.app.command ?? [];

  return {
    display: {
      number: displayNumber,
      ...screen,
      readyTimeoutMs: Math.round(readyTimeout * 1000),
      serverPath: file.display.serverPath,
      serverArgs: file.display.serverArgs,
      socketDir: file.display.socketDir,
    },
    browser: {
      path: browserPath,
      required: cli.allowMissingBrowser === true ? false : file.browser.required,
      probe: cli.probeBrowser === true || file.browser.probe,
      probeTimeoutMs: Math.round(file.browser.probeTimeout * 1000),
      versionVariable: file.browser.versionVariable,
    },
    app: {
      command,
      cwd: file.app.cwd,
      env: file.app.env,
      gracePeriodMs: Math.round(gracePeriod * 1000),
      unbuffered: file.app.unbuffered,
    },
    identity: user !== undefined ? { user, group } : undefined,
  };
}
