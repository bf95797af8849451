import { execFile } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { promisify } from 'node:util';

import { bundledChromiumPath } from '../browser/probe.js';
import { BROWSER_DEFAULTS, TIMEOUTS } from '../config/defaults.js';
import { ProvisioningError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { publishEnvironment } from './runtimeEnv.js';
import type { RuntimeEnvironment } from './runtimeEnv.js';

const execFileAsync = promisify(execFile);

// ── Public types ─────────────────────────────────────────────

export interface BrowserInfo {
  path: string;
  versionString: string;
  majorVersion: string;
}

export interface ProvisionerOptions {
  /** Display identifier published as DISPLAY, e.g. ":99". */
  display: string;
  browserPath?: string | undefined;
  /** When false, a missing browser is a warning, not an error. */
  browserRequired?: boolean | undefined;
  versionVariable?: string | undefined;
  unbuffered?: readonly string[] | undefined;
  candidates?: readonly string[] | undefined;
  isExecutable?: ((file: string) => Promise<boolean>) | undefined;
  queryVersion?: ((binary: string) => Promise<string>) | undefined;
}

// ── Version parsing ──────────────────────────────────────────

/**
 * Leading numeric component of the first dotted version token:
 * "Google Chrome 126.0.6478.126" → "126". Null when there is none.
 */
export function parseMajorVersion(versionString: string): string | null {
  const match = /(?:^|\s)(\d+)(?:\.\d+)*(?=\s|$)/.exec(versionString.trim());
  return match?.[1] ?? null;
}

// ── Defaults ─────────────────────────────────────────────────

async function isExecutableFile(file: string): Promise<boolean> {
  return access(file, constants.X_OK).then(
    () => true,
    () => false,
  );
}

async function queryBrowserVersion(binary: string): Promise<string> {
  const { stdout } = await execFileAsync(binary, ['--version'], {
    timeout: TIMEOUTS.BROWSER_VERSION_QUERY,
  });
  return stdout.trim();
}

// ── Provisioner ──────────────────────────────────────────────

/**
 * Detects the browser and publishes the runtime environment once.
 * Later calls return the same frozen mapping (or the same failure).
 */
export class EnvironmentProvisioner {
  private published: Promise<RuntimeEnvironment> | null = null;
  private detected: BrowserInfo | null = null;
  private readonly isExecutable: (file: string) => Promise<boolean>;
  private readonly queryVersion: (binary: string) => Promise<string>;

  constructor(private readonly options: ProvisionerOptions) {
    this.isExecutable = options.isExecutable ?? isExecutableFile;
    this.queryVersion = options.queryVersion ?? queryBrowserVersion;
  }

  /** Browser found by the last successful `provision()`. */
  get browser(): BrowserInfo | null {
    return this.detected;
  }

  provision(): Promise<RuntimeEnvironment> {
    this.published ??= this.build();
    return this.published;
  }

  async detectBrowser(): Promise<BrowserInfo> {
    const path = await this.resolveBinary();

    let versionString: string;
    try {
      versionString = await this.queryVersion(path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProvisioningError(
        `Could not query browser version from ${path}: ${message}`,
        { cause: err },
      );
    }

    const majorVersion = parseMajorVersion(versionString);
    if (majorVersion === null) {
      throw new ProvisioningError(
        `Unrecognized browser version string from ${path}: "${versionString}"`,
      );
    }

    return { path, versionString, majorVersion };
  }

  private async build(): Promise<RuntimeEnvironment> {
    const unbuffered: Record<string, string> = {};
    for (const name of this.options.unbuffered ?? []) {
      unbuffered[name] = '1';
    }

    const base = { ...unbuffered, DISPLAY: this.options.display };
    const variable = this.options.versionVariable ?? BROWSER_DEFAULTS.VERSION_VARIABLE;

    try {
      const info = await this.detectBrowser();
      this.detected = info;
      log.browser(`Browser ${info.versionString} (${info.path})`);
      return publishEnvironment(base, { [variable]: info.majorVersion });
    } catch (err) {
      if (!(err instanceof ProvisioningError) || this.options.browserRequired !== false) {
        throw err;
      }
      log.warn(`${err.message}; continuing without ${variable}`);
      return publishEnvironment(base);
    }
  }

  private async resolveBinary(): Promise<string> {
    const explicit = this.options.browserPath;
    if (explicit !== undefined) {
      if (await this.isExecutable(explicit)) return explicit;
      throw new ProvisioningError(`Browser binary not found or not executable: ${explicit}`);
    }

    const candidates = [...(this.options.candidates ?? BROWSER_DEFAULTS.CANDIDATES)];
    const bundled = this.options.candidates === undefined ? bundledChromiumPath() : undefined;
    if (bundled !== undefined) candidates.push(bundled);

    for (const candidate of candidates) {
      if (await this.isExecutable(candidate)) return candidate;
    }

    throw new ProvisioningError(
      `No browser binary found (looked in ${candidates.join(', ')})`,
    );
  }
}
