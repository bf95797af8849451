import { chromium } from 'playwright-core';

import { BROWSER_DEFAULTS } from '../config/defaults.js';
import { ProvisioningError } from '../core/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface BrowserProbeOptions {
  executablePath: string;
  display: string;
  env: Readonly<Record<string, string>>;
  timeoutMs: number;
}

export type BrowserProbe = (options: BrowserProbeOptions) => Promise<string>;

// ── Probe ────────────────────────────────────────────────────

/**
 * Launch the browser headful on the display, read its version, close it.
 * Proves the browser can attach to the display before the application
 * depends on it.
 */
export const probeBrowser: BrowserProbe = async (options) => {
  const browser = await chromium
    .launch({
      executablePath: options.executablePath,
      headless: false,
      timeout: options.timeoutMs,
      args: [...BROWSER_DEFAULTS.PROBE_ARGS],
      env: { ...options.env, DISPLAY: options.display },
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProvisioningError(
        `Browser ${options.executablePath} could not open on ${options.display}: ${message}`,
        { cause: err },
      );
    });

  try {
    return browser.version();
  } finally {
    await browser.close();
  }
};

// ── Bundled browser ──────────────────────────────────────────

/** Path of the Chromium build playwright-core manages, when resolvable. */
export function bundledChromiumPath(): string | undefined {
  try {
    const executablePath = chromium.executablePath();
    return executablePath.length > 0 ? executablePath : undefined;
  } catch {
    // Unsupported host platform: there is no bundled build to fall back to.
    return undefined;
  }
}
