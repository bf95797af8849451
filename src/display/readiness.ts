import { access, chmod, mkdir } from 'node:fs/promises';
import path from 'node:path';

import { DISPLAY_DEFAULTS } from '../config/defaults.js';
import { ProvisioningError } from '../core/errors.js';

/** Resolves true once the display accepts clients. Must not hang. */
export type ReadinessProbe = (displayNumber: number) => Promise<boolean>;

/**
 * Xvfb creates `/tmp/.X11-unix/X<n>` once it listens on display `:n`.
 */
export function x11SocketProbe(
  socketDir: string = DISPLAY_DEFAULTS.SOCKET_DIR,
): ReadinessProbe {
  return (displayNumber) =>
    access(path.join(socketDir, `X${String(displayNumber)}`)).then(
      () => true,
      () => false,
    );
}

/**
 * Xvfb creates the socket directory only when it runs as root, so it has
 * to exist (sticky, world-writable) before privileges are dropped.
 * An existing directory is left as it is.
 */
export async function ensureSocketDir(socketDir: string): Promise<void> {
  try {
    const created = await mkdir(socketDir, { recursive: true });
    if (created !== undefined) {
      await chmod(socketDir, 0o1777);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ProvisioningError(
      `Cannot prepare display socket directory ${socketDir}: ${message}`,
      { cause: err },
    );
  }
}

// ── Display identifiers ──────────────────────────────────────

export function formatDisplay(displayNumber: number): string {
  return `:${String(displayNumber)}`;
}

/**
 * Accepts ":99", "99" or ":99.0" and returns 99.
 * Returns null for anything else (remote displays included).
 */
export function parseDisplay(value: string): number | null {
  const match = /^:?(\d+)(?:\.\d+)?$/.exec(value.trim());
  if (!match?.[1]) return null;
  return Number(match[1]);
}
