import { constants } from 'node:os';

import { EXIT_CODES } from '../config/defaults.js';

// ── Base ──────────────────────────────────────────────────────

/**
 * Where a failure happened. `environment` failures mean the application
 * never started; `application` failures happened after hand-off.
 */
export type FailurePhase = 'environment' | 'application';

export class BootstrapError extends Error {
  readonly exitCode: number;
  readonly phase: FailurePhase;

  constructor(
    message: string,
    exitCode: number,
    phase: FailurePhase,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'BootstrapError';
    this.exitCode = exitCode;
    this.phase = phase;
  }
}

// ── Environment failures ──────────────────────────────────────

export class ProvisioningError extends BootstrapError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.PROVISIONING_FAILED, 'environment', options);
    this.name = 'ProvisioningError';
  }
}

export type DisplayFailureReason =
  | 'invalid_geometry'
  | 'spawn_failed'
  | 'exited'
  | 'in_use'
  | 'timeout'
  | 'aborted'
  | 'not_ready';

export class DisplayUnavailableError extends BootstrapError {
  readonly reason: DisplayFailureReason;
  readonly display: string;

  constructor(
    display: string,
    reason: DisplayFailureReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      `Display ${display} unavailable: ${message}`,
      EXIT_CODES.DISPLAY_UNAVAILABLE,
      'environment',
      options,
    );
    this.name = 'DisplayUnavailableError';
    this.reason = reason;
    this.display = display;
  }
}

export class PermissionError extends BootstrapError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.PERMISSION_DENIED, 'environment', options);
    this.name = 'PermissionError';
  }
}

export class ConfigError extends BootstrapError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.CONFIG_ERROR, 'environment', options);
    this.name = 'ConfigError';
  }
}

export class SessionInterruptedError extends BootstrapError {
  readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals) {
    super(
      `Interrupted by ${signal} before the application started`,
      signalExitCode(signal),
      'environment',
    );
    this.name = 'SessionInterruptedError';
    this.signal = signal;
  }
}

// ── Application failures ──────────────────────────────────────

export class ApplicationLaunchError extends BootstrapError {
  readonly command: string;

  constructor(command: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(
      `Failed to launch application "${command}"${reason}`,
      EXIT_CODES.APP_NOT_LAUNCHED,
      'application',
      options,
    );
    this.name = 'ApplicationLaunchError';
    this.command = command;
  }
}

// ── Exit code helpers ─────────────────────────────────────────

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(
  Object.entries(constants.signals),
);

/** Shell convention: a process killed by signal N exits with 128 + N. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/** Exit code for any thrown value; unknown errors map to 1. */
export function exitCodeFor(err: unknown): number {
  return err instanceof BootstrapError ? err.exitCode : 1;
}
