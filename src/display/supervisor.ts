import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';

import { TIMEOUTS } from '../config/defaults.js';
import { DisplayUnavailableError } from '../core/errors.js';
import type { DisplayFailureReason } from '../core/errors.js';
import { launchProcess } from '../process/launcher.js';
import type { ManagedProcess, ProcessLauncher } from '../process/launcher.js';
import * as log from '../utils/logger.js';
import { formatDisplay, x11SocketProbe } from './readiness.js';
import type { ReadinessProbe } from './readiness.js';

// ── Public types ─────────────────────────────────────────────

export type DisplayState = 'starting' | 'ready' | 'failed' | 'stopped';

export interface ScreenGeometry {
  width: number;
  height: number;
  depth: number;
}

export interface DisplayHandle {
  readonly id: string;
  readonly display: string;
  readonly displayNumber: number;
  readonly geometry: Readonly<ScreenGeometry>;
  readonly state: DisplayState;
  readonly pid: number | undefined;
  readonly failureReason: string | undefined;
}

export interface DisplaySupervisor {
  start(
    displayNumber: number,
    width: number,
    height: number,
    depth: number,
  ): Promise<DisplayHandle>;
  waitReady(
    handle: DisplayHandle,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<void>;
  stop(handle: DisplayHandle): Promise<void>;
}

export interface SupervisorOptions {
  serverPath: string;
  serverArgs?: readonly string[] | undefined;
  env?: Readonly<Record<string, string>> | undefined;
  launcher?: ProcessLauncher | undefined;
  probe?: ReadinessProbe | undefined;
  pollIntervalMs?: number | undefined;
  stopTimeoutMs?: number | undefined;
}

// ── Internal state ───────────────────────────────────────────

interface MutableHandle {
  id: string;
  display: string;
  displayNumber: number;
  geometry: Readonly<ScreenGeometry>;
  state: DisplayState;
  pid: number | undefined;
  failureReason: string | undefined;
}

interface DisplayRecord {
  handle: MutableHandle;
  process: ManagedProcess;
  exit: Promise<void>;
  stopping: Promise<void> | null;
  alreadyActive: boolean;
  stderrTail: string[];
}

const ALLOWED_TRANSITIONS: Record<DisplayState, readonly DisplayState[]> = {
  starting: ['ready', 'failed', 'stopped'],
  ready: ['stopped'],
  failed: ['stopped'],
  stopped: [],
};

const STDERR_TAIL_LINES = 20;

// ── Supervisor ───────────────────────────────────────────────

/**
 * Owns Xvfb processes. Every handle it returns is mutated only here.
 */
export class VirtualDisplaySupervisor implements DisplaySupervisor {
  private readonly records = new Map<string, DisplayRecord>();
  private readonly launcher: ProcessLauncher;
  private readonly probe: ReadinessProbe;
  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;

  constructor(private readonly options: SupervisorOptions) {
    this.launcher = options.launcher ?? launchProcess;
    this.probe = options.probe ?? x11SocketProbe();
    this.pollIntervalMs = options.pollIntervalMs ?? TIMEOUTS.READY_POLL_INTERVAL;
    this.stopTimeoutMs = options.stopTimeoutMs ?? TIMEOUTS.DISPLAY_STOP;
  }

  async start(
    displayNumber: number,
    width: number,
    height: number,
    depth: number,
  ): Promise<DisplayHandle> {
    const display = formatDisplay(displayNumber);
    if (!Number.isInteger(displayNumber) || displayNumber < 0) {
      throw new DisplayUnavailableError(
        display,
        'invalid_geometry',
        `display number must be a non-negative integer, got ${String(displayNumber)}`,
      );
    }
    for (const [name, value] of [['width', width], ['height', height], ['depth', depth]] as const) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new DisplayUnavailableError(
          display,
          'invalid_geometry',
          `${name} must be a positive integer, got ${String(value)}`,
        );
      }
    }

    const screen = `${String(width)}x${String(height)}x${String(depth)}`;
    const args = [
      display,
      '-screen',
      '0',
      screen,
      '-nolisten',
      'tcp',
      '-ac',
      '+extension',
      'RANDR',
      ...(this.options.serverArgs ?? []),
    ];

    log.display(`Starting ${this.options.serverPath} on ${display} (${screen})`);

    const proc = this.launcher(this.options.serverPath, args, {
      env: this.options.env ?? {},
      captureStderr: true,
      // Own process group: a terminal Ctrl-C must reach the application only.
      detached: true,
    });

    const handle: MutableHandle = {
      id: randomUUID(),
      display,
      displayNumber,
      geometry: Object.freeze({ width, height, depth }),
      state: 'starting',
      pid: undefined,
      failureReason: undefined,
    };

    const record: DisplayRecord = {
      handle,
      process: proc,
      exit: new Promise<void>((resolve) => {
        proc.onExit(() => resolve());
      }),
      stopping: null,
      alreadyActive: false,
      stderrTail: [],
    };
    this.records.set(handle.id, record);

    proc.onStderr((text) => {
      for (const line of text.split('\n')) {
        if (line.trim().length === 0) continue;
        record.stderrTail.push(line);
        if (line.includes('Server is already active')) {
          record.alreadyActive = true;
        }
      }
      record.stderrTail.splice(0, Math.max(0, record.stderrTail.length - STDERR_TAIL_LINES));
    });

    proc.onExit((code, signal) => {
      if (handle.state === 'starting') {
        this.fail(record, `server exited (${describeExit(code, signal)}) before the display was ready`);
      } else if (handle.state === 'ready') {
        if (record.stopping === null) {
          log.warn(`Display ${display} server exited (${describeExit(code, signal)})`);
        }
        this.transition(handle, 'stopped');
      }
    });

    await new Promise<void>((resolve, reject) => {
      proc.onSpawn(() => {
        handle.pid = proc.pid;
        resolve();
      });
      proc.onError((err) => {
        if (handle.pid !== undefined) {
          log.warn(`Display ${display} server error: ${err.message}`);
          return;
        }
        this.fail(record, `failed to start ${this.options.serverPath}: ${err.message}`);
        reject(
          new DisplayUnavailableError(display, 'spawn_failed', handle.failureReason ?? err.message, {
            cause: err,
          }),
        );
      });
    });

    log.detail(`${this.options.serverPath} pid ${String(handle.pid)}`);
    return handle;
  }

  async waitReady(
    handle: DisplayHandle,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<void> {
    const record = this.lookup(handle);
    const target = record.handle;
    if (target.state === 'ready') return;

    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (target.state !== 'starting') {
        const reason = record.alreadyActive
          ? 'in_use'
          : record.process.exited ? 'exited' : 'not_ready';
        throw this.unavailable(record, reason);
      }
      if (signal?.aborted === true) {
        this.fail(record, 'wait for readiness aborted');
        throw this.unavailable(record, 'aborted');
      }

      const ready = await raceDeadline(
        this.probe(target.displayNumber),
        Math.max(deadline - Date.now(), 0),
        signal,
      );
      // The server may have died while the probe ran.
      if (ready && target.state === 'starting') {
        this.transition(target, 'ready');
        log.display(`Display ${target.display} ready`);
        return;
      }

      const remaining = deadline - Date.now();
      if (target.state === 'starting' && remaining <= 0) {
        this.fail(record, `not ready within ${String(timeoutMs)}ms`);
        throw this.unavailable(record, 'timeout');
      }
      if (target.state === 'starting') {
        await delay(Math.min(this.pollIntervalMs, Math.max(remaining, 0)));
      }
    }
  }

  stop(handle: DisplayHandle): Promise<void> {
    const record = this.lookup(handle);
    if (record.stopping) return record.stopping;
    record.stopping = this.terminate(record);
    return record.stopping;
  }

  // ── Internals ──────────────────────────────────────────────

  private async terminate(record: DisplayRecord): Promise<void> {
    const { handle, process: proc } = record;
    if (handle.state === 'stopped') return;

    if (!proc.exited) {
      log.display(`Stopping display ${handle.display}`);
      proc.kill('SIGTERM');

      let timer: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        record.exit.then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
        }),
      ]);
      clearTimeout(timer);

      if (timedOut && !proc.exited) {
        log.warn(`Display ${handle.display} ignored SIGTERM, sending SIGKILL`);
        proc.kill('SIGKILL');
        await record.exit;
      }
    }

    if (handle.state !== 'stopped') {
      this.transition(handle, 'stopped');
    }
  }

  private lookup(handle: DisplayHandle): DisplayRecord {
    const record = this.records.get(handle.id);
    if (!record) {
      throw new Error(`Unknown display handle ${handle.id}`);
    }
    return record;
  }

  private transition(handle: MutableHandle, next: DisplayState): void {
    if (!ALLOWED_TRANSITIONS[handle.state].includes(next)) {
      throw new Error(
        `Illegal display transition ${handle.state} → ${next} for ${handle.display}`,
      );
    }
    handle.state = next;
  }

  private fail(record: DisplayRecord, reason: string): void {
    if (record.handle.state !== 'starting') return;
    record.handle.failureReason = reason;
    this.transition(record.handle, 'failed');
  }

  private unavailable(
    record: DisplayRecord,
    reason: DisplayFailureReason,
  ): DisplayUnavailableError {
    const { handle, stderrTail } = record;
    const message =
      reason === 'in_use'
        ? `display ${handle.display} is already in use`
        : handle.failureReason ?? `display is ${handle.state}`;
    const tail = stderrTail.length > 0 ? ` (last output: ${stderrTail.join(' | ')})` : '';
    return new DisplayUnavailableError(handle.display, reason, message + tail);
  }
}

/**
 * Resolves false once `ms` elapse or `signal` aborts, whichever comes
 * before the probe settles.
 */
function raceDeadline(
  probe: Promise<boolean>,
  ms: number,
  signal: AbortSignal | undefined,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
    onAbort = () => resolve(false);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
  return Promise.race([probe, expired]).finally(() => {
    clearTimeout(timer);
    if (onAbort) signal?.removeEventListener('abort', onAbort);
  });
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return signal !== null ? `signal ${signal}` : `code ${String(code)}`;
}
