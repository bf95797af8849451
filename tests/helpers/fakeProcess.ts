import { EventEmitter } from 'node:events';

import type {
  LaunchOptions,
  ManagedProcess,
  ProcessLauncher,
} from '../../src/process/launcher.js';

type KillHandler = (signal: NodeJS.Signals, proc: FakeProcess) => void;

/** In-memory stand-in for a child process. */
export class FakeProcess implements ManagedProcess {
  pid: number | undefined = undefined;
  exited = false;
  readonly kills: NodeJS.Signals[] = [];
  private readonly events = new EventEmitter();

  constructor(private readonly onKill: KillHandler = () => {}) {}

  onSpawn(listener: () => void): void {
    this.events.once('spawn', listener);
  }

  onExit(
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): void {
    this.events.once('exit', listener);
  }

  onError(listener: (err: Error) => void): void {
    this.events.on('error', listener);
  }

  onStderr(listener: (text: string) => void): void {
    this.events.on('stderr', listener);
  }

  kill(signal: NodeJS.Signals): boolean {
    this.kills.push(signal);
    this.onKill(signal, this);
    return true;
  }

  // ── Test controls ──────────────────────────────────────────

  spawn(pid = 4242): void {
    this.pid = pid;
    this.events.emit('spawn');
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.events.emit('exit', code, signal);
  }

  fail(err: Error): void {
    if (this.pid === undefined) this.exited = true;
    this.events.emit('error', err);
  }

  stderr(text: string): void {
    this.events.emit('stderr', text);
  }
}

/** Exits with the delivered signal, like a well-behaved server. */
export const exitOnSignal: KillHandler = (signal, proc) => {
  queueMicrotask(() => proc.exit(null, signal));
};

export interface LaunchCall {
  command: string;
  args: readonly string[];
  options: LaunchOptions;
  proc: FakeProcess;
}

/**
 * Launcher that hands each call to `script` on the next microtask,
 * after the caller has attached its listeners.
 */
export function fakeLauncher(
  script: (proc: FakeProcess, call: LaunchCall) => void,
  onKill: KillHandler = exitOnSignal,
): { launcher: ProcessLauncher; calls: LaunchCall[] } {
  const calls: LaunchCall[] = [];
  const launcher: ProcessLauncher = (command, args, options) => {
    const proc = new FakeProcess(onKill);
    const call = { command, args, options, proc };
    calls.push(call);
    queueMicrotask(() => script(proc, call));
    return proc;
  };
  return { launcher, calls };
}

export function enoent(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}
