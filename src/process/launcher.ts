import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';

// ── Public types ─────────────────────────────────────────────

export interface LaunchOptions {
  env: Readonly<Record<string, string>>;
  cwd?: string | undefined;
  /** Pipe stderr to `onStderr` listeners instead of inheriting it. */
  captureStderr?: boolean | undefined;
  /** Start in a new process group so terminal signals do not reach it. */
  detached?: boolean | undefined;
}

/**
 * The slice of a child process the supervisor and the session need.
 * Kept narrow so tests can drive it without real OS processes.
 */
export interface ManagedProcess {
  readonly pid: number | undefined;
  readonly exited: boolean;
  onSpawn(listener: () => void): void;
  onExit(
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): void;
  onError(listener: (err: Error) => void): void;
  onStderr(listener: (text: string) => void): void;
  kill(signal: NodeJS.Signals): boolean;
}

export type ProcessLauncher = (
  command: string,
  args: readonly string[],
  options: LaunchOptions,
) => ManagedProcess;

// ── Node implementation ──────────────────────────────────────

export const launchProcess: ProcessLauncher = (command, args, options) => {
  const child = spawn(command, [...args], {
    cwd: options.cwd,
    env: { ...options.env },
    detached: options.detached === true,
    stdio: options.captureStderr === true
      ? ['ignore', 'ignore', 'pipe']
      : 'inherit',
  });
  return wrapChild(child);
};

function wrapChild(child: ChildProcess): ManagedProcess {
  let exited = false;
  child.once('exit', () => {
    exited = true;
  });
  // Spawn failures emit 'error' without 'exit'.
  child.once('error', () => {
    if (child.pid === undefined) exited = true;
  });

  return {
    get pid() {
      return child.pid;
    },
    get exited() {
      return exited;
    },
    onSpawn(listener) {
      child.once('spawn', listener);
    },
    onExit(listener) {
      child.once('exit', listener);
    },
    onError(listener) {
      child.on('error', listener);
    },
    onStderr(listener) {
      child.stderr?.setEncoding('utf-8');
      child.stderr?.on('data', (chunk: string) => {
        listener(chunk);
      });
    },
    kill(signal) {
      return child.kill(signal);
    },
  };
}
