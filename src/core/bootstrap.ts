import { TIMEOUTS } from '../config/defaults.js';
import type { DisplayHandle, DisplaySupervisor } from '../display/supervisor.js';
import { childEnvironment } from '../environment/runtimeEnv.js';
import type { RuntimeEnvironment } from '../environment/runtimeEnv.js';
import { launchProcess } from '../process/launcher.js';
import type { ManagedProcess, ProcessLauncher } from '../process/launcher.js';
import type { SessionState, SessionTimeline } from '../schema/session.js';
import * as log from '../utils/logger.js';
import {
  ApplicationLaunchError,
  DisplayUnavailableError,
  SessionInterruptedError,
  exitCodeFor,
  signalExitCode,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ApplicationCommand {
  command: string;
  args: readonly string[];
  cwd?: string | undefined;
  env?: Readonly<Record<string, string>> | undefined;
}

export interface DisplaySettings {
  number: number;
  width: number;
  height: number;
  depth: number;
}

/** Where termination signals come from; `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(
    event: NodeJS.Signals,
    listener: (signal: NodeJS.Signals) => void,
  ): unknown;
}

export interface SessionBootstrapOptions {
  supervisor: DisplaySupervisor;
  display: DisplaySettings;
  app: ApplicationCommand;
  environment: RuntimeEnvironment;
  readyTimeoutMs?: number | undefined;
  gracePeriodMs?: number | undefined;
  /** Parent environment the application inherits. Defaults to process.env. */
  baseEnv?: Readonly<Record<string, string | undefined>> | undefined;
  launcher?: ProcessLauncher | undefined;
  signals?: SignalSource | undefined;
  /** Runs after the display is ready and before the application launches. */
  beforeLaunch?: ((handle: DisplayHandle) => Promise<void>) | undefined;
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

// ── Session ──────────────────────────────────────────────────

/**
 * display up → application launched → application exited → display down.
 *
 * The application is never launched before `waitReady` succeeds, and the
 * display is stopped on every exit path, after the application is gone.
 */
export class SessionBootstrap {
  private current: SessionState = { status: 'idle' };
  private readonly times: SessionTimeline = {};
  private readonly abort = new AbortController();
  private app: ManagedProcess | null = null;
  private interruptedBy: NodeJS.Signals | null = null;
  private graceTimer: NodeJS.Timeout | undefined;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.handleSignal(signal);
  };

  constructor(private readonly options: SessionBootstrapOptions) {}

  get state(): SessionState {
    return this.current;
  }

  get timeline(): Readonly<SessionTimeline> {
    return this.times;
  }

  async run(): Promise<number> {
    if (this.current.status !== 'idle') {
      throw new Error(`Session already ran (state: ${this.current.status})`);
    }

    const { supervisor, display } = this.options;
    const signals = this.options.signals ?? process;
    for (const name of FORWARDED_SIGNALS) signals.on(name, this.onSignal);

    let handle: DisplayHandle | undefined;
    try {
      // 1. Start the display server
      this.transition({ status: 'display_starting' });
      this.times.displayRequestedAt = Date.now();
      handle = await supervisor.start(display.number, display.width, display.height, display.depth);

      // 2. Wait until clients can connect
      await supervisor.waitReady(
        handle,
        this.options.readyTimeoutMs ?? TIMEOUTS.DISPLAY_READY,
        this.abort.signal,
      );
      this.times.displayReadyAt = Date.now();
      this.transition({ status: 'display_ready' });

      if (this.options.beforeLaunch) {
        await this.options.beforeLaunch(handle);
      }
      if (this.interruptedBy !== null) {
        throw new SessionInterruptedError(this.interruptedBy);
      }

      // 3–4. Launch the application and wait for it
      const exitCode = await this.launchApplication(handle);

      // 5. Surface its exit code verbatim
      this.terminate(exitCode);
      return exitCode;
    } catch (err) {
      const failure =
        this.interruptedBy !== null && this.app === null
          ? new SessionInterruptedError(this.interruptedBy)
          : err;
      this.terminate(exitCodeFor(failure));
      throw failure;
    } finally {
      clearTimeout(this.graceTimer);
      try {
        if (handle !== undefined) {
          await supervisor.stop(handle);
        }
      } finally {
        // Listeners stay attached until the display is down.
        for (const name of FORWARDED_SIGNALS) signals.removeListener(name, this.onSignal);
      }
    }
  }

  // ── Application ────────────────────────────────────────────

  private launchApplication(handle: DisplayHandle): Promise<number> {
    if (handle.state !== 'ready') {
      throw new DisplayUnavailableError(
        handle.display,
        'not_ready',
        `refusing to launch the application while the display is ${handle.state}`,
      );
    }

    const { app, environment } = this.options;
    const env = childEnvironment(
      this.options.baseEnv ?? process.env,
      environment,
      app.env ?? {},
      handle.display,
    );
    const launcher = this.options.launcher ?? launchProcess;

    log.app(`Launching ${[app.command, ...app.args].join(' ')} on ${handle.display}`);

    return new Promise<number>((resolve, reject) => {
      const child = launcher(app.command, app.args, { env, cwd: app.cwd });
      this.app = child;
      this.times.appLaunchedAt = Date.now();
      this.transition({ status: 'app_launched' });

      child.onExit((code, signal) => {
        this.times.appExitedAt = Date.now();
        const exitCode = code ?? (signal !== null ? signalExitCode(signal) : 1);
        log.app(`Application exited with code ${String(exitCode)}`);
        resolve(exitCode);
      });
      child.onError((err) => {
        if (child.pid === undefined) {
          reject(new ApplicationLaunchError(app.command, { cause: err }));
          return;
        }
        log.warn(`Application process error: ${err.message}`);
      });
    });
  }

  // ── Signals ────────────────────────────────────────────────

  private handleSignal(signal: NodeJS.Signals): void {
    const app = this.app;
    if (app === null) {
      log.warn(`Received ${signal} before the application started; aborting`);
      this.interruptedBy ??= signal;
      this.abort.abort();
      return;
    }
    if (app.exited) return;

    log.warn(`Forwarding ${signal} to the application`);
    app.kill(signal);

    if (this.graceTimer === undefined) {
      const graceMs = this.options.gracePeriodMs ?? TIMEOUTS.APP_GRACE_PERIOD;
      this.graceTimer = setTimeout(() => {
        if (!app.exited) {
          log.warn(`Application still running after ${String(graceMs)}ms; sending SIGKILL`);
          app.kill('SIGKILL');
        }
      }, graceMs);
    }
  }

  // ── State ──────────────────────────────────────────────────

  private transition(next: SessionState): void {
    log.transition(this.current.status, next.status);
    this.current = next;
  }

  private terminate(exitCode: number): void {
    if (this.current.status === 'terminated') return;
    this.times.terminatedAt = Date.now();
    this.transition({ status: 'terminated', exitCode });
  }
}
