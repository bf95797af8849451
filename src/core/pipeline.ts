import { probeBrowser } from '../browser/probe.js';
import type { BrowserProbe } from '../browser/probe.js';
import type { BootstrapSettings } from '../config/settings.js';
import { ensureSocketDir, formatDisplay, x11SocketProbe } from '../display/readiness.js';
import { VirtualDisplaySupervisor } from '../display/supervisor.js';
import type { DisplaySupervisor } from '../display/supervisor.js';
import { EnvironmentProvisioner } from '../environment/provisioner.js';
import { publishEnvironment } from '../environment/runtimeEnv.js';
import type { RuntimeEnvironment } from '../environment/runtimeEnv.js';
import { PrivilegeBoundary } from '../privilege/boundary.js';
import type { ExecutionIdentity } from '../privilege/boundary.js';
import type { ProcessLauncher } from '../process/launcher.js';
import type {
  SessionOutcome,
  SessionState,
  SessionTimeline,
} from '../schema/session.js';
import * as log from '../utils/logger.js';
import { SessionBootstrap } from './bootstrap.js';
import type { SignalSource } from './bootstrap.js';
import {
  ApplicationLaunchError,
  BootstrapError,
  ConfigError,
  DisplayUnavailableError,
  PermissionError,
  ProvisioningError,
  SessionInterruptedError,
  exitCodeFor,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface PipelineDeps {
  provisioner?: EnvironmentProvisioner | undefined;
  boundary?: PrivilegeBoundary | undefined;
  supervisor?: DisplaySupervisor | undefined;
  launcher?: ProcessLauncher | undefined;
  signals?: SignalSource | undefined;
  probe?: BrowserProbe | undefined;
  prepareSocketDir?: ((socketDir: string) => Promise<void>) | undefined;
  baseEnv?: Readonly<Record<string, string | undefined>> | undefined;
}

export interface BootstrapOutcome {
  outcome: SessionOutcome;
  exitCode: number;
  state: SessionState | null;
  timeline: SessionTimeline;
  environment: RuntimeEnvironment | null;
  identity: ExecutionIdentity | null;
  error: Error | null;
  startedAt: number;
  finishedAt: number;
}

// ── Pipeline ─────────────────────────────────────────────────

/**
 * provision → socket directory → drop privileges → session.
 * Never throws: every failure becomes an outcome with its exit code.
 */
export async function runBootstrap(
  settings: BootstrapSettings,
  deps: PipelineDeps = {},
): Promise<BootstrapOutcome> {
  const startedAt = Date.now();
  const baseEnv = deps.baseEnv ?? process.env;
  const display = formatDisplay(settings.display.number);

  let environment: RuntimeEnvironment | null = null;
  let identity: ExecutionIdentity | null = null;
  let session: SessionBootstrap | null = null;

  const finish = (exitCode: number, error: Error | null): BootstrapOutcome => ({
    outcome: error === null ? 'app_exited' : outcomeFor(error),
    exitCode,
    state: session?.state ?? null,
    timeline: { ...(session?.timeline ?? {}) },
    environment,
    identity,
    error,
    startedAt,
    finishedAt: Date.now(),
  });

  try {
    const [command, ...args] = settings.app.command;
    if (command === undefined) {
      throw new ConfigError('No application command given (pass it after "--" or set app.command)');
    }

    // 1. Environment
    log.section('Environment');
    const provisioner =
      deps.provisioner ??
      new EnvironmentProvisioner({
        display,
        browserPath: settings.browser.path,
        browserRequired: settings.browser.required,
        versionVariable: settings.browser.versionVariable,
        unbuffered: settings.app.unbuffered,
      });
    const provisioned = await provisioner.provision();

    // 2. Privilege boundary (the socket directory needs root)
    await (deps.prepareSocketDir ?? ensureSocketDir)(settings.display.socketDir);
    const boundary = deps.boundary ?? new PrivilegeBoundary({ inheritedEnv: baseEnv });
    identity = boundary.dropPrivileges(settings.identity);
    environment = publishEnvironment(provisioned, boundary.environment());

    // 3. Session
    log.section('Session');
    const supervisor =
      deps.supervisor ??
      new VirtualDisplaySupervisor({
        serverPath: settings.display.serverPath,
        serverArgs: settings.display.serverArgs,
        probe: x11SocketProbe(settings.display.socketDir),
        env: stringEntries(baseEnv),
      });

    const browserPath = provisioner.browser?.path;
    const probe = deps.probe ?? probeBrowser;
    const runtime = environment;

    session = new SessionBootstrap({
      supervisor,
      display: settings.display,
      readyTimeoutMs: settings.display.readyTimeoutMs,
      gracePeriodMs: settings.app.gracePeriodMs,
      environment: runtime,
      app: { command, args, cwd: settings.app.cwd, env: settings.app.env },
      baseEnv,
      launcher: deps.launcher,
      signals: deps.signals,
      beforeLaunch:
        settings.browser.probe && browserPath !== undefined
          ? async (handle) => {
              const version = await probe({
                executablePath: browserPath,
                display: handle.display,
                env: runtime,
                timeoutMs: settings.browser.probeTimeoutMs,
              });
              log.browser(`Browser ${version} reachable on ${handle.display}`);
            }
          : undefined,
    });

    if (settings.browser.probe && browserPath === undefined) {
      log.warn('Browser probe skipped: no browser binary was detected');
    }

    const exitCode = await session.run();
    return finish(exitCode, null);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    const exitCode = exitCodeFor(error);
    reportFailure(error, exitCode);
    return finish(exitCode, error);
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function outcomeFor(error: Error): SessionOutcome {
  if (error instanceof ProvisioningError) return 'provisioning_failed';
  if (error instanceof DisplayUnavailableError) return 'display_unavailable';
  if (error instanceof PermissionError) return 'permission_denied';
  if (error instanceof ConfigError) return 'config_error';
  if (error instanceof SessionInterruptedError) return 'interrupted';
  if (error instanceof ApplicationLaunchError) return 'app_not_launched';
  return 'internal_error';
}

function reportFailure(error: Error, exitCode: number): void {
  if (error instanceof BootstrapError && error.phase === 'environment') {
    log.error(`Environment never came up (exit ${String(exitCode)}): ${error.message}`);
    return;
  }
  log.error(`${error.message} (exit ${String(exitCode)})`);
}

function stringEntries(
  env: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && /^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      entries[name] = value;
    }
  }
  return entries;
}
