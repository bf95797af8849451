import { appendFile } from 'node:fs/promises';

import type { Command } from 'commander';

import { DEFAULT_CONFIG_PATH, EXIT_CODES } from '../config/defaults.js';
import { loadConfigFile } from '../config/loader.js';
import { resolveSettings } from '../config/settings.js';
import type { BootstrapSettings, CliOverrides } from '../config/settings.js';
import { exitCodeFor } from '../core/errors.js';
import { runBootstrap } from '../core/pipeline.js';
import { formatDisplay } from '../display/readiness.js';
import { EnvironmentProvisioner } from '../environment/provisioner.js';
import { formatEnvironmentFile } from '../environment/runtimeEnv.js';
import { formatSummary, generateJSON, serializeJSON } from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Shared option handling ───────────────────────────────────

interface ConfigOpts {
  config?: string;
}

/**
 * The default config path may be absent; an explicit one must exist.
 */
async function loadSettings(
  opts: ConfigOpts,
  overrides: CliOverrides,
): Promise<BootstrapSettings> {
  const explicit = opts.config ?? process.env['BOOTSTRAP_CONFIG'];
  const file = await loadConfigFile(explicit ?? DEFAULT_CONFIG_PATH, {
    optional: explicit === undefined,
  });
  return resolveSettings(file, process.env, overrides);
}

function fail(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = exitCodeFor(err);
}

// ── Run command ──────────────────────────────────────────────

interface RunOpts extends ConfigOpts {
  display?: string;
  screen?: string;
  readyTimeout?: string;
  gracePeriod?: string;
  user?: string;
  group?: string;
  browserPath?: string;
  allowMissingBrowser?: true;
  probeBrowser?: true;
  json?: true;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Start the virtual display, then run the application on it')
    .argument('[command...]', 'Application command (put it after "--")')
    .option('--config <path>', `Path to config file (default: ${DEFAULT_CONFIG_PATH})`)
    .option('--display <id>', 'Display identifier, e.g. :99')
    .option('--screen <geometry>', 'Screen geometry WIDTHxHEIGHTxDEPTH, e.g. 1024x768x16')
    .option('--ready-timeout <seconds>', 'How long to wait for the display')
    .option('--grace-period <seconds>', 'Time between a forwarded signal and SIGKILL')
    .option('--user <name>', 'User to run as when started as root')
    .option('--group <name>', 'Group to run as (defaults to the user name)')
    .option('--browser-path <path>', 'Browser binary to detect')
    .option('--allow-missing-browser', 'Continue when no browser version is detected')
    .option('--probe-browser', 'Open the browser on the display before launching')
    .option('--json', 'Output the session report as JSON to stdout')
    .action(async (command: string[], opts: RunOpts) => {
      let settings: BootstrapSettings;
      try {
        settings = await loadSettings(opts, {
          display: opts.display,
          screen: opts.screen,
          readyTimeout: opts.readyTimeout,
          gracePeriod: opts.gracePeriod,
          user: opts.user,
          group: opts.group,
          browserPath: opts.browserPath,
          allowMissingBrowser: opts.allowMissingBrowser,
          probeBrowser: opts.probeBrowser,
          command,
        });
      } catch (err) {
        log.error(`Environment never came up: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = exitCodeFor(err);
        return;
      }

      const outcome = await runBootstrap(settings);
      const report = generateJSON(outcome, settings);

      if (opts.json) {
        process.stdout.write(serializeJSON(report) + '\n');
      }
      process.stderr.write(formatSummary(report));
      process.exitCode = outcome.exitCode;
    });
}

// ── Env command ──────────────────────────────────────────────

interface EnvOpts extends ConfigOpts {
  display?: string;
  browserPath?: string;
  allowMissingBrowser?: true;
  write?: string;
}

export function registerEnvCommand(program: Command): void {
  program
    .command('env')
    .description('Detect the browser and print the runtime environment as KEY=value lines')
    .option('--config <path>', `Path to config file (default: ${DEFAULT_CONFIG_PATH})`)
    .option('--display <id>', 'Display identifier, e.g. :99')
    .option('--browser-path <path>', 'Browser binary to detect')
    .option('--allow-missing-browser', 'Continue when no browser version is detected')
    .option('--write <path>', 'Append the lines to an environment file')
    .action(async (opts: EnvOpts) => {
      try {
        const settings = await loadSettings(opts, {
          display: opts.display,
          browserPath: opts.browserPath,
          allowMissingBrowser: opts.allowMissingBrowser,
        });
        const provisioner = new EnvironmentProvisioner({
          display: formatDisplay(settings.display.number),
          browserPath: settings.browser.path,
          browserRequired: settings.browser.required,
          versionVariable: settings.browser.versionVariable,
          unbuffered: settings.app.unbuffered,
        });
        const lines = formatEnvironmentFile(await provisioner.provision());

        if (opts.write !== undefined) {
          await appendFile(opts.write, lines, 'utf-8');
          log.info(`Appended runtime environment to ${opts.write}`);
        } else {
          process.stdout.write(lines);
        }
        process.exitCode = EXIT_CODES.OK;
      } catch (err) {
        fail(err);
      }
    });
}

// ── Detect-browser command ───────────────────────────────────

export function registerDetectBrowserCommand(program: Command): void {
  program
    .command('detect-browser')
    .description('Print the browser binary and its major version')
    .option('--browser-path <path>', 'Browser binary to detect')
    .action(async (opts: { browserPath?: string }) => {
      try {
        const provisioner = new EnvironmentProvisioner({
          display: formatDisplay(0),
          browserPath: opts.browserPath ?? process.env['CHROME_PATH'],
        });
        const info = await provisioner.detectBrowser();
        process.stdout.write(`${info.path}\t${info.majorVersion}\t${info.versionString}\n`);
      } catch (err) {
        fail(err);
      }
    });
}
