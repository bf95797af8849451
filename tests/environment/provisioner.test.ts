import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ProvisioningError } from '../../src/core/errors.js';
import {
  EnvironmentProvisioner,
  parseMajorVersion,
} from '../../src/environment/provisioner.js';
import { setLogSink } from '../../src/utils/logger.js';

let logs: string[];
let restoreLog: () => void;

beforeEach(() => {
  logs = [];
  restoreLog = setLogSink((line) => logs.push(line));
});

afterEach(() => {
  restoreLog();
});

describe('parseMajorVersion', () => {
  it('takes the leading component of the version token', () => {
    expect(parseMajorVersion('Google Chrome 126.0.6478.126')).toBe('126');
    expect(parseMajorVersion('Chromium 125.0.6422.60 built on Debian 12')).toBe('125');
    expect(parseMajorVersion('Google Chrome 118.0.5993.70 \n')).toBe('118');
  });

  it('accepts a bare major version', () => {
    expect(parseMajorVersion('Google Chrome 126')).toBe('126');
  });

  it('returns null when there is no version', () => {
    expect(parseMajorVersion('Google Chrome')).toBeNull();
    expect(parseMajorVersion('')).toBeNull();
    expect(parseMajorVersion('Chrome v126')).toBeNull();
  });
});

describe('EnvironmentProvisioner', () => {
  it('publishes the display, browser version and unbuffered flags', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      unbuffered: ['PYTHONUNBUFFERED'],
      isExecutable: async () => true,
      queryVersion: async () => 'Google Chrome 126.0.6478.126',
    });

    const env = await provisioner.provision();

    expect(env).toEqual({
      DISPLAY: ':99',
      CHROME_VERSION: '126',
      PYTHONUNBUFFERED: '1',
    });
    expect(Object.isFrozen(env)).toBe(true);
    expect(provisioner.browser).toEqual({
      path: '/usr/bin/google-chrome',
      versionString: 'Google Chrome 126.0.6478.126',
      majorVersion: '126',
    });
  });

  it('is idempotent', async () => {
    const queryVersion = vi.fn(async () => 'Chromium 125.0.6422.60');
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/chromium',
      isExecutable: async () => true,
      queryVersion,
    });

    const first = await provisioner.provision();
    const second = await provisioner.provision();

    expect(second).toBe(first);
    expect(queryVersion).toHaveBeenCalledTimes(1);
  });

  it('uses a custom version variable', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':1',
      browserPath: '/opt/chrome/chrome',
      versionVariable: 'BROWSER_MAJOR',
      isExecutable: async () => true,
      queryVersion: async () => 'Google Chrome 120.0.6099.109',
    });

    await expect(provisioner.provision()).resolves.toEqual({
      DISPLAY: ':1',
      BROWSER_MAJOR: '120',
    });
  });

  it('picks the first executable candidate', async () => {
    const checked: string[] = [];
    const queryVersion = vi.fn(async () => 'Chromium 125.0.6422.60');
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      candidates: ['/usr/bin/google-chrome', '/usr/bin/chromium'],
      isExecutable: async (file) => {
        checked.push(file);
        return file === '/usr/bin/chromium';
      },
      queryVersion,
    });

    await provisioner.provision();

    expect(checked).toEqual(['/usr/bin/google-chrome', '/usr/bin/chromium']);
    expect(queryVersion).toHaveBeenCalledWith('/usr/bin/chromium');
  });

  it('fails when the browser binary is absent', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      isExecutable: async () => false,
    });

    const err: unknown = await provisioner.provision().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisioningError);
    expect(err).toMatchObject({
      exitCode: 78,
      message: 'Browser binary not found or not executable: /usr/bin/google-chrome',
    });
  });

  it('fails when no candidate exists', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      candidates: ['/usr/bin/google-chrome', '/usr/bin/chromium'],
      isExecutable: async () => false,
    });

    await expect(provisioner.provision()).rejects.toThrow(
      'No browser binary found (looked in /usr/bin/google-chrome, /usr/bin/chromium)',
    );
  });

  it('fails when the version string cannot be parsed', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      isExecutable: async () => true,
      queryVersion: async () => 'Google Chrome',
    });

    await expect(provisioner.provision()).rejects.toThrow(
      'Unrecognized browser version string from /usr/bin/google-chrome: "Google Chrome"',
    );
  });

  it('wraps version query failures', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      isExecutable: async () => true,
      queryVersion: async () => {
        throw new Error('Command failed: /usr/bin/google-chrome --version');
      },
    });

    const err: unknown = await provisioner.provision().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisioningError);
    expect(err).toMatchObject({
      message:
        'Could not query browser version from /usr/bin/google-chrome: Command failed: /usr/bin/google-chrome --version',
    });
  });

  it('remembers a failure instead of retrying', async () => {
    const queryVersion = vi.fn(async () => 'garbage');
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      isExecutable: async () => true,
      queryVersion,
    });

    await expect(provisioner.provision()).rejects.toBeInstanceOf(ProvisioningError);
    await expect(provisioner.provision()).rejects.toBeInstanceOf(ProvisioningError);
    expect(queryVersion).toHaveBeenCalledTimes(1);
  });

  it('continues without a version when the browser is optional', async () => {
    const provisioner = new EnvironmentProvisioner({
      display: ':99',
      browserPath: '/usr/bin/google-chrome',
      browserRequired: false,
      isExecutable: async () => false,
    });

    const env = await provisioner.provision();

    expect(env).toEqual({ DISPLAY: ':99' });
    expect(provisioner.browser).toBeNull();
    expect(logs).toEqual([
      '⚠️  Browser binary not found or not executable: /usr/bin/google-chrome; continuing without CHROME_VERSION',
    ]);
  });
});

describe('EnvironmentProvisioner with the real binary checks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'bootstrap-browser-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs the binary with --version', async () => {
    const binary = path.join(dir, 'chromium');
    await writeFile(binary, '#!/bin/sh\necho "Chromium 125.0.6422.60 $1"\n');
    await chmod(binary, 0o755);

    const info = await new EnvironmentProvisioner({ display: ':99', browserPath: binary }).detectBrowser();

    expect(info).toEqual({
      path: binary,
      versionString: 'Chromium 125.0.6422.60 --version',
      majorVersion: '125',
    });
  });

  it('skips a file that is not executable', async () => {
    const binary = path.join(dir, 'chromium');
    await writeFile(binary, '#!/bin/sh\n');
    await chmod(binary, 0o644);

    await expect(
      new EnvironmentProvisioner({ display: ':99', browserPath: binary }).detectBrowser(),
    ).rejects.toThrow(`Browser binary not found or not executable: ${binary}`);
  });
});
