import { describe, expect, it } from 'vitest';

import { launchProcess } from '../../src/process/launcher.js';
import type { ManagedProcess } from '../../src/process/launcher.js';

function exitOf(proc: ManagedProcess): Promise<[number | null, NodeJS.Signals | null]> {
  return new Promise((resolve) => {
    proc.onExit((code, signal) => resolve([code, signal]));
  });
}

describe('launchProcess', () => {
  it('reports the exit code of a real child', async () => {
    const proc = launchProcess(process.execPath, ['-e', 'process.exit(3)'], { env: {} });
    const spawned = new Promise<void>((resolve) => proc.onSpawn(resolve));
    const exited = exitOf(proc);

    await spawned;
    expect(proc.pid).toBeGreaterThan(0);
    await expect(exited).resolves.toEqual([3, null]);
    expect(proc.exited).toBe(true);
  });

  it('passes captured stderr to listeners', async () => {
    const proc = launchProcess(
      process.execPath,
      ['-e', "process.stderr.write('Server is already active')"],
      { env: {}, captureStderr: true },
    );
    let stderr = '';
    proc.onStderr((text) => {
      stderr += text;
    });

    await exitOf(proc);

    expect(stderr).toBe('Server is already active');
  });

  it('reports a kill signal on exit', async () => {
    const proc = launchProcess(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
      env: {},
      detached: true,
    });
    const exited = exitOf(proc);
    await new Promise<void>((resolve) => proc.onSpawn(resolve));

    proc.kill('SIGTERM');

    await expect(exited).resolves.toEqual([null, 'SIGTERM']);
  });

  it('marks a command that cannot be spawned as exited', async () => {
    const proc = launchProcess('/nonexistent/display-bootstrap-missing', [], { env: {} });

    const err = await new Promise<Error>((resolve) => proc.onError(resolve));

    expect(err.message).toContain('ENOENT');
    expect(proc.pid).toBeUndefined();
    expect(proc.exited).toBe(true);
  });
});
