import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PermissionError } from '../../src/core/errors.js';
import {
  PrivilegeBoundary,
  describeIdentity,
} from '../../src/privilege/boundary.js';
import type { ExecutionIdentity, IdentitySwitcher } from '../../src/privilege/boundary.js';
import { setLogSink } from '../../src/utils/logger.js';

// ── Fixtures ─────────────────────────────────────────────────

class FakeSwitcher implements IdentitySwitcher {
  readonly assumed: ExecutionIdentity[] = [];

  constructor(
    private privileged: boolean,
    private readonly failWith: Error | null = null,
    private readonly sticky = false,
  ) {}

  isPrivileged(): boolean {
    return this.privileged;
  }

  current(): { uid: number; username: string } {
    return this.privileged ? { uid: 0, username: 'root' } : { uid: 1000, username: 'appuser' };
  }

  assume(identity: ExecutionIdentity): void {
    if (this.failWith) throw this.failWith;
    this.assumed.push(identity);
    if (!this.sticky) this.privileged = false;
  }
}

let logs: string[];
let restoreLog: () => void;

beforeEach(() => {
  logs = [];
  restoreLog = setLogSink((line) => logs.push(line));
});

afterEach(() => {
  restoreLog();
});

// ── Scenarios ────────────────────────────────────────────────

describe('PrivilegeBoundary.dropPrivileges', () => {
  it('switches from root to the execution identity', () => {
    const switcher = new FakeSwitcher(true);
    const boundary = new PrivilegeBoundary({ switcher, inheritedEnv: {} });

    const identity = boundary.dropPrivileges({ user: 'appuser', group: 'appgroup' });

    expect(identity).toEqual({ user: 'appuser', group: 'appgroup' });
    expect(switcher.assumed).toEqual([{ user: 'appuser', group: 'appgroup' }]);
    expect(boundary.identity).toEqual(identity);
    expect(boundary.environment()).toEqual({ BOOTSTRAP_PRIVILEGES_DROPPED: '1' });
    expect(logs).toEqual(['🔐 Running as appuser:appgroup']);
  });

  it('fails on a second drop in the same process', () => {
    const boundary = new PrivilegeBoundary({ switcher: new FakeSwitcher(true), inheritedEnv: {} });
    boundary.dropPrivileges({ user: 'appuser' });

    expect(() => boundary.dropPrivileges({ user: 'appuser' })).toThrow(
      'Privileges already dropped to appuser',
    );
  });

  it('fails when a parent already dropped privileges', () => {
    const switcher = new FakeSwitcher(false);
    const boundary = new PrivilegeBoundary({
      switcher,
      inheritedEnv: { BOOTSTRAP_PRIVILEGES_DROPPED: '1' },
    });

    expect(() => boundary.dropPrivileges()).toThrow(
      'Privileges were already dropped earlier in this process tree',
    );
    expect(switcher.assumed).toEqual([]);
  });

  it('refuses to stay root without a configured user', () => {
    const boundary = new PrivilegeBoundary({ switcher: new FakeSwitcher(true), inheritedEnv: {} });

    let err: unknown;
    try {
      boundary.dropPrivileges();
    } catch (e) {
      err = e;
    }

    expect(err).toBeInstanceOf(PermissionError);
    expect(err).toMatchObject({
      exitCode: 77,
      message: 'Refusing to run as root: no execution user configured',
    });
    expect(boundary.environment()).toEqual({});
  });

  it('reports an identity the OS will not grant', () => {
    const boundary = new PrivilegeBoundary({
      switcher: new FakeSwitcher(true, new Error('setuid user id does not exist')),
      inheritedEnv: {},
    });

    expect(() => boundary.dropPrivileges({ user: 'ghost' })).toThrow(
      'Cannot assume identity ghost: setuid user id does not exist',
    );
  });

  it('verifies the switch took effect', () => {
    const boundary = new PrivilegeBoundary({
      switcher: new FakeSwitcher(true, null, true),
      inheritedEnv: {},
    });

    expect(() => boundary.dropPrivileges({ user: 'appuser' })).toThrow(
      'Still privileged after switching to appuser',
    );
    expect(boundary.identity).toBeNull();
  });

  it('keeps the current identity when already unprivileged', () => {
    const switcher = new FakeSwitcher(false);
    const boundary = new PrivilegeBoundary({ switcher, inheritedEnv: {} });

    expect(boundary.dropPrivileges()).toEqual({ user: 'appuser' });
    expect(switcher.assumed).toEqual([]);
  });

  it('accepts a target matching the current unprivileged user', () => {
    const boundary = new PrivilegeBoundary({ switcher: new FakeSwitcher(false), inheritedEnv: {} });

    expect(boundary.dropPrivileges({ user: 1000 })).toEqual({ user: 1000 });
  });

  it('cannot switch to another user without privileges', () => {
    const boundary = new PrivilegeBoundary({ switcher: new FakeSwitcher(false), inheritedEnv: {} });

    expect(() => boundary.dropPrivileges({ user: 'other' })).toThrow(
      'Cannot assume identity other from unprivileged user appuser',
    );
  });
});

describe('describeIdentity', () => {
  it('joins user and group', () => {
    expect(describeIdentity({ user: 'appuser', group: 'staff' })).toBe('appuser:staff');
    expect(describeIdentity({ user: 1000 })).toBe('1000');
  });
});
