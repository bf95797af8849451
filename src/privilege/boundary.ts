import { userInfo } from 'node:os';

import { PRIVILEGES_DROPPED_VARIABLE } from '../config/defaults.js';
import { PermissionError } from '../core/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecutionIdentity {
  user: string | number;
  group?: string | number | undefined;
}

/** OS-level identity operations, swapped out in tests. */
export interface IdentitySwitcher {
  isPrivileged(): boolean;
  current(): { uid: number; username: string };
  assume(identity: ExecutionIdentity): void;
}

export interface PrivilegeBoundaryOptions {
  switcher?: IdentitySwitcher | undefined;
  /** Environment inherited from the parent, checked for an earlier drop. */
  inheritedEnv?: Readonly<Record<string, string | undefined>> | undefined;
}

// ── Node implementation ──────────────────────────────────────

export const processIdentitySwitcher: IdentitySwitcher = {
  isPrivileged() {
    return typeof process.getuid === 'function' && process.getuid() === 0;
  },

  current() {
    const info = userInfo();
    return { uid: info.uid, username: info.username };
  },

  assume(identity) {
    const { setuid, setgid, initgroups } = process;
    if (!setuid || !setgid || !initgroups) {
      throw new Error('identity switching is not supported on this platform');
    }
    const group = identity.group ?? identity.user;
    initgroups.call(process, identity.user, group);
    setgid.call(process, group);
    setuid.call(process, identity.user);
  },
};

export function describeIdentity(identity: ExecutionIdentity): string {
  return identity.group !== undefined
    ? `${String(identity.user)}:${String(identity.group)}`
    : String(identity.user);
}

// ── Boundary ─────────────────────────────────────────────────

/**
 * One-way switch from the privileged setup identity to the execution
 * identity. The guard flag makes the transition enforceable without
 * real OS privilege separation.
 */
export class PrivilegeBoundary {
  private dropped: ExecutionIdentity | null = null;
  private readonly switcher: IdentitySwitcher;
  private readonly inheritedEnv: Readonly<Record<string, string | undefined>>;

  constructor(options: PrivilegeBoundaryOptions = {}) {
    this.switcher = options.switcher ?? processIdentitySwitcher;
    this.inheritedEnv = options.inheritedEnv ?? process.env;
  }

  get identity(): ExecutionIdentity | null {
    return this.dropped;
  }

  dropPrivileges(target?: ExecutionIdentity): ExecutionIdentity {
    if (this.dropped !== null) {
      throw new PermissionError(
        `Privileges already dropped to ${describeIdentity(this.dropped)}`,
      );
    }
    if (this.inheritedEnv[PRIVILEGES_DROPPED_VARIABLE] === '1') {
      throw new PermissionError(
        'Privileges were already dropped earlier in this process tree',
      );
    }

    const identity = this.switcher.isPrivileged()
      ? this.assumeTarget(target)
      : this.keepCurrent(target);

    if (this.switcher.isPrivileged()) {
      throw new PermissionError(
        `Still privileged after switching to ${describeIdentity(identity)}`,
      );
    }

    this.dropped = identity;
    log.privilege(`Running as ${describeIdentity(identity)}`);
    return identity;
  }

  /** Variables children inherit so they can see the drop happened. */
  environment(): Record<string, string> {
    return this.dropped !== null ? { [PRIVILEGES_DROPPED_VARIABLE]: '1' } : {};
  }

  private assumeTarget(target: ExecutionIdentity | undefined): ExecutionIdentity {
    if (target === undefined) {
      throw new PermissionError(
        'Refusing to run as root: no execution user configured',
      );
    }
    try {
      this.switcher.assume(target);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PermissionError(
        `Cannot assume identity ${describeIdentity(target)}: ${message}`,
        { cause: err },
      );
    }
    return target;
  }

  private keepCurrent(target: ExecutionIdentity | undefined): ExecutionIdentity {
    const current = this.switcher.current();
    if (
      target !== undefined &&
      target.user !== current.uid &&
      target.user !== current.username
    ) {
      throw new PermissionError(
        `Cannot assume identity ${describeIdentity(target)} from unprivileged user ${current.username}`,
      );
    }
    return target ?? { user: current.username };
  }
}
