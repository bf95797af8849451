import { describe, expect, it } from 'vitest';

import {
  childEnvironment,
  formatEnvironmentFile,
  publishEnvironment,
} from '../../src/environment/runtimeEnv.js';

describe('publishEnvironment', () => {
  it('merges layers left to right and freezes the result', () => {
    const env = publishEnvironment(
      { DISPLAY: ':99', PYTHONUNBUFFERED: '1' },
      { CHROME_VERSION: '126', DISPLAY: ':1' },
    );

    expect(env).toEqual({ DISPLAY: ':1', PYTHONUNBUFFERED: '1', CHROME_VERSION: '126' });
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('rejects names that are not valid variables', () => {
    expect(() => publishEnvironment({ 'CHROME-VERSION': '126' })).toThrow(
      'Invalid environment variable name "CHROME-VERSION"',
    );
  });
});

describe('childEnvironment', () => {
  it('layers parent, runtime and extra variables under the bound display', () => {
    const env = childEnvironment(
      { PATH: '/usr/bin', DISPLAY: ':0', UNSET: undefined },
      publishEnvironment({ DISPLAY: ':99', CHROME_VERSION: '126' }),
      { CHROME_VERSION: '125', DISPLAY: ':5' },
      ':42',
    );

    expect(env).toEqual({ PATH: '/usr/bin', DISPLAY: ':42', CHROME_VERSION: '125' });
  });
});

describe('formatEnvironmentFile', () => {
  it('writes sorted KEY=value lines', () => {
    const text = formatEnvironmentFile(
      publishEnvironment({ PYTHONUNBUFFERED: '1', DISPLAY: ':99', CHROME_VERSION: '126' }),
    );

    expect(text).toBe('CHROME_VERSION=126\nDISPLAY=:99\nPYTHONUNBUFFERED=1\n');
  });
});
