import { describe, it, expect } from 'vitest';
import { checkLaunchPrecondition } from '../../src/infrastructure/config/index.js';

describe('checkLaunchPrecondition', () => {
  it('fails when the launch token is missing', () => {
    const check = checkLaunchPrecondition({});

    expect(check).toEqual({
      ok: false,
      diagnostic:
        'BRIDGE_LAUNCH_TOKEN is not set. The bridge worker must be started by its orchestrator; '
        + 'refusing to open broker or database connections.',
    });
  });

  it('fails when the launch token is blank', () => {
    expect(checkLaunchPrecondition({ BRIDGE_LAUNCH_TOKEN: '   ' }).ok).toBe(false);
  });

  it('passes with any token when no expected token is configured', () => {
    expect(checkLaunchPrecondition({ BRIDGE_LAUNCH_TOKEN: 'test-secret' })).toEqual({ ok: true });
  });

  it('passes when the token matches the expected one', () => {
    const env = { BRIDGE_LAUNCH_TOKEN: 'test-secret', BRIDGE_EXPECTED_LAUNCH_TOKEN: 'test-secret' };
    expect(checkLaunchPrecondition(env)).toEqual({ ok: true });
  });

  it('fails on a mismatched token, including one of different length', () => {
    const mismatch = {
      ok: false,
      diagnostic: 'BRIDGE_LAUNCH_TOKEN does not match BRIDGE_EXPECTED_LAUNCH_TOKEN; refusing to start.',
    };
    expect(checkLaunchPrecondition({
      BRIDGE_LAUNCH_TOKEN: 'test-secret',
      BRIDGE_EXPECTED_LAUNCH_TOKEN: 'test-secreT',
    })).toEqual(mismatch);
    expect(checkLaunchPrecondition({
      BRIDGE_LAUNCH_TOKEN: 'test',
      BRIDGE_EXPECTED_LAUNCH_TOKEN: 'test-secret',
    })).toEqual(mismatch);
  });
});
