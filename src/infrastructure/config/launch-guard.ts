import { timingSafeEqual } from 'node:crypto';

export type LaunchCheck =
  | { ok: true }
  | { ok: false; diagnostic: string };

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * The worker only runs when launched by its orchestrator, which passes
 * `BRIDGE_LAUNCH_TOKEN`. When `BRIDGE_EXPECTED_LAUNCH_TOKEN` is set the
 * two must match.
 *
 * Evaluated before any connection is opened.
 */
export function checkLaunchPrecondition(env: NodeJS.ProcessEnv = process.env): LaunchCheck {
  const token = env['BRIDGE_LAUNCH_TOKEN'];
  if (token === undefined || token.trim() === '') {
    return {
      ok: false,
      diagnostic:
        'BRIDGE_LAUNCH_TOKEN is not set. The bridge worker must be started by its orchestrator; '
        + 'refusing to open broker or database connections.',
    };
  }

  const expected = env['BRIDGE_EXPECTED_LAUNCH_TOKEN'];
  if (expected !== undefined && expected !== '' && !sameToken(token, expected)) {
    return {
      ok: false,
      diagnostic: 'BRIDGE_LAUNCH_TOKEN does not match BRIDGE_EXPECTED_LAUNCH_TOKEN; refusing to start.',
    };
  }

  return { ok: true };
}
