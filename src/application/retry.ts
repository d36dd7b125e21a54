import { SinkWriteError } from '../domain/index.js';
import type { SinkErrorKind } from '../domain/index.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Exponential backoff: base * 2^attempt, capped. `attempt` is zero-based. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** attempt);
}

export class OperationTimeoutError extends Error {
  override readonly name = 'OperationTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
  }
}

/**
 * Races `task` against a timer. The task itself is not cancelled; its
 * eventual result is ignored once the timer wins.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// Node socket errors and libpq-style SQLSTATE codes that indicate the
// server may accept the same write later.
const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  '57P01', // admin_shutdown
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}

/** Transient when the error (or its cause) carries a connection-level code. */
export function classifyError(err: unknown): SinkErrorKind {
  if (err instanceof SinkWriteError) return err.kind;
  if (err instanceof OperationTimeoutError) return 'transient';

  const code = errorCode(err);
  if (code !== undefined && (TRANSIENT_CODES.has(code) || code.startsWith('08'))) {
    return 'transient';
  }
  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    return classifyError(err.cause);
  }
  return 'permanent';
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
