import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  backoffDelay,
  classifyError,
  OperationTimeoutError,
  withTimeout,
} from '../../src/application/retry.js';
import { SinkWriteError } from '../../src/domain/index.js';

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([0, 1, 2, 3].map((a) => backoffDelay(a, 200, 5000))).toEqual([200, 400, 800, 1600]);
  });

  it('caps at the maximum delay', () => {
    expect(backoffDelay(5, 200, 5000)).toBe(5000);
  });
});

describe('classifyError', () => {
  it('keeps the kind a sink assigned', () => {
    expect(classifyError(new SinkWriteError('timeseries', 'permanent', 'bad row'))).toBe('permanent');
    expect(classifyError(new SinkWriteError('document', 'transient', 'busy'))).toBe('transient');
  });

  it('treats timeouts as transient', () => {
    expect(classifyError(new OperationTimeoutError(100))).toBe('transient');
  });

  it('treats socket and connection-class codes as transient', () => {
    expect(classifyError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe('transient');
    expect(classifyError(Object.assign(new Error('gone'), { code: '08006' }))).toBe('transient');
    expect(classifyError(Object.assign(new Error('shutdown'), { code: '57P01' }))).toBe('transient');
  });

  it('looks through the error cause', () => {
    const cause = Object.assign(new Error('timed out'), { code: 'ETIMEDOUT' });
    expect(classifyError(new Error('write failed', { cause }))).toBe('transient');
  });

  it('treats anything else as permanent', () => {
    expect(classifyError(Object.assign(new Error('dup'), { code: '23505' }))).toBe('permanent');
    expect(classifyError(new Error('boom'))).toBe('permanent');
    expect(classifyError('boom')).toBe('permanent');
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the task result', async () => {
    await expect(withTimeout(Promise.resolve(42), 100)).resolves.toBe(42);
  });

  it('rejects once the timer fires first', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 100);
    const assertion = expect(pending).rejects.toBeInstanceOf(OperationTimeoutError);

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
  });
});
