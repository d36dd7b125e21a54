import { describe, it, expect, vi, afterEach } from 'vitest';
import { CommitPool } from '../../src/application/commit-pool.js';
import { fakeLogger } from '../support/fakes.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('CommitPool', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('never runs more tasks than its concurrency', async () => {
    const pool = new CommitPool(2, fakeLogger());
    const gates = Array.from({ length: 5 }, () => deferred());
    let running = 0;
    let peak = 0;
    let finished = 0;

    for (const gate of gates) {
      pool.submit(async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
        finished++;
      });
    }

    expect(pool.pending).toBe(5);
    for (const gate of gates) gate.resolve();
    await pool.onIdle();

    expect(peak).toBe(2);
    expect(finished).toBe(5);
    expect(pool.pending).toBe(0);
  });

  it('logs a failing task and keeps going', async () => {
    const log = fakeLogger();
    const pool = new CommitPool(1, log);
    const err = new Error('sink exploded');
    let ranAfter = false;

    pool.submit(async () => {
      throw err;
    });
    pool.submit(async () => {
      ranAfter = true;
    });
    await pool.onIdle();

    expect(ranAfter).toBe(true);
    expect(log.error).toHaveBeenCalledWith({ err }, 'Commit task failed');
  });

  it('drains immediately when idle', async () => {
    const pool = new CommitPool(1, fakeLogger());

    await expect(pool.drain(1000)).resolves.toBe(0);
  });

  it('reports tasks still pending when the grace period runs out', async () => {
    vi.useFakeTimers();
    const pool = new CommitPool(1, fakeLogger());
    pool.submit(() => new Promise<void>(() => undefined));
    pool.submit(async () => undefined);

    const drained = pool.drain(500);
    await vi.advanceTimersByTimeAsync(500);

    await expect(drained).resolves.toBe(2);
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new CommitPool(0, fakeLogger())).toThrow(RangeError);
  });
});
