import type { Logger } from 'pino';

type Task = () => Promise<void>;

/**
 * Runs commit tasks with bounded concurrency so slow sinks back-pressure
 * into a queue instead of an unbounded number of in-flight writes.
 */
export class CommitPool {
  private readonly queue: Task[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly log: Logger,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this.queue.length + this.running;
  }

  submit(task: Task): void {
    this.queue.push(task);
    this.pump();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Waits up to `graceMs` for outstanding tasks. Returns the number of
   * tasks still pending when the grace period ran out (0 when drained).
   */
  async drain(graceMs: number): Promise<number> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), graceMs);
    });
    try {
      const outcome = await Promise.race([this.onIdle().then(() => 'idle' as const), expired]);
      if (outcome === 'expired') {
        this.log.warn({ pending: this.pending, graceMs }, 'Commit pool drain timed out');
        return this.pending;
      }
      return 0;
    } finally {
      clearTimeout(timer);
    }
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const task = this.queue.shift();
      if (task === undefined) break;
      this.running++;
      void this.run(task);
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (err: unknown) {
      this.log.error({ err }, 'Commit task failed');
    } finally {
      this.running--;
      this.pump();
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
