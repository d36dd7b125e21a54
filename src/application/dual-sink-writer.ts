import type { Logger } from 'pino';
import type { CommitRecord, SealedEntry, SinkErrorKind, SinkName } from '../domain/index.js';
import { toCommitRecord } from './commit-record.js';
import { backoffDelay, classifyError, sleep, withTimeout } from './retry.js';
import type { RetryPolicy } from './retry.js';

/**
 * A durable destination for commit records.
 *
 * `write` must be an idempotent upsert keyed on `idempotency_key`, and
 * should throw `SinkWriteError` so the writer can tell transient
 * failures from permanent ones.
 */
export interface ReadingSink {
  readonly name: SinkName;
  write(record: CommitRecord): Promise<void>;
}

export type SinkOutcome =
  | { status: 'written'; attempts: number }
  | { status: 'failed'; attempts: number; error: { kind: SinkErrorKind; message: string } };

export interface CommitResult {
  idempotency_key: string;
  /** True only when both sinks hold the record. */
  ok: boolean;
  document: SinkOutcome;
  timeseries: SinkOutcome;
}

export interface WriterMetrics {
  sinkWrite(sink: SinkName, status: SinkOutcome['status']): void;
  sinkRetry(sink: SinkName): void;
}

export interface DualSinkWriterOptions extends RetryPolicy {
  writeTimeoutMs: number;
  log: Logger;
  metrics?: WriterMetrics;
  /** Injected by tests to skip real backoff waits. */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 5000,
};

/**
 * Commits a sealed entry to the document sink and the time-series sink.
 *
 * Both sinks are written concurrently and retried independently: a
 * permanent failure on one never prevents or rolls back the other. There
 * is no cross-sink transaction; idempotent upserts make a later re-commit
 * of the same key converge.
 */
export class DualSinkWriter {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly documentSink: ReadingSink,
    private readonly timeseriesSink: ReadingSink,
    private readonly options: DualSinkWriterOptions,
  ) {
    this.sleep = options.sleep ?? sleep;
  }

  async commit(entry: SealedEntry): Promise<CommitResult> {
    const record = toCommitRecord(entry);

    const [document, timeseries] = await Promise.all([
      this.writeWithRetry(this.documentSink, record),
      this.writeWithRetry(this.timeseriesSink, record),
    ]);

    const ok = document.status === 'written' && timeseries.status === 'written';
    if (!ok) {
      this.options.log.error(
        { idempotency_key: record.idempotency_key, document, timeseries },
        'Reading commit incomplete',
      );
    } else {
      this.options.log.debug(
        { idempotency_key: record.idempotency_key, partial: record.partial },
        'Reading committed',
      );
    }

    return { idempotency_key: record.idempotency_key, ok, document, timeseries };
  }

  private async writeWithRetry(sink: ReadingSink, record: CommitRecord): Promise<SinkOutcome> {
    const { maxAttempts, baseDelayMs, maxDelayMs, writeTimeoutMs, log, metrics } = this.options;

    for (let attempt = 1; ; attempt++) {
      try {
        await withTimeout(sink.write(record), writeTimeoutMs);
        metrics?.sinkWrite(sink.name, 'written');
        return { status: 'written', attempts: attempt };
      } catch (err: unknown) {
        const kind = classifyError(err);
        const message = err instanceof Error ? err.message : String(err);

        if (kind === 'permanent' || attempt >= maxAttempts) {
          log.error(
            { err, sink: sink.name, idempotency_key: record.idempotency_key, attempt, kind },
            'Sink write failed',
          );
          metrics?.sinkWrite(sink.name, 'failed');
          return { status: 'failed', attempts: attempt, error: { kind, message } };
        }

        const delay = backoffDelay(attempt - 1, baseDelayMs, maxDelayMs);
        log.warn(
          { err, sink: sink.name, idempotency_key: record.idempotency_key, attempt, delayMs: delay },
          'Transient sink failure, retrying',
        );
        metrics?.sinkRetry(sink.name);
        if (delay > 0) await this.sleep(delay);
      }
    }
  }
}
