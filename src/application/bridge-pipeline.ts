import type { Logger } from 'pino';
import type { DecodeErrorKind, SealedEntry } from '../domain/index.js';
import { AggregationWindow } from './aggregation-window.js';
import type { AggregationMetrics, AggregationWindowOptions } from './aggregation-window.js';
import type { CommitPool } from './commit-pool.js';
import type { CommitResult, DualSinkWriter } from './dual-sink-writer.js';
import type { TopicDecoder } from './topic-decoder.js';

export type MessageOutcome = 'rejected' | 'buffered' | 'sealed';

export interface PipelineObserver {
  messageHandled(outcome: MessageOutcome): void;
  decodeRejected(kind: DecodeErrorKind): void;
  commitSettled(ok: boolean, durationMs: number): void;
}

export type WindowSettings = Pick<
  AggregationWindowOptions,
  'bucketMs' | 'windowTimeoutMs' | 'maxOpenEntries' | 'sealedRetentionMs' | 'deviceClasses' | 'store' | 'now'
>;

export interface BridgePipelineDeps {
  decoder: TopicDecoder;
  writer: DualSinkWriter;
  pool: CommitPool;
  window: WindowSettings;
  log: Logger;
  metrics?: PipelineObserver & AggregationMetrics;
  /** Called after every commit attempt settles, whatever its outcome. */
  onCommitted?: (entry: SealedEntry, result: CommitResult) => Promise<void> | void;
}

export interface ShutdownReport {
  flushed: number;
  /** Commits still in flight when the grace period expired. */
  abandoned: number;
}

/**
 * decode → aggregate → commit.
 *
 * `handleMessage` runs synchronously inside the transport's delivery
 * callback: by the time it returns, the record is either rejected or
 * held by the aggregation window, so the transport may acknowledge the
 * message. Commits run on the pool and never block delivery.
 */
export class BridgePipeline {
  private readonly window: AggregationWindow;
  private closed = false;

  constructor(private readonly deps: BridgePipelineDeps) {
    this.window = new AggregationWindow({
      ...deps.window,
      log: deps.log.child({ component: 'aggregation' }),
      metrics: deps.metrics,
      onSeal: (entry) => this.enqueue(entry),
    });
  }

  get openEntries(): number {
    return this.window.openCount;
  }

  get pendingCommits(): number {
    return this.deps.pool.pending;
  }

  handleMessage(topic: string, payload: Buffer | Uint8Array | string): MessageOutcome {
    const { log, metrics } = this.deps;

    if (this.closed) {
      log.warn({ topic }, 'Message received after shutdown, dropped');
      metrics?.messageHandled('rejected');
      return 'rejected';
    }

    const decoded = this.deps.decoder.decode(topic, payload);
    if (!decoded.ok) {
      const { error } = decoded;
      log.warn({ topic, kind: error.kind, issues: error.issues }, error.message);
      metrics?.decodeRejected(error.kind);
      metrics?.messageHandled('rejected');
      return 'rejected';
    }

    const sealed = this.window.ingest(decoded.record);
    if (sealed === null) {
      metrics?.messageHandled('buffered');
      return 'buffered';
    }

    this.enqueue(sealed);
    metrics?.messageHandled('sealed');
    return 'sealed';
  }

  /**
   * Seals every open entry, commits them, and waits up to `graceMs` for
   * outstanding commits. New messages are rejected from here on.
   */
  async shutdown(graceMs: number): Promise<ShutdownReport> {
    this.closed = true;
    const flushed = this.window.flushAll('shutdown');
    for (const entry of flushed) this.enqueue(entry);

    this.deps.log.info({ flushed: flushed.length, pending: this.deps.pool.pending }, 'Draining commits');
    const abandoned = await this.deps.pool.drain(graceMs);
    return { flushed: flushed.length, abandoned };
  }

  private enqueue(entry: SealedEntry): void {
    this.deps.pool.submit(async () => {
      const started = Date.now();
      const result = await this.deps.writer.commit(entry);
      this.deps.metrics?.commitSettled(result.ok, Date.now() - started);

      if (this.deps.onCommitted !== undefined) {
        try {
          await this.deps.onCommitted(entry, result);
        } catch (err: unknown) {
          this.deps.log.warn({ err, key: entry.key }, 'Commit callback failed');
        }
      }
    });
  }
}
