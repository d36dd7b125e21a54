import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { DecodeErrorKind, SealReason, SinkName } from '../../domain/index.js';
import type { AggregationMetrics } from '../../application/aggregation-window.js';
import type { SinkOutcome, WriterMetrics } from '../../application/dual-sink-writer.js';
import type { MessageOutcome, PipelineObserver } from '../../application/bridge-pipeline.js';
import type { SubscriptionState } from '../mqtt/subscription-manager.js';

const PREFIX = 'bridge_';
const SUBSCRIPTION_STATES: readonly SubscriptionState[] = ['disconnected', 'connecting', 'subscribed', 'stopped'];

export interface PipelineMetrics extends AggregationMetrics, WriterMetrics, PipelineObserver {
  readonly registry: Registry;
  reconnectAttempted(): void;
  subscriptionState(state: SubscriptionState): void;
}

export interface PipelineMetricsOptions {
  registry?: Registry;
  /** Process-level collectors (event loop lag, heap). Off in tests. */
  collectDefaults?: boolean;
}

export function createPipelineMetrics(options: PipelineMetricsOptions = {}): PipelineMetrics {
  const registry = options.registry ?? new Registry();
  const registers = [registry];

  if (options.collectDefaults === true) {
    collectDefaultMetrics({ register: registry, prefix: PREFIX });
  }

  const messages = new Counter({
    name: `${PREFIX}messages_total`,
    help: 'Inbound MQTT messages grouped by pipeline outcome',
    labelNames: ['outcome'],
    registers,
  });

  const decodeErrors = new Counter({
    name: `${PREFIX}decode_errors_total`,
    help: 'Rejected messages grouped by decode error kind',
    labelNames: ['kind'],
    registers,
  });

  const sealed = new Counter({
    name: `${PREFIX}entries_sealed_total`,
    help: 'Aggregate entries sealed grouped by reason and completeness',
    labelNames: ['reason', 'partial'],
    registers,
  });

  const duplicates = new Counter({
    name: `${PREFIX}duplicates_dropped_total`,
    help: 'Redelivered records that added nothing to a sealed reading',
    registers,
  });

  const openEntries = new Gauge({
    name: `${PREFIX}open_entries`,
    help: 'Aggregate entries currently open',
    registers,
  });

  const sinkWrites = new Counter({
    name: `${PREFIX}sink_writes_total`,
    help: 'Sink write outcomes grouped by sink and status',
    labelNames: ['sink', 'status'],
    registers,
  });

  const sinkRetries = new Counter({
    name: `${PREFIX}sink_retries_total`,
    help: 'Transient sink failures that were retried',
    labelNames: ['sink'],
    registers,
  });

  const commitDuration = new Histogram({
    name: `${PREFIX}commit_duration_seconds`,
    help: 'Time from seal to both sinks settled',
    labelNames: ['ok'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers,
  });

  const reconnects = new Counter({
    name: `${PREFIX}mqtt_reconnects_total`,
    help: 'Broker reconnect attempts',
    registers,
  });

  const state = new Gauge({
    name: `${PREFIX}mqtt_subscription_state`,
    help: 'Current subscription state (1 for the active state)',
    labelNames: ['state'],
    registers,
  });

  return {
    registry,
    messageHandled(outcome: MessageOutcome) {
      messages.labels(outcome).inc();
    },
    decodeRejected(kind: DecodeErrorKind) {
      decodeErrors.labels(kind).inc();
    },
    commitSettled(ok: boolean, durationMs: number) {
      commitDuration.labels(String(ok)).observe(durationMs / 1000);
    },
    entrySealed(reason: SealReason, partial: boolean) {
      sealed.labels(reason, String(partial)).inc();
    },
    duplicateDropped() {
      duplicates.inc();
    },
    openEntries(count: number) {
      openEntries.set(count);
    },
    sinkWrite(sink: SinkName, status: SinkOutcome['status']) {
      sinkWrites.labels(sink, status).inc();
    },
    sinkRetry(sink: SinkName) {
      sinkRetries.labels(sink).inc();
    },
    reconnectAttempted() {
      reconnects.inc();
    },
    subscriptionState(current: SubscriptionState) {
      for (const s of SUBSCRIPTION_STATES) {
        state.labels(s).set(s === current ? 1 : 0);
      }
    },
  };
}
