export { TopicDecoder, CHANNEL_VARIANTS } from './topic-decoder.js';
export type { DecodeResult, TopicDecoderOptions, Channel } from './topic-decoder.js';
export { normalizePayload } from './record-schema.js';
export { DeviceClassTable, DEFAULT_DEVICE_CLASS } from './device-classes.js';
export type { DeviceClass } from './device-classes.js';
export { AggregationWindow, OpenEntryStore } from './aggregation-window.js';
export type { AggregationWindowOptions, AggregationMetrics, OpenEntry } from './aggregation-window.js';
export { toCommitRecord } from './commit-record.js';
export { backoffDelay, classifyError, withTimeout, OperationTimeoutError } from './retry.js';
export type { RetryPolicy } from './retry.js';
export { DualSinkWriter, DEFAULT_RETRY_POLICY } from './dual-sink-writer.js';
export type { ReadingSink, SinkOutcome, CommitResult, WriterMetrics, DualSinkWriterOptions } from './dual-sink-writer.js';
export { CommitPool } from './commit-pool.js';
export { BridgePipeline } from './bridge-pipeline.js';
export type { BridgePipelineDeps, MessageOutcome, PipelineObserver, ShutdownReport } from './bridge-pipeline.js';
export { listReadings, getReading, toReadingView } from './query-readings.js';
export type { ListReadingsParams, ReadingView, ReadingPage } from './query-readings.js';
export { renderReadingsCsv } from './reading-csv.js';
export { getMetrics, resolveWindow, resolveGroupBy } from './metrics.js';
export type { GetMetricsParams, MetricsResult } from './metrics.js';
