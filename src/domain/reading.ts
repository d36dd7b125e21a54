import type { Measurements, SensorVariant } from './record.js';

/** Why an aggregate entry stopped accepting records. */
export type SealReason = 'complete' | 'timeout' | 'evicted' | 'shutdown';

/**
 * A finished aggregate entry. Immutable once produced by the
 * aggregation window; the writer owns it from then on.
 */
export interface SealedEntry {
  readonly key: string;
  readonly device_id: string;
  readonly device_class: string;
  /** Bucket start, epoch milliseconds. */
  readonly reading_epoch: number;
  /** Latest record timestamp merged into the entry, epoch milliseconds. */
  readonly captured_at: number;
  readonly measurements: Readonly<Measurements>;
  readonly variants: readonly SensorVariant[];
  readonly expected_variants: readonly SensorVariant[];
  readonly complete: boolean;
  readonly seal_reason: SealReason;
  readonly record_count: number;
}

/**
 * Flattened form persisted to every sink.
 *
 * `idempotency_key` is derived from the device and reading epoch only,
 * so re-committing the same logical reading overwrites rather than
 * duplicates.
 */
export interface CommitRecord {
  readonly idempotency_key: string;
  readonly device_id: string;
  readonly device_class: string;
  readonly reading_epoch: string; // ISO-8601
  readonly captured_at: string; // ISO-8601
  readonly variants: SensorVariant[];
  readonly missing_variants: SensorVariant[];
  readonly partial: boolean;
  readonly seal_reason: SealReason;
  readonly record_count: number;
  readonly measurements: Measurements;
}

export function readingKey(deviceId: string, readingEpoch: number): string {
  return `${deviceId}:${readingEpoch}`;
}

export function bucketTimestamp(timestamp: number, bucketMs: number): number {
  return Math.floor(timestamp / bucketMs) * bucketMs;
}
