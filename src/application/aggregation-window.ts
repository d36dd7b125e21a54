import { isDeepStrictEqual } from 'node:util';
import type { Logger } from 'pino';
import {
  AggregationError,
  bucketTimestamp,
  readingKey,
  SENSOR_VARIANTS,
} from '../domain/index.js';
import type {
  Measurements,
  SealReason,
  SealedEntry,
  SensorRecord,
  SensorVariant,
} from '../domain/index.js';
import type { DeviceClassTable } from './device-classes.js';

export interface OpenEntry {
  readonly key: string;
  readonly device_id: string;
  readonly device_class: string;
  readonly reading_epoch: number;
  readonly expected: readonly SensorVariant[];
  measurements: Measurements;
  captured_at: number;
  record_count: number;
  timer: NodeJS.Timeout | null;
}

interface RecentSeal {
  entry: SealedEntry;
  sealedAtMs: number;
}

/**
 * Mutable state of one aggregation window: open entries plus the keys
 * sealed recently enough that a redelivery should be recognized.
 *
 * Both maps rely on insertion order: the first key is always the
 * oldest open entry or the oldest seal.
 */
export class OpenEntryStore {
  readonly open = new Map<string, OpenEntry>();
  readonly recent = new Map<string, RecentSeal>();
}

/** Counters the window reports into; see PipelineMetrics. */
export interface AggregationMetrics {
  entrySealed(reason: SealReason, partial: boolean): void;
  duplicateDropped(): void;
  openEntries(count: number): void;
}

export interface AggregationWindowOptions {
  bucketMs: number;
  windowTimeoutMs: number;
  maxOpenEntries: number;
  sealedRetentionMs: number;
  deviceClasses: DeviceClassTable;
  /** Receives entries sealed by timeout or eviction. */
  onSeal: (entry: SealedEntry) => void;
  log: Logger;
  store?: OpenEntryStore;
  metrics?: AggregationMetrics;
  now?: () => number;
}

/**
 * Groups records by (device, reading epoch) until the reading is complete
 * or its window times out.
 *
 * `ingest` is synchronous, so calls for the same key are serialized by the
 * event loop and fields merge last-writer-wins. The caller commits the entry
 * `ingest` returns; entries sealed by a timer or by eviction go to `onSeal`.
 */
export class AggregationWindow {
  private readonly store: OpenEntryStore;
  private readonly now: () => number;

  constructor(private readonly options: AggregationWindowOptions) {
    this.store = options.store ?? new OpenEntryStore();
    this.now = options.now ?? Date.now;
  }

  get openCount(): number {
    return this.store.open.size;
  }

  ingest(record: SensorRecord): SealedEntry | null {
    const epoch = bucketTimestamp(record.timestamp, this.options.bucketMs);
    const key = readingKey(record.device_id, epoch);
    this.pruneRecent();

    let entry = this.store.open.get(key);
    if (entry === undefined) {
      const recent = this.store.recent.get(key);
      if (recent !== undefined && !changesMeasurements(recent.entry.measurements, record)) {
        this.options.metrics?.duplicateDropped();
        this.options.log.debug({ key, variant: record.variant }, 'Duplicate record for sealed reading dropped');
        return null;
      }

      if (this.store.open.size >= this.options.maxOpenEntries) {
        this.evictOldest();
      }
      entry = this.openEntry(key, record.device_id, epoch, recent?.entry);
      if (recent !== undefined) {
        this.store.recent.delete(key);
        this.options.log.debug({ key }, 'Late record reopened sealed reading');
      }
    }

    applyRecord(entry.measurements, record);
    entry.record_count += 1;
    entry.captured_at = Math.max(entry.captured_at, record.timestamp);

    if (missingVariants(entry).length === 0) {
      return this.seal(entry, 'complete');
    }
    return null;
  }

  /** Seals every open entry, oldest first. Timers are cleared. */
  flushAll(reason: SealReason = 'shutdown'): SealedEntry[] {
    return [...this.store.open.values()].map((entry) => this.seal(entry, reason));
  }

  private openEntry(key: string, deviceId: string, epoch: number, seed: SealedEntry | undefined): OpenEntry {
    const deviceClass = this.options.deviceClasses.resolve(deviceId);
    const entry: OpenEntry = {
      key,
      device_id: deviceId,
      device_class: deviceClass.name,
      reading_epoch: epoch,
      expected: deviceClass.expected,
      measurements: seed === undefined ? {} : structuredClone(seed.measurements),
      captured_at: seed?.captured_at ?? 0,
      record_count: seed?.record_count ?? 0,
      timer: null,
    };

    entry.timer = setTimeout(() => this.expire(key), this.options.windowTimeoutMs);
    entry.timer.unref();

    this.store.open.set(key, entry);
    this.options.metrics?.openEntries(this.store.open.size);
    return entry;
  }

  private expire(key: string): void {
    const entry = this.store.open.get(key);
    if (entry === undefined) return;
    this.emit(this.seal(entry, 'timeout'));
  }

  private evictOldest(): void {
    const oldest = this.store.open.values().next();
    if (oldest.done === true) return;

    const entry = oldest.value;
    const err = new AggregationError(entry.key, 'Open entry bound reached; oldest entry force-sealed');
    this.options.log.warn(
      { err, key: entry.key, maxOpenEntries: this.options.maxOpenEntries },
      'Aggregation window full, evicting oldest entry',
    );
    this.emit(this.seal(entry, 'evicted'));
  }

  private seal(entry: OpenEntry, reason: SealReason): SealedEntry {
    if (entry.timer !== null) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    this.store.open.delete(entry.key);

    const missing = missingVariants(entry);
    const sealed: SealedEntry = Object.freeze({
      key: entry.key,
      device_id: entry.device_id,
      device_class: entry.device_class,
      reading_epoch: entry.reading_epoch,
      captured_at: entry.captured_at,
      measurements: structuredClone(entry.measurements),
      variants: presentVariants(entry.measurements),
      expected_variants: [...entry.expected],
      complete: missing.length === 0,
      seal_reason: reason,
      record_count: entry.record_count,
    });

    this.store.recent.set(entry.key, { entry: sealed, sealedAtMs: this.now() });
    this.options.metrics?.entrySealed(reason, !sealed.complete);
    this.options.metrics?.openEntries(this.store.open.size);
    this.options.log.debug(
      { key: sealed.key, reason, complete: sealed.complete, variants: sealed.variants },
      'Aggregate entry sealed',
    );
    return sealed;
  }

  private emit(entry: SealedEntry): void {
    try {
      this.options.onSeal(entry);
    } catch (err: unknown) {
      this.options.log.error({ err, key: entry.key }, 'Seal handler failed');
    }
  }

  private pruneRecent(): void {
    const cutoff = this.now() - this.options.sealedRetentionMs;
    const cap = this.options.maxOpenEntries * 4;
    for (const [key, recent] of this.store.recent) {
      if (recent.sealedAtMs > cutoff && this.store.recent.size <= cap) break;
      this.store.recent.delete(key);
    }
  }
}

function presentVariants(measurements: Measurements): SensorVariant[] {
  return SENSOR_VARIANTS.filter((v) => measurements[v] !== undefined);
}

function missingVariants(entry: OpenEntry): SensorVariant[] {
  return entry.expected.filter((v) => entry.measurements[v] === undefined);
}

function merged<T extends object>(current: T | undefined, incoming: T): T {
  return current === undefined ? { ...incoming } : { ...current, ...incoming };
}

/** Merges a record's fields into its variant slot, last writer wins per field. */
function applyRecord(measurements: Measurements, record: SensorRecord): void {
  switch (record.variant) {
    case 'location':
      measurements.location = merged(measurements.location, record.fields);
      break;
    case 'thermal':
      measurements.thermal = merged(measurements.thermal, record.fields);
      break;
    case 'spectral':
      measurements.spectral = merged(measurements.spectral, record.fields);
      break;
    case 'environmental':
      measurements.environmental = merged(measurements.environmental, record.fields);
      break;
    case 'transform':
      measurements.transform = merged(measurements.transform, record.fields);
      break;
    case 'plant_metric':
      measurements.plant_metric = merged(measurements.plant_metric, record.fields);
      break;
    default: {
      const unreachable: never = record;
      throw new Error(`Unhandled record variant: ${JSON.stringify(unreachable)}`);
    }
  }
}

function changesMeasurements(current: Readonly<Measurements>, record: SensorRecord): boolean {
  const candidate: Measurements = structuredClone(current);
  applyRecord(candidate, record);
  return !isDeepStrictEqual(candidate, current);
}
