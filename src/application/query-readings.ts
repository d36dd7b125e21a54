import type { Database, ReadingRow } from '../infrastructure/db/index.js';
import { queryReadings, countReadings, findReadingByKey } from '../infrastructure/db/index.js';
import type { ReadingQueryFilters } from '../infrastructure/db/index.js';
import type { Measurements, SealReason, SensorVariant } from '../domain/index.js';

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 500;

export interface ListReadingsParams {
  limit?: number;
  offset?: number;
  device_id?: string;
  variant?: SensorVariant;
  partial?: boolean;
  from?: string;
  to?: string;
}

/** Wire shape of a committed reading; timestamps are ISO-8601. */
export interface ReadingView {
  idempotency_key: string;
  device_id: string;
  device_class: string;
  reading_epoch: string;
  captured_at: string;
  variants: string[];
  missing_variants: string[];
  partial: boolean;
  seal_reason: SealReason | string;
  record_count: number;
  measurements: Measurements;
  committed_at: string;
  updated_at: string;
}

export interface ReadingPage {
  data: ReadingView[];
  pagination: { limit: number; offset: number; count: number; total: number };
}

export function toReadingView(row: ReadingRow): ReadingView {
  return {
    idempotency_key: row.idempotency_key,
    device_id: row.device_id,
    device_class: row.device_class,
    reading_epoch: row.reading_epoch.toISOString(),
    captured_at: row.captured_at.toISOString(),
    variants: row.variants,
    missing_variants: row.missing_variants,
    partial: row.partial,
    seal_reason: row.seal_reason,
    record_count: row.record_count,
    measurements: row.measurements,
    committed_at: row.committed_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

/**
 * Use case: list committed readings, newest reading epoch first.
 * Clamps limit to [1, 500], defaults to 10.
 */
export async function listReadings(db: Database, params: ListReadingsParams): Promise<ReadingPage> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: ReadingQueryFilters = {};
  if (params.device_id !== undefined) filters.device_id = params.device_id;
  if (params.variant !== undefined) filters.variant = params.variant;
  if (params.partial !== undefined) filters.partial = params.partial;
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  const [rows, total] = await Promise.all([
    queryReadings(db, filters, { limit, offset }),
    countReadings(db, filters),
  ]);

  return {
    data: rows.map(toReadingView),
    pagination: { limit, offset, count: rows.length, total },
  };
}

/**
 * Use case: fetch a single reading by idempotency key.
 * Returns null if not found.
 */
export async function getReading(db: Database, idempotencyKey: string): Promise<ReadingView | null> {
  const row = await findReadingByKey(db, idempotencyKey);
  return row === undefined ? null : toReadingView(row);
}
