import { eq, and, gte, lte, desc, count, arrayContains, type SQL } from 'drizzle-orm';
import type { SensorVariant } from '../../domain/index.js';
import type { Database } from './client.js';
import { readings } from './schema.js';
import type { ReadingRow } from './schema.js';

export interface ReadingQueryFilters {
  device_id?: string;
  variant?: SensorVariant;
  partial?: boolean;
  from?: string;   // ISO-8601, inclusive, on reading_epoch
  to?: string;     // ISO-8601, inclusive, on reading_epoch
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

function buildWhere(filters: ReadingQueryFilters): SQL | undefined {
  const conditions: SQL[] = [];

  if (filters.device_id !== undefined) {
    conditions.push(eq(readings.device_id, filters.device_id));
  }
  if (filters.variant !== undefined) {
    conditions.push(arrayContains(readings.variants, [filters.variant]));
  }
  if (filters.partial !== undefined) {
    conditions.push(eq(readings.partial, filters.partial));
  }
  if (filters.from !== undefined) {
    conditions.push(gte(readings.reading_epoch, new Date(filters.from)));
  }
  if (filters.to !== undefined) {
    conditions.push(lte(readings.reading_epoch, new Date(filters.to)));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Fetches a filtered page of readings, newest reading epoch first.
 * Ties break on the idempotency key so pages are stable.
 */
export async function queryReadings(
  db: Database,
  filters: ReadingQueryFilters,
  pagination: PaginationParams,
): Promise<ReadingRow[]> {
  return db
    .select()
    .from(readings)
    .where(buildWhere(filters))
    .orderBy(desc(readings.reading_epoch), readings.idempotency_key)
    .limit(pagination.limit)
    .offset(pagination.offset);
}

/** Total rows matching the filters, ignoring pagination. */
export async function countReadings(db: Database, filters: ReadingQueryFilters): Promise<number> {
  const rows = await db
    .select({ total: count() })
    .from(readings)
    .where(buildWhere(filters));

  return Number(rows[0]?.total ?? 0);
}

/**
 * Fetches a single reading by idempotency key.
 * Returns undefined if not found.
 */
export async function findReadingByKey(
  db: Database,
  idempotencyKey: string,
): Promise<ReadingRow | undefined> {
  const rows = await db
    .select()
    .from(readings)
    .where(eq(readings.idempotency_key, idempotencyKey))
    .limit(1);

  return rows[0];
}
