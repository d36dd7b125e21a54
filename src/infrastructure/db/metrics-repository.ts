import { and, gte, lte, eq, count, sql, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { readings } from './schema.js';

export type MetricsGroupBy = 'device_id' | 'device_class' | 'seal_reason';

export interface MetricsFilters {
  from: Date;
  to: Date;
  group_by: MetricsGroupBy;
  device_id?: string;
}

export interface MetricsBucket {
  key: string;
  count: number;
  partial: number;
}

/**
 * Counts readings committed within a time window, grouped by device,
 * device class or seal reason, with the partial readings among them. The window applies to `committed_at`
 * (`idx_readings_committed_at`); rate calculation is left to the
 * application layer.
 */
export async function queryMetrics(
  db: Database,
  filters: MetricsFilters,
): Promise<MetricsBucket[]> {
  const conditions: SQL[] = [
    gte(readings.committed_at, filters.from),
    lte(readings.committed_at, filters.to),
  ];

  if (filters.device_id !== undefined) {
    conditions.push(eq(readings.device_id, filters.device_id));
  }

  const groupCol = {
    device_id: readings.device_id,
    device_class: readings.device_class,
    seal_reason: readings.seal_reason,
  }[filters.group_by];

  const rows = await db
    .select({
      key: groupCol,
      count: count(),
      partial: sql<number>`count(*) filter (where ${readings.partial})`.mapWith(Number),
    })
    .from(readings)
    .where(and(...conditions))
    .groupBy(groupCol);

  return rows.map((r) => ({
    key: r.key,
    count: Number(r.count),
    partial: Number(r.partial),
  }));
}
