import type { Database, MetricsGroupBy } from '../infrastructure/db/index.js';
import { queryMetrics } from '../infrastructure/db/index.js';

export const DEFAULT_WINDOW = 60;
export const MIN_WINDOW = 10;
export const MAX_WINDOW = 3600;

export const VALID_GROUP_BY = ['device_id', 'device_class', 'seal_reason'] as const satisfies readonly MetricsGroupBy[];

export interface GetMetricsParams {
  window_seconds?: number;
  group_by?: string;
  device_id?: string;
}

export interface MetricsResult {
  window_seconds: number;
  group_by: MetricsGroupBy;
  from: string;
  to: string;
  metrics: Array<{
    key: string;
    count: number;
    partial: number;
    /** Share of partial readings in the bucket, 0..1. */
    partial_ratio: number;
    rate_per_sec: number;
  }>;
}

/**
 * Clamps and validates `window_seconds`.
 * Returns the clamped value or `null` if the input is invalid (not a finite integer).
 */
export function resolveWindow(raw: number | undefined): number | null {
  if (raw === undefined) return DEFAULT_WINDOW;
  if (!Number.isFinite(raw) || raw !== Math.floor(raw)) return null;
  return Math.min(Math.max(raw, MIN_WINDOW), MAX_WINDOW);
}

/**
 * Validates `group_by` against the allowed enum.
 * Returns the validated value or `null` if invalid.
 */
export function resolveGroupBy(raw: string | undefined): MetricsGroupBy | null {
  if (raw === undefined) return 'device_id';
  return VALID_GROUP_BY.find((g) => g === raw) ?? null;
}

/**
 * Use case: committed-reading counts grouped by device, device class or
 * seal reason within a sliding time window, with the partial share per
 * group. Rate is derived as count / window_seconds.
 */
export async function getMetrics(
  db: Database,
  params: GetMetricsParams,
  now: () => Date = () => new Date(),
): Promise<MetricsResult> {
  const window_seconds = resolveWindow(params.window_seconds) ?? DEFAULT_WINDOW;
  const group_by = resolveGroupBy(params.group_by) ?? 'device_id';

  const to = now();
  const from = new Date(to.getTime() - window_seconds * 1000);

  const buckets = await queryMetrics(db, {
    from,
    to,
    group_by,
    device_id: params.device_id,
  });

  return {
    window_seconds,
    group_by,
    from: from.toISOString(),
    to: to.toISOString(),
    metrics: buckets.map((b) => ({
      key: b.key,
      count: b.count,
      partial: b.partial,
      partial_ratio: b.count > 0 ? parseFloat((b.partial / b.count).toFixed(4)) : 0,
      rate_per_sec: parseFloat((b.count / window_seconds).toFixed(4)),
    })),
  };
}
