import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { SENSOR_VARIANTS } from '../../domain/index.js';
import type { CommitRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { readings } from './schema.js';

const CANONICAL_VARIANTS = sql`array[${sql.join(SENSOR_VARIANTS.map((v) => sql`${v}`), sql`, `)}]::text[]`;

/** Variants matching `predicate` (over `v`), in canonical order. */
function canonicalArray(predicate: SQL): SQL {
  return sql`array(select v from unnest(${CANONICAL_VARIANTS}) with ordinality as c(v, n) where ${predicate} order by n)`;
}

const mergedVariants = canonicalArray(
  sql`v = any(${readings.variants} || excluded.variants)`,
);

// Expected set comes from the incoming record (present + missing).
const mergedMissing = canonicalArray(
  sql`v = any(excluded.variants || excluded.missing_variants) and not (v = any(${readings.variants} || excluded.variants))`,
);

/**
 * Upserts a commit record keyed on `idempotency_key`.
 *
 * The update is monotone: variants already stored are kept and the
 * incoming ones replace theirs, so a redelivery that re-seals a reading
 * with fewer variants never degrades the row. Completeness is recomputed
 * from the union; a complete row keeps its seal reason. `committed_at`
 * keeps the first commit time.
 */
export async function upsertReading(db: Database, record: CommitRecord): Promise<void> {
  const values = {
    idempotency_key: record.idempotency_key,
    device_id: record.device_id,
    device_class: record.device_class,
    reading_epoch: new Date(record.reading_epoch),
    captured_at: new Date(record.captured_at),
    variants: record.variants,
    missing_variants: record.missing_variants,
    partial: record.partial,
    seal_reason: record.seal_reason,
    record_count: record.record_count,
    measurements: record.measurements,
  };

  await db
    .insert(readings)
    .values(values)
    .onConflictDoUpdate({
      target: readings.idempotency_key,
      set: {
        device_class: values.device_class,
        captured_at: sql`greatest(${readings.captured_at}, excluded.captured_at)`,
        variants: mergedVariants,
        missing_variants: mergedMissing,
        partial: sql`cardinality(${mergedMissing}) > 0`,
        seal_reason: sql`case when ${readings.partial} then excluded.seal_reason else ${readings.seal_reason} end`,
        record_count: sql`greatest(${readings.record_count}, excluded.record_count)`,
        measurements: sql`${readings.measurements} || excluded.measurements`,
        updated_at: sql`now()`,
      },
    });
}
