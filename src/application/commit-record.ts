import type { CommitRecord, SealedEntry } from '../domain/index.js';

/**
 * Flattens a sealed entry into the shape every sink persists.
 * The idempotency key is the entry key, so a re-seal of the same
 * (device, reading epoch) upserts over the earlier commit.
 */
export function toCommitRecord(entry: SealedEntry): CommitRecord {
  const present = new Set(entry.variants);
  const missing = entry.expected_variants.filter((v) => !present.has(v));

  return {
    idempotency_key: entry.key,
    device_id: entry.device_id,
    device_class: entry.device_class,
    reading_epoch: new Date(entry.reading_epoch).toISOString(),
    captured_at: new Date(entry.captured_at).toISOString(),
    variants: [...entry.variants],
    missing_variants: missing,
    partial: missing.length > 0,
    seal_reason: entry.seal_reason,
    record_count: entry.record_count,
    measurements: structuredClone(entry.measurements),
  };
}
