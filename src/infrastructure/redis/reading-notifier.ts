import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import { SENSOR_VARIANTS } from '../../domain/index.js';
import type { SealedEntry } from '../../domain/index.js';
import type { CommitResult } from '../../application/dual-sink-writer.js';

export const READINGS_CHANNEL = 'readings_committed';

export const readingNotificationSchema = z.object({
  idempotency_key: z.string().min(1),
  device_id: z.string().min(1),
  device_class: z.string(),
  reading_epoch: z.string().datetime({ offset: true }),
  variants: z.array(z.enum(SENSOR_VARIANTS)),
  partial: z.boolean(),
  seal_reason: z.enum(['complete', 'timeout', 'evicted', 'shutdown']),
  sinks: z.object({
    document: z.enum(['written', 'failed']),
    timeseries: z.enum(['written', 'failed']),
  }),
});

export type ReadingNotification = z.infer<typeof readingNotificationSchema>;

export function buildReadingNotification(entry: SealedEntry, result: CommitResult): ReadingNotification {
  return {
    idempotency_key: result.idempotency_key,
    device_id: entry.device_id,
    device_class: entry.device_class,
    reading_epoch: new Date(entry.reading_epoch).toISOString(),
    variants: [...entry.variants],
    partial: !entry.complete,
    seal_reason: entry.seal_reason,
    sinks: {
      document: result.document.status,
      timeseries: result.timeseries.status,
    },
  };
}

/**
 * Publishes a commit notification to the "readings_committed" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never fail the commit.
 */
export async function publishReadingCommitted(
  redis: Redis,
  log: Logger,
  payload: ReadingNotification,
): Promise<void> {
  try {
    await redis.publish(READINGS_CHANNEL, JSON.stringify(payload));
    log.debug(
      { channel: READINGS_CHANNEL, idempotency_key: payload.idempotency_key },
      'Published reading notification',
    );
  } catch (err: unknown) {
    log.warn({ err, idempotency_key: payload.idempotency_key }, 'Failed to publish reading notification');
  }
}
