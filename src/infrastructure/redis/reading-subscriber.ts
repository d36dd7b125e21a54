import type { FastifyBaseLogger } from 'fastify';
import { createRedisClient } from './client.js';
import { READINGS_CHANNEL, readingNotificationSchema } from './reading-notifier.js';
import type { ReadingNotification } from './reading-notifier.js';

export type ReadingHandler = (payload: ReadingNotification) => void;

/**
 * Parses one Pub/Sub message. Returns null (and logs) for anything that
 * is not a well-formed reading notification.
 */
export function parseReadingNotification(
  message: string,
  log: FastifyBaseLogger,
): ReadingNotification | null {
  let json: unknown;
  try {
    json = JSON.parse(message);
  } catch (err: unknown) {
    log.warn({ err, message }, 'Failed to parse reading notification');
    return null;
  }

  const parsed = readingNotificationSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ message, issues: parsed.error.issues }, 'Malformed reading notification payload, skipping');
    return null;
  }
  return parsed.data;
}

/**
 * Subscribes to "readings_committed" in the query service and hands each
 * valid notification to `handler`. Malformed payloads are logged and
 * skipped.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startReadingSubscriber(
  redisUrl: string,
  log: FastifyBaseLogger,
  handler: ReadingHandler,
): Promise<() => Promise<void>> {
  const sub = createRedisClient(redisUrl);

  await sub.connect();
  log.info('Reading subscriber Redis connection established');

  sub.on('message', (channel: string, message: string) => {
    if (channel !== READINGS_CHANNEL) return;

    const payload = parseReadingNotification(message, log);
    if (payload === null) return;

    try {
      handler(payload);
    } catch (err: unknown) {
      log.error({ err, idempotency_key: payload.idempotency_key }, 'Reading notification handler failed');
    }
  });

  await sub.subscribe(READINGS_CHANNEL);
  log.info({ channel: READINGS_CHANNEL }, 'Subscribed to reading notifications');

  return async () => {
    try {
      await sub.unsubscribe(READINGS_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Reading subscriber shutdown failed');
    }
    log.info('Reading subscriber disconnected');
  };
}
