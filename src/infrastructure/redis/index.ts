export { createRedisClient } from './client.js';
export { publishReadingCommitted, buildReadingNotification, readingNotificationSchema, READINGS_CHANNEL } from './reading-notifier.js';
export type { ReadingNotification } from './reading-notifier.js';
export { startReadingSubscriber, parseReadingNotification } from './reading-subscriber.js';
export type { ReadingHandler } from './reading-subscriber.js';
