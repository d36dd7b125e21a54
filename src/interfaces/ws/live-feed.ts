import fp from 'fastify-plugin';
import websocket from '@fastify/websocket';
import { WebSocket } from 'ws';
import type { FastifyInstance } from 'fastify';
import { startReadingSubscriber } from '../../infrastructure/redis/index.js';
import type { ReadingNotification } from '../../infrastructure/redis/index.js';

export interface LiveFeedOptions {
  redisUrl: string;
  /** Replaced in tests to avoid a Redis connection. */
  startSubscriber?: typeof startReadingSubscriber;
}

/**
 * Live feed of committed readings on `/ws`.
 *
 * Each `readings_committed` notification is forwarded to every open
 * socket as `{ "type": "reading", "data": <notification> }`. The Redis subscriber
 * starts once the server is ready and stops on close.
 */
async function liveFeed(fastify: FastifyInstance, options: LiveFeedOptions): Promise<void> {
  await fastify.register(websocket);

  const startSubscriber = options.startSubscriber ?? startReadingSubscriber;
  let stopSubscriber: (() => Promise<void>) | null = null;

  const broadcast = (payload: ReadingNotification): void => {
    const frame = JSON.stringify({ type: 'reading', data: payload });
    let delivered = 0;
    for (const client of fastify.websocketServer.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(frame);
        delivered++;
      }
    }
    fastify.log.debug({ idempotency_key: payload.idempotency_key, delivered }, 'Reading broadcast');
  };

  fastify.get('/ws', { websocket: true }, (socket, request) => {
    fastify.log.info({ ip: request.ip, clients: fastify.websocketServer.clients.size }, 'Live feed client connected');
    socket.send(JSON.stringify({ type: 'hello', channel: 'readings' }));
    socket.on('close', () => {
      fastify.log.info({ ip: request.ip }, 'Live feed client disconnected');
    });
  });

  fastify.addHook('onReady', async () => {
    stopSubscriber = await startSubscriber(options.redisUrl, fastify.log, broadcast);
  });

  fastify.addHook('onClose', async () => {
    if (stopSubscriber !== null) {
      await stopSubscriber();
    }
  });
}

export default fp(liveFeed, {
  name: 'live-feed',
  fastify: '5.x',
});
