import Fastify from 'fastify';
import type { Logger } from 'pino';
import type { Registry } from 'prom-client';
import type { SubscriptionState } from '../mqtt/subscription-manager.js';

export interface OpsStatus {
  subscription: SubscriptionState;
  openEntries: number;
  pendingCommits: number;
}

export interface OpsServerOptions {
  registry: Registry;
  status: () => OpsStatus;
  log: Logger;
}

/**
 * Worker operations endpoints.
 *
 * GET /health: 200 while subscribed, 503 otherwise
 * GET /metrics: Prometheus exposition of the pipeline registry
 */
export function buildOpsServer(options: OpsServerOptions) {
  const app = Fastify({ loggerInstance: options.log.child({ component: 'ops' }) });

  app.get('/health', async (_request, reply) => {
    const status = options.status();
    const healthy = status.subscription === 'subscribed';
    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'unavailable',
      subscription: status.subscription,
      open_entries: status.openEntries,
      pending_commits: status.pendingCommits,
    });
  });

  app.get('/metrics', async (_request, reply) => {
    const body = await options.registry.metrics();
    return reply.type(options.registry.contentType).send(body);
  });

  return app;
}
