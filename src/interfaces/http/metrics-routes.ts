import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getMetrics,
  resolveGroupBy,
  DEFAULT_WINDOW,
  MIN_WINDOW,
  MAX_WINDOW,
  VALID_GROUP_BY,
} from '../../application/metrics.js';

/**
 * Metrics API route.
 *
 * GET /api/v1/metrics: committed-reading counts and rates within a time window.
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/metrics',
    async (
      request: FastifyRequest<{
        Querystring: {
          window_seconds?: string;
          group_by?: string;
          device_id?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      // --- Validate window_seconds ---
      let windowParam: number | undefined;
      if (q.window_seconds !== undefined) {
        const n = Number(q.window_seconds);
        if (!Number.isFinite(n) || n !== Math.floor(n)) {
          return reply.status(400).send({ error: 'window_seconds must be an integer' });
        }
        if (n < MIN_WINDOW || n > MAX_WINDOW) {
          return reply
            .status(400)
            .send({ error: `window_seconds must be between ${MIN_WINDOW} and ${MAX_WINDOW}` });
        }
        windowParam = n;
      }

      // --- Validate group_by ---
      if (q.group_by !== undefined && resolveGroupBy(q.group_by) === null) {
        return reply
          .status(400)
          .send({ error: `group_by must be one of: ${VALID_GROUP_BY.join(', ')}` });
      }

      fastify.log.debug(
        { window_seconds: windowParam ?? DEFAULT_WINDOW, group_by: q.group_by ?? 'device_id' },
        'Metrics endpoint hit',
      );

      const result = await getMetrics(fastify.db, {
        window_seconds: windowParam,
        group_by: q.group_by,
        device_id: q.device_id,
      });

      return reply.status(200).send(result);
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
