import fp from 'fastify-plugin';
import { sql } from 'drizzle-orm';
import type { FastifyInstance } from 'fastify';

/**
 * GET /api/v1/health: 200 when the database answers, 503 otherwise.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/api/v1/health', async (_request, reply) => {
    try {
      await fastify.db.execute(sql`select 1`);
      return reply.status(200).send({ status: 'ok', database: 'up' });
    } catch (err: unknown) {
      fastify.log.error({ err }, 'Health check failed');
      return reply.status(503).send({ status: 'unavailable', database: 'down' });
    }
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
