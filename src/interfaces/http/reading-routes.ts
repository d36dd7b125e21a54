import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { isSensorVariant } from '../../domain/index.js';
import { listReadings, getReading } from '../../application/query-readings.js';
import { renderReadingsCsv } from '../../application/reading-csv.js';

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Returns true if `value` is a valid ISO-8601 date string.
 */
function isValidIso(value: string): boolean {
  const ms = Date.parse(value);
  return Number.isFinite(ms);
}

function parseBool(value: string | undefined): boolean | undefined | null {
  if (value === undefined) return undefined;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

function wantsCsv(format: string | undefined, accept: string | undefined): boolean {
  if (format !== undefined) return format === 'csv';
  return accept !== undefined && accept.includes('text/csv');
}

interface ReadingsQuerystring {
  limit?: string;
  offset?: string;
  device_id?: string;
  variant?: string;
  partial?: string;
  from?: string;
  to?: string;
  format?: string;
}

/**
 * Read-only query API over committed readings.
 *
 * GET /api/v1/readings: paginated list, JSON or CSV
 * GET /api/v1/readings/:idempotency_key: single reading
 */
async function readingRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/readings',
    async (
      request: FastifyRequest<{ Querystring: ReadingsQuerystring }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && (Number.isNaN(offset) || offset < 0)) {
        return reply.status(400).send({ error: 'offset must be a non-negative integer' });
      }

      if (q.variant !== undefined && !isSensorVariant(q.variant)) {
        return reply.status(400).send({ error: `unknown variant "${q.variant}"` });
      }

      const partial = parseBool(q.partial);
      if (partial === null) {
        return reply.status(400).send({ error: 'partial must be true or false' });
      }

      // from/to: parseable ISO-8601, and from <= to
      if (q.from !== undefined && !isValidIso(q.from)) {
        return reply.status(400).send({ error: 'from must be a valid ISO-8601 timestamp' });
      }
      if (q.to !== undefined && !isValidIso(q.to)) {
        return reply.status(400).send({ error: 'to must be a valid ISO-8601 timestamp' });
      }
      if (q.from !== undefined && q.to !== undefined && Date.parse(q.from) > Date.parse(q.to)) {
        return reply.status(400).send({ error: 'from must not be after to' });
      }

      if (q.format !== undefined && q.format !== 'json' && q.format !== 'csv') {
        return reply.status(400).send({ error: 'format must be one of: json, csv' });
      }

      const result = await listReadings(fastify.db, {
        limit,
        offset,
        device_id: q.device_id,
        variant: q.variant !== undefined && isSensorVariant(q.variant) ? q.variant : undefined,
        partial,
        from: q.from,
        to: q.to,
      });

      if (wantsCsv(q.format, request.headers.accept)) {
        return reply
          .status(200)
          .type('text/csv; charset=utf-8')
          .send(renderReadingsCsv(result.data));
      }

      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/readings/:idempotency_key',
    async (
      request: FastifyRequest<{ Params: { idempotency_key: string } }>,
      reply: FastifyReply,
    ) => {
      const reading = await getReading(fastify.db, request.params.idempotency_key);

      if (reading === null) {
        return reply.status(404).send({ error: 'Reading not found' });
      }

      return reply.status(200).send(reading);
    },
  );
}

export default fp(readingRoutes, {
  name: 'reading-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
