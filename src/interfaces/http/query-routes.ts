import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getIntelSnapshot } from '../../application/index.js';
import { safeInt } from './query-string.js';

/**
 * Read-only query API routes.
 *
 * - GET /api/v1/intel: recent events, actions and active rules
 * - GET /api/v1/stream/stats: live stream observer counters
 * - GET /healthz
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/intel
   *
   * Query params: limit (clamped to [1, 500], default 100)
   */
  fastify.get(
    '/api/v1/intel',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const { engine } = fastify;
      const snapshot = await getIntelSnapshot(engine.db, engine.rules.get(), engine.clock, limit);
      return reply.status(200).send(snapshot);
    },
  );

  fastify.get(
    '/api/v1/stream/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.engine.broadcaster.stats());
    },
  );

  fastify.get(
    '/healthz',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'ok', ts: fastify.engine.clock() });
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
