import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  forceRetry,
  listQueue,
  readDeliveryLog,
  removeQueued,
  sendTestAlert,
} from '../../application/index.js';
import { parseId, safeInt } from './query-string.js';

/**
 * Delivery management routes.
 *
 * GET    /api/v1/deliveries/queue            retry queue, dead letters included
 * POST   /api/v1/deliveries/queue/:id/retry  make an entry due now
 * DELETE /api/v1/deliveries/queue/:id        drop an entry
 * GET    /api/v1/deliveries/log              delivery audit log
 * POST   /api/v1/deliveries/test             send a test alert
 */
async function deliveryRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/deliveries/queue',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const entries = await listQueue(fastify.engine.db);
      return reply.status(200).send({ data: entries, count: entries.length });
    },
  );

  fastify.post(
    '/api/v1/deliveries/queue/:id/retry',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = parseId(request.params.id);
      if (id === null) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const entry = await forceRetry(fastify.engine.db, id);
      if (entry === null) {
        return reply.status(404).send({ error: 'Queue entry not found' });
      }

      fastify.log.info({ queue_id: id }, 'Queued delivery scheduled for immediate retry');
      return reply.status(200).send(entry);
    },
  );

  fastify.delete(
    '/api/v1/deliveries/queue/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = parseId(request.params.id);
      if (id === null) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const deleted = await removeQueued(fastify.engine.db, id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Queue entry not found' });
      }

      return reply.status(204).send();
    },
  );

  fastify.get(
    '/api/v1/deliveries/log',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const entries = await readDeliveryLog(fastify.engine.db, limit);
      return reply.status(200).send({ data: entries, count: entries.length });
    },
  );

  fastify.post(
    '/api/v1/deliveries/test',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { engine } = fastify;
      const outcome = await sendTestAlert(engine.delivery, engine.recipient);
      return reply.status(200).send(outcome);
    },
  );
}

export default fp(deliveryRoutes, {
  name: 'delivery-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
