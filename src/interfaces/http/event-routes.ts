import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, ingestEvent } from '../../application/index.js';

/**
 * POST /api/v1/events: validates and stores an event, then announces it
 * to stream observers. Scoring happens later in the background worker.
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { engine } = fastify;
      const event = await ingestEvent(
        { db: engine.db, broadcaster: engine.broadcaster, clock: engine.clock },
        parsed.data,
      );

      fastify.log.debug({ event_id: event.id, action: event.action }, 'Event stored');

      return reply.status(201).send({
        status: 'ok',
        event_id: event.id,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
