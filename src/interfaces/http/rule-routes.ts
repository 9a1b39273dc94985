import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ruleConfigSchema } from '../../application/index.js';

/**
 * Rule config routes. PUT replaces the whole document and rejects
 * unknown keys.
 */
async function ruleRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/rules ────────────────────────────────────
  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.engine.rules.get());
    },
  );

  // ── PUT /api/v1/rules ────────────────────────────────────
  fastify.put(
    '/api/v1/rules',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = ruleConfigSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const rules = await fastify.engine.rules.save(parsed.data);
      fastify.log.info({ rules }, 'Rule config updated');

      return reply.status(200).send({ status: 'ok', rules });
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
