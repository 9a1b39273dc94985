import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Engine } from '../../application/index.js';

export interface EnginePluginOptions {
  engine: Engine;
}

/**
 * Fastify plugin that exposes the engine to route plugins.
 *
 * Decorates `fastify.engine`. Stops the engine (worker drain, retry
 * scheduler, stream observers) when the server closes. The engine is
 * started by the caller, so tests can drive it cycle by cycle.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  fastify.decorate('engine', opts.engine);

  fastify.addHook('onClose', async () => {
    await opts.engine.stop();
    fastify.log.info('Engine stopped');
  });
}

export default fp(enginePlugin, {
  name: 'engine',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.engine` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    engine: Engine;
  }
}
