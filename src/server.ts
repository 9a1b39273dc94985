import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Engine } from './application/index.js';
import type { LogLevel } from './infrastructure/index.js';
import {
  enginePlugin,
  eventRoutes,
  queryRoutes,
  ruleRoutes,
  deliveryRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  /** Fastify's own request logger; `false` silences it. */
  logLevel: LogLevel | false;
}

/**
 * Builds the HTTP server around an engine.
 *
 * Order:
 * 1) Engine decoration (closing the server stops the engine)
 * 2) HTTP routes
 */
export async function buildServer(engine: Engine, opts: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: opts.logLevel === false ? false : { level: opts.logLevel },
  });

  await fastify.register(enginePlugin, { engine });

  await fastify.register(eventRoutes);
  await fastify.register(queryRoutes);
  await fastify.register(ruleRoutes);
  await fastify.register(deliveryRoutes);

  return fastify;
}
