import { mkdir } from 'node:fs/promises';
import { pino } from 'pino';
import { createEngine } from './application/index.js';
import {
  createDbClient,
  createNotifier,
  ensureSchema,
  loadEngineConfig,
  loadNotificationConfig,
} from './infrastructure/index.js';
import { StreamServer } from './interfaces/ws/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap the engine and its HTTP server.
 *
 * Order:
 * 1) Configuration (env + notification YAML)
 * 2) Storage (data dir, SQLite schema)
 * 3) Engine start (rule document, worker, retry scheduler)
 * 4) HTTP routes + listen()
 * 5) Stream endpoint (after listen)
 * 6) Shutdown hooks
 */
async function main(): Promise<void> {
  const config = loadEngineConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Storage
  // --------------------------------------------------

  await mkdir(config.dataDir, { recursive: true });
  const client = createDbClient(config.databasePath);
  ensureSchema(client);
  log.info({ path: config.databasePath }, 'Database ready');

  // --------------------------------------------------
  // Notifications
  // --------------------------------------------------

  const notifConfig = loadNotificationConfig(config.notificationsPath);
  log.info({ notifConfig }, 'Notification config loaded');

  const engine = createEngine({
    config,
    db: client.db,
    log,
    notifier: createNotifier(notifConfig, log),
    recipient: notifConfig.alerts.recipient,
  });

  await engine.start();

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = await buildServer(engine, { logLevel: config.logLevel });

  let streamServer: StreamServer | null = null;

  // onClose MUST be registered BEFORE listen()
  fastify.addHook('onClose', async () => {
    streamServer?.close();
  });

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  // --------------------------------------------------
  // Stream endpoint (after listen)
  // --------------------------------------------------

  if (notifConfig.stream.enabled) {
    streamServer = new StreamServer(engine.broadcaster, log.child({ component: 'stream' }));
    streamServer.attach(fastify.server);
  }

  // --------------------------------------------------
  // Graceful shutdown on SIGINT / SIGTERM
  // --------------------------------------------------

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');

    // The database outlives the server: the engine drains on close.
    fastify.close().then(
      () => {
        client.sqlite.close();
        log.info('Database closed');
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
