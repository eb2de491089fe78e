import Fastify from 'fastify';
import { pino } from 'pino';

import { Pipeline } from './application/index.js';
import {
  JetstreamAdapter,
  decodeJetstreamMessage,
  loadPipelineConfig,
} from './infrastructure/index.js';
import {
  pipelinePlugin,
  consumerRoutes,
  activityRoutes,
  pipelineRoutes,
} from './interfaces/http/index.js';
import { WebSocketServer } from './interfaces/ws/index.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + Jetstream adapter + pipeline
 * 2) Pipeline plugin (starts ingestion and the dispatch timer)
 * 3) HTTP routes
 * 4) Register shutdown hooks
 * 5) listen()
 * 6) WebSocket push, subscribed to dispatches
 */
async function main(): Promise<void> {

  const fastify = Fastify({
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  });

  // --------------------------------------------------
  // Pipeline
  // --------------------------------------------------

  const config = loadPipelineConfig();
  const jetstream = {
    ...config.jetstream,
    endpoint: process.env['JETSTREAM_URL'] ?? config.jetstream.endpoint,
  };

  fastify.log.info({ pipeline: config.pipeline, jetstream }, 'Pipeline config loaded');

  const pipeline = new Pipeline({
    adapter: new JetstreamAdapter(jetstream, { log: fastify.log.child({ component: 'jetstream' }) }),
    decode: (raw) => decodeJetstreamMessage(raw),
    log: fastify.log.child({ component: 'pipeline' }),
    settings: config.pipeline,
  });

  await fastify.register(pipelinePlugin, { pipeline });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(consumerRoutes);
  await fastify.register(activityRoutes);
  await fastify.register(pipelineRoutes);

  // --------------------------------------------------
  // Push channel placeholders
  // --------------------------------------------------

  let wsServer: WebSocketServer | null = null;
  let unsubscribe: null | (() => void) = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    if (unsubscribe) {
      unsubscribe();
    }
    if (wsServer) {
      wsServer.close();
    }
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });

  // --------------------------------------------------
  // WebSocket push (after listen)
  // --------------------------------------------------

  if (config.websocket.enabled) {
    const server = new WebSocketServer(
      fastify.log.child({ component: 'ws' }),
      () => pipeline.gate.signal(),
    );
    server.attach(fastify.server);
    unsubscribe = pipeline.onDispatch((report) => server.broadcast(report));
    wsServer = server;
  }

  // --------------------------------------------------
  // Signals
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {

  pino().fatal({ err }, 'Fatal: failed to start server');

  process.exit(1);

});
