import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Pipeline } from '../../application/index.js';

export interface PipelinePluginOptions {
  pipeline: Pipeline;
}

/**
 * Fastify plugin that owns the pipeline lifecycle.
 *
 * Decorates `fastify.pipeline` for the route plugins, starts it on
 * registration and drains it on server shutdown.
 */
async function pipelinePlugin(fastify: FastifyInstance, opts: PipelinePluginOptions): Promise<void> {
  const { pipeline } = opts;

  fastify.decorate('pipeline', pipeline);
  pipeline.start();

  fastify.addHook('onClose', async () => {
    await pipeline.stop();
    fastify.log.info('Pipeline stopped');
  });
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: Pipeline;
  }
}
