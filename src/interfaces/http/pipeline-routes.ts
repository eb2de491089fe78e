import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/pipeline/health — lifecycle state, backlog, gate and
 * ingestion counters. 503 once the pipeline is no longer running.
 */
async function pipelineRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/pipeline/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const health = fastify.pipeline.health();
      return reply.status(health.state === 'running' ? 200 : 503).send(health);
    },
  );
}

export default fp(pipelineRoutes, {
  name: 'pipeline-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
