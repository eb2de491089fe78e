import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * User-activity route.
 *
 * POST /api/v1/activity/scroll — the user is scrolling; hold dispatch for
 * the cooldown window. Repeated signals only ever extend the pause.
 */
async function activityRoutes(fastify: FastifyInstance): Promise<void> {
  const { gate } = fastify.pipeline;

  fastify.post(
    '/api/v1/activity/scroll',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      gate.signal();
      return reply.status(202).send({
        suspended_until: new Date(gate.suspendedUntil).toISOString(),
      });
    },
  );
}

export default fp(activityRoutes, {
  name: 'activity-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
