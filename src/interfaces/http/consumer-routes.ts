import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createConsumerSchema, updateFilterSchema } from '../../application/consumer-schema.js';
import type { ConsumerView } from '../../application/index.js';
import type { PostEvent } from '../../domain/index.js';

export interface ConsumerBody {
  id: string;
  role: ConsumerView['role'];
  filter: string;
  retained: number;
  events?: PostEvent[];
}

export function toConsumerBody(consumer: ConsumerView, withEvents: boolean): ConsumerBody {
  const body: ConsumerBody = {
    id: consumer.id,
    role: consumer.role,
    filter: consumer.filter,
    retained: consumer.retained,
  };
  if (withEvents) body.events = consumer.events();
  return body;
}

/**
 * Consumer management routes.
 *
 * GET    /api/v1/consumers      — list consumers (primary first)
 * POST   /api/v1/consumers      — split: create a secondary consumer
 * GET    /api/v1/consumers/:id  — one consumer with its retained posts
 * PATCH  /api/v1/consumers/:id  — replace the keyword filter
 * DELETE /api/v1/consumers/:id  — remove a secondary consumer
 */
async function consumerRoutes(fastify: FastifyInstance): Promise<void> {
  const { registry } = fastify.pipeline;

  // ── GET /api/v1/consumers ────────────────────────────────
  fastify.get(
    '/api/v1/consumers',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(registry.list().map((c) => toConsumerBody(c, false)));
    },
  );

  // ── POST /api/v1/consumers ───────────────────────────────
  fastify.post(
    '/api/v1/consumers',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createConsumerSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const consumer = registry.add(parsed.data.filter);
      request.log.info({ consumer_id: consumer.id, filter: consumer.filter }, 'Consumer created');

      return reply.status(201).send(toConsumerBody(consumer, false));
    },
  );

  // ── GET /api/v1/consumers/:id ────────────────────────────
  fastify.get(
    '/api/v1/consumers/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const consumer = registry.get(request.params.id);
      if (!consumer) {
        return reply.status(404).send({ error: 'Consumer not found' });
      }
      return reply.status(200).send(toConsumerBody(consumer, true));
    },
  );

  // ── PATCH /api/v1/consumers/:id ──────────────────────────
  fastify.patch(
    '/api/v1/consumers/:id',
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = updateFilterSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const consumer = registry.updateFilter(request.params.id, parsed.data.filter);
      if (consumer === null) {
        return reply.status(404).send({ error: 'Consumer not found' });
      }

      request.log.info({ consumer_id: consumer.id, filter: consumer.filter }, 'Consumer filter replaced');
      return reply.status(200).send(toConsumerBody(consumer, false));
    },
  );

  // ── DELETE /api/v1/consumers/:id ─────────────────────────
  fastify.delete(
    '/api/v1/consumers/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const result = registry.remove(request.params.id);

      switch (result) {
        case 'not_found':
          return reply.status(404).send({ error: 'Consumer not found' });
        case 'primary_protected':
          return reply.status(409).send({ error: 'The primary consumer cannot be removed' });
        case 'removed':
          request.log.info({ consumer_id: request.params.id }, 'Consumer removed');
          return reply.status(204).send();
      }
    },
  );
}

export default fp(consumerRoutes, {
  name: 'consumer-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
