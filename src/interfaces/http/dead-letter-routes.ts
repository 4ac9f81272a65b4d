import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { EventProcessor } from '../../application/event-processor.js';
import { reprocessDeadLetterSchema } from '../../application/subscription-schema.js';

export interface DeadLetterRoutesOptions {
  processor: EventProcessor;
}

/**
 * POST /webhooks/dead-letter/reprocess — replay up to `limit` dead-lettered events.
 */
async function deadLetterRoutes(fastify: FastifyInstance, opts: DeadLetterRoutesOptions): Promise<void> {
  fastify.post(
    '/webhooks/dead-letter/reprocess',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = reprocessDeadLetterSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await opts.processor.reprocessDeadLetter(parsed.data.limit);
      return reply.status(200).send(result);
    },
  );
}

export default fp(deadLetterRoutes, {
  name: 'dead-letter-routes',
  fastify: '5.x',
});
