import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { MalformedPayloadError, PipelineError } from '../../application/errors.js';
import type { DurableQueue } from '../../application/ports.js';
import { PROCESSOR_METRICS_KEY } from '../../application/ports.js';
import type { WebhookIngress } from '../../application/webhook-ingress.js';

export interface WebhookRoutesOptions {
  ingress: WebhookIngress;
  queue: DurableQueue;
  /** Path segment and header prefix, e.g. "zoho" → X-Zoho-Signature. */
  provider: string;
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Sends the status and message a pipeline error carries.
 * Anything else is rethrown to Fastify's default error handler.
 */
export function sendPipelineError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!(err instanceof PipelineError)) throw err;

  if (err instanceof MalformedPayloadError && err.issues.length > 0) {
    return reply.status(err.statusCode).send({ error: err.message, issues: err.issues });
  }
  return reply.status(err.statusCode).send({ error: err.message });
}

/**
 * Registers the webhook ingress routes.
 *
 * POST /webhooks/:provider          — CRM webhook receiver (raw body, HMAC verified)
 * GET  /webhooks/health             — queue connectivity and utilization
 * GET  /webhooks/metrics            — ingress counters and rates
 * GET  /webhooks/processor/metrics  — last snapshot published by the worker
 */
async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRoutesOptions): Promise<void> {
  const signatureHeader = `x-${opts.provider}-signature`;
  const eventIdHeader = `x-${opts.provider}-event-id`;

  /**
   * The signature covers the exact bytes sent, so this route runs in its
   * own context where every content type is read as a raw Buffer.
   */
  await fastify.register(async (raw) => {
    raw.removeAllContentTypeParsers();
    raw.addContentTypeParser('*', { parseAs: 'buffer' }, (_req, body, done) => {
      done(null, body);
    });

    raw.post(
      `/webhooks/${opts.provider}`,
      async (request: FastifyRequest, reply: FastifyReply) => {
        const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

        try {
          const result = await opts.ingress.handleWebhook({
            rawBody,
            signature: headerValue(request, signatureHeader),
            eventId: headerValue(request, eventIdHeader),
          });
          return reply.status(200).send(result);
        } catch (err: unknown) {
          return sendPipelineError(reply, err);
        }
      },
    );
  });

  fastify.get(
    '/webhooks/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const health = await opts.ingress.getHealthStatus();
      return reply.status(health.status === 'healthy' ? 200 : 503).send(health);
    },
  );

  fastify.get(
    '/webhooks/metrics',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(await opts.ingress.getMetrics());
    },
  );

  /**
   * The worker process publishes its metrics under a TTL key; a missing
   * key means no worker has reported recently.
   */
  fastify.get(
    '/webhooks/processor/metrics',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let snapshot: string | null;
      try {
        snapshot = await opts.queue.get(PROCESSOR_METRICS_KEY);
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Processor metrics lookup failed');
        return reply.status(503).send({ error: 'Queue backend unreachable' });
      }

      if (snapshot === null) {
        return reply.status(503).send({ error: 'No processor metrics reported' });
      }
      return reply.status(200).type('application/json').send(snapshot);
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  fastify: '5.x',
});
