import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  registerSubscriptionSchema,
  updateSubscriptionSchema,
} from '../../application/subscription-schema.js';
import type { WebhookConfigManager } from '../../application/webhook-config-manager.js';
import type { WebhookConfiguration } from '../../domain/index.js';
import { sendPipelineError } from './webhook-routes.js';

export interface SubscriptionRoutesOptions {
  manager: WebhookConfigManager;
}

/** The shared secret never leaves the service through the API. */
function redact(config: WebhookConfiguration): Omit<WebhookConfiguration, 'secret_token'> {
  const { secret_token: _secret, ...rest } = config;
  return rest;
}

/**
 * CRM subscription management routes.
 *
 * GET    /webhooks/subscriptions         — list subscriptions with stats
 * GET    /webhooks/subscriptions/health  — ask the CRM about every channel
 * POST   /webhooks/subscriptions         — register a subscription
 * PATCH  /webhooks/subscriptions/:name   — change events / enabled
 * DELETE /webhooks/subscriptions/:name   — unregister
 */
async function subscriptionRoutes(fastify: FastifyInstance, opts: SubscriptionRoutesOptions): Promise<void> {
  const { manager } = opts;

  // ── GET /webhooks/subscriptions ──────────────────────────
  fastify.get(
    '/webhooks/subscriptions',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        subscriptions: manager.listWebhooks().map(redact),
        stats: manager.getWebhookStats(),
      });
    },
  );

  // ── GET /webhooks/subscriptions/health ───────────────────
  fastify.get(
    '/webhooks/subscriptions/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(await manager.verifyWebhookHealth());
    },
  );

  // ── POST /webhooks/subscriptions ─────────────────────────
  fastify.post(
    '/webhooks/subscriptions',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = registerSubscriptionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      if (manager.getWebhook(parsed.data.name) !== undefined) {
        return reply.status(409).send({ error: `Webhook ${parsed.data.name} already exists` });
      }

      try {
        const config = await manager.registerWebhook(
          parsed.data.name,
          parsed.data.module,
          parsed.data.events,
          parsed.data.url,
        );
        return reply.status(201).send(redact(config));
      } catch (err: unknown) {
        return sendPipelineError(reply, err);
      }
    },
  );

  // ── PATCH /webhooks/subscriptions/:name ──────────────────
  fastify.patch(
    '/webhooks/subscriptions/:name',
    async (
      request: FastifyRequest<{ Params: { name: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = updateSubscriptionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const config = await manager.updateWebhook(request.params.name, parsed.data);
        return reply.status(200).send(redact(config));
      } catch (err: unknown) {
        return sendPipelineError(reply, err);
      }
    },
  );

  // ── DELETE /webhooks/subscriptions/:name ─────────────────
  fastify.delete(
    '/webhooks/subscriptions/:name',
    async (
      request: FastifyRequest<{ Params: { name: string } }>,
      reply: FastifyReply,
    ) => {
      const removed = await manager.unregisterWebhook(request.params.name);
      if (!removed) {
        return reply.status(404).send({ error: `Webhook ${request.params.name} not found` });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(subscriptionRoutes, {
  name: 'subscription-routes',
  fastify: '5.x',
});
