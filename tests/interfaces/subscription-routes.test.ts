import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { subscriptionRoutes, deadLetterRoutes } from '../../src/interfaces/http/index.js';
import { WebhookConfigManager } from '../../src/application/webhook-config-manager.js';
import { EventProcessor } from '../../src/application/event-processor.js';
import { DEAD_LETTER_KEY } from '../../src/application/ports.js';
import { InMemoryWebhookRegistry } from '../../src/infrastructure/registry/index.js';
import { InMemoryDurableQueue } from '../in-memory-durable-queue.js';
import { fakeLogger, makeEvent } from '../helpers.js';

describe('subscription routes', () => {
  let app: FastifyInstance;
  let crm: {
    register: ReturnType<typeof vi.fn>;
    update: ReturnType<typeof vi.fn>;
    unregister: ReturnType<typeof vi.fn>;
    status: ReturnType<typeof vi.fn>;
  };

  beforeEach(async () => {
    crm = {
      register: vi.fn().mockResolvedValue('channel-1'),
      update: vi.fn().mockResolvedValue(undefined),
      unregister: vi.fn().mockResolvedValue(undefined),
      status: vi.fn().mockResolvedValue({ active: true }),
    };
    const manager = new WebhookConfigManager(crm, new InMemoryWebhookRegistry(), fakeLogger(), {
      baseUrl: 'https://sync.example.com',
      secret: 'test-secret-0123456789',
    });
    await manager.initialize();

    app = Fastify();
    await app.register(subscriptionRoutes, { manager });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  function register(payload: unknown) {
    return app.inject({ method: 'POST', url: '/webhooks/subscriptions', payload: JSON.stringify(payload), headers: { 'content-type': 'application/json' } });
  }

  it('registers a subscription without exposing the secret', async () => {
    const response = await register({ name: 'deals_hook', module: 'Deals', events: ['create'] });

    expect(response.statusCode).toBe(201);
    const json = response.json();
    expect(json).toMatchObject({ name: 'deals_hook', module: 'Deals', webhook_id: 'channel-1', enabled: true });
    expect(json).not.toHaveProperty('secret_token');
  });

  it('returns 400 for an empty event list or an unknown module', async () => {
    expect((await register({ name: 'x', module: 'Deals', events: [] })).statusCode).toBe(400);
    expect((await register({ name: 'x', module: 'Leads', events: ['create'] })).statusCode).toBe(400);
    expect(crm.register).not.toHaveBeenCalled();
  });

  it('returns 409 for a name already in use', async () => {
    await register({ name: 'deals_hook', module: 'Deals', events: ['create'] });
    expect((await register({ name: 'deals_hook', module: 'Deals', events: ['update'] })).statusCode).toBe(409);
  });

  it('returns 502 when the CRM rejects the registration', async () => {
    crm.register.mockRejectedValueOnce(new Error('INVALID_TOKEN'));
    const response = await register({ name: 'deals_hook', module: 'Deals', events: ['create'] });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ error: 'Failed to register webhook deals_hook: INVALID_TOKEN' });
  });

  it('patches, lists and deletes a subscription', async () => {
    await register({ name: 'deals_hook', module: 'Deals', events: ['create'] });

    const patched = await app.inject({
      method: 'PATCH',
      url: '/webhooks/subscriptions/deals_hook',
      payload: JSON.stringify({ enabled: false }),
      headers: { 'content-type': 'application/json' },
    });
    expect(patched.statusCode).toBe(200);
    expect(patched.json().enabled).toBe(false);

    const listed = await app.inject({ method: 'GET', url: '/webhooks/subscriptions' });
    expect(listed.json().stats).toMatchObject({ total_webhooks: 1, enabled: 0, disabled: 1 });

    expect((await app.inject({ method: 'DELETE', url: '/webhooks/subscriptions/deals_hook' })).statusCode).toBe(204);
    expect((await app.inject({ method: 'DELETE', url: '/webhooks/subscriptions/deals_hook' })).statusCode).toBe(404);
  });

  it('returns 404 when patching an unknown subscription', async () => {
    const response = await app.inject({
      method: 'PATCH',
      url: '/webhooks/subscriptions/nope',
      payload: JSON.stringify({ enabled: true }),
      headers: { 'content-type': 'application/json' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Webhook nope not found' });
  });

  it('reports subscription health', async () => {
    await register({ name: 'deals_hook', module: 'Deals', events: ['create'] });
    const response = await app.inject({ method: 'GET', url: '/webhooks/subscriptions/health' });

    expect(response.json()).toMatchObject({ total: 1, healthy: 1, unhealthy: 0 });
  });
});

describe('dead letter routes', () => {
  it('replays dead-lettered events', async () => {
    const queue = new InMemoryDurableQueue();
    const syncAccount = vi.fn().mockResolvedValue(undefined);
    const processor = new EventProcessor(queue, { syncAccount }, fakeLogger());
    const entry = { event: makeEvent({ record_id: 'acc_1', event_type: 'create' }), error: 'e', failed_at: 'now', retry_count: 3 };
    await queue.push(DEAD_LETTER_KEY, JSON.stringify(entry));

    const app = Fastify();
    await app.register(deadLetterRoutes, { processor });

    const response = await app.inject({
      method: 'POST',
      url: '/webhooks/dead-letter/reprocess',
      payload: JSON.stringify({ limit: 5 }),
      headers: { 'content-type': 'application/json' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
    expect(syncAccount).toHaveBeenCalledWith('acc_1', { force: true });

    expect((await app.inject({
      method: 'POST',
      url: '/webhooks/dead-letter/reprocess',
      payload: JSON.stringify({ limit: 0 }),
      headers: { 'content-type': 'application/json' },
    })).statusCode).toBe(400);

    await app.close();
  });
});
