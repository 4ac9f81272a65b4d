import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { webhookRoutes } from '../../src/interfaces/http/index.js';
import { WebhookIngress } from '../../src/application/webhook-ingress.js';
import { computeSignature } from '../../src/application/signature.js';
import { PROCESSOR_METRICS_KEY, QUEUE_KEY } from '../../src/application/ports.js';
import { InMemoryDurableQueue } from '../in-memory-durable-queue.js';
import { FIXED_NOW, TEST_SECRET, fakeLogger } from '../helpers.js';

const body = JSON.stringify({
  operation: 'update',
  module: 'Accounts',
  data: [{ id: 'acc_9' }],
  modified_fields: ['Health_Score', 'Description'],
});

describe('webhook routes', () => {
  let app: FastifyInstance;
  let queue: InMemoryDurableQueue;

  beforeEach(async () => {
    queue = new InMemoryDurableQueue();
    const ingress = new WebhookIngress(queue, fakeLogger(), {
      secret: () => TEST_SECRET,
      maxQueueSize: 2,
      now: () => FIXED_NOW,
    });

    app = Fastify();
    await app.register(webhookRoutes, { ingress, queue, provider: 'zoho' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  function post(payload: string, headers: Record<string, string> = {}) {
    return app.inject({
      method: 'POST',
      url: '/webhooks/zoho',
      headers: { 'content-type': 'application/json', ...headers },
      payload,
    });
  }

  it('accepts a signed webhook and verifies the exact bytes', async () => {
    const response = await post(body, {
      'x-zoho-signature': computeSignature(TEST_SECRET, body),
      'x-zoho-event-id': 'evt-1',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'accepted',
      event_id: 'evt-1',
      message: 'Event queued for processing',
      queued: true,
    });
    expect(queue.items(QUEUE_KEY)).toHaveLength(1);
  });

  it('answers a redelivery with 200 duplicate', async () => {
    const headers = { 'x-zoho-signature': computeSignature(TEST_SECRET, body), 'x-zoho-event-id': 'evt-1' };
    await post(body, headers);
    const response = await post(body, headers);

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('duplicate');
    expect(queue.items(QUEUE_KEY)).toHaveLength(1);
  });

  it('returns 401 for a bad signature', async () => {
    const response = await post(body, { 'x-zoho-signature': 'deadbeef', 'x-zoho-event-id': 'evt-1' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Invalid webhook signature' });
  });

  it('verifies a body sent with another content type', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/webhooks/zoho',
      headers: { 'content-type': 'text/plain', 'x-zoho-signature': computeSignature(TEST_SECRET, body) },
      payload: body,
    });

    expect(response.statusCode).toBe(200);
  });

  it('returns 400 for signed invalid JSON', async () => {
    const payload = '{"module":';
    const response = await post(payload, { 'x-zoho-signature': computeSignature(TEST_SECRET, payload) });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Invalid JSON payload' });
  });

  it('returns 400 with issues for an invalid CRM body', async () => {
    const payload = JSON.stringify({ data: 'nope' });
    const response = await post(payload, { 'x-zoho-signature': computeSignature(TEST_SECRET, payload) });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('Invalid CRM webhook payload');
    expect(response.json().issues.length).toBeGreaterThan(0);
  });

  it('returns 503 when the queue is full', async () => {
    const signature = computeSignature(TEST_SECRET, body);
    await post(body, { 'x-zoho-signature': signature, 'x-zoho-event-id': 'evt-1' });
    await post(body, { 'x-zoho-signature': signature, 'x-zoho-event-id': 'evt-2' });
    const response = await post(body, { 'x-zoho-signature': signature, 'x-zoho-event-id': 'evt-3' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'Queue full or unavailable' });
  });

  it('returns 404 for an unknown provider', async () => {
    const response = await app.inject({ method: 'POST', url: '/webhooks/hubspot', payload: body });
    expect(response.statusCode).toBe(404);
  });

  it('serves health with 503 when the backend is down', async () => {
    expect((await app.inject({ method: 'GET', url: '/webhooks/health' })).statusCode).toBe(200);

    queue.down = true;
    const response = await app.inject({ method: 'GET', url: '/webhooks/health' });
    expect(response.statusCode).toBe(503);
    expect(response.json().redis_connected).toBe(false);
  });

  it('serves ingress metrics', async () => {
    await post(body, { 'x-zoho-signature': 'bad' });
    const response = await app.inject({ method: 'GET', url: '/webhooks/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ total_events: 1, rejected_events: 1, acceptance_rate: '0.0%' });
  });

  it('serves the processor snapshot published by the worker', async () => {
    expect((await app.inject({ method: 'GET', url: '/webhooks/processor/metrics' })).statusCode).toBe(503);

    await queue.setWithExpiry(PROCESSOR_METRICS_KEY, JSON.stringify({ events_processed: 7 }), 30);
    const response = await app.inject({ method: 'GET', url: '/webhooks/processor/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ events_processed: 7 });
  });
});
