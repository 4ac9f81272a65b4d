import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import type { DurableQueue } from '../../application/ports.js';
import { RedisDurableQueue } from './redis-durable-queue.js';

export interface RedisPluginOptions {
  url: string;
}

/**
 * Fastify plugin that manages the ioredis connection lifecycle.
 *
 * - Connects on server start, disconnects on close.
 * - Decorates `fastify.redis` and `fastify.queue` (the DurableQueue
 *   view of the same connection) for routes and services.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = createRedisClient(opts.url);

  await redis.connect();
  fastify.log.info('Redis connected');

  const queue = new RedisDurableQueue(redis);

  fastify.decorate('redis', redis);
  fastify.decorate('queue', queue);

  fastify.addHook('onClose', async () => {
    await queue.close();
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

/** Reconnect attempts a queued command waits through before it rejects. */
export const SHARED_CLIENT_MAX_RETRIES = 3;

/**
 * Shared client for LPUSH / SET NX / LLEN / PING. Commands fail after a
 * few reconnect attempts so ingress and health checks report an outage
 * instead of hanging. Blocking pops run on duplicates without that limit.
 */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: SHARED_CLIENT_MAX_RETRIES,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` and `fastify.queue` are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
    queue: DurableQueue;
  }
}
