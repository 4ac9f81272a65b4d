import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { RedisDurableQueue } from '../../src/infrastructure/redis/redis-durable-queue.js';
import { createRedisClient, SHARED_CLIENT_MAX_RETRIES } from '../../src/infrastructure/redis/redis-plugin.js';

function fakeRedis() {
  const blocking = {
    brpop: vi.fn(),
    quit: vi.fn().mockResolvedValue('OK'),
  };
  const redis = {
    lpush: vi.fn().mockResolvedValue(1),
    rpop: vi.fn().mockResolvedValue(null),
    llen: vi.fn().mockResolvedValue(0),
    expire: vi.fn().mockResolvedValue(1),
    set: vi.fn(),
    del: vi.fn().mockResolvedValue(1),
    get: vi.fn().mockResolvedValue(null),
    publish: vi.fn().mockResolvedValue(0),
    ping: vi.fn().mockResolvedValue('PONG'),
    duplicate: vi.fn(() => blocking),
  };
  return { redis, blocking, client: redis as unknown as Redis };
}

describe('RedisDurableQueue', () => {
  it('pushes at the head and pops from the tail', async () => {
    const { redis, client } = fakeRedis();
    const queue = new RedisDurableQueue(client);

    await queue.push('webhook:queue', 'a');
    await queue.pop('webhook:queue');

    expect(redis.lpush).toHaveBeenCalledWith('webhook:queue', 'a');
    expect(redis.rpop).toHaveBeenCalledWith('webhook:queue');
  });

  it('runs blocking pops on a duplicated connection and reuses it', async () => {
    const { redis, blocking, client } = fakeRedis();
    blocking.brpop.mockResolvedValueOnce(['webhook:queue', 'item']).mockResolvedValueOnce(null);
    const queue = new RedisDurableQueue(client);

    await expect(queue.popBlocking('webhook:queue', 5)).resolves.toBe('item');
    await expect(queue.popBlocking('webhook:queue', 5)).resolves.toBeNull();

    expect(redis.duplicate).toHaveBeenCalledTimes(1);
    expect(redis.duplicate).toHaveBeenCalledWith({ maxRetriesPerRequest: null });
    expect(blocking.brpop).toHaveBeenCalledWith('webhook:queue', 5);

    await queue.close();
    expect(blocking.quit).toHaveBeenCalledTimes(1);
  });

  it('maps SET NX replies to a boolean', async () => {
    const { redis, client } = fakeRedis();
    redis.set.mockResolvedValueOnce('OK').mockResolvedValueOnce(null);
    const queue = new RedisDurableQueue(client);

    await expect(queue.setIfAbsent('webhook:processed:e1', '1', 3600)).resolves.toBe(true);
    await expect(queue.setIfAbsent('webhook:processed:e1', '1', 3600)).resolves.toBe(false);
    expect(redis.set).toHaveBeenCalledWith('webhook:processed:e1', '1', 'EX', 3600, 'NX');
  });

  it('propagates a failed ping', async () => {
    const { redis, client } = fakeRedis();
    redis.ping.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(new RedisDurableQueue(client).ping()).rejects.toThrow('ECONNREFUSED');
  });
});

describe('createRedisClient', () => {
  it('bounds command retries on the shared client and does not connect eagerly', () => {
    const client = createRedisClient('redis://localhost:6379');

    expect(client.options.maxRetriesPerRequest).toBe(SHARED_CLIENT_MAX_RETRIES);
    expect(client.options.lazyConnect).toBe(true);
    expect(client.status).toBe('wait');
    client.disconnect();
  });
});
