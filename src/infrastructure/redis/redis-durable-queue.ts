import type { Redis } from 'ioredis';
import type { DurableQueue } from '../../application/ports.js';

/**
 * DurableQueue backed by Redis lists and keys.
 *
 * BRPOP blocks the connection it runs on, so blocking pops borrow a
 * dedicated duplicate connection from a small pool instead of stalling
 * the shared client used for LPUSH / SET / PUBLISH.
 */
export class RedisDurableQueue implements DurableQueue {
  private readonly idle: Redis[] = [];
  private readonly all = new Set<Redis>();

  constructor(private readonly redis: Redis) {}

  async push(list: string, item: string): Promise<void> {
    await this.redis.lpush(list, item);
  }

  async popBlocking(list: string, timeoutSeconds: number): Promise<string | null> {
    const conn = this.acquire();
    try {
      const result = await conn.brpop(list, timeoutSeconds);
      return result === null ? null : result[1];
    } finally {
      this.idle.push(conn);
    }
  }

  async pop(list: string): Promise<string | null> {
    return this.redis.rpop(list);
  }

  async length(list: string): Promise<number> {
    return this.redis.llen(list);
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.redis.expire(key, ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    // null reply = key already present
    const result = await this.redis.set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async remove(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.redis.publish(channel, message);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  /** Closes the blocking connections. The shared client is owned by the caller. */
  async close(): Promise<void> {
    const conns = [...this.all];
    this.all.clear();
    this.idle.length = 0;
    await Promise.allSettled(conns.map((conn) => conn.quit()));
  }

  private acquire(): Redis {
    const existing = this.idle.pop();
    if (existing !== undefined) return existing;

    // An idle BRPOP must not be failed by the retry limit.
    const conn = this.redis.duplicate({ maxRetriesPerRequest: null });
    this.all.add(conn);
    return conn;
  }
}
