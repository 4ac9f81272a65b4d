export { default as redisPlugin, createRedisClient } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { RedisDurableQueue } from './redis-durable-queue.js';
