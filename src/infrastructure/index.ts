export { redisPlugin, createRedisClient, RedisDurableQueue } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { dbPlugin, createDbClient, ensureSchema, PostgresWebhookRegistry } from './db/index.js';
export type { Database, DbPluginOptions } from './db/index.js';
export { InMemoryWebhookRegistry } from './registry/index.js';
export { HttpCrmWatchClient, CrmApiError } from './crm/index.js';
export type { CrmWatchClientConfig } from './crm/index.js';
export { HttpSyncTarget, DebouncedSyncTarget, SyncTargetError } from './sync/index.js';
export { loadPipelineConfig, ConfigError } from './config/index.js';
export type { PipelineConfig } from './config/index.js';
