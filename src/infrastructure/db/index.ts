export { webhookSubscriptions, WEBHOOK_SUBSCRIPTIONS_DDL } from './schema.js';
export { createDbClient, ensureSchema } from './client.js';
export type { Database, SqlClient } from './client.js';
export {
  toWebhookConfiguration,
  findAllSubscriptions,
  upsertSubscription,
  deleteSubscription,
  PostgresWebhookRegistry,
} from './subscription-repository.js';
export type { SubscriptionRow } from './subscription-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
