import { pgTable, varchar, boolean, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `webhook_subscriptions` table.
 *
 * `name` is the natural primary key: the config manager addresses
 * subscriptions by name, and upserts on it when a subscription changes.
 */
export const webhookSubscriptions = pgTable('webhook_subscriptions', {
  name: varchar('name', { length: 255 }).primaryKey(),
  webhook_id: varchar('webhook_id', { length: 255 }),
  url: varchar('url', { length: 2048 }).notNull(),
  module: varchar('module', { length: 32 }).notNull(),
  events: jsonb('events').$type<string[]>().notNull(),
  enabled: boolean('enabled').notNull().default(true),
  secret_token: varchar('secret_token', { length: 255 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }),
  updated_at: timestamp('updated_at', { withTimezone: true }),
}, (table) => [
  index('idx_webhook_subscriptions_module').on(table.module),
  index('idx_webhook_subscriptions_enabled').on(table.enabled),
]);

/** DDL applied at startup when drizzle-kit migrations have not been run. */
export const WEBHOOK_SUBSCRIPTIONS_DDL = [
  `CREATE TABLE IF NOT EXISTS webhook_subscriptions (
    name          VARCHAR(255)  PRIMARY KEY,
    webhook_id    VARCHAR(255),
    url           VARCHAR(2048) NOT NULL,
    module        VARCHAR(32)   NOT NULL,
    events        JSONB         NOT NULL,
    enabled       BOOLEAN       NOT NULL DEFAULT true,
    secret_token  VARCHAR(255)  NOT NULL,
    created_at    TIMESTAMPTZ,
    updated_at    TIMESTAMPTZ
  )`,
  'CREATE INDEX IF NOT EXISTS idx_webhook_subscriptions_module ON webhook_subscriptions (module)',
  'CREATE INDEX IF NOT EXISTS idx_webhook_subscriptions_enabled ON webhook_subscriptions (enabled)',
] as const;
