import { asc, eq } from 'drizzle-orm';
import type { Logger } from 'pino';
import { isCrmModule, isWebhookEventType } from '../../domain/index.js';
import type { WebhookConfiguration } from '../../domain/index.js';
import type { WebhookRegistry } from '../../application/ports.js';
import type { Database } from './client.js';
import { webhookSubscriptions } from './schema.js';

/** Row shape returned by subscription queries. */
export type SubscriptionRow = typeof webhookSubscriptions.$inferSelect;

/**
 * Maps a row to the domain configuration.
 * Returns null when the row names a module this build does not know.
 */
export function toWebhookConfiguration(row: SubscriptionRow): WebhookConfiguration | null {
  if (!isCrmModule(row.module)) return null;

  const events = row.events.filter(isWebhookEventType);
  if (events.length === 0) return null;

  return {
    webhook_id: row.webhook_id,
    name: row.name,
    url: row.url,
    module: row.module,
    events,
    enabled: row.enabled,
    secret_token: row.secret_token,
    created_at: row.created_at?.toISOString() ?? null,
    updated_at: row.updated_at?.toISOString() ?? null,
  };
}

export async function findAllSubscriptions(db: Database): Promise<SubscriptionRow[]> {
  return db.select().from(webhookSubscriptions).orderBy(asc(webhookSubscriptions.name));
}

/** Inserts or replaces the subscription row keyed by name. */
export async function upsertSubscription(db: Database, config: WebhookConfiguration): Promise<void> {
  const values = {
    webhook_id: config.webhook_id,
    url: config.url,
    module: config.module,
    events: [...config.events],
    enabled: config.enabled,
    secret_token: config.secret_token,
    created_at: config.created_at === null ? null : new Date(config.created_at),
    updated_at: config.updated_at === null ? null : new Date(config.updated_at),
  };

  await db
    .insert(webhookSubscriptions)
    .values({ name: config.name, ...values })
    .onConflictDoUpdate({ target: webhookSubscriptions.name, set: values });
}

export async function deleteSubscription(db: Database, name: string): Promise<boolean> {
  const rows = await db
    .delete(webhookSubscriptions)
    .where(eq(webhookSubscriptions.name, name))
    .returning({ name: webhookSubscriptions.name });
  return rows.length > 0;
}

/** WebhookRegistry persisting subscriptions in Postgres. */
export class PostgresWebhookRegistry implements WebhookRegistry {
  constructor(
    private readonly db: Database,
    private readonly log: Logger,
  ) {}

  async load(): Promise<WebhookConfiguration[]> {
    const configs: WebhookConfiguration[] = [];
    for (const row of await findAllSubscriptions(this.db)) {
      const config = toWebhookConfiguration(row);
      if (config === null) {
        this.log.warn({ name: row.name, module: row.module }, 'Skipping unreadable webhook subscription row');
        continue;
      }
      configs.push(config);
    }
    return configs;
  }

  async save(config: WebhookConfiguration): Promise<void> {
    await upsertSubscription(this.db, config);
  }

  async remove(name: string): Promise<boolean> {
    return deleteSubscription(this.db, name);
  }
}
