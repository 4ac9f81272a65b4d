import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';
import { WEBHOOK_SUBSCRIPTIONS_DDL } from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    // Subscription writes are rare; a small pool is plenty
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];

/** Ensures the subscription table exists (lightweight migration via raw SQL). */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  for (const statement of WEBHOOK_SUBSCRIPTIONS_DDL) {
    await sql.unsafe(statement);
  }
}
