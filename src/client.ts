import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { loadDatabaseConfig } from './config';
import * as schema from './schema';

/**
 * Database client for the ledger's PostgreSQL store
 * Uses connection pooling; settings come from the environment
 */
const config = loadDatabaseConfig();

// Create PostgreSQL client
const client = postgres(config.url, {
  max: config.poolMax,
  idle_timeout: config.idleTimeout,
  connect_timeout: config.connectTimeout,
});

// Create Drizzle ORM instance with schema
export const db = drizzle(client, { schema });

export type Database = typeof db;

/**
 * Close the pool. Scripts call this before exiting.
 */
export async function closeDatabase(): Promise<void> {
  await client.end();
}

// Export schema for direct access
export { schema };
