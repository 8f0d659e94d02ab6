/**
 * Drizzle ORM Database Client
 *
 * One lazily created postgres.js pool per process, shared by the chunk store.
 */

import { drizzle, type PostgresJsDatabase, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import { requireEnv } from '@/lib/env';
import { createLayerLogger } from '@/lib/logger';
import * as schema from './schema';

const log = createLayerLogger('db', 'DatabaseClient');

// =============================================================================
// Types
// =============================================================================

export type Database = PostgresJsDatabase<typeof schema>;

/** The shared client or a transaction opened on it */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export interface DatabaseOptions {
  /** Defaults to DATABASE_URL */
  connectionString?: string;
  max?: number;
}

// =============================================================================
// Shared Client
// =============================================================================

let client: postgres.Sql | null = null;
let db: Database | null = null;

/**
 * Get the shared Drizzle client, connecting on first use.
 *
 * @throws Error when no connection string is given and DATABASE_URL is not set
 */
export function getDb(options: DatabaseOptions = {}): Database {
  if (db) {
    return db;
  }

  const connectionString = options.connectionString ?? requireEnv('DATABASE_URL');

  client = postgres(connectionString, {
    max: options.max ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  db = drizzle(client, { schema });

  log.debug({ max: options.max ?? 10 }, 'Database pool created');

  return db;
}

/**
 * Close the shared connection. Call this during graceful shutdown.
 */
export async function closeDb(): Promise<void> {
  if (client) {
    await client.end();
    client = null;
    db = null;
    log.info('Database connection closed');
  }
}
