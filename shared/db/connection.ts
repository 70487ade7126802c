import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';
import { loadSettings, type DatabaseSettings } from '../config/settings';

export type Database = PostgresJsDatabase<typeof schema>;

let client: ReturnType<typeof postgres> | undefined;
let db: Database | undefined;

/**
 * Shared drizzle instance over a postgres-js pool, created on first use. The
 * pool is sized by DB_POOL_SIZE, independently of worker concurrency.
 */
export function getDb(settings: DatabaseSettings = loadSettings().database): Database {
  if (!db) {
    client = postgres(settings.url, {
      max: settings.poolSize,
      idle_timeout: settings.idleTimeoutSeconds,
      connect_timeout: settings.connectTimeoutSeconds,
      transform: {
        undefined: null
      }
    });

    db = drizzle(client, {
      schema,
      logger: process.env.NODE_ENV === 'development'
    });
  }
  return db;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (client) {
    const pool = client;
    client = undefined;
    db = undefined;
    await pool.end();
  }
}
