import SqliteDatabase from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by better-sqlite3.
 *
 * Returns both the raw `sqlite` handle (for lifecycle management and
 * schema bootstrap) and the typed `db` instance (for queries).
 * Pass `':memory:'` for a throwaway database.
 */
export function createDbClient(databasePath: string) {
  const sqlite = new SqliteDatabase(databasePath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });

  return { sqlite, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
