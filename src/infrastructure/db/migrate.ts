import type { DbClient } from './client.js';

/**
 * Ensures tables exist (lightweight migration via raw SQL).
 *
 * Mirrors `schema.ts`. drizzle-kit can generate proper migrations from
 * the schema, but this keeps a fresh data directory usable on first run.
 */
export function ensureSchema(client: Pick<DbClient, 'sqlite'>): void {
  client.sqlite.exec(`
    CREATE TABLE IF NOT EXISTS events (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      user        TEXT,
      action      TEXT    NOT NULL,
      payload     TEXT,
      timestamp   REAL    NOT NULL,
      processed   INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS actions (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id    INTEGER NOT NULL,
      action_type TEXT    NOT NULL,
      details     TEXT    NOT NULL,
      timestamp   REAL    NOT NULL
    );

    CREATE TABLE IF NOT EXISTS delivery_log (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id    INTEGER,
      recipient   TEXT    NOT NULL,
      subject     TEXT    NOT NULL,
      status      TEXT    NOT NULL,
      error       TEXT,
      attempt     INTEGER NOT NULL,
      created_at  REAL    NOT NULL
    );

    CREATE TABLE IF NOT EXISTS delivery_queue (
      id               INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id         INTEGER,
      subject          TEXT    NOT NULL,
      body             TEXT    NOT NULL,
      recipient        TEXT    NOT NULL,
      attempts         INTEGER NOT NULL DEFAULT 0,
      next_retry_at    REAL    NOT NULL DEFAULT 0,
      created_at       REAL    NOT NULL,
      last_error       TEXT,
      dead_lettered_at REAL
    );

    CREATE INDEX IF NOT EXISTS idx_events_processed_timestamp ON events (processed, timestamp);
    CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp);
    CREATE INDEX IF NOT EXISTS idx_actions_event_id ON actions (event_id);
    CREATE INDEX IF NOT EXISTS idx_actions_timestamp ON actions (timestamp);
    CREATE INDEX IF NOT EXISTS idx_delivery_log_event_id ON delivery_log (event_id);
    CREATE INDEX IF NOT EXISTS idx_delivery_queue_next_retry_at ON delivery_queue (next_retry_at);
  `);
}
