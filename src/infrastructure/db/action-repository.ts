import { asc, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { actions } from './schema.js';
import type { ActionDetails, ActionRecord, ActionType } from '../../domain/index.js';

export interface NewActionRecord {
  event_id: number;
  action_type: ActionType;
  details: ActionDetails;
  timestamp: number;
}

/** Appends an action record. Records are never updated afterwards. */
export async function insertActionRecord(db: Database, record: NewActionRecord): Promise<ActionRecord> {
  const rows = await db.insert(actions).values(record).returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Action insert returned no row');
  }
  return row;
}

/** Most recent action records, newest first. */
export async function fetchRecentActions(db: Database, limit: number): Promise<ActionRecord[]> {
  return db
    .select()
    .from(actions)
    .orderBy(desc(actions.timestamp), desc(actions.id))
    .limit(limit);
}

export async function findActionsByEventId(db: Database, eventId: number): Promise<ActionRecord[]> {
  return db
    .select()
    .from(actions)
    .where(eq(actions.event_id, eventId))
    .orderBy(asc(actions.id));
}
