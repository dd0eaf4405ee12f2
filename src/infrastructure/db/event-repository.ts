import { eq, and, gte, lte, lt, desc, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { events } from './schema.js';
import type { BehaviourEvent } from '../../domain/index.js';

export type EventRow = typeof events.$inferSelect;

export interface EventQueryFilters {
  subject_id?: string;
  event_type?: string;
  source?: string;
  from?: string;   // ISO-8601, inclusive
  to?: string;     // ISO-8601, inclusive
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Inserts an event idempotently.
 *
 * Uses ON CONFLICT DO NOTHING on the event_id primary key.
 * Returns true if a row was inserted, false if it was a duplicate.
 */
export async function insertEvent(db: Database, event: BehaviourEvent): Promise<boolean> {
  const rows = await db
    .insert(events)
    .values({
      event_id: event.event_id,
      subject_id: event.subject_id,
      event_type: event.event_type,
      source: event.source,
      timestamp: new Date(event.timestamp),
      payload: event.payload,
      metadata: event.metadata,
    })
    .onConflictDoNothing({ target: events.event_id })
    .returning({ event_id: events.event_id });

  return rows.length > 0;
}

/**
 * Fetches a paginated, filtered list of events, newest first.
 * Only non-undefined filters are applied.
 */
export async function queryEvents(
  db: Database,
  filters: EventQueryFilters,
  pagination: PaginationParams,
): Promise<EventRow[]> {
  const conditions: SQL[] = [];

  if (filters.subject_id !== undefined) {
    conditions.push(eq(events.subject_id, filters.subject_id));
  }
  if (filters.event_type !== undefined) {
    conditions.push(eq(events.event_type, filters.event_type));
  }
  if (filters.source !== undefined) {
    conditions.push(eq(events.source, filters.source));
  }
  if (filters.from !== undefined) {
    conditions.push(gte(events.timestamp, new Date(filters.from)));
  }
  if (filters.to !== undefined) {
    conditions.push(lte(events.timestamp, new Date(filters.to)));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  return db
    .select()
    .from(events)
    .where(whereClause)
    .orderBy(desc(events.timestamp))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

/** Returns undefined if not found. */
export async function findEventById(db: Database, eventId: string): Promise<EventRow | undefined> {
  const rows = await db
    .select()
    .from(events)
    .where(eq(events.event_id, eventId))
    .limit(1);

  return rows[0];
}

/** Deletes events whose timestamp is before `cutoff`. Returns the number removed. */
export async function purgeEventsBefore(db: Database, cutoff: Date): Promise<number> {
  const rows = await db
    .delete(events)
    .where(lt(events.timestamp, cutoff))
    .returning({ event_id: events.event_id });
  return rows.length;
}
