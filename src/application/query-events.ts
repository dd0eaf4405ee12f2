import type { Database } from '../infrastructure/db/index.js';
import { queryEvents, findEventById } from '../infrastructure/db/index.js';
import type { EventQueryFilters } from '../infrastructure/db/index.js';
import type { EventListQuery } from './query-schema.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 500;

/** Clamps limit to [1, 500] (default 50) and offset to >= 0. */
export function resolvePage(limit: number | undefined, offset: number | undefined): { limit: number; offset: number } {
  return {
    limit: Math.min(Math.max(limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT),
    offset: Math.max(offset ?? 0, 0),
  };
}

/**
 * Use case: list events with pagination and filters, newest first.
 */
export async function listEvents(db: Database, params: EventListQuery) {
  const { limit, offset } = resolvePage(params.limit, params.offset);

  const filters: EventQueryFilters = {};
  if (params.subject_id !== undefined) filters.subject_id = params.subject_id;
  if (params.event_type !== undefined) filters.event_type = params.event_type;
  if (params.source !== undefined) filters.source = params.source;
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  const data = await queryEvents(db, filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/**
 * Use case: fetch a single event by ID.
 * Returns null if not found.
 */
export async function getEvent(db: Database, eventId: string) {
  const row = await findEventById(db, eventId);
  return row ?? null;
}
