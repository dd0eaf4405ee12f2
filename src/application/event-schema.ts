import { z } from 'zod';

/** Largest number of events accepted by a single batch request. */
export const MAX_BATCH_SIZE = 500;

/**
 * Zod schema for validating a single inbound behaviour event.
 *
 * - `event_id` is optional at ingestion; assigned at intake if absent.
 * - `timestamp` must be ISO-8601 with a `Z` or numeric offset.
 * - `event_type` is trimmed and lower-cased; `source` defaults to `"api"`.
 * - `payload` and `metadata` are open-ended objects so heterogeneous
 *   behaviours (logins, movements, zone changes) share one envelope.
 */
export const eventSchema = z.object({
  event_id: z.string().uuid().optional(),
  subject_id: z.string().trim().min(1).max(255),
  event_type: z.string().trim().toLowerCase().min(1).max(255),
  source: z.string().trim().min(1).max(255).optional().default('api'),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
  payload: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

/** Validated-but-incomplete event (no guaranteed id, timestamp not yet canonical). */
export type EventInput = z.infer<typeof eventSchema>;
