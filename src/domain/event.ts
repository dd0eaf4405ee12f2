/**
 * Core domain types for the behaviour event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Free-form attributes describing what the subject did. */
export type EventPayload = Record<string, unknown>;

/** Optional metadata for routing, tracing, or enrichment. */
export type EventMetadata = Record<string, unknown>;

/**
 * Canonical behaviour event.
 *
 * `event_id` is assigned at intake if the producer does not supply one.
 * `timestamp` is always the normalized UTC form produced by `toISOString()`,
 * and `event_type` is lower-case. Immutable once ingested.
 */
export interface BehaviourEvent {
  readonly event_id: string;
  readonly subject_id: string;
  readonly event_type: string;
  readonly source: string;
  readonly timestamp: string; // ISO-8601
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;
}
