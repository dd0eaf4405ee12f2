import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { BehaviourEvent } from '../domain/index.js';
import { eventSchema, MAX_BATCH_SIZE, type EventInput } from './event-schema.js';

export interface IntakeOptions {
  /** Events further than this into the future of `nowFn()` are rejected. */
  readonly maxClockSkewSeconds: number;
  readonly nowFn?: () => number;
  readonly idFn?: () => string;
}

export type IntakeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly issues: z.ZodIssue[] };

/**
 * Builds the per-request schema: the shared event shape plus the
 * future-skew check, which depends on the intake clock.
 */
function intakeEventSchema(opts: IntakeOptions) {
  const nowFn = opts.nowFn ?? Date.now;
  const skewMs = opts.maxClockSkewSeconds * 1000;

  return eventSchema.superRefine((ev, ctx) => {
    const tsMs = Date.parse(ev.timestamp);
    if (tsMs - nowFn() > skewMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timestamp'],
        message: `Timestamp is more than ${opts.maxClockSkewSeconds}s in the future`,
      });
    }
  });
}

function normalize(input: EventInput, idFn: () => string): BehaviourEvent {
  return {
    event_id: input.event_id ?? idFn(),
    subject_id: input.subject_id,
    event_type: input.event_type,
    source: input.source,
    timestamp: new Date(input.timestamp).toISOString(),
    payload: input.payload,
    metadata: input.metadata,
  };
}

/**
 * Validates and normalizes one raw event body.
 *
 * The returned event has an id, a canonical UTC timestamp and a
 * lower-case event_type, ready to be appended to the stream.
 */
export function validateEvent(raw: unknown, opts: IntakeOptions): IntakeResult<BehaviourEvent> {
  const parsed = intakeEventSchema(opts).safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues };
  }
  return { ok: true, value: normalize(parsed.data, opts.idFn ?? randomUUID) };
}

/**
 * Validates a batch of 1..500 events. Any invalid event rejects the
 * whole batch; issue paths start with the offending index.
 */
export function validateBatch(raw: unknown, opts: IntakeOptions): IntakeResult<BehaviourEvent[]> {
  const schema = z
    .array(intakeEventSchema(opts))
    .min(1, 'Batch must contain at least one event')
    .max(MAX_BATCH_SIZE, `Batch must contain at most ${MAX_BATCH_SIZE} events`);

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues };
  }
  const idFn = opts.idFn ?? randomUUID;
  return { ok: true, value: parsed.data.map((input) => normalize(input, idFn)) };
}
