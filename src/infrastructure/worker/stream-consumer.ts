import { z } from 'zod';
import type { BehaviourEvent } from '../../domain/index.js';
import { insertEvent } from '../db/index.js';
import type { RuleEngine } from '../../application/rule-engine.js';
import { STREAM_KEY, GROUP_NAME } from '../redis/keys.js';
import { writeAlerts, type AlertWriterDeps } from './alert-writer.js';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

const jsonObject = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.unknown()));

/** Shape of a stream entry written by `enqueueEvent()`. */
const streamEntrySchema = z.object({
  event_id: z.string().uuid(),
  subject_id: z.string().min(1),
  event_type: z.string().min(1),
  source: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  payload: jsonObject,
  metadata: jsonObject,
});

/**
 * Parses a raw Redis Stream entry into an event.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 * Returns null when the entry is not a well-formed event.
 */
export function parseStreamEntry(fields: readonly string[]): BehaviourEvent | null {
  const record: Record<string, string> = {};
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      record[key] = value;
    }
  }

  const parsed = streamEntrySchema.safeParse(record);
  return parsed.success ? parsed.data : null;
}

type StreamEntry = [id: string, fields: string[]];

/**
 * Flattens an XREADGROUP reply ([[stream, [[id, fields], ...]], ...]) into
 * entries. Deleted-but-pending entries come back with nil fields: they
 * yield an empty field list.
 */
export function toStreamEntries(response: unknown): StreamEntry[] {
  const entries: StreamEntry[] = [];
  if (!Array.isArray(response)) return entries;
  for (const stream of response) {
    if (!Array.isArray(stream)) continue;
    const items: unknown = stream[1];
    if (!Array.isArray(items)) continue;
    for (const item of items) {
      if (!Array.isArray(item)) continue;
      const id: unknown = item[0];
      const fields: unknown = item[1];
      if (typeof id !== 'string') continue;
      const strings = Array.isArray(fields)
        ? fields.filter((field): field is string => typeof field === 'string')
        : [];
      entries.push([id, strings]);
    }
  }
  return entries;
}

/** Dependencies bundled for the consumer loop. */
export interface ConsumerDeps extends AlertWriterDeps {
  readonly engine: RuleEngine;
  readonly consumerName: string;
}

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$" = only deliver messages arriving after group creation;
 * crash recovery re-reads this consumer's own pending entries instead
 * (see processPending()). MKSTREAM creates the stream if needed.
 * BUSYGROUP (group already exists) is not an error.
 */
async function ensureConsumerGroup(deps: ConsumerDeps): Promise<void> {
  try {
    await deps.redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    deps.log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      deps.log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK: waits for new messages on the stream.
 * 2. For each message: parse → insert into Postgres (idempotent) → XACK.
 * 3. After insert+ACK: evaluate rules → persist alerts → publish.
 * 4. While an insert failure left entries pending, re-read them first.
 *
 * Never ACK before a successful insert. Rule evaluation is post-ACK and
 * never blocks persistence or acknowledgement.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(deps: ConsumerDeps, signal: AbortSignal): Promise<void> {
  await ensureConsumerGroup(deps);

  deps.log.info(
    { consumer: deps.consumerName, group: GROUP_NAME, stream: STREAM_KEY, ruleCount: deps.ruleStore.get().length },
    'Consumer started',
  );

  deps.log.info('Checking for pending entries...');
  let pending = await processPending(deps);

  while (!signal.aborted) {
    try {
      // Entries left unacknowledged by a failed insert are retried before new ones.
      if (pending > 0) pending = await processPending(deps);

      const response = await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, deps.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [streamId, fields] of toStreamEntries(response)) {
        if (!(await processEntry(deps, streamId, fields))) pending++;
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      deps.log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  deps.log.info('Consumer stopped');
}

/**
 * Processes pending (delivered but unacknowledged) entries of this consumer,
 * page by page. Handles recovery after a crash or restart and retries
 * entries whose insert failed.
 *
 * Resolves to the number of entries still pending afterwards.
 */
export async function processPending(deps: ConsumerDeps): Promise<number> {
  // '0' = from the start of this consumer's pending list; each next page
  // starts after the last id seen, so entries that fail again are not re-read.
  let cursor = '0';
  let recovered = 0;
  let stillPending = 0;

  for (;;) {
    const response = await deps.redis.xreadgroup(
      'GROUP', GROUP_NAME, deps.consumerName,
      'COUNT', BATCH_SIZE,
      'STREAMS', STREAM_KEY,
      cursor,
    );
    const entries = toStreamEntries(response);
    if (entries.length === 0) break;

    for (const [streamId, fields] of entries) {
      cursor = streamId;
      if (fields.length === 0) {
        // Trimmed from the stream while pending: nothing left to process.
        await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
        continue;
      }
      if (await processEntry(deps, streamId, fields)) recovered++;
      else stillPending++;
    }
  }

  if (recovered > 0) {
    deps.log.info({ count: recovered }, 'Recovered pending entries');
  }
  if (stillPending > 0) {
    deps.log.warn({ count: stillPending }, 'Pending entries left for retry');
  }
  return stillPending;
}

/**
 * Processes a single stream entry: parse → insert → ACK → evaluate → alerts.
 * Resolves to false when the entry was left pending.
 *
 * - Unparseable entry: ACKed and dropped, it can never succeed.
 * - Insert failure: no ACK, the entry stays pending for redelivery.
 * - Duplicate (already persisted): ACKed, not evaluated again.
 * - Evaluation or alert failures: logged only, ACK already completed.
 */
export async function processEntry(deps: ConsumerDeps, streamId: string, fields: readonly string[]): Promise<boolean> {
  const event = parseStreamEntry(fields);
  if (event === null) {
    deps.log.warn({ streamId }, 'Malformed stream entry, acknowledging and dropping');
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
    return true;
  }

  // --- Persistence boundary: insert + ACK ---
  let inserted: boolean;
  try {
    inserted = await insertEvent(deps.db, event);
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.event_id, streamId }, 'Failed to persist event');
    return false;
  }

  if (!inserted) {
    deps.log.debug({ event_id: event.event_id, streamId }, 'Duplicate event skipped');
    return true;
  }
  deps.log.debug({ event_id: event.event_id, streamId }, 'Event persisted');
  deps.stats.recordProcessed();

  // --- Rule evaluation boundary (post-ACK) ---
  try {
    const subject = deps.subjects.get(event.subject_id);
    if (subject !== undefined && !subject.active) return true;

    const firings = deps.engine.evaluate(event, deps.ruleStore.get(), subject);
    deps.stats.recordEvaluated();
    await writeAlerts(deps, firings);
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.event_id, streamId }, 'Failed to evaluate rules');
  }
  return true;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
