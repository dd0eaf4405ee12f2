import type { Redis } from 'ioredis';
import type { BehaviourEvent } from '../../domain/index.js';
import { STREAM_KEY } from './keys.js';

function streamFields(event: BehaviourEvent): string[] {
  return [
    'event_id', event.event_id,
    'subject_id', event.subject_id,
    'event_type', event.event_type,
    'source', event.source,
    'timestamp', event.timestamp,
    'payload', JSON.stringify(event.payload),
    'metadata', JSON.stringify(event.metadata),
  ];
}

/**
 * Appends a validated event to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). Redis Streams
 * require string values, so payload and metadata are JSON-serialized.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(redis: Redis, event: BehaviourEvent): Promise<string> {
  const entryId = await redis.xadd(STREAM_KEY, '*', ...streamFields(event));
  if (entryId === null) {
    throw new Error('XADD returned no entry id');
  }
  return entryId;
}

/**
 * Appends a batch in one MULTI/EXEC round trip, so either every event
 * reaches the stream or none does.
 */
export async function enqueueEvents(redis: Redis, batch: readonly BehaviourEvent[]): Promise<string[]> {
  const tx = redis.multi();
  for (const event of batch) {
    tx.xadd(STREAM_KEY, '*', ...streamFields(event));
  }
  const results = await tx.exec();
  if (results === null) {
    throw new Error('Batch enqueue transaction aborted');
  }

  const ids: string[] = [];
  for (const [err, entryId] of results) {
    if (err !== null) throw err;
    if (typeof entryId !== 'string') throw new Error('XADD returned no entry id');
    ids.push(entryId);
  }
  return ids;
}
