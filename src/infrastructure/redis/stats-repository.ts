import type { Redis } from 'ioredis';
import { parseStatsHash, type MonitorStats } from '../../application/monitor-stats.js';
import { HEALTH_KEY, STATS_KEY } from './keys.js';

/** Adds counter deltas to the stats hash in one pipeline. */
export async function flushStats(redis: Redis, deltas: ReadonlyMap<string, number>): Promise<void> {
  if (deltas.size === 0) return;
  const pipeline = redis.pipeline();
  for (const [field, by] of deltas) {
    pipeline.hincrby(STATS_KEY, field, by);
  }
  const results = await pipeline.exec();
  for (const [err] of results ?? []) {
    if (err !== null) throw err;
  }
}

export async function readStats(redis: Redis): Promise<MonitorStats> {
  return parseStatsHash(await redis.hgetall(STATS_KEY));
}

export async function resetStats(redis: Redis): Promise<void> {
  await redis.del(STATS_KEY);
}

export interface WorkerHeartbeat {
  readonly worker_id: string;
  readonly ts: string;
}

/** Marks the worker alive for `ttlSeconds`. */
export async function writeHeartbeat(redis: Redis, workerId: string, ttlSeconds: number): Promise<void> {
  const heartbeat: WorkerHeartbeat = { worker_id: workerId, ts: new Date().toISOString() };
  await redis.set(HEALTH_KEY, JSON.stringify(heartbeat), 'EX', Math.max(1, Math.ceil(ttlSeconds)));
}

/** Returns the last heartbeat, or null when it expired or is unreadable. */
export async function readHeartbeat(redis: Redis): Promise<WorkerHeartbeat | null> {
  const raw = await redis.get(HEALTH_KEY);
  if (raw === null) return null;
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === 'object' && value !== null && 'worker_id' in value && 'ts' in value) {
      const { worker_id, ts } = value;
      if (typeof worker_id === 'string' && typeof ts === 'string') return { worker_id, ts };
    }
    return null;
  } catch {
    return null;
  }
}
