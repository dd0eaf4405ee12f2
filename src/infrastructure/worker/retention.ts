import type { Logger } from 'pino';
import type { Database } from '../db/index.js';
import { purgeAlertsBefore, purgeEventsBefore } from '../db/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export interface PurgeResult {
  readonly cutoff: string;
  readonly events: number;
  readonly alerts: number;
}

/** Deletes events and alerts older than `retentionDays` before `nowMs`. */
export async function purgeExpired(db: Database, retentionDays: number, nowMs: number): Promise<PurgeResult> {
  const cutoff = new Date(nowMs - retentionDays * DAY_MS);
  const events = await purgeEventsBefore(db, cutoff);
  const alerts = await purgeAlertsBefore(db, cutoff);
  return { cutoff: cutoff.toISOString(), events, alerts };
}

async function sweep(db: Database, log: Logger, retentionDays: number): Promise<void> {
  try {
    const result = await purgeExpired(db, retentionDays, Date.now());
    log.info({ ...result, retentionDays }, 'Retention sweep completed');
  } catch (err: unknown) {
    log.error({ err, retentionDays }, 'Retention sweep failed');
  }
}

/** Sweeps once now, then hourly until `signal` aborts. */
export function startRetentionSweeper(db: Database, log: Logger, retentionDays: number, signal: AbortSignal): void {
  void sweep(db, log, retentionDays);
  const timer = setInterval(() => { void sweep(db, log, retentionDays); }, SWEEP_INTERVAL_MS);
  signal.addEventListener('abort', () => clearInterval(timer), { once: true });
}
