import type { RuleEngine } from '../../application/rule-engine.js';
import { flushStats, writeHeartbeat } from '../redis/stats-repository.js';
import { writeAlerts, type AlertWriterDeps } from './alert-writer.js';

export interface TickerDeps extends AlertWriterDeps {
  readonly engine: RuleEngine;
  readonly workerId: string;
  readonly intervalSeconds: number;
}

/**
 * One monitoring tick:
 *
 * 1. Time-based triggers (inactivity, dwell) → alerts.
 * 2. Counter deltas → `monitor:stats` hash.
 * 3. Heartbeat → `worker:health` with a TTL of three intervals.
 *
 * Each step has its own error boundary; nothing here throws.
 */
export async function runTick(deps: TickerDeps, nowMs: number): Promise<void> {
  try {
    const firings = deps.engine.tick(nowMs, deps.ruleStore.get(), (id) => deps.subjects.get(id));
    await writeAlerts(deps, firings);
  } catch (err: unknown) {
    deps.log.error({ err }, 'Monitoring tick failed');
  }

  const deltas = deps.stats.drain();
  try {
    await flushStats(deps.redis, deltas);
  } catch (err: unknown) {
    deps.stats.restore(deltas);
    deps.log.warn({ err }, 'Failed to flush monitoring stats');
  }

  try {
    await writeHeartbeat(deps.redis, deps.workerId, deps.intervalSeconds * 3);
  } catch (err: unknown) {
    deps.log.warn({ err }, 'Failed to write worker heartbeat');
  }
}

/**
 * Runs `runTick()` every `intervalSeconds` until `signal` aborts.
 * A tick still in flight when the next one is due is not overlapped.
 */
export function startMonitorTicker(deps: TickerDeps, signal: AbortSignal): void {
  let inFlight = false;

  const timer = setInterval(() => {
    if (inFlight) {
      deps.log.debug('Previous monitoring tick still running, skipping');
      return;
    }
    inFlight = true;
    void runTick(deps, Date.now()).finally(() => { inFlight = false; });
  }, deps.intervalSeconds * 1000);

  signal.addEventListener('abort', () => clearInterval(timer), { once: true });
  deps.log.info({ intervalSeconds: deps.intervalSeconds, workerId: deps.workerId }, 'Monitoring ticker started');
}
