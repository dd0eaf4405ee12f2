import type { RuleFiring } from '../domain/index.js';

const EVENTS_PROCESSED = 'events_processed';
const EVENTS_EVALUATED = 'events_evaluated';
const ALERTS_TOTAL = 'alerts_total';
const RULE_PREFIX = 'alerts:rule:';
const SEVERITY_PREFIX = 'alerts:severity:';
const DETECTION_PREFIX = 'detections:rule:';

export interface MonitorStats {
  readonly events_processed: number;
  readonly events_evaluated: number;
  readonly alerts_total: number;
  readonly alerts_by_rule: Record<string, number>;
  readonly alerts_by_severity: Record<string, number>;
  /** Times each rule's condition was met, cooldown-suppressed ones included. */
  readonly detections_by_rule: Record<string, number>;
}

/**
 * Accumulates counter increments between flushes.
 *
 * The worker records into this on every event and firing, then drains
 * the deltas into the shared stats hash once per tick.
 */
export class StatsAccumulator {
  private pending: Map<string, number> = new Map();

  recordProcessed(): void {
    this.increment(EVENTS_PROCESSED);
  }

  recordEvaluated(): void {
    this.increment(EVENTS_EVALUATED);
  }

  recordFiring(firing: RuleFiring): void {
    this.increment(ALERTS_TOTAL);
    this.increment(`${RULE_PREFIX}${firing.rule_id}`);
    this.increment(`${SEVERITY_PREFIX}${firing.severity}`);
  }

  recordDetection(ruleId: string): void {
    this.increment(`${DETECTION_PREFIX}${ruleId}`);
  }

  /** Returns hash-field increments since the last drain and clears them. */
  drain(): Map<string, number> {
    const deltas = this.pending;
    this.pending = new Map();
    return deltas;
  }

  /** Puts deltas back after a failed flush so they are not lost. */
  restore(deltas: ReadonlyMap<string, number>): void {
    for (const [field, by] of deltas) this.increment(field, by);
  }

  private increment(field: string, by = 1): void {
    this.pending.set(field, (this.pending.get(field) ?? 0) + by);
  }
}

function toCount(raw: string | undefined): number {
  const n = Number(raw ?? '0');
  return Number.isFinite(n) ? n : 0;
}

/** Builds the counters view from the raw stats hash. */
export function parseStatsHash(hash: Readonly<Record<string, string>>): MonitorStats {
  const byRule: Record<string, number> = {};
  const bySeverity: Record<string, number> = {};
  const detections: Record<string, number> = {};
  for (const [field, value] of Object.entries(hash)) {
    if (field.startsWith(RULE_PREFIX)) byRule[field.slice(RULE_PREFIX.length)] = toCount(value);
    else if (field.startsWith(SEVERITY_PREFIX)) bySeverity[field.slice(SEVERITY_PREFIX.length)] = toCount(value);
    else if (field.startsWith(DETECTION_PREFIX)) detections[field.slice(DETECTION_PREFIX.length)] = toCount(value);
  }

  return {
    events_processed: toCount(hash[EVENTS_PROCESSED]),
    events_evaluated: toCount(hash[EVENTS_EVALUATED]),
    alerts_total: toCount(hash[ALERTS_TOTAL]),
    alerts_by_rule: byRule,
    alerts_by_severity: bySeverity,
    detections_by_rule: detections,
  };
}
