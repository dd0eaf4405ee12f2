import type { ChannelKind } from './subject.js';

/** Alert severities, ordered from least to most urgent. */
export const SEVERITIES = ['info', 'warning', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Numeric rank of a severity, for threshold comparisons. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export type AlertStatus = 'open' | 'acknowledged';

/**
 * A firing decision produced by the rule engine.
 *
 * `event_id` is null when the firing came from a clock tick
 * (inactivity, dwell) rather than from an incoming event.
 */
export interface RuleFiring {
  readonly rule_id: string;
  readonly rule_name: string;
  readonly subject_id: string;
  readonly event_id: string | null;
  readonly severity: Severity;
  readonly message: string;
  readonly triggered_at: string; // ISO-8601
  readonly details: Readonly<Record<string, unknown>>;
}

/**
 * A persisted firing. Immutable once created apart from acknowledgement.
 *
 * `channels === null` routes to the dispatcher's default channels.
 */
export interface Alert extends RuleFiring {
  readonly alert_id: string;
  readonly channels: readonly ChannelKind[] | null;
  readonly status: AlertStatus;
  readonly acknowledged_at: string | null;
}
