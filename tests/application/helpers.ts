import type { BehaviourEvent } from '../../src/domain/index.js';
import type { EngineRule, EngineSubject } from '../../src/application/rule-engine.js';
import { triggerConditionSchema } from '../../src/application/rule-schema.js';
import type { AlertRow, RuleRow, SubjectRow } from '../../src/infrastructure/db/index.js';

let counter = 0;

/** Fixed "now" for deterministic window and clock tests. Aligned to a minute. */
export const T0 = Date.parse('2026-03-01T12:00:00Z');

/** ISO string `seconds` after T0. */
export function at(seconds: number): string {
  return new Date(T0 + seconds * 1000).toISOString();
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<BehaviourEvent> = {}): BehaviourEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `evt-${counter}`,
    subject_id: overrides.subject_id ?? 'user-1',
    event_type: overrides.event_type ?? 'login',
    source: overrides.source ?? 'web',
    timestamp: overrides.timestamp ?? at(0),
    payload: overrides.payload ?? {},
    metadata: overrides.metadata ?? {},
  };
}

/**
 * Factory for rules. `condition` is parsed so trigger defaults
 * (empty filters, count metric) are applied like on the API path.
 */
export function makeRule(
  condition: Record<string, unknown>,
  overrides: Partial<Omit<EngineRule, 'condition'>> = {},
): EngineRule {
  return {
    rule_id: overrides.rule_id ?? 'rule-1',
    name: overrides.name ?? 'Test rule',
    enabled: overrides.enabled ?? true,
    severity: overrides.severity ?? 'warning',
    window_seconds: overrides.window_seconds ?? 60,
    cooldown_seconds: overrides.cooldown_seconds ?? 0,
    scope: overrides.scope ?? {},
    condition: triggerConditionSchema.parse(condition),
    updated_at: overrides.updated_at ?? new Date('2026-02-01T00:00:00Z'),
  };
}

export function makeSubject(overrides: Partial<EngineSubject> = {}): EngineSubject {
  return {
    subject_id: overrides.subject_id ?? 'user-1',
    subject_type: overrides.subject_type ?? 'user',
    profile: overrides.profile ?? 'default',
    active: overrides.active ?? true,
  };
}

// ─── persisted rows ──────────────────────────────────────────

export const RULE_ID = '11111111-2222-4333-8444-555555555555';
export const ALERT_ID = '99999999-8888-4777-8666-555555555555';

/** Minimal RuleRow factory for testing. */
export function fakeRuleRow(overrides: Partial<RuleRow> = {}): RuleRow {
  return {
    rule_id: overrides.rule_id ?? RULE_ID,
    name: overrides.name ?? 'High error rate',
    description: overrides.description ?? '',
    enabled: overrides.enabled ?? true,
    severity: overrides.severity ?? 'critical',
    window_seconds: overrides.window_seconds ?? 60,
    cooldown_seconds: overrides.cooldown_seconds ?? 300,
    scope: overrides.scope ?? {},
    condition: overrides.condition ?? triggerConditionSchema.parse({
      type: 'threshold',
      filters: { event_type: 'error' },
      operator: '>',
      value: 10,
    }),
    action: overrides.action ?? { type: 'notify' },
    created_at: overrides.created_at ?? new Date('2026-02-18T12:00:00Z'),
    updated_at: overrides.updated_at ?? new Date('2026-02-18T12:00:00Z'),
  };
}

export function fakeSubjectRow(overrides: Partial<SubjectRow> = {}): SubjectRow {
  return {
    subject_id: overrides.subject_id ?? 'user-1',
    subject_type: overrides.subject_type ?? 'user',
    display_name: overrides.display_name ?? 'Test User',
    profile: overrides.profile ?? 'default',
    channels: overrides.channels ?? [],
    active: overrides.active ?? true,
    created_at: overrides.created_at ?? new Date('2026-02-18T12:00:00Z'),
    updated_at: overrides.updated_at ?? new Date('2026-02-18T12:00:00Z'),
  };
}

export function fakeAlertRow(overrides: Partial<AlertRow> = {}): AlertRow {
  return {
    alert_id: overrides.alert_id ?? ALERT_ID,
    rule_id: overrides.rule_id ?? RULE_ID,
    rule_name: overrides.rule_name ?? 'High error rate',
    subject_id: overrides.subject_id ?? 'user-1',
    event_id: overrides.event_id ?? null,
    severity: overrides.severity ?? 'critical',
    message: overrides.message ?? 'Threshold rule "High error rate" triggered: count(11) > 10 within 60s',
    details: overrides.details ?? { trigger: 'threshold', count: 11 },
    channels: overrides.channels ?? null,
    status: overrides.status ?? 'open',
    triggered_at: overrides.triggered_at ?? new Date('2026-03-01T12:00:00Z'),
    acknowledged_at: overrides.acknowledged_at ?? null,
  };
}
