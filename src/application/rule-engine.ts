import type { BehaviourEvent, RuleFiring, Severity, SubjectType } from '../domain/index.js';
import type { RuleScope, TriggerCondition } from './rule-schema.js';
import { WindowAggregator } from './window-aggregator.js';
import { StatisticalEvaluator, type StatisticalEvaluatorLog } from './statistical-evaluator.js';
import { compare, matchesFilters, matchesPredicate, readNumber, readPath } from './trigger-matcher.js';

/** Rule fields the engine reads. Satisfied by a `rules` row. */
export interface EngineRule {
  readonly rule_id: string;
  readonly name: string;
  readonly enabled: boolean;
  readonly severity: Severity;
  readonly window_seconds: number;
  readonly cooldown_seconds: number;
  readonly scope: RuleScope;
  readonly condition: TriggerCondition;
  readonly updated_at: Date;
}

/** Subject fields the engine reads. Satisfied by a `subjects` row. */
export interface EngineSubject {
  readonly subject_id: string;
  readonly subject_type: SubjectType;
  readonly profile: string;
  readonly active: boolean;
}

export type SubjectLookup = (subjectId: string) => EngineSubject | undefined;

export type RuleEngineOptions = Readonly<{
  /** Engine clock (epoch ms) for cooldowns and `triggered_at`. */
  nowFn?: () => number;
  /** z-score threshold for zscore triggers that set none. */
  defaultZThreshold?: number;
  /** Called each time a rule's condition is met, whether or not cooldown lets it fire. */
  onDetection?: (ruleId: string, subjectId: string) => void;
  log?: StatisticalEvaluatorLog;
}>;

interface Streak {
  count: number;
  lastTs: number;
}

interface Activity {
  lastActivityMs: number;
  alerted: boolean;
}

interface Dwell {
  enteredAt: number;
}

interface RuleState {
  readonly version: number;
  readonly streaks: Map<string, Streak>;
  readonly activity: Map<string, Activity>;
  readonly dwell: Map<string, Dwell>;
  /** subject_id → last firing (engine clock, ms). */
  readonly lastFired: Map<string, number>;
}

interface Candidate {
  readonly message: string;
  readonly details: Record<string, unknown>;
  readonly onFired?: () => void;
}

/**
 * True when the rule applies to the subject.
 *
 * An empty scope matches every subject, registered or not. Any set field
 * restricts the rule to registered subjects satisfying all set fields.
 */
export function scopeMatches(scope: RuleScope, subjectId: string, subject: EngineSubject | undefined): boolean {
  const constrained =
    scope.subject_type !== undefined || scope.profile !== undefined || scope.subject_ids !== undefined;
  if (!constrained) return true;
  if (subject === undefined) return false;
  if (scope.subject_type !== undefined && subject.subject_type !== scope.subject_type) return false;
  if (scope.profile !== undefined && subject.profile !== scope.profile) return false;
  if (scope.subject_ids !== undefined && !scope.subject_ids.includes(subjectId)) return false;
  return true;
}

function stateKey(ruleId: string, subjectId: string): string {
  return `${ruleId}:${subjectId}`;
}

/**
 * RuleEngine — evaluates events and clock ticks against rules.
 *
 * State is kept per rule × subject: sliding windows (threshold, aggregate),
 * z-score buckets, consecutive streaks, last activity and zone entry times.
 * A rule fires at most once per `cooldown_seconds` per subject.
 *
 * Pure: no I/O. Callers persist and publish the returned firings.
 */
export class RuleEngine {
  private readonly aggregator = new WindowAggregator();
  private readonly statistics: StatisticalEvaluator;
  private readonly states: Map<string, RuleState> = new Map();
  private readonly nowFn: () => number;
  private readonly defaultZThreshold: number;
  private readonly log: StatisticalEvaluatorLog | undefined;
  private readonly onDetection: ((ruleId: string, subjectId: string) => void) | undefined;

  constructor(opts: RuleEngineOptions = {}) {
    this.nowFn = opts.nowFn ?? Date.now;
    this.defaultZThreshold = opts.defaultZThreshold ?? 3;
    this.onDetection = opts.onDetection;
    this.log = opts.log;
    this.statistics = new StatisticalEvaluator(opts.log);
  }

  /**
   * Evaluate one event against every enabled rule whose scope matches the
   * subject and whose filters match the event.
   *
   * Events of inactive subjects are ignored.
   */
  evaluate(event: BehaviourEvent, rules: readonly EngineRule[], subject?: EngineSubject): RuleFiring[] {
    const firings: RuleFiring[] = [];
    if (subject !== undefined && !subject.active) return firings;

    const tsMs = Date.parse(event.timestamp);
    if (!Number.isFinite(tsMs)) return firings;

    for (const rule of rules) {
      if (!rule.enabled) continue;
      if (!scopeMatches(rule.scope, event.subject_id, subject)) continue;
      if (!matchesFilters(event, rule.condition.filters)) continue;

      const state = this.stateFor(rule);
      const candidate = this.observe(rule, state, event, tsMs);
      if (candidate === null) continue;

      const firing = this.tryFire(rule, state, event.subject_id, event.event_id, candidate);
      if (firing !== null) firings.push(firing);
    }

    return firings;
  }

  /**
   * Evaluate time-based triggers (inactivity, dwell) at `nowMs` and sweep
   * idle window state. `lookup`, when given, re-checks scope and activity
   * of each tracked subject.
   */
  tick(nowMs: number, rules: readonly EngineRule[], lookup?: SubjectLookup): RuleFiring[] {
    const firings: RuleFiring[] = [];

    for (const rule of rules) {
      if (!rule.enabled) continue;
      const { condition } = rule;
      if (condition.type !== 'inactivity' && condition.type !== 'dwell') continue;

      const state = this.stateFor(rule);
      const windowMs = rule.window_seconds * 1000;

      if (condition.type === 'inactivity') {
        for (const [subjectId, activity] of state.activity) {
          if (activity.alerted) continue;
          if (!this.eligible(rule, subjectId, lookup)) continue;
          const idleMs = nowMs - activity.lastActivityMs;
          if (idleMs <= windowMs) continue;

          const firing = this.tryFire(rule, state, subjectId, null, {
            message: `Inactivity rule "${rule.name}" triggered: ${subjectId} inactive for ${Math.floor(idleMs / 1000)}s (> ${rule.window_seconds}s)`,
            details: {
              idle_seconds: Math.floor(idleMs / 1000),
              window_seconds: rule.window_seconds,
              last_activity_at: new Date(activity.lastActivityMs).toISOString(),
            },
            onFired: () => { activity.alerted = true; },
          });
          if (firing !== null) firings.push(firing);
        }
      } else {
        for (const [subjectId, dwell] of state.dwell) {
          if (!this.eligible(rule, subjectId, lookup)) continue;
          const candidate = this.dwellCandidate(rule, subjectId, dwell, nowMs);
          if (candidate === null) continue;
          const firing = this.tryFire(rule, state, subjectId, null, candidate);
          if (firing !== null) firings.push(firing);
        }
      }
    }

    this.sweep(nowMs, rules);
    return firings;
  }

  /**
   * Drops state of rules that disappeared, were disabled, or whose
   * definition changed (`updated_at` differs).
   */
  syncRules(rules: readonly EngineRule[]): void {
    const live = new Map<string, number>();
    for (const rule of rules) {
      if (rule.enabled) live.set(rule.rule_id, rule.updated_at.getTime());
    }
    for (const [ruleId, state] of this.states) {
      if (live.get(ruleId) !== state.version) this.dropRule(ruleId);
    }
  }

  /** For testing and status — tracked state sizes. */
  get stateSize(): {
    rules: number;
    windowKeys: number;
    windowEntries: number;
    zscoreKeys: number;
    cooldownKeys: number;
    dwellKeys: number;
  } {
    let cooldownKeys = 0;
    let dwellKeys = 0;
    for (const state of this.states.values()) {
      cooldownKeys += state.lastFired.size;
      dwellKeys += state.dwell.size;
    }
    return {
      rules: this.states.size,
      windowKeys: this.aggregator.keyCount,
      windowEntries: this.aggregator.size(),
      zscoreKeys: this.statistics.keyCount,
      cooldownKeys,
      dwellKeys,
    };
  }

  // ----- helpers -----

  private stateFor(rule: EngineRule): RuleState {
    const version = rule.updated_at.getTime();
    const existing = this.states.get(rule.rule_id);
    if (existing !== undefined && existing.version === version) return existing;
    if (existing !== undefined) this.dropRule(rule.rule_id);

    const state: RuleState = {
      version,
      streaks: new Map(),
      activity: new Map(),
      dwell: new Map(),
      lastFired: new Map(),
    };
    this.states.set(rule.rule_id, state);
    return state;
  }

  private dropRule(ruleId: string): void {
    this.states.delete(ruleId);
    this.aggregator.dropPrefix(`${ruleId}:`);
    this.statistics.dropPrefix(`${ruleId}:`);
  }

  private eligible(rule: EngineRule, subjectId: string, lookup: SubjectLookup | undefined): boolean {
    if (lookup === undefined) return true;
    const subject = lookup(subjectId);
    if (subject !== undefined && !subject.active) return false;
    return scopeMatches(rule.scope, subjectId, subject);
  }

  /** Updates the rule's state with a matching event and returns a candidate firing, if any. */
  private observe(rule: EngineRule, state: RuleState, event: BehaviourEvent, tsMs: number): Candidate | null {
    const { condition } = rule;
    const subjectId = event.subject_id;
    const key = stateKey(rule.rule_id, subjectId);
    const windowMs = rule.window_seconds * 1000;

    switch (condition.type) {
      case 'threshold': {
        const added = this.aggregator.add(key, tsMs, null, windowMs);
        if (!added.accepted) return null;
        const { count } = this.aggregator.aggregate(key);
        if (!compare(count, condition.operator, condition.value)) return null;
        return {
          message: `Threshold rule "${rule.name}" triggered: count(${count}) ${condition.operator} ${condition.value} within ${rule.window_seconds}s`,
          details: { count, operator: condition.operator, value: condition.value, window_seconds: rule.window_seconds },
        };
      }

      case 'aggregate': {
        const added = this.aggregator.add(key, tsMs, readNumber(event.payload, condition.field), windowMs);
        if (!added.accepted) return null;
        const aggregate = this.aggregator.aggregate(key);
        const observed = aggregate[condition.metric];
        if (observed === null) return null;
        if (!compare(observed, condition.operator, condition.value)) return null;
        return {
          message: `Aggregate rule "${rule.name}" triggered: ${condition.metric}(${condition.field})=${observed} ${condition.operator} ${condition.value}`,
          details: {
            metric: condition.metric,
            field: condition.field,
            observed,
            count: aggregate.count,
            operator: condition.operator,
            value: condition.value,
            window_seconds: rule.window_seconds,
          },
        };
      }

      case 'consecutive': {
        let streak = state.streaks.get(subjectId);
        if (streak === undefined) {
          streak = { count: 0, lastTs: tsMs };
          state.streaks.set(subjectId, streak);
        } else if (tsMs - streak.lastTs > windowMs) {
          streak.count = 0;
        }
        const observed = readPath(event.payload, condition.field);
        streak.count = compare(observed, condition.operator, condition.value) ? streak.count + 1 : 0;
        streak.lastTs = Math.max(streak.lastTs, tsMs);
        if (streak.count < condition.count) return null;

        // A completed streak restarts even when cooldown suppresses the firing.
        const completed = streak.count;
        streak.count = 0;
        return {
          message: `Consecutive rule "${rule.name}" triggered: ${completed} events in a row with ${condition.field} ${condition.operator} ${String(condition.value)}`,
          details: {
            streak: completed,
            required: condition.count,
            field: condition.field,
            last_value: observed,
          },
        };
      }

      case 'inactivity': {
        // First sighting starts the clock even without activity.
        const active = condition.activity === undefined || matchesPredicate(event.payload, condition.activity);
        const activity = state.activity.get(subjectId);
        if (activity === undefined) {
          state.activity.set(subjectId, { lastActivityMs: tsMs, alerted: false });
        } else if (active) {
          activity.lastActivityMs = Math.max(activity.lastActivityMs, tsMs);
          activity.alerted = false;
        }
        return null;
      }

      case 'dwell': {
        // Only subjects currently in the zone are tracked.
        if (readPath(event.payload, condition.field) !== condition.equals) {
          state.dwell.delete(subjectId);
          return null;
        }
        const dwell = state.dwell.get(subjectId);
        if (dwell === undefined) {
          state.dwell.set(subjectId, { enteredAt: tsMs });
          return null;
        }
        return this.dwellCandidate(rule, subjectId, dwell, tsMs);
      }

      case 'zscore': {
        const sample = this.statistics.record(key, tsMs, rule.window_seconds, condition.baseline_buckets);
        if (sample === null) return null;
        const threshold = condition.z_threshold ?? this.defaultZThreshold;
        this.log?.debug(
          { rule_id: rule.rule_id, subject_id: subjectId, z: sample.z, threshold, willFire: sample.z >= threshold },
          'StatEval: z-score computed',
        );
        if (sample.z < threshold) return null;
        return {
          message: `Z-score rule "${rule.name}" triggered: z=${sample.z}, current=${sample.currentCount}, mean=${sample.mean}, stddev=${sample.stddev}`,
          details: {
            z: sample.z,
            z_threshold: threshold,
            current_count: sample.currentCount,
            mean: sample.mean,
            stddev: sample.stddev,
            bucket_start: new Date(sample.bucketStart).toISOString(),
            bucket_seconds: rule.window_seconds,
            baseline_buckets: condition.baseline_buckets,
          },
        };
      }
    }
  }

  /** Fires once the subject has been in the zone for longer than the window; entry time then restarts. */
  private dwellCandidate(rule: EngineRule, subjectId: string, dwell: Dwell, atMs: number): Candidate | null {
    const dwellMs = atMs - dwell.enteredAt;
    if (dwellMs <= rule.window_seconds * 1000) return null;
    const enteredAt = dwell.enteredAt;
    return {
      message: `Dwell rule "${rule.name}" triggered: ${subjectId} in zone for ${Math.floor(dwellMs / 1000)}s (> ${rule.window_seconds}s)`,
      details: {
        dwell_seconds: Math.floor(dwellMs / 1000),
        window_seconds: rule.window_seconds,
        entered_at: new Date(enteredAt).toISOString(),
      },
      onFired: () => { dwell.enteredAt = atMs; },
    };
  }

  private tryFire(
    rule: EngineRule,
    state: RuleState,
    subjectId: string,
    eventId: string | null,
    candidate: Candidate,
  ): RuleFiring | null {
    const now = this.nowFn();
    const cooldownMs = rule.cooldown_seconds * 1000;
    const last = state.lastFired.get(subjectId);
    this.onDetection?.(rule.rule_id, subjectId);
    if (cooldownMs > 0 && last !== undefined && now - last < cooldownMs) {
      this.log?.debug(
        { rule_id: rule.rule_id, subject_id: subjectId, cooldownRemainingMs: cooldownMs - (now - last) },
        'RuleEngine: skipped — within cooldown window',
      );
      return null;
    }

    state.lastFired.set(subjectId, now);
    candidate.onFired?.();

    return {
      rule_id: rule.rule_id,
      rule_name: rule.name,
      subject_id: subjectId,
      event_id: eventId,
      severity: rule.severity,
      message: candidate.message,
      triggered_at: new Date(now).toISOString(),
      details: { trigger: rule.condition.type, ...candidate.details },
    };
  }

  private sweep(nowMs: number, rules: readonly EngineRule[]): void {
    this.aggregator.sweep(nowMs);
    this.statistics.sweep(nowMs);

    for (const rule of rules) {
      const state = this.states.get(rule.rule_id);
      if (state === undefined) continue;
      const windowMs = rule.window_seconds * 1000;
      const cooldownMs = rule.cooldown_seconds * 1000;
      for (const [subjectId, streak] of state.streaks) {
        if (nowMs - streak.lastTs > windowMs) state.streaks.delete(subjectId);
      }
      for (const [subjectId, firedAt] of state.lastFired) {
        if (nowMs - firedAt >= cooldownMs) state.lastFired.delete(subjectId);
      }
    }
  }
}
