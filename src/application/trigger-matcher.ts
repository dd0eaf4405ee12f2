import type { BehaviourEvent } from '../domain/index.js';
import type { ComparisonOperator, Predicate, TriggerFilters } from './rule-schema.js';

export type PredicateValue = Predicate['value'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Same normalization intake applies to `event_type`. */
export function normalizeEventType(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Resolves a dotted path (`location.zone`) inside a payload.
 * Returns undefined when any segment is missing or not an object.
 */
export function readPath(payload: Readonly<Record<string, unknown>>, path: string): unknown {
  let current: unknown = payload;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/** Finite number at `path`, else null. */
export function readNumber(payload: Readonly<Record<string, unknown>>, path: string): number | null {
  const value = readPath(payload, path);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Compares `left operator right`.
 *
 * Ordering operators hold only between finite numbers. `==` / `!=` are
 * strict, and an absent value (undefined) never satisfies either.
 */
export function compare(left: unknown, operator: ComparisonOperator, right: PredicateValue): boolean {
  if (left === undefined) return false;
  if (operator === '==') return left === right;
  if (operator === '!=') return left !== right;

  if (typeof left !== 'number' || typeof right !== 'number' || !Number.isFinite(left)) return false;
  switch (operator) {
    case '>':  return left > right;
    case '>=': return left >= right;
    case '<':  return left < right;
    case '<=': return left <= right;
    default:   return false;
  }
}

export function matchesPredicate(payload: Readonly<Record<string, unknown>>, predicate: Predicate): boolean {
  return compare(readPath(payload, predicate.field), predicate.operator, predicate.value);
}

/**
 * Checks if an event matches a trigger's filters.
 * A missing filter field means "match all".
 */
export function matchesFilters(event: BehaviourEvent, filters: TriggerFilters | undefined): boolean {
  if (filters === undefined) return true;

  if (filters.event_type !== undefined) {
    const wanted = Array.isArray(filters.event_type) ? filters.event_type : [filters.event_type];
    if (!wanted.some((type) => normalizeEventType(type) === event.event_type)) return false;
  }
  if (filters.source !== undefined && event.source !== filters.source) return false;
  if (filters.where !== undefined) {
    for (const predicate of filters.where) {
      if (!matchesPredicate(event.payload, predicate)) return false;
    }
  }
  return true;
}
