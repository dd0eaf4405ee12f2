/** One observation inside a window. `value` is null when the event carried no usable number. */
export interface WindowEntry {
  readonly ts: number; // epoch ms, event time
  readonly value: number | null;
}

export interface WindowAggregate {
  /** All entries in the window, numeric or not. */
  readonly count: number;
  readonly sum: number | null;
  readonly avg: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly oldest: number | null;
  readonly newest: number | null;
}

export interface AddResult {
  /** False when the entry was already older than the window cutoff. */
  readonly accepted: boolean;
  readonly size: number;
}

interface KeyWindow {
  readonly entries: WindowEntry[];
  windowMs: number;
}

const EMPTY: WindowAggregate = {
  count: 0, sum: null, avg: null, min: null, max: null, oldest: null, newest: null,
};

/**
 * WindowAggregator — sliding event-time windows keyed by `<rule_id>:<subject_id>`.
 *
 * Entries are kept sorted by timestamp. Each `add()` prunes from the front
 * everything older than `newest - windowMs`, so a key never holds more than
 * the entries inside its window. Entries exactly at the cutoff stay.
 */
export class WindowAggregator {
  private readonly windows: Map<string, KeyWindow> = new Map();

  add(key: string, tsMs: number, value: number | null, windowMs: number): AddResult {
    let window = this.windows.get(key);
    if (window === undefined) {
      window = { entries: [], windowMs };
      this.windows.set(key, window);
    }
    window.windowMs = windowMs;
    const { entries } = window;

    const last = entries[entries.length - 1];
    const newest = last === undefined ? tsMs : Math.max(last.ts, tsMs);
    const cutoff = newest - windowMs;

    if (tsMs < cutoff) {
      return { accepted: false, size: entries.length };
    }

    // Insert after any entry with an equal timestamp (stable arrival order).
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = entries[mid];
      if (entry !== undefined && entry.ts <= tsMs) lo = mid + 1;
      else hi = mid;
    }
    entries.splice(lo, 0, { ts: tsMs, value });

    let pruneIndex = 0;
    while (pruneIndex < entries.length) {
      const entry = entries[pruneIndex];
      if (entry === undefined || entry.ts >= cutoff) break;
      pruneIndex++;
    }
    if (pruneIndex > 0) {
      entries.splice(0, pruneIndex);
    }

    return { accepted: true, size: entries.length };
  }

  aggregate(key: string): WindowAggregate {
    const window = this.windows.get(key);
    if (window === undefined || window.entries.length === 0) return EMPTY;

    const { entries } = window;
    let numeric = 0;
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const entry of entries) {
      if (entry.value === null || !Number.isFinite(entry.value)) continue;
      numeric++;
      sum += entry.value;
      if (entry.value < min) min = entry.value;
      if (entry.value > max) max = entry.value;
    }

    const first = entries[0];
    const last = entries[entries.length - 1];
    return {
      count: entries.length,
      sum: numeric > 0 ? sum : null,
      avg: numeric > 0 ? sum / numeric : null,
      min: numeric > 0 ? min : null,
      max: numeric > 0 ? max : null,
      oldest: first?.ts ?? null,
      newest: last?.ts ?? null,
    };
  }

  /** Drops keys whose newest entry fell out of its window. Returns the number dropped. */
  sweep(nowMs: number): number {
    let dropped = 0;
    for (const [key, window] of this.windows) {
      const last = window.entries[window.entries.length - 1];
      if (last === undefined || last.ts < nowMs - window.windowMs) {
        this.windows.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  /** Drops every key starting with `prefix` (all subjects of one rule). */
  dropPrefix(prefix: string): void {
    for (const key of this.windows.keys()) {
      if (key.startsWith(prefix)) this.windows.delete(key);
    }
  }

  /** Entries held for `key`, or across all keys when omitted. */
  size(key?: string): number {
    if (key !== undefined) return this.windows.get(key)?.entries.length ?? 0;
    let total = 0;
    for (const window of this.windows.values()) total += window.entries.length;
    return total;
  }

  get keyCount(): number {
    return this.windows.size;
  }
}
