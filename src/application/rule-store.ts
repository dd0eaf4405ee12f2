import type { RuleRow, SubjectRow } from '../infrastructure/db/index.js';

/**
 * Single-threaded atomic swap wrapper for the in-memory rule snapshot
 * used by the consumer loop and the monitoring ticker.
 *
 * The consumer calls `get()` on every event evaluation.
 * The hot-reload subscriber calls `set()` when rules change.
 *
 * `get()`/`set()` are synchronous, so there is no torn read: readers see
 * either the old snapshot or the new one, never a partial mix.
 */
export class RuleStore {
  private rules: readonly RuleRow[];

  constructor(initial: readonly RuleRow[] = []) {
    this.rules = initial;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly RuleRow[] {
    return this.rules;
  }

  /** Atomically replaces the snapshot. */
  set(next: readonly RuleRow[]): void {
    this.rules = next;
  }
}

/** Same swap semantics for registered subjects, indexed by id. */
export class SubjectDirectory {
  private subjects: ReadonlyMap<string, SubjectRow>;

  constructor(initial: readonly SubjectRow[] = []) {
    this.subjects = SubjectDirectory.index(initial);
  }

  get(subjectId: string): SubjectRow | undefined {
    return this.subjects.get(subjectId);
  }

  get size(): number {
    return this.subjects.size;
  }

  set(next: readonly SubjectRow[]): void {
    this.subjects = SubjectDirectory.index(next);
  }

  private static index(rows: readonly SubjectRow[]): ReadonlyMap<string, SubjectRow> {
    return new Map(rows.map((row) => [row.subject_id, row]));
  }
}
