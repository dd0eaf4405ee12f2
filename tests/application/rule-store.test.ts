import { describe, it, expect } from 'vitest';
import { RuleStore, SubjectDirectory } from '../../src/application/rule-store.js';
import { fakeRuleRow, fakeSubjectRow } from './helpers.js';

describe('RuleStore', () => {
  it('initialises with empty array by default', () => {
    const store = new RuleStore();
    expect(store.get()).toEqual([]);
  });

  it('set() replaces the snapshot atomically', () => {
    const store = new RuleStore([fakeRuleRow({ rule_id: 'old' })]);
    const next = [fakeRuleRow({ rule_id: 'new-1' }), fakeRuleRow({ rule_id: 'new-2' })];
    store.set(next);
    expect(store.get()).toHaveLength(2);
    expect(store.get()[0]?.rule_id).toBe('new-1');
  });

  it('get() returns the same reference (no defensive copy)', () => {
    const rules = [fakeRuleRow()];
    const store = new RuleStore(rules);
    expect(store.get()).toBe(rules);
  });

  it('a reader holding the old snapshot is unaffected by set()', () => {
    const store = new RuleStore([fakeRuleRow({ rule_id: 'v1' })]);
    const snapshot = store.get();
    store.set([]);
    expect(snapshot).toHaveLength(1);
    expect(store.get()).toHaveLength(0);
  });
});

describe('SubjectDirectory', () => {
  it('indexes subjects by id', () => {
    const directory = new SubjectDirectory([
      fakeSubjectRow({ subject_id: 'a' }),
      fakeSubjectRow({ subject_id: 'b', subject_type: 'device' }),
    ]);

    expect(directory.size).toBe(2);
    expect(directory.get('b')?.subject_type).toBe('device');
    expect(directory.get('c')).toBeUndefined();
  });

  it('set() swaps the whole index', () => {
    const directory = new SubjectDirectory([fakeSubjectRow({ subject_id: 'a' })]);
    directory.set([fakeSubjectRow({ subject_id: 'z' })]);

    expect(directory.get('a')).toBeUndefined();
    expect(directory.get('z')?.subject_id).toBe('z');
  });
});
