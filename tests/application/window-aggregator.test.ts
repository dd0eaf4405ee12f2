import { describe, it, expect, beforeEach } from 'vitest';
import { WindowAggregator } from '../../src/application/window-aggregator.js';

const WINDOW_MS = 10_000;

describe('WindowAggregator', () => {
  let agg: WindowAggregator;

  beforeEach(() => {
    agg = new WindowAggregator();
  });

  it('returns an empty aggregate for an unknown key', () => {
    expect(agg.aggregate('missing')).toEqual({
      count: 0, sum: null, avg: null, min: null, max: null, oldest: null, newest: null,
    });
  });

  it('counts entries inside the window', () => {
    agg.add('r:s', 0, null, WINDOW_MS);
    agg.add('r:s', 2_000, null, WINDOW_MS);
    const result = agg.add('r:s', 4_000, null, WINDOW_MS);

    expect(result).toEqual({ accepted: true, size: 3 });
    expect(agg.aggregate('r:s').count).toBe(3);
  });

  it('prunes entries older than newest - window', () => {
    agg.add('r:s', 0, null, WINDOW_MS);
    agg.add('r:s', 5_000, null, WINDOW_MS);
    agg.add('r:s', 12_000, null, WINDOW_MS);

    const aggregate = agg.aggregate('r:s');
    expect(aggregate.count).toBe(2);
    expect(aggregate.oldest).toBe(5_000);
    expect(aggregate.newest).toBe(12_000);
  });

  it('keeps an entry exactly at the cutoff', () => {
    agg.add('r:s', 0, null, WINDOW_MS);
    agg.add('r:s', 10_000, null, WINDOW_MS);

    expect(agg.size('r:s')).toBe(2);
  });

  it('rejects an entry already older than the window', () => {
    agg.add('r:s', 20_000, null, WINDOW_MS);
    const result = agg.add('r:s', 5_000, null, WINDOW_MS);

    expect(result).toEqual({ accepted: false, size: 1 });
  });

  it('accepts out-of-order entries still inside the window', () => {
    agg.add('r:s', 10_000, 1, WINDOW_MS);
    const result = agg.add('r:s', 5_000, 2, WINDOW_MS);

    expect(result.accepted).toBe(true);
    const aggregate = agg.aggregate('r:s');
    expect(aggregate.oldest).toBe(5_000);
    expect(aggregate.newest).toBe(10_000);
  });

  it('aggregates only numeric values but counts every entry', () => {
    agg.add('r:s', 0, null, WINDOW_MS);
    agg.add('r:s', 1_000, 4, WINDOW_MS);
    agg.add('r:s', 2_000, 6, WINDOW_MS);

    expect(agg.aggregate('r:s')).toEqual({
      count: 3, sum: 10, avg: 5, min: 4, max: 6, oldest: 0, newest: 2_000,
    });
  });

  it('reports null numeric aggregates when no entry carries a value', () => {
    agg.add('r:s', 0, null, WINDOW_MS);
    const aggregate = agg.aggregate('r:s');

    expect(aggregate.count).toBe(1);
    expect(aggregate.sum).toBeNull();
    expect(aggregate.avg).toBeNull();
  });

  it('keeps keys independent', () => {
    agg.add('r:a', 0, null, WINDOW_MS);
    agg.add('r:b', 0, null, WINDOW_MS);
    agg.add('r:b', 1_000, null, WINDOW_MS);

    expect(agg.size('r:a')).toBe(1);
    expect(agg.size('r:b')).toBe(2);
    expect(agg.size()).toBe(3);
  });

  it('sweep() drops keys whose newest entry left the window', () => {
    agg.add('r:old', 0, null, 1_000);
    agg.add('r:new', 5_000, null, 1_000);

    expect(agg.sweep(5_500)).toBe(1);
    expect(agg.keyCount).toBe(1);
    expect(agg.size('r:new')).toBe(1);
  });

  it('dropPrefix() removes every subject of a rule', () => {
    agg.add('r1:a', 0, null, WINDOW_MS);
    agg.add('r1:b', 0, null, WINDOW_MS);
    agg.add('r2:a', 0, null, WINDOW_MS);

    agg.dropPrefix('r1:');

    expect(agg.keyCount).toBe(1);
    expect(agg.size('r2:a')).toBe(1);
  });
});
