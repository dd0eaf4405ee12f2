import { describe, it, expect } from 'vitest';
import { validateEvent, validateBatch } from '../../src/application/event-intake.js';
import { T0 } from './helpers.js';

const FIXED_ID = '00000000-0000-4000-8000-000000000001';

const opts = {
  maxClockSkewSeconds: 300,
  nowFn: () => T0,
  idFn: () => FIXED_ID,
};

describe('validateEvent', () => {
  it('normalizes a valid event', () => {
    const result = validateEvent({
      subject_id: ' user-1 ',
      event_type: ' LOGIN ',
      timestamp: '2026-03-01T13:00:00+01:00',
    }, opts);

    expect(result).toEqual({
      ok: true,
      value: {
        event_id: FIXED_ID,
        subject_id: 'user-1',
        event_type: 'login',
        source: 'api',
        timestamp: '2026-03-01T12:00:00.000Z',
        payload: {},
        metadata: {},
      },
    });
  });

  it('keeps a supplied event_id', () => {
    const supplied = '11111111-2222-4333-8444-555555555555';
    const result = validateEvent({
      event_id: supplied,
      subject_id: 'user-1',
      event_type: 'login',
      timestamp: '2026-03-01T12:00:00Z',
    }, opts);

    expect(result.ok && result.value.event_id).toBe(supplied);
  });

  it('rejects a missing subject_id', () => {
    const result = validateEvent({ event_type: 'login', timestamp: '2026-03-01T12:00:00Z' }, opts);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues.map((issue) => issue.path)).toContainEqual(['subject_id']);
    }
  });

  it('rejects a timestamp without offset', () => {
    const result = validateEvent({
      subject_id: 'user-1',
      event_type: 'login',
      timestamp: '2026-03-01T12:00:00',
    }, opts);

    expect(result.ok).toBe(false);
  });

  it('accepts a timestamp exactly at the skew limit', () => {
    const result = validateEvent({
      subject_id: 'user-1',
      event_type: 'login',
      timestamp: '2026-03-01T12:05:00Z',
    }, opts);

    expect(result.ok).toBe(true);
  });

  it('rejects a timestamp too far in the future', () => {
    const result = validateEvent({
      subject_id: 'user-1',
      event_type: 'login',
      timestamp: '2026-03-01T12:05:01Z',
    }, opts);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]?.path).toEqual(['timestamp']);
      expect(result.issues[0]?.message).toBe('Timestamp is more than 300s in the future');
    }
  });

  it('accepts timestamps in the past', () => {
    const result = validateEvent({
      subject_id: 'user-1',
      event_type: 'login',
      timestamp: '2025-01-01T00:00:00Z',
    }, opts);

    expect(result.ok).toBe(true);
  });
});

describe('validateBatch', () => {
  const valid = { subject_id: 'user-1', event_type: 'login', timestamp: '2026-03-01T12:00:00Z' };

  it('assigns an id to every event', () => {
    let n = 0;
    const result = validateBatch([valid, valid], {
      ...opts,
      idFn: () => `00000000-0000-4000-8000-00000000000${++n}`,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((event) => event.event_id)).toEqual([
        '00000000-0000-4000-8000-000000000001',
        '00000000-0000-4000-8000-000000000002',
      ]);
    }
  });

  it('rejects an empty batch', () => {
    const result = validateBatch([], opts);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.message).toBe('Batch must contain at least one event');
    }
  });

  it('rejects a batch over 500 events', () => {
    const result = validateBatch(Array.from({ length: 501 }, () => valid), opts);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.message).toBe('Batch must contain at most 500 events');
    }
  });

  it('rejects the whole batch when one event is invalid', () => {
    const result = validateBatch([valid, { ...valid, subject_id: '' }], opts);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.path).toEqual([1, 'subject_id']);
    }
  });

  it('rejects a non-array body', () => {
    expect(validateBatch(valid, opts).ok).toBe(false);
  });
});
