import { vi } from 'vitest';
import type { Redis } from 'ioredis';
import type { Database, RuleRow, SubjectRow } from '../../src/infrastructure/db/index.js';
import { RuleStore, SubjectDirectory } from '../../src/application/rule-store.js';
import { StatsAccumulator } from '../../src/application/monitor-stats.js';
import { RuleEngine } from '../../src/application/rule-engine.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/**
 * In-process Redis stand-in covering the commands the worker issues.
 * `pipelineCalls` records pipeline/transaction commands in order; `exec`
 * resolves every pipeline and transaction.
 */
export function fakeRedis() {
  const pipelineCalls: Array<[string, ...unknown[]]> = [];
  const exec = vi.fn().mockResolvedValue([]);
  const batch = () => {
    const chain = {
      hincrby: (...args: unknown[]) => { pipelineCalls.push(['hincrby', ...args]); return chain; },
      xadd: (...args: unknown[]) => { pipelineCalls.push(['xadd', ...args]); return chain; },
      exec,
    };
    return chain;
  };

  const mocks = {
    xgroup: vi.fn().mockResolvedValue('OK'),
    xreadgroup: vi.fn().mockResolvedValue(null),
    xack: vi.fn().mockResolvedValue(1),
    xadd: vi.fn().mockResolvedValue('1700000000000-0'),
    publish: vi.fn().mockResolvedValue(1),
    set: vi.fn().mockResolvedValue('OK'),
    get: vi.fn().mockResolvedValue(null),
    del: vi.fn().mockResolvedValue(1),
    hgetall: vi.fn().mockResolvedValue({}),
    pipeline: vi.fn(batch),
    multi: vi.fn(batch),
  };

  return { mocks, pipelineCalls, exec, redis: mocks as unknown as Redis };
}

/**
 * Worker dependencies around a fake Redis, an empty db handle (repository
 * calls are module-mocked) and real in-memory stores.
 */
export function workerDeps(rules: readonly RuleRow[] = [], subjects: readonly SubjectRow[] = []) {
  const fake = fakeRedis();
  const log = fakeLogger();
  const deps = {
    redis: fake.redis,
    db: {} as Database,
    log,
    ruleStore: new RuleStore(rules),
    subjects: new SubjectDirectory(subjects),
    stats: new StatsAccumulator(),
    engine: new RuleEngine(),
  };
  return { ...fake, log, deps };
}
