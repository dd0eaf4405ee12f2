import type { Logger } from 'pino';
import { z } from 'zod';
import type { Database, RuleRow } from '../db/index.js';
import { findEnabledRules, findSubjects } from '../db/index.js';
import type { RuleStore, SubjectDirectory } from '../../application/rule-store.js';
import { createRedisClient } from '../redis/connection.js';
import { CONFIG_CHANNEL } from '../redis/keys.js';

const configChangeMessageSchema = z.object({
  kind: z.enum(['rule', 'subject']),
  reason: z.string().optional(),
  id: z.string().optional(),
});

export type ReloadKind = 'rule' | 'subject';

const ALL_KINDS: ReadonlySet<ReloadKind> = new Set<ReloadKind>(['rule', 'subject']);

export interface ReloadTargets {
  readonly ruleStore: RuleStore;
  readonly subjects: SubjectDirectory;
  /** Called after a rule snapshot swap, e.g. to drop stale engine state. */
  readonly onRulesReloaded?: (rules: readonly RuleRow[]) => void;
}

/**
 * Which snapshots a change message refers to. Anything unparseable
 * reloads both.
 */
export function parseConfigChange(rawMessage: string, log: Logger): ReadonlySet<ReloadKind> {
  let raw: unknown;
  try {
    raw = JSON.parse(rawMessage);
  } catch {
    log.debug({ rawMessage }, 'Non-JSON config change message, reloading everything');
    return ALL_KINDS;
  }
  const parsed = configChangeMessageSchema.safeParse(raw);
  if (!parsed.success) return ALL_KINDS;

  log.info(
    { kind: parsed.data.kind, reason: parsed.data.reason, id: parsed.data.id },
    'Config change detected',
  );
  return new Set<ReloadKind>([parsed.data.kind]);
}

/**
 * Reloads the requested snapshots from Postgres and swaps them in.
 *
 * Exported for unit testing; callers outside this module should use
 * `startConfigSubscriber()` instead.
 */
export async function reloadConfig(
  db: Database,
  log: Logger,
  targets: ReloadTargets,
  kinds: ReadonlySet<ReloadKind>,
): Promise<void> {
  try {
    if (kinds.has('rule')) {
      const rules = await findEnabledRules(db);
      targets.ruleStore.set(rules);
      targets.onRulesReloaded?.(rules);
      log.info(
        { ruleCount: rules.length, ruleIds: rules.map((r) => r.rule_id) },
        'Rules reloaded successfully',
      );
    }
    if (kinds.has('subject')) {
      const rows = await findSubjects(db);
      targets.subjects.set(rows);
      log.info({ subjectCount: rows.length }, 'Subjects reloaded successfully');
    }
  } catch (err: unknown) {
    log.error({ err }, 'Failed to reload configuration from database');
  }
}

/**
 * Serializes reloads. Kinds requested while a reload runs are collected
 * and reloaded once afterwards, so bursts collapse without losing a change.
 */
export function createReloadQueue(
  run: (kinds: ReadonlySet<ReloadKind>) => Promise<void>,
): (kinds: ReadonlySet<ReloadKind>) => Promise<void> {
  const pending = new Set<ReloadKind>();
  let running: Promise<void> | null = null;

  const drain = async (): Promise<void> => {
    while (pending.size > 0) {
      const batch = new Set(pending);
      pending.clear();
      await run(batch);
    }
    running = null;
  };

  return (kinds) => {
    for (const kind of kinds) pending.add(kind);
    if (running === null) running = drain();
    return running;
  };
}

/**
 * Subscribes to the "config_changed" Pub/Sub channel and reloads rules
 * or subjects from Postgres whenever a notification arrives.
 *
 * ioredis requires a dedicated connection for subscriptions: once a client
 * enters subscriber mode it cannot issue regular commands.
 *
 * The consumer loop keeps using the last snapshot while a reload runs;
 * the new snapshot is swapped in atomically.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startConfigSubscriber(
  redisUrl: string,
  db: Database,
  log: Logger,
  targets: ReloadTargets,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = createRedisClient(redisUrl);

  await sub.connect();
  log.info('Config subscriber Redis connection established');

  const reload = createReloadQueue((kinds) => reloadConfig(db, log, targets, kinds));

  sub.on('message', (channel: string, message: string) => {
    if (channel !== CONFIG_CHANNEL) return;
    if (signal.aborted) return;
    void reload(parseConfigChange(message, log));
  });

  await sub.subscribe(CONFIG_CHANNEL);
  log.info({ channel: CONFIG_CHANNEL }, 'Subscribed to config change notifications');

  return async () => {
    try {
      await sub.unsubscribe(CONFIG_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Config subscriber did not close cleanly');
    }
    log.info('Config subscriber disconnected');
  };
}
