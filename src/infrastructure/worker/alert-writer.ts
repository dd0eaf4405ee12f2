import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { ChannelKind, RuleFiring } from '../../domain/index.js';
import type { Database, RuleRow, SubjectRow } from '../db/index.js';
import { insertAlert } from '../db/index.js';
import { publishAlertNotification, toAlert } from '../redis/alert-notifier.js';
import type { RuleStore, SubjectDirectory } from '../../application/rule-store.js';
import type { StatsAccumulator } from '../../application/monitor-stats.js';

export interface AlertWriterDeps {
  readonly redis: Redis;
  readonly db: Database;
  readonly log: Logger;
  readonly ruleStore: RuleStore;
  readonly subjects: SubjectDirectory;
  readonly stats: StatsAccumulator;
}

/**
 * Channel routing for a firing: the rule's own channels, else the
 * subject's, else null (dispatcher defaults).
 */
export function resolveChannels(
  rule: RuleRow | undefined,
  subject: SubjectRow | undefined,
): readonly ChannelKind[] | null {
  if (rule?.action.channels !== undefined) return rule.action.channels;
  if (subject !== undefined && subject.channels.length > 0) return subject.channels;
  return null;
}

/**
 * Persists firings as alerts and publishes them for dispatch.
 *
 * Each firing has its own error boundary: a failed insert is logged and
 * the remaining firings are still written. Rules whose action is `record`
 * are persisted without a notification.
 *
 * Returns the number of alerts persisted.
 */
export async function writeAlerts(deps: AlertWriterDeps, firings: readonly RuleFiring[]): Promise<number> {
  if (firings.length === 0) return 0;

  const rulesById = new Map(deps.ruleStore.get().map((rule) => [rule.rule_id, rule]));
  let written = 0;

  for (const firing of firings) {
    deps.stats.recordFiring(firing);
    deps.log.warn(
      { rule_id: firing.rule_id, subject_id: firing.subject_id, severity: firing.severity, event_id: firing.event_id },
      `Alert triggered: [${firing.rule_name}] ${firing.message}`,
    );

    const rule = rulesById.get(firing.rule_id);
    const channels = resolveChannels(rule, deps.subjects.get(firing.subject_id));

    try {
      const row = await insertAlert(deps.db, firing, channels);
      written++;
      if (rule?.action.type === 'record') continue;
      await publishAlertNotification(deps.redis, deps.log, toAlert(row));
    } catch (err: unknown) {
      deps.log.error(
        { err, rule_id: firing.rule_id, subject_id: firing.subject_id },
        'Failed to persist alert',
      );
    }
  }

  return written;
}
