import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CHANNEL_KINDS, SEVERITIES } from '../../domain/index.js';
import type { Alert } from '../../domain/index.js';
import type { AlertRow } from '../db/index.js';
import { ALERT_CHANNEL } from './keys.js';

/** Wire shape of an alert on the "alert_notifications" channel. */
export const alertNotificationSchema = z.object({
  alert_id: z.string().min(1),
  rule_id: z.string().min(1),
  rule_name: z.string(),
  subject_id: z.string().min(1),
  event_id: z.string().nullable(),
  severity: z.enum(SEVERITIES),
  message: z.string(),
  triggered_at: z.string(),
  details: z.record(z.string(), z.unknown()),
  channels: z.array(z.enum(CHANNEL_KINDS)).nullable(),
  status: z.enum(['open', 'acknowledged']),
  acknowledged_at: z.string().nullable(),
});

/** Converts a persisted row to the wire/domain shape. */
export function toAlert(row: AlertRow): Alert {
  return {
    alert_id: row.alert_id,
    rule_id: row.rule_id,
    rule_name: row.rule_name,
    subject_id: row.subject_id,
    event_id: row.event_id,
    severity: row.severity,
    message: row.message,
    triggered_at: row.triggered_at.toISOString(),
    details: row.details,
    channels: row.channels,
    status: row.status,
    acknowledged_at: row.acknowledged_at === null ? null : row.acknowledged_at.toISOString(),
  };
}

/**
 * Publishes an alert to the "alert_notifications" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never block alert persistence.
 */
export async function publishAlertNotification(redis: Redis, log: Logger, alert: Alert): Promise<void> {
  try {
    await redis.publish(ALERT_CHANNEL, JSON.stringify(alert));
    log.debug(
      { channel: ALERT_CHANNEL, alert_id: alert.alert_id, rule_id: alert.rule_id },
      'Publishing alert notification',
    );
  } catch (err: unknown) {
    log.warn({ err, alert_id: alert.alert_id }, 'Failed to publish alert notification');
  }
}
