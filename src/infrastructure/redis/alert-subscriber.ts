import type { BaseLogger } from 'pino';
import type { Alert } from '../../domain/index.js';
import { createRedisClient } from './connection.js';
import { alertNotificationSchema } from './alert-notifier.js';
import { ALERT_CHANNEL } from './keys.js';

export type AlertHandler = (alert: Alert) => void;

/**
 * Parses one Pub/Sub message. Returns null for malformed payloads.
 */
export function parseAlertNotification(message: string): Alert | null {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    return null;
  }
  const parsed = alertNotificationSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Subscribes to the "alert_notifications" Pub/Sub channel in the API process.
 *
 * ioredis requires a dedicated connection for subscriber mode.
 * Malformed payloads are logged and skipped.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startAlertSubscriber(
  redisUrl: string,
  log: BaseLogger,
  handler: AlertHandler,
): Promise<() => Promise<void>> {
  const sub = createRedisClient(redisUrl);

  await sub.connect();
  log.info('Alert subscriber Redis connection established');

  sub.on('message', (channel: string, message: string) => {
    if (channel !== ALERT_CHANNEL) return;

    const alert = parseAlertNotification(message);
    if (alert === null) {
      log.warn({ message }, 'Malformed alert notification payload, skipping');
      return;
    }

    log.info(
      { alert_id: alert.alert_id, rule_id: alert.rule_id, severity: alert.severity },
      'Alert notification received',
    );
    handler(alert);
  });

  await sub.subscribe(ALERT_CHANNEL);
  log.info({ channel: ALERT_CHANNEL }, 'Subscribed to alert notifications');

  return async () => {
    try {
      await sub.unsubscribe(ALERT_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Alert subscriber did not close cleanly');
    }
    log.info('Alert subscriber disconnected');
  };
}
