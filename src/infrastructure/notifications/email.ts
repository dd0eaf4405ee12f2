import type { BaseLogger } from 'pino';
import type { Alert } from '../../domain/index.js';
import type { AlertChannel } from '../../application/alert-dispatcher.js';
import type { AppConfig } from '../../config.js';
import type { NotificationConfig } from './config.js';

/**
 * Stub email channel.
 *
 * No SMTP delivery. Logs a structured message carrying the SMTP
 * settings and recipients the message would go to.
 */
export function createEmailChannel(
  config: NotificationConfig['email'],
  smtp: AppConfig['smtp'],
  log: BaseLogger,
): AlertChannel {
  return {
    kind: 'email',
    send(alert: Alert): Promise<void> {
      log.info(
        {
          recipients: config.recipients,
          smtp_host: smtp.host,
          smtp_port: smtp.port,
          from: smtp.from,
          alert_id: alert.alert_id,
          rule_id: alert.rule_id,
          subject_id: alert.subject_id,
          severity: alert.severity,
          message: alert.message,
          triggered_at: alert.triggered_at,
        },
        'Email notification (stub), SMTP not implemented',
      );
      return Promise.resolve();
    },
  };
}
