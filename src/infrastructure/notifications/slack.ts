import type { BaseLogger } from 'pino';
import type { Alert } from '../../domain/index.js';
import type { AlertChannel } from '../../application/alert-dispatcher.js';
import type { NotificationConfig } from './config.js';

/** Slack message text for an alert. */
export function formatSlackText(alert: Alert): string {
  return `*[${alert.severity.toUpperCase()}]* ${alert.rule_name}\n>${alert.message}\nSubject: \`${alert.subject_id}\` | Triggered: ${alert.triggered_at}`;
}

/**
 * Slack incoming-webhook channel.
 *
 * POSTs a formatted JSON payload to the configured webhook URL.
 * A non-OK response rejects, so the dispatcher reports the failure.
 */
export function createSlackChannel(config: NotificationConfig['slack'], log: BaseLogger): AlertChannel {
  return {
    kind: 'slack',
    async send(alert: Alert): Promise<void> {
      if (!config.webhook_url) {
        throw new Error('Slack webhook_url is not configured');
      }

      const response = await fetch(config.webhook_url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: formatSlackText(alert) }),
      });

      if (!response.ok) {
        throw new Error(`Slack webhook returned ${response.status}`);
      }
      log.info({ alert_id: alert.alert_id, rule_id: alert.rule_id, severity: alert.severity }, 'Slack notification sent');
    },
  };
}
