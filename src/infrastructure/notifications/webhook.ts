import type { BaseLogger } from 'pino';
import type { Alert } from '../../domain/index.js';
import type { AlertChannel } from '../../application/alert-dispatcher.js';
import type { NotificationConfig } from './config.js';

/**
 * Generic webhook channel: POSTs the alert as JSON.
 * Requests are aborted after `timeout_ms`.
 */
export function createWebhookChannel(config: NotificationConfig['webhook'], log: BaseLogger): AlertChannel {
  return {
    kind: 'webhook',
    async send(alert: Alert): Promise<void> {
      if (!config.url) {
        throw new Error('Webhook url is not configured');
      }

      const response = await fetch(config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(alert),
        signal: AbortSignal.timeout(config.timeout_ms),
      });

      if (!response.ok) {
        throw new Error(`Webhook returned ${response.status}`);
      }
      log.info({ alert_id: alert.alert_id, status: response.status }, 'Webhook notification sent');
    },
  };
}
