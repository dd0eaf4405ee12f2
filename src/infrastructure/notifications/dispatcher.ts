import type { BaseLogger } from 'pino';
import { AlertDispatcher, type AlertChannel } from '../../application/alert-dispatcher.js';
import type { AppConfig } from '../../config.js';
import type { NotificationConfig } from './config.js';
import { createSlackChannel } from './slack.js';
import { createWebhookChannel } from './webhook.js';
import { createEmailChannel } from './email.js';

/**
 * Builds the alert dispatcher from the loaded notification config:
 * the channel implementations plus per-channel routing settings.
 *
 * Slack and webhook are left out while their URL is empty, so the
 * dispatcher reports them as `not_configured`.
 */
export function createAlertDispatcher(
  config: NotificationConfig,
  smtp: AppConfig['smtp'],
  log: BaseLogger,
): AlertDispatcher {
  const channels: AlertChannel[] = [createEmailChannel(config.email, smtp, log)];
  if (config.slack.webhook_url) channels.push(createSlackChannel(config.slack, log));
  if (config.webhook.url) channels.push(createWebhookChannel(config.webhook, log));

  return new AlertDispatcher({
    channels,
    routing: {
      default_channels: config.routing.default_channels,
      channels: {
        slack: { enabled: config.slack.enabled, min_severity: config.slack.min_severity },
        webhook: { enabled: config.webhook.enabled, min_severity: config.webhook.min_severity },
        email: { enabled: config.email.enabled, min_severity: config.email.min_severity },
      },
    },
    log,
  });
}
