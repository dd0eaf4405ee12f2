export { loadNotificationConfig, parseSimpleYaml, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { createSlackChannel, formatSlackText } from './slack.js';
export { createWebhookChannel } from './webhook.js';
export { createEmailChannel } from './email.js';
export { createAlertDispatcher } from './dispatcher.js';
