export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { createRedisClient } from './connection.js';
export { STREAM_KEY, GROUP_NAME, CONFIG_CHANNEL, ALERT_CHANNEL, HEALTH_KEY, STATS_KEY } from './keys.js';
export { enqueueEvent, enqueueEvents } from './event-producer.js';
export { publishConfigChange, createConfigNotifier } from './config-notifier.js';
export type { ConfigChangePayload } from './config-notifier.js';
export { publishAlertNotification, toAlert, alertNotificationSchema } from './alert-notifier.js';
export { startAlertSubscriber, parseAlertNotification } from './alert-subscriber.js';
export type { AlertHandler } from './alert-subscriber.js';
export { flushStats, readStats, resetStats, writeHeartbeat, readHeartbeat } from './stats-repository.js';
export type { WorkerHeartbeat } from './stats-repository.js';
