export { redisPlugin, enqueueEvent, enqueueEvents, createConfigNotifier } from './redis/index.js';
export { readStats, resetStats, readHeartbeat, startAlertSubscriber } from './redis/index.js';
export { createDbClient, ensureSchema, dbPlugin } from './db/index.js';
export type { Database, SqlClient, RuleRow, SubjectRow, AlertRow, EventRow } from './db/index.js';
export { startConsumer, startConfigSubscriber, startMonitorTicker, startRetentionSweeper } from './worker/index.js';
export { loadNotificationConfig, createAlertDispatcher } from './notifications/index.js';
