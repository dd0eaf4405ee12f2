export { startConsumer, processEntry, parseStreamEntry, toStreamEntries } from './stream-consumer.js';
export type { ConsumerDeps } from './stream-consumer.js';
export { writeAlerts, resolveChannels } from './alert-writer.js';
export type { AlertWriterDeps } from './alert-writer.js';
export {
  startConfigSubscriber,
  reloadConfig,
  parseConfigChange,
  createReloadQueue,
} from './config-subscriber.js';
export type { ReloadKind, ReloadTargets } from './config-subscriber.js';
export { runTick, startMonitorTicker } from './monitor-ticker.js';
export type { TickerDeps } from './monitor-ticker.js';
export { purgeExpired, startRetentionSweeper } from './retention.js';
export type { PurgeResult } from './retention.js';
