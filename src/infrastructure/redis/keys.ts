/** Stream of validated events, appended by the API and consumed by workers. */
export const STREAM_KEY = 'events_stream';
/** Consumer group shared by all workers. */
export const GROUP_NAME = 'rule_evaluator';

/** Pub/Sub: rule or subject definitions changed. */
export const CONFIG_CHANNEL = 'config_changed';
/** Pub/Sub: persisted alerts awaiting dispatch. */
export const ALERT_CHANNEL = 'alert_notifications';

/** Worker heartbeat, written every tick with a TTL. */
export const HEALTH_KEY = 'worker:health';
/** Hash of monitoring counters. */
export const STATS_KEY = 'monitor:stats';
