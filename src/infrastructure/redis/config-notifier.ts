import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { ConfigChange, ConfigChangeNotifier } from '../../application/config-change.js';
import { CONFIG_CHANNEL } from './keys.js';

export interface ConfigChangePayload extends ConfigChange {
  readonly ts: string;
}

/**
 * Publishes a lightweight notification to the "config_changed" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated to the caller,
 * so CRUD HTTP responses are never affected by Pub/Sub issues.
 */
export async function publishConfigChange(redis: Redis, log: BaseLogger, change: ConfigChange): Promise<void> {
  try {
    const payload: ConfigChangePayload = { ts: new Date().toISOString(), ...change };
    await redis.publish(CONFIG_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: CONFIG_CHANNEL, ...change }, 'Published config change notification');
  } catch (err: unknown) {
    log.error({ err, ...change }, 'Failed to publish config change notification');
  }
}

export function createConfigNotifier(redis: Redis, log: BaseLogger): ConfigChangeNotifier {
  return (change) => publishConfigChange(redis, log, change);
}
