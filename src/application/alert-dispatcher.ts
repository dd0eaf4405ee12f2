import { severityRank } from '../domain/index.js';
import type { Alert, ChannelKind, Severity } from '../domain/index.js';

/** A delivery target. Implementations live in infrastructure/notifications. */
export interface AlertChannel {
  readonly kind: ChannelKind;
  send(alert: Alert): Promise<void>;
}

export interface ChannelRouting {
  readonly enabled: boolean;
  readonly min_severity: Severity;
}

export interface DispatcherRouting {
  /** Used when an alert carries no channels of its own. */
  readonly default_channels: readonly ChannelKind[];
  readonly channels: Readonly<Record<ChannelKind, ChannelRouting>>;
}

export type SkipReason = 'disabled' | 'below_min_severity' | 'not_configured';

export interface DeliveryReport {
  readonly alert_id: string;
  readonly duplicate: boolean;
  readonly routed: ChannelKind[];
  readonly skipped: Array<{ channel: ChannelKind; reason: SkipReason }>;
  readonly failed: ChannelKind[];
}

/** Minimal logger interface accepted by AlertDispatcher. */
export type DispatcherLog = {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
};

export type AlertDispatcherOptions = Readonly<{
  channels: readonly AlertChannel[];
  routing: DispatcherRouting;
  log: DispatcherLog;
  /** Dedupe cache bounds. */
  dedupeMaxEntries?: number;
  dedupeTtlMs?: number;
  nowFn?: () => number;
}>;

const DEFAULT_DEDUPE_MAX_ENTRIES = 10_000;
const DEFAULT_DEDUPE_TTL_MS = 60 * 60 * 1000;

/**
 * AlertDispatcher — routes each alert to its channels at most once.
 *
 * Alerts are deduplicated by `alert_id` in a bounded TTL cache. Every
 * channel is invoked independently; a failing channel is logged and
 * reported without affecting the others.
 */
export class AlertDispatcher {
  private readonly channels: Map<ChannelKind, AlertChannel>;
  private readonly routing: DispatcherRouting;
  private readonly log: DispatcherLog;
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly nowFn: () => number;
  /** alert_id → expiry (ms). Insertion order doubles as age order. */
  private readonly seen: Map<string, number> = new Map();

  constructor(opts: AlertDispatcherOptions) {
    this.channels = new Map(opts.channels.map((channel) => [channel.kind, channel]));
    this.routing = opts.routing;
    this.log = opts.log;
    this.maxEntries = opts.dedupeMaxEntries ?? DEFAULT_DEDUPE_MAX_ENTRIES;
    this.ttlMs = opts.dedupeTtlMs ?? DEFAULT_DEDUPE_TTL_MS;
    this.nowFn = opts.nowFn ?? Date.now;
  }

  async dispatch(alert: Alert): Promise<DeliveryReport> {
    if (this.markSeen(alert.alert_id)) {
      this.log.info({ alert_id: alert.alert_id }, 'Duplicate alert notification ignored');
      return { alert_id: alert.alert_id, duplicate: true, routed: [], skipped: [], failed: [] };
    }

    const requested = alert.channels ?? this.routing.default_channels;
    const routed: AlertChannel[] = [];
    const skipped: Array<{ channel: ChannelKind; reason: SkipReason }> = [];

    for (const kind of new Set(requested)) {
      const settings = this.routing.channels[kind];
      const channel = this.channels.get(kind);
      if (!settings.enabled) {
        skipped.push({ channel: kind, reason: 'disabled' });
      } else if (severityRank(alert.severity) < severityRank(settings.min_severity)) {
        skipped.push({ channel: kind, reason: 'below_min_severity' });
      } else if (channel === undefined) {
        skipped.push({ channel: kind, reason: 'not_configured' });
      } else {
        routed.push(channel);
      }
    }

    const results = await Promise.allSettled(routed.map((channel) => channel.send(alert)));

    const failed: ChannelKind[] = [];
    results.forEach((result, i) => {
      const channel = routed[i];
      if (result.status === 'rejected' && channel !== undefined) {
        failed.push(channel.kind);
        this.log.warn({ err: result.reason, alert_id: alert.alert_id, channel: channel.kind }, 'Alert channel delivery failed');
      }
    });

    return {
      alert_id: alert.alert_id,
      duplicate: false,
      routed: routed.map((channel) => channel.kind),
      skipped,
      failed,
    };
  }

  /** Number of alert ids currently remembered. */
  get dedupeSize(): number {
    return this.seen.size;
  }

  /** Records `alertId`; returns true if it was already seen and not expired. */
  private markSeen(alertId: string): boolean {
    const now = this.nowFn();

    for (const [id, expiresAt] of this.seen) {
      if (expiresAt > now) break;
      this.seen.delete(id);
    }

    const expiresAt = this.seen.get(alertId);
    if (expiresAt !== undefined && expiresAt > now) return true;

    this.seen.set(alertId, now + this.ttlMs);
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done === true) break;
      this.seen.delete(oldest.value);
    }
    return false;
  }
}
