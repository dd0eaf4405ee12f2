import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAlertDispatcher } from '../../src/infrastructure/notifications/dispatcher.js';
import { DEFAULT_CONFIG } from '../../src/infrastructure/notifications/config.js';
import type { NotificationConfig } from '../../src/infrastructure/notifications/config.js';
import type { Alert } from '../../src/domain/index.js';
import { fakeLogger } from './helpers.js';

const smtp = { host: '', port: 587, user: '', from: 'monitor@localhost' };

function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    alert_id: 'a-001',
    rule_id: 'r-001',
    rule_name: 'Failed logins',
    subject_id: 'user-1',
    event_id: 'evt-1',
    severity: 'warning',
    message: 'Too many failed logins',
    triggered_at: '2026-03-01T12:00:00.000Z',
    details: {},
    channels: null,
    status: 'open',
    acknowledged_at: null,
    ...overrides,
  };
}

const config: NotificationConfig = {
  routing: { default_channels: ['slack', 'email'] },
  slack: { enabled: true, min_severity: 'warning', webhook_url: 'https://hooks.slack.com/test' },
  webhook: { enabled: false, min_severity: 'info', url: 'https://hooks.example.com/alerts', timeout_ms: 1000 },
  email: { enabled: true, min_severity: 'critical', recipients: ['ops@example.com'] },
};

describe('createAlertDispatcher', () => {
  let log: ReturnType<typeof fakeLogger>;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    log = fakeLogger();
    mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('routes to default channels filtered by min severity', async () => {
    const report = await createAlertDispatcher(config, smtp, log).dispatch(makeAlert());

    expect(report).toEqual({
      alert_id: 'a-001',
      duplicate: false,
      routed: ['slack'],
      skipped: [{ channel: 'email', reason: 'below_min_severity' }],
      failed: [],
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('uses the channels carried by the alert', async () => {
    const report = await createAlertDispatcher(config, smtp, log).dispatch(
      makeAlert({ severity: 'critical', channels: ['webhook', 'email'] }),
    );

    expect(report.routed).toEqual(['email']);
    expect(report.skipped).toEqual([{ channel: 'webhook', reason: 'disabled' }]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports channels without a URL as not configured', async () => {
    const noUrls: NotificationConfig = {
      ...config,
      slack: { ...config.slack, webhook_url: '' },
      webhook: { ...config.webhook, enabled: true, url: '' },
    };

    const report = await createAlertDispatcher(noUrls, smtp, log).dispatch(
      makeAlert({ severity: 'critical', channels: ['slack', 'webhook', 'email'] }),
    );

    expect(report).toEqual({
      alert_id: 'a-001',
      duplicate: false,
      routed: ['email'],
      skipped: [
        { channel: 'slack', reason: 'not_configured' },
        { channel: 'webhook', reason: 'not_configured' },
      ],
      failed: [],
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports a failing channel without blocking the others', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 500 });

    const report = await createAlertDispatcher(config, smtp, log).dispatch(makeAlert({ severity: 'critical' }));

    expect(report.routed).toEqual(['slack', 'email']);
    expect(report.failed).toEqual(['slack']);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ alert_id: 'a-001', channel: 'slack' }),
      'Alert channel delivery failed',
    );
  });

  it('ignores a repeated alert id', async () => {
    const dispatcher = createAlertDispatcher(config, smtp, log);
    await dispatcher.dispatch(makeAlert());
    const second = await dispatcher.dispatch(makeAlert());

    expect(second.duplicate).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('skips everything under the default config', async () => {
    const report = await createAlertDispatcher(DEFAULT_CONFIG, smtp, log).dispatch(makeAlert({ severity: 'critical' }));

    expect(report.routed).toEqual([]);
    expect(report.skipped).toEqual([{ channel: 'email', reason: 'disabled' }]);
  });
});
