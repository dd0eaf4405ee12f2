import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { CHANNEL_KINDS, SEVERITIES } from '../../domain/index.js';
import type { ChannelKind, Severity } from '../../domain/index.js';

interface ChannelBase {
  enabled: boolean;
  /** Alerts below this severity are not routed to the channel. */
  min_severity: Severity;
}

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  routing: { default_channels: ChannelKind[] };
  slack: ChannelBase & { webhook_url: string };
  webhook: ChannelBase & { url: string; timeout_ms: number };
  email: ChannelBase & { recipients: string[] };
}

/**
 * Default configuration: every channel disabled, email as the default route.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  routing: { default_channels: ['email'] },
  slack: { enabled: false, min_severity: 'info', webhook_url: '' },
  webhook: { enabled: false, min_severity: 'info', url: '', timeout_ms: 5000 },
  email: { enabled: false, min_severity: 'info', recipients: [] },
};

type YamlValue = string | number | boolean | string[];

function parseScalar(raw: string): YamlValue {
  const value = raw.trim();
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === '[]') return [];
  if (value.startsWith('[') && value.endsWith(']')) {
    return value.slice(1, -1).split(',').map(unquote).filter((item) => item !== '');
  }
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return unquote(value);
}

function unquote(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2 && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Minimal YAML parser for the two-level notification config structure.
 *
 * Handles only the subset of YAML used in config/notifications.yaml:
 * top-level sections with indented scalars, inline lists (`[a, b]`) and
 * block lists (`- item`) under a key with no inline value.
 * Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, YamlValue>> {
  const result: Record<string, Record<string, YamlValue>> = {};
  let section: Record<string, YamlValue> | undefined;
  let listKey: string | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\s+#.*$/, '').trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const indented = line.startsWith(' ') || line.startsWith('\t');
    const trimmed = line.trim();

    // Top-level key (no leading whitespace)
    if (!indented) {
      const name = trimmed.split(':')[0]?.trim() ?? '';
      section = {};
      result[name] = section;
      listKey = undefined;
      continue;
    }
    if (section === undefined) continue;

    // Block list item under the last empty key
    if (trimmed.startsWith('- ')) {
      if (listKey === undefined) continue;
      const current = section[listKey];
      const item = unquote(trimmed.slice(2));
      section[listKey] = Array.isArray(current) ? [...current, item] : [item];
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx <= 0) continue;
    const key = trimmed.slice(0, colonIdx).trim();
    const rawValue = trimmed.slice(colonIdx + 1);

    if (rawValue.trim() === '') {
      section[key] = '';
      listKey = key;
    } else {
      section[key] = parseScalar(rawValue);
      listKey = undefined;
    }
  }

  return result;
}

const severity = (fallback: Severity) => z.enum(SEVERITIES).catch(fallback);
const channelList = (fallback: ChannelKind[]) => z.array(z.enum(CHANNEL_KINDS)).catch(fallback);

const configSchema = z.object({
  routing: z.object({
    default_channels: channelList(DEFAULT_CONFIG.routing.default_channels),
  }).catch(DEFAULT_CONFIG.routing),
  slack: z.object({
    enabled: z.boolean().catch(DEFAULT_CONFIG.slack.enabled),
    min_severity: severity(DEFAULT_CONFIG.slack.min_severity),
    webhook_url: z.string().catch(DEFAULT_CONFIG.slack.webhook_url),
  }).catch(DEFAULT_CONFIG.slack),
  webhook: z.object({
    enabled: z.boolean().catch(DEFAULT_CONFIG.webhook.enabled),
    min_severity: severity(DEFAULT_CONFIG.webhook.min_severity),
    url: z.string().catch(DEFAULT_CONFIG.webhook.url),
    timeout_ms: z.number().int().positive().catch(DEFAULT_CONFIG.webhook.timeout_ms),
  }).catch(DEFAULT_CONFIG.webhook),
  email: z.object({
    enabled: z.boolean().catch(DEFAULT_CONFIG.email.enabled),
    min_severity: severity(DEFAULT_CONFIG.email.min_severity),
    recipients: z.array(z.string()).catch(DEFAULT_CONFIG.email.recipients),
  }).catch(DEFAULT_CONFIG.email),
});

/**
 * Loads notification configuration from the YAML file.
 *
 * Merges loaded values over defaults: a missing or invalid key takes its
 * default value. A missing or unreadable file yields DEFAULT_CONFIG and
 * reports the error through `onError`.
 */
export function loadNotificationConfig(
  configPath?: string,
  onError?: (err: unknown) => void,
): NotificationConfig {
  const filePath = resolve(process.cwd(), configPath ?? 'config/notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    onError?.(err);
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  return configSchema.parse({
    routing: parsed['routing'] ?? {},
    slack: parsed['slack'] ?? {},
    webhook: parsed['webhook'] ?? {},
    email: parsed['email'] ?? {},
  });
}
