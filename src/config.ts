import { z } from 'zod';

/** Thrown when one or more environment variables are invalid. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const port = z.coerce.number().int().min(1).max(65_535);
const optionalString = z.string().min(1).optional();

const envSchema = z.object({
  APP_PORT: port.default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DATABASE_URL: optionalString,
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: port.default(5432),
  DB_NAME: z.string().min(1).default('behaviour_monitor'),
  DB_USER: z.string().min(1).default('monitor'),
  DB_PASSWORD: z.string().default('monitor_dev'),

  REDIS_URL: optionalString,
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: port.default(6379),
  REDIS_PASSWORD: optionalString,

  SMTP_HOST: z.string().default(''),
  SMTP_PORT: port.default(587),
  SMTP_USER: z.string().default(''),
  SMTP_FROM: z.string().default('monitor@localhost'),

  MONITORING_INTERVAL_SECONDS: z.coerce.number().positive().default(5),
  ANOMALY_THRESHOLD: z.coerce.number().positive().default(3),
  RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  MAX_CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).default(300),
  WORKER_ID: z.string().min(1).default('worker-1'),
  NOTIFICATIONS_CONFIG: z.string().min(1).default('config/notifications.yaml'),
});

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;
  readonly databaseUrl: string;
  readonly redisUrl: string;
  readonly smtp: {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly from: string;
  };
  readonly monitoringIntervalSeconds: number;
  readonly anomalyThreshold: number;
  readonly retentionDays: number;
  readonly maxClockSkewSeconds: number;
  readonly workerId: string;
  readonly notificationsConfigPath: string;
}

/**
 * Parses process environment into typed configuration.
 *
 * `DATABASE_URL` and `REDIS_URL` win over their split `DB_*` / `REDIS_*`
 * forms. Empty strings count as unset. Throws ConfigError listing every
 * offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  const databaseUrl = e.DATABASE_URL
    ?? `postgres://${encodeURIComponent(e.DB_USER)}:${encodeURIComponent(e.DB_PASSWORD)}@${e.DB_HOST}:${e.DB_PORT}/${e.DB_NAME}`;

  const redisAuth = e.REDIS_PASSWORD !== undefined ? `:${encodeURIComponent(e.REDIS_PASSWORD)}@` : '';
  const redisUrl = e.REDIS_URL ?? `redis://${redisAuth}${e.REDIS_HOST}:${e.REDIS_PORT}`;

  return {
    port: e.APP_PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    databaseUrl,
    redisUrl,
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      user: e.SMTP_USER,
      from: e.SMTP_FROM,
    },
    monitoringIntervalSeconds: e.MONITORING_INTERVAL_SECONDS,
    anomalyThreshold: e.ANOMALY_THRESHOLD,
    retentionDays: e.RETENTION_DAYS,
    maxClockSkewSeconds: e.MAX_CLOCK_SKEW_SECONDS,
    workerId: e.WORKER_ID,
    notificationsConfigPath: e.NOTIFICATIONS_CONFIG,
  };
}
