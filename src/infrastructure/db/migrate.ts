import type { SqlClient } from './client.js';

/**
 * Ensures tables and indexes exist (lightweight bootstrap via raw SQL).
 *
 * Production deployments run drizzle-kit migrations instead; this keeps a
 * fresh local database usable on first worker start.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      event_id     UUID PRIMARY KEY,
      subject_id   VARCHAR(255) NOT NULL,
      event_type   VARCHAR(255) NOT NULL,
      source       VARCHAR(255) NOT NULL,
      timestamp    TIMESTAMPTZ  NOT NULL,
      payload      JSONB        NOT NULL DEFAULT '{}',
      metadata     JSONB        NOT NULL DEFAULT '{}',
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS subjects (
      subject_id    VARCHAR(255) PRIMARY KEY,
      subject_type  VARCHAR(20)  NOT NULL,
      display_name  VARCHAR(255) NOT NULL,
      profile       VARCHAR(64)  NOT NULL DEFAULT 'default',
      channels      JSONB        NOT NULL DEFAULT '[]',
      active        BOOLEAN      NOT NULL DEFAULT true,
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS rules (
      rule_id          UUID PRIMARY KEY,
      name             VARCHAR(255)  NOT NULL,
      description      VARCHAR(1024) NOT NULL DEFAULT '',
      enabled          BOOLEAN       NOT NULL DEFAULT true,
      severity         VARCHAR(20)   NOT NULL,
      window_seconds   INTEGER       NOT NULL,
      cooldown_seconds INTEGER       NOT NULL DEFAULT 0,
      scope            JSONB         NOT NULL DEFAULT '{}',
      condition        JSONB         NOT NULL,
      action           JSONB         NOT NULL,
      created_at       TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
      updated_at       TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS alerts (
      alert_id        UUID PRIMARY KEY,
      rule_id         UUID          NOT NULL,
      rule_name       VARCHAR(255)  NOT NULL,
      subject_id      VARCHAR(255)  NOT NULL,
      event_id        UUID,
      severity        VARCHAR(20)   NOT NULL,
      message         VARCHAR(1024) NOT NULL,
      details         JSONB         NOT NULL DEFAULT '{}',
      channels        JSONB,
      status          VARCHAR(20)   NOT NULL DEFAULT 'open',
      triggered_at    TIMESTAMPTZ   NOT NULL,
      acknowledged_at TIMESTAMPTZ
    )
  `);

  const indexes = [
    'CREATE INDEX IF NOT EXISTS idx_events_subject_id ON events (subject_id)',
    'CREATE INDEX IF NOT EXISTS idx_events_event_type ON events (event_type)',
    'CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp)',
    'CREATE INDEX IF NOT EXISTS idx_events_created_at ON events (created_at)',
    'CREATE INDEX IF NOT EXISTS idx_subjects_type ON subjects (subject_type)',
    'CREATE INDEX IF NOT EXISTS idx_subjects_profile ON subjects (profile)',
    'CREATE INDEX IF NOT EXISTS idx_rules_enabled ON rules (enabled)',
    'CREATE INDEX IF NOT EXISTS idx_alerts_rule_id ON alerts (rule_id)',
    'CREATE INDEX IF NOT EXISTS idx_alerts_subject_id ON alerts (subject_id)',
    'CREATE INDEX IF NOT EXISTS idx_alerts_severity ON alerts (severity)',
    'CREATE INDEX IF NOT EXISTS idx_alerts_triggered_at ON alerts (triggered_at)',
  ];
  for (const statement of indexes) {
    await sql.unsafe(statement);
  }
}
