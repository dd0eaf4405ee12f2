import { pgTable, uuid, varchar, timestamp, jsonb, boolean, integer, index } from 'drizzle-orm/pg-core';
import type { ChannelKind, Severity, AlertStatus, SubjectType } from '../../domain/index.js';
import type { RuleAction, RuleScope, TriggerCondition } from '../../application/rule-schema.js';

/**
 * `events` table.
 *
 * `event_id` is the natural primary key, assigned at intake time.
 * Using it as PK gives idempotent inserts via ON CONFLICT DO NOTHING,
 * so a redelivered stream entry never produces a second row.
 */
export const events = pgTable('events', {
  event_id: uuid('event_id').primaryKey(),
  subject_id: varchar('subject_id', { length: 255 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  source: varchar('source', { length: 255 }).notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull().default({}),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_events_subject_id').on(table.subject_id),
  index('idx_events_event_type').on(table.event_type),
  index('idx_events_timestamp').on(table.timestamp),
  index('idx_events_created_at').on(table.created_at),
]);

/** Monitored subjects. `subject_id` is chosen by the registering client. */
export const subjects = pgTable('subjects', {
  subject_id: varchar('subject_id', { length: 255 }).primaryKey(),
  subject_type: varchar('subject_type', { length: 20 }).$type<SubjectType>().notNull(),
  display_name: varchar('display_name', { length: 255 }).notNull(),
  profile: varchar('profile', { length: 64 }).notNull().default('default'),
  channels: jsonb('channels').$type<ChannelKind[]>().notNull().default([]),
  active: boolean('active').notNull().default(true),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_subjects_type').on(table.subject_type),
  index('idx_subjects_profile').on(table.profile),
]);

/** Rule definitions. `condition`, `scope` and `action` are validated JSON documents. */
export const rules = pgTable('rules', {
  rule_id: uuid('rule_id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  description: varchar('description', { length: 1024 }).notNull().default(''),
  enabled: boolean('enabled').notNull().default(true),
  severity: varchar('severity', { length: 20 }).$type<Severity>().notNull(),
  window_seconds: integer('window_seconds').notNull(),
  cooldown_seconds: integer('cooldown_seconds').notNull().default(0),
  scope: jsonb('scope').$type<RuleScope>().notNull().default({}),
  condition: jsonb('condition').$type<TriggerCondition>().notNull(),
  action: jsonb('action').$type<RuleAction>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_rules_enabled').on(table.enabled),
]);

/**
 * Alerts produced by the rule engine.
 *
 * `event_id` is not an FK: retention may purge the event first,
 * and time-triggered alerts carry no event at all.
 */
export const alerts = pgTable('alerts', {
  alert_id: uuid('alert_id').primaryKey(),
  rule_id: uuid('rule_id').notNull(),
  rule_name: varchar('rule_name', { length: 255 }).notNull(),
  subject_id: varchar('subject_id', { length: 255 }).notNull(),
  event_id: uuid('event_id'),
  severity: varchar('severity', { length: 20 }).$type<Severity>().notNull(),
  message: varchar('message', { length: 1024 }).notNull(),
  details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
  channels: jsonb('channels').$type<ChannelKind[] | null>(),
  status: varchar('status', { length: 20 }).$type<AlertStatus>().notNull().default('open'),
  triggered_at: timestamp('triggered_at', { withTimezone: true }).notNull(),
  acknowledged_at: timestamp('acknowledged_at', { withTimezone: true }),
}, (table) => [
  index('idx_alerts_rule_id').on(table.rule_id),
  index('idx_alerts_subject_id').on(table.subject_id),
  index('idx_alerts_severity').on(table.severity),
  index('idx_alerts_triggered_at').on(table.triggered_at),
]);
