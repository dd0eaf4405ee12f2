import { randomUUID } from 'node:crypto';
import { eq, and, gte, lte, lt, desc, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { alerts } from './schema.js';
import type { PaginationParams } from './event-repository.js';
import type { AlertStatus, ChannelKind, RuleFiring, Severity } from '../../domain/index.js';

export type AlertRow = typeof alerts.$inferSelect;

export interface AlertQueryFilters {
  rule_id?: string;
  subject_id?: string;
  severity?: Severity;
  status?: AlertStatus;
  from?: string;
  to?: string;
}

/**
 * Persists a firing as an open alert.
 * Generates the alert_id and returns the stored row.
 */
export async function insertAlert(
  db: Database,
  firing: RuleFiring,
  channels: readonly ChannelKind[] | null,
): Promise<AlertRow> {
  const rows = await db.insert(alerts).values({
    alert_id: randomUUID(),
    rule_id: firing.rule_id,
    rule_name: firing.rule_name,
    subject_id: firing.subject_id,
    event_id: firing.event_id,
    severity: firing.severity,
    message: firing.message.slice(0, 1024),
    details: { ...firing.details },
    channels: channels === null ? null : [...channels],
    status: 'open',
    triggered_at: new Date(firing.triggered_at),
  }).returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Alert insert returned no row');
  }
  return row;
}

/**
 * Fetches a paginated, filtered list of alerts, newest first.
 */
export async function queryAlerts(
  db: Database,
  filters: AlertQueryFilters,
  pagination: PaginationParams,
): Promise<AlertRow[]> {
  const conditions: SQL[] = [];

  if (filters.rule_id !== undefined) conditions.push(eq(alerts.rule_id, filters.rule_id));
  if (filters.subject_id !== undefined) conditions.push(eq(alerts.subject_id, filters.subject_id));
  if (filters.severity !== undefined) conditions.push(eq(alerts.severity, filters.severity));
  if (filters.status !== undefined) conditions.push(eq(alerts.status, filters.status));
  if (filters.from !== undefined) conditions.push(gte(alerts.triggered_at, new Date(filters.from)));
  if (filters.to !== undefined) conditions.push(lte(alerts.triggered_at, new Date(filters.to)));

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  return db
    .select()
    .from(alerts)
    .where(whereClause)
    .orderBy(desc(alerts.triggered_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

export async function findAlertById(db: Database, alertId: string): Promise<AlertRow | undefined> {
  const rows = await db.select().from(alerts).where(eq(alerts.alert_id, alertId)).limit(1);
  return rows[0];
}

/**
 * Marks an open alert acknowledged. Already-acknowledged alerts are
 * returned unchanged; undefined means the alert does not exist.
 */
export async function acknowledgeAlert(db: Database, alertId: string, at: Date): Promise<AlertRow | undefined> {
  const rows = await db
    .update(alerts)
    .set({ status: 'acknowledged', acknowledged_at: at })
    .where(and(eq(alerts.alert_id, alertId), eq(alerts.status, 'open')))
    .returning();

  return rows[0] ?? findAlertById(db, alertId);
}

/** Deletes alerts triggered before `cutoff`. Returns the number removed. */
export async function purgeAlertsBefore(db: Database, cutoff: Date): Promise<number> {
  const rows = await db
    .delete(alerts)
    .where(lt(alerts.triggered_at, cutoff))
    .returning({ alert_id: alerts.alert_id });
  return rows.length;
}
