import type { Database, AlertRow, AlertQueryFilters } from '../infrastructure/db/index.js';
import { queryAlerts, findAlertById, acknowledgeAlert as repoAcknowledge } from '../infrastructure/db/index.js';
import { resolvePage } from './query-events.js';
import type { AlertListQuery } from './query-schema.js';

/**
 * Use case: list alerts with pagination and filters, newest first.
 */
export async function listAlerts(db: Database, params: AlertListQuery) {
  const { limit, offset } = resolvePage(params.limit, params.offset);

  const filters: AlertQueryFilters = {};
  if (params.rule_id !== undefined) filters.rule_id = params.rule_id;
  if (params.subject_id !== undefined) filters.subject_id = params.subject_id;
  if (params.severity !== undefined) filters.severity = params.severity;
  if (params.status !== undefined) filters.status = params.status;
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  const data = await queryAlerts(db, filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

export async function getAlert(db: Database, alertId: string): Promise<AlertRow | null> {
  const row = await findAlertById(db, alertId);
  return row ?? null;
}

/**
 * Marks an alert acknowledged. Idempotent: an already acknowledged alert
 * is returned unchanged. Returns null if not found.
 */
export async function acknowledgeAlert(db: Database, alertId: string, at: Date = new Date()): Promise<AlertRow | null> {
  const row = await repoAcknowledge(db, alertId, at);
  return row ?? null;
}
