import { z } from 'zod';
import { SEVERITIES } from '../domain/index.js';

// Out-of-range values are clamped by resolvePage(), not rejected.
const pagination = {
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
};

function fromNotAfterTo(range: { from?: string | undefined; to?: string | undefined }): boolean {
  return range.from === undefined || range.to === undefined || Date.parse(range.from) <= Date.parse(range.to);
}

const rangeMessage = { message: 'from must not be after to', path: ['from'] };

const timeRange = {
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
};

/** Query string of GET /api/v1/events. */
export const eventListQuerySchema = z.object({
  ...pagination,
  subject_id: z.string().min(1).max(255).optional(),
  event_type: z.string().trim().toLowerCase().min(1).max(255).optional(),
  source: z.string().min(1).max(255).optional(),
  ...timeRange,
}).refine(fromNotAfterTo, rangeMessage);

export type EventListQuery = z.infer<typeof eventListQuerySchema>;

/** Query string of GET /api/v1/alerts. */
export const alertListQuerySchema = z.object({
  ...pagination,
  rule_id: z.string().uuid().optional(),
  subject_id: z.string().min(1).max(255).optional(),
  severity: z.enum(SEVERITIES).optional(),
  status: z.enum(['open', 'acknowledged']).optional(),
  ...timeRange,
}).refine(fromNotAfterTo, rangeMessage);

export type AlertListQuery = z.infer<typeof alertListQuerySchema>;
