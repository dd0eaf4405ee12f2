import { z } from 'zod';
import { CHANNEL_KINDS, SEVERITIES, SUBJECT_TYPES } from '../domain/index.js';

/** Comparison operators shared by every trigger. */
export const comparisonOperatorSchema = z.enum(['>', '>=', '<', '<=', '==', '!=']);

export type ComparisonOperator = z.infer<typeof comparisonOperatorSchema>;

/**
 * A single attribute test against the event payload.
 *
 * `field` is a dotted path (`location.zone`). Ordering operators only
 * hold between numbers; `==` / `!=` compare strictly.
 */
export const predicateSchema = z.object({
  field: z.string().min(1).max(255),
  operator: comparisonOperatorSchema,
  value: z.union([z.number().finite(), z.string(), z.boolean()]),
});

export type Predicate = z.infer<typeof predicateSchema>;

/** Event selection shared by every trigger. A missing field means "match all". */
export const triggerFiltersSchema = z.object({
  event_type: z.union([
    z.string().min(1),
    z.array(z.string().min(1)).min(1),
  ]).optional(),
  source: z.string().min(1).optional(),
  where: z.array(predicateSchema).max(20).optional(),
});

export type TriggerFilters = z.infer<typeof triggerFiltersSchema>;

const filters = triggerFiltersSchema.optional().default({});

/** Count of matching events in the window. */
export const thresholdConditionSchema = z.object({
  type: z.literal('threshold'),
  metric: z.literal('count').optional().default('count'),
  filters,
  operator: comparisonOperatorSchema,
  value: z.number().finite(),
});

/** sum / avg / min / max of a numeric payload field over the window. */
export const aggregateConditionSchema = z.object({
  type: z.literal('aggregate'),
  metric: z.enum(['sum', 'avg', 'min', 'max']),
  field: z.string().min(1).max(255),
  filters,
  operator: comparisonOperatorSchema,
  value: z.number().finite(),
});

/** N matching events in a row satisfying `field operator value`. */
export const consecutiveConditionSchema = z.object({
  type: z.literal('consecutive'),
  field: z.string().min(1).max(255),
  operator: comparisonOperatorSchema,
  value: z.union([z.number().finite(), z.string(), z.boolean()]),
  count: z.number().int().min(1).max(1000),
  filters,
});

/** No activity from a previously seen subject for longer than the window. */
export const inactivityConditionSchema = z.object({
  type: z.literal('inactivity'),
  activity: predicateSchema.optional(),
  filters,
});

/** Subject continuously reporting `field == equals` for longer than the window. */
export const dwellConditionSchema = z.object({
  type: z.literal('dwell'),
  field: z.string().min(1).max(255),
  equals: z.union([z.number().finite(), z.string(), z.boolean()]),
  filters,
});

/** Z-score of the current bucket's event count against recent buckets. */
export const zscoreConditionSchema = z.object({
  type: z.literal('zscore'),
  baseline_buckets: z.number().int().min(2).max(1000),
  z_threshold: z.number().finite().positive().optional(),
  filters,
});

export const triggerConditionSchema = z.discriminatedUnion('type', [
  thresholdConditionSchema,
  aggregateConditionSchema,
  consecutiveConditionSchema,
  inactivityConditionSchema,
  dwellConditionSchema,
  zscoreConditionSchema,
]);

export type ThresholdCondition = z.infer<typeof thresholdConditionSchema>;
export type AggregateCondition = z.infer<typeof aggregateConditionSchema>;
export type ConsecutiveCondition = z.infer<typeof consecutiveConditionSchema>;
export type InactivityCondition = z.infer<typeof inactivityConditionSchema>;
export type DwellCondition = z.infer<typeof dwellConditionSchema>;
export type ZScoreCondition = z.infer<typeof zscoreConditionSchema>;
export type TriggerCondition = z.infer<typeof triggerConditionSchema>;

/** Which subjects a rule applies to. Empty = every subject. */
export const ruleScopeSchema = z.object({
  subject_type: z.enum(SUBJECT_TYPES).optional(),
  profile: z.string().min(1).max(64).optional(),
  subject_ids: z.array(z.string().min(1).max(255)).min(1).max(1000).optional(),
});

export type RuleScope = z.infer<typeof ruleScopeSchema>;

/** What happens when the rule fires. */
export const ruleActionSchema = z.object({
  type: z.enum(['notify', 'record']).optional().default('notify'),
  channels: z.array(z.enum(CHANNEL_KINDS)).min(1).optional(),
});

export type RuleAction = z.infer<typeof ruleActionSchema>;

export const ruleSeveritySchema = z.enum(SEVERITIES);

/** Default per-subject cooldown between two firings of the same rule. */
export const DEFAULT_COOLDOWN_SECONDS = 10;

/**
 * Schema for POST /api/v1/rules (create).
 */
export const createRuleSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().max(1024).optional().default(''),
  enabled: z.boolean().optional().default(true),
  severity: ruleSeveritySchema,
  window_seconds: z.number().int().min(1).max(86_400 * 7),
  cooldown_seconds: z.number().int().min(0).optional().default(DEFAULT_COOLDOWN_SECONDS),
  scope: ruleScopeSchema.optional().default({}),
  condition: triggerConditionSchema,
  action: ruleActionSchema.optional().default({ type: 'notify' }),
});

export type CreateRuleInput = z.infer<typeof createRuleSchema>;

/**
 * Schema for PUT /api/v1/rules/:rule_id (full replace).
 * All fields required.
 */
export const updateRuleSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().max(1024),
  enabled: z.boolean(),
  severity: ruleSeveritySchema,
  window_seconds: z.number().int().min(1).max(86_400 * 7),
  cooldown_seconds: z.number().int().min(0),
  scope: ruleScopeSchema,
  condition: triggerConditionSchema,
  action: ruleActionSchema,
});

export type UpdateRuleInput = z.infer<typeof updateRuleSchema>;

/**
 * Schema for PATCH /api/v1/rules/:rule_id (partial update).
 */
export const patchRuleSchema = updateRuleSchema.partial().refine(
  (data) => Object.keys(data).length > 0,
  { message: 'At least one field must be provided' },
);

export type PatchRuleInput = z.infer<typeof patchRuleSchema>;
