/** Kinds of entity the monitor can watch. */
export const SUBJECT_TYPES = ['user', 'employee', 'device'] as const;
export type SubjectType = (typeof SUBJECT_TYPES)[number];

/** Outbound notification channels an alert can be routed to. */
export const CHANNEL_KINDS = ['slack', 'email', 'webhook'] as const;
export type ChannelKind = (typeof CHANNEL_KINDS)[number];

/**
 * A monitored entity.
 *
 * `profile` names the monitoring profile rules can be scoped to.
 * Events of an inactive subject are stored but never evaluated.
 */
export interface Subject {
  readonly subject_id: string;
  readonly subject_type: SubjectType;
  readonly display_name: string;
  readonly profile: string;
  readonly channels: readonly ChannelKind[];
  readonly active: boolean;
  readonly created_at: Date;
  readonly updated_at: Date;
}
