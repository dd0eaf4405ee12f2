export type { BehaviourEvent, EventPayload, EventMetadata } from './event.js';
export { SUBJECT_TYPES, CHANNEL_KINDS } from './subject.js';
export type { Subject, SubjectType, ChannelKind } from './subject.js';
export { SEVERITIES, severityRank } from './alert.js';
export type { Severity, AlertStatus, RuleFiring, Alert } from './alert.js';
