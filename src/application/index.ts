export { eventSchema, MAX_BATCH_SIZE } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export { validateEvent, validateBatch } from './event-intake.js';
export type { IntakeOptions, IntakeResult } from './event-intake.js';
export { RuleEngine, scopeMatches } from './rule-engine.js';
export type { EngineRule, EngineSubject, SubjectLookup, RuleEngineOptions } from './rule-engine.js';
export { WindowAggregator } from './window-aggregator.js';
export { StatisticalEvaluator } from './statistical-evaluator.js';
export { AlertDispatcher } from './alert-dispatcher.js';
export type { AlertChannel, DeliveryReport, DispatcherRouting } from './alert-dispatcher.js';
export { RuleStore, SubjectDirectory } from './rule-store.js';
export { StatsAccumulator, parseStatsHash } from './monitor-stats.js';
export type { MonitorStats } from './monitor-stats.js';
export { createRuleSchema, updateRuleSchema, patchRuleSchema, triggerConditionSchema } from './rule-schema.js';
export { createSubjectSchema, patchSubjectSchema, subjectListQuerySchema } from './subject-schema.js';
export { eventListQuerySchema, alertListQuerySchema } from './query-schema.js';
export { listEvents, getEvent } from './query-events.js';
export { listAlerts, getAlert, acknowledgeAlert } from './query-alerts.js';
export { createRule, listRules, getRule, replaceRule, patchRule, removeRule } from './rule-crud.js';
export { registerSubject, listSubjects, getSubject, updateSubjectProfile, removeSubject } from './subject-crud.js';
export type { ConfigChange, ConfigChangeNotifier, ConfigDeps } from './config-change.js';
