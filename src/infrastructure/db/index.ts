export { events, subjects, rules, alerts } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { insertEvent, queryEvents, findEventById, purgeEventsBefore } from './event-repository.js';
export type { EventRow, EventQueryFilters, PaginationParams } from './event-repository.js';
export {
  insertSubject,
  findSubjects,
  findSubjectById,
  patchSubject,
  deleteSubject,
} from './subject-repository.js';
export type { SubjectRow, CreateSubjectInput, PatchSubjectInput, SubjectQueryFilters } from './subject-repository.js';
export {
  insertRule,
  findAllRules,
  findEnabledRules,
  findRuleById,
  updateRule,
  patchRule,
  deleteRule,
} from './rule-repository.js';
export type { RuleRow, CreateRuleInput, UpdateRuleInput, PatchRuleInput } from './rule-repository.js';
export {
  insertAlert,
  queryAlerts,
  findAlertById,
  acknowledgeAlert,
  purgeAlertsBefore,
} from './alert-repository.js';
export type { AlertRow, AlertQueryFilters } from './alert-repository.js';
export { default as dbPlugin } from './db-plugin.js';
