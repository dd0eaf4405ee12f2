import {
  insertRule,
  findAllRules,
  findRuleById,
  updateRule as repoUpdate,
  patchRule as repoPatch,
  deleteRule as repoDelete,
} from '../infrastructure/db/index.js';
import type { Database, RuleRow, CreateRuleInput, UpdateRuleInput, PatchRuleInput } from '../infrastructure/db/index.js';
import type { ConfigDeps } from './config-change.js';

export type { RuleRow };

/** Create a rule and announce it. */
export async function createRule(deps: ConfigDeps, input: CreateRuleInput): Promise<RuleRow> {
  const row = await insertRule(deps.db, input);
  await deps.notify({ kind: 'rule', reason: 'create', id: row.rule_id });
  return row;
}

/** List all rules (enabled and disabled). */
export async function listRules(db: Database): Promise<RuleRow[]> {
  return findAllRules(db);
}

/** Fetch a single rule by ID. Returns null if not found. */
export async function getRule(db: Database, ruleId: string): Promise<RuleRow | null> {
  const row = await findRuleById(db, ruleId);
  return row ?? null;
}

/** Full replace of a rule. Returns null if not found; nothing is announced then. */
export async function replaceRule(deps: ConfigDeps, ruleId: string, input: UpdateRuleInput): Promise<RuleRow | null> {
  const row = await repoUpdate(deps.db, ruleId, input);
  if (row === undefined) return null;
  await deps.notify({ kind: 'rule', reason: 'update', id: ruleId });
  return row;
}

/** Partial update of a rule. Returns null if not found. */
export async function patchRule(deps: ConfigDeps, ruleId: string, input: PatchRuleInput): Promise<RuleRow | null> {
  const row = await repoPatch(deps.db, ruleId, input);
  if (row === undefined) return null;
  await deps.notify({ kind: 'rule', reason: 'patch', id: ruleId });
  return row;
}

/** Delete a rule. Returns false if not found. */
export async function removeRule(deps: ConfigDeps, ruleId: string): Promise<boolean> {
  const deleted = await repoDelete(deps.db, ruleId);
  if (deleted) await deps.notify({ kind: 'rule', reason: 'delete', id: ruleId });
  return deleted;
}
