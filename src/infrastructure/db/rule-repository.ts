import { randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { rules } from './schema.js';
import type { CreateRuleInput, UpdateRuleInput, PatchRuleInput } from '../../application/rule-schema.js';

/** Row shape returned by rule queries. */
export type RuleRow = typeof rules.$inferSelect;

export type { CreateRuleInput, UpdateRuleInput, PatchRuleInput };

export async function insertRule(db: Database, input: CreateRuleInput): Promise<RuleRow> {
  const now = new Date();
  const rows = await db.insert(rules).values({
    rule_id: randomUUID(),
    ...input,
    created_at: now,
    updated_at: now,
  }).returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Rule insert returned no row');
  }
  return row;
}

export async function findAllRules(db: Database): Promise<RuleRow[]> {
  return db.select().from(rules).orderBy(asc(rules.created_at));
}

export async function findEnabledRules(db: Database): Promise<RuleRow[]> {
  return db.select().from(rules).where(eq(rules.enabled, true));
}

export async function findRuleById(db: Database, ruleId: string): Promise<RuleRow | undefined> {
  const rows = await db.select().from(rules).where(eq(rules.rule_id, ruleId)).limit(1);
  return rows[0];
}

export async function updateRule(
  db: Database,
  ruleId: string,
  input: UpdateRuleInput,
): Promise<RuleRow | undefined> {
  const rows = await db.update(rules).set({
    ...input,
    updated_at: new Date(),
  }).where(eq(rules.rule_id, ruleId)).returning();

  return rows[0];
}

export async function patchRule(
  db: Database,
  ruleId: string,
  input: PatchRuleInput,
): Promise<RuleRow | undefined> {
  const setFields: Partial<typeof rules.$inferInsert> = { updated_at: new Date() };
  if (input.name !== undefined) setFields.name = input.name;
  if (input.description !== undefined) setFields.description = input.description;
  if (input.enabled !== undefined) setFields.enabled = input.enabled;
  if (input.severity !== undefined) setFields.severity = input.severity;
  if (input.window_seconds !== undefined) setFields.window_seconds = input.window_seconds;
  if (input.cooldown_seconds !== undefined) setFields.cooldown_seconds = input.cooldown_seconds;
  if (input.scope !== undefined) setFields.scope = input.scope;
  if (input.condition !== undefined) setFields.condition = input.condition;
  if (input.action !== undefined) setFields.action = input.action;

  const rows = await db.update(rules).set(setFields).where(eq(rules.rule_id, ruleId)).returning();
  return rows[0];
}

export async function deleteRule(db: Database, ruleId: string): Promise<boolean> {
  const rows = await db
    .delete(rules)
    .where(eq(rules.rule_id, ruleId))
    .returning({ rule_id: rules.rule_id });
  return rows.length > 0;
}
