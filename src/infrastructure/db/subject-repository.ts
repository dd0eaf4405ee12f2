import { eq, and, asc, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { subjects } from './schema.js';
import type { ChannelKind, SubjectType } from '../../domain/index.js';

/** Row shape returned by subject queries. */
export type SubjectRow = typeof subjects.$inferSelect;

export interface CreateSubjectInput {
  subject_id: string;
  subject_type: SubjectType;
  display_name: string;
  profile: string;
  channels: ChannelKind[];
  active: boolean;
}

export interface PatchSubjectInput {
  subject_type?: SubjectType;
  display_name?: string;
  profile?: string;
  channels?: ChannelKind[];
  active?: boolean;
}

export interface SubjectQueryFilters {
  subject_type?: SubjectType;
  profile?: string;
}

/**
 * Inserts a subject. Returns undefined when the id is already registered.
 */
export async function insertSubject(db: Database, input: CreateSubjectInput): Promise<SubjectRow | undefined> {
  const now = new Date();
  const rows = await db.insert(subjects).values({
    ...input,
    created_at: now,
    updated_at: now,
  }).onConflictDoNothing({ target: subjects.subject_id }).returning();

  return rows[0];
}

export async function findSubjects(db: Database, filters: SubjectQueryFilters = {}): Promise<SubjectRow[]> {
  const conditions: SQL[] = [];
  if (filters.subject_type !== undefined) conditions.push(eq(subjects.subject_type, filters.subject_type));
  if (filters.profile !== undefined) conditions.push(eq(subjects.profile, filters.profile));

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;
  return db.select().from(subjects).where(whereClause).orderBy(asc(subjects.subject_id));
}

export async function findSubjectById(db: Database, subjectId: string): Promise<SubjectRow | undefined> {
  const rows = await db.select().from(subjects).where(eq(subjects.subject_id, subjectId)).limit(1);
  return rows[0];
}

export async function patchSubject(
  db: Database,
  subjectId: string,
  input: PatchSubjectInput,
): Promise<SubjectRow | undefined> {
  const setFields: Partial<typeof subjects.$inferInsert> = { updated_at: new Date() };
  if (input.subject_type !== undefined) setFields.subject_type = input.subject_type;
  if (input.display_name !== undefined) setFields.display_name = input.display_name;
  if (input.profile !== undefined) setFields.profile = input.profile;
  if (input.channels !== undefined) setFields.channels = input.channels;
  if (input.active !== undefined) setFields.active = input.active;

  const rows = await db.update(subjects).set(setFields).where(eq(subjects.subject_id, subjectId)).returning();
  return rows[0];
}

export async function deleteSubject(db: Database, subjectId: string): Promise<boolean> {
  const rows = await db
    .delete(subjects)
    .where(eq(subjects.subject_id, subjectId))
    .returning({ subject_id: subjects.subject_id });
  return rows.length > 0;
}
