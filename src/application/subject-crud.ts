import {
  insertSubject,
  findSubjects,
  findSubjectById,
  patchSubject as repoPatch,
  deleteSubject as repoDelete,
} from '../infrastructure/db/index.js';
import type { Database, SubjectRow, SubjectQueryFilters } from '../infrastructure/db/index.js';
import type { ConfigDeps } from './config-change.js';
import type { CreateSubjectBody, PatchSubjectBody } from './subject-schema.js';

export type { SubjectRow };

/** Register a subject. Returns null when the id is already taken. */
export async function registerSubject(deps: ConfigDeps, input: CreateSubjectBody): Promise<SubjectRow | null> {
  const row = await insertSubject(deps.db, input);
  if (row === undefined) return null;
  await deps.notify({ kind: 'subject', reason: 'create', id: row.subject_id });
  return row;
}

export async function listSubjects(db: Database, filters: SubjectQueryFilters): Promise<SubjectRow[]> {
  return findSubjects(db, filters);
}

export async function getSubject(db: Database, subjectId: string): Promise<SubjectRow | null> {
  const row = await findSubjectById(db, subjectId);
  return row ?? null;
}

/** Apply a profile change. Returns null if not found. */
export async function updateSubjectProfile(
  deps: ConfigDeps,
  subjectId: string,
  input: PatchSubjectBody,
): Promise<SubjectRow | null> {
  const row = await repoPatch(deps.db, subjectId, input);
  if (row === undefined) return null;
  await deps.notify({ kind: 'subject', reason: 'patch', id: subjectId });
  return row;
}

export async function removeSubject(deps: ConfigDeps, subjectId: string): Promise<boolean> {
  const deleted = await repoDelete(deps.db, subjectId);
  if (deleted) await deps.notify({ kind: 'subject', reason: 'delete', id: subjectId });
  return deleted;
}
