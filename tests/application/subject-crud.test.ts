import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  insertSubject: vi.fn(),
  findSubjects: vi.fn(),
  findSubjectById: vi.fn(),
  patchSubject: vi.fn(),
  deleteSubject: vi.fn(),
}));

import {
  registerSubject,
  listSubjects,
  getSubject,
  updateSubjectProfile,
  removeSubject,
} from '../../src/application/subject-crud.js';
import { createSubjectSchema, patchSubjectSchema } from '../../src/application/subject-schema.js';
import {
  insertSubject,
  findSubjects,
  findSubjectById,
  patchSubject,
  deleteSubject,
} from '../../src/infrastructure/db/index.js';
import { fakeSubjectRow } from './helpers.js';

const mockInsert = vi.mocked(insertSubject);
const mockFind = vi.mocked(findSubjects);
const mockFindById = vi.mocked(findSubjectById);
const mockPatch = vi.mocked(patchSubject);
const mockDelete = vi.mocked(deleteSubject);

const db = {} as Parameters<typeof listSubjects>[0];
const notify = vi.fn<Parameters<typeof registerSubject>[0]['notify']>();
const deps = { db, notify };

beforeEach(() => {
  vi.clearAllMocks();
  notify.mockResolvedValue(undefined);
});

describe('createSubjectSchema', () => {
  it('fills profile, channels and active defaults', () => {
    expect(createSubjectSchema.parse({
      subject_id: ' badge-42 ',
      subject_type: 'employee',
      display_name: 'Night guard',
    })).toEqual({
      subject_id: 'badge-42',
      subject_type: 'employee',
      display_name: 'Night guard',
      profile: 'default',
      channels: [],
      active: true,
    });
  });

  it('rejects unknown subject types and channels', () => {
    expect(createSubjectSchema.safeParse({ subject_id: 'x', subject_type: 'robot', display_name: 'X' }).success).toBe(false);
    expect(createSubjectSchema.safeParse({
      subject_id: 'x', subject_type: 'user', display_name: 'X', channels: ['pager'],
    }).success).toBe(false);
  });

  it('patch schema rejects an empty body', () => {
    expect(patchSubjectSchema.safeParse({}).success).toBe(false);
    expect(patchSubjectSchema.safeParse({ profile: 'night-shift' }).success).toBe(true);
  });
});

describe('registerSubject', () => {
  const input = createSubjectSchema.parse({ subject_id: 'user-1', subject_type: 'user', display_name: 'Test User' });

  it('inserts and announces', async () => {
    const row = fakeSubjectRow();
    mockInsert.mockResolvedValue(row);

    expect(await registerSubject(deps, input)).toBe(row);
    expect(mockInsert).toHaveBeenCalledWith(db, input);
    expect(notify).toHaveBeenCalledWith({ kind: 'subject', reason: 'create', id: 'user-1' });
  });

  it('returns null for an id already registered', async () => {
    mockInsert.mockResolvedValue(undefined);

    expect(await registerSubject(deps, input)).toBeNull();
    expect(notify).not.toHaveBeenCalled();
  });
});

describe('listSubjects / getSubject', () => {
  it('passes filters through', async () => {
    mockFind.mockResolvedValue([]);
    await listSubjects(db, { subject_type: 'device' });
    expect(mockFind).toHaveBeenCalledWith(db, { subject_type: 'device' });
  });

  it('returns null for an unknown subject', async () => {
    mockFindById.mockResolvedValue(undefined);
    expect(await getSubject(db, 'nobody')).toBeNull();
  });
});

describe('updateSubjectProfile', () => {
  it('patches and announces', async () => {
    mockPatch.mockResolvedValue(fakeSubjectRow({ profile: 'night-shift' }));

    const result = await updateSubjectProfile(deps, 'user-1', { profile: 'night-shift' });

    expect(result?.profile).toBe('night-shift');
    expect(notify).toHaveBeenCalledWith({ kind: 'subject', reason: 'patch', id: 'user-1' });
  });

  it('returns null for an unknown subject', async () => {
    mockPatch.mockResolvedValue(undefined);
    expect(await updateSubjectProfile(deps, 'nobody', { active: false })).toBeNull();
    expect(notify).not.toHaveBeenCalled();
  });
});

describe('removeSubject', () => {
  it('deletes and announces', async () => {
    mockDelete.mockResolvedValue(true);
    expect(await removeSubject(deps, 'user-1')).toBe(true);
    expect(notify).toHaveBeenCalledWith({ kind: 'subject', reason: 'delete', id: 'user-1' });
  });
});
