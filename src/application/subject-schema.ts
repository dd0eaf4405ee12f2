import { z } from 'zod';
import { CHANNEL_KINDS, SUBJECT_TYPES } from '../domain/index.js';

const channelsSchema = z.array(z.enum(CHANNEL_KINDS)).max(CHANNEL_KINDS.length);

/**
 * Schema for POST /api/v1/subjects (registration).
 */
export const createSubjectSchema = z.object({
  subject_id: z.string().trim().min(1).max(255),
  subject_type: z.enum(SUBJECT_TYPES),
  display_name: z.string().min(1).max(255),
  profile: z.string().min(1).max(64).optional().default('default'),
  channels: channelsSchema.optional().default([]),
  active: z.boolean().optional().default(true),
});

export type CreateSubjectBody = z.infer<typeof createSubjectSchema>;

/**
 * Schema for PATCH /api/v1/subjects/:subject_id (profile changes).
 */
export const patchSubjectSchema = z.object({
  subject_type: z.enum(SUBJECT_TYPES),
  display_name: z.string().min(1).max(255),
  profile: z.string().min(1).max(64),
  channels: channelsSchema,
  active: z.boolean(),
}).partial().refine(
  (data) => Object.keys(data).length > 0,
  { message: 'At least one field must be provided' },
);

export type PatchSubjectBody = z.infer<typeof patchSubjectSchema>;

export const subjectListQuerySchema = z.object({
  subject_type: z.enum(SUBJECT_TYPES).optional(),
  profile: z.string().min(1).max(64).optional(),
});
