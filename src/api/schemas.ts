import { z } from 'zod';

import type { NoteRecord, NoteResource } from '../types/index.js';

/**
 * Wire schemas of the notes HTTP API, shared by the routes and the
 * remote-proxy repository.
 */

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 timestamp',
});

export const noteResourceSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  due_at: isoTimestamp.nullable(),
  created_at: isoTimestamp,
});

export const noteListSchema = z.object({
  notes: z.array(noteResourceSchema),
});

export const createdNoteSchema = z.object({
  id: z.string().min(1),
});

export const updatedSchema = z.object({ updated: z.boolean() });
export const deletedSchema = z.object({ deleted: z.boolean() });

export const statsSchema = z.object({
  total: z.number().int().nonnegative(),
  withReminder: z.number().int().nonnegative(),
  withoutReminder: z.number().int().nonnegative(),
  recentCount: z.number().int().nonnegative(),
});

export const healthSchema = z.object({
  status: z.literal('ok'),
  backend: z.string(),
  timestamp: z.string(),
});

export const errorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export const createNoteBodySchema = z.object({
  title: z.string(),
  content: z.string(),
  due_at: isoTimestamp.nullish(),
});

export const updateNoteBodySchema = z.object({
  title: z.string().optional(),
  content: z.string().optional(),
  due_at: isoTimestamp.nullish(),
});

export type CreateNoteBody = z.infer<typeof createNoteBodySchema>;
export type UpdateNoteBody = z.infer<typeof updateNoteBodySchema>;

export function toNoteResource(record: NoteRecord): NoteResource {
  return {
    id: record.id.toString(),
    title: record.title,
    content: record.content,
    due_at: record.dueAt ? record.dueAt.toISOString() : null,
    created_at: record.createdAt.toISOString(),
  };
}
