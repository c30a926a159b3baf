import type { FastifyInstance } from 'fastify';

import { NoteStoreError } from '../core/errors.js';
import type { NoteStore } from '../core/repository-factory.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteChanges } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { createNoteBodySchema, toNoteResource, updateNoteBodySchema } from './schemas.js';

const STATUS_BY_CODE: Record<NoteStoreError['code'], number> = {
  VALIDATION: 400,
  INVALID_IDENTIFIER: 400,
  BACKEND_UNAVAILABLE: 503,
  QUERY_FAILURE: 502,
};

type LimitQuery = { Querystring: { limit?: string } };
type SearchQuery = { Querystring: { q?: string; limit?: string } };
type ReminderQuery = { Querystring: { hours?: string } };
type IdParams = { Params: { id: string } };

function numberParam(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

export async function registerRoutes(app: FastifyInstance, store: NoteStore, logger: Logger) {
  const repository: NoteRepository = store.repository;

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NoteStoreError) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        logger.error({ err: error, url: request.url }, 'Request failed in storage backend');
      }
      return reply.code(status).send({ error: error.message, code: error.code });
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      logger.error({ err: error, url: request.url }, 'Unhandled request error');
    }
    return reply.code(status).send({ error: error.message });
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', backend: store.backend, timestamp: new Date().toISOString() };
  });

  // Record count for monitoring; null when the backend cannot answer
  app.get('/count', async () => {
    try {
      const stats = await repository.stats();
      return { records: stats.total, backend: store.backend };
    } catch (error) {
      logger.error({ err: error }, 'Failed to count notes');
      return { records: null, backend: store.backend };
    }
  });

  app.get('/stats', async () => {
    return repository.stats();
  });

  // Recent notes
  app.get<LimitQuery>('/notes', async (request) => {
    const notes = await repository.recent(numberParam(request.query.limit, 10));
    return { notes: notes.map(toNoteResource) };
  });

  app.post('/notes', async (request, reply) => {
    const parsed = createNoteBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: parsed.error.issues.map((issue) => issue.message).join('; ') };
    }
    const { title, content, due_at } = parsed.data;
    const id = await repository.add(title, content, due_at ? new Date(due_at) : undefined);
    reply.code(201);
    return { id: id.toString() };
  });

  // Remove every note
  app.delete('/notes', async () => {
    await repository.clear();
    return { deleted: true };
  });

  // Search notes
  app.get<SearchQuery>('/notes/search', async (request, reply) => {
    const query = request.query.q;
    if (query === undefined) {
      reply.code(400);
      return { error: 'Query parameter "q" is required' };
    }
    const notes = await repository.search(query, numberParam(request.query.limit, 10));
    return { notes: notes.map(toNoteResource) };
  });

  app.get<ReminderQuery>('/notes/reminders', async (request) => {
    const notes = await repository.upcomingReminders(numberParam(request.query.hours, 24));
    return { notes: notes.map(toNoteResource) };
  });

  // Get specific note
  app.get<IdParams>('/notes/:id', async (request, reply) => {
    const note = await repository.get(repository.parseId(request.params.id));
    if (!note) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    return toNoteResource(note);
  });

  app.put<IdParams>('/notes/:id', async (request, reply) => {
    const id = repository.parseId(request.params.id);
    const parsed = updateNoteBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: parsed.error.issues.map((issue) => issue.message).join('; ') };
    }
    const changes: NoteChanges = {};
    if (parsed.data.title !== undefined) {
      changes.title = parsed.data.title;
    }
    if (parsed.data.content !== undefined) {
      changes.content = parsed.data.content;
    }
    if (parsed.data.due_at !== undefined) {
      changes.dueAt = parsed.data.due_at === null ? null : new Date(parsed.data.due_at);
    }
    const updated = await repository.update(id, changes);
    if (!updated) {
      reply.code(404);
      return { error: 'Note not found or no fields to update' };
    }
    return { updated: true };
  });

  app.delete<IdParams>('/notes/:id', async (request, reply) => {
    const deleted = await repository.delete(repository.parseId(request.params.id));
    if (!deleted) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    return { deleted: true };
  });
}
