import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BackendUnavailableError, QueryFailureError } from '../core/errors.js';
import { MemoryNoteRepository } from '../repositories/memory-note-repository.js';
import { CONTRACT_NOW, FakeClock } from '../test-support/note-repository-contract.js';
import { createSilentLogger } from '../utils/logger.js';
import { buildServer } from './server.js';

describe('notes routes', () => {
  let app: FastifyInstance;
  let repository: MemoryNoteRepository;

  beforeEach(async () => {
    repository = new MemoryNoteRepository({
      logger: createSilentLogger(),
      clock: new FakeClock(CONTRACT_NOW.getTime()),
    });
    await repository.initialize();
    app = await buildServer({ backend: 'in-memory', repository }, createSilentLogger());
  });

  afterEach(async () => {
    await app.close();
  });

  async function createNote(payload: Record<string, unknown>): Promise<string> {
    const response = await app.inject({ method: 'POST', url: '/notes', payload });
    expect(response.statusCode).toBe(201);
    return response.json().id;
  }

  describe('GET /health', () => {
    it('reports the active backend', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', backend: 'in-memory' });
    });
  });

  describe('GET /count', () => {
    it('returns the number of notes', async () => {
      await createNote({ title: 'A', content: 'B' });

      const response = await app.inject({ method: 'GET', url: '/count' });

      expect(response.json()).toEqual({ records: 1, backend: 'in-memory' });
    });

    it('returns null when stats fail', async () => {
      vi.spyOn(repository, 'stats').mockRejectedValue(new QueryFailureError('stats', 'boom'));

      const response = await app.inject({ method: 'GET', url: '/count' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ records: null, backend: 'in-memory' });
    });
  });

  describe('POST /notes', () => {
    it('creates a note and returns its id', async () => {
      const id = await createNote({
        title: 'A',
        content: 'B',
        due_at: '2024-05-01T13:00:00.000Z',
      });

      const response = await app.inject({ method: 'GET', url: `/notes/${id}` });

      expect(response.json()).toEqual({
        id,
        title: 'A',
        content: 'B',
        due_at: '2024-05-01T13:00:00.000Z',
        created_at: '2024-05-01T12:00:00.000Z',
      });
    });

    it('rejects a blank title', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/notes',
        payload: { title: ' ', content: 'B' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Note title must not be empty', code: 'VALIDATION' });
    });

    it('rejects a malformed body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/notes',
        payload: { title: 'A', content: 'B', due_at: 'tomorrow' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Expected an ISO-8601 timestamp' });
    });
  });

  describe('GET /notes/:id', () => {
    it('returns 404 for an absent note', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/notes/00000000-0000-4000-8000-000000000000',
      });

      expect(response.statusCode).toBe(404);
    });

    it('returns 400 for a malformed id', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes/not-a-uuid' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'Invalid note id "not-a-uuid": expected a UUID',
        code: 'INVALID_IDENTIFIER',
      });
    });
  });

  describe('PUT /notes/:id', () => {
    it('applies supplied fields and clears the reminder with null', async () => {
      const id = await createNote({ title: 'A', content: 'B', due_at: '2024-05-01T13:00:00.000Z' });

      const response = await app.inject({
        method: 'PUT',
        url: `/notes/${id}`,
        payload: { title: 'A2', due_at: null },
      });

      expect(response.json()).toEqual({ updated: true });
      const note = (await app.inject({ method: 'GET', url: `/notes/${id}` })).json();
      expect(note).toMatchObject({ title: 'A2', content: 'B', due_at: null });
    });

    it('returns 404 for an absent note', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/notes/00000000-0000-4000-8000-000000000000',
        payload: { title: 'X' },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('DELETE /notes/:id', () => {
    it('deletes once', async () => {
      const id = await createNote({ title: 'A', content: 'B' });

      const first = await app.inject({ method: 'DELETE', url: `/notes/${id}` });
      const second = await app.inject({ method: 'DELETE', url: `/notes/${id}` });

      expect(first.json()).toEqual({ deleted: true });
      expect(second.statusCode).toBe(404);
    });
  });

  describe('DELETE /notes', () => {
    it('removes every note', async () => {
      await createNote({ title: 'A', content: 'B' });
      await createNote({ title: 'C', content: 'D' });

      await app.inject({ method: 'DELETE', url: '/notes' });

      expect((await app.inject({ method: 'GET', url: '/count' })).json().records).toBe(0);
    });
  });

  describe('listing routes', () => {
    beforeEach(async () => {
      await createNote({ title: 'Foo', content: 'Bar', due_at: '2024-05-01T12:30:00.000Z' });
      await createNote({ title: 'Baz', content: 'Qux', due_at: '2024-05-01T15:00:00.000Z' });
      await createNote({ title: 'Other', content: 'about foo' });
    });

    it('lists recent notes with a limit', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes?limit=2' });

      expect(response.json().notes.map((note: { title: string }) => note.title)).toEqual([
        'Other',
        'Baz',
      ]);
    });

    it('searches notes', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes/search?q=foo' });

      expect(response.json().notes.map((note: { title: string }) => note.title)).toEqual([
        'Other',
        'Foo',
      ]);
    });

    it('requires a search query', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes/search' });

      expect(response.statusCode).toBe(400);
    });

    it('rejects a non-numeric limit', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes?limit=many' });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION');
    });

    it('lists reminders inside the window', async () => {
      const response = await app.inject({ method: 'GET', url: '/notes/reminders?hours=1' });

      expect(response.json().notes.map((note: { title: string }) => note.title)).toEqual(['Foo']);
    });

    it('returns stats', async () => {
      const response = await app.inject({ method: 'GET', url: '/stats' });

      expect(response.json()).toEqual({
        total: 3,
        withReminder: 2,
        withoutReminder: 1,
        recentCount: 3,
      });
    });
  });

  describe('error mapping', () => {
    it('maps an unavailable backend to 503', async () => {
      vi.spyOn(repository, 'recent').mockRejectedValue(new BackendUnavailableError('down'));

      const response = await app.inject({ method: 'GET', url: '/notes' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ error: 'down', code: 'BACKEND_UNAVAILABLE' });
    });

    it('maps a failed query to 502', async () => {
      vi.spyOn(repository, 'search').mockRejectedValue(new QueryFailureError('search', 'boom'));

      const response = await app.inject({ method: 'GET', url: '/notes/search?q=x' });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({ error: 'search failed: boom', code: 'QUERY_FAILURE' });
    });
  });
});
