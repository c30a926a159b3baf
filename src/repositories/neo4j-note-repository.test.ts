import { beforeEach, describe, expect, it, vi } from 'vitest';

import { BackendUnavailableError, QueryFailureError } from '../core/errors.js';
import { NOTE_QUERIES, SCHEMA_QUERIES } from '../core/neo4j-queries.js';
import { CONTRACT_NOW, FakeClock } from '../test-support/note-repository-contract.js';
import { createSilentLogger } from '../utils/logger.js';
import { Neo4jNoteRepository } from './neo4j-note-repository.js';

const mocks = vi.hoisted(() => {
  const session = { run: vi.fn(), close: vi.fn() };
  const driver = { verifyConnectivity: vi.fn(), session: vi.fn(() => session), close: vi.fn() };
  return { session, driver };
});

// Mock neo4j-driver module
vi.mock('neo4j-driver', () => {
  const toInteger = (n: number) => ({ low: n, high: 0, toNumber: () => n });
  return {
    default: {
      driver: vi.fn(() => mocks.driver),
      auth: { basic: vi.fn((principal: string, credentials: string) => ({ principal, credentials })) },
      int: vi.fn(toInteger),
      isInt: vi.fn(
        (value: unknown) => typeof value === 'object' && value !== null && 'toNumber' in value
      ),
    },
  };
});

function record(values: Record<string, unknown>) {
  return { get: (key: string) => values[key] };
}

function result(rows: Record<string, unknown>[]) {
  return { records: rows.map(record) };
}

const UUID = '6f1c1d2e-3b4a-4c5d-8e9f-0a1b2c3d4e5f';

describe('Neo4jNoteRepository', () => {
  let repository: Neo4jNoteRepository;

  beforeEach(async () => {
    vi.clearAllMocks();
    mocks.session.run.mockResolvedValue(result([]));
    mocks.session.close.mockResolvedValue(undefined);
    mocks.driver.verifyConnectivity.mockResolvedValue({});
    mocks.driver.close.mockResolvedValue(undefined);

    repository = new Neo4jNoteRepository(
      { uri: 'neo4j://localhost:7687', username: 'neo4j', password: 'test-secret' },
      { logger: createSilentLogger(), clock: new FakeClock(CONTRACT_NOW.getTime()) }
    );
  });

  describe('initialize', () => {
    it('connects with basic auth and creates the schema', async () => {
      const neo4j = (await import('neo4j-driver')).default;

      await repository.initialize();

      expect(neo4j.driver).toHaveBeenCalledWith('neo4j://localhost:7687', {
        principal: 'neo4j',
        credentials: 'test-secret',
      });
      expect(mocks.driver.verifyConnectivity).toHaveBeenCalled();
      expect(mocks.session.run.mock.calls.map((call) => call[0])).toEqual([
        SCHEMA_QUERIES.createIdConstraint,
        SCHEMA_QUERIES.createCreatedAtIndex,
        SCHEMA_QUERIES.createDueAtIndex,
      ]);
      expect(mocks.session.close).toHaveBeenCalledTimes(1);
    });

    it('reports an unreachable server and releases the driver', async () => {
      mocks.driver.verifyConnectivity.mockRejectedValue(new Error('ServiceUnavailable'));

      await expect(repository.initialize()).rejects.toBeInstanceOf(BackendUnavailableError);
      expect(mocks.driver.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('after initialize', () => {
    beforeEach(async () => {
      await repository.initialize();
      mocks.session.run.mockClear();
      mocks.session.close.mockClear();
    });

    it('creates a node with a generated UUID and ISO timestamps', async () => {
      const id = await repository.add('A', 'B');

      const [query, params] = mocks.session.run.mock.calls[0] ?? [];
      expect(query).toBe(NOTE_QUERIES.create);
      expect(params).toEqual({
        id: id.value,
        title: 'A',
        content: 'B',
        due_at: null,
        created_at: '2024-05-01T12:00:00.000Z',
      });
      expect(id.value).toMatch(/^[0-9a-f-]{36}$/);
      expect(mocks.session.close).toHaveBeenCalledTimes(1);
    });

    it('maps returned properties to a record', async () => {
      mocks.session.run.mockResolvedValue(
        result([
          {
            id: UUID,
            title: 'A',
            content: 'B',
            due_at: '2024-05-01T13:00:00.000Z',
            created_at: '2024-05-01T12:00:00.000Z',
          },
        ])
      );

      const note = await repository.get(repository.parseId(UUID));

      expect(note?.id.value).toBe(UUID);
      expect(note?.dueAt?.toISOString()).toBe('2024-05-01T13:00:00.000Z');
      expect(note?.createdAt.toISOString()).toBe('2024-05-01T12:00:00.000Z');
    });

    it('treats an empty delete result as not found', async () => {
      mocks.session.run.mockResolvedValueOnce(result([{ id: UUID }]));
      mocks.session.run.mockResolvedValueOnce(result([]));
      const id = repository.parseId(UUID);

      expect(await repository.delete(id)).toBe(true);
      expect(await repository.delete(id)).toBe(false);
    });

    it('sets only the supplied properties', async () => {
      mocks.session.run.mockResolvedValue(result([{ id: UUID }]));

      await repository.update(repository.parseId(UUID), { title: 'T', dueAt: null });

      const [query, params] = mocks.session.run.mock.calls[0] ?? [];
      expect(query).toContain('SET n.title = $title, n.due_at = $due_at');
      expect(params).toEqual({ id: UUID, title: 'T', due_at: null });
    });

    it('searches with an escaped case-insensitive pattern', async () => {
      await repository.search('a.b', 7);

      const [query, params] = mocks.session.run.mock.calls[0] ?? [];
      expect(query).toBe(NOTE_QUERIES.search);
      expect(params.pattern).toBe('(?is).*a\\.b.*');
      expect(params.limit.toNumber()).toBe(7);
    });

    it('converts Integer counts in stats', async () => {
      const int = (n: number) => ({ toNumber: () => n });
      mocks.session.run.mockResolvedValue(
        result([{ total: int(5), with_reminder: int(2), recent: int(4) }])
      );

      expect(await repository.stats()).toEqual({
        total: 5,
        withReminder: 2,
        withoutReminder: 3,
        recentCount: 4,
      });
      expect(mocks.session.run.mock.calls[0]?.[1]).toEqual({ since: '2024-04-24T12:00:00.000Z' });
    });

    it('wraps driver errors in QueryFailureError and still closes the session', async () => {
      mocks.session.run.mockRejectedValue(new Error('Neo.ClientError.Statement.SyntaxError'));

      await expect(repository.recent(3)).rejects.toBeInstanceOf(QueryFailureError);
      expect(mocks.session.close).toHaveBeenCalledTimes(1);
    });

    it('closes the driver once', async () => {
      await repository.close();
      await repository.close();

      expect(mocks.driver.close).toHaveBeenCalledTimes(1);
    });
  });

  it('fails operations before initialize', async () => {
    await expect(repository.recent(1)).rejects.toBeInstanceOf(QueryFailureError);
  });
});
