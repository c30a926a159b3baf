import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BackendUnavailableError, InvalidIdentifierError, QueryFailureError } from '../core/errors.js';
import { describeNoteRepositoryContract } from '../test-support/note-repository-contract.js';
import { createSilentLogger } from '../utils/logger.js';
import { SqliteNoteRepository } from './sqlite-note-repository.js';

describeNoteRepositoryContract('SqliteNoteRepository', async (options) => {
  const dir = mkdtempSync(join(tmpdir(), 'notes-sqlite-contract-'));
  return {
    repository: new SqliteNoteRepository({ path: join(dir, 'notes.db') }, options),
    absentId: '999999',
    teardown: async () => rmSync(dir, { recursive: true, force: true }),
  };
});

describeNoteRepositoryContract('SqliteNoteRepository (:memory:)', async (options) => ({
  repository: new SqliteNoteRepository({ path: ':memory:' }, options),
  absentId: '999999',
}));

describe('SqliteNoteRepository', () => {
  let dir: string;
  let path: string;
  let repository: SqliteNoteRepository;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'notes-sqlite-'));
    path = join(dir, 'nested', 'notes.db');
    repository = new SqliteNoteRepository({ path }, { logger: createSilentLogger() });
    await repository.initialize();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the database directory, table and indexes', () => {
    const db = new Database(path, { readonly: true });
    try {
      const names = db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE tbl_name = 'notes' ORDER BY name"
        )
        .all()
        .map((row) => row.name);
      expect(names).toEqual(['idx_notes_created_at', 'idx_notes_due_at', 'notes']);
    } finally {
      db.close();
    }
  });

  it('stores timestamps as epoch milliseconds', async () => {
    const due = new Date('2030-06-01T08:30:00.000Z');
    const id = await repository.add('A', 'B', due);

    const db = new Database(path, { readonly: true });
    try {
      const row = db
        .prepare<[number], { due_at: number }>('SELECT due_at FROM notes WHERE id = ?')
        .get(Number(id.value));
      expect(row?.due_at).toBe(due.getTime());
    } finally {
      db.close();
    }
  });

  it('assigns increasing integer ids', async () => {
    const first = await repository.add('one', 'x');
    const second = await repository.add('two', 'x');

    expect(first.value).toBe('1');
    expect(second.value).toBe('2');
  });

  it('persists notes across instances', async () => {
    const id = await repository.add('A', 'B');
    const reopened = new SqliteNoteRepository({ path }, { logger: createSilentLogger() });
    await reopened.initialize();

    expect((await reopened.get(reopened.parseId(id.value)))?.title).toBe('A');
  });

  it('rejects ids that are not positive integers', () => {
    expect(() => repository.parseId('0')).toThrow(InvalidIdentifierError);
    expect(() => repository.parseId('12a')).toThrow(InvalidIdentifierError);
    expect(() => repository.parseId('99999999999999999999')).toThrow(InvalidIdentifierError);
    expect(repository.parseId('42').value).toBe('42');
  });

  it('fails initialization when the path cannot be created', async () => {
    const file = join(dir, 'plain-file');
    writeFileSync(file, 'not a directory');
    const blocked = new SqliteNoteRepository(
      { path: join(file, 'notes.db') },
      { logger: createSilentLogger() }
    );

    await expect(blocked.initialize()).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  describe('with an in-memory database', () => {
    it('keeps the schema and data between calls', async () => {
      const memory = new SqliteNoteRepository({ path: ':memory:' }, { logger: createSilentLogger() });
      await memory.initialize();

      const id = await memory.add('A', 'B');

      expect((await memory.get(id))?.title).toBe('A');
      expect((await memory.stats()).total).toBe(1);
      await memory.close();
    });

    it('drops the data on close', async () => {
      const memory = new SqliteNoteRepository({ path: ':memory:' }, { logger: createSilentLogger() });
      await memory.initialize();
      await memory.add('A', 'B');
      await memory.close();

      await expect(memory.recent(1)).rejects.toBeInstanceOf(QueryFailureError);
      await memory.initialize();
      expect(await memory.recent(1)).toEqual([]);
      await memory.close();
    });
  });
});
