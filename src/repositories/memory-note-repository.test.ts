import { describe, expect, it } from 'vitest';

import { describeNoteRepositoryContract } from '../test-support/note-repository-contract.js';
import { createSilentLogger } from '../utils/logger.js';
import { MemoryNoteRepository } from './memory-note-repository.js';

describeNoteRepositoryContract('MemoryNoteRepository', async (options) => ({
  repository: new MemoryNoteRepository(options),
  absentId: '00000000-0000-4000-8000-000000000000',
}));

describe('MemoryNoteRepository', () => {
  it('does not share stored dates with callers', async () => {
    const repository = new MemoryNoteRepository({ logger: createSilentLogger() });
    const due = new Date('2030-01-01T00:00:00.000Z');
    const id = await repository.add('A', 'B', due);

    due.setFullYear(2031);
    const first = await repository.get(id);
    first?.dueAt?.setFullYear(2032);

    expect((await repository.get(id))?.dueAt?.toISOString()).toBe('2030-01-01T00:00:00.000Z');
  });

  it('matches non-ASCII text regardless of case', async () => {
    const repository = new MemoryNoteRepository({ logger: createSilentLogger() });
    await repository.add('Ärger', 'Über alles');

    const results = await repository.search('über', 10);

    expect(results.map((note) => note.title)).toEqual(['Ärger']);
  });

  it('forgets everything on close', async () => {
    const repository = new MemoryNoteRepository({ logger: createSilentLogger() });
    await repository.add('A', 'B');
    await repository.close();

    expect((await repository.stats()).total).toBe(0);
  });
});
