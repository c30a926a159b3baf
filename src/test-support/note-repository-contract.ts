import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { HOUR_MS, type Clock } from '../core/clock.js';
import { InvalidIdentifierError, ValidationError } from '../core/errors.js';
import type { NoteRepositoryOptions } from '../repositories/abstract-note-repository.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import { NoteId, type BackendName, type NoteRecord } from '../types/index.js';
import { createSilentLogger } from '../utils/logger.js';

export interface ContractSubject {
  repository: NoteRepository;
  /** A well-formed id that no stored note has. */
  absentId: string;
  teardown?: () => Promise<void>;
}

export class FakeClock implements Clock {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  set(value: Date): void {
    this.current = value.getTime();
  }
}

export const CONTRACT_NOW = new Date('2024-05-01T12:00:00.000Z');

function titles(records: NoteRecord[]): string[] {
  return records.map((record) => record.title);
}

/**
 * Behaviour every NoteRepository must share. Each test starts from an
 * initialized, empty repository driven by a fake clock.
 */
export function describeNoteRepositoryContract(
  label: string,
  create: (options: NoteRepositoryOptions) => Promise<ContractSubject>
) {
  describe(`${label} (NoteRepository contract)`, () => {
    let clock: FakeClock;
    let subject: ContractSubject;
    let repository: NoteRepository;

    beforeEach(async () => {
      clock = new FakeClock(CONTRACT_NOW.getTime());
      subject = await create({ logger: createSilentLogger(), clock });
      repository = subject.repository;
      await repository.initialize();
      await repository.clear();
    });

    afterEach(async () => {
      await repository.close();
      await subject.teardown?.();
    });

    it('adds a note and reads it back', async () => {
      const id = await repository.add('A', 'B');
      const note = await repository.get(id);

      expect(note?.title).toBe('A');
      expect(note?.content).toBe('B');
      expect(note?.dueAt).toBeUndefined();
      expect(note?.createdAt.toISOString()).toBe(CONTRACT_NOW.toISOString());
      expect(note?.id.equals(id)).toBe(true);
    });

    it('keeps the reminder time', async () => {
      const due = new Date(CONTRACT_NOW.getTime() + HOUR_MS);
      const id = await repository.add('A', 'B', due);

      expect((await repository.get(id))?.dueAt?.toISOString()).toBe(due.toISOString());
    });

    it('assigns distinct ids and increasing creation times', async () => {
      const first = await repository.add('one', 'x');
      const second = await repository.add('two', 'x');

      expect(first.equals(second)).toBe(false);
      const [a, b] = await Promise.all([repository.get(first), repository.get(second)]);
      expect(b?.createdAt.getTime()).toBeGreaterThan(a?.createdAt.getTime() ?? Infinity);
    });

    it('rejects empty and whitespace-only fields without storing anything', async () => {
      await expect(repository.add('', 'content')).rejects.toBeInstanceOf(ValidationError);
      await expect(repository.add('title', '   ')).rejects.toBeInstanceOf(ValidationError);

      expect((await repository.stats()).total).toBe(0);
    });

    it('returns undefined for a well-formed absent id', async () => {
      expect(await repository.get(repository.parseId(subject.absentId))).toBeUndefined();
    });

    it('rejects malformed ids', () => {
      expect(() => repository.parseId('not a valid id!')).toThrow(InvalidIdentifierError);
      expect(() => repository.parseId('')).toThrow(InvalidIdentifierError);
    });

    it('rejects ids minted by another backend', async () => {
      const id = await repository.add('A', 'B');
      const other: BackendName = repository.backend === 'graph' ? 'document' : 'graph';

      await expect(repository.get(new NoteId(other, id.value))).rejects.toBeInstanceOf(
        InvalidIdentifierError
      );
    });

    it('deletes once', async () => {
      const id = await repository.add('A', 'B');

      expect(await repository.delete(id)).toBe(true);
      expect(await repository.delete(id)).toBe(false);
      expect(await repository.get(id)).toBeUndefined();
    });

    it('updates only the supplied fields', async () => {
      const id = await repository.add('A', 'B', new Date(CONTRACT_NOW.getTime() + HOUR_MS));

      expect(await repository.update(id, { content: 'C' })).toBe(true);
      const updated = await repository.get(id);
      expect(updated?.title).toBe('A');
      expect(updated?.content).toBe('C');
      expect(updated?.dueAt).toBeDefined();

      expect(await repository.update(id, { dueAt: null })).toBe(true);
      expect((await repository.get(id))?.dueAt).toBeUndefined();
    });

    it('reports false for empty updates and absent notes', async () => {
      const id = await repository.add('A', 'B');

      expect(await repository.update(id, {})).toBe(false);
      expect(await repository.update(repository.parseId(subject.absentId), { title: 'X' })).toBe(
        false
      );
      await expect(repository.update(id, { title: ' ' })).rejects.toBeInstanceOf(ValidationError);
      expect((await repository.get(id))?.title).toBe('A');
    });

    it('searches title and content case-insensitively, newest first', async () => {
      await repository.add('Foo', 'Bar');
      await repository.add('Baz', 'Qux');
      await repository.add('Other', 'mentions foo here');

      expect(titles(await repository.search('Foo', 10))).toEqual(['Other', 'Foo']);
      expect(titles(await repository.search('QUX', 10))).toEqual(['Baz']);
      expect(titles(await repository.search('Foo', 1))).toEqual(['Other']);
    });

    it('treats search input literally', async () => {
      await repository.add('100% done', 'a_b (c)');
      await repository.add('1000 done', 'axb c');

      expect(titles(await repository.search('100%', 10))).toEqual(['100% done']);
      expect(titles(await repository.search('a_b', 10))).toEqual(['100% done']);
      expect(titles(await repository.search('(c)', 10))).toEqual(['100% done']);
    });

    it('returns nothing for a blank query and rejects bad limits', async () => {
      await repository.add('Foo', 'Bar');

      expect(await repository.search('  ', 10)).toEqual([]);
      await expect(repository.search('Foo', 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(repository.recent(-1)).rejects.toBeInstanceOf(ValidationError);
    });

    it('lists reminders inside the window, soonest first', async () => {
      const at = (minutes: number) => new Date(CONTRACT_NOW.getTime() + minutes * 60_000);
      await repository.add('later', 'x', at(120));
      await repository.add('soon', 'x', at(30));
      await repository.add('edge', 'x', at(60));
      await repository.add('past', 'x', at(-60));
      await repository.add('none', 'x');

      expect(titles(await repository.upcomingReminders(1))).toEqual(['soon', 'edge']);
      expect(titles(await repository.upcomingReminders(3))).toEqual(['soon', 'edge', 'later']);
      await expect(repository.upcomingReminders(0)).rejects.toBeInstanceOf(ValidationError);
    });

    it('computes statistics over the trailing week', async () => {
      clock.set(new Date(CONTRACT_NOW.getTime() - 8 * 24 * HOUR_MS));
      await repository.add('old', 'x');
      clock.set(CONTRACT_NOW);
      await repository.add('reminded', 'x', new Date(CONTRACT_NOW.getTime() + HOUR_MS / 2));
      await repository.add('plain', 'x');

      expect(await repository.stats()).toEqual({
        total: 3,
        withReminder: 1,
        withoutReminder: 2,
        recentCount: 2,
      });
    });

    it('lists recent notes newest first without deleted ones', async () => {
      const ids: NoteId[] = [];
      for (let i = 1; i <= 7; i++) {
        ids.push(await repository.add(`note ${i}`, 'x'));
      }
      const newest = ids[6];
      if (newest) {
        await repository.delete(newest);
      }

      expect(titles(await repository.recent(5))).toEqual([
        'note 6',
        'note 5',
        'note 4',
        'note 3',
        'note 2',
      ]);
    });

    it('returns identical results for repeated reads', async () => {
      const id = await repository.add('stable', 'x', new Date(CONTRACT_NOW.getTime() + HOUR_MS));

      expect(await repository.get(id)).toEqual(await repository.get(id));
    });

    it('clears every note', async () => {
      await repository.add('A', 'B');
      await repository.add('C', 'D');
      await repository.clear();

      expect((await repository.stats()).total).toBe(0);
      expect(await repository.recent(10)).toEqual([]);
    });
  });
}
