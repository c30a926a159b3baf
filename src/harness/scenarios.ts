import { HOUR_MS } from '../core/clock.js';
import { NoteStoreError } from '../core/errors.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteId, NoteRecord } from '../types/index.js';

/**
 * JSON-comparable result of a scenario. Ids and timestamps are left out so
 * outcomes from different backends can be compared directly.
 */
export type Outcome = string | number | boolean | null | Outcome[] | { [key: string]: Outcome };

export interface ScenarioContext {
  repository: NoteRepository;
  /** Record one assertion; never throws. */
  check(description: string, passed: boolean): void;
}

export interface Scenario {
  name: string;
  run(context: ScenarioContext): Promise<Outcome>;
}

export function normalizeRecord(record: NoteRecord | undefined): Outcome {
  if (!record) {
    return null;
  }
  return { title: record.title, content: record.content, hasDueAt: record.dueAt !== undefined };
}

function titles(records: NoteRecord[]): string[] {
  return records.map((record) => record.title);
}

/**
 * Error code an action fails with, or "none".
 */
async function failureCode(action: () => unknown): Promise<string> {
  try {
    await action();
    return 'none';
  } catch (error) {
    return error instanceof NoteStoreError ? error.code : 'UNEXPECTED';
  }
}

function sameOrder(actual: string[], expected: string[]): boolean {
  return actual.length === expected.length && actual.every((title, i) => title === expected[i]);
}

const crud: Scenario = {
  name: 'crud',
  async run({ repository, check }) {
    const id = await repository.add('A', 'B');
    const created = await repository.get(id);
    check('get returns the added note', created?.title === 'A' && created.content === 'B');
    check('note without reminder has no dueAt', created !== undefined && created.dueAt === undefined);

    const updated = await repository.update(id, { title: 'A2' });
    const afterUpdate = await repository.get(id);
    check('update reports success', updated);
    check('update changes only the supplied field', afterUpdate?.title === 'A2' && afterUpdate.content === 'B');

    const emptyUpdate = await repository.update(id, {});
    check('update without fields reports false', !emptyUpdate);

    const deleted = await repository.delete(id);
    const deletedAgain = await repository.delete(id);
    const afterDelete = await repository.get(id);
    check('delete reports true then false', deleted && !deletedAgain);
    check('deleted note is gone', afterDelete === undefined);

    return {
      created: normalizeRecord(created),
      updated,
      afterUpdate: normalizeRecord(afterUpdate),
      emptyUpdate,
      deleted,
      deletedAgain,
      afterDelete: normalizeRecord(afterDelete),
    };
  },
};

const validation: Scenario = {
  name: 'validation',
  async run({ repository, check }) {
    const existing = await repository.add('kept', 'kept');
    const codes = {
      emptyTitle: await failureCode(() => repository.add('', 'content')),
      blankTitle: await failureCode(() => repository.add('   ', 'content')),
      emptyContent: await failureCode(() => repository.add('title', '')),
      emptyTitleUpdate: await failureCode(() => repository.update(existing, { title: '' })),
      malformedId: await failureCode(() => repository.parseId('not a valid id!')),
      emptyId: await failureCode(() => repository.parseId('')),
      zeroLimit: await failureCode(() => repository.search('kept', 0)),
      fractionalLimit: await failureCode(() => repository.recent(1.5)),
      zeroHours: await failureCode(() => repository.upcomingReminders(0)),
    };
    check('empty title is rejected', codes.emptyTitle === 'VALIDATION');
    check('whitespace title is rejected', codes.blankTitle === 'VALIDATION');
    check('empty content is rejected', codes.emptyContent === 'VALIDATION');
    check('update to an empty title is rejected', codes.emptyTitleUpdate === 'VALIDATION');
    check('malformed id is rejected', codes.malformedId === 'INVALID_IDENTIFIER');
    check('empty id is rejected', codes.emptyId === 'INVALID_IDENTIFIER');
    check('non-positive limit is rejected', codes.zeroLimit === 'VALIDATION');
    check('fractional limit is rejected', codes.fractionalLimit === 'VALIDATION');
    check('non-positive window is rejected', codes.zeroHours === 'VALIDATION');

    const stats = await repository.stats();
    check('rejected adds store nothing', stats.total === 1);
    return { ...codes, total: stats.total };
  },
};

const search: Scenario = {
  name: 'search',
  async run({ repository, check }) {
    await repository.add('Foo', 'Bar');
    await repository.add('Baz', 'Qux');
    await repository.add('foo fighters', 'lowercase title');
    await repository.add('Other', 'mentions FOO in the content');

    const foo = titles(await repository.search('Foo', 10));
    const qux = titles(await repository.search('qux', 10));
    const missing = titles(await repository.search('zzz', 10));
    const blank = titles(await repository.search('   ', 10));

    check('match on title', foo.includes('Foo'));
    check('non-match excluded', !foo.includes('Baz'));
    check('case-insensitive on title and content', sameOrder(foo, ['Other', 'foo fighters', 'Foo']));
    check('content match', sameOrder(qux, ['Baz']));
    check('no match yields empty', missing.length === 0);
    check('blank query yields empty', blank.length === 0);
    return { foo, qux, missing, blank };
  },
};

const searchLimit: Scenario = {
  name: 'search-limit',
  async run({ repository, check }) {
    for (let i = 1; i <= 4; i++) {
      await repository.add(`limit ${i}`, 'shared needle');
    }
    const limited = titles(await repository.search('needle', 2));
    check('limit caps the result', limited.length === 2);
    check('newest matches come first', sameOrder(limited, ['limit 4', 'limit 3']));
    return { limited };
  },
};

const reminders: Scenario = {
  name: 'reminders',
  async run({ repository, check }) {
    const now = Date.now();
    await repository.add('soon', 'due in half an hour', new Date(now + HOUR_MS / 2));
    await repository.add('later', 'due in two hours', new Date(now + 2 * HOUR_MS));
    await repository.add('past', 'was due an hour ago', new Date(now - HOUR_MS));
    await repository.add('none', 'no reminder');

    const withinOne = titles(await repository.upcomingReminders(1));
    const withinThree = titles(await repository.upcomingReminders(3));
    check('one-hour window holds only the nearest', sameOrder(withinOne, ['soon']));
    check('wider window is ordered by due time', sameOrder(withinThree, ['soon', 'later']));
    return { withinOne, withinThree };
  },
};

const statistics: Scenario = {
  name: 'stats',
  async run({ repository, check }) {
    await repository.add('reminded', 'with reminder', new Date(Date.now() + HOUR_MS / 2));
    await repository.add('plain', 'without reminder');
    const stats = await repository.stats();
    check('total counts every note', stats.total === 2);
    check('reminder split', stats.withReminder === 1 && stats.withoutReminder === 1);
    check('fresh notes count as recent', stats.recentCount === 2);
    return { ...stats };
  },
};

const recentListing: Scenario = {
  name: 'recent',
  async run({ repository, check }) {
    const ids: NoteId[] = [];
    for (let i = 1; i <= 7; i++) {
      ids.push(await repository.add(`note ${i}`, `content ${i}`));
    }
    const newest = ids[ids.length - 1];
    if (newest) {
      await repository.delete(newest);
    }
    const recent = titles(await repository.recent(5));
    check('at most limit notes', recent.length <= 5);
    check('newest first', sameOrder(recent, ['note 6', 'note 5', 'note 4', 'note 3', 'note 2']));
    check('deleted note never listed', !recent.includes('note 7'));
    return { recent };
  },
};

const idempotentReads: Scenario = {
  name: 'idempotent-reads',
  async run({ repository, check }) {
    const id = await repository.add('stable', 'read twice', new Date(Date.now() + HOUR_MS));
    const first = await repository.get(id);
    const second = await repository.get(id);
    check(
      'get twice returns identical records',
      first !== undefined &&
        second !== undefined &&
        first.id.equals(second.id) &&
        first.title === second.title &&
        first.content === second.content &&
        first.createdAt.getTime() === second.createdAt.getTime() &&
        first.dueAt?.getTime() === second.dueAt?.getTime()
    );
    const searchFirst = titles(await repository.search('stable', 10));
    const searchSecond = titles(await repository.search('stable', 10));
    check('search twice returns identical results', sameOrder(searchFirst, searchSecond));
    return { record: normalizeRecord(first), search: searchFirst };
  },
};

/**
 * The fixed scenario sequence every backend runs, in order.
 */
export const SCENARIOS: readonly Scenario[] = [
  crud,
  validation,
  search,
  searchLimit,
  reminders,
  statistics,
  recentListing,
  idempotentReads,
];
