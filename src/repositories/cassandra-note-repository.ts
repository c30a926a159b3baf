import cassandra from 'cassandra-driver';
import type { Client, QueryOptions, types } from 'cassandra-driver';

import {
  buildNoteQueries,
  buildSchemaQueries,
  buildUpdateQuery,
  isValidKeyspace,
  type NoteQueries,
} from '../core/cassandra-queries.js';
import { BackendUnavailableError, errorMessage } from '../core/errors.js';
import type { CassandraConfig, NoteChanges, NoteRecord, NoteStats } from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';
import { UUID_PATTERN } from './note-validation.js';

const SCAN_PAGE_SIZE = 500;

/** Earliest instant a JS Date can hold; every stored due_at is after it. */
const EARLIEST = new Date(-8_640_000_000_000_000);

function toCount(value: unknown): number {
  if (
    typeof value === 'object' &&
    value !== null &&
    'toNumber' in value &&
    typeof value.toNumber === 'function'
  ) {
    return Number(value.toNumber());
  }
  return typeof value === 'number' ? value : 0;
}

/**
 * Wide-column NoteRepository backed by Cassandra.
 *
 * The table is keyed by `id uuid` with secondary indexes on title, created_at
 * and due_at. There is no substring search or cross-partition ordering, so
 * `search` and `recent` page through the whole table and filter and sort in
 * process. That is O(N) per call and only suitable for small tables.
 */
export class CassandraNoteRepository extends AbstractNoteRepository<'wide-column'> {
  private readonly config: CassandraConfig;
  private readonly queries: NoteQueries;
  private client: Client | null = null;

  constructor(config: CassandraConfig, options: NoteRepositoryOptions) {
    super('wide-column', options);
    this.config = config;
    this.queries = buildNoteQueries(config.keyspace);
  }

  async initialize(): Promise<void> {
    if (!isValidKeyspace(this.config.keyspace)) {
      throw new BackendUnavailableError(`Invalid Cassandra keyspace name: ${this.config.keyspace}`);
    }
    const { username, password } = this.config;
    this.client = new cassandra.Client({
      contactPoints: this.config.contactPoints,
      localDataCenter: this.config.localDataCenter,
      protocolOptions: { port: this.config.port },
      ...(username !== undefined && password !== undefined
        ? { credentials: { username, password } }
        : {}),
    });
    try {
      await this.client.connect();
      for (const statement of buildSchemaQueries(this.config.keyspace)) {
        await this.client.execute(statement);
      }
    } catch (error) {
      await this.close();
      throw new BackendUnavailableError(
        `Failed to initialize Cassandra keyspace ${this.config.keyspace}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.logger.info(
      { contactPoints: this.config.contactPoints, keyspace: this.config.keyspace },
      'Cassandra note store initialized'
    );
  }

  async close(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.shutdown();
      this.logger.info('Cassandra connection closed');
    }
  }

  async clear(): Promise<void> {
    await this.run('clear', async () => {
      await this.execute(this.queries.truncate);
    });
  }

  protected describeInvalidId(value: string): string | null {
    return UUID_PATTERN.test(value) ? null : 'expected a UUID';
  }

  protected async insert(note: NewNote): Promise<string> {
    const id = cassandra.types.Uuid.random();
    await this.execute(this.queries.insert, [
      id,
      note.title,
      note.content,
      note.dueAt ?? null,
      note.createdAt,
    ]);
    return id.toString();
  }

  protected async findById(id: string): Promise<NoteRecord<'wide-column'> | undefined> {
    const result = await this.execute(this.queries.getById, [cassandra.types.Uuid.fromString(id)]);
    const row = result.first();
    return row ? this.toRecord(row) : undefined;
  }

  protected async remove(id: string): Promise<boolean> {
    const result = await this.execute(this.queries.deleteById, [
      cassandra.types.Uuid.fromString(id),
    ]);
    return result.wasApplied();
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const columns: ('title' | 'content' | 'due_at')[] = [];
    const params: (string | Date | null | types.Uuid)[] = [];
    if (changes.title !== undefined) {
      columns.push('title');
      params.push(changes.title);
    }
    if (changes.content !== undefined) {
      columns.push('content');
      params.push(changes.content);
    }
    if (changes.dueAt !== undefined) {
      columns.push('due_at');
      params.push(changes.dueAt);
    }
    params.push(cassandra.types.Uuid.fromString(id));
    const result = await this.execute(buildUpdateQuery(this.config.keyspace, columns), params);
    return result.wasApplied();
  }

  protected async findMatching(query: string, limit: number): Promise<NoteRecord<'wide-column'>[]> {
    const needle = query.toLowerCase();
    const matches = await this.scan(this.queries.scanAll, [], (note) =>
      note.title.toLowerCase().includes(needle) || note.content.toLowerCase().includes(needle)
    );
    return newestFirst(matches).slice(0, limit);
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'wide-column'>[]> {
    const all = await this.scan(this.queries.scanAll, [], () => true);
    return newestFirst(all).slice(0, limit);
  }

  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'wide-column'>[]> {
    const due = await this.scan(this.queries.dueBetween, [from, to], () => true);
    return due.sort((a, b) => (a.dueAt?.getTime() ?? 0) - (b.dueAt?.getTime() ?? 0));
  }

  protected async countStats(createdSince: Date): Promise<NoteStats> {
    const [total, withReminder, recentCount] = await Promise.all([
      this.count(this.queries.countAll, []),
      this.count(this.queries.countDueSince, [EARLIEST]),
      this.count(this.queries.countCreatedSince, [createdSince]),
    ]);
    return { total, withReminder, withoutReminder: total - withReminder, recentCount };
  }

  private async count(query: string, params: Date[]): Promise<number> {
    const result = await this.execute(query, params);
    const row = result.first();
    return row ? toCount(row.get('count')) : 0;
  }

  /**
   * Page through every row `query` returns and keep the records accepted by
   * `predicate`.
   */
  private async scan(
    query: string,
    params: unknown[],
    predicate: (note: NoteRecord<'wide-column'>) => boolean
  ): Promise<NoteRecord<'wide-column'>[]> {
    const kept: NoteRecord<'wide-column'>[] = [];
    let pageState: string | undefined;
    let pages = 0;
    do {
      const result = await this.execute(query, params, {
        fetchSize: SCAN_PAGE_SIZE,
        pageState,
      });
      for (const row of result.rows) {
        const note = this.toRecord(row);
        if (predicate(note)) {
          kept.push(note);
        }
      }
      pages++;
      pageState = result.pageState || undefined;
    } while (pageState);
    this.logger.debug({ pages, kept: kept.length }, 'Paged query finished');
    return kept;
  }

  private async execute(
    query: string,
    params: unknown[] = [],
    options: QueryOptions = {}
  ): Promise<types.ResultSet> {
    if (!this.client) {
      throw new Error('Cassandra client not initialized. Call initialize() first.');
    }
    return this.client.execute(query, params, { prepare: true, ...options });
  }

  private toRecord(row: types.Row): NoteRecord<'wide-column'> {
    const dueAt: unknown = row.get('due_at');
    const note: NoteRecord<'wide-column'> = {
      id: this.toNoteId(String(row.get('id'))),
      title: String(row.get('title')),
      content: String(row.get('content')),
      createdAt: new Date(row.get('created_at')),
    };
    if (dueAt instanceof Date) {
      note.dueAt = new Date(dueAt.getTime());
    }
    return note;
  }
}

function newestFirst<T extends { createdAt: Date }>(notes: T[]): T[] {
  return notes.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}
