import { randomUUID } from 'node:crypto';
import neo4j, { type Driver, type Record as Neo4jRecord, type Session } from 'neo4j-driver';

import { BackendUnavailableError, errorMessage } from '../core/errors.js';
import {
  MAINTENANCE_QUERIES,
  NOTE_QUERIES,
  SCHEMA_QUERIES,
  buildUpdateQuery,
} from '../core/neo4j-queries.js';
import type { Neo4jConfig, NoteChanges, NoteRecord, NoteStats } from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';
import { UUID_PATTERN, escapeRegExp } from './note-validation.js';

const NOT_INITIALIZED = 'Neo4j driver not initialized. Call initialize() first.';

function toNumber(value: unknown): number {
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  return typeof value === 'number' ? value : 0;
}

/**
 * Graph NoteRepository backed by Neo4j.
 *
 * Each note is a `:Note` node; `id` is a generated UUID guarded by a
 * uniqueness constraint. Timestamps are ISO-8601 strings, which order the same
 * way as the instants they encode. Every call opens its own session.
 */
export class Neo4jNoteRepository extends AbstractNoteRepository<'graph'> {
  private readonly config: Neo4jConfig;
  private driver: Driver | null = null;

  constructor(config: Neo4jConfig, options: NoteRepositoryOptions) {
    super('graph', options);
    this.config = config;
  }

  /**
   * Connect, verify connectivity and create the constraint and indexes.
   */
  async initialize(): Promise<void> {
    try {
      this.driver = neo4j.driver(
        this.config.uri,
        neo4j.auth.basic(this.config.username, this.config.password)
      );
      await this.driver.verifyConnectivity();
      await this.withSession(async (session) => {
        await session.run(SCHEMA_QUERIES.createIdConstraint);
        await session.run(SCHEMA_QUERIES.createCreatedAtIndex);
        await session.run(SCHEMA_QUERIES.createDueAtIndex);
      });
    } catch (error) {
      await this.close();
      throw new BackendUnavailableError(
        `Failed to initialize Neo4j connection: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.logger.info({ uri: this.config.uri }, 'Neo4j note store initialized');
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      this.logger.info('Neo4j connection closed');
    }
  }

  async clear(): Promise<void> {
    await this.run('clear', () =>
      this.withSession(async (session) => {
        await session.run(MAINTENANCE_QUERIES.deleteAll);
      })
    );
  }

  protected describeInvalidId(value: string): string | null {
    return UUID_PATTERN.test(value) ? null : 'expected a UUID';
  }

  protected async insert(note: NewNote): Promise<string> {
    const id = randomUUID();
    await this.withSession((session) =>
      session.run(NOTE_QUERIES.create, {
        id,
        title: note.title,
        content: note.content,
        due_at: note.dueAt ? note.dueAt.toISOString() : null,
        created_at: note.createdAt.toISOString(),
      })
    );
    return id;
  }

  protected async findById(id: string): Promise<NoteRecord<'graph'> | undefined> {
    const records = await this.query(NOTE_QUERIES.getById, { id });
    return records[0];
  }

  protected async remove(id: string): Promise<boolean> {
    const result = await this.withSession((session) => session.run(NOTE_QUERIES.deleteById, { id }));
    return result.records.length > 0;
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const properties: ('title' | 'content' | 'due_at')[] = [];
    const params: Record<string, string | null> = { id };
    if (changes.title !== undefined) {
      properties.push('title');
      params.title = changes.title;
    }
    if (changes.content !== undefined) {
      properties.push('content');
      params.content = changes.content;
    }
    if (changes.dueAt !== undefined) {
      properties.push('due_at');
      params.due_at = changes.dueAt === null ? null : changes.dueAt.toISOString();
    }
    const result = await this.withSession((session) =>
      session.run(buildUpdateQuery(properties), params)
    );
    return result.records.length > 0;
  }

  protected async findMatching(query: string, limit: number): Promise<NoteRecord<'graph'>[]> {
    return this.query(NOTE_QUERIES.search, {
      pattern: `(?is).*${escapeRegExp(query)}.*`,
      limit: neo4j.int(limit),
    });
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'graph'>[]> {
    return this.query(NOTE_QUERIES.recent, { limit: neo4j.int(limit) });
  }

  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'graph'>[]> {
    return this.query(NOTE_QUERIES.dueBetween, {
      from: from.toISOString(),
      to: to.toISOString(),
    });
  }

  protected async countStats(createdSince: Date): Promise<NoteStats> {
    const result = await this.withSession((session) =>
      session.run(NOTE_QUERIES.stats, { since: createdSince.toISOString() })
    );
    const row = result.records[0];
    const total = row ? toNumber(row.get('total')) : 0;
    const withReminder = row ? toNumber(row.get('with_reminder')) : 0;
    return {
      total,
      withReminder,
      withoutReminder: total - withReminder,
      recentCount: row ? toNumber(row.get('recent')) : 0,
    };
  }

  private async query(
    cypher: string,
    params: Record<string, unknown>
  ): Promise<NoteRecord<'graph'>[]> {
    const result = await this.withSession((session) => session.run(cypher, params));
    return result.records.map((record) => this.toRecord(record));
  }

  private async withSession<T>(work: (session: Session) => Promise<T>): Promise<T> {
    if (!this.driver) {
      throw new Error(NOT_INITIALIZED);
    }
    const session = this.driver.session({ database: this.config.database });
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }

  private toRecord(record: Neo4jRecord): NoteRecord<'graph'> {
    const dueAt: unknown = record.get('due_at');
    const note: NoteRecord<'graph'> = {
      id: this.toNoteId(String(record.get('id'))),
      title: String(record.get('title')),
      content: String(record.get('content')),
      createdAt: new Date(String(record.get('created_at'))),
    };
    if (typeof dueAt === 'string') {
      note.dueAt = new Date(dueAt);
    }
    return note;
  }
}
