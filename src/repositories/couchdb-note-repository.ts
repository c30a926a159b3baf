import type Nano from 'nano';

import { CouchDBClient } from '../core/couchdb-client.js';
import { BackendUnavailableError, errorMessage } from '../core/errors.js';
import type { INoteDocumentStore, NoteDocument } from '../core/interfaces.js';
import type { CouchDBConfig, NoteChanges, NoteRecord, NoteStats } from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';
import { escapeRegExp } from './note-validation.js';

/**
 * Upper bound for Mango finds that must see every matching document
 * (stats and reminder windows). Mango has no server-side count.
 */
const SCAN_LIMIT = 1_000_000;

const INDEXES: ReadonlyArray<{ name: string; fields: string[] }> = [
  { name: 'notes-compound', fields: ['title', 'content', 'due_at', 'created_at'] },
  { name: 'notes-created-at', fields: ['created_at'] },
  { name: 'notes-due-at', fields: ['due_at'] },
];

const ANY_CREATED_AT: Nano.MangoSelector = { created_at: { $gt: null } };

export interface CouchDBNoteRepositoryOptions extends NoteRepositoryOptions {
  /** Pre-built client; defaults to a nano-backed CouchDBClient. */
  client?: INoteDocumentStore;
}

/**
 * Document NoteRepository backed by CouchDB.
 *
 * Ids are the server-assigned `_id`. Search is a Mango `$regex` with the
 * `(?i)` flag over title and content, sorted and limited server-side.
 */
export class CouchDBNoteRepository extends AbstractNoteRepository<'document'> {
  private readonly client: INoteDocumentStore;
  private readonly database: string;

  constructor(config: CouchDBConfig, options: CouchDBNoteRepositoryOptions) {
    super('document', options);
    this.database = config.database;
    this.client = options.client ?? new CouchDBClient(config, this.logger);
  }

  async initialize(): Promise<void> {
    const connected = await this.client.testConnection();
    if (!connected) {
      throw new BackendUnavailableError(`CouchDB is not reachable for database ${this.database}`);
    }
    try {
      await this.client.ensureDatabase();
      for (const index of INDEXES) {
        await this.client.ensureIndex(index.name, index.fields);
      }
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to prepare CouchDB database ${this.database}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.logger.info({ database: this.database }, 'CouchDB note store initialized');
  }

  async close(): Promise<void> {
    // nano keeps no session state beyond the HTTP agent.
  }

  async clear(): Promise<void> {
    await this.run('clear', () => this.client.deleteAllDocuments());
  }

  protected describeInvalidId(value: string): string | null {
    if (value.length === 0) {
      return 'expected a document id';
    }
    if (value.startsWith('_')) {
      return 'document ids must not start with "_"';
    }
    if (!/^[A-Za-z0-9_.:-]+$/.test(value)) {
      return 'unexpected characters in document id';
    }
    return null;
  }

  protected async insert(note: NewNote): Promise<string> {
    return this.client.insertDocument({
      title: note.title,
      content: note.content,
      due_at: note.dueAt ? note.dueAt.toISOString() : null,
      created_at: note.createdAt.toISOString(),
    });
  }

  protected async findById(id: string): Promise<NoteRecord<'document'> | undefined> {
    const doc = await this.client.getDocument(id);
    return doc ? this.toRecord(doc) : undefined;
  }

  protected async remove(id: string): Promise<boolean> {
    const doc = await this.client.getDocument(id);
    if (!doc) {
      return false;
    }
    return this.client.destroyDocument(id, doc._rev);
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const doc = await this.client.getDocument(id);
    if (!doc) {
      return false;
    }
    const next: NoteDocument = { ...doc };
    if (changes.title !== undefined) {
      next.title = changes.title;
    }
    if (changes.content !== undefined) {
      next.content = changes.content;
    }
    if (changes.dueAt !== undefined) {
      next.due_at = changes.dueAt === null ? null : changes.dueAt.toISOString();
    }
    return this.client.saveDocument(next);
  }

  protected async findMatching(query: string, limit: number): Promise<NoteRecord<'document'>[]> {
    const pattern = `(?i)${escapeRegExp(query)}`;
    const docs = await this.client.find({
      selector: {
        ...ANY_CREATED_AT,
        $or: [{ title: { $regex: pattern } }, { content: { $regex: pattern } }],
      },
      sort: [{ created_at: 'desc' }],
      limit,
    });
    return docs.map((doc) => this.toRecord(doc));
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'document'>[]> {
    const docs = await this.client.find({
      selector: ANY_CREATED_AT,
      sort: [{ created_at: 'desc' }],
      limit,
    });
    return docs.map((doc) => this.toRecord(doc));
  }

  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'document'>[]> {
    const docs = await this.client.find({
      selector: { due_at: { $gte: from.toISOString(), $lte: to.toISOString() } },
      sort: [{ due_at: 'asc' }],
      limit: SCAN_LIMIT,
    });
    return docs.map((doc) => this.toRecord(doc));
  }

  protected async countStats(createdSince: Date): Promise<NoteStats> {
    const [total, withReminder, withoutReminder, recentCount] = await Promise.all([
      this.count(ANY_CREATED_AT),
      this.count({ due_at: { $ne: null } }),
      this.count({ due_at: null }),
      this.count({ created_at: { $gte: createdSince.toISOString() } }),
    ]);
    return { total, withReminder, withoutReminder, recentCount };
  }

  private async count(selector: Nano.MangoSelector): Promise<number> {
    const docs = await this.client.find({ selector, fields: ['_id'], limit: SCAN_LIMIT });
    return docs.length;
  }

  private toRecord(doc: NoteDocument): NoteRecord<'document'> {
    const record: NoteRecord<'document'> = {
      id: this.toNoteId(doc._id),
      title: doc.title,
      content: doc.content,
      createdAt: new Date(doc.created_at),
    };
    if (doc.due_at) {
      record.dueAt = new Date(doc.due_at);
    }
    return record;
  }
}
