import Nano from 'nano';

import type { CouchDBConfig } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { INoteDocumentStore, NoteDocument, NoteFields } from './interfaces.js';

export function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * CouchDB client for the notes database
 * Implements INoteDocumentStore interface for abstraction
 */
export class CouchDBClient implements INoteDocumentStore {
  private nano: Nano.ServerScope;
  private db: Nano.DocumentScope<NoteFields>;
  private readonly database: string;

  constructor(
    config: CouchDBConfig,
    private readonly logger: Logger
  ) {
    const auth = `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}`;
    const url = config.url.replace('://', `://${auth}@`);

    this.nano = Nano(url);
    this.database = config.database;
    this.db = this.nano.db.use<NoteFields>(config.database);
  }

  /**
   * Test connection to CouchDB
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.nano.db.list();
      this.logger.info('CouchDB connection successful');
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to connect to CouchDB');
      return false;
    }
  }

  async ensureDatabase(): Promise<void> {
    try {
      await this.nano.db.get(this.database);
    } catch (error) {
      if (statusCodeOf(error) !== 404) {
        throw error;
      }
      try {
        await this.nano.db.create(this.database);
        this.logger.info({ database: this.database }, 'Created CouchDB database');
      } catch (createError) {
        // 412: created concurrently by another process
        if (statusCodeOf(createError) !== 412) {
          throw createError;
        }
      }
    }
  }

  async ensureIndex(name: string, fields: string[]): Promise<void> {
    const result = await this.db.createIndex({ index: { fields }, name, ddoc: name });
    this.logger.debug({ name, fields, result: result.result }, 'Index ensured');
  }

  async insertDocument(fields: NoteFields): Promise<string> {
    try {
      const response = await this.db.insert(fields);
      return response.id;
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to insert document');
      throw error;
    }
  }

  /**
   * Get a specific document by ID
   */
  async getDocument(id: string): Promise<NoteDocument | null> {
    try {
      const doc = await this.db.get(id);
      return {
        _id: doc._id,
        _rev: doc._rev,
        title: doc.title,
        content: doc.content,
        due_at: doc.due_at ?? null,
        created_at: doc.created_at,
      };
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return null;
      }
      this.logger.error({ err: error, id }, 'Failed to fetch document');
      throw error;
    }
  }

  async saveDocument(doc: NoteDocument): Promise<boolean> {
    try {
      await this.db.insert(doc);
      return true;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return false;
      }
      this.logger.error({ err: error, id: doc._id }, 'Failed to save document');
      throw error;
    }
  }

  async destroyDocument(id: string, rev: string): Promise<boolean> {
    try {
      await this.db.destroy(id, rev);
      return true;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return false;
      }
      this.logger.error({ err: error, id }, 'Failed to delete document');
      throw error;
    }
  }

  async find(query: Nano.MangoQuery): Promise<NoteDocument[]> {
    try {
      const result = await this.db.find(query);
      return result.docs.map((doc) => ({
        _id: doc._id,
        _rev: doc._rev,
        title: doc.title,
        content: doc.content,
        due_at: doc.due_at ?? null,
        created_at: doc.created_at,
      }));
    } catch (error) {
      this.logger.error({ err: error, selector: query.selector }, 'Mango query failed');
      throw error;
    }
  }

  async deleteAllDocuments(): Promise<number> {
    const result = await this.db.list();
    const docs = result.rows
      .filter((row) => !row.id.startsWith('_design'))
      .map((row) => ({ _id: row.id, _rev: row.value.rev, _deleted: true }));
    if (docs.length === 0) {
      return 0;
    }
    await this.db.bulk({ docs });
    this.logger.debug({ count: docs.length }, 'Deleted all documents');
    return docs.length;
  }
}
