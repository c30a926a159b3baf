/**
 * Core interfaces for engine clients.
 * These let the adapters be exercised against fakes in tests.
 */

import type Nano from 'nano';

/**
 * Fields of a note document in the CouchDB `notes` database.
 * `due_at` is null when the note has no reminder.
 */
export interface NoteFields {
  title: string;
  content: string;
  due_at: string | null;
  created_at: string;
}

export type NoteDocument = NoteFields & { _id: string; _rev: string };

/**
 * Interface for CouchDB document storage operations
 */
export interface INoteDocumentStore {
  /**
   * Check that the server answers.
   */
  testConnection(): Promise<boolean>;

  /**
   * Create the database when it is missing.
   */
  ensureDatabase(): Promise<void>;

  ensureIndex(name: string, fields: string[]): Promise<void>;

  /**
   * Insert a new document and return the server-assigned id.
   */
  insertDocument(fields: NoteFields): Promise<string>;

  /**
   * Get a single document by ID, or null when it does not exist.
   */
  getDocument(id: string): Promise<NoteDocument | null>;

  /**
   * Write a new revision. Resolves false when the document is gone.
   */
  saveDocument(doc: NoteDocument): Promise<boolean>;

  /**
   * Delete one revision. Resolves false when the document is gone.
   */
  destroyDocument(id: string, rev: string): Promise<boolean>;

  /**
   * Run a Mango query.
   */
  find(query: Nano.MangoQuery): Promise<NoteDocument[]>;

  /**
   * Delete every non-design document.
   */
  deleteAllDocuments(): Promise<number>;
}
