import type {
  BackendName,
  NoteChanges,
  NoteId,
  NoteRecord,
  NoteStats,
} from '../types/index.js';

/**
 * Storage contract for notes.
 * Every backend adapter implements it with identical observable semantics.
 */
export interface NoteRepository<B extends BackendName = BackendName> {
  readonly backend: B;

  /**
   * Connect, verify reachability and create schema.
   * Fails with BackendUnavailableError.
   */
  initialize(): Promise<void>;

  /**
   * Release connections. Safe to call on an uninitialized adapter.
   */
  close(): Promise<void>;

  /**
   * Turn an untrusted string into this backend's identifier.
   * Fails with InvalidIdentifierError.
   */
  parseId(raw: string): NoteId<B>;

  /**
   * Create a note, assigning its id and creation time.
   */
  add(title: string, content: string, dueAt?: Date): Promise<NoteId<B>>;

  /**
   * Return the stored note, or undefined when it does not exist.
   */
  get(id: NoteId<B>): Promise<NoteRecord<B> | undefined>;

  /**
   * Remove a note. Resolves false when nothing was there.
   */
  delete(id: NoteId<B>): Promise<boolean>;

  /**
   * Apply the supplied fields only. Resolves false when no field was supplied
   * or the note does not exist.
   */
  update(id: NoteId<B>, changes: NoteChanges): Promise<boolean>;

  /**
   * Case-insensitive substring search on title and content, newest first.
   */
  search(query: string, limit: number): Promise<NoteRecord<B>[]>;

  /**
   * The most recently created notes, newest first.
   */
  recent(limit: number): Promise<NoteRecord<B>[]>;

  /**
   * Notes due within [now, now + hours], soonest first.
   */
  upcomingReminders(hours: number): Promise<NoteRecord<B>[]>;

  stats(): Promise<NoteStats>;

  /**
   * Remove every note. Used by the conformance harness between scenarios.
   */
  clear(): Promise<void>;
}
