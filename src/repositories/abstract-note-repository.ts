import { HOUR_MS, MonotonicClock, RECENT_WINDOW_MS, systemClock, type Clock } from '../core/clock.js';
import { InvalidIdentifierError, toQueryFailure } from '../core/errors.js';
import {
  NoteId,
  type BackendName,
  type NoteChanges,
  type NoteRecord,
  type NoteStats,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { NoteRepository } from './note-repository.js';
import {
  isBlank,
  normalizeChanges,
  requireDate,
  requireHours,
  requireLimit,
  requireText,
} from './note-validation.js';

export interface NoteRepositoryOptions {
  logger: Logger;
  /** Wall clock used for reminder and stats windows. */
  clock?: Clock;
}

/**
 * Fields an adapter persists when a note is created.
 */
export interface NewNote {
  title: string;
  content: string;
  dueAt?: Date;
  createdAt: Date;
}

/**
 * Shared contract plumbing: argument validation, identifier ownership,
 * creation timestamps, and wrapping engine errors into QueryFailureError.
 * Adapters implement only the engine-specific primitives.
 */
export abstract class AbstractNoteRepository<B extends BackendName>
  implements NoteRepository<B>
{
  protected readonly logger: Logger;
  protected readonly clock: Clock;
  private readonly creationClock: MonotonicClock;

  protected constructor(
    readonly backend: B,
    options: NoteRepositoryOptions
  ) {
    this.logger = options.logger.child({ backend });
    this.clock = options.clock ?? systemClock;
    this.creationClock = new MonotonicClock(this.clock);
  }

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;
  abstract clear(): Promise<void>;

  /**
   * Describe why `value` is not a well-formed id for this backend,
   * or return null when it is.
   */
  protected abstract describeInvalidId(value: string): string | null;

  protected abstract insert(note: NewNote): Promise<string>;
  protected abstract findById(id: string): Promise<NoteRecord<B> | undefined>;
  protected abstract remove(id: string): Promise<boolean>;
  protected abstract modify(id: string, changes: NoteChanges): Promise<boolean>;
  protected abstract findMatching(query: string, limit: number): Promise<NoteRecord<B>[]>;
  protected abstract findRecent(limit: number): Promise<NoteRecord<B>[]>;
  protected abstract findDueBetween(from: Date, to: Date): Promise<NoteRecord<B>[]>;
  protected abstract countStats(createdSince: Date): Promise<NoteStats>;

  parseId(raw: string): NoteId<B> {
    const problem = this.describeInvalidId(raw);
    if (problem) {
      throw new InvalidIdentifierError(raw, problem);
    }
    return new NoteId(this.backend, raw);
  }

  async add(title: string, content: string, dueAt?: Date): Promise<NoteId<B>> {
    requireText('title', title);
    requireText('content', content);
    if (dueAt !== undefined) {
      requireDate('dueAt', dueAt);
    }
    const createdAt = this.creationClock.now();
    const id = await this.run('add', () => this.insert({ title, content, dueAt, createdAt }));
    this.logger.debug({ id, title, dueAt }, 'Note added');
    return new NoteId(this.backend, id);
  }

  async get(id: NoteId<B>): Promise<NoteRecord<B> | undefined> {
    const key = this.ownKey(id);
    return this.run('get', () => this.findById(key));
  }

  async delete(id: NoteId<B>): Promise<boolean> {
    const key = this.ownKey(id);
    const removed = await this.run('delete', () => this.remove(key));
    if (removed) {
      this.logger.debug({ id: key }, 'Note deleted');
    } else {
      this.logger.warn({ id: key }, 'Attempt to delete non-existent note');
    }
    return removed;
  }

  async update(id: NoteId<B>, changes: NoteChanges): Promise<boolean> {
    const key = this.ownKey(id);
    const normalized = normalizeChanges(changes);
    if (!normalized) {
      return false;
    }
    const updated = await this.run('update', () => this.modify(key, normalized));
    this.logger.debug({ id: key, fields: Object.keys(normalized), updated }, 'Note update applied');
    return updated;
  }

  async search(query: string, limit: number): Promise<NoteRecord<B>[]> {
    requireLimit(limit);
    if (isBlank(query)) {
      return [];
    }
    const results = await this.run('search', () => this.findMatching(query, limit));
    this.logger.debug({ query, results: results.length }, 'Search performed');
    return results;
  }

  async recent(limit: number): Promise<NoteRecord<B>[]> {
    requireLimit(limit);
    return this.run('recent', () => this.findRecent(limit));
  }

  async upcomingReminders(hours: number): Promise<NoteRecord<B>[]> {
    requireHours(hours);
    const from = this.clock.now();
    const to = new Date(from.getTime() + hours * HOUR_MS);
    return this.run('upcomingReminders', () => this.findDueBetween(from, to));
  }

  async stats(): Promise<NoteStats> {
    const since = new Date(this.clock.now().getTime() - RECENT_WINDOW_MS);
    return this.run('stats', () => this.countStats(since));
  }

  protected async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      this.logger.error({ err: error, operation }, 'Note store operation failed');
      throw toQueryFailure(operation, error);
    }
  }

  protected toNoteId(value: string): NoteId<B> {
    return new NoteId(this.backend, value);
  }

  private ownKey(id: NoteId<B>): string {
    if (id.backend !== this.backend) {
      throw new InvalidIdentifierError(id.value, `belongs to the ${id.backend} backend`);
    }
    const problem = this.describeInvalidId(id.value);
    if (problem) {
      throw new InvalidIdentifierError(id.value, problem);
    }
    return id.value;
  }
}
