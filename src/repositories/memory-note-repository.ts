import { randomUUID } from 'node:crypto';

import type { NoteChanges, NoteRecord, NoteStats } from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';
import { UUID_PATTERN } from './note-validation.js';

interface StoredNote {
  id: string;
  title: string;
  content: string;
  dueAt?: Date;
  createdAt: Date;
}

/**
 * In-memory NoteRepository implementation.
 * Exact semantics (true substring match, exact ordering); the other adapters
 * are judged against it by the conformance harness.
 */
export class MemoryNoteRepository extends AbstractNoteRepository<'in-memory'> {
  private notes = new Map<string, StoredNote>();

  constructor(options: NoteRepositoryOptions) {
    super('in-memory', options);
  }

  async initialize(): Promise<void> {
    this.logger.info('In-memory note store initialized');
  }

  async close(): Promise<void> {
    this.notes.clear();
  }

  async clear(): Promise<void> {
    this.notes.clear();
  }

  protected describeInvalidId(value: string): string | null {
    return UUID_PATTERN.test(value) ? null : 'expected a UUID';
  }

  protected async insert(note: NewNote): Promise<string> {
    const id = randomUUID();
    const stored: StoredNote = {
      id,
      title: note.title,
      content: note.content,
      createdAt: new Date(note.createdAt),
    };
    if (note.dueAt) {
      stored.dueAt = new Date(note.dueAt);
    }
    this.notes.set(id, stored);
    return id;
  }

  protected async findById(id: string): Promise<NoteRecord<'in-memory'> | undefined> {
    const stored = this.notes.get(id);
    return stored ? this.toRecord(stored) : undefined;
  }

  protected async remove(id: string): Promise<boolean> {
    return this.notes.delete(id);
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const stored = this.notes.get(id);
    if (!stored) {
      return false;
    }
    const next: StoredNote = { ...stored };
    if (changes.title !== undefined) {
      next.title = changes.title;
    }
    if (changes.content !== undefined) {
      next.content = changes.content;
    }
    if (changes.dueAt === null) {
      delete next.dueAt;
    } else if (changes.dueAt !== undefined) {
      next.dueAt = new Date(changes.dueAt);
    }
    this.notes.set(id, next);
    return true;
  }

  protected async findMatching(query: string, limit: number): Promise<NoteRecord<'in-memory'>[]> {
    const lower = query.toLowerCase();
    return this.newestFirst()
      .filter(
        (note) =>
          note.title.toLowerCase().includes(lower) ||
          note.content.toLowerCase().includes(lower)
      )
      .slice(0, limit)
      .map((note) => this.toRecord(note));
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'in-memory'>[]> {
    return this.newestFirst()
      .slice(0, limit)
      .map((note) => this.toRecord(note));
  }

  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'in-memory'>[]> {
    const start = from.getTime();
    const end = to.getTime();
    return Array.from(this.notes.values())
      .filter((note) => {
        const due = note.dueAt?.getTime();
        return due !== undefined && due >= start && due <= end;
      })
      .sort((a, b) => (a.dueAt?.getTime() ?? 0) - (b.dueAt?.getTime() ?? 0))
      .map((note) => this.toRecord(note));
  }

  protected async countStats(createdSince: Date): Promise<NoteStats> {
    const notes = Array.from(this.notes.values());
    const withReminder = notes.filter((note) => note.dueAt !== undefined).length;
    const since = createdSince.getTime();
    return {
      total: notes.length,
      withReminder,
      withoutReminder: notes.length - withReminder,
      recentCount: notes.filter((note) => note.createdAt.getTime() >= since).length,
    };
  }

  private newestFirst(): StoredNote[] {
    return Array.from(this.notes.values()).sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
    );
  }

  private toRecord(note: StoredNote): NoteRecord<'in-memory'> {
    const record: NoteRecord<'in-memory'> = {
      id: this.toNoteId(note.id),
      title: note.title,
      content: note.content,
      createdAt: new Date(note.createdAt),
    };
    if (note.dueAt) {
      record.dueAt = new Date(note.dueAt);
    }
    return record;
  }
}
