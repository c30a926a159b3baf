import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BackendUnavailableError, errorMessage } from '../core/errors.js';
import type { NoteChanges, NoteRecord, NoteStats, SqliteConfig } from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS notes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    due_at INTEGER,
    created_at INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_notes_created_at ON notes(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_notes_due_at ON notes(due_at)',
];

const COLUMNS = 'id, title, content, due_at, created_at';

const IN_MEMORY = ':memory:';

interface NoteRow {
  id: number;
  title: string;
  content: string;
  due_at: number | null;
  created_at: number;
}

interface StatsRow {
  total: number;
  with_reminder: number;
  recent: number;
}

/**
 * Relational NoteRepository backed by a SQLite file.
 *
 * Every call opens its own connection and closes it before returning, so the
 * shared instance holds no connection between calls. The `:memory:` path is
 * the exception: its one connection lives from initialize() to close(), since
 * the database disappears with it. Timestamps are stored as epoch
 * milliseconds. `LIKE` folds ASCII case only.
 */
export class SqliteNoteRepository extends AbstractNoteRepository<'relational'> {
  private readonly path: string;
  private memoryDb: Database.Database | null = null;

  constructor(config: SqliteConfig, options: NoteRepositoryOptions) {
    super('relational', options);
    this.path = config.path;
  }

  async initialize(): Promise<void> {
    try {
      if (this.path === IN_MEMORY) {
        if (!this.memoryDb) {
          this.memoryDb = new Database(IN_MEMORY);
        }
      } else {
        mkdirSync(dirname(this.path), { recursive: true });
      }
      this.withConnection((db) => {
        db.pragma('journal_mode = WAL');
        for (const statement of SCHEMA) {
          db.exec(statement);
        }
      });
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to open SQLite database at ${this.path}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.logger.info({ path: this.path }, 'SQLite note store initialized');
  }

  async close(): Promise<void> {
    // File connections are per call; only the in-memory one is held open.
    if (this.memoryDb) {
      this.memoryDb.close();
      this.memoryDb = null;
    }
  }

  async clear(): Promise<void> {
    await this.run('clear', async () =>
      this.withConnection((db) => {
        db.prepare('DELETE FROM notes').run();
      })
    );
  }

  protected describeInvalidId(value: string): string | null {
    if (!/^[1-9]\d*$/.test(value) || !Number.isSafeInteger(Number(value))) {
      return 'expected a positive integer';
    }
    return null;
  }

  protected async insert(note: NewNote): Promise<string> {
    return this.withConnection((db) => {
      const result = db
        .prepare('INSERT INTO notes (title, content, due_at, created_at) VALUES (?, ?, ?, ?)')
        .run(note.title, note.content, note.dueAt?.getTime() ?? null, note.createdAt.getTime());
      return String(result.lastInsertRowid);
    });
  }

  protected async findById(id: string): Promise<NoteRecord<'relational'> | undefined> {
    return this.withConnection((db) => {
      const row = db
        .prepare<[number], NoteRow>(`SELECT ${COLUMNS} FROM notes WHERE id = ?`)
        .get(Number(id));
      return row ? this.toRecord(row) : undefined;
    });
  }

  protected async remove(id: string): Promise<boolean> {
    return this.withConnection(
      (db) => db.prepare('DELETE FROM notes WHERE id = ?').run(Number(id)).changes > 0
    );
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const assignments: string[] = [];
    const params: (string | number | null)[] = [];
    if (changes.title !== undefined) {
      assignments.push('title = ?');
      params.push(changes.title);
    }
    if (changes.content !== undefined) {
      assignments.push('content = ?');
      params.push(changes.content);
    }
    if (changes.dueAt !== undefined) {
      assignments.push('due_at = ?');
      params.push(changes.dueAt === null ? null : changes.dueAt.getTime());
    }
    params.push(Number(id));
    return this.withConnection(
      (db) =>
        db.prepare(`UPDATE notes SET ${assignments.join(', ')} WHERE id = ?`).run(...params)
          .changes > 0
    );
  }

  protected async findMatching(query: string, limit: number): Promise<NoteRecord<'relational'>[]> {
    const pattern = `%${query.replace(/[\\%_]/g, '\\$&')}%`;
    return this.withConnection((db) =>
      db
        .prepare<[string, string, number], NoteRow>(
          `SELECT ${COLUMNS} FROM notes
           WHERE title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\'
           ORDER BY created_at DESC, id DESC
           LIMIT ?`
        )
        .all(pattern, pattern, limit)
        .map((row) => this.toRecord(row))
    );
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'relational'>[]> {
    return this.withConnection((db) =>
      db
        .prepare<[number], NoteRow>(
          `SELECT ${COLUMNS} FROM notes ORDER BY created_at DESC, id DESC LIMIT ?`
        )
        .all(limit)
        .map((row) => this.toRecord(row))
    );
  }

  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'relational'>[]> {
    return this.withConnection((db) =>
      db
        .prepare<[number, number], NoteRow>(
          `SELECT ${COLUMNS} FROM notes
           WHERE due_at IS NOT NULL AND due_at BETWEEN ? AND ?
           ORDER BY due_at ASC, id ASC`
        )
        .all(from.getTime(), to.getTime())
        .map((row) => this.toRecord(row))
    );
  }

  protected async countStats(createdSince: Date): Promise<NoteStats> {
    return this.withConnection((db) => {
      const row = db
        .prepare<[number], StatsRow>(
          `SELECT COUNT(*) AS total,
                  COUNT(due_at) AS with_reminder,
                  COALESCE(SUM(CASE WHEN created_at >= ? THEN 1 ELSE 0 END), 0) AS recent
           FROM notes`
        )
        .get(createdSince.getTime());
      const total = row?.total ?? 0;
      const withReminder = row?.with_reminder ?? 0;
      return {
        total,
        withReminder,
        withoutReminder: total - withReminder,
        recentCount: row?.recent ?? 0,
      };
    });
  }

  private withConnection<T>(work: (db: Database.Database) => T): T {
    if (this.path === IN_MEMORY) {
      if (!this.memoryDb) {
        throw new Error('In-memory SQLite database not initialized. Call initialize() first.');
      }
      return work(this.memoryDb);
    }
    const db = new Database(this.path, { timeout: 5000 });
    try {
      return work(db);
    } finally {
      db.close();
    }
  }

  private toRecord(row: NoteRow): NoteRecord<'relational'> {
    const record: NoteRecord<'relational'> = {
      id: this.toNoteId(String(row.id)),
      title: row.title,
      content: row.content,
      createdAt: new Date(row.created_at),
    };
    if (row.due_at !== null) {
      record.dueAt = new Date(row.due_at);
    }
    return record;
  }
}
