import type { z } from 'zod';

import {
  createdNoteSchema,
  deletedSchema,
  errorBodySchema,
  healthSchema,
  noteListSchema,
  noteResourceSchema,
  statsSchema,
  updatedSchema,
} from '../api/schemas.js';
import {
  BackendUnavailableError,
  InvalidIdentifierError,
  QueryFailureError,
  ValidationError,
  errorMessage,
} from '../core/errors.js';
import type {
  NoteChanges,
  NoteRecord,
  NoteResource,
  NoteStats,
  RemoteConfig,
} from '../types/index.js';
import {
  AbstractNoteRepository,
  type NewNote,
  type NoteRepositoryOptions,
} from './abstract-note-repository.js';

// Dots are excluded: "." and ".." would be collapsed out of the request path.
const REMOTE_ID = /^[A-Za-z0-9_-]+$/;

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * NoteRepository that forwards every call to a notes HTTP API, such as the
 * one this service exposes.
 *
 * Transport failures and timeouts surface as BackendUnavailableError, a 400
 * as ValidationError (or InvalidIdentifierError), a 404 on a single note as
 * an absent result, and any other non-2xx status or malformed body as
 * QueryFailureError.
 */
export class RemoteNoteRepository extends AbstractNoteRepository<'remote-proxy'> {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: RemoteConfig, options: NoteRepositoryOptions) {
    super('remote-proxy', options);
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
  }

  async initialize(): Promise<void> {
    try {
      const health = await this.request('health', 'GET', '/health', healthSchema);
      if (!health) {
        throw new Error('GET /health answered 404');
      }
    } catch (error) {
      throw new BackendUnavailableError(
        `Remote notes service at ${this.baseUrl} is not healthy: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.logger.info({ baseUrl: this.baseUrl }, 'Remote note store initialized');
  }

  async close(): Promise<void> {
    // fetch pools connections globally; nothing to release per instance.
  }

  async clear(): Promise<void> {
    await this.run('clear', () => this.request('clear', 'DELETE', '/notes', deletedSchema));
  }

  protected describeInvalidId(value: string): string | null {
    return REMOTE_ID.test(value) ? null : 'unexpected characters in remote note id';
  }

  protected async insert(note: NewNote): Promise<string> {
    const created = await this.request('add', 'POST', '/notes', createdNoteSchema, {
      title: note.title,
      content: note.content,
      due_at: note.dueAt ? note.dueAt.toISOString() : null,
    });
    if (!created) {
      throw new QueryFailureError('add', 'remote service answered 404');
    }
    return created.id;
  }

  protected async findById(id: string): Promise<NoteRecord<'remote-proxy'> | undefined> {
    const resource = await this.request('get', 'GET', this.notePath(id), noteResourceSchema);
    return resource ? this.toRecord(resource) : undefined;
  }

  protected async remove(id: string): Promise<boolean> {
    const result = await this.request('delete', 'DELETE', this.notePath(id), deletedSchema);
    return result?.deleted ?? false;
  }

  protected async modify(id: string, changes: NoteChanges): Promise<boolean> {
    const body: Record<string, string | null> = {};
    if (changes.title !== undefined) {
      body.title = changes.title;
    }
    if (changes.content !== undefined) {
      body.content = changes.content;
    }
    if (changes.dueAt !== undefined) {
      body.due_at = changes.dueAt === null ? null : changes.dueAt.toISOString();
    }
    const result = await this.request('update', 'PUT', this.notePath(id), updatedSchema, body);
    return result?.updated ?? false;
  }

  protected async findMatching(
    query: string,
    limit: number
  ): Promise<NoteRecord<'remote-proxy'>[]> {
    const params = new URLSearchParams({ q: query, limit: String(limit) });
    return this.list('search', `/notes/search?${params.toString()}`);
  }

  protected async findRecent(limit: number): Promise<NoteRecord<'remote-proxy'>[]> {
    return this.list('recent', `/notes?limit=${limit}`);
  }

  /**
   * The remote service evaluates the window against its own clock, so only
   * the width is forwarded.
   */
  protected async findDueBetween(from: Date, to: Date): Promise<NoteRecord<'remote-proxy'>[]> {
    const hours = (to.getTime() - from.getTime()) / 3_600_000;
    return this.list('upcomingReminders', `/notes/reminders?hours=${hours}`);
  }

  protected async countStats(): Promise<NoteStats> {
    const stats = await this.request('stats', 'GET', '/stats', statsSchema);
    if (!stats) {
      throw new QueryFailureError('stats', 'remote service answered 404');
    }
    return stats;
  }

  private async list(operation: string, path: string): Promise<NoteRecord<'remote-proxy'>[]> {
    const body = await this.request(operation, 'GET', path, noteListSchema);
    if (!body) {
      // A collection route never 404s on a compatible service.
      throw new QueryFailureError(operation, `remote service answered 404 for ${path}`);
    }
    return body.notes.map((resource) => this.toRecord(resource));
  }

  private notePath(id: string): string {
    return `/notes/${encodeURIComponent(id)}`;
  }

  /**
   * Send one request and validate the JSON reply. Resolves undefined on 404.
   */
  private async request<S extends z.ZodTypeAny>(
    operation: string,
    method: HttpMethod,
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S> | undefined> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new BackendUnavailableError(
        `${method} ${path} did not reach the remote notes service: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (response.status === 404) {
      await response.body?.cancel();
      return undefined;
    }

    const payload = await this.readJson(operation, response);
    if (response.status === 400) {
      const parsed = errorBodySchema.safeParse(payload);
      const message = parsed.success ? parsed.data.error : 'remote service rejected the request';
      if (parsed.success && parsed.data.code === 'INVALID_IDENTIFIER') {
        throw new InvalidIdentifierError(path.slice(path.lastIndexOf('/') + 1), message);
      }
      throw new ValidationError(message);
    }
    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(payload);
      throw new QueryFailureError(
        operation,
        `remote service answered ${response.status}${parsed.success ? `: ${parsed.data.error}` : ''}`
      );
    }

    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new QueryFailureError(operation, `malformed response: ${result.error.message}`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  private async readJson(operation: string, response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new QueryFailureError(operation, `response is not JSON (${response.status})`, {
        cause: error,
      });
    }
  }

  private toRecord(resource: NoteResource): NoteRecord<'remote-proxy'> {
    const record: NoteRecord<'remote-proxy'> = {
      id: this.toNoteId(resource.id),
      title: resource.title,
      content: resource.content,
      createdAt: new Date(resource.created_at),
    };
    if (resource.due_at) {
      record.dueAt = new Date(resource.due_at);
    }
    return record;
  }
}
