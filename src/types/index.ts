/**
 * Core type definitions for notes-store
 */

export const BACKEND_NAMES = [
  'relational',
  'document',
  'graph',
  'wide-column',
  'in-memory',
  'remote-proxy',
] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export function isBackendName(value: string): value is BackendName {
  return (BACKEND_NAMES as readonly string[]).includes(value);
}

/**
 * Opaque note identifier scoped to one backend.
 *
 * The physical form differs per engine (auto-increment integer, UUID,
 * document key); callers only ever hold the handle. A handle minted by one
 * backend is rejected by every other backend.
 */
export class NoteId<B extends BackendName = BackendName> {
  constructor(
    readonly backend: B,
    readonly value: string
  ) {}

  equals(other: NoteId): boolean {
    return this.backend === other.backend && this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export interface NoteRecord<B extends BackendName = BackendName> {
  id: NoteId<B>;
  title: string;
  content: string;
  dueAt?: Date;
  createdAt: Date;
}

/**
 * Fields accepted by update. `dueAt: null` clears the reminder.
 */
export interface NoteChanges {
  title?: string;
  content?: string;
  dueAt?: Date | null;
}

export interface NoteStats {
  total: number;
  withReminder: number;
  withoutReminder: number;
  /** Records created within the trailing seven days. */
  recentCount: number;
}

export interface SqliteConfig {
  path: string;
}

export interface CouchDBConfig {
  url: string;
  username: string;
  password: string;
  database: string;
}

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
}

export interface CassandraConfig {
  contactPoints: string[];
  port: number;
  localDataCenter: string;
  keyspace: string;
  username?: string;
  password?: string;
}

export interface RemoteConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface StorageConfig {
  backend: BackendName;
  sqlite: SqliteConfig;
  couchdb: CouchDBConfig;
  neo4j: Neo4jConfig;
  cassandra: CassandraConfig;
  remote: RemoteConfig;
}

export interface AppConfig {
  storage: StorageConfig;
  server: {
    port: number;
    host: string;
  };
  logLevel: string;
  bench: {
    backends: BackendName[];
    size: number;
  };
}

/**
 * JSON shape of a note on the notes HTTP API.
 */
export interface NoteResource {
  id: string;
  title: string;
  content: string;
  due_at: string | null;
  created_at: string;
}
