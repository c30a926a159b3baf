import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteRepositoryOptions } from '../repositories/abstract-note-repository.js';
import { CassandraNoteRepository } from '../repositories/cassandra-note-repository.js';
import { CouchDBNoteRepository } from '../repositories/couchdb-note-repository.js';
import { MemoryNoteRepository } from '../repositories/memory-note-repository.js';
import { Neo4jNoteRepository } from '../repositories/neo4j-note-repository.js';
import { RemoteNoteRepository } from '../repositories/remote-note-repository.js';
import { SqliteNoteRepository } from '../repositories/sqlite-note-repository.js';
import type { BackendName, StorageConfig } from '../types/index.js';

/**
 * A repository tagged with the backend that produced it.
 */
export type NoteStore = {
  [B in BackendName]: { backend: B; repository: NoteRepository<B> };
}[BackendName];

export type RepositoryFactory = (
  backend: BackendName,
  config: StorageConfig,
  options: NoteRepositoryOptions
) => NoteStore;

/**
 * Construct (but do not initialize) the adapter for `backend`.
 */
export const createRepository: RepositoryFactory = (backend, config, options) => {
  switch (backend) {
    case 'relational':
      return { backend, repository: new SqliteNoteRepository(config.sqlite, options) };
    case 'document':
      return { backend, repository: new CouchDBNoteRepository(config.couchdb, options) };
    case 'graph':
      return { backend, repository: new Neo4jNoteRepository(config.neo4j, options) };
    case 'wide-column':
      return { backend, repository: new CassandraNoteRepository(config.cassandra, options) };
    case 'in-memory':
      return { backend, repository: new MemoryNoteRepository(options) };
    case 'remote-proxy':
      return { backend, repository: new RemoteNoteRepository(config.remote, options) };
  }
};
