import dotenv from 'dotenv';

import { BACKEND_NAMES, isBackendName, type AppConfig, type BackendName } from '../types/index.js';

export type Env = Record<string, string | undefined>;

function parseBackend(variable: string, value: string): BackendName {
  const name = value.trim();
  if (!isBackendName(name)) {
    throw new Error(
      `${variable} must be one of ${BACKEND_NAMES.join(', ')}; got "${value}"`
    );
  }
  return name;
}

function parsePositiveInt(variable: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${variable} must be a positive integer; got "${value}"`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < 1) {
    throw new Error(`${variable} must be a positive integer; got "${value}"`);
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build the application configuration from environment variables.
 * `.env` is loaded first when reading from `process.env`.
 */
export function loadConfig(env: Env = readProcessEnv()): AppConfig {
  return {
    storage: {
      backend: parseBackend('NOTES_BACKEND', env.NOTES_BACKEND || 'relational'),
      sqlite: {
        path: env.SQLITE_PATH || './data/notes.db',
      },
      couchdb: {
        url: env.COUCHDB_URL || 'http://localhost:5984',
        username: env.COUCHDB_USERNAME || 'admin',
        password: env.COUCHDB_PASSWORD || 'password',
        database: env.COUCHDB_DATABASE || 'notes',
      },
      neo4j: {
        uri: env.NEO4J_URI || 'neo4j://localhost:7687',
        username: env.NEO4J_USERNAME || 'neo4j',
        password: env.NEO4J_PASSWORD || 'password',
        database: env.NEO4J_DATABASE || undefined,
      },
      cassandra: {
        contactPoints: parseList(env.CASSANDRA_CONTACT_POINTS || 'localhost'),
        port: parsePositiveInt('CASSANDRA_PORT', env.CASSANDRA_PORT || '9042'),
        localDataCenter: env.CASSANDRA_LOCAL_DATA_CENTER || 'datacenter1',
        keyspace: env.CASSANDRA_KEYSPACE || 'notes_keyspace',
        username: env.CASSANDRA_USERNAME || undefined,
        password: env.CASSANDRA_PASSWORD || undefined,
      },
      remote: {
        baseUrl: env.REMOTE_NOTES_URL || 'http://localhost:8080',
        timeoutMs: parsePositiveInt('REMOTE_TIMEOUT_MS', env.REMOTE_TIMEOUT_MS || '5000'),
      },
    },
    server: {
      port: parsePositiveInt('PORT', env.PORT || '3000'),
      host: env.HOST || '0.0.0.0',
    },
    logLevel: env.LOG_LEVEL || 'info',
    bench: {
      backends: parseList(env.BENCH_BACKENDS || 'in-memory,relational').map((name) =>
        parseBackend('BENCH_BACKENDS', name)
      ),
      size: parsePositiveInt('BENCH_SIZE', env.BENCH_SIZE || '200'),
    },
  };
}

function readProcessEnv(): Env {
  dotenv.config();
  return process.env;
}
