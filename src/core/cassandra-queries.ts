/**
 * CQL used by the wide-column note repository.
 * Statements are built per keyspace because CQL cannot bind identifiers.
 */

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]{0,47}$/;

export function isValidKeyspace(name: string): boolean {
  return IDENTIFIER.test(name);
}

const COLUMNS = 'id, title, content, due_at, created_at';

export function buildSchemaQueries(keyspace: string): string[] {
  return [
    `CREATE KEYSPACE IF NOT EXISTS ${keyspace}
       WITH replication = {'class': 'SimpleStrategy', 'replication_factor': 1}`,
    `CREATE TABLE IF NOT EXISTS ${keyspace}.notes (
       id uuid PRIMARY KEY,
       title text,
       content text,
       due_at timestamp,
       created_at timestamp
     )`,
    `CREATE INDEX IF NOT EXISTS notes_title_idx ON ${keyspace}.notes (title)`,
    `CREATE INDEX IF NOT EXISTS notes_created_at_idx ON ${keyspace}.notes (created_at)`,
    `CREATE INDEX IF NOT EXISTS notes_due_at_idx ON ${keyspace}.notes (due_at)`,
  ];
}

export function buildNoteQueries(keyspace: string) {
  const table = `${keyspace}.notes`;
  return {
    insert: `INSERT INTO ${table} (${COLUMNS}) VALUES (?, ?, ?, ?, ?)`,
    getById: `SELECT ${COLUMNS} FROM ${table} WHERE id = ?`,
    deleteById: `DELETE FROM ${table} WHERE id = ? IF EXISTS`,
    // Full table scan; paged by the driver.
    scanAll: `SELECT ${COLUMNS} FROM ${table}`,
    dueBetween: `SELECT ${COLUMNS} FROM ${table} WHERE due_at >= ? AND due_at <= ? ALLOW FILTERING`,
    countAll: `SELECT COUNT(*) AS count FROM ${table}`,
    countDueSince: `SELECT COUNT(*) AS count FROM ${table} WHERE due_at >= ? ALLOW FILTERING`,
    countCreatedSince: `SELECT COUNT(*) AS count FROM ${table} WHERE created_at >= ? ALLOW FILTERING`,
    truncate: `TRUNCATE ${table}`,
  } as const;
}

export type NoteQueries = ReturnType<typeof buildNoteQueries>;

/**
 * Build a conditional update touching only the supplied columns.
 * Column names come from a fixed list, never from input.
 */
export function buildUpdateQuery(
  keyspace: string,
  columns: ReadonlyArray<'title' | 'content' | 'due_at'>
): string {
  const assignments = columns.map((column) => `${column} = ?`).join(', ');
  return `UPDATE ${keyspace}.notes SET ${assignments} WHERE id = ? IF EXISTS`;
}
