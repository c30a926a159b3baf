/**
 * Neo4j Cypher Queries
 *
 * All Cypher used by the graph note repository.
 */

const RETURN_NOTE = `
    RETURN n.id AS id,
           n.title AS title,
           n.content AS content,
           n.due_at AS due_at,
           n.created_at AS created_at
`;

/**
 * Constraint and index queries for schema initialization
 */
export const SCHEMA_QUERIES = {
  createIdConstraint: 'CREATE CONSTRAINT note_id_unique IF NOT EXISTS FOR (n:Note) REQUIRE n.id IS UNIQUE',
  createCreatedAtIndex: 'CREATE INDEX note_created_at IF NOT EXISTS FOR (n:Note) ON (n.created_at)',
  createDueAtIndex: 'CREATE INDEX note_due_at IF NOT EXISTS FOR (n:Note) ON (n.due_at)',
} as const;

export const NOTE_QUERIES = {
  create: `
    CREATE (n:Note {
      id: $id,
      title: $title,
      content: $content,
      due_at: $due_at,
      created_at: $created_at
    })
    RETURN n.id AS id
  `,

  getById: `
    MATCH (n:Note {id: $id})
    ${RETURN_NOTE}
  `,

  // Returning the id after DELETE tells a removed node from no match.
  deleteById: `
    MATCH (n:Note {id: $id})
    WITH n, n.id AS id
    DELETE n
    RETURN id
  `,

  search: `
    MATCH (n:Note)
    WHERE n.title =~ $pattern OR n.content =~ $pattern
    ${RETURN_NOTE}
    ORDER BY created_at DESC
    LIMIT $limit
  `,

  recent: `
    MATCH (n:Note)
    ${RETURN_NOTE}
    ORDER BY created_at DESC
    LIMIT $limit
  `,

  dueBetween: `
    MATCH (n:Note)
    WHERE n.due_at IS NOT NULL AND n.due_at >= $from AND n.due_at <= $to
    ${RETURN_NOTE}
    ORDER BY due_at ASC
  `,

  stats: `
    MATCH (n:Note)
    RETURN count(n) AS total,
           count(n.due_at) AS with_reminder,
           sum(CASE WHEN n.created_at >= $since THEN 1 ELSE 0 END) AS recent
  `,
} as const;

/**
 * Build an update query that sets only the supplied properties.
 * Property names come from a fixed list, never from input.
 */
export function buildUpdateQuery(properties: ReadonlyArray<'title' | 'content' | 'due_at'>): string {
  const assignments = properties.map((property) => `n.${property} = $${property}`);
  return `
    MATCH (n:Note {id: $id})
    SET ${assignments.join(', ')}
    RETURN n.id AS id
  `;
}

/**
 * Maintenance queries
 */
export const MAINTENANCE_QUERIES = {
  deleteAll: 'MATCH (n:Note) DETACH DELETE n',
} as const;
