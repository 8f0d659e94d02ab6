/**
 * Database Migrations
 *
 * Idempotent SQL bootstrap for the chunk store:
 * - pgvector extension
 * - document_processing table
 * - document_chunks table (with vector embeddings)
 * - Vector similarity search index
 */

import postgres from 'postgres';
import { errorMessage } from '@/lib/errors';
import { createLayerLogger } from '@/lib/logger';

const log = createLayerLogger('db', 'migrations');

// =============================================================================
// Migration SQL
// =============================================================================

const ENABLE_PGVECTOR = `
CREATE EXTENSION IF NOT EXISTS vector;
`;

const CREATE_DOCUMENT_PROCESSING_TABLE = `
CREATE TABLE IF NOT EXISTS document_processing (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  organization_id INTEGER NOT NULL,
  file_name VARCHAR(255) NOT NULL,

  -- Processing status
  processing_status VARCHAR(50) NOT NULL DEFAULT 'pending',
  error_message TEXT,

  -- Timestamps
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS ix_document_processing_organization_id
  ON document_processing(organization_id);
`;

const CREATE_DOCUMENT_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS document_chunks (
  id SERIAL PRIMARY KEY,
  document_processing_id UUID NOT NULL
    REFERENCES document_processing(id) ON DELETE CASCADE,
  chunk_text TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,

  -- pgvector embedding (1536 dimensions for OpenAI text-embedding-3-small)
  embedding vector(1536) NOT NULL,

  chunk_metadata JSONB NOT NULL DEFAULT '{}',

  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS ix_document_chunks_document_processing_id
  ON document_chunks(document_processing_id);
CREATE INDEX IF NOT EXISTS ix_document_chunks_created_at
  ON document_chunks(created_at);
CREATE UNIQUE INDEX IF NOT EXISTS ux_document_chunks_document_chunk
  ON document_chunks(document_processing_id, chunk_index);
`;

/**
 * IVFFlat index for approximate nearest neighbour search.
 * lists = number of clusters, adjust based on data size.
 */
const CREATE_VECTOR_INDEX = `
CREATE INDEX IF NOT EXISTS ix_document_chunks_embedding_ivfflat
ON document_chunks
USING ivfflat (embedding vector_cosine_ops)
WITH (lists = 100);
`;

const MIGRATIONS: ReadonlyArray<{ name: string; sql: string; optional?: boolean }> = [
  { name: 'pgvector_extension', sql: ENABLE_PGVECTOR },
  { name: 'document_processing_table', sql: CREATE_DOCUMENT_PROCESSING_TABLE },
  { name: 'document_chunks_table', sql: CREATE_DOCUMENT_CHUNKS_TABLE },
  // Building the index can fail before there is data to cluster; retried on the next run
  { name: 'vector_index', sql: CREATE_VECTOR_INDEX, optional: true },
];

export const REQUIRED_TABLES = ['document_processing', 'document_chunks'] as const;

// =============================================================================
// Migration Runner
// =============================================================================

export interface MigrationResult {
  success: boolean;
  migrationsRun: string[];
  /** Optional steps that failed and will be retried */
  deferred: string[];
  errors: string[];
  durationMs: number;
}

function connect(databaseUrl: string): postgres.Sql {
  return postgres(databaseUrl, {
    max: 1,
    idle_timeout: 20,
    connect_timeout: 30,
  });
}

/**
 * Run all migrations in order. Stops at the first required step that fails.
 */
export async function runMigrations(databaseUrl: string): Promise<MigrationResult> {
  const startTime = Date.now();
  const migrationsRun: string[] = [];
  const deferred: string[] = [];
  const errors: string[] = [];

  log.info({ event: 'migrations_start' }, 'Starting database migrations');

  const sql = connect(databaseUrl);

  try {
    for (const migration of MIGRATIONS) {
      try {
        await sql.unsafe(migration.sql);
        migrationsRun.push(migration.name);
        log.debug({ migration: migration.name }, 'Migration applied');
      } catch (error) {
        if (!migration.optional) {
          throw error;
        }
        deferred.push(migration.name);
        log.warn(
          { migration: migration.name, error: errorMessage(error) },
          'Optional migration deferred'
        );
      }
    }

    const durationMs = Date.now() - startTime;
    log.info(
      { event: 'migrations_complete', count: migrationsRun.length, durationMs },
      `Completed ${migrationsRun.length} migrations`
    );

    return { success: true, migrationsRun, deferred, errors, durationMs };
  } catch (error) {
    const message = errorMessage(error);
    errors.push(message);
    log.error({ event: 'migrations_failed', error: message }, 'Migration failed');

    return {
      success: false,
      migrationsRun,
      deferred,
      errors,
      durationMs: Date.now() - startTime,
    };
  } finally {
    await sql.end();
  }
}

/**
 * Check that the chunk store tables exist.
 */
export async function verifySchema(databaseUrl: string): Promise<{
  valid: boolean;
  missingTables: string[];
}> {
  const sql = connect(databaseUrl);

  try {
    const result = await sql<{ table_name: string }[]>`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_name = ANY(${[...REQUIRED_TABLES]})
    `;

    const existing = new Set(result.map((r) => r.table_name));
    const missingTables = REQUIRED_TABLES.filter((table) => !existing.has(table));

    return { valid: missingTables.length === 0, missingTables };
  } finally {
    await sql.end();
  }
}
