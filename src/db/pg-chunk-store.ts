/**
 * Postgres Chunk Store
 *
 * ChunkStore over document_processing + document_chunks with pgvector.
 * Similarity is `1 - cosine distance`; every search joins through
 * document_processing to filter by organization.
 */

import { and, eq, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import { createLayerLogger, logExternalCall, Timer } from '@/lib/logger';
import { errorMessage } from '@/lib/errors';
import type { ChunkSearchOptions, ChunkStore } from '@/lib/rag/store';
import type {
  ChunkMetadata,
  DocumentRef,
  DocumentStatus,
  EmbeddedChunk,
  RetrievedChunk,
} from '@/types/rag';
import type { Database, DbExecutor } from './client';
import { documentChunks, documentProcessing, toVectorLiteral } from './schema';

const log = createLayerLogger('db', 'PgChunkStore');

// =============================================================================
// Row Parsing
// =============================================================================

// postgres-js returns numeric expressions as strings
const searchRowSchema = z.object({
  chunk_id: z.union([z.number(), z.string()]).transform(String),
  document_id: z.string(),
  document_name: z.string(),
  chunk_index: z.coerce.number().int(),
  chunk_text: z.string(),
  chunk_metadata: z.record(z.unknown()).nullable(),
  similarity: z.coerce.number(),
});

/**
 * Validate raw search rows and map them to retrieved chunks.
 */
export function parseSearchRows(rows: readonly unknown[]): RetrievedChunk[] {
  return z
    .array(searchRowSchema)
    .parse(rows)
    .map((row) => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      documentName: row.document_name,
      chunkIndex: row.chunk_index,
      text: row.chunk_text,
      similarityScore: row.similarity,
      metadata: row.chunk_metadata ?? {},
    }));
}

/**
 * Nearest-neighbour query for one organization, closest first.
 */
export function buildSearchQuery(organizationId: number, queryVector: number[], topK: number): SQL {
  const embedding = toVectorLiteral(queryVector);

  return sql`
    SELECT
      dc.id AS chunk_id,
      dc.document_processing_id AS document_id,
      dp.file_name AS document_name,
      dc.chunk_index,
      dc.chunk_text,
      dc.chunk_metadata,
      1 - (dc.embedding <=> ${embedding}::vector) AS similarity
    FROM document_chunks dc
    JOIN document_processing dp ON dc.document_processing_id = dp.id
    WHERE dp.organization_id = ${organizationId}
    ORDER BY dc.embedding <=> ${embedding}::vector, dc.id
    LIMIT ${topK}
  `;
}

// =============================================================================
// Statements
// =============================================================================

/**
 * Create the document row, or move an existing one to this name and organization.
 */
export function upsertDocumentRow(db: DbExecutor, document: DocumentRef) {
  return db
    .insert(documentProcessing)
    .values({
      id: document.documentId,
      organizationId: document.organizationId,
      fileName: document.documentName,
      processingStatus: 'processing',
    })
    .onConflictDoUpdate({
      target: documentProcessing.id,
      set: {
        organizationId: document.organizationId,
        fileName: document.documentName,
        updatedAt: new Date(),
      },
    });
}

export function markDocumentRow(
  db: DbExecutor,
  document: DocumentRef,
  status: DocumentStatus,
  errorMessage: string | null
) {
  return db
    .insert(documentProcessing)
    .values({
      id: document.documentId,
      organizationId: document.organizationId,
      fileName: document.documentName,
      processingStatus: status,
      errorMessage,
    })
    .onConflictDoUpdate({
      target: documentProcessing.id,
      set: {
        organizationId: document.organizationId,
        fileName: document.documentName,
        processingStatus: status,
        errorMessage,
        updatedAt: new Date(),
      },
    });
}

export function deleteDocumentChunks(db: DbExecutor, documentId: string) {
  return db
    .delete(documentChunks)
    .where(eq(documentChunks.documentProcessingId, documentId))
    .returning({ id: documentChunks.id });
}

// =============================================================================
// Store
// =============================================================================

export class PgChunkStore implements ChunkStore {
  constructor(private readonly db: Database) {}

  async upsert(document: DocumentRef, chunks: EmbeddedChunk[]): Promise<void> {
    const timer = new Timer();

    // Old chunks go in the same transaction the new ones arrive in
    await this.db.transaction(async (tx) => {
      await upsertDocumentRow(tx, document);
      await deleteDocumentChunks(tx, document.documentId);

      if (chunks.length === 0) return;

      await tx.insert(documentChunks).values(
        chunks.map((chunk) => ({
          documentProcessingId: document.documentId,
          chunkText: chunk.text,
          chunkIndex: chunk.chunkIndex,
          embedding: chunk.embedding,
          chunkMetadata: chunk.metadata,
        }))
      );
    });

    logExternalCall(log, 'postgres', 'upsert_chunks', { duration_ms: timer.elapsed() });
    log.debug({ documentId: document.documentId, chunks: chunks.length }, 'Chunks stored');
  }

  async markDocument(
    document: DocumentRef,
    status: DocumentStatus,
    errorMessage?: string
  ): Promise<void> {
    await markDocumentRow(this.db, document, status, errorMessage ?? null);
    log.debug({ documentId: document.documentId, status }, 'Document status recorded');
  }

  async search(
    organizationId: number,
    queryVector: number[],
    topK: number,
    options: ChunkSearchOptions = {}
  ): Promise<RetrievedChunk[]> {
    options.signal?.throwIfAborted();
    const timer = new Timer();

    try {
      const rows = await this.db.execute(buildSearchQuery(organizationId, queryVector, topK));
      logExternalCall(log, 'postgres', 'vector_search', { duration_ms: timer.elapsed() });

      options.signal?.throwIfAborted();
      return parseSearchRows(Array.from(rows));
    } catch (error) {
      logExternalCall(log, 'postgres', 'vector_search', {
        duration_ms: timer.elapsed(),
        error: errorMessage(error),
      });
      throw error;
    }
  }

  async amendMetadata(
    documentId: string,
    chunkIndex: number,
    patch: ChunkMetadata
  ): Promise<boolean> {
    const updated = await this.db
      .update(documentChunks)
      .set({
        chunkMetadata: sql`${documentChunks.chunkMetadata} || ${JSON.stringify(patch)}::jsonb`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(documentChunks.documentProcessingId, documentId),
          eq(documentChunks.chunkIndex, chunkIndex)
        )
      )
      .returning({ id: documentChunks.id });

    return updated.length > 0;
  }

  async deleteDocument(documentId: string): Promise<number> {
    return this.db.transaction(async (tx) => {
      const removed = await deleteDocumentChunks(tx, documentId);

      await tx.delete(documentProcessing).where(eq(documentProcessing.id, documentId));

      log.info({ documentId, chunks: removed.length }, 'Document deleted');
      return removed.length;
    });
  }
}
