/**
 * Document Schema (Drizzle ORM)
 *
 * document_processing: one row per uploaded document, scoped to an organization
 * document_chunks: embedded chunks of a document, deleted with it
 */

import {
  pgTable,
  uuid,
  serial,
  varchar,
  text,
  integer,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
  customType,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { ChunkMetadata, DocumentStatus } from '@/types/rag';

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * Serialize a vector to pgvector's text format: [0.1,0.2,...]
 */
export function toVectorLiteral(value: number[]): string {
  return `[${value.join(',')}]`;
}

/**
 * Parse pgvector's text format back to numbers.
 */
export function fromVectorLiteral(value: string): number[] {
  const body = value.trim().slice(1, -1);
  return body ? body.split(',').map(Number) : [];
}

export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? 1536})`;
  },
  toDriver: toVectorLiteral,
  fromDriver: fromVectorLiteral,
});

// =============================================================================
// Document Processing Table
// =============================================================================

export const documentProcessing = pgTable('document_processing', {
  id: uuid('id').primaryKey().defaultRandom(),
  organizationId: integer('organization_id').notNull(),
  fileName: varchar('file_name', { length: 255 }).notNull(),

  // Processing status
  processingStatus: varchar('processing_status', { length: 50 })
    .notNull()
    .default('pending')
    .$type<ProcessingStatus>(),
  errorMessage: text('error_message'),

  // Timestamps
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  organizationIdx: index('ix_document_processing_organization_id').on(table.organizationId),
}));

// =============================================================================
// Document Chunks Table
// =============================================================================

export const documentChunks = pgTable('document_chunks', {
  id: serial('id').primaryKey(),
  documentProcessingId: uuid('document_processing_id')
    .notNull()
    .references(() => documentProcessing.id, { onDelete: 'cascade' }),
  chunkText: text('chunk_text').notNull(),
  chunkIndex: integer('chunk_index').notNull(),

  // pgvector embedding (1536 dimensions for OpenAI text-embedding-3-small)
  embedding: vector('embedding', { dimensions: 1536 }).notNull(),

  // page, strategy, chunk size and caller-supplied attributes
  chunkMetadata: jsonb('chunk_metadata').$type<ChunkMetadata>().notNull().default({}),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  documentIdx: index('ix_document_chunks_document_processing_id').on(table.documentProcessingId),
  createdAtIdx: index('ix_document_chunks_created_at').on(table.createdAt),
  documentChunkIdx: uniqueIndex('ux_document_chunks_document_chunk').on(
    table.documentProcessingId,
    table.chunkIndex
  ),
  // Note: IVFFlat index for vector search is created via raw SQL migration
}));

// =============================================================================
// Relations
// =============================================================================

export const documentProcessingRelations = relations(documentProcessing, ({ many }) => ({
  chunks: many(documentChunks),
}));

export const documentChunksRelations = relations(documentChunks, ({ one }) => ({
  document: one(documentProcessing, {
    fields: [documentChunks.documentProcessingId],
    references: [documentProcessing.id],
  }),
}));

// =============================================================================
// Types (inferred from schema)
// =============================================================================

export type DocumentProcessing = typeof documentProcessing.$inferSelect;
export type NewDocumentProcessing = typeof documentProcessing.$inferInsert;

export type DocumentChunkRow = typeof documentChunks.$inferSelect;
export type NewDocumentChunkRow = typeof documentChunks.$inferInsert;

export type ProcessingStatus = 'pending' | DocumentStatus;
