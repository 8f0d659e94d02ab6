/**
 * Chunk Store
 *
 * Persistence boundary for embedded chunks. Implementations enforce the
 * organization scope on every search; the pipeline only passes it through.
 *
 * - `InMemoryChunkStore`: brute-force cosine search, for tests and local runs
 * - `PgChunkStore` (`@/db/pg-chunk-store`): Postgres + pgvector
 */

import type {
  ChunkMetadata,
  DocumentRef,
  DocumentState,
  DocumentStatus,
  EmbeddedChunk,
  RetrievedChunk,
} from '@/types/rag';

// =============================================================================
// Interface
// =============================================================================

export interface ChunkSearchOptions {
  signal?: AbortSignal;
}

export interface ChunkStore {
  /**
   * Replace the document's whole chunk set with `chunks`, atomically. Chunks
   * of an earlier version are gone afterwards; stored text is never edited.
   * The document moves to `document.organizationId`.
   */
  upsert(document: DocumentRef, chunks: EmbeddedChunk[]): Promise<void>;

  /**
   * Record a document's processing status, creating the document if needed.
   */
  markDocument(document: DocumentRef, status: DocumentStatus, errorMessage?: string): Promise<void>;

  /**
   * Nearest neighbours within one organization, by descending cosine
   * similarity, at most `topK`. Equal scores keep a stable order.
   */
  search(
    organizationId: number,
    queryVector: number[],
    topK: number,
    options?: ChunkSearchOptions
  ): Promise<RetrievedChunk[]>;

  /**
   * Merge `patch` into a chunk's metadata. Returns false when no such chunk.
   */
  amendMetadata(documentId: string, chunkIndex: number, patch: ChunkMetadata): Promise<boolean>;

  /**
   * Delete a document and all of its chunks. Returns the number of chunks removed.
   */
  deleteDocument(documentId: string): Promise<number>;
}

// =============================================================================
// Similarity
// =============================================================================

/**
 * Cosine similarity of two vectors. 0 when either has zero magnitude or the
 * lengths differ.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// =============================================================================
// In-Memory Store
// =============================================================================

interface StoredChunk {
  chunkId: string;
  document: DocumentRef;
  chunk: EmbeddedChunk;
}

export class InMemoryChunkStore implements ChunkStore {
  // Insertion order doubles as the tie-break order
  private chunks: StoredChunk[] = [];
  private documents = new Map<string, DocumentState>();

  async upsert(document: DocumentRef, chunks: EmbeddedChunk[]): Promise<void> {
    const replacement: StoredChunk[] = chunks.map((chunk) => ({
      chunkId: `${document.documentId}:${chunk.chunkIndex}`,
      document: { ...document },
      chunk: { ...chunk, metadata: { ...chunk.metadata } },
    }));

    this.chunks = this.chunks
      .filter((s) => s.document.documentId !== document.documentId)
      .concat(replacement);

    const state = this.documents.get(document.documentId);
    this.documents.set(document.documentId, {
      status: state?.status ?? 'processing',
      errorMessage: state?.errorMessage ?? null,
      organizationId: document.organizationId,
    });
  }

  async markDocument(
    document: DocumentRef,
    status: DocumentStatus,
    errorMessage?: string
  ): Promise<void> {
    this.documents.set(document.documentId, {
      organizationId: document.organizationId,
      status,
      errorMessage: errorMessage ?? null,
    });
  }

  async search(
    organizationId: number,
    queryVector: number[],
    topK: number,
    options: ChunkSearchOptions = {}
  ): Promise<RetrievedChunk[]> {
    options.signal?.throwIfAborted();

    return this.chunks
      .filter((s) => s.document.organizationId === organizationId)
      .map((s) => ({
        chunkId: s.chunkId,
        documentId: s.document.documentId,
        documentName: s.document.documentName,
        chunkIndex: s.chunk.chunkIndex,
        text: s.chunk.text,
        similarityScore: cosineSimilarity(queryVector, s.chunk.embedding),
        metadata: { ...s.chunk.metadata },
      }))
      .sort((a, b) => b.similarityScore - a.similarityScore)
      .slice(0, topK);
  }

  async amendMetadata(
    documentId: string,
    chunkIndex: number,
    patch: ChunkMetadata
  ): Promise<boolean> {
    const stored = this.chunks.find(
      (s) => s.document.documentId === documentId && s.chunk.chunkIndex === chunkIndex
    );
    if (!stored) return false;

    stored.chunk.metadata = { ...stored.chunk.metadata, ...patch };
    return true;
  }

  async deleteDocument(documentId: string): Promise<number> {
    const before = this.chunks.length;
    this.chunks = this.chunks.filter((s) => s.document.documentId !== documentId);
    this.documents.delete(documentId);
    return before - this.chunks.length;
  }

  /**
   * Recorded status of a document, if it has one.
   */
  documentState(documentId: string): DocumentState | undefined {
    const state = this.documents.get(documentId);
    return state && { ...state };
  }

  /**
   * Number of stored chunks, optionally for one document.
   */
  size(documentId?: string): number {
    if (documentId === undefined) return this.chunks.length;
    return this.chunks.filter((s) => s.document.documentId === documentId).length;
  }
}
