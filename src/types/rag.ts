/**
 * RAG data model types.
 *
 * Chunks flow ingestion → store → retrieval → answer. Every record is an
 * explicit type rather than an open map; only `metadata` stays open.
 */

// =============================================================================
// Chunks
// =============================================================================

export type ChunkStrategy = 'fixed' | 'sentence' | 'semantic';

/**
 * Open key-value map attached to a chunk. Carries the chunking strategy and
 * its effective sizes, plus caller tags such as `page` or `section`.
 */
export type ChunkMetadata = Record<string, unknown>;

/**
 * A bounded span of one document, before embedding.
 */
export interface TextChunk {
  /** 0-based, sequential within a document, no gaps */
  chunkIndex: number;
  text: string;
  /** Approximate, see `countTokens` */
  tokenCount: number;
  /** Character span of `text` within the chunked input */
  startOffset: number;
  endOffset: number;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk extends TextChunk {
  embedding: number[];
}

/**
 * Reference to the source document that owns a set of chunks.
 */
export interface DocumentRef {
  documentId: string;
  documentName: string;
  organizationId: number;
}

/**
 * Lifecycle of a document in the store.
 */
export type DocumentStatus = 'processing' | 'completed' | 'partial' | 'failed';

export interface DocumentState {
  organizationId: number;
  status: DocumentStatus;
  errorMessage: string | null;
}

/**
 * A stored chunk returned by nearest-neighbour search. Ephemeral, never
 * persisted.
 */
export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  documentName: string;
  chunkIndex: number;
  text: string;
  /** Cosine similarity, practically in [0, 1] */
  similarityScore: number;
  metadata: ChunkMetadata;
}

// =============================================================================
// Answers
// =============================================================================

export interface SourceCitation {
  documentName: string;
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  /** Rounded to 3 decimals */
  similarityScore: number;
  /** Only present when the chunk metadata carries a numeric page */
  pageNumber?: number;
}

/**
 * NO_CONTEXT: retrieval found nothing, a fixed refusal was returned.
 * GROUNDED: a completion was generated from retrieved chunks.
 */
export type AnswerState = 'no_context' | 'grounded';

export interface RAGAnswer {
  question: string;
  answer: string;
  sources: SourceCitation[];
  /** Mean retrieval similarity in [0, 1]; a relevance proxy, not a probability */
  confidence: number;
  chunksUsed: number;
  queryTimeMs: number;
  state: AnswerState;
}

/**
 * Inline `[Source: name, page N]` marker found in answer text.
 */
export interface InlineCitation {
  raw: string;
  documentName: string;
  page?: number;
}

// =============================================================================
// Conversations
// =============================================================================

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
  timestamp: Date;
  /** Assistant turns only */
  sources?: SourceCitation[];
  /** Assistant turns only */
  confidence?: number;
}
