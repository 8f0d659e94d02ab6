/**
 * RAG Module Exports
 *
 * - Document chunking
 * - Embedding generation
 * - Chunk storage and vector retrieval
 * - Citation mapping
 * - Question answering and conversations
 * - Document ingestion
 */

// Chunker
export { ChunkingService, countTokens, type ChunkOptions } from './chunker';

// Embeddings
export {
  EmbeddingService,
  createEmbeddingService,
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  type EmbeddingConfig,
  type EmbedCallOptions,
  type CostSummary,
  type RetryPolicy,
} from './embeddings';

// Storage
export {
  InMemoryChunkStore,
  cosineSimilarity,
  type ChunkStore,
  type ChunkSearchOptions,
} from './store';

// Retrieval
export { RetrievalPipeline, validateRetrievalOptions, type RetrievalOptions } from './retrieval';

// Citations
export {
  buildSourceCitations,
  formatContextForPrompt,
  pageFromMetadata,
  parseInlineCitation,
  extractInlineCitations,
  findUnknownCitations,
  findUncitedSources,
} from './citations';

// Conversation
export { Conversation } from './conversation';

// Orchestrator
export {
  RAGOrchestrator,
  calculateConfidence,
  type AnswerOptions,
  type RAGOrchestratorConfig,
} from './service';

// Ingestion
export {
  IngestionPipeline,
  type IngestionInput,
  type IngestionChunkOptions,
  type IngestOptions,
  type IngestionReport,
  type IngestionStatus,
  type FailedChunk,
} from './ingestion';

// Wiring
export { createRAGStack, type RAGStack, type RAGStackOptions } from './stack';

export * from './config';
