/**
 * RAG Configuration Constants
 *
 * Centralized defaults for the chunking, embedding, retrieval and answer
 * stages. Deployment-specific values (model names, batch size, cost) are
 * read through `getEnv()` and fall back to these.
 */

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size, in the unit of the chosen strategy's budget (tokens).
 */
export const DEFAULT_CHUNK_SIZE = 500;

/**
 * Default overlap. Tokens for `fixed`, sentences for `sentence`,
 * sections for `semantic`.
 */
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Hard ceiling of the embedding API input, in tokens.
 */
export const MAX_CHUNK_SIZE = 8191;

/**
 * Margin subtracted from chunk size when the requested overlap leaves no
 * forward progress.
 */
export const OVERLAP_REDUCTION_MARGIN = 100;

// =============================================================================
// Embedding Configuration
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export const EMBEDDING_DIMENSIONS = 1536;

/**
 * Provider limit on inputs per embedding request.
 */
export const MAX_EMBEDDING_BATCH_SIZE = 100;

/**
 * USD per one million input tokens for text-embedding-3-small.
 */
export const EMBEDDING_COST_PER_MILLION_TOKENS = 0.02;

/**
 * Texts shorter than this (after trimming) are rejected.
 */
export const MIN_EMBEDDING_TEXT_LENGTH = 10;

export const EMBEDDING_RETRY_ATTEMPTS = 3;

export const EMBEDDING_RETRY_MIN_DELAY_MS = 4_000;

export const EMBEDDING_RETRY_MAX_DELAY_MS = 10_000;

/**
 * Total wall-clock budget for one embedding call including retries.
 */
export const EMBEDDING_RETRY_BUDGET_MS = 15_000;

/**
 * Default ceiling for one provider request (LLM_TIMEOUT_MS).
 */
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;

// =============================================================================
// Retrieval Configuration
// =============================================================================

export const DEFAULT_TOP_K = 10;

export const MAX_TOP_K = 50;

/**
 * Cosine similarity below which a candidate chunk is discarded.
 */
export const DEFAULT_MIN_SIMILARITY = 0.7;

// =============================================================================
// Answer Configuration
// =============================================================================

/**
 * Low temperature for factual answers.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.1;

export const DEFAULT_RAG_MAX_TOKENS = 1000;

/**
 * Conversation turns replayed before a follow-up question.
 */
export const DEFAULT_HISTORY_TURNS = 5;

/**
 * Returned without any completion call when retrieval finds nothing.
 */
export const NO_CONTEXT_ANSWER =
  "I don't have information about that topic in the uploaded documents. " +
  'Please upload additional documents or try a different question.';

/**
 * Substituted when the completion comes back blank.
 */
export const EMPTY_ANSWER_FALLBACK = 'Unable to generate answer from retrieved documents.';

/**
 * Label for chunks whose document has no name.
 */
export const UNKNOWN_DOCUMENT_NAME = 'Unknown Document';

// =============================================================================
// Ingestion Configuration
// =============================================================================

/**
 * Extracted text shorter than this (after trimming) stops ingestion.
 */
export const MIN_EXTRACTED_TEXT_LENGTH = 10;

// =============================================================================
// Composite Default Config
// =============================================================================

export const DEFAULT_RAG_CONFIG = {
  topK: DEFAULT_TOP_K,
  minSimilarity: DEFAULT_MIN_SIMILARITY,
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
  temperature: DEFAULT_RAG_TEMPERATURE,
  maxTokens: DEFAULT_RAG_MAX_TOKENS,
} as const;
