/**
 * RAG Pipeline Errors
 *
 * Every failure that leaves the core carries the pipeline stage it came from,
 * so callers can decide on user-facing messaging without inspecting messages.
 */

export type RAGStage =
  | 'chunking'
  | 'embedding'
  | 'retrieval'
  | 'completion'
  | 'ingestion'
  | 'extraction';

export type RAGErrorCode =
  | 'INVALID_INPUT'
  | 'EMBEDDING_FAILED'
  | 'DIMENSION_MISMATCH'
  | 'RETRIEVAL_FAILED'
  | 'COMPLETION_FAILED'
  | 'INGESTION_FAILED'
  | 'EXTRACTION_FAILED';

export class RAGError extends Error {
  readonly stage: RAGStage;
  readonly code: RAGErrorCode;

  constructor(
    message: string,
    stage: RAGStage,
    code: RAGErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RAGError';
    this.stage = stage;
    this.code = code;
  }
}

/**
 * Rejected synchronously before any external call. Never retried.
 */
export class InvalidInputError extends RAGError {
  constructor(message: string, stage: RAGStage) {
    super(message, stage, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class EmbeddingError extends RAGError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: RAGErrorCode }
  ) {
    super(message, 'embedding', options?.code ?? 'EMBEDDING_FAILED', options);
    this.name = 'EmbeddingError';
  }
}

export class EmbeddingDimensionError extends EmbeddingError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Expected ${expected} dimensions, got ${received}`, {
      code: 'DIMENSION_MISMATCH',
    });
    this.name = 'EmbeddingDimensionError';
    this.expected = expected;
    this.received = received;
  }
}

export class RetrievalError extends RAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'retrieval', 'RETRIEVAL_FAILED', options);
    this.name = 'RetrievalError';
  }
}

export class CompletionError extends RAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'completion', 'COMPLETION_FAILED', options);
    this.name = 'CompletionError';
  }
}

export class IngestionError extends RAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ingestion', 'INGESTION_FAILED', options);
    this.name = 'IngestionError';
  }
}

/**
 * Structured field extraction gave up after the JSON-mode fallback, or hit
 * a provider failure that a fallback cannot fix.
 */
export class ExtractionError extends RAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extraction', 'EXTRACTION_FAILED', options);
    this.name = 'ExtractionError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
