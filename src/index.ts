/**
 * Package entry point.
 */

export * from './lib/rag';
export * from './lib/errors';
export * from './lib/extraction';
export type {
  ChunkStrategy,
  ChunkMetadata,
  TextChunk,
  EmbeddedChunk,
  DocumentRef,
  DocumentStatus,
  DocumentState,
  RetrievedChunk,
  SourceCitation,
  AnswerState,
  RAGAnswer,
  InlineCitation,
  ConversationRole,
  ConversationTurn,
} from './types/rag';

export { createLLMAdapter, LLMError, OpenAIAdapter, type LLMAdapter, type LLMErrorKind } from './lib/llm';
export { parseFile, validateFile, type ParseResult } from './lib/parsers';
export { getEnv, parseEnv, type Env } from './lib/env';
export { logger } from './lib/logger';

export { getDb, closeDb, type Database } from './db/client';
export { PgChunkStore } from './db/pg-chunk-store';
export { runMigrations, verifySchema, type MigrationResult } from './db/migrations';
