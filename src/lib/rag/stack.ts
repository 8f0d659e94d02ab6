/**
 * RAG Stack
 *
 * Wires one adapter, one embedding service and one chunk store into the
 * retrieval, answering and ingestion pipelines, and the adapter into the
 * field extractor. Everything not passed in is built from the environment.
 */

import type { LLMAdapter } from '@/lib/llm/adapter';
import { createLLMAdapter } from '@/lib/llm/factory';
import { getEnv } from '@/lib/env';
import { createLayerLogger } from '@/lib/logger';
import { getDb } from '@/db/client';
import { PgChunkStore } from '@/db/pg-chunk-store';
import { FinancialDataExtractor, type ExtractorConfig } from '@/lib/extraction/extractor';
import { ChunkingService } from './chunker';
import { EmbeddingService, type EmbeddingConfig } from './embeddings';
import { IngestionPipeline } from './ingestion';
import { RetrievalPipeline } from './retrieval';
import { RAGOrchestrator, type RAGOrchestratorConfig } from './service';
import { InMemoryChunkStore, type ChunkStore } from './store';

const log = createLayerLogger('rag', 'stack');

export interface RAGStackOptions {
  /** Used when no adapter is given; defaults to OPENAI_API_KEY */
  apiKey?: string;
  adapter?: LLMAdapter;
  /** Defaults to Postgres when DATABASE_URL is set, memory otherwise */
  store?: ChunkStore;
  embedding?: Partial<EmbeddingConfig>;
  orchestrator?: Partial<RAGOrchestratorConfig>;
  extractor?: Partial<ExtractorConfig>;
}

export interface RAGStack {
  adapter: LLMAdapter;
  chunker: ChunkingService;
  embeddings: EmbeddingService;
  store: ChunkStore;
  retrieval: RetrievalPipeline;
  orchestrator: RAGOrchestrator;
  ingestion: IngestionPipeline;
  extractor: FinancialDataExtractor;
}

function createDefaultAdapter(apiKey: string | undefined): LLMAdapter {
  const env = getEnv();
  const key = apiKey ?? env.OPENAI_API_KEY;

  if (!key) {
    throw new Error('No OpenAI API key provided and OPENAI_API_KEY not set');
  }

  return createLLMAdapter('openai', {
    apiKey: key,
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.OPENAI_MODEL,
    defaultEmbeddingModel: env.EMBEDDING_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });
}

function createDefaultStore(): ChunkStore {
  if (getEnv().DATABASE_URL) {
    return new PgChunkStore(getDb());
  }

  log.warn('DATABASE_URL not set, using in-memory chunk store');
  return new InMemoryChunkStore();
}

/**
 * Build the full pipeline from options and the environment.
 *
 * @throws Error when no adapter is given and no API key is available
 */
export function createRAGStack(options: RAGStackOptions = {}): RAGStack {
  const env = getEnv();

  const adapter = options.adapter ?? createDefaultAdapter(options.apiKey);
  const store = options.store ?? createDefaultStore();

  const chunker = new ChunkingService();
  const embeddings = new EmbeddingService(adapter, {
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    batchSize: env.EMBEDDING_BATCH_SIZE,
    costPerMillionTokens: env.EMBEDDING_COST_PER_MILLION_TOKENS,
    requestTimeoutMs: env.LLM_TIMEOUT_MS,
    ...options.embedding,
  });
  const retrieval = new RetrievalPipeline(embeddings, store);
  const orchestrator = new RAGOrchestrator(retrieval, adapter, {
    model: env.OPENAI_MODEL,
    ...options.orchestrator,
  });
  const ingestion = new IngestionPipeline(chunker, embeddings, store);
  const extractor = new FinancialDataExtractor(adapter, {
    model: env.OPENAI_MODEL,
    ...options.extractor,
  });

  log.debug(
    { provider: adapter.provider, embeddingModel: embeddings.getModel(), store: store.constructor.name },
    'RAG stack created'
  );

  return { adapter, chunker, embeddings, store, retrieval, orchestrator, ingestion, extractor };
}
