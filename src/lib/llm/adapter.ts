/**
 * Base LLM adapter class.
 *
 * Provides the interface that all LLM provider adapters must implement.
 */

import type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMResponseFormat,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  LLMBatchEmbeddingResponse,
  FinishReason,
} from '@/types/llm';

export const DEFAULT_COMPLETION_MODEL = 'gpt-4o-mini';
export const DEFAULT_ADAPTER_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement complete(), embed() and embedBatch().
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected defaultEmbeddingModel: string;
  protected baseUrl?: string;
  protected timeoutMs: number;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? DEFAULT_COMPLETION_MODEL;
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? DEFAULT_ADAPTER_EMBEDDING_MODEL;
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  abstract embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;

  abstract embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMBatchEmbeddingResponse>;

  /**
   * Per-request options understood by HTTP clients: caller timeout wins.
   */
  protected requestOptions(options?: { signal?: AbortSignal; timeoutMs?: number }): {
    signal?: AbortSignal;
    timeout: number;
  } {
    return {
      signal: options?.signal,
      timeout: options?.timeoutMs ?? this.timeoutMs,
    };
  }
}

export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMResponseFormat,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  LLMBatchEmbeddingResponse,
  FinishReason,
};
