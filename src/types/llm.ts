/**
 * LLM adapter interface types.
 *
 * These types define the contract for LLM provider adapters,
 * enabling easy switching between OpenAI-compatible providers.
 */

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Per-call cancellation. Every adapter call honours both.
 */
export interface LLMCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Options for text completion.
 */
export interface LLMCompletionOptions extends LLMCallOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 1.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
  stopSequences?: string[];
  responseFormat?: LLMResponseFormat;
}

/**
 * Output constraint for a completion. `json_schema` asks the provider to
 * enforce the schema; `json_object` only guarantees a JSON object.
 */
export type LLMResponseFormat =
  | { type: 'json_object' }
  | { type: 'json_schema'; name: string; schema: Record<string, unknown> };

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Options for embedding generation.
 */
export interface LLMEmbeddingOptions extends LLMCallOptions {
  model?: string;       // Override default embedding model
  dimensions?: number;  // Requested output dimensionality
}

/**
 * Response from embedding generation.
 */
export interface LLMEmbeddingResponse {
  embedding: number[];
  usage: EmbeddingUsage;
}

/**
 * Response from a batch embedding call, in input order.
 */
export interface LLMBatchEmbeddingResponse {
  embeddings: number[][];
  usage: EmbeddingUsage;
}

export interface EmbeddingUsage {
  promptTokens: number;
  totalTokens: number;
}

/**
 * Core LLM adapter interface.
 *
 * All provider adapters must implement this interface. Failures are thrown
 * as `LLMError` (see `@/lib/llm/errors`).
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai') */
  readonly provider: string;

  complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;

  /**
   * Embed several texts in one request. Output order matches input order.
   */
  embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMBatchEmbeddingResponse>;
}

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  defaultModel?: string;
  defaultEmbeddingModel?: string;
  baseUrl?: string;       // For custom endpoints
  timeoutMs?: number;     // Default per-request timeout
}

export type LLMProvider = 'openai';
