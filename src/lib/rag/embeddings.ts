/**
 * Embedding Service
 *
 * Generates vector embeddings through an injected LLM adapter.
 * Uses text-embedding-3-small (1536 dimensions) by default.
 *
 * - Retries rate limits and provider outages with exponential backoff,
 *   bounded by an attempt count and a total time budget
 * - Tracks token usage and cost per instance
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { LLMAdapter } from '@/lib/llm/adapter';
import { createLLMAdapter } from '@/lib/llm/factory';
import { LLMError, toLLMError } from '@/lib/llm/errors';
import {
  EmbeddingDimensionError,
  EmbeddingError,
  InvalidInputError,
} from '@/lib/errors';
import { getEnv } from '@/lib/env';
import { createLayerLogger, logExternalCall } from '@/lib/logger';
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_LLM_TIMEOUT_MS,
  EMBEDDING_COST_PER_MILLION_TOKENS,
  EMBEDDING_DIMENSIONS,
  EMBEDDING_RETRY_ATTEMPTS,
  EMBEDDING_RETRY_BUDGET_MS,
  EMBEDDING_RETRY_MAX_DELAY_MS,
  EMBEDDING_RETRY_MIN_DELAY_MS,
  MAX_EMBEDDING_BATCH_SIZE,
  MIN_EMBEDDING_TEXT_LENGTH,
} from './config';

const log = createLayerLogger('external', 'embeddings');

// =============================================================================
// Types
// =============================================================================

export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  /** Delay before retry n is baseDelayMs * 2^(n-1), clamped to [min, max] */
  baseDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  /** Wall-clock budget for one call including every retry */
  budgetMs: number;
}

export interface EmbeddingConfig {
  model: string;
  dimensions: number;
  batchSize: number;
  costPerMillionTokens: number;
  /** Ceiling for one provider request; the remaining retry budget can shorten it */
  requestTimeoutMs: number;
  retry: Partial<RetryPolicy>;
}

export interface EmbedCallOptions {
  signal?: AbortSignal;
}

export interface CostSummary {
  totalTokens: number;
  /** USD, rounded to 6 decimals */
  totalCost: number;
  avgCostPerToken: number;
  model: string;
  dimensions: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: EMBEDDING_RETRY_ATTEMPTS,
  baseDelayMs: 1_000,
  minDelayMs: EMBEDDING_RETRY_MIN_DELAY_MS,
  maxDelayMs: EMBEDDING_RETRY_MAX_DELAY_MS,
  budgetMs: EMBEDDING_RETRY_BUDGET_MS,
};

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, exponential));
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidInputError(`${name} must be a positive integer, got ${value}`, 'embedding');
  }
  return value;
}

// =============================================================================
// Embedding Service Class
// =============================================================================

export class EmbeddingService {
  private readonly adapter: LLMAdapter;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly batchSize: number;
  private readonly costPerMillionTokens: number;
  private readonly requestTimeoutMs: number;
  private readonly retry: RetryPolicy;

  // Running usage; only touched after a successful call
  private totalTokens = 0;
  private totalCost = 0;

  /**
   * @throws InvalidInputError when `batchSize` or `requestTimeoutMs` is not a positive integer
   */
  constructor(adapter: LLMAdapter, config: Partial<EmbeddingConfig> = {}) {
    this.adapter = adapter;
    this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = config.dimensions ?? EMBEDDING_DIMENSIONS;
    this.batchSize = Math.min(
      requirePositiveInteger('batchSize', config.batchSize ?? MAX_EMBEDDING_BATCH_SIZE),
      MAX_EMBEDDING_BATCH_SIZE
    );
    this.requestTimeoutMs = requirePositiveInteger(
      'requestTimeoutMs',
      config.requestTimeoutMs ?? DEFAULT_LLM_TIMEOUT_MS
    );
    this.costPerMillionTokens = config.costPerMillionTokens ?? EMBEDDING_COST_PER_MILLION_TOKENS;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...config.retry };
  }

  /**
   * Generate the embedding for one text.
   *
   * @throws InvalidInputError when the trimmed text is shorter than 10 chars
   * @throws EmbeddingDimensionError when the vector length is not `dimensions`
   * @throws EmbeddingError when the provider fails after retries
   */
  async generateEmbedding(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
    if (text.trim().length < MIN_EMBEDDING_TEXT_LENGTH) {
      throw new InvalidInputError(
        `Text must be at least ${MIN_EMBEDDING_TEXT_LENGTH} characters (excluding surrounding whitespace)`,
        'embedding'
      );
    }

    const { embedding, usage } = await this.withRetry('embed', options.signal, (timeoutMs) =>
      this.adapter.embed(text, {
        model: this.model,
        dimensions: this.dimensions,
        signal: options.signal,
        timeoutMs,
      })
    );

    this.assertDimensions(embedding);
    this.recordUsage(usage.promptTokens);

    return embedding;
  }

  /**
   * Generate embeddings for up to `batchSize` texts in one request.
   * Output vector i belongs to input text i. Does not split oversized batches.
   *
   * @throws InvalidInputError for an empty list, too many texts, or a blank text
   */
  async generateEmbeddingsBatch(
    texts: string[],
    options: EmbedCallOptions = {}
  ): Promise<number[][]> {
    if (texts.length === 0) {
      throw new InvalidInputError('Texts list cannot be empty', 'embedding');
    }
    if (texts.length > this.batchSize) {
      throw new InvalidInputError(
        `Cannot embed more than ${this.batchSize} texts at once. Requested: ${texts.length}`,
        'embedding'
      );
    }
    const blank = texts.findIndex((t) => !t.trim());
    if (blank !== -1) {
      throw new InvalidInputError(`Text at index ${blank} is blank`, 'embedding');
    }

    const { embeddings, usage } = await this.withRetry('embed_batch', options.signal, (timeoutMs) =>
      this.adapter.embedBatch(texts, {
        model: this.model,
        dimensions: this.dimensions,
        signal: options.signal,
        timeoutMs,
      })
    );

    if (embeddings.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, got ${embeddings.length}`, {
        cause: new LLMError('malformed_response', 'Embedding count mismatch'),
      });
    }
    for (const embedding of embeddings) {
      this.assertDimensions(embedding);
    }

    this.recordUsage(usage.promptTokens);

    return embeddings;
  }

  /**
   * Snapshot of the running usage counters.
   */
  getCostSummary(): CostSummary {
    return {
      totalTokens: this.totalTokens,
      totalCost: Math.round(this.totalCost * 1e6) / 1e6,
      avgCostPerToken: this.totalTokens > 0 ? this.totalCost / this.totalTokens : 0,
      model: this.model,
      dimensions: this.dimensions,
    };
  }

  resetMetrics(): void {
    this.totalTokens = 0;
    this.totalCost = 0;
    log.info('Embedding usage metrics reset');
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertDimensions(embedding: number[]): void {
    if (embedding.length !== this.dimensions) {
      throw new EmbeddingDimensionError(this.dimensions, embedding.length);
    }
  }

  private recordUsage(tokens: number): void {
    const cost = (tokens / 1_000_000) * this.costPerMillionTokens;
    this.totalTokens += tokens;
    this.totalCost += cost;
  }

  /**
   * Run a provider call, retrying retryable failures while attempts and
   * budget remain. Each request times out at `requestTimeoutMs` or when the
   * budget runs out, whichever comes first.
   */
  private async withRetry<T>(
    operation: string,
    signal: AbortSignal | undefined,
    call: (timeoutMs: number) => Promise<T>
  ): Promise<T> {
    const deadline = Date.now() + this.retry.budgetMs;

    for (let attempt = 1; ; attempt++) {
      const startedAt = Date.now();
      try {
        const timeoutMs = Math.max(1, Math.min(this.requestTimeoutMs, deadline - startedAt));
        const result = await call(timeoutMs);
        logExternalCall(log, 'openai', operation, {
          duration_ms: Date.now() - startedAt,
          model: this.model,
          attempt,
        });
        return result;
      } catch (error) {
        const llmError = toLLMError(error);
        const delay = backoffDelay(attempt, this.retry);
        const canRetry =
          llmError.retryable &&
          attempt < this.retry.attempts &&
          Date.now() + delay < deadline;

        logExternalCall(log, 'openai', operation, {
          duration_ms: Date.now() - startedAt,
          model: this.model,
          attempt,
          status: llmError.status ?? llmError.kind,
          error: llmError.message,
        });

        if (!canRetry) {
          throw new EmbeddingError(`Embedding ${operation} failed: ${llmError.message}`, {
            cause: llmError,
          });
        }

        log.warn({ attempt, delay_ms: delay, kind: llmError.kind }, 'Retrying embedding call');
        await this.pause(delay, signal);
      }
    }
  }

  private async pause(delayMs: number, signal: AbortSignal | undefined): Promise<void> {
    try {
      await sleep(delayMs, undefined, { signal });
    } catch (error) {
      throw new EmbeddingError('Embedding request aborted during backoff', {
        cause: toLLMError(error),
      });
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an EmbeddingService backed by the OpenAI adapter.
 * Falls back to OPENAI_API_KEY and the EMBEDDING_* environment settings.
 */
export function createEmbeddingService(
  apiKey?: string | null,
  config: Partial<EmbeddingConfig> = {}
): EmbeddingService {
  const env = getEnv();
  const key = apiKey ?? env.OPENAI_API_KEY;

  if (!key) {
    throw new Error('No OpenAI API key provided and OPENAI_API_KEY not set');
  }

  const adapter = createLLMAdapter('openai', {
    apiKey: key,
    baseUrl: env.OPENAI_BASE_URL,
    defaultEmbeddingModel: config.model ?? env.EMBEDDING_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });

  return new EmbeddingService(adapter, {
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    batchSize: env.EMBEDDING_BATCH_SIZE,
    costPerMillionTokens: env.EMBEDDING_COST_PER_MILLION_TOKENS,
    requestTimeoutMs: env.LLM_TIMEOUT_MS,
    ...config,
  });
}
