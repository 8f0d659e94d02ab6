/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - GPT-4o-mini (default) and newer chat models for completions
 * - text-embedding-3-small (default), text-embedding-3-large for embeddings
 * - Batch embeddings (native support)
 *
 * The SDK's own retries are disabled: retry policy belongs to the callers
 * (EmbeddingService retries, the orchestrator does not).
 */

import OpenAI from 'openai';
import {
  BaseLLMAdapter,
  type LLMAdapterConfig,
  type LLMMessage,
  type LLMCompletionOptions,
  type LLMCompletionResponse,
  type LLMResponseFormat,
  type LLMEmbeddingOptions,
  type LLMEmbeddingResponse,
  type LLMBatchEmbeddingResponse,
  type FinishReason,
} from './adapter';
import { LLMError, toLLMError } from './errors';

/** Newer chat models reject max_tokens in favour of max_completion_tokens */
type TokenLimitParam = 'max_tokens' | 'max_completion_tokens';

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;
  private tokenLimitParam: TokenLimitParam = 'max_tokens';

  constructor(config: LLMAdapterConfig) {
    super(config);

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      maxRetries: 0,
      timeout: this.timeoutMs,
    });
  }

  /**
   * Generate a text completion using the Chat Completions API.
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    try {
      return await this.createCompletion(messages, options);
    } catch (error) {
      const llmError = toLLMError(error);

      // Switch the token limit parameter once and remember it for this adapter
      if (
        llmError.kind === 'unsupported_parameter' &&
        llmError.param === 'max_tokens' &&
        this.tokenLimitParam === 'max_tokens'
      ) {
        this.tokenLimitParam = 'max_completion_tokens';
        try {
          return await this.createCompletion(messages, options);
        } catch (retryError) {
          throw toLLMError(retryError);
        }
      }

      throw llmError;
    }
  }

  /**
   * Generate an embedding for a single text.
   */
  async embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse> {
    const { embeddings, usage } = await this.createEmbeddings(text, 1, options);
    return { embedding: embeddings[0], usage };
  }

  /**
   * Generate embeddings for multiple texts (batch).
   * Uses OpenAI's native batch embedding support.
   */
  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMBatchEmbeddingResponse> {
    if (texts.length === 0) {
      return { embeddings: [], usage: { promptTokens: 0, totalTokens: 0 } };
    }

    return this.createEmbeddings(texts, texts.length, options);
  }

  private async createCompletion(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const maxTokens = options?.maxTokens ?? 1000;
    const tokenLimit =
      this.tokenLimitParam === 'max_tokens'
        ? { max_tokens: maxTokens }
        : { max_completion_tokens: maxTokens };

    const response = await this.client.chat.completions.create(
      {
        model: options?.model ?? this.defaultModel,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? 0.3,
        stop: options?.stopSequences,
        ...tokenLimit,
        ...(options?.responseFormat && {
          response_format: toResponseFormat(options.responseFormat),
        }),
      },
      this.requestOptions(options)
    );

    const choice = response.choices?.[0];
    if (!choice || !choice.message) {
      throw new LLMError('malformed_response', 'Completion response contained no choices');
    }

    return {
      content: choice.message.content ?? '',
      finishReason: this.mapFinishReason(choice.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  private async createEmbeddings(
    input: string | string[],
    expectedCount: number,
    options?: LLMEmbeddingOptions
  ): Promise<LLMBatchEmbeddingResponse> {
    const response = await this.client.embeddings
      .create(
        {
          model: options?.model ?? this.defaultEmbeddingModel,
          input,
          ...(options?.dimensions !== undefined && { dimensions: options.dimensions }),
        },
        this.requestOptions(options)
      )
      .catch((error: unknown) => {
        throw toLLMError(error);
      });

    if (!Array.isArray(response.data) || response.data.length !== expectedCount) {
      throw new LLMError(
        'malformed_response',
        `Expected ${expectedCount} embeddings, got ${Array.isArray(response.data) ? response.data.length : 'none'}`
      );
    }

    // Ensure embeddings are in the same order as input
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    for (const item of sorted) {
      if (!Array.isArray(item.embedding) || item.embedding.some((v) => typeof v !== 'number')) {
        throw new LLMError('malformed_response', `Embedding ${item.index} is not a numeric vector`);
      }
    }

    return {
      embeddings: sorted.map((item) => item.embedding),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(
    reason: string | null | undefined
  ): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return null;
    }
  }
}

function toResponseFormat(
  format: LLMResponseFormat
): OpenAI.ResponseFormatJSONObject | OpenAI.ResponseFormatJSONSchema {
  if (format.type === 'json_object') {
    return { type: 'json_object' };
  }
  return {
    type: 'json_schema',
    json_schema: { name: format.name, schema: format.schema, strict: true },
  };
}
