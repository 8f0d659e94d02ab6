/**
 * LLM module exports.
 */

export {
  BaseLLMAdapter,
  DEFAULT_COMPLETION_MODEL,
  DEFAULT_ADAPTER_EMBEDDING_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './adapter';
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
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';

export { LLMError, toLLMError } from './errors';
export type { LLMErrorKind } from './errors';

export { createLLMAdapter } from './factory';

export {
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  MODEL_REFUSAL_SENTENCE,
} from './prompts';
