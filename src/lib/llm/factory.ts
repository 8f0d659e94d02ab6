/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 */

import type { LLMAdapter, LLMAdapterConfig } from './adapter';
import { OpenAIAdapter } from './openai-adapter';
import type { LLMProvider } from '@/types/llm';

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapters: Record<LLMProvider, AdapterConstructor> = {
  openai: OpenAIAdapter,
};

/**
 * Create an LLM adapter for a specific provider.
 *
 * @example
 * const adapter = createLLMAdapter('openai', {
 *   apiKey: env.OPENAI_API_KEY,
 *   defaultModel: 'gpt-4o-mini',
 * });
 */
export function createLLMAdapter(provider: LLMProvider, config: LLMAdapterConfig): LLMAdapter {
  const AdapterClass = adapters[provider];
  return new AdapterClass(config);
}
