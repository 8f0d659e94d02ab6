/**
 * Tests for RAG Configuration Constants
 *
 * Ensures environment schema defaults stay in sync with config values.
 */

import { describe, it, expect } from 'vitest';
import { parseEnv } from '@/lib/env';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_RAG_CONFIG,
  EMBEDDING_COST_PER_MILLION_TOKENS,
  EMBEDDING_DIMENSIONS,
  MAX_CHUNK_SIZE,
  MAX_EMBEDDING_BATCH_SIZE,
} from '../config';

describe('RAG config', () => {
  it('should match the environment defaults', () => {
    const env = parseEnv({});

    expect(env.EMBEDDING_MODEL).toBe(DEFAULT_EMBEDDING_MODEL);
    expect(env.EMBEDDING_DIMENSIONS).toBe(EMBEDDING_DIMENSIONS);
    expect(env.EMBEDDING_BATCH_SIZE).toBe(MAX_EMBEDDING_BATCH_SIZE);
    expect(env.EMBEDDING_COST_PER_MILLION_TOKENS).toBe(EMBEDDING_COST_PER_MILLION_TOKENS);
    expect(env.LLM_TIMEOUT_MS).toBe(DEFAULT_LLM_TIMEOUT_MS);
  });

  it('should keep the default chunk window valid', () => {
    expect(DEFAULT_CHUNK_OVERLAP).toBeLessThan(DEFAULT_CHUNK_SIZE);
    expect(DEFAULT_CHUNK_SIZE).toBeLessThanOrEqual(MAX_CHUNK_SIZE);
  });

  it('should expose the composite defaults', () => {
    expect(DEFAULT_RAG_CONFIG).toEqual({
      topK: 10,
      minSimilarity: 0.7,
      chunkSize: 500,
      chunkOverlap: 50,
      temperature: 0.1,
      maxTokens: 1000,
    });
  });
});
