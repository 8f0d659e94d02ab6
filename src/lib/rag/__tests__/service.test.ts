/**
 * Tests for RAG Orchestrator
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  RAGOrchestrator,
  calculateConfidence,
  NO_CONTEXT_ANSWER,
  EMPTY_ANSWER_FALLBACK,
} from '../service';
import { RetrievalPipeline } from '../retrieval';
import { EmbeddingService } from '../embeddings';
import { Conversation } from '../conversation';
import type { ChunkStore } from '../store';
import { LLMError } from '@/lib/llm/errors';
import { CompletionError, EmbeddingError, InvalidInputError, RetrievalError } from '@/lib/errors';
import type { LLMCompletionResponse } from '@/types/llm';
import type { RetrievedChunk } from '@/types/rag';
import { axisVector, createFakeAdapter, type FakeAdapter } from '@/test/fakes';

// =============================================================================
// Mock Data
// =============================================================================

function retrieved(
  id: string,
  similarityScore: number,
  overrides: Partial<RetrievedChunk> = {}
): RetrievedChunk {
  return {
    chunkId: id,
    documentId: `doc-${id}`,
    documentName: `${id}.pdf`,
    chunkIndex: 0,
    text: `Content of ${id}`,
    similarityScore,
    metadata: {},
    ...overrides,
  };
}

function completion(content: string): LLMCompletionResponse {
  return {
    content,
    finishReason: 'stop',
    usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
  };
}

function createMockStore(results: RetrievedChunk[]) {
  return {
    upsert: vi.fn<ChunkStore['upsert']>(),
    markDocument: vi.fn<ChunkStore['markDocument']>(),
    search: vi.fn<ChunkStore['search']>().mockResolvedValue(results),
    amendMetadata: vi.fn<ChunkStore['amendMetadata']>(),
    deleteDocument: vi.fn<ChunkStore['deleteDocument']>(),
  } satisfies ChunkStore;
}

const QUESTION = 'How much did we spend on consulting in Q4?';

// =============================================================================
// Tests
// =============================================================================

describe('calculateConfidence', () => {
  it('should average similarity scores', () => {
    expect(calculateConfidence([retrieved('a', 0.9), retrieved('b', 0.8), retrieved('c', 0.7)])).toBe(0.8);
  });

  it('should clamp to [0, 1]', () => {
    expect(calculateConfidence([retrieved('a', 1.2), retrieved('b', 1.1)])).toBe(1);
    expect(calculateConfidence([retrieved('a', -0.4)])).toBe(0);
  });

  it('should be 0 without chunks', () => {
    expect(calculateConfidence([])).toBe(0);
  });
});

describe('RAGOrchestrator', () => {
  let adapter: FakeAdapter;
  let store: ReturnType<typeof createMockStore>;

  function createOrchestrator(results: RetrievedChunk[], times: number[] = []) {
    store = createMockStore(results);
    const embeddings = new EmbeddingService(adapter, {
      retry: { baseDelayMs: 0, minDelayMs: 0, maxDelayMs: 0 },
    });
    const clock = vi.fn<() => number>();
    for (const time of times) clock.mockReturnValueOnce(time);
    clock.mockReturnValue(times.length > 0 ? times[times.length - 1] : 0);

    return new RAGOrchestrator(new RetrievalPipeline(embeddings, store), adapter, { now: clock });
  }

  beforeEach(() => {
    adapter = createFakeAdapter();
    adapter.embed.mockResolvedValue({
      embedding: axisVector(0),
      usage: { promptTokens: 10, totalTokens: 10 },
    });
  });

  describe('no-context branch', () => {
    it('should refuse without calling the completion API', async () => {
      const orchestrator = createOrchestrator([]);

      const result = await orchestrator.answer('unrelated question about the weather', 1);

      expect(result).toEqual({
        question: 'unrelated question about the weather',
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        confidence: 0,
        chunksUsed: 0,
        queryTimeMs: 0,
        state: 'no_context',
      });
      expect(adapter.complete).not.toHaveBeenCalled();
    });

    it('should refuse when every candidate is below the threshold', async () => {
      const orchestrator = createOrchestrator([retrieved('a', 0.4)]);

      const result = await orchestrator.answer(QUESTION, 1);

      expect(result.state).toBe('no_context');
      expect(adapter.complete).not.toHaveBeenCalled();
    });
  });

  describe('grounded branch', () => {
    it('should return the mean similarity as confidence', async () => {
      adapter.complete.mockResolvedValue(completion('Consulting cost 15,000 EUR [Source: a.pdf].'));
      const orchestrator = createOrchestrator([
        retrieved('a', 0.9),
        retrieved('b', 0.8),
        retrieved('c', 0.7),
      ]);

      const result = await orchestrator.answer(QUESTION, 1);

      expect(result.confidence).toBe(0.8);
      expect(result.chunksUsed).toBe(3);
      expect(result.state).toBe('grounded');
      expect(result.answer).toBe('Consulting cost 15,000 EUR [Source: a.pdf].');
    });

    it('should build citations in retrieval order', async () => {
      adapter.complete.mockResolvedValue(completion('Answer.'));
      const orchestrator = createOrchestrator([
        retrieved('a', 0.91234, { metadata: { page: 3 }, chunkIndex: 2 }),
        retrieved('b', 0.75),
      ]);

      const result = await orchestrator.answer(QUESTION, 1);

      expect(result.sources).toEqual([
        {
          documentName: 'a.pdf',
          documentId: 'doc-a',
          chunkId: 'a',
          chunkIndex: 2,
          similarityScore: 0.912,
          pageNumber: 3,
        },
        {
          documentName: 'b.pdf',
          documentId: 'doc-b',
          chunkId: 'b',
          chunkIndex: 0,
          similarityScore: 0.75,
        },
      ]);
    });

    it('should send numbered context in the system prompt and the question last', async () => {
      adapter.complete.mockResolvedValue(completion('Answer.'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9), retrieved('b', 0.8)]);

      await orchestrator.answer(`  ${QUESTION}  `, 1);

      const [messages, options] = adapter.complete.mock.calls[0];
      expect(messages).toHaveLength(2);
      expect(messages[0].role).toBe('system');
      expect(messages[0].content).toContain(
        '[Document 1: a.pdf]\nContent of a\n\n[Document 2: b.pdf]\nContent of b\n'
      );
      expect(messages[0].content).toContain('[Source: document_name, page X]');
      expect(messages[1]).toEqual({
        role: 'user',
        content: `Question: ${QUESTION}\n\nAnswer based ONLY on the provided context above. Be concise and cite sources.`,
      });
      expect(options).toEqual({
        model: undefined,
        temperature: 0.1,
        maxTokens: 1000,
        signal: undefined,
      });
    });

    it('should pass a caller temperature through', async () => {
      adapter.complete.mockResolvedValue(completion('Answer.'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      await orchestrator.answer(QUESTION, 1, { temperature: 0.5 });

      expect(adapter.complete.mock.calls[0][1]).toMatchObject({ temperature: 0.5 });
    });

    it('should substitute a fallback for a blank completion', async () => {
      adapter.complete.mockResolvedValue(completion('   \n'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      const result = await orchestrator.answer(QUESTION, 1);

      expect(result.answer).toBe(EMPTY_ANSWER_FALLBACK);
      expect(result.answer).toBe('Unable to generate answer from retrieved documents.');
    });

    it('should report elapsed query time', async () => {
      adapter.complete.mockResolvedValue(completion('Answer.'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)], [1000, 1000, 1040, 1040, 1900, 1900, 1900, 1900]);

      const result = await orchestrator.answer(QUESTION, 1);

      expect(result.queryTimeMs).toBe(900);
    });
  });

  describe('failures', () => {
    it('should raise a completion error instead of downgrading', async () => {
      adapter.complete.mockRejectedValue(new LLMError('rate_limited', 'Too many requests', { status: 429 }));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      await expect(orchestrator.answer(QUESTION, 1)).rejects.toBeInstanceOf(CompletionError);
      expect(adapter.complete).toHaveBeenCalledTimes(1);
    });

    it('should carry the provider error as cause', async () => {
      adapter.complete.mockRejectedValue(new LLMError('auth_failed', 'Invalid key', { status: 401 }));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      try {
        await orchestrator.answer(QUESTION, 1);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompletionError);
        if (error instanceof CompletionError) {
          expect(error.stage).toBe('completion');
          expect(error.message).toBe('Failed to generate answer: Invalid key');
          expect(error.cause).toBeInstanceOf(LLMError);
        }
      }
    });

    it('should propagate embedding failures', async () => {
      adapter.embed.mockRejectedValue(new LLMError('auth_failed', 'Invalid key'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      await expect(orchestrator.answer(QUESTION, 1)).rejects.toBeInstanceOf(EmbeddingError);
      expect(adapter.complete).not.toHaveBeenCalled();
    });

    it('should propagate store failures', async () => {
      const orchestrator = createOrchestrator([]);
      store.search.mockRejectedValue(new Error('connection reset'));

      await expect(orchestrator.answer(QUESTION, 1)).rejects.toBeInstanceOf(RetrievalError);
    });

    it('should reject a blank question', async () => {
      const orchestrator = createOrchestrator([]);

      await expect(orchestrator.answer('  ', 1)).rejects.toBeInstanceOf(InvalidInputError);
      expect(adapter.embed).not.toHaveBeenCalled();
    });

    it('should reject an out-of-range temperature', async () => {
      const orchestrator = createOrchestrator([]);

      await expect(orchestrator.answer(QUESTION, 1, { temperature: 3 })).rejects.toBeInstanceOf(
        InvalidInputError
      );
    });
  });

  describe('conversations', () => {
    it('should replay recent turns between system prompt and question', async () => {
      adapter.complete.mockResolvedValue(completion('Rent was 1,200 EUR.'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);
      const conversation = new Conversation(1);
      conversation.addUserTurn('What documents do we have?');
      conversation.addAssistantTurn('An invoice and a lease.');

      await orchestrator.answer('And what was the monthly rent?', 1, { conversation });

      const [messages] = adapter.complete.mock.calls[0];
      expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
      expect(messages[1].content).toBe('What documents do we have?');
      expect(messages[2].content).toBe('An invoice and a lease.');
    });

    it('should append the question and answer', async () => {
      adapter.complete.mockResolvedValue(completion('Rent was 1,200 EUR.'));
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);
      const conversation = new Conversation(1);

      await orchestrator.answer('What was the monthly rent?', 1, { conversation });

      const turns = conversation.getTurns();
      expect(turns.map((t) => t.role)).toEqual(['user', 'assistant']);
      expect(turns[1].content).toBe('Rent was 1,200 EUR.');
      expect(turns[1].confidence).toBe(0.9);
      expect(turns[1].sources).toHaveLength(1);
    });

    it('should record refusals too', async () => {
      const orchestrator = createOrchestrator([]);
      const conversation = new Conversation(1);

      await orchestrator.answer('What was the monthly rent?', 1, { conversation });

      expect(conversation.getTurns()[1]).toMatchObject({ content: NO_CONTEXT_ANSWER, confidence: 0 });
    });

    it('should reject a conversation of another organization', async () => {
      const orchestrator = createOrchestrator([retrieved('a', 0.9)]);

      await expect(
        orchestrator.answer(QUESTION, 1, { conversation: new Conversation(2) })
      ).rejects.toBeInstanceOf(InvalidInputError);
      expect(store.search).not.toHaveBeenCalled();
    });
  });
});
