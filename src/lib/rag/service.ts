/**
 * RAG Orchestrator
 *
 * Answers a question from retrieved document chunks:
 * 1. Retrieve relevant chunks for the organization
 * 2. No chunks: return the fixed refusal without calling the LLM (NO_CONTEXT)
 * 3. Build numbered context and citation records
 * 4. Generate the answer with the LLM (GROUNDED)
 * 5. Score confidence as the mean retrieval similarity
 *
 * A completion failure is an error, never a downgrade to NO_CONTEXT.
 */

import type { LLMAdapter, LLMMessage } from '@/lib/llm/adapter';
import { toLLMError } from '@/lib/llm/errors';
import { buildRAGSystemPrompt, buildRAGUserPrompt } from '@/lib/llm/prompts';
import { CompletionError, InvalidInputError } from '@/lib/errors';
import {
  createLayerLogger,
  logExternalCall,
  logRagStep,
  Timer,
  truncateText,
} from '@/lib/logger';
import type { RAGAnswer, RetrievedChunk, SourceCitation } from '@/types/rag';
import type { RetrievalPipeline } from './retrieval';
import type { Conversation } from './conversation';
import {
  buildSourceCitations,
  extractInlineCitations,
  findUnknownCitations,
  formatContextForPrompt,
} from './citations';
import {
  DEFAULT_HISTORY_TURNS,
  DEFAULT_RAG_MAX_TOKENS,
  DEFAULT_RAG_TEMPERATURE,
  EMPTY_ANSWER_FALLBACK,
  NO_CONTEXT_ANSWER,
} from './config';

const log = createLayerLogger('rag', 'orchestrator');

// =============================================================================
// Types
// =============================================================================

export interface AnswerOptions {
  topK?: number;
  minSimilarity?: number;
  temperature?: number;
  /** Prior turns are replayed; the new question and answer are appended */
  conversation?: Conversation;
  signal?: AbortSignal;
}

export interface RAGOrchestratorConfig {
  /** Completion model; the adapter default when unset */
  model?: string;
  maxTokens: number;
  historyTurns: number;
  /** Clock for query timing */
  now: () => number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Mean similarity clamped to [0, 1] and rounded to 3 decimals. 0 for no chunks.
 */
export function calculateConfidence(chunks: RetrievedChunk[]): number {
  if (chunks.length === 0) return 0;

  const mean = chunks.reduce((sum, chunk) => sum + chunk.similarityScore, 0) / chunks.length;
  const clamped = Math.min(1, Math.max(0, mean));
  return Math.round(clamped * 1000) / 1000;
}

// =============================================================================
// RAG Orchestrator Class
// =============================================================================

export class RAGOrchestrator {
  private readonly config: RAGOrchestratorConfig;

  constructor(
    private readonly retrieval: RetrievalPipeline,
    private readonly llm: LLMAdapter,
    config: Partial<RAGOrchestratorConfig> = {}
  ) {
    this.config = {
      model: config.model,
      maxTokens: config.maxTokens ?? DEFAULT_RAG_MAX_TOKENS,
      historyTurns: config.historyTurns ?? DEFAULT_HISTORY_TURNS,
      now: config.now ?? Date.now,
    };
  }

  /**
   * Answer a question from the organization's documents.
   *
   * @throws InvalidInputError for a blank question, an out-of-range
   *   temperature, or a conversation of another organization
   * @throws EmbeddingError or RetrievalError from retrieval, unchanged
   * @throws CompletionError when answer generation fails
   */
  async answer(
    question: string,
    organizationId: number,
    options: AnswerOptions = {}
  ): Promise<RAGAnswer> {
    const timer = new Timer(this.config.now);
    const temperature = options.temperature ?? DEFAULT_RAG_TEMPERATURE;
    const { conversation } = options;

    const trimmed = question.trim();
    if (!trimmed) {
      throw new InvalidInputError('Question cannot be empty', 'retrieval');
    }
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
      throw new InvalidInputError(`temperature must be between 0 and 2, got ${temperature}`, 'completion');
    }
    if (conversation && conversation.organizationId !== organizationId) {
      throw new InvalidInputError('Conversation belongs to a different organization', 'retrieval');
    }

    log.info(
      { event: 'rag_query_start', organizationId, question: truncateText(trimmed, 100) },
      'RAG query started'
    );

    // 1. Retrieve
    timer.mark('retrieval');
    const chunks = await this.retrieval.search(trimmed, organizationId, {
      topK: options.topK,
      minSimilarity: options.minSimilarity,
      signal: options.signal,
    });
    timer.measure('retrieval');

    // 2. NO_CONTEXT
    if (chunks.length === 0) {
      log.info({ event: 'rag_no_context', organizationId }, 'No relevant chunks found');
      conversation?.addUserTurn(trimmed);
      conversation?.addAssistantTurn(NO_CONTEXT_ANSWER, { sources: [], confidence: 0 });

      return {
        question: trimmed,
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        confidence: 0,
        chunksUsed: 0,
        queryTimeMs: timer.elapsed(),
        state: 'no_context',
      };
    }

    // 3. Context and citations
    const context = formatContextForPrompt(chunks);
    const sources = buildSourceCitations(chunks);

    const messages: LLMMessage[] = [
      { role: 'system', content: buildRAGSystemPrompt(context) },
      ...(conversation ? conversation.toMessages(this.config.historyTurns) : []),
      { role: 'user', content: buildRAGUserPrompt(trimmed) },
    ];

    // 4. GROUNDED
    const answer = await this.generate(messages, temperature, timer, options.signal);
    const confidence = calculateConfidence(chunks);

    this.checkInlineCitations(answer, sources);

    conversation?.addUserTurn(trimmed);
    conversation?.addAssistantTurn(answer, { sources, confidence });

    logRagStep(log, 'generation', {
      chunks: chunks.length,
      confidence,
      duration_ms: timer.getDuration('generation'),
    });
    log.info(
      {
        event: 'rag_query_complete',
        organizationId,
        chunksUsed: chunks.length,
        confidence,
        ...timer.getAllDurations(),
        total_ms: timer.elapsed(),
      },
      'RAG query completed'
    );

    return {
      question: trimmed,
      answer,
      sources,
      confidence,
      chunksUsed: chunks.length,
      queryTimeMs: timer.elapsed(),
      state: 'grounded',
    };
  }

  private async generate(
    messages: LLMMessage[],
    temperature: number,
    timer: Timer,
    signal: AbortSignal | undefined
  ): Promise<string> {
    timer.mark('generation');
    try {
      const response = await this.llm.complete(messages, {
        model: this.config.model,
        temperature,
        maxTokens: this.config.maxTokens,
        signal,
      });
      timer.measure('generation');

      logExternalCall(log, 'openai', 'complete', {
        duration_ms: timer.getDuration('generation'),
        tokens: response.usage.totalTokens,
        model: this.config.model,
      });

      return response.content.trim() || EMPTY_ANSWER_FALLBACK;
    } catch (error) {
      const llmError = toLLMError(error);
      logExternalCall(log, 'openai', 'complete', {
        duration_ms: timer.measure('generation'),
        status: llmError.status ?? llmError.kind,
        error: llmError.message,
      });
      throw new CompletionError(`Failed to generate answer: ${llmError.message}`, {
        cause: llmError,
      });
    }
  }

  /**
   * Log inline citations that name documents outside the retrieved set.
   */
  private checkInlineCitations(answer: string, sources: SourceCitation[]): void {
    const unknown = findUnknownCitations(extractInlineCitations(answer), sources);
    if (unknown.length > 0) {
      log.warn(
        { event: 'rag_unknown_citations', citations: unknown.map((c) => c.raw) },
        'Answer cites documents that were not retrieved'
      );
    }
  }
}

export { NO_CONTEXT_ANSWER, EMPTY_ANSWER_FALLBACK };
