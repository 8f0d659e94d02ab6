/**
 * Retrieval Pipeline
 *
 * Embeds a query, runs nearest-neighbour search scoped to one organization,
 * and drops candidates below the similarity threshold. Store order is kept:
 * no secondary sort, so equal scores stay in whatever order the store returned.
 */

import { InvalidInputError, RetrievalError, errorMessage } from '@/lib/errors';
import { createLayerLogger, logRagStep, Timer, truncateText } from '@/lib/logger';
import type { RetrievedChunk } from '@/types/rag';
import type { EmbeddingService } from './embeddings';
import type { ChunkStore } from './store';
import { DEFAULT_MIN_SIMILARITY, DEFAULT_TOP_K, MAX_TOP_K } from './config';

const log = createLayerLogger('rag', 'retrieval');

// =============================================================================
// Types
// =============================================================================

export interface RetrievalOptions {
  /** Candidates requested from the store, 1..50 */
  topK?: number;
  /** Inclusive lower bound on cosine similarity, 0..1 */
  minSimilarity?: number;
  signal?: AbortSignal;
}

// =============================================================================
// Validation
// =============================================================================

export function validateRetrievalOptions(topK: number, minSimilarity: number): void {
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new InvalidInputError(`topK must be an integer between 1 and ${MAX_TOP_K}, got ${topK}`, 'retrieval');
  }
  if (!Number.isFinite(minSimilarity) || minSimilarity < 0 || minSimilarity > 1) {
    throw new InvalidInputError(`minSimilarity must be between 0 and 1, got ${minSimilarity}`, 'retrieval');
  }
}

// =============================================================================
// Pipeline
// =============================================================================

export class RetrievalPipeline {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly store: ChunkStore
  ) {}

  /**
   * Find chunks relevant to a query within one organization.
   * An empty result is a normal outcome, not an error.
   *
   * @throws InvalidInputError for a blank query or out-of-range options
   * @throws EmbeddingError (unchanged) when the query cannot be embedded
   * @throws RetrievalError when the store search fails
   */
  async search(
    query: string,
    organizationId: number,
    options: RetrievalOptions = {}
  ): Promise<RetrievedChunk[]> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const minSimilarity = options.minSimilarity ?? DEFAULT_MIN_SIMILARITY;

    const trimmed = query.trim();
    if (!trimmed) {
      throw new InvalidInputError('Query cannot be empty', 'retrieval');
    }
    validateRetrievalOptions(topK, minSimilarity);

    const timer = new Timer();

    timer.mark('embedding');
    const queryVector = await this.embeddings.generateEmbedding(trimmed, { signal: options.signal });
    timer.measure('embedding');

    timer.mark('search');
    let candidates: RetrievedChunk[];
    try {
      candidates = await this.store.search(organizationId, queryVector, topK, {
        signal: options.signal,
      });
    } catch (error) {
      logRagStep(log, 'retrieval', { error: errorMessage(error) });
      throw new RetrievalError(`Vector search failed: ${errorMessage(error)}`, { cause: error });
    }
    timer.measure('search');

    const results = candidates
      .filter((chunk) => chunk.similarityScore >= minSimilarity)
      .slice(0, topK);

    log.info(
      {
        event: 'retrieval_complete',
        organizationId,
        query: truncateText(trimmed, 100),
        candidates: candidates.length,
        chunks: results.length,
        topK,
        minSimilarity,
        ...timer.getAllDurations(),
      },
      'Retrieval complete'
    );

    return results;
  }
}
