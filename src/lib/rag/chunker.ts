/**
 * Document Chunker
 *
 * Splits document text into overlapping chunks bounded by a token budget.
 * Three strategies:
 * - fixed: sliding window over whitespace-delimited tokens, overlap in tokens
 * - sentence: sentences accumulated up to the budget, overlap in sentences
 * - semantic: paragraphs and markdown sections, overlap in sections
 *
 * Pure and deterministic: no I/O.
 */

import { InvalidInputError } from '@/lib/errors';
import { createLayerLogger } from '@/lib/logger';
import type { ChunkMetadata, ChunkStrategy, TextChunk } from '@/types/rag';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  OVERLAP_REDUCTION_MARGIN,
} from './config';

const log = createLayerLogger('rag', 'chunker');

// =============================================================================
// Types
// =============================================================================

export interface ChunkOptions {
  chunkSize?: number;
  overlap?: number;
  strategy?: ChunkStrategy;
  metadata?: ChunkMetadata;
}

/**
 * A piece of the input with its character span.
 */
interface Span {
  text: string;
  start: number;
  end: number;
}

// =============================================================================
// Token Counting
// =============================================================================

/**
 * Approximate token count: whitespace runs and the position after
 * `.!?,;:` are boundaries, every non-blank piece counts as one. Never below 1.
 */
export function countTokens(text: string): number {
  const pieces = text.split(/\s+|(?<=[.!?,;:])/);
  let count = 0;
  for (const piece of pieces) {
    if (piece.trim()) count++;
  }
  return Math.max(1, count);
}

// =============================================================================
// Splitting Helpers
// =============================================================================

/**
 * Narrow a raw span to its trimmed content. Returns null for blank spans.
 */
function trimSpan(source: string, start: number, end: number): Span | null {
  const raw = source.slice(start, end);
  const text = raw.trim();
  if (!text) return null;

  const leading = raw.length - raw.trimStart().length;
  return { text, start: start + leading, end: start + leading + text.length };
}

/**
 * Split on a separator pattern, keeping the offsets of each non-blank piece.
 */
function splitSpans(text: string, separator: RegExp): Span[] {
  const spans: Span[] = [];
  let cursor = 0;

  for (const match of text.matchAll(separator)) {
    const index = match.index ?? 0;
    const span = trimSpan(text, cursor, index);
    if (span) spans.push(span);
    cursor = index + match[0].length;
  }

  const tail = trimSpan(text, cursor, text.length);
  if (tail) spans.push(tail);

  return spans;
}

/**
 * Words with their trailing whitespace attached (the first also keeps any
 * leading whitespace), so the tokens concatenate back to the input.
 */
function tokenize(text: string): Span[] {
  const tokens: Span[] = [];
  for (const match of text.matchAll(/\s*\S+\s*/g)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

// =============================================================================
// Strategies
// =============================================================================

function splitFixed(text: string, chunkSize: number, overlap: number): Span[] {
  const tokens = tokenize(text);
  const windows: Span[] = [];
  const advance = Math.max(1, chunkSize - overlap);

  for (let current = 0; current < tokens.length; current += advance) {
    const last = Math.min(current + chunkSize, tokens.length) - 1;
    const window = trimSpan(text, tokens[current].start, tokens[last].end);
    if (window) windows.push(window);
  }

  return windows;
}

/**
 * Accumulate units until the next one would exceed the budget. A chunk always
 * takes at least one unit, so a single oversized unit becomes its own chunk.
 */
function groupUnits(
  units: Span[],
  chunkSize: number,
  overlap: number,
  joiner: string
): Span[] {
  const groups: Span[] = [];
  let current = 0;

  while (current < units.length) {
    const taken: Span[] = [];
    let tokenCount = 0;

    for (let idx = current; idx < units.length; idx++) {
      const unitTokens = countTokens(units[idx].text);
      if (taken.length > 0 && tokenCount + unitTokens > chunkSize) break;
      taken.push(units[idx]);
      tokenCount += unitTokens;
    }

    groups.push({
      text: taken.map((unit) => unit.text).join(joiner),
      start: taken[0].start,
      end: taken[taken.length - 1].end,
    });

    current += Math.max(1, taken.length - overlap);
  }

  return groups;
}

function splitSentences(text: string, chunkSize: number, overlap: number): Span[] {
  return groupUnits(splitSpans(text, /(?<=[.!?])\s+/g), chunkSize, overlap, ' ');
}

function splitSections(text: string, chunkSize: number, overlap: number): Span[] {
  return groupUnits(splitSpans(text, /\n\n+|(?=^#)/gm), chunkSize, overlap, '\n\n');
}

const STRATEGIES: Record<
  ChunkStrategy,
  (text: string, chunkSize: number, overlap: number) => Span[]
> = {
  fixed: splitFixed,
  sentence: splitSentences,
  semantic: splitSections,
};

function isStrategy(value: string): value is ChunkStrategy {
  return Object.prototype.hasOwnProperty.call(STRATEGIES, value);
}

// =============================================================================
// Chunking Service
// =============================================================================

export class ChunkingService {
  /**
   * Split text into chunks with sequential indexes.
   *
   * Empty or whitespace-only text yields `[]`. An overlap that leaves no
   * forward progress is reduced to `max(0, chunkSize - 100)`, and chunk sizes
   * above the embedding ceiling are capped to it.
   *
   * @throws InvalidInputError for a non-positive or non-integer chunk size,
   *   a negative or non-integer overlap, or an unknown strategy
   */
  chunk(text: string, options: ChunkOptions = {}): TextChunk[] {
    const strategy = options.strategy ?? 'fixed';
    let chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    let overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

    if (!text.trim()) {
      log.warn('Empty text provided to chunker');
      return [];
    }

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new InvalidInputError(`chunkSize must be a positive integer, got ${chunkSize}`, 'chunking');
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new InvalidInputError(`overlap must be a non-negative integer, got ${overlap}`, 'chunking');
    }
    if (!isStrategy(strategy)) {
      throw new InvalidInputError(`Unknown chunking strategy: ${strategy}`, 'chunking');
    }

    if (overlap >= chunkSize) {
      const reduced = Math.max(0, chunkSize - OVERLAP_REDUCTION_MARGIN);
      log.warn({ overlap, chunkSize, reduced }, 'Overlap leaves no progress, reducing');
      overlap = reduced;
    }

    if (chunkSize > MAX_CHUNK_SIZE) {
      log.warn({ chunkSize, max: MAX_CHUNK_SIZE }, 'Chunk size exceeds embedding limit, capping');
      chunkSize = MAX_CHUNK_SIZE;
    }

    const spans = STRATEGIES[strategy](text, chunkSize, overlap);
    const baseMetadata = options.metadata ?? {};

    const chunks = spans.map((span, chunkIndex) => ({
      chunkIndex,
      text: span.text,
      tokenCount: countTokens(span.text),
      startOffset: span.start,
      endOffset: span.end,
      metadata: {
        ...baseMetadata,
        strategy,
        chunkSizeConfig: chunkSize,
        overlapConfig: overlap,
      },
    }));

    log.debug(
      { strategy, chunkSize, overlap, chars: text.length, chunks: chunks.length },
      'Text chunked'
    );

    return chunks;
  }

  countTokens(text: string): number {
    return countTokens(text);
  }
}
