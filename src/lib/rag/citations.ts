/**
 * Citation Helpers
 *
 * Builds citation records and prompt context from retrieved chunks, and scans
 * generated answers for inline `[Source: name, page N]` markers. The scan is
 * best-effort: it never throws and never affects the answer itself.
 */

import type { InlineCitation, RetrievedChunk, SourceCitation } from '@/types/rag';
import { UNKNOWN_DOCUMENT_NAME } from './config';

// =============================================================================
// Citation Building
// =============================================================================

function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

function documentLabel(chunk: RetrievedChunk): string {
  return chunk.documentName.trim() || UNKNOWN_DOCUMENT_NAME;
}

/**
 * Page number from chunk metadata, only when it is a real number.
 */
export function pageFromMetadata(metadata: Record<string, unknown>): number | undefined {
  const page = metadata.page;
  return typeof page === 'number' && Number.isFinite(page) ? page : undefined;
}

/**
 * One citation per retrieved chunk, in retrieval order.
 */
export function buildSourceCitations(chunks: RetrievedChunk[]): SourceCitation[] {
  return chunks.map((chunk) => {
    const pageNumber = pageFromMetadata(chunk.metadata);
    return {
      documentName: documentLabel(chunk),
      documentId: chunk.documentId,
      chunkId: chunk.chunkId,
      chunkIndex: chunk.chunkIndex,
      similarityScore: roundScore(chunk.similarityScore),
      ...(pageNumber !== undefined && { pageNumber }),
    };
  });
}

/**
 * Numbered context block for the prompt. Each chunk is labelled with its
 * position and source document name.
 */
export function formatContextForPrompt(chunks: RetrievedChunk[]): string {
  return chunks
    .map((chunk, index) => `[Document ${index + 1}: ${documentLabel(chunk)}]\n${chunk.text}\n`)
    .join('\n');
}

// =============================================================================
// Inline Citation Parsing
// =============================================================================

const INLINE_CITATION_PATTERN = /\[Source:[^\]]*\]/g;
const INLINE_CITATION_PARTS = /^\[Source:\s*(.*?)(?:,\s*(?:page|p\.)\s*(\d+))?\s*\]$/i;

/**
 * Parse one `[Source: name, page N]` marker. Returns null when the marker
 * names no document.
 */
export function parseInlineCitation(raw: string): InlineCitation | null {
  const match = INLINE_CITATION_PARTS.exec(raw);
  if (!match) return null;

  const documentName = match[1].trim();
  if (!documentName) return null;

  return match[2] === undefined
    ? { raw, documentName }
    : { raw, documentName, page: Number.parseInt(match[2], 10) };
}

/**
 * All inline citation markers in an answer, in order of appearance.
 */
export function extractInlineCitations(answer: string): InlineCitation[] {
  const citations: InlineCitation[] = [];
  for (const match of answer.matchAll(INLINE_CITATION_PATTERN)) {
    const parsed = parseInlineCitation(match[0]);
    if (parsed) citations.push(parsed);
  }
  return citations;
}

// =============================================================================
// Validation
// =============================================================================

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Inline citations naming a document that is not among the sources.
 */
export function findUnknownCitations(
  inline: InlineCitation[],
  sources: SourceCitation[]
): InlineCitation[] {
  return inline.filter(
    (citation) => !sources.some((source) => sameName(source.documentName, citation.documentName))
  );
}

/**
 * Sources whose document is never cited inline.
 */
export function findUncitedSources(
  inline: InlineCitation[],
  sources: SourceCitation[]
): SourceCitation[] {
  return sources.filter(
    (source) => !inline.some((citation) => sameName(source.documentName, citation.documentName))
  );
}
