/**
 * Document Ingestion
 *
 * Extracted text → chunks → embeddings → chunk store.
 *
 * A failing embedding batch marks its chunks as failed and ingestion moves
 * on to the next batch; the report says which chunk indexes are missing.
 * Text too short to be useful stops ingestion before chunking.
 *
 * The store holds the document's status: `processing` while running, then
 * the report's status, or `failed` with the error when ingestion throws.
 */

import { parseFile, type ParseResult } from '@/lib/parsers';
import { errorMessage, IngestionError, RAGError, type RAGErrorCode } from '@/lib/errors';
import { createLayerLogger, logRagStep, Timer } from '@/lib/logger';
import type {
  ChunkMetadata,
  DocumentRef,
  DocumentStatus,
  EmbeddedChunk,
  TextChunk,
} from '@/types/rag';
import type { ChunkingService, ChunkOptions } from './chunker';
import type { EmbeddingService } from './embeddings';
import type { ChunkStore } from './store';
import { MIN_EXTRACTED_TEXT_LENGTH } from './config';

const log = createLayerLogger('ingestion', 'pipeline');

// =============================================================================
// Types
// =============================================================================

export interface IngestionInput extends DocumentRef {
  /** Whole-document text; ignored when `pages` is given */
  text?: string;
  /** Per-page text, page 1 first */
  pages?: string[];
  metadata?: ChunkMetadata;
}

export type IngestionChunkOptions = Omit<ChunkOptions, 'metadata'>;

export interface IngestOptions {
  signal?: AbortSignal;
}

export type IngestionStatus = Exclude<DocumentStatus, 'processing'>;

export interface FailedChunk {
  chunkIndex: number;
  error: string;
  code?: RAGErrorCode;
}

export interface IngestionReport {
  documentId: string;
  status: IngestionStatus;
  totalChunks: number;
  embeddedChunks: number;
  failedChunks: FailedChunk[];
  durationMs: number;
}

// =============================================================================
// Ingestion Pipeline
// =============================================================================

export class IngestionPipeline {
  constructor(
    private readonly chunker: ChunkingService,
    private readonly embeddings: EmbeddingService,
    private readonly store: ChunkStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Chunk, embed and store one document.
   *
   * With `pages`, each page is chunked on its own and its chunks carry
   * `metadata.page` (1-based); chunk offsets are then relative to the page.
   * Chunk indexes run across the whole document.
   *
   * @throws IngestionError when the text is too short or the store rejects the chunks
   * @throws InvalidInputError for invalid chunk options
   */
  async ingest(
    input: IngestionInput,
    chunkOptions: IngestionChunkOptions = {},
    options: IngestOptions = {}
  ): Promise<IngestionReport> {
    const document: DocumentRef = {
      documentId: input.documentId,
      documentName: input.documentName,
      organizationId: input.organizationId,
    };

    await this.recordStatus(document, 'processing');

    let report: IngestionReport;
    try {
      report = await this.run(document, input, chunkOptions, options);
    } catch (error) {
      await this.recordFailure(document, error);
      throw error;
    }

    await this.recordStatus(document, report.status, describeFailures(report));
    return report;
  }

  /**
   * Extract text from a file and ingest it. PDFs keep their pages.
   *
   * @throws IngestionError when extraction fails
   */
  async ingestFile(
    buffer: Buffer,
    filename: string,
    document: DocumentRef & { metadata?: ChunkMetadata },
    chunkOptions: IngestionChunkOptions = {},
    options: IngestOptions = {}
  ): Promise<IngestionReport> {
    let parsed: ParseResult;
    try {
      parsed = await parseFile(buffer, filename);
    } catch (error) {
      log.error({ filename, error: errorMessage(error) }, 'Text extraction failed');
      const failure = new IngestionError(
        `Failed to extract text from ${filename}: ${errorMessage(error)}`,
        { cause: error }
      );
      await this.recordFailure(document, failure);
      throw failure;
    }

    return this.ingest(
      parsed.pages ? { ...document, pages: parsed.pages } : { ...document, text: parsed.content },
      chunkOptions,
      options
    );
  }

  private async run(
    document: DocumentRef,
    input: IngestionInput,
    chunkOptions: IngestionChunkOptions,
    options: IngestOptions
  ): Promise<IngestionReport> {
    const timer = new Timer(this.now);

    const fullText = input.pages ? input.pages.join('\n\n') : (input.text ?? '');
    const usableLength = fullText.trim().length;
    if (usableLength < MIN_EXTRACTED_TEXT_LENGTH) {
      log.warn({ documentId: document.documentId, chars: usableLength }, 'Extracted text too short');
      throw new IngestionError(
        `Extracted text too short: ${usableLength} characters (minimum ${MIN_EXTRACTED_TEXT_LENGTH})`
      );
    }

    // 1. Chunk
    timer.mark('chunking');
    const chunks = this.chunkDocument(input, chunkOptions);
    timer.measure('chunking');
    logRagStep(log, 'chunking', {
      chunks: chunks.length,
      duration_ms: timer.getDuration('chunking'),
    });

    // 2. Embed, batch by batch
    timer.mark('embedding');
    const { embedded, failed } = await this.embedChunks(chunks, options.signal);
    timer.measure('embedding');

    // 3. Store, replacing any earlier version of the document
    timer.mark('storage');
    try {
      await this.store.upsert(document, embedded);
    } catch (error) {
      log.error(
        { documentId: document.documentId, error: errorMessage(error) },
        'Failed to store chunks'
      );
      throw new IngestionError(`Failed to store chunks: ${errorMessage(error)}`, { cause: error });
    }
    timer.measure('storage');

    const status: IngestionStatus =
      embedded.length === 0 ? 'failed' : failed.length > 0 ? 'partial' : 'completed';

    const report: IngestionReport = {
      documentId: document.documentId,
      status,
      totalChunks: chunks.length,
      embeddedChunks: embedded.length,
      failedChunks: failed,
      durationMs: timer.elapsed(),
    };

    log.info(
      {
        event: 'ingestion_complete',
        documentId: document.documentId,
        organizationId: document.organizationId,
        status,
        totalChunks: report.totalChunks,
        failedChunks: failed.length,
        ...timer.getAllDurations(),
      },
      `Document ingested (${status})`
    );

    return report;
  }

  private chunkDocument(input: IngestionInput, chunkOptions: IngestionChunkOptions): TextChunk[] {
    const baseMetadata = input.metadata ?? {};

    if (!input.pages) {
      return this.chunker.chunk(input.text ?? '', { ...chunkOptions, metadata: baseMetadata });
    }

    const chunks: TextChunk[] = [];
    input.pages.forEach((pageText, i) => {
      if (!pageText.trim()) return;
      const pageChunks = this.chunker.chunk(pageText, {
        ...chunkOptions,
        metadata: { ...baseMetadata, page: i + 1 },
      });
      for (const chunk of pageChunks) {
        chunks.push({ ...chunk, chunkIndex: chunks.length });
      }
    });
    return chunks;
  }

  private async embedChunks(
    chunks: TextChunk[],
    signal: AbortSignal | undefined
  ): Promise<{ embedded: EmbeddedChunk[]; failed: FailedChunk[] }> {
    const batchSize = this.embeddings.getBatchSize();
    const embedded: EmbeddedChunk[] = [];
    const failed: FailedChunk[] = [];

    for (let start = 0; start < chunks.length; start += batchSize) {
      signal?.throwIfAborted();
      const batch = chunks.slice(start, start + batchSize);

      try {
        const vectors = await this.embeddings.generateEmbeddingsBatch(
          batch.map((c) => c.text),
          { signal }
        );
        batch.forEach((chunk, i) => embedded.push({ ...chunk, embedding: vectors[i] }));
      } catch (error) {
        if (signal?.aborted) throw error;

        const code = error instanceof RAGError ? error.code : undefined;
        log.warn(
          {
            event: 'embedding_batch_failed',
            firstChunk: batch[0].chunkIndex,
            size: batch.length,
            error: errorMessage(error),
          },
          'Embedding batch failed, continuing'
        );
        for (const chunk of batch) {
          failed.push({
            chunkIndex: chunk.chunkIndex,
            error: errorMessage(error),
            ...(code && { code }),
          });
        }
      }
    }

    return { embedded, failed };
  }

  private async recordStatus(
    document: DocumentRef,
    status: DocumentStatus,
    message?: string
  ): Promise<void> {
    try {
      await this.store.markDocument(document, status, message);
    } catch (error) {
      throw new IngestionError(`Failed to record document status: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  // The ingestion error stays the one the caller sees
  private async recordFailure(document: DocumentRef, error: unknown): Promise<void> {
    try {
      await this.store.markDocument(document, 'failed', errorMessage(error));
    } catch (markError) {
      log.error(
        { documentId: document.documentId, error: errorMessage(markError) },
        'Failed to mark document as failed'
      );
    }
  }
}

/**
 * Error message stored with a partial or failed document.
 */
function describeFailures(report: IngestionReport): string | undefined {
  if (report.failedChunks.length === 0) return undefined;

  const [first] = report.failedChunks;
  return `${report.failedChunks.length} of ${report.totalChunks} chunks failed to embed: ${first.error}`;
}
