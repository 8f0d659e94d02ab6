/**
 * Tests for document ingestion.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IngestionPipeline } from '../ingestion';
import { ChunkingService } from '../chunker';
import { EmbeddingService } from '../embeddings';
import { InMemoryChunkStore, type ChunkStore } from '../store';
import { LLMError } from '@/lib/llm/errors';
import { IngestionError, InvalidInputError } from '@/lib/errors';
import { axisVector, createFakeAdapter, type FakeAdapter } from '@/test/fakes';

// =============================================================================
// Fixtures
// =============================================================================

const DOCUMENT = {
  documentId: 'doc-1',
  documentName: 'annual-report.pdf',
  organizationId: 7,
};

// Six words at two tokens per chunk: three chunks, two batches of size 2
const TEXT = 'alpha beta gamma delta epsilon zeta';
const SMALL_CHUNKS = { chunkSize: 2, overlap: 0 };

function createFailingStore(error: Error) {
  return {
    upsert: vi.fn<ChunkStore['upsert']>().mockRejectedValue(error),
    markDocument: vi.fn<ChunkStore['markDocument']>().mockResolvedValue(undefined),
    search: vi.fn<ChunkStore['search']>(),
    amendMetadata: vi.fn<ChunkStore['amendMetadata']>(),
    deleteDocument: vi.fn<ChunkStore['deleteDocument']>(),
  } satisfies ChunkStore;
}

function words(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}

// =============================================================================
// Tests
// =============================================================================

describe('IngestionPipeline', () => {
  let adapter: FakeAdapter;
  let store: InMemoryChunkStore;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    adapter = createFakeAdapter();
    adapter.embedBatch.mockImplementation(async (texts) => ({
      embeddings: texts.map((_, i) => axisVector(i)),
      usage: { promptTokens: texts.length, totalTokens: texts.length },
    }));

    store = new InMemoryChunkStore();
    const embeddings = new EmbeddingService(adapter, {
      batchSize: 2,
      retry: { baseDelayMs: 0, minDelayMs: 0, maxDelayMs: 0 },
    });
    pipeline = new IngestionPipeline(new ChunkingService(), embeddings, store);
  });

  describe('ingest', () => {
    it('should embed in batches and store every chunk', async () => {
      const report = await pipeline.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS);

      expect(report).toMatchObject({
        documentId: 'doc-1',
        status: 'completed',
        totalChunks: 3,
        embeddedChunks: 3,
        failedChunks: [],
      });
      expect(adapter.embedBatch).toHaveBeenCalledTimes(2);
      expect(adapter.embedBatch.mock.calls[0][0]).toEqual(['alpha beta', 'gamma delta']);
      expect(adapter.embedBatch.mock.calls[1][0]).toEqual(['epsilon zeta']);
      expect(store.size('doc-1')).toBe(3);
      expect(store.documentState('doc-1')).toEqual({
        organizationId: 7,
        status: 'completed',
        errorMessage: null,
      });
    });

    it('should replace the chunks of an earlier version of the document', async () => {
      const longer = words('old', 50);
      const shorter = words('new', 10);

      await pipeline.ingest({ ...DOCUMENT, text: longer }, { chunkSize: 10, overlap: 0 });
      expect(store.size('doc-1')).toBe(5);

      await pipeline.ingest({ ...DOCUMENT, text: shorter }, { chunkSize: 10, overlap: 0 });
      const results = await store.search(7, axisVector(0), 10);

      expect(store.size('doc-1')).toBe(1);
      expect(results.map((r) => [r.chunkIndex, r.text])).toEqual([[0, shorter]]);
    });

    it('should continue after a failed batch and report its chunks', async () => {
      adapter.embedBatch.mockRejectedValueOnce(
        new LLMError('auth_failed', 'Invalid key', { status: 401 })
      );

      const report = await pipeline.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS);

      expect(report.status).toBe('partial');
      expect(report.embeddedChunks).toBe(1);
      expect(report.failedChunks).toEqual([
        { chunkIndex: 0, error: 'Embedding embed_batch failed: Invalid key', code: 'EMBEDDING_FAILED' },
        { chunkIndex: 1, error: 'Embedding embed_batch failed: Invalid key', code: 'EMBEDDING_FAILED' },
      ]);
      expect(store.size('doc-1')).toBe(1);
      expect(store.documentState('doc-1')).toEqual({
        organizationId: 7,
        status: 'partial',
        errorMessage: '2 of 3 chunks failed to embed: Embedding embed_batch failed: Invalid key',
      });
    });

    it('should report failure and keep no chunks when every batch fails', async () => {
      await pipeline.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS);
      adapter.embedBatch.mockRejectedValue(new LLMError('auth_failed', 'Invalid key', { status: 401 }));

      const report = await pipeline.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS);

      expect(report.status).toBe('failed');
      expect(report.failedChunks.map((f) => f.chunkIndex)).toEqual([0, 1, 2]);
      expect(store.size()).toBe(0);
      expect(store.documentState('doc-1')).toEqual({
        organizationId: 7,
        status: 'failed',
        errorMessage: '3 of 3 chunks failed to embed: Embedding embed_batch failed: Invalid key',
      });
    });

    it('should chunk pages separately with a page number and global indexes', async () => {
      await pipeline.ingest({
        ...DOCUMENT,
        pages: ['Revenue rose sharply', '   ', 'Costs fell slightly'],
        metadata: { fiscalYear: 2024 },
      });

      const results = await store.search(7, axisVector(0), 10);
      const byIndex = [...results].sort((a, b) => a.chunkIndex - b.chunkIndex);

      expect(byIndex.map((r) => [r.chunkIndex, r.text, r.metadata.page, r.metadata.fiscalYear])).toEqual([
        [0, 'Revenue rose sharply', 1, 2024],
        [1, 'Costs fell slightly', 3, 2024],
      ]);
    });

    it('should reject text shorter than 10 characters before chunking', async () => {
      const error = await pipeline.ingest({ ...DOCUMENT, text: '   tiny   ' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionError);
      if (error instanceof IngestionError) {
        expect(error.message).toBe('Extracted text too short: 4 characters (minimum 10)');
        expect(error.stage).toBe('ingestion');
      }
      expect(adapter.embedBatch).not.toHaveBeenCalled();
      expect(store.documentState('doc-1')).toEqual({
        organizationId: 7,
        status: 'failed',
        errorMessage: 'Extracted text too short: 4 characters (minimum 10)',
      });
    });

    it('should propagate invalid chunk options', async () => {
      await expect(
        pipeline.ingest({ ...DOCUMENT, text: TEXT }, { chunkSize: 0 })
      ).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('should wrap store failures and mark the document failed', async () => {
      const failingStore = createFailingStore(new Error('disk full'));
      const failing = new IngestionPipeline(
        new ChunkingService(),
        new EmbeddingService(adapter, { batchSize: 2 }),
        failingStore
      );

      await expect(failing.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS)).rejects.toThrow(
        'Failed to store chunks: disk full'
      );
      expect(failingStore.markDocument.mock.calls).toEqual([
        [DOCUMENT, 'processing', undefined],
        [DOCUMENT, 'failed', 'Failed to store chunks: disk full'],
      ]);
    });

    it('should keep the original error when the failure cannot be recorded', async () => {
      const failingStore = createFailingStore(new Error('disk full'));
      failingStore.markDocument
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('connection lost'));
      const failing = new IngestionPipeline(
        new ChunkingService(),
        new EmbeddingService(adapter, { batchSize: 2 }),
        failingStore
      );

      await expect(failing.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS)).rejects.toThrow(
        'Failed to store chunks: disk full'
      );
    });

    it('should fail before chunking when the status cannot be recorded', async () => {
      const failingStore = createFailingStore(new Error('disk full'));
      failingStore.markDocument.mockRejectedValue(new Error('connection lost'));
      const failing = new IngestionPipeline(
        new ChunkingService(),
        new EmbeddingService(adapter, { batchSize: 2 }),
        failingStore
      );

      await expect(failing.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS)).rejects.toThrow(
        'Failed to record document status: connection lost'
      );
      expect(adapter.embedBatch).not.toHaveBeenCalled();
    });

    it('should stop before embedding when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        pipeline.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS, { signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(adapter.embedBatch).not.toHaveBeenCalled();
    });

    it('should time the run with the injected clock', async () => {
      let tick = 0;
      const timed = new IngestionPipeline(
        new ChunkingService(),
        new EmbeddingService(adapter, { batchSize: 2 }),
        store,
        () => (tick++) * 10
      );

      const report = await timed.ingest({ ...DOCUMENT, text: TEXT }, SMALL_CHUNKS);

      // start, three mark/measure pairs, then the final reading
      expect(report.durationMs).toBe(70);
    });
  });

  describe('ingestFile', () => {
    it('should ingest extracted text', async () => {
      const report = await pipeline.ingestFile(Buffer.from(TEXT, 'utf-8'), 'minutes.txt', DOCUMENT, SMALL_CHUNKS);

      expect(report.status).toBe('completed');
      expect(report.totalChunks).toBe(3);
    });

    it('should wrap extraction failures and mark the document failed', async () => {
      const message =
        'Failed to extract text from scan.png: Unsupported file type: .png. Supported types: .pdf, .txt, .md, .docx';

      await expect(pipeline.ingestFile(Buffer.from('x'), 'scan.png', DOCUMENT)).rejects.toThrow(message);
      expect(store.documentState('doc-1')).toEqual({
        organizationId: 7,
        status: 'failed',
        errorMessage: message,
      });
    });
  });
});
