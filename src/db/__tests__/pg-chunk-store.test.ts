/**
 * Tests for the Postgres chunk store query and row mapping.
 */

import { describe, it, expect, afterAll } from 'vitest';
import { PgDialect } from 'drizzle-orm/pg-core';
import {
  buildSearchQuery,
  deleteDocumentChunks,
  markDocumentRow,
  parseSearchRows,
  upsertDocumentRow,
} from '../pg-chunk-store';
import { closeDb, getDb } from '../client';
import { fromVectorLiteral, toVectorLiteral } from '../schema';

const LEASE = { documentId: 'doc-1', documentName: 'lease.pdf', organizationId: 7 };

// Statements are rendered, never sent
afterAll(async () => {
  await closeDb();
});

describe('vector literals', () => {
  it('should serialize to pgvector text format', () => {
    expect(toVectorLiteral([0.5, -1, 0])).toBe('[0.5,-1,0]');
  });

  it('should parse pgvector text format', () => {
    expect(fromVectorLiteral('[0.5,-1,0]')).toEqual([0.5, -1, 0]);
    expect(fromVectorLiteral('[]')).toEqual([]);
  });
});

describe('buildSearchQuery', () => {
  it('should filter by organization and bind vector and limit', () => {
    const query = new PgDialect().sqlToQuery(buildSearchQuery(7, [0.5, -1], 3));

    expect(query.params).toEqual(['[0.5,-1]', 7, '[0.5,-1]', 3]);
    expect(query.sql).toContain('1 - (dc.embedding <=> $1::vector) AS similarity');
    expect(query.sql).toContain('WHERE dp.organization_id = $2');
    expect(query.sql).toContain('ORDER BY dc.embedding <=> $3::vector, dc.id');
    expect(query.sql).toContain('LIMIT $4');
  });
});

describe('parseSearchRows', () => {
  it('should map rows and coerce numeric strings', () => {
    const chunks = parseSearchRows([
      {
        chunk_id: 42,
        document_id: '6b1f1c1e-0000-4000-8000-000000000001',
        document_name: 'invoice.pdf',
        chunk_index: '3',
        chunk_text: 'Consulting fee: 5,000 EUR.',
        chunk_metadata: { page: 2 },
        similarity: '0.8125',
      },
    ]);

    expect(chunks).toEqual([
      {
        chunkId: '42',
        documentId: '6b1f1c1e-0000-4000-8000-000000000001',
        documentName: 'invoice.pdf',
        chunkIndex: 3,
        text: 'Consulting fee: 5,000 EUR.',
        similarityScore: 0.8125,
        metadata: { page: 2 },
      },
    ]);
  });

  it('should default missing metadata to an empty object', () => {
    const [chunk] = parseSearchRows([
      {
        chunk_id: '1',
        document_id: 'doc-1',
        document_name: 'lease.pdf',
        chunk_index: 0,
        chunk_text: 'Monthly rent: 1,200 EUR.',
        chunk_metadata: null,
        similarity: 0.9,
      },
    ]);

    expect(chunk.metadata).toEqual({});
  });

  it('should reject malformed rows', () => {
    expect(() => parseSearchRows([{ chunk_id: 1 }])).toThrow();
  });
});

describe('document statements', () => {
  it('should move an existing document row to the new organization', () => {
    const query = upsertDocumentRow(getDb(), LEASE).toSQL();

    expect(query.sql).toContain(
      'on conflict ("id") do update set "organization_id" = $5, "file_name" = $6, "updated_at" = $7'
    );
    expect(query.params).toEqual(['doc-1', 7, 'lease.pdf', 'processing', 7, 'lease.pdf', expect.any(String)]);
  });

  it('should write the status and error message on insert and on conflict', () => {
    const query = markDocumentRow(getDb(), LEASE, 'failed', 'Invalid key').toSQL();

    expect(query.sql).toContain('"processing_status" = $8, "error_message" = $9');
    expect(query.params).toEqual([
      'doc-1',
      7,
      'lease.pdf',
      'failed',
      'Invalid key',
      7,
      'lease.pdf',
      'failed',
      'Invalid key',
      expect.any(String),
    ]);
  });

  it('should clear a previous error message', () => {
    const query = markDocumentRow(getDb(), LEASE, 'completed', null).toSQL();

    expect(query.params.slice(3, 5)).toEqual(['completed', null]);
  });

  it('should delete every chunk of a document', () => {
    const query = deleteDocumentChunks(getDb(), 'doc-1').toSQL();

    expect(query.sql).toMatch(/^delete from "document_chunks" where .*"document_processing_id" = \$1 returning "id"$/);
    expect(query.params).toEqual(['doc-1']);
  });
});
