/**
 * File Parser Utility
 *
 * Extracts text content from various file formats:
 * - PDF (.pdf)
 * - Plain text (.txt)
 * - Markdown (.md)
 * - Word documents (.docx)
 */

import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';

type PDFTextResult = Awaited<ReturnType<PDFParse['getText']>>;

// =============================================================================
// Types
// =============================================================================

export interface ParseResult {
  content: string;
  /** Per-page text, for formats with pages (PDF) */
  pages?: string[];
  metadata: {
    pageCount?: number;
    wordCount: number;
    charCount: number;
  };
}

export type SupportedMimeType =
  | 'application/pdf'
  | 'text/plain'
  | 'text/markdown'
  | 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const MIME_TYPE_MAP: Record<SupportedExtension, SupportedMimeType> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Check if file type is supported.
 */
export function isSupportedFileType(filename: string): boolean {
  return isSupportedExtension(getFileExtension(filename));
}

/**
 * Get MIME type from filename.
 */
export function getMimeType(filename: string): SupportedMimeType | null {
  const ext = getFileExtension(filename);
  return isSupportedExtension(ext) ? MIME_TYPE_MAP[ext] : null;
}

// =============================================================================
// Parsers
// =============================================================================

/**
 * Normalise extracted text: unix newlines, at most one blank line in a row.
 */
function cleanText(raw: string): string {
  return raw
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/-- \d+ of \d+ --/g, '') // Remove page markers
    .trim();
}

function countWords(content: string): number {
  return content.split(/\s+/).filter(Boolean).length;
}

/**
 * Parse PDF file and extract text, keeping page boundaries.
 */
async function parsePDF(buffer: Buffer): Promise<ParseResult> {
  const parser = new PDFParse({ data: buffer });

  let result: PDFTextResult;
  try {
    result = await parser.getText();
  } finally {
    await parser.destroy();
  }

  const pages = (result.pages ?? [])
    .slice()
    .sort((a, b) => a.num - b.num)
    .map((page) => cleanText(page.text));
  const content = pages.length > 0 ? pages.filter(Boolean).join('\n\n') : cleanText(result.text);

  return {
    content,
    ...(pages.length > 0 && { pages }),
    metadata: {
      pageCount: result.total ?? (pages.length || undefined),
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

/**
 * Parse plain text file.
 */
async function parseText(buffer: Buffer): Promise<ParseResult> {
  const content = buffer.toString('utf-8').replace(/\r\n/g, '\n').trim();

  return {
    content,
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

/**
 * Parse Markdown file (treat as plain text, preserve formatting).
 */
async function parseMarkdown(buffer: Buffer): Promise<ParseResult> {
  const content = buffer.toString('utf-8').replace(/\r\n/g, '\n').trim();

  return {
    content,
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

/**
 * Parse DOCX file and extract text.
 */
async function parseDOCX(buffer: Buffer): Promise<ParseResult> {
  const result = await mammoth.extractRawText({ buffer });

  const content = cleanText(result.value);

  return {
    content,
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

// =============================================================================
// Main Parser
// =============================================================================

/**
 * Parse a file and extract text content.
 *
 * @param buffer - File contents as Buffer
 * @param filename - Original filename (for type detection)
 * @returns Parsed content and metadata
 * @throws Error if file type is not supported
 */
export async function parseFile(
  buffer: Buffer,
  filename: string
): Promise<ParseResult> {
  const ext = getFileExtension(filename);

  if (!isSupportedExtension(ext)) {
    throw new Error(
      `Unsupported file type: ${ext}. Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  switch (ext) {
    case '.pdf':
      return parsePDF(buffer);
    case '.txt':
      return parseText(buffer);
    case '.md':
      return parseMarkdown(buffer);
    case '.docx':
      return parseDOCX(buffer);
  }
}

/**
 * Validate file before parsing.
 */
export function validateFile(
  file: { name: string; size: number }
): { valid: boolean; error?: string } {
  if (!isSupportedFileType(file.name)) {
    return {
      valid: false,
      error: `Unsupported file type. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    };
  }

  if (file.size > MAX_FILE_SIZE) {
    return {
      valid: false,
      error: `File too large. Maximum size: ${MAX_FILE_SIZE / 1024 / 1024}MB`,
    };
  }

  if (file.size === 0) {
    return {
      valid: false,
      error: 'File is empty',
    };
  }

  return { valid: true };
}
