/**
 * Financial Data Extractor
 *
 * Pulls cost and revenue fields out of one document's text with the LLM:
 * 1. Ask for a response that the provider holds to the field schema
 * 2. If the provider rejects the request or the reply does not validate,
 *    ask again in plain JSON mode at temperature 0
 * 3. Validate the reply with the same zod schema
 *
 * Rate limits, auth failures, timeouts and aborts are not retried in JSON
 * mode. Every failure leaves as an ExtractionError carrying the LLMError.
 */

import { z } from 'zod';
import { zodResponseFormat } from 'openai/helpers/zod';
import type {
  LLMAdapter,
  LLMCompletionResponse,
  LLMMessage,
  LLMResponseFormat,
} from '@/lib/llm/adapter';
import { LLMError, toLLMError, type LLMErrorKind } from '@/lib/llm/errors';
import {
  buildCostExtractionPrompt,
  buildExtractionUserPrompt,
  buildProfitExtractionPrompt,
} from '@/lib/llm/extraction-prompts';
import { ExtractionError, InvalidInputError } from '@/lib/errors';
import { createLayerLogger, logExternalCall, truncateText } from '@/lib/logger';
import {
  costDataSchema,
  profitDataSchema,
  type ExtractedCostData,
  type ExtractedProfitData,
} from './schemas';

const log = createLayerLogger('ingestion', 'extraction');

export const DEFAULT_EXTRACTION_MAX_TOKENS = 1000;

/** Failures a plain JSON-mode request can get past */
const FALLBACK_KINDS: ReadonlySet<LLMErrorKind> = new Set([
  'bad_request',
  'unsupported_parameter',
  'malformed_response',
]);

export type ExtractionMode = 'json_schema' | 'json_object';

export interface ExtractorConfig {
  /** Completion model; the adapter default when unset */
  model?: string;
  maxTokens: number;
  now: () => number;
}

export interface ExtractOptions {
  signal?: AbortSignal;
}

interface ExtractionTarget<T extends z.ZodTypeAny> {
  kind: 'cost' | 'profit';
  /** Subject named in the user prompt */
  subject: string;
  systemPrompt: string;
  schema: T;
  format: LLMResponseFormat;
}

function schemaFormat(schema: z.ZodTypeAny, name: string): LLMResponseFormat {
  const { json_schema } = zodResponseFormat(schema, name);
  return { type: 'json_schema', name: json_schema.name, schema: json_schema.schema ?? {} };
}

const COST_TARGET: ExtractionTarget<typeof costDataSchema> = {
  kind: 'cost',
  subject: 'cost',
  systemPrompt: buildCostExtractionPrompt(),
  schema: costDataSchema,
  format: schemaFormat(costDataSchema, 'cost_data'),
};

const PROFIT_TARGET: ExtractionTarget<typeof profitDataSchema> = {
  kind: 'profit',
  subject: 'profit/revenue',
  systemPrompt: buildProfitExtractionPrompt(),
  schema: profitDataSchema,
  format: schemaFormat(profitDataSchema, 'profit_data'),
};

/**
 * Remove a surrounding markdown code fence from a model reply.
 */
export function stripJsonFence(content: string): string {
  let cleaned = content.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  }
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Parse and validate a reply.
 *
 * @throws LLMError of kind malformed_response
 */
export function parseExtraction<T extends z.ZodTypeAny>(content: string, schema: T): z.output<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonFence(content));
  } catch {
    throw new LLMError('malformed_response', 'Extraction response is not valid JSON');
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new LLMError('malformed_response', `Schema validation failed: ${issues}`);
  }
  return result.data;
}

export class FinancialDataExtractor {
  private readonly config: ExtractorConfig;

  constructor(
    private readonly llm: LLMAdapter,
    config: Partial<ExtractorConfig> = {}
  ) {
    this.config = {
      model: config.model,
      maxTokens: config.maxTokens ?? DEFAULT_EXTRACTION_MAX_TOKENS,
      now: config.now ?? Date.now,
    };
  }

  /**
   * Extract expense fields from a receipt, invoice or bill.
   *
   * @throws InvalidInputError for blank text
   * @throws ExtractionError when no valid reply could be obtained
   */
  extractCost(text: string, options: ExtractOptions = {}): Promise<ExtractedCostData> {
    return this.extract(COST_TARGET, text, options);
  }

  /**
   * Extract incoming-money fields from a donation receipt, grant award,
   * sent invoice or bank statement.
   *
   * @throws InvalidInputError for blank text
   * @throws ExtractionError when no valid reply could be obtained
   */
  extractProfit(text: string, options: ExtractOptions = {}): Promise<ExtractedProfitData> {
    return this.extract(PROFIT_TARGET, text, options);
  }

  private async extract<T extends z.ZodTypeAny>(
    target: ExtractionTarget<T>,
    text: string,
    options: ExtractOptions
  ): Promise<z.output<T>> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new InvalidInputError('Document text cannot be empty', 'extraction');
    }

    const messages: LLMMessage[] = [
      { role: 'system', content: target.systemPrompt },
      { role: 'user', content: buildExtractionUserPrompt(target.subject, trimmed) },
    ];

    try {
      return await this.request(target, messages, 'json_schema', options);
    } catch (error) {
      const llmError = toLLMError(error);
      if (!FALLBACK_KINDS.has(llmError.kind)) {
        throw new ExtractionError(`${target.kind} extraction failed: ${llmError.message}`, {
          cause: llmError,
        });
      }
      log.warn(
        { event: 'extraction_fallback', kind: target.kind, reason: llmError.message },
        'Falling back to JSON mode'
      );
    }

    try {
      return await this.request(target, messages, 'json_object', options);
    } catch (error) {
      const llmError = toLLMError(error);
      throw new ExtractionError(
        `${target.kind} extraction failed in JSON mode: ${llmError.message}`,
        { cause: llmError }
      );
    }
  }

  private async request<T extends z.ZodTypeAny>(
    target: ExtractionTarget<T>,
    messages: LLMMessage[],
    mode: ExtractionMode,
    options: ExtractOptions
  ): Promise<z.output<T>> {
    const startedAt = this.config.now();
    const operation = `extract_${target.kind}`;

    let response: LLMCompletionResponse;
    try {
      response = await this.llm.complete(messages, {
        model: this.config.model,
        temperature: 0,
        maxTokens: this.config.maxTokens,
        responseFormat: mode === 'json_schema' ? target.format : { type: 'json_object' },
        signal: options.signal,
      });
    } catch (error) {
      const llmError = toLLMError(error);
      logExternalCall(log, 'openai', operation, {
        duration_ms: this.config.now() - startedAt,
        status: llmError.status ?? llmError.kind,
        error: llmError.message,
      });
      throw llmError;
    }

    logExternalCall(log, 'openai', operation, {
      duration_ms: this.config.now() - startedAt,
      tokens: response.usage.totalTokens,
      model: this.config.model,
    });

    try {
      const data = parseExtraction(response.content, target.schema);
      log.info({ event: 'extraction_complete', kind: target.kind, mode }, 'Fields extracted');
      return data;
    } catch (parseError) {
      log.error(
        {
          event: 'extraction_parse_error',
          kind: target.kind,
          mode,
          response: truncateText(response.content, 500),
          error: toLLMError(parseError).message,
        },
        'Failed to parse extraction response'
      );
      throw parseError;
    }
  }
}
