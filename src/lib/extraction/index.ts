/**
 * Structured field extraction exports.
 */

export {
  FinancialDataExtractor,
  DEFAULT_EXTRACTION_MAX_TOKENS,
  parseExtraction,
  stripJsonFence,
} from './extractor';
export type { ExtractorConfig, ExtractOptions, ExtractionMode } from './extractor';

export {
  coerceAmount,
  costDataSchema,
  profitDataSchema,
  extractedItemSchema,
  transactionItemSchema,
} from './schemas';
export type {
  ExtractedCostData,
  ExtractedProfitData,
  ExtractedItem,
  TransactionItem,
} from './schemas';
