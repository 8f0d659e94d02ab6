/**
 * Zod schemas for fields extracted from single financial documents.
 *
 * Every field is required but nullable, which is the shape strict JSON
 * schema mode accepts. Amounts arrive as numbers or as strings like
 * "€8,00" and are coerced to numbers.
 */

import { z } from 'zod';

/**
 * "€8,00" and " 8.0 " become 8; a string with no digits becomes 0.
 * Non-strings pass through to the number check.
 */
export function coerceAmount(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const cleaned = value
    .trim()
    .replace(/€/g, '')
    .replace(/,/g, '.')
    .replace(/[^0-9.-]/g, '');
  return cleaned === '' ? 0 : Number(cleaned);
}

const amount = z.preprocess(coerceAmount, z.number());

export const extractedItemSchema = z.object({
  name: z.string().min(1).max(255),
  /** Line total, not unit price */
  amount,
  quantity: amount.nullable(),
  unit: z.string().max(50).nullable(),
});

export const costDataSchema = z.object({
  date: z.string().nullable(),
  vendor: z.string().nullable(),
  category: z.string().nullable(),
  description: z.string().nullable(),
  amount: amount.nullable(),
  currency: z.string().nullable(),
  items: z.array(extractedItemSchema).nullable(),
  confidence: z.number().min(0).max(1).nullable(),
});

export const transactionItemSchema = z.object({
  date: z.string().nullable(),
  description: z.string().nullable(),
  amount: amount.nullable(),
});

export const profitDataSchema = z.object({
  date: z.string().nullable(),
  source: z.string().nullable(),
  amount: amount.nullable(),
  currency: z.string().nullable(),
  donorName: z.string().nullable(),
  description: z.string().nullable(),
  reference: z.string().nullable(),
  transactionItems: z.array(transactionItemSchema).nullable(),
  confidence: z.number().min(0).max(1).nullable(),
});

export type ExtractedItem = z.infer<typeof extractedItemSchema>;
export type ExtractedCostData = z.infer<typeof costDataSchema>;
export type TransactionItem = z.infer<typeof transactionItemSchema>;
export type ExtractedProfitData = z.infer<typeof profitDataSchema>;
